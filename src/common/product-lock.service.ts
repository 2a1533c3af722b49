import { Injectable } from '@nestjs/common';

/**
 * Serializes work on a single product (keyed by reference number) inside this
 * process. The orchestrator, the webhook receiver and the reconciliation loop
 * all write the same status columns, so each of them wraps its
 * read-modify-write in `runExclusive`.
 */
@Injectable()
export class ProductLockService {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
