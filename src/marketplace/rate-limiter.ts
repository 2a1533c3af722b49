import { Logger } from '@nestjs/common';
import { QuotaWindowConfig } from '../config/marketplace.config';
import { QuotaExhaustedError } from '../common/errors/pipeline.errors';
import { realSleep, Sleeper } from '../common/sleeper';

export interface RateLimiterOptions {
  windows: QuotaWindowConfig[];
  /** Minimum gap between two consecutive calls. */
  minIntervalMs: number;
  /** Longest a caller may be parked before the window counts as exhausted. */
  maxWaitMs: number;
  now?: () => number;
  sleep?: Sleeper;
}

export interface WindowUsage {
  name: string;
  used: number;
  limit: number;
  windowMs: number;
}

interface Wait {
  ms: number;
  window: string | null;
}

/**
 * Sliding-log limiter over several quota windows plus a minimum spacing.
 *
 * Every `acquire()` joins one promise chain, so callers from the registration
 * batch and the reconciliation pass are admitted strictly one at a time.
 */
export class RateLimiter {
  private readonly logger = new Logger(RateLimiter.name);
  private readonly windows: QuotaWindowConfig[];
  private readonly log = new Map<string, number[]>(); // window name -> call timestamps, oldest first
  private readonly now: () => number;
  private readonly sleep: Sleeper;
  private lastCallAt: number | null = null;
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly options: RateLimiterOptions) {
    this.windows = options.windows;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? realSleep;
    for (const window of this.windows) {
      this.log.set(window.name, []);
    }
  }

  /**
   * Resolves once a call may be issued and records it. Rejects with
   * `QuotaExhaustedError` when a window would keep the caller waiting longer
   * than `maxWaitMs`.
   */
  acquire(): Promise<void> {
    const turn = this.chain.then(() => this.admit());
    this.chain = turn.catch(() => undefined);
    return turn;
  }

  /** Replays calls made before a restart so quota usage survives it. */
  seed(callTimes: Date[]): void {
    const now = this.now();
    const sorted = callTimes.map(t => t.getTime()).filter(t => t <= now).sort((a, b) => a - b);
    for (const window of this.windows) {
      const entries = this.entries(window.name);
      entries.push(...sorted.filter(t => t > now - window.windowMs));
      entries.sort((a, b) => a - b);
    }
    if (sorted.length > 0) {
      const last = sorted[sorted.length - 1];
      this.lastCallAt = this.lastCallAt === null ? last : Math.max(this.lastCallAt, last);
    }
    this.logger.log(`Seeded rate limiter with ${sorted.length} recent call(s): ${this.describeUsage()}`);
  }

  usage(): WindowUsage[] {
    const now = this.now();
    return this.windows.map(window => ({
      name: window.name,
      used: this.prune(window, now).length,
      limit: window.limit,
      windowMs: window.windowMs,
    }));
  }

  private async admit(): Promise<void> {
    const now = this.now();
    const quotaWait = this.quotaWait(now);
    if (quotaWait.ms > this.options.maxWaitMs) {
      this.logger.warn(`Quota window '${quotaWait.window}' full for another ${quotaWait.ms}ms; refusing call. ${this.describeUsage()}`);
      throw new QuotaExhaustedError(
        `Quota window '${quotaWait.window}' exhausted; next slot in ${Math.ceil(quotaWait.ms / 1000)}s`,
        quotaWait.window,
      );
    }

    const spacingWait = this.lastCallAt === null ? 0 : this.lastCallAt + this.options.minIntervalMs - now;
    const wait = Math.max(quotaWait.ms, spacingWait);
    if (wait > 0) {
      if (quotaWait.ms > spacingWait) {
        this.logger.debug(`Waiting ${wait}ms for quota window '${quotaWait.window}'`);
      }
      await this.sleep(wait);
    }

    const at = this.now();
    for (const window of this.windows) {
      this.entries(window.name).push(at);
    }
    this.lastCallAt = at;
  }

  // Time until every window has a free slot, and the window that needs it longest.
  private quotaWait(now: number): Wait {
    let longest: Wait = { ms: 0, window: null };
    for (const window of this.windows) {
      const entries = this.prune(window, now);
      if (entries.length < window.limit) {
        continue;
      }
      // The slot frees up when the entry that pushes us over the limit ages out.
      const blocking = entries[entries.length - window.limit];
      const ms = blocking + window.windowMs - now;
      if (ms > longest.ms) {
        longest = { ms, window: window.name };
      }
    }
    return longest;
  }

  private prune(window: QuotaWindowConfig, now: number): number[] {
    const entries = this.entries(window.name);
    const cutoff = now - window.windowMs;
    let expired = 0;
    while (expired < entries.length && entries[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      entries.splice(0, expired);
    }
    return entries;
  }

  private entries(name: string): number[] {
    let entries = this.log.get(name);
    if (!entries) {
      entries = [];
      this.log.set(name, entries);
    }
    return entries;
  }

  private describeUsage(): string {
    return this.usage()
      .map(u => `${u.name} ${u.used}/${u.limit}`)
      .join(', ');
  }
}
