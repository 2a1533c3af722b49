import { PublishStatus } from '../catalog/entities/listing-product.entity';

/**
 * Events that move a listing through
 * unregistered -> pending_confirmation -> published | failed.
 *
 * `submitAccepted` / `submitRejected` come from the outbound call,
 * `confirm*` from the marketplace webhook, `operatorReset` from the
 * operator after a data fix.
 */
export type PublishEvent =
  | 'submitAccepted'
  | 'submitRejected'
  | 'confirmSucceeded'
  | 'confirmFailed'
  | 'operatorReset';

function target(current: PublishStatus, event: PublishEvent): PublishStatus | null {
  switch (event) {
    case 'submitAccepted':
      return current === 'unregistered' ? 'pending_confirmation' : null;
    case 'submitRejected':
      return current === 'unregistered' ? 'failed' : null;
    case 'confirmSucceeded':
      return 'published';
    case 'confirmFailed':
      return 'failed';
    case 'operatorReset':
      return current === 'failed' ? 'unregistered' : null;
  }
}

/**
 * Next status for `event`, or null when the event changes nothing.
 *
 * Submission results only apply to a product that is still unregistered, so a
 * confirmation that overtook the submit write is never rolled back to pending.
 * Confirmations apply from any state.
 */
export function transition(current: PublishStatus, event: PublishEvent): PublishStatus | null {
  const next = target(current, event);
  return next === current ? null : next;
}
