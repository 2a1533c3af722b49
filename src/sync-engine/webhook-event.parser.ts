export type WebhookEventType = 'create_success' | 'update_success' | 'create_failure' | 'update_failure';

/** Wire event names as sent in the event header (or the body's `event` field). */
export const WEBHOOK_EVENT_NAMES: ReadonlyMap<string, WebhookEventType> = new Map<string, WebhookEventType>([
    ['product/create', 'create_success'],
    ['product/update', 'update_success'],
    ['product/fail_to_create', 'create_failure'],
    ['product/fail_to_update', 'update_failure'],
]);

export type KeyLocation = 'top_level' | 'nested';

export type ParsedWebhookEvent =
    | { kind: 'success'; eventType: WebhookEventType; referenceNumber: string; remoteId: string; keyLocation: KeyLocation }
    | { kind: 'failure'; eventType: WebhookEventType; referenceNumber: string; errors: string; keyLocation: KeyLocation }
    | { kind: 'ambiguous'; eventType: WebhookEventType; reason: string }
    | { kind: 'unsupported'; eventType: string | null };

export const UNKNOWN_WEBHOOK_ERROR = 'Unknown error';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function identifier(value: unknown): string | null {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
        return value.trim();
    }
    return null;
}

export function isSuccessEvent(eventType: WebhookEventType): boolean {
    return eventType === 'create_success' || eventType === 'update_success';
}

/**
 * Failure events carry the reference number at the top level, success events
 * nest it under `product`. Both places are tried, top level first.
 */
export function parseWebhookEvent(eventName: string | null, body: unknown): ParsedWebhookEvent {
    const eventType = eventName ? WEBHOOK_EVENT_NAMES.get(eventName) : undefined;
    if (!eventType) {
        return { kind: 'unsupported', eventType: eventName };
    }
    if (!isRecord(body)) {
        return { kind: 'ambiguous', eventType, reason: 'body is not a JSON object' };
    }

    const product = isRecord(body.product) ? body.product : null;
    const topLevel = identifier(body.reference_number);
    const nested = product ? identifier(product.reference_number) : null;
    const referenceNumber = topLevel ?? nested;
    if (referenceNumber === null) {
        return { kind: 'ambiguous', eventType, reason: 'no reference_number at the top level or under product' };
    }
    const keyLocation: KeyLocation = topLevel !== null ? 'top_level' : 'nested';

    if (isSuccessEvent(eventType)) {
        const remoteId = product ? identifier(product.id) : null;
        if (remoteId === null) {
            return { kind: 'ambiguous', eventType, reason: `success event for ${referenceNumber} carries no product.id` };
        }
        return { kind: 'success', eventType, referenceNumber, remoteId, keyLocation };
    }

    const errors = body.errors === undefined || body.errors === null ? UNKNOWN_WEBHOOK_ERROR : JSON.stringify(body.errors);
    return { kind: 'failure', eventType, referenceNumber, errors, keyLocation };
}
