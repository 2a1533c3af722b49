import { parseWebhookEvent } from './webhook-event.parser';

describe('parseWebhookEvent', () => {
    it('reads a success event with the reference nested under product', () => {
        const parsed = parseWebhookEvent('product/create', {
            product: { id: 98765, reference_number: 'REF-123' },
        });

        expect(parsed).toEqual({
            kind: 'success',
            eventType: 'create_success',
            referenceNumber: 'REF-123',
            remoteId: '98765',
            keyLocation: 'nested',
        });
    });

    it('prefers the top-level reference when both are present', () => {
        const parsed = parseWebhookEvent('product/update', {
            reference_number: 'REF-TOP',
            product: { id: '5', reference_number: 'REF-NESTED' },
        });

        expect(parsed).toMatchObject({ kind: 'success', referenceNumber: 'REF-TOP', keyLocation: 'top_level' });
    });

    it('reads a failure event with the reference at the top level', () => {
        const parsed = parseWebhookEvent('product/fail_to_create', {
            reference_number: 'REF-9',
            errors: { price: ['is too low'] },
        });

        expect(parsed).toEqual({
            kind: 'failure',
            eventType: 'create_failure',
            referenceNumber: 'REF-9',
            errors: '{"price":["is too low"]}',
            keyLocation: 'top_level',
        });
    });

    it('falls back to a generic error text', () => {
        const parsed = parseWebhookEvent('product/fail_to_update', { reference_number: 'REF-9' });

        expect(parsed).toMatchObject({ kind: 'failure', eventType: 'update_failure', errors: 'Unknown error' });
    });

    it('flags events without a reference in either place as ambiguous', () => {
        expect(parseWebhookEvent('product/fail_to_create', { errors: ['boom'] })).toEqual({
            kind: 'ambiguous',
            eventType: 'create_failure',
            reason: 'no reference_number at the top level or under product',
        });
        expect(parseWebhookEvent('product/create', { product: { id: 1, reference_number: '  ' } })).toMatchObject({
            kind: 'ambiguous',
        });
    });

    it('flags a success event without a remote id as ambiguous', () => {
        expect(parseWebhookEvent('product/create', { product: { reference_number: 'REF-1' } })).toEqual({
            kind: 'ambiguous',
            eventType: 'create_success',
            reason: 'success event for REF-1 carries no product.id',
        });
    });

    it('flags a non-object body as ambiguous', () => {
        expect(parseWebhookEvent('product/create', 'not json')).toMatchObject({
            kind: 'ambiguous',
            reason: 'body is not a JSON object',
        });
    });

    it('reports unknown and missing event names as unsupported', () => {
        expect(parseWebhookEvent('order/create', { reference_number: 'REF-1' })).toEqual({
            kind: 'unsupported',
            eventType: 'order/create',
        });
        expect(parseWebhookEvent(null, {})).toEqual({ kind: 'unsupported', eventType: null });
        expect(parseWebhookEvent('constructor', {})).toEqual({ kind: 'unsupported', eventType: 'constructor' });
    });
});
