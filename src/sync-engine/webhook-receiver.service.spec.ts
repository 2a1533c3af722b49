import { ProductStateWriter } from '../catalog/product-state.writer';
import { buildProduct, InMemoryCatalog } from '../catalog/testing/in-memory-catalog';
import { ActivityLogEntry } from '../common/activity-log.service';
import { ProductLockService } from '../common/product-lock.service';
import { createRecordingActivityLog } from '../common/testing/activity-log.testing';
import { testPipelineConfig } from '../config/testing/config.fixtures';
import { WebhookReceiverService } from './webhook-receiver.service';

describe('WebhookReceiverService', () => {
    let catalog: InMemoryCatalog;
    let entries: ActivityLogEntry[];
    let sleeps: number[];
    let onSleep: (() => void) | undefined;
    let receiver: WebhookReceiverService;

    beforeEach(() => {
        catalog = new InMemoryCatalog();
        sleeps = [];
        onSleep = undefined;
        const config = testPipelineConfig({ webhookLookupAttempts: 3, webhookLookupDelayMs: 250 });
        const activity = createRecordingActivityLog();
        entries = activity.entries;
        receiver = new WebhookReceiverService(
            catalog,
            new ProductStateWriter(catalog, activity.service, config),
            new ProductLockService(),
            activity.service,
            config,
            async ms => {
                sleeps.push(ms);
                onSleep?.();
            },
        );
    });

    // ---------------------------------------------------------------------------
    // Success events
    // ---------------------------------------------------------------------------

    it('publishes a pending product from a nested success event', async () => {
        catalog.seed({
            product: buildProduct({ ReferenceNumber: 'REF-123', PublishStatus: 'pending_confirmation', RequestUid: 'uid-1' }),
        });

        const result = await receiver.handle('wh-1', 'product/create', {
            product: { id: 98765, reference_number: 'REF-123' },
        });

        expect(result).toEqual({ webhookId: 'wh-1', disposition: 'published', referenceNumber: 'REF-123' });
        expect(catalog.get('REF-123')).toMatchObject({
            PublishStatus: 'published',
            RemoteId: '98765',
            RequestUid: 'uid-1',
            LastError: null,
        });
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({ EntityType: 'Product', EntityId: 'REF-123', EventType: 'LISTING_PUBLISHED', Status: 'Success' });
    });

    it('treats a repeated success event as a no-op', async () => {
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-123', PublishStatus: 'pending_confirmation' }) });
        const body = { product: { id: 98765, reference_number: 'REF-123' } };

        await receiver.handle('wh-1', 'product/create', body);
        const versionAfterFirst = catalog.get('REF-123')?.Version;
        const second = await receiver.handle('wh-2', 'product/create', body);

        expect(second.disposition).toBe('duplicate');
        expect(catalog.get('REF-123')).toMatchObject({ PublishStatus: 'published', RemoteId: '98765', Version: versionAfterFirst });
        expect(entries.map(e => e.EventType)).toEqual(['LISTING_PUBLISHED']);
    });

    it('publishes a product whose pending write has not landed yet', async () => {
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-5', PublishStatus: 'unregistered' }) });

        const result = await receiver.handle('wh-1', 'product/create', { product: { id: '777', reference_number: 'REF-5' } });

        expect(result.disposition).toBe('published');
        expect(catalog.get('REF-5')).toMatchObject({ PublishStatus: 'published', RemoteId: '777' });
    });

    it('waits for a product that is not visible yet', async () => {
        onSleep = () => {
            if (!catalog.get('REF-7')) {
                catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-7', PublishStatus: 'pending_confirmation' }) });
            }
        };

        const result = await receiver.handle('wh-1', 'product/create', { product: { id: 1, reference_number: 'REF-7' } });

        expect(sleeps).toEqual([250]);
        expect(result.disposition).toBe('published');
    });

    it('reports a reference that never shows up', async () => {
        const result = await receiver.handle('wh-9', 'product/create', { product: { id: 1, reference_number: 'REF-404' } });

        expect(result).toEqual({ webhookId: 'wh-9', disposition: 'unknown_reference', referenceNumber: 'REF-404' });
        expect(sleeps).toEqual([250, 250]);
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
            EntityType: 'Webhook',
            EntityId: 'wh-9',
            EventType: 'WEBHOOK_UNKNOWN_REFERENCE',
            Status: 'NeedsAttention',
        });
    });

    // ---------------------------------------------------------------------------
    // Failure events
    // ---------------------------------------------------------------------------

    it('fails a pending product and stores the error text', async () => {
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-9', PublishStatus: 'pending_confirmation' }) });

        const result = await receiver.handle('wh-1', 'product/fail_to_create', {
            reference_number: 'REF-9',
            errors: { name: ['contains a banned word'] },
        });

        expect(result.disposition).toBe('failed');
        expect(catalog.get('REF-9')).toMatchObject({
            PublishStatus: 'failed',
            LastError: '{"name":["contains a banned word"]}',
        });
        expect(entries[0]).toMatchObject({ EventType: 'LISTING_FAILED', Status: 'Failed' });
    });

    it('ignores a repeated failure with the same error', async () => {
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-9', PublishStatus: 'pending_confirmation' }) });
        const body = { reference_number: 'REF-9' };

        await receiver.handle('wh-1', 'product/fail_to_create', body);
        const second = await receiver.handle('wh-2', 'product/fail_to_create', body);

        expect(second.disposition).toBe('duplicate');
        expect(catalog.get('REF-9')?.LastError).toBe('Unknown error');
        expect(entries).toHaveLength(1);
    });

    it('keeps the remote id when an update fails on a published product', async () => {
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-2', PublishStatus: 'published', RemoteId: '555' }) });

        await receiver.handle('wh-1', 'product/fail_to_update', { reference_number: 'REF-2', errors: ['price too low'] });

        expect(catalog.get('REF-2')).toMatchObject({ PublishStatus: 'failed', RemoteId: '555', LastError: '["price too low"]' });
    });

    // ---------------------------------------------------------------------------
    // Unusable events
    // ---------------------------------------------------------------------------

    it('logs an ambiguous failure event and changes nothing', async () => {
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-1', PublishStatus: 'pending_confirmation' }) });
        const body = { errors: { base: ['unknown'] } };

        const result = await receiver.handle('wh-3', 'product/fail_to_create', body);

        expect(result).toEqual({ webhookId: 'wh-3', disposition: 'ambiguous', referenceNumber: null });
        expect(catalog.get('REF-1')).toMatchObject({ PublishStatus: 'pending_confirmation', Version: 1 });
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
            EntityType: 'Webhook',
            EntityId: 'wh-3',
            EventType: 'AMBIGUOUS_WEBHOOK',
            Status: 'NeedsAttention',
        });
        expect(entries[0].Details).toMatchObject({ eventType: 'product/fail_to_create', rawBody: body });
    });

    it('ignores unsupported event types with a warning entry', async () => {
        const result = await receiver.handle('wh-4', 'order/create', { reference_number: 'REF-1' });

        expect(result.disposition).toBe('unsupported');
        expect(entries[0]).toMatchObject({ EventType: 'WEBHOOK_UNSUPPORTED_EVENT', Status: 'Warning' });
    });
});
