import { createRecordingActivityLog } from '../common/testing/activity-log.testing';
import { testPipelineConfig } from '../config/testing/config.fixtures';
import { ProductStateWriter } from './product-state.writer';
import { buildProduct, InMemoryCatalog } from './testing/in-memory-catalog';

describe('ProductStateWriter', () => {
    let catalog: InMemoryCatalog;

    function writerWith(writeAttempts = 3) {
        const activity = createRecordingActivityLog();
        const writer = new ProductStateWriter(catalog, activity.service, testPipelineConfig({ writeAttempts }));
        return { writer, entries: activity.entries };
    }

    beforeEach(() => {
        catalog = new InMemoryCatalog();
        catalog.seed({ product: buildProduct({ ReferenceNumber: 'REF-1', Version: 4 }) });
    });

    it('writes the patch and bumps the version', async () => {
        const { writer } = writerWith();

        const result = await writer.apply('REF-1', () => ({ LastError: 'boom' }), 'TEST');

        expect(result.kind).toBe('updated');
        expect(catalog.get('REF-1')).toMatchObject({ LastError: 'boom', Version: 5 });
    });

    it('does not write when the patch function returns null', async () => {
        const { writer } = writerWith();

        const result = await writer.apply('REF-1', () => null, 'TEST');

        expect(result.kind).toBe('unchanged');
        expect(catalog.get('REF-1')?.Version).toBe(4);
    });

    it('retries on a stale version using the fresh row', async () => {
        const { writer } = writerWith();
        let interfered = false;
        catalog.beforeUpdate = ref => {
            if (!interfered) {
                interfered = true;
                catalog.touch(ref, { Price: 31000 });
            }
        };
        const seenPrices: number[] = [];

        const result = await writer.apply(
            'REF-1',
            current => {
                seenPrices.push(current.Price);
                return { PriceSyncedAt: '2026-02-01T00:00:00.000Z' };
            },
            'TEST',
        );

        expect(result.kind).toBe('updated');
        expect(seenPrices).toEqual([30000, 31000]);
        expect(catalog.get('REF-1')).toMatchObject({ Price: 31000, Version: 6 });
    });

    it('falls back to last-write-wins and reports the conflict', async () => {
        const { writer, entries } = writerWith(2);
        catalog.beforeUpdate = ref => catalog.touch(ref);

        const result = await writer.apply('REF-1', () => ({ PublishStatus: 'published', RemoteId: '555' }), 'WEBHOOK');

        expect(result.kind).toBe('forced');
        expect(catalog.get('REF-1')).toMatchObject({ PublishStatus: 'published', RemoteId: '555' });
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
            EntityType: 'Product',
            EntityId: 'REF-1',
            EventType: 'CONCURRENT_UPDATE_CONFLICT',
            Status: 'NeedsAttention',
        });
    });

    it('reports a missing product', async () => {
        const { writer } = writerWith();

        expect(await writer.apply('REF-404', () => ({ LastError: 'x' }), 'TEST')).toEqual({ kind: 'missing' });
    });
});
