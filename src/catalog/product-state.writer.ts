import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pipelineConfig } from '../config/pipeline.config';
import { ActivityLogService } from '../common/activity-log.service';
import { ConcurrentUpdateConflictError } from '../common/errors/pipeline.errors';
import { CATALOG_STORE, CatalogStore } from './catalog.types';
import { ListingProduct, ListingProductPatch } from './entities/listing-product.entity';

export type WriteResult =
    | { kind: 'updated'; product: ListingProduct }
    | { kind: 'forced'; product: ListingProduct }
    | { kind: 'unchanged'; product: ListingProduct }
    | { kind: 'missing' };

/** Derives the patch from the freshest row; null means nothing to write. */
export type PatchFn = (current: ListingProduct) => ListingProductPatch | null;

/**
 * Read-modify-write of one product's status columns under the optimistic
 * `Version` check. Callers hold the product's `ProductLockService` lock; the
 * version check covers writers in other processes.
 *
 * When every attempt loses the race the write is applied unconditionally and
 * the conflict is reported as CONCURRENT_UPDATE_CONFLICT.
 */
@Injectable()
export class ProductStateWriter {
    private readonly logger = new Logger(ProductStateWriter.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly catalog: CatalogStore,
        private readonly activityLogService: ActivityLogService,
        @Inject(pipelineConfig.KEY)
        private readonly config: ConfigType<typeof pipelineConfig>,
    ) {}

    async apply(referenceNumber: string, patchFn: PatchFn, source: string): Promise<WriteResult> {
        const attempts = Math.max(1, this.config.writeAttempts);

        for (let attempt = 1; attempt <= attempts; attempt++) {
            const current = await this.catalog.findByReference(referenceNumber);
            if (!current) {
                return { kind: 'missing' };
            }
            const patch = patchFn(current);
            if (!patch) {
                return { kind: 'unchanged', product: current };
            }
            const updated = await this.catalog.updateProduct(referenceNumber, patch, current.Version);
            if (updated) {
                return { kind: 'updated', product: updated };
            }
            this.logger.debug(`[${source} ${referenceNumber}] Version ${current.Version} stale (attempt ${attempt}/${attempts})`);
        }

        const conflict = new ConcurrentUpdateConflictError(referenceNumber, attempts);
        this.logger.warn(`[${source} ${referenceNumber}] ${conflict.message}; applying last-write-wins`);

        const latest = await this.catalog.findByReference(referenceNumber);
        if (!latest) {
            return { kind: 'missing' };
        }
        const patch = patchFn(latest);
        if (!patch) {
            return { kind: 'unchanged', product: latest };
        }
        const forced = await this.catalog.forceUpdateProduct(referenceNumber, patch);
        await this.activityLogService.logProductEvent(
            referenceNumber,
            conflict.code,
            'NeedsAttention',
            `${source}: ${conflict.message}; last write applied without version check`,
            { source, attempts, patch },
        );
        return forced ? { kind: 'forced', product: forced } : { kind: 'missing' };
    }
}
