import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pipelineConfig } from '../config/pipeline.config';
import { QuotaExhaustedPolicy } from '../config/env.validation';
import { StockState } from '../catalog/entities/listing-product-variant.entity';
import { ListingProduct, ListingProductPatch } from '../catalog/entities/listing-product.entity';
import { CATALOG_STORE, CatalogStore, ProductBundle } from '../catalog/catalog.types';
import { ProductStateWriter } from '../catalog/product-state.writer';
import { ActivityLogService } from '../common/activity-log.service';
import { errorMessage, errorStack } from '../common/errors/pipeline.errors';
import { ProductLockService } from '../common/product-lock.service';
import { SLEEPER, Sleeper } from '../common/sleeper';
import { MarketplaceApiClient } from '../marketplace/marketplace-api-client.service';
import { MarketplaceMapper } from '../marketplace/marketplace.mapper';
import { CallOutcome, OutboundDocument, WireControl } from '../marketplace/marketplace.types';
import { MarginCalculator } from '../pricing/margin.calculator';
import { CompetitivePricePolicy } from '../pricing/price-policy';

export type UpdateKind = 'stock_decrease' | 'delist' | 'withdraw' | 'restock' | 'price';

// Lower goes first. A variant must never stay purchasable after its source sold out.
export const UPDATE_PRIORITY: Readonly<Record<UpdateKind, number>> = {
    stock_decrease: 0,
    delist: 0,
    withdraw: 1,
    restock: 2,
    price: 3,
};

export interface StockChange {
    variantId: number;
    to: StockState;
}

export interface PendingUpdate {
    kind: UpdateKind;
    referenceNumber: string;
    productOrder: number;
    /** 0 for the stock update, 1 for the price or withdraw update that follows it. */
    step: 0 | 1;
    priority: number;
    /** Price to advertise; withdrawals and stock updates keep the current one. */
    price: number;
    marginRate: number | null;
}

export interface ReconciliationResult {
    examined: number;
    stockUpdates: number;
    priceUpdates: number;
    withdrawals: number;
    delistings: number;
    failedUpdates: number;
    droppedUpdates: number;
    unchanged: number;
    halted: boolean;
    haltReason: string | null;
}

type ProductPlan = { kind: 'updates'; updates: PendingUpdate[] } | { kind: 'unchanged' } | { kind: 'invalid'; reason: string };

type PushResult =
    | { kind: 'pushed'; outcome: CallOutcome }
    | { kind: 'skipped'; reason: string }
    // The stock already matches the source; later steps for the product still go out.
    | { kind: 'settled' }
    | { kind: 'invalid'; reason: string };

type Rebuilt = { ok: true; document: OutboundDocument } | { ok: false; reason: string };

/** Stable order for one pass: priority, then catalog order, then stock before price. */
export function orderUpdates(updates: PendingUpdate[]): PendingUpdate[] {
    return [...updates].sort(
        (a, b) => a.priority - b.priority || a.productOrder - b.productOrder || a.step - b.step,
    );
}

/** Local columns to write once the marketplace has accepted `update`. */
function patchAfterUpdate(update: PendingUpdate, document: OutboundDocument, now: string): ListingProductPatch {
    switch (update.kind) {
        case 'stock_decrease':
        case 'restock':
        case 'delist':
            return { StockSyncedAt: now, LastPayload: document };
        case 'price':
            return {
                Price: update.price,
                MarginRate: update.marginRate,
                PriceSyncedAt: now,
                StockSyncedAt: now,
                LastPayload: document,
            };
        case 'withdraw':
            return { Control: 'suspend', MarginRate: update.marginRate, StockSyncedAt: now, LastPayload: document };
    }
}

function stockChangesOf(bundle: ProductBundle): StockChange[] {
    return bundle.variants
        .filter(v => v.SourceStockState !== v.StockState)
        .map(v => ({ variantId: v.Id, to: v.SourceStockState }));
}

// Listings registered here always went out as publish.
function advertisedControl(product: ListingProduct): string {
    const control = product.LastPayload?.control;
    return typeof control === 'string' ? control : 'publish';
}

function isHalt(outcome: CallOutcome): boolean {
    return outcome.kind === 'quota_exhausted' || outcome.kind === 'unauthorized';
}

@Injectable()
export class ReconciliationService {
    private readonly logger = new Logger(ReconciliationService.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly catalog: CatalogStore,
        private readonly mapper: MarketplaceMapper,
        private readonly apiClient: MarketplaceApiClient,
        private readonly pricePolicy: CompetitivePricePolicy,
        private readonly marginCalculator: MarginCalculator,
        private readonly writer: ProductStateWriter,
        private readonly locks: ProductLockService,
        private readonly activityLogService: ActivityLogService,
        @Inject(pipelineConfig.KEY)
        private readonly config: ConfigType<typeof pipelineConfig>,
        @Inject(SLEEPER) private readonly sleep: Sleeper,
    ) {}

    /**
     * One pass over published listings, least recently synced first. Failed
     * updates are left for the next pass; nothing is retried within a pass.
     */
    async runPass(limit = this.config.reconcileBatchSize, jobId?: string): Promise<ReconciliationResult> {
        const startedAt = Date.now();
        const tag = `[RECONCILE ${jobId ?? 'manual'}]`;
        const result: ReconciliationResult = {
            examined: 0,
            stockUpdates: 0,
            priceUpdates: 0,
            withdrawals: 0,
            delistings: 0,
            failedUpdates: 0,
            droppedUpdates: 0,
            unchanged: 0,
            halted: false,
            haltReason: null,
        };

        const products = await this.catalog.findPublishedForReconciliation(limit);
        result.examined = products.length;
        this.logger.log(`${tag} Examining ${products.length} published product(s)`);

        const pending: PendingUpdate[] = [];
        for (const [order, product] of products.entries()) {
            let plan: ProductPlan;
            try {
                plan = await this.planProduct(product, order);
            } catch (error) {
                this.logger.error(`[RECONCILE ${product.ReferenceNumber}] Planning failed: ${errorMessage(error)}`, errorStack(error));
                result.failedUpdates++;
                continue;
            }

            switch (plan.kind) {
                case 'invalid':
                    this.logger.warn(`[RECONCILE ${product.ReferenceNumber}] Cannot build update: ${plan.reason}`);
                    result.failedUpdates++;
                    break;
                case 'unchanged':
                    result.unchanged++;
                    await this.touchSynced(product.ReferenceNumber);
                    break;
                case 'updates':
                    pending.push(...plan.updates);
                    break;
            }
        }

        const failedStock = new Set<string>();
        for (const update of orderUpdates(pending)) {
            const ref = update.referenceNumber;
            if (update.step === 1 && failedStock.has(ref)) {
                this.logger.warn(`[RECONCILE ${ref}] Dropping ${update.kind} update; the stock update failed this pass`);
                result.droppedUpdates++;
                continue;
            }

            let pushed: PushResult;
            try {
                pushed = await this.pushWithQuotaPolicy(update);
            } catch (error) {
                this.logger.error(`[RECONCILE ${ref}] ${update.kind} update threw: ${errorMessage(error)}`, errorStack(error));
                result.failedUpdates++;
                if (update.step === 0) {
                    failedStock.add(ref);
                }
                continue;
            }
            if (pushed.kind === 'settled') {
                this.logger.log(`[RECONCILE ${ref}] Stock already in line with the source; nothing to send`);
                result.droppedUpdates++;
                continue;
            }
            if (pushed.kind === 'invalid') {
                this.logger.warn(`[RECONCILE ${ref}] Cannot rebuild ${update.kind} update: ${pushed.reason}`);
                result.failedUpdates++;
                if (update.step === 0) {
                    failedStock.add(ref);
                }
                continue;
            }
            if (pushed.kind === 'skipped') {
                this.logger.log(`[RECONCILE ${ref}] Skipping ${update.kind} update: ${pushed.reason}`);
                result.droppedUpdates++;
                if (update.step === 0) {
                    failedStock.add(ref);
                }
                continue;
            }

            const outcome = pushed.outcome;
            if (isHalt(outcome)) {
                result.halted = true;
                result.haltReason = outcome.kind;
                break;
            }
            if (outcome.kind !== 'submitted') {
                result.failedUpdates++;
                if (update.step === 0) {
                    failedStock.add(ref);
                }
                continue;
            }

            switch (update.kind) {
                case 'stock_decrease':
                case 'restock':
                    result.stockUpdates++;
                    break;
                case 'price':
                    result.priceUpdates++;
                    break;
                case 'withdraw':
                    result.withdrawals++;
                    break;
                case 'delist':
                    result.delistings++;
                    break;
            }
        }

        await this.report(result, tag, startedAt, jobId);
        return result;
    }

    private async planProduct(product: ListingProduct, productOrder: number): Promise<ProductPlan> {
        const ref = product.ReferenceNumber;
        const remoteId = product.RemoteId;
        if (remoteId === null) {
            return { kind: 'invalid', reason: 'published without a remote id' };
        }

        // Taken down locally: only the control goes out, once.
        if (product.Control !== 'publish') {
            const wanted = this.mapper.wireControl(product.Control);
            if (wanted === advertisedControl(product)) {
                return { kind: 'unchanged' };
            }
            this.logger.log(`[RECONCILE ${ref}] Control is ${product.Control}; sending ${wanted} for ${remoteId}`);
            return {
                kind: 'updates',
                updates: [
                    {
                        kind: 'delist',
                        referenceNumber: ref,
                        productOrder,
                        step: 0,
                        priority: UPDATE_PRIORITY.delist,
                        price: product.Price,
                        marginRate: product.MarginRate,
                    },
                ],
            };
        }

        const bundle = await this.catalog.loadBundle(product);
        const stockChanges = stockChangesOf(bundle);

        const observation = product.ModelNo ? await this.catalog.latestPriceObservation(product.ModelNo) : null;
        const decision = this.pricePolicy.decide(product.Price, observation?.LowestPrice ?? null);

        let marginRate = product.MarginRate;
        let withdraw = false;
        if (product.PurchaseCost !== null) {
            const margin = this.marginCalculator.calculate(decision.price, product.PurchaseCost, product.ExpectedShippingFee);
            marginRate = margin.marginRate;
            withdraw = !margin.profitable && this.config.suspendWhenUnprofitable;
            if (withdraw) {
                this.logger.warn(`[RECONCILE ${ref}] Unprofitable at ${decision.price} (margin ${margin.margin}); withdrawing`);
            }
        }
        const priceChanged = decision.price !== product.Price;

        if (stockChanges.length === 0 && !priceChanged && !withdraw) {
            return { kind: 'unchanged' };
        }

        // Catch data problems now; the document that goes out is rebuilt at push time.
        const built = await this.buildUpdate(product, bundle, remoteId, withdraw ? 'suspend' : undefined);
        if (!built.ok) {
            return { kind: 'invalid', reason: built.reason };
        }

        const updates: PendingUpdate[] = [];
        let stockPriority = 0;

        if (stockChanges.length > 0) {
            const kind: UpdateKind = stockChanges.some(c => c.to === 'out_of_stock') ? 'stock_decrease' : 'restock';
            stockPriority = UPDATE_PRIORITY[kind];
            updates.push({
                kind,
                referenceNumber: ref,
                productOrder,
                step: 0,
                priority: stockPriority,
                price: product.Price,
                marginRate: product.MarginRate,
            });
        }

        if (withdraw || priceChanged) {
            const kind: UpdateKind = withdraw ? 'withdraw' : 'price';
            updates.push({
                kind,
                referenceNumber: ref,
                productOrder,
                step: 1,
                // Never ahead of its own stock update.
                priority: Math.max(UPDATE_PRIORITY[kind], stockPriority),
                price: withdraw ? product.Price : decision.price,
                marginRate,
            });
        }

        this.logger.debug(`[RECONCILE ${ref}] Planned ${updates.map(u => u.kind).join(', ')} (${decision.reason})`);
        return { kind: 'updates', updates };
    }

    /** Every document carries the fresh stock, so the update after the stock update repeats it. */
    private async buildUpdate(
        product: ListingProduct,
        bundle: ProductBundle,
        remoteId: string,
        control?: WireControl,
    ): Promise<Rebuilt> {
        const brandId = await this.catalog.resolveBrandId(product);
        const categoryId = await this.catalog.resolveCategoryId(product);
        const variants = bundle.variants.map(v => ({
            ...v,
            StockState: v.SourceStockState,
            Quantity: v.SourceStockState === 'in_stock' ? 1 : 0,
        }));
        const built = this.mapper.buildDocument(
            { ...bundle, product, variants, brandId, categoryId },
            new Date(),
            control ? { remoteId, control } : { remoteId },
        );
        return built.ok
            ? { ok: true, document: built.document }
            : { ok: false, reason: `${built.error.code}: ${built.error.message}` };
    }

    private async pushWithQuotaPolicy(update: PendingUpdate): Promise<PushResult> {
        let pushed = await this.push(update);
        if (this.config.quotaPolicy !== QuotaExhaustedPolicy.BACKOFF) {
            return pushed;
        }
        for (
            let attempt = 1;
            pushed.kind === 'pushed' && pushed.outcome.kind === 'quota_exhausted' && attempt <= this.config.quotaBackoffAttempts;
            attempt++
        ) {
            this.logger.warn(
                `[RECONCILE ${update.referenceNumber}] Quota exhausted; backing off ${this.config.quotaBackoffMs}ms (${attempt}/${this.config.quotaBackoffAttempts})`,
            );
            await this.sleep(this.config.quotaBackoffMs);
            pushed = await this.push(update);
        }
        return pushed;
    }

    /**
     * Re-reads the product under its lock and rebuilds the document from what
     * is stored now, so a pass never sends stock or content it read minutes ago.
     */
    private async push(update: PendingUpdate): Promise<PushResult> {
        const ref = update.referenceNumber;
        return this.locks.runExclusive<PushResult>(ref, async () => {
            const current = await this.catalog.findByReference(ref);
            if (!current || current.PublishStatus !== 'published' || current.RemoteId === null) {
                return { kind: 'skipped', reason: current ? `now ${current.PublishStatus}` : 'product removed' };
            }
            const remoteId = current.RemoteId;

            if (update.kind === 'delist') {
                if (current.Control === 'publish') {
                    return { kind: 'skipped', reason: 'control is publish again' };
                }
                const document = this.mapper.buildControlDocument(current, remoteId);
                const outcome = await this.apiClient.submitProduct('update', document);
                if (outcome.kind === 'submitted') {
                    await this.applySubmitted(update, document, []);
                }
                return { kind: 'pushed', outcome };
            }

            if (current.Control !== 'publish') {
                return { kind: 'skipped', reason: `control is now ${current.Control}` };
            }
            const bundle = await this.catalog.loadBundle(current);
            const stockChanges = stockChangesOf(bundle);
            if (update.step === 0 && stockChanges.length === 0) {
                return { kind: 'settled' };
            }

            const rebuilt = await this.buildUpdate(
                { ...current, Price: update.price },
                bundle,
                remoteId,
                update.kind === 'withdraw' ? 'suspend' : undefined,
            );
            if (!rebuilt.ok) {
                return { kind: 'invalid', reason: rebuilt.reason };
            }

            const outcome = await this.apiClient.submitProduct('update', rebuilt.document);
            if (outcome.kind === 'submitted') {
                await this.applySubmitted(update, rebuilt.document, stockChanges);
            }
            return { kind: 'pushed', outcome };
        });
    }

    private async applySubmitted(update: PendingUpdate, document: OutboundDocument, stockChanges: StockChange[]): Promise<void> {
        const now = new Date().toISOString();
        for (const change of stockChanges) {
            await this.catalog.updateVariantStock(change.variantId, change.to, change.to === 'in_stock' ? 1 : 0);
        }

        const patch = patchAfterUpdate(update, document, now);
        await this.writer.apply(update.referenceNumber, () => patch, 'RECONCILE');
        this.logger.log(`[RECONCILE ${update.referenceNumber}] ${update.kind} update accepted`);
    }

    private async touchSynced(referenceNumber: string): Promise<void> {
        try {
            await this.locks.runExclusive(referenceNumber, () =>
                this.writer.apply(referenceNumber, () => ({ StockSyncedAt: new Date().toISOString() }), 'RECONCILE'),
            );
        } catch (error) {
            // Only the sync timestamp is lost; the product comes up first again next pass.
            this.logger.error(`[RECONCILE ${referenceNumber}] Could not record sync time: ${errorMessage(error)}`, errorStack(error));
        }
    }

    private async report(result: ReconciliationResult, tag: string, startedAt: number, jobId?: string): Promise<void> {
        const durationMs = Date.now() - startedAt;
        const succeeded = result.stockUpdates + result.priceUpdates + result.withdrawals + result.delistings;
        const summary =
            `examined ${result.examined}, stock ${result.stockUpdates}, price ${result.priceUpdates}, ` +
            `withdrawn ${result.withdrawals}, delisted ${result.delistings}, failed ${result.failedUpdates}, dropped ${result.droppedUpdates}, unchanged ${result.unchanged}`;

        if (result.halted) {
            this.logger.error(`${tag} Halted (${result.haltReason}) after ${durationMs}ms: ${summary}`);
            await this.activityLogService.logBatchEvent(
                'ReconciliationPass',
                'RECONCILIATION_PASS_HALTED',
                'NeedsAttention',
                `Reconciliation pass halted: ${result.haltReason}`,
                { jobId, processed: result.examined, succeeded, failed: result.failedUpdates, haltReason: result.haltReason, durationMs },
            );
            return;
        }

        this.logger.log(`${tag} Completed in ${durationMs}ms: ${summary}`);
        await this.activityLogService.logBatchEvent(
            'ReconciliationPass',
            'RECONCILIATION_PASS_COMPLETED',
            result.failedUpdates > 0 ? 'Warning' : 'Success',
            `Reconciliation pass completed: ${summary}`,
            { jobId, processed: result.examined, succeeded, failed: result.failedUpdates, durationMs },
        );
    }
}
