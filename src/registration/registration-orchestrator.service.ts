import { ConflictException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pipelineConfig } from '../config/pipeline.config';
import { QuotaExhaustedPolicy } from '../config/env.validation';
import { CATALOG_STORE, CatalogStore, PublishStatusCounts } from '../catalog/catalog.types';
import { ListingProduct } from '../catalog/entities/listing-product.entity';
import { ProductStateWriter } from '../catalog/product-state.writer';
import { ActivityLogService } from '../common/activity-log.service';
import { errorMessage, errorStack } from '../common/errors/pipeline.errors';
import { ProductLockService } from '../common/product-lock.service';
import { SLEEPER, Sleeper } from '../common/sleeper';
import { CallLogService } from '../marketplace/call-log.service';
import { MarketplaceApiClient } from '../marketplace/marketplace-api-client.service';
import { MarketplaceMapper } from '../marketplace/marketplace.mapper';
import { CallOutcome } from '../marketplace/marketplace.types';
import { RateLimiter, WindowUsage } from '../marketplace/rate-limiter';
import { EligibilityChecker } from './eligibility.checker';
import { transition } from './publish-state';

export type HaltReason = 'quota_exhausted' | 'unauthorized';

export type ItemResult =
    | { kind: 'submitted'; requestUid: string | null }
    | { kind: 'already_submitted' }
    | { kind: 'failed'; reason: string }
    | { kind: 'retryable'; reason: string }
    | { kind: 'skipped'; reason: string }
    | { kind: 'halt'; reason: HaltReason; message: string };

export interface BatchResult {
    selected: number;
    submitted: number;
    failed: number;
    retryable: number;
    skipped: number;
    halted: boolean;
    haltReason: string | null;
    apiCalls: number;
}

export interface RegistrationStatus {
    products: PublishStatusCounts;
    quota: WindowUsage[];
}

interface RegisterOptions {
    checkEligibility: boolean;
}

// Outcomes that never left this process (local limiter refusal, missing token).
function reachedMarketplace(outcome: CallOutcome): boolean {
    return outcome.httpStatus !== null || outcome.kind === 'retryable';
}

@Injectable()
export class RegistrationOrchestrator {
    private readonly logger = new Logger(RegistrationOrchestrator.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly catalog: CatalogStore,
        private readonly mapper: MarketplaceMapper,
        private readonly apiClient: MarketplaceApiClient,
        private readonly callLog: CallLogService,
        private readonly rateLimiter: RateLimiter,
        private readonly eligibility: EligibilityChecker,
        private readonly writer: ProductStateWriter,
        private readonly locks: ProductLockService,
        private readonly activityLogService: ActivityLogService,
        @Inject(pipelineConfig.KEY)
        private readonly config: ConfigType<typeof pipelineConfig>,
        @Inject(SLEEPER) private readonly sleep: Sleeper,
    ) {}

    /**
     * Registers up to `limit` eligible products, one at a time. Item failures
     * are recorded and the batch moves on; quota exhaustion or a refused token
     * stops it (after backing off, under the `backoff` policy).
     */
    async runBatch(limit = this.config.registrationBatchSize, jobId?: string): Promise<BatchResult> {
        const startedAt = Date.now();
        const result: BatchResult = {
            selected: 0,
            submitted: 0,
            failed: 0,
            retryable: 0,
            skipped: 0,
            halted: false,
            haltReason: null,
            apiCalls: 0,
        };
        this.logger.log(`[BATCH ${jobId ?? 'manual'}] Starting registration batch (limit ${limit}, quota policy ${this.config.quotaPolicy})`);

        let afterId = 0;
        const pageSize = Math.max(limit, 50);
        while (result.selected < limit && !result.halted) {
            const page = await this.catalog.findRegistrationCandidates(pageSize, afterId);
            if (page.length === 0) {
                break;
            }

            for (const candidate of page) {
                if (result.selected >= limit || result.halted) {
                    break;
                }
                afterId = candidate.Id;

                let item: ItemResult;
                try {
                    item = await this.registerWithQuotaPolicy(candidate.ReferenceNumber, result);
                } catch (error) {
                    item = await this.recordItemError(candidate.ReferenceNumber, error);
                }
                this.tally(result, item);
            }
        }

        const durationMs = Date.now() - startedAt;
        const summary =
            `selected ${result.selected}, submitted ${result.submitted}, failed ${result.failed}, ` +
            `retryable ${result.retryable}, skipped ${result.skipped}, api calls ${result.apiCalls}`;

        if (result.halted) {
            this.logger.error(`[BATCH ${jobId ?? 'manual'}] Halted (${result.haltReason}) after ${durationMs}ms: ${summary}`);
            await this.activityLogService.logBatchEvent(
                'RegistrationBatch',
                'REGISTRATION_BATCH_HALTED',
                'NeedsAttention',
                `Registration batch halted: ${result.haltReason}`,
                {
                    jobId,
                    processed: result.selected,
                    succeeded: result.submitted,
                    failed: result.failed,
                    haltReason: result.haltReason,
                    durationMs,
                },
            );
        } else {
            this.logger.log(`[BATCH ${jobId ?? 'manual'}] Completed in ${durationMs}ms: ${summary}`);
            await this.activityLogService.logBatchEvent(
                'RegistrationBatch',
                'REGISTRATION_BATCH_COMPLETED',
                result.failed > 0 ? 'Warning' : 'Success',
                `Registration batch completed: ${summary}`,
                { jobId, processed: result.selected, succeeded: result.submitted, failed: result.failed, durationMs },
            );
        }
        return result;
    }

    /** Operator path: registers one product, bypassing the eligibility filter but not payload validation. */
    async registerOne(referenceNumber: string): Promise<ItemResult> {
        const product = await this.catalog.findByReference(referenceNumber);
        if (!product) {
            throw new NotFoundException(`Product ${referenceNumber} not found`);
        }
        if (product.PublishStatus !== 'unregistered') {
            throw new ConflictException(`Product ${referenceNumber} is ${product.PublishStatus}, not unregistered`);
        }
        const counter = { apiCalls: 0 };
        return this.registerProduct(referenceNumber, { checkEligibility: false }, counter);
    }

    /** Moves a failed product back to unregistered after its data was fixed. */
    async resetFailed(referenceNumber: string): Promise<ListingProduct> {
        return this.locks.runExclusive(referenceNumber, async () => {
            const product = await this.catalog.findByReference(referenceNumber);
            if (!product) {
                throw new NotFoundException(`Product ${referenceNumber} not found`);
            }
            if (product.PublishStatus !== 'failed') {
                throw new ConflictException(`Product ${referenceNumber} is ${product.PublishStatus}; only failed products can be reset`);
            }

            const written = await this.writer.apply(
                referenceNumber,
                current => {
                    const next = transition(current.PublishStatus, 'operatorReset');
                    return next ? { PublishStatus: next, LastError: null, RequestUid: null } : null;
                },
                'RESET',
            );
            if (written.kind === 'missing') {
                throw new NotFoundException(`Product ${referenceNumber} not found`);
            }
            if (written.kind === 'unchanged') {
                throw new ConflictException(`Product ${referenceNumber} changed to ${written.product.PublishStatus} before the reset`);
            }
            this.logger.log(`[RESET ${referenceNumber}] failed -> unregistered`);
            await this.activityLogService.logProductEvent(
                referenceNumber,
                'REGISTRATION_RESET',
                'Info',
                `Product ${referenceNumber} reset to unregistered by operator`,
                { previousError: product.LastError },
            );
            return written.product;
        });
    }

    async status(): Promise<RegistrationStatus> {
        return {
            products: await this.catalog.countByPublishStatus(),
            quota: this.rateLimiter.usage(),
        };
    }

    private async registerWithQuotaPolicy(referenceNumber: string, result: BatchResult): Promise<ItemResult> {
        let item = await this.registerProduct(referenceNumber, { checkEligibility: true }, result);

        if (this.config.quotaPolicy !== QuotaExhaustedPolicy.BACKOFF) {
            return item;
        }
        for (
            let attempt = 1;
            item.kind === 'halt' && item.reason === 'quota_exhausted' && attempt <= this.config.quotaBackoffAttempts;
            attempt++
        ) {
            this.logger.warn(
                `[REGISTER ${referenceNumber}] Quota exhausted; backing off ${this.config.quotaBackoffMs}ms (${attempt}/${this.config.quotaBackoffAttempts})`,
            );
            await this.sleep(this.config.quotaBackoffMs);
            item = await this.registerProduct(referenceNumber, { checkEligibility: true }, result);
        }
        return item;
    }

    // The row is left as it was, so the next batch picks it up again.
    private async recordItemError(referenceNumber: string, error: unknown): Promise<ItemResult> {
        const reason = errorMessage(error);
        this.logger.error(`[REGISTER ${referenceNumber}] Registration threw, moving on: ${reason}`, errorStack(error));
        await this.activityLogService.logProductEvent(
            referenceNumber,
            'REGISTRATION_ERROR',
            'Warning',
            `Registration of ${referenceNumber} failed unexpectedly: ${reason}`,
            { error: reason },
        );
        return { kind: 'retryable', reason };
    }

    private tally(result: BatchResult, item: ItemResult): void {
        switch (item.kind) {
            case 'submitted':
            case 'already_submitted':
                result.selected++;
                result.submitted++;
                break;
            case 'failed':
                result.selected++;
                result.failed++;
                break;
            case 'retryable':
                result.selected++;
                result.retryable++;
                break;
            case 'skipped':
                result.skipped++;
                break;
            case 'halt':
                // The product was selected but never sent; it stays unregistered.
                result.selected++;
                result.halted = true;
                result.haltReason = item.reason;
                break;
        }
    }

    /**
     * One product, start to finish, under its lock: re-read, check, build,
     * submit and record the outcome. Never marks a product published; only
     * the webhook does that.
     */
    private async registerProduct(
        referenceNumber: string,
        options: RegisterOptions,
        counter: { apiCalls: number },
    ): Promise<ItemResult> {
        return this.locks.runExclusive<ItemResult>(referenceNumber, async () => {
            const tag = `[REGISTER ${referenceNumber}]`;
            const product = await this.catalog.findByReference(referenceNumber);
            if (!product) {
                return { kind: 'skipped', reason: 'not found' };
            }
            if (product.PublishStatus !== 'unregistered') {
                this.logger.debug(`${tag} Skipping; status is now ${product.PublishStatus}`);
                return { kind: 'skipped', reason: `status is ${product.PublishStatus}` };
            }

            // An accepted create newer than the row means the local write was lost; sending again would duplicate the listing.
            const accepted = await this.callLog.findAcceptedCreate(referenceNumber);
            if (accepted?.CreatedAt && Date.parse(accepted.CreatedAt) > Date.parse(product.UpdatedAt)) {
                this.logger.warn(`${tag} Create already accepted at ${accepted.CreatedAt}; restoring pending state without a new call`);
                await this.writer.apply(
                    referenceNumber,
                    current => {
                        const next = transition(current.PublishStatus, 'submitAccepted');
                        return next
                            ? { PublishStatus: next, RequestUid: accepted.RequestUid, RegisteredAt: accepted.CreatedAt ?? null }
                            : null;
                    },
                    'REGISTER',
                );
                return { kind: 'already_submitted' };
            }

            const bundle = await this.catalog.loadBundle(product);
            const categoryId = await this.catalog.resolveCategoryId(product);

            let marginRate: number | null = product.MarginRate;
            if (options.checkEligibility) {
                const verdict = this.eligibility.check(bundle, categoryId);
                if (!verdict.eligible) {
                    this.logger.log(`${tag} Not eligible: ${verdict.reason}`);
                    return { kind: 'skipped', reason: verdict.reason };
                }
                marginRate = verdict.marginRate ?? marginRate;
            }

            const brandId = await this.catalog.resolveBrandId(product);
            const built = this.mapper.buildDocument(
                { ...bundle, brandId, categoryId },
                new Date(),
            );
            if (!built.ok) {
                const reason = `${built.error.code}: ${built.error.message}`;
                this.logger.warn(`${tag} Payload invalid, marking failed. ${reason}`);
                await this.writer.apply(
                    referenceNumber,
                    current => {
                        const next = transition(current.PublishStatus, 'submitRejected');
                        return next ? { PublishStatus: next, LastError: reason } : null;
                    },
                    'REGISTER',
                );
                return { kind: 'failed', reason };
            }

            const document = built.document;
            const outcome = await this.apiClient.submitProduct('create', document);
            if (reachedMarketplace(outcome)) {
                counter.apiCalls++;
            }

            switch (outcome.kind) {
                case 'submitted': {
                    const registeredAt = new Date().toISOString();
                    await this.writer.apply(
                        referenceNumber,
                        current => {
                            const next = transition(current.PublishStatus, 'submitAccepted');
                            if (!next) {
                                this.logger.log(`${tag} Already ${current.PublishStatus} by webhook; keeping it`);
                            }
                            return {
                                ...(next ? { PublishStatus: next } : {}),
                                RequestUid: outcome.requestUid,
                                LastPayload: document,
                                LastError: null,
                                RegisteredAt: registeredAt,
                                MarginRate: marginRate,
                            };
                        },
                        'REGISTER',
                    );
                    return { kind: 'submitted', requestUid: outcome.requestUid };
                }
                case 'rejected':
                    await this.writer.apply(
                        referenceNumber,
                        current => {
                            const next = transition(current.PublishStatus, 'submitRejected');
                            return next ? { PublishStatus: next, LastError: outcome.message, LastPayload: document } : null;
                        },
                        'REGISTER',
                    );
                    return { kind: 'failed', reason: outcome.message };
                case 'retryable':
                    await this.writer.apply(referenceNumber, () => ({ LastError: outcome.message }), 'REGISTER');
                    return { kind: 'retryable', reason: outcome.message };
                case 'quota_exhausted':
                case 'unauthorized':
                    return { kind: 'halt', reason: outcome.kind, message: outcome.message };
            }
        });
    }
}
