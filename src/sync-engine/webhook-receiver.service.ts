import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pipelineConfig } from '../config/pipeline.config';
import { CATALOG_STORE, CatalogStore } from '../catalog/catalog.types';
import { ListingProduct } from '../catalog/entities/listing-product.entity';
import { ProductStateWriter } from '../catalog/product-state.writer';
import { ActivityLogService } from '../common/activity-log.service';
import { AmbiguousWebhookError } from '../common/errors/pipeline.errors';
import { ProductLockService } from '../common/product-lock.service';
import { SLEEPER, Sleeper } from '../common/sleeper';
import { transition } from '../registration/publish-state';
import { parseWebhookEvent } from './webhook-event.parser';

export type WebhookDisposition =
    | 'published'
    | 'failed'
    | 'duplicate'
    | 'ambiguous'
    | 'unsupported'
    | 'unknown_reference';

export interface WebhookHandlingResult {
    webhookId: string;
    disposition: WebhookDisposition;
    referenceNumber: string | null;
}

@Injectable()
export class WebhookReceiverService {
    private readonly logger = new Logger(WebhookReceiverService.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly catalog: CatalogStore,
        private readonly writer: ProductStateWriter,
        private readonly locks: ProductLockService,
        private readonly activityLogService: ActivityLogService,
        @Inject(pipelineConfig.KEY)
        private readonly config: ConfigType<typeof pipelineConfig>,
        @Inject(SLEEPER) private readonly sleep: Sleeper,
    ) {}

    /**
     * Applies one confirmation event. Never throws for a bad event; the
     * caller has already acknowledged it to the sender.
     */
    async handle(webhookId: string, eventName: string | null, body: unknown): Promise<WebhookHandlingResult> {
        const parsed = parseWebhookEvent(eventName, body);

        if (parsed.kind === 'unsupported') {
            this.logger.warn(`[${webhookId}] Ignoring unsupported event type '${parsed.eventType ?? 'none'}'`);
            await this.activityLogService.logWebhookEvent(
                webhookId,
                'WEBHOOK_UNSUPPORTED_EVENT',
                'Warning',
                `Webhook with unsupported event type '${parsed.eventType ?? 'none'}' ignored`,
                { eventType: parsed.eventType, rawBody: body },
            );
            return { webhookId, disposition: 'unsupported', referenceNumber: null };
        }

        if (parsed.kind === 'ambiguous') {
            const error = new AmbiguousWebhookError(`Ambiguous ${eventName} webhook: ${parsed.reason}`, eventName, body);
            this.logger.error(`[${webhookId}] ${error.message}. Raw body: ${JSON.stringify(body)}`);
            await this.activityLogService.logWebhookEvent(webhookId, error.code, 'NeedsAttention', error.message, {
                eventType: error.eventType,
                reason: parsed.reason,
                rawBody: error.rawBody,
            });
            return { webhookId, disposition: 'ambiguous', referenceNumber: null };
        }

        const ref = parsed.referenceNumber;
        this.logger.log(`[${webhookId}] ${eventName} for ${ref} (key at ${parsed.keyLocation})`);

        const found = await this.findWithRetry(webhookId, ref);
        if (!found) {
            return this.unknownReference(webhookId, ref, eventName);
        }

        return this.locks.runExclusive<WebhookHandlingResult>(ref, async () => {
            if (parsed.kind === 'success') {
                const written = await this.writer.apply(
                    ref,
                    current => {
                        if (current.PublishStatus === 'published' && current.RemoteId === parsed.remoteId) {
                            return null;
                        }
                        const next = transition(current.PublishStatus, 'confirmSucceeded');
                        return { ...(next ? { PublishStatus: next } : {}), RemoteId: parsed.remoteId, LastError: null };
                    },
                    'WEBHOOK',
                );
                if (written.kind === 'missing') {
                    return this.unknownReference(webhookId, ref, eventName);
                }
                if (written.kind === 'unchanged') {
                    this.logger.debug(`[${webhookId}] ${ref} already published as ${parsed.remoteId}; nothing to do`);
                    return { webhookId, disposition: 'duplicate', referenceNumber: ref };
                }
                this.logger.log(`[${webhookId}] ${ref} published as ${parsed.remoteId}`);
                await this.activityLogService.logProductEvent(
                    ref,
                    'LISTING_PUBLISHED',
                    'Success',
                    `Marketplace confirmed ${ref} as listing ${parsed.remoteId}`,
                    { webhookId, eventType: parsed.eventType, previousStatus: found.PublishStatus },
                );
                return { webhookId, disposition: 'published', referenceNumber: ref };
            }

            const written = await this.writer.apply(
                ref,
                current => {
                    if (current.PublishStatus === 'failed' && current.LastError === parsed.errors) {
                        return null;
                    }
                    const next = transition(current.PublishStatus, 'confirmFailed');
                    return { ...(next ? { PublishStatus: next } : {}), LastError: parsed.errors };
                },
                'WEBHOOK',
            );
            if (written.kind === 'missing') {
                return this.unknownReference(webhookId, ref, eventName);
            }
            if (written.kind === 'unchanged') {
                this.logger.debug(`[${webhookId}] ${ref} already failed with the same error; nothing to do`);
                return { webhookId, disposition: 'duplicate', referenceNumber: ref };
            }
            this.logger.warn(`[${webhookId}] ${ref} failed on the marketplace: ${parsed.errors}`);
            await this.activityLogService.logProductEvent(
                ref,
                'LISTING_FAILED',
                'Failed',
                `Marketplace reported ${eventName} for ${ref}`,
                { webhookId, eventType: parsed.eventType, errors: parsed.errors, previousStatus: found.PublishStatus },
            );
            return { webhookId, disposition: 'failed', referenceNumber: ref };
        });
    }

    // The confirmation can outrun the orchestrator's own write; give it a moment.
    private async findWithRetry(webhookId: string, referenceNumber: string): Promise<ListingProduct | null> {
        const attempts = Math.max(1, this.config.webhookLookupAttempts);
        for (let attempt = 1; attempt <= attempts; attempt++) {
            const product = await this.catalog.findByReference(referenceNumber);
            if (product) {
                return product;
            }
            if (attempt < attempts) {
                this.logger.debug(`[${webhookId}] ${referenceNumber} not found (attempt ${attempt}/${attempts}); retrying in ${this.config.webhookLookupDelayMs}ms`);
                await this.sleep(this.config.webhookLookupDelayMs);
            }
        }
        return null;
    }

    private async unknownReference(
        webhookId: string,
        referenceNumber: string,
        eventName: string | null,
    ): Promise<WebhookHandlingResult> {
        this.logger.error(`[${webhookId}] No product with reference ${referenceNumber}; event ${eventName} dropped`);
        await this.activityLogService.logWebhookEvent(
            webhookId,
            'WEBHOOK_UNKNOWN_REFERENCE',
            'NeedsAttention',
            `Webhook ${eventName} references unknown product ${referenceNumber}`,
            { referenceNumber, eventType: eventName },
        );
        return { webhookId, disposition: 'unknown_reference', referenceNumber };
    }
}
