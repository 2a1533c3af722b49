import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CATALOG_STORE, CatalogStore } from '../catalog/catalog.types';
import { ActivityLogService } from '../common/activity-log.service';
import { errorMessage, errorStack } from '../common/errors/pipeline.errors';
import { pipelineConfig } from '../config/pipeline.config';
import { RegistrationQueueService } from '../registration/registration-queue.service';
import { ReconciliationQueueService } from '../sync-engine/reconciliation-queue.service';

const STALE_PENDING_SCAN_LIMIT = 100;
const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class TasksService implements OnModuleInit {
    private readonly logger = new Logger(TasksService.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly catalog: CatalogStore,
        private readonly registrationQueue: RegistrationQueueService,
        private readonly reconciliationQueue: ReconciliationQueueService,
        private readonly activityLogService: ActivityLogService,
        @Inject(pipelineConfig.KEY)
        private readonly config: ConfigType<typeof pipelineConfig>,
    ) {}

    // Cron patterns come from the environment, so the schedules live in Redis as repeatable jobs.
    async onModuleInit(): Promise<void> {
        await this.syncSchedules();
    }

    async syncSchedules(): Promise<void> {
        try {
            await this.reconciliationQueue.scheduleRepeating(this.config.reconcileCron || null);
            await this.registrationQueue.scheduleRepeating(
                this.config.registrationCronEnabled ? this.config.registrationCron : null,
            );
            this.logger.log(
                `Schedules synced: reconcile '${this.config.reconcileCron}', registration ${this.config.registrationCronEnabled ? `'${this.config.registrationCron}'` : 'disabled'}`,
            );
        } catch (error) {
            this.logger.error(`Failed to sync repeatable job schedules: ${errorMessage(error)}`, errorStack(error));
            throw error;
        }
    }

    /**
     * A submission whose webhook never arrived stays pending forever; nothing
     * in the pipeline retries it, so the operator is told instead.
     */
    @Cron(CronExpression.EVERY_HOUR, { name: 'pendingConfirmationWatch' })
    async reportStalePendingConfirmations(): Promise<number> {
        const cutoff = new Date(Date.now() - this.config.pendingAlertHours * HOUR_MS);
        this.logger.log(`[CRON - pendingConfirmationWatch] Looking for submissions pending since before ${cutoff.toISOString()}`);
        try {
            const stale = await this.catalog.findStalePending(cutoff, STALE_PENDING_SCAN_LIMIT);
            if (stale.length === 0) {
                this.logger.log('[CRON - pendingConfirmationWatch] No stale pending confirmations.');
                return 0;
            }
            for (const product of stale) {
                await this.activityLogService.logProductEvent(
                    product.ReferenceNumber,
                    'PENDING_CONFIRMATION_STALE',
                    'NeedsAttention',
                    `${product.ReferenceNumber} has waited more than ${this.config.pendingAlertHours}h for marketplace confirmation`,
                    { requestUid: product.RequestUid, registeredAt: product.RegisteredAt },
                );
            }
            this.logger.warn(`[CRON - pendingConfirmationWatch] ${stale.length} submission(s) still unconfirmed.`);
            return stale.length;
        } catch (error) {
            this.logger.error(`[CRON - pendingConfirmationWatch] Error: ${errorMessage(error)}`, errorStack(error));
            return 0;
        }
    }
}
