import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { Queue } from 'bullmq';
import { pruneRepeatableJobs } from '../common/repeatable-jobs';
import {
    RECONCILIATION_PASS_JOB,
    RECONCILIATION_QUEUE,
    ReconciliationJobData,
    ReconciliationTrigger,
} from './sync-engine.constants';

@Injectable()
export class ReconciliationQueueService {
    private readonly logger = new Logger(ReconciliationQueueService.name);

    constructor(
        @InjectQueue(RECONCILIATION_QUEUE)
        private readonly reconciliationQueue: Queue<ReconciliationJobData>,
    ) {}

    async enqueuePass(trigger: ReconciliationTrigger, limit?: number): Promise<string> {
        const job = await this.reconciliationQueue.add(
            RECONCILIATION_PASS_JOB,
            { trigger, limit },
            {
                jobId: `reconcile-${trigger}-${Date.now()}`,
                // The next scheduled pass picks up whatever this one missed.
                attempts: 1,
            },
        );
        this.logger.log(`Reconciliation job ${job.id} queued (${trigger})`);
        return job.id ?? '';
    }

    /**
     * Installs the cron schedule for this job, replacing any schedule left
     * behind by an earlier pattern. A null pattern removes the schedule.
     */
    async scheduleRepeating(pattern: string | null): Promise<void> {
        const alreadyScheduled = await pruneRepeatableJobs(
            this.reconciliationQueue,
            RECONCILIATION_PASS_JOB,
            pattern,
            this.logger,
        );
        if (pattern === null || alreadyScheduled) {
            return;
        }
        await this.reconciliationQueue.add(
            RECONCILIATION_PASS_JOB,
            { trigger: 'cron' },
            { repeat: { pattern }, jobId: 'reconcile-cron', attempts: 1 },
        );
        this.logger.log(`Scheduled ${RECONCILIATION_PASS_JOB} with pattern '${pattern}'`);
    }
}
