import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Logger } from '@nestjs/common';
import { errorMessage, errorStack } from '../../common/errors/pipeline.errors';
import { RECONCILIATION_QUEUE, ReconciliationJobData } from '../sync-engine.constants';
import { ReconciliationResult, ReconciliationService } from '../reconciliation.service';

@Processor(RECONCILIATION_QUEUE, { concurrency: 1 })
export class ReconciliationProcessor extends WorkerHost {
    private readonly logger = new Logger(ReconciliationProcessor.name);

    constructor(private readonly reconciliationService: ReconciliationService) {
        super();
        this.logger.log('ReconciliationProcessor initialized');
    }

    async process(job: Job<ReconciliationJobData, ReconciliationResult, string>): Promise<ReconciliationResult> {
        this.logger.log(`[RECONCILE JOB] Processing job ${job.id} (${job.data.trigger})`);
        try {
            await job.updateProgress({ progress: 5, description: 'Planning updates...' });
            const result = await this.reconciliationService.runPass(job.data.limit, job.id);
            await job.updateProgress({ progress: 100, description: result.halted ? `Halted: ${result.haltReason}` : 'Completed' });
            return result;
        } catch (error) {
            this.logger.error(`[RECONCILE JOB] Job ${job.id} failed: ${errorMessage(error)}`, errorStack(error));
            throw error;
        }
    }
}
