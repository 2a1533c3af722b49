import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { errorMessage, errorStack } from '../common/errors/pipeline.errors';
import { REGISTRATION_QUEUE, RegistrationJobData } from './registration.constants';
import { BatchResult, RegistrationOrchestrator } from './registration-orchestrator.service';

// One worker, one batch at a time: batches share the marketplace quota.
@Processor(REGISTRATION_QUEUE, { concurrency: 1 })
export class RegistrationProcessor extends WorkerHost {
    private readonly logger = new Logger(RegistrationProcessor.name);

    constructor(private readonly orchestrator: RegistrationOrchestrator) {
        super();
        this.logger.log('RegistrationProcessor initialized');
    }

    async process(job: Job<RegistrationJobData, BatchResult, string>): Promise<BatchResult> {
        this.logger.log(`[REGISTRATION JOB] Processing job ${job.id} (${job.data.trigger}, limit ${job.data.limit ?? 'default'})`);
        try {
            const result = await this.orchestrator.runBatch(job.data.limit, job.id);
            await job.updateProgress({ progress: 100, description: result.halted ? `Halted: ${result.haltReason}` : 'Completed' });
            return result;
        } catch (error) {
            this.logger.error(`[REGISTRATION JOB] Job ${job.id} failed: ${errorMessage(error)}`, errorStack(error));
            throw error;
        }
    }
}
