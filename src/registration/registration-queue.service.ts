import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { Queue } from 'bullmq';
import { pruneRepeatableJobs } from '../common/repeatable-jobs';
import { REGISTRATION_BATCH_JOB, REGISTRATION_QUEUE, RegistrationJobData, RegistrationTrigger } from './registration.constants';

@Injectable()
export class RegistrationQueueService {
    private readonly logger = new Logger(RegistrationQueueService.name);

    constructor(
        @InjectQueue(REGISTRATION_QUEUE)
        private readonly registrationQueue: Queue<RegistrationJobData>,
    ) {}

    async enqueueBatch(trigger: RegistrationTrigger, limit?: number): Promise<string> {
        const job = await this.registrationQueue.add(
            REGISTRATION_BATCH_JOB,
            { trigger, limit },
            {
                jobId: `registration-${trigger}-${Date.now()}`,
                // A failed batch is picked up again by the next run; retrying would double-spend quota.
                attempts: 1,
            },
        );
        this.logger.log(`Registration batch job ${job.id} queued (${trigger})`);
        return job.id ?? '';
    }

    /**
     * Installs the cron schedule for this job, replacing any schedule left
     * behind by an earlier pattern. A null pattern removes the schedule.
     */
    async scheduleRepeating(pattern: string | null): Promise<void> {
        const alreadyScheduled = await pruneRepeatableJobs(
            this.registrationQueue,
            REGISTRATION_BATCH_JOB,
            pattern,
            this.logger,
        );
        if (pattern === null || alreadyScheduled) {
            return;
        }
        await this.registrationQueue.add(
            REGISTRATION_BATCH_JOB,
            { trigger: 'cron' },
            { repeat: { pattern }, jobId: 'registration-cron', attempts: 1 },
        );
        this.logger.log(`Scheduled ${REGISTRATION_BATCH_JOB} with pattern '${pattern}'`);
    }
}
