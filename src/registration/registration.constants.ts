export const REGISTRATION_QUEUE = 'listing-registration';
export const REGISTRATION_BATCH_JOB = 'run-registration-batch';

export type RegistrationTrigger = 'cron' | 'operator';

export interface RegistrationJobData {
    limit?: number;
    trigger: RegistrationTrigger;
}
