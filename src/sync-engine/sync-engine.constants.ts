export const RECONCILIATION_QUEUE = 'listing-reconciliation';
export const RECONCILIATION_PASS_JOB = 'run-reconciliation-pass';

export type ReconciliationTrigger = 'cron' | 'operator';

export interface ReconciliationJobData {
    limit?: number;
    trigger: ReconciliationTrigger;
}
