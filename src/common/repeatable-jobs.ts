import { Logger } from '@nestjs/common';

export interface RepeatableJobInfo {
    key: string;
    name: string;
    pattern?: string | null;
}

export interface RepeatableJobQueue {
    getRepeatableJobs(): Promise<RepeatableJobInfo[]>;
    removeRepeatableByKey(key: string): Promise<boolean>;
}

/**
 * Removes every repeatable schedule of `jobName` whose pattern differs from
 * `keepPattern`. Returns true when a schedule with `keepPattern` is already
 * in place, so the caller does not need to add it again.
 */
export async function pruneRepeatableJobs(
    queue: RepeatableJobQueue,
    jobName: string,
    keepPattern: string | null,
    logger: Logger,
): Promise<boolean> {
    let kept = false;
    const existing = await queue.getRepeatableJobs();
    for (const job of existing) {
        if (job.name !== jobName) {
            continue;
        }
        if (keepPattern !== null && job.pattern === keepPattern) {
            kept = true;
            continue;
        }
        await queue.removeRepeatableByKey(job.key);
        logger.log(`Removed repeatable ${jobName} schedule '${job.pattern ?? 'unknown'}'`);
    }
    return kept;
}
