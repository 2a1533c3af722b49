import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from './supabase.service';
import { errorMessage } from './errors/pipeline.errors';

export type ActivityStatus = 'Info' | 'Success' | 'Failed' | 'Warning' | 'NeedsAttention';

export type ActivityEntityType = 'Product' | 'Webhook' | 'RegistrationBatch' | 'ReconciliationPass';

export interface ActivityLogEntry {
    Id?: number;
    Timestamp?: string;
    EntityType: ActivityEntityType;
    EntityId?: string | null; // reference number, webhook id or job id
    EventType: string;
    Status: ActivityStatus;
    Message: string;
    Details?: Record<string, unknown> | null;
}

export interface BatchEventDetails {
    jobId?: string;
    processed?: number;
    succeeded?: number;
    failed?: number;
    haltReason?: string | null;
    durationMs?: number;
}

/**
 * Operator-facing audit trail. Writes are best-effort: a failed insert is
 * logged and never propagates into the pipeline that produced the event.
 */
@Injectable()
export class ActivityLogService {
    private readonly logger = new Logger(ActivityLogService.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    async logActivity(entry: ActivityLogEntry): Promise<void> {
        try {
            const { error } = await this.supabaseService
                .getClient()
                .from('ActivityLogs')
                .insert({
                    Timestamp: entry.Timestamp || new Date().toISOString(),
                    EntityType: entry.EntityType,
                    EntityId: entry.EntityId || null,
                    EventType: entry.EventType,
                    Status: entry.Status,
                    Message: entry.Message,
                    Details: entry.Details || null,
                });

            if (error) {
                this.logger.error(`Failed to log activity ${entry.EventType}: ${error.message}`);
            } else {
                this.logger.debug(`Activity logged: ${entry.EventType} - ${entry.Message}`);
            }
        } catch (error) {
            this.logger.error(`Exception while logging activity ${entry.EventType}: ${errorMessage(error)}`);
        }
    }

    async logProductEvent(
        referenceNumber: string,
        eventType: string,
        status: ActivityStatus,
        message: string,
        details?: Record<string, unknown>,
    ): Promise<void> {
        await this.logActivity({
            EntityType: 'Product',
            EntityId: referenceNumber,
            EventType: eventType,
            Status: status,
            Message: message,
            Details: details ?? null,
        });
    }

    async logWebhookEvent(
        webhookId: string,
        eventType: string,
        status: ActivityStatus,
        message: string,
        details?: Record<string, unknown>,
    ): Promise<void> {
        await this.logActivity({
            EntityType: 'Webhook',
            EntityId: webhookId,
            EventType: eventType,
            Status: status,
            Message: message,
            Details: { webhookId, ...details },
        });
    }

    async logBatchEvent(
        entityType: 'RegistrationBatch' | 'ReconciliationPass',
        eventType: string,
        status: ActivityStatus,
        message: string,
        details: BatchEventDetails,
    ): Promise<void> {
        await this.logActivity({
            EntityType: entityType,
            EntityId: details.jobId ?? null,
            EventType: eventType,
            Status: status,
            Message: message,
            Details: { ...details },
        });
    }
}
