import { Inject, Injectable, Logger } from '@nestjs/common';
import { CATALOG_STORE, CatalogStore } from '../catalog/catalog.types';
import { ApiCallLog, CallAction } from '../catalog/entities/api-call-log.entity';
import { errorMessage } from '../common/errors/pipeline.errors';
import { CallOutcome, ProductRequest } from './marketplace.types';

/**
 * Append-only audit of every outbound attempt. A failed insert is logged and
 * swallowed here so it can never change the outcome the caller acts on.
 */
@Injectable()
export class CallLogService {
    private readonly logger = new Logger(CallLogService.name);

    constructor(@Inject(CATALOG_STORE) private readonly catalog: CatalogStore) {}

    async record(
        action: CallAction,
        request: ProductRequest,
        outcome: CallOutcome,
        responseBody: string | null,
    ): Promise<void> {
        const entry: ApiCallLog = {
            ReferenceNumber: request.product.reference_number,
            Action: action,
            RequestBody: request,
            ResponseBody: responseBody,
            HttpStatus: outcome.httpStatus,
            Outcome: outcome.kind,
            IsSuccess: outcome.kind === 'submitted',
            RequestUid: outcome.kind === 'submitted' ? outcome.requestUid : null,
            ErrorMessage: outcome.kind === 'submitted' ? null : outcome.message,
            CreatedAt: new Date().toISOString(),
        };

        try {
            await this.catalog.appendCallLog(entry);
        } catch (error) {
            this.logger.error(
                `[${entry.ReferenceNumber}] Failed to append ${action} call log (${outcome.kind}): ${errorMessage(error)}`,
            );
        }
    }

    /** A create the marketplace already accepted; resubmitting it would duplicate the listing. */
    async findAcceptedCreate(referenceNumber: string): Promise<ApiCallLog | null> {
        return this.catalog.findAcceptedCreate(referenceNumber);
    }

    async recentCallTimes(windowMs: number): Promise<Date[]> {
        return this.catalog.findCallTimesSince(new Date(Date.now() - windowMs));
    }
}
