import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { marketplaceConfig } from '../config/marketplace.config';
import { CallAction } from '../catalog/entities/api-call-log.entity';
import {
    errorMessage,
    FieldError,
    QuotaExhaustedError,
    UnauthorizedMarketplaceError,
} from '../common/errors/pipeline.errors';
import { CallLogService } from './call-log.service';
import { MarketplaceTokenService } from './marketplace-token.service';
import { CallOutcome, OutboundDocument, ProductRequest } from './marketplace.types';
import { RateLimiter } from './rate-limiter';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(body: unknown): string | null {
    if (body === undefined || body === null || body === '') {
        return null;
    }
    return typeof body === 'string' ? body : JSON.stringify(body);
}

/**
 * Turns the `errors` member of a 422 body into field errors. The marketplace
 * sends either `{ field: [messages] }` or a flat list of messages.
 */
export function parseFieldErrors(body: unknown): FieldError[] {
    const errors = isRecord(body) ? body.errors : undefined;
    if (Array.isArray(errors)) {
        return [{ field: 'base', messages: errors.map(e => (typeof e === 'string' ? e : JSON.stringify(e))) }];
    }
    if (!isRecord(errors)) {
        return [];
    }
    return Object.entries(errors).map(([field, messages]) => ({
        field,
        messages: Array.isArray(messages)
            ? messages.map(m => (typeof m === 'string' ? m : JSON.stringify(m)))
            : [typeof messages === 'string' ? messages : JSON.stringify(messages)],
    }));
}

export function describeFieldErrors(fieldErrors: FieldError[]): string {
    if (fieldErrors.length === 0) {
        return 'Rejected without field errors';
    }
    return fieldErrors.map(fe => `${fe.field}: ${fe.messages.join(', ')}`).join('; ');
}

@Injectable()
export class MarketplaceApiClient {
    private readonly logger = new Logger(MarketplaceApiClient.name);
    public axiosInstance: AxiosInstance;

    constructor(
        @Inject(marketplaceConfig.KEY)
        private readonly config: ConfigType<typeof marketplaceConfig>,
        private readonly rateLimiter: RateLimiter,
        private readonly callLog: CallLogService,
        private readonly tokens: MarketplaceTokenService,
    ) {
        this.axiosInstance = axios.create({
            baseURL: this.config.baseUrl,
            timeout: this.config.requestTimeoutMs,
            headers: {
                'Accept': 'application/json',
                'Content-Type': 'application/json',
            },
            // Every status is classified below instead of thrown.
            validateStatus: () => true,
        });

        this.axiosInstance.interceptors.request.use(request => {
            this.logger.debug(`[Marketplace API Request] ${request.method?.toUpperCase()} ${request.url}`);
            if (request.data) {
                this.logger.verbose(`[Marketplace API Request Body] ${typeof request.data === 'string' ? request.data : JSON.stringify(request.data)}`);
            }
            return request;
        });
        this.axiosInstance.interceptors.response.use(response => {
            this.logger.debug(`[Marketplace API Response] Status: ${response.status} for ${response.config.method?.toUpperCase()} ${response.config.url}`);
            return response;
        }, error => {
            this.logger.error(`[Marketplace API Error] ${errorMessage(error)}`);
            return Promise.reject(error);
        });
    }

    /**
     * Sends one create or update. Waits for the rate limiter first; never
     * throws for marketplace or transport failures, which come back classified.
     */
    async submitProduct(action: CallAction, document: OutboundDocument): Promise<CallOutcome> {
        const ref = document.reference_number;
        const request: ProductRequest = { product: document };

        try {
            await this.rateLimiter.acquire();
        } catch (error) {
            if (!(error instanceof QuotaExhaustedError)) {
                throw error;
            }
            const outcome: CallOutcome = { kind: 'quota_exhausted', httpStatus: null, message: error.message };
            await this.callLog.record(action, request, outcome, null);
            return outcome;
        }

        let token: string;
        try {
            token = await this.tokens.getAccessToken();
        } catch (error) {
            if (!(error instanceof UnauthorizedMarketplaceError)) {
                throw error;
            }
            const outcome: CallOutcome = { kind: 'unauthorized', httpStatus: null, message: error.message };
            await this.callLog.record(action, request, outcome, null);
            return outcome;
        }

        let response: AxiosResponse<unknown>;
        try {
            response = await this.axiosInstance.post<unknown>(this.config.productsPath, request, {
                headers: { [this.config.tokenHeader]: token },
            });
        } catch (error) {
            const timedOut = axios.isAxiosError(error) && error.code === 'ECONNABORTED';
            const outcome: CallOutcome = {
                kind: 'retryable',
                httpStatus: null,
                message: timedOut ? `Request timed out after ${this.config.requestTimeoutMs}ms` : errorMessage(error),
            };
            this.logger.warn(`[${ref}] ${action} failed in transport: ${outcome.message}`);
            await this.callLog.record(action, request, outcome, null);
            return outcome;
        }

        const outcome = this.classify(response.status, response.data);
        this.logOutcome(ref, action, outcome);
        await this.callLog.record(action, request, outcome, stringify(response.data));
        return outcome;
    }

    classify(status: number, body: unknown): CallOutcome {
        if (status === 200 || status === 201 || status === 202) {
            const uid = isRecord(body) ? body.request_uid : undefined;
            return {
                kind: 'submitted',
                httpStatus: status,
                requestUid: typeof uid === 'string' || typeof uid === 'number' ? String(uid) : null,
            };
        }
        if (status === 422) {
            const fieldErrors = parseFieldErrors(body);
            return { kind: 'rejected', httpStatus: status, message: describeFieldErrors(fieldErrors), fieldErrors };
        }
        if (status === 429) {
            return { kind: 'quota_exhausted', httpStatus: status, message: 'Marketplace quota exhausted (429)' };
        }
        if (status === 401 || status === 403) {
            this.tokens.invalidate();
            return { kind: 'unauthorized', httpStatus: status, message: `Marketplace refused the access token (${status})` };
        }
        if (status >= 500) {
            return { kind: 'retryable', httpStatus: status, message: `Marketplace server error (${status})` };
        }
        if (status >= 400) {
            return {
                kind: 'rejected',
                httpStatus: status,
                message: `Marketplace rejected the request (${status}): ${stringify(body) ?? 'no body'}`,
                fieldErrors: parseFieldErrors(body),
            };
        }
        return { kind: 'retryable', httpStatus: status, message: `Unexpected marketplace status ${status}` };
    }

    private logOutcome(ref: string, action: CallAction, outcome: CallOutcome): void {
        switch (outcome.kind) {
            case 'submitted':
                this.logger.log(`[${ref}] ${action} accepted (${outcome.httpStatus}), request_uid ${outcome.requestUid ?? 'n/a'}`);
                break;
            case 'rejected':
                this.logger.warn(`[${ref}] ${action} rejected (${outcome.httpStatus}): ${outcome.message}`);
                break;
            case 'retryable':
                this.logger.warn(`[${ref}] ${action} failed, will retry on a later pass: ${outcome.message}`);
                break;
            default:
                this.logger.error(`[${ref}] ${action} stopped: ${outcome.message}`);
        }
    }
}
