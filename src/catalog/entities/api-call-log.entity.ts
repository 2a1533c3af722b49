export type CallAction = 'create' | 'update';

export type CallOutcomeKind =
    | 'submitted'
    | 'rejected'
    | 'quota_exhausted'
    | 'unauthorized'
    | 'retryable';

// Append-only; rows are never updated.
export interface ApiCallLog {
    Id?: number;
    ReferenceNumber: string;
    Action: CallAction;
    RequestBody: Record<string, unknown>;
    ResponseBody: string | null;
    HttpStatus: number | null;
    Outcome: CallOutcomeKind;
    IsSuccess: boolean;
    RequestUid: string | null;
    ErrorMessage: string | null;
    CreatedAt?: string;
}
