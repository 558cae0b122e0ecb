// Error taxonomy shared by the managers and the transport layer

export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'NOT_FOUND'
    | 'PRECONDITION_FAILED'
    | 'DELIVERY_FAILURE'
    | 'TIMEOUT'
    | 'UPSTREAM_ERROR';

export class AppError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = 'AppError';
        this.code = code;
    }
}

/**
 * Bad caller input. Raised before any state is changed, so the caller can
 * retry with corrected data.
 */
export class ValidationError extends AppError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = [message]) {
        super('VALIDATION_ERROR', message);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super('NOT_FOUND', message);
        this.name = 'NotFoundError';
    }
}

/**
 * An operation was attempted before its prerequisites exist, e.g. an alert
 * for a session with no registered emergency contacts.
 */
export class PreconditionFailedError extends AppError {
    constructor(message: string) {
        super('PRECONDITION_FAILED', message);
        this.name = 'PreconditionFailedError';
    }
}

export class DeliveryFailure extends AppError {
    constructor(message: string, code: ErrorCode = 'DELIVERY_FAILURE') {
        super(code, message);
        this.name = 'DeliveryFailure';
    }
}

/**
 * An outbound call exceeded its time limit. Thrown by `withTimeout`; a
 * delivery attempt records it as a failed attempt, while transcription,
 * completion and synthesis callers rethrow it as an `UpstreamTimeoutError`.
 */
export class TimeoutError extends DeliveryFailure {
    readonly operation: string;
    readonly timeoutMs: number;

    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
        this.name = 'TimeoutError';
        this.operation = operation;
        this.timeoutMs = timeoutMs;
    }
}

/** A transcription, completion or synthesis call failed. */
export class UpstreamServiceError extends AppError {
    readonly service: string;

    constructor(service: string, message: string, code: ErrorCode = 'UPSTREAM_ERROR') {
        super(code, `${service}: ${message}`);
        this.name = 'UpstreamServiceError';
        this.service = service;
    }
}

export class UpstreamTimeoutError extends UpstreamServiceError {
    readonly timeoutMs: number;

    constructor(service: string, timeoutMs: number) {
        super(service, `timed out after ${timeoutMs}ms`, 'TIMEOUT');
        this.name = 'UpstreamTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
};
