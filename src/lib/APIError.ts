export interface APIErrorMeta {
    requestId?: string;
    timestamp?: string;
    [key: string]: unknown;
}

export interface APIErrorOptions {
    code: number;
    message: string;
    errorCode?: string;
    data?: Record<string, unknown>;
    meta?: APIErrorMeta;
    cause?: unknown;
}

export class APIError extends Error {
    public readonly statusCode: number;
    public readonly errorCode: string;
    public readonly data?: Record<string, unknown>;
    public readonly meta: APIErrorMeta;

    constructor(options: APIErrorOptions) {
        super(options.message, { cause: options.cause });
        this.name = 'APIError';
        this.statusCode = options.code;
        this.errorCode =
            options.errorCode || this.getDefaultErrorCode(options.code);
        this.data = options.data;

        this.meta = {
            timestamp: new Date().toISOString(),
            ...options.meta,
        };

        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    private getDefaultErrorCode(statusCode: number): string {
        const errorCodeMap: Record<number, string> = {
            400: 'BAD_REQUEST',
            404: 'NOT_FOUND',
            409: 'CONFLICT',
            422: 'UNPROCESSABLE_ENTITY',
            500: 'INTERNAL_ERROR',
            502: 'BAD_GATEWAY',
            503: 'SERVICE_UNAVAILABLE',
        };

        return errorCodeMap[statusCode] || 'ERROR';
    }
}
