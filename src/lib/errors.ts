/**
 * Pipeline error taxonomy.
 *
 * Every failure a caller can act on is an APIError subclass, so the HTTP
 * error handler renders it with the right status and a `stage` telling
 * "bad input" apart from "bad URL" and "AI provider down".
 */

import { APIError } from './APIError';

export type PipelineStage =
    | 'validation'
    | 'extraction'
    | 'embedding'
    | 'generation';

export class InvalidContentError extends APIError {
    constructor(message: string) {
        super({
            code: 400,
            message,
            errorCode: 'INVALID_CONTENT',
            data: { stage: 'validation' satisfies PipelineStage },
        });
        this.name = 'InvalidContentError';
    }
}

export class InvalidQueryError extends APIError {
    constructor(message: string) {
        super({
            code: 400,
            message,
            errorCode: 'INVALID_QUERY',
            data: { stage: 'validation' satisfies PipelineStage },
        });
        this.name = 'InvalidQueryError';
    }
}

export class ItemNotFoundError extends APIError {
    constructor(public readonly itemId: string) {
        super({
            code: 404,
            message: `Item ${itemId} not found`,
            errorCode: 'ITEM_NOT_FOUND',
            data: { itemId },
        });
        this.name = 'ItemNotFoundError';
    }
}

export class ExtractionFailedError extends APIError {
    constructor(
        public readonly url: string,
        public readonly reason: string,
        cause?: unknown
    ) {
        super({
            code: 422,
            message: `Failed to extract URL content: ${reason}`,
            errorCode: 'EXTRACTION_FAILED',
            data: { stage: 'extraction' satisfies PipelineStage, url, reason },
            cause,
        });
        this.name = 'ExtractionFailedError';
    }
}

export interface ProviderFailure {
    message: string;
    provider: string;
    /** Provider-level reason, e.g. TIMEOUT, RATE_LIMIT, HTTP_500 */
    reason: string;
    /** Whether a caller-side retry may succeed */
    retryable: boolean;
    cause?: unknown;
}

export class EmbeddingUnavailableError extends APIError {
    public readonly provider: string;
    public readonly reason: string;
    public readonly retryable: boolean;

    constructor(failure: ProviderFailure) {
        super({
            code: 503,
            message: failure.message,
            errorCode: 'EMBEDDING_UNAVAILABLE',
            data: {
                stage: 'embedding' satisfies PipelineStage,
                provider: failure.provider,
                reason: failure.reason,
                retryable: failure.retryable,
            },
            cause: failure.cause,
        });
        this.name = 'EmbeddingUnavailableError';
        this.provider = failure.provider;
        this.reason = failure.reason;
        this.retryable = failure.retryable;
    }
}

export class GenerationUnavailableError extends APIError {
    public readonly provider: string;
    public readonly reason: string;
    public readonly retryable: boolean;

    constructor(failure: ProviderFailure) {
        super({
            code: 503,
            message: failure.message,
            errorCode: 'GENERATION_UNAVAILABLE',
            data: {
                stage: 'generation' satisfies PipelineStage,
                provider: failure.provider,
                reason: failure.reason,
                retryable: failure.retryable,
            },
            cause: failure.cause,
        });
        this.name = 'GenerationUnavailableError';
        this.provider = failure.provider;
        this.reason = failure.reason;
        this.retryable = failure.retryable;
    }
}

/**
 * Broken index invariant (duplicate chunk id, dimension mismatch).
 * A programming error: never caught by the pipelines.
 */
export class IndexInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IndexInvariantError';
    }
}
