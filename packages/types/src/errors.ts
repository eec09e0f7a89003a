/**
 * Error Types
 *
 * Validation errors map to client errors, store failures to server errors.
 * TranslationFailedError and ProviderFetchFailedError are absorbed inside the
 * search layer and never reach a client.
 */

export type ErrorCode =
    | 'INVALID_COORDINATE'
    | 'INVALID_QUERY'
    | 'INVALID_PROVIDER'
    | 'INVALID_REFERENCE'
    | 'NOT_FOUND'
    | 'STORE_UNAVAILABLE'
    | 'TRANSLATION_FAILED'
    | 'PROVIDER_FETCH_FAILED';

export class CityScopeError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly status: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'CityScopeError';
    }
}

export class InvalidCoordinateError extends CityScopeError {
    constructor(
        public readonly latitude: number,
        public readonly longitude: number
    ) {
        super(`Invalid coordinate (${latitude}, ${longitude})`, 'INVALID_COORDINATE', 400);
        this.name = 'InvalidCoordinateError';
    }
}

export class InvalidQueryError extends CityScopeError {
    constructor(message: string) {
        super(message, 'INVALID_QUERY', 400);
        this.name = 'InvalidQueryError';
    }
}

export class InvalidProviderError extends CityScopeError {
    constructor(public readonly provider: string) {
        super(`Unknown news provider: ${provider}`, 'INVALID_PROVIDER', 400);
        this.name = 'InvalidProviderError';
    }
}

/** A request body names a document that does not exist */
export class InvalidReferenceError extends CityScopeError {
    constructor(message: string) {
        super(message, 'INVALID_REFERENCE', 400);
        this.name = 'InvalidReferenceError';
    }
}

export class NotFoundError extends CityScopeError {
    constructor(collection: string, id: string) {
        super(`${collection}/${id} not found`, 'NOT_FOUND', 404);
        this.name = 'NotFoundError';
    }
}

export class StoreUnavailableError extends CityScopeError {
    constructor(message: string, cause?: unknown) {
        super(message, 'STORE_UNAVAILABLE', 503, { cause });
        this.name = 'StoreUnavailableError';
    }
}

export class TranslationFailedError extends CityScopeError {
    constructor(message: string, cause?: unknown) {
        super(message, 'TRANSLATION_FAILED', 502, { cause });
        this.name = 'TranslationFailedError';
    }
}

export class ProviderFetchFailedError extends CityScopeError {
    constructor(
        public readonly provider: string,
        message: string,
        cause?: unknown
    ) {
        super(`[${provider}] ${message}`, 'PROVIDER_FETCH_FAILED', 502, { cause });
        this.name = 'ProviderFetchFailedError';
    }
}
