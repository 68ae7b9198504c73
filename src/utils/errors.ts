/**
 * Errors surfaced by the public API. Each carries the HTTP status and a
 * machine-readable code that the error middleware puts on the wire.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly code: string,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

export class ValidationError extends ApiError {
    constructor(message: string, details?: unknown) {
        super(message, 400, 'validation_error', details);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends ApiError {
    constructor(message: string) {
        super(message, 404, 'not_found');
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends ApiError {
    constructor(message: string) {
        super(message, 409, 'conflict');
        this.name = 'ConflictError';
    }
}

export class UpstreamError extends ApiError {
    constructor(message: string, details?: unknown) {
        super(message, 502, 'upstream_error', details);
        this.name = 'UpstreamError';
    }
}

export class ServiceUnavailableError extends ApiError {
    constructor(message: string, details?: unknown) {
        super(message, 503, 'service_unavailable', details);
        this.name = 'ServiceUnavailableError';
    }
}

/**
 * Invalid configuration (bad env var, unreadable config file value).
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A provider answered, but not with something we can read.
 */
export class SourceError extends Error {
    constructor(
        message: string,
        public readonly source: string
    ) {
        super(message);
        this.name = 'SourceError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
