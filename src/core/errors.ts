/**
 * @file Error Taxonomy
 *
 * Every failure the library raises derives from PromptlineError and carries
 * a stable `code`. Subclasses expose the data a caller needs to retry
 * correctly (missing keys, valid bounds, offending token).
 *
 * @module core/errors
 */

export type ErrorCode =
    | 'NOT_FOUND'
    | 'INTEGRITY_VIOLATION'
    | 'REFERENCED_CONTENT'
    | 'INVALID_RANGE'
    | 'OUT_OF_RANGE'
    | 'QUERY_SYNTAX'
    | 'QUERY_TYPE'
    | 'SESSION_IN_PROGRESS'
    | 'SESSION_NOT_ACTIVE'
    | 'INVALID_INPUT';

export class PromptlineError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
    ) {
        super(message);
        this.name = 'PromptlineError';
        Error.captureStackTrace(this, this.constructor);
    }
}

// ─── Not Found ──────────────────────────────────────────────────

export class NotFoundError extends PromptlineError {
    constructor(message: string = 'Resource not found') {
        super('NOT_FOUND', message);
        this.name = 'NotFoundError';
    }
}

export class BlobNotFoundError extends NotFoundError {
    constructor(public readonly fingerprint: string) {
        super(`Blob ${fingerprint} not found`);
        this.name = 'BlobNotFoundError';
    }
}

export class ArtifactNotFoundError extends NotFoundError {
    constructor(public readonly artifact: string) {
        super(`Artifact '${artifact}' not found`);
        this.name = 'ArtifactNotFoundError';
    }
}

/**
 * Raised for a sequence outside `1..count`. `count` is 0 when the artifact
 * has no history at all.
 */
export class VersionNotFoundError extends NotFoundError {
    constructor(
        public readonly artifact: string,
        public readonly sequence: number,
        public readonly count: number,
    ) {
        super(
            count === 0
                ? `Version ${sequence} not found: '${artifact}' has no versions`
                : `Version ${sequence} not found: '${artifact}' has versions 1..${count}`,
        );
        this.name = 'VersionNotFoundError';
    }
}

// ─── Integrity ──────────────────────────────────────────────────

export class IntegrityViolationError extends PromptlineError {
    constructor(message: string) {
        super('INTEGRITY_VIOLATION', message);
        this.name = 'IntegrityViolationError';
    }
}

export class ReferencedContentError extends PromptlineError {
    constructor(public readonly fingerprint: string) {
        super('REFERENCED_CONTENT', `Blob ${fingerprint} is still referenced by a version`);
        this.name = 'ReferencedContentError';
    }
}

// ─── Bisect ─────────────────────────────────────────────────────

export class InvalidRangeError extends PromptlineError {
    constructor(
        public readonly low: number,
        public readonly high: number,
    ) {
        super('INVALID_RANGE', `Invalid bisect range: good=${low} must be older than bad=${high}`);
        this.name = 'InvalidRangeError';
    }
}

export class OutOfRangeError extends PromptlineError {
    constructor(
        public readonly sequence: number,
        public readonly low: number,
        public readonly high: number,
    ) {
        super(
            'OUT_OF_RANGE',
            `Version ${sequence} is outside the open bisect interval (${low}, ${high})`,
        );
        this.name = 'OutOfRangeError';
    }
}

export class SessionInProgressError extends PromptlineError {
    constructor(public readonly artifact: string) {
        super('SESSION_IN_PROGRESS', `A bisect session is already active for '${artifact}'; reset it first`);
        this.name = 'SessionInProgressError';
    }
}

export class SessionNotActiveError extends PromptlineError {
    constructor(
        public readonly artifact: string,
        public readonly status: string,
    ) {
        super('SESSION_NOT_ACTIVE', `No active bisect session for '${artifact}' (status: ${status})`);
        this.name = 'SessionNotActiveError';
    }
}

// ─── Query ──────────────────────────────────────────────────────

export class QuerySyntaxError extends PromptlineError {
    constructor(
        public readonly token: string,
        public readonly position: number,
        detail: string,
    ) {
        super('QUERY_SYNTAX', `${detail} at position ${position} (found '${token}')`);
        this.name = 'QuerySyntaxError';
    }
}

export class QueryTypeError extends PromptlineError {
    constructor(
        public readonly field: string,
        public readonly operator: string,
        public readonly reason: string,
    ) {
        super('QUERY_TYPE', `Cannot apply '${operator}' to '${field}': ${reason}`);
        this.name = 'QueryTypeError';
    }
}

// ─── Input ──────────────────────────────────────────────────────

export class InvalidInputError extends PromptlineError {
    constructor(message: string) {
        super('INVALID_INPUT', message);
        this.name = 'InvalidInputError';
    }
}
