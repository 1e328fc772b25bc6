export type ErrorType =
    | 'InvalidArgumentError'
    | 'InvalidQueryError'
    | 'UpstreamUnavailableError'
    | 'UpstreamRejectedError'
    | 'NotFoundError'
    | 'PartialResultError'
    | 'InternalError';

export class BridgeError extends Error {
    readonly type: ErrorType = 'InternalError';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BridgeError';
    }
}

/** Malformed caller input: negative paging values, limits over the maximum, bad ids. */
export class InvalidArgumentError extends BridgeError {
    override readonly type = 'InvalidArgumentError';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

/** A query that cannot be expressed in the upstream's filter grammar. */
export class InvalidQueryError extends BridgeError {
    override readonly type = 'InvalidQueryError';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidQueryError';
    }
}

export class UpstreamUnavailableError extends BridgeError {
    override readonly type = 'UpstreamUnavailableError';

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'UpstreamUnavailableError';
    }
}

export class UpstreamRejectedError extends BridgeError {
    override readonly type = 'UpstreamRejectedError';

    constructor(message: string, readonly status: number) {
        super(message);
        this.name = 'UpstreamRejectedError';
    }
}

export class NotFoundError extends BridgeError {
    override readonly type = 'NotFoundError';

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/** Some pages arrived before a later page failed. Carried inside the envelope, never thrown to callers. */
export class PartialResultError extends BridgeError {
    override readonly type = 'PartialResultError';

    constructor(message: string, readonly fetched: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PartialResultError';
    }
}

export interface ErrorPayload {
    error: string;
    errorType: ErrorType;
}

export function toErrorPayload(err: unknown): ErrorPayload {
    if (err instanceof BridgeError) {
        return { error: err.message, errorType: err.type };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { error: message, errorType: 'InternalError' };
}
