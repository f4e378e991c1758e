// The HTTP round trip did not complete (connection refused, reset, DNS, closed client)
export class TransportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransportError';
    }
}

// The HTTP round trip did not complete within the client's timeout
export class TransportTimeoutError extends TransportError {
    public timeout: number;

    constructor(message: string, timeout: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransportTimeoutError';
        this.timeout = timeout;
    }
}

// Credential exchange against /api/auth failed
export class AuthError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AuthError';
    }
}

/**
 * Raised when a caller needs a value but the server answered with a 4xx/5xx.
 * The message is the raw response body.
 */
export class ServerRejectionError extends Error {
    public statusCode: number;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = 'ServerRejectionError';
        this.statusCode = statusCode;
    }
}

// 404 refinement of ServerRejectionError, used when a resource disappeared
export class NotFoundError extends ServerRejectionError {
    constructor(message: string) {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}

// A resource-targeting operation was called without a resolvable id
export class NullResourceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NullResourceError';
    }
}

// A JSON payload was expected but the server answered with text or nothing
export class UnexpectedResponseError extends Error {
    public statusCode: number;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = 'UnexpectedResponseError';
        this.statusCode = statusCode;
    }
}

// Accessor needs fields that only a full inspect provides
export class SparseModelError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SparseModelError';
    }
}
