import { fetch, type Dispatcher, type Response } from 'undici';
import {
    TransportError,
    TransportTimeoutError,
    UnexpectedResponseError,
} from './errors.js';
import { defaultLog, type Log } from './log.js';
import type { Outcome } from './outcome.js';
import { TokenManager, type Credentials } from './token-manager.js';
import { getErrorMessage } from './util.js';

export const APPLICATION_JSON = 'application/json';

// Every request is bounded by this many milliseconds unless configured otherwise
export const DEFAULT_TIMEOUT = 60_000;

// undici error codes that mean the server did not answer in time
const UNDICI_TIMEOUT_CODES = new Set([
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
]);

export type HTTPMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD';

// Query values able to render themselves, such as Filter
export interface URLParameter {
    toURLParameter(): string;
}

export type QueryValue =
    | string
    | number
    | boolean
    | URLParameter
    | null
    | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface RequestDescriptor {
    method: HTTPMethod;
    // Relative to the endpoint's Docker API, or to /api when absolute
    path: string;
    absolute?: boolean;
    params?: QueryParams;
    data?: object;
    // Defaults to true
    authenticate?: boolean;
}

export interface HTTPClientOptions {
    // Origin of the Portainer server, e.g. "http://localhost:9000"
    baseUrl: string;
    endpointId: number;
    credentials: Credentials;
    dispatcher: Dispatcher;
    userAgent: string;
    timeout?: number;
    log?: Log;
    now?: () => number;
}

export function buildQueryString(params?: QueryParams): string {
    if (!params || Object.keys(params).length === 0) {
        return '';
    }

    const searchParams = new URLSearchParams();
    Object.entries(params).forEach(([key, value]) => {
        if (value === undefined || value === null) {
            return;
        }
        if (typeof value === 'object') {
            searchParams.append(key, value.toURLParameter());
        } else {
            searchParams.append(key, String(value));
        }
    });

    const queryString = searchParams.toString();
    return queryString ? `?${queryString}` : '';
}

function isTimeout(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
        return true;
    }
    const cause = error.cause;
    return (
        cause !== null &&
        typeof cause === 'object' &&
        'code' in cause &&
        typeof cause.code === 'string' &&
        UNDICI_TIMEOUT_CODES.has(cause.code)
    );
}

/**
 * Map a completed response onto an Outcome.
 * Error bodies are kept as raw text even when the server sends JSON.
 */
export async function classifyResponse<T>(
    response: Response,
): Promise<Outcome<T>> {
    const status = response.status;

    if (status >= 400 && status <= 599) {
        return { kind: 'failure', status, message: await response.text() };
    }

    if (status === 204) {
        return { kind: 'empty', status };
    }

    const contentType = response.headers.get('content-type')?.toLowerCase();
    const text = await response.text();

    if (contentType?.includes(APPLICATION_JSON)) {
        if (text.length === 0) {
            return { kind: 'empty', status };
        }
        let data: T;
        try {
            data = JSON.parse(text);
        } catch (error) {
            throw new UnexpectedResponseError(
                `Invalid JSON in response: ${getErrorMessage(error)}`,
                status,
            );
        }
        return { kind: 'json', status, data };
    }

    return { kind: 'text', status, text };
}

/**
 * HTTPClient is the authenticated request core of the Portainer client.
 * It scopes paths to the endpoint's Docker API, injects a fresh bearer token
 * into every authenticated request, and classifies responses into Outcomes.
 * Exactly one attempt is made per request.
 */
export class HTTPClient {
    private readonly baseUrl: string;
    private readonly endpointId: number;
    private readonly dispatcher: Dispatcher;
    private readonly userAgent: string;
    private readonly timeout: number;
    private readonly log: Log;
    private readonly tokens: TokenManager;
    private closed = false;

    constructor(options: HTTPClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/$/, '');
        this.endpointId = options.endpointId;
        this.dispatcher = options.dispatcher;
        this.userAgent = options.userAgent;
        this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
        this.log = options.log ?? defaultLog;
        this.tokens = new TokenManager(
            options.credentials,
            (credentials) =>
                this.request({
                    method: 'POST',
                    path: '/auth',
                    absolute: true,
                    data: credentials,
                    authenticate: false,
                }),
            { now: options.now, log: this.log },
        );
    }

    get tokenManager(): TokenManager {
        return this.tokens;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    // Release the dispatcher; calling close again is a no-op
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.dispatcher.close();
    }

    public resolvePath(path: string, absolute: boolean = false): string {
        if (absolute) {
            return `/api${path}`;
        }
        return `/api/endpoints/${this.endpointId}/docker${path}`;
    }

    public async request<T = unknown>(
        descriptor: RequestDescriptor,
    ): Promise<Outcome<T>> {
        const uri = `${this.resolvePath(descriptor.path, descriptor.absolute)}${buildQueryString(descriptor.params)}`;
        if (this.closed) {
            throw new TransportError(
                `Client is closed (${descriptor.method} ${uri})`,
            );
        }

        const headers: Record<string, string> = {
            Accept: APPLICATION_JSON,
            'User-Agent': this.userAgent,
        };
        await this.authorize(descriptor, headers);

        let body: string | undefined;
        if (descriptor.data !== undefined) {
            body = JSON.stringify(descriptor.data);
            headers['Content-Type'] = APPLICATION_JSON;
        }

        this.log.debug(`${descriptor.method} ${uri}`);

        try {
            const response = await fetch(`${this.baseUrl}${uri}`, {
                method: descriptor.method,
                headers,
                body,
                dispatcher: this.dispatcher,
                signal: AbortSignal.timeout(this.timeout),
            });
            return await classifyResponse<T>(response);
        } catch (error) {
            if (error instanceof UnexpectedResponseError) {
                throw error;
            }
            throw this.transportError(error, `${descriptor.method} ${uri}`);
        }
    }

    // Authentication stage: every descriptor not explicitly opting out gets a fresh token
    private async authorize(
        descriptor: RequestDescriptor,
        headers: Record<string, string>,
    ): Promise<void> {
        if (descriptor.authenticate === false) {
            return;
        }
        const token = await this.tokens.ensureFreshToken();
        headers['Authorization'] = `Bearer ${token}`;
    }

    private transportError(error: unknown, request: string): TransportError {
        if (isTimeout(error)) {
            return new TransportTimeoutError(
                `Timeout occurred while connecting to Portainer (${request})`,
                this.timeout,
                { cause: error },
            );
        }
        return new TransportError(
            `Error occurred while communicating with Portainer (${request}): ${getErrorMessage(error)}`,
            { cause: error },
        );
    }
}
