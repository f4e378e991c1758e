import { AuthError } from './errors.js';
import { defaultLog, type Log } from './log.js';
import type { Outcome } from './outcome.js';
import type { AuthResponse } from './types/index.js';
import { getErrorMessage } from './util.js';

export interface Credentials {
    username: string;
    password: string;
}

// Performs the unauthenticated POST /api/auth
export type CredentialExchange = (
    credentials: Credentials,
) => Promise<Outcome<unknown>>;

// Portainer issues tokens valid for 8 hours; renew a minute early
export const TOKEN_LIFETIME = (7 * 60 + 59) * 60 * 1000;

interface Session {
    token: string;
    expiry: number;
}

function isAuthResponse(data: unknown): data is AuthResponse {
    return (
        data !== null &&
        typeof data === 'object' &&
        'jwt' in data &&
        typeof data.jwt === 'string' &&
        data.jwt !== ''
    );
}

/**
 * TokenManager owns the bearer token of one client.
 * Concurrent callers that find the token missing or expired share a single
 * credential exchange.
 */
export class TokenManager {
    private readonly credentials: Credentials;
    private readonly exchange: CredentialExchange;
    private readonly now: () => number;
    private readonly log: Log;
    private session?: Session;
    private refreshPromise: Promise<string> | null = null;
    // Bumped by invalidate() so an exchange started earlier cannot store its token
    private generation = 0;

    constructor(
        credentials: Credentials,
        exchange: CredentialExchange,
        options?: { now?: () => number; log?: Log },
    ) {
        this.credentials = { ...credentials };
        this.exchange = exchange;
        this.now = options?.now ?? Date.now;
        this.log = options?.log ?? defaultLog;
    }

    get expiresAt(): number | undefined {
        return this.session?.expiry;
    }

    /**
     * Return a token that is valid right now, exchanging credentials first when
     * there is none or the current one has expired.
     */
    async ensureFreshToken(): Promise<string> {
        if (this.session && this.now() < this.session.expiry) {
            return this.session.token;
        }

        if (this.refreshPromise) {
            return this.refreshPromise;
        }

        let pending: Promise<string> | undefined;
        pending = (async () => {
            try {
                return await this.refresh();
            } finally {
                if (this.refreshPromise === pending) {
                    this.refreshPromise = null;
                }
            }
        })();
        this.refreshPromise = pending;

        return pending;
    }

    // Forget the current token; the next authenticated call exchanges credentials again
    invalidate(): void {
        this.session = undefined;
        this.refreshPromise = null;
        this.generation += 1;
    }

    private async refresh(): Promise<string> {
        this.log.debug('Token needs to be refreshed');
        const generation = this.generation;

        let outcome: Outcome<unknown>;
        try {
            outcome = await this.exchange({
                username: this.credentials.username,
                password: this.credentials.password,
            });
        } catch (error) {
            throw new AuthError(
                `Credential exchange failed: ${getErrorMessage(error)}`,
                { cause: error },
            );
        }

        if (outcome.kind === 'failure') {
            throw new AuthError(
                `Authentication rejected with status ${outcome.status}: ${outcome.message}`,
            );
        }
        if (outcome.kind !== 'json' || !isAuthResponse(outcome.data)) {
            throw new AuthError('Authentication response did not contain a token');
        }

        const token = outcome.data.jwt;
        if (generation === this.generation) {
            this.session = { token, expiry: this.now() + TOKEN_LIFETIME };
        } else {
            this.log.debug('Token was invalidated during refresh, not storing it');
        }
        return token;
    }
}
