function isObject(value: unknown): value is object {
    return value !== null && typeof value === 'object';
}

export function isFileNotFoundError(error: unknown): boolean {
    return isObject(error) && 'code' in error && error.code === 'ENOENT';
}

export function getErrorMessage(error: unknown): string | undefined {
    if (!error) {
        return;
    }
    if (typeof error === 'string') {
        return error;
    }
    if (error instanceof Error) {
        return error.message;
    }
    if (
        isObject(error) &&
        'message' in error &&
        typeof error.message === 'string'
    ) {
        return error.message;
    }
    return;
}

export function parseIntWithDefault(
    value: string | undefined,
    defaultValue: number,
): number {
    if (value === undefined) {
        return defaultValue;
    }
    const number = parseInt(value);
    return Number.isNaN(number) ? defaultValue : number;
}

export type Protocol = 'http' | 'https';

// Portainer listens on 9000 for plain HTTP and 9443 for HTTPS out of the box
export const DEFAULT_PORTS: Record<Protocol, number> = {
    http: 9000,
    https: 9443,
};

// Written out explicitly, these are dropped from URL.port
const SCHEME_PORTS: Record<Protocol, number> = {
    http: 80,
    https: 443,
};

function toProtocol(scheme: string): Protocol | undefined {
    if (scheme === 'http:') {
        return 'http';
    }
    if (scheme === 'https:') {
        return 'https';
    }
    return undefined;
}

/**
 * Split a Portainer URL such as "https://portainer.local:9443" into its parts.
 * IPv6 hosts keep their brackets, e.g. "[::1]". Any path after the authority
 * is ignored; the API root is always /api.
 */
export function parsePortainerUrl(url: string): {
    protocol: Protocol;
    host: string;
    port: number;
} {
    const message = `Invalid Portainer URL: ${url}. Must start with "http://" or "https://"`;
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (error) {
        throw new Error(message, { cause: error });
    }
    const protocol = toProtocol(parsed.protocol);
    if (!protocol || !parsed.hostname) {
        throw new Error(message);
    }

    let port = DEFAULT_PORTS[protocol];
    if (parsed.port) {
        port = Number(parsed.port);
    } else if (/:\d+$/.test(authorityOf(url))) {
        port = SCHEME_PORTS[protocol];
    }
    return { protocol, host: parsed.hostname, port };
}

// The raw "host[:port]" part, before the parser drops a scheme's default port
function authorityOf(url: string): string {
    return /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i.exec(url)?.[1] ?? '';
}
