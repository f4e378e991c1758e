import type { SecureContextOptions } from 'node:tls';
import { Agent, type Dispatcher } from 'undici';
import { Filter, type FilterInput } from './filter.js';
import { DEFAULT_TIMEOUT, HTTPClient } from './http.js';
import { defaultLog, type Log } from './log.js';
import { ContainerCollection } from './models/containers.js';
import type { Outcome } from './outcome.js';
import { resolveResourceId, type ResourceReference } from './resource.js';
import { TLS } from './tls.js';
import type { Credentials } from './token-manager.js';
import type * as types from './types/index.js';
import {
    DEFAULT_PORTS,
    parseIntWithDefault,
    parsePortainerUrl,
    type Protocol,
} from './util.js';

const DEFAULT_USER_AGENT = 'portainer/node-sdk';

export interface PortainerClientOptions {
    host: string;
    // Defaults to 9000 for http and 9443 for https
    port?: number;
    protocol?: Protocol;
    username: string;
    password: string;
    // Portainer environment whose Docker API every container call goes through
    endpointId?: number;
    // Milliseconds, per request
    timeout?: number;
    // Extra CA or client certificates; server certificates are always verified
    tls?: SecureContextOptions;
    userAgent?: string;
    // Used instead of a dedicated undici Agent; closed together with the client
    dispatcher?: Dispatcher;
    logger?: Log;
    now?: () => number;
}

export type ClientSettings = Omit<
    PortainerClientOptions,
    'host' | 'port' | 'protocol' | 'username' | 'password'
>;

export interface ContainerListParams {
    all?: boolean;
    before?: string;
    filters?: FilterInput | Filter;
    latest?: boolean;
    limit?: number;
    quiet?: boolean;
    since?: string;
    size?: boolean;
    trunc?: boolean;
}

// IPv6 literals are bracketed inside a URL
function formatHost(host: string): string {
    return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

function toFilter(filters?: FilterInput | Filter): Filter | undefined {
    if (!filters) {
        return undefined;
    }
    const filter = filters instanceof Filter ? filters : Filter.from(filters);
    return filter.keys().length > 0 ? filter : undefined;
}

export class PortainerClient {
    public readonly endpointId: number;
    public readonly log: Log;
    private api: HTTPClient;

    constructor(options: PortainerClientOptions) {
        const protocol = options.protocol ?? 'http';
        const port = options.port ?? DEFAULT_PORTS[protocol];
        const dispatcher =
            options.dispatcher ??
            new Agent({
                connect: { ...options.tls, rejectUnauthorized: true },
            });

        this.endpointId = options.endpointId ?? 1;
        this.log = options.logger ?? defaultLog;
        if (options.tls && protocol === 'http') {
            this.log.warn(
                'TLS options are ignored because the Portainer URL uses http',
            );
        }
        this.api = new HTTPClient({
            baseUrl: `${protocol}://${formatHost(options.host)}:${port}`,
            endpointId: this.endpointId,
            credentials: {
                username: options.username,
                password: options.password,
            },
            dispatcher,
            userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
            timeout: options.timeout,
            log: this.log,
            now: options.now,
        });
    }

    /**
     * Create a PortainerClient from a server URL
     * @param url Portainer URL, e.g. "https://portainer.local:9443"
     * @param credentials Portainer user name and password
     */
    static fromUrl(
        url: string,
        credentials: Credentials,
        settings?: ClientSettings,
    ): PortainerClient {
        const { protocol, host, port } = parsePortainerUrl(url);
        return new PortainerClient({
            ...settings,
            protocol,
            host,
            port,
            username: credentials.username,
            password: credentials.password,
        });
    }

    /**
     * Create a PortainerClient from environment variables.
     * PORTAINER_URL (or PORTAINER_HOST and PORTAINER_PORT), PORTAINER_USERNAME and
     * PORTAINER_PASSWORD are required; PORTAINER_ENDPOINT_ID, PORTAINER_TIMEOUT
     * and PORTAINER_CERT_PATH are optional.
     */
    static async fromEnv(
        env: NodeJS.ProcessEnv = process.env,
        settings?: ClientSettings,
    ): Promise<PortainerClient> {
        const username = env.PORTAINER_USERNAME;
        if (!username) {
            throw new Error('PORTAINER_USERNAME environment variable is not set');
        }
        const password = env.PORTAINER_PASSWORD;
        if (!password) {
            throw new Error('PORTAINER_PASSWORD environment variable is not set');
        }

        let location: { protocol: Protocol; host: string; port: number };
        if (env.PORTAINER_URL) {
            location = parsePortainerUrl(env.PORTAINER_URL);
        } else if (env.PORTAINER_HOST) {
            location = {
                protocol: 'http',
                host: env.PORTAINER_HOST,
                port: parseIntWithDefault(env.PORTAINER_PORT, DEFAULT_PORTS.http),
            };
        } else {
            throw new Error(
                'Neither PORTAINER_URL nor PORTAINER_HOST environment variable is set',
            );
        }

        const tls = env.PORTAINER_CERT_PATH
            ? await TLS.loadCertificates(env.PORTAINER_CERT_PATH)
            : undefined;

        return new PortainerClient({
            endpointId: parseIntWithDefault(env.PORTAINER_ENDPOINT_ID, 1),
            timeout: parseIntWithDefault(env.PORTAINER_TIMEOUT, DEFAULT_TIMEOUT),
            tls,
            ...settings,
            ...location,
            username,
            password,
        });
    }

    get http(): HTTPClient {
        return this.api;
    }

    get containers(): ContainerCollection {
        return new ContainerCollection(this);
    }

    public close(): Promise<void> {
        return this.api.close();
    }

    // --- System API

    /**
     * Returns the version of Docker running on the endpoint and information about its host.
     */
    public async version(): Promise<Outcome<types.SystemVersion>> {
        return this.api.request<types.SystemVersion>({
            method: 'GET',
            path: '/version',
        });
    }

    // --- Containers API

    /**
     * List containers. Similar to `docker ps`.
     * @param options
     * @param options.all Show all containers. Only running containers are shown by default
     * @param options.before Only containers created before this id or name
     * @param options.filters Filters such as `status`, `label`, `name`, `ancestor` or `exited`
     * @param options.latest Only the latest created container
     * @param options.limit Show this many last created containers; -1 for no limit
     * @param options.quiet Reduce each entry to its Id
     * @param options.since Only containers created since this id or name
     * @param options.size Include container sizes
     * @param options.trunc Truncate ids to 12 characters
     */
    public async containerList(
        options?: ContainerListParams,
    ): Promise<Outcome<types.ContainerSummary[]>> {
        const outcome = await this.api.request<types.ContainerSummary[]>({
            method: 'GET',
            path: '/containers/json',
            params: {
                limit: options?.latest ? 1 : (options?.limit ?? -1),
                all: options?.all ? 1 : 0,
                size: options?.size ? 1 : 0,
                trunc_cmd: options?.trunc ? 1 : 0,
                since: options?.since,
                before: options?.before,
                filters: toFilter(options?.filters),
            },
        });

        if (outcome.kind !== 'json') {
            return outcome;
        }
        if (options?.quiet) {
            return {
                ...outcome,
                data: outcome.data.map((container) => ({ Id: container.Id })),
            };
        }
        if (options?.trunc) {
            return {
                ...outcome,
                data: outcome.data.map((container) => ({
                    ...container,
                    Id: container.Id.substring(0, 12),
                })),
            };
        }
        return outcome;
    }

    /**
     * Return low-level information about a container
     * @param container ID or name of the container, or an object carrying its Id
     */
    public async containerInspect(
        container: ResourceReference,
    ): Promise<Outcome<types.ContainerInspectResponse>> {
        const id = resolveResourceId(container);
        return this.api.request<types.ContainerInspectResponse>({
            method: 'GET',
            path: `/containers/${id}/json`,
        });
    }

    /**
     * Send a POSIX signal to a container, SIGKILL by default
     * @param container ID or name of the container
     * @param options
     * @param options.signal Signal name (e.g. 'SIGINT') or number
     * @throws TypeError if a numeric signal is not finite
     */
    public async containerKill(
        container: ResourceReference,
        options?: {
            signal?: string | number;
        },
    ): Promise<Outcome> {
        const id = resolveResourceId(container);
        const signal = options?.signal;
        if (typeof signal === 'number' && !Number.isFinite(signal)) {
            throw new TypeError(`Invalid signal: ${signal}`);
        }
        return this.api.request({
            method: 'POST',
            path: `/containers/${id}/kill`,
            params: {
                signal: typeof signal === 'number' ? Math.trunc(signal) : signal,
            },
        });
    }

    /**
     * Use the freezer cgroup to suspend all processes in a container.
     * @param container ID or name of the container
     */
    public async containerPause(container: ResourceReference): Promise<Outcome> {
        const id = resolveResourceId(container);
        return this.api.request({
            method: 'POST',
            path: `/containers/${id}/pause`,
        });
    }

    /**
     * Restart a container
     * @param container ID or name of the container
     * @param options
     * @param options.timeout Seconds to wait for the container to stop before killing it. Defaults to 10
     */
    public async containerRestart(
        container: ResourceReference,
        options?: {
            timeout?: number;
        },
    ): Promise<Outcome> {
        const id = resolveResourceId(container);
        return this.api.request({
            method: 'POST',
            path: `/containers/${id}/restart`,
            params: {
                t: options?.timeout ?? 10,
            },
        });
    }

    /**
     * Start a container
     * @param container ID or name of the container
     */
    public async containerStart(container: ResourceReference): Promise<Outcome> {
        const id = resolveResourceId(container);
        return this.api.request({
            method: 'POST',
            path: `/containers/${id}/start`,
        });
    }

    /**
     * Single snapshot of a container's resource usage statistics
     * @param container ID or name of the container
     */
    public async containerStats(
        container: ResourceReference,
    ): Promise<Outcome<types.ContainerStatsResponse>> {
        const id = resolveResourceId(container);
        return this.api.request<types.ContainerStatsResponse>({
            method: 'GET',
            path: `/containers/${id}/stats`,
            params: {
                stream: false,
            },
        });
    }

    /**
     * Stop a container
     * @param container ID or name of the container
     * @param options
     * @param options.timeout Seconds to wait before killing the container. Defaults to 10
     */
    public async containerStop(
        container: ResourceReference,
        options?: {
            timeout?: number;
        },
    ): Promise<Outcome> {
        const id = resolveResourceId(container);
        return this.api.request({
            method: 'POST',
            path: `/containers/${id}/stop`,
            params: {
                t: options?.timeout ?? 10,
            },
        });
    }

    /**
     * List processes running inside a container. Not supported on Windows hosts.
     * @param container ID or name of the container
     * @param options
     * @param options.psArgs The arguments to pass to `ps`, e.g. 'aux'
     */
    public async containerTop(
        container: ResourceReference,
        options?: {
            psArgs?: string;
        },
    ): Promise<Outcome<types.ContainerTopResponse>> {
        const id = resolveResourceId(container);
        return this.api.request<types.ContainerTopResponse>({
            method: 'GET',
            path: `/containers/${id}/top`,
            params: {
                ps_args: options?.psArgs,
            },
        });
    }
}
