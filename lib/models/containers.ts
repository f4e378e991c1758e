import { NotFoundError, SparseModelError } from '../errors.js';
import type { Filter, FilterInput } from '../filter.js';
import { expectJSON, type Outcome } from '../outcome.js';
import type { ResourceReference } from '../resource.js';
import type {
    ContainerInspectResponse,
    ContainerState,
    ContainerStatsResponse,
    ContainerSummary,
    ContainerTopResponse,
    PortMap,
} from '../types/index.js';
import { Collection, Model } from './resource.js';

// Summaries come from a listing, inspect responses from get() or reload()
export type ContainerAttributes = ContainerSummary | ContainerInspectResponse;

export function isInspected(
    attrs: Readonly<ContainerAttributes>,
): attrs is Readonly<ContainerInspectResponse> {
    return typeof attrs.State === 'object' || 'Config' in attrs;
}

/**
 * Local representation of a container. Attributes are cached; call `reload()`
 * to fetch the current state from the server.
 */
export class Container extends Model<ContainerAttributes> {
    // Container name without the leading slash
    get name(): string | undefined {
        const attrs = this.attrs;
        const name = isInspected(attrs) ? attrs.Name : attrs.Names?.[0];
        return name?.replace(/^\/+/, '');
    }

    get imageId(): string | undefined {
        const attrs = this.attrs;
        return isInspected(attrs) ? attrs.Image : (attrs.ImageID ?? attrs.Image);
    }

    get labels(): Record<string, string> {
        const attrs = this.attrs;
        if (!isInspected(attrs) || !attrs.Config) {
            throw new SparseModelError(
                'Label data is not available for sparse objects. Call reload() to retrieve all information',
            );
        }
        return attrs.Config.Labels ?? {};
    }

    // The detailed state object, only present after an inspect
    get state(): ContainerState | undefined {
        const attrs = this.attrs;
        return isInspected(attrs) ? attrs.State : undefined;
    }

    /**
     * For inspected containers the state, e.g. `running` or `exited`;
     * for sparse ones the human readable status, e.g. `Up 2 hours`.
     */
    get status(): string | undefined {
        const attrs = this.attrs;
        return isInspected(attrs) ? attrs.State?.Status : attrs.Status;
    }

    get ports(): PortMap {
        const attrs = this.attrs;
        if (!isInspected(attrs)) {
            return {};
        }
        return attrs.NetworkSettings?.Ports ?? {};
    }

    get startedAt(): string | undefined {
        return this.state?.StartedAt;
    }

    kill(signal?: string | number): Promise<Outcome> {
        return this.client.containerKill(this.id, { signal });
    }

    pause(): Promise<Outcome> {
        return this.client.containerPause(this.id);
    }

    restart(options?: { timeout?: number }): Promise<Outcome> {
        return this.client.containerRestart(this.id, options);
    }

    start(): Promise<Outcome> {
        return this.client.containerStart(this.id);
    }

    stats(): Promise<Outcome<ContainerStatsResponse>> {
        return this.client.containerStats(this.id);
    }

    stop(options?: { timeout?: number }): Promise<Outcome> {
        return this.client.containerStop(this.id, options);
    }

    top(options?: { psArgs?: string }): Promise<Outcome<ContainerTopResponse>> {
        return this.client.containerTop(this.id, options);
    }

    protected override async fetchAttributes(): Promise<ContainerInspectResponse> {
        return expectJSON(await this.client.containerInspect(this.id));
    }
}

export interface ContainerListOptions {
    all?: boolean;
    before?: string;
    filters?: FilterInput | Filter;
    limit?: number;
    since?: string;
    // Skip the per-container inspect and return summaries only
    sparse?: boolean;
    // Skip containers removed between the listing and their inspect
    ignoreRemoved?: boolean;
}

export class ContainerCollection extends Collection<
    ContainerAttributes,
    Container
> {
    override prepareModel(attrs: ContainerAttributes): Container {
        return new Container(this.client, attrs);
    }

    /**
     * Get a container by name or ID.
     * @throws NotFoundError if the container does not exist
     * @throws ServerRejectionError if the server returns another error
     */
    async get(container: ResourceReference): Promise<Container> {
        const attrs = expectJSON(await this.client.containerInspect(container));
        return this.prepareModel(attrs);
    }

    /**
     * List containers. Unless `sparse` is set, every listed container is
     * inspected so the returned models carry all attributes.
     */
    async list(options?: ContainerListOptions): Promise<Container[]> {
        const summaries = expectJSON(
            await this.client.containerList({
                all: options?.all,
                before: options?.before,
                filters: options?.filters,
                limit: options?.limit,
                since: options?.since,
            }),
        );

        if (options?.sparse) {
            return summaries.map((summary) => this.prepareModel(summary));
        }

        const containers: Container[] = [];
        for (const summary of summaries) {
            try {
                containers.push(await this.get(summary.Id));
            } catch (error) {
                if (options?.ignoreRemoved && error instanceof NotFoundError) {
                    this.client.log.debug(
                        `Container ${summary.Id} was removed while listing, skipping`,
                    );
                    continue;
                }
                throw error;
            }
        }
        return containers;
    }
}
