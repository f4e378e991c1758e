import type { PortainerClient } from '../portainer-client.js';

/**
 * Local representation of a server-side object. Attributes are a snapshot
 * taken when the model was created; `reload()` replaces them as a whole.
 */
export abstract class Model<TAttrs extends { Id: string }> {
    protected readonly client: PortainerClient;
    private snapshot: Readonly<TAttrs>;

    constructor(client: PortainerClient, attrs: TAttrs) {
        this.client = client;
        this.snapshot = attrs;
    }

    get attrs(): Readonly<TAttrs> {
        return this.snapshot;
    }

    get id(): string {
        return this.snapshot.Id;
    }

    // The ID truncated to 12 characters, as `docker ps` shows it
    get shortId(): string {
        return this.id.substring(0, 12);
    }

    async reload(): Promise<void> {
        this.snapshot = await this.fetchAttributes();
    }

    protected abstract fetchAttributes(): Promise<TAttrs>;
}

export abstract class Collection<
    TAttrs extends { Id: string },
    TModel extends Model<TAttrs>,
> {
    protected readonly client: PortainerClient;

    constructor(client: PortainerClient) {
        this.client = client;
    }

    abstract prepareModel(attrs: TAttrs): TModel;
}
