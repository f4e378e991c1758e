import { NullResourceError } from './errors.js';

// Anything carrying a container id the way the API reports it
export interface EntityReference {
    Id?: string;
    ID?: string;
}

export type ResourceReference = string | EntityReference;

export function resolveResourceId(
    reference: ResourceReference | null | undefined,
): string {
    const id =
        typeof reference === 'string'
            ? reference
            : (reference?.Id ?? reference?.ID);
    if (!id) {
        throw new NullResourceError('Resource ID was not provided');
    }
    return id;
}
