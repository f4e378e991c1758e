import type { MountPoint, Port } from './ContainerShared.js';

/**
 * One entry of GET /containers/json
 */
export interface ContainerSummary {
    Id: string;
    Names?: string[];
    Image?: string;
    ImageID?: string;
    Command?: string;
    Created?: number;
    Ports?: Port[];
    SizeRw?: number;
    SizeRootFs?: number;
    Labels?: Record<string, string>;
    // e.g. "running"
    State?: string;
    // e.g. "Up 2 hours"
    Status?: string;
    HostConfig?: {
        NetworkMode?: string;
    };
    Mounts?: MountPoint[];
}
