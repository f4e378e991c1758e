import type { MountPoint, PortMap } from './ContainerShared.js';

export type ContainerStatus =
    | 'created'
    | 'running'
    | 'paused'
    | 'restarting'
    | 'removing'
    | 'exited'
    | 'dead';

export interface ContainerState {
    Status?: ContainerStatus;
    Running?: boolean;
    Paused?: boolean;
    Restarting?: boolean;
    OOMKilled?: boolean;
    Dead?: boolean;
    Pid?: number;
    ExitCode?: number;
    Error?: string;
    StartedAt?: string;
    FinishedAt?: string;
}

export interface ContainerConfig {
    Hostname?: string;
    User?: string;
    Env?: string[];
    Cmd?: string[];
    Entrypoint?: string[];
    Image?: string;
    WorkingDir?: string;
    Labels?: Record<string, string>;
    ExposedPorts?: Record<string, object>;
}

export interface EndpointSettings {
    NetworkID?: string;
    EndpointID?: string;
    Gateway?: string;
    IPAddress?: string;
    MacAddress?: string;
}

export interface NetworkSettings {
    IPAddress?: string;
    Ports?: PortMap;
    Networks?: Record<string, EndpointSettings>;
}

/**
 * Response of GET /containers/{id}/json
 */
export interface ContainerInspectResponse {
    Id: string;
    Created?: string;
    Path?: string;
    Args?: string[];
    State?: ContainerState;
    // Image id, e.g. "sha256:..."
    Image?: string;
    Name?: string;
    RestartCount?: number;
    Driver?: string;
    Platform?: string;
    Config?: ContainerConfig;
    HostConfig?: Record<string, unknown>;
    NetworkSettings?: NetworkSettings;
    Mounts?: MountPoint[];
}
