export interface Port {
    IP?: string;
    PrivatePort: number;
    PublicPort?: number;
    Type: 'tcp' | 'udp' | 'sctp';
}

export interface MountPoint {
    Type?: string;
    Name?: string;
    Source?: string;
    Destination?: string;
    Driver?: string;
    Mode?: string;
    RW?: boolean;
    Propagation?: string;
}

export interface PortBinding {
    HostIp?: string;
    HostPort?: string;
}

// Keyed by "<port>/<protocol>", e.g. "80/tcp"
export type PortMap = Record<string, PortBinding[] | null>;
