export interface CPUStats {
    cpu_usage?: {
        total_usage?: number;
        percpu_usage?: number[];
        usage_in_kernelmode?: number;
        usage_in_usermode?: number;
    };
    system_cpu_usage?: number;
    online_cpus?: number;
}

export interface MemoryStats {
    usage?: number;
    max_usage?: number;
    limit?: number;
    stats?: Record<string, number>;
}

export interface NetworkStats {
    rx_bytes?: number;
    rx_packets?: number;
    tx_bytes?: number;
    tx_packets?: number;
}

/**
 * Single snapshot of GET /containers/{id}/stats?stream=false
 */
export interface ContainerStatsResponse {
    id?: string;
    name?: string;
    read?: string;
    preread?: string;
    pids_stats?: {
        current?: number;
        limit?: number;
    };
    cpu_stats?: CPUStats;
    precpu_stats?: CPUStats;
    memory_stats?: MemoryStats;
    networks?: Record<string, NetworkStats>;
}
