/**
 * Response of GET /version on the endpoint's Docker daemon
 */
export interface SystemVersion {
    Platform?: {
        Name: string;
    };
    Version?: string;
    ApiVersion?: string;
    MinAPIVersion?: string;
    GitCommit?: string;
    GoVersion?: string;
    Os?: string;
    Arch?: string;
    KernelVersion?: string;
    BuildTime?: string;
}
