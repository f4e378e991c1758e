/**
 * Response of GET /containers/{id}/top
 */
export interface ContainerTopResponse {
    Titles: string[];
    Processes: string[][];
}
