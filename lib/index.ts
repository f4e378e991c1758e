export * from './types/index.js';
export * from './errors.js';
export { Filter, convertFilters } from './filter.js';
export type { FilterInput, FilterValue } from './filter.js';
export {
    APPLICATION_JSON,
    DEFAULT_TIMEOUT,
    HTTPClient,
    buildQueryString,
    classifyResponse,
} from './http.js';
export type {
    HTTPClientOptions,
    HTTPMethod,
    QueryParams,
    QueryValue,
    RequestDescriptor,
    URLParameter,
} from './http.js';
export { defaultLog, silentLog } from './log.js';
export type { Log } from './log.js';
export { Container, ContainerCollection, isInspected } from './models/containers.js';
export type {
    ContainerAttributes,
    ContainerListOptions,
} from './models/containers.js';
export { Collection, Model } from './models/resource.js';
export {
    describeOutcome,
    expectJSON,
    isNotFound,
    isSuccess,
    rejectionError,
} from './outcome.js';
export type {
    EmptyOutcome,
    FailureOutcome,
    JSONOutcome,
    Outcome,
    TextOutcome,
} from './outcome.js';
export { PortainerClient } from './portainer-client.js';
export type {
    ClientSettings,
    ContainerListParams,
    PortainerClientOptions,
} from './portainer-client.js';
export { resolveResourceId } from './resource.js';
export type { EntityReference, ResourceReference } from './resource.js';
export { TLS } from './tls.js';
export { TOKEN_LIFETIME, TokenManager } from './token-manager.js';
export type { CredentialExchange, Credentials } from './token-manager.js';
export { DEFAULT_PORTS, parsePortainerUrl } from './util.js';
export type { Protocol } from './util.js';
