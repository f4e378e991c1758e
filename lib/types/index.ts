export * from './AuthResponse.js';
export * from './ContainerInspectResponse.js';
export * from './ContainerShared.js';
export * from './ContainerStatsResponse.js';
export * from './ContainerSummary.js';
export * from './ContainerTopResponse.js';
export * from './SystemVersion.js';
