// src/backend/index.ts

export * from './types';
export { BackendCell, BackendAlreadySelectedError, processBackendCell } from './backend_cell';
export { createProcessEnvironment, isRootAvailable, once } from './environment';
export type { Environment, EnvironmentProbes, ProcessEnvironmentOptions } from './environment';
export { CapabilityResolver, createBackend, currentBackend, getBackendResolver } from './capability_resolver';
export type { CapabilityResolverOptions } from './capability_resolver';
