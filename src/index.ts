/**
 * Docker tenant gateway
 *
 * Typed request construction for the Docker Engine API plus the HTTP gateway
 * that forwards tenant-addressed requests to per-tenant daemons.
 */

// Request construction
export * from './docker/clients';
export * from './docker/options';
export {
  ContainerFilter,
  EventFilter,
  FILTER_KINDS,
  ImageFilter,
  ImageSearchFilter,
  NetworkFilter,
  PruneFilter,
  ServiceFilter,
  VolumeFilter,
  encodeFilters,
  groupFilters,
  withFilters,
  type Filter,
  type FilterMap,
} from './docker/filters';
export {
  decodeRegistryAuth,
  encodeRegistryAuth,
  passwordAuth,
  tokenAuth,
  REGISTRY_AUTH_HEADER,
  type RegistryAuth,
} from './docker/auth';
export {
  formatEndpoint,
  parseDaemonEndpoint,
  type DaemonEndpoint,
  type TcpEndpoint,
  type UnixEndpoint,
} from './docker/endpoint';
export {
  createRequest,
  describeRequest,
  encodeIdentifier,
  type HttpMethod,
  type RequestDescriptor,
} from './docker/request';
export { encodeQuery, withQuery, type RequestBody } from './docker/query';
export { packDirectory } from './docker/tarball';

// Gateway
export { createGatewayApp, type GatewayAppOptions } from './gateway/app';
export {
  CachedDaemonDirectory,
  StaticDaemonDirectory,
  loadTenantDirectory,
  parseTenantFile,
  type DaemonDirectory,
} from './gateway/directory';
export { TenantResolver, type ResolvedTenant } from './gateway/resolver';
export { UndiciTransport, type DaemonResponse, type Transport } from './gateway/transport';
export { startGateway, type RunningGateway } from './cli/server';

// Configuration, errors and logging
export { createAppConfig, type AppConfig } from './config';
export * from './errors';
export { createLogger, type Logger } from './lib/logger';
