/**
 * Options for swarm service operations.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Service
 */

import type { RegistryAuth } from '../auth';
import { encodeFilters, type Filter, type ServiceFilterKind } from '../filters';
import { encodeQuery, jsonBody, type RequestBody } from '../query';

export interface ServiceListOptions {
  filters?: readonly Filter<ServiceFilterKind>[];
  /** Include `ServiceStatus` with running and desired task counts */
  status?: boolean;
}

export function serializeServiceListOptions(options: ServiceListOptions = {}): string | undefined {
  return encodeQuery({ filters: encodeFilters(options.filters), status: options.status });
}

/** `ServiceSpec`; only the commonly used top-level fields are typed */
export interface ServiceSpec {
  Name?: string;
  Labels?: Record<string, string>;
  TaskTemplate?: {
    ContainerSpec?: {
      Image: string;
      Command?: string[];
      Args?: string[];
      Env?: string[];
      [key: string]: unknown;
    };
    [key: string]: unknown;
  };
  Mode?: { Replicated?: { Replicas?: number }; Global?: Record<string, never> };
  UpdateConfig?: Record<string, unknown>;
  RollbackConfig?: Record<string, unknown>;
  Networks?: Array<{ Target: string; Aliases?: string[] }>;
  EndpointSpec?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ServiceCreateOptions {
  spec: ServiceSpec;
  auth?: RegistryAuth;
}

export function serializeServiceSpec(options: { spec: ServiceSpec }): RequestBody {
  return jsonBody(options.spec);
}

export interface ServiceUpdateOptions extends ServiceCreateOptions {
  /** Version of the service object being updated, required to avoid conflicting writes */
  version: number;
  registryAuthFrom?: 'spec' | 'previous-spec';
  rollback?: 'previous';
}

export function serializeServiceUpdateQuery(options: ServiceUpdateOptions): string | undefined {
  return encodeQuery({
    version: options.version,
    registryAuthFrom: options.registryAuthFrom,
    rollback: options.rollback,
  });
}
