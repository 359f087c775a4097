/**
 * Address of one Docker daemon.
 */

import { ConfigurationError } from '../errors';

export interface TcpEndpoint {
  readonly kind: 'tcp';
  /** Normalized origin, e.g. `tcp://10.0.0.5:2375` or `https://docker.internal:2376` */
  readonly url: string;
  readonly apiVersion?: string;
}

export interface UnixEndpoint {
  readonly kind: 'unix';
  readonly socketPath: string;
  readonly apiVersion?: string;
}

export type DaemonEndpoint = TcpEndpoint | UnixEndpoint;

const TCP_SCHEMES = new Set(['tcp:', 'http:', 'https:']);

/** Base every request path of a unix-socket daemon is joined onto */
export const UNIX_BASE_URL = 'http://localhost';

/**
 * Accept `1.41` or `v1.41`, return `v1.41`.
 */
export function normalizeApiVersion(version: string): string {
  const trimmed = version.trim();
  if (!/^v?\d+\.\d+$/.test(trimmed)) {
    throw new ConfigurationError(`Invalid Docker API version: ${version}`, 'apiVersion', version);
  }
  return trimmed.startsWith('v') ? trimmed : `v${trimmed}`;
}

/**
 * Parse a daemon address such as `tcp://10.0.0.5:2375`, `http://127.0.0.1:8010`
 * or `unix:///var/run/docker.sock`.
 */
export function parseDaemonEndpoint(address: string, apiVersion?: string): DaemonEndpoint {
  const version = apiVersion === undefined ? undefined : normalizeApiVersion(apiVersion);

  let url: URL;
  try {
    url = new URL(address.trim());
  } catch {
    throw new ConfigurationError(`Invalid daemon address: ${address}`, 'address', address);
  }

  if (url.protocol === 'unix:') {
    const socketPath = decodeURIComponent(url.pathname);
    if (socketPath.length === 0 || socketPath === '/') {
      throw new ConfigurationError(`Missing socket path in ${address}`, 'address', address);
    }
    const endpoint: UnixEndpoint = {
      kind: 'unix',
      socketPath,
      ...(version === undefined ? {} : { apiVersion: version }),
    };
    return Object.freeze(endpoint);
  }

  if (!TCP_SCHEMES.has(url.protocol)) {
    throw new ConfigurationError(
      `Unsupported daemon address scheme ${url.protocol} in ${address}`,
      'address',
      address,
    );
  }
  if (url.hostname.length === 0) {
    throw new ConfigurationError(`Missing host in ${address}`, 'address', address);
  }

  const endpoint: TcpEndpoint = {
    kind: 'tcp',
    url: `${url.protocol}//${url.host}`,
    ...(version === undefined ? {} : { apiVersion: version }),
  };
  return Object.freeze(endpoint);
}

/**
 * Human-readable address, for logs and diagnostics.
 */
export function formatEndpoint(endpoint: DaemonEndpoint): string {
  return endpoint.kind === 'unix' ? `unix://${endpoint.socketPath}` : endpoint.url;
}
