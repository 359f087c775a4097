/**
 * Gateway bootstrap: builds the directory, transport and HTTP app from an
 * `AppConfig` and starts listening.
 */

import { once } from 'node:events';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { basename, join } from 'node:path';
import type { AppConfig } from '../config/app-config';
import { parseDaemonEndpoint } from '../docker/endpoint';
import { createGatewayApp } from '../gateway/app';
import {
  CachedDaemonDirectory,
  loadTenantDirectory,
  StaticDaemonDirectory,
  type DaemonDirectory,
} from '../gateway/directory';
import { UndiciTransport, type Transport } from '../gateway/transport';
import type { Logger } from '../lib/logger';

export interface RunningGateway {
  server: Server;
  transport: Transport;
  /** Address actually bound, useful when port 0 was requested */
  address: AddressInfo;
  close(): Promise<void>;
}

/**
 * Project root for a module under `src/cli`, or under `dist/src/cli` once built.
 */
export function packageRoot(moduleDir: string): string {
  const twoUp = join(moduleDir, '..', '..');
  return basename(twoUp) === 'dist' ? join(twoUp, '..') : twoUp;
}

/**
 * Tenants from the tenant file, falling back to the configured default daemon.
 */
export async function createDirectory(config: AppConfig, logger: Logger): Promise<DaemonDirectory> {
  const { apiVersion, defaultHost } = config.docker;
  const defaultEndpoint =
    defaultHost === undefined ? undefined : parseDaemonEndpoint(defaultHost, apiVersion);

  const base = config.tenants.file
    ? await loadTenantDirectory(config.tenants.file, apiVersion)
    : new StaticDaemonDirectory();
  const directory = defaultEndpoint ? base.withDefault(defaultEndpoint) : base;

  logger.info(
    { tenants: directory.size, tenantsFile: config.tenants.file, defaultDaemon: defaultHost },
    'Tenant directory loaded',
  );

  if (config.cache.ttl > 0) {
    return new CachedDaemonDirectory(
      directory,
      { ttlMs: config.cache.ttl, maxEntries: config.cache.maxSize },
      logger,
    );
  }
  return directory;
}

export async function startGateway(config: AppConfig, logger: Logger): Promise<RunningGateway> {
  const directory = await createDirectory(config, logger);
  const transport = new UndiciTransport({ timeoutMs: config.docker.requestTimeout, logger });

  const app = createGatewayApp({
    directory,
    transport,
    logger,
    basePath: config.server.basePath,
    jsonBodyLimit: config.server.jsonBodyLimit,
  });

  const server = app.listen(config.server.port, config.server.host);
  try {
    await once(server, 'listening');
  } catch (error) {
    await transport.close();
    throw error;
  }

  const bound = server.address();
  if (bound === null || typeof bound === 'string') {
    throw new Error(`Unexpected server address: ${String(bound)}`);
  }
  logger.info({ host: bound.address, port: bound.port }, 'Gateway listening');

  return {
    server,
    transport,
    address: bound,
    async close(): Promise<void> {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await transport.close();
      logger.info('Gateway stopped');
    },
  };
}
