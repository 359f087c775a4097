/**
 * HTTP application assembly.
 *
 * Tenant routes are mounted at `<basePath>/:tenant`; everything below that
 * prefix mirrors the Docker Engine API surface the gateway exposes.
 */

import cors from 'cors';
import express, { type Express } from 'express';
import type { Logger } from '../lib/logger';
import type { DaemonDirectory } from './directory';
import { Forwarder } from './forwarder';
import { errorHandler, notFound, requestLogging } from './middleware';
import { TenantResolver } from './resolver';
import { containerRoutes } from './routes/containers';
import { imageRoutes } from './routes/images';
import { networkRoutes } from './routes/networks';
import { createRouteFactory } from './routes/route';
import { serviceRoutes } from './routes/services';
import { systemRoutes } from './routes/system';
import { volumeRoutes } from './routes/volumes';
import type { Transport } from './transport';

export const CORS_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'];

export interface GatewayAppOptions {
  directory: DaemonDirectory;
  transport: Transport;
  logger: Logger;
  /** Prefix in front of `/:tenant`, e.g. `/docker`. Empty by default */
  basePath?: string;
  jsonBodyLimit?: string;
}

export function createGatewayApp(options: GatewayAppOptions): Express {
  const logger = options.logger.child({ component: 'Gateway' });
  const basePath = options.basePath ?? '';

  const route = createRouteFactory({
    resolver: new TenantResolver(options.directory, logger),
    forwarder: new Forwarder(options.transport),
    logger,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(cors({ origin: '*', methods: CORS_METHODS, credentials: false }));
  app.use(requestLogging(logger));
  app.use(express.json({ limit: options.jsonBodyLimit ?? '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  const tenant = express.Router({ mergeParams: true });
  tenant.use(
    systemRoutes(route),
    containerRoutes(route),
    imageRoutes(route),
    volumeRoutes(route),
    networkRoutes(route),
    serviceRoutes(route),
  );
  app.use(`${basePath}/:tenant`, tenant);

  app.use(notFound);
  app.use(errorHandler(logger));

  return app;
}
