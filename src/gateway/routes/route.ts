import type { Request, RequestHandler } from 'express';
import { Docker } from '../../docker/clients/docker';
import type { RequestDescriptor } from '../../docker/request';
import type { Logger } from '../../lib/logger';
import type { Forwarder } from '../forwarder';
import { asyncHandler, loggerFor } from '../middleware';
import type { TenantResolver } from '../resolver';

/** Turns an inbound request into the daemon request it maps to */
export type DescriptorBuilder = (
  docker: Docker,
  req: Request,
) => RequestDescriptor | Promise<RequestDescriptor>;

export type RouteFactory = (build: DescriptorBuilder) => RequestHandler;

export interface RouteDependencies {
  resolver: TenantResolver;
  forwarder: Forwarder;
  logger: Logger;
}

/**
 * Each handler resolves the `:tenant` segment, builds the descriptor against
 * the resolved endpoint and forwards it. Nothing is sent when resolution or
 * parameter parsing fails.
 */
export function createRouteFactory(deps: RouteDependencies): RouteFactory {
  return (build) =>
    asyncHandler(async (req, res) => {
      const tenantId = req.params.tenant;
      const logger = loggerFor(req, deps.logger).child({ tenant: tenantId });

      const { endpoint } = await deps.resolver.resolve(tenantId);
      const descriptor = await build(new Docker(endpoint), req);
      await deps.forwarder.forward(descriptor, req, res, { tenantId, logger });
    });
}
