import { Router } from 'express';
import { z } from 'zod';
import { FILTER_KINDS } from '../../docker/filters';
import type { ServiceSpec } from '../../docker/options/service';
import {
  BaseLogsQuery,
  booleanParam,
  filtersParam,
  nonNegativeIntegerParam,
  parseBody,
  parseQuery,
  registryAuthOf,
} from '../params';
import type { RouteFactory } from './route';

const isSpecObject = (value: unknown): value is ServiceSpec =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** The daemon validates the service spec itself */
const SpecBody = z.custom<ServiceSpec>(isSpecObject, { message: 'Body must be a service spec object' });

const ListQuery = z.object({
  filters: filtersParam(FILTER_KINDS.services).optional(),
  status: booleanParam.optional(),
});

const UpdateQuery = z.object({
  version: nonNegativeIntegerParam,
  registryAuthFrom: z.enum(['spec', 'previous-spec']).optional(),
  rollback: z.literal('previous').optional(),
});

const LogsQuery = BaseLogsQuery.extend({ details: booleanParam.optional() });

export function serviceRoutes(route: RouteFactory): Router {
  const router = Router({ mergeParams: true });

  router.get('/services', route((docker, req) => docker.services().list(parseQuery(ListQuery, req))));

  router.post(
    '/services',
    route((docker, req) =>
      docker.services().create({ spec: parseBody(SpecBody, req), auth: registryAuthOf(req) }),
    ),
  );

  router.get('/services/:id', route((docker, req) => docker.services().get(req.params.id).inspect()));

  router.delete('/services/:id', route((docker, req) => docker.services().get(req.params.id).delete()));

  router.post(
    '/services/:id/update',
    route((docker, req) =>
      docker
        .services()
        .get(req.params.id)
        .update({
          ...parseQuery(UpdateQuery, req),
          spec: parseBody(SpecBody, req),
          auth: registryAuthOf(req),
        }),
    ),
  );

  router.get(
    '/services/:id/logs',
    route((docker, req) => docker.services().get(req.params.id).logs(parseQuery(LogsQuery, req))),
  );

  return router;
}
