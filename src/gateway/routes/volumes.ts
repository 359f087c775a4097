import { Router } from 'express';
import { z } from 'zod';
import { FILTER_KINDS } from '../../docker/filters';
import { booleanParam, filtersParam, parseBody, parseQuery } from '../params';
import type { RouteFactory } from './route';

const CreateBody = z.object({
  Name: z.string().min(1).optional(),
  Driver: z.string().min(1).optional(),
  DriverOpts: z.record(z.string()).optional(),
  Labels: z.record(z.string()).optional(),
});

const ListQuery = z.object({
  filters: filtersParam(FILTER_KINDS.volumes).optional(),
});

const PruneQuery = z.object({
  filters: filtersParam(FILTER_KINDS.prune).optional(),
});

const RemoveQuery = z.object({ force: booleanParam.optional() });

export function volumeRoutes(route: RouteFactory): Router {
  const router = Router({ mergeParams: true });

  router.get('/volumes', route((docker, req) => docker.volumes().list(parseQuery(ListQuery, req))));

  router.post(
    '/volumes',
    route((docker, req) => {
      const body = parseBody(CreateBody, req);
      return docker.volumes().create({
        name: body.Name,
        driver: body.Driver,
        driverOpts: body.DriverOpts,
        labels: body.Labels,
      });
    }),
  );

  router.post(
    '/volumes/prune',
    route((docker, req) => docker.volumes().prune(parseQuery(PruneQuery, req))),
  );

  router.get('/volumes/:name', route((docker, req) => docker.volumes().get(req.params.name).inspect()));

  router.delete(
    '/volumes/:name',
    route((docker, req) => docker.volumes().get(req.params.name).delete(parseQuery(RemoveQuery, req))),
  );

  return router;
}
