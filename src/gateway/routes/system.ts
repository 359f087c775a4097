import { Router } from 'express';
import { z } from 'zod';
import { FILTER_KINDS } from '../../docker/filters';
import { filtersParam, parseQuery } from '../params';
import type { RouteFactory } from './route';

const EventsQuery = z.object({
  since: z.string().optional(),
  until: z.string().optional(),
  filters: filtersParam(FILTER_KINDS.events).optional(),
});

export function systemRoutes(route: RouteFactory): Router {
  const router = Router({ mergeParams: true });

  router.get('/info', route((docker) => docker.info()));
  router.get('/ping', route((docker) => docker.ping()));
  router.get('/version', route((docker) => docker.version()));
  router.get('/system/df', route((docker) => docker.dataUsage()));
  router.get('/events', route((docker, req) => docker.events(parseQuery(EventsQuery, req))));

  return router;
}
