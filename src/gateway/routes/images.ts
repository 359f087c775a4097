/**
 * Image routes. Builds and loads stream the inbound tar body to the daemon;
 * pulls and pushes pass the caller's `X-Registry-Auth` on.
 */

import { Router } from 'express';
import { z } from 'zod';
import { FILTER_KINDS } from '../../docker/filters';
import {
  booleanParam,
  filtersParam,
  integerParam,
  jsonQueryParam,
  nonNegativeIntegerParam,
  parseQuery,
  registryAuthOf,
  stringListParam,
} from '../params';
import type { RouteFactory } from './route';

const ListQuery = z.object({
  all: booleanParam.optional(),
  digests: booleanParam.optional(),
  filter: z.string().optional(),
  filters: filtersParam(FILTER_KINDS.images).optional(),
});

const stringMap = z.record(z.string());

const BuildQuery = z.object({
  dockerfile: z.string().optional(),
  t: z.string().optional(),
  extrahosts: z.string().optional(),
  remote: z.string().optional(),
  q: booleanParam.optional(),
  nocache: booleanParam.optional(),
  cachefrom: jsonQueryParam(z.array(z.string())).optional(),
  pull: booleanParam.optional(),
  rm: booleanParam.optional(),
  forcerm: booleanParam.optional(),
  memory: nonNegativeIntegerParam.optional(),
  memswap: integerParam.optional(),
  cpushares: nonNegativeIntegerParam.optional(),
  cpusetcpus: z.string().optional(),
  cpuperiod: nonNegativeIntegerParam.optional(),
  cpuquota: nonNegativeIntegerParam.optional(),
  buildargs: jsonQueryParam(stringMap).optional(),
  shmsize: nonNegativeIntegerParam.optional(),
  squash: booleanParam.optional(),
  labels: jsonQueryParam(stringMap).optional(),
  networkmode: z.string().optional(),
  platform: z.string().optional(),
  target: z.string().optional(),
});

const SearchQuery = z.object({
  term: z.string().min(1),
  limit: nonNegativeIntegerParam.optional(),
  filters: filtersParam(FILTER_KINDS.imageSearch).optional(),
});

const PullQuery = z.object({
  fromImage: z.string().optional(),
  fromSrc: z.string().optional(),
  repo: z.string().optional(),
  tag: z.string().optional(),
  platform: z.string().optional(),
});

const ExportQuery = z.object({ names: stringListParam });

const PruneQuery = z.object({
  filters: filtersParam(FILTER_KINDS.prune).optional(),
});

const TagQuery = z.object({
  repo: z.string().min(1).optional(),
  tag: z.string().min(1).optional(),
});

const PushQuery = z.object({ tag: z.string().min(1).optional() });

const RemoveQuery = z.object({
  force: booleanParam.optional(),
  noprune: booleanParam.optional(),
});

export function imageRoutes(route: RouteFactory): Router {
  const router = Router({ mergeParams: true });

  router.get(
    '/images',
    route((docker, req) => {
      const { filter, ...query } = parseQuery(ListQuery, req);
      return docker.images().list({ ...query, filterName: filter });
    }),
  );

  router.post(
    '/images/build',
    route((docker, req) => {
      const query = parseQuery(BuildQuery, req);
      return docker.images().buildFromArchive(req, {
        dockerfile: query.dockerfile,
        tag: query.t,
        extraHosts: query.extrahosts,
        remote: query.remote,
        quiet: query.q,
        nocache: query.nocache,
        cachefrom: query.cachefrom,
        pull: query.pull,
        rm: query.rm,
        forcerm: query.forcerm,
        memory: query.memory,
        memswap: query.memswap,
        cpushares: query.cpushares,
        cpusetcpus: query.cpusetcpus,
        cpuperiod: query.cpuperiod,
        cpuquota: query.cpuquota,
        buildargs: query.buildargs,
        shmsize: query.shmsize,
        squash: query.squash,
        labels: query.labels,
        networkMode: query.networkmode,
        platform: query.platform,
        target: query.target,
      });
    }),
  );

  router.get(
    '/images/search',
    route((docker, req) => {
      const { term, ...options } = parseQuery(SearchQuery, req);
      return docker.images().search(term, options);
    }),
  );

  router.post(
    '/images/create',
    route((docker, req) => {
      const query = parseQuery(PullQuery, req);
      return docker.images().pull({
        image: query.fromImage,
        src: query.fromSrc,
        repo: query.repo,
        tag: query.tag,
        platform: query.platform,
        auth: registryAuthOf(req),
      });
    }),
  );

  router.get(
    '/images/get',
    route((docker, req) => docker.images().export(parseQuery(ExportQuery, req).names)),
  );

  router.post('/images/load', route((docker, req) => docker.images().import(req)));

  router.post(
    '/images/prune',
    route((docker, req) => docker.images().prune(parseQuery(PruneQuery, req))),
  );

  router.get('/images/:name', route((docker, req) => docker.images().get(req.params.name).inspect()));

  router.get(
    '/images/:name/history',
    route((docker, req) => docker.images().get(req.params.name).history()),
  );

  router.get(
    '/images/:name/get',
    route((docker, req) => docker.images().get(req.params.name).export()),
  );

  router.post(
    '/images/:name/tag',
    route((docker, req) => docker.images().get(req.params.name).tag(parseQuery(TagQuery, req))),
  );

  router.post(
    '/images/:name/push',
    route((docker, req) =>
      docker
        .images()
        .get(req.params.name)
        .push({ tag: parseQuery(PushQuery, req).tag, auth: registryAuthOf(req) }),
    ),
  );

  router.delete(
    '/images/:name',
    route((docker, req) => docker.images().get(req.params.name).delete(parseQuery(RemoveQuery, req))),
  );

  return router;
}
