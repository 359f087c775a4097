/**
 * Container routes. `stop` and `restart` take the grace period as `wait`;
 * `remove` is reachable both as `POST …/remove` and as `DELETE`.
 */

import { Router, type Request } from 'express';
import { z } from 'zod';
import { FILTER_KINDS } from '../../docker/filters';
import { DEFAULT_ATTACH_OPTIONS, type ContainerConfig } from '../../docker/options/container';
import {
  BaseLogsQuery,
  booleanParam,
  filtersParam,
  integerParam,
  nonNegativeIntegerParam,
  parseBody,
  parseQuery,
} from '../params';
import type { RouteFactory } from './route';

const isContainerConfig = (value: unknown): value is ContainerConfig =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  'Image' in value &&
  typeof value.Image === 'string' &&
  value.Image.length > 0;

const ContainerConfigBody = z.custom<ContainerConfig>(isContainerConfig, {
  message: 'Body must be a container configuration with a non-empty Image',
});

const ListQuery = z.object({
  all: booleanParam.optional(),
  limit: integerParam.optional(),
  size: booleanParam.optional(),
  filters: filtersParam(FILTER_KINDS.containers).optional(),
});

const CreateQuery = z.object({
  name: z.string().min(1).optional(),
  platform: z.string().optional(),
});

const PruneQuery = z.object({
  filters: filtersParam(FILTER_KINDS.prune).optional(),
});

const TopQuery = z.object({ ps_args: z.string().optional() });

const LogsQuery = BaseLogsQuery.extend({ until: integerParam.optional() });

const StatsQuery = z.object({
  stream: booleanParam.optional(),
  'one-shot': booleanParam.optional(),
});

const StopQuery = z.object({ wait: nonNegativeIntegerParam.optional() });

const KillQuery = z.object({ signal: z.string().min(1).optional() });

const RenameQuery = z.object({ name: z.string().min(1) });

const AttachQuery = z.object({
  detachKeys: z.string().optional(),
  logs: booleanParam.optional(),
  stream: booleanParam.optional(),
  stdin: booleanParam.optional(),
  stdout: booleanParam.optional(),
  stderr: booleanParam.optional(),
});

const WaitQuery = z.object({
  condition: z.enum(['not-running', 'next-exit', 'removed']).optional(),
});

const RemoveQuery = z.object({
  v: booleanParam.optional(),
  force: booleanParam.optional(),
  link: booleanParam.optional(),
});

const ResizeQuery = z.object({
  h: nonNegativeIntegerParam,
  w: nonNegativeIntegerParam,
});

const ArchiveQuery = z.object({
  path: z.string().min(1),
  noOverwriteDirNonDir: booleanParam.optional(),
  copyUIDGID: booleanParam.optional(),
});

function removeOptions(req: Request) {
  const query = parseQuery(RemoveQuery, req);
  return { volumes: query.v, force: query.force, link: query.link };
}

export function containerRoutes(route: RouteFactory): Router {
  const router = Router({ mergeParams: true });

  router.get(
    '/containers',
    route((docker, req) => docker.containers().list(parseQuery(ListQuery, req))),
  );

  router.post(
    '/containers',
    route((docker, req) =>
      docker.containers().create({
        ...parseQuery(CreateQuery, req),
        config: parseBody(ContainerConfigBody, req),
      }),
    ),
  );

  router.post(
    '/containers/prune',
    route((docker, req) => docker.containers().prune(parseQuery(PruneQuery, req))),
  );

  router.get(
    '/containers/:id',
    route((docker, req) => docker.containers().get(req.params.id).inspect()),
  );

  router.get(
    '/containers/:id/top',
    route((docker, req) =>
      docker.containers().get(req.params.id).top({ psArgs: parseQuery(TopQuery, req).ps_args }),
    ),
  );

  router.get(
    '/containers/:id/logs',
    route((docker, req) => docker.containers().get(req.params.id).logs(parseQuery(LogsQuery, req))),
  );

  router.get(
    '/containers/:id/changes',
    route((docker, req) => docker.containers().get(req.params.id).changes()),
  );

  router.get(
    '/containers/:id/export',
    route((docker, req) => docker.containers().get(req.params.id).export()),
  );

  router.get(
    '/containers/:id/stats',
    route((docker, req) => {
      const query = parseQuery(StatsQuery, req);
      return docker
        .containers()
        .get(req.params.id)
        .stats({ stream: query.stream, oneShot: query['one-shot'] });
    }),
  );

  router.get(
    '/containers/:id/archive',
    route((docker, req) =>
      docker.containers().get(req.params.id).archive({ path: parseQuery(ArchiveQuery, req).path }),
    ),
  );

  router.put(
    '/containers/:id/archive',
    route((docker, req) =>
      docker.containers().get(req.params.id).putArchive(parseQuery(ArchiveQuery, req), req),
    ),
  );

  for (const action of ['start', 'pause', 'unpause'] as const) {
    router.post(
      `/containers/:id/${action}`,
      route((docker, req) => docker.containers().get(req.params.id)[action]()),
    );
  }

  router.post(
    '/containers/:id/stop',
    route((docker, req) => docker.containers().get(req.params.id).stop(parseQuery(StopQuery, req))),
  );

  router.post(
    '/containers/:id/restart',
    route((docker, req) =>
      docker.containers().get(req.params.id).restart(parseQuery(StopQuery, req)),
    ),
  );

  router.post(
    '/containers/:id/kill',
    route((docker, req) => docker.containers().get(req.params.id).kill(parseQuery(KillQuery, req))),
  );

  router.post(
    '/containers/:id/rename',
    route((docker, req) =>
      docker.containers().get(req.params.id).rename(parseQuery(RenameQuery, req).name),
    ),
  );

  router.post(
    '/containers/:id/attach',
    route((docker, req) => {
      const query = parseQuery(AttachQuery, req);
      return docker
        .containers()
        .get(req.params.id)
        .attach({
          detachKeys: query.detachKeys,
          logs: query.logs,
          stream: query.stream ?? DEFAULT_ATTACH_OPTIONS.stream,
          stdin: query.stdin ?? DEFAULT_ATTACH_OPTIONS.stdin,
          stdout: query.stdout ?? DEFAULT_ATTACH_OPTIONS.stdout,
          stderr: query.stderr ?? DEFAULT_ATTACH_OPTIONS.stderr,
        });
    }),
  );

  router.post(
    '/containers/:id/wait',
    route((docker, req) => docker.containers().get(req.params.id).wait(parseQuery(WaitQuery, req))),
  );

  router.post(
    '/containers/:id/remove',
    route((docker, req) => docker.containers().get(req.params.id).remove(removeOptions(req))),
  );

  router.delete(
    '/containers/:id',
    route((docker, req) => docker.containers().get(req.params.id).remove(removeOptions(req))),
  );

  router.post(
    '/containers/:id/resize',
    route((docker, req) => {
      const { h, w } = parseQuery(ResizeQuery, req);
      return docker.containers().get(req.params.id).resize({ height: h, width: w });
    }),
  );

  return router;
}
