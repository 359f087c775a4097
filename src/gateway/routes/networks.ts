import { Router } from 'express';
import { z } from 'zod';
import { FILTER_KINDS } from '../../docker/filters';
import type { EndpointSettings } from '../../docker/options/network';
import { filtersParam, parseBody, parseQuery } from '../params';
import type { RouteFactory } from './route';

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const IpamBody = z.object({
  Driver: z.string().optional(),
  Config: z
    .array(
      z.object({
        Subnet: z.string().optional(),
        IPRange: z.string().optional(),
        Gateway: z.string().optional(),
        AuxiliaryAddresses: z.record(z.string()).optional(),
      }),
    )
    .optional(),
  Options: z.record(z.string()).optional(),
});

const EndpointConfigBody = z.custom<EndpointSettings>(isObject, {
  message: 'EndpointConfig must be an object',
});

const CreateBody = z.object({
  Name: z.string().min(1),
  CheckDuplicate: z.boolean().optional(),
  Driver: z.string().optional(),
  Internal: z.boolean().optional(),
  Attachable: z.boolean().optional(),
  Ingress: z.boolean().optional(),
  IPAM: IpamBody.optional(),
  EnableIPv6: z.boolean().optional(),
  Options: z.record(z.string()).optional(),
  Labels: z.record(z.string()).optional(),
});

const ConnectBody = z.object({
  Container: z.string().min(1),
  EndpointConfig: EndpointConfigBody.optional(),
});

const DisconnectBody = z.object({
  Container: z.string().min(1),
  Force: z.boolean().optional(),
});

const ListQuery = z.object({
  filters: filtersParam(FILTER_KINDS.networks).optional(),
});

const PruneQuery = z.object({
  filters: filtersParam(FILTER_KINDS.prune).optional(),
});

export function networkRoutes(route: RouteFactory): Router {
  const router = Router({ mergeParams: true });

  router.get('/networks', route((docker, req) => docker.networks().list(parseQuery(ListQuery, req))));

  router.post(
    '/networks',
    route((docker, req) => {
      const body = parseBody(CreateBody, req);
      return docker.networks().create({
        name: body.Name,
        checkDuplicate: body.CheckDuplicate,
        driver: body.Driver,
        internal: body.Internal,
        attachable: body.Attachable,
        ingress: body.Ingress,
        ipam: body.IPAM,
        enableIPv6: body.EnableIPv6,
        options: body.Options,
        labels: body.Labels,
      });
    }),
  );

  router.post(
    '/networks/prune',
    route((docker, req) => docker.networks().prune(parseQuery(PruneQuery, req))),
  );

  router.get('/networks/:id', route((docker, req) => docker.networks().get(req.params.id).inspect()));

  router.delete('/networks/:id', route((docker, req) => docker.networks().get(req.params.id).delete()));

  router.post(
    '/networks/:id/connect',
    route((docker, req) => {
      const body = parseBody(ConnectBody, req);
      return docker
        .networks()
        .get(req.params.id)
        .connect({ container: body.Container, endpointConfig: body.EndpointConfig });
    }),
  );

  router.post(
    '/networks/:id/disconnect',
    route((docker, req) => {
      const body = parseBody(DisconnectBody, req);
      return docker
        .networks()
        .get(req.params.id)
        .disconnect({ container: body.Container, force: body.Force });
    }),
  );

  return router;
}
