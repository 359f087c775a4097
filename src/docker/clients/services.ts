/**
 * Swarm service endpoints.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Service
 */

import { registryAuthHeaders } from '../auth';
import type { DaemonEndpoint } from '../endpoint';
import { serializeLogsOptions, type LogsOptions } from '../options/common';
import {
  serializeServiceListOptions,
  serializeServiceSpec,
  serializeServiceUpdateQuery,
  type ServiceCreateOptions,
  type ServiceListOptions,
  type ServiceUpdateOptions,
} from '../options/service';
import { withQuery } from '../query';
import { createRequest, resourcePath, type RequestDescriptor } from '../request';

export class Services {
  constructor(readonly endpoint: DaemonEndpoint) {}

  list(options: ServiceListOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery('/services', serializeServiceListOptions(options)));
  }

  get(id: string): Service {
    return new Service(this.endpoint, id);
  }

  create(options: ServiceCreateOptions): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', '/services/create', {
      body: serializeServiceSpec(options),
      headers: registryAuthHeaders(options.auth),
    });
  }
}

export class Service {
  constructor(
    readonly endpoint: DaemonEndpoint,
    readonly id: string,
  ) {}

  private path(suffix = ''): string {
    return resourcePath`/services/${this.id}` + suffix;
  }

  inspect(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', this.path());
  }

  delete(): RequestDescriptor {
    return createRequest(this.endpoint, 'DELETE', this.path());
  }

  update(options: ServiceUpdateOptions): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'POST',
      withQuery(this.path('/update'), serializeServiceUpdateQuery(options)),
      { body: serializeServiceSpec(options), headers: registryAuthHeaders(options.auth) },
    );
  }

  /** Logs of every task of the service */
  logs(options: LogsOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery(this.path('/logs'), serializeLogsOptions(options)));
  }
}
