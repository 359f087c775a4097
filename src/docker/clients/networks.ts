/**
 * Network endpoints.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Network
 */

import type { DaemonEndpoint } from '../endpoint';
import { serializePruneOptions, type PruneOptions } from '../options/common';
import {
  serializeNetworkConnectOptions,
  serializeNetworkCreateOptions,
  serializeNetworkDisconnectOptions,
  serializeNetworkListOptions,
  type NetworkConnectOptions,
  type NetworkCreateOptions,
  type NetworkDisconnectOptions,
  type NetworkListOptions,
} from '../options/network';
import { withQuery } from '../query';
import { createRequest, resourcePath, type RequestDescriptor } from '../request';

export class Networks {
  constructor(readonly endpoint: DaemonEndpoint) {}

  list(options: NetworkListOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery('/networks', serializeNetworkListOptions(options)));
  }

  get(id: string): Network {
    return new Network(this.endpoint, id);
  }

  create(options: NetworkCreateOptions): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', '/networks/create', {
      body: serializeNetworkCreateOptions(options),
    });
  }

  prune(options: PruneOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', withQuery('/networks/prune', serializePruneOptions(options)));
  }
}

export class Network {
  constructor(
    readonly endpoint: DaemonEndpoint,
    readonly id: string,
  ) {}

  private path(suffix = ''): string {
    return resourcePath`/networks/${this.id}` + suffix;
  }

  inspect(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', this.path());
  }

  delete(): RequestDescriptor {
    return createRequest(this.endpoint, 'DELETE', this.path());
  }

  connect(options: NetworkConnectOptions): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', this.path('/connect'), {
      body: serializeNetworkConnectOptions(options),
    });
  }

  disconnect(options: NetworkDisconnectOptions): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', this.path('/disconnect'), {
      body: serializeNetworkDisconnectOptions(options),
    });
  }
}
