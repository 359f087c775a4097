/**
 * Root client bound to one daemon endpoint.
 *
 * Every method returns a request descriptor; nothing here opens a connection.
 * Descriptors are sent by a transport (see `gateway/transport`).
 *
 * @example
 * const docker = new Docker(parseDaemonEndpoint('tcp://10.0.0.5:2375'));
 * docker.containers().get('web').stop({ wait: 30 });
 * // POST tcp://10.0.0.5:2375/containers/web/stop?t=30
 */

import type { DaemonEndpoint } from '../endpoint';
import { serializeEventsOptions, type EventsOptions } from '../options/system';
import { withQuery } from '../query';
import { createRequest, type RequestDescriptor } from '../request';
import { Containers } from './containers';
import { Images } from './images';
import { Networks } from './networks';
import { Services } from './services';
import { Volumes } from './volumes';

export class Docker {
  constructor(readonly endpoint: DaemonEndpoint) {}

  images(): Images {
    return new Images(this.endpoint);
  }

  containers(): Containers {
    return new Containers(this.endpoint);
  }

  volumes(): Volumes {
    return new Volumes(this.endpoint);
  }

  networks(): Networks {
    return new Networks(this.endpoint);
  }

  services(): Services {
    return new Services(this.endpoint);
  }

  version(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', '/version');
  }

  info(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', '/info');
  }

  ping(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', '/_ping');
  }

  events(options: EventsOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery('/events', serializeEventsOptions(options)));
  }

  /** Disk usage of images, containers, volumes and build cache */
  dataUsage(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', '/system/df');
  }
}
