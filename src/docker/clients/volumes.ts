/**
 * Volume endpoints.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Volume
 */

import type { DaemonEndpoint } from '../endpoint';
import { serializePruneOptions, type PruneOptions } from '../options/common';
import {
  serializeVolumeCreateOptions,
  serializeVolumeListOptions,
  serializeVolumeRemoveOptions,
  type VolumeCreateOptions,
  type VolumeListOptions,
  type VolumeRemoveOptions,
} from '../options/volume';
import { withQuery } from '../query';
import { createRequest, resourcePath, type RequestDescriptor } from '../request';

export class Volumes {
  constructor(readonly endpoint: DaemonEndpoint) {}

  create(options: VolumeCreateOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', '/volumes/create', {
      body: serializeVolumeCreateOptions(options),
    });
  }

  list(options: VolumeListOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery('/volumes', serializeVolumeListOptions(options)));
  }

  get(name: string): Volume {
    return new Volume(this.endpoint, name);
  }

  prune(options: PruneOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', withQuery('/volumes/prune', serializePruneOptions(options)));
  }
}

export class Volume {
  constructor(
    readonly endpoint: DaemonEndpoint,
    readonly name: string,
  ) {}

  inspect(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', resourcePath`/volumes/${this.name}`);
  }

  delete(options: VolumeRemoveOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'DELETE',
      withQuery(resourcePath`/volumes/${this.name}`, serializeVolumeRemoveOptions(options)),
    );
  }
}
