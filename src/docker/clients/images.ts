/**
 * Image endpoints.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Image
 */

import type { Readable } from 'node:stream';
import { registryAuthHeaders } from '../auth';
import type { DaemonEndpoint } from '../endpoint';
import { serializePruneOptions, type PruneOptions } from '../options/common';
import {
  serializeImageBuildParams,
  serializeImageExportNames,
  serializeImageListOptions,
  serializeImagePullOptions,
  serializeImagePushOptions,
  serializeImageRemoveOptions,
  serializeImageSearchOptions,
  serializeImageTagOptions,
  type ImageBuildOptions,
  type ImageBuildParams,
  type ImageListOptions,
  type ImagePullOptions,
  type ImagePushOptions,
  type ImageRemoveOptions,
  type ImageSearchOptions,
  type ImageTagOptions,
} from '../options/image';
import { tarBody, withQuery } from '../query';
import { createRequest, resourcePath, type RequestDescriptor } from '../request';
import { packDirectory } from '../tarball';

export class Images {
  constructor(readonly endpoint: DaemonEndpoint) {}

  list(options: ImageListOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'GET',
      withQuery('/images/json', serializeImageListOptions(options)),
    );
  }

  get(name: string): Image {
    return new Image(this.endpoint, name);
  }

  /**
   * Archive `options.path` and build an image from it. The only client
   * operation that touches the filesystem.
   */
  async build(options: ImageBuildOptions): Promise<RequestDescriptor> {
    const { path, ...params } = options;
    const archive = await packDirectory(path);
    return this.buildFromArchive(archive, params);
  }

  /** Build from a tar archive of the context that is already at hand */
  buildFromArchive(
    archive: Uint8Array | Readable,
    params: ImageBuildParams = {},
  ): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', withQuery('/build', serializeImageBuildParams(params)), {
      body: tarBody(archive),
    });
  }

  search(term: string, options: ImageSearchOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'GET',
      withQuery('/images/search', serializeImageSearchOptions(term, options)),
    );
  }

  pull(options: ImagePullOptions): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'POST',
      withQuery('/images/create', serializeImagePullOptions(options)),
      { headers: registryAuthHeaders(options.auth) },
    );
  }

  /** Export several images into one tarball */
  export(names: readonly string[]): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery('/images/get', serializeImageExportNames(names)));
  }

  /** Load images from a tarball produced by `export` */
  import(tarball: Uint8Array | Readable): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', '/images/load', { body: tarBody(tarball) });
  }

  prune(options: PruneOptions = {}): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', withQuery('/images/prune', serializePruneOptions(options)));
  }
}

export class Image {
  constructor(
    readonly endpoint: DaemonEndpoint,
    readonly name: string,
  ) {}

  private path(suffix = ''): string {
    return resourcePath`/images/${this.name}` + suffix;
  }

  inspect(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', this.path('/json'));
  }

  history(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', this.path('/history'));
  }

  delete(options: ImageRemoveOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'DELETE',
      withQuery(this.path(), serializeImageRemoveOptions(options)),
    );
  }

  export(): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', this.path('/get'));
  }

  tag(options: ImageTagOptions): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'POST',
      withQuery(this.path('/tag'), serializeImageTagOptions(options)),
    );
  }

  push(options: ImagePushOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'POST',
      withQuery(this.path('/push'), serializeImagePushOptions(options)),
      { headers: registryAuthHeaders(options.auth) },
    );
  }
}
