/**
 * Container endpoints.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Container
 */

import type { Readable } from 'node:stream';
import type { DaemonEndpoint } from '../endpoint';
import {
  serializeLogsOptions,
  serializePruneOptions,
  type LogsOptions,
  type PruneOptions,
} from '../options/common';
import {
  DEFAULT_ATTACH_OPTIONS,
  serializeArchiveOptions,
  serializeAttachOptions,
  serializeContainerCreateBody,
  serializeContainerCreateQuery,
  serializeContainerListOptions,
  serializeKillOptions,
  serializeRemoveContainerOptions,
  serializeRenameOptions,
  serializeResizeOptions,
  serializeStatsOptions,
  serializeStopOptions,
  serializeTopOptions,
  serializeWaitOptions,
  type ArchiveOptions,
  type AttachOptions,
  type ContainerCreateOptions,
  type ContainerListOptions,
  type KillOptions,
  type PutArchiveOptions,
  type RemoveContainerOptions,
  type ResizeOptions,
  type StatsOptions,
  type StopOptions,
  type TopOptions,
  type WaitOptions,
} from '../options/container';
import { tarBody, withQuery } from '../query';
import { createRequest, resourcePath, type RequestDescriptor } from '../request';

export class Containers {
  constructor(readonly endpoint: DaemonEndpoint) {}

  list(options: ContainerListOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'GET',
      withQuery('/containers/json', serializeContainerListOptions(options)),
    );
  }

  get(id: string): Container {
    return new Container(this.endpoint, id);
  }

  create(options: ContainerCreateOptions): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'POST',
      withQuery('/containers/create', serializeContainerCreateQuery(options)),
      { body: serializeContainerCreateBody(options) },
    );
  }

  prune(options: PruneOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'POST',
      withQuery('/containers/prune', serializePruneOptions(options)),
    );
  }
}

/**
 * Handle on one container. Holds no state beyond its address.
 */
export class Container {
  constructor(
    readonly endpoint: DaemonEndpoint,
    readonly id: string,
  ) {}

  private path(suffix = ''): string {
    return resourcePath`/containers/${this.id}` + suffix;
  }

  private read(suffix: string, query?: string): RequestDescriptor {
    return createRequest(this.endpoint, 'GET', withQuery(this.path(suffix), query));
  }

  private action(suffix: string, query?: string): RequestDescriptor {
    return createRequest(this.endpoint, 'POST', withQuery(this.path(suffix), query));
  }

  inspect(): RequestDescriptor {
    return this.read('/json');
  }

  top(options: TopOptions = {}): RequestDescriptor {
    return this.read('/top', serializeTopOptions(options));
  }

  logs(options: LogsOptions = {}): RequestDescriptor {
    return this.read('/logs', serializeLogsOptions(options));
  }

  changes(): RequestDescriptor {
    return this.read('/changes');
  }

  export(): RequestDescriptor {
    return this.read('/export');
  }

  stats(options: StatsOptions = {}): RequestDescriptor {
    return this.read('/stats', serializeStatsOptions(options));
  }

  start(): RequestDescriptor {
    return this.action('/start');
  }

  stop(options: StopOptions = {}): RequestDescriptor {
    return this.action('/stop', serializeStopOptions(options));
  }

  restart(options: StopOptions = {}): RequestDescriptor {
    return this.action('/restart', serializeStopOptions(options));
  }

  kill(options: KillOptions = {}): RequestDescriptor {
    return this.action('/kill', serializeKillOptions(options));
  }

  rename(name: string): RequestDescriptor {
    return this.action('/rename', serializeRenameOptions(name));
  }

  pause(): RequestDescriptor {
    return this.action('/pause');
  }

  unpause(): RequestDescriptor {
    return this.action('/unpause');
  }

  attach(options: AttachOptions = DEFAULT_ATTACH_OPTIONS): RequestDescriptor {
    return this.action('/attach', serializeAttachOptions(options));
  }

  wait(options: WaitOptions = {}): RequestDescriptor {
    return this.action('/wait', serializeWaitOptions(options));
  }

  remove(options: RemoveContainerOptions = {}): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'DELETE',
      withQuery(this.path(), serializeRemoveContainerOptions(options)),
    );
  }

  /** Remove without options */
  delete(): RequestDescriptor {
    return this.remove();
  }

  resize(options: ResizeOptions): RequestDescriptor {
    return this.action('/resize', serializeResizeOptions(options));
  }

  /** Download `path` from the container as a tar archive */
  archive(options: ArchiveOptions): RequestDescriptor {
    return this.read('/archive', serializeArchiveOptions({ path: options.path }));
  }

  /** Extract a tar archive into `path` inside the container */
  putArchive(
    options: PutArchiveOptions,
    archive: Uint8Array | Readable,
  ): RequestDescriptor {
    return createRequest(
      this.endpoint,
      'PUT',
      withQuery(this.path('/archive'), serializeArchiveOptions(options)),
      { body: tarBody(archive) },
    );
  }
}
