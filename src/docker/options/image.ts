/**
 * Options for image operations.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Image
 */

import type { RegistryAuth } from '../auth';
import {
  encodeFilters,
  type Filter,
  type ImageFilterKind,
  type ImageSearchFilterKind,
} from '../filters';
import { encodeQuery, jsonParam } from '../query';

export interface ImageListOptions {
  /** Show all images, including intermediate layers */
  all?: boolean;
  digests?: boolean;
  /** Legacy reference filter, sent as `filter` */
  filterName?: string;
  filters?: readonly Filter<ImageFilterKind>[];
}

export function serializeImageListOptions(options: ImageListOptions = {}): string | undefined {
  return encodeQuery({
    all: options.all,
    digests: options.digests,
    filter: options.filterName,
    filters: encodeFilters(options.filters),
  });
}

export interface ImageBuildParams {
  /** Path of the Dockerfile inside the build context. Defaults to `Dockerfile` on the daemon */
  dockerfile?: string;
  /** Name and optional tag applied to the result, sent as `t` */
  tag?: string;
  extraHosts?: string;
  /** Build from a git repository or URL instead of an uploaded context */
  remote?: string;
  quiet?: boolean;
  nocache?: boolean;
  cachefrom?: readonly string[];
  pull?: boolean;
  rm?: boolean;
  forcerm?: boolean;
  memory?: number;
  memswap?: number;
  cpushares?: number;
  cpusetcpus?: string;
  cpuperiod?: number;
  cpuquota?: number;
  buildargs?: Readonly<Record<string, string>>;
  shmsize?: number;
  squash?: boolean;
  labels?: Readonly<Record<string, string>>;
  /** `bridge`, `host`, `none`, `container:<name|id>`, or a custom network name */
  networkMode?: string;
  platform?: string;
  target?: string;
}

export interface ImageBuildOptions extends ImageBuildParams {
  /** Directory holding the build context */
  path: string;
}

export function serializeImageBuildParams(params: ImageBuildParams = {}): string | undefined {
  return encodeQuery({
    dockerfile: params.dockerfile,
    t: params.tag,
    extrahosts: params.extraHosts,
    remote: params.remote,
    q: params.quiet,
    nocache: params.nocache,
    cachefrom: params.cachefrom === undefined ? undefined : JSON.stringify(params.cachefrom),
    pull: params.pull,
    rm: params.rm,
    forcerm: params.forcerm,
    memory: params.memory,
    memswap: params.memswap,
    cpushares: params.cpushares,
    cpusetcpus: params.cpusetcpus,
    cpuperiod: params.cpuperiod,
    cpuquota: params.cpuquota,
    buildargs: jsonParam(params.buildargs),
    shmsize: params.shmsize,
    squash: params.squash,
    labels: jsonParam(params.labels),
    networkmode: params.networkMode,
    platform: params.platform,
    target: params.target,
  });
}

export interface ImagePullOptions {
  /**
   * Image to pull; may include a tag or digest. Without a tag and without
   * `tag`, every tag of the repository is pulled.
   */
  image?: string;
  /** Source to import from; `-` reads the request body */
  src?: string;
  /** Repository name given to an imported image */
  repo?: string;
  tag?: string;
  platform?: string;
  auth?: RegistryAuth;
}

export function serializeImagePullOptions(options: ImagePullOptions): string | undefined {
  return encodeQuery({
    fromImage: options.image,
    fromSrc: options.src,
    repo: options.repo,
    tag: options.tag,
    platform: options.platform,
  });
}

export interface ImageTagOptions {
  repo?: string;
  tag?: string;
}

export function serializeImageTagOptions(options: ImageTagOptions): string | undefined {
  return encodeQuery({ repo: options.repo, tag: options.tag });
}

export interface ImageRemoveOptions {
  force?: boolean;
  /** Keep untagged parent images */
  noprune?: boolean;
}

export function serializeImageRemoveOptions(options: ImageRemoveOptions = {}): string | undefined {
  return encodeQuery({ force: options.force, noprune: options.noprune });
}

export interface ImagePushOptions {
  tag?: string;
  auth?: RegistryAuth;
}

export function serializeImagePushOptions(options: ImagePushOptions = {}): string | undefined {
  return encodeQuery({ tag: options.tag });
}

export interface ImageSearchOptions {
  limit?: number;
  filters?: readonly Filter<ImageSearchFilterKind>[];
}

export function serializeImageSearchOptions(
  term: string,
  options: ImageSearchOptions = {},
): string | undefined {
  return encodeQuery({
    term,
    limit: options.limit,
    filters: encodeFilters(options.filters),
  });
}

export function serializeImageExportNames(names: readonly string[]): string | undefined {
  return encodeQuery({ names });
}
