/**
 * Options for container operations.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Container
 */

import { encodeFilters, type ContainerFilterKind, type Filter } from '../filters';
import { encodeQuery, jsonBody, type RequestBody } from '../query';

export interface ContainerListOptions {
  /** Include stopped containers */
  all?: boolean;
  limit?: number;
  /** Report `SizeRw` and `SizeRootFs` */
  size?: boolean;
  filters?: readonly Filter<ContainerFilterKind>[];
}

export function serializeContainerListOptions(
  options: ContainerListOptions = {},
): string | undefined {
  return encodeQuery({
    all: options.all,
    limit: options.limit,
    size: options.size,
    filters: encodeFilters(options.filters),
  });
}

export interface PortBinding {
  HostIp?: string;
  HostPort?: string;
}

export interface Mount {
  Target: string;
  Source?: string;
  Type: 'bind' | 'volume' | 'tmpfs' | 'npipe';
  ReadOnly?: boolean;
  [key: string]: unknown;
}

export interface RestartPolicy {
  Name: '' | 'no' | 'always' | 'unless-stopped' | 'on-failure';
  MaximumRetryCount?: number;
}

/** Subset of `HostConfig`; further fields pass through unchanged */
export interface HostConfig {
  Binds?: string[];
  Mounts?: Mount[];
  PortBindings?: Record<string, PortBinding[]>;
  PublishAllPorts?: boolean;
  NetworkMode?: string;
  RestartPolicy?: RestartPolicy;
  AutoRemove?: boolean;
  Privileged?: boolean;
  Memory?: number;
  MemorySwap?: number;
  CpuShares?: number;
  NanoCpus?: number;
  CapAdd?: string[];
  CapDrop?: string[];
  Dns?: string[];
  ExtraHosts?: string[];
  Links?: string[];
  LogConfig?: { Type: string; Config?: Record<string, string> };
  [key: string]: unknown;
}

/** Body of `POST /containers/create`; further fields pass through unchanged */
export interface ContainerConfig {
  Image: string;
  Hostname?: string;
  Domainname?: string;
  User?: string;
  AttachStdin?: boolean;
  AttachStdout?: boolean;
  AttachStderr?: boolean;
  ExposedPorts?: Record<string, Record<string, never>>;
  Tty?: boolean;
  OpenStdin?: boolean;
  StdinOnce?: boolean;
  Env?: string[];
  Cmd?: string[];
  Entrypoint?: string[];
  WorkingDir?: string;
  Labels?: Record<string, string>;
  Volumes?: Record<string, Record<string, never>>;
  StopSignal?: string;
  StopTimeout?: number;
  NetworkDisabled?: boolean;
  HostConfig?: HostConfig;
  NetworkingConfig?: { EndpointsConfig?: Record<string, unknown> };
  [key: string]: unknown;
}

export interface ContainerCreateOptions {
  /** Assign a name, sent as the `name` query parameter */
  name?: string;
  platform?: string;
  config: ContainerConfig;
}

export function serializeContainerCreateQuery(options: ContainerCreateOptions): string | undefined {
  return encodeQuery({ name: options.name, platform: options.platform });
}

export function serializeContainerCreateBody(options: ContainerCreateOptions): RequestBody {
  return jsonBody(options.config);
}

export interface TopOptions {
  /** Arguments for `ps`, e.g. `aux` */
  psArgs?: string;
}

export function serializeTopOptions(options: TopOptions = {}): string | undefined {
  return encodeQuery({ ps_args: options.psArgs });
}

export interface StatsOptions {
  /** Keep streaming samples; the daemon defaults to true */
  stream?: boolean;
  /** Return a single sample without waiting for a second cycle */
  oneShot?: boolean;
}

export function serializeStatsOptions(options: StatsOptions = {}): string | undefined {
  return encodeQuery({ stream: options.stream, 'one-shot': options.oneShot });
}

export interface StopOptions {
  /** Seconds to wait before killing the container, sent as `t` */
  wait?: number;
}

export function serializeStopOptions(options: StopOptions = {}): string | undefined {
  return encodeQuery({ t: options.wait });
}

export interface KillOptions {
  /** Signal name or number, e.g. `SIGINT` */
  signal?: string;
}

export function serializeKillOptions(options: KillOptions = {}): string | undefined {
  return encodeQuery({ signal: options.signal });
}

export function serializeRenameOptions(name: string): string | undefined {
  return encodeQuery({ name });
}

export interface AttachOptions {
  detachKeys?: string;
  logs?: boolean;
  stream?: boolean;
  stdin?: boolean;
  stdout?: boolean;
  stderr?: boolean;
}

/** Stream every standard stream, as an interactive attach does */
export const DEFAULT_ATTACH_OPTIONS: Readonly<AttachOptions> = Object.freeze({
  stream: true,
  stdin: true,
  stdout: true,
  stderr: true,
});

export function serializeAttachOptions(options: AttachOptions): string | undefined {
  return encodeQuery({
    detachKeys: options.detachKeys,
    logs: options.logs,
    stream: options.stream,
    stdin: options.stdin,
    stdout: options.stdout,
    stderr: options.stderr,
  });
}

export interface WaitOptions {
  condition?: 'not-running' | 'next-exit' | 'removed';
}

export function serializeWaitOptions(options: WaitOptions = {}): string | undefined {
  return encodeQuery({ condition: options.condition });
}

export interface RemoveContainerOptions {
  /** Remove anonymous volumes, sent as `v` */
  volumes?: boolean;
  force?: boolean;
  /** Remove the link instead of the container */
  link?: boolean;
}

export function serializeRemoveContainerOptions(
  options: RemoveContainerOptions = {},
): string | undefined {
  return encodeQuery({ v: options.volumes, force: options.force, link: options.link });
}

export interface ResizeOptions {
  height: number;
  width: number;
}

export function serializeResizeOptions(options: ResizeOptions): string | undefined {
  return encodeQuery({ h: options.height, w: options.width });
}

export interface ArchiveOptions {
  /** Path inside the container */
  path: string;
}

export interface PutArchiveOptions extends ArchiveOptions {
  noOverwriteDirNonDir?: boolean;
  copyUIDGID?: boolean;
}

export function serializeArchiveOptions(options: PutArchiveOptions): string | undefined {
  return encodeQuery({
    path: options.path,
    noOverwriteDirNonDir: options.noOverwriteDirNonDir,
    copyUIDGID: options.copyUIDGID,
  });
}
