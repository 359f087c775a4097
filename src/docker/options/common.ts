/**
 * Options shared by several resource families.
 */

import { encodeFilters, type Filter, type PruneFilterKind } from '../filters';
import { encodeQuery } from '../query';

/** Filters for `POST /{containers,images,volumes,networks}/prune` */
export interface PruneOptions {
  filters?: readonly Filter<PruneFilterKind>[];
}

export function serializePruneOptions(options: PruneOptions = {}): string | undefined {
  return encodeQuery({ filters: encodeFilters(options.filters) });
}

/** Log retrieval for containers and services */
export interface LogsOptions {
  follow?: boolean;
  stdout?: boolean;
  stderr?: boolean;
  /** UNIX timestamp (seconds) */
  since?: number;
  /** UNIX timestamp (seconds); containers only */
  until?: number;
  timestamps?: boolean;
  /** Number of lines from the end, or `all` */
  tail?: number | 'all';
  /** Show extra details; services only */
  details?: boolean;
}

export function serializeLogsOptions(options: LogsOptions = {}): string | undefined {
  return encodeQuery({
    details: options.details,
    follow: options.follow,
    stdout: options.stdout,
    stderr: options.stderr,
    since: options.since,
    until: options.until,
    timestamps: options.timestamps,
    tail: options.tail,
  });
}
