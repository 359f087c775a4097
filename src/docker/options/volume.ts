/**
 * Options for volume operations.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Volume
 */

import { encodeFilters, type Filter, type VolumeFilterKind } from '../filters';
import { encodeQuery, jsonBody, type RequestBody } from '../query';

export interface VolumeCreateOptions {
  /** Generated by the daemon when omitted */
  name?: string;
  driver?: string;
  driverOpts?: Readonly<Record<string, string>>;
  labels?: Readonly<Record<string, string>>;
}

export function serializeVolumeCreateOptions(options: VolumeCreateOptions = {}): RequestBody {
  return jsonBody({
    Name: options.name,
    Driver: options.driver,
    DriverOpts: options.driverOpts,
    Labels: options.labels,
  });
}

export interface VolumeListOptions {
  filters?: readonly Filter<VolumeFilterKind>[];
}

export function serializeVolumeListOptions(options: VolumeListOptions = {}): string | undefined {
  return encodeQuery({ filters: encodeFilters(options.filters) });
}

export interface VolumeRemoveOptions {
  force?: boolean;
}

export function serializeVolumeRemoveOptions(options: VolumeRemoveOptions = {}): string | undefined {
  return encodeQuery({ force: options.force });
}
