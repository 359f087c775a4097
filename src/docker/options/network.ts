/**
 * Options for network operations.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#tag/Network
 */

import { encodeFilters, type Filter, type NetworkFilterKind } from '../filters';
import { encodeQuery, jsonBody, type RequestBody } from '../query';

export interface NetworkListOptions {
  filters?: readonly Filter<NetworkFilterKind>[];
}

export function serializeNetworkListOptions(options: NetworkListOptions = {}): string | undefined {
  return encodeQuery({ filters: encodeFilters(options.filters) });
}

export interface IpamConfig {
  Subnet?: string;
  IPRange?: string;
  Gateway?: string;
  AuxiliaryAddresses?: Record<string, string>;
}

export interface Ipam {
  Driver?: string;
  Config?: IpamConfig[];
  Options?: Record<string, string>;
}

export interface NetworkCreateOptions {
  name: string;
  checkDuplicate?: boolean;
  driver?: string;
  internal?: boolean;
  attachable?: boolean;
  ingress?: boolean;
  ipam?: Ipam;
  enableIPv6?: boolean;
  options?: Readonly<Record<string, string>>;
  labels?: Readonly<Record<string, string>>;
}

export function serializeNetworkCreateOptions(options: NetworkCreateOptions): RequestBody {
  return jsonBody({
    Name: options.name,
    CheckDuplicate: options.checkDuplicate,
    Driver: options.driver,
    Internal: options.internal,
    Attachable: options.attachable,
    Ingress: options.ingress,
    IPAM: options.ipam,
    EnableIPv6: options.enableIPv6,
    Options: options.options,
    Labels: options.labels,
  });
}

export interface EndpointSettings {
  Aliases?: string[];
  Links?: string[];
  IPAMConfig?: { IPv4Address?: string; IPv6Address?: string; LinkLocalIPs?: string[] };
  DriverOpts?: Record<string, string>;
  [key: string]: unknown;
}

export interface NetworkConnectOptions {
  container: string;
  endpointConfig?: EndpointSettings;
}

export function serializeNetworkConnectOptions(options: NetworkConnectOptions): RequestBody {
  return jsonBody({ Container: options.container, EndpointConfig: options.endpointConfig });
}

export interface NetworkDisconnectOptions {
  container: string;
  force?: boolean;
}

export function serializeNetworkDisconnectOptions(options: NetworkDisconnectOptions): RequestBody {
  return jsonBody({ Container: options.container, Force: options.force });
}
