/**
 * Request factory: turns a method, path, body and headers into a
 * transport-ready request descriptor bound to one daemon endpoint.
 */

import { RequestBuildError } from '../errors';
import { UNIX_BASE_URL, type DaemonEndpoint } from './endpoint';
import type { RequestBody } from './query';
import { REGISTRY_AUTH_HEADER } from './auth';

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HeaderList = ReadonlyArray<readonly [name: string, value: string]>;

export type HeaderInput = Readonly<Record<string, string>> | HeaderList;

/**
 * A fully assembled, not yet sent request. Frozen on construction.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Absolute URL, endpoint base + path + optional query */
  readonly url: string;
  readonly endpoint: DaemonEndpoint;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: RequestBody;
}

export interface RequestInit {
  body?: RequestBody;
  headers?: HeaderInput;
}

const METHODS: ReadonlySet<string> = new Set(HTTP_METHODS);

export const isHttpMethod = (value: string): value is HttpMethod => METHODS.has(value);

const isHeaderList = (input: HeaderInput): input is HeaderList => Array.isArray(input);

function headerEntries(input: HeaderInput): HeaderList {
  return isHeaderList(input) ? input : Object.entries(input);
}

/**
 * Copy headers verbatim; on names differing only in case the last one wins.
 */
function mergeHeaders(target: Map<string, [string, string]>, input: HeaderInput): void {
  for (const [name, value] of headerEntries(input)) {
    target.set(name.toLowerCase(), [name, value]);
  }
}

function baseUrl(endpoint: DaemonEndpoint): string {
  return endpoint.kind === 'unix' ? UNIX_BASE_URL : endpoint.url;
}

/**
 * Join `path` (absolute, may carry a query) onto the endpoint base.
 */
export function resolveUrl(endpoint: DaemonEndpoint, path: string): string {
  if (!path.startsWith('/')) {
    throw new RequestBuildError(`Request path must be absolute: ${path}`, path);
  }
  const versioned = endpoint.apiVersion ? `/${endpoint.apiVersion}${path}` : path;

  try {
    return new URL(versioned, baseUrl(endpoint)).href;
  } catch (error) {
    throw new RequestBuildError(
      `Cannot join ${versioned} onto ${baseUrl(endpoint)}`,
      path,
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Assemble a request descriptor. The method is passed through exactly as
 * given and `Content-Type` is only set when a body is present.
 */
export function createRequest(
  endpoint: DaemonEndpoint,
  method: HttpMethod,
  path: string,
  init: RequestInit = {},
): RequestDescriptor {
  if (!isHttpMethod(method)) {
    throw new RequestBuildError(`Unsupported HTTP method: ${String(method)}`, path);
  }

  const url = resolveUrl(endpoint, path);

  const merged = new Map<string, [string, string]>();
  if (init.headers) {
    mergeHeaders(merged, init.headers);
  }
  if (init.body) {
    mergeHeaders(merged, [['Content-Type', init.body.contentType]]);
  }
  const headers = Object.freeze(Object.fromEntries(merged.values()));

  const descriptor: RequestDescriptor = {
    method,
    url,
    endpoint,
    headers,
    ...(init.body === undefined ? {} : { body: init.body }),
  };
  return Object.freeze(descriptor);
}

/**
 * Percent-encode a resource identifier for use inside a path. `/`, `:` and
 * `@` stay literal so image references like `library/nginx@sha256:…` keep
 * the shape the daemon routes on. Dot segments would be collapsed by URL
 * joining and move the request to another endpoint, so they are rejected.
 */
export function encodeIdentifier(id: string): string {
  if (id.split('/').some((segment) => segment === '.' || segment === '..')) {
    throw new RequestBuildError(`Identifier contains a dot segment: ${JSON.stringify(id)}`);
  }
  try {
    return encodeURIComponent(id).replace(/%2F/gi, '/').replace(/%3A/gi, ':').replace(/%40/g, '@');
  } catch (error) {
    throw new RequestBuildError(
      `Identifier cannot be percent-encoded: ${JSON.stringify(id)}`,
      undefined,
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Tagged template for resource paths: interpolated identifiers are encoded.
 *
 * @example resourcePath`/containers/${id}/stop`
 */
export function resourcePath(strings: TemplateStringsArray, ...ids: string[]): string {
  return strings.reduce((path, segment, index) => {
    const id = ids[index];
    return path + segment + (id === undefined ? '' : encodeIdentifier(id));
  }, '');
}

/**
 * Loggable summary of a descriptor with credentials masked.
 */
export function describeRequest(descriptor: RequestDescriptor): Record<string, unknown> {
  const headers = Object.fromEntries(
    Object.entries(descriptor.headers).map(([name, value]) => [
      name,
      name.toLowerCase() === REGISTRY_AUTH_HEADER.toLowerCase() ? '[REDACTED]' : value,
    ]),
  );
  return {
    method: descriptor.method,
    url: descriptor.url,
    headers,
    ...(descriptor.body ? { contentType: descriptor.body.contentType } : {}),
  };
}
