/**
 * Query-string encoding shared by every option serializer.
 */

import type { Readable } from 'node:stream';

/** A value that can appear in a query string. Arrays become repeated keys. */
export type QueryValue = string | number | boolean | readonly string[] | undefined;

export type QueryParams = Readonly<Record<string, QueryValue>>;

/**
 * Encode parameters with form-urlencoding (UTF-8, spaces as `+`).
 * Undefined values are left out entirely; returns undefined when nothing is left.
 */
export function encodeQuery(params: QueryParams): string | undefined {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;

    if (typeof value === 'string') {
      search.append(key, value);
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      search.append(key, String(value));
    } else {
      for (const item of value) {
        search.append(key, item);
      }
    }
  }

  const query = search.toString();
  return query.length > 0 ? query : undefined;
}

/**
 * Append a serialized query to a path, the way the daemon expects `path?query`.
 */
export function withQuery(path: string, query: string | undefined): string {
  return query === undefined ? path : `${path}?${query}`;
}

/**
 * JSON-encode a map-valued query parameter (`buildargs`, `labels`).
 * Empty or missing maps are treated as unset.
 */
export function jsonParam(value: Readonly<Record<string, string>> | undefined): string | undefined {
  if (value === undefined || Object.keys(value).length === 0) {
    return undefined;
  }
  return JSON.stringify(value);
}

/** Body of an outbound request together with its declared media type. */
export interface RequestBody {
  readonly content: string | Uint8Array | Readable;
  readonly contentType: string;
}

export const JSON_CONTENT_TYPE = 'application/json';
export const TAR_CONTENT_TYPE = 'application/tar';

/**
 * Encode a structured body as JSON. Undefined fields are dropped by JSON.stringify.
 */
export function jsonBody(value: unknown): RequestBody {
  return { content: JSON.stringify(value), contentType: JSON_CONTENT_TYPE };
}

export function tarBody(content: Uint8Array | Readable): RequestBody {
  return { content, contentType: TAR_CONTENT_TYPE };
}
