/**
 * Parsing of inbound query strings, headers and bodies into option values.
 */

import type { Request } from 'express';
import { z } from 'zod';
import { decodeRegistryAuth, REGISTRY_AUTH_HEADER, type RegistryAuth } from '../docker/auth';
import type { Filter } from '../docker/filters';
import { ValidationError } from '../errors';

export const booleanParam = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const integerParam = z
  .string()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform(Number);

export const nonNegativeIntegerParam = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(Number);

/** A parameter that may be repeated: `?names=a&names=b` */
export const stringListParam = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

/** A query parameter holding JSON, validated against `schema` once decoded */
export function jsonQueryParam<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        const decoded: unknown = JSON.parse(raw);
        return decoded;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected JSON' });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

/** Log parameters shared by containers and services */
export const BaseLogsQuery = z.object({
  follow: booleanParam.optional(),
  stdout: booleanParam.optional(),
  stderr: booleanParam.optional(),
  since: integerParam.optional(),
  timestamps: booleanParam.optional(),
  tail: z.union([z.literal('all'), nonNegativeIntegerParam]).optional(),
});

const FilterJsonSchema = z.record(
  z.union([z.array(z.string()), z.record(z.boolean())]),
);

/**
 * The `filters` parameter as the Engine API takes it: JSON mapping each kind
 * to a list of values. The older `{ kind: { value: true } }` form is accepted too.
 */
export function filtersParam<K extends string>(kinds: readonly K[]) {
  const isKind = (kind: string): kind is K => kinds.some((known) => known === kind);

  return z.string().transform((raw, ctx): Filter<K>[] => {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'filters must be JSON' });
      return z.NEVER;
    }

    const parsed = FilterJsonSchema.safeParse(json);
    if (!parsed.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'filters must map each kind to a list of strings',
      });
      return z.NEVER;
    }

    const filters: Filter<K>[] = [];
    for (const [kind, values] of Object.entries(parsed.data)) {
      if (!isKind(kind)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported filter: ${kind}` });
        return z.NEVER;
      }
      const list = Array.isArray(values)
        ? values
        : Object.keys(values).filter((value) => values[value]);
      for (const value of list) {
        filters.push({ kind, value });
      }
    }
    return filters;
  });
}

function violations(error: z.ZodError, prefix: string): Array<{ field: string; message: string }> {
  return error.issues.map((issue) => ({
    field: [prefix, ...issue.path].join('.'),
    message: issue.message,
  }));
}

/**
 * Validate the query string of `req`.
 *
 * @throws ValidationError listing every offending parameter
 */
export function parseQuery<T extends z.ZodTypeAny>(schema: T, req: Request): z.output<T> {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    throw new ValidationError('Invalid query parameters', violations(result.error, 'query'));
  }
  return result.data;
}

/**
 * Validate the JSON body of `req`.
 *
 * @throws ValidationError listing every offending field
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, req: Request): z.output<T> {
  const result = schema.safeParse(req.body ?? {});
  if (!result.success) {
    throw new ValidationError('Invalid request body', violations(result.error, 'body'));
  }
  return result.data;
}

/** Credentials the caller sent in `X-Registry-Auth`, if any */
export function registryAuthOf(req: Request): RegistryAuth | undefined {
  const header = req.get(REGISTRY_AUTH_HEADER);
  return header === undefined || header.length === 0 ? undefined : decodeRegistryAuth(header);
}

/** JSON object whose fields are passed to the daemon unchanged */
export const passthroughObject = z.record(z.unknown());
