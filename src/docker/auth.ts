/**
 * Registry credentials sent to the daemon in `X-Registry-Auth`.
 *
 * API Reference: https://docs.docker.com/engine/api/v1.41/#section/Authentication
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

export const REGISTRY_AUTH_HEADER = 'X-Registry-Auth';

export interface PasswordAuth {
  username: string;
  password: string;
  email?: string;
  serveraddress?: string;
}

export interface TokenAuth {
  identitytoken: string;
}

export type RegistryAuth = PasswordAuth | TokenAuth;

export const isTokenAuth = (auth: RegistryAuth): auth is TokenAuth => 'identitytoken' in auth;

/** Credentials for token authentication */
export function tokenAuth(identitytoken: string): TokenAuth {
  return { identitytoken };
}

/** Credentials for username/password authentication; optional fields stay unset */
export function passwordAuth(
  username: string,
  password: string,
  extra: { email?: string; serveraddress?: string } = {},
): PasswordAuth {
  return { username, password, ...extra };
}

function toWire(auth: RegistryAuth): Record<string, string> {
  if (isTokenAuth(auth)) {
    return { identitytoken: auth.identitytoken };
  }
  const wire: Record<string, string> = { username: auth.username, password: auth.password };
  if (auth.email !== undefined) wire.email = auth.email;
  if (auth.serveraddress !== undefined) wire.serveraddress = auth.serveraddress;
  return wire;
}

/**
 * Serialize credentials as JSON and encode them with the URL-safe base64
 * alphabet (padding kept), which is what the daemon decodes first.
 */
export function encodeRegistryAuth(auth: RegistryAuth): string {
  return Buffer.from(JSON.stringify(toWire(auth)), 'utf8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

const RegistryAuthSchema = z.union([
  z.object({ identitytoken: z.string().min(1) }),
  z.object({
    username: z.string(),
    password: z.string(),
    email: z.string().optional(),
    serveraddress: z.string().optional(),
  }),
]);

/**
 * Decode an `X-Registry-Auth` value received from a caller.
 * Accepts both base64 alphabets.
 */
export function decodeRegistryAuth(header: string): RegistryAuth {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(header, 'base64').toString('utf8'));
  } catch {
    throw new ValidationError(`${REGISTRY_AUTH_HEADER} is not base64-encoded JSON`, [
      { field: REGISTRY_AUTH_HEADER, message: 'invalid encoding' },
    ]);
  }

  const result = RegistryAuthSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(
      `${REGISTRY_AUTH_HEADER} does not hold registry credentials`,
      result.error.issues.map((issue) => ({
        field: `${REGISTRY_AUTH_HEADER}.${issue.path.join('.')}`,
        message: issue.message,
      })),
    );
  }
  return result.data;
}

/** Headers carrying `auth`, or none when no credentials are given */
export function registryAuthHeaders(auth: RegistryAuth | undefined): Record<string, string> {
  return auth === undefined ? {} : { [REGISTRY_AUTH_HEADER]: encodeRegistryAuth(auth) };
}
