/**
 * Application configuration
 *
 * Environment variables validated with Zod. CLI flags are applied on top
 * through `overrides`.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

const CONSTANTS = {
  DEFAULTS: {
    HOST: '127.0.0.1',
    PORT: 8030,
    REQUEST_TIMEOUT: 60000, // 60s until the daemon answers
    CACHE_TTL: 0, // disabled
    CACHE_MAX_SIZE: 1000,
    JSON_BODY_LIMIT: '1mb',
  },
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const BasePathSchema = z
  .string()
  .default('')
  .transform((value) => value.replace(/\/+$/, ''))
  .refine((value) => value === '' || value.startsWith('/'), {
    message: 'Base path must start with /',
  });

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    host: z.string().min(1).default(CONSTANTS.DEFAULTS.HOST),
    port: z.coerce.number().int().min(0).max(65535).default(CONSTANTS.DEFAULTS.PORT),
    basePath: BasePathSchema,
    jsonBodyLimit: z.string().min(1).default(CONSTANTS.DEFAULTS.JSON_BODY_LIMIT),
  }),
  logging: z.object({
    level: LogLevelSchema,
  }),
  docker: z.object({
    /** Daemon for tenants the tenant file does not list */
    defaultHost: z.string().min(1).optional(),
    apiVersion: z.string().min(1).optional(),
    requestTimeout: z.coerce.number().int().min(0).default(CONSTANTS.DEFAULTS.REQUEST_TIMEOUT),
  }),
  tenants: z.object({
    file: z.string().min(1).optional(),
  }),
  cache: z.object({
    ttl: z.coerce.number().int().min(0).default(CONSTANTS.DEFAULTS.CACHE_TTL),
    maxSize: z.coerce.number().int().positive().default(CONSTANTS.DEFAULTS.CACHE_MAX_SIZE),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type Environment = Readonly<Record<string, string | undefined>>;

/** Values taken from the command line; they win over the environment */
export interface ConfigOverrides {
  host?: string;
  port?: string | number;
  basePath?: string;
  logLevel?: string;
  tenantsFile?: string;
  defaultDaemon?: string;
}

/** Unset and empty variables both fall back to the default */
function envValue(env: Environment, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Create configuration from environment variables and overrides, with validation
 */
export function createAppConfig(
  env: Environment = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: envValue(env, 'NODE_ENV'),
      host: overrides.host ?? envValue(env, 'HOST'),
      port: overrides.port ?? envValue(env, 'PORT'),
      basePath: overrides.basePath ?? envValue(env, 'GATEWAY_BASE_PATH'),
      jsonBodyLimit: envValue(env, 'JSON_BODY_LIMIT'),
    },
    logging: {
      level: overrides.logLevel ?? envValue(env, 'LOG_LEVEL'),
    },
    docker: {
      defaultHost: overrides.defaultDaemon ?? envValue(env, 'DEFAULT_DOCKER_HOST'),
      apiVersion: envValue(env, 'DOCKER_API_VERSION'),
      requestTimeout: envValue(env, 'DOCKER_REQUEST_TIMEOUT'),
    },
    tenants: {
      file: overrides.tenantsFile ?? envValue(env, 'TENANTS_FILE'),
    },
    cache: {
      ttl: envValue(env, 'RESOLVER_CACHE_TTL'),
      maxSize: envValue(env, 'RESOLVER_CACHE_SIZE'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Configuration validation failed: ${result.error.issues
        .map((entry) => `${entry.path.join('.')}: ${entry.message}`)
        .join('; ')}`,
      issue?.path.join('.'),
    );
  }

  return result.data;
}
