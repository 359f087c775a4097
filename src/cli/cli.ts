#!/usr/bin/env node
/**
 * Docker tenant gateway CLI
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, exit } from 'node:process';
import { program } from 'commander';
import { createAppConfig, type ConfigOverrides } from '../config/app-config';
import { isApplicationError } from '../errors';
import { createLogger, type Logger } from '../lib/logger';
import { createDirectory, packageRoot, startGateway } from './server';

function packageVersion(): string {
  const parsed: unknown = JSON.parse(
    readFileSync(join(packageRoot(__dirname), 'package.json'), 'utf-8'),
  );
  return typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
    ? parsed.version
    : '0.0.0';
}

interface CliOptions {
  host?: string;
  port?: string;
  tenants?: string;
  defaultDaemon?: string;
  logLevel?: string;
  basePath?: string;
  validate?: boolean;
}

program
  .name('docker-tenant-gateway')
  .description('Forward tenant-addressed Docker Engine API requests to per-tenant daemons')
  .version(packageVersion())
  .option('--host <host>', 'interface to listen on (default: 127.0.0.1)')
  .option('--port <port>', 'port to listen on (default: 8030)')
  .option('--tenants <file>', 'YAML file mapping tenant ids to daemon addresses')
  .option('--default-daemon <address>', 'daemon for tenants not listed in the tenant file')
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error')
  .option('--base-path <path>', 'path prefix in front of /:tenant, e.g. /docker')
  .option('--validate', 'validate configuration and tenant file, then exit')
  .addHelpText(
    'after',
    `

Examples:
  $ docker-tenant-gateway --tenants tenants.yaml
  $ docker-tenant-gateway --default-daemon unix:///var/run/docker.sock --base-path /docker

Environment Variables:
  HOST, PORT                 Listen address
  LOG_LEVEL                  Logging level
  GATEWAY_BASE_PATH          Path prefix in front of /:tenant
  TENANTS_FILE               Tenant file
  DEFAULT_DOCKER_HOST        Fallback daemon address
  DOCKER_API_VERSION         API version prefix for daemon paths, e.g. 1.41
  DOCKER_REQUEST_TIMEOUT     Milliseconds to wait for daemon response headers
  RESOLVER_CACHE_TTL         Milliseconds to cache tenant lookups (0 disables)
  RESOLVER_CACHE_SIZE        Maximum cached tenants
  JSON_BODY_LIMIT            Maximum JSON request body, e.g. 1mb
`,
  );

async function main(): Promise<void> {
  program.parse(argv);
  const options = program.opts<CliOptions>();

  const overrides: ConfigOverrides = {
    host: options.host,
    port: options.port,
    basePath: options.basePath,
    logLevel: options.logLevel,
    tenantsFile: options.tenants,
    defaultDaemon: options.defaultDaemon,
  };
  const config = createAppConfig(process.env, overrides);
  const logger = createLogger({
    level: config.logging.level,
    environment: config.server.nodeEnv,
    version: packageVersion(),
  });

  if (options.validate) {
    await createDirectory(config, logger);
    logger.info('Configuration is valid');
    return;
  }

  const gateway = await startGateway(config, logger);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown initiated');

    const shutdownTimeout = setTimeout(() => {
      logger.error('Forced shutdown due to timeout');
      exit(1);
    }, 10000);

    await gateway.close();
    clearTimeout(shutdownTimeout);
    exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown error');
        exit(1);
      });
    });
  }
}

function reportStartupFailure(error: unknown, logger: Logger): void {
  if (isApplicationError(error)) {
    logger.fatal({ code: error.code, context: error.context }, error.message);
  } else {
    logger.fatal({ err: error }, 'Gateway startup failed');
  }
}

main().catch((error: unknown) => {
  reportStartupFailure(error, createLogger({ pretty: false }));
  exit(1);
});
