/**
 * Daemon directories map tenant identifiers to daemon endpoints.
 *
 * The gateway only depends on the `DaemonDirectory` interface. A static
 * directory loaded from a YAML tenant file is provided, and any directory can
 * be wrapped in a bounded TTL cache.
 */

import { readFile } from 'node:fs/promises';
import { load } from 'js-yaml';
import { z } from 'zod';
import { parseDaemonEndpoint, type DaemonEndpoint } from '../docker/endpoint';
import { ConfigurationError } from '../errors';
import type { Logger } from '../lib/logger';

export interface DaemonDirectory {
  /** Endpoint serving `tenantId`, or undefined when the tenant is unknown */
  lookup(tenantId: string): Promise<DaemonEndpoint | undefined>;
}

export class StaticDaemonDirectory implements DaemonDirectory {
  private readonly entries: ReadonlyMap<string, DaemonEndpoint>;

  constructor(
    entries: Iterable<readonly [string, DaemonEndpoint]> = [],
    private readonly defaultEndpoint?: DaemonEndpoint,
  ) {
    this.entries = new Map(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Same tenants, different fallback daemon */
  withDefault(endpoint: DaemonEndpoint | undefined): StaticDaemonDirectory {
    return new StaticDaemonDirectory(this.entries, endpoint);
  }

  async lookup(tenantId: string): Promise<DaemonEndpoint | undefined> {
    return this.entries.get(tenantId) ?? this.defaultEndpoint;
  }
}

export interface CacheOptions {
  /** Lifetime of a cached endpoint, in milliseconds */
  ttlMs: number;
  maxEntries: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

interface CacheEntry {
  endpoint: DaemonEndpoint;
  expiresAt: number;
}

/**
 * Serves repeated lookups from memory. Unknown tenants are not cached, so a
 * tenant added to the backing directory becomes reachable on the next request.
 */
export class CachedDaemonDirectory implements DaemonDirectory {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly source: DaemonDirectory,
    private readonly options: CacheOptions,
    logger: Logger,
  ) {
    if (!(options.ttlMs > 0)) {
      throw new ConfigurationError('Resolver cache TTL must be positive', 'ttlMs', options.ttlMs);
    }
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new ConfigurationError(
        'Resolver cache size must be a positive integer',
        'maxEntries',
        options.maxEntries,
      );
    }
    this.now = options.now ?? Date.now;
    this.logger = logger.child({ component: 'CachedDaemonDirectory' });
  }

  get size(): number {
    return this.cache.size;
  }

  async lookup(tenantId: string): Promise<DaemonEndpoint | undefined> {
    const entry = this.cache.get(tenantId);
    if (entry) {
      if (this.now() < entry.expiresAt) {
        this.logger.trace({ tenantId }, 'Cache hit');
        return entry.endpoint;
      }
      this.cache.delete(tenantId);
      this.logger.debug({ tenantId }, 'Cache entry expired');
    }

    const endpoint = await this.source.lookup(tenantId);
    if (endpoint) {
      this.store(tenantId, endpoint);
    }
    return endpoint;
  }

  clear(): void {
    this.cache.clear();
  }

  private store(tenantId: string, endpoint: DaemonEndpoint): void {
    // Map iteration order is insertion order, so the first key is the oldest.
    while (this.cache.size >= this.options.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    this.cache.set(tenantId, { endpoint, expiresAt: this.now() + this.options.ttlMs });
  }
}

const TenantEntrySchema = z.union([
  z.string().min(1),
  z.object({
    address: z.string().min(1),
    apiVersion: z.union([z.string(), z.number()]).optional(),
  }),
]);

const TenantFileSchema = z.object({
  /** Daemon used for tenants without an entry of their own */
  default: z.string().min(1).optional(),
  apiVersion: z.union([z.string(), z.number()]).optional(),
  tenants: z.record(TenantEntrySchema).default({}),
});

export type TenantFile = z.infer<typeof TenantFileSchema>;

const versionString = (version: string | number | undefined): string | undefined =>
  version === undefined ? undefined : String(version);

/**
 * Parse the contents of a tenant file:
 *
 * ```yaml
 * default: http://127.0.0.1:8010
 * apiVersion: "1.41"
 * tenants:
 *   tenant-7: tcp://10.0.0.5:2375
 *   builds:
 *     address: unix:///var/run/docker.sock
 * ```
 */
export function parseTenantFile(
  text: string,
  source = 'tenant file',
  fallbackApiVersion?: string,
): StaticDaemonDirectory {
  let document: unknown;
  try {
    document = load(text);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      'tenants',
    );
  }

  const result = TenantFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}: ${result.error.message}`, 'tenants');
  }

  const fileVersion = versionString(result.data.apiVersion) ?? fallbackApiVersion;
  const entries = Object.entries(result.data.tenants).map(([tenantId, entry]) => {
    const endpoint =
      typeof entry === 'string'
        ? parseDaemonEndpoint(entry, fileVersion)
        : parseDaemonEndpoint(entry.address, versionString(entry.apiVersion) ?? fileVersion);
    return [tenantId, endpoint] as const;
  });

  const defaultEndpoint =
    result.data.default === undefined
      ? undefined
      : parseDaemonEndpoint(result.data.default, fileVersion);

  return new StaticDaemonDirectory(entries, defaultEndpoint);
}

/**
 * Read a YAML tenant file from disk. `fallbackApiVersion` applies to entries
 * that neither the file nor the entry pins to a version.
 */
export async function loadTenantDirectory(
  file: string,
  fallbackApiVersion?: string,
): Promise<StaticDaemonDirectory> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read tenant file ${file}: ${error instanceof Error ? error.message : String(error)}`,
      'tenantsFile',
      file,
    );
  }
  return parseTenantFile(text, file, fallbackApiVersion);
}
