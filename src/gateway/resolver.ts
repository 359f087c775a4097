/**
 * Tenant resolution: inbound tenant id to daemon endpoint.
 */

import { formatEndpoint, type DaemonEndpoint } from '../docker/endpoint';
import { ResolutionError } from '../errors';
import type { Logger } from '../lib/logger';
import type { DaemonDirectory } from './directory';

export const TENANT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

export interface ResolvedTenant {
  readonly tenantId: string;
  readonly endpoint: DaemonEndpoint;
}

export class TenantResolver {
  private readonly logger: Logger;

  constructor(
    private readonly directory: DaemonDirectory,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'TenantResolver' });
  }

  /**
   * @throws ResolutionError `INVALID_TENANT` for malformed ids, `TENANT_NOT_FOUND` for unknown ones
   */
  async resolve(tenantId: string): Promise<ResolvedTenant> {
    if (!TENANT_ID_PATTERN.test(tenantId)) {
      throw new ResolutionError(`Invalid tenant identifier: ${tenantId}`, tenantId, 'INVALID_TENANT');
    }

    const endpoint = await this.directory.lookup(tenantId);
    if (!endpoint) {
      this.logger.debug({ tenantId }, 'Tenant not found');
      throw new ResolutionError(`Unknown tenant: ${tenantId}`, tenantId);
    }

    this.logger.trace({ tenantId, daemon: formatEndpoint(endpoint) }, 'Tenant resolved');
    return Object.freeze({ tenantId, endpoint });
  }
}
