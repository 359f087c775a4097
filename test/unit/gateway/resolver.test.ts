import { describe, it, expect } from '@jest/globals';
import { ResolutionError } from '../../../src/errors';
import { StaticDaemonDirectory } from '../../../src/gateway/directory';
import { TENANT_ID_PATTERN, TenantResolver } from '../../../src/gateway/resolver';
import { createTestLogger, tenantSevenEndpoint } from '../../__support__/utilities/mock-factories';

describe('TenantResolver', () => {
  const resolver = new TenantResolver(
    new StaticDaemonDirectory([['tenant-7', tenantSevenEndpoint]]),
    createTestLogger(),
  );

  it('should resolve a known tenant to its daemon', async () => {
    const resolved = await resolver.resolve('tenant-7');
    expect(resolved).toEqual({ tenantId: 'tenant-7', endpoint: tenantSevenEndpoint });
    expect(Object.isFrozen(resolved)).toBe(true);
  });

  it('should report unknown tenants as not found', async () => {
    const failure = resolver.resolve('tenant-8');
    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    await expect(failure).rejects.toMatchObject({ reason: 'TENANT_NOT_FOUND', tenantId: 'tenant-8' });
  });

  it.each(['', '-leading-dash', 'has space', 'a/b', 'x'.repeat(129)])(
    'rejects the malformed id %j before any lookup',
    async (tenantId) => {
      await expect(resolver.resolve(tenantId)).rejects.toMatchObject({
        code: 'INVALID_TENANT',
        reason: 'INVALID_TENANT',
      });
    },
  );
});

describe('TENANT_ID_PATTERN', () => {
  it.each(['tenant-7', 'acme.prod', 'a', 'team_01', 'x'.repeat(128)])('accepts %s', (tenantId) => {
    expect(TENANT_ID_PATTERN.test(tenantId)).toBe(true);
  });
});
