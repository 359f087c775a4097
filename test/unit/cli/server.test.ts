import { afterAll, beforeAll, describe, it, expect } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { request } from 'undici';
import { createDirectory, packageRoot, startGateway } from '../../../src/cli/server';
import { createAppConfig } from '../../../src/config/app-config';
import { ConfigurationError } from '../../../src/errors';
import { CachedDaemonDirectory, StaticDaemonDirectory } from '../../../src/gateway/directory';
import { startFakeDaemon } from '../../__support__/utilities/integration-test-utils';
import { createTestLogger } from '../../__support__/utilities/mock-factories';

describe('gateway bootstrap', () => {
  const logger = createTestLogger();
  let dir: string;
  let tenantsFile: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gateway-'));
    tenantsFile = join(dir, 'tenants.yaml');
    await writeFile(tenantsFile, 'tenants:\n  tenant-7: tcp://10.0.0.5:2375\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('createDirectory', () => {
    it('should combine the tenant file with the default daemon', async () => {
      const config = createAppConfig({
        TENANTS_FILE: tenantsFile,
        DEFAULT_DOCKER_HOST: 'http://127.0.0.1:8010',
        DOCKER_API_VERSION: '1.41',
      });

      const directory = await createDirectory(config, logger);

      expect(directory).toBeInstanceOf(StaticDaemonDirectory);
      await expect(directory.lookup('tenant-7')).resolves.toEqual({
        kind: 'tcp',
        url: 'tcp://10.0.0.5:2375',
        apiVersion: 'v1.41',
      });
      await expect(directory.lookup('other')).resolves.toEqual({
        kind: 'tcp',
        url: 'http://127.0.0.1:8010',
        apiVersion: 'v1.41',
      });
    });

    it('should wrap the directory in a cache when a ttl is set', async () => {
      const config = createAppConfig({ TENANTS_FILE: tenantsFile, RESOLVER_CACHE_TTL: '1000' });

      expect(await createDirectory(config, logger)).toBeInstanceOf(CachedDaemonDirectory);
    });

    it('should start without any tenants', async () => {
      const directory = await createDirectory(createAppConfig({}), logger);
      await expect(directory.lookup('tenant-7')).resolves.toBeUndefined();
    });

    it('should fail on a missing tenant file', async () => {
      const config = createAppConfig({ TENANTS_FILE: join(dir, 'missing.yaml') });
      await expect(createDirectory(config, logger)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('packageRoot', () => {
    it('should find the root from the source layout', () => {
      expect(packageRoot('/home/distro/gateway/src/cli')).toBe('/home/distro/gateway');
    });

    it('should find the root from the compiled layout', () => {
      expect(packageRoot('/home/distro/gateway/dist/src/cli')).toBe('/home/distro/gateway');
    });
  });

  describe('startGateway', () => {
    it('should serve tenant requests until closed', async () => {
      const daemon = await startFakeDaemon((_request, res) => {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.end('OK');
      });
      const gateway = await startGateway(
        createAppConfig({ PORT: '0', DEFAULT_DOCKER_HOST: daemon.address, GATEWAY_BASE_PATH: '/docker' }),
        logger,
      );

      try {
        const response = await request(`http://127.0.0.1:${gateway.address.port}/docker/tenant-7/ping`);
        expect(response.statusCode).toBe(200);
        expect(await response.body.text()).toBe('OK');
        expect(daemon.requests.map((recorded) => recorded.url)).toEqual(['/_ping']);
      } finally {
        await gateway.close();
        await daemon.close();
      }

      expect(gateway.server.listening).toBe(false);
    });
  });
});
