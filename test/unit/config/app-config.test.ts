import { describe, it, expect } from '@jest/globals';
import { createAppConfig } from '../../../src/config/app-config';
import { ConfigurationError } from '../../../src/errors';

describe('createAppConfig', () => {
  describe('defaults', () => {
    it('should apply defaults to an empty environment', () => {
      expect(createAppConfig({})).toEqual({
        server: {
          nodeEnv: 'production',
          host: '127.0.0.1',
          port: 8030,
          basePath: '',
          jsonBodyLimit: '1mb',
        },
        logging: { level: 'info' },
        docker: { requestTimeout: 60000 },
        tenants: {},
        cache: { ttl: 0, maxSize: 1000 },
      });
    });

    it('should treat empty variables as unset', () => {
      const config = createAppConfig({ PORT: '', LOG_LEVEL: '  ' });
      expect(config.server.port).toBe(8030);
      expect(config.logging.level).toBe('info');
    });
  });

  describe('environment', () => {
    it('should read every supported variable', () => {
      const config = createAppConfig({
        NODE_ENV: 'development',
        HOST: '0.0.0.0',
        PORT: '9000',
        GATEWAY_BASE_PATH: '/docker/',
        JSON_BODY_LIMIT: '5mb',
        LOG_LEVEL: 'debug',
        DEFAULT_DOCKER_HOST: 'http://127.0.0.1:8010',
        DOCKER_API_VERSION: '1.41',
        DOCKER_REQUEST_TIMEOUT: '2500',
        TENANTS_FILE: '/etc/gateway/tenants.yaml',
        RESOLVER_CACHE_TTL: '30000',
        RESOLVER_CACHE_SIZE: '50',
      });

      expect(config).toEqual({
        server: {
          nodeEnv: 'development',
          host: '0.0.0.0',
          port: 9000,
          basePath: '/docker',
          jsonBodyLimit: '5mb',
        },
        logging: { level: 'debug' },
        docker: {
          defaultHost: 'http://127.0.0.1:8010',
          apiVersion: '1.41',
          requestTimeout: 2500,
        },
        tenants: { file: '/etc/gateway/tenants.yaml' },
        cache: { ttl: 30000, maxSize: 50 },
      });
    });

    it('should let overrides win over the environment', () => {
      const config = createAppConfig(
        { PORT: '9000', LOG_LEVEL: 'debug', TENANTS_FILE: 'a.yaml' },
        { port: 7000, logLevel: 'warn', tenantsFile: 'b.yaml', defaultDaemon: 'tcp://10.0.0.9:2375' },
      );

      expect(config.server.port).toBe(7000);
      expect(config.logging.level).toBe('warn');
      expect(config.tenants.file).toBe('b.yaml');
      expect(config.docker.defaultHost).toBe('tcp://10.0.0.9:2375');
    });
  });

  describe('validation', () => {
    it.each([
      ['PORT', '70000'],
      ['PORT', 'http'],
      ['LOG_LEVEL', 'verbose'],
      ['NODE_ENV', 'staging'],
      ['GATEWAY_BASE_PATH', 'docker'],
      ['RESOLVER_CACHE_SIZE', '0'],
      ['DOCKER_REQUEST_TIMEOUT', '-1'],
    ])('should reject %s=%s', (key, value) => {
      expect(() => createAppConfig({ [key]: value })).toThrow(ConfigurationError);
    });

    it('should name the offending key', () => {
      try {
        createAppConfig({ PORT: 'http' });
        throw new Error('expected a configuration error');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({ configKey: 'server.port' });
      }
    });
  });
});
