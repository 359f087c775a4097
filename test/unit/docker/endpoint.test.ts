import { describe, it, expect } from '@jest/globals';
import {
  formatEndpoint,
  normalizeApiVersion,
  parseDaemonEndpoint,
} from '../../../src/docker/endpoint';
import { ConfigurationError } from '../../../src/errors';

describe('parseDaemonEndpoint', () => {
  it('should keep the tcp scheme and drops any path', () => {
    expect(parseDaemonEndpoint('tcp://10.0.0.5:2375/ignored')).toEqual({
      kind: 'tcp',
      url: 'tcp://10.0.0.5:2375',
    });
  });

  it('should accept http and https addresses', () => {
    expect(parseDaemonEndpoint('http://127.0.0.1:8010')).toEqual({
      kind: 'tcp',
      url: 'http://127.0.0.1:8010',
    });
    expect(parseDaemonEndpoint('https://docker.internal:2376', '1.41')).toEqual({
      kind: 'tcp',
      url: 'https://docker.internal:2376',
      apiVersion: 'v1.41',
    });
  });

  it('should parse unix socket addresses', () => {
    expect(parseDaemonEndpoint('unix:///var/run/docker.sock')).toEqual({
      kind: 'unix',
      socketPath: '/var/run/docker.sock',
    });
  });

  it('should return frozen endpoints', () => {
    expect(Object.isFrozen(parseDaemonEndpoint('tcp://10.0.0.5:2375'))).toBe(true);
  });

  it.each(['not an address', 'ftp://host:21', 'unix:///', 'unix://'])(
    'should reject %s',
    (address) => {
      expect(() => parseDaemonEndpoint(address)).toThrow(ConfigurationError);
    },
  );
});

describe('normalizeApiVersion', () => {
  it('should add the v prefix when missing', () => {
    expect(normalizeApiVersion('1.41')).toBe('v1.41');
    expect(normalizeApiVersion('v1.43')).toBe('v1.43');
  });

  it('should reject anything that is not major.minor', () => {
    expect(() => normalizeApiVersion('latest')).toThrow(ConfigurationError);
    expect(() => normalizeApiVersion('1.41.2')).toThrow(ConfigurationError);
  });
});

describe('formatEndpoint', () => {
  it('should render both kinds as addresses', () => {
    expect(formatEndpoint(parseDaemonEndpoint('tcp://10.0.0.5:2375'))).toBe('tcp://10.0.0.5:2375');
    expect(formatEndpoint(parseDaemonEndpoint('unix:///run/docker.sock'))).toBe(
      'unix:///run/docker.sock',
    );
  });
});
