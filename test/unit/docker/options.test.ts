import { describe, it, expect } from '@jest/globals';
import { ContainerFilter, ImageSearchFilter, PruneFilter } from '../../../src/docker/filters';
import { serializeLogsOptions, serializePruneOptions } from '../../../src/docker/options/common';
import {
  DEFAULT_ATTACH_OPTIONS,
  serializeArchiveOptions,
  serializeAttachOptions,
  serializeContainerCreateBody,
  serializeContainerCreateQuery,
  serializeContainerListOptions,
  serializeRemoveContainerOptions,
  serializeResizeOptions,
  serializeStatsOptions,
  serializeStopOptions,
  serializeTopOptions,
} from '../../../src/docker/options/container';
import {
  serializeImageBuildParams,
  serializeImagePullOptions,
  serializeImageSearchOptions,
} from '../../../src/docker/options/image';
import {
  serializeNetworkConnectOptions,
  serializeNetworkCreateOptions,
  serializeNetworkDisconnectOptions,
} from '../../../src/docker/options/network';
import { serializeServiceUpdateQuery } from '../../../src/docker/options/service';
import { serializeVolumeCreateOptions } from '../../../src/docker/options/volume';

describe('container options', () => {
  it('should serialize list options in declaration order', () => {
    expect(
      serializeContainerListOptions({
        all: true,
        limit: 5,
        filters: [ContainerFilter.status('exited')],
      }),
    ).toBe('all=true&limit=5&filters=%7B%22status%22%3A%5B%22exited%22%5D%7D');
  });

  it('should return undefined for default options', () => {
    expect(serializeContainerListOptions()).toBeUndefined();
    expect(serializeStopOptions()).toBeUndefined();
  });

  it('should send the stop wait as t', () => {
    expect(serializeStopOptions({ wait: 30 })).toBe('t=30');
    expect(serializeStopOptions({ wait: 0 })).toBe('t=0');
  });

  it('should rename API parameters that differ from option names', () => {
    expect(serializeTopOptions({ psArgs: 'aux' })).toBe('ps_args=aux');
    expect(serializeStatsOptions({ stream: false, oneShot: true })).toBe('stream=false&one-shot=true');
    expect(serializeRemoveContainerOptions({ volumes: true, force: true })).toBe('v=true&force=true');
    expect(serializeResizeOptions({ height: 40, width: 120 })).toBe('h=40&w=120');
  });

  it('should attach to every stream by default', () => {
    expect(serializeAttachOptions(DEFAULT_ATTACH_OPTIONS)).toBe(
      'stream=true&stdin=true&stdout=true&stderr=true',
    );
  });

  it('should keep the create name in the query and the config in the body', () => {
    const options = { name: 'web', config: { Image: 'nginx:1.25', Env: ['A=1'] } };
    expect(serializeContainerCreateQuery(options)).toBe('name=web');
    expect(serializeContainerCreateBody(options)).toEqual({
      content: '{"Image":"nginx:1.25","Env":["A=1"]}',
      contentType: 'application/json',
    });
  });

  it('should serialize archive paths', () => {
    expect(serializeArchiveOptions({ path: '/etc/nginx', noOverwriteDirNonDir: true })).toBe(
      'path=%2Fetc%2Fnginx&noOverwriteDirNonDir=true',
    );
  });
});

describe('logs options', () => {
  it('should pass tail as a number or all', () => {
    expect(serializeLogsOptions({ stdout: true, tail: 100 })).toBe('stdout=true&tail=100');
    expect(serializeLogsOptions({ tail: 'all', timestamps: true })).toBe('timestamps=true&tail=all');
  });
});

describe('prune options', () => {
  it('should encode negated label filters', () => {
    expect(serializePruneOptions({ filters: [PruneFilter.labelNot('keep')] })).toBe(
      'filters=%7B%22label%21%22%3A%5B%22keep%22%5D%7D',
    );
  });
});

describe('image options', () => {
  it('should map build parameters onto their API names', () => {
    const query = new URLSearchParams(
      serializeImageBuildParams({
        tag: 'app:1',
        quiet: true,
        buildargs: { VERSION: '1.2' },
        labels: {},
        cachefrom: ['app:0'],
        networkMode: 'host',
      }),
    );
    expect(Object.fromEntries(query)).toEqual({
      t: 'app:1',
      q: 'true',
      cachefrom: '["app:0"]',
      buildargs: '{"VERSION":"1.2"}',
      networkmode: 'host',
    });
  });

  it('should pull with fromImage and tag', () => {
    expect(serializeImagePullOptions({ image: 'alpine', tag: '3.19' })).toBe(
      'fromImage=alpine&tag=3.19',
    );
  });

  it('should put the search term first', () => {
    expect(
      serializeImageSearchOptions('redis', {
        limit: 5,
        filters: [ImageSearchFilter.isOfficial(true)],
      }),
    ).toBe('term=redis&limit=5&filters=%7B%22is-official%22%3A%5B%22true%22%5D%7D');
  });
});

describe('volume options', () => {
  it('should build the create body in PascalCase', () => {
    expect(
      serializeVolumeCreateOptions({ name: 'data', labels: { team: 'core' } }).content,
    ).toBe('{"Name":"data","Labels":{"team":"core"}}');
  });

  it('should create an anonymous volume from no options', () => {
    expect(serializeVolumeCreateOptions().content).toBe('{}');
  });
});

describe('network options', () => {
  it('should build the create body in PascalCase', () => {
    expect(
      serializeNetworkCreateOptions({
        name: 'backend',
        driver: 'bridge',
        ipam: { Config: [{ Subnet: '172.28.0.0/16' }] },
      }).content,
    ).toBe('{"Name":"backend","Driver":"bridge","IPAM":{"Config":[{"Subnet":"172.28.0.0/16"}]}}');
  });

  it('should build connect and disconnect bodies', () => {
    expect(serializeNetworkConnectOptions({ container: 'web' }).content).toBe('{"Container":"web"}');
    expect(serializeNetworkDisconnectOptions({ container: 'web', force: true }).content).toBe(
      '{"Container":"web","Force":true}',
    );
  });
});

describe('service options', () => {
  it('should send the version with every update', () => {
    expect(
      serializeServiceUpdateQuery({ spec: {}, version: 12, rollback: 'previous' }),
    ).toBe('version=12&rollback=previous');
  });
});
