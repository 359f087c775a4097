import { describe, it, expect } from '@jest/globals';
import { parseDaemonEndpoint } from '../../../src/docker/endpoint';
import { jsonBody } from '../../../src/docker/query';
import {
  createRequest,
  describeRequest,
  encodeIdentifier,
  isHttpMethod,
  resolveUrl,
  resourcePath,
} from '../../../src/docker/request';
import { RequestBuildError } from '../../../src/errors';
import { tenantSevenEndpoint } from '../../__support__/utilities/mock-factories';

describe('createRequest', () => {
  it('should join the path onto the endpoint url', () => {
    const request = createRequest(tenantSevenEndpoint, 'GET', '/containers/json?all=true');
    expect(request.url).toBe('tcp://10.0.0.5:2375/containers/json?all=true');
    expect(request.method).toBe('GET');
    expect(request.headers).toEqual({});
    expect(request.body).toBeUndefined();
  });

  it('should prefix the api version when the endpoint pins one', () => {
    const endpoint = parseDaemonEndpoint('tcp://10.0.0.5:2375', '1.41');
    expect(createRequest(endpoint, 'GET', '/_ping').url).toBe('tcp://10.0.0.5:2375/v1.41/_ping');
  });

  it('should use http://localhost for unix sockets', () => {
    const endpoint = parseDaemonEndpoint('unix:///var/run/docker.sock');
    expect(createRequest(endpoint, 'GET', '/info').url).toBe('http://localhost/info');
  });

  it('should set Content-Type only when a body is present', () => {
    const withBody = createRequest(tenantSevenEndpoint, 'POST', '/volumes/create', {
      body: jsonBody({ Name: 'data' }),
    });
    expect(withBody.headers).toEqual({ 'Content-Type': 'application/json' });

    const withoutBody = createRequest(tenantSevenEndpoint, 'POST', '/containers/abc/start');
    expect(withoutBody.headers).toEqual({});
  });

  it('should let later headers win over earlier ones of any case', () => {
    const request = createRequest(tenantSevenEndpoint, 'POST', '/build', {
      headers: [
        ['x-custom', 'first'],
        ['X-Custom', 'second'],
        ['content-type', 'text/plain'],
      ],
      body: jsonBody({}),
    });
    expect(request.headers).toEqual({
      'X-Custom': 'second',
      'Content-Type': 'application/json',
    });
  });

  it('should freeze the descriptor and its headers', () => {
    const request = createRequest(tenantSevenEndpoint, 'GET', '/info', { headers: { A: 'b' } });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.headers)).toBe(true);
  });

  it('should reject relative paths', () => {
    expect(() => createRequest(tenantSevenEndpoint, 'GET', 'info')).toThrow(RequestBuildError);
  });

  it('should reject an empty path', () => {
    expect(() => resolveUrl(tenantSevenEndpoint, '')).toThrow(RequestBuildError);
  });
});

describe('isHttpMethod', () => {
  it('should accept the supported methods only', () => {
    expect(isHttpMethod('DELETE')).toBe(true);
    expect(isHttpMethod('TRACE')).toBe(false);
    expect(isHttpMethod('get')).toBe(false);
  });
});

describe('encodeIdentifier', () => {
  it('should keep image reference separators literal', () => {
    expect(encodeIdentifier('library/nginx@sha256:abc')).toBe('library/nginx@sha256:abc');
  });

  it('should percent-encode everything else', () => {
    expect(encodeIdentifier('my container?x=1#y')).toBe('my%20container%3Fx%3D1%23y');
  });

  it.each(['..', '../info', 'a/./b', 'a/..'])('should reject the dot segment in %s', (id) => {
    expect(() => encodeIdentifier(id)).toThrow(RequestBuildError);
  });

  it('should allow dots inside a segment', () => {
    expect(encodeIdentifier('app.v1..2')).toBe('app.v1..2');
  });
});

describe('resourcePath', () => {
  it('should encode interpolated identifiers only', () => {
    expect(resourcePath`/containers/${'a b'}/rename`).toBe('/containers/a%20b/rename');
  });
});

describe('describeRequest', () => {
  it('should mask registry credentials', () => {
    const request = createRequest(tenantSevenEndpoint, 'POST', '/images/create?fromImage=alpine', {
      headers: { 'X-Registry-Auth': 'eyJpZGVudGl0eXRva2VuIjoiYWJjIn0=' },
    });
    expect(describeRequest(request)).toEqual({
      method: 'POST',
      url: 'tcp://10.0.0.5:2375/images/create?fromImage=alpine',
      headers: { 'X-Registry-Auth': '[REDACTED]' },
    });
  });

  it('should report the body media type', () => {
    const request = createRequest(tenantSevenEndpoint, 'POST', '/networks/create', {
      body: jsonBody({ Name: 'backend' }),
    });
    expect(describeRequest(request).contentType).toBe('application/json');
  });
});
