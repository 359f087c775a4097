import { describe, it, expect } from '@jest/globals';
import { encodeQuery, jsonBody, jsonParam, tarBody, withQuery } from '../../../src/docker/query';

describe('encodeQuery', () => {
  it('should return undefined when every value is unset', () => {
    expect(encodeQuery({})).toBeUndefined();
    expect(encodeQuery({ all: undefined, limit: undefined })).toBeUndefined();
  });

  it('should encode booleans and numbers as text', () => {
    expect(encodeQuery({ all: true, size: false, limit: 10 })).toBe('all=true&size=false&limit=10');
  });

  it('should keep falsy values that are set', () => {
    expect(encodeQuery({ t: 0, name: '' })).toBe('t=0&name=');
  });

  it('should repeat the key for list values', () => {
    expect(encodeQuery({ names: ['alpine', 'busybox:1.36'] })).toBe(
      'names=alpine&names=busybox%3A1.36',
    );
  });

  it('should form-encode reserved characters', () => {
    expect(encodeQuery({ term: 'a b&c' })).toBe('term=a+b%26c');
  });
});

describe('withQuery', () => {
  it('should leave the path alone without a query', () => {
    expect(withQuery('/containers/json', undefined)).toBe('/containers/json');
  });

  it('should append the query after ?', () => {
    expect(withQuery('/containers/json', 'all=true')).toBe('/containers/json?all=true');
  });
});

describe('jsonParam', () => {
  it('should treat empty maps as unset', () => {
    expect(jsonParam({})).toBeUndefined();
    expect(jsonParam(undefined)).toBeUndefined();
  });

  it('should serialize maps as JSON', () => {
    expect(jsonParam({ VERSION: '1.2' })).toBe('{"VERSION":"1.2"}');
  });
});

describe('bodies', () => {
  it('should mark JSON bodies as application/json and drops undefined fields', () => {
    expect(jsonBody({ Name: 'data', Driver: undefined })).toEqual({
      content: '{"Name":"data"}',
      contentType: 'application/json',
    });
  });

  it('should mark archives as application/tar', () => {
    const archive = Buffer.from('tar');
    expect(tarBody(archive)).toEqual({ content: archive, contentType: 'application/tar' });
  });
});
