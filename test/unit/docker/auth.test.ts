import { describe, it, expect } from '@jest/globals';
import {
  decodeRegistryAuth,
  encodeRegistryAuth,
  passwordAuth,
  registryAuthHeaders,
  tokenAuth,
} from '../../../src/docker/auth';
import { ValidationError } from '../../../src/errors';

describe('registry auth', () => {
  it('should encode token credentials as base64 JSON', () => {
    expect(encodeRegistryAuth(tokenAuth('abc'))).toBe('eyJpZGVudGl0eXRva2VuIjoiYWJjIn0=');
  });

  it('should omit unset optional fields', () => {
    const encoded = encodeRegistryAuth(
      passwordAuth('alice', 'test-secret', { serveraddress: 'registry.example.com' }),
    );
    expect(Buffer.from(encoded, 'base64').toString('utf8')).toBe(
      '{"username":"alice","password":"test-secret","serveraddress":"registry.example.com"}',
    );
  });

  it('should use the URL-safe alphabet', () => {
    const encoded = encodeRegistryAuth(passwordAuth('u', '??>'));
    expect(encoded).toBe('eyJ1c2VybmFtZSI6InUiLCJwYXNzd29yZCI6Ij8_PiJ9');
  });

  it('should decode what it encodes', () => {
    const credentials = passwordAuth('alice', 'test-secret', { email: 'alice@example.com' });
    expect(decodeRegistryAuth(encodeRegistryAuth(credentials))).toEqual(credentials);
    expect(decodeRegistryAuth(encodeRegistryAuth(tokenAuth('abc')))).toEqual({
      identitytoken: 'abc',
    });
  });

  it('should decode the standard alphabet as well', () => {
    expect(decodeRegistryAuth('eyJ1c2VybmFtZSI6InUiLCJwYXNzd29yZCI6Ij8/PiJ9')).toEqual({
      username: 'u',
      password: '??>',
    });
  });

  it('should reject headers that are not credentials', () => {
    expect(() => decodeRegistryAuth('not base64 json')).toThrow(ValidationError);
    const other = Buffer.from('{"user":"x"}').toString('base64');
    expect(() => decodeRegistryAuth(other)).toThrow(ValidationError);
  });

  it('should build the header only when credentials are given', () => {
    expect(registryAuthHeaders(undefined)).toEqual({});
    expect(registryAuthHeaders(tokenAuth('abc'))).toEqual({
      'X-Registry-Auth': 'eyJpZGVudGl0eXRva2VuIjoiYWJjIn0=',
    });
  });
});
