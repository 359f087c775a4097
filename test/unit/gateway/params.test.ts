import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { FILTER_KINDS } from '../../../src/docker/filters';
import {
  BaseLogsQuery,
  booleanParam,
  filtersParam,
  integerParam,
  jsonQueryParam,
  nonNegativeIntegerParam,
  stringListParam,
} from '../../../src/gateway/params';

describe('scalar parameters', () => {
  it('should accept true/false and 1/0 as booleans', () => {
    expect(booleanParam.parse('true')).toBe(true);
    expect(booleanParam.parse('1')).toBe(true);
    expect(booleanParam.parse('false')).toBe(false);
    expect(booleanParam.parse('0')).toBe(false);
    expect(booleanParam.safeParse('yes').success).toBe(false);
  });

  it('should parse integers', () => {
    expect(integerParam.parse('-5')).toBe(-5);
    expect(integerParam.safeParse('1.5').success).toBe(false);
    expect(nonNegativeIntegerParam.parse('30')).toBe(30);
    expect(nonNegativeIntegerParam.safeParse('-1').success).toBe(false);
  });

  it('should wrap a single value into a list', () => {
    expect(stringListParam.parse('alpine')).toEqual(['alpine']);
    expect(stringListParam.parse(['alpine', 'busybox'])).toEqual(['alpine', 'busybox']);
  });
});

describe('jsonQueryParam', () => {
  const param = jsonQueryParam(z.record(z.string()));

  it('should decode and validates the JSON value', () => {
    expect(param.parse('{"VERSION":"1.2"}')).toEqual({ VERSION: '1.2' });
    expect(param.safeParse('{"VERSION":1}').success).toBe(false);
  });

  it('should reject text that is not JSON', () => {
    const result = param.safeParse('{oops');
    expect(result.success).toBe(false);
    expect(result.success ? undefined : result.error.issues[0]?.message).toBe('Expected JSON');
  });
});

describe('filtersParam', () => {
  const param = filtersParam(FILTER_KINDS.containers);

  it('should turn the JSON map into a flat filter list', () => {
    expect(param.parse('{"label":["a=1","b"],"status":["running"]}')).toEqual([
      { kind: 'label', value: 'a=1' },
      { kind: 'label', value: 'b' },
      { kind: 'status', value: 'running' },
    ]);
  });

  it('should accept the map-of-booleans form', () => {
    expect(param.parse('{"status":{"running":true,"exited":false}}')).toEqual([
      { kind: 'status', value: 'running' },
    ]);
  });

  it('should reject kinds the resource does not support', () => {
    const result = param.safeParse('{"dangling":["true"]}');
    expect(result.success ? undefined : result.error.issues[0]?.message).toBe(
      'Unsupported filter: dangling',
    );
  });

  it('should reject malformed values', () => {
    expect(param.safeParse('not json').success).toBe(false);
    expect(param.safeParse('{"label":"a=1"}').success).toBe(false);
  });

  it('should accept negated labels for prune', () => {
    expect(filtersParam(FILTER_KINDS.prune).parse('{"label!":["keep"]}')).toEqual([
      { kind: 'label!', value: 'keep' },
    ]);
  });
});

describe('BaseLogsQuery', () => {
  it('should parse every log parameter', () => {
    expect(
      BaseLogsQuery.parse({ follow: '1', stdout: 'true', since: '1700000000', tail: '50' }),
    ).toEqual({ follow: true, stdout: true, since: 1700000000, tail: 50 });
  });

  it('should accept tail=all', () => {
    expect(BaseLogsQuery.parse({ tail: 'all' })).toEqual({ tail: 'all' });
  });

  it('should reject a negative tail', () => {
    expect(BaseLogsQuery.safeParse({ tail: '-3' }).success).toBe(false);
  });
});
