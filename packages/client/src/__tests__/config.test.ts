import { describe, it, expect } from 'vitest';
import { readRetryLimit, resolveClientConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('resolveClientConfig', () => {
  it('accepts release names, enum keys and patch releases', () => {
    expect(resolveClientConfig({ version: '1.2', env: {} }).version).toBe('1.2');
    expect(resolveClientConfig({ version: 'v1_1', env: {} }).version).toBe('1.1');
    expect(resolveClientConfig({ version: '0.13.1', env: {} }).version).toBe('0.13');
  });

  it('applies defaults', () => {
    const resolved = resolveClientConfig({ version: '1.0', env: {} });

    expect(resolved).toEqual({ version: '1.0', config: {}, retryLimit: 1, outputBufferSize: 10240 });
  });

  it('overlays environment variables', () => {
    const resolved = resolveClientConfig({
      env: {
        METABRIDGE_VERSION: '0.14',
        METABRIDGE_RETRIES: '4',
        METABRIDGE_RETRY_DELAY: '2s',
        METABRIDGE_USER: 'etl',
        METABRIDGE_UNRELATED: 'x',
      },
    });

    expect(resolved.version).toBe('0.14');
    expect(resolved.retryLimit).toBe(4);
    expect(resolved.config).toEqual({
      'metastore.failure.retries': '4',
      'metastore.client.connect.retry.delay': '2s',
      'user.name': 'etl',
    });
  });

  it('lets explicit options win over the environment', () => {
    const resolved = resolveClientConfig({
      version: '1.2',
      config: { 'metastore.failure.retries': '0' },
      env: { METABRIDGE_VERSION: '0.12', METABRIDGE_RETRIES: '4', METABRIDGE_USER: '' },
    });

    expect(resolved.version).toBe('1.2');
    expect(resolved.retryLimit).toBe(0);
    expect(resolved.config).toEqual({ 'metastore.failure.retries': '0' });
  });

  it('freezes the result', () => {
    const resolved = resolveClientConfig({ version: '1.2', config: { a: '1' }, env: {} });

    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.config)).toBe(true);
  });

  it('rejects missing and unsupported versions', () => {
    expect(() => resolveClientConfig({ env: {} })).toThrow(
      'Catalog version is required (option "version" or METABRIDGE_VERSION)'
    );
    expect(() => resolveClientConfig({ version: '3.1', env: {} })).toThrow('Unsupported catalog version: 3.1');
    expect(() => resolveClientConfig({ version: '3.1', env: {} })).toThrow(ConfigurationError);
  });

  it('rejects an invalid output buffer size', () => {
    expect(() => resolveClientConfig({ version: '1.2', outputBufferSize: 0, env: {} })).toThrow(
      'outputBufferSize must be a positive integer, got 0'
    );
  });
});

describe('readRetryLimit', () => {
  it('defaults to one retry', () => {
    expect(readRetryLimit({})).toBe(1);
  });

  it('reads a non-negative integer', () => {
    expect(readRetryLimit({ 'metastore.failure.retries': ' 3 ' })).toBe(3);
    expect(readRetryLimit({ 'metastore.failure.retries': '0' })).toBe(0);
  });

  it('rejects anything else', () => {
    expect(() => readRetryLimit({ 'metastore.failure.retries': '-1' })).toThrow(
      'metastore.failure.retries must be a non-negative integer, got -1'
    );
    expect(() => readRetryLimit({ 'metastore.failure.retries': 'many' })).toThrow(ConfigurationError);
  });
});
