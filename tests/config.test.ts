import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_CONFIG } from '../src/config.js';
import { ValidationError } from '../src/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults on an empty environment', () => {
    expect(loadConfig({})).toEqual({
      hosts: ['http://localhost:9200'],
      indexPrefix: 'mh-logs',
      timeoutSeconds: 30,
    });
  });

  it('should not share the default hosts array', () => {
    const config = loadConfig({});
    config.hosts.push('http://other:9200');
    expect(DEFAULT_CONFIG.hosts).toEqual(['http://localhost:9200']);
  });

  it('should split and trim a comma-separated host list', () => {
    const config = loadConfig({ ELASTICSEARCH_HOSTS: ' http://es1:9200 , http://es2:9200,' });
    expect(config.hosts).toEqual(['http://es1:9200', 'http://es2:9200']);
  });

  it('should reject a host list with no hosts', () => {
    expect(() => loadConfig({ ELASTICSEARCH_HOSTS: ' , ' })).toThrow(ValidationError);
  });

  it('should read the index prefix, including an empty one', () => {
    expect(loadConfig({ LOG_INDEX_PREFIX: 'app-logs' }).indexPrefix).toBe('app-logs');
    expect(loadConfig({ LOG_INDEX_PREFIX: '' }).indexPrefix).toBe('');
  });

  it('should parse a fractional timeout', () => {
    expect(loadConfig({ ELASTICSEARCH_TIMEOUT_SECONDS: '2.5' }).timeoutSeconds).toBe(2.5);
  });

  it('should use the default timeout when the variable is blank', () => {
    expect(loadConfig({ ELASTICSEARCH_TIMEOUT_SECONDS: '  ' }).timeoutSeconds).toBe(30);
  });

  it.each(['abc', '0', '-5', 'Infinity'])('should reject timeout %s', (value) => {
    expect(() => loadConfig({ ELASTICSEARCH_TIMEOUT_SECONDS: value })).toThrow(ValidationError);
  });

  it('should report the offending value in error details', () => {
    try {
      loadConfig({ ELASTICSEARCH_TIMEOUT_SECONDS: 'soon' });
      expect.unreachable('loadConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.code).toBe('VALIDATION_ERROR');
        expect(err.details).toEqual({ value: 'soon' });
      }
    }
  });
});
