import { describe, it, expect } from 'vitest';
import { createExampleConfig } from './config.js';

describe('createExampleConfig', () => {
  describe('given only the application name', () => {
    it('leaves the optional settings unset', () => {
      const config = createExampleConfig({ DIRCACHE_APP_NAME: 'weather-widget' });

      expect(config).toEqual({
        namespace: { appName: 'weather-widget', cacheDir: undefined, defaultTtlSeconds: undefined },
        logLevel: 'warn',
      });
    });
  });

  describe('given every variable', () => {
    it('parses them', () => {
      const config = createExampleConfig({
        DIRCACHE_APP_NAME: ' weather-widget ',
        DIRCACHE_DIR: '/var/cache',
        DIRCACHE_DEFAULT_TTL_SECONDS: '300',
        DIRCACHE_LOG_LEVEL: 'DEBUG',
      });

      expect(config).toEqual({
        namespace: { appName: 'weather-widget', cacheDir: '/var/cache', defaultTtlSeconds: 300 },
        logLevel: 'debug',
      });
    });
  });

  describe('given blank optional variables', () => {
    it('treats them as unset', () => {
      const config = createExampleConfig({
        DIRCACHE_APP_NAME: 'weather-widget',
        DIRCACHE_DIR: '  ',
        DIRCACHE_DEFAULT_TTL_SECONDS: '',
      });

      expect(config.namespace.cacheDir).toBeUndefined();
      expect(config.namespace.defaultTtlSeconds).toBeUndefined();
    });
  });

  describe('given no application name', () => {
    it('throws', () => {
      expect(() => createExampleConfig({})).toThrow('Invalid environment: DIRCACHE_APP_NAME: must be set');
    });
  });

  describe('given a blank application name', () => {
    it('throws', () => {
      expect(() => createExampleConfig({ DIRCACHE_APP_NAME: '   ' })).toThrow(
        'Invalid environment: DIRCACHE_APP_NAME: must be set'
      );
    });
  });

  describe('given a TTL that is not a number', () => {
    it('throws naming the variable', () => {
      expect(() =>
        createExampleConfig({ DIRCACHE_APP_NAME: 'weather-widget', DIRCACHE_DEFAULT_TTL_SECONDS: 'soon' })
      ).toThrow('DIRCACHE_DEFAULT_TTL_SECONDS');
    });
  });

  describe('given a negative TTL', () => {
    it('throws naming the variable', () => {
      expect(() =>
        createExampleConfig({ DIRCACHE_APP_NAME: 'weather-widget', DIRCACHE_DEFAULT_TTL_SECONDS: '-5' })
      ).toThrow('DIRCACHE_DEFAULT_TTL_SECONDS');
    });
  });
});
