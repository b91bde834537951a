import { describe, it, expect } from 'vitest';
import { loadProxyConfig, normalizeBasePath } from './env.js';
import { ConfigurationError } from './errors.js';
import { DEFAULT_LAUNCH_CONTEXT_FIELDS } from './config.js';
import { TEST_AUTHORITY, TEST_CLIENT_ID, TEST_ORIGIN } from '../test/constants.js';

describe('env', () => {
  describe('loadProxyConfig', () => {
    it('should apply defaults', () => {
      expect(loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY })).toEqual({
        authority: TEST_AUTHORITY,
        clientId: undefined,
        enabled: true,
        port: 4000,
        baseUrl: 'http://localhost:4000',
        basePath: '',
        corsOrigins: [],
        launchContextFields: [...DEFAULT_LAUNCH_CONTEXT_FIELDS],
        logLevel: 'info',
      });
    });

    it('should read every variable', () => {
      const config = loadProxyConfig({
        SMART_PROXY_AUTHORITY: TEST_AUTHORITY,
        SMART_PROXY_CLIENT_ID: TEST_CLIENT_ID,
        SMART_PROXY_ENABLED: 'false',
        PORT: '8080',
        SMART_PROXY_BASE_URL: `${TEST_ORIGIN}/`,
        SMART_PROXY_BASE_PATH: '/AadProxy/',
        SMART_PROXY_CORS_ORIGINS: 'https://app.example.com, https://other.example.com',
        SMART_PROXY_LAUNCH_FIELDS: 'patient,encounter,',
        LOG_LEVEL: 'DEBUG',
      });

      expect(config).toEqual({
        authority: TEST_AUTHORITY,
        clientId: TEST_CLIENT_ID,
        enabled: false,
        port: 8080,
        baseUrl: TEST_ORIGIN,
        basePath: '/AadProxy',
        corsOrigins: ['https://app.example.com', 'https://other.example.com'],
        launchContextFields: ['patient', 'encounter'],
        logLevel: 'debug',
      });
    });

    it('should derive the base URL from the port', () => {
      expect(loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY, PORT: '3000' }).baseUrl).toBe(
        'http://localhost:3000'
      );
    });

    it.each(['1', 'yes', 'on', 'TRUE'])('should read %s as enabled', (value) => {
      expect(
        loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY, SMART_PROXY_ENABLED: value }).enabled
      ).toBe(true);
    });

    describe('errors', () => {
      it('should require the authority', () => {
        expect(() => loadProxyConfig({})).toThrow(new ConfigurationError('SMART_PROXY_AUTHORITY is required'));
      });

      it('should reject a relative authority', () => {
        expect(() => loadProxyConfig({ SMART_PROXY_AUTHORITY: 'login.example.com' })).toThrow(
          'SMART_PROXY_AUTHORITY must be an absolute URL, got "login.example.com"'
        );
      });

      it('should reject a malformed boolean', () => {
        expect(() =>
          loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY, SMART_PROXY_ENABLED: 'maybe' })
        ).toThrow('SMART_PROXY_ENABLED must be a boolean, got "maybe"');
      });

      it.each(['http', '-1', '70000', '80.5'])('should reject PORT=%s', (port) => {
        expect(() => loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY, PORT: port })).toThrow(
          ConfigurationError
        );
      });

      it('should reject an unknown log level', () => {
        expect(() => loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY, LOG_LEVEL: 'verbose' })).toThrow(
          'LOG_LEVEL must be one of debug, info, warn, error, got "verbose"'
        );
      });

      it('should reject a relative base URL', () => {
        expect(() =>
          loadProxyConfig({ SMART_PROXY_AUTHORITY: TEST_AUTHORITY, SMART_PROXY_BASE_URL: 'proxy.example.com' })
        ).toThrow(ConfigurationError);
      });
    });
  });

  describe('normalizeBasePath', () => {
    it.each([
      [undefined, ''],
      ['', ''],
      ['/', ''],
      ['/AadProxy', '/AadProxy'],
      ['/AadProxy/', '/AadProxy'],
    ])('%j -> %j', (value, expected) => {
      expect(normalizeBasePath(value)).toBe(expected);
    });

    it('should require a leading slash', () => {
      expect(() => normalizeBasePath('AadProxy')).toThrow(
        'SMART_PROXY_BASE_PATH must start with "/", got "AadProxy"'
      );
    });
  });
});
