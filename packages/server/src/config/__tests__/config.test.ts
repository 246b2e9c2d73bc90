import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, parseCliArgs, resolveLogLevel } from '../config.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should fall back to defaults', () => {
      expect(loadConfig({}, {})).toEqual({
        port: 3000,
        lmstudioUrl: 'http://localhost:1234',
        bindAll: false,
        corsEnabled: false,
        logLevel: undefined,
        upstreamTimeoutMs: 300000,
        logFile: undefined,
        nodeEnv: 'production',
      });
    });

    it('should read environment variables', () => {
      const config = loadConfig(
        {},
        {
          PORT: '8080',
          LMSTUDIO_URL: 'http://gpu-box:1234',
          BIND_ALL: '1',
          CORS_ENABLED: 'YES',
          LOG_LEVEL: 'warn',
          UPSTREAM_TIMEOUT_MS: '0',
          LOG_FILE: 'logs/proxy.log',
          NODE_ENV: 'development',
        }
      );

      expect(config).toEqual({
        port: 8080,
        lmstudioUrl: 'http://gpu-box:1234',
        bindAll: true,
        corsEnabled: true,
        logLevel: 'warn',
        upstreamTimeoutMs: 0,
        logFile: 'logs/proxy.log',
        nodeEnv: 'development',
      });
    });

    it('should let CLI flags override environment variables', () => {
      const config = loadConfig(
        { port: 9000, lmstudioUrl: 'http://cli-host:1234', cors: false, upstreamTimeout: 1000 },
        { PORT: '8080', LMSTUDIO_URL: 'http://env-host:1234', CORS_ENABLED: 'true', UPSTREAM_TIMEOUT_MS: '5' }
      );

      expect(config.port).toBe(9000);
      expect(config.lmstudioUrl).toBe('http://cli-host:1234');
      expect(config.corsEnabled).toBe(false);
      expect(config.upstreamTimeoutMs).toBe(1000);
    });

    it('should treat unrecognised boolean strings as false', () => {
      expect(loadConfig({}, { BIND_ALL: 'false' }).bindAll).toBe(false);
      expect(loadConfig({}, { BIND_ALL: 'on' }).bindAll).toBe(false);
      expect(loadConfig({}, { BIND_ALL: ' True ' }).bindAll).toBe(true);
    });

    it('should strip trailing slashes from the upstream URL', () => {
      expect(loadConfig({ lmstudioUrl: 'http://localhost:1234//' }, {}).lmstudioUrl).toBe('http://localhost:1234');
    });

    it('should ignore an empty LOG_FILE', () => {
      expect(loadConfig({}, { LOG_FILE: '' }).logFile).toBeUndefined();
    });

    it('should reject an out-of-range port', () => {
      expect(() => loadConfig({ port: 70000 }, {})).toThrow(ConfigError);
    });

    it('should name every invalid field', () => {
      try {
        loadConfig({}, { PORT: 'abc', LMSTUDIO_URL: 'not a url' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(Object.keys(error.fieldErrors).sort()).toEqual(['lmstudioUrl', 'port']);
          expect(error.message).toMatch(/^Invalid configuration: /);
        }
      }
    });

    it('should reject an unknown log level', () => {
      expect(() => loadConfig({}, { LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    });
  });

  describe('parseCliArgs', () => {
    it('should read long flags', () => {
      expect(
        parseCliArgs([
          '--port',
          '4000',
          '--lmstudio-url',
          'http://gpu-box:1234',
          '--bind-all',
          '--cors',
          '--log-level',
          'debug',
          '--upstream-timeout',
          '60000',
        ])
      ).toEqual({
        port: 4000,
        lmstudioUrl: 'http://gpu-box:1234',
        bindAll: true,
        cors: true,
        logLevel: 'debug',
        upstreamTimeout: 60000,
      });
    });

    it('should read short flags', () => {
      const args = parseCliArgs(['-p', '4001', '-l', 'http://gpu-box:1234', '-b', '-c']);

      expect(args.port).toBe(4001);
      expect(args.lmstudioUrl).toBe('http://gpu-box:1234');
      expect(args.bindAll).toBe(true);
      expect(args.cors).toBe(true);
    });

    it('should leave unset flags undefined so the environment applies', () => {
      const args = parseCliArgs([]);

      expect(args.port).toBeUndefined();
      expect(args.bindAll).toBeUndefined();
      expect(loadConfig(args, { BIND_ALL: 'true' }).bindAll).toBe(true);
    });
  });

  describe('resolveLogLevel', () => {
    it('should use debug in development and info otherwise', () => {
      expect(resolveLogLevel(loadConfig({}, { NODE_ENV: 'development' }))).toBe('debug');
      expect(resolveLogLevel(loadConfig({}, { NODE_ENV: 'production' }))).toBe('info');
    });

    it('should prefer an explicit level', () => {
      expect(resolveLogLevel(loadConfig({ logLevel: 'error' }, { NODE_ENV: 'development' }))).toBe('error');
    });
  });
});
