import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig } from './Config.js';

describe('Config', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        server: { port: 3000, host: '0.0.0.0' },
        desk: {
          id: 'visitor-desk',
          officeName: 'the office',
          cardTitle: 'SideSlacker',
          directoryFile: 'config/directory.json',
        },
        session: { idleTtlMs: 1800000 },
        dialog: { oneShotSessionFallback: true, notifyOncePerSession: true },
        notification: { socketUrl: '', apiKey: '', timeoutMs: 10000, enabled: false },
        logging: { level: 'info', pretty: true },
      });
    });

    it('should read values from the environment', () => {
      const config = loadConfig({
        PORT: '8080',
        OFFICE_NAME: 'Harbor Street',
        NOTIFY_SOCKET_URL: 'https://relay.example.com',
        NOTIFY_API_KEY: 'test-secret',
        ONE_SHOT_SESSION_FALLBACK: 'false',
        NOTIFY_ONCE_PER_SESSION: 'no',
        SESSION_IDLE_TTL_MS: '60000',
        LOG_LEVEL: 'DEBUG',
        NODE_ENV: 'production',
      });

      expect(config.server.port).toBe(8080);
      expect(config.desk.officeName).toBe('Harbor Street');
      expect(config.notification).toEqual({
        socketUrl: 'https://relay.example.com',
        apiKey: 'test-secret',
        timeoutMs: 10000,
        enabled: true,
      });
      expect(config.dialog).toEqual({ oneShotSessionFallback: false, notifyOncePerSession: false });
      expect(config.session).toEqual({ idleTtlMs: 60000 });
      expect(config.logging).toEqual({ level: 'debug', pretty: false });
    });

    it('should fall back on unparseable numbers and booleans', () => {
      const config = loadConfig({ PORT: 'eighty', ONE_SHOT_SESSION_FALLBACK: 'maybe' });

      expect(config.server.port).toBe(3000);
      expect(config.dialog.oneShotSessionFallback).toBe(true);
    });

    it('should reject an unknown log level', () => {
      expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(
        'LOG_LEVEL must be one of trace, debug, info, warn, error, fatal (got "loud")'
      );
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(() => validateConfig(loadConfig({}))).not.toThrow();
    });

    it('should reject a relay URL with an unsupported scheme', () => {
      const config = loadConfig({ NOTIFY_SOCKET_URL: 'ftp://relay', NOTIFY_API_KEY: 'test-secret' });

      expect(() => validateConfig(config)).toThrow(
        'NOTIFY_SOCKET_URL must start with http://, https://, ws:// or wss://'
      );
    });

    it('should require an API key when a relay is configured', () => {
      const config = loadConfig({ NOTIFY_SOCKET_URL: 'wss://relay.example.com' });

      expect(() => validateConfig(config)).toThrow('NOTIFY_API_KEY is required when NOTIFY_SOCKET_URL is set');
    });

    it('should reject an out-of-range port', () => {
      expect(() => validateConfig(loadConfig({ PORT: '70000' }))).toThrow('PORT must be between 0 and 65535');
    });

    it('should reject a non-positive session idle timeout', () => {
      expect(() => validateConfig(loadConfig({ SESSION_IDLE_TTL_MS: '-5' }))).toThrow(
        'SESSION_IDLE_TTL_MS must be a positive number of milliseconds'
      );
    });

    it('should reject a non-positive timeout', () => {
      expect(() => validateConfig(loadConfig({ NOTIFY_TIMEOUT_MS: '0' }))).toThrow(
        'NOTIFY_TIMEOUT_MS must be a positive number of milliseconds'
      );
    });
  });
});
