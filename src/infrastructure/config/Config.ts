import dotenv from 'dotenv';
import { isLogLevel, type LogLevel } from '../../domain/ports/ILogger.js';

// Load environment variables from .env when present
dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  server: {
    port: number;
    host: string;
  };
  desk: {
    /** Identifies this desk to the notification relay */
    id: string;
    officeName: string;
    cardTitle: string;
    directoryFile: string;
  };
  session: {
    /** Conversations untouched for this long are dropped */
    idleTtlMs: number;
  };
  dialog: {
    oneShotSessionFallback: boolean;
    notifyOncePerSession: boolean;
  };
  notification: {
    socketUrl: string;
    apiKey: string;
    timeoutMs: number;
    enabled: boolean;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value && value.trim() ? value.trim() : defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return defaultValue;
  if (['true', '1', 'yes', 'on'].includes(value)) return true;
  if (['false', '0', 'no', 'off'].includes(value)) return false;
  return defaultValue;
}

function getLogLevel(env: Env): LogLevel {
  const value = getEnvOrDefault(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(value)) {
    throw new Error(`LOG_LEVEL must be one of trace, debug, info, warn, error, fatal (got "${value}")`);
  }
  return value;
}

/**
 * Load configuration from the environment (and .env in development)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const socketUrl = env.NOTIFY_SOCKET_URL?.trim() ?? '';
  const apiKey = env.NOTIFY_API_KEY?.trim() ?? '';

  return {
    server: {
      port: getEnvNumber(env, 'PORT', 3000),
      host: getEnvOrDefault(env, 'HOST', '0.0.0.0'),
    },
    desk: {
      id: getEnvOrDefault(env, 'DESK_ID', 'visitor-desk'),
      officeName: getEnvOrDefault(env, 'OFFICE_NAME', 'the office'),
      cardTitle: getEnvOrDefault(env, 'CARD_TITLE', 'SideSlacker'),
      directoryFile: getEnvOrDefault(env, 'DIRECTORY_FILE', 'config/directory.json'),
    },
    session: {
      idleTtlMs: getEnvNumber(env, 'SESSION_IDLE_TTL_MS', 1800000),
    },
    dialog: {
      oneShotSessionFallback: getEnvBoolean(env, 'ONE_SHOT_SESSION_FALLBACK', true),
      notifyOncePerSession: getEnvBoolean(env, 'NOTIFY_ONCE_PER_SESSION', true),
    },
    notification: {
      socketUrl,
      apiKey,
      timeoutMs: getEnvNumber(env, 'NOTIFY_TIMEOUT_MS', 10000),
      enabled: !!socketUrl,
    },
    logging: {
      level: getLogLevel(env),
      pretty: env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test',
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (config.server.port < 0 || config.server.port > 65535) {
    throw new Error('PORT must be between 0 and 65535');
  }

  if (config.notification.enabled) {
    const url = config.notification.socketUrl;
    if (!/^(https?|wss?):\/\//.test(url)) {
      throw new Error('NOTIFY_SOCKET_URL must start with http://, https://, ws:// or wss://');
    }

    if (!config.notification.apiKey) {
      throw new Error('NOTIFY_API_KEY is required when NOTIFY_SOCKET_URL is set');
    }
  }

  if (config.session.idleTtlMs <= 0) {
    throw new Error('SESSION_IDLE_TTL_MS must be a positive number of milliseconds');
  }

  if (config.notification.timeoutMs <= 0) {
    throw new Error('NOTIFY_TIMEOUT_MS must be a positive number of milliseconds');
  }
}
