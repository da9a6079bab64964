import dotenv from 'dotenv';
import { LOG_LEVELS, type LogLevel } from '../../domain/ports/ILogger.js';

// Load environment variables from .env when present
dotenv.config();

export interface AppConfig {
  name: string;
  dashboard: {
    host: string;
    port: number;
  };
  timeouts: {
    /** Budget for (re)connecting, in ms */
    reconnect: number;
    /** Connect attempt and receive wait, in ms */
    io: number;
    /** Wait for a reply after a command, in ms */
    reply: number;
    settle: number;
    retry: number;
  };
  script: {
    enabled: boolean;
    port: number;
    /** Budget for one script send including any reconnect, in ms */
    reconnect: number;
  };
  http: {
    enabled: boolean;
    port: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

type Env = Record<string, string | undefined>;

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load configuration from the environment (and .env)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const level = getEnvOrDefault(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${level}")`);
  }

  return {
    name: getEnvOrDefault(env, 'CLIENT_NAME', 'robot-dashboard'),
    dashboard: {
      host: getEnvOrThrow(env, 'DASHBOARD_HOST'),
      port: getEnvNumber(env, 'DASHBOARD_PORT', 29999),
    },
    timeouts: {
      reconnect: getEnvNumber(env, 'RECONNECT_TIMEOUT_MS', 10000),
      io: getEnvNumber(env, 'IO_TIMEOUT_MS', 1000),
      reply: getEnvNumber(env, 'REPLY_TIMEOUT_MS', 1000),
      settle: getEnvNumber(env, 'SETTLE_DELAY_MS', 500),
      retry: getEnvNumber(env, 'RETRY_DELAY_MS', 100),
    },
    script: {
      enabled: getEnvBoolean(env, 'SCRIPT_ENABLED', true),
      port: getEnvNumber(env, 'SCRIPT_PORT', 30003),
      reconnect: getEnvNumber(env, 'SCRIPT_RECONNECT_TIMEOUT_MS', 2000),
    },
    http: {
      enabled: getEnvBoolean(env, 'HTTP_ENABLED', true),
      port: getEnvNumber(env, 'HTTP_PORT', 3000),
    },
    logging: {
      level,
      pretty: env.NODE_ENV !== 'production',
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (config.dashboard.host.trim() === '') {
    throw new Error('DASHBOARD_HOST must not be empty');
  }

  const ports: Array<[string, number]> = [
    ['DASHBOARD_PORT', config.dashboard.port],
    ['SCRIPT_PORT', config.script.port],
    ['HTTP_PORT', config.http.port],
  ];
  for (const [key, port] of ports) {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`${key} must be between 1 and 65535 (got ${port})`);
    }
  }

  const positive: Array<[string, number]> = [
    ['RECONNECT_TIMEOUT_MS', config.timeouts.reconnect],
    ['IO_TIMEOUT_MS', config.timeouts.io],
    ['REPLY_TIMEOUT_MS', config.timeouts.reply],
    ['SCRIPT_RECONNECT_TIMEOUT_MS', config.script.reconnect],
  ];
  for (const [key, value] of positive) {
    if (value <= 0) {
      throw new Error(`${key} must be greater than 0 (got ${value})`);
    }
  }

  if (config.timeouts.settle < 0 || config.timeouts.retry < 0) {
    throw new Error('SETTLE_DELAY_MS and RETRY_DELAY_MS must not be negative');
  }
}
