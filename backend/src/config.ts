import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';

dotenv.config();

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  logLevel: LogLevel;
  wordlistDir: string;
  pollTimeoutMs: number;
  sweepIntervalMs: number;
  playerIdleMs: number;
  gameRetentionMs: number;
}

const DEFAULT_WORDLIST_DIR = fileURLToPath(new URL('../wordlists', import.meta.url));

const isLogLevel = (value: string): value is LogLevel => (LOG_LEVELS as readonly string[]).includes(value);

const getNumber = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid environment variable: ${key}`);
  }
  return value;
};

const getLogLevel = (env: NodeJS.ProcessEnv): LogLevel => {
  const raw = env.LOG_LEVEL || 'info';
  if (!isLogLevel(raw)) {
    throw new Error('Invalid environment variable: LOG_LEVEL');
  }
  return raw;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => ({
  port: getNumber(env, 'PORT', 9091),
  corsOrigin: env.CORS_ORIGIN || '*',
  logLevel: getLogLevel(env),
  wordlistDir: env.WORDLIST_DIR || DEFAULT_WORDLIST_DIR,
  pollTimeoutMs: getNumber(env, 'POLL_TIMEOUT_MS', 25_000),
  sweepIntervalMs: getNumber(env, 'SWEEP_INTERVAL_MS', 10 * 60_000),
  playerIdleMs: getNumber(env, 'PLAYER_IDLE_MS', 60_000),
  gameRetentionMs: getNumber(env, 'GAME_RETENTION_MS', 24 * 60 * 60_000)
});
