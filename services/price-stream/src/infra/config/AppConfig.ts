import type { RetryPolicy } from '@/infra/reconnect/BackoffStrategy';
import { DEFAULT_RETRY_POLICY } from '@/infra/reconnect/BackoffStrategy';
import { BINANCE_STREAM_URL } from '@/infra/adapters/binance/BinanceFeedAdapter';

type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  feedUrl: string;
  coldReadTimeoutMs: number;
  retryPolicy: RetryPolicy;
  logLevel: string;
  nodeEnv: string;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * 任意の環境変数を取得する。未設定または空文字ならデフォルト値を返す。
 */
function optionalEnv(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

/**
 * 整数の環境変数を取得する。
 * @throws {Error} 整数でない、または min 未満の場合
 */
function intEnv(env: Env, key: string, fallback: number, min: number): number {
  const raw = optionalEnv(env, key, String(fallback));
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`Invalid environment variable ${key}: "${raw}" is not an integer`);
  }
  const value = Number(raw);
  if (value < min) {
    throw new Error(`Invalid environment variable ${key}: must be >= ${min}`);
  }
  return value;
}

function parseRetryMode(raw: string): RetryPolicy['mode'] {
  if (raw === 'fixed' || raw === 'exponential') {
    return raw;
  }
  throw new Error(`Invalid environment variable RECONNECT_MODE: "${raw}" (expected fixed or exponential)`);
}

/**
 * 環境変数から起動設定を組み立てる。不正な値は起動時に即座に失敗させる。
 * @param env 環境変数（省略時は process.env）
 * @throws {Error} 値が不正な場合
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = optionalEnv(env, 'LOG_LEVEL', 'info');
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new Error(`Invalid environment variable LOG_LEVEL: "${logLevel}"`);
  }

  const feedUrl = optionalEnv(env, 'FEED_URL', BINANCE_STREAM_URL);
  if (!/^wss?:\/\//.test(feedUrl)) {
    throw new Error(`Invalid environment variable FEED_URL: "${feedUrl}" (expected ws:// or wss://)`);
  }

  const baseDelayMs = intEnv(env, 'RECONNECT_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs, 0);
  const maxDelayMs = intEnv(env, 'RECONNECT_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs, 0);
  if (maxDelayMs < baseDelayMs) {
    throw new Error('Invalid environment variable RECONNECT_MAX_DELAY_MS: must be >= RECONNECT_BASE_DELAY_MS');
  }
  const maxAttempts =
    optionalEnv(env, 'RECONNECT_MAX_ATTEMPTS', '') === ''
      ? Number.POSITIVE_INFINITY
      : intEnv(env, 'RECONNECT_MAX_ATTEMPTS', 0, 1);

  return {
    port: intEnv(env, 'PORT', 3000, 0),
    feedUrl,
    coldReadTimeoutMs: intEnv(env, 'COLD_READ_TIMEOUT_MS', 10_000, 1),
    retryPolicy: {
      mode: parseRetryMode(optionalEnv(env, 'RECONNECT_MODE', DEFAULT_RETRY_POLICY.mode)),
      baseDelayMs,
      maxDelayMs,
      maxAttempts,
    },
    logLevel,
    nodeEnv: optionalEnv(env, 'NODE_ENV', 'development'),
  };
}
