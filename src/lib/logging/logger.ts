import { serverEnv } from '@/lib/env/server';
import { redactJsonSecrets } from '@/lib/redaction/redact-json';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ServiceName = 'cli' | 'hmc' | 'array' | 'reconcile';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

const EXCERPT_LIMIT = 2000;

function levelRank(level: LogLevel): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  if (level === 'warn') return 30;
  return 40;
}

function getEnv() {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'development';
}

function getVersion() {
  return process.env.HMC_SYNC_VERSION ?? process.env.GIT_SHA ?? 'unknown';
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function getMinLevel(): LogLevel {
  // serverEnv rejects an unknown level at startup; unset only when validation is skipped.
  const level: unknown = serverEnv.HMC_SYNC_LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

/**
 * Emits one JSON line on stderr. Stdout is reserved for the run report and the inventory dump.
 */
export function logEvent(input: LogEventInput) {
  if (levelRank(input.level) < levelRank(getMinLevel())) return;

  const base = {
    ts: new Date().toISOString(),
    env: getEnv(),
    version: getVersion(),
    ...input,
  };

  const event = truncateExcerptsDeep(redactJsonSecrets(base));
  console.error(JSON.stringify(event));
}
