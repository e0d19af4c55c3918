import { afterEach, describe, expect, it, vi } from 'vitest';

const KEYS = ['HMC_SYNC_DEBUG', 'HMC_SYNC_MAX_PARALLEL', 'HMC_SYNC_LOG_LEVEL'] as const;

async function loadEnv(values: Partial<Record<(typeof KEYS)[number], string>>) {
  vi.resetModules();

  for (const key of KEYS) {
    const value = values[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }

  // The test setup disables validation globally; re-enable it to exercise parsing.
  const prevSkip = process.env.SKIP_ENV_VALIDATION;
  process.env.SKIP_ENV_VALIDATION = '';
  try {
    const { serverEnv } = await import('@/lib/env/server');
    return serverEnv;
  } finally {
    if (prevSkip === undefined) delete process.env.SKIP_ENV_VALIDATION;
    else process.env.SKIP_ENV_VALIDATION = prevSkip;
  }
}

describe('serverEnv', () => {
  afterEach(() => {
    for (const key of KEYS) delete process.env[key];
  });

  it('parses HMC_SYNC_DEBUG (true/false/1/0; case-insensitive) and defaults to false', async () => {
    expect((await loadEnv({})).HMC_SYNC_DEBUG).toBe(false);
    expect((await loadEnv({ HMC_SYNC_DEBUG: 'TRUE' })).HMC_SYNC_DEBUG).toBe(true);
    expect((await loadEnv({ HMC_SYNC_DEBUG: '0' })).HMC_SYNC_DEBUG).toBe(false);
    expect((await loadEnv({ HMC_SYNC_DEBUG: '1' })).HMC_SYNC_DEBUG).toBe(true);
  });

  it('coerces HMC_SYNC_MAX_PARALLEL and applies defaults', async () => {
    const env = await loadEnv({ HMC_SYNC_MAX_PARALLEL: '8' });
    expect(env.HMC_SYNC_MAX_PARALLEL).toBe(8);
    expect(env.HMC_SYNC_COMMAND_TIMEOUT_MS).toBe(30_000);
    expect(env.HMC_SYNC_ARRAY_API_VERSION).toBe('2.4');
  });

  it('rejects invalid HMC_SYNC_DEBUG values', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await expect(loadEnv({ HMC_SYNC_DEBUG: 'yes' })).rejects.toThrow();
    spy.mockRestore();
  });

  it('accepts a known HMC_SYNC_LOG_LEVEL and rejects an unknown one', async () => {
    expect((await loadEnv({})).HMC_SYNC_LOG_LEVEL).toBe('info');
    expect((await loadEnv({ HMC_SYNC_LOG_LEVEL: 'warn' })).HMC_SYNC_LOG_LEVEL).toBe('warn');

    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await expect(loadEnv({ HMC_SYNC_LOG_LEVEL: 'verbose' })).rejects.toThrow('Invalid environment variables');
    spy.mockRestore();
  });
});
