import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => v === 'true' || v === 'false' || v === '1' || v === '0', { message: 'expected true/false/1/0' })
  .transform((v) => v === 'true' || v === '1');

export const serverEnv = createEnv({
  server: {
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // Secrets may come from the environment instead of the command line.
    HMC_PASSWORD: z.string().min(1).optional(),
    ARRAY_API_TOKEN: z.string().min(1).optional(),
    ARRAY_PASSWORD: z.string().min(1).optional(),

    HMC_SYNC_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    HMC_SYNC_REGISTRY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    HMC_SYNC_MAX_PARALLEL: z.coerce.number().int().positive().default(4),
    HMC_SYNC_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    HMC_SYNC_ARRAY_API_VERSION: z
      .string()
      .regex(/^2\.\d+$/)
      .default('2.4'),
    HMC_SYNC_DEBUG: booleanFlag.default(false),
  },
  runtimeEnv: process.env,
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  emptyStringAsUndefined: true,
});
