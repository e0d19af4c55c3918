#!/usr/bin/env tsx

import { serverEnv } from '@/lib/env/server';
import { toPublicError } from '@/lib/errors/error';
import { describeArrayCredential } from '@/lib/credentials/schema';
import { logEvent } from '@/lib/logging/logger';

import { createFlashArrayRegistry } from '../flasharray/client';
import { USAGE, parseCliArgs } from './args';
import { createSshCommandChannel } from './client';
import { EXIT_FAILURE, runSync } from './sync';

import type { CliOptions } from './args';

const SSH_READY_TIMEOUT_MS = 20_000;

function buildRegistry(options: CliOptions) {
  if (!options.array) return null;
  return createFlashArrayRegistry({
    endpoint: options.array.endpoint,
    credential: options.array.credential,
    tlsVerify: options.array.tlsVerify,
    timeoutMs: options.registryTimeoutMs,
    apiVersion: options.apiVersion,
  });
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    const parsed = parseCliArgs(process.argv.slice(2), serverEnv);
    if (parsed.kind === 'help') {
      process.stdout.write(USAGE);
      return 0;
    }
    options = parsed.options;
  } catch (err) {
    const error = toPublicError(err);
    logEvent({
      level: 'error',
      service: 'cli',
      event_type: 'cli.invalid_arguments',
      error_code: error.code,
      message: error.message,
    });
    process.stderr.write(`${error.message}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }

  const controller = new AbortController();
  const onSigint = () => {
    logEvent({ level: 'warn', service: 'cli', event_type: 'cli.interrupted' });
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  logEvent({
    level: 'info',
    service: 'cli',
    event_type: 'sync.started',
    hmc: options.hmc.host,
    hmc_user: options.hmc.credential.username,
    managed_system: options.managedSystem ?? 'ALL',
    array: options.array?.endpoint ?? null,
    array_auth: options.array ? describeArrayCredential(options.array.credential) : null,
    dry_run: options.dryRun,
  });

  try {
    const result = await runSync(
      {
        ...(options.managedSystem ? { managedSystem: options.managedSystem } : {}),
        excludedLpars: options.excludedLpars,
        hostPrefix: options.hostPrefix,
        dryRun: options.dryRun,
        json: options.json,
        concurrency: options.concurrency,
        commandTimeoutMs: options.commandTimeoutMs,
        signal: controller.signal,
      },
      {
        channel: createSshCommandChannel({
          host: options.hmc.host,
          port: options.hmc.port,
          credential: options.hmc.credential,
          readyTimeoutMs: SSH_READY_TIMEOUT_MS,
        }),
        registry: buildRegistry(options),
        write: (line) => process.stdout.write(`${line}\n`),
      },
    );
    return result.exitCode;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const error = toPublicError(err);
    logEvent({
      level: 'error',
      service: 'cli',
      event_type: 'sync.failed',
      error_code: error.code,
      cause: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = EXIT_FAILURE;
  });
