import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';

import { z } from 'zod/v4';

import { ArrayCredentialSchema, HmcCredentialSchema, resolveArrayCredential } from '@/lib/credentials/schema';
import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, errorCause } from '@/lib/errors/error';

import type { serverEnv } from '@/lib/env/server';
import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type CliEnv = Pick<
  typeof serverEnv,
  | 'HMC_PASSWORD'
  | 'ARRAY_API_TOKEN'
  | 'ARRAY_PASSWORD'
  | 'HMC_SYNC_COMMAND_TIMEOUT_MS'
  | 'HMC_SYNC_REGISTRY_TIMEOUT_MS'
  | 'HMC_SYNC_MAX_PARALLEL'
  | 'HMC_SYNC_ARRAY_API_VERSION'
>;

export const USAGE = `Usage: hmc-sync -H <hmc> -u <hmc-user> (-w <password> | --hmc-key-file <path>) [options]

Discover LPAR WWPNs/MACs from an HMC and add missing WWPNs to FlashArray hosts (dry run unless --apply).

HMC:
  -H, --hmc <host>              HMC hostname or IP
      --hmc-port <port>         SSH port (default 22)
  -u, --hmc-user <user>         HMC username
  -w, --hmc-password <pass>     HMC password (or HMC_PASSWORD)
      --hmc-key-file <path>     private key file instead of a password
      --hmc-key-passphrase <p>  passphrase of the private key
  -m, --managed-system <name>   limit discovery to one managed system
      --exclude-lpar <a,b,...>  LPAR names to skip

Array:
  -P, --array <host>            FlashArray management address
      --array-api-token <tok>   API token (or ARRAY_API_TOKEN)
  -s, --array-user <user>       username, used when no API token is given
  -p, --array-password <pass>   password (or ARRAY_PASSWORD)
      --verify-ssl              verify the array certificate (default)
      --no-verify-ssl           skip certificate verification
      --host-prefix <prefix>    host name = prefix + LPAR name

Run:
      --apply                   perform the changes (default is a dry run)
      --json                    print the inventory as JSON at the end
      --concurrency <n>         parallel managed systems / hosts (default HMC_SYNC_MAX_PARALLEL)
  -h, --help                    show this help
`;

const CliOptionsSchema = z.object({
  hmc: z.object({
    host: z.string().trim().min(1, 'is required'),
    port: z.coerce.number().int().min(1).max(65535),
    credential: HmcCredentialSchema,
  }),
  array: z
    .object({
      endpoint: z.string().trim().min(1),
      credential: ArrayCredentialSchema,
      tlsVerify: z.boolean(),
    })
    .nullable(),
  managedSystem: z.string().trim().min(1).optional(),
  excludedLpars: z.array(z.string().min(1)),
  hostPrefix: z.string(),
  dryRun: z.boolean(),
  json: z.boolean(),
  concurrency: z.coerce.number().int().min(1).max(64),
  commandTimeoutMs: z.number().int().positive(),
  registryTimeoutMs: z.number().int().positive(),
  apiVersion: z.string().regex(/^2\.\d+$/),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type ParsedCli = { kind: 'help' } | { kind: 'run'; options: CliOptions };

function configError(message: string, code: ErrorCodeType = ErrorCode.CONFIG_INVALID): AppErrorException {
  return new AppErrorException({ code, category: 'config', message, retryable: false });
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return Array.from(new Set(value.split(',').map((v) => v.trim()).filter((v) => v.length > 0)));
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        hmc: { type: 'string', short: 'H' },
        'hmc-port': { type: 'string' },
        'hmc-user': { type: 'string', short: 'u' },
        'hmc-password': { type: 'string', short: 'w' },
        'hmc-key-file': { type: 'string' },
        'hmc-key-passphrase': { type: 'string' },
        'managed-system': { type: 'string', short: 'm' },
        'exclude-lpar': { type: 'string', multiple: true },
        array: { type: 'string', short: 'P' },
        'array-api-token': { type: 'string' },
        'array-user': { type: 'string', short: 's' },
        'array-password': { type: 'string', short: 'p' },
        'verify-ssl': { type: 'boolean' },
        'no-verify-ssl': { type: 'boolean' },
        'host-prefix': { type: 'string', default: '' },
        apply: { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
        concurrency: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    }).values;
  } catch (err) {
    throw configError(errorCause(err));
  }
}

/**
 * Turns argv plus environment into validated run options. Secrets given on the command line win
 * over the environment. Throws `AppErrorException` with a config error on invalid input.
 */
export function parseCliArgs(
  argv: string[],
  env: CliEnv,
  readKeyFile: (path: string) => string = (path) => readFileSync(path, 'utf8'),
): ParsedCli {
  const values = readArgv(argv);
  if (values.help) return { kind: 'help' };

  const hmcUser = values['hmc-user']?.trim() ?? '';
  const keyFile = values['hmc-key-file']?.trim();
  const hmcPassword = values['hmc-password'] ?? env.HMC_PASSWORD;

  let hmcCredential: unknown;
  if (keyFile) {
    let privateKey: string;
    try {
      privateKey = readKeyFile(keyFile);
    } catch (err) {
      throw configError(`cannot read --hmc-key-file: ${errorCause(err)}`);
    }
    const passphrase = values['hmc-key-passphrase'];
    hmcCredential = { kind: 'private_key', username: hmcUser, privateKey, ...(passphrase ? { passphrase } : {}) };
  } else if (hmcPassword) {
    hmcCredential = { kind: 'password', username: hmcUser, password: hmcPassword };
  } else {
    throw configError(
      'missing HMC password (--hmc-password, HMC_PASSWORD or --hmc-key-file)',
      ErrorCode.CONFIG_CREDENTIAL_MISSING,
    );
  }

  const arrayEndpoint = values.array?.trim();
  let array: unknown = null;
  if (arrayEndpoint) {
    const credential = resolveArrayCredential({
      apiToken: values['array-api-token'] ?? env.ARRAY_API_TOKEN,
      username: values['array-user'],
      password: values['array-password'] ?? env.ARRAY_PASSWORD,
    });
    if (!credential) {
      throw configError(
        'missing array credential (--array-api-token, ARRAY_API_TOKEN or --array-user with --array-password)',
        ErrorCode.CONFIG_CREDENTIAL_MISSING,
      );
    }
    array = { endpoint: arrayEndpoint, credential, tlsVerify: !values['no-verify-ssl'] };
  } else if (values.apply) {
    throw configError('--apply requires --array');
  }

  const excluded = (values['exclude-lpar'] ?? []).flatMap((v) => splitList(v));

  const parsed = CliOptionsSchema.safeParse({
    hmc: { host: values.hmc ?? '', port: values['hmc-port'] ?? 22, credential: hmcCredential },
    array,
    ...(values['managed-system'] ? { managedSystem: values['managed-system'] } : {}),
    excludedLpars: Array.from(new Set(excluded)),
    hostPrefix: values['host-prefix'] ?? '',
    dryRun: !values.apply,
    json: values.json ?? false,
    concurrency: values.concurrency ?? env.HMC_SYNC_MAX_PARALLEL,
    commandTimeoutMs: env.HMC_SYNC_COMMAND_TIMEOUT_MS,
    registryTimeoutMs: env.HMC_SYNC_REGISTRY_TIMEOUT_MS,
    apiVersion: env.HMC_SYNC_ARRAY_API_VERSION,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw configError(`invalid options: ${issues.join('; ')}`);
  }
  return { kind: 'run', options: parsed.data };
}
