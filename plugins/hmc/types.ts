import type { HmcCredentialInput } from '@/lib/credentials/schema';
import type { AppError } from '@/lib/errors/error';
import type { Inventory } from '@/lib/reconcile/types';

export type PortKind = 'wwpn' | 'mac';

export type PortIdentifier = {
  kind: PortKind;
  // Canonical form: uppercase 2-hex-digit groups joined by ':'.
  value: string;
};

export type CommandResult = {
  exitCode: number;
  stdoutLines: string[];
  stderr: string;
  // Set when the command never ran to completion on the HMC (connect/auth failure, timeout, abort).
  transport?: 'connect' | 'timeout' | 'aborted';
};

export type CommandOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export interface CommandChannel {
  execute(command: string, opts: CommandOptions): Promise<CommandResult>;
}

export type HmcCredential = HmcCredentialInput;

export type HmcConnectionOptions = {
  host: string;
  port: number;
  credential: HmcCredential;
  readyTimeoutMs: number;
};

export type FcRecord = { lpar: string; wwpns: string[] };
export type EthRecord = { lpar: string; macs: string[] };

export type MacDiscovery =
  | { kind: 'supported'; records: EthRecord[] }
  | { kind: 'unsupported'; error: AppError }
  | { kind: 'error'; error: AppError };

export type SystemDiscovery = {
  managedSystem: string;
  fc: FcRecord[];
  // Present when the FC listing failed; `fc` is then empty.
  fcError?: AppError;
  mac: MacDiscovery;
};

export type DiscoverOptions = {
  // Restrict discovery to one managed system; otherwise every system the HMC lists.
  managedSystem?: string;
  excludedLpars: ReadonlySet<string>;
  commandTimeoutMs: number;
  concurrency: number;
  signal?: AbortSignal;
};

export type InventoryResult = {
  inventory: Inventory;
  systems: string[];
  systemErrors: Array<{ managedSystem: string | null; error: AppError }>;
  cancelled: string[];
};
