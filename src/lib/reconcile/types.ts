import type { AppError } from '@/lib/errors/error';

export type LogicalPartition = {
  readonly name: string;
  readonly managedSystem: string;
  // Discovery order, duplicate-free, canonical form.
  readonly wwpns: readonly string[];
  readonly macs: readonly string[];
};

export type Inventory = Map<string, LogicalPartition>;

export type HostRecord = {
  name: string;
  // Canonical WWPNs currently registered on the host.
  wwpns: ReadonlySet<string>;
};

/** The remote host registry the reconciliation reads and extends. It is never asked to remove ports. */
export interface HostRegistry {
  /** `null` when the host does not exist. */
  getHost(name: string): Promise<HostRecord | null>;
  createHost(name: string): Promise<HostRecord>;
  addWwpns(name: string, wwpns: readonly string[]): Promise<void>;
}

export type RegistryState = ReadonlyMap<string, ReadonlySet<string>>;

export type PlannedHost = {
  host: string;
  lpar: string;
  // Inventory order, duplicate-free, none already registered.
  toAdd: readonly string[];
};

export type ReconciliationPlan = Map<string, PlannedHost>;

export type HostOutcome =
  | { host: string; lpar: string; status: 'unchanged' }
  | { host: string; lpar: string; status: 'dry_run'; would_add: number; wwpns: readonly string[] }
  | { host: string; lpar: string; status: 'applied'; added: number; created: boolean }
  | { host: string; lpar: string; status: 'failed'; error: AppError }
  | { host: string; lpar: string; status: 'cancelled' };
