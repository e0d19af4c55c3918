import { mapLimit } from '@/lib/concurrency/map-limit';
import { toAppError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { applyPlan } from '@/lib/reconcile/execute';
import { buildPlan, hostNameFor, plannedMutations } from '@/lib/reconcile/plan';

import { discoverInventory } from './inventory';
import { formatLparLine, formatOutcomeLine, inventoryToJson } from './report';

import type { HostOutcome, HostRegistry, Inventory, ReconciliationPlan } from '@/lib/reconcile/types';
import type { CommandChannel } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_LPARS = 2;

export type SyncOptions = {
  managedSystem?: string;
  excludedLpars: readonly string[];
  hostPrefix: string;
  dryRun: boolean;
  json: boolean;
  concurrency: number;
  commandTimeoutMs: number;
  signal?: AbortSignal;
};

export type SyncRegistry = HostRegistry & { logout?(): Promise<void> };

export type SyncDeps = {
  channel: CommandChannel;
  // `null` when no array is configured: registry state is then empty and only a dry run makes sense.
  registry: SyncRegistry | null;
  // Receives one report line at a time, without trailing newline.
  write: (line: string) => void;
};

export type SyncResult = {
  exitCode: number;
  inventory: Inventory;
  plan: ReconciliationPlan;
  outcomes: HostOutcome[];
};

type StateRead = { host: string; lpar: string } & (
  | { ok: true; wwpns: ReadonlySet<string> }
  | { ok: false; outcome: HostOutcome }
);

/**
 * Reads the current WWPNs of each host the inventory maps to. A failed read marks only that host
 * as failed; hosts not reached before cancellation are reported as cancelled.
 */
async function readRegistryState(
  inventory: Inventory,
  hostPrefix: string,
  registry: SyncRegistry,
  opts: { concurrency: number; signal?: AbortSignal },
): Promise<{ state: Map<string, ReadonlySet<string>>; failures: Map<string, HostOutcome> }> {
  const targets = Array.from(inventory.values())
    .filter((lpar) => lpar.wwpns.length > 0)
    .map((lpar) => ({ host: hostNameFor(hostPrefix, lpar.name), lpar: lpar.name }));

  const reads = await mapLimit(
    targets,
    { limit: opts.concurrency, signal: opts.signal },
    async ({ host, lpar }): Promise<StateRead> => {
      try {
        const record = await registry.getHost(host);
        return { host, lpar, ok: true, wwpns: record?.wwpns ?? new Set<string>() };
      } catch (err) {
        const error = toAppError(err, 'array.read_host');
        logEvent({
          level: 'error',
          service: 'reconcile',
          event_type: 'host.read_failed',
          host,
          lpar,
          error_code: error.code,
          error_message: error.message,
        });
        return { host, lpar, ok: false, outcome: { host, lpar, status: 'failed', error } };
      }
    },
  );

  const state = new Map<string, ReadonlySet<string>>();
  const failures = new Map<string, HostOutcome>();
  reads.forEach((read, i) => {
    const { host, lpar } = targets[i];
    if (read.status === 'cancelled') {
      failures.set(host, { host, lpar, status: 'cancelled' });
      return;
    }
    if (read.value.ok) state.set(host, read.value.wwpns);
    else failures.set(host, read.value.outcome);
  });
  return { state, failures };
}

/**
 * One full invocation: discover, report, read registry state, plan, apply (or dry run), report.
 * Returns the process exit code instead of exiting.
 */
export async function runSync(opts: SyncOptions, deps: SyncDeps): Promise<SyncResult> {
  const start = Date.now();
  const { write, registry } = deps;

  try {
    const discovery = await discoverInventory(deps.channel, {
      ...(opts.managedSystem ? { managedSystem: opts.managedSystem } : {}),
      excludedLpars: new Set(opts.excludedLpars),
      commandTimeoutMs: opts.commandTimeoutMs,
      concurrency: opts.concurrency,
      signal: opts.signal,
    });
    const inventory = discovery.inventory;

    if (inventory.size === 0 && opts.signal?.aborted) {
      logEvent({
        level: 'warn',
        service: 'cli',
        event_type: 'sync.cancelled',
        duration_ms: Date.now() - start,
        managed_systems: discovery.cancelled,
      });
      return { exitCode: EXIT_FAILURE, inventory, plan: new Map(), outcomes: [] };
    }

    if (inventory.size === 0) {
      logEvent({
        level: 'error',
        service: 'cli',
        event_type: 'sync.no_lpars',
        message: 'No LPARs discovered. Check HMC credentials/filters.',
        managed_systems: discovery.systems,
        system_errors: discovery.systemErrors.map((e) => ({ managed_system: e.managedSystem, code: e.error.code })),
      });
      return { exitCode: EXIT_NO_LPARS, inventory, plan: new Map(), outcomes: [] };
    }

    const lpars = Array.from(inventory.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const lpar of lpars) write(formatLparLine(lpar, hostNameFor(opts.hostPrefix, lpar.name)));

    const { state, failures } = registry
      ? await readRegistryState(inventory, opts.hostPrefix, registry, opts)
      : { state: new Map<string, ReadonlySet<string>>(), failures: new Map<string, HostOutcome>() };

    const plan = buildPlan(inventory, opts.hostPrefix, state);
    const runnable: ReconciliationPlan = new Map(Array.from(plan).filter(([host]) => !failures.has(host)));

    logEvent({
      level: 'info',
      service: 'reconcile',
      event_type: 'sync.planned',
      lpars: inventory.size,
      hosts: plan.size,
      mutations: plannedMutations(runnable),
      dry_run: opts.dryRun,
    });

    const applied = await applyPlan(runnable, registry, {
      dryRun: opts.dryRun,
      concurrency: opts.concurrency,
      signal: opts.signal,
    });
    const byHost = new Map(applied.map((outcome) => [outcome.host, outcome]));
    const outcomes: HostOutcome[] = [];
    for (const host of plan.keys()) {
      const outcome = failures.get(host) ?? byHost.get(host);
      if (outcome) outcomes.push(outcome);
    }

    for (const outcome of outcomes) write(formatOutcomeLine(outcome));
    if (opts.json) write(inventoryToJson(inventory));

    const cancelled = opts.signal?.aborted ?? false;
    logEvent({
      level: cancelled ? 'warn' : 'info',
      service: 'cli',
      event_type: cancelled ? 'sync.cancelled' : 'sync.completed',
      duration_ms: Date.now() - start,
      lpars: inventory.size,
      applied: outcomes.filter((o) => o.status === 'applied').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
      unchanged: outcomes.filter((o) => o.status === 'unchanged').length,
    });
    write('[DONE]');

    return { exitCode: cancelled ? EXIT_FAILURE : EXIT_OK, inventory, plan, outcomes };
  } finally {
    if (registry?.logout) await registry.logout();
  }
}
