import { mapLimit } from '@/lib/concurrency/map-limit';
import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';

import { listEthAdaptersCommand, listFcAdaptersCommand, listManagedSystemsCommand } from './commands';
import { looksLikeUnsupportedListing, toHmcCapabilityError, toHmcCommandError } from './errors';
import { parseEthLines, parseFcLines, parseManagedSystemLines } from './parse';

import type { Inventory, LogicalPartition } from '@/lib/reconcile/types';
import type { CommandChannel, DiscoverOptions, InventoryResult, MacDiscovery, SystemDiscovery } from './types';

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

async function discoverMacs(
  channel: CommandChannel,
  managedSystem: string,
  opts: { commandTimeoutMs: number; signal?: AbortSignal },
): Promise<MacDiscovery> {
  const result = await channel.execute(listEthAdaptersCommand(managedSystem), {
    timeoutMs: opts.commandTimeoutMs,
    signal: opts.signal,
  });
  if (result.exitCode === 0) return { kind: 'supported', records: parseEthLines(result.stdoutLines) };

  const stage = 'hmc.eth_listing';
  const unsupported = !result.transport && looksLikeUnsupportedListing(result.stderr);
  const error = unsupported ? toHmcCapabilityError(result, stage) : toHmcCommandError(result, stage);

  // MAC data is best-effort: any failure here is informational.
  logEvent({
    level: 'info',
    service: 'hmc',
    event_type: 'hmc.eth_listing_unavailable',
    managed_system: managedSystem,
    error_code: error.code,
    exit_code: result.exitCode,
    stderr_excerpt: excerpt(result.stderr),
  });
  return unsupported ? { kind: 'unsupported', error } : { kind: 'error', error };
}

/**
 * Runs the FC and Ethernet listings for one managed system. Never rejects; a failed FC listing
 * contributes zero LPARs.
 */
export async function discoverManagedSystem(
  channel: CommandChannel,
  managedSystem: string,
  opts: { commandTimeoutMs: number; signal?: AbortSignal },
): Promise<SystemDiscovery> {
  const fcResult = await channel.execute(listFcAdaptersCommand(managedSystem), {
    timeoutMs: opts.commandTimeoutMs,
    signal: opts.signal,
  });

  if (fcResult.exitCode !== 0) {
    logEvent({
      level: 'warn',
      service: 'hmc',
      event_type: 'hmc.fc_listing_failed',
      managed_system: managedSystem,
      exit_code: fcResult.exitCode,
      stderr_excerpt: excerpt(fcResult.stderr),
    });
    return {
      managedSystem,
      fc: [],
      fcError: toHmcCommandError(fcResult, 'hmc.fc_listing'),
      mac: await discoverMacs(channel, managedSystem, opts),
    };
  }

  return {
    managedSystem,
    fc: parseFcLines(fcResult.stdoutLines),
    mac: await discoverMacs(channel, managedSystem, opts),
  };
}

/**
 * Merges per-system discoveries in order. Excluded LPARs are dropped entirely. A name seen on a
 * later system replaces the earlier record; names are expected to be unique per HMC.
 */
export function aggregateInventory(discoveries: readonly SystemDiscovery[], excluded: ReadonlySet<string>): Inventory {
  const inventory: Inventory = new Map();

  for (const discovery of discoveries) {
    const macsByLpar = new Map<string, readonly string[]>();
    if (discovery.mac.kind === 'supported') {
      for (const record of discovery.mac.records) macsByLpar.set(record.lpar, record.macs);
    }

    for (const record of discovery.fc) {
      if (excluded.has(record.lpar)) continue;

      const previous = inventory.get(record.lpar);
      if (previous && previous.managedSystem !== discovery.managedSystem) {
        logEvent({
          level: 'warn',
          service: 'hmc',
          event_type: 'hmc.lpar_name_collision',
          lpar: record.lpar,
          previous_managed_system: previous.managedSystem,
          managed_system: discovery.managedSystem,
        });
      }

      const lpar: LogicalPartition = Object.freeze({
        name: record.lpar,
        managedSystem: discovery.managedSystem,
        wwpns: Object.freeze([...record.wwpns]),
        macs: Object.freeze([...(macsByLpar.get(record.lpar) ?? [])]),
      });
      inventory.set(record.lpar, lpar);
    }
  }

  return inventory;
}

function wasInterrupted(discovery: SystemDiscovery): boolean {
  if (discovery.fcError?.code === ErrorCode.RUN_CANCELLED) return true;
  return discovery.mac.kind === 'error' && discovery.mac.error.code === ErrorCode.RUN_CANCELLED;
}

async function resolveManagedSystems(
  channel: CommandChannel,
  opts: DiscoverOptions,
): Promise<{ ok: true; systems: string[] } | { ok: false; result: InventoryResult }> {
  if (opts.managedSystem) return { ok: true, systems: [opts.managedSystem] };

  const listing = await channel.execute(listManagedSystemsCommand(), {
    timeoutMs: opts.commandTimeoutMs,
    signal: opts.signal,
  });
  if (listing.exitCode === 0) return { ok: true, systems: parseManagedSystemLines(listing.stdoutLines) };

  logEvent({
    level: 'error',
    service: 'hmc',
    event_type: 'hmc.system_listing_failed',
    exit_code: listing.exitCode,
    stderr_excerpt: excerpt(listing.stderr),
  });
  return {
    ok: false,
    result: {
      inventory: new Map(),
      systems: [],
      systemErrors: [{ managedSystem: null, error: toHmcCommandError(listing, 'hmc.system_listing') }],
      cancelled: [],
    },
  };
}

/**
 * Lists managed systems (unless one is pinned) and discovers them through a bounded pool.
 * Each worker returns its own discovery; the merge into the inventory happens once, in system
 * order, after all workers finish.
 */
export async function discoverInventory(channel: CommandChannel, opts: DiscoverOptions): Promise<InventoryResult> {
  const resolved = await resolveManagedSystems(channel, opts);
  if (!resolved.ok) return resolved.result;

  const systems = resolved.systems;
  const unitOpts = { commandTimeoutMs: opts.commandTimeoutMs, signal: opts.signal };
  const results = await mapLimit(systems, { limit: opts.concurrency, signal: opts.signal }, (system) =>
    discoverManagedSystem(channel, system, unitOpts),
  );

  const completed: SystemDiscovery[] = [];
  const cancelled: string[] = [];
  const systemErrors: InventoryResult['systemErrors'] = [];

  results.forEach((res, i) => {
    const system = systems[i];
    // A unit interrupted mid-flight contributes nothing rather than a partial record.
    if (res.status === 'cancelled' || wasInterrupted(res.value)) {
      cancelled.push(system);
      return;
    }
    if (res.value.fcError) systemErrors.push({ managedSystem: system, error: res.value.fcError });
    completed.push(res.value);
  });

  if (cancelled.length > 0) {
    logEvent({ level: 'warn', service: 'hmc', event_type: 'hmc.discovery_cancelled', managed_systems: cancelled });
  }

  return {
    inventory: aggregateInventory(completed, opts.excludedLpars),
    systems,
    systemErrors,
    cancelled,
  };
}
