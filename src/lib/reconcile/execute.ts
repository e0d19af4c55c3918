import { mapLimit } from '@/lib/concurrency/map-limit';
import { ErrorCode } from '@/lib/errors/error-codes';
import { toAppError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import type { HostOutcome, HostRegistry, PlannedHost, ReconciliationPlan } from '@/lib/reconcile/types';

export type ApplyOptions = {
  dryRun: boolean;
  concurrency: number;
  signal?: AbortSignal;
};

async function applyHost(entry: PlannedHost, registry: HostRegistry): Promise<HostOutcome> {
  const { host, lpar, toAdd } = entry;
  let stage = 'array.get_host';

  try {
    let created = false;
    const existing = await registry.getHost(host);
    if (!existing) {
      stage = 'array.create_host';
      await registry.createHost(host);
      created = true;
    }

    stage = 'array.add_wwns';
    await registry.addWwpns(host, toAdd);

    logEvent({
      level: 'info',
      service: 'reconcile',
      event_type: 'host.applied',
      host,
      lpar,
      created,
      added: toAdd.length,
      wwpns: [...toAdd],
    });
    return { host, lpar, status: 'applied', added: toAdd.length, created };
  } catch (err) {
    const error = toAppError(err, stage);
    logEvent({
      level: 'error',
      service: 'reconcile',
      event_type: 'host.failed',
      host,
      lpar,
      stage,
      error_code: error.code,
      error_message: error.message,
      ...(error.redacted_context ? { context: error.redacted_context } : {}),
    });
    return { host, lpar, status: 'failed', error };
  }
}

async function runEntry(entry: PlannedHost, registry: HostRegistry | null, dryRun: boolean): Promise<HostOutcome> {
  const { host, lpar, toAdd } = entry;
  if (toAdd.length === 0) return { host, lpar, status: 'unchanged' };

  if (dryRun) {
    logEvent({
      level: 'info',
      service: 'reconcile',
      event_type: 'host.dry_run',
      host,
      lpar,
      would_add: toAdd.length,
    });
    return { host, lpar, status: 'dry_run', would_add: toAdd.length, wwpns: toAdd };
  }

  if (!registry) {
    return {
      host,
      lpar,
      status: 'failed',
      error: {
        code: ErrorCode.CONFIG_INVALID,
        category: 'config',
        message: 'no host registry configured',
        retryable: false,
      },
    };
  }

  return applyHost(entry, registry);
}

/**
 * Applies the plan host by host. One host's failure never stops the others, and nothing is
 * retried within a run. In dry-run mode the registry is not called at all.
 */
export async function applyPlan(
  plan: ReconciliationPlan,
  registry: HostRegistry | null,
  opts: ApplyOptions,
): Promise<HostOutcome[]> {
  const entries = Array.from(plan.values());

  const results = await mapLimit(entries, { limit: opts.concurrency, signal: opts.signal }, (entry) =>
    runEntry(entry, registry, opts.dryRun),
  );

  return results.map((res, i): HostOutcome => {
    if (res.status === 'done') return res.value;
    const entry = entries[i];
    return { host: entry.host, lpar: entry.lpar, status: 'cancelled' };
  });
}
