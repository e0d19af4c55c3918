import type { HostOutcome, Inventory, LogicalPartition } from '@/lib/reconcile/types';

function joinOrDash(values: readonly string[]): string {
  return values.length > 0 ? values.join(',') : '-';
}

export function formatLparLine(lpar: LogicalPartition, host: string): string {
  return `[LPAR] ${lpar.name}  WWPNs=${joinOrDash(lpar.wwpns)}  MACs=${joinOrDash(lpar.macs)}  -> host=${host}`;
}

export function formatOutcomeLine(outcome: HostOutcome): string {
  switch (outcome.status) {
    case 'unchanged':
      return `[SKIP] host=${outcome.host} up to date`;
    case 'dry_run':
      return `[DRY-RUN] host=${outcome.host} would_add=${outcome.would_add} wwpns=${outcome.wwpns.join(',')}`;
    case 'applied':
      return `[OK] host=${outcome.host} added=${outcome.added}${outcome.created ? ' created' : ''}`;
    case 'failed':
      return `[ERROR] host=${outcome.host} ${outcome.error.code}: ${outcome.error.message}`;
    case 'cancelled':
      return `[CANCELLED] host=${outcome.host}`;
  }
}

/** `{ lpar: { wwpns, macs } }` ordered by LPAR name. */
export function inventoryToJson(inventory: Inventory): string {
  const out: Record<string, { wwpns: readonly string[]; macs: readonly string[] }> = {};
  for (const name of Array.from(inventory.keys()).sort()) {
    const lpar = inventory.get(name);
    if (lpar) out[name] = { wwpns: lpar.wwpns, macs: lpar.macs };
  }
  return JSON.stringify(out, null, 2);
}
