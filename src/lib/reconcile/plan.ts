import type { Inventory, PlannedHost, ReconciliationPlan, RegistryState } from '@/lib/reconcile/types';

export function hostNameFor(hostPrefix: string, lparName: string): string {
  return `${hostPrefix}${lparName}`;
}

/**
 * Computes the additive port changes per host. Pure: the same inventory and registry state always
 * give the same plan, and a host whose WWPNs are all registered gets an empty `toAdd`.
 *
 * LPARs without WWPNs have nothing to reconcile and are left out. A host missing from
 * `registryState` is treated as having no ports (it will be created first).
 */
export function buildPlan(inventory: Inventory, hostPrefix: string, registryState: RegistryState): ReconciliationPlan {
  const plan: ReconciliationPlan = new Map();

  for (const lpar of inventory.values()) {
    if (lpar.wwpns.length === 0) continue;

    const host = hostNameFor(hostPrefix, lpar.name);
    const current = registryState.get(host) ?? new Set<string>();
    const toAdd = Array.from(new Set(lpar.wwpns)).filter((wwpn) => !current.has(wwpn));

    const planned: PlannedHost = { host, lpar: lpar.name, toAdd };
    plan.set(host, planned);
  }

  return plan;
}

/** Number of hosts whose plan requires a remote mutation. */
export function plannedMutations(plan: ReconciliationPlan): number {
  let count = 0;
  for (const entry of plan.values()) if (entry.toAdd.length > 0) count += 1;
  return count;
}
