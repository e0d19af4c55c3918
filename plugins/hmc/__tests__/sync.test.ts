import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AppErrorException } from '@/lib/errors/error';

import { listEthAdaptersCommand, listFcAdaptersCommand, listManagedSystemsCommand } from '../commands';
import { EXIT_FAILURE, EXIT_NO_LPARS, EXIT_OK, runSync } from '../sync';

import type { HostRecord } from '@/lib/reconcile/types';
import type { SyncOptions, SyncRegistry } from '../sync';
import type { CommandChannel, CommandResult } from '../types';

const W4 = 'C0:50:76:01:A2:B3:00:04';
const W5 = 'C0:50:76:01:A2:B3:00:05';
const W8 = 'C0:50:76:01:A2:B3:00:08';

function ok(lines: string[]): CommandResult {
  return { exitCode: 0, stdoutLines: lines, stderr: '' };
}

function channelFor(responses: Record<string, CommandResult>): CommandChannel {
  return {
    execute: async (command) => responses[command] ?? { exitCode: 1, stdoutLines: [], stderr: 'unexpected' },
  };
}

const healthyHmc = channelFor({
  [listManagedSystemsCommand()]: ok(['sys-a']),
  [listFcAdaptersCommand('sys-a')]: ok(['db01;c0507601a2b30004,c0507601a2b30005', 'app01;c0507601a2b30008']),
  [listEthAdaptersCommand('sys-a')]: ok(['db01;fa163e5b0c01']),
});

const baseOpts: SyncOptions = {
  excludedLpars: [],
  hostPrefix: '',
  dryRun: true,
  json: false,
  concurrency: 2,
  commandTimeoutMs: 1000,
};

function fakeRegistry(hosts: Map<string, Set<string>>, unreadable: Set<string> = new Set()) {
  const registry = {
    getHost: vi.fn(async (name: string): Promise<HostRecord | null> => {
      if (unreadable.has(name)) {
        throw new AppErrorException({
          code: 'ARRAY_PERMISSION_DENIED',
          category: 'permission',
          message: 'array permission denied',
          retryable: false,
        });
      }
      const wwpns = hosts.get(name);
      return wwpns ? { name, wwpns: new Set(wwpns) } : null;
    }),
    createHost: vi.fn(async (name: string): Promise<HostRecord> => {
      hosts.set(name, new Set());
      return { name, wwpns: new Set() };
    }),
    addWwpns: vi.fn(async (name: string, wwpns: readonly string[]) => {
      const current = hosts.get(name) ?? new Set<string>();
      for (const w of wwpns) current.add(w);
      hosts.set(name, current);
    }),
    logout: vi.fn(async () => {}),
  } satisfies SyncRegistry;
  return registry;
}

describe('hmc runSync', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the no-LPAR exit code when every listing fails', async () => {
    const lines: string[] = [];
    const registry = fakeRegistry(new Map());
    const channel = channelFor({
      [listManagedSystemsCommand()]: { exitCode: 255, stdoutLines: [], stderr: 'connection refused', transport: 'connect' },
    });

    const res = await runSync({ ...baseOpts, dryRun: false }, { channel, registry, write: (l) => lines.push(l) });

    expect(res.exitCode).toBe(EXIT_NO_LPARS);
    expect(res.outcomes).toEqual([]);
    expect(lines).toEqual([]);
    expect(registry.getHost).not.toHaveBeenCalled();
    expect(registry.logout).toHaveBeenCalledTimes(1);
  });

  it('exits as interrupted, not as an empty discovery, when cancelled during discovery', async () => {
    const controller = new AbortController();
    const lines: string[] = [];
    const registry = fakeRegistry(new Map());
    const channel: CommandChannel = {
      execute: async (command) => {
        if (command === listManagedSystemsCommand()) return ok(['sys-a']);
        controller.abort();
        return { exitCode: 255, stdoutLines: [], stderr: 'aborted', transport: 'aborted' };
      },
    };

    const res = await runSync(
      { ...baseOpts, dryRun: false, signal: controller.signal },
      { channel, registry, write: (l) => lines.push(l) },
    );

    expect(res.exitCode).toBe(EXIT_FAILURE);
    expect(res.inventory.size).toBe(0);
    expect(lines).toEqual([]);
    expect(registry.getHost).not.toHaveBeenCalled();
    const events = vi.mocked(console.error).mock.calls.map((call) => JSON.parse(String(call[0])).event_type);
    expect(events).toContain('sync.cancelled');
    expect(events).not.toContain('sync.no_lpars');
  });

  it('reports LPARs by name and dry-runs without an array', async () => {
    const lines: string[] = [];

    const res = await runSync(baseOpts, { channel: healthyHmc, registry: null, write: (l) => lines.push(l) });

    expect(res.exitCode).toBe(EXIT_OK);
    expect(lines).toEqual([
      `[LPAR] app01  WWPNs=${W8}  MACs=-  -> host=app01`,
      `[LPAR] db01  WWPNs=${W4},${W5}  MACs=FA:16:3E:5B:0C:01  -> host=db01`,
      `[DRY-RUN] host=db01 would_add=2 wwpns=${W4},${W5}`,
      `[DRY-RUN] host=app01 would_add=1 wwpns=${W8}`,
      '[DONE]',
    ]);
  });

  it('dry-runs against the registry state without mutating it', async () => {
    const lines: string[] = [];
    const registry = fakeRegistry(new Map([['prod-db01', new Set([W4, W5])]]));

    const res = await runSync(
      { ...baseOpts, hostPrefix: 'prod-' },
      { channel: healthyHmc, registry, write: (l) => lines.push(l) },
    );

    expect(res.outcomes.map((o) => [o.host, o.status])).toEqual([
      ['prod-db01', 'unchanged'],
      ['prod-app01', 'dry_run'],
    ]);
    expect(registry.createHost).not.toHaveBeenCalled();
    expect(registry.addWwpns).not.toHaveBeenCalled();
  });

  it('creates missing hosts and adds only missing WWPNs', async () => {
    const hosts = new Map([['db01', new Set([W4])]]);
    const registry = fakeRegistry(hosts);
    const lines: string[] = [];

    const res = await runSync(
      { ...baseOpts, dryRun: false, concurrency: 1 },
      { channel: healthyHmc, registry, write: (l) => lines.push(l) },
    );

    expect(res.exitCode).toBe(EXIT_OK);
    expect(registry.addWwpns.mock.calls).toEqual([
      ['db01', [W5]],
      ['app01', [W8]],
    ]);
    expect(registry.createHost).toHaveBeenCalledWith('app01');
    expect(lines.slice(2)).toEqual(['[OK] host=db01 added=1', '[OK] host=app01 added=1 created', '[DONE]']);
    expect([...(hosts.get('db01') ?? [])]).toEqual([W4, W5]);
  });

  it('fails only the host whose state cannot be read', async () => {
    const registry = fakeRegistry(new Map(), new Set(['db01']));

    const res = await runSync({ ...baseOpts, dryRun: false }, { channel: healthyHmc, registry, write: () => {} });

    expect(res.exitCode).toBe(EXIT_OK);
    expect(res.outcomes[0]).toMatchObject({ host: 'db01', status: 'failed', error: { code: 'ARRAY_PERMISSION_DENIED' } });
    expect(res.outcomes[1]).toMatchObject({ host: 'app01', status: 'applied', created: true });
    expect(registry.addWwpns).toHaveBeenCalledTimes(1);
  });

  it('prints the inventory as JSON when asked', async () => {
    const lines: string[] = [];

    await runSync({ ...baseOpts, json: true }, { channel: healthyHmc, registry: null, write: (l) => lines.push(l) });

    expect(JSON.parse(lines[lines.length - 2])).toEqual({
      app01: { wwpns: [W8], macs: [] },
      db01: { wwpns: [W4, W5], macs: ['FA:16:3E:5B:0C:01'] },
    });
  });

  it('skips excluded LPARs', async () => {
    const res = await runSync(
      { ...baseOpts, excludedLpars: ['db01'] },
      { channel: healthyHmc, registry: null, write: () => {} },
    );

    expect([...res.inventory.keys()]).toEqual(['app01']);
    expect([...res.plan.keys()]).toEqual(['app01']);
  });
});
