import { beforeEach, describe, expect, it, vi } from 'vitest';

import { runSshCommand } from '../client';

import type { HmcConnectionOptions } from '../types';

const script = vi.hoisted(() => ({ stdout: [] as Buffer[], stderr: [] as Buffer[], exitCode: 0 }));

vi.mock('ssh2', async () => {
  const { EventEmitter } = await import('node:events');
  const { PassThrough } = await import('node:stream');
  const { finished } = await import('node:stream/promises');

  class FakeChannel extends PassThrough {
    readonly stderr = new PassThrough();

    constructor() {
      super({ autoDestroy: false });
    }
  }

  class Client extends EventEmitter {
    connect() {
      setImmediate(() => this.emit('ready'));
      return this;
    }

    end() {
      return this;
    }

    exec(_command: string, callback: (err: Error | undefined, channel: FakeChannel) => void) {
      const channel = new FakeChannel();
      callback(undefined, channel);
      void Promise.all([finished(channel), finished(channel.stderr)]).then(() => {
        channel.emit('exit', script.exitCode);
        channel.emit('close');
      });
      for (const chunk of script.stderr) channel.stderr.write(chunk);
      channel.stderr.end();
      for (const chunk of script.stdout) channel.write(chunk);
      channel.end();
      return this;
    }
  }

  return { Client };
});

const connection: HmcConnectionOptions = {
  host: 'hmc01.example.com',
  port: 22,
  credential: { kind: 'password', username: 'hscroot', password: 'test-secret' },
  readyTimeoutMs: 1000,
};

// Splits the encoded text inside the first multi-byte character.
function splitInsideCharacter(text: string): Buffer[] {
  const bytes = Buffer.from(text, 'utf8');
  const cut = bytes.findIndex((b) => b >= 0x80) + 1;
  return [bytes.subarray(0, cut), bytes.subarray(cut)];
}

describe('hmc runSshCommand', () => {
  beforeEach(() => {
    script.stdout = [];
    script.stderr = [];
    script.exitCode = 0;
  });

  it('decodes characters split across output chunks', async () => {
    script.stdout = splitInsideCharacter('prod-dé01;c0507601a2b30004\nbatch01;none\n');
    script.stderr = splitInsideCharacter('Hinweis: Größe unbekannt');

    const res = await runSshCommand(connection, 'lshwres -r virtualio --rsubtype fc', { timeoutMs: 1000 });

    expect(res).toEqual({
      exitCode: 0,
      stdoutLines: ['prod-dé01;c0507601a2b30004', 'batch01;none'],
      stderr: 'Hinweis: Größe unbekannt',
    });
  });

  it('reports the remote exit code', async () => {
    script.stderr = [Buffer.from('HSCL8012 The managed system was not found')];
    script.exitCode = 1;

    const res = await runSshCommand(connection, 'lssyscfg -r sys -F name', { timeoutMs: 1000 });

    expect(res).toEqual({ exitCode: 1, stdoutLines: [], stderr: 'HSCL8012 The managed system was not found' });
  });
});
