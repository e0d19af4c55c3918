import { Client } from 'ssh2';

import { serverEnv } from '@/lib/env/server';
import { logEvent } from '@/lib/logging/logger';

import type { ConnectConfig } from 'ssh2';
import type { CommandChannel, CommandOptions, CommandResult, HmcConnectionOptions } from './types';

// Mirrors ssh(1): a command that never ran reports 255.
const TRANSPORT_EXIT_CODE = 255;

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function buildConnectConfig(opts: HmcConnectionOptions): ConnectConfig {
  const base: ConnectConfig = {
    host: opts.host,
    port: opts.port,
    username: opts.credential.username,
    readyTimeout: opts.readyTimeoutMs,
    ...(serverEnv.HMC_SYNC_DEBUG
      ? {
          debug: (message: string) =>
            logEvent({ level: 'debug', service: 'hmc', event_type: 'hmc.ssh_debug', host: opts.host, message }),
        }
      : {}),
  };

  const cred = opts.credential;
  if (cred.kind === 'password') return { ...base, password: cred.password };
  return { ...base, privateKey: cred.privateKey, ...(cred.passphrase ? { passphrase: cred.passphrase } : {}) };
}

/**
 * Runs one command per SSH connection, the way an operator would with `ssh hscroot@hmc <cmd>`.
 * Never rejects: connection failures, timeouts and aborts resolve with exit code 255 and a
 * `transport` marker so callers can treat the unit as contributing nothing.
 */
export function runSshCommand(
  connection: HmcConnectionOptions,
  command: string,
  opts: CommandOptions,
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve) => {
    const client = new Client();
    let stdout = '';
    let stderr = '';
    let exitCode: number | null = null;
    let settled = false;
    const start = Date.now();

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      opts.signal?.removeEventListener('abort', onAbort);
      client.end();
      logEvent({
        level: 'debug',
        service: 'hmc',
        event_type: 'hmc.command',
        host: connection.host,
        command,
        exit_code: result.exitCode,
        duration_ms: Date.now() - start,
        ...(result.transport ? { transport: result.transport } : {}),
      });
      resolve(result);
    };

    const failTransport = (transport: 'connect' | 'timeout' | 'aborted', cause: string) =>
      finish({ exitCode: TRANSPORT_EXIT_CODE, stdoutLines: splitLines(stdout), stderr: cause, transport });

    const onAbort = () => failTransport('aborted', 'aborted');

    const timeout = setTimeout(() => failTransport('timeout', `timeout after ${opts.timeoutMs}ms`), opts.timeoutMs);

    if (opts.signal?.aborted) {
      onAbort();
      return;
    }
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    client.on('error', (err: Error) => failTransport('connect', err.message));

    client.on('ready', () => {
      client.exec(command, (err, stream) => {
        if (err) {
          failTransport('connect', err.message);
          return;
        }

        // A multi-byte character may straddle two chunks; the stream decoder holds partial bytes back.
        stream.setEncoding('utf8');
        stream.stderr.setEncoding('utf8');
        stream.on('data', (chunk: string) => {
          stdout += chunk;
        });
        stream.stderr.on('data', (chunk: string) => {
          stderr += chunk;
        });
        stream.on('exit', (code: number | null) => {
          exitCode = code;
        });
        stream.on('close', () => {
          finish({
            exitCode: exitCode ?? TRANSPORT_EXIT_CODE,
            stdoutLines: splitLines(stdout),
            stderr,
          });
        });
      });
    });

    client.connect(buildConnectConfig(connection));
  });
}

export function createSshCommandChannel(connection: HmcConnectionOptions): CommandChannel {
  return {
    execute: (command, opts) => runSshCommand(connection, command, opts),
  };
}
