import { Agent, fetch as undiciFetch } from 'undici';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, errorCause } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { isCanonicalWwpn, normalizeWwpn } from '../hmc/normalize';

import type { AppError } from '@/lib/errors/error';
import type { HostRecord, HostRegistry } from '@/lib/reconcile/types';
import type { FetchLike, FlashArrayClientOptions, FlashArrayHost } from './types';

export class FlashArrayClientError extends AppErrorException {
  readonly status: number | null;

  constructor(appError: AppError, status: number | null = null) {
    super(appError);
    this.name = 'FlashArrayClientError';
    this.status = status;
  }
}

export type FlashArrayRegistry = HostRegistry & {
  /** Ends the REST session. Best effort: failures are logged, never thrown. */
  logout(): Promise<void>;
};

type ApiResponse = { status: number; bodyText: string; authToken: string | null };

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function buildFetch(tlsVerify: boolean): FetchLike {
  // Node's fetch has no per-request TLS switch; an undici dispatcher carries it instead.
  const dispatcher = tlsVerify ? undefined : new Agent({ connect: { rejectUnauthorized: false } });
  return (url, init) => undiciFetch(url, { ...init, ...(dispatcher ? { dispatcher } : {}) });
}

function firstErrorMessage(bodyText: string): string | undefined {
  try {
    const parsed = JSON.parse(bodyText) as unknown;
    if (!isRecord(parsed) || !Array.isArray(parsed.errors)) return undefined;
    const first: unknown = parsed.errors[0];
    return isRecord(first) && typeof first.message === 'string' ? first.message : undefined;
  } catch {
    return undefined;
  }
}

function isNotFound(res: ApiResponse): boolean {
  if (res.status !== 400 && res.status !== 404) return false;
  const message = firstErrorMessage(res.bodyText) ?? res.bodyText;
  return message.toLowerCase().includes('does not exist');
}

function toNetworkError(stage: string, url: string, err: unknown, timedOut: boolean): FlashArrayClientError {
  const cause = errorCause(err);
  const nested = err instanceof Error && err.cause instanceof Error ? err.cause.message : '';
  const lower = `${cause} ${nested}`.toLowerCase();
  const tlsLike = lower.includes('certificate') || lower.includes('self signed') || lower.includes('self-signed');

  return new FlashArrayClientError({
    code: tlsLike ? ErrorCode.ARRAY_TLS_ERROR : ErrorCode.ARRAY_UNREACHABLE,
    category: 'network',
    message: timedOut ? 'array request timed out' : tlsLike ? 'array tls error' : 'array unreachable',
    retryable: !tlsLike,
    redacted_context: { stage, url, cause: nested ? `${cause}: ${nested}` : cause },
  });
}

export function toStatusError(stage: string, url: string, res: ApiResponse): FlashArrayClientError {
  const context = {
    stage,
    url,
    status: res.status,
    ...(res.bodyText ? { body_excerpt: excerpt(res.bodyText) } : {}),
  };

  if (res.status === 401) {
    return new FlashArrayClientError(
      {
        code: ErrorCode.ARRAY_AUTH_FAILED,
        category: 'auth',
        message: 'array authentication failed',
        retryable: false,
        redacted_context: context,
      },
      res.status,
    );
  }
  if (res.status === 403) {
    return new FlashArrayClientError(
      {
        code: ErrorCode.ARRAY_PERMISSION_DENIED,
        category: 'permission',
        message: 'array permission denied',
        retryable: false,
        redacted_context: context,
      },
      res.status,
    );
  }
  if (res.status >= 400 && res.status < 500) {
    return new FlashArrayClientError(
      {
        code: ErrorCode.ARRAY_REQUEST_REJECTED,
        category: 'rejected',
        message: firstErrorMessage(res.bodyText) ?? 'array rejected request',
        retryable: false,
        redacted_context: context,
      },
      res.status,
    );
  }
  return new FlashArrayClientError(
    {
      code: ErrorCode.ARRAY_INTERNAL,
      category: 'unknown',
      message: 'array request failed',
      retryable: true,
      redacted_context: context,
    },
    res.status,
  );
}

function badResponse(stage: string, url: string, res: ApiResponse, cause?: string): FlashArrayClientError {
  return new FlashArrayClientError(
    {
      code: ErrorCode.ARRAY_BAD_RESPONSE,
      category: 'parse',
      message: 'array bad response',
      retryable: false,
      redacted_context: {
        stage,
        url,
        status: res.status,
        ...(res.bodyText ? { body_excerpt: excerpt(res.bodyText) } : {}),
        ...(cause ? { cause } : {}),
      },
    },
    res.status,
  );
}

function parseJson(stage: string, url: string, res: ApiResponse): unknown {
  try {
    return res.bodyText ? (JSON.parse(res.bodyText) as unknown) : null;
  } catch (err) {
    throw badResponse(stage, url, res, errorCause(err));
  }
}

function parseHosts(stage: string, url: string, res: ApiResponse): FlashArrayHost[] {
  const parsed = parseJson(stage, url, res);
  if (!isRecord(parsed) || !Array.isArray(parsed.items)) throw badResponse(stage, url, res);

  const hosts: FlashArrayHost[] = [];
  for (const item of parsed.items) {
    if (!isRecord(item) || typeof item.name !== 'string') throw badResponse(stage, url, res);
    const wwns = Array.isArray(item.wwns) ? item.wwns.filter((w): w is string => typeof w === 'string') : [];
    hosts.push({ name: item.name, wwns });
  }
  return hosts;
}

// Purity host names are case-insensitive.
function sameHostName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function toHostRecord(host: FlashArrayHost): HostRecord {
  // The array reports WWNs without separators; compare in canonical form.
  return { name: host.name, wwpns: new Set((host.wwns ?? []).map(normalizeWwpn)) };
}

export function createFlashArrayRegistry(opts: FlashArrayClientOptions): FlashArrayRegistry {
  const baseUrl = normalizeEndpoint(opts.endpoint);
  const fetchImpl = opts.fetchImpl ?? buildFetch(opts.tlsVerify);
  const legacyApiVersion = opts.legacyApiVersion ?? '1.19';
  let session: Promise<string> | null = null;

  async function send(
    stage: string,
    input: { method: 'GET' | 'POST' | 'PATCH'; path: string; headers: Record<string, string>; body?: unknown },
  ): Promise<{ url: string; res: ApiResponse }> {
    const url = `${baseUrl}${input.path}`;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, opts.timeoutMs);
    const start = Date.now();

    try {
      const response = await fetchImpl(url, {
        method: input.method,
        headers: {
          accept: 'application/json',
          ...(input.body !== undefined ? { 'content-type': 'application/json' } : {}),
          ...input.headers,
        },
        ...(input.body !== undefined ? { body: JSON.stringify(input.body) } : {}),
        signal: controller.signal,
      });
      const bodyText = await response.text();
      logEvent({
        level: 'debug',
        service: 'array',
        event_type: 'array.http_response',
        stage,
        method: input.method,
        url,
        status: response.status,
        duration_ms: Date.now() - start,
      });
      return { url, res: { status: response.status, bodyText, authToken: response.headers.get('x-auth-token') } };
    } catch (err) {
      throw toNetworkError(stage, url, err, timedOut);
    } finally {
      clearTimeout(timeout);
    }
  }

  async function exchangePasswordForToken(username: string, password: string): Promise<string> {
    const stage = 'array.api_token';
    const { url, res } = await send(stage, {
      method: 'POST',
      path: `/api/${legacyApiVersion}/auth/apitoken`,
      headers: {},
      body: { username, password },
    });
    if (res.status !== 200) throw toStatusError(stage, url, res);

    const parsed = parseJson(stage, url, res);
    if (!isRecord(parsed) || typeof parsed.api_token !== 'string' || !parsed.api_token) {
      throw badResponse(stage, url, res);
    }
    return parsed.api_token;
  }

  async function login(): Promise<string> {
    const cred = opts.credential;
    const apiToken = cred.kind === 'api_token' ? cred.token : await exchangePasswordForToken(cred.username, cred.password);

    const stage = 'array.login';
    const { url, res } = await send(stage, {
      method: 'POST',
      path: `/api/${opts.apiVersion}/login`,
      headers: { 'api-token': apiToken },
    });
    if (res.status !== 200) throw toStatusError(stage, url, res);
    if (!res.authToken) throw badResponse(stage, url, res, 'missing x-auth-token header');

    logEvent({ level: 'debug', service: 'array', event_type: 'array.login', endpoint: baseUrl, auth: cred.kind });
    return res.authToken;
  }

  function authToken(): Promise<string> {
    if (!session) {
      session = login();
      // A failed login is not cached; the next call tries again.
      void session.catch(() => {
        session = null;
      });
    }
    return session;
  }

  function hostsPath(name: string): string {
    return `/api/${opts.apiVersion}/hosts?names=${encodeURIComponent(name)}`;
  }

  return {
    async getHost(name) {
      const stage = 'array.get_host';
      const token = await authToken();
      const { url, res } = await send(stage, { method: 'GET', path: hostsPath(name), headers: { 'x-auth-token': token } });
      if (isNotFound(res)) return null;
      if (res.status !== 200) throw toStatusError(stage, url, res);

      const host = parseHosts(stage, url, res).find((h) => sameHostName(h.name, name));
      return host ? toHostRecord(host) : null;
    },

    async createHost(name) {
      const stage = 'array.create_host';
      const token = await authToken();
      const { url, res } = await send(stage, {
        method: 'POST',
        path: hostsPath(name),
        headers: { 'x-auth-token': token },
        body: {},
      });
      if (res.status !== 200) throw toStatusError(stage, url, res);

      const host = parseHosts(stage, url, res).find((h) => sameHostName(h.name, name));
      return host ? toHostRecord(host) : { name, wwpns: new Set<string>() };
    },

    async addWwpns(name, wwpns) {
      const stage = 'array.add_wwns';
      const invalid = wwpns.filter((wwpn) => !isCanonicalWwpn(wwpn));
      if (invalid.length > 0) {
        throw new FlashArrayClientError({
          code: ErrorCode.ARRAY_REQUEST_REJECTED,
          category: 'rejected',
          message: 'non-canonical wwpn',
          retryable: false,
          redacted_context: { stage, host: name, wwpns: invalid },
        });
      }
      const token = await authToken();
      const { url, res } = await send(stage, {
        method: 'PATCH',
        path: hostsPath(name),
        headers: { 'x-auth-token': token },
        body: { add_wwns: [...wwpns] },
      });
      if (res.status !== 200) throw toStatusError(stage, url, res);
    },

    async logout() {
      if (!session) return;
      const pending = session;
      session = null;

      try {
        const token = await pending;
        const stage = 'array.logout';
        const { url, res } = await send(stage, {
          method: 'POST',
          path: `/api/${opts.apiVersion}/logout`,
          headers: { 'x-auth-token': token },
        });
        if (res.status !== 200) throw toStatusError(stage, url, res);
      } catch (err) {
        logEvent({
          level: 'info',
          service: 'array',
          event_type: 'array.logout_failed',
          error: err instanceof AppErrorException ? err.appError.code : errorCause(err),
        });
      }
    },
  };
}
