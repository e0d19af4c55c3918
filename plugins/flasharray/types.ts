import type { ArrayCredential } from '@/lib/credentials/schema';

export type FlashArrayCredential = ArrayCredential;

export type FetchInit = {
  method: 'GET' | 'POST' | 'PATCH';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
};

export type FetchResponse = {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
};

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export type FlashArrayClientOptions = {
  // Management address; `https://` is assumed when no scheme is given.
  endpoint: string;
  credential: FlashArrayCredential;
  tlsVerify: boolean;
  timeoutMs: number;
  apiVersion: string;
  // REST 1.x is only used to exchange username/password for an API token.
  legacyApiVersion?: string;
  fetchImpl?: FetchLike;
};

export type FlashArrayHost = {
  name: string;
  wwns?: string[];
};
