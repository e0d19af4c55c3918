const REDACTED = '***';

function shouldRedactKey(key: string): boolean {
  const k = key.toLowerCase();

  // Header names are matched exactly.
  if (k === 'authorization' || k === 'cookie' || k === 'x-auth-token' || k === 'api-token') return true;

  return k.includes('password') || k.includes('secret') || k.includes('token') || k.includes('passphrase');
}

export function redactJsonSecrets(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => redactJsonSecrets(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    out[key] = shouldRedactKey(key) ? REDACTED : redactJsonSecrets(value);
  }

  return out;
}
