import { z } from 'zod/v4';

const ArrayApiTokenCredential = z.object({ kind: z.literal('api_token'), token: z.string().min(1) }).strict();
const ArrayUserPasswordCredential = z
  .object({ kind: z.literal('user_password'), username: z.string().min(1), password: z.string().min(1) })
  .strict();

export const ArrayCredentialSchema = z.discriminatedUnion('kind', [
  ArrayApiTokenCredential,
  ArrayUserPasswordCredential,
]);
export type ArrayCredential = z.infer<typeof ArrayCredentialSchema>;

const HmcPasswordCredential = z
  .object({ kind: z.literal('password'), username: z.string().min(1), password: z.string().min(1) })
  .strict();
const HmcPrivateKeyCredential = z
  .object({
    kind: z.literal('private_key'),
    username: z.string().min(1),
    privateKey: z.string().min(1),
    passphrase: z.string().min(1).optional(),
  })
  .strict();

export const HmcCredentialSchema = z.discriminatedUnion('kind', [HmcPasswordCredential, HmcPrivateKeyCredential]);
export type HmcCredentialInput = z.infer<typeof HmcCredentialSchema>;

/**
 * Picks the array credential from the raw option values. An API token wins over a
 * username/password pair; returns null when neither is complete.
 */
export function resolveArrayCredential(input: {
  apiToken?: string;
  username?: string;
  password?: string;
}): ArrayCredential | null {
  const apiToken = input.apiToken?.trim();
  if (apiToken) return { kind: 'api_token', token: apiToken };

  const parsed = ArrayUserPasswordCredential.safeParse({
    kind: 'user_password',
    username: input.username?.trim(),
    password: input.password,
  });
  return parsed.success ? parsed.data : null;
}

/** Shows which account a credential authenticates as, without the secret. */
export function describeArrayCredential(credential: ArrayCredential): string {
  return credential.kind === 'api_token' ? 'api-token' : credential.username;
}
