/**
 * Persisted OAuth token for the interactive auth mode
 *
 * The file carries the client identity next to the tokens, so an expired
 * access token can be refreshed without the client-secret file.
 */

import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import type { Auth } from 'googleapis';
import { toErrorMessage } from './errors.js';
import { fileExists } from '../utils/files.js';
import { debug, warn } from '../utils/logger.js';

/** Access tokens expiring within this window are treated as expired */
export const EXPIRY_MARGIN_MS = 60 * 1000;

const storedTokenSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().optional(),
  access_token: z.string().optional(),
  expiry_date: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

/**
 * Client identity the token was minted for
 */
export interface ClientIdentity {
  clientId: string;
  clientSecret: string;
}

/**
 * Loads the stored token
 *
 * @returns The token, or null when the file is absent or unreadable
 */
export async function loadStoredToken(tokenPath: string): Promise<StoredToken | null> {
  if (!(await fileExists(tokenPath))) {
    debug('No stored token', { module: 'token-store', tokenPath });
    return null;
  }

  try {
    const raw: unknown = JSON.parse(await readFile(tokenPath, 'utf-8'));
    const parsed = storedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      warn('Stored token has an unexpected shape, ignoring it', {
        module: 'token-store',
        tokenPath,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      return null;
    }
    return parsed.data;
  } catch (error) {
    warn('Failed to read stored token, ignoring it', {
      module: 'token-store',
      tokenPath,
      error: toErrorMessage(error),
    });
    return null;
  }
}

/**
 * Writes the token file, readable by the owner only
 */
export async function saveToken(tokenPath: string, token: StoredToken): Promise<void> {
  await writeFile(tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
  debug('Token saved', { module: 'token-store', tokenPath });
}

/**
 * True when the access token can be used as-is
 */
export function isTokenValid(token: StoredToken, now: number): boolean {
  if (!token.access_token || token.expiry_date === undefined) {
    return false;
  }
  return token.expiry_date > now + EXPIRY_MARGIN_MS;
}

/**
 * Builds a stored token from freshly minted credentials
 */
export function toStoredToken(client: ClientIdentity, credentials: Auth.Credentials): StoredToken {
  return {
    type: 'authorized_user',
    client_id: client.clientId,
    client_secret: client.clientSecret,
    refresh_token: credentials.refresh_token ?? undefined,
    access_token: credentials.access_token ?? undefined,
    expiry_date: credentials.expiry_date ?? undefined,
    scope: credentials.scope ?? undefined,
    token_type: credentials.token_type ?? undefined,
  };
}

/**
 * Merges refreshed credentials into a stored token
 * A refresh response usually omits the refresh token; the stored one is kept.
 */
export function mergeRefreshedToken(token: StoredToken, credentials: Auth.Credentials): StoredToken {
  return {
    ...token,
    access_token: credentials.access_token ?? token.access_token,
    expiry_date: credentials.expiry_date ?? token.expiry_date,
    refresh_token: credentials.refresh_token ?? token.refresh_token,
    scope: credentials.scope ?? token.scope,
    token_type: credentials.token_type ?? token.token_type,
  };
}

/**
 * Credentials to set on an OAuth2 client for a stored token
 */
export function toCredentials(token: StoredToken): Auth.Credentials {
  return {
    access_token: token.access_token,
    refresh_token: token.refresh_token,
    expiry_date: token.expiry_date,
    scope: token.scope,
    token_type: token.token_type,
  };
}
