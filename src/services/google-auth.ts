/**
 * Google authentication and service handles
 *
 * Two strategies, picked by configuration:
 * - oauth: stored token, refreshed when expired, browser consent otherwise
 * - service_account: key file read on every start, nothing persisted
 *
 * Credential and handles are created lazily, once per instance.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { google, Auth, docs_v1, drive_v3 } from 'googleapis';
import type { Config } from '../config.js';
import { CredentialsMissingError, toErrorMessage } from './errors.js';
import type { AuthMode } from '../types/index.js';
import { fileExists } from '../utils/files.js';
import { info, warn, error as logError } from '../utils/logger.js';
import { readClientSecrets, runConsentFlow } from './oauth-flow.js';
import {
  loadStoredToken,
  saveToken,
  isTokenValid,
  toStoredToken,
  mergeRefreshedToken,
  toCredentials,
} from './token-store.js';
import type { StoredToken } from './token-store.js';

/** Full Drive and Docs access: listing, reading and editing */
export const SCOPES = [
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/documents',
];

export type GoogleCredential = Auth.OAuth2Client | Auth.GoogleAuth;

export interface GoogleServicesOptions {
  mode: AuthMode;
  credentialsPath: string;
  tokenPath: string;
  serviceAccountPath: string;
  callbackPort: number;
}

/**
 * Source of the two API handles the tools need
 */
export interface GoogleServiceProvider {
  getDriveService(): Promise<drive_v3.Drive>;
  getDocsService(): Promise<docs_v1.Docs>;
}

const serviceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

/**
 * Persists tokens the library refreshes on its own during the process
 */
function persistRefreshedTokens(client: Auth.OAuth2Client, token: StoredToken, tokenPath: string): void {
  let current = token;
  client.on('tokens', (tokens) => {
    current = mergeRefreshedToken(current, tokens);
    saveToken(tokenPath, current).catch((err: unknown) => {
      logError('Failed to persist refreshed token', {
        module: 'google-auth',
        tokenPath,
        error: toErrorMessage(err),
      });
    });
  });
}

/**
 * Interactive mode: stored token, refresh, or browser consent
 */
async function authorizeUser(options: GoogleServicesOptions): Promise<Auth.OAuth2Client> {
  const stored = await loadStoredToken(options.tokenPath);

  if (stored) {
    const client = new google.auth.OAuth2(stored.client_id, stored.client_secret);
    client.setCredentials(toCredentials(stored));

    if (isTokenValid(stored, Date.now())) {
      info('Using stored token', { module: 'google-auth', tokenPath: options.tokenPath });
      persistRefreshedTokens(client, stored, options.tokenPath);
      return client;
    }

    if (stored.refresh_token) {
      try {
        const { credentials } = await client.refreshAccessToken();
        const refreshed = mergeRefreshedToken(stored, credentials);
        client.setCredentials(toCredentials(refreshed));
        await saveToken(options.tokenPath, refreshed);
        info('Stored token refreshed', { module: 'google-auth', tokenPath: options.tokenPath });
        persistRefreshedTokens(client, refreshed, options.tokenPath);
        return client;
      } catch (err) {
        warn('Token refresh failed, falling back to browser consent', {
          module: 'google-auth',
          error: toErrorMessage(err),
        });
      }
    }
  }

  const identity = await readClientSecrets(options.credentialsPath);
  const { client, tokens } = await runConsentFlow(identity, SCOPES, options.callbackPort);
  const token = toStoredToken(identity, tokens);
  await saveToken(options.tokenPath, token);
  info('New token saved', { module: 'google-auth', tokenPath: options.tokenPath });
  persistRefreshedTokens(client, token, options.tokenPath);
  return client;
}

/**
 * Non-interactive mode: service account key file
 */
async function authorizeServiceAccount(serviceAccountPath: string): Promise<Auth.GoogleAuth> {
  if (!(await fileExists(serviceAccountPath))) {
    throw new CredentialsMissingError('ServiceAccountFileMissing', serviceAccountPath);
  }

  const raw: unknown = JSON.parse(await readFile(serviceAccountPath, 'utf-8'));
  const parsed = serviceAccountKeySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid service account key file at ${serviceAccountPath}: client_email and private_key are required`);
  }

  info('Using service account', { module: 'google-auth', clientEmail: parsed.data.client_email });
  return new google.auth.GoogleAuth({
    credentials: {
      client_email: parsed.data.client_email,
      private_key: parsed.data.private_key,
    },
    scopes: SCOPES,
  });
}

/**
 * Lazily authenticated Drive v3 and Docs v1 handles
 */
export class GoogleServices implements GoogleServiceProvider {
  private credential: GoogleCredential | null = null;
  private credentialPromise: Promise<GoogleCredential> | null = null;
  private driveService: drive_v3.Drive | null = null;
  private docsService: docs_v1.Docs | null = null;

  constructor(private readonly options: GoogleServicesOptions) {}

  static fromConfig(config: Config): GoogleServices {
    return new GoogleServices({
      mode: config.authMode,
      credentialsPath: config.credentialsPath,
      tokenPath: config.tokenPath,
      serviceAccountPath: config.serviceAccountPath,
      callbackPort: config.oauthCallbackPort,
    });
  }

  isAuthenticated(): boolean {
    return this.credential !== null;
  }

  /**
   * Establishes the credential
   *
   * @throws CredentialsMissingError when no credential file exists at the configured path
   */
  async authenticate(): Promise<void> {
    await this.getCredential();
  }

  async getDriveService(): Promise<drive_v3.Drive> {
    if (this.driveService) {
      return this.driveService;
    }
    const auth = await this.getCredential();
    // Re-check: a concurrent caller may have built it while we awaited
    if (!this.driveService) {
      this.driveService = google.drive({ version: 'v3', auth });
    }
    return this.driveService;
  }

  async getDocsService(): Promise<docs_v1.Docs> {
    if (this.docsService) {
      return this.docsService;
    }
    const auth = await this.getCredential();
    if (!this.docsService) {
      this.docsService = google.docs({ version: 'v1', auth });
    }
    return this.docsService;
  }

  /**
   * Promise-caching so concurrent first calls share one authentication
   */
  private async getCredential(): Promise<GoogleCredential> {
    if (this.credential) {
      return this.credential;
    }

    if (this.credentialPromise) {
      return await this.credentialPromise;
    }

    this.credentialPromise = (async () => {
      const credential = this.options.mode === 'service_account'
        ? await authorizeServiceAccount(this.options.serviceAccountPath)
        : await authorizeUser(this.options);
      this.credential = credential;
      return credential;
    })();

    try {
      return await this.credentialPromise;
    } catch (err) {
      // Clear promise on error to allow retry
      this.credentialPromise = null;
      throw err;
    }
  }
}
