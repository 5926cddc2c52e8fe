/**
 * Interactive OAuth consent flow
 *
 * Opens the Google consent page in the browser and waits for the redirect on
 * a local Fastify callback server, then exchanges the code for tokens.
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import open from 'open';
import { randomUUID } from 'crypto';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { google, Auth } from 'googleapis';
import { CredentialsMissingError, toErrorMessage } from './errors.js';
import { fileExists } from '../utils/files.js';
import { info, warn } from '../utils/logger.js';
import type { ClientIdentity } from './token-store.js';

export const CALLBACK_PATH = '/oauth2callback';

/** Give up waiting for the browser redirect after 2 minutes */
export const CONSENT_TIMEOUT_MS = 120000;

const clientSecretEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

// Google Cloud Console downloads either an "installed" or a "web" client
const clientSecretsFileSchema = z.union([
  z.object({ installed: clientSecretEntrySchema }),
  z.object({ web: clientSecretEntrySchema }),
]);

export interface ConsentResult {
  client: Auth.OAuth2Client;
  tokens: Auth.Credentials;
}

interface CallbackQuery {
  code?: string;
  error?: string;
  state?: string;
}

/**
 * Reads the OAuth client-secret file
 *
 * @throws CredentialsMissingError when the file does not exist
 */
export async function readClientSecrets(credentialsPath: string): Promise<ClientIdentity> {
  if (!(await fileExists(credentialsPath))) {
    throw new CredentialsMissingError('CredentialsFileMissing', credentialsPath);
  }

  const raw: unknown = JSON.parse(await readFile(credentialsPath, 'utf-8'));
  const parsed = clientSecretsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid client secrets file at ${credentialsPath}: expected an "installed" or "web" OAuth client`);
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  return { clientId: entry.client_id, clientSecret: entry.client_secret };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function resultPage(title: string, message: string): string {
  return `<html>
  <body style="font-family: sans-serif; text-align: center; padding: 50px;">
    <h1>${title}</h1>
    <p>${escapeHtml(message)}</p>
    <p>You can close this window.</p>
  </body>
</html>`;
}

/**
 * Builds the local server that receives the consent redirect
 *
 * @param state - Value the redirect must echo back
 * @param onCode - Called with the authorization code
 * @param onFailure - Called when Google redirects with an error, a foreign state or no code
 */
export function buildCallbackServer(
  state: string,
  onCode: (code: string) => void,
  onFailure: (error: Error) => void
): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get<{ Querystring: CallbackQuery }>(CALLBACK_PATH, async (request, reply) => {
    const { code, error } = request.query;
    // One redirect per flow; don't keep the socket around for close()
    reply.header('connection', 'close');

    if (error) {
      onFailure(new Error(`OAuth error: ${error}`));
      return reply.code(400).type('text/html').send(resultPage('Authentication Failed', error));
    }

    if (request.query.state !== state) {
      onFailure(new Error('OAuth state mismatch'));
      return reply.code(400).type('text/html').send(resultPage('Authentication Failed', 'Unexpected state parameter.'));
    }

    if (!code) {
      onFailure(new Error('No authorization code received'));
      return reply.code(400).type('text/html').send(resultPage('Authentication Failed', 'No authorization code received.'));
    }

    onCode(code);
    return reply.type('text/html').send(resultPage('Authentication Successful', 'Docs & Drive MCP has been authorized.'));
  });

  return app;
}

/**
 * Opens the consent page; without a browser the URL is left in the log
 */
async function openBrowser(authUrl: string): Promise<void> {
  try {
    await open(authUrl);
  } catch (error) {
    warn('Could not open browser automatically, open the URL manually', {
      module: 'oauth-flow',
      authUrl,
      error: toErrorMessage(error),
    });
  }
}

/**
 * Runs the browser consent flow
 *
 * @param client - OAuth client identity from the client-secret file
 * @param scopes - Scopes to request
 * @param port - Callback port; 0 lets the OS pick one
 */
export async function runConsentFlow(
  client: ClientIdentity,
  scopes: string[],
  port: number
): Promise<ConsentResult> {
  let resolveCode: (code: string) => void = () => undefined;
  let rejectCode: (error: Error) => void = () => undefined;
  const codeReceived = new Promise<string>((resolve, reject) => {
    resolveCode = resolve;
    rejectCode = reject;
  });

  const state = randomUUID();
  const app = buildCallbackServer(
    state,
    (code) => resolveCode(code),
    (error) => rejectCode(error)
  );
  await app.listen({ port, host: 'localhost' });

  let timer: NodeJS.Timeout | undefined;
  try {
    const [address] = app.addresses();
    const redirectUri = `http://localhost:${address ? address.port : port}${CALLBACK_PATH}`;
    const oauth2Client = new google.auth.OAuth2(client.clientId, client.clientSecret, redirectUri);

    const authUrl = oauth2Client.generateAuthUrl({
      access_type: 'offline', // Request refresh token
      scope: scopes,
      prompt: 'consent', // Force consent to get refresh token
      state,
    });

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error('Authentication timed out. Please try again.')),
        CONSENT_TIMEOUT_MS
      );
    });
    const authorization = Promise.race([codeReceived, timeout]);

    info('Waiting for Google authorization', { module: 'oauth-flow', redirectUri, authUrl });
    // The redirect may arrive before the browser launcher returns
    const [code] = await Promise.all([authorization, openBrowser(authUrl)]);
    const { tokens } = await oauth2Client.getToken({ code, redirect_uri: redirectUri });
    oauth2Client.setCredentials(tokens);

    info('Authorization complete', { module: 'oauth-flow' });
    return { client: oauth2Client, tokens };
  } finally {
    clearTimeout(timer);
    await app.close();
  }
}
