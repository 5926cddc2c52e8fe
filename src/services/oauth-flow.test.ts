import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ChildProcess } from 'child_process';
import type { FastifyInstance } from 'fastify';

const oauth = vi.hoisted(() => {
  const generateAuthUrl = vi.fn((_options: { state?: string }) => 'https://accounts.example.test/consent');
  const getToken = vi.fn();
  const setCredentials = vi.fn();
  const OAuth2 = vi.fn(function (
    this: Record<string, unknown>,
    _clientId: string,
    _clientSecret: string,
    _redirectUri: string
  ) {
    this.generateAuthUrl = generateAuthUrl;
    this.getToken = getToken;
    this.setCredentials = setCredentials;
  });
  return { generateAuthUrl, getToken, setCredentials, OAuth2 };
});

vi.mock('googleapis', () => ({
  google: {
    auth: {
      OAuth2: oauth.OAuth2,
    },
  },
}));

vi.mock('fs/promises', () => ({
  readFile: vi.fn(),
}));

vi.mock('open', () => ({
  default: vi.fn(),
}));

vi.mock('../utils/files.js', () => ({
  fileExists: vi.fn(),
}));

vi.mock('../utils/logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

import { readFile } from 'fs/promises';
import open from 'open';
import { fileExists } from '../utils/files.js';
import { warn } from '../utils/logger.js';
import {
  readClientSecrets,
  buildCallbackServer,
  escapeHtml,
  runConsentFlow,
  CALLBACK_PATH,
  CONSENT_TIMEOUT_MS,
} from './oauth-flow.js';
import { CredentialsMissingError } from './errors.js';

describe('readClientSecrets', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws CredentialsMissingError when the file is absent', async () => {
    vi.mocked(fileExists).mockResolvedValue(false);

    const failure = readClientSecrets('missing.json');

    await expect(failure).rejects.toThrow(CredentialsMissingError);
    await expect(failure).rejects.toMatchObject({
      kind: 'CredentialsFileMissing',
      path: 'missing.json',
      message: 'Credentials file not found at missing.json. Please download it from Google Cloud Console.',
    });
    expect(readFile).not.toHaveBeenCalled();
  });

  it('reads an installed-app client', async () => {
    vi.mocked(fileExists).mockResolvedValue(true);
    vi.mocked(readFile).mockResolvedValue(
      JSON.stringify({
        installed: {
          client_id: 'test-client-id',
          client_secret: 'test-client-secret',
          redirect_uris: ['http://localhost'],
        },
      })
    );

    await expect(readClientSecrets('credentials.json')).resolves.toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
    });
  });

  it('reads a web client', async () => {
    vi.mocked(fileExists).mockResolvedValue(true);
    vi.mocked(readFile).mockResolvedValue(
      JSON.stringify({ web: { client_id: 'web-id', client_secret: 'web-secret' } })
    );

    await expect(readClientSecrets('credentials.json')).resolves.toEqual({
      clientId: 'web-id',
      clientSecret: 'web-secret',
    });
  });

  it('rejects a file that is neither kind of client', async () => {
    vi.mocked(fileExists).mockResolvedValue(true);
    vi.mocked(readFile).mockResolvedValue(JSON.stringify({ client_id: 'loose-id' }));

    await expect(readClientSecrets('credentials.json')).rejects.toThrow(
      'Invalid client secrets file at credentials.json: expected an "installed" or "web" OAuth client'
    );
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<b>"x" & 'y'</b>`)).toBe('&lt;b&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/b&gt;');
  });

  it('leaves plain text alone', () => {
    expect(escapeHtml('access_denied')).toBe('access_denied');
  });
});

describe('buildCallbackServer', () => {
  let server: FastifyInstance;
  const onCode = vi.fn();
  const onFailure = vi.fn();

  beforeEach(async () => {
    vi.clearAllMocks();
    server = buildCallbackServer('test-state', onCode, onFailure);
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('hands over the authorization code', async () => {
    const response = await server.inject({ method: 'GET', url: `${CALLBACK_PATH}?code=test-code&state=test-state` });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/html');
    expect(response.headers.connection).toBe('close');
    expect(response.body).toContain('Authentication Successful');
    expect(onCode).toHaveBeenCalledWith('test-code');
    expect(onFailure).not.toHaveBeenCalled();
  });

  it('reports an error redirect', async () => {
    const response = await server.inject({ method: 'GET', url: `${CALLBACK_PATH}?error=access_denied` });

    expect(response.statusCode).toBe(400);
    expect(response.body).toContain('Authentication Failed');
    expect(onFailure).toHaveBeenCalledWith(new Error('OAuth error: access_denied'));
    expect(onCode).not.toHaveBeenCalled();
  });

  it('escapes the error value in the page', async () => {
    const response = await server.inject({
      method: 'GET',
      url: `${CALLBACK_PATH}?error=${encodeURIComponent('<b>x</b>')}`,
    });

    expect(response.body).toContain('<p>&lt;b&gt;x&lt;/b&gt;</p>');
    expect(response.body).not.toContain('<b>x</b>');
  });

  it('rejects a redirect carrying a different state', async () => {
    const response = await server.inject({ method: 'GET', url: `${CALLBACK_PATH}?code=test-code&state=other` });

    expect(response.statusCode).toBe(400);
    expect(onFailure).toHaveBeenCalledWith(new Error('OAuth state mismatch'));
    expect(onCode).not.toHaveBeenCalled();
  });

  it('rejects a redirect without a state', async () => {
    const response = await server.inject({ method: 'GET', url: `${CALLBACK_PATH}?code=test-code` });

    expect(response.statusCode).toBe(400);
    expect(onFailure).toHaveBeenCalledWith(new Error('OAuth state mismatch'));
  });

  it('reports a redirect without a code', async () => {
    const response = await server.inject({ method: 'GET', url: `${CALLBACK_PATH}?state=test-state` });

    expect(response.statusCode).toBe(400);
    expect(onFailure).toHaveBeenCalledWith(new Error('No authorization code received'));
  });

  it('returns 404 for other paths', async () => {
    const response = await server.inject({ method: 'GET', url: '/favicon.ico' });

    expect(response.statusCode).toBe(404);
    expect(onCode).not.toHaveBeenCalled();
  });
});

describe('runConsentFlow', () => {
  const identity = { clientId: 'test-client-id', clientSecret: 'test-client-secret' };
  const scopes = ['https://www.googleapis.com/auth/documents'];
  const browser = {} as unknown as ChildProcess;
  let redirect: Promise<Response> | undefined;

  function redirectUri(): string {
    return oauth.OAuth2.mock.calls[0][2];
  }

  function consentState(): string {
    return oauth.generateAuthUrl.mock.calls[0][0].state ?? '';
  }

  // Simulates the browser following the consent redirect
  function redirectBack(params: Record<string, string>): void {
    const query = new URLSearchParams({ state: consentState(), ...params });
    redirect = fetch(`${redirectUri()}?${query.toString()}`);
  }

  beforeEach(() => {
    vi.clearAllMocks();
    redirect = undefined;
    oauth.generateAuthUrl.mockImplementation(() => 'https://accounts.example.test/consent');
    oauth.getToken.mockResolvedValue({
      tokens: { access_token: 'minted-access-token', refresh_token: 'minted-refresh-token' },
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('exchanges the code received on the bound port', async () => {
    const setTimeoutSpy = vi.spyOn(globalThis, 'setTimeout');
    const clearTimeoutSpy = vi.spyOn(globalThis, 'clearTimeout');
    vi.mocked(open).mockImplementation(async () => {
      redirectBack({ code: 'test-code' });
      return browser;
    });

    const result = await runConsentFlow(identity, scopes, 0);

    const uri = redirectUri();
    expect(uri).toMatch(/^http:\/\/localhost:\d+\/oauth2callback$/);
    expect(uri).not.toBe('http://localhost:0/oauth2callback');
    expect(oauth.OAuth2).toHaveBeenCalledWith('test-client-id', 'test-client-secret', uri);
    expect(oauth.generateAuthUrl).toHaveBeenCalledWith({
      access_type: 'offline',
      scope: scopes,
      prompt: 'consent',
      state: expect.any(String),
    });
    expect(open).toHaveBeenCalledWith('https://accounts.example.test/consent');
    expect(oauth.getToken).toHaveBeenCalledWith({ code: 'test-code', redirect_uri: uri });
    expect(oauth.setCredentials).toHaveBeenCalledWith({
      access_token: 'minted-access-token',
      refresh_token: 'minted-refresh-token',
    });
    expect(result.tokens).toEqual({ access_token: 'minted-access-token', refresh_token: 'minted-refresh-token' });
    expect((await redirect)?.status).toBe(200);

    const consentTimer = setTimeoutSpy.mock.calls.findIndex((call) => call[1] === CONSENT_TIMEOUT_MS);
    expect(consentTimer).not.toBe(-1);
    expect(clearTimeoutSpy).toHaveBeenCalledWith(setTimeoutSpy.mock.results[consentTimer].value);

    setTimeoutSpy.mockRestore();
    clearTimeoutSpy.mockRestore();

    // Callback server is gone
    await expect(fetch(uri)).rejects.toThrow();
  });

  it('continues when the browser cannot be opened', async () => {
    vi.mocked(open).mockImplementation(async () => {
      redirectBack({ code: 'test-code' });
      throw new Error('no browser available');
    });

    const result = await runConsentFlow(identity, scopes, 0);

    expect(warn).toHaveBeenCalledWith('Could not open browser automatically, open the URL manually', {
      module: 'oauth-flow',
      authUrl: 'https://accounts.example.test/consent',
      error: 'no browser available',
    });
    expect(result.tokens.access_token).toBe('minted-access-token');
    expect((await redirect)?.status).toBe(200);
  });

  it('fails when consent is denied and closes the server', async () => {
    vi.mocked(open).mockImplementation(async () => {
      redirectBack({ error: 'access_denied' });
      return browser;
    });

    await expect(runConsentFlow(identity, scopes, 0)).rejects.toThrow('OAuth error: access_denied');

    expect((await redirect)?.status).toBe(400);
    expect(oauth.getToken).not.toHaveBeenCalled();
    await expect(fetch(redirectUri())).rejects.toThrow();
  });

  it('times out after two minutes without a redirect', async () => {
    // Only the consent timer runs on the fake clock
    oauth.generateAuthUrl.mockImplementationOnce(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      return 'https://accounts.example.test/consent';
    });
    vi.mocked(open).mockImplementation(async () => {
      vi.advanceTimersByTime(CONSENT_TIMEOUT_MS);
      vi.useRealTimers();
      return browser;
    });

    await expect(runConsentFlow(identity, scopes, 0)).rejects.toThrow('Authentication timed out. Please try again.');

    expect(oauth.getToken).not.toHaveBeenCalled();
    await expect(fetch(redirectUri())).rejects.toThrow();
  });

  it('fails when the code exchange is rejected', async () => {
    oauth.getToken.mockRejectedValue(new Error('invalid_grant'));
    vi.mocked(open).mockImplementation(async () => {
      redirectBack({ code: 'stale-code' });
      return browser;
    });

    await expect(runConsentFlow(identity, scopes, 0)).rejects.toThrow('invalid_grant');

    expect((await redirect)?.status).toBe(200);
    await expect(fetch(redirectUri())).rejects.toThrow();
  });
});
