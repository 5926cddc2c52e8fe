#!/usr/bin/env node

/**
 * MCP server for Google Drive and Google Docs
 * Lists and searches Drive files, reads and writes Docs documents
 */

import { config } from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

// Load .env before anything reads the environment
config();

import { getConfig } from './config.js';
import { createServer } from './server.js';
import { GoogleServices } from './services/google-auth.js';
import { CredentialsMissingError, toErrorMessage } from './services/errors.js';
import { info, error as logError } from './utils/logger.js';

async function main(): Promise<void> {
  const appConfig = getConfig();
  const google = GoogleServices.fromConfig(appConfig);

  // Authenticate up front: missing credentials abort startup
  await google.authenticate();
  info('Google APIs authenticated', { module: 'index', phase: 'init', authMode: appConfig.authMode });

  const server = createServer({ google });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  info('MCP server running on stdio', { module: 'index', phase: 'init' });
}

main().catch((err: unknown) => {
  if (err instanceof CredentialsMissingError) {
    logError('Missing credentials', { module: 'index', phase: 'init', kind: err.kind, path: err.path, error: err.message });
  } else {
    logError('Failed to start MCP server', {
      module: 'index',
      phase: 'init',
      error: toErrorMessage(err),
    });
  }
  process.exit(1);
});
