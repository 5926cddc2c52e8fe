/**
 * Tests for the logger utility
 * Covers: level helpers, context forwarding, and environment-based transport selection
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

const mockPino = vi.hoisted(() => vi.fn(() => mockLogger));
const mockDestination = vi.hoisted(() => vi.fn((fd: number) => ({ fd })));

vi.mock('pino', () => ({ pino: mockPino, destination: mockDestination }));

vi.mock('../config.js', () => ({
  getConfig: vi.fn(() => ({ logLevel: 'INFO', nodeEnv: 'test' })),
}));

import { debug, info, warn, error, resetLogger } from './logger.js';
import { getConfig } from '../config.js';
import type { Config } from '../config.js';

const baseConfig: Config = {
  nodeEnv: 'test',
  logLevel: 'INFO',
  authMode: 'oauth',
  credentialsPath: 'credentials.json',
  tokenPath: 'token.json',
  serviceAccountPath: 'service-account.json',
  oauthCallbackPort: 0,
};

describe('Logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    resetLogger();
    vi.mocked(getConfig).mockReturnValue(baseConfig);
  });

  it('logs debug message without context', () => {
    debug('Test debug message');

    expect(mockLogger.debug).toHaveBeenCalledWith('Test debug message');
  });

  it('passes context first, message second', () => {
    const context = { module: 'docs', documentId: 'doc-1' };
    info('Fetched document', context);

    expect(mockLogger.info).toHaveBeenCalledWith(context, 'Fetched document');
  });

  it('routes warn and error to matching levels', () => {
    warn('careful');
    error('broken', { phase: 'init' });

    expect(mockLogger.warn).toHaveBeenCalledWith('careful');
    expect(mockLogger.error).toHaveBeenCalledWith({ phase: 'init' }, 'broken');
  });

  it('creates the pino instance once', () => {
    info('one');
    info('two');

    expect(mockPino).toHaveBeenCalledTimes(1);
  });

  it('writes plain JSON to stderr outside development', () => {
    vi.mocked(getConfig).mockReturnValue({ ...baseConfig, nodeEnv: 'production', logLevel: 'WARN' });

    info('hello');

    expect(mockDestination).toHaveBeenCalledWith(2);
    expect(mockPino).toHaveBeenCalledWith({ level: 'warn' }, { fd: 2 });
  });

  it('uses pino-pretty on stderr in development', () => {
    vi.mocked(getConfig).mockReturnValue({ ...baseConfig, nodeEnv: 'development', logLevel: 'DEBUG' });

    info('hello');

    expect(mockPino).toHaveBeenCalledWith({
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
    expect(mockDestination).not.toHaveBeenCalled();
  });
});
