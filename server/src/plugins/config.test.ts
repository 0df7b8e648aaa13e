import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { loadConfig } from './config.js';

describe('Configuration Module - loadConfig() Pure Function', () => {
  describe('Scenario 1: Default Configuration Values Applied', () => {
    it('returns correct defaults when no env vars set', () => {
      expect(loadConfig({})).toEqual({
        port: 3000,
        host: '0.0.0.0',
        databaseUrl: '/app/data/studio-ledger.db',
        logLevel: 'info',
        nodeEnv: 'production',
        trustProxy: false,
      });
    });

    it('treats empty string env vars as missing (defaults applied)', () => {
      const config = loadConfig({
        PORT: '',
        HOST: '',
        DATABASE_URL: '',
        LOG_LEVEL: '',
        NODE_ENV: '',
        TRUST_PROXY: '',
      });

      expect(config).toEqual(loadConfig({}));
    });
  });

  describe('Scenario 2: Environment Overrides', () => {
    it('reads every supported variable', () => {
      const config = loadConfig({
        PORT: '8080',
        HOST: '127.0.0.1',
        DATABASE_URL: '/tmp/ledger.db',
        LOG_LEVEL: 'debug',
        NODE_ENV: 'development',
        TRUST_PROXY: 'true',
      });

      expect(config).toEqual({
        port: 8080,
        host: '127.0.0.1',
        databaseUrl: '/tmp/ledger.db',
        logLevel: 'debug',
        nodeEnv: 'development',
        trustProxy: true,
      });
    });

    it('accepts log levels in any case', () => {
      expect(loadConfig({ LOG_LEVEL: 'WARN' }).logLevel).toBe('warn');
      expect(loadConfig({ TRUST_PROXY: 'TRUE' }).trustProxy).toBe(true);
    });
  });

  describe('Scenario 3: Invalid Values Rejected', () => {
    it('rejects a non-numeric port', () => {
      expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be a valid number, got: abc');
    });

    it('rejects an out-of-range port', () => {
      expect(() => loadConfig({ PORT: '70000' })).toThrow('PORT must be in range 0-65535, got: 70000');
    });

    it('rejects an unknown log level', () => {
      expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
        'LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, got: verbose',
      );
    });

    it('rejects a non-boolean TRUST_PROXY', () => {
      expect(() => loadConfig({ TRUST_PROXY: 'yes' })).toThrow(
        "TRUST_PROXY must be 'true' or 'false', got: yes",
      );
    });

    it('lists every problem in one error', () => {
      expect(() => loadConfig({ PORT: 'abc', LOG_LEVEL: 'loud' })).toThrow(
        'Configuration validation failed:\n' +
          '  - PORT must be a valid number, got: abc\n' +
          '  - LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, got: loud',
      );
    });
  });
});

describe('Configuration Plugin', () => {
  let app: FastifyInstance | undefined;
  let tempDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    tempDir = mkdtempSync(join(tmpdir(), 'studio-ledger-config-'));
    process.env.DATABASE_URL = join(tempDir, 'test.db');
  });

  afterEach(async () => {
    if (app) {
      await app.close();
      app = undefined;
    }
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('decorates the instance with the loaded configuration', async () => {
    process.env.PORT = '4321';
    app = await buildApp();

    expect(app.config.port).toBe(4321);
    expect(app.config.databaseUrl).toBe(join(tempDir, 'test.db'));
  });

  it('applies TRUST_PROXY to client address resolution', async () => {
    process.env.TRUST_PROXY = 'TRUE';
    app = await buildApp();
    app.get('/test/ip', async (request) => ({ ip: request.ip }));

    const response = await app.inject({
      method: 'GET',
      url: '/test/ip',
      headers: { 'x-forwarded-for': '203.0.113.7' },
    });

    expect(app.config.trustProxy).toBe(true);
    expect(response.json<{ ip: string }>()).toEqual({ ip: '203.0.113.7' });
  });

  it('applies LOG_LEVEL to the server logger', async () => {
    process.env.LOG_LEVEL = 'WARN';
    app = await buildApp();

    expect(app.log.level).toBe('warn');
  });

  it('refuses to start with invalid configuration', async () => {
    process.env.PORT = 'not-a-port';

    await expect(buildApp()).rejects.toThrow('PORT must be a valid number, got: not-a-port');
  });
});
