import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { configFromEnv, loadConfig, CONFIG_FILE } from '../../src/config/config.js';

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'orunmila-test-'));
}

describe('configFromEnv', () => {
  it('should return empty object for empty env', () => {
    expect(configFromEnv({})).toEqual({});
  });

  it('should pick the Gemini key first when several are set', () => {
    const result = configFromEnv({ OPENAI_API_KEY: 'test-openai', GEMINI_API_KEY: 'test-gemini' });
    expect(result.llm).toEqual({ provider: 'gemini', apiKey: 'test-gemini' });
  });

  it('should map Anthropic key with model override', () => {
    const result = configFromEnv({ ANTHROPIC_API_KEY: 'test-secret', ORUNMILA_MODEL: 'claude-3-5-haiku-latest' });
    expect(result.llm).toEqual({ provider: 'anthropic', apiKey: 'test-secret', model: 'claude-3-5-haiku-latest' });
  });

  it('should map Telex and server variables', () => {
    const result = configFromEnv({
      TELEX_API_KEY: 'test-key',
      TELEX_WEBHOOK_SECRET: 'test-secret',
      PORT: '9090',
      DEBUG: 'true',
      LOG_LEVEL: 'WARN',
    });
    expect(result.telex).toEqual({ apiKey: 'test-key', webhookSecret: 'test-secret' });
    expect(result.server).toEqual({ port: 9090, debug: true });
    expect(result.logLevel).toBe('warn');
  });

  it('should treat DEBUG=0 as false', () => {
    expect(configFromEnv({ DEBUG: '0' }).server).toEqual({ debug: false });
  });
});

describe('loadConfig', () => {
  it('should use defaults when no file and no env', async () => {
    const config = await loadConfig(undefined, {}, tempDir());
    expect(config.llm.provider).toBe('gemini');
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.server.port).toBe(8000);
  });

  it('should let env override the config file', async () => {
    const dir = tempDir();
    writeFileSync(join(dir, CONFIG_FILE), JSON.stringify({
      server: { port: 7000, host: '127.0.0.1' },
      webhook: { workers: 2 },
    }));

    const config = await loadConfig(undefined, { PORT: '7100' }, dir);
    expect(config.server.port).toBe(7100);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.webhook.workers).toBe(2);
  });

  it('should let overrides win over env', async () => {
    const config = await loadConfig({ server: { port: 1234 } }, { PORT: '7100' }, tempDir());
    expect(config.server.port).toBe(1234);
  });

  it('should return a frozen config', async () => {
    const config = await loadConfig(undefined, {}, tempDir());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.telex)).toBe(true);
  });

  it('should reject a config file that is not an object', async () => {
    const dir = tempDir();
    writeFileSync(join(dir, CONFIG_FILE), '[1, 2]');
    await expect(loadConfig(undefined, {}, dir)).rejects.toThrow('expected a JSON object');
  });
});
