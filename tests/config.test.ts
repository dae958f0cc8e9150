import { mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const ENV_KEYS = [
  'MAX_TOKENS',
  'WEB_SEARCH_MAX_USES',
  'PROMPT_CACHE_TTL',
  'LOG_API_CALLS',
  'MODEL_CATALOG_PATH',
];

beforeEach(() => {
  vi.resetModules();
  ENV_KEYS.forEach((key) => {
    delete process.env[key];
  });
});

afterEach(() => {
  ENV_KEYS.forEach((key) => {
    delete process.env[key];
  });
  vi.restoreAllMocks();
});

describe('libraryConfig', () => {
  it('uses defaults when the environment is empty', async () => {
    const { libraryConfig } = await import('../src/config.js');
    expect(libraryConfig.maxTokens).toBe(4096);
    expect(libraryConfig.webSearchMaxUses).toBe(5);
    expect(libraryConfig.promptCacheTtl).toBe('5m');
    expect(libraryConfig.logApiCalls).toBe(false);
    expect(libraryConfig.modelCatalogPath).toBe(
      fileURLToPath(new URL('../models.json', import.meta.url)),
    );
  });

  it('reads overrides from the environment', async () => {
    process.env.MAX_TOKENS = '2048';
    process.env.WEB_SEARCH_MAX_USES = '0';
    process.env.PROMPT_CACHE_TTL = '1h';
    process.env.LOG_API_CALLS = 'true';
    process.env.MODEL_CATALOG_PATH = '/tmp/catalog.json';
    const { libraryConfig } = await import('../src/config.js');

    expect(libraryConfig).toEqual({
      maxTokens: 2048,
      webSearchMaxUses: 0,
      promptCacheTtl: '1h',
      logApiCalls: true,
      modelCatalogPath: '/tmp/catalog.json',
    });
  });

  it('warns about an invalid cache TTL and keeps the default', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    process.env.PROMPT_CACHE_TTL = '10m';
    const { libraryConfig } = await import('../src/config.js');

    expect(libraryConfig.promptCacheTtl).toBe('5m');
    expect(warn).toHaveBeenCalledWith('Ignoring PROMPT_CACHE_TTL="10m", expected "5m" or "1h"');
  });

  it('resolveAdapterOptions merges overrides over the defaults', async () => {
    process.env.MAX_TOKENS = '1000';
    const { resolveAdapterOptions } = await import('../src/config.js');

    expect(resolveAdapterOptions()).toEqual({
      maxTokens: 1000,
      webSearchMaxUses: 5,
      cacheTtl: '5m',
      systemPrompt: '',
    });
    expect(resolveAdapterOptions({ maxTokens: 50, systemPrompt: 'Be kind.' })).toEqual({
      maxTokens: 50,
      webSearchMaxUses: 5,
      cacheTtl: '5m',
      systemPrompt: 'Be kind.',
    });
  });
});

describe('EnvironmentApiConfig', () => {
  it('reads trimmed keys per vendor and treats blanks as missing', async () => {
    const { EnvironmentApiConfig } = await import('../src/config.js');
    const config = new EnvironmentApiConfig({
      ANTHROPIC_API_KEY: ' test-secret ',
      OPENAI_API_KEY: '   ',
    });

    expect(config.getApiKey('anthropic')).toBe('test-secret');
    expect(config.getApiKey('openai')).toBeUndefined();
    expect(config.getApiKey('google')).toBeUndefined();
  });

  it('getApiKeyOrThrow names the vendor', async () => {
    const { EnvironmentApiConfig } = await import('../src/config.js');
    const { ConfigurationError } = await import('../src/errors.js');
    const config = new EnvironmentApiConfig({});

    expect(() => config.getApiKeyOrThrow('google')).toThrow(ConfigurationError);
    expect(() => config.getApiKeyOrThrow('google')).toThrow(/^API key for Google is not configured/);
  });
});

describe('FileApiConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'api-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads dotenv-style key files', async () => {
    const file = path.join(dir, 'keys.env');
    await writeFile(file, '# keys\nanthropic.api.key=test-secret\nopenai.api.key=\n');
    const { FileApiConfig } = await import('../src/config.js');

    const config = FileApiConfig.fromFile(file);

    expect(config.getApiKey('anthropic')).toBe('test-secret');
    expect(config.getApiKey('openai')).toBeUndefined();
    expect(config.getApiKeyOrThrow('anthropic')).toBe('test-secret');
  });

  it('accepts a record of values', async () => {
    const { FileApiConfig } = await import('../src/config.js');
    expect(new FileApiConfig({ 'google.api.key': 'test-secret' }).getApiKey('google')).toBe(
      'test-secret',
    );
  });

  it('wraps unreadable files in a ConfigurationError', async () => {
    const { FileApiConfig } = await import('../src/config.js');
    const { ConfigurationError } = await import('../src/errors.js');

    expect(() => FileApiConfig.fromFile(path.join(dir, 'missing.env'))).toThrow(ConfigurationError);
  });
});
