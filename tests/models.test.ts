import { mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import { loadModelRegistry, parseModelCatalog } from '../src/models.js';
import { createModelId } from '../src/vendors.js';

const entry = {
  vendorSlug: 'anthropic',
  apiModelName: 'claude-test',
  friendlyName: 'Claude Test',
  supportsTools: true,
  supportsImages: true,
  supportsFiles: false,
  supportsStreaming: true,
  contextWindowTokens: 200000,
  maxOutputTokens: 8192,
};

describe('parseModelCatalog', () => {
  it('builds descriptors keyed by vendor and model name', () => {
    const registry = parseModelCatalog([
      entry,
      { ...entry, vendorSlug: 'openai', apiModelName: 'gpt-test', friendlyName: 'GPT Test' },
    ]);

    expect(registry.size).toBe(2);
    expect(registry.find(createModelId('anthropic', 'claude-test'))).toEqual({
      id: { vendor: 'anthropic', apiModelName: 'claude-test' },
      friendlyName: 'Claude Test',
      apiModelName: 'claude-test',
      capabilities: {
        supportsChat: true,
        supportsTools: true,
        supportsImages: true,
        supportsFiles: false,
        supportsStreaming: true,
        contextWindowTokens: 200000,
        maxOutputTokens: 8192,
      },
    });
    expect(registry.find('openai', 'gpt-test')?.friendlyName).toBe('GPT Test');
    expect(registry.find('openai', 'claude-test')).toBeUndefined();
    expect(registry.list('openai').map((model) => model.apiModelName)).toEqual(['gpt-test']);
    expect(registry.list()).toHaveLength(2);
  });

  it('rejects malformed entries', () => {
    expect(() => parseModelCatalog([{ ...entry, contextWindowTokens: -1 }])).toThrow(
      ConfigurationError,
    );
    expect(() => parseModelCatalog({ models: [] })).toThrow(ConfigurationError);
  });

  it('rejects unknown vendors', () => {
    expect(() => parseModelCatalog([{ ...entry, vendorSlug: 'acme' }])).toThrow(
      ConfigurationError,
    );
  });
});

describe('loadModelRegistry', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'models-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled catalog', () => {
    const registry = loadModelRegistry();

    expect(registry.find('anthropic', 'claude-sonnet-4-5')?.friendlyName).toBe('Claude Sonnet 4.5');
    expect(registry.list('google')).toHaveLength(1);
  });

  it('loads a catalog from a path and logs the count', async () => {
    const file = path.join(dir, 'models.json');
    await writeFile(file, JSON.stringify([entry]));

    const registry = loadModelRegistry(file);

    expect(registry.size).toBe(1);
    expect(console.log).toHaveBeenCalledWith(`Loaded 1 model(s) from ${file}`);
  });

  it('fails on missing files and invalid JSON', async () => {
    const broken = path.join(dir, 'broken.json');
    await writeFile(broken, '[{');

    expect(() => loadModelRegistry(path.join(dir, 'absent.json'))).toThrow(ConfigurationError);
    expect(() => loadModelRegistry(broken)).toThrow(ConfigurationError);
  });
});
