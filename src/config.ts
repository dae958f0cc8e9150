import 'dotenv/config';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './errors.js';
import { VENDORS, type Vendor } from './vendors.js';

// ---------- API keys ----------

export abstract class ApiConfig {
  abstract getApiKey(vendor: Vendor): string | undefined;

  getApiKeyOrThrow(vendor: Vendor): string {
    const apiKey = this.getApiKey(vendor);
    if (!apiKey) {
      throw new ConfigurationError(
        `API key for ${VENDORS[vendor].displayName} is not configured. ` +
          'Please configure it using the appropriate method for your ApiConfig implementation.',
      );
    }
    return apiKey;
  }
}

const ENV_VARS: Record<Vendor, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
};

export class EnvironmentApiConfig extends ApiConfig {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    super();
  }

  getApiKey(vendor: Vendor): string | undefined {
    const value = this.env[ENV_VARS[vendor]]?.trim();
    return value ? value : undefined;
  }
}

// Keys file format (dotenv syntax, keep it out of version control):
//   anthropic.api.key=...
//   openai.api.key=...
//   google.api.key=...
const FILE_KEYS: Record<Vendor, string> = {
  anthropic: 'anthropic.api.key',
  openai: 'openai.api.key',
  google: 'google.api.key',
};

export class FileApiConfig extends ApiConfig {
  private readonly values: Record<string, string>;

  constructor(values: Record<string, string>) {
    super();
    this.values = { ...values };
  }

  static fromFile(filePath: string): FileApiConfig {
    let contents: string;
    try {
      contents = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`Failed to read API key file ${filePath}`, { cause: err });
    }
    return new FileApiConfig(dotenv.parse(contents));
  }

  getApiKey(vendor: Vendor): string | undefined {
    const value = this.values[FILE_KEYS[vendor]]?.trim();
    return value ? value : undefined;
  }
}

// ---------- Library defaults ----------

export type CacheTtl = '5m' | '1h';

function parseCacheTtl(raw: string | undefined): CacheTtl {
  if (!raw) return '5m';
  if (raw === '5m' || raw === '1h') return raw;
  console.warn(`Ignoring PROMPT_CACHE_TTL="${raw}", expected "5m" or "1h"`);
  return '5m';
}

const DEFAULT_MODEL_CATALOG = fileURLToPath(new URL('../models.json', import.meta.url));

export const libraryConfig = {
  maxTokens: parseInt(process.env.MAX_TOKENS || '4096', 10),
  webSearchMaxUses: parseInt(process.env.WEB_SEARCH_MAX_USES || '5', 10),
  promptCacheTtl: parseCacheTtl(process.env.PROMPT_CACHE_TTL),
  logApiCalls: process.env.LOG_API_CALLS === 'true',
  modelCatalogPath: process.env.MODEL_CATALOG_PATH || DEFAULT_MODEL_CATALOG,
};

export interface AdapterOptions {
  maxTokens: number;
  // 0 disables the web search tool
  webSearchMaxUses: number;
  cacheTtl: CacheTtl;
  systemPrompt: string;
}

// Per-conversation overrides on top of the environment defaults
export function resolveAdapterOptions(overrides: Partial<AdapterOptions> = {}): AdapterOptions {
  return {
    maxTokens: overrides.maxTokens ?? libraryConfig.maxTokens,
    webSearchMaxUses: overrides.webSearchMaxUses ?? libraryConfig.webSearchMaxUses,
    cacheTtl: overrides.cacheTtl ?? libraryConfig.promptCacheTtl,
    systemPrompt: overrides.systemPrompt ?? '',
  };
}
