import { ContentValidationError } from './errors.js';

export type Vendor = 'anthropic' | 'openai' | 'google';

export interface VendorInfo {
  displayName: string;
  slug: Vendor;
  website: string;
}

export const VENDORS: Readonly<Record<Vendor, VendorInfo>> = {
  anthropic: { displayName: 'Anthropic', slug: 'anthropic', website: 'https://www.anthropic.com/' },
  openai: { displayName: 'OpenAI', slug: 'openai', website: 'https://openai.com/' },
  google: { displayName: 'Google', slug: 'google', website: 'https://ai.google/' },
};

export function parseVendor(slug: string): Vendor {
  const normalized = slug.trim().toLowerCase();
  if (normalized === 'anthropic' || normalized === 'openai' || normalized === 'google') {
    return normalized;
  }
  throw new ContentValidationError(`Unknown vendor: ${slug}`);
}

export type ModelId = {
  readonly vendor: Vendor;
  readonly apiModelName: string;
};

export function createModelId(vendor: Vendor, apiModelName: string): ModelId {
  if (!(vendor in VENDORS)) {
    throw new ContentValidationError(`Unknown vendor: ${String(vendor)}`);
  }
  const trimmed = apiModelName?.trim();
  if (!trimmed) {
    throw new ContentValidationError('Model name cannot be blank');
  }
  return Object.freeze({ vendor, apiModelName: trimmed });
}

// "anthropic:claude-sonnet-4-5" -> ModelId
export function parseModelId(value: string): ModelId {
  const separator = value.indexOf(':');
  if (separator <= 0) {
    throw new ContentValidationError(`Expected "<vendor>:<model>", got "${value}"`);
  }
  return createModelId(parseVendor(value.slice(0, separator)), value.slice(separator + 1));
}

export function formatModelId(modelId: ModelId): string {
  return `${modelId.vendor}:${modelId.apiModelName}`;
}

export function modelIdKey(vendor: Vendor, apiModelName: string): string {
  return `${vendor}:${apiModelName}`;
}
