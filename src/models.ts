import * as fs from 'fs';
import { z } from 'zod';
import { libraryConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { createModelId, modelIdKey, parseVendor, type ModelId, type Vendor } from './vendors.js';

export interface ModelCapabilities {
  supportsChat: boolean;
  supportsTools: boolean;
  supportsImages: boolean;
  supportsFiles: boolean;
  supportsStreaming: boolean;
  contextWindowTokens: number;
  maxOutputTokens: number;
}

export interface ModelDescriptor {
  id: ModelId;
  friendlyName: string;
  apiModelName: string;
  capabilities: ModelCapabilities;
}

// Catalog entry as written in models.json
const modelEntrySchema = z.object({
  vendorSlug: z.string().min(1),
  apiModelName: z.string().min(1),
  friendlyName: z.string().min(1),
  supportsTools: z.boolean(),
  supportsImages: z.boolean(),
  supportsFiles: z.boolean(),
  supportsStreaming: z.boolean(),
  contextWindowTokens: z.number().int().positive(),
  maxOutputTokens: z.number().int().positive(),
});

const catalogSchema = z.array(modelEntrySchema);

type ModelEntry = z.infer<typeof modelEntrySchema>;

export class ModelRegistry {
  private readonly byId: ReadonlyMap<string, ModelDescriptor>;

  constructor(descriptors: Iterable<ModelDescriptor>) {
    const byId = new Map<string, ModelDescriptor>();
    for (const descriptor of descriptors) {
      byId.set(modelIdKey(descriptor.id.vendor, descriptor.id.apiModelName), descriptor);
    }
    this.byId = byId;
  }

  find(id: ModelId): ModelDescriptor | undefined;
  find(vendor: Vendor, apiModelName: string): ModelDescriptor | undefined;
  find(idOrVendor: ModelId | Vendor, apiModelName?: string): ModelDescriptor | undefined {
    const key =
      typeof idOrVendor === 'string'
        ? modelIdKey(idOrVendor, apiModelName ?? '')
        : modelIdKey(idOrVendor.vendor, idOrVendor.apiModelName);
    return this.byId.get(key);
  }

  list(vendor?: Vendor): ModelDescriptor[] {
    const all = [...this.byId.values()];
    return vendor ? all.filter((descriptor) => descriptor.id.vendor === vendor) : all;
  }

  get size(): number {
    return this.byId.size;
  }
}

function toDescriptor(entry: ModelEntry): ModelDescriptor {
  const id = createModelId(parseVendor(entry.vendorSlug), entry.apiModelName);
  return {
    id,
    friendlyName: entry.friendlyName,
    apiModelName: id.apiModelName,
    capabilities: {
      supportsChat: true,
      supportsTools: entry.supportsTools,
      supportsImages: entry.supportsImages,
      supportsFiles: entry.supportsFiles,
      supportsStreaming: entry.supportsStreaming,
      contextWindowTokens: entry.contextWindowTokens,
      maxOutputTokens: entry.maxOutputTokens,
    },
  };
}

export function parseModelCatalog(json: unknown): ModelRegistry {
  const result = catalogSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Invalid model catalog: ${result.error.message}`, {
      cause: result.error,
    });
  }
  try {
    return new ModelRegistry(result.data.map(toDescriptor));
  } catch (err) {
    throw new ConfigurationError('Invalid model catalog entry', { cause: err });
  }
}

export function loadModelRegistry(catalogPath: string = libraryConfig.modelCatalogPath): ModelRegistry {
  let raw: string;
  try {
    raw = fs.readFileSync(catalogPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Model catalog not found: ${catalogPath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Model catalog is not valid JSON: ${catalogPath}`, { cause: err });
  }

  const registry = parseModelCatalog(json);
  console.log(`Loaded ${registry.size} model(s) from ${catalogPath}`);
  return registry;
}
