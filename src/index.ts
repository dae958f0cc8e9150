export * from './types.js';
export * from './errors.js';
export * from './vendors.js';
export * from './citations.js';
export * from './blocks.js';
export * from './message.js';
export { detectTextFormat, isMarkdown, isWellFormedHtml } from './format-detector.js';
export {
  ApiConfig,
  EnvironmentApiConfig,
  FileApiConfig,
  libraryConfig,
  resolveAdapterOptions,
} from './config.js';
export type { AdapterOptions, CacheTtl } from './config.js';
export { ModelRegistry, loadModelRegistry, parseModelCatalog } from './models.js';
export type { ModelCapabilities, ModelDescriptor } from './models.js';
export { Conversation, generateDefaultName } from './conversation.js';
export type { ConversationOptions, VendorAdapter } from './conversation.js';
export { applyCacheBreakpoint, clearCacheBreakpoints, countCacheBreakpoints } from './caching.js';
export type { CacheBreakpoint } from './caching.js';
export { AnthropicAdapter, fromVendorCitation, toVendorCitation } from './anthropic-adapter.js';
export type { AnthropicAdapterOptions, AnthropicMessagesClient } from './anthropic-adapter.js';
export { OpenAIAdapter } from './openai-adapter.js';
export type { OpenAIAdapterOptions, OpenAIChatClient } from './openai-adapter.js';
export { withApiLogging } from './logging.js';
export { createConversation } from './providers.js';
export type {
  AnthropicConversation,
  AnyConversation,
  CreateConversationOptions,
  OpenAIConversation,
} from './providers.js';
