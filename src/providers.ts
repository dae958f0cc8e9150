import type { MessageParam, Message as AnthropicMessage } from '@anthropic-ai/sdk/resources/messages';
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { AnthropicAdapter, type AnthropicMessagesClient } from './anthropic-adapter.js';
import { libraryConfig, resolveAdapterOptions, type AdapterOptions, type ApiConfig } from './config.js';
import { Conversation, type ConversationOptions, type VendorAdapter } from './conversation.js';
import { assertNever, UnsupportedVariantError } from './errors.js';
import { withApiLogging } from './logging.js';
import { OpenAIAdapter, type OpenAIChatClient } from './openai-adapter.js';
import { createModelId, VENDORS, type ModelId } from './vendors.js';

export type AnthropicConversation = Conversation<MessageParam, AnthropicMessage>;
export type OpenAIConversation = Conversation<ChatCompletionMessageParam, ChatCompletion>;
export type AnyConversation = AnthropicConversation | OpenAIConversation;

export type CreateConversationOptions = ConversationOptions &
  Partial<AdapterOptions> & {
    logApiCalls?: boolean;
    openaiBaseURL?: string;
    anthropicClient?: AnthropicMessagesClient;
    openaiClient?: OpenAIChatClient;
  };

function maybeLogged<V, R>(
  adapter: VendorAdapter<V, R>,
  logApiCalls: boolean,
): VendorAdapter<V, R> {
  return logApiCalls ? withApiLogging(adapter) : adapter;
}

export function createConversation(
  modelId: ModelId,
  apiConfig: ApiConfig,
  options: CreateConversationOptions = {},
): AnyConversation {
  const {
    name,
    logApiCalls = libraryConfig.logApiCalls,
    openaiBaseURL,
    anthropicClient,
    openaiClient,
    ...overrides
  } = options;
  const id = createModelId(modelId.vendor, modelId.apiModelName);
  const adapterOptions = resolveAdapterOptions(overrides);

  switch (id.vendor) {
    case 'anthropic': {
      const adapter = new AnthropicAdapter({
        ...adapterOptions,
        client: anthropicClient,
        apiKey: anthropicClient ? undefined : apiConfig.getApiKeyOrThrow('anthropic'),
      });
      return new Conversation(id, maybeLogged(adapter, logApiCalls), { name });
    }
    case 'openai': {
      const adapter = new OpenAIAdapter({
        ...adapterOptions,
        client: openaiClient,
        baseURL: openaiBaseURL,
        apiKey: openaiClient ? undefined : apiConfig.getApiKeyOrThrow('openai'),
      });
      return new Conversation(id, maybeLogged(adapter, logApiCalls), { name });
    }
    case 'google':
      throw new UnsupportedVariantError(
        `Conversations with ${VENDORS.google.displayName} models are not supported yet`,
      );
    default:
      return assertNever(id.vendor, 'vendor');
  }
}
