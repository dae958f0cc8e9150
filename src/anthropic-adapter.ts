import Anthropic from '@anthropic-ai/sdk';
import type {
  Base64ImageSource,
  ContentBlock as AnthropicContentBlock,
  ContentBlockParam,
  DocumentBlockParam,
  ImageBlockParam,
  Message as AnthropicMessage,
  MessageCreateParamsNonStreaming,
  MessageParam,
  TextBlockParam,
  TextCitation as AnthropicCitation,
  TextCitationParam,
} from '@anthropic-ai/sdk/resources/messages';
import * as path from 'path';
import {
  base64ImageBlock,
  base64PdfDocumentBlock,
  plainTextDocumentBlock,
  textBlock,
  unknownBlock,
  urlImageBlock,
  urlPdfDocumentBlock,
} from './blocks.js';
import { applyCacheBreakpoint } from './caching.js';
import {
  charLocationCitation,
  contentBlockLocationCitation,
  pageLocationCitation,
  searchResultCitation,
  UNTITLED_SOURCE,
  unknownCitation,
  webSearchResultCitation,
} from './citations.js';
import { resolveAdapterOptions, type AdapterOptions } from './config.js';
import type { VendorAdapter } from './conversation.js';
import {
  assertNever,
  ConfigurationError,
  ContentValidationError,
  UnsupportedVariantError,
} from './errors.js';
import { createMessage } from './message.js';
import type {
  Citation,
  ContentBlock,
  DocumentBlock,
  ImageBlock,
  Message,
  MessageRole,
  TextBlock,
} from './types.js';
import {
  readFileAsBase64,
  validateBase64Data,
  validateFilePath,
  validateHttpUrl,
  validateMimeType,
  validatePlainText,
} from './validation.js';
import type { ModelId } from './vendors.js';

type ImageMediaType = Base64ImageSource['media_type'];

const IMAGE_MEDIA_TYPES: Record<string, ImageMediaType> = {
  'image/png': 'image/png',
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/gif': 'image/gif',
  'image/webp': 'image/webp',
};

const IMAGE_EXTENSION_MEDIA_TYPES: Record<string, ImageMediaType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

const SUPPORTED_IMAGE_MIME_TYPES: ReadonlySet<string> = new Set(Object.keys(IMAGE_MEDIA_TYPES));
const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(
  Object.keys(IMAGE_EXTENSION_MEDIA_TYPES),
);
const SUPPORTED_PDF_MIME_TYPES: ReadonlySet<string> = new Set(['application/pdf']);
const SUPPORTED_TEXT_DOCUMENT_MIME_TYPES: ReadonlySet<string> = new Set(['text/plain']);
const SUPPORTED_DOCUMENT_EXTENSIONS: ReadonlySet<string> = new Set(['.pdf']);

// Narrow view of the SDK client so tests can pass a stand-in
export interface AnthropicMessagesClient {
  messages: {
    create(params: MessageCreateParamsNonStreaming): PromiseLike<AnthropicMessage>;
  };
}

export type AnthropicAdapterOptions = Partial<AdapterOptions> & {
  apiKey?: string;
  client?: AnthropicMessagesClient;
};

export class AnthropicAdapter implements VendorAdapter<MessageParam, AnthropicMessage> {
  readonly vendor = 'anthropic' as const;
  private readonly client: AnthropicMessagesClient;
  private readonly options: AdapterOptions;

  constructor(options: AnthropicAdapterOptions) {
    const { apiKey, client, ...overrides } = options;
    if (client) {
      this.client = client;
    } else {
      if (!apiKey?.trim()) {
        throw new ConfigurationError('Anthropic API key cannot be blank');
      }
      this.client = new Anthropic({ apiKey });
    }
    this.options = resolveAdapterOptions(overrides);
  }

  // ---------- Generic -> vendor ----------

  async toVendorMessage(message: Message): Promise<MessageParam> {
    const role = toVendorRole(message.role);
    const content: ContentBlockParam[] = [];
    for (const block of message.blocks) {
      content.push(await this.toVendorBlock(block));
    }
    return { role, content };
  }

  async toVendorBlock(block: ContentBlock): Promise<ContentBlockParam> {
    switch (block.type) {
      case 'text':
        return toVendorTextBlock(block);
      case 'image':
        return toVendorImageBlock(block);
      case 'document':
        return toVendorDocumentBlock(block);
      case 'unknown':
        throw new UnsupportedVariantError(
          `Unknown blocks cannot be sent to Anthropic: ${block.vendorData}`,
        );
      default:
        return assertNever(block, 'content block');
    }
  }

  // ---------- Transport ----------

  async sendConversationToVendor(
    history: readonly MessageParam[],
    modelId: ModelId,
  ): Promise<AnthropicMessage> {
    const systemPrompt = this.options.systemPrompt.trim();
    const params: MessageCreateParamsNonStreaming = {
      model: modelId.apiModelName,
      max_tokens: this.options.maxTokens,
      messages: [...history],
    };
    if (systemPrompt) {
      params.system = systemPrompt;
    }
    if (this.options.webSearchMaxUses > 0) {
      params.tools = [
        { type: 'web_search_20250305', name: 'web_search', max_uses: this.options.webSearchMaxUses },
      ];
    }
    return this.client.messages.create(params);
  }

  // ---------- Vendor -> generic ----------

  vendorResponseToVendorMessage(response: AnthropicMessage): MessageParam {
    return {
      role: 'assistant',
      content: response.content.map(responseBlockToParam),
    };
  }

  fromVendorResponse(response: AnthropicMessage): Message {
    const usage = response.usage;
    return createMessage(
      fromVendorRole(response.role),
      response.content.map(fromVendorContentBlock),
      {
        inputTokens: usage.input_tokens,
        outputTokens: usage.output_tokens,
        cacheCreationInputTokens: usage.cache_creation_input_tokens ?? 0,
        cacheReadInputTokens: usage.cache_read_input_tokens ?? 0,
      },
    );
  }

  /** Rebuilds a generic message from a stored history entry. */
  fromVendorMessage(message: MessageParam): Message {
    const blocks =
      typeof message.content === 'string'
        ? [textBlock(message.content)]
        : message.content.map(fromVendorBlockParam);
    return createMessage(fromVendorRole(message.role), blocks);
  }

  // ---------- Caching ----------

  isCacheable(): boolean {
    return true;
  }

  configureCaching(history: MessageParam[]): void {
    applyCacheBreakpoint(history, { type: 'ephemeral', ttl: this.options.cacheTtl });
  }
}

// ---------- Roles ----------

function toVendorRole(role: MessageRole): MessageParam['role'] {
  switch (role) {
    case 'user':
      return 'user';
    case 'assistant':
      return 'assistant';
    case 'system':
    case 'tool':
      throw new UnsupportedVariantError(
        `Anthropic messages cannot have role "${role}"; pass system prompts as an adapter option`,
      );
    default:
      return assertNever(role, 'message role');
  }
}

function fromVendorRole(role: string): MessageRole {
  if (role === 'assistant' || role === 'user') {
    return role;
  }
  throw new UnsupportedVariantError(`Unsupported Anthropic role: ${role}`);
}

// ---------- Text & citations ----------

function toVendorTextBlock(block: TextBlock): TextBlockParam {
  const param: TextBlockParam = { type: 'text', text: block.text };
  if (block.citations.length > 0) {
    param.citations = block.citations.map(toVendorCitation);
  }
  return param;
}

function requireLocator<T>(value: T | undefined, field: string, citation: Citation): T {
  if (value === undefined) {
    throw new ContentValidationError(`Citation of type ${citation.type} is missing ${field}`);
  }
  return value;
}

export function toVendorCitation(citation: Citation): TextCitationParam {
  switch (citation.type) {
    case 'char_location':
      return {
        type: 'char_location',
        cited_text: citation.citedText,
        document_index: requireLocator(citation.documentIndex, 'documentIndex', citation),
        document_title: citation.documentTitle ?? null,
        start_char_index: requireLocator(citation.startCharIndex, 'startCharIndex', citation),
        end_char_index: requireLocator(citation.endCharIndex, 'endCharIndex', citation),
      };
    case 'page_location':
      return {
        type: 'page_location',
        cited_text: citation.citedText,
        document_index: requireLocator(citation.documentIndex, 'documentIndex', citation),
        document_title: citation.documentTitle ?? null,
        start_page_number: requireLocator(citation.startPageNumber, 'startPageNumber', citation),
        end_page_number: requireLocator(citation.endPageNumber, 'endPageNumber', citation),
      };
    case 'content_block_location':
      return {
        type: 'content_block_location',
        cited_text: citation.citedText,
        document_index: requireLocator(citation.documentIndex, 'documentIndex', citation),
        document_title: citation.documentTitle ?? null,
        start_block_index: requireLocator(citation.startBlockIndex, 'startBlockIndex', citation),
        end_block_index: requireLocator(citation.endBlockIndex, 'endBlockIndex', citation),
      };
    case 'web_search_result_location':
      return {
        type: 'web_search_result_location',
        cited_text: citation.citedText,
        url: requireLocator(citation.url, 'url', citation),
        encrypted_index: requireLocator(citation.encryptedIndex, 'encryptedIndex', citation),
        title: citation.title,
      };
    case 'search_result_location':
      return {
        type: 'search_result_location',
        cited_text: citation.citedText,
        source: requireLocator(citation.source, 'source', citation),
        start_block_index: requireLocator(citation.startBlockIndex, 'startBlockIndex', citation),
        end_block_index: requireLocator(citation.endBlockIndex, 'endBlockIndex', citation),
        search_result_index: requireLocator(
          citation.searchResultIndex,
          'searchResultIndex',
          citation,
        ),
        title: citation.title,
      };
    case 'unknown':
      throw new UnsupportedVariantError(
        `Unknown citations cannot be sent to Anthropic: ${citation.rawData}`,
      );
    default:
      return assertNever(citation, 'citation');
  }
}

type CitationLike = AnthropicCitation | TextCitationParam;

// Response citations and request citation params share their wire shape
export function fromVendorCitation(citation: CitationLike): Citation {
  switch (citation.type) {
    case 'char_location':
      return charLocationCitation({
        citedText: citation.cited_text,
        title: citation.document_title ?? UNTITLED_SOURCE,
        documentIndex: citation.document_index,
        documentTitle: citation.document_title ?? undefined,
        fileId: 'file_id' in citation ? (citation.file_id ?? undefined) : undefined,
        startCharIndex: citation.start_char_index,
        endCharIndex: citation.end_char_index,
      });
    case 'page_location':
      return pageLocationCitation({
        citedText: citation.cited_text,
        title: citation.document_title ?? UNTITLED_SOURCE,
        documentIndex: citation.document_index,
        documentTitle: citation.document_title ?? undefined,
        fileId: 'file_id' in citation ? (citation.file_id ?? undefined) : undefined,
        startPageNumber: citation.start_page_number,
        endPageNumber: citation.end_page_number,
      });
    case 'content_block_location':
      return contentBlockLocationCitation({
        citedText: citation.cited_text,
        title: citation.document_title ?? UNTITLED_SOURCE,
        documentIndex: citation.document_index,
        documentTitle: citation.document_title ?? undefined,
        fileId: 'file_id' in citation ? (citation.file_id ?? undefined) : undefined,
        startBlockIndex: citation.start_block_index,
        endBlockIndex: citation.end_block_index,
      });
    case 'web_search_result_location':
      return webSearchResultCitation({
        citedText: citation.cited_text,
        title: citation.title ?? UNTITLED_SOURCE,
        url: citation.url,
        encryptedIndex: citation.encrypted_index,
      });
    case 'search_result_location':
      return searchResultCitation({
        citedText: citation.cited_text,
        title: citation.title ?? UNTITLED_SOURCE,
        source: citation.source,
        startBlockIndex: citation.start_block_index,
        endBlockIndex: citation.end_block_index,
        searchResultIndex: citation.search_result_index,
      });
    default:
      // Citation kinds newer than this SDK release
      return unknownCitation(JSON.stringify(citation));
  }
}

// ---------- Images ----------

async function toVendorImageBlock(block: ImageBlock): Promise<ImageBlockParam> {
  switch (block.source) {
    case 'url': {
      const url = validateHttpUrl(block.url);
      validateMimeType(block.mimeType, SUPPORTED_IMAGE_MIME_TYPES);
      return { type: 'image', source: { type: 'url', url: url.toString() } };
    }
    case 'base64': {
      validateBase64Data(block.data);
      const mediaType = imageMediaType(block.mimeType);
      return { type: 'image', source: { type: 'base64', data: block.data, media_type: mediaType } };
    }
    case 'file': {
      validateFilePath(block.path, SUPPORTED_IMAGE_EXTENSIONS);
      const mediaType = imageMediaType(block.mimeType);
      const data = await readFileAsBase64(block.path);
      return { type: 'image', source: { type: 'base64', data, media_type: mediaType } };
    }
    default:
      return assertNever(block, 'image block');
  }
}

function imageMediaType(mimeType: string): ImageMediaType {
  return IMAGE_MEDIA_TYPES[validateMimeType(mimeType, SUPPORTED_IMAGE_MIME_TYPES)];
}

// ---------- Documents ----------

async function toVendorDocumentBlock(block: DocumentBlock): Promise<DocumentBlockParam> {
  const citations = { enabled: true };
  switch (block.source) {
    case 'url': {
      const url = validateHttpUrl(block.url);
      validateMimeType(block.mimeType, SUPPORTED_PDF_MIME_TYPES);
      return { type: 'document', source: { type: 'url', url: url.toString() }, citations };
    }
    case 'base64':
      validateBase64Data(block.data);
      validateMimeType(block.mimeType, SUPPORTED_PDF_MIME_TYPES);
      return {
        type: 'document',
        source: { type: 'base64', data: block.data, media_type: 'application/pdf' },
        citations,
      };
    case 'file': {
      validateFilePath(block.path, SUPPORTED_DOCUMENT_EXTENSIONS);
      validateMimeType(block.mimeType, SUPPORTED_PDF_MIME_TYPES);
      const data = await readFileAsBase64(block.path);
      return {
        type: 'document',
        source: { type: 'base64', data, media_type: 'application/pdf' },
        citations,
      };
    }
    case 'text':
      validatePlainText(block.text);
      validateMimeType(block.mimeType, SUPPORTED_TEXT_DOCUMENT_MIME_TYPES);
      return {
        type: 'document',
        source: { type: 'text', data: block.text, media_type: 'text/plain' },
        citations,
      };
    default:
      return assertNever(block, 'document block');
  }
}

// ---------- Response blocks ----------

function fromVendorContentBlock(block: AnthropicContentBlock): ContentBlock {
  if (block.type === 'text') {
    return textBlock(block.text, { citations: (block.citations ?? []).map(fromVendorCitation) });
  }
  return unknownBlock(JSON.stringify(block));
}

// Copies the vendor's citation fields as they came, null titles included
function responseCitationToParam(citation: AnthropicCitation): TextCitationParam {
  switch (citation.type) {
    case 'char_location':
      return {
        type: 'char_location',
        cited_text: citation.cited_text,
        document_index: citation.document_index,
        document_title: citation.document_title,
        start_char_index: citation.start_char_index,
        end_char_index: citation.end_char_index,
      };
    case 'page_location':
      return {
        type: 'page_location',
        cited_text: citation.cited_text,
        document_index: citation.document_index,
        document_title: citation.document_title,
        start_page_number: citation.start_page_number,
        end_page_number: citation.end_page_number,
      };
    case 'content_block_location':
      return {
        type: 'content_block_location',
        cited_text: citation.cited_text,
        document_index: citation.document_index,
        document_title: citation.document_title,
        start_block_index: citation.start_block_index,
        end_block_index: citation.end_block_index,
      };
    case 'web_search_result_location':
      return {
        type: 'web_search_result_location',
        cited_text: citation.cited_text,
        url: citation.url,
        encrypted_index: citation.encrypted_index,
        title: citation.title,
      };
    case 'search_result_location':
      return {
        type: 'search_result_location',
        cited_text: citation.cited_text,
        source: citation.source,
        start_block_index: citation.start_block_index,
        end_block_index: citation.end_block_index,
        search_result_index: citation.search_result_index,
        title: citation.title,
      };
    default:
      return assertNever(citation, 'Anthropic response citation');
  }
}

function responseBlockToParam(block: AnthropicContentBlock): ContentBlockParam {
  switch (block.type) {
    case 'text': {
      const param: TextBlockParam = { type: 'text', text: block.text };
      if (block.citations && block.citations.length > 0) {
        param.citations = block.citations.map(responseCitationToParam);
      }
      return param;
    }
    case 'thinking':
      return { type: 'thinking', thinking: block.thinking, signature: block.signature };
    case 'redacted_thinking':
      return { type: 'redacted_thinking', data: block.data };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'server_tool_use':
      return { type: 'server_tool_use', id: block.id, name: block.name, input: block.input };
    case 'web_search_tool_result':
      // Kept in history so later web search citations still resolve
      return {
        type: 'web_search_tool_result',
        tool_use_id: block.tool_use_id,
        content: Array.isArray(block.content)
          ? block.content.map((result) => ({
              type: 'web_search_result' as const,
              url: result.url,
              title: result.title,
              encrypted_content: result.encrypted_content,
              page_age: result.page_age,
            }))
          : { type: 'web_search_tool_result_error', error_code: block.content.error_code },
      };
    default:
      throw new UnsupportedVariantError(
        `Unsupported Anthropic response block: ${JSON.stringify(block)}`,
      );
  }
}

// ---------- Stored params -> generic ----------

function fromVendorBlockParam(block: ContentBlockParam): ContentBlock {
  switch (block.type) {
    case 'text':
      return textBlock(block.text, { citations: (block.citations ?? []).map(fromVendorCitation) });
    case 'image':
      if (block.source.type === 'base64') {
        return base64ImageBlock(block.source.data, block.source.media_type);
      }
      return urlImageBlock(block.source.url, guessImageMimeType(block.source.url));
    case 'document':
      switch (block.source.type) {
        case 'base64':
          return base64PdfDocumentBlock(block.source.data, block.source.media_type);
        case 'text':
          return plainTextDocumentBlock(block.source.data, block.source.media_type);
        case 'url':
          return urlPdfDocumentBlock(block.source.url);
        default:
          return unknownBlock(JSON.stringify(block));
      }
    default:
      return unknownBlock(JSON.stringify(block));
  }
}

// URL image params carry no media type; fall back to the file extension
function guessImageMimeType(url: string): string {
  const extension = path.extname(new URL(url).pathname).toLowerCase();
  return IMAGE_EXTENSION_MEDIA_TYPES[extension] ?? 'application/octet-stream';
}
