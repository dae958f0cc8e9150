import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import * as path from 'path';
import { PDF_MIME_TYPE, textBlock } from './blocks.js';
import { UNTITLED_SOURCE, webSearchResultCitation } from './citations.js';
import { resolveAdapterOptions, type AdapterOptions } from './config.js';
import type { VendorAdapter } from './conversation.js';
import {
  assertNever,
  ConfigurationError,
  UnsupportedVariantError,
  VendorRequestError,
} from './errors.js';
import { createMessage } from './message.js';
import type {
  Citation,
  ContentBlock,
  DocumentBlock,
  ImageBlock,
  Message,
  TextBlock,
} from './types.js';
import {
  readFileAsBase64,
  toDataUrl,
  validateBase64Data,
  validateFilePath,
  validateHttpUrl,
  validateMimeType,
  validatePlainText,
} from './validation.js';
import type { ModelId } from './vendors.js';

const SUPPORTED_IMAGE_MIME_TYPES: ReadonlySet<string> = new Set([
  'image/png',
  'image/jpeg',
  'image/jpg',
  'image/gif',
  'image/webp',
]);
const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.webp',
]);
const SUPPORTED_PDF_MIME_TYPES: ReadonlySet<string> = new Set([PDF_MIME_TYPE]);
const SUPPORTED_TEXT_DOCUMENT_MIME_TYPES: ReadonlySet<string> = new Set(['text/plain']);
const SUPPORTED_DOCUMENT_EXTENSIONS: ReadonlySet<string> = new Set(['.pdf']);

const DEFAULT_PDF_FILENAME = 'document.pdf';

export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletion>;
    };
  };
}

export type OpenAIAdapterOptions = Partial<AdapterOptions> & {
  apiKey?: string;
  baseURL?: string;
  client?: OpenAIChatClient;
};

export class OpenAIAdapter implements VendorAdapter<ChatCompletionMessageParam, ChatCompletion> {
  readonly vendor = 'openai' as const;
  private readonly client: OpenAIChatClient;
  private readonly options: AdapterOptions;

  constructor(options: OpenAIAdapterOptions) {
    const { apiKey, baseURL, client, ...overrides } = options;
    if (client) {
      this.client = client;
    } else {
      if (!apiKey?.trim()) {
        throw new ConfigurationError('OpenAI API key cannot be blank');
      }
      this.client = new OpenAI({ apiKey, baseURL: baseURL || undefined });
    }
    this.options = resolveAdapterOptions(overrides);
  }

  async toVendorMessage(message: Message): Promise<ChatCompletionMessageParam> {
    switch (message.role) {
      case 'user': {
        const content: ChatCompletionContentPart[] = [];
        for (const block of message.blocks) {
          content.push(await toContentPart(block));
        }
        return { role: 'user', content };
      }
      case 'assistant':
        return { role: 'assistant', content: textOnly(message, 'assistant') };
      case 'system':
        return { role: 'system', content: textOnly(message, 'system') };
      case 'tool':
        throw new UnsupportedVariantError('Tool messages are not supported for OpenAI');
      default:
        return assertNever(message.role, 'message role');
    }
  }

  async sendConversationToVendor(
    history: readonly ChatCompletionMessageParam[],
    modelId: ModelId,
  ): Promise<ChatCompletion> {
    const systemPrompt = this.options.systemPrompt.trim();
    const messages: ChatCompletionMessageParam[] = systemPrompt
      ? [{ role: 'system', content: systemPrompt }, ...history]
      : [...history];

    return this.client.chat.completions.create({
      model: modelId.apiModelName,
      max_tokens: this.options.maxTokens,
      messages,
    });
  }

  vendorResponseToVendorMessage(response: ChatCompletion): ChatCompletionMessageParam {
    const reply = firstChoice(response).message;
    return { role: 'assistant', content: reply.content ?? reply.refusal ?? '' };
  }

  fromVendorResponse(response: ChatCompletion): Message {
    const reply = firstChoice(response).message;
    const text = reply.content ?? reply.refusal ?? '';
    const citations: Citation[] = [];
    for (const annotation of reply.annotations ?? []) {
      if (annotation.type !== 'url_citation') continue;
      const { url, title, start_index, end_index } = annotation.url_citation;
      const cited = text.slice(start_index, end_index);
      citations.push(
        webSearchResultCitation({
          citedText: cited.trim() ? cited : url,
          title: title?.trim() ? title : UNTITLED_SOURCE,
          url,
        }),
      );
    }

    const usage = response.usage;
    return createMessage('assistant', text ? [textBlock(text, { citations })] : [], {
      inputTokens: usage?.prompt_tokens ?? 0,
      outputTokens: usage?.completion_tokens ?? 0,
      cacheReadInputTokens: usage?.prompt_tokens_details?.cached_tokens ?? 0,
    });
  }

  // OpenAI caches repeated prefixes on its own; there is no directive to place
  isCacheable(): boolean {
    return false;
  }

  configureCaching(): void {
    throw new UnsupportedVariantError('OpenAI does not accept cache directives');
  }
}

function firstChoice(response: ChatCompletion): ChatCompletion.Choice {
  const choice = response.choices[0];
  if (!choice) {
    throw new VendorRequestError('OpenAI response contained no choices', 'openai');
  }
  return choice;
}

function textOnly(message: Message, role: string): string {
  const texts: string[] = [];
  for (const block of message.blocks) {
    if (block.type !== 'text') {
      throw new UnsupportedVariantError(
        `OpenAI ${role} messages can only contain text, got ${block.type}`,
      );
    }
    checkCitations(block);
    texts.push(block.text);
  }
  return texts.join('\n');
}

async function toContentPart(block: ContentBlock): Promise<ChatCompletionContentPart> {
  switch (block.type) {
    case 'text':
      return toTextPart(block);
    case 'image':
      return toImagePart(block);
    case 'document':
      return toDocumentPart(block);
    case 'unknown':
      throw new UnsupportedVariantError(
        `Unknown blocks cannot be sent to OpenAI: ${block.vendorData}`,
      );
    default:
      return assertNever(block, 'content block');
  }
}

function toTextPart(block: TextBlock): ChatCompletionContentPart {
  checkCitations(block);
  return { type: 'text', text: block.text };
}

// Chat completions take no citation input, so known citations stay with the
// generic message only. Unknown ones cannot be represented anywhere.
function checkCitations(block: TextBlock): void {
  for (const citation of block.citations) {
    switch (citation.type) {
      case 'char_location':
      case 'page_location':
      case 'content_block_location':
      case 'web_search_result_location':
      case 'search_result_location':
        break;
      case 'unknown':
        throw new UnsupportedVariantError(
          `Unknown citations cannot be sent to OpenAI: ${citation.rawData}`,
        );
      default:
        assertNever(citation, 'citation');
    }
  }
}

async function toImagePart(block: ImageBlock): Promise<ChatCompletionContentPart> {
  switch (block.source) {
    case 'url':
      validateMimeType(block.mimeType, SUPPORTED_IMAGE_MIME_TYPES);
      return { type: 'image_url', image_url: { url: validateHttpUrl(block.url).toString() } };
    case 'base64': {
      const mimeType = validateMimeType(block.mimeType, SUPPORTED_IMAGE_MIME_TYPES);
      return {
        type: 'image_url',
        image_url: { url: toDataUrl(mimeType, validateBase64Data(block.data)) },
      };
    }
    case 'file': {
      validateFilePath(block.path, SUPPORTED_IMAGE_EXTENSIONS);
      const mimeType = validateMimeType(block.mimeType, SUPPORTED_IMAGE_MIME_TYPES);
      const data = await readFileAsBase64(block.path);
      return { type: 'image_url', image_url: { url: toDataUrl(mimeType, data) } };
    }
    default:
      return assertNever(block, 'image block');
  }
}

async function toDocumentPart(block: DocumentBlock): Promise<ChatCompletionContentPart> {
  switch (block.source) {
    case 'url':
      throw new UnsupportedVariantError('OpenAI cannot fetch PDF documents by URL');
    case 'base64': {
      validateMimeType(block.mimeType, SUPPORTED_PDF_MIME_TYPES);
      return {
        type: 'file',
        file: {
          filename: DEFAULT_PDF_FILENAME,
          file_data: toDataUrl(PDF_MIME_TYPE, validateBase64Data(block.data)),
        },
      };
    }
    case 'file': {
      validateFilePath(block.path, SUPPORTED_DOCUMENT_EXTENSIONS);
      validateMimeType(block.mimeType, SUPPORTED_PDF_MIME_TYPES);
      const data = await readFileAsBase64(block.path);
      return {
        type: 'file',
        file: { filename: path.basename(block.path), file_data: toDataUrl(PDF_MIME_TYPE, data) },
      };
    }
    case 'text':
      validateMimeType(block.mimeType, SUPPORTED_TEXT_DOCUMENT_MIME_TYPES);
      return { type: 'text', text: validatePlainText(block.text) };
    default:
      return assertNever(block, 'document block');
  }
}
