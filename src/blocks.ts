import { freezeCitations } from './citations.js';
import { ContentValidationError } from './errors.js';
import { detectTextFormat } from './format-detector.js';
import type {
  Base64ImageBlock,
  Base64PdfDocumentBlock,
  Citation,
  ContentBlock,
  FilePathImageBlock,
  FilePathPdfDocumentBlock,
  PlainTextDocumentBlock,
  TextBlock,
  TextFormat,
  UnknownBlock,
  UrlImageBlock,
  UrlPdfDocumentBlock,
} from './types.js';

export const PDF_MIME_TYPE = 'application/pdf';
export const PLAIN_TEXT_MIME_TYPE = 'text/plain';

function requireNonBlank(value: string | undefined, message: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ContentValidationError(message);
  }
  return value;
}

function requireParsableUrl(value: string): string {
  requireNonBlank(value, 'URL cannot be blank');
  if (!URL.canParse(value)) {
    throw new ContentValidationError(`Invalid URL: ${value}`);
  }
  return value;
}

// ---------- Text ----------

export function textBlock(
  text: string,
  options: { format?: TextFormat; citations?: readonly Citation[] } = {},
): TextBlock {
  return Object.freeze({
    type: 'text',
    format: options.format ?? detectTextFormat(text),
    text,
    citations: freezeCitations(options.citations),
  });
}

// ---------- Images ----------

export function urlImageBlock(url: string, mimeType: string): UrlImageBlock {
  return Object.freeze({ type: 'image', source: 'url', url: requireParsableUrl(url), mimeType });
}

export function base64ImageBlock(data: string, mimeType: string): Base64ImageBlock {
  return Object.freeze({ type: 'image', source: 'base64', data, mimeType });
}

export function filePathImageBlock(path: string, mimeType: string): FilePathImageBlock {
  return Object.freeze({
    type: 'image',
    source: 'file',
    path: requireNonBlank(path, 'File path cannot be blank'),
    mimeType: requireNonBlank(mimeType, 'MIME type cannot be blank'),
  });
}

// ---------- Documents ----------

export function urlPdfDocumentBlock(url: string, mimeType = PDF_MIME_TYPE): UrlPdfDocumentBlock {
  return Object.freeze({ type: 'document', source: 'url', url: requireParsableUrl(url), mimeType });
}

export function base64PdfDocumentBlock(
  data: string,
  mimeType = PDF_MIME_TYPE,
): Base64PdfDocumentBlock {
  return Object.freeze({ type: 'document', source: 'base64', data, mimeType });
}

export function filePathPdfDocumentBlock(
  path: string,
  mimeType = PDF_MIME_TYPE,
): FilePathPdfDocumentBlock {
  return Object.freeze({
    type: 'document',
    source: 'file',
    path: requireNonBlank(path, 'File path cannot be blank'),
    mimeType: requireNonBlank(mimeType, 'MIME type cannot be blank'),
  });
}

export function plainTextDocumentBlock(
  text: string,
  mimeType = PLAIN_TEXT_MIME_TYPE,
): PlainTextDocumentBlock {
  return Object.freeze({ type: 'document', source: 'text', text, mimeType });
}

// ---------- Unknown ----------

export function unknownBlock(vendorData: string): UnknownBlock {
  return Object.freeze({
    type: 'unknown',
    vendorData: requireNonBlank(vendorData, 'Unknown block vendor data cannot be blank'),
  });
}

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return block.type === 'text';
}

export function textOf(blocks: readonly ContentBlock[]): string {
  return blocks
    .filter(isTextBlock)
    .map((block) => block.text)
    .join('\n');
}
