export type TextFormat = 'plain' | 'markdown' | 'html';

export const TextFormat = {
  PLAIN: 'plain',
  MARKDOWN: 'markdown',
  HTML: 'html',
} as const satisfies Record<string, TextFormat>;

export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export const MessageRole = {
  USER: 'user',
  ASSISTANT: 'assistant',
  SYSTEM: 'system',
  TOOL: 'tool',
} as const satisfies Record<string, MessageRole>;

// ---------- Citations ----------

type CitationBase = {
  readonly citedText: string;
  readonly title: string;
};

type DocumentLocator = {
  readonly documentIndex?: number;
  readonly documentTitle?: string;
  readonly fileId?: string;
};

export type CharLocationCitation = CitationBase &
  DocumentLocator & {
    readonly type: 'char_location';
    readonly startCharIndex?: number;
    readonly endCharIndex?: number;
  };

export type PageLocationCitation = CitationBase &
  DocumentLocator & {
    readonly type: 'page_location';
    readonly startPageNumber?: number;
    readonly endPageNumber?: number;
  };

export type ContentBlockLocationCitation = CitationBase &
  DocumentLocator & {
    readonly type: 'content_block_location';
    readonly startBlockIndex?: number;
    readonly endBlockIndex?: number;
  };

export type WebSearchResultCitation = CitationBase & {
  readonly type: 'web_search_result_location';
  readonly url?: string;
  readonly encryptedIndex?: string;
};

export type SearchResultCitation = CitationBase & {
  readonly type: 'search_result_location';
  readonly source?: string;
  readonly startBlockIndex?: number;
  readonly endBlockIndex?: number;
  readonly searchResultIndex?: number;
};

// Citation kinds this library does not model yet; rawData keeps the vendor payload
export type UnknownCitation = CitationBase & {
  readonly type: 'unknown';
  readonly rawData: string;
};

export type Citation =
  | CharLocationCitation
  | PageLocationCitation
  | ContentBlockLocationCitation
  | WebSearchResultCitation
  | SearchResultCitation
  | UnknownCitation;

// ---------- Content blocks ----------

export type TextBlock = {
  readonly type: 'text';
  readonly format: TextFormat;
  readonly text: string;
  readonly citations: readonly Citation[];
};

export type UrlImageBlock = {
  readonly type: 'image';
  readonly source: 'url';
  readonly url: string;
  readonly mimeType: string;
};

export type Base64ImageBlock = {
  readonly type: 'image';
  readonly source: 'base64';
  readonly data: string;
  readonly mimeType: string;
};

// File contents are read when the block is converted for a vendor, not before
export type FilePathImageBlock = {
  readonly type: 'image';
  readonly source: 'file';
  readonly path: string;
  readonly mimeType: string;
};

export type ImageBlock = UrlImageBlock | Base64ImageBlock | FilePathImageBlock;

export type UrlPdfDocumentBlock = {
  readonly type: 'document';
  readonly source: 'url';
  readonly url: string;
  readonly mimeType: string;
};

export type Base64PdfDocumentBlock = {
  readonly type: 'document';
  readonly source: 'base64';
  readonly data: string;
  readonly mimeType: string;
};

export type FilePathPdfDocumentBlock = {
  readonly type: 'document';
  readonly source: 'file';
  readonly path: string;
  readonly mimeType: string;
};

export type PlainTextDocumentBlock = {
  readonly type: 'document';
  readonly source: 'text';
  readonly text: string;
  readonly mimeType: string;
};

export type DocumentBlock =
  | UrlPdfDocumentBlock
  | Base64PdfDocumentBlock
  | FilePathPdfDocumentBlock
  | PlainTextDocumentBlock;

export type UnknownBlock = {
  readonly type: 'unknown';
  readonly vendorData: string;
};

export type ContentBlock = TextBlock | ImageBlock | DocumentBlock | UnknownBlock;

// ---------- Messages ----------

export type TokenUsage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheCreationInputTokens: number;
  readonly cacheReadInputTokens: number;
};

export type Message = {
  readonly role: MessageRole;
  readonly blocks: readonly ContentBlock[];
  readonly usage: TokenUsage;
};
