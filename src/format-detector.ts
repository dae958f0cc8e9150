/**
 * Classifies raw model output as plain text, Markdown or HTML.
 *
 * HTML is checked first because its signature is the most specific. Markdown
 * is decided from the block structure of a CommonMark parse: prose made only
 * of unformatted paragraphs stays plain, anything with headings, lists,
 * quotes, code or inline formatting is Markdown.
 */

import { load } from 'cheerio';
import type { Paragraph, RootContent } from 'mdast';
import remarkParse from 'remark-parse';
import { unified } from 'unified';
import type { TextFormat } from './types.js';

const TAG_PATTERN = /<\/?[a-zA-Z][a-zA-Z0-9]*[^>]*>/;

const markdownParser = unified().use(remarkParse);

export function detectTextFormat(text: string | null | undefined): TextFormat {
  if (text == null || text.trim().length === 0) {
    return 'plain';
  }
  if (isWellFormedHtml(text)) {
    return 'html';
  }
  if (isMarkdown(text)) {
    return 'markdown';
  }
  return 'plain';
}

export function isWellFormedHtml(text: string | null | undefined): boolean {
  if (text == null || text.trim().length === 0 || !text.includes('<')) {
    return false;
  }
  // "2 < 3" has angle brackets but nothing tag-shaped
  if (!TAG_PATTERN.test(text)) {
    return false;
  }
  const $ = load(text, null, false);
  return $.root().children().length > 0;
}

/** Assumes HTML has already been ruled out. */
export function isMarkdown(text: string): boolean {
  const nodes = markdownParser.parse(text).children;
  if (nodes.length === 0) {
    return false;
  }

  if (nodes.length > 1) {
    return nodes.some((node) => !isPlainParagraph(node));
  }

  return !isPlainParagraph(nodes[0]);
}

function isPlainParagraph(node: RootContent): boolean {
  return node.type === 'paragraph' && !hasInlineFormatting(node);
}

// Soft line breaks stay inside text nodes; a hard break, emphasis, link or code span does not
function hasInlineFormatting(paragraph: Paragraph): boolean {
  return paragraph.children.some((child) => child.type !== 'text');
}
