import { ContentValidationError } from './errors.js';
import type {
  CharLocationCitation,
  Citation,
  ContentBlockLocationCitation,
  PageLocationCitation,
  SearchResultCitation,
  UnknownCitation,
  WebSearchResultCitation,
} from './types.js';

export const UNTITLED_SOURCE = 'Untitled';

type CitationInput<T extends Citation> = Omit<T, 'type'>;

function requireText(value: string | undefined, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ContentValidationError(`Citation ${field} cannot be blank`);
  }
  return value;
}

function finalize<T extends Citation>(citation: T): T {
  requireText(citation.citedText, 'citedText');
  requireText(citation.title, 'title');
  return Object.freeze(citation);
}

export function charLocationCitation(
  input: CitationInput<CharLocationCitation>,
): CharLocationCitation {
  return finalize<CharLocationCitation>({ ...input, type: 'char_location' });
}

export function pageLocationCitation(
  input: CitationInput<PageLocationCitation>,
): PageLocationCitation {
  return finalize<PageLocationCitation>({ ...input, type: 'page_location' });
}

export function contentBlockLocationCitation(
  input: CitationInput<ContentBlockLocationCitation>,
): ContentBlockLocationCitation {
  return finalize<ContentBlockLocationCitation>({ ...input, type: 'content_block_location' });
}

export function webSearchResultCitation(
  input: CitationInput<WebSearchResultCitation>,
): WebSearchResultCitation {
  return finalize<WebSearchResultCitation>({ ...input, type: 'web_search_result_location' });
}

export function searchResultCitation(
  input: CitationInput<SearchResultCitation>,
): SearchResultCitation {
  return finalize<SearchResultCitation>({ ...input, type: 'search_result_location' });
}

export function unknownCitation(rawData: string): UnknownCitation {
  requireText(rawData, 'rawData');
  return finalize<UnknownCitation>({
    type: 'unknown',
    citedText: 'Unknown citation',
    title: 'Unknown',
    rawData,
  });
}

export function freezeCitations(citations: readonly Citation[] | undefined): readonly Citation[] {
  return Object.freeze([...(citations ?? [])]);
}
