import { describe, expect, it } from 'vitest';
import { detectTextFormat, isMarkdown, isWellFormedHtml } from '../src/format-detector.js';

describe('detectTextFormat', () => {
  it.each([
    ['Hello world', 'plain'],
    ['# Heading', 'markdown'],
    ['line one\nline two', 'plain'],
    ['<div>hi</div>', 'html'],
    ['2 < 3', 'plain'],
    ['This is **bold**', 'markdown'],
  ])('classifies %j as %s', (text, expected) => {
    expect(detectTextFormat(text)).toBe(expected);
  });

  it('treats missing and blank input as plain', () => {
    expect(detectTextFormat(null)).toBe('plain');
    expect(detectTextFormat(undefined)).toBe('plain');
    expect(detectTextFormat('')).toBe('plain');
    expect(detectTextFormat('   \n\t')).toBe('plain');
  });

  it('keeps multi-paragraph prose plain', () => {
    expect(detectTextFormat('First paragraph.\n\nSecond paragraph.')).toBe('plain');
  });

  it('does not turn bare URLs into markdown', () => {
    expect(detectTextFormat('Visit https://example.com for details')).toBe('plain');
  });

  it.each([
    ['- one\n- two', 'list'],
    ['1. first\n2. second', 'ordered list'],
    ['> quoted words', 'blockquote'],
    ['```\nconst x = 1;\n```', 'fenced code'],
    ['---', 'thematic break'],
    ['Intro\n\n## Details', 'paragraph followed by heading'],
  ])('detects block-level markdown: %j (%s)', (text) => {
    expect(detectTextFormat(text)).toBe('markdown');
  });

  it.each([
    ['Some *emphasis* here'],
    ['See [the docs](https://example.com/docs)'],
    ['Run `make test` first'],
    ['line one  \nline two'],
  ])('detects inline markdown in a single paragraph: %j', (text) => {
    expect(detectTextFormat(text)).toBe('markdown');
  });

  it.each([
    ['<p>Hello <b>world</b></p>'],
    ['a <b>bold</b> word'],
    ['<ul><li>one</li><li>two</li></ul>'],
    ['<br/>'],
  ])('detects html: %j', (text) => {
    expect(detectTextFormat(text)).toBe('html');
  });

  it('checks html before markdown', () => {
    expect(detectTextFormat('<h1>Title</h1>\n\n- item')).toBe('html');
  });
});

describe('isWellFormedHtml', () => {
  it('rejects stray angle brackets', () => {
    expect(isWellFormedHtml('a < b > c')).toBe(false);
    expect(isWellFormedHtml('x <= 10')).toBe(false);
  });

  it('accepts fragments with at least one element', () => {
    expect(isWellFormedHtml('<span>ok</span>')).toBe(true);
  });
});

describe('isMarkdown', () => {
  it('is false for unformatted prose', () => {
    expect(isMarkdown('Just a sentence.')).toBe(false);
  });

  it('is true for headings', () => {
    expect(isMarkdown('### Small heading')).toBe(true);
  });
});
