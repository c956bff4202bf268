/**
 * Unit tests for TextChunker
 */

import { describe, it, expect } from 'vitest';
import {
  TextChunker,
  computeSpans,
  reassembleChunks
} from '../../src/services/chunker/index.js';

const EXAMPLE = 'Cats are mammals. Dogs are mammals too.';

function longText(): string {
  const sentences: string[] = [];
  for (let i = 0; i < 40; i++) {
    sentences.push(`Sentence number ${i} talks about topic ${i % 7} in some detail.`);
    if (i % 9 === 8) sentences.push('\n\n');
  }
  return sentences.join(' ');
}

describe('TextChunker', () => {
  const chunker = new TextChunker({ maxChars: 20, overlapChars: 5 });

  it('should cut at sentence and word boundaries', () => {
    const result = chunker.chunk('doc1', EXAMPLE);

    expect(result.isOk()).toBe(true);
    const chunks = result._unsafeUnwrap();
    expect(chunks.map((c) => c.text)).toEqual(['Cats are mammals. ', 'Dogs are mammals ', 'too.']);
    expect(chunks.map((c) => [c.charStart, c.charEnd])).toEqual([[0, 18], [18, 35], [35, 39]]);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.documentId === 'doc1')).toBe(true);
  });

  it('should return no chunks for empty text', () => {
    expect(chunker.chunk('doc1', '')._unsafeUnwrap()).toEqual([]);
  });

  it('should return a single chunk for short text', () => {
    const chunks = chunker.chunk('doc1', 'Short.')._unsafeUnwrap();

    expect(chunks).toEqual([
      { documentId: 'doc1', sequenceIndex: 0, text: 'Short.', charStart: 0, charEnd: 6 }
    ]);
  });

  it('should prefer paragraph breaks', () => {
    const text = 'First paragraph here.\n\nSecond paragraph text.';
    const chunks = chunker.chunk('doc1', text, { maxChars: 30, overlapChars: 0 })._unsafeUnwrap();

    expect(chunks.map((c) => c.text)).toEqual(['First paragraph here.\n\n', 'Second paragraph text.']);
  });

  it('should hard cut text without whitespace', () => {
    const text = 'abcdefghij'.repeat(3);

    expect(computeSpans(text, 10, 2)).toEqual([[0, 10], [8, 18], [16, 26], [24, 30]]);
  });

  it('should never cut inside a surrogate pair', () => {
    const text = '😀'.repeat(30);
    const loneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

    const chunks = new TextChunker({ maxChars: 21, overlapChars: 5 }).chunk('emoji', text)._unsafeUnwrap();

    expect(chunks.map((c) => [c.charStart, c.charEnd])).toEqual([[0, 20], [14, 34], [28, 48], [42, 60]]);
    expect(chunks.some((c) => loneSurrogate.test(c.text))).toBe(false);
    expect(reassembleChunks(chunks)).toBe(text);
  });

  it('should keep a code point whole even when it exceeds the chunk size', () => {
    expect(computeSpans('😀😀', 1, 0)).toEqual([[0, 2], [2, 4]]);
  });

  it('should keep every chunk within the size bound and cover the text', () => {
    const text = longText();
    const chunks = new TextChunker({ maxChars: 120, overlapChars: 30 }).chunk('doc', text)._unsafeUnwrap();

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(120);
      expect(chunk.text).toBe(text.slice(chunk.charStart, chunk.charEnd));
    }
    for (let i = 1; i < chunks.length; i++) {
      const previous = chunks[i - 1];
      const current = chunks[i];
      expect(current?.charStart).toBeGreaterThan(previous?.charStart ?? -1);
      expect(current?.charStart).toBeLessThanOrEqual(previous?.charEnd ?? -1);
    }
    expect(chunks[0]?.charStart).toBe(0);
    expect(chunks[chunks.length - 1]?.charEnd).toBe(text.length);
  });

  it('should reassemble the original text from overlapping chunks', () => {
    const text = longText();
    const chunks = new TextChunker({ maxChars: 80, overlapChars: 25 }).chunk('doc', text)._unsafeUnwrap();

    expect(reassembleChunks(chunks)).toBe(text);
    expect(reassembleChunks(chunker.chunk('doc1', EXAMPLE)._unsafeUnwrap())).toBe(EXAMPLE);
  });

  it('should produce identical chunks for identical input', () => {
    const text = longText();
    const first = chunker.chunk('doc', text)._unsafeUnwrap();
    const second = chunker.chunk('doc', text)._unsafeUnwrap();

    expect(second).toEqual(first);
  });

  it('should reject overlap that is not smaller than the chunk size', () => {
    const result = chunker.chunk('doc1', EXAMPLE, { maxChars: 10, overlapChars: 10 });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().code).toBe('INVALID_ARGUMENT');
    expect(result._unsafeUnwrapErr().message).toBe('overlap_chars (10) must be smaller than max_chars (10)');
  });

  it('should reject a non-positive chunk size', () => {
    const result = chunker.chunk('doc1', EXAMPLE, { maxChars: 0, overlapChars: 0 });

    expect(result._unsafeUnwrapErr().message).toBe('max_chars must be a positive integer (got 0)');
  });
});
