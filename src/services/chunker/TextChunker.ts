/**
 * TextChunker - splits document text into overlapping, size-bounded chunks
 *
 * Cuts prefer semantic boundaries (paragraph, then sentence, then whitespace)
 * and fall back to a hard character cut only when a window contains none.
 */

import type { Chunk } from '../../models/document.js';
import { InvalidArgumentError } from '../../lib/errors/ProviderErrors.js';
import { Result, ok, err } from 'neverthrow';

/**
 * Chunking bounds
 */
export interface ChunkingOptions {
  /** Maximum UTF-16 units per chunk; a lone code point wider than this still forms one chunk */
  maxChars: number;

  /** Characters repeated between consecutive chunks (< maxChars) */
  overlapChars: number;
}

const PARAGRAPH_BREAK = '\n\n';
const SENTENCE_END = /[.!?]+["'”’)\]]*\s+/g;
const WHITESPACE = /\s/;

/**
 * Validate chunking bounds
 */
export function validateChunkingOptions(
  options: ChunkingOptions
): Result<ChunkingOptions, InvalidArgumentError> {
  const { maxChars, overlapChars } = options;

  if (!Number.isInteger(maxChars) || maxChars < 1) {
    return err(new InvalidArgumentError(`max_chars must be a positive integer (got ${maxChars})`));
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0) {
    return err(new InvalidArgumentError(`overlap_chars must be a non-negative integer (got ${overlapChars})`));
  }
  if (overlapChars >= maxChars) {
    return err(
      new InvalidArgumentError(
        `overlap_chars (${overlapChars}) must be smaller than max_chars (${maxChars})`
      )
    );
  }

  return ok(options);
}

/**
 * TextChunker service
 */
export class TextChunker {
  constructor(private readonly defaults: ChunkingOptions) {}

  /**
   * Split a document's text into chunks
   *
   * @param documentId Owning document id, copied onto every chunk
   * @param text Full document text
   * @param options Overrides for the configured bounds
   */
  chunk(
    documentId: string,
    text: string,
    options: Partial<ChunkingOptions> = {}
  ): Result<Chunk[], InvalidArgumentError> {
    const validated = validateChunkingOptions({ ...this.defaults, ...options });
    if (validated.isErr()) {
      return err(validated.error);
    }

    const { maxChars, overlapChars } = validated.value;
    const spans = computeSpans(text, maxChars, overlapChars);

    return ok(
      spans.map(([charStart, charEnd], sequenceIndex) => ({
        documentId,
        sequenceIndex,
        text: text.slice(charStart, charEnd),
        charStart,
        charEnd,
      }))
    );
  }
}

/**
 * Compute [start, end) offsets for every chunk
 */
export function computeSpans(
  text: string,
  maxChars: number,
  overlapChars: number
): Array<[number, number]> {
  const length = text.length;

  if (length === 0) {
    return [];
  }
  if (length <= maxChars) {
    return [[0, length]];
  }

  const spans: Array<[number, number]> = [];
  let start = 0;

  while (start < length) {
    const hardEnd = Math.min(start + maxChars, length);
    let end = hardEnd === length ? length : alignBack(text, findBreak(text, start, hardEnd, overlapChars));
    if (end <= start) {
      // A single code point wider than maxChars
      end = alignForward(text, start + 1);
    }

    spans.push([start, end]);

    if (end === length) {
      break;
    }

    const next = alignBack(text, nextStart(text, end, overlapChars));
    start = next > start ? next : alignForward(text, start + 1);
  }

  return spans;
}

/**
 * Pick the cut position for the window [start, hardEnd)
 *
 * Any candidate must lie strictly past `start + overlapChars` so that the
 * following chunk still starts after this one.
 */
function findBreak(text: string, start: number, hardEnd: number, overlapChars: number): number {
  const window = text.slice(start, hardEnd);

  const paragraph = window.lastIndexOf(PARAGRAPH_BREAK);
  if (paragraph >= 0 && paragraph + PARAGRAPH_BREAK.length > overlapChars) {
    return start + paragraph + PARAGRAPH_BREAK.length;
  }

  let sentenceEnd = -1;
  for (const match of window.matchAll(SENTENCE_END)) {
    const candidate = (match.index ?? 0) + match[0].length;
    if (candidate > overlapChars) {
      sentenceEnd = candidate;
    }
  }
  if (sentenceEnd > 0) {
    return start + sentenceEnd;
  }

  // Window ends exactly at a word boundary
  if (WHITESPACE.test(text.charAt(hardEnd))) {
    return hardEnd;
  }

  for (let i = window.length - 1; i >= 0; i--) {
    if (i + 1 <= overlapChars) break;
    if (WHITESPACE.test(window.charAt(i))) {
      return start + i + 1;
    }
  }

  return hardEnd;
}

/**
 * Start of the chunk following one that ends at `end`
 *
 * Backs up by the overlap, then moves forward to the next word start when
 * that would land mid-word, which only ever shortens the overlap.
 */
function nextStart(text: string, end: number, overlapChars: number): number {
  let next = end - overlapChars;

  if (overlapChars > 0 && next > 0 && !WHITESPACE.test(text.charAt(next - 1))) {
    const overlap = text.slice(next, end);
    const space = overlap.search(WHITESPACE);
    if (space >= 0) {
      next += space + 1;
    }
  }

  return next;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/** Move an offset off the middle of a surrogate pair, towards the start */
function alignBack(text: string, index: number): number {
  return splitsSurrogatePair(text, index) ? index - 1 : index;
}

function alignForward(text: string, index: number): number {
  return splitsSurrogatePair(text, index) ? index + 1 : index;
}

/**
 * Rebuild the source text from chunks by dropping each chunk's overlap
 * with its predecessor
 */
export function reassembleChunks(chunks: ReadonlyArray<Pick<Chunk, 'text' | 'charStart' | 'charEnd'>>): string {
  let text = '';
  let covered = 0;

  for (const chunk of chunks) {
    const skip = Math.max(0, covered - chunk.charStart);
    text += chunk.text.slice(skip);
    covered = Math.max(covered, chunk.charEnd);
  }

  return text;
}
