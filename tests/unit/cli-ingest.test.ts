/**
 * Unit tests for ingest command option parsing
 */

import { describe, it, expect } from 'vitest';
import { parseMetadataOption } from '../../src/cli/commands/ingest.js';
import { CommandError } from '../../src/cli/utils/context.js';

describe('parseMetadataOption', () => {
  it('should default to no metadata', () => {
    expect(parseMetadataOption(undefined)).toEqual({});
  });

  it('should accept a JSON object of metadata values', () => {
    expect(parseMetadataOption('{"category":"notes","year":2024,"tags":["a","b"]}')).toEqual({
      category: 'notes',
      year: 2024,
      tags: ['a', 'b']
    });
  });

  it('should reject malformed JSON', () => {
    expect(() => parseMetadataOption('{nope')).toThrow(CommandError);
    expect(() => parseMetadataOption('{nope')).toThrow('INVALID_ARGUMENT: --metadata must be a JSON object');
  });

  it('should reject nested values', () => {
    expect(() => parseMetadataOption('{"nested":{"a":1}}')).toThrow(
      'INVALID_ARGUMENT: --metadata values must be strings, numbers, booleans or string lists'
    );
  });
});
