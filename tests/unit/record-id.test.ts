import { describe, it, expect } from 'vitest';
import {
  belongsToDocument,
  buildRecordId,
  parseRecordId,
  recordIdPrefix
} from '../../src/lib/record-id.js';

describe('record ids', () => {
  it('should build ids from document id and position', () => {
    expect(buildRecordId('doc1', 0)).toBe('doc1:0');
    expect(buildRecordId('doc1', 12)).toBe('doc1:12');
    expect(recordIdPrefix('doc1')).toBe('doc1:');
  });

  it('should parse at the last separator', () => {
    expect(parseRecordId('doc1:3')).toEqual({ documentId: 'doc1', sequenceIndex: 3 });
    expect(parseRecordId('notes:2024:7')).toEqual({ documentId: 'notes:2024', sequenceIndex: 7 });
  });

  it('should reject ids without a numeric suffix', () => {
    expect(parseRecordId('doc1')).toBeNull();
    expect(parseRecordId('doc1:')).toBeNull();
    expect(parseRecordId('doc1:a')).toBeNull();
    expect(parseRecordId(':0')).toBeNull();
    expect(parseRecordId('doc1:-1')).toBeNull();
  });

  it('should only match records of exactly the same document', () => {
    expect(belongsToDocument('doc1:0', 'doc1')).toBe(true);
    expect(belongsToDocument('doc1:a:0', 'doc1')).toBe(false);
    expect(belongsToDocument('doc10:0', 'doc1')).toBe(false);
  });
});
