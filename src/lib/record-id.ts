/**
 * Record Identifier Utilities
 *
 * Records are addressed as `${documentId}:${sequenceIndex}` so that
 * re-ingesting a document overwrites its previous records in place.
 */

const SEPARATOR = ':';

/**
 * Build the record id for a chunk position
 *
 * @example
 * ```typescript
 * buildRecordId('doc1', 0); // 'doc1:0'
 * ```
 */
export function buildRecordId(documentId: string, sequenceIndex: number): string {
	return `${documentId}${SEPARATOR}${sequenceIndex}`;
}

/**
 * Prefix shared by every record of a document
 */
export function recordIdPrefix(documentId: string): string {
	return `${documentId}${SEPARATOR}`;
}

/**
 * Split a record id back into its document id and sequence index
 *
 * Splits at the last separator, so document ids may themselves contain
 * colons. Returns null when the suffix is not a non-negative integer.
 */
export function parseRecordId(
	recordId: string
): { documentId: string; sequenceIndex: number } | null {
	const cut = recordId.lastIndexOf(SEPARATOR);
	if (cut <= 0) {
		return null;
	}

	const suffix = recordId.slice(cut + 1);
	if (!/^\d+$/.test(suffix)) {
		return null;
	}

	return {
		documentId: recordId.slice(0, cut),
		sequenceIndex: parseInt(suffix, 10),
	};
}

/**
 * Check whether a record id belongs to exactly this document
 *
 * A prefix listing for `doc1:` also returns records of a document named
 * `doc1:a`; those are rejected here.
 */
export function belongsToDocument(recordId: string, documentId: string): boolean {
	const parsed = parseRecordId(recordId);
	return parsed !== null && parsed.documentId === documentId;
}
