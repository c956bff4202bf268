/**
 * Formats search results as readable context blocks for the client model
 */

import type { SearchResult } from '../models/document.js';

const SEPARATOR = '-'.repeat(10);

/**
 * Render results as a "Retrieved Contexts" block
 *
 * @example
 * ```
 * Retrieved Contexts:
 *
 * Result 1 | Similarity: 0.912 | Document ID: doc1:0
 * Cats are mammals.
 * ----------
 * ```
 */
export function formatResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return 'No matching documents found.';
  }

  let formatted = 'Retrieved Contexts:\n\n';
  results.forEach((result, i) => {
    formatted += `Result ${i + 1} | Similarity: ${result.score.toFixed(3)} | Document ID: ${result.recordId}\n`;
    formatted += `${result.text.trim()}\n`;
    formatted += `${SEPARATOR}\n\n`;
  });

  return formatted;
}
