/**
 * In-process vector index for tests
 *
 * Exact cosine scoring over every record in a namespace, with the subset of
 * metadata filter operators the tests rely on.
 */

import { ok, err, type Result } from 'neverthrow';
import type { ProviderError } from '../../src/lib/errors/ProviderErrors.js';
import type {
  EmbeddingVector,
  IndexRecord,
  IndexStats,
  Metadata,
  MetadataFilter,
  MetadataValue,
  SearchMatch
} from '../../src/models/document.js';
import { compareMatches, type IVectorIndex } from '../../src/services/vector-index/index-interface.js';

type Operation = 'upsert' | 'query' | 'delete' | 'fetch' | 'listIds' | 'describeStats';

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueEquals(value: MetadataValue | undefined, operand: unknown): boolean {
  if (Array.isArray(value)) {
    return value.some((item) => item === operand);
  }
  return value === operand;
}

function compareNumbers(
  value: MetadataValue | undefined,
  operand: unknown,
  test: (a: number, b: number) => boolean
): boolean {
  return typeof value === 'number' && typeof operand === 'number' && test(value, operand);
}

function matchesCondition(value: MetadataValue | undefined, condition: unknown): boolean {
  if (!isRecord(condition)) {
    return valueEquals(value, condition);
  }

  return Object.entries(condition).every(([operator, operand]) => {
    switch (operator) {
      case '$eq':
        return valueEquals(value, operand);
      case '$ne':
        return !valueEquals(value, operand);
      case '$gt':
        return compareNumbers(value, operand, (a, b) => a > b);
      case '$gte':
        return compareNumbers(value, operand, (a, b) => a >= b);
      case '$lt':
        return compareNumbers(value, operand, (a, b) => a < b);
      case '$lte':
        return compareNumbers(value, operand, (a, b) => a <= b);
      case '$in':
        return Array.isArray(operand) && operand.some((item) => valueEquals(value, item));
      case '$nin':
        return Array.isArray(operand) && !operand.some((item) => valueEquals(value, item));
      case '$exists':
        return (value !== undefined) === operand;
      default:
        throw new Error(`Unsupported filter operator: ${operator}`);
    }
  });
}

export function matchesFilter(metadata: Metadata, filter: MetadataFilter): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    if (key === '$and') {
      return Array.isArray(condition) && condition.every((sub) => isRecord(sub) && matchesFilter(metadata, sub));
    }
    if (key === '$or') {
      return Array.isArray(condition) && condition.some((sub) => isRecord(sub) && matchesFilter(metadata, sub));
    }
    return matchesCondition(metadata[key], condition);
  });
}

export class InMemoryIndex implements IVectorIndex {
  private readonly namespaces = new Map<string, Map<string, IndexRecord>>();
  private readonly faults = new Map<Operation, ProviderError[]>();
  readonly callCounts: Record<Operation, number> = {
    upsert: 0,
    query: 0,
    delete: 0,
    fetch: 0,
    listIds: 0,
    describeStats: 0
  };

  /** Make the next calls of an operation fail, one error per call */
  failNext(operation: Operation, ...errors: ProviderError[]): void {
    this.faults.set(operation, [...(this.faults.get(operation) ?? []), ...errors]);
  }

  /** Record ids in a namespace, sorted */
  ids(namespace: string): string[] {
    return Array.from(this.namespaces.get(namespace)?.keys() ?? []).sort();
  }

  record(namespace: string, id: string): IndexRecord | undefined {
    return this.namespaces.get(namespace)?.get(id);
  }

  async upsert(namespace: string, records: IndexRecord[]): Promise<Result<number, ProviderError>> {
    const fault = this.enter('upsert');
    if (fault) return err(fault);

    let store = this.namespaces.get(namespace);
    if (!store) {
      store = new Map();
      this.namespaces.set(namespace, store);
    }
    for (const record of records) {
      store.set(record.id, { id: record.id, values: [...record.values], metadata: { ...record.metadata } });
    }
    return ok(records.length);
  }

  async query(
    namespace: string,
    vector: EmbeddingVector,
    topK: number,
    filter?: MetadataFilter
  ): Promise<Result<SearchMatch[], ProviderError>> {
    const fault = this.enter('query');
    if (fault) return err(fault);

    const store = this.namespaces.get(namespace);
    if (!store) return ok([]);

    const matches = Array.from(store.values())
      .filter((record) => !filter || matchesFilter(record.metadata, filter))
      .map((record) => ({
        id: record.id,
        score: cosineSimilarity(vector, record.values),
        metadata: { ...record.metadata }
      }))
      .sort(compareMatches)
      .slice(0, topK);

    return ok(matches);
  }

  async delete(namespace: string, ids: string[]): Promise<Result<number, ProviderError>> {
    const fault = this.enter('delete');
    if (fault) return err(fault);

    const store = this.namespaces.get(namespace);
    for (const id of ids) {
      store?.delete(id);
    }
    return ok(ids.length);
  }

  async fetch(namespace: string, ids: string[]): Promise<Result<Map<string, IndexRecord>, ProviderError>> {
    const fault = this.enter('fetch');
    if (fault) return err(fault);

    const found = new Map<string, IndexRecord>();
    const store = this.namespaces.get(namespace);
    for (const id of ids) {
      const record = store?.get(id);
      if (record) found.set(id, record);
    }
    return ok(found);
  }

  async listIds(namespace: string, prefix: string): Promise<Result<string[], ProviderError>> {
    const fault = this.enter('listIds');
    if (fault) return err(fault);

    return ok(this.ids(namespace).filter((id) => id.startsWith(prefix)));
  }

  async describeStats(): Promise<Result<IndexStats, ProviderError>> {
    const fault = this.enter('describeStats');
    if (fault) return err(fault);

    let dimension = 0;
    let totalRecordCount = 0;
    const namespaces: IndexStats['namespaces'] = {};
    for (const [name, store] of this.namespaces) {
      if (store.size === 0) continue;
      namespaces[name] = { recordCount: store.size };
      totalRecordCount += store.size;
      for (const record of store.values()) {
        dimension = record.values.length;
        break;
      }
    }
    return ok({ dimension, totalRecordCount, namespaces });
  }

  private enter(operation: Operation): ProviderError | undefined {
    this.callCounts[operation]++;
    return this.faults.get(operation)?.shift();
  }
}
