/**
 * Wires configuration into adapters and orchestrators.
 */

import type { RecallConfig } from '../lib/env-config.js';
import type { FetchLike } from '../lib/http-client.js';
import type { Logger } from '../lib/logger.js';
import type { IEmbeddingProvider } from './embedding/adapter-interface.js';
import { EmbeddingService } from './embedding/embedding-service.js';
import { PineconeInferenceProvider } from './embedding/pinecone-inference-adapter.js';
import type { IVectorIndex } from './vector-index/index-interface.js';
import { PineconeIndex } from './vector-index/pinecone-index.js';
import { IngestionPipeline } from './ingestion-pipeline.js';
import { RetrievalOrchestrator } from './retrieval-orchestrator.js';
import { ToolDispatcher } from './tool-dispatcher.js';

export interface RecallServices {
  embeddings: EmbeddingService;
  index: IVectorIndex;
  ingestion: IngestionPipeline;
  retrieval: RetrievalOrchestrator;
  dispatcher: ToolDispatcher;
}

/**
 * Replacements for the network-backed adapters
 */
export interface ServiceOverrides {
  provider?: IEmbeddingProvider;
  index?: IVectorIndex;
  fetch?: FetchLike;
}

export function createRecallServices(
  config: RecallConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): RecallServices {
  const { pinecone } = config;

  const provider = overrides.provider ?? new PineconeInferenceProvider({
    apiKey: pinecone.apiKey,
    model: config.embedding.model,
    controlPlaneUrl: pinecone.controlPlaneUrl,
    apiVersion: pinecone.apiVersion,
    timeoutMs: config.requestTimeoutMs,
    fetch: overrides.fetch
  });

  const index = overrides.index ?? new PineconeIndex({
    apiKey: pinecone.apiKey,
    indexName: pinecone.indexName,
    indexHost: pinecone.indexHost,
    controlPlaneUrl: pinecone.controlPlaneUrl,
    apiVersion: pinecone.apiVersion,
    timeoutMs: config.requestTimeoutMs,
    fetch: overrides.fetch
  });

  const embeddings = new EmbeddingService(provider, {
    batchSize: config.embedding.batchSize,
    retry: config.retry,
    logger
  });

  const ingestion = new IngestionPipeline(embeddings, index, {
    chunking: config.chunking,
    retry: config.retry,
    defaultNamespace: config.defaultNamespace
  }, logger);

  const retrieval = new RetrievalOrchestrator(embeddings, index, {
    retrieval: config.retrieval,
    retry: config.retry,
    defaultNamespace: config.defaultNamespace
  }, logger);

  const dispatcher = new ToolDispatcher({
    ingestion,
    retrieval,
    index,
    retry: config.retry,
    logger
  });

  return { embeddings, index, ingestion, retrieval, dispatcher };
}
