/**
 * Provider limits and configuration defaults
 *
 * Centralizes all magic numbers used by the adapters and orchestrators.
 */

/**
 * Pinecone service limits
 */
export const PINECONE_LIMITS = {
  /** Vectors per upsert request */
  UPSERT_BATCH_SIZE: 100,

  /** Ids per delete request */
  DELETE_BATCH_SIZE: 1000,

  /** Ids per fetch request (bounded by URL length) */
  FETCH_BATCH_SIZE: 100,

  /** Page size for id listing */
  LIST_PAGE_SIZE: 100,

  /** Inputs per inference embed request */
  EMBED_BATCH_SIZE: 96
} as const;

/**
 * Pinecone endpoints and protocol constants
 */
export const PINECONE_API = {
  CONTROL_PLANE_URL: 'https://api.pinecone.io',
  API_VERSION: '2024-10',
  DEFAULT_EMBEDDING_MODEL: 'multilingual-e5-large'
} as const;

/**
 * Configuration defaults
 */
export const RECALL_DEFAULTS = {
  /** Pinecone's default namespace */
  NAMESPACE: '',

  CHUNK_MAX_CHARS: 1200,
  CHUNK_OVERLAP_CHARS: 200,

  TOP_K_DEFAULT: 10,
  TOP_K_MAX: 50,

  RETRY_MAX_ATTEMPTS: 3,
  RETRY_INITIAL_DELAY_MS: 500,
  RETRY_MAX_DELAY_MS: 8000,
  RETRY_BACKOFF_MULTIPLIER: 2,

  REQUEST_TIMEOUT_MS: 30000,

  /** Grace period for in-flight requests on shutdown */
  SHUTDOWN_GRACE_MS: 10000
} as const;

/**
 * Server identity reported during the protocol handshake
 */
export const SERVER_INFO = {
  NAME: 'vector-recall',
  VERSION: '0.1.0'
} as const;
