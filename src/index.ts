// ── memstrata — tiered memory and retrieval ──────────────

export { loadConfig } from "./config.js";
export type { AppConfig, EmbeddingProviderSetting } from "./config.js";
export { log } from "./logger.js";
export type { Logger } from "./logger.js";

export * from "./memory/errors.js";
export type * from "./memory/types.js";

export {
  createRecord,
  normalizeContext,
  mergeContext,
  applyUpgrade,
  serializeRecord,
  deserializeRecord,
  MAX_EXTRA_KEYS,
  MAX_EXTRA_VALUE_LENGTH,
} from "./memory/record.js";
export type { NewRecordInput, SerializedRecord, UpgradeResult } from "./memory/record.js";

export { FocusSlot } from "./memory/focus-slot.js";
export { WorkingBuffer, DEFAULT_WORKING_CAPACITY } from "./memory/working-buffer.js";

export { isValidProfile, assertProfile } from "./memory/record-store.js";
export type { RecordStore } from "./memory/record-store.js";
export { FileRecordStore } from "./memory/file-store.js";
export type { FileRecordStoreOptions } from "./memory/file-store.js";
export { SqliteRecordStore } from "./memory/sqlite-store.js";
export type { SqliteRecordStoreOptions } from "./memory/sqlite-store.js";
export { PineconeRecordStore } from "./memory/pinecone-store.js";
export type { PineconeRecordStoreOptions } from "./memory/pinecone-store.js";
export {
  createPineconeClient,
  createVectorIndex,
  createPassageEmbedder,
} from "./memory/pinecone.js";
export type { VectorIndex, PassageEmbedder } from "./memory/pinecone.js";
export { createRecordStore } from "./memory/store-factory.js";

export {
  OpenAIEmbeddingProvider,
  PineconeEmbeddingProvider,
  HashingEmbeddingProvider,
  tryEmbed,
  tryEmbedBatch,
  detectEmbeddingProvider,
} from "./memory/embedder.js";
export type { EmbeddingProvider, OpenAIEmbeddingsClient } from "./memory/embedder.js";

export { cosineSimilarity, keywordOverlap, tokenize } from "./memory/similarity.js";
export { VectorIndexCache } from "./memory/vector-cache.js";
export type { ScoredId, VectorCacheStats } from "./memory/vector-cache.js";

export { RetrievalEngine, DEFAULT_RETRIEVAL_SETTINGS } from "./memory/retrieval.js";
export type {
  RetrievalOutcome,
  RetrievedItem,
  RetrieveOptions,
  RetrievalSettings,
  RetrievalMode,
  DegradedReason,
} from "./memory/retrieval.js";

export { buildMemoryContext, formatAgo } from "./memory/context-builder.js";
export type { MemoryContextOptions } from "./memory/context-builder.js";

export { MemorySession, DEFAULT_KNOWLEDGE_BOOST } from "./memory/session.js";
export type {
  MemorySettings,
  RememberOptions,
  KnowledgeSource,
  FileSource,
  ImportReport,
  ImportResult,
  SessionInfo,
} from "./memory/session.js";
export {
  MemoryManager,
  createMemoryManager,
  DEFAULT_MEMORY_SETTINGS,
} from "./memory/manager.js";
export type { MemoryManagerOptions } from "./memory/manager.js";

export { withRetry } from "./providers/retry.js";
export type { RetryOptions } from "./providers/retry.js";
