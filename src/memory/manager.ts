import type { AppConfig } from "../config.js";
import { log } from "../logger.js";
import { detectEmbeddingProvider, type EmbeddingProvider } from "./embedder.js";
import { StorageUnavailableError } from "./errors.js";
import { assertProfile, type RecordStore } from "./record-store.js";
import { DEFAULT_RETRIEVAL_SETTINGS } from "./retrieval.js";
import { MemorySession, type MemorySettings } from "./session.js";
import { createRecordStore } from "./store-factory.js";
import { VectorIndexCache } from "./vector-cache.js";
import { DEFAULT_WORKING_CAPACITY } from "./working-buffer.js";

// ── MemoryManager — shared store, provider and caches ────

export const DEFAULT_MEMORY_SETTINGS: Readonly<MemorySettings> = {
  ...DEFAULT_RETRIEVAL_SETTINGS,
  workingCapacity: DEFAULT_WORKING_CAPACITY,
};

export interface MemoryManagerOptions {
  store?: RecordStore | null;
  embedder?: EmbeddingProvider | null;
  settings?: Partial<MemorySettings>;
}

/**
 * Owns one record store, one embedding provider and one vector cache per
 * profile, and hands out sessions that share them.
 */
export class MemoryManager {
  readonly store: RecordStore | null;
  readonly embedder: EmbeddingProvider | null;
  readonly settings: Readonly<MemorySettings>;
  private readonly caches = new Map<string, VectorIndexCache>();

  constructor(options: MemoryManagerOptions = {}) {
    this.store = options.store ?? null;
    this.embedder = options.embedder ?? null;
    this.settings = { ...DEFAULT_MEMORY_SETTINGS, ...options.settings };
  }

  /** Open a session. Without a profile the session is anonymous. */
  openSession(profile: string | null = null): MemorySession {
    if (profile !== null) {
      assertProfile(profile);
      if (!this.store) {
        throw new StorageUnavailableError(
          `No record store configured for profile "${profile}"`,
        );
      }
    }

    const session = new MemorySession({
      profile,
      store: this.store,
      provider: this.embedder,
      cache: profile !== null ? this.cacheFor(profile) : null,
      settings: this.settings,
    });
    log.debug(
      { sessionId: session.id, profile, provider: this.embedder?.name ?? null },
      "🧠 Memory session opened",
    );
    return session;
  }

  /** The shared vector cache for a profile, created on first use. */
  cacheFor(profile: string): VectorIndexCache {
    assertProfile(profile);
    let cache = this.caches.get(profile);
    if (!cache) {
      const { store } = this;
      cache = new VectorIndexCache({
        provider: this.embedder,
        generation: () => store?.generation(profile) ?? 0,
      });
      this.caches.set(profile, cache);
    }
    return cache;
  }

  async close(): Promise<void> {
    this.caches.clear();
    await this.store?.close();
  }
}

/** Build a manager from configuration: backend, provider and settings. */
export function createMemoryManager(config: AppConfig): MemoryManager {
  return new MemoryManager({
    store: createRecordStore(config),
    embedder: detectEmbeddingProvider(config),
    settings: {
      workingCapacity: config.workingMemoryCapacity,
      scanLimit: config.scanLimit,
      recencyBoost: config.recencyBoost,
      minSimilarity: config.minSimilarity,
      defaultK: config.defaultK,
      timeoutMs: config.retrievalTimeoutMs,
      tieBreak: config.tieBreak,
    },
  });
}
