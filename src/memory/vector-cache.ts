import { log } from "../logger.js";
import type { EmbeddingProvider } from "./embedder.js";
import {
  CacheInconsistentError,
  EmbeddingUnavailableError,
  toError,
} from "./errors.js";
import { cosineSimilarity } from "./similarity.js";
import type { MemoryRecord, Outcome } from "./types.js";

// ── Vector Index Cache ───────────────────────────────────

export const DEFAULT_MAX_ENTRIES = 10_000;

export interface ScoredId {
  recordId: string;
  score: number;
}

export interface VectorCacheStats {
  hits: number;
  misses: number;
  rebuilds: number;
  entries: number;
  generation: number;
}

export interface VectorIndexCacheOptions {
  provider: EmbeddingProvider | null;
  /** Current write generation of the backing store partition */
  generation: () => number;
  maxEntries?: number;
}

/**
 * Derived `recordId → embedding` map for one profile. It is coherent when
 * its generation matches the store's; anything else triggers a rebuild.
 * Brute-force cosine over the candidates handed in.
 */
export class VectorIndexCache {
  private readonly provider: EmbeddingProvider | null;
  private readonly currentGeneration: () => number;
  private readonly maxEntries: number;

  private readonly vectors = new Map<string, readonly number[]>();
  private readonly inFlight = new Map<string, Promise<readonly number[]>>();
  private syncedGeneration = -1;
  private hits = 0;
  private misses = 0;
  private rebuilds = 0;

  constructor(options: VectorIndexCacheOptions) {
    this.provider = options.provider;
    this.currentGeneration = options.generation;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
  }

  /**
   * Top `k` candidates by cosine similarity to the query, newer
   * `createdAt` first on ties. Fails only when vectors that are still
   * missing cannot be embedded.
   */
  async lookup(
    queryEmbedding: readonly number[],
    candidates: readonly MemoryRecord[],
    k: number,
  ): Promise<Outcome<ScoredId[], EmbeddingUnavailableError>> {
    const generation = this.currentGeneration();
    const stale = generation !== this.syncedGeneration;
    if (stale) {
      log.debug(
        { err: new CacheInconsistentError(this.syncedGeneration, generation) },
        "🔄 Vector cache behind store, rebuilding",
      );
    }

    const unique = new Map<string, MemoryRecord>();
    for (const record of candidates) {
      const seen = unique.get(record.id);
      // A stored copy may carry the vector a session copy lacks
      if (!seen || (!seen.embedding && record.embedding)) unique.set(record.id, record);
    }

    const resolved = new Map<string, readonly number[]>();
    const adopted = new Map<string, readonly number[]>();
    const toEmbed: MemoryRecord[] = [];
    const waiting: Array<[string, Promise<readonly number[]>]> = [];

    for (const record of unique.values()) {
      // Resync from the store's copy where it has one
      if (stale && record.embedding) {
        this.misses++;
        adopted.set(record.id, record.embedding);
        resolved.set(record.id, record.embedding);
        continue;
      }

      const cached = this.vectors.get(record.id);
      if (cached) {
        this.hits++;
        resolved.set(record.id, cached);
        continue;
      }

      this.misses++;
      if (record.embedding) {
        adopted.set(record.id, record.embedding);
        resolved.set(record.id, record.embedding);
        continue;
      }
      const shared = this.inFlight.get(record.id);
      if (shared) waiting.push([record.id, shared]);
      else toEmbed.push(record);
    }

    if (toEmbed.length > 0) {
      if (!this.provider) {
        return {
          ok: false,
          error: new EmbeddingUnavailableError(
            `${toEmbed.length} candidates have no embedding and no provider is configured`,
          ),
        };
      }
      const batch = this.provider.embedBatch(toEmbed.map((r) => r.content));
      toEmbed.forEach((record, i) => {
        const single = batch.then((vectors) => vectors[i]);
        // Lookups that lose the race to a deadline still settle this promise
        void single.catch(() => undefined);
        this.inFlight.set(record.id, single);
        waiting.push([record.id, single]);
      });
      void batch.finally(() => {
        for (const record of toEmbed) this.inFlight.delete(record.id);
      }).catch(() => undefined);
    }

    let fetched: Array<readonly number[]>;
    try {
      fetched = await Promise.all(waiting.map(([, vector]) => vector));
    } catch (err) {
      return {
        ok: false,
        error: new EmbeddingUnavailableError("Vector cache rebuild failed", {
          cause: toError(err),
        }),
      };
    }

    // Merge and stamp in one synchronous step
    waiting.forEach(([id], i) => {
      adopted.set(id, fetched[i]);
      resolved.set(id, fetched[i]);
    });
    for (const [id, vector] of adopted) this.store(id, vector);
    if (stale) this.rebuilds++;
    this.syncedGeneration = generation;

    if (k <= 0) return { ok: true, value: [] };

    const scored = [...unique.values()].map((record) => ({
      record,
      score: cosineSimilarity(queryEmbedding, resolved.get(record.id) ?? []),
    }));
    scored.sort(
      (a, b) =>
        b.score - a.score ||
        Date.parse(b.record.createdAt) - Date.parse(a.record.createdAt),
    );

    return {
      ok: true,
      value: scored
        .slice(0, k)
        .map(({ record, score }) => ({ recordId: record.id, score })),
    };
  }

  /** Drop every entry; the next lookup rebuilds. */
  invalidate(): void {
    this.vectors.clear();
    this.syncedGeneration = -1;
  }

  stats(): VectorCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      rebuilds: this.rebuilds,
      entries: this.vectors.size,
      generation: this.syncedGeneration,
    };
  }

  private store(id: string, vector: readonly number[]): void {
    this.vectors.delete(id);
    this.vectors.set(id, vector);
    while (this.vectors.size > this.maxEntries) {
      const oldest = this.vectors.keys().next();
      if (oldest.done) break;
      this.vectors.delete(oldest.value);
    }
  }
}
