import { log } from "../logger.js";
import { tryEmbed, type EmbeddingProvider } from "./embedder.js";
import {
  EmbeddingUnavailableError,
  PartialScanFailureError,
  RetrievalUnavailableError,
  toError,
} from "./errors.js";
import type { FocusSlot } from "./focus-slot.js";
import type { RecordStore } from "./record-store.js";
import { cosineSimilarity, keywordOverlap } from "./similarity.js";
import { VectorIndexCache, type ScoredId } from "./vector-cache.js";
import type { WorkingBuffer } from "./working-buffer.js";
import type { MemoryRecord, Outcome, TieBreak, Tier } from "./types.js";

// ── Retrieval Engine — merge focus, working and persistent ──

export interface RetrievalSettings {
  /** Most recent persistent records considered per query */
  scanLimit: number;
  /** Weight applied to focus and working candidates (> 1) */
  recencyBoost: number;
  minSimilarity: number;
  defaultK: number;
  /** Default relative deadline; 0 means none */
  timeoutMs: number;
  tieBreak: TieBreak;
}

export const DEFAULT_RETRIEVAL_SETTINGS: Readonly<RetrievalSettings> = {
  scanLimit: 1000,
  recencyBoost: 1.2,
  minSimilarity: 0.1,
  defaultK: 5,
  timeoutMs: 0,
  tieBreak: "recency",
};

export interface RetrievedItem {
  recordId: string;
  content: string;
  score: number;
  similarity: number;
  tier: Tier;
  record: MemoryRecord;
}

export type RetrievalMode = "embedding" | "keyword";

export type DegradedReason =
  | "no-embedding-provider"
  | "embedding-unavailable"
  | "partial-scan";

export interface RetrievalOutcome {
  query: string;
  /** Focus first when present, then best score first */
  items: RetrievedItem[];
  mode: RetrievalMode;
  timedOut: boolean;
  degraded: DegradedReason[];
}

export interface RetrieveOptions {
  /** Result budget, focus included */
  k?: number;
  /** Absolute deadline, epoch ms */
  deadline?: number;
  /** Relative deadline; ignored when `deadline` is set */
  timeoutMs?: number;
}

export interface RetrievalSources {
  profile: string | null;
  focus: FocusSlot;
  /** null when the caller keeps no session history */
  working: WorkingBuffer | null;
  store: RecordStore | null;
  provider: EmbeddingProvider | null;
  cache?: VectorIndexCache | null;
  settings?: Partial<RetrievalSettings>;
}

interface Candidate {
  record: MemoryRecord;
  tier: Exclude<Tier, "focus">;
}

type Raced<T> = { timedOut: false; value: T } | { timedOut: true };

export class RetrievalEngine {
  readonly settings: Readonly<RetrievalSettings>;
  private readonly sources: RetrievalSources;
  private readonly cache: VectorIndexCache | null;

  constructor(sources: RetrievalSources) {
    this.sources = sources;
    this.settings = { ...DEFAULT_RETRIEVAL_SETTINGS, ...sources.settings };
    this.cache =
      sources.cache ??
      (sources.provider
        ? new VectorIndexCache({ provider: sources.provider, generation: () => 0 })
        : null);
  }

  async retrieve(
    query: string,
    options: RetrieveOptions = {},
  ): Promise<RetrievalOutcome> {
    const { provider } = this.sources;
    const k = options.k ?? this.settings.defaultK;
    const deadline = resolveDeadline(options, this.settings.timeoutMs);
    const degraded: DegradedReason[] = provider ? [] : ["no-embedding-provider"];

    if (k <= 0) {
      return { query, items: [], mode: "keyword", timedOut: false, degraded };
    }

    const focus = this.sources.focus.get();
    const working = this.sources.working?.all() ?? [];

    // Start both before awaiting either
    const scanning = this.scanPersistent();
    const embedding = provider ? tryEmbed(provider, query) : null;

    const scanned = await beforeDeadline(scanning, deadline, "store scan");
    if (scanned.timedOut) {
      return this.fallback(query, focus, working, k, degraded);
    }

    let persistent: MemoryRecord[] = [];
    if (scanned.value.ok) {
      persistent = scanned.value.value;
    } else if (!this.sources.working) {
      throw new RetrievalUnavailableError(
        "Record store scan failed and the session keeps no working memory",
        { cause: scanned.value.error },
      );
    } else {
      degraded.push("partial-scan");
      log.warn(
        {
          profile: this.sources.profile,
          err: new PartialScanFailureError(this.sources.profile ?? "", {
            cause: scanned.value.error,
          }),
        },
        "⚠️ Record store scan failed, using focus and working memory only",
      );
    }

    const candidates: Candidate[] = [
      // Newest working record first so complete ties favour it
      ...[...working].reverse().map((record) => ({ record, tier: "working" as const })),
      ...persistent.map((record) => ({ record, tier: "persistent" as const })),
    ];

    let queryVector: readonly number[] | null = null;
    let similarities: Map<string, number> | null = null;

    if (embedding && this.cache) {
      const embedded = await beforeDeadline(embedding, deadline, "query embedding");
      if (embedded.timedOut) {
        return this.fallback(query, focus, working, k, degraded);
      }

      if (embedded.value.ok) {
        queryVector = embedded.value.value;
        const records = candidates.map((c) => c.record);
        const looked = await beforeDeadline(
          this.lookupSafely(queryVector, records),
          deadline,
          "vector cache rebuild",
        );
        if (looked.timedOut) {
          return this.fallback(query, focus, working, k, degraded);
        }
        if (looked.value.ok) {
          similarities = new Map(
            looked.value.value.map((s): [string, number] => [s.recordId, s.score]),
          );
        } else {
          degraded.push("embedding-unavailable");
        }
      } else {
        degraded.push("embedding-unavailable");
      }
    }

    const mode: RetrievalMode = similarities ? "embedding" : "keyword";
    const similarityOf = (record: MemoryRecord): number => {
      if (!similarities) return keywordOverlap(query, record.content);
      const cached = similarities.get(record.id);
      if (cached !== undefined) return cached;
      if (queryVector && record.embedding) {
        return cosineSimilarity(queryVector, record.embedding);
      }
      return keywordOverlap(query, record.content);
    };

    const items = this.assemble(focus, candidates, similarityOf, k, true);
    log.debug(
      { profile: this.sources.profile, mode, results: items.length, degraded },
      "🔎 Memory retrieved",
    );
    return { query, items, mode, timedOut: false, degraded };
  }

  // ── Candidates ─────────────────────────────────────────

  private async scanPersistent(): Promise<Outcome<MemoryRecord[]>> {
    const { store, profile } = this.sources;
    if (!store || !profile) return { ok: true, value: [] };
    return settle(store.scan(profile, { limit: this.settings.scanLimit }));
  }

  private async lookupSafely(
    queryVector: readonly number[],
    records: MemoryRecord[],
  ): Promise<Outcome<ScoredId[], EmbeddingUnavailableError>> {
    if (!this.cache) {
      return { ok: false, error: new EmbeddingUnavailableError("No vector cache") };
    }
    try {
      return await this.cache.lookup(queryVector, records, records.length);
    } catch (err) {
      return {
        ok: false,
        error: new EmbeddingUnavailableError("Vector lookup failed", {
          cause: toError(err),
        }),
      };
    }
  }

  /** Focus + Working only, keyword-scored, no similarity threshold. */
  private fallback(
    query: string,
    focus: MemoryRecord | null,
    working: readonly MemoryRecord[],
    k: number,
    degraded: DegradedReason[],
  ): RetrievalOutcome {
    log.warn(
      { profile: this.sources.profile, working: working.length },
      "⏱️ Retrieval deadline expired, answering from session memory",
    );
    const candidates: Candidate[] = [...working]
      .reverse()
      .map((record) => ({ record, tier: "working" as const }));
    const items = this.assemble(
      focus,
      candidates,
      (record) => keywordOverlap(query, record.content),
      k,
      false,
    );
    return { query, items, mode: "keyword", timedOut: true, degraded };
  }

  // ── Ranking ────────────────────────────────────────────

  private assemble(
    focus: MemoryRecord | null,
    candidates: readonly Candidate[],
    similarityOf: (record: MemoryRecord) => number,
    k: number,
    threshold: boolean,
  ): RetrievedItem[] {
    const best = new Map<string, RetrievedItem>();
    for (const { record, tier } of candidates) {
      if (focus && record.id === focus.id) continue;
      const similarity = similarityOf(record);
      if (threshold && similarity < this.settings.minSimilarity) continue;

      const item = this.toItem(record, tier, similarity);
      const seen = best.get(record.id);
      if (!seen || item.score > seen.score) best.set(record.id, item);
    }

    const ranked = [...best.values()].sort((a, b) => this.compare(a, b));
    const budget = k - (focus ? 1 : 0);
    const items = ranked.slice(0, Math.max(0, budget));

    return focus
      ? [this.toItem(focus, "focus", similarityOf(focus)), ...items]
      : items;
  }

  private toItem(record: MemoryRecord, tier: Tier, similarity: number): RetrievedItem {
    const weight = tier === "persistent" ? 1 : this.settings.recencyBoost;
    return {
      recordId: record.id,
      content: record.content,
      score: similarity * record.reliabilityMultiplier * weight,
      similarity,
      tier,
      record,
    };
  }

  private compare(a: RetrievedItem, b: RetrievedItem): number {
    if (b.score !== a.score) return b.score - a.score;

    const { tieBreak } = this.settings;
    if (tieBreak !== "recency" && a.tier !== b.tier) {
      return a.tier === tieBreak ? -1 : b.tier === tieBreak ? 1 : 0;
    }
    return timeOf(b.record) - timeOf(a.record);
  }
}

// ── Deadlines ────────────────────────────────────────────

function resolveDeadline(
  options: RetrieveOptions,
  defaultTimeoutMs: number,
): number | undefined {
  if (options.deadline !== undefined) return options.deadline;
  const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
  return timeoutMs > 0 ? Date.now() + timeoutMs : undefined;
}

function settle<T>(promise: Promise<T>): Promise<Outcome<T>> {
  return promise.then(
    (value): Outcome<T> => ({ ok: true, value }),
    (err: unknown): Outcome<T> => ({ ok: false, error: toError(err) }),
  );
}

/**
 * Race never-rejecting work against an absolute deadline. The timer is
 * always cleared; a result that arrives late is dropped and, if it was a
 * failure, logged at debug.
 */
async function beforeDeadline<T extends Outcome<unknown>>(
  work: Promise<T>,
  deadline: number | undefined,
  label: string,
): Promise<Raced<T>> {
  if (deadline === undefined) return { timedOut: false, value: await work };

  const discard = (): { timedOut: true } => {
    void work.then((late: Outcome<unknown>) => {
      if (!late.ok) log.debug({ label, err: late.error }, "Late failure discarded");
    });
    return { timedOut: true };
  };

  const remaining = deadline - Date.now();
  if (remaining <= 0) return discard();

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<"expired">((resolve) => {
    timer = setTimeout(() => resolve("expired"), remaining);
  });

  try {
    const winner = await Promise.race([work, expired]);
    return winner === "expired" ? discard() : { timedOut: false, value: winner };
  } finally {
    clearTimeout(timer);
  }
}

function timeOf(record: MemoryRecord): number {
  const t = Date.parse(record.createdAt);
  return Number.isNaN(t) ? 0 : t;
}
