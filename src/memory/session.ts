import { readFile } from "fs/promises";
import { nanoid } from "nanoid";
import { log } from "../logger.js";
import {
  buildMemoryContext,
  type MemoryContextOptions,
} from "./context-builder.js";
import { tryEmbed, tryEmbedBatch, type EmbeddingProvider } from "./embedder.js";
import { DuplicateIdError, ProfileRequiredError, toError } from "./errors.js";
import { FocusSlot } from "./focus-slot.js";
import { createRecord, normalizeContext, withEmbedding } from "./record.js";
import type { RecordStore } from "./record-store.js";
import {
  RetrievalEngine,
  type RetrievalOutcome,
  type RetrievalSettings,
  type RetrieveOptions,
} from "./retrieval.js";
import type {
  ContextInput,
  Importance,
  MemoryRecord,
  PersistenceDecision,
} from "./types.js";
import type { VectorCacheStats, VectorIndexCache } from "./vector-cache.js";
import { WorkingBuffer } from "./working-buffer.js";

// ── Memory Session — one conversation over the three tiers ─

export interface MemorySettings extends RetrievalSettings {
  workingCapacity: number;
}

export interface MemorySessionOptions {
  /** null for an anonymous session with no persistent tier */
  profile: string | null;
  store: RecordStore | null;
  provider: EmbeddingProvider | null;
  cache: VectorIndexCache | null;
  settings: MemorySettings;
}

export interface RememberOptions {
  context?: ContextInput;
  companionResponse?: string;
  /** Also write to the record store (named profiles only) */
  persist?: boolean;
}

export interface KnowledgeSource {
  content: string;
  type?: string;
  importance?: Importance;
  /** Reliability multiplier for the imported record (default 1.3) */
  boost?: number;
  sourceFile?: string;
  /** Set when the source could not be read; the source is skipped */
  error?: string;
}

export type FileSource =
  | string
  | { path: string; type?: string; importance?: Importance; boost?: number };

export type ImportResult =
  | {
      type: string;
      size: number;
      importance: Importance;
      boost: number;
      recordId: string;
      /** False when the record was stored but could not be marked as knowledge */
      upgraded: boolean;
    }
  | { type: string; error: string };

export interface ImportReport {
  importedCount: number;
  skippedCount: number;
  totalSources: number;
  results: ImportResult[];
}

export interface SessionInfo {
  sessionId: string;
  profile: string | null;
  isAnonymous: boolean;
  hasPersistentMemory: boolean;
  storeKind: string | null;
  currentFocus: boolean;
  sessionSize: number;
  workingCapacity: number;
  embeddingProvider: string | null;
  cache: VectorCacheStats | null;
}

export const DEFAULT_KNOWLEDGE_BOOST = 1.3;
const DEFAULT_DECISION_SCOPE = 3;
const SUMMARY_CHARS = 200;

export class MemorySession {
  readonly id = nanoid();
  readonly profile: string | null;
  readonly focus = new FocusSlot();
  readonly working: WorkingBuffer;

  private readonly store: RecordStore | null;
  private readonly provider: EmbeddingProvider | null;
  private readonly cache: VectorIndexCache | null;
  private readonly engine: RetrievalEngine;

  constructor(options: MemorySessionOptions) {
    this.profile = options.profile;
    this.store = options.profile ? options.store : null;
    this.provider = options.provider;
    this.cache = options.cache;
    this.working = new WorkingBuffer(options.settings.workingCapacity);
    this.engine = new RetrievalEngine({
      profile: this.profile,
      focus: this.focus,
      working: this.working,
      store: this.store,
      provider: this.provider,
      cache: this.cache,
      settings: options.settings,
    });
  }

  get hasPersistentMemory(): boolean {
    return this.store !== null;
  }

  // ── Intake ─────────────────────────────────────────────

  /**
   * Record a new input: it becomes the focus and joins the working buffer
   * before any provider call. Session-only records get their vector lazily
   * from the vector cache. With `persist`, a named session embeds the record
   * and writes it to the record store.
   */
  async remember(
    content: string,
    options: RememberOptions = {},
  ): Promise<MemoryRecord> {
    const record = createRecord({
      content,
      context: normalizeContext({ session_id: this.id, ...options.context }),
      ...(options.companionResponse !== undefined
        ? { companionResponse: options.companionResponse }
        : {}),
    });

    this.focus.set(record);
    this.working.push(record);

    if (!options.persist || !this.store || !this.profile) return record;

    const stored = await this.withVector(record);
    await this.store.put(this.profile, stored);
    if (this.focus.get()?.id === stored.id) this.focus.set(stored);
    return stored;
  }

  /**
   * Apply an external persistence decision to the most recent working
   * records: store the ones not yet stored, then upgrade them if the
   * decision carries an upgrade payload.
   */
  async applyDecision(decision: PersistenceDecision): Promise<MemoryRecord[]> {
    if (!decision.persist) return [];
    const { store, profile } = this.requirePersistence("applyDecision");

    const recent = this.working.recent(
      decision.recentCount ?? DEFAULT_DECISION_SCOPE,
    );
    const evolved = decision.upgrade
      ? normalizeContext(decision.upgrade.context)
      : null;

    const results: MemoryRecord[] = [];
    for (const record of recent) {
      let stored = await this.ensureStored(store, profile, record);

      if (decision.upgrade && evolved) {
        const upgraded = await store.upgrade(
          profile,
          record.id,
          decision.upgrade.boost,
          evolved,
        );
        if (upgraded) stored = upgraded;
      }

      if (this.focus.get()?.id === stored.id) this.focus.set(stored);
      results.push(stored);
    }

    log.debug(
      { profile, records: results.length, upgraded: Boolean(decision.upgrade) },
      "💾 Persistence decision applied",
    );
    return results;
  }

  // ── Project knowledge ──────────────────────────────────

  /**
   * Store documents as evolved knowledge. Blank or unreadable sources are
   * skipped; a failing source is reported in the results, not thrown.
   */
  async importKnowledge(
    sources: readonly KnowledgeSource[],
  ): Promise<ImportReport> {
    const { store, profile } = this.requirePersistence("importKnowledge");

    const embeddings = new Map<number, number[]>();
    const embeddable = sources
      .map((source, i) => ({ source, i }))
      .filter(({ source }) => !source.error && source.content.trim() !== "");
    if (this.provider && embeddable.length > 0) {
      const batch = await tryEmbedBatch(
        this.provider,
        embeddable.map(({ source }) => source.content),
      );
      if (batch.ok) {
        embeddable.forEach(({ i }, j) => embeddings.set(i, batch.value[j]));
      }
    }

    const report: ImportReport = {
      importedCount: 0,
      skippedCount: 0,
      totalSources: sources.length,
      results: [],
    };

    for (const [i, source] of sources.entries()) {
      const type = source.type ?? "general";
      if (source.error) {
        report.skippedCount++;
        report.results.push({ type, error: source.error });
        continue;
      }
      if (source.content.trim() === "") {
        report.skippedCount++;
        continue;
      }

      const importance = source.importance ?? "medium";
      const boost = source.boost ?? DEFAULT_KNOWLEDGE_BOOST;
      const importedAt = new Date().toISOString();

      let recordId: string;
      try {
        const embedding = embeddings.get(i);
        const record = createRecord({
          content: source.content,
          context: normalizeContext({
            source_type: "project_knowledge",
            document_type: type,
            importance,
            imported_at: importedAt,
            content_summary: summarize(source.content),
            ...(source.sourceFile ? { source_file: source.sourceFile } : {}),
          }),
          ...(embedding ? { embedding } : {}),
        });

        await store.put(profile, record);
        recordId = record.id;
      } catch (err) {
        const error = toError(err);
        log.warn({ profile, type, err: error }, "⚠️ Knowledge import failed");
        report.skippedCount++;
        report.results.push({ type, error: error.message });
        continue;
      }

      // Stored from here on: an upgrade failure still counts as imported
      let upgraded: boolean;
      try {
        const evolved = await store.upgrade(
          profile,
          recordId,
          boost,
          normalizeContext({
            knowledge_summary: `${titleCase(type)} documentation`,
            learning_context: "project_documentation",
            future_relevance: `Relevant for ${type} decisions and planning`,
            imported_at: importedAt,
          }),
        );
        upgraded = evolved !== null;
      } catch (err) {
        upgraded = false;
        log.warn(
          { profile, type, recordId, err: toError(err) },
          "⚠️ Knowledge stored but not upgraded",
        );
      }

      report.importedCount++;
      report.results.push({
        type,
        size: source.content.length,
        importance,
        boost,
        recordId,
        upgraded,
      });
    }

    log.info(
      {
        profile,
        imported: report.importedCount,
        skipped: report.skippedCount,
      },
      "📚 Project knowledge imported",
    );
    return report;
  }

  /** Read UTF-8 files and import them as project knowledge. */
  async importFiles(
    files: readonly FileSource[],
    defaultType = "documentation",
  ): Promise<ImportReport> {
    this.requirePersistence("importFiles");

    const sources = await Promise.all(
      files.map(async (file): Promise<KnowledgeSource> => {
        const entry = typeof file === "string" ? { path: file } : file;
        const type = entry.type ?? defaultType;
        try {
          return {
            content: await readFile(entry.path, "utf-8"),
            type,
            importance: entry.importance ?? "medium",
            boost: entry.boost ?? DEFAULT_KNOWLEDGE_BOOST,
            sourceFile: entry.path,
          };
        } catch (err) {
          return {
            content: "",
            type,
            error: `Failed to read ${entry.path}: ${toError(err).message}`,
          };
        }
      }),
    );

    return this.importKnowledge(sources);
  }

  // ── Retrieval ──────────────────────────────────────────

  retrieve(query: string, options?: RetrieveOptions): Promise<RetrievalOutcome> {
    return this.engine.retrieve(query, options);
  }

  /** Retrieve and render as a prompt block ("" when nothing matched). */
  async buildContext(
    query: string,
    options: RetrieveOptions & MemoryContextOptions = {},
  ): Promise<string> {
    const outcome = await this.engine.retrieve(query, options);
    return buildMemoryContext(outcome, options);
  }

  // ── Lifecycle ──────────────────────────────────────────

  clearFocus(): void {
    this.focus.clear();
  }

  /** Drop session memory. Persistent records are untouched. */
  end(): void {
    this.focus.clear();
    this.working.clear();
    log.debug({ sessionId: this.id, profile: this.profile }, "👋 Session ended");
  }

  info(): SessionInfo {
    return {
      sessionId: this.id,
      profile: this.profile,
      isAnonymous: this.profile === null,
      hasPersistentMemory: this.hasPersistentMemory,
      storeKind: this.store?.kind ?? null,
      currentFocus: this.focus.hasFocus(),
      sessionSize: this.working.size,
      workingCapacity: this.working.capacity,
      embeddingProvider: this.provider?.name ?? null,
      cache: this.cache?.stats() ?? null,
    };
  }

  // ── Helpers ────────────────────────────────────────────

  private requirePersistence(operation: string): {
    store: RecordStore;
    profile: string;
  } {
    if (!this.store || !this.profile) throw new ProfileRequiredError(operation);
    return { store: this.store, profile: this.profile };
  }

  private async ensureStored(
    store: RecordStore,
    profile: string,
    record: MemoryRecord,
  ): Promise<MemoryRecord> {
    const existing = await store.get(profile, record.id);
    if (existing) return existing;
    const embedded = await this.withVector(record);
    try {
      await store.put(profile, embedded);
      return embedded;
    } catch (err) {
      // Another writer stored it first
      if (err instanceof DuplicateIdError) {
        return (await store.get(profile, record.id)) ?? record;
      }
      throw err;
    }
  }

  /** Attach a vector when the provider can supply one. */
  private async withVector(record: MemoryRecord): Promise<MemoryRecord> {
    if (record.embedding || !this.provider) return record;
    const outcome = await tryEmbed(this.provider, record.content);
    return outcome.ok ? withEmbedding(record, outcome.value) : record;
  }
}

function summarize(content: string): string {
  return content.length > SUMMARY_CHARS
    ? `${content.slice(0, SUMMARY_CHARS)}...`
    : content;
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, (c) => c.toUpperCase());
}
