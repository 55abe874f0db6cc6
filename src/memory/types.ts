// ── Memory Module — Shared Types ─────────────────────────

export type Importance = "low" | "medium" | "high";

/**
 * Typed context attached to a record. Known keys are explicit fields;
 * anything else lands in the bounded `extra` map.
 */
export interface RecordContext {
  readonly sourceType?: string;
  readonly documentType?: string;
  readonly importance?: Importance;
  readonly learningContext?: string;
  readonly knowledgeSummary?: string;
  readonly futureRelevance?: string;
  readonly sessionId?: string;
  readonly importedAt?: string;
  readonly personaName?: string;
  readonly extra?: Readonly<Record<string, string>>;
}

/** Opaque scalar map handed over by external collaborators. */
export type ContextInput = Readonly<Record<string, string | number | boolean>>;

export interface MemoryRecord {
  readonly id: string;
  readonly content: string;
  /** ISO-8601 */
  readonly createdAt: string;
  readonly context: RecordContext;
  readonly embedding?: readonly number[];
  readonly isEvolved: boolean;
  /** Ranking weight, >= 1.0, never decreases */
  readonly reliabilityMultiplier: number;
  readonly companionResponse?: string;
  /** 1 at creation, +1 per effective upgrade */
  readonly version: number;
  readonly evolvedAt?: string;
}

export type Tier = "focus" | "working" | "persistent";

export type StoreKind = "file" | "sqlite" | "pinecone";

/** Ordering among equal scores: newest first, or prefer one tier then newest. */
export type TieBreak = "recency" | "working" | "persistent";

export type ContextPredicate = (context: RecordContext) => boolean;

export interface ScanOptions {
  limit: number;
  filter?: ContextPredicate;
}

/** Result-or-error value for calls that may degrade instead of failing. */
export type Outcome<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Upgrade payload produced by the external learning decision. */
export interface UpgradePayload {
  boost: number;
  context: ContextInput;
}

export interface PersistenceDecision {
  persist: boolean;
  upgrade?: UpgradePayload;
  /** How many of the most recent working records the decision covers (default 3) */
  recentCount?: number;
}
