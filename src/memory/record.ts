import { nanoid } from "nanoid";
import { log } from "../logger.js";
import type {
  ContextInput,
  Importance,
  MemoryRecord,
  RecordContext,
} from "./types.js";

// ── Record Construction & Versioning ─────────────────────

/** Upper bound on free-form context annotations per record */
export const MAX_EXTRA_KEYS = 32;
/** Longer annotation values are truncated */
export const MAX_EXTRA_VALUE_LENGTH = 1000;

type TypedContextKey = Exclude<keyof RecordContext, "extra" | "importance">;

const TYPED_KEYS: Record<string, TypedContextKey | "importance"> = {
  source_type: "sourceType",
  sourceType: "sourceType",
  document_type: "documentType",
  documentType: "documentType",
  importance: "importance",
  learning_context: "learningContext",
  learningContext: "learningContext",
  knowledge_summary: "knowledgeSummary",
  knowledgeSummary: "knowledgeSummary",
  future_relevance: "futureRelevance",
  futureRelevance: "futureRelevance",
  session_id: "sessionId",
  sessionId: "sessionId",
  imported_at: "importedAt",
  importedAt: "importedAt",
  persona_name: "personaName",
  personaName: "personaName",
};

const IMPORTANCE_LEVELS: readonly Importance[] = ["low", "medium", "high"];

function isImportance(value: string): value is Importance {
  return IMPORTANCE_LEVELS.some((level) => level === value);
}

export interface NewRecordInput {
  content: string;
  id?: string;
  createdAt?: string;
  context?: RecordContext;
  embedding?: readonly number[];
  companionResponse?: string;
}

/** Build a fresh, frozen version-1 record. */
export function createRecord(input: NewRecordInput): MemoryRecord {
  return freezeRecord({
    id: input.id ?? nanoid(),
    content: input.content,
    createdAt: input.createdAt ?? new Date().toISOString(),
    context: input.context ?? {},
    ...(input.embedding ? { embedding: input.embedding } : {}),
    isEvolved: false,
    reliabilityMultiplier: 1,
    ...(input.companionResponse !== undefined
      ? { companionResponse: input.companionResponse }
      : {}),
    version: 1,
  });
}

/** Deep-freeze a record so shared references can never be torn. */
export function freezeRecord(record: MemoryRecord): MemoryRecord {
  const context: RecordContext = Object.freeze({
    ...record.context,
    ...(record.context.extra
      ? { extra: Object.freeze({ ...record.context.extra }) }
      : {}),
  });
  return Object.freeze({
    ...record,
    context,
    ...(record.embedding
      ? { embedding: Object.freeze([...record.embedding]) }
      : {}),
  });
}

/** The same record version carrying a vector. */
export function withEmbedding(
  record: MemoryRecord,
  embedding: readonly number[],
): MemoryRecord {
  return freezeRecord({ ...record, embedding });
}

/**
 * Map an opaque scalar map onto typed context fields.
 * Unknown keys (and invalid importance levels) go to `extra`.
 */
export function normalizeContext(input: ContextInput = {}): RecordContext {
  const typed: Record<string, string> = {};
  const extra: Record<string, string> = {};

  for (const [key, raw] of Object.entries(input)) {
    const value = String(raw);
    const field = Object.hasOwn(TYPED_KEYS, key)
      ? TYPED_KEYS[key]
      : undefined;
    if (field === "importance") {
      if (isImportance(value)) typed.importance = value;
      else extra[key] = value;
    } else if (field) {
      typed[field] = value;
    } else {
      extra[key] = value;
    }
  }

  return buildContext(typed, extra);
}

/** Overlay `patch` on `base`; `extra` maps are merged key by key. */
export function mergeContext(
  base: RecordContext,
  patch: RecordContext,
): RecordContext {
  const typed: Record<string, string> = {};
  const extra: Record<string, string> = { ...(base.extra ?? {}) };

  for (const source of [base, patch]) {
    for (const [key, value] of Object.entries(source)) {
      if (key === "extra" || typeof value !== "string") continue;
      typed[key] = value;
    }
  }
  Object.assign(extra, patch.extra ?? {});

  return buildContext(typed, extra);
}

type MutableContext = {
  -readonly [K in keyof RecordContext]: RecordContext[K];
};

const TEXT_FIELDS: readonly TypedContextKey[] = [
  "sourceType",
  "documentType",
  "learningContext",
  "knowledgeSummary",
  "futureRelevance",
  "sessionId",
  "importedAt",
  "personaName",
];

function buildContext(
  typed: Record<string, string>,
  extra: Record<string, string>,
): RecordContext {
  const context: MutableContext = {};
  for (const field of TEXT_FIELDS) {
    const value = typed[field];
    if (value !== undefined) context[field] = value;
  }

  const importance = typed.importance;
  if (importance !== undefined && isImportance(importance)) {
    context.importance = importance;
  }

  const bounded = boundExtra(extra);
  if (Object.keys(bounded).length > 0) context.extra = bounded;
  return context;
}

function boundExtra(extra: Record<string, string>): Record<string, string> {
  const keys = Object.keys(extra);
  if (keys.length > MAX_EXTRA_KEYS) {
    log.warn(
      { dropped: keys.slice(MAX_EXTRA_KEYS) },
      "⚠️ Context annotations over limit, extra keys dropped",
    );
  }

  const bounded: Record<string, string> = {};
  for (const key of keys.slice(0, MAX_EXTRA_KEYS)) {
    bounded[key] = extra[key].slice(0, MAX_EXTRA_VALUE_LENGTH);
  }
  return bounded;
}

/** Structural equality on contexts, independent of key order. */
export function sameContext(a: RecordContext, b: RecordContext): boolean {
  return canonical(a) === canonical(b);
}

function canonical(context: RecordContext): string {
  const entries = Object.entries(context)
    .filter(([key]) => key !== "extra")
    .sort(([x], [y]) => x.localeCompare(y));
  const extra = Object.entries(context.extra ?? {}).sort(([x], [y]) =>
    x.localeCompare(y),
  );
  return JSON.stringify([entries, extra]);
}

// ── Upgrade ──────────────────────────────────────────────

export interface UpgradeResult {
  record: MemoryRecord;
  /** False when the upgrade left the record exactly as it was */
  changed: boolean;
}

/**
 * Produce the next version of a record carrying evolved knowledge.
 * Multiplier becomes max(current, boost); repeating an upgrade is a no-op.
 */
export function applyUpgrade(
  record: MemoryRecord,
  boost: number,
  evolved: RecordContext,
  now: string = new Date().toISOString(),
): UpgradeResult {
  if (!Number.isFinite(boost) || boost <= 0) {
    throw new RangeError(`Reliability boost must be a positive number, got ${boost}`);
  }

  const reliabilityMultiplier = Math.max(record.reliabilityMultiplier, boost);
  const context = mergeContext(record.context, evolved);

  const changed =
    !record.isEvolved ||
    reliabilityMultiplier !== record.reliabilityMultiplier ||
    !sameContext(context, record.context);
  if (!changed) return { record, changed: false };

  return {
    record: freezeRecord({
      ...record,
      context,
      isEvolved: true,
      reliabilityMultiplier,
      version: record.version + 1,
      evolvedAt: record.evolvedAt ?? now,
    }),
    changed: true,
  };
}

// ── Persisted Schema ─────────────────────────────────────

/** Storage-agnostic persisted shape */
export interface SerializedRecord {
  id: string;
  content: string;
  created_at: string;
  context: RecordContext;
  embedding?: number[];
  is_evolved: boolean;
  reliability_multiplier: number;
  companion_response?: string;
  version: number;
  evolved_at?: string;
}

export function serializeRecord(record: MemoryRecord): SerializedRecord {
  return {
    id: record.id,
    content: record.content,
    created_at: record.createdAt,
    context: record.context,
    ...(record.embedding ? { embedding: [...record.embedding] } : {}),
    is_evolved: record.isEvolved,
    reliability_multiplier: record.reliabilityMultiplier,
    ...(record.companionResponse !== undefined
      ? { companion_response: record.companionResponse }
      : {}),
    version: record.version,
    ...(record.evolvedAt ? { evolved_at: record.evolvedAt } : {}),
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is readonly number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

/** Rebuild a stored context; anything that is not a string is ignored. */
export function parseStoredContext(raw: unknown): RecordContext {
  if (!isObject(raw)) return {};
  const typed: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== "extra" && typeof value === "string") typed[key] = value;
  }
  const extra: Record<string, string> = {};
  if (isObject(raw.extra)) {
    for (const [key, value] of Object.entries(raw.extra)) {
      if (typeof value === "string") extra[key] = value;
    }
  }
  return buildContext(typed, extra);
}

/**
 * Parse a persisted record. Throws on anything malformed.
 * Backends that keep the vector outside the document pass it as `vector`.
 */
export function deserializeRecord(
  raw: unknown,
  vector?: readonly number[],
): MemoryRecord {
  if (!isObject(raw)) throw new TypeError("Stored record is not an object");
  const {
    id,
    content,
    created_at,
    is_evolved,
    reliability_multiplier,
    companion_response,
    version,
    evolved_at,
  } = raw;
  const rawEmbedding: unknown = vector ?? raw.embedding;

  if (typeof id !== "string" || id.length === 0) {
    throw new TypeError("Stored record has no id");
  }
  if (typeof content !== "string" || typeof created_at !== "string") {
    throw new TypeError(`Stored record ${id} is missing content or created_at`);
  }
  let embedding: readonly number[] | undefined;
  if (isNumberArray(rawEmbedding)) {
    embedding = rawEmbedding;
  } else if (rawEmbedding !== undefined && rawEmbedding !== null) {
    throw new TypeError(`Stored record ${id} has a malformed embedding`);
  }

  const multiplier =
    typeof reliability_multiplier === "number" && reliability_multiplier >= 1
      ? reliability_multiplier
      : 1;

  return freezeRecord({
    id,
    content,
    createdAt: created_at,
    context: parseStoredContext(raw.context),
    ...(embedding ? { embedding } : {}),
    isEvolved: is_evolved === true,
    reliabilityMultiplier: multiplier,
    ...(typeof companion_response === "string"
      ? { companionResponse: companion_response }
      : {}),
    version: typeof version === "number" && version >= 1 ? version : 1,
    ...(typeof evolved_at === "string" ? { evolvedAt: evolved_at } : {}),
  });
}
