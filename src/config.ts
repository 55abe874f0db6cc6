import dotenv from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { ConfigError } from "./memory/errors.js";
import type { StoreKind, TieBreak } from "./memory/types.js";

dotenv.config();

// ── Config ───────────────────────────────────────────────

export type EmbeddingProviderSetting =
  | "auto"
  | "openai"
  | "pinecone"
  | "hashing"
  | "none";

export interface AppConfig {
  memoryStore: StoreKind;
  /** Root for the file and SQLite stores */
  memoryDir: string;

  // ── Embeddings ────────────────────────────────────────
  embeddingProvider: EmbeddingProviderSetting;
  openaiApiKey: string;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;

  // ── Pinecone ──────────────────────────────────────────
  pineconeApiKey: string;
  pineconeIndex: string;
  pineconeEmbeddingModel: string;
  pineconeDimension: number;

  // ── Retrieval ─────────────────────────────────────────
  workingMemoryCapacity: number;
  scanLimit: number;
  recencyBoost: number;
  minSimilarity: number;
  defaultK: number;
  /** 0 disables the default deadline */
  retrievalTimeoutMs: number;
  tieBreak: TieBreak;
}

type Env = Readonly<Record<string, string | undefined>>;

// ── Helpers ──────────────────────────────────────────────

function oneOf<T extends string>(
  env: Env,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new ConfigError(
      `${key} must be one of ${allowed.join(", ")} (got "${raw}")`,
    );
  }
  return match;
}

function integer(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function decimal(
  env: Env,
  key: string,
  fallback: number,
  accept: (value: number) => boolean,
  rule: string,
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !accept(value)) {
    throw new ConfigError(`${key} must be ${rule} (got "${raw}")`);
  }
  return value;
}

function expandHome(path: string): string {
  return path === "~" || path.startsWith("~/")
    ? join(homedir(), path.slice(1))
    : path;
}

// ── Loader ───────────────────────────────────────────────

/** Read and validate configuration. Throws ConfigError on bad values. */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    memoryStore: oneOf(env, "MEMORY_STORE", ["file", "sqlite", "pinecone"], "file"),
    memoryDir: expandHome(
      env.MEMORY_DIR?.trim() || join(homedir(), ".memstrata", "profiles"),
    ),

    embeddingProvider: oneOf(
      env,
      "EMBEDDING_PROVIDER",
      ["auto", "openai", "pinecone", "hashing", "none"],
      "auto",
    ),
    openaiApiKey: env.OPENAI_API_KEY || "",
    openaiBaseUrl: env.OPENAI_BASE_URL || "",
    openaiEmbeddingModel:
      env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",

    pineconeApiKey: env.PINECONE_API_KEY || "",
    pineconeIndex: env.PINECONE_INDEX || "",
    pineconeEmbeddingModel:
      env.PINECONE_EMBEDDING_MODEL || "multilingual-e5-large",
    pineconeDimension: integer(env, "PINECONE_DIMENSION", 1024, 1),

    workingMemoryCapacity: integer(env, "WORKING_MEMORY_CAPACITY", 100, 1),
    scanLimit: integer(env, "MEMORY_SCAN_LIMIT", 1000, 0),
    recencyBoost: decimal(
      env,
      "MEMORY_RECENCY_BOOST",
      1.2,
      (v) => v > 1,
      "a number greater than 1",
    ),
    minSimilarity: decimal(
      env,
      "MEMORY_MIN_SIMILARITY",
      0.1,
      (v) => v >= 0 && v <= 1,
      "a number between 0 and 1",
    ),
    defaultK: integer(env, "MEMORY_DEFAULT_K", 5, 0),
    retrievalTimeoutMs: integer(env, "MEMORY_RETRIEVAL_TIMEOUT_MS", 0, 0),
    tieBreak: oneOf(
      env,
      "MEMORY_TIE_BREAK",
      ["recency", "working", "persistent"],
      "recency",
    ),
  };

  // ── Validation ─────────────────────────────────────────

  if (config.memoryStore === "pinecone") {
    if (!config.pineconeApiKey || !config.pineconeIndex) {
      throw new ConfigError(
        "MEMORY_STORE=pinecone requires PINECONE_API_KEY and PINECONE_INDEX",
      );
    }
  }
  if (config.embeddingProvider === "openai" && !config.openaiApiKey) {
    throw new ConfigError("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY");
  }
  if (config.embeddingProvider === "pinecone" && !config.pineconeApiKey) {
    throw new ConfigError("EMBEDDING_PROVIDER=pinecone requires PINECONE_API_KEY");
  }

  return config;
}
