import OpenAI from "openai";
import type { AppConfig } from "../config.js";
import { log } from "../logger.js";
import { withRetry } from "../providers/retry.js";
import { EmbeddingUnavailableError, toError } from "./errors.js";
import {
  createPassageEmbedder,
  createPineconeClient,
  type PassageEmbedder,
} from "./pinecone.js";
import { tokenize } from "./similarity.js";
import type { Outcome } from "./types.js";

// ── Embedding Providers ──────────────────────────────────

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  /** One vector per input, same order */
  embedBatch(texts: readonly string[]): Promise<number[][]>;
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

function zeros(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

/**
 * Embed only the non-blank inputs; blank ones map to a zero vector
 * without reaching the provider.
 */
async function embedNonBlank(
  texts: readonly string[],
  dimension: number,
  embedChunk: (chunk: string[]) => Promise<number[][]>,
  chunkSize: number,
): Promise<number[][]> {
  const results: number[][] = texts.map(() => zeros(dimension));
  const pending: number[] = [];
  texts.forEach((text, i) => {
    if (!isBlank(text)) pending.push(i);
  });

  for (let start = 0; start < pending.length; start += chunkSize) {
    const slots = pending.slice(start, start + chunkSize);
    const vectors = await embedChunk(slots.map((i) => texts[i]));
    if (vectors.length !== slots.length) {
      throw new Error(
        `Embedding provider returned ${vectors.length} vectors for ${slots.length} inputs`,
      );
    }
    slots.forEach((slot, j) => {
      results[slot] = vectors[j];
    });
  }
  return results;
}

// ── OpenAI ───────────────────────────────────────────────

/** The part of the OpenAI SDK client the provider uses. */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<{
      data: ReadonlyArray<{ embedding: number[]; index: number }>;
    }>;
  };
}

const OPENAI_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

/** OpenAI accepts up to 2048 inputs per call; keep requests small. */
const OPENAI_BATCH_SIZE = 100;

export interface OpenAIEmbeddingOptions {
  client: OpenAIEmbeddingsClient;
  model?: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimension: number;
  private readonly client: OpenAIEmbeddingsClient;

  constructor(options: OpenAIEmbeddingOptions) {
    this.client = options.client;
    this.model = options.model ?? "text-embedding-3-small";
    this.dimension = OPENAI_DIMENSIONS[this.model] ?? 1536;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  embedBatch(texts: readonly string[]): Promise<number[][]> {
    return embedNonBlank(
      texts,
      this.dimension,
      async (input) => {
        const response = await withRetry(
          () => this.client.embeddings.create({ model: this.model, input }),
          { label: "OpenAI embeddings" },
        );
        return [...response.data]
          .sort((a, b) => a.index - b.index)
          .map((d) => d.embedding);
      },
      OPENAI_BATCH_SIZE,
    );
  }
}

// ── Pinecone Inference ───────────────────────────────────

/** Pinecone inference takes at most 96 passages per request. */
const PINECONE_BATCH_SIZE = 96;

/** Rough character cap so a single passage stays under the token limit */
const PINECONE_MAX_CHARS = 2000;

export interface PineconeEmbeddingOptions {
  embedPassages: PassageEmbedder;
  model?: string;
  dimension?: number;
}

export class PineconeEmbeddingProvider implements EmbeddingProvider {
  readonly name = "pinecone";
  readonly model: string;
  readonly dimension: number;
  private readonly embedPassages: PassageEmbedder;

  constructor(options: PineconeEmbeddingOptions) {
    this.embedPassages = options.embedPassages;
    this.model = options.model ?? "multilingual-e5-large";
    this.dimension = options.dimension ?? 1024;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  embedBatch(texts: readonly string[]): Promise<number[][]> {
    return embedNonBlank(
      texts,
      this.dimension,
      (inputs) =>
        withRetry(
          () =>
            this.embedPassages(
              this.model,
              inputs.map((t) => t.slice(0, PINECONE_MAX_CHARS)),
            ),
          { label: "Pinecone inference" },
        ),
      PINECONE_BATCH_SIZE,
    );
  }
}

// ── Local feature hashing ────────────────────────────────

/**
 * Deterministic, offline embeddings: each token is hashed into one of
 * `dimension` buckets with a hash-derived sign, then L2-normalised.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hashing";
  readonly dimension: number;

  constructor(dimension = 256) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorize(t));
  }

  private vectorize(text: string): number[] {
    const vector = zeros(this.dimension);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimension] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

/** 32-bit FNV-1a, unsigned */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// ── Result-or-error calls ────────────────────────────────

/** Embed one text. Never throws; a missing provider is a failure. */
export async function tryEmbed(
  provider: EmbeddingProvider | null,
  text: string,
): Promise<Outcome<number[], EmbeddingUnavailableError>> {
  const outcome = await tryEmbedBatch(provider, [text]);
  return outcome.ok ? { ok: true, value: outcome.value[0] } : outcome;
}

/** Embed many texts in one provider call. Never throws. */
export async function tryEmbedBatch(
  provider: EmbeddingProvider | null,
  texts: readonly string[],
): Promise<Outcome<number[][], EmbeddingUnavailableError>> {
  if (!provider) {
    return {
      ok: false,
      error: new EmbeddingUnavailableError("No embedding provider configured"),
    };
  }
  try {
    return { ok: true, value: await provider.embedBatch(texts) };
  } catch (err) {
    log.warn(
      { provider: provider.name, count: texts.length, err },
      "⚠️ Embedding failed",
    );
    return {
      ok: false,
      error: new EmbeddingUnavailableError(
        `Embedding provider "${provider.name}" failed`,
        { cause: toError(err) },
      ),
    };
  }
}

// ── Detection ────────────────────────────────────────────

export type EmbeddingConfig = Pick<
  AppConfig,
  | "embeddingProvider"
  | "openaiApiKey"
  | "openaiBaseUrl"
  | "openaiEmbeddingModel"
  | "pineconeApiKey"
  | "pineconeEmbeddingModel"
  | "pineconeDimension"
>;

let warnedKeywordOnly = false;

/**
 * Pick the embedding provider for a configuration. `auto` prefers OpenAI,
 * then Pinecone inference, then none (keyword-only retrieval).
 */
export function detectEmbeddingProvider(
  config: EmbeddingConfig,
): EmbeddingProvider | null {
  const setting = config.embeddingProvider;

  if (setting === "openai" || (setting === "auto" && config.openaiApiKey)) {
    const client = new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    });
    return new OpenAIEmbeddingProvider({
      client,
      model: config.openaiEmbeddingModel,
    });
  }

  if (setting === "pinecone" || (setting === "auto" && config.pineconeApiKey)) {
    return new PineconeEmbeddingProvider({
      embedPassages: createPassageEmbedder(
        createPineconeClient(config.pineconeApiKey),
      ),
      model: config.pineconeEmbeddingModel,
      dimension: config.pineconeDimension,
    });
  }

  if (setting === "hashing") return new HashingEmbeddingProvider();

  if (!warnedKeywordOnly) {
    warnedKeywordOnly = true;
    log.warn(
      { setting },
      "⚠️ No embedding provider available, retrieval falls back to keyword overlap",
    );
  }
  return null;
}
