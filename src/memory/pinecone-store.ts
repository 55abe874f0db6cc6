import { log } from "../logger.js";
import {
  DuplicateIdError,
  StorageUnavailableError,
  toError,
} from "./errors.js";
import type {
  StoredVector,
  VectorIndex,
  VectorMetadata,
  VectorWrite,
} from "./pinecone.js";
import {
  applyUpgrade,
  deserializeRecord,
  serializeRecord,
  type SerializedRecord,
} from "./record.js";
import {
  assertProfile,
  Generations,
  ProfileLocks,
  selectRecent,
  type RecordStore,
} from "./record-store.js";
import type { MemoryRecord, RecordContext, ScanOptions } from "./types.js";

// ── Pinecone Record Store ────────────────────────────────

/** Ids per fetch request */
const FETCH_BATCH_SIZE = 100;

/** Pinecone caps metadata at 40KB per vector */
export const MAX_METADATA_BYTES = 40 * 1024;

type StoredDocument = Omit<SerializedRecord, "embedding">;

export interface PineconeRecordStoreOptions {
  index: VectorIndex;
  /** Index dimension; records without a matching embedding get a placeholder */
  dimension: number;
}

/**
 * Records live as vectors in one shared index under `<profile>:<id>` ids,
 * enumerated by that prefix. A write-through cache gives read-your-writes
 * inside this process.
 */
export class PineconeRecordStore implements RecordStore {
  readonly kind = "pinecone";
  private readonly index: VectorIndex;
  private readonly dimension: number;
  /** Pinecone rejects all-zero dense vectors */
  private readonly placeholder: readonly number[];
  private readonly locks = new ProfileLocks();
  private readonly generations = new Generations();
  private readonly cache = new Map<string, Map<string, MemoryRecord>>();
  private readonly hydrated = new Map<string, Promise<void>>();

  constructor(options: PineconeRecordStoreOptions) {
    this.index = options.index;
    this.dimension = options.dimension;
    const placeholder = new Array<number>(options.dimension).fill(0);
    if (placeholder.length > 0) placeholder[0] = 1;
    this.placeholder = placeholder;
  }

  async put(profile: string, record: MemoryRecord): Promise<string> {
    assertProfile(profile);
    return this.locks.run(profile, async () => {
      if (await this.lookup(profile, record.id)) {
        throw new DuplicateIdError(profile, record.id);
      }
      await this.write(profile, record);
      this.generations.bump(profile);
      return record.id;
    });
  }

  async get(profile: string, id: string): Promise<MemoryRecord | null> {
    assertProfile(profile);
    return this.lookup(profile, id);
  }

  async upgrade(
    profile: string,
    id: string,
    boost: number,
    evolvedContext: RecordContext,
  ): Promise<MemoryRecord | null> {
    assertProfile(profile);
    return this.locks.run(profile, async () => {
      const current = await this.lookup(profile, id);
      if (!current) return null;

      const { record, changed } = applyUpgrade(current, boost, evolvedContext);
      if (!changed) return current;

      await this.write(profile, record);
      this.generations.bump(profile);
      return record;
    });
  }

  async scan(profile: string, options: ScanOptions): Promise<MemoryRecord[]> {
    assertProfile(profile);
    await this.hydrate(profile);
    return selectRecent(this.partition(profile).values(), options);
  }

  /** Process-local: writes from other processes are not counted. */
  generation(profile: string): number {
    return this.generations.get(profile);
  }

  async close(): Promise<void> {
    await this.locks.drain();
    this.cache.clear();
    this.hydrated.clear();
  }

  // ── Internals ──────────────────────────────────────────

  private partition(profile: string): Map<string, MemoryRecord> {
    let records = this.cache.get(profile);
    if (!records) {
      records = new Map();
      this.cache.set(profile, records);
    }
    return records;
  }

  /** Keep whichever copy has the higher version. */
  private remember(profile: string, record: MemoryRecord): void {
    const records = this.partition(profile);
    const existing = records.get(record.id);
    if (!existing || record.version > existing.version) {
      records.set(record.id, record);
    }
  }

  private async lookup(
    profile: string,
    id: string,
  ): Promise<MemoryRecord | null> {
    const cached = this.partition(profile).get(id);
    if (cached) return cached;

    const vectorId = toVectorId(profile, id);
    const found = await this.index.fetch([vectorId]);
    const vector = found.get(vectorId);
    if (!vector || vector.metadata.profile !== profile) return null;

    const record = fromVector(vector);
    this.remember(profile, record);
    return record;
  }

  private async write(profile: string, record: MemoryRecord): Promise<void> {
    try {
      await this.index.upsert([this.toVector(profile, record)]);
    } catch (err) {
      throw new StorageUnavailableError(
        `Failed to upsert record ${record.id} for profile "${profile}"`,
        { cause: toError(err) },
      );
    }
    this.remember(profile, record);
  }

  /** Pull the profile's records into the local cache once per process. */
  private hydrate(profile: string): Promise<void> {
    const cached = this.hydrated.get(profile);
    if (cached) return cached;

    const pending = (async () => {
      const ids = await this.index.listIds(`${profile}:`);

      let loaded = 0;
      for (let start = 0; start < ids.length; start += FETCH_BATCH_SIZE) {
        const found = await this.index.fetch(
          ids.slice(start, start + FETCH_BATCH_SIZE),
        );
        for (const vector of found.values()) {
          if (vector.metadata.profile !== profile) continue;
          try {
            this.remember(profile, fromVector(vector));
            loaded++;
          } catch (err) {
            log.warn({ profile, id: vector.id, err }, "⚠️ Skipping unreadable vector");
          }
        }
      }
      log.debug({ profile, records: loaded }, "📦 Records loaded from Pinecone");
    })();

    this.hydrated.set(profile, pending);
    void pending.catch(() => {
      if (this.hydrated.get(profile) === pending) this.hydrated.delete(profile);
    });
    return pending;
  }

  private toVector(profile: string, record: MemoryRecord): VectorWrite {
    const { embedding, ...document } = serializeRecord(record);
    const hasEmbedding =
      embedding?.length === this.dimension && embedding.some((v) => v !== 0);

    const { metadata, truncated } = fitMetadata(
      {
        profile,
        record_id: record.id,
        created_at: record.createdAt,
        version: record.version,
        has_embedding: hasEmbedding,
      },
      document,
    );
    if (truncated) {
      log.warn(
        { profile, id: record.id, chars: record.content.length },
        "✂️ Record content truncated to fit Pinecone metadata",
      );
    }

    return {
      id: toVectorId(profile, record.id),
      values: hasEmbedding && embedding ? embedding : [...this.placeholder],
      metadata,
    };
  }
}

/**
 * Attach the record document to the metadata, cutting its content until
 * the whole metadata fits the size limit.
 */
function fitMetadata(
  base: VectorMetadata,
  document: StoredDocument,
): { metadata: VectorMetadata; truncated: boolean } {
  let content = document.content;
  for (;;) {
    const truncated = content.length < document.content.length;
    const metadata: VectorMetadata = {
      ...base,
      ...(truncated ? { content_truncated: true } : {}),
      record: JSON.stringify({ ...document, content }),
    };
    const over = Buffer.byteLength(JSON.stringify(metadata)) - MAX_METADATA_BYTES;
    if (over <= 0) return { metadata, truncated };
    if (content.length === 0) {
      throw new RangeError(
        `Record ${document.id} exceeds the Pinecone metadata limit without its content`,
      );
    }

    content = content.slice(0, Math.max(0, content.length - over));
    // Never end on half a surrogate pair
    const last = content.charCodeAt(content.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) content = content.slice(0, -1);
  }
}

function toVectorId(profile: string, id: string): string {
  return `${profile}:${id}`;
}

function fromVector(vector: StoredVector): MemoryRecord {
  const { record, has_embedding } = vector.metadata;
  if (typeof record !== "string") {
    throw new TypeError(`Vector ${vector.id} carries no record document`);
  }
  const document: unknown = JSON.parse(record);
  return deserializeRecord(
    document,
    has_embedding === true ? vector.values : undefined,
  );
}
