import { Pinecone } from "@pinecone-database/pinecone";

// ── Pinecone Client ───────────────────────────────────────

export interface PineconeSettings {
  apiKey: string;
  indexName: string;
}

/** Metadata written alongside each vector */
export type VectorMetadata = Record<string, string | number | boolean>;

export interface VectorWrite {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

export interface StoredVector {
  id: string;
  values: readonly number[];
  metadata: Readonly<Record<string, unknown>>;
}

/** The slice of a Pinecone index the record store talks to. */
export interface VectorIndex {
  upsert(vectors: VectorWrite[]): Promise<void>;
  fetch(ids: string[]): Promise<Map<string, StoredVector>>;
  /** Every vector id starting with `prefix`, across all pages */
  listIds(prefix: string): Promise<string[]>;
}

/** Pinecone inference call: one passage embedding per input, same order. */
export type PassageEmbedder = (
  model: string,
  inputs: string[],
) => Promise<number[][]>;

export function createPineconeClient(apiKey: string): Pinecone {
  return new Pinecone({ apiKey });
}

/** Wrap a Pinecone index behind the VectorIndex interface. */
export function createVectorIndex(
  client: Pinecone,
  indexName: string,
): VectorIndex {
  const index = client.index(indexName);

  return {
    async upsert(vectors) {
      await index.upsert({ records: vectors });
    },

    async fetch(ids) {
      const result = await index.fetch({ ids });
      const found = new Map<string, StoredVector>();
      for (const [id, record] of Object.entries(result.records ?? {})) {
        found.set(id, {
          id,
          values: record.values ?? [],
          metadata: record.metadata ?? {},
        });
      }
      return found;
    },

    // Serverless indexes only
    async listIds(prefix) {
      const ids: string[] = [];
      let paginationToken: string | undefined;
      do {
        const page = await index.listPaginated({
          prefix,
          ...(paginationToken ? { paginationToken } : {}),
        });
        for (const vector of page.vectors ?? []) {
          if (vector.id) ids.push(vector.id);
        }
        paginationToken = page.pagination?.next;
      } while (paginationToken);
      return ids;
    },
  };
}

/** Pinecone's hosted inference (e.g. multilingual-e5-large). */
export function createPassageEmbedder(client: Pinecone): PassageEmbedder {
  return async (model, inputs) => {
    const result = await client.inference.embed({
      model,
      inputs,
      parameters: {
        inputType: "passage",
        truncate: "END",
      },
    });

    const data = result.data ?? [];
    return inputs.map((_, i) => {
      const embedding = data[i];
      if (!embedding || !("values" in embedding) || !embedding.values) {
        throw new Error("Pinecone inference returned no embedding");
      }
      return [...embedding.values];
    });
  };
}
