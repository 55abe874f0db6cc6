import { join } from "path";
import type { AppConfig } from "../config.js";
import { log } from "../logger.js";
import { ConfigError } from "./errors.js";
import { FileRecordStore } from "./file-store.js";
import { createPineconeClient, createVectorIndex } from "./pinecone.js";
import { PineconeRecordStore } from "./pinecone-store.js";
import type { RecordStore } from "./record-store.js";
import { SqliteRecordStore } from "./sqlite-store.js";

// ── Record Store Factory ─────────────────────────────────

export type StoreConfig = Pick<
  AppConfig,
  "memoryStore" | "memoryDir" | "pineconeApiKey" | "pineconeIndex" | "pineconeDimension"
>;

/** Build the configured durable backend. */
export function createRecordStore(config: StoreConfig): RecordStore {
  switch (config.memoryStore) {
    case "file":
      log.info({ directory: config.memoryDir }, "📁 File memory store ready");
      return new FileRecordStore({ directory: config.memoryDir });

    case "sqlite":
      return new SqliteRecordStore({
        filename: join(config.memoryDir, "memory.db"),
      });

    case "pinecone": {
      if (!config.pineconeApiKey || !config.pineconeIndex) {
        throw new ConfigError(
          "Pinecone store requires PINECONE_API_KEY and PINECONE_INDEX",
        );
      }
      const client = createPineconeClient(config.pineconeApiKey);
      log.info({ index: config.pineconeIndex }, "🌲 Pinecone memory store ready");
      return new PineconeRecordStore({
        index: createVectorIndex(client, config.pineconeIndex),
        dimension: config.pineconeDimension,
      });
    }
  }
}
