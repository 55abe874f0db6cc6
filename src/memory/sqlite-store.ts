import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { log } from "../logger.js";
import {
  DuplicateIdError,
  StorageUnavailableError,
  toError,
} from "./errors.js";
import { applyUpgrade, deserializeRecord, serializeRecord } from "./record.js";
import {
  assertProfile,
  Generations,
  ProfileLocks,
  type RecordStore,
} from "./record-store.js";
import type { MemoryRecord, RecordContext, ScanOptions } from "./types.js";

// ── SQLite Record Store — better-sqlite3 ─────────────────

const SCHEMA = `
CREATE TABLE IF NOT EXISTS memory_records (
  profile     TEXT    NOT NULL,
  id          TEXT    NOT NULL,
  created_at  TEXT    NOT NULL,
  version     INTEGER NOT NULL,
  data        TEXT    NOT NULL,
  PRIMARY KEY (profile, id)
);
CREATE INDEX IF NOT EXISTS idx_memory_records_recent
  ON memory_records (profile, created_at DESC);
`;

const BUSY_TIMEOUT_MS = 5000;

interface DataRow {
  data: string;
}

export interface SqliteRecordStoreOptions {
  /** Database file, or ":memory:" */
  filename: string;
}

export class SqliteRecordStore implements RecordStore {
  readonly kind = "sqlite";
  private readonly db: Database.Database;
  private readonly locks = new ProfileLocks();
  private readonly generations = new Generations();

  private readonly selectOne: Database.Statement<[string, string], DataRow>;
  private readonly selectRecent: Database.Statement<[string], DataRow>;
  private readonly insert: Database.Statement<
    [string, string, string, number, string]
  >;
  private readonly update: Database.Statement<[number, string, string, string]>;

  constructor(options: SqliteRecordStoreOptions) {
    const { filename } = options;
    if (filename !== ":memory:") {
      mkdirSync(dirname(filename), { recursive: true });
    }

    try {
      this.db = new Database(filename);
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("synchronous = FULL");
      this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      this.db.exec(SCHEMA);
    } catch (err) {
      throw new StorageUnavailableError(
        `Failed to open memory database at ${filename}`,
        { cause: toError(err) },
      );
    }

    this.selectOne = this.db.prepare<[string, string], DataRow>(
      "SELECT data FROM memory_records WHERE profile = ? AND id = ?",
    );
    // rowid breaks createdAt ties by insertion order
    this.selectRecent = this.db.prepare<[string], DataRow>(
      `SELECT data FROM memory_records WHERE profile = ?
       ORDER BY created_at DESC, rowid DESC`,
    );
    this.insert = this.db.prepare<[string, string, string, number, string]>(
      `INSERT INTO memory_records (profile, id, created_at, version, data)
       VALUES (?, ?, ?, ?, ?)`,
    );
    this.update = this.db.prepare<[number, string, string, string]>(
      "UPDATE memory_records SET version = ?, data = ? WHERE profile = ? AND id = ?",
    );

    log.info({ filename }, "🗄️ SQLite memory store ready");
  }

  async put(profile: string, record: MemoryRecord): Promise<string> {
    assertProfile(profile);
    return this.locks.run(profile, async () => {
      if (this.selectOne.get(profile, record.id)) {
        throw new DuplicateIdError(profile, record.id);
      }

      this.write(profile, () =>
        this.insert.run(
          profile,
          record.id,
          record.createdAt,
          record.version,
          JSON.stringify(serializeRecord(record)),
        ),
      );
      this.generations.bump(profile);
      return record.id;
    });
  }

  async get(profile: string, id: string): Promise<MemoryRecord | null> {
    assertProfile(profile);
    const row = this.selectOne.get(profile, id);
    return row ? deserializeRecord(JSON.parse(row.data)) : null;
  }

  async upgrade(
    profile: string,
    id: string,
    boost: number,
    evolvedContext: RecordContext,
  ): Promise<MemoryRecord | null> {
    assertProfile(profile);
    return this.locks.run(profile, async () => {
      const upgradeTx = this.db.transaction(() => {
        const row = this.selectOne.get(profile, id);
        if (!row) return null;

        const current = deserializeRecord(JSON.parse(row.data));
        const result = applyUpgrade(current, boost, evolvedContext);
        if (result.changed) {
          this.update.run(
            result.record.version,
            JSON.stringify(serializeRecord(result.record)),
            profile,
            id,
          );
        }
        return result;
      });

      const result = this.write(profile, () => upgradeTx.immediate());
      if (!result) return null;
      if (result.changed) this.generations.bump(profile);
      return result.record;
    });
  }

  async scan(profile: string, options: ScanOptions): Promise<MemoryRecord[]> {
    assertProfile(profile);
    const { limit, filter } = options;
    if (limit <= 0) return [];

    const results: MemoryRecord[] = [];
    for (const row of this.selectRecent.iterate(profile)) {
      const record = deserializeRecord(JSON.parse(row.data));
      if (filter && !filter(record.context)) continue;
      results.push(record);
      if (results.length >= limit) break;
    }
    return results;
  }

  generation(profile: string): number {
    return this.generations.get(profile);
  }

  async close(): Promise<void> {
    await this.locks.drain();
    if (this.db.open) this.db.close();
  }

  /** Run a write, mapping driver failures to StorageUnavailableError. */
  private write<T>(profile: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof RangeError || err instanceof DuplicateIdError) {
        throw err;
      }
      throw new StorageUnavailableError(
        `Failed to write memory record for profile "${profile}"`,
        { cause: toError(err) },
      );
    }
  }
}
