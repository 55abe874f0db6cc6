import { mkdir, open, readFile, rename } from "fs/promises";
import { join } from "path";
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
  selectRecent,
  type RecordStore,
} from "./record-store.js";
import type { MemoryRecord, RecordContext, ScanOptions } from "./types.js";

// ── File Record Store — append-only JSONL per profile ────

const LOG_FILE = "records.jsonl";

export interface FileRecordStoreOptions {
  /** Root directory; each profile gets `<directory>/<profile>/records.jsonl` */
  directory: string;
}

interface ProfileLog {
  /** Latest version per id, in first-insertion order */
  records: Map<string, MemoryRecord>;
  /** The file ends mid-line (torn write); the next append starts a new line */
  needsNewline: boolean;
}

export class FileRecordStore implements RecordStore {
  readonly kind = "file";
  private readonly directory: string;
  private readonly locks = new ProfileLocks();
  private readonly generations = new Generations();
  private readonly logs = new Map<string, Promise<ProfileLog>>();

  constructor(options: FileRecordStoreOptions) {
    this.directory = options.directory;
  }

  /** Path of a profile's log file. */
  logPath(profile: string): string {
    assertProfile(profile);
    return join(this.directory, profile, LOG_FILE);
  }

  async put(profile: string, record: MemoryRecord): Promise<string> {
    const path = this.logPath(profile);
    return this.locks.run(profile, async () => {
      const state = await this.load(profile);
      if (state.records.has(record.id)) {
        throw new DuplicateIdError(profile, record.id);
      }

      await this.append(profile, path, state, record);
      state.records.set(record.id, record);
      this.generations.bump(profile);
      return record.id;
    });
  }

  async get(profile: string, id: string): Promise<MemoryRecord | null> {
    assertProfile(profile);
    const state = await this.load(profile);
    return state.records.get(id) ?? null;
  }

  async upgrade(
    profile: string,
    id: string,
    boost: number,
    evolvedContext: RecordContext,
  ): Promise<MemoryRecord | null> {
    const path = this.logPath(profile);
    return this.locks.run(profile, async () => {
      const state = await this.load(profile);
      const current = state.records.get(id);
      if (!current) return null;

      const { record, changed } = applyUpgrade(current, boost, evolvedContext);
      if (!changed) return current;

      await this.append(profile, path, state, record);
      state.records.set(id, record);
      this.generations.bump(profile);
      return record;
    });
  }

  async scan(profile: string, options: ScanOptions): Promise<MemoryRecord[]> {
    assertProfile(profile);
    const state = await this.load(profile);
    return selectRecent(state.records.values(), options);
  }

  generation(profile: string): number {
    return this.generations.get(profile);
  }

  /**
   * Rewrite a profile's log with only the latest version of each record.
   * The new file is synced before it replaces the old one.
   */
  async compact(profile: string): Promise<number> {
    const path = this.logPath(profile);
    return this.locks.run(profile, async () => {
      const state = await this.load(profile);
      const tmpPath = `${path}.tmp`;
      const body = [...state.records.values()]
        .map((r) => JSON.stringify(serializeRecord(r)) + "\n")
        .join("");

      try {
        await mkdir(join(this.directory, profile), { recursive: true });
        const handle = await open(tmpPath, "w");
        try {
          await handle.writeFile(body, "utf-8");
          await handle.sync();
        } finally {
          await handle.close();
        }
        await rename(tmpPath, path);
      } catch (err) {
        throw new StorageUnavailableError(
          `Failed to compact log for profile "${profile}"`,
          { cause: toError(err) },
        );
      }

      state.needsNewline = false;
      log.info(
        { profile, records: state.records.size },
        "🗜️ Memory log compacted",
      );
      return state.records.size;
    });
  }

  async close(): Promise<void> {
    await this.locks.drain();
    this.logs.clear();
  }

  // ── Log I/O ────────────────────────────────────────────

  private load(profile: string): Promise<ProfileLog> {
    const cached = this.logs.get(profile);
    if (cached) return cached;

    const pending = this.readLog(profile);
    this.logs.set(profile, pending);
    // A failed read is retried on the next call
    void pending.catch(() => {
      if (this.logs.get(profile) === pending) this.logs.delete(profile);
    });
    return pending;
  }

  private async readLog(profile: string): Promise<ProfileLog> {
    const path = this.logPath(profile);
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return { records: new Map(), needsNewline: false };
      throw new StorageUnavailableError(
        `Failed to read memory log for profile "${profile}"`,
        { cause: toError(err) },
      );
    }

    const records = new Map<string, MemoryRecord>();
    const lines = text.split("\n");
    const lastIndex = lines.length - 1;

    lines.forEach((line, i) => {
      if (line.trim() === "") return;
      let record: MemoryRecord;
      try {
        record = deserializeRecord(JSON.parse(line));
      } catch (err) {
        // Only the final line can be torn by a crash mid-append
        log.warn(
          { profile, line: i + 1, torn: i === lastIndex, err },
          "⚠️ Skipping unreadable memory log line",
        );
        return;
      }
      const existing = records.get(record.id);
      if (!existing || record.version > existing.version) {
        records.set(record.id, record);
      }
    });

    log.debug({ profile, records: records.size }, "📂 Memory log loaded");
    return { records, needsNewline: text.length > 0 && !text.endsWith("\n") };
  }

  private async append(
    profile: string,
    path: string,
    state: ProfileLog,
    record: MemoryRecord,
  ): Promise<void> {
    const line =
      (state.needsNewline ? "\n" : "") +
      JSON.stringify(serializeRecord(record)) +
      "\n";

    try {
      await mkdir(join(this.directory, profile), { recursive: true });
      const handle = await open(path, "a");
      try {
        await handle.appendFile(line, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw new StorageUnavailableError(
        `Failed to write memory log for profile "${profile}"`,
        { cause: toError(err) },
      );
    }
    state.needsNewline = false;
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
