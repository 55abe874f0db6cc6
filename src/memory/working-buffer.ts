import type { MemoryRecord } from "./types.js";

// ── Working Buffer — bounded session history ─────────────

/** Default capacity when none is configured */
export const DEFAULT_WORKING_CAPACITY = 100;

/**
 * Session-scoped sequence of recent records.
 * Eviction is FIFO by insertion: reads never move a record, so the
 * earliest-inserted entry is always the next one to go.
 */
export class WorkingBuffer {
  readonly capacity: number;
  private records: MemoryRecord[] = [];

  constructor(capacity: number = DEFAULT_WORKING_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Working buffer capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.records.length;
  }

  /** Append to the tail, evicting from the head past capacity. */
  push(record: MemoryRecord): void {
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
  }

  /** Last `n` records, oldest first. */
  recent(n: number): MemoryRecord[] {
    if (Number.isNaN(n)) return [];
    const count = Math.max(0, Math.min(Math.floor(n), this.records.length));
    return count === 0 ? [] : this.records.slice(-count);
  }

  search(predicate: (record: MemoryRecord) => boolean): MemoryRecord[] {
    return this.records.filter(predicate);
  }

  /** Most recent buffered copy with this id. */
  get(id: string): MemoryRecord | null {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.records[i].id === id) return this.records[i];
    }
    return null;
  }

  all(): MemoryRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records = [];
  }
}
