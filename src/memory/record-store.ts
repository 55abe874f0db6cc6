import { InvalidProfileError } from "./errors.js";
import type { MemoryRecord, RecordContext, ScanOptions } from "./types.js";

// ── Record Store — durable, profile-partitioned ──────────

/**
 * Durable tier. Every operation is scoped to one profile; profiles never
 * see each other's records. `put` and `upgrade` resolve only once the change
 * is durable, and the profile's generation is bumped after it is visible.
 */
export interface RecordStore {
  readonly kind: string;
  /** Insert a new record. Rejects with DuplicateIdError if the id exists. */
  put(profile: string, record: MemoryRecord): Promise<string>;
  get(profile: string, id: string): Promise<MemoryRecord | null>;
  /**
   * Mark a record as evolved knowledge. Returns the resulting version, or
   * null when the id is unknown. Repeating an identical upgrade is a no-op.
   */
  upgrade(
    profile: string,
    id: string,
    boost: number,
    evolvedContext: RecordContext,
  ): Promise<MemoryRecord | null>;
  /** Most recent records first (createdAt, then insertion order). */
  scan(profile: string, options: ScanOptions): Promise<MemoryRecord[]>;
  generation(profile: string): number;
  close(): Promise<void>;
}

// ── Profile names ────────────────────────────────────────

const PROFILE_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]{0,63}$/;

export function isValidProfile(profile: string): boolean {
  return PROFILE_PATTERN.test(profile) && profile !== "." && profile !== "..";
}

export function assertProfile(profile: string): void {
  if (!isValidProfile(profile)) throw new InvalidProfileError(profile);
}

// ── Per-profile write serialization ──────────────────────

/**
 * Promise-chain lock keyed by profile. Writers on the same profile run one
 * after another; different profiles never wait on each other.
 */
export class ProfileLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(profile: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(profile) ?? Promise.resolve();
    const result = prev.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(profile, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(profile) === tail) this.tails.delete(profile);
    }
  }

  /** Wait for every queued writer to settle. */
  async drain(): Promise<void> {
    await Promise.all(this.tails.values());
  }
}

/** Write generations per profile. Starts at 0. */
export class Generations {
  private readonly counters = new Map<string, number>();

  get(profile: string): number {
    return this.counters.get(profile) ?? 0;
  }

  bump(profile: string): number {
    const next = this.get(profile) + 1;
    this.counters.set(profile, next);
    return next;
  }
}

// ── Scan ordering ────────────────────────────────────────

function timeOf(record: MemoryRecord): number {
  const t = Date.parse(record.createdAt);
  return Number.isNaN(t) ? 0 : t;
}

/**
 * Order records newest first. Input is in insertion order; equal
 * timestamps keep the later-inserted record ahead.
 */
export function newestFirst(records: Iterable<MemoryRecord>): MemoryRecord[] {
  return [...records].reverse().sort((a, b) => timeOf(b) - timeOf(a));
}

/** Apply `filter` and `limit` to an insertion-ordered record sequence. */
export function selectRecent(
  records: Iterable<MemoryRecord>,
  { limit, filter }: ScanOptions,
): MemoryRecord[] {
  if (limit <= 0) return [];
  const ordered = newestFirst(records);
  const matching = filter ? ordered.filter((r) => filter(r.context)) : ordered;
  return matching.slice(0, limit);
}
