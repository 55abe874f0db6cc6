import type { MemoryRecord } from "./types.js";

// ── Focus Slot — what is being processed right now ───────

export class FocusSlot {
  private current: MemoryRecord | null = null;

  /** Replace the current focus unconditionally. */
  set(record: MemoryRecord): void {
    this.current = record;
  }

  get(): MemoryRecord | null {
    return this.current;
  }

  clear(): void {
    this.current = null;
  }

  hasFocus(): boolean {
    return this.current !== null;
  }
}
