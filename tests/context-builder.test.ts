import { describe, it, expect } from "vitest";
import { buildMemoryContext, formatAgo } from "../src/memory/context-builder.js";
import { applyUpgrade, createRecord } from "../src/memory/record.js";
import type { RetrievedItem } from "../src/memory/retrieval.js";
import type { MemoryRecord, Tier } from "../src/memory/types.js";

const NOW = Date.parse("2025-06-01T12:00:00.000Z");

function at(msAgo: number): string {
  return new Date(NOW - msAgo).toISOString();
}

function item(record: MemoryRecord, tier: Tier, score = 0.5): RetrievedItem {
  return {
    recordId: record.id,
    content: record.content,
    score,
    similarity: score,
    tier,
    record,
  };
}

describe("buildMemoryContext", () => {
  // ── Empty context ──────────────────────────────────────

  it("returns empty string when nothing was retrieved", () => {
    expect(buildMemoryContext({ items: [] }, { now: NOW })).toBe("");
  });

  // ── Sections ───────────────────────────────────────────

  it("renders the focus section", () => {
    const focus = createRecord({ content: "dark mode please", createdAt: at(5_000) });
    expect(buildMemoryContext({ items: [item(focus, "focus")] }, { now: NOW })).toBe(
      '🎯 CURRENT FOCUS:\n• [just now] "dark mode please"',
    );
  });

  it("renders focus, session and long-term sections in order", () => {
    const focus = createRecord({ content: "now", createdAt: at(1_000) });
    const working = createRecord({ content: "earlier", createdAt: at(300_000) });
    const stored = createRecord({ content: "long ago", createdAt: at(259_200_000) });

    const result = buildMemoryContext(
      {
        items: [
          item(focus, "focus"),
          item(stored, "persistent"),
          item(working, "working"),
        ],
      },
      { now: NOW },
    );

    expect(result).toBe(
      [
        '🎯 CURRENT FOCUS:\n• [just now] "now"',
        '🕐 RECENT SESSION CONTEXT:\n• [5m ago] "earlier"',
        '🧠 LONG-TERM KNOWLEDGE:\n• [3d ago] "long ago"',
      ].join("\n\n"),
    );
  });

  it("tags evolved records as learned", () => {
    const base = createRecord({ content: "prefers dark mode", createdAt: at(7_200_000) });
    const { record } = applyUpgrade(base, 1.5, { learningContext: "preference" });

    expect(buildMemoryContext({ items: [item(record, "persistent")] }, { now: NOW })).toBe(
      '🧠 LONG-TERM KNOWLEDGE:\n• [2h ago] (learned) "prefers dark mode"',
    );
  });

  // ── Ordering & limits ──────────────────────────────────

  it("lists lines oldest → newest", () => {
    const newer = createRecord({ content: "Second message", createdAt: at(1_000) });
    const older = createRecord({ content: "First message", createdAt: at(120_000) });

    const result = buildMemoryContext(
      { items: [item(newer, "working", 0.9), item(older, "working", 0.4)] },
      { now: NOW },
    );
    expect(result).toBe(
      '🕐 RECENT SESSION CONTEXT:\n• [2m ago] "First message"\n• [just now] "Second message"',
    );
  });

  it("keeps only the best-ranked lines per tier", () => {
    const records = [1, 2, 3].map((n) =>
      createRecord({ content: `note ${n}`, createdAt: at(n * 60_000) }),
    );
    const result = buildMemoryContext(
      { items: records.map((r) => item(r, "persistent")) },
      { now: NOW, maxPersistent: 2 },
    );
    expect(result).toBe(
      '🧠 LONG-TERM KNOWLEDGE:\n• [2m ago] "note 2"\n• [1m ago] "note 1"',
    );
  });

  it("truncates long content to 200 chars", () => {
    const record = createRecord({ content: "x".repeat(500), createdAt: at(1_000) });
    expect(buildMemoryContext({ items: [item(record, "working")] }, { now: NOW })).toBe(
      `🕐 RECENT SESSION CONTEXT:\n• [just now] "${"x".repeat(200)}"`,
    );
  });
});

describe("formatAgo", () => {
  it.each([
    [5_000, "just now"],
    [300_000, "5m ago"],
    [7_200_000, "2h ago"],
    [259_200_000, "3d ago"],
    [90 * 86_400_000, "3mo ago"],
  ])("formats %i ms as %s", (ms, expected) => {
    expect(formatAgo(NOW - ms, NOW)).toBe(expected);
  });

  it("treats an unparseable timestamp as just now", () => {
    expect(formatAgo(Number.NaN, NOW)).toBe("just now");
  });
});
