import { describe, it, expect } from "vitest";
import type { EmbeddingProvider } from "../src/memory/embedder.js";
import { RetrievalUnavailableError } from "../src/memory/errors.js";
import { FocusSlot } from "../src/memory/focus-slot.js";
import { applyUpgrade, createRecord } from "../src/memory/record.js";
import type { RecordStore } from "../src/memory/record-store.js";
import { RetrievalEngine, type RetrievalSettings } from "../src/memory/retrieval.js";
import type { MemoryRecord } from "../src/memory/types.js";
import { WorkingBuffer } from "../src/memory/working-buffer.js";
import { FailingEmbedder, FixedEmbedder, ScanStubStore } from "./fakes.js";

interface Setup {
  focus?: MemoryRecord;
  working?: MemoryRecord[] | null;
  store?: RecordStore | null;
  provider?: EmbeddingProvider | null;
  settings?: Partial<RetrievalSettings>;
}

function engine(setup: Setup = {}): RetrievalEngine {
  const focus = new FocusSlot();
  if (setup.focus) focus.set(setup.focus);

  let working: WorkingBuffer | null = null;
  if (setup.working !== null) {
    working = new WorkingBuffer(10);
    for (const record of setup.working ?? []) working.push(record);
  }

  return new RetrievalEngine({
    profile: "alice",
    focus,
    working,
    store: setup.store ?? null,
    provider: setup.provider ?? null,
    settings: setup.settings,
  });
}

const storeOf = (...records: MemoryRecord[]) => new ScanStubStore(async () => records);
const neverScans = () => new ScanStubStore(() => new Promise<MemoryRecord[]>(() => {}));
const failingScan = () =>
  new ScanStubStore(() => Promise.reject(new Error("disk unavailable")));

// ── Ranking ──────────────────────────────────────────────

describe("RetrievalEngine ranking", () => {
  const slow = createRecord({ content: "the app is slow", embedding: [0.8, 0.6] });
  const learned = applyUpgrade(
    createRecord({ content: "cache the dashboard queries", embedding: [20, 21] }),
    1.5,
    { learningContext: "performance" },
  ).record;

  it("lets a boosted long-term record outrank a recent one", async () => {
    const outcome = await engine({
      working: [slow],
      store: storeOf(learned),
      provider: new FixedEmbedder({ "why is it slow": [1, 0] }),
    }).retrieve("why is it slow");

    expect(outcome.mode).toBe("embedding");
    expect(outcome.degraded).toEqual([]);
    expect(outcome.items.map((i) => [i.recordId, i.tier])).toEqual([
      [learned.id, "persistent"],
      [slow.id, "working"],
    ]);
    expect(outcome.items[0].score).toBeCloseTo(1.0345, 3);
    expect(outcome.items[1].score).toBeCloseTo(0.96);
  });

  it("drops candidates below the similarity threshold in keyword mode", async () => {
    const outcome = await engine({
      working: [slow],
      store: storeOf(learned),
    }).retrieve("performance regression");

    expect(outcome).toEqual({
      query: "performance regression",
      items: [],
      mode: "keyword",
      timedOut: false,
      degraded: ["no-embedding-provider"],
    });
  });

  it("always puts the focus first and counts it against k", async () => {
    const focus = createRecord({ content: "unrelated thought" });
    const notes = [1, 2, 3].map((n) => createRecord({ content: `dark mode note ${n}` }));

    const outcome = await engine({ focus, working: [...notes, focus] }).retrieve(
      "dark mode",
      { k: 3 },
    );

    expect(outcome.items).toHaveLength(3);
    expect(outcome.items[0]).toMatchObject({ recordId: focus.id, tier: "focus", similarity: 0 });
    expect(outcome.items.slice(1).every((i) => i.tier === "working")).toBe(true);
  });

  it("returns nothing for k <= 0", async () => {
    const focus = createRecord({ content: "dark mode" });
    const outcome = await engine({ focus, working: [focus] }).retrieve("dark mode", { k: 0 });
    expect(outcome.items).toEqual([]);
  });

  it("keeps one item per record, at its best score", async () => {
    const record = createRecord({ content: "prefers dark mode" });
    const outcome = await engine({
      working: [record],
      store: storeOf(record),
    }).retrieve("dark mode");

    expect(outcome.items).toHaveLength(1);
    expect(outcome.items[0].tier).toBe("working");
    expect(outcome.items[0].score).toBeCloseTo(1.2);
  });
});

// ── Tie-breaking ─────────────────────────────────────────

describe("RetrievalEngine tie-breaking", () => {
  const recent = createRecord({
    content: "alpha beta",
    createdAt: "2025-06-01T00:00:00.000Z",
  });
  const stored = applyUpgrade(
    createRecord({ content: "alpha beta", createdAt: "2025-01-01T00:00:00.000Z" }),
    1.2,
    {},
  ).record;

  const order = async (tieBreak: RetrievalSettings["tieBreak"]) => {
    const outcome = await engine({
      working: [recent],
      store: storeOf(stored),
      settings: { tieBreak },
    }).retrieve("alpha beta");
    return outcome.items.map((i) => i.recordId);
  };

  it("prefers the newer record by default", async () => {
    expect(await order("recency")).toEqual([recent.id, stored.id]);
  });

  it("can prefer a tier", async () => {
    expect(await order("working")).toEqual([recent.id, stored.id]);
    expect(await order("persistent")).toEqual([stored.id, recent.id]);
  });
});

// ── Degraded modes ───────────────────────────────────────

describe("RetrievalEngine degraded modes", () => {
  const focus = createRecord({ content: "what theme do I like" });
  const earlier = createRecord({ content: "unrelated chatter" });

  it("answers from session memory when the deadline expires", async () => {
    const outcome = await engine({
      focus,
      working: [earlier, focus],
      store: neverScans(),
    }).retrieve("theme", { timeoutMs: 20 });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.mode).toBe("keyword");
    expect(outcome.items.map((i) => [i.recordId, i.tier])).toEqual([
      [focus.id, "focus"],
      [earlier.id, "working"],
    ]);
  });

  it("falls back at once when the deadline has already passed", async () => {
    const outcome = await engine({ focus, working: [focus], store: neverScans() }).retrieve(
      "theme",
      { deadline: Date.now() - 1 },
    );
    expect(outcome.timedOut).toBe(true);
    expect(outcome.items.map((i) => i.recordId)).toEqual([focus.id]);
  });

  it("keeps going on a failed scan when working memory exists", async () => {
    const note = createRecord({ content: "prefers dark mode" });
    const outcome = await engine({ working: [note], store: failingScan() }).retrieve(
      "dark mode",
    );

    expect(outcome.degraded).toEqual(["no-embedding-provider", "partial-scan"]);
    expect(outcome.items.map((i) => i.recordId)).toEqual([note.id]);
  });

  it("fails when the scan fails and there is no working memory", async () => {
    await expect(
      engine({ working: null, store: failingScan() }).retrieve("dark mode"),
    ).rejects.toBeInstanceOf(RetrievalUnavailableError);
  });

  it("switches to keyword scoring when the provider fails", async () => {
    const note = createRecord({ content: "prefers dark mode", embedding: [1, 0] });
    const outcome = await engine({
      working: [note],
      provider: new FailingEmbedder(),
    }).retrieve("dark mode");

    expect(outcome.mode).toBe("keyword");
    expect(outcome.degraded).toEqual(["embedding-unavailable"]);
    expect(outcome.items.map((i) => i.recordId)).toEqual([note.id]);
  });
});
