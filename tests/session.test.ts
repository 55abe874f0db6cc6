import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";
import { HashingEmbeddingProvider } from "../src/memory/embedder.js";
import {
  InvalidProfileError,
  ProfileRequiredError,
  StorageUnavailableError,
} from "../src/memory/errors.js";
import { FileRecordStore } from "../src/memory/file-store.js";
import { MemoryManager, createMemoryManager } from "../src/memory/manager.js";
import { SqliteRecordStore } from "../src/memory/sqlite-store.js";
import type { MemoryRecord } from "../src/memory/types.js";
import { SlowEmbedder } from "./fakes.js";

/** Stores fine, but every upgrade fails. */
class UpgradeFailingStore extends SqliteRecordStore {
  async upgrade(): Promise<MemoryRecord | null> {
    throw new StorageUnavailableError("disk full");
  }
}

let dir: string;
let manager: MemoryManager;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "memstrata-session-"));
  manager = new MemoryManager({
    store: new SqliteRecordStore({ filename: ":memory:" }),
    embedder: new HashingEmbeddingProvider(),
  });
});

afterEach(async () => {
  await manager.close();
  await rm(dir, { recursive: true, force: true });
});

// ── Intake & persistence decisions ───────────────────────

describe("MemorySession intake", () => {
  it("makes a new input the focus and the newest working record", async () => {
    const session = manager.openSession("alice");
    await session.remember("hello there");
    const record = await session.remember("I prefer dark mode", {
      context: { topic: "ui" },
      companionResponse: "Noted.",
    });

    expect(session.focus.get()).toBe(record);
    expect(session.working.recent(1)).toEqual([record]);
    expect(record.context).toEqual({ sessionId: session.id, extra: { topic: "ui" } });
    expect(record.companionResponse).toBe("Noted.");
    expect(record.embedding).toBeUndefined();
    expect(await manager.store?.get("alice", record.id)).toBeNull();
  });

  it("updates focus and working memory before the provider answers", async () => {
    const slow = new SlowEmbedder(new HashingEmbeddingProvider(), 50);
    const session = new MemoryManager({ embedder: slow }).openSession();

    const pending = session.remember("prefers dark mode");
    expect(session.focus.get()?.content).toBe("prefers dark mode");
    expect(session.working.size).toBe(1);

    const outcome = await session.retrieve("dark mode");
    expect(outcome.items[0]).toMatchObject({ content: "prefers dark mode", tier: "focus" });

    const record = await pending;
    expect(record.embedding).toBeUndefined();
  });

  it("embeds a persisted record and refreshes the focus with it", async () => {
    const slow = new SlowEmbedder(new HashingEmbeddingProvider(), 50);
    const slowManager = new MemoryManager({
      store: new SqliteRecordStore({ filename: ":memory:" }),
      embedder: slow,
    });
    const session = slowManager.openSession("alice");

    const pending = session.remember("deploys go out on Fridays", { persist: true });
    const early = session.focus.get();
    expect(early?.embedding).toBeUndefined();

    const stored = await pending;
    expect(stored.id).toBe(early?.id);
    expect(stored.embedding).toHaveLength(256);
    expect(session.focus.get()).toBe(stored);
    expect(slow.calls).toBe(1);
    await slowManager.close();
  });

  it("writes through to the store when asked to persist", async () => {
    const session = manager.openSession("alice");
    const record = await session.remember("deploys go out on Fridays", { persist: true });
    expect(record.embedding).toHaveLength(256);
    expect(await manager.store?.get("alice", record.id)).toEqual(record);
  });

  it("stores and upgrades the covered records on a persistence decision", async () => {
    const session = manager.openSession("alice");
    await session.remember("good morning");
    const preference = await session.remember("I prefer dark mode");
    const followUp = await session.remember("and larger fonts");

    const stored = await session.applyDecision({
      persist: true,
      recentCount: 2,
      upgrade: { boost: 1.5, context: { learning_context: "preference" } },
    });

    expect(stored.map((r) => r.id)).toEqual([preference.id, followUp.id]);
    for (const record of stored) {
      expect(record).toMatchObject({
        isEvolved: true,
        reliabilityMultiplier: 1.5,
        version: 2,
        context: { sessionId: session.id, learningContext: "preference" },
      });
    }
    expect(session.focus.get()).toEqual(stored[1]);

    const later = manager.openSession("alice");
    const outcome = await later.retrieve("dark mode");
    expect(outcome.mode).toBe("embedding");
    expect(outcome.items[0]).toMatchObject({ recordId: preference.id, tier: "persistent" });
  });

  it("stores plainly when the decision carries no upgrade", async () => {
    const session = manager.openSession("alice");
    const record = await session.remember("the staging server is eu-west");

    const [stored] = await session.applyDecision({ persist: true });
    expect(stored).toMatchObject({ id: record.id, content: record.content, version: 1 });
    expect(stored.embedding).toHaveLength(256);
  });

  it("ignores a decision not to persist", async () => {
    const session = manager.openSession("alice");
    const record = await session.remember("just chatting");
    expect(await session.applyDecision({ persist: false })).toEqual([]);
    expect(await manager.store?.get("alice", record.id)).toBeNull();
  });

  it("does not store a record twice across decisions", async () => {
    const session = manager.openSession("alice");
    const record = await session.remember("remember this");
    await session.applyDecision({ persist: true });
    const [again] = await session.applyDecision({
      persist: true,
      upgrade: { boost: 1.2, context: {} },
    });
    expect(again).toMatchObject({ id: record.id, version: 2, reliabilityMultiplier: 1.2 });
  });
});

// ── Anonymous sessions ───────────────────────────────────

describe("anonymous MemorySession", () => {
  it("keeps session memory but has no persistent tier", async () => {
    const session = manager.openSession();
    await session.remember("I prefer dark mode", { persist: true });

    expect(session.hasPersistentMemory).toBe(false);
    expect(session.info()).toMatchObject({
      profile: null,
      isAnonymous: true,
      storeKind: null,
      sessionSize: 1,
      cache: null,
    });
  });

  it("refuses operations that need a profile", async () => {
    const session = manager.openSession();
    await session.remember("x");
    await expect(session.applyDecision({ persist: true })).rejects.toBeInstanceOf(
      ProfileRequiredError,
    );
    await expect(session.importKnowledge([{ content: "doc" }])).rejects.toBeInstanceOf(
      ProfileRequiredError,
    );
    await expect(session.importFiles(["README.md"])).rejects.toBeInstanceOf(
      ProfileRequiredError,
    );
  });
});

// ── Project knowledge ────────────────────────────────────

describe("MemorySession knowledge import", () => {
  it("imports sources as evolved knowledge and reports skips", async () => {
    const session = manager.openSession("alice");
    const report = await session.importKnowledge([
      { content: "API uses REST", type: "api" },
      { content: "   " },
      { content: "", type: "runbook", error: "Failed to read runbook.md" },
    ]);

    expect(report).toMatchObject({ importedCount: 1, skippedCount: 2, totalSources: 3 });
    expect(report.results).toHaveLength(2);
    expect(report.results[1]).toEqual({ type: "runbook", error: "Failed to read runbook.md" });

    const imported = report.results[0];
    if (!("recordId" in imported)) throw new Error("expected an imported result");
    expect(imported).toMatchObject({
      type: "api",
      size: 13,
      importance: "medium",
      boost: 1.3,
      upgraded: true,
    });

    const record = await manager.store?.get("alice", imported.recordId);
    expect(record).toMatchObject({
      isEvolved: true,
      reliabilityMultiplier: 1.3,
      version: 2,
      context: {
        sourceType: "project_knowledge",
        documentType: "api",
        importance: "medium",
        knowledgeSummary: "Api documentation",
        learningContext: "project_documentation",
        futureRelevance: "Relevant for api decisions and planning",
      },
    });
    expect(record?.embedding).toHaveLength(256);
  });

  it("reports a stored source as imported when only its upgrade fails", async () => {
    const failing = new MemoryManager({
      store: new UpgradeFailingStore({ filename: ":memory:" }),
    });
    const report = await failing
      .openSession("alice")
      .importKnowledge([{ content: "Use pnpm workspaces", type: "tooling" }]);

    expect(report).toMatchObject({ importedCount: 1, skippedCount: 0, totalSources: 1 });
    const [result] = report.results;
    if (!("recordId" in result)) throw new Error("expected an imported result");
    expect(result.upgraded).toBe(false);

    const record = await failing.store?.get("alice", result.recordId);
    expect(record).toMatchObject({
      content: "Use pnpm workspaces",
      isEvolved: false,
      reliabilityMultiplier: 1,
    });
    await failing.close();
  });

  it("reads files and reports the ones it could not read", async () => {
    const session = manager.openSession("alice");
    const guide = join(dir, "guide.md");
    const missing = join(dir, "missing.md");
    await writeFile(guide, "Use feature flags for risky changes.");

    const report = await session.importFiles([
      { path: guide, importance: "high", boost: 1.4 },
      missing,
    ]);

    expect(report.importedCount).toBe(1);
    expect(report.skippedCount).toBe(1);
    const [ok, failed] = report.results;
    if (!("recordId" in ok) || !("error" in failed)) throw new Error("unexpected results");
    expect(failed.type).toBe("documentation");
    expect(failed.error.startsWith(`Failed to read ${missing}: `)).toBe(true);

    const record = await manager.store?.get("alice", ok.recordId);
    expect(record?.reliabilityMultiplier).toBe(1.4);
    expect(record?.context.importance).toBe("high");
    expect(record?.context.documentType).toBe("documentation");
    expect(record?.context.extra?.source_file).toBe(guide);
  });
});

// ── Retrieval & lifecycle ────────────────────────────────

describe("MemorySession retrieval and lifecycle", () => {
  it("renders the current focus into prompt context", async () => {
    const session = manager.openSession();
    await session.remember("I prefer dark mode");
    const text = await session.buildContext("dark mode", { now: Date.now() });
    expect(text).toBe('🎯 CURRENT FOCUS:\n• [just now] "I prefer dark mode"');
  });

  it("keeps profiles apart", async () => {
    const alice = manager.openSession("alice");
    await alice.remember("alice likes tea", { persist: true });
    alice.end();

    const outcome = await manager.openSession("bob").retrieve("tea");
    expect(outcome.items).toEqual([]);
  });

  it("ends by dropping session memory only", async () => {
    const session = manager.openSession("alice");
    const record = await session.remember("keep me", { persist: true });
    session.end();

    expect(session.info()).toMatchObject({ currentFocus: false, sessionSize: 0 });
    expect(await manager.store?.get("alice", record.id)).toEqual(record);
  });

  it("describes itself", async () => {
    const session = manager.openSession("alice");
    await session.remember("x");
    expect(session.info()).toMatchObject({
      sessionId: session.id,
      profile: "alice",
      isAnonymous: false,
      hasPersistentMemory: true,
      storeKind: "sqlite",
      currentFocus: true,
      sessionSize: 1,
      workingCapacity: 100,
      embeddingProvider: "hashing",
    });
  });

  it("clears the focus on request", async () => {
    const session = manager.openSession();
    await session.remember("x");
    session.clearFocus();
    expect(session.focus.hasFocus()).toBe(false);
    expect(session.working.size).toBe(1);
  });
});

// ── MemoryManager ────────────────────────────────────────

describe("MemoryManager", () => {
  it("rejects invalid profile names", () => {
    expect(() => manager.openSession("../etc")).toThrow(InvalidProfileError);
  });

  it("cannot open a named session without a store", () => {
    const storeless = new MemoryManager();
    expect(() => storeless.openSession("alice")).toThrow(StorageUnavailableError);
    expect(storeless.openSession().hasPersistentMemory).toBe(false);
  });

  it("shares one vector cache per profile", () => {
    expect(manager.cacheFor("alice")).toBe(manager.cacheFor("alice"));
    expect(manager.cacheFor("alice")).not.toBe(manager.cacheFor("bob"));
  });

  it("survives a restart with the file store", async () => {
    const first = new MemoryManager({ store: new FileRecordStore({ directory: dir }) });
    const record = await first.openSession("alice").remember("the build uses pnpm workspaces", {
      persist: true,
    });
    await first.close();

    const second = new MemoryManager({ store: new FileRecordStore({ directory: dir }) });
    const outcome = await second.openSession("alice").retrieve("build workspaces");
    await second.close();

    expect(outcome.items.map((i) => i.recordId)).toEqual([record.id]);
    expect(outcome.items[0].record).toEqual(record);
  });

  it("builds itself from configuration", async () => {
    const configured = createMemoryManager(
      loadConfig({ MEMORY_DIR: dir, EMBEDDING_PROVIDER: "hashing", WORKING_MEMORY_CAPACITY: "2" }),
    );
    const session = configured.openSession("alice");
    await session.remember("first", { persist: true });
    await configured.close();

    expect(configured.store?.kind).toBe("file");
    expect(configured.embedder?.name).toBe("hashing");
    expect(session.info().workingCapacity).toBe(2);
    const log = await readFile(join(dir, "alice", "records.jsonl"), "utf-8");
    expect(log.trim().split("\n")).toHaveLength(1);
  });
});
