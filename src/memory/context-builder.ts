import type { RetrievalOutcome, RetrievedItem } from "./retrieval.js";

// ── Context Builder — render retrieved memory for a prompt ─

export interface MemoryContextOptions {
  /** Max recent-session lines (default 4) */
  maxWorking?: number;
  /** Max long-term lines (default 4) */
  maxPersistent?: number;
  /** Reference time for relative ages, epoch ms */
  now?: number;
}

const MAX_CONTENT_CHARS = 200;

/**
 * Render a retrieval outcome as prompt text: current focus, recent session
 * context, then long-term knowledge. Returns "" when nothing was retrieved.
 */
export function buildMemoryContext(
  outcome: Pick<RetrievalOutcome, "items">,
  options: MemoryContextOptions = {},
): string {
  const { maxWorking = 4, maxPersistent = 4, now = Date.now() } = options;
  const parts: string[] = [];

  const focus = outcome.items.find((item) => item.tier === "focus");
  if (focus) {
    parts.push(`🎯 CURRENT FOCUS:\n${formatLine(focus, now)}`);
  }

  // Both tiers render oldest → newest
  const working = byAge(
    outcome.items.filter((item) => item.tier === "working").slice(0, maxWorking),
  );
  if (working.length > 0) {
    const lines = working.map((item) => formatLine(item, now));
    parts.push(`🕐 RECENT SESSION CONTEXT:\n${lines.join("\n")}`);
  }

  const persistent = byAge(
    outcome.items
      .filter((item) => item.tier === "persistent")
      .slice(0, maxPersistent),
  );
  if (persistent.length > 0) {
    const lines = persistent.map((item) => formatLine(item, now));
    parts.push(`🧠 LONG-TERM KNOWLEDGE:\n${lines.join("\n")}`);
  }

  return parts.join("\n\n");
}

function byAge(items: RetrievedItem[]): RetrievedItem[] {
  return [...items].sort(
    (a, b) => Date.parse(a.record.createdAt) - Date.parse(b.record.createdAt),
  );
}

function formatLine(item: RetrievedItem, now: number): string {
  const ago = formatAgo(Date.parse(item.record.createdAt), now);
  const tag = item.record.isEvolved ? " (learned)" : "";
  return `• [${ago}]${tag} "${item.content.slice(0, MAX_CONTENT_CHARS)}"`;
}

/** Format a Unix ms timestamp as a human-readable "X ago" string. */
export function formatAgo(ts: number, now: number = Date.now()): string {
  const diffSec = Math.floor((now - ts) / 1000);
  if (!Number.isFinite(diffSec) || diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}
