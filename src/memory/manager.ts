import { extractFact } from "./fact-extractor.js";
import { buildMemoryNote, parseMemoryContent } from "./context-builder.js";
import type { MemoryStore } from "./store.js";
import type { FactKey, MemorySource } from "./types.js";
import { log } from "../logger.js";

// ── MemoryManager — extractor + store glue ───────────────

const IMPORTANCE: Record<FactKey, number> = {
  user_name: 5,
  allergy: 5,
  dietary: 4,
  preference: 3,
  dislike: 3,
  note: 2,
};

/** Keys where only the latest record counts; the rest accumulate values. */
const SINGLE_VALUED: ReadonlySet<FactKey> = new Set(["user_name", "dietary"]);

/** How many records feed the memory note. */
const NOTE_RECORD_LIMIT = 50;

export class MemoryManager {
  constructor(private readonly store: MemoryStore) {}

  /** Current value of a key: its most recent record. */
  latestValue(threadId: string, key: FactKey): string | undefined {
    const latest = this.store
      .search(threadId, `${key}:`, NOTE_RECORD_LIMIT)
      .map((r) => parseMemoryContent(r.content))
      .find((fact) => fact.key === key && fact.value);
    return latest?.value;
  }

  /** Latest stored name for the thread, if any. */
  knownName(threadId: string): string | undefined {
    return this.latestValue(threadId, "user_name");
  }

  /**
   * Extract a fact from one utterance and store it.
   * Returns the new record id, or null when there was nothing new to keep.
   */
  rememberFrom(
    threadId: string,
    text: string,
    source: Extract<MemorySource, "user" | "assistant">,
  ): string | null {
    const fact = extractFact(text, source, this.knownName(threadId));
    if (!fact) return null;

    const content = `${fact.key}:${fact.value}`;
    const sameValue = (value: string | undefined) =>
      value?.toLowerCase() === fact.value.toLowerCase();

    // A single-valued fact is new unless it repeats the current value
    const duplicate = SINGLE_VALUED.has(fact.key)
      ? sameValue(this.latestValue(threadId, fact.key))
      : this.store
          .search(threadId, content, NOTE_RECORD_LIMIT)
          .some((r) => r.content.toLowerCase() === content.toLowerCase());
    if (duplicate) return null;

    const id = this.store.add(threadId, {
      content,
      tags: [fact.key],
      importance: IMPORTANCE[fact.key],
      source,
    });
    if (id) {
      log.info({ threadId, fact: content, source }, "🧠 Fact remembered");
    }
    return id;
  }

  /** The profile note injected into this turn's prompt ("" when empty). */
  buildNote(threadId: string): string {
    return buildMemoryNote(this.store.list(threadId, NOTE_RECORD_LIMIT));
  }
}
