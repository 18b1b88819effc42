// ── Memory Module — Shared Types ─────────────────────────

import type { ChatMessage, Persona } from "../agent/types.js";

export type MemorySource = "user" | "assistant" | "tool";

/** Semantic keys the fact extractor produces. */
export type FactKey =
  | "user_name"
  | "preference"
  | "dislike"
  | "dietary"
  | "allergy"
  | "note";

export interface MemoryRecord {
  id: string;
  threadId: string;
  /** "key:value", e.g. "user_name:Sam" */
  content: string;
  tags: string[];
  importance: number; // 1..5
  source: MemorySource;
  createdAt: string; // ISO-8601
  updatedAt: string; // ISO-8601
}

export interface NewMemory {
  content: string;
  tags?: string[];
  importance?: number;
  source?: MemorySource;
}

/** A fact pulled out of a single utterance. */
export interface ExtractedFact {
  key: FactKey;
  value: string;
}

export interface Checkpoint {
  threadId: string;
  /** The persona that owns the thread. Absent on snapshots from before it was stored. */
  persona?: Persona;
  messages: ChatMessage[];
  summary?: string;
}
