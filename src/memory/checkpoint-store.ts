import { openDatabase, type SqliteDatabase } from "../db/sqlite.js";
import { PersistenceError } from "../agent/errors.js";
import { isPersona } from "../agent/personas.js";
import type { ChatMessage, MessageRole } from "../agent/types.js";
import { log } from "../logger.js";
import type { Checkpoint } from "./types.js";

// ── Checkpoint Store — latest snapshot per thread ────────

export interface CheckpointStore {
  get(threadId: string): Checkpoint | null;
  /** Last write wins; the previous snapshot is discarded. */
  put(threadId: string, snapshot: Omit<Checkpoint, "threadId">): void;
  close(): void;
}

export class SqliteCheckpointStore implements CheckpointStore {
  private readonly db: SqliteDatabase;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        thread_id   TEXT PRIMARY KEY,
        persona     TEXT,
        messages    TEXT NOT NULL,
        summary     TEXT,
        updated_at  TEXT NOT NULL
      );
    `);

    // Databases created before the persona column
    const columns = this.db
      .prepare("PRAGMA table_info(checkpoints)")
      .all() as { name: string }[];
    if (!columns.some((c) => c.name === "persona")) {
      this.db.exec("ALTER TABLE checkpoints ADD COLUMN persona TEXT");
    }
  }

  get(threadId: string): Checkpoint | null {
    try {
      const row = this.db
        .prepare(
          "SELECT persona, messages, summary FROM checkpoints WHERE thread_id = ?",
        )
        .get(threadId) as
        | { persona: string | null; messages: string; summary: string | null }
        | undefined;
      if (!row) return null;
      return {
        threadId,
        ...(isPersona(row.persona) ? { persona: row.persona } : {}),
        messages: parseMessages(row.messages),
        ...(row.summary ? { summary: row.summary } : {}),
      };
    } catch (err) {
      log.warn(
        new PersistenceError(`checkpoint read for ${threadId}`, err),
        "⚠️ Checkpoint unreadable, starting thread fresh",
      );
      return null;
    }
  }

  put(threadId: string, snapshot: Omit<Checkpoint, "threadId">): void {
    try {
      this.db
        .prepare(
          `INSERT INTO checkpoints (thread_id, persona, messages, summary, updated_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(thread_id) DO UPDATE SET
             persona = excluded.persona,
             messages = excluded.messages,
             summary = excluded.summary,
             updated_at = excluded.updated_at`,
        )
        .run(
          threadId,
          snapshot.persona ?? null,
          JSON.stringify(snapshot.messages),
          snapshot.summary ?? null,
          new Date().toISOString(),
        );
    } catch (err) {
      log.warn(
        new PersistenceError(`checkpoint write for ${threadId}`, err),
        "⚠️ Checkpoint not saved",
      );
    }
  }

  close(): void {
    this.db.close();
  }
}

/** Process-lifetime map. Nothing survives a restart. */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly snapshots = new Map<string, Omit<Checkpoint, "threadId">>();

  get(threadId: string): Checkpoint | null {
    const snapshot = this.snapshots.get(threadId);
    if (!snapshot) return null;
    // Copies, so callers can't mutate a saved snapshot
    return { threadId, ...structuredClone(snapshot) };
  }

  put(threadId: string, snapshot: Omit<Checkpoint, "threadId">): void {
    this.snapshots.set(threadId, structuredClone(snapshot));
  }

  close(): void {
    this.snapshots.clear();
  }
}

/**
 * Open the file-backed checkpoint store. If the database cannot be
 * opened, log once and continue with a non-persistent map.
 */
export function openCheckpointStore(dbPath: string): CheckpointStore {
  try {
    return new SqliteCheckpointStore(dbPath);
  } catch (err) {
    log.warn(
      new PersistenceError(`open checkpoint store at ${dbPath}`, err),
      "⚠️ Checkpoint store unavailable, conversations will not survive a restart",
    );
    return new InMemoryCheckpointStore();
  }
}

// ── Helpers ──────────────────────────────────────────────

const ROLES: readonly MessageRole[] = ["user", "assistant", "system", "tool"];

function isRole(value: unknown): value is MessageRole {
  return typeof value === "string" && ROLES.some((r) => r === value);
}

/** Decode a stored message list, dropping entries that don't fit the shape. */
function parseMessages(raw: string): ChatMessage[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];

  const messages: ChatMessage[] = [];
  for (const entry of parsed) {
    if (typeof entry !== "object" || entry === null) continue;
    const role = "role" in entry ? entry.role : undefined;
    const content = "content" in entry ? entry.content : undefined;
    const name = "name" in entry ? entry.name : undefined;
    const timestamp = "timestamp" in entry ? entry.timestamp : undefined;
    if (!isRole(role) || typeof content !== "string") continue;
    messages.push({
      role,
      content,
      ...(typeof name === "string" ? { name } : {}),
      timestamp: typeof timestamp === "number" ? timestamp : 0,
    });
  }
  return messages;
}
