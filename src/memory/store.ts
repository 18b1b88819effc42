import { randomUUID } from "crypto";
import { openDatabase, type SqliteDatabase } from "../db/sqlite.js";
import { PersistenceError } from "../agent/errors.js";
import { log } from "../logger.js";
import type { MemoryRecord, MemorySource, NewMemory } from "./types.js";

// ── Memory Store — per-thread fact ledger ────────────────

export interface MemoryStore {
  /** Returns the new record id, or null when the write could not be stored. */
  add(threadId: string, memory: NewMemory): string | null;
  /** Most recently updated first. */
  list(threadId: string, limit?: number): MemoryRecord[];
  /** Case-insensitive substring match on content, most recent first. */
  search(threadId: string, query: string, limit?: number): MemoryRecord[];
  delete(threadId: string, id: string): boolean;
  close(): void;
}

const DEFAULT_LIST_LIMIT = 50;
const DEFAULT_SEARCH_LIMIT = 5;

function newMemoryId(): string {
  return randomUUID().replace(/-/g, "");
}

export function clampImportance(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 1;
  return Math.min(5, Math.max(1, Math.round(value)));
}

// ── SQLite-backed store ──────────────────────────────────

interface MemoryRow {
  id: string;
  thread_id: string;
  content: string;
  tags: string | null;
  importance: number;
  source: string;
  created_at: string;
  updated_at: string;
}

const COLUMNS =
  "id, thread_id, content, tags, importance, source, created_at, updated_at";

export class SqliteMemoryStore implements MemoryStore {
  private readonly db: SqliteDatabase;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id          TEXT PRIMARY KEY,
        thread_id   TEXT NOT NULL,
        content     TEXT NOT NULL,
        tags        TEXT,
        importance  INTEGER NOT NULL DEFAULT 1,
        source      TEXT NOT NULL DEFAULT 'assistant',
        created_at  TEXT NOT NULL,
        updated_at  TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_mem_thread ON memories(thread_id);
      CREATE INDEX IF NOT EXISTS idx_mem_updated ON memories(updated_at);
    `);
  }

  add(threadId: string, memory: NewMemory): string | null {
    const id = newMemoryId();
    const now = new Date().toISOString();
    try {
      this.db
        .prepare(
          `INSERT INTO memories (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          threadId,
          memory.content,
          JSON.stringify(memory.tags ?? []),
          clampImportance(memory.importance),
          memory.source ?? "assistant",
          now,
          now,
        );
      return id;
    } catch (err) {
      log.warn(new PersistenceError("memory add", err), "⚠️ Memory write dropped");
      return null;
    }
  }

  list(threadId: string, limit = DEFAULT_LIST_LIMIT): MemoryRecord[] {
    return this.select(
      `SELECT ${COLUMNS} FROM memories WHERE thread_id = ?
       ORDER BY updated_at DESC, rowid DESC LIMIT ?`,
      [threadId, limit],
      "memory list",
    );
  }

  search(
    threadId: string,
    query: string,
    limit = DEFAULT_SEARCH_LIMIT,
  ): MemoryRecord[] {
    // instr() rather than LIKE so % and _ in the query match literally
    return this.select(
      `SELECT ${COLUMNS} FROM memories
       WHERE thread_id = ? AND instr(LOWER(content), ?) > 0
       ORDER BY updated_at DESC, rowid DESC LIMIT ?`,
      [threadId, query.toLowerCase(), limit],
      "memory search",
    );
  }

  delete(threadId: string, id: string): boolean {
    try {
      const result = this.db
        .prepare("DELETE FROM memories WHERE id = ? AND thread_id = ?")
        .run(id, threadId);
      return result.changes > 0;
    } catch (err) {
      log.warn(new PersistenceError("memory delete", err), "⚠️ Memory delete failed");
      return false;
    }
  }

  close(): void {
    this.db.close();
  }

  private select(
    sql: string,
    params: (string | number)[],
    operation: string,
  ): MemoryRecord[] {
    try {
      const rows = this.db.prepare(sql).all(...params) as MemoryRow[];
      return rows.map(fromRow);
    } catch (err) {
      log.warn(new PersistenceError(operation, err), "⚠️ Memory read failed");
      return [];
    }
  }
}

function fromRow(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    threadId: row.thread_id,
    content: row.content,
    tags: parseTags(row.tags),
    importance: row.importance,
    source: toSource(row.source),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseTags(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed)
      ? parsed.filter((t): t is string => typeof t === "string")
      : [];
  } catch {
    return [];
  }
}

function toSource(raw: string): MemorySource {
  return raw === "user" || raw === "tool" ? raw : "assistant";
}

// ── In-process store (fallback and tests) ────────────────

export class InMemoryMemoryStore implements MemoryStore {
  private readonly records: MemoryRecord[] = [];

  add(threadId: string, memory: NewMemory): string {
    const now = new Date().toISOString();
    const record: MemoryRecord = {
      id: newMemoryId(),
      threadId,
      content: memory.content,
      tags: [...(memory.tags ?? [])],
      importance: clampImportance(memory.importance),
      source: memory.source ?? "assistant",
      createdAt: now,
      updatedAt: now,
    };
    this.records.push(record);
    return record.id;
  }

  list(threadId: string, limit = DEFAULT_LIST_LIMIT): MemoryRecord[] {
    return this.newestFirst(threadId).slice(0, limit);
  }

  search(
    threadId: string,
    query: string,
    limit = DEFAULT_SEARCH_LIMIT,
  ): MemoryRecord[] {
    const needle = query.toLowerCase();
    return this.newestFirst(threadId)
      .filter((r) => r.content.toLowerCase().includes(needle))
      .slice(0, limit);
  }

  delete(threadId: string, id: string): boolean {
    const idx = this.records.findIndex(
      (r) => r.id === id && r.threadId === threadId,
    );
    if (idx < 0) return false;
    this.records.splice(idx, 1);
    return true;
  }

  close(): void {
    this.records.length = 0;
  }

  /** Insertion order breaks updatedAt ties, like rowid in SQLite. */
  private newestFirst(threadId: string): MemoryRecord[] {
    return this.records
      .map((record, seq) => ({ record, seq }))
      .filter(({ record }) => record.threadId === threadId)
      .sort(
        (a, b) =>
          b.record.updatedAt.localeCompare(a.record.updatedAt) || b.seq - a.seq,
      )
      .map(({ record }) => ({ ...record, tags: [...record.tags] }));
  }
}

/**
 * Open the file-backed store, or fall back to a process-lifetime
 * in-memory store when the database cannot be opened.
 */
export function openMemoryStore(dbPath: string): MemoryStore {
  try {
    return new SqliteMemoryStore(dbPath);
  } catch (err) {
    log.warn(
      new PersistenceError(`open memory store at ${dbPath}`, err),
      "⚠️ Memory store unavailable, facts will not survive a restart",
    );
    return new InMemoryMemoryStore();
  }
}
