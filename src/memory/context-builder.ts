import type { FactKey, MemoryRecord } from "./types.js";

// ── Context Builder — the per-turn memory note ───────────

const FACT_KEYS: readonly FactKey[] = [
  "user_name",
  "preference",
  "dislike",
  "dietary",
  "allergy",
  "note",
];

const MAX_VALUES_PER_LINE = 5;

/** Split "key:value" content. Free-form content is treated as a note. */
export function parseMemoryContent(content: string): {
  key: FactKey;
  value: string;
} {
  const sep = content.indexOf(":");
  if (sep > 0) {
    const key = content.slice(0, sep).trim();
    const fact = FACT_KEYS.find((k) => k === key);
    if (fact) {
      return { key: fact, value: content.slice(sep + 1).trim() };
    }
  }
  return { key: "note", value: content.trim() };
}

/**
 * Render a thread's memory records (newest first) as a compact profile.
 * Single-valued facts keep their latest value; the rest list distinct values.
 * Returns an empty string when nothing is known.
 */
export function buildMemoryNote(records: MemoryRecord[]): string {
  const values = new Map<FactKey, string[]>();

  for (const record of records) {
    const { key, value } = parseMemoryContent(record.content);
    if (!value) continue;
    const seen = values.get(key) ?? [];
    if (!seen.some((v) => v.toLowerCase() === value.toLowerCase())) {
      seen.push(value);
    }
    values.set(key, seen);
  }

  const latest = (key: FactKey) => values.get(key)?.[0];
  const all = (key: FactKey) =>
    (values.get(key) ?? []).slice(0, MAX_VALUES_PER_LINE).join(", ");

  const lines: string[] = [];
  const name = latest("user_name");
  if (name) lines.push(`- Name: ${name}`);
  const dietary = latest("dietary");
  if (dietary) lines.push(`- Dietary: ${dietary}`);
  if (values.has("allergy")) lines.push(`- Allergies: ${all("allergy")}`);
  if (values.has("preference")) lines.push(`- Likes: ${all("preference")}`);
  if (values.has("dislike")) lines.push(`- Dislikes: ${all("dislike")}`);
  if (values.has("note")) lines.push(`- Notes: ${all("note")}`);

  if (lines.length === 0) return "";
  return `Known profile for this conversation:\n${lines.join("\n")}`;
}
