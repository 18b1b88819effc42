import type { ExtractedFact, FactKey } from "./types.js";

// ── Fact Extractor — ordered pattern rules ───────────────

export interface FactRule {
  key: FactKey;
  pattern: RegExp;
}

/** Words a sloppy "my name is …" match can capture instead of a name. */
export const NAME_STOPLIST: ReadonlySet<string> = new Set([
  "what",
  "who",
  "where",
  "why",
  "how",
  "when",
]);

// Captured values stop at the end of the clause
const VALUE = "([^.!?,;\\n]+)";
const NAME = "([A-Za-z][A-Za-z'-]*)";
const DIET = "(vegan|vegetarian|pescatarian|gluten[- ]free)";

/** Rules for what the user says about themselves. First match wins. */
export const USER_RULES: readonly FactRule[] = [
  { key: "note", pattern: /\bremember that\s+(.+)/i },
  { key: "allergy", pattern: new RegExp(`\\ballergic to\\s+${VALUE}`, "i") },
  {
    key: "dietary",
    pattern: new RegExp(`\\b(?:i'm|i am)\\s+(?:a\\s+)?${DIET}\\b`, "i"),
  },
  {
    key: "dislike",
    pattern: new RegExp(`\\bi\\s+(?:don't|do not|dont)\\s+like\\s+${VALUE}`, "i"),
  },
  {
    key: "preference",
    pattern: new RegExp(`\\bi\\s+(?:really\\s+)?(?:like|love|enjoy)\\s+${VALUE}`, "i"),
  },
  { key: "user_name", pattern: new RegExp(`\\bmy name is\\s+${NAME}`, "i") },
  { key: "user_name", pattern: new RegExp(`\\bcall me\\s+${NAME}`, "i") },
  // Case-sensitive on the name so "I'm looking for…" is not a name
  {
    key: "user_name",
    pattern: /\b[Ii](?:'m| am)\s+([A-Z][A-Za-z'-]*)\b/,
  },
];

/**
 * Rules for facts the assistant states back ("your name is Sam").
 * Questions ("do you like…", "are you allergic…") don't match.
 */
export const ASSISTANT_RULES: readonly FactRule[] = [
  {
    key: "allergy",
    pattern: new RegExp(`\\b(?:you're|you are)\\s+allergic to\\s+${VALUE}`, "i"),
  },
  {
    key: "dietary",
    pattern: new RegExp(`\\b(?:you're|you are)\\s+(?:a\\s+)?${DIET}\\b`, "i"),
  },
  {
    key: "dislike",
    pattern: new RegExp(`(?<!\\b(?:do|did|would)\\s)\\byou\\s+(?:don't|do not)\\s+like\\s+${VALUE}`, "i"),
  },
  {
    key: "preference",
    pattern: new RegExp(`(?<!\\b(?:do|did|would)\\s)\\byou\\s+(?:really\\s+)?(?:like|love|enjoy)\\s+${VALUE}`, "i"),
  },
  { key: "user_name", pattern: new RegExp(`\\byour name is\\s+${NAME}`, "i") },
];

const MAX_VALUE_LENGTH = 120;

function cleanValue(raw: string): string {
  return raw
    .trim()
    .replace(/[.!?,;:\s]+$/, "")
    .slice(0, MAX_VALUE_LENGTH)
    .trim();
}

function normalize(key: FactKey, value: string): string {
  if (key === "dietary") {
    return value.toLowerCase().replace(/\s+/, "-");
  }
  return value;
}

/**
 * Scan one utterance for a durable fact.
 *
 * A name candidate on the stoplist is discarded; the previously known
 * name (if any) comes back instead, so callers treat it as a no-op.
 */
export function extractFact(
  text: string,
  speaker: "user" | "assistant",
  knownName?: string,
): ExtractedFact | null {
  const rules = speaker === "user" ? USER_RULES : ASSISTANT_RULES;

  for (const rule of rules) {
    const match = text.match(rule.pattern);
    const captured = match?.[1];
    if (captured === undefined) continue;

    const value = normalize(rule.key, cleanValue(captured));
    if (!value) continue;

    if (rule.key === "user_name" && NAME_STOPLIST.has(value.toLowerCase())) {
      return knownName ? { key: "user_name", value: knownName } : null;
    }
    return { key: rule.key, value };
  }

  return null;
}
