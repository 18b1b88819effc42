import {
  MENU_FILTER_FIELDS,
  MENU_QUERY_TOOL,
  hasArg,
  lacksDishReference,
} from "./plan-rules.js";
import type { Persona, Plan } from "./types.js";

// ── Clarification Policy ─────────────────────────────────

export interface Clarification {
  /** The missing argument this question is about. */
  field: string;
  question: string;
}

const DISH_QUESTION: Record<Persona, string> = {
  internal: "Which dish do you mean? Give me the dish name or recipe id and I'll pull it up.",
  external: "Which dish would you like to know more about?",
};

const MENU_QUESTION: Record<Persona, string> = {
  internal:
    "Which menu should I check? Tell me a date, location, category, price range or dietary restriction.",
  external:
    "Happy to help! Are you looking for something in particular, like a category (mains, desserts), a price range, or vegetarian, vegan or gluten-free dishes?",
};

/**
 * Decide whether a plan needs a question before it runs.
 * Never asks about a field already in `askedFields`.
 */
export function clarificationFor(
  plan: Plan | undefined,
  persona: Persona,
  askedFields: ReadonlySet<string> = new Set(),
): Clarification | null {
  if (!plan) return null;

  let candidate: Clarification | null = null;
  if (lacksDishReference(plan)) {
    candidate = { field: "dish_name", question: DISH_QUESTION[persona] };
  } else if (
    plan.tool === MENU_QUERY_TOOL &&
    !MENU_FILTER_FIELDS.some((field) => hasArg(plan.args, field))
  ) {
    candidate = { field: "menu_filters", question: MENU_QUESTION[persona] };
  }

  return candidate && !askedFields.has(candidate.field) ? candidate : null;
}
