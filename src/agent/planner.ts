import { z } from "zod";
import { callModel } from "../llm/client.js";
import { log } from "../logger.js";
import { PlanValidationError } from "./errors.js";
import { transcript } from "./history.js";
import { lacksDishReference } from "./plan-rules.js";
import type { StageModel } from "./classifier.js";
import type { ChatMessage, Plan, ToolArgs } from "./types.js";

// ── Planner ──────────────────────────────────────────────

const CONTEXT_MESSAGES = 6;

const planSchema = z.object({
  tool: z.string().trim().min(1),
  args: z
    .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
    .nullish()
    .transform((args): ToolArgs => args ?? {}),
});

/**
 * First balanced `{…}` in free text, ignoring braces inside JSON strings.
 * Returns undefined when no object closes.
 */
export function firstBalancedObject(text: string): string | undefined {
  const start = text.indexOf("{");
  if (start < 0) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Direct JSON first, then the first balanced object inside the text. */
export function extractJson(raw: string): unknown {
  const direct = tryJson(raw.trim());
  if (direct !== undefined) return direct;
  const embedded = firstBalancedObject(raw);
  return embedded === undefined ? undefined : tryJson(embedded);
}

/**
 * Turn parsed planner output into a whitelisted plan with flat args.
 * `output_format` defaults to "structured".
 */
export function validatePlan(candidate: unknown, whitelist: readonly string[]): Plan {
  if (candidate === undefined) {
    throw new PlanValidationError("planner output is not JSON");
  }
  const parsed = planSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new PlanValidationError(
      `planner output is not a flat {tool, args} object: ${parsed.error.issues
        .map((i) => `${i.path.join(".") || "root"} ${i.message}`)
        .join("; ")}`,
    );
  }
  const { tool, args } = parsed.data;
  if (!whitelist.includes(tool)) {
    throw new PlanValidationError(`tool "${tool}" is not available`);
  }
  return {
    tool,
    args: hasOutputFormat(args) ? args : { ...args, output_format: "structured" },
  };
}

function hasOutputFormat(args: ToolArgs): boolean {
  return typeof args.output_format === "string" && args.output_format.trim() !== "";
}

/** Raw planner text → plan, or null when nothing valid came back. */
export function parsePlan(raw: string, whitelist: readonly string[]): Plan | null {
  try {
    return validatePlan(extractJson(raw), whitelist);
  } catch (err) {
    if (!(err instanceof PlanValidationError)) throw err;
    log.warn({ reason: err.message, raw: raw.slice(0, 200) }, "⚠️ Plan rejected");
    return null;
  }
}

// ── Salvage: dish name from "… for/about <dish>" ─────────

const DISH_CLAUSE_RE = /.*\b(?:for|about)\s+(.+?)\s*[?.!]*\s*$/i;
const LEADING_DETERMINER_RE = /^(?:the|a|an|your|this|that|our)\s+/i;
const NOT_A_DISH: ReadonlySet<string> = new Set([
  "it",
  "that",
  "this",
  "them",
  "those",
  "these",
  "one",
  "that one",
  "this one",
]);

/** The dish a message asks about ("… for the tiramisu?"), if any. */
export function dishNameFromText(text: string): string | undefined {
  const captured = DISH_CLAUSE_RE.exec(text)?.[1];
  if (!captured) return undefined;
  const dish = captured.trim().replace(/^["']|["']$/g, "");
  if (NOT_A_DISH.has(dish.toLowerCase())) return undefined;
  const stripped = dish.replace(LEADING_DETERMINER_RE, "").trim();
  return stripped || undefined;
}

/**
 * For a single-dish detail plan with neither id nor dish name, recover the
 * dish from the user's own wording. Other plans pass through untouched.
 */
export function salvageDishName(plan: Plan, userText: string): Plan {
  if (!lacksDishReference(plan)) return plan;
  const dish = dishNameFromText(userText);
  if (!dish) return plan;
  log.debug({ tool: plan.tool, dish }, "🩹 Dish name salvaged from message");
  return { tool: plan.tool, args: { ...plan.args, dish_name: dish } };
}

// ── Model call ───────────────────────────────────────────

export interface PlanInput {
  text: string;
  history: readonly ChatMessage[];
  summary?: string;
  whitelist: readonly string[];
  /** Planner-facing catalogue of the whitelisted tools. */
  toolCatalogue: string;
  today: string;
}

export async function planToolCall(
  stage: StageModel,
  input: PlanInput,
): Promise<Plan | null> {
  const context = transcript(input.history.slice(-CONTEXT_MESSAGES));
  const raw = await callModel(
    stage.model,
    [
      {
        role: "system",
        content: [
          "You plan exactly one lookup against the restaurant database.",
          'Reply with a single JSON object and nothing else: {"tool": "<name>", "args": {<flat key/value pairs>}}.',
          `The tool must be one of: ${input.whitelist.join(", ")}.`,
          "Argument values must be strings, numbers, booleans or null; no nested objects or arrays.",
          "Do not add a result-count limit. When information is missing, use as few filters as possible.",
          "Use names the user gave (dish names, staff names, locations) as they were written.",
          `Today's date is ${input.today}.`,
          "",
          "Tools:",
          input.toolCatalogue,
        ].join("\n"),
      },
      {
        role: "user",
        content: [
          input.summary ? `Conversation summary: ${input.summary}` : "",
          context ? `Recent conversation:\n${context}` : "",
          `Request: ${input.text}`,
        ]
          .filter(Boolean)
          .join("\n\n"),
      },
    ],
    { stage: "planner", timeoutMs: stage.timeoutMs, temperature: 0, jsonMode: true },
  );

  const plan = parsePlan(raw, input.whitelist);
  return plan ? salvageDishName(plan, input.text) : null;
}
