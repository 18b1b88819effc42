import { callModel, type ChatModel } from "../llm/client.js";
import { transcript } from "./history.js";
import type { ChatMessage, Intent, Persona } from "./types.js";

// ── Intent Classifier ────────────────────────────────────

/** How a pipeline stage reaches the model. */
export interface StageModel {
  model: ChatModel;
  timeoutMs: number;
}

/** Recent messages shown to the classifier for follow-up questions. */
const CONTEXT_MESSAGES = 4;

const DOMAIN: Record<Persona, string> = {
  internal:
    "employees, staff performance, storage inventory and stock levels, recipes and ingredients, the daily menu",
  external: "the daily menu, dishes, prices, dietary options, ingredients of a dish",
};

/** Anything starting with "db_query" is a lookup; everything else is chat. */
export function parseIntent(raw: string): Intent {
  return raw.trim().toLowerCase().startsWith("db_query")
    ? "db_query"
    : "conversational";
}

export async function classifyIntent(
  stage: StageModel,
  input: { persona: Persona; text: string; history: readonly ChatMessage[] },
): Promise<Intent> {
  const context = transcript(input.history.slice(-CONTEXT_MESSAGES));
  const raw = await callModel(
    stage.model,
    [
      {
        role: "system",
        content:
          `Classify the user's latest message for a restaurant assistant.\n` +
          `Answer "db_query" if answering needs a lookup in the restaurant data (${DOMAIN[input.persona]}).\n` +
          `Answer "conversational" for greetings, small talk, thanks, or anything the conversation already answers.\n` +
          `Reply with exactly one word: db_query or conversational.`,
      },
      {
        role: "user",
        content: context
          ? `Conversation so far:\n${context}\n\nLatest message: ${input.text}`
          : `Latest message: ${input.text}`,
      },
    ],
    { stage: "classifier", timeoutMs: stage.timeoutMs, temperature: 0, maxTokens: 8 },
  );
  return parseIntent(raw);
}
