import { callModel, type ModelMessage } from "../llm/client.js";
import type { StageModel } from "./classifier.js";
import { toModelMessages } from "./history.js";
import type { ChatMessage } from "./types.js";

// ── Responder ────────────────────────────────────────────

export const NO_SUGGESTIONS_DIRECTIVE =
  "Answer only what was asked. Do not add follow-up suggestions, next steps, or an extra insight section.";

export interface ResponderInput {
  systemPrompt: string;
  memoryNote?: string;
  summary?: string;
  /** Windowed history, excluding the new user message. */
  history: readonly ChatMessage[];
  userText: string;
  toolResult?: string;
  /** Tool that produced `toolResult`. */
  toolName?: string;
  suggestions: boolean;
}

/**
 * Fixed prompt order: persona, memory note, summary, history, user message,
 * tool result, then the no-suggestions directive when suggestions are off.
 */
export function buildResponderMessages(input: ResponderInput): ModelMessage[] {
  const messages: ModelMessage[] = [{ role: "system", content: input.systemPrompt }];
  if (input.memoryNote) {
    messages.push({ role: "system", content: input.memoryNote });
  }
  if (input.summary) {
    messages.push({
      role: "system",
      content: `Summary of the conversation so far:\n${input.summary}`,
    });
  }
  messages.push(...toModelMessages(input.history));
  messages.push({ role: "user", content: input.userText });
  if (input.toolResult !== undefined) {
    messages.push({
      role: "system",
      content:
        `Result of ${input.toolName ?? "the lookup"} for the user's message. ` +
        `Answer from it; if it reports an error, say the information could not be retrieved.\n${input.toolResult}`,
    });
  }
  if (!input.suggestions) {
    messages.push({ role: "system", content: NO_SUGGESTIONS_DIRECTIVE });
  }
  return messages;
}

/** One model call; the reply is returned verbatim. */
export async function generateReply(
  stage: StageModel & { temperature: number },
  input: ResponderInput,
): Promise<string> {
  return callModel(stage.model, buildResponderMessages(input), {
    stage: "responder",
    timeoutMs: stage.timeoutMs,
    temperature: stage.temperature,
  });
}
