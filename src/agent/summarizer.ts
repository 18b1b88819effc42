import { callModel } from "../llm/client.js";
import { log } from "../logger.js";
import type { StageModel } from "./classifier.js";
import { describeError } from "./errors.js";

// ── Summarizer ───────────────────────────────────────────

/**
 * Fold the latest exchange into the running summary.
 * Any failure (or an empty reply) keeps the previous summary.
 */
export async function updateSummary(
  stage: StageModel,
  input: { previous?: string; userText: string; assistantText: string },
): Promise<string | undefined> {
  try {
    const raw = await callModel(
      stage.model,
      [
        {
          role: "system",
          content:
            "Maintain a short running summary of a restaurant assistant conversation. " +
            "Keep names, dishes, filters and open questions. At most five sentences. Reply with the summary only.",
        },
        {
          role: "user",
          content: [
            `Previous summary: ${input.previous ?? "(none)"}`,
            `User: ${input.userText}`,
            `Assistant: ${input.assistantText}`,
          ].join("\n"),
        },
      ],
      { stage: "summarizer", timeoutMs: stage.timeoutMs, temperature: 0 },
    );
    const summary = raw.trim();
    return summary || input.previous;
  } catch (err) {
    log.warn({ error: describeError(err) }, "⚠️ Summary not updated");
    return input.previous;
  }
}
