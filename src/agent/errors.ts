import { getStatusCode } from "../llm/retry.js";
import type { Persona } from "./types.js";

// ── Turn Error Taxonomy ──────────────────────────────────

/** A language-model call failed, timed out, or returned nothing usable. */
export class ModelCallError extends Error {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`${stage} model call failed: ${describeError(cause)}`, { cause });
    this.name = "ModelCallError";
    this.stage = stage;
  }
}

/** A tool collaborator threw. Never escapes the Tool Executor. */
export class ToolExecutionError extends Error {
  readonly tool: string;

  constructor(tool: string, cause: unknown) {
    super(`Tool "${tool}" failed: ${describeError(cause)}`, { cause });
    this.name = "ToolExecutionError";
    this.tool = tool;
  }
}

/** The planner's output could not be turned into a whitelisted plan. */
export class PlanValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanValidationError";
  }
}

/** Checkpoint or memory storage I/O failed. Caught at the store boundary. */
export class PersistenceError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "PersistenceError";
  }
}

/** A turn arrived for a thread owned by the other persona. */
export class PersonaMismatchError extends Error {
  readonly threadId: string;

  constructor(threadId: string, owner: Persona, requested: Persona) {
    super(`thread ${threadId} belongs to the ${owner} persona, not ${requested}`);
    this.name = "PersonaMismatchError";
    this.threadId = threadId;
  }
}

/** The state machine took more transitions than the per-turn ceiling. */
export class StepLimitExceededError extends Error {
  readonly steps: number;

  constructor(steps: number) {
    super(`processing limit exceeded after ${steps} steps`);
    this.name = "StepLimitExceededError";
    this.steps = steps;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ── Error Messages ───────────────────────────────────────

/** Short apology shown instead of a reply when a turn cannot complete. */
export function buildUserErrorMessage(error: unknown): string {
  if (error instanceof PersonaMismatchError) {
    return "⚠️ Sorry, this conversation was started in the other chat. Please start a new conversation.";
  }
  if (error instanceof StepLimitExceededError) {
    return "⚠️ Sorry, that request hit my processing limit. Could you ask it in a simpler way?";
  }

  const cause = error instanceof ModelCallError ? error.cause : error;
  const status = getStatusCode(cause);

  if (status === 429) {
    return "⚠️ Sorry, I'm getting too many requests right now. Try again in a minute.";
  }
  if (status === 503 || status === 502) {
    return "⚠️ Sorry, the AI service is temporarily down. Give it a minute and try again.";
  }
  if (status === 401) {
    return "🔑 Sorry, I couldn't authenticate with the AI service. The API key may be invalid or expired.";
  }

  const msg = describeError(cause);
  if (msg.includes("ECONNRESET") || msg.includes("ETIMEDOUT")) {
    return "⚠️ Sorry, the network connection failed. Please try again.";
  }
  if (msg.includes("timed out")) {
    return "⚠️ Sorry, that took too long to answer. Please try again.";
  }

  return "⚠️ Sorry, something went wrong while answering. Please try again.";
}
