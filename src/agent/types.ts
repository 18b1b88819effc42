// ── Turn Pipeline — Shared Types ─────────────────────────

export type Persona = "internal" | "external";

export type Intent = "conversational" | "db_query";

export type MessageRole = "user" | "assistant" | "system" | "tool";

export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** Tool name, for role "tool". */
  name?: string;
  timestamp: number; // Unix ms
}

/** Flat argument map handed to a tool. */
export type ToolArgs = Record<string, string | number | boolean | null>;

export interface Plan {
  tool: string;
  args: ToolArgs;
}

export type TurnStep =
  | "START"
  | "DETECT_INTENT"
  | "PLAN"
  | "CLARIFY"
  | "EXEC"
  | "RESPOND"
  | "SUMMARIZE"
  | "END";

/** The unit the pipeline mutates while processing one turn. */
export interface TurnState {
  threadId: string;
  persona: Persona;
  /** Windowed history plus everything appended this turn. */
  messages: ChatMessage[];
  summary?: string;
  /** Recomputed from the Memory Store every turn, never persisted. */
  memoryNote?: string;
  intent?: Intent;
  plan?: Plan;
  toolResult?: string;
  clarifyQuestion?: string;
  /** Argument fields already asked about this turn. */
  askedFields: Set<string>;
  /** The reply produced by CLARIFY or RESPOND. */
  reply?: string;
}

export interface TurnResult {
  /** The text returned to the caller. */
  response: string;
  /** False when the turn ended in an apology instead of a reply. */
  ok: boolean;
  intent?: Intent;
  plan?: Plan;
  clarified: boolean;
  toolCalls: number;
  /** Steps visited, in order. */
  steps: TurnStep[];
  latencyMs: number;
}
