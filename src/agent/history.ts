import type { ModelMessage } from "../llm/client.js";
import type { ChatMessage } from "./types.js";

// ── Conversation history helpers ─────────────────────────

/** The last `size` messages, oldest first. */
export function windowMessages(
  messages: readonly ChatMessage[],
  size: number,
): ChatMessage[] {
  return size > 0 ? messages.slice(-size) : [];
}

/** Tool output goes to the model as system content. */
export function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case "tool":
      return {
        role: "system",
        content: `Tool result${message.name ? ` (${message.name})` : ""}:\n${message.content}`,
      };
    default:
      return { role: message.role, content: message.content };
  }
}

export function toModelMessages(messages: readonly ChatMessage[]): ModelMessage[] {
  return messages.map(toModelMessage);
}

/** "User: …" / "Assistant: …" transcript lines, tool output left out. */
export function transcript(messages: readonly ChatMessage[]): string {
  return messages
    .filter((m) => m.role === "user" || m.role === "assistant")
    .map((m) => `${m.role === "user" ? "User" : "Assistant"}: ${m.content}`)
    .join("\n");
}
