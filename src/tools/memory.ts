import { z } from "zod";
import type { ToolDefinition } from "./registry.js";
import type { MemoryStore } from "../memory/store.js";
import type { MemoryRecord } from "../memory/types.js";
import { optNumber, optText, parseToolArgs } from "./args.js";

// ── Memory Tools — scoped to the calling thread ──────────

const saveArgs = z.object({
  content: optText.refine((v) => v !== undefined, "content is required"),
  tags: optText,
  importance: optNumber,
});

const listArgs = z.object({ limit: optNumber });

const searchArgs = z.object({
  query: optText.refine((v) => v !== undefined, "query is required"),
  limit: optNumber,
});

const deleteArgs = z.object({
  memory_id: optText.refine((v) => v !== undefined, "memory_id is required"),
});

function memoryLine(m: MemoryRecord): string {
  const tags = m.tags.length ? ` [${m.tags.join(", ")}]` : "";
  return `- (${m.id}) ${m.content}${tags} importance ${m.importance}`;
}

export function createMemoryTools(store: MemoryStore): ToolDefinition[] {
  const saveMemory: ToolDefinition = {
    name: "save_memory",
    description:
      'Store a fact about this guest or conversation as "key:value", e.g. "preference:spicy food".',
    parameters: {
      type: "object",
      properties: {
        content: { type: "string", description: "The fact to remember." },
        tags: { type: "string", description: "Comma-separated tags." },
        importance: { type: "number", description: "1 (low) to 5 (critical)." },
      },
      required: ["content"],
    },
    personas: ["internal", "external"],

    executeSync: (input, ctx) => {
      const args = parseToolArgs("save_memory", saveArgs, input);
      const tags = (args.tags ?? "")
        .split(",")
        .map((t) => t.trim())
        .filter(Boolean);
      const id = store.add(ctx.threadId, {
        content: args.content ?? "",
        tags,
        importance: args.importance,
        source: "tool",
      });
      return id ? `Saved memory ${id}.` : "Could not save the memory right now.";
    },
  };

  const listMemories: ToolDefinition = {
    name: "list_memories",
    description: "List the facts remembered for this conversation, newest first.",
    parameters: {
      type: "object",
      properties: {
        limit: { type: "number", description: "Maximum facts to return." },
      },
      required: [],
    },
    personas: ["internal", "external"],

    executeSync: (input, ctx) => {
      const args = parseToolArgs("list_memories", listArgs, input);
      const memories = store.list(ctx.threadId, args.limit);
      return memories.length === 0
        ? "No memories stored for this conversation."
        : memories.map(memoryLine).join("\n");
    },
  };

  const searchMemory: ToolDefinition = {
    name: "search_memory",
    description: "Find remembered facts containing the given text.",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "Text to look for." },
        limit: { type: "number", description: "Maximum facts to return." },
      },
      required: ["query"],
    },
    personas: ["internal", "external"],

    executeSync: (input, ctx) => {
      const args = parseToolArgs("search_memory", searchArgs, input);
      const query = args.query ?? "";
      const memories = store.search(ctx.threadId, query, args.limit);
      return memories.length === 0
        ? `No memories match "${query}".`
        : memories.map(memoryLine).join("\n");
    },
  };

  const deleteMemory: ToolDefinition = {
    name: "delete_memory",
    description: "Forget one remembered fact by its id.",
    parameters: {
      type: "object",
      properties: {
        memory_id: { type: "string", description: "Id shown by list_memories." },
      },
      required: ["memory_id"],
    },
    personas: ["internal", "external"],

    executeSync: (input, ctx) => {
      const args = parseToolArgs("delete_memory", deleteArgs, input);
      const id = args.memory_id ?? "";
      return store.delete(ctx.threadId, id)
        ? `Deleted memory ${id}.`
        : `Memory ${id} not found.`;
    },
  };

  return [saveMemory, listMemories, searchMemory, deleteMemory];
}
