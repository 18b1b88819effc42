import { describe, it, expect } from "vitest";
import {
  NO_SUGGESTIONS_DIRECTIVE,
  buildResponderMessages,
  generateReply,
} from "../src/agent/responder.js";
import { transcript } from "../src/agent/history.js";
import { ScriptedModel } from "./helpers/scripted-model.js";

describe("buildResponderMessages", () => {
  it("orders persona, profile, summary, history, message and lookup", () => {
    const messages = buildResponderMessages({
      systemPrompt: "You are the host.",
      memoryNote: "Known profile for this conversation:\n- Name: Sam",
      summary: "Sam asked about desserts.",
      history: [
        { role: "user", content: "Any desserts?", timestamp: 1 },
        { role: "tool", name: "query_daily_menu", content: '{"count":2}', timestamp: 2 },
        { role: "assistant", content: "Tiramisu and brownies.", timestamp: 3 },
      ],
      userText: "Is the tiramisu vegetarian?",
      toolResult: '{"detail":null}',
      toolName: "get_menu_item_details",
      suggestions: false,
    });

    expect(messages).toEqual([
      { role: "system", content: "You are the host." },
      { role: "system", content: "Known profile for this conversation:\n- Name: Sam" },
      { role: "system", content: "Summary of the conversation so far:\nSam asked about desserts." },
      { role: "user", content: "Any desserts?" },
      { role: "system", content: 'Tool result (query_daily_menu):\n{"count":2}' },
      { role: "assistant", content: "Tiramisu and brownies." },
      { role: "user", content: "Is the tiramisu vegetarian?" },
      {
        role: "system",
        content:
          "Result of get_menu_item_details for the user's message. Answer from it; if it reports an error, say the information could not be retrieved.\n" +
          '{"detail":null}',
      },
      { role: "system", content: NO_SUGGESTIONS_DIRECTIVE },
    ]);
  });

  it("leaves out what is absent", () => {
    expect(
      buildResponderMessages({
        systemPrompt: "You are the host.",
        history: [],
        userText: "hello",
        suggestions: true,
      }),
    ).toEqual([
      { role: "system", content: "You are the host." },
      { role: "user", content: "hello" },
    ]);
  });
});

describe("generateReply", () => {
  it("returns the model text verbatim at the given temperature", async () => {
    const model = new ScriptedModel({ responder: "  Welcome back!\n" });

    const reply = await generateReply(
      { model, timeoutMs: 1000, temperature: 0.3 },
      { systemPrompt: "You are the host.", history: [], userText: "hi", suggestions: true },
    );

    expect(reply).toBe("  Welcome back!\n");
    expect(model.calls[0]?.opts).toEqual({ temperature: 0.3 });
  });
});

describe("transcript", () => {
  it("keeps only user and assistant turns", () => {
    expect(
      transcript([
        { role: "user", content: "Any desserts?", timestamp: 1 },
        { role: "tool", name: "query_daily_menu", content: "{}", timestamp: 2 },
        { role: "assistant", content: "Tiramisu.", timestamp: 3 },
      ]),
    ).toBe("User: Any desserts?\nAssistant: Tiramisu.");
  });
});
