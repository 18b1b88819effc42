import { describe, it, expect } from "vitest";
import {
  ConversationPipeline,
  nextStep,
  type PipelineOptions,
} from "../src/agent/pipeline.js";
import { NO_SUGGESTIONS_DIRECTIVE } from "../src/agent/responder.js";
import { PERSONA_CONFIGS } from "../src/agent/personas.js";
import { createToolRegistry } from "../src/tools/index.js";
import { InMemoryMemoryStore } from "../src/memory/store.js";
import { InMemoryCheckpointStore } from "../src/memory/checkpoint-store.js";
import type { TurnState } from "../src/agent/types.js";
import { ScriptedModel, type StageName, type StageReply } from "./helpers/scripted-model.js";
import { TODAY, seededDb } from "./helpers/fixtures.js";

function setup(
  script: Partial<Record<StageName, StageReply>>,
  options: Partial<PipelineOptions> = {},
) {
  const model = new ScriptedModel(script);
  const memory = new InMemoryMemoryStore();
  const checkpoints = new InMemoryCheckpointStore();
  const tools = createToolRegistry(seededDb(), memory, () => TODAY);
  const pipeline = new ConversationPipeline({
    model,
    tools,
    checkpoints,
    memory,
    options: { today: () => TODAY, ...options },
  });
  return { model, memory, checkpoints, tools, pipeline };
}

const CHAT = {
  classifier: "conversational",
  responder: "Happy to help.",
  summarizer: "Small talk.",
} satisfies Partial<Record<StageName, StageReply>>;

describe("nextStep", () => {
  const state = (patch: Partial<TurnState>): TurnState => ({
    threadId: "t",
    persona: "internal",
    messages: [],
    askedFields: new Set(),
    ...patch,
  });

  it("routes on intent, plan and clarification", () => {
    expect(nextStep("START", state({}))).toBe("DETECT_INTENT");
    expect(nextStep("DETECT_INTENT", state({ intent: "conversational" }))).toBe("RESPOND");
    expect(nextStep("DETECT_INTENT", state({ intent: "db_query" }))).toBe("PLAN");
    expect(nextStep("PLAN", state({}))).toBe("RESPOND");
    const plan = { tool: "query_daily_menu", args: {} };
    expect(nextStep("PLAN", state({ plan }))).toBe("EXEC");
    expect(nextStep("PLAN", state({ plan, clarifyQuestion: "Which one?" }))).toBe("CLARIFY");
    expect(nextStep("CLARIFY", state({}))).toBe("SUMMARIZE");
    expect(nextStep("EXEC", state({}))).toBe("RESPOND");
    expect(nextStep("RESPOND", state({}))).toBe("SUMMARIZE");
    expect(nextStep("SUMMARIZE", state({}))).toBe("END");
  });
});

describe("ConversationPipeline", () => {
  // ── Lookups ────────────────────────────────────────────

  it("answers a staff menu question from a lookup", async () => {
    const { pipeline, model, checkpoints } = setup({
      classifier: "db_query",
      planner: '{"tool": "query_daily_menu", "args": {"location": "Downtown"}}',
      responder: "Downtown has carbonara, risotto, tiramisu and a Caesar salad.",
      summarizer: "Staff asked for the Downtown menu.",
    });

    const result = await pipeline.run("What's on today's menu at Downtown?", "staff-1", "internal");

    expect(result.ok).toBe(true);
    expect(result.response).toBe("Downtown has carbonara, risotto, tiramisu and a Caesar salad.");
    expect(result.steps).toEqual(["START", "DETECT_INTENT", "PLAN", "EXEC", "RESPOND", "SUMMARIZE"]);
    expect(result.plan).toEqual({
      tool: "query_daily_menu",
      args: { location: "Downtown", output_format: "structured" },
    });
    expect(result.toolCalls).toBe(1);

    const saved = checkpoints.get("staff-1");
    expect(saved?.summary).toBe("Staff asked for the Downtown menu.");
    expect(saved?.messages.map((m) => m.role)).toEqual(["user", "tool", "assistant"]);
    const toolMessage = saved?.messages[1];
    expect(toolMessage?.name).toBe("query_daily_menu");
    expect(toolMessage?.content).toContain('"restaurant_location":"Downtown Main Street"');
    expect(toolMessage?.content).toContain('"dish_name":"Spaghetti Carbonara"');

    const [respond] = model.callsFor("responder");
    expect(respond?.messages).toHaveLength(3);
    expect(respond?.messages[1]).toEqual({
      role: "user",
      content: "What's on today's menu at Downtown?",
    });
    expect(respond?.messages[2]?.content.startsWith(
      "Result of query_daily_menu for the user's message.",
    )).toBe(true);
  });

  it("lists desserts for a guest across every location", async () => {
    const { pipeline, checkpoints } = setup({
      classifier: "db_query",
      planner: '{"tool": "query_daily_menu", "args": {"category_filter": "dessert"}}',
      responder: "We have Tiramisu and a Chocolate Brownie.",
      summarizer: "Guest asked about desserts.",
    });

    const result = await pipeline.run("What desserts do you have?", "guest-1", "external");

    expect(result.ok).toBe(true);
    const content = checkpoints.get("guest-1")?.messages[1]?.content ?? "";
    const payload: unknown = JSON.parse(content);
    expect(payload).toMatchObject({
      menu_date: TODAY,
      locations: 3,
      menus: [
        { menu: { restaurant_location: "Airport Terminal" }, items: [{ dish_name: "Chocolate Brownie" }] },
        { menu: { restaurant_location: "Downtown Main Street" }, items: [{ dish_name: "Tiramisu" }] },
        { menu: { restaurant_location: "Westside Shopping Center" }, items: [{ dish_name: "Chocolate Brownie" }] },
      ],
    });
  });

  it("fills a missing dish name from the message", async () => {
    const { pipeline, checkpoints } = setup({
      classifier: "db_query",
      planner: '{"tool": "get_recipe_details", "args": {}}',
      responder: "Tiramisu takes mascarpone and eggs.",
      summarizer: "Staff asked for the tiramisu recipe.",
    });

    const result = await pipeline.run("Show me the recipe for the tiramisu", "staff-1", "internal");

    expect(result.plan).toEqual({
      tool: "get_recipe_details",
      args: { output_format: "structured", dish_name: "tiramisu" },
    });
    expect(result.clarified).toBe(false);
    expect(checkpoints.get("staff-1")?.messages[1]?.content).toContain('"recipe_id":"REC003"');
  });

  // ── Clarification ──────────────────────────────────────

  it("asks which dish instead of running an incomplete lookup", async () => {
    const { pipeline, model, checkpoints } = setup({
      classifier: "db_query",
      planner: '{"tool": "get_recipe_details", "args": {}}',
      summarizer: "Staff asked for recipe details without naming a dish.",
    });

    const result = await pipeline.run("Show me the recipe details", "staff-1", "internal");

    expect(result.ok).toBe(true);
    expect(result.response).toBe(
      "Which dish do you mean? Give me the dish name or recipe id and I'll pull it up.",
    );
    expect(result.steps).toEqual(["START", "DETECT_INTENT", "PLAN", "CLARIFY", "SUMMARIZE"]);
    expect(result.clarified).toBe(true);
    expect(result.toolCalls).toBe(0);
    expect(model.callsFor("responder")).toHaveLength(0);
    expect(checkpoints.get("staff-1")?.messages.map((m) => m.content)).toEqual([
      "Show me the recipe details",
      "Which dish do you mean? Give me the dish name or recipe id and I'll pull it up.",
    ]);
    expect(checkpoints.get("staff-1")?.summary).toBe(
      "Staff asked for recipe details without naming a dish.",
    );
  });

  // ── Memory ─────────────────────────────────────────────

  it("carries a stated name into later turns", async () => {
    const { pipeline, model, memory } = setup({
      classifier: "conversational",
      responder: "Nice to meet you!",
      summarizer: "Guest introduced themselves as Sam.",
    });

    await pipeline.run("Hi, my name is Sam", "guest-1", "external");
    await pipeline.run("What do you recommend?", "guest-1", "external");

    const second = model.callsFor("responder")[1];
    expect(second?.messages.map((m) => m.content)).toEqual([
      PERSONA_CONFIGS.external.systemPrompt,
      "Known profile for this conversation:\n- Name: Sam",
      "Summary of the conversation so far:\nGuest introduced themselves as Sam.",
      "Hi, my name is Sam",
      "Nice to meet you!",
      "What do you recommend?",
    ]);
    expect(memory.list("guest-1").map((m) => m.content)).toEqual(["user_name:Sam"]);
  });

  it("stores a repeated name once", async () => {
    const { pipeline, memory } = setup(CHAT);

    await pipeline.run("My name is Sam", "guest-1", "external");
    await pipeline.run("my name is sam", "guest-1", "external");
    await pipeline.run("My name is what?", "guest-1", "external");

    expect(memory.list("guest-1").map((m) => m.content)).toEqual(["user_name:Sam"]);
  });

  it("keeps memories per thread", async () => {
    const { pipeline, memory } = setup(CHAT);

    await pipeline.run("I'm allergic to peanuts", "guest-1", "external");

    expect(memory.list("guest-1").map((m) => m.content)).toEqual(["allergy:peanuts"]);
    expect(memory.list("guest-2")).toEqual([]);
  });

  // ── Failures ───────────────────────────────────────────

  it("answers from a failed lookup without failing the turn", async () => {
    const { pipeline, tools, checkpoints, model } = setup({
      classifier: "db_query",
      planner: '{"tool": "query_daily_menu", "args": {"location": "Westside"}}',
      responder: "Sorry, I couldn't load the menu just now.",
      summarizer: "Menu lookup failed.",
    });
    tools.register({
      name: "query_daily_menu",
      description: "Daily menu.",
      parameters: { type: "object", properties: {}, required: [] },
      personas: ["internal", "external"],
      executeSync: () => {
        throw new Error("database is locked");
      },
    });

    const result = await pipeline.run("Menu at Westside?", "guest-1", "external");

    expect(result.ok).toBe(true);
    expect(result.response).toBe("Sorry, I couldn't load the menu just now.");
    const saved = checkpoints.get("guest-1");
    expect(saved?.messages[1]?.content).toBe(
      'Error: Tool "query_daily_menu" failed: database is locked',
    );
    expect(saved?.summary).toBe("Menu lookup failed.");
    expect(model.callsFor("responder")[0]?.messages.at(-1)?.content).toBe(
      "Result of query_daily_menu for the user's message. Answer from it; if it reports an error, say the information could not be retrieved.\n" +
        'Error: Tool "query_daily_menu" failed: database is locked',
    );
  });

  it("falls back to a conversational answer when classification fails", async () => {
    const { pipeline, model } = setup({
      responder: "Hello!",
      summarizer: "Greeting.",
    });

    const result = await pipeline.run("hello", "guest-1", "external");

    expect(result.ok).toBe(true);
    expect(result.intent).toBe("conversational");
    expect(result.steps).toEqual(["START", "DETECT_INTENT", "RESPOND", "SUMMARIZE"]);
    expect(model.callsFor("planner")).toHaveLength(0);
  });

  it("answers without a lookup when the plan is unusable", async () => {
    const { pipeline } = setup({
      classifier: "db_query",
      planner: "I am not sure which tool fits.",
      responder: "Could you tell me a bit more?",
      summarizer: "Unclear request.",
    });

    const result = await pipeline.run("stuff?", "staff-1", "internal");

    expect(result.ok).toBe(true);
    expect(result.plan).toBeUndefined();
    expect(result.toolCalls).toBe(0);
    expect(result.steps).toEqual(["START", "DETECT_INTENT", "PLAN", "RESPOND", "SUMMARIZE"]);
  });

  it("never runs staff tools for guests", async () => {
    const { pipeline, checkpoints } = setup({
      classifier: "db_query",
      planner: '{"tool": "query_employees", "args": {"department_filter": "Kitchen"}}',
      responder: "I can only help with our menu.",
      summarizer: "Guest asked about staff.",
    });

    const result = await pipeline.run("Who works in the kitchen?", "guest-1", "external");

    expect(result.plan).toBeUndefined();
    expect(result.toolCalls).toBe(0);
    expect(checkpoints.get("guest-1")?.messages.map((m) => m.role)).toEqual(["user", "assistant"]);
  });

  it("refuses a turn from the other persona on a staff thread", async () => {
    const { pipeline, model, memory, checkpoints } = setup({
      classifier: "db_query",
      planner: '{"tool": "query_employees", "args": {"department_filter": "Kitchen"}}',
      responder: "Five people work in the kitchen.",
      summarizer: "Staff asked about the kitchen team.",
    });
    await pipeline.run("Who works in the kitchen?", "shared", "internal");
    const callsBefore = model.calls.length;

    const result = await pipeline.run("My name is Sam, who works here?", "shared", "external");

    expect(result).toMatchObject({
      ok: false,
      toolCalls: 0,
      response:
        "⚠️ Sorry, this conversation was started in the other chat. Please start a new conversation.",
    });
    expect(model.calls).toHaveLength(callsBefore);
    expect(memory.list("shared")).toEqual([]);
    const saved = checkpoints.get("shared");
    expect(saved?.persona).toBe("internal");
    expect(saved?.messages.map((m) => m.role)).toEqual(["user", "tool", "assistant"]);
  });

  it("adopts a thread saved without a persona", async () => {
    const { pipeline, checkpoints } = setup(CHAT);
    checkpoints.put("legacy", {
      messages: [{ role: "user", content: "hi", timestamp: 1 }],
    });

    const result = await pipeline.run("hello again", "legacy", "external");

    expect(result.ok).toBe(true);
    expect(checkpoints.get("legacy")?.persona).toBe("external");
  });

  it("apologises and keeps the checkpoint when the responder fails", async () => {
    const { pipeline, checkpoints } = setup({ classifier: "conversational" });

    const result = await pipeline.run("hello", "guest-1", "external");

    expect(result).toMatchObject({
      ok: false,
      response: "⚠️ Sorry, something went wrong while answering. Please try again.",
    });
    expect(checkpoints.get("guest-1")).toBeNull();
  });

  it("stops at the step ceiling", async () => {
    const { pipeline, checkpoints, model } = setup(
      {
        classifier: "db_query",
        planner: '{"tool": "query_daily_menu", "args": {"location": "Downtown"}}',
        responder: "unused",
        summarizer: "unused",
      },
      { maxTurnSteps: 3 },
    );

    const result = await pipeline.run("Menu at Downtown?", "staff-1", "internal");

    expect(result.ok).toBe(false);
    expect(result.response).toBe(
      "⚠️ Sorry, that request hit my processing limit. Could you ask it in a simpler way?",
    );
    expect(result.steps).toEqual(["START", "DETECT_INTENT", "PLAN"]);
    expect(result.toolCalls).toBe(0);
    expect(model.callsFor("responder")).toHaveLength(0);
    expect(checkpoints.get("staff-1")).toBeNull();
  });

  it("keeps the summary when the summarizer fails", async () => {
    const { pipeline, checkpoints } = setup({ classifier: "conversational", responder: "Hi!" });

    const result = await pipeline.run("hello", "guest-1", "external");

    expect(result.ok).toBe(true);
    expect(checkpoints.get("guest-1")?.summary).toBeUndefined();
  });

  // ── History ────────────────────────────────────────────

  it("windows the stored history", async () => {
    const { pipeline, model, checkpoints } = setup(CHAT);

    for (let n = 1; n <= 15; n++) {
      await pipeline.run(`hello ${n}`, "guest-1", "external");
    }

    const saved = checkpoints.get("guest-1");
    expect(saved?.messages).toHaveLength(20);
    expect(saved?.messages[0]?.content).toBe("hello 6");
    expect(saved?.messages.at(-1)?.content).toBe("Happy to help.");
    // system prompt + summary + 20 history messages + the new message
    expect(model.callsFor("responder").at(-1)?.messages).toHaveLength(23);
  });

  it("serializes concurrent turns on one thread", async () => {
    const { pipeline, model, checkpoints } = setup(CHAT);

    const [first, second] = await Promise.all([
      pipeline.run("first", "guest-1", "external"),
      pipeline.run("second", "guest-1", "external"),
    ]);

    expect(first.ok && second.ok).toBe(true);
    expect(checkpoints.get("guest-1")?.messages.map((m) => m.content)).toEqual([
      "first",
      "Happy to help.",
      "second",
      "Happy to help.",
    ]);
    const secondCall = model.callsFor("responder")[1];
    expect(secondCall?.messages.map((m) => m.content).slice(-3)).toEqual([
      "first",
      "Happy to help.",
      "second",
    ]);
  });

  // ── Persona settings ───────────────────────────────────

  it("uses each persona's temperature unless overridden", async () => {
    const staff = setup(CHAT);
    await staff.pipeline.run("hi", "a", "internal");
    await staff.pipeline.run("hi", "b", "external");
    expect(staff.model.callsFor("responder").map((c) => c.opts.temperature)).toEqual([0.1, 0.3]);

    const fixed = setup(CHAT, { temperature: 0.7 });
    await fixed.pipeline.run("hi", "a", "external");
    expect(fixed.model.callsFor("responder")[0]?.opts.temperature).toBe(0.7);
  });

  it("ends with the no-suggestions directive when suggestions are off", async () => {
    const { pipeline, model } = setup(CHAT, { suggestions: false });

    await pipeline.run("hi", "guest-1", "external");

    expect(model.callsFor("responder")[0]?.messages.at(-1)).toEqual({
      role: "system",
      content: NO_SUGGESTIONS_DIRECTIVE,
    });
  });

  it("defaults to the persona's thread", async () => {
    const { pipeline, checkpoints } = setup(CHAT);

    const reply = await pipeline.processTurn("hi", undefined, "external");

    expect(reply).toBe("Happy to help.");
    expect(checkpoints.get("customer_session")?.messages).toHaveLength(2);
    expect(checkpoints.get("internal_staff_session")).toBeNull();
  });
});
