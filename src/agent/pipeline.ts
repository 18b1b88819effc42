import type { ChatModel } from "../llm/client.js";
import { log, type Logger } from "../logger.js";
import type { CheckpointStore } from "../memory/checkpoint-store.js";
import { MemoryManager } from "../memory/manager.js";
import type { MemoryStore } from "../memory/store.js";
import type { ToolRegistry } from "../tools/registry.js";
import { todayIso } from "../data/restaurant-db.js";
import { classifyIntent, type StageModel } from "./classifier.js";
import { clarificationFor } from "./clarification.js";
import {
  PersonaMismatchError,
  StepLimitExceededError,
  buildUserErrorMessage,
  describeError,
} from "./errors.js";
import { windowMessages } from "./history.js";
import { PERSONA_CONFIGS, type PersonaConfig } from "./personas.js";
import { planToolCall } from "./planner.js";
import { generateReply } from "./responder.js";
import { updateSummary } from "./summarizer.js";
import { ThreadLock } from "./thread-lock.js";
import { ToolExecutor } from "./tool-executor.js";
import type {
  ChatMessage,
  Persona,
  TurnResult,
  TurnState,
  TurnStep,
} from "./types.js";

// ── Conversation Pipeline — per-turn state machine ───────
//
//   START → DETECT_INTENT → PLAN → CLARIFY → SUMMARIZE → END
//                 │           │ ↘
//                 │           │   EXEC → RESPOND → SUMMARIZE
//                 └───────────┴──────────↗ (conversational / no plan)

export interface PipelineOptions {
  /** Messages kept in the checkpoint and reloaded each turn. */
  historyWindow: number;
  maxTurnSteps: number;
  llmTimeoutMs: number;
  toolTimeoutMs: number;
  toolResultLogLimit: number;
  /** Follow-up suggestions in replies. */
  suggestions: boolean;
  /** Overrides every persona's temperature when set. */
  temperature?: number;
  /** Default menu date and planner context. */
  today: () => string;
  personas: Record<Persona, PersonaConfig>;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  historyWindow: 20,
  maxTurnSteps: 12,
  llmTimeoutMs: 30_000,
  toolTimeoutMs: 30_000,
  toolResultLogLimit: 2000,
  suggestions: true,
  today: todayIso,
  personas: PERSONA_CONFIGS,
};

export interface PipelineDeps {
  model: ChatModel;
  tools: ToolRegistry;
  checkpoints: CheckpointStore;
  memory: MemoryStore;
  options?: Partial<PipelineOptions>;
}

/** Edges of the turn state machine. */
export function nextStep(step: TurnStep, state: TurnState): TurnStep {
  switch (step) {
    case "START":
      return "DETECT_INTENT";
    case "DETECT_INTENT":
      return state.intent === "db_query" ? "PLAN" : "RESPOND";
    case "PLAN":
      if (!state.plan) return "RESPOND";
      return state.clarifyQuestion ? "CLARIFY" : "EXEC";
    case "CLARIFY":
      return "SUMMARIZE";
    case "EXEC":
      return "RESPOND";
    case "RESPOND":
      return "SUMMARIZE";
    case "SUMMARIZE":
    case "END":
      return "END";
  }
}

/** Per-turn bookkeeping that never reaches the checkpoint. */
interface TurnContext {
  state: TurnState;
  userText: string;
  /** History as loaded, before this turn's messages. */
  history: ChatMessage[];
  persona: PersonaConfig;
  log: Logger;
  toolCalls: number;
}

export class ConversationPipeline {
  private readonly opts: PipelineOptions;
  private readonly memories: MemoryManager;
  private readonly executor: ToolExecutor;
  private readonly stage: StageModel;
  private readonly lock = new ThreadLock();

  constructor(private readonly deps: PipelineDeps) {
    this.opts = { ...DEFAULT_PIPELINE_OPTIONS, ...deps.options };
    this.memories = new MemoryManager(deps.memory);
    this.executor = new ToolExecutor(deps.tools, {
      timeoutMs: this.opts.toolTimeoutMs,
      logLimit: this.opts.toolResultLogLimit,
    });
    this.stage = { model: deps.model, timeoutMs: this.opts.llmTimeoutMs };
  }

  /** Reply text for one user message. Never throws. */
  async processTurn(
    text: string,
    threadId: string | undefined,
    persona: Persona,
  ): Promise<string> {
    const result = await this.run(
      text,
      threadId ?? this.opts.personas[persona].defaultThreadId,
      persona,
    );
    return result.response;
  }

  /**
   * Run one turn. Turns on the same thread are serialized. Failures end in
   * an apology (`ok: false`) and leave the checkpoint untouched, as does a
   * turn for a thread that another persona started.
   */
  async run(text: string, threadId: string, persona: Persona): Promise<TurnResult> {
    return this.lock.run(threadId, () => this.runTurn(text, threadId, persona));
  }

  private async runTurn(
    text: string,
    threadId: string,
    persona: Persona,
  ): Promise<TurnResult> {
    const startTime = Date.now();
    const turnLog = log.child({ persona, threadId });
    const steps: TurnStep[] = [];

    const checkpoint = this.deps.checkpoints.get(threadId);
    // A thread keeps the persona it was started with
    if (checkpoint?.persona && checkpoint.persona !== persona) {
      const err = new PersonaMismatchError(threadId, checkpoint.persona, persona);
      turnLog.warn({ owner: checkpoint.persona }, "🚫 Turn refused, thread belongs to the other persona");
      return {
        response: buildUserErrorMessage(err),
        ok: false,
        clarified: false,
        toolCalls: 0,
        steps,
        latencyMs: Date.now() - startTime,
      };
    }
    const history = windowMessages(checkpoint?.messages ?? [], this.opts.historyWindow);

    this.memories.rememberFrom(threadId, text, "user");

    const state: TurnState = {
      threadId,
      persona,
      messages: [...history, { role: "user", content: text, timestamp: Date.now() }],
      summary: checkpoint?.summary,
      memoryNote: this.memories.buildNote(threadId) || undefined,
      askedFields: new Set(),
    };
    const ctx: TurnContext = {
      state,
      userText: text,
      history,
      persona: this.opts.personas[persona],
      log: turnLog,
      toolCalls: 0,
    };

    turnLog.info({ chars: text.length, history: history.length }, "📨 Turn started");

    try {
      let step: TurnStep = "START";
      while (step !== "END") {
        if (steps.length >= this.opts.maxTurnSteps) {
          throw new StepLimitExceededError(steps.length);
        }
        steps.push(step);
        await this.runStep(step, ctx);
        step = nextStep(step, state);
      }
    } catch (err) {
      turnLog.error({ error: describeError(err), steps }, "❌ Turn failed");
      return {
        response: buildUserErrorMessage(err),
        ok: false,
        intent: state.intent,
        plan: state.plan,
        clarified: false,
        toolCalls: ctx.toolCalls,
        steps,
        latencyMs: Date.now() - startTime,
      };
    }

    const reply = state.reply ?? "";
    this.deps.checkpoints.put(threadId, {
      persona,
      messages: windowMessages(state.messages, this.opts.historyWindow),
      summary: state.summary,
    });
    this.memories.rememberFrom(threadId, reply, "assistant");

    const result: TurnResult = {
      response: reply,
      ok: true,
      intent: state.intent,
      plan: state.plan,
      clarified: state.clarifyQuestion !== undefined,
      toolCalls: ctx.toolCalls,
      steps,
      latencyMs: Date.now() - startTime,
    };
    turnLog.info(
      {
        intent: result.intent,
        tool: result.plan?.tool,
        clarified: result.clarified,
        steps: steps.length,
        latencyMs: result.latencyMs,
      },
      "✅ Turn complete",
    );
    return result;
  }

  // ── Nodes ──────────────────────────────────────────────

  private async runStep(step: TurnStep, ctx: TurnContext): Promise<void> {
    switch (step) {
      case "START":
      case "END":
        return;
      case "DETECT_INTENT":
        return this.detectIntent(ctx);
      case "PLAN":
        return this.plan(ctx);
      case "CLARIFY":
        return this.clarify(ctx);
      case "EXEC":
        return this.exec(ctx);
      case "RESPOND":
        return this.respond(ctx);
      case "SUMMARIZE":
        return this.summarize(ctx);
    }
  }

  private async detectIntent(ctx: TurnContext): Promise<void> {
    const { state } = ctx;
    try {
      state.intent = await classifyIntent(this.stage, {
        persona: state.persona,
        text: ctx.userText,
        history: ctx.history,
      });
    } catch (err) {
      ctx.log.warn({ error: describeError(err) }, "⚠️ Intent detection failed, answering conversationally");
      state.intent = "conversational";
    }
    ctx.log.debug({ intent: state.intent }, "🧭 Intent");
  }

  private async plan(ctx: TurnContext): Promise<void> {
    const { state } = ctx;
    try {
      const plan = await planToolCall(this.stage, {
        text: ctx.userText,
        history: ctx.history,
        summary: state.summary,
        whitelist: this.deps.tools.namesFor(state.persona),
        toolCatalogue: this.deps.tools.describeFor(state.persona),
        today: this.opts.today(),
      });
      state.plan = plan ?? undefined;
    } catch (err) {
      ctx.log.warn({ error: describeError(err) }, "⚠️ Planning failed, answering conversationally");
      state.plan = undefined;
    }

    const clarification = clarificationFor(state.plan, state.persona, state.askedFields);
    if (clarification) {
      state.askedFields.add(clarification.field);
      state.clarifyQuestion = clarification.question;
    }
    ctx.log.debug({ plan: state.plan, clarify: clarification?.field }, "🗺️ Plan");
  }

  private async clarify(ctx: TurnContext): Promise<void> {
    const { state } = ctx;
    const question = state.clarifyQuestion ?? "";
    state.reply = question;
    state.messages.push({ role: "assistant", content: question, timestamp: Date.now() });
    ctx.log.info({ field: [...state.askedFields] }, "❓ Clarifying question");
  }

  private async exec(ctx: TurnContext): Promise<void> {
    const { state } = ctx;
    if (!state.plan) return;
    const outcome = await this.executor.execute(state.plan, {
      threadId: state.threadId,
      persona: state.persona,
    });
    ctx.toolCalls++;
    state.toolResult = outcome.result;
    state.messages.push({
      role: "tool",
      name: state.plan.tool,
      content: outcome.result,
      timestamp: Date.now(),
    });
  }

  private async respond(ctx: TurnContext): Promise<void> {
    const { state } = ctx;
    const reply = await generateReply(
      {
        ...this.stage,
        temperature: this.opts.temperature ?? ctx.persona.temperature,
      },
      {
        systemPrompt: ctx.persona.systemPrompt,
        memoryNote: state.memoryNote,
        summary: state.summary,
        history: ctx.history,
        userText: ctx.userText,
        toolResult: state.toolResult,
        toolName: state.plan?.tool,
        suggestions: this.opts.suggestions,
      },
    );
    state.reply = reply;
    state.messages.push({ role: "assistant", content: reply, timestamp: Date.now() });
  }

  private async summarize(ctx: TurnContext): Promise<void> {
    const { state } = ctx;
    state.summary = await updateSummary(this.stage, {
      previous: state.summary,
      userText: ctx.userText,
      assistantText: state.reply ?? "",
    });
  }
}
