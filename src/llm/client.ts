import OpenAI from "openai";
import { withRetry, withTimeout } from "./retry.js";
import { ModelCallError } from "../agent/errors.js";
import { log } from "../logger.js";

// ── Language-model collaborator ──────────────────────────

export interface ModelMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a JSON object response where it supports one. */
  jsonMode?: boolean;
}

/** Ordered role-tagged messages in, one assistant text out. */
export interface ChatModel {
  complete(messages: ModelMessage[], opts?: CompletionOptions): Promise<string>;
}

export interface OpenAIChatModelOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  maxRetries?: number;
}

/** ChatModel over any OpenAI-compatible chat completions endpoint. */
export class OpenAIChatModel implements ChatModel {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxRetries: number;

  constructor(opts: OpenAIChatModelOptions) {
    // Retries are ours (withRetry), not the SDK's
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      maxRetries: 0,
    });
    this.model = opts.model;
    this.maxRetries = opts.maxRetries ?? 2;
  }

  async complete(
    messages: ModelMessage[],
    opts: CompletionOptions = {},
  ): Promise<string> {
    const startTime = Date.now();
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          messages: messages.map(toOpenAIMessage),
          max_tokens: opts.maxTokens ?? 1024,
          ...(opts.temperature !== undefined
            ? { temperature: opts.temperature }
            : {}),
          ...(opts.jsonMode
            ? { response_format: { type: "json_object" as const } }
            : {}),
        }),
      { label: `LLM (${this.model})`, maxRetries: this.maxRetries },
    );

    log.debug(
      {
        model: this.model,
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
        latencyMs: Date.now() - startTime,
      },
      "📞 LLM call",
    );

    const content = response.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new Error("No response content from LLM");
    }
    return content;
  }
}

function toOpenAIMessage(
  message: ModelMessage,
): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export interface ModelCallOptions extends CompletionOptions {
  /** Pipeline stage name, used in logs and errors. */
  stage: string;
  timeoutMs: number;
}

/**
 * One bounded model call on behalf of a pipeline stage.
 * Any failure (backend error, timeout) surfaces as a ModelCallError.
 */
export async function callModel(
  model: ChatModel,
  messages: ModelMessage[],
  opts: ModelCallOptions,
): Promise<string> {
  const { stage, timeoutMs, ...completion } = opts;
  try {
    return await withTimeout(
      model.complete(messages, completion),
      timeoutMs,
      `${stage} model call`,
    );
  } catch (err) {
    throw new ModelCallError(stage, err);
  }
}
