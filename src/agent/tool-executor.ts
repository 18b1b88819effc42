import { withTimeout } from "../llm/retry.js";
import { log } from "../logger.js";
import type { ToolContext, ToolRegistry } from "../tools/registry.js";
import { ToolExecutionError } from "./errors.js";
import type { Plan } from "./types.js";

// ── Tool Executor ────────────────────────────────────────

/** Default timeout for tool execution (30 seconds) */
const TOOL_TIMEOUT_MS = 30_000;

export interface ToolExecutorOptions {
  timeoutMs?: number;
  /** Logged results are cut to this many characters. */
  logLimit?: number;
}

export interface ToolOutcome {
  /** Text handed to the Responder, an error description on failure. */
  result: string;
  ok: boolean;
}

export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}… [${text.length - limit} more chars]` : text;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "(no result)";
  return JSON.stringify(value);
}

export class ToolExecutor {
  private readonly timeoutMs: number;
  private readonly logLimit: number;

  constructor(
    private readonly registry: ToolRegistry,
    opts: ToolExecutorOptions = {},
  ) {
    this.timeoutMs = opts.timeoutMs ?? TOOL_TIMEOUT_MS;
    this.logLimit = opts.logLimit ?? 2000;
  }

  /** Run a plan. Never throws: failures come back as `ok: false` text. */
  async execute(plan: Plan, ctx: ToolContext): Promise<ToolOutcome> {
    const tool = this.registry.getFor(plan.tool, ctx.persona);
    if (!tool) {
      log.warn({ tool: plan.tool, persona: ctx.persona }, "⚠️ Tool not available");
      return {
        result: `Tool "${plan.tool}" is not available in this conversation.`,
        ok: false,
      };
    }

    log.info({ tool: plan.tool, args: plan.args }, "🔧 Tool call");
    const startTime = Date.now();

    try {
      const run = tool.execute
        ? tool.execute(plan.args, ctx)
        : Promise.resolve().then(() => tool.executeSync?.(plan.args, ctx));
      const result = stringify(
        await withTimeout(run, this.timeoutMs, `Tool "${plan.tool}"`),
      );

      log.info(
        {
          tool: plan.tool,
          latencyMs: Date.now() - startTime,
          result: truncate(result, this.logLimit),
        },
        "✅ Tool result",
      );
      return { result, ok: true };
    } catch (err) {
      const error = new ToolExecutionError(plan.tool, err);
      log.error({ tool: plan.tool, error: error.message }, "❌ Tool execution failed");
      return { result: `Error: ${error.message}`, ok: false };
    }
  }
}
