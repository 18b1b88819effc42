#!/usr/bin/env node
import { existsSync } from "fs";
import readline from "readline/promises";
import { config } from "./config.js";
import { log } from "./logger.js";
import { OpenAIChatModel } from "./llm/client.js";
import { RestaurantDb } from "./data/restaurant-db.js";
import { openCheckpointStore } from "./memory/checkpoint-store.js";
import { openMemoryStore } from "./memory/store.js";
import { createToolRegistry } from "./tools/index.js";
import { ConversationPipeline } from "./agent/pipeline.js";
import { PERSONA_CONFIGS, isPersona, newThreadId } from "./agent/personas.js";
import type { Persona } from "./agent/types.js";

// ── CLI args ─────────────────────────────────────────────

function parseArgs(argv: string[]): { persona: Persona; threadId?: string } {
  let persona: Persona = "internal";
  let threadId: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === "--persona" && value !== undefined) {
      if (!isPersona(value)) {
        throw new Error(`Unknown persona "${value}" (expected internal or external)`);
      }
      persona = value;
      i++;
    } else if (arg === "--thread" && value !== undefined) {
      threadId = value;
      i++;
    }
  }
  return { persona, threadId };
}

const HELP = `Commands: /new starts a fresh conversation, /memories lists what I remember, quit exits.`;

// ── Main ─────────────────────────────────────────────────

async function main() {
  const { persona, threadId: requestedThread } = parseArgs(process.argv.slice(2));

  log.info(
    { model: config.llmModel, persona, suggestions: config.followUpSuggestions },
    "🍽️ Restaurant Desk starting",
  );

  const restaurant = new RestaurantDb(config.restaurantDbPath);
  if (existsSync(config.seedPath)) {
    restaurant.seedFromFileIfEmpty(config.seedPath);
  } else {
    log.warn({ seedPath: config.seedPath }, "⚠️ Seed file not found, dataset left as is");
  }

  const checkpoints = openCheckpointStore(config.checkpointDbPath);
  const memory = openMemoryStore(config.memoryDbPath);
  const tools = createToolRegistry(restaurant, memory);

  const pipeline = new ConversationPipeline({
    model: new OpenAIChatModel({
      apiKey: config.openAiApiKey,
      baseURL: config.openAiBaseUrl,
      model: config.llmModel,
      maxRetries: config.llmMaxRetries,
    }),
    tools,
    checkpoints,
    memory,
    options: {
      historyWindow: config.historyWindow,
      maxTurnSteps: config.maxTurnSteps,
      llmTimeoutMs: config.llmTimeoutMs,
      toolTimeoutMs: config.toolTimeoutMs,
      toolResultLogLimit: config.toolResultLogLimit,
      suggestions: config.followUpSuggestions,
      temperature: config.llmTemperature,
    },
  });

  let threadId = requestedThread ?? PERSONA_CONFIGS[persona].defaultThreadId;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  // Graceful shutdown
  let closed = false;
  const shutdown = () => {
    if (closed) return;
    closed = true;
    log.info("👋 Shutting down...");
    rl.close();
    checkpoints.close();
    memory.close();
    restaurant.close();
  };
  rl.on("SIGINT", shutdown);
  rl.on("close", shutdown);
  process.on("SIGTERM", shutdown);

  console.log(`\n${persona === "internal" ? "Staff" : "Guest"} chat (thread ${threadId}). ${HELP}\n`);

  try {
    while (!closed) {
      let text: string;
      try {
        text = (await rl.question("you › ")).trim();
      } catch (err) {
        // Closing the interface aborts the pending question
        if (closed) break;
        throw err;
      }
      if (!text) continue;

      if (["quit", "exit"].includes(text.toLowerCase())) break;

      if (text === "/new") {
        threadId = newThreadId(persona);
        console.log(`Started a new conversation (thread ${threadId}).\n`);
        continue;
      }

      if (text === "/memories") {
        const records = memory.list(threadId);
        console.log(
          records.length === 0
            ? "Nothing remembered yet.\n"
            : `${records.map((r) => `- ${r.content}`).join("\n")}\n`,
        );
        continue;
      }

      const reply = await pipeline.processTurn(text, threadId, persona);
      console.log(`\nassistant › ${reply}\n`);
    }
  } finally {
    shutdown();
  }
}

main().catch((error: unknown) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});
