import dotenv from "dotenv";
import { join } from "path";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    console.error(`❌ Missing required environment variable: ${key}`);
    console.error(`   Copy .env.example to .env and fill in your values.`);
    process.exit(1);
  }
  return value;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(process.env[key] || "", 10);
  return isNaN(parsed) ? fallback : parsed;
}

/** "0", "off", "no" and "false" switch a flag off; anything else (or unset) keeps the default. */
function flagEnv(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return !["0", "off", "no", "false"].includes(raw.trim().toLowerCase());
}

function optionalFloatEnv(key: string): number | undefined {
  const parsed = parseFloat(process.env[key] || "");
  return isNaN(parsed) ? undefined : parsed;
}

const dataDir = process.env.DATA_DIR || "data";

// ── Config ───────────────────────────────────────────────

export const config = {
  openAiApiKey: requireEnv("OPENAI_API_KEY"),
  openAiBaseUrl: process.env.OPENAI_BASE_URL || undefined,

  llmModel: process.env.LLM_MODEL || "gpt-4.1-mini",
  // Overrides the per-persona temperature when set
  llmTemperature: optionalFloatEnv("AI_TEMPERATURE"),
  llmTimeoutMs: intEnv("LLM_TIMEOUT_MS", 30_000),
  llmMaxRetries: intEnv("LLM_MAX_RETRIES", 2),
  followUpSuggestions: flagEnv("AI_SUGGESTIONS", true),

  // ── Storage ───────────────────────────────────────────
  dataDir,
  checkpointDbPath:
    process.env.CHECKPOINT_DB_PATH || join(dataDir, "agent_memory.sqlite"),
  memoryDbPath: process.env.MEMORY_DB_PATH || join(dataDir, "memories.sqlite"),
  restaurantDbPath:
    process.env.RESTAURANT_DB_PATH || join(dataDir, "restaurant.sqlite"),
  seedPath: process.env.SEED_PATH || join(dataDir, "seed.json"),

  // ── Pipeline ──────────────────────────────────────────
  historyWindow: intEnv("HISTORY_WINDOW", 20),
  maxTurnSteps: intEnv("MAX_TURN_STEPS", 12),
  toolTimeoutMs: intEnv("TOOL_TIMEOUT_MS", 30_000),
  toolResultLogLimit: intEnv("TOOL_RESULT_LOG_LIMIT", 2000),
} as const;

// ── Validation ───────────────────────────────────────────

if (config.historyWindow < 1) {
  console.error("❌ HISTORY_WINDOW must be at least 1.");
  process.exit(1);
}
