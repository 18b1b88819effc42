import pino from "pino";

// ── Structured Logger — pino ─────────────────────────────
// JSON output in production and under tests. Set LOG_PRETTY=true to force it.

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST;
const isPretty =
  process.env.LOG_PRETTY === "true" || (!isProduction && !isTest);

export const log = pino({
  level: process.env.LOG_LEVEL || "info",
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

export type Logger = typeof log;
