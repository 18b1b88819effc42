import { z } from "zod";
import type { ToolArgs } from "../agent/types.js";

// ── Tool argument parsing — zod ──────────────────────────
// Planner args are flat scalars written by a model: numbers may arrive as
// strings, flags as "true", and empty strings mean "not given".

export const optText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return undefined;
    const text = String(v).trim();
    return text === "" ? undefined : text;
  });

export const optNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v, ctx) => {
    if (v === null || v === undefined || v === "") return undefined;
    const n = typeof v === "number" ? v : Number(v.trim());
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a number" });
      return z.NEVER;
    }
    return n;
  });

export const optFlag = z
  .union([z.boolean(), z.string(), z.number()])
  .nullish()
  .transform((v) =>
    typeof v === "string"
      ? ["true", "yes", "1"].includes(v.trim().toLowerCase())
      : v === true || v === 1,
  );

export type OutputFormat = "structured" | "text";

export const outputFormat = z
  .string()
  .nullish()
  .transform((v): OutputFormat =>
    v?.trim().toLowerCase() === "text" ? "text" : "structured",
  );

export const OUTPUT_FORMAT_PARAM = {
  type: "string",
  enum: ["structured", "text"],
  description: 'Result format. Defaults to "structured" (JSON).',
};

export const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export const optDate = optText.refine(
  (v) => v === undefined || DATE_RE.test(v),
  "expected a date in YYYY-MM-DD format",
);

export class ToolArgumentError extends Error {
  constructor(tool: string, issues: string) {
    super(`Invalid arguments for ${tool}: ${issues}`);
    this.name = "ToolArgumentError";
  }
}

export function parseToolArgs<T extends z.ZodTypeAny>(
  tool: string,
  schema: T,
  input: ToolArgs,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ToolArgumentError(tool, issues);
  }
  return result.data;
}

/** JSON for structured output, the text rendering otherwise. */
export function render(
  format: OutputFormat,
  payload: unknown,
  asText: () => string,
): string {
  return format === "structured" ? JSON.stringify(payload) : asText();
}

/** Applies an optional result cap. */
export function capped<T>(rows: T[], limit: number | undefined): T[] {
  return limit !== undefined && limit > 0 ? rows.slice(0, limit) : rows;
}
