import type { Plan, ToolArgs } from "./types.js";

// ── Plan argument rules shared by the salvage step and clarification ──

/** Tools that describe a single dish, with the id field each accepts. */
export const DISH_DETAIL_TOOLS: Readonly<Record<string, { idField?: string }>> = {
  get_recipe_details: { idField: "recipe_id" },
  get_menu_item_details: {},
};

export const MENU_QUERY_TOOL = "query_daily_menu";

/** A menu query with none of these would list everything. */
export const MENU_FILTER_FIELDS = [
  "menu_date",
  "location",
  "category_filter",
  "price_range",
  "dietary_restrictions",
] as const;

export function hasArg(args: ToolArgs, field: string): boolean {
  const value = args[field];
  if (value === undefined || value === null) return false;
  return typeof value !== "string" || value.trim() !== "";
}

/** A dish-detail plan that names neither an id nor a dish. */
export function lacksDishReference(plan: Plan): boolean {
  const rule = DISH_DETAIL_TOOLS[plan.tool];
  if (!rule) return false;
  if (rule.idField && hasArg(plan.args, rule.idField)) return false;
  return !hasArg(plan.args, "dish_name");
}
