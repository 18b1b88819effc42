import { z } from "zod";

// ── Restaurant dataset — seed file shape ─────────────────

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const employeeSchema = z.object({
  employee_id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  phone: z.string(),
  position: z.string(),
  department: z.string(),
  hire_date: isoDate,
  tenure_months: z.number().int().nonnegative(),
  performance_rating: z.number().min(1).max(5),
  shift_type: z.enum(["morning", "afternoon", "evening", "night"]),
  status: z.enum(["active", "inactive", "on_leave"]).default("active"),
});

export const storageItemSchema = z.object({
  item_id: z.string(),
  item_name: z.string(),
  category: z.string(),
  storage_location: z.string(),
  current_stock: z.number().nonnegative(),
  minimum_stock: z.number().nonnegative(),
  unit: z.string(),
  cost_per_unit: z.number().nonnegative(),
  supplier: z.string(),
  expiry_date: isoDate.nullable().default(null),
});

export const recipeIngredientSchema = z.object({
  ingredient_name: z.string(),
  quantity: z.number().positive(),
  unit: z.string(),
  timing: z.enum(["prep", "start", "middle", "end", "garnish"]).default("prep"),
  notes: z.string().nullable().default(null),
});

export const recipeSchema = z.object({
  recipe_id: z.string(),
  dish_name: z.string(),
  category: z.string(),
  cuisine_type: z.string(),
  difficulty_level: z.number().int().min(1).max(5),
  prep_time_minutes: z.number().int().nonnegative(),
  cook_time_minutes: z.number().int().nonnegative(),
  serving_size: z.number().int().positive(),
  cost_per_serving: z.number().nonnegative(),
  instructions: z.array(z.string()).default([]),
  allergens: z.array(z.string()).default([]),
  ingredients: z.array(recipeIngredientSchema).default([]),
});

export const menuItemSchema = z.object({
  menu_item_id: z.string(),
  recipe_id: z.string().nullable().default(null),
  dish_name: z.string(),
  description: z.string(),
  category: z.string(),
  price: z.number().nonnegative(),
  status: z
    .enum(["available", "sold_out", "limited", "discontinued"])
    .default("available"),
  estimated_prep_time: z.number().int().nonnegative(),
  spicy_level: z.number().int().min(0).max(5).nullable().default(null),
  is_vegetarian: z.boolean().default(false),
  is_vegan: z.boolean().default(false),
  is_gluten_free: z.boolean().default(false),
  calories: z.number().int().nullable().default(null),
});

export const dailyMenuSchema = z.object({
  menu_id: z.string(),
  /** Omitted → the menu is served every day. */
  menu_date: isoDate.optional(),
  restaurant_location: z.string(),
  chef_recommendation: z.string().nullable().default(null),
  special_offers: z.array(z.string()).default([]),
  items: z.array(menuItemSchema),
});

export const seedSchema = z.object({
  employees: z.array(employeeSchema).default([]),
  storage_items: z.array(storageItemSchema).default([]),
  recipes: z.array(recipeSchema).default([]),
  daily_menus: z.array(dailyMenuSchema).default([]),
});

export type Employee = z.infer<typeof employeeSchema>;
export type StorageItem = z.infer<typeof storageItemSchema>;
export type Recipe = z.infer<typeof recipeSchema>;
export type RecipeIngredient = z.infer<typeof recipeIngredientSchema>;
export type MenuItem = z.infer<typeof menuItemSchema>;
export type DailyMenu = z.infer<typeof dailyMenuSchema>;
export type SeedData = z.infer<typeof seedSchema>;
/** Seed input before defaults are applied. */
export type SeedInput = z.input<typeof seedSchema>;
