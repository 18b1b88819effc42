import { z } from "zod";
import type { ToolDefinition } from "./registry.js";
import type { RestaurantDb } from "../data/restaurant-db.js";
import type { Recipe } from "../data/seed-schema.js";
import {
  OUTPUT_FORMAT_PARAM,
  capped,
  optNumber,
  optText,
  outputFormat,
  parseToolArgs,
  render,
} from "./args.js";

// ── Recipe Tools (internal only) ─────────────────────────

const recipeQueryArgs = z.object({
  dish_name_filter: optText,
  category_filter: optText,
  cuisine_filter: optText,
  max_prep_time: optNumber,
  difficulty_level: optNumber,
  limit: optNumber,
  output_format: outputFormat,
});

const recipeDetailArgs = z
  .object({
    recipe_id: optText,
    dish_name: optText,
    output_format: outputFormat,
  })
  .refine((a) => a.recipe_id !== undefined || a.dish_name !== undefined, {
    message: "recipe_id or dish_name is required",
  });

function recipeSummary(r: Recipe): string {
  return (
    `- ${r.dish_name} (${r.recipe_id}): ${r.category}, ${r.cuisine_type}, ` +
    `difficulty ${r.difficulty_level}/5, ${r.prep_time_minutes + r.cook_time_minutes} min total, ` +
    `$${r.cost_per_serving.toFixed(2)} per serving`
  );
}

function recipeDetail(r: Recipe): string {
  return [
    `${r.dish_name} (${r.recipe_id})`,
    `Category: ${r.category} | Cuisine: ${r.cuisine_type} | Difficulty: ${r.difficulty_level}/5`,
    `Prep ${r.prep_time_minutes} min, cook ${r.cook_time_minutes} min, serves ${r.serving_size}`,
    `Cost per serving: $${r.cost_per_serving.toFixed(2)}`,
    `Allergens: ${r.allergens.length ? r.allergens.join(", ") : "none listed"}`,
    "Ingredients:",
    ...r.ingredients.map(
      (i) =>
        `- ${i.quantity} ${i.unit} ${i.ingredient_name} (${i.timing})${i.notes ? `, ${i.notes}` : ""}`,
    ),
    "Instructions:",
    ...r.instructions.map((step, n) => `${n + 1}. ${step}`),
  ].join("\n");
}

export function createRecipeTools(db: RestaurantDb): ToolDefinition[] {
  const queryRecipes: ToolDefinition = {
    name: "query_recipes",
    description:
      "Search recipes by dish name, category, cuisine, maximum prep time or difficulty.",
    parameters: {
      type: "object",
      properties: {
        dish_name_filter: {
          type: "string",
          description: "Dish name (partial match).",
        },
        category_filter: {
          type: "string",
          description: "Food category (Main Course, Dessert, Salad, ...).",
        },
        cuisine_filter: { type: "string", description: "Cuisine type." },
        max_prep_time: {
          type: "number",
          description: "Maximum preparation time in minutes.",
        },
        difficulty_level: {
          type: "number",
          description: "Exact difficulty level (1-5).",
        },
        limit: { type: "number", description: "Maximum rows to return." },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: [],
    },
    personas: ["internal"],

    executeSync: (input) => {
      const args = parseToolArgs("query_recipes", recipeQueryArgs, input);
      const recipes = capped(
        db.queryRecipes({
          dishName: args.dish_name_filter,
          category: args.category_filter,
          cuisine: args.cuisine_filter,
          maxPrepTime: args.max_prep_time,
          difficulty: args.difficulty_level,
        }),
        args.limit,
      );
      const rows = recipes.map(({ ingredients: _ingredients, ...r }) => r);

      return render(args.output_format, { count: rows.length, recipes: rows }, () =>
        recipes.length === 0
          ? "No recipes found matching the criteria."
          : [`Found ${recipes.length} recipe(s):`, ...recipes.map(recipeSummary)].join("\n"),
      );
    },
  };

  const recipeDetails: ToolDefinition = {
    name: "get_recipe_details",
    description:
      "Full recipe for one dish: ingredients with quantities, instructions and allergens.",
    parameters: {
      type: "object",
      properties: {
        recipe_id: { type: "string", description: "Recipe identifier, e.g. REC001." },
        dish_name: {
          type: "string",
          description: "Dish name, used when the recipe id is unknown.",
        },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: [],
    },
    personas: ["internal"],

    executeSync: (input) => {
      const args = parseToolArgs("get_recipe_details", recipeDetailArgs, input);
      const recipe = db.getRecipe({
        recipeId: args.recipe_id,
        dishName: args.dish_name,
      });
      const wanted = args.recipe_id ?? args.dish_name ?? "";

      return render(args.output_format, { recipe }, () =>
        recipe ? recipeDetail(recipe) : `Recipe "${wanted}" not found.`,
      );
    },
  };

  return [queryRecipes, recipeDetails];
}
