import { z } from "zod";
import type { ToolDefinition } from "./registry.js";
import {
  todayIso,
  type MenuListing,
  type RestaurantDb,
} from "../data/restaurant-db.js";
import type { MenuItem } from "../data/seed-schema.js";
import {
  OUTPUT_FORMAT_PARAM,
  optDate,
  optText,
  outputFormat,
  parseToolArgs,
  render,
} from "./args.js";

// ── Daily Menu Tools (both personas) ─────────────────────

const PRICE_RANGE_RE = /^\$?(\d+(?:\.\d+)?)\s*-\s*\$?(\d+(?:\.\d+)?)$/;

/** "10-20" or "$10-$20" → bounds. */
export function parsePriceRange(
  raw: string,
): { min: number; max: number } | null {
  const match = PRICE_RANGE_RE.exec(raw.trim());
  if (!match?.[1] || !match[2]) return null;
  const a = Number(match[1]);
  const b = Number(match[2]);
  return { min: Math.min(a, b), max: Math.max(a, b) };
}

const priceRange = optText.transform((v, ctx) => {
  if (v === undefined) return undefined;
  const range = parsePriceRange(v);
  if (!range) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expected a price range like "10-20"',
    });
    return z.NEVER;
  }
  return range;
});

const menuArgs = z.object({
  menu_date: optDate,
  location: optText,
  category_filter: optText,
  price_range: priceRange,
  dietary_restrictions: optText,
  output_format: outputFormat,
});

const menuItemArgs = z.object({
  dish_name: optText.refine((v) => v !== undefined, "dish_name is required"),
  menu_date: optDate,
  output_format: outputFormat,
});

function dietaryTags(item: MenuItem): string[] {
  return [
    item.is_vegan ? "vegan" : "",
    item.is_vegetarian ? "vegetarian" : "",
    item.is_gluten_free ? "gluten-free" : "",
    item.spicy_level ? `spicy ${item.spicy_level}/5` : "",
  ].filter(Boolean);
}

function itemLine(item: MenuItem): string {
  const tags = dietaryTags(item);
  const status = item.status === "available" ? "" : ` (${item.status.replace("_", " ")})`;
  return (
    `- ${item.dish_name}: $${item.price.toFixed(2)}${status}, ${item.description}` +
    (tags.length ? ` [${tags.join(", ")}]` : "")
  );
}

function listingText(listing: MenuListing): string {
  const { menu, items } = listing;
  return [
    `${menu.restaurant_location} (${menu.menu_date})`,
    ...(menu.chef_recommendation
      ? [`Chef's recommendation: ${menu.chef_recommendation}`]
      : []),
    ...menu.special_offers.map((offer) => `Special: ${offer}`),
    ...items.map(itemLine),
  ].join("\n");
}

export function createMenuTools(
  db: RestaurantDb,
  today: () => string = todayIso,
): ToolDefinition[] {
  const queryDailyMenu: ToolDefinition = {
    name: "query_daily_menu",
    description:
      "Dishes on the daily menu, filterable by date, restaurant location, category, price range and dietary needs.",
    parameters: {
      type: "object",
      properties: {
        menu_date: {
          type: "string",
          description: "Date in YYYY-MM-DD format. Defaults to today.",
        },
        location: {
          type: "string",
          description: "Restaurant location or branch (partial match).",
        },
        category_filter: {
          type: "string",
          description: "Menu category (Main Course, Dessert, Salad, ...).",
        },
        price_range: {
          type: "string",
          description: 'Price range like "10-20" for $10-$20.',
        },
        dietary_restrictions: {
          type: "string",
          description: "vegetarian, vegan or gluten_free.",
        },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: [],
    },
    personas: ["internal", "external"],

    executeSync: (input) => {
      const args = parseToolArgs("query_daily_menu", menuArgs, input);
      const date = args.menu_date ?? today();
      const listings = db.queryMenu({
        date,
        location: args.location,
        category: args.category_filter,
        priceRange: args.price_range,
        dietary: args.dietary_restrictions,
      });

      return render(
        args.output_format,
        { menu_date: date, locations: listings.length, menus: listings },
        () =>
          listings.length === 0
            ? `No menu items found for ${date} matching the criteria.`
            : listings.map(listingText).join("\n\n"),
      );
    },
  };

  const menuItemDetails: ToolDefinition = {
    name: "get_menu_item_details",
    description:
      "Everything about one dish on the menu: price, availability, dietary info, allergens and ingredients.",
    parameters: {
      type: "object",
      properties: {
        dish_name: { type: "string", description: "Name of the dish." },
        menu_date: {
          type: "string",
          description: "Date in YYYY-MM-DD format. Defaults to today.",
        },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: ["dish_name"],
    },
    personas: ["internal", "external"],

    executeSync: (input) => {
      const args = parseToolArgs("get_menu_item_details", menuItemArgs, input);
      const dishName = args.dish_name ?? "";
      const date = args.menu_date ?? today();
      const detail = db.getMenuItem(dishName, date);

      return render(args.output_format, { menu_date: date, detail }, () => {
        if (!detail) return `"${dishName}" is not on the menu for ${date}.`;
        const { item, menu, recipe } = detail;
        return [
          `${item.dish_name} at ${menu.restaurant_location} (${date})`,
          itemLine(item),
          `Category: ${item.category} | Prep time: ${item.estimated_prep_time} min` +
            (item.calories !== null ? ` | ${item.calories} kcal` : ""),
          ...(recipe
            ? [
                `Allergens: ${recipe.allergens.length ? recipe.allergens.join(", ") : "none listed"}`,
                `Ingredients: ${recipe.ingredients.map((i) => i.ingredient_name).join(", ")}`,
              ]
            : []),
        ].join("\n");
      });
    },
  };

  return [queryDailyMenu, menuItemDetails];
}
