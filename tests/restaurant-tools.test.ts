import { describe, it, expect, beforeEach } from "vitest";
import { parsePriceRange } from "../src/tools/menu.js";
import { createToolRegistry } from "../src/tools/index.js";
import { ToolExecutor } from "../src/agent/tool-executor.js";
import { InMemoryMemoryStore } from "../src/memory/store.js";
import { RestaurantDb } from "../src/data/restaurant-db.js";
import type { ToolArgs } from "../src/agent/types.js";
import type { ToolContext } from "../src/tools/registry.js";
import { TODAY, loadSeed, seededDb } from "./helpers/fixtures.js";

let db: RestaurantDb;

beforeEach(() => {
  db = seededDb();
});

describe("RestaurantDb", () => {
  // ── Employees ──────────────────────────────────────────

  it("filters employees by department, ordered by name", () => {
    expect(db.queryEmployees({ department: "kitchen" }).map((e) => e.first_name)).toEqual([
      "Aiko",
      "Daniel",
      "James",
      "Maria",
      "Priya",
    ]);
  });

  it("computes performance statistics", () => {
    const stats = db.employeeStats("Kitchen");
    expect(stats?.total).toBe(5);
    expect(stats?.highPerformers).toBe(3);
    expect(stats?.lowPerformers).toBe(1);
    expect(stats?.averagePerformance).toBeCloseTo(3.92, 5);
    expect(db.employeeStats("Marketing")).toBeNull();
  });

  // ── Inventory ──────────────────────────────────────────

  it("flags low stock and expired items", () => {
    expect(db.queryInventory({ lowStockOnly: true }, TODAY).map((i) => i.item_name)).toEqual([
      "Arborio Rice",
      "Chicken Breast",
      "Eggs",
      "Mascarpone",
      "Porcini Mushrooms",
    ]);
    expect(db.queryInventory({ expiredOnly: true }, TODAY).map((i) => i.item_name)).toEqual([
      "Mascarpone",
    ]);
    expect(db.queryInventory({ itemName: "guanciale" }, TODAY)[0]?.is_low_stock).toBe(false);
  });

  // ── Recipes ────────────────────────────────────────────

  it("looks up a recipe by id or partial name", () => {
    const byName = db.getRecipe({ dishName: "tiramisu" });
    expect(byName?.recipe_id).toBe("REC003");
    expect(byName?.ingredients.map((i) => i.ingredient_name)).toEqual(["Mascarpone", "Eggs"]);
    expect(db.getRecipe({ recipeId: "REC001" })?.allergens).toEqual(["gluten", "eggs", "dairy"]);
    expect(db.getRecipe({ dishName: "lasagne" })).toBeNull();
  });

  // ── Daily menu ─────────────────────────────────────────

  it("filters the menu by dietary restriction", () => {
    const listings = db.queryMenu({ date: TODAY, dietary: "vegan" });
    expect(
      listings.map((l) => [l.menu.restaurant_location, l.items.map((i) => i.dish_name)]),
    ).toEqual([
      ["Airport Terminal", ["Spicy Chickpea Wrap"]],
      ["Westside Shopping Center", ["Roasted Vegetable Bowl"]],
    ]);
  });

  it("filters the menu by price range", () => {
    const listings = db.queryMenu({ date: TODAY, priceRange: { min: 10, max: 20 } });
    expect(listings.map((l) => l.items.map((i) => i.dish_name))).toEqual([
      ["Spicy Chickpea Wrap", "Caesar Salad"],
      ["Spaghetti Carbonara", "Caesar Salad"],
      ["Roasted Vegetable Bowl"],
    ]);
  });

  it("serves undated menus on every day", () => {
    const nextDay = db.queryMenu({ date: "2026-03-15", location: "Downtown" });
    expect(nextDay.map((l) => [l.menu.menu_date, l.items.length])).toEqual([["2026-03-15", 4]]);
    expect(db.getMenuItem("tiramisu", "2026-04-01")?.menu.menu_date).toBe("2026-04-01");
  });

  it("serves a dated menu only on its date", () => {
    const seed = loadSeed();
    const downtown = seed.daily_menus.find((m) => m.menu_id === "MENU-DT");
    const popUp = new RestaurantDb(":memory:");
    popUp.seed({
      daily_menus: [
        {
          menu_id: "MENU-POP",
          menu_date: "2026-03-20",
          restaurant_location: "Harbour Pop-up",
          items: downtown?.items ?? [],
        },
      ],
    });

    expect(popUp.queryMenu({ date: TODAY })).toEqual([]);
    expect(
      popUp.queryMenu({ date: "2026-03-20" }).map((l) => [l.menu.restaurant_location, l.items.length]),
    ).toEqual([["Harbour Pop-up", 4]]);
  });

  it("matches % and _ in filters literally", () => {
    expect(db.queryEmployees({ name: "%" })).toEqual([]);
    expect(db.queryInventory({ itemName: "_" }, TODAY)).toEqual([]);
    expect(db.queryMenu({ date: TODAY, location: "%" })).toEqual([]);
    expect(db.getRecipe({ dishName: "%" })).toBeNull();
  });

  it("finds a menu item with its recipe", () => {
    const detail = db.getMenuItem("brownie", TODAY);
    expect(detail?.menu.restaurant_location).toBe("Airport Terminal");
    expect(detail?.item.price).toBe(7.5);
    expect(detail?.item.is_vegetarian).toBe(true);
    expect(detail?.recipe?.recipe_id).toBe("REC006");
  });

  it("seeds only once", () => {
    expect(db.isEmpty()).toBe(false);
  });
});

describe("parsePriceRange", () => {
  it("parses plain and dollar ranges", () => {
    expect(parsePriceRange("10-20")).toEqual({ min: 10, max: 20 });
    expect(parsePriceRange("$20 - $12.5")).toEqual({ min: 12.5, max: 20 });
    expect(parsePriceRange("cheap")).toBeNull();
  });
});

// ── Tools through the executor ───────────────────────────

describe("restaurant tools", () => {
  const internal: ToolContext = { threadId: "t1", persona: "internal" };

  function run(tool: string, args: ToolArgs, ctx: ToolContext = internal) {
    const memory = new InMemoryMemoryStore();
    const executor = new ToolExecutor(createToolRegistry(db, memory, () => TODAY));
    return executor.execute({ tool, args }, ctx);
  }

  it("registers the full set for staff and the menu tools for guests", () => {
    const registry = createToolRegistry(db, new InMemoryMemoryStore(), () => TODAY);
    expect(registry.namesFor("internal")).toEqual([
      "query_employees",
      "get_employee_performance_stats",
      "query_storage_inventory",
      "get_low_stock_alerts",
      "query_recipes",
      "get_recipe_details",
      "query_daily_menu",
      "get_menu_item_details",
      "save_memory",
      "list_memories",
      "search_memory",
      "delete_memory",
    ]);
    expect(registry.namesFor("external")).toEqual([
      "query_daily_menu",
      "get_menu_item_details",
      "save_memory",
      "list_memories",
      "search_memory",
      "delete_memory",
    ]);
  });

  it("returns structured JSON by default", async () => {
    const outcome = await run("query_employees", { name_filter: "maria" });
    const payload: unknown = JSON.parse(outcome.result);
    expect(payload).toMatchObject({ count: 1, employees: [{ employee_id: "EMP001" }] });
  });

  it("renders text on request", async () => {
    const outcome = await run("get_menu_item_details", {
      dish_name: "tiramisu",
      output_format: "text",
    });
    expect(outcome.result).toBe(
      [
        "Tiramisu at Downtown Main Street (2026-03-14)",
        "- Tiramisu: $8.50, Espresso-soaked ladyfingers and mascarpone. [vegetarian]",
        "Category: Dessert | Prep time: 5 min | 450 kcal",
        "Allergens: eggs, dairy, gluten",
        "Ingredients: Mascarpone, Eggs",
      ].join("\n"),
    );
  });

  it("lists low stock alerts", async () => {
    const outcome = await run("get_low_stock_alerts", { output_format: "text" });
    expect(outcome.result.split("\n").slice(0, 2)).toEqual([
      "Items needing restock: 5",
      "- Arborio Rice: 6 kg (minimum 10), order from Pasta Mills",
    ]);
  });

  it("accepts numbers written as strings", async () => {
    const outcome = await run("query_recipes", { max_prep_time: "10", category_filter: "main" });
    const payload: unknown = JSON.parse(outcome.result);
    expect(payload).toMatchObject({
      count: 2,
      recipes: [{ dish_name: "Grilled Salmon" }, { dish_name: "Spaghetti Carbonara" }],
    });
  });

  it("reports invalid arguments as a tool error", async () => {
    const outcome = await run("query_daily_menu", { price_range: "cheap" });
    expect(outcome).toEqual({
      result:
        'Error: Tool "query_daily_menu" failed: Invalid arguments for query_daily_menu: price_range: expected a price range like "10-20"',
      ok: false,
    });
  });

  it("keeps staff tools away from guests", async () => {
    const outcome = await run("query_employees", {}, { threadId: "t1", persona: "external" });
    expect(outcome.ok).toBe(false);
  });
});

describe("memory tools", () => {
  it("save, list, search and delete within the calling thread", async () => {
    const memory = new InMemoryMemoryStore();
    const executor = new ToolExecutor(createToolRegistry(db, memory, () => TODAY));
    const guest = { threadId: "guest-1", persona: "external" as const };

    const saved = await executor.execute(
      {
        tool: "save_memory",
        args: { content: "preference:window seat", tags: "seating, preference", importance: 9 },
      },
      guest,
    );
    const [record] = memory.list("guest-1");
    expect(saved.result).toBe(`Saved memory ${record?.id}.`);
    expect(record?.importance).toBe(5);
    expect(record?.source).toBe("tool");

    expect((await executor.execute({ tool: "list_memories", args: {} }, guest)).result).toBe(
      `- (${record?.id}) preference:window seat [seating, preference] importance 5`,
    );
    expect(
      (await executor.execute({ tool: "list_memories", args: {} }, { ...guest, threadId: "guest-2" }))
        .result,
    ).toBe("No memories stored for this conversation.");
    expect(
      (await executor.execute({ tool: "search_memory", args: { query: "booth" } }, guest)).result,
    ).toBe('No memories match "booth".');

    const deleted = await executor.execute(
      { tool: "delete_memory", args: { memory_id: record?.id ?? "" } },
      guest,
    );
    expect(deleted.result).toBe(`Deleted memory ${record?.id}.`);
    expect(memory.list("guest-1")).toEqual([]);
  });
});
