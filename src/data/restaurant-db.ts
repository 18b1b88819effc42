import { readFileSync } from "fs";
import { openDatabase, type SqliteDatabase } from "../db/sqlite.js";
import { log } from "../logger.js";
import {
  seedSchema,
  type DailyMenu,
  type Employee,
  type MenuItem,
  type Recipe,
  type RecipeIngredient,
  type SeedInput,
  type StorageItem,
} from "./seed-schema.js";

// ── Restaurant Dataset — SQLite ──────────────────────────

export interface EmployeeFilters {
  name?: string;
  position?: string;
  department?: string;
  shift?: string;
  status?: string;
  minPerformance?: number;
}

export interface EmployeeStats {
  total: number;
  averagePerformance: number;
  averageTenureMonths: number;
  highPerformers: number;
  lowPerformers: number;
  departments: { department: string; count: number; averageRating: number }[];
}

export interface InventoryFilters {
  itemName?: string;
  category?: string;
  location?: string;
  lowStockOnly?: boolean;
  expiredOnly?: boolean;
}

export type InventoryItem = StorageItem & { is_low_stock: boolean };

export interface RecipeFilters {
  dishName?: string;
  category?: string;
  cuisine?: string;
  maxPrepTime?: number;
  difficulty?: number;
}

export interface MenuFilters {
  date: string;
  location?: string;
  category?: string;
  priceRange?: { min: number; max: number };
  dietary?: string;
}

export type MenuHeader = Omit<DailyMenu, "items" | "menu_date"> & {
  menu_date: string;
};

export interface MenuListing {
  menu: MenuHeader;
  items: MenuItem[];
}

export interface MenuItemDetail {
  item: MenuItem;
  menu: MenuHeader;
  recipe: Recipe | null;
}

/** Today's date as YYYY-MM-DD (UTC), the default menu date. */
export function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}

/** Substring pattern for `LIKE ? ESCAPE '\'`; `%` and `_` in the value match literally. */
const like = (value: string) =>
  `%${value.toLowerCase().replace(/[\\%_]/g, "\\$&")}%`;

export class RestaurantDb {
  private readonly db: SqliteDatabase;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  isEmpty(): boolean {
    const row = this.db
      .prepare(
        `SELECT (SELECT COUNT(*) FROM employees) + (SELECT COUNT(*) FROM recipes)
              + (SELECT COUNT(*) FROM daily_menus) AS n`,
      )
      .get() as { n: number };
    return row.n === 0;
  }

  /** Insert a dataset in one transaction. Menus without a date are served every day. */
  seed(input: SeedInput): void {
    const data = seedSchema.parse(input);
    const insertEmployee = this.db.prepare(`
      INSERT INTO employees (employee_id, first_name, last_name, email, phone, position,
        department, hire_date, tenure_months, performance_rating, shift_type, status)
      VALUES (@employee_id, @first_name, @last_name, @email, @phone, @position,
        @department, @hire_date, @tenure_months, @performance_rating, @shift_type, @status)`);
    const insertItem = this.db.prepare(`
      INSERT INTO storage_items (item_id, item_name, category, storage_location, current_stock,
        minimum_stock, unit, cost_per_unit, supplier, expiry_date)
      VALUES (@item_id, @item_name, @category, @storage_location, @current_stock,
        @minimum_stock, @unit, @cost_per_unit, @supplier, @expiry_date)`);
    const insertRecipe = this.db.prepare(`
      INSERT INTO recipes (recipe_id, dish_name, category, cuisine_type, difficulty_level,
        prep_time_minutes, cook_time_minutes, serving_size, cost_per_serving, instructions, allergens)
      VALUES (@recipe_id, @dish_name, @category, @cuisine_type, @difficulty_level,
        @prep_time_minutes, @cook_time_minutes, @serving_size, @cost_per_serving, @instructions, @allergens)`);
    const insertIngredient = this.db.prepare(`
      INSERT INTO recipe_ingredients (recipe_id, ingredient_name, quantity, unit, timing, notes)
      VALUES (@recipe_id, @ingredient_name, @quantity, @unit, @timing, @notes)`);
    const insertMenu = this.db.prepare(`
      INSERT INTO daily_menus (menu_id, menu_date, restaurant_location, chef_recommendation, special_offers)
      VALUES (@menu_id, @menu_date, @restaurant_location, @chef_recommendation, @special_offers)`);
    const insertMenuItem = this.db.prepare(`
      INSERT INTO daily_menu_items (menu_item_id, menu_id, recipe_id, dish_name, description,
        category, price, status, estimated_prep_time, spicy_level, is_vegetarian, is_vegan,
        is_gluten_free, calories)
      VALUES (@menu_item_id, @menu_id, @recipe_id, @dish_name, @description,
        @category, @price, @status, @estimated_prep_time, @spicy_level, @is_vegetarian, @is_vegan,
        @is_gluten_free, @calories)`);

    this.db.transaction(() => {
      for (const e of data.employees) insertEmployee.run(e);
      for (const s of data.storage_items) insertItem.run(s);
      for (const r of data.recipes) {
        const { ingredients, ...recipe } = r;
        insertRecipe.run({
          ...recipe,
          instructions: JSON.stringify(recipe.instructions),
          allergens: JSON.stringify(recipe.allergens),
        });
        for (const ing of ingredients) {
          insertIngredient.run({ recipe_id: r.recipe_id, ...ing });
        }
      }
      for (const m of data.daily_menus) {
        const { items, ...menu } = m;
        insertMenu.run({
          ...menu,
          menu_date: menu.menu_date ?? null,
          special_offers: JSON.stringify(menu.special_offers),
        });
        for (const item of items) {
          insertMenuItem.run({
            ...item,
            menu_id: m.menu_id,
            is_vegetarian: item.is_vegetarian ? 1 : 0,
            is_vegan: item.is_vegan ? 1 : 0,
            is_gluten_free: item.is_gluten_free ? 1 : 0,
          });
        }
      }
    })();

    log.info(
      {
        employees: data.employees.length,
        storageItems: data.storage_items.length,
        recipes: data.recipes.length,
        menus: data.daily_menus.length,
      },
      "🌱 Restaurant dataset seeded",
    );
  }

  /** Seed from a JSON file when the database has no data yet. */
  seedFromFileIfEmpty(seedPath: string): void {
    if (!this.isEmpty()) return;
    const raw: unknown = JSON.parse(readFileSync(seedPath, "utf-8"));
    this.seed(seedSchema.parse(raw));
  }

  // ── Employees ──────────────────────────────────────────

  queryEmployees(filters: EmployeeFilters = {}): Employee[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filters.name) {
      where.push("(LOWER(first_name) LIKE ? ESCAPE '\\' OR LOWER(last_name) LIKE ? ESCAPE '\\')");
      params.push(like(filters.name), like(filters.name));
    }
    if (filters.position) {
      where.push("LOWER(position) LIKE ? ESCAPE '\\'");
      params.push(like(filters.position));
    }
    if (filters.department) {
      where.push("LOWER(department) LIKE ? ESCAPE '\\'");
      params.push(like(filters.department));
    }
    if (filters.shift) {
      where.push("shift_type = ?");
      params.push(filters.shift.toLowerCase());
    }
    if (filters.status) {
      where.push("status = ?");
      params.push(filters.status.toLowerCase());
    }
    if (filters.minPerformance !== undefined) {
      where.push("performance_rating >= ?");
      params.push(filters.minPerformance);
    }
    return this.db
      .prepare(
        `SELECT * FROM employees ${whereClause(where)} ORDER BY first_name, last_name`,
      )
      .all(...params) as Employee[];
  }

  employeeStats(department?: string): EmployeeStats | null {
    const employees = this.queryEmployees(department ? { department } : {});
    if (employees.length === 0) return null;

    const total = employees.length;
    const mean = (values: number[]) =>
      values.reduce((s, v) => s + v, 0) / values.length;

    const byDept = new Map<string, number[]>();
    for (const e of employees) {
      byDept.set(e.department, [
        ...(byDept.get(e.department) ?? []),
        e.performance_rating,
      ]);
    }

    return {
      total,
      averagePerformance: mean(employees.map((e) => e.performance_rating)),
      averageTenureMonths: mean(employees.map((e) => e.tenure_months)),
      highPerformers: employees.filter((e) => e.performance_rating >= 4).length,
      lowPerformers: employees.filter((e) => e.performance_rating < 3).length,
      departments: [...byDept.entries()].map(([dept, ratings]) => ({
        department: dept,
        count: ratings.length,
        averageRating: mean(ratings),
      })),
    };
  }

  // ── Inventory ──────────────────────────────────────────

  queryInventory(filters: InventoryFilters = {}, today = todayIso()): InventoryItem[] {
    const where: string[] = [];
    const params: string[] = [];
    if (filters.itemName) {
      where.push("LOWER(item_name) LIKE ? ESCAPE '\\'");
      params.push(like(filters.itemName));
    }
    if (filters.category) {
      where.push("LOWER(category) LIKE ? ESCAPE '\\'");
      params.push(like(filters.category));
    }
    if (filters.location) {
      where.push("LOWER(storage_location) LIKE ? ESCAPE '\\'");
      params.push(like(filters.location));
    }
    if (filters.lowStockOnly) {
      where.push("current_stock < minimum_stock");
    }
    if (filters.expiredOnly) {
      where.push("expiry_date IS NOT NULL AND expiry_date <= ?");
      params.push(today);
    }
    const rows = this.db
      .prepare(
        `SELECT * FROM storage_items ${whereClause(where)} ORDER BY item_name`,
      )
      .all(...params) as StorageItem[];
    return rows.map((row) => ({
      ...row,
      is_low_stock: row.current_stock < row.minimum_stock,
    }));
  }

  // ── Recipes ────────────────────────────────────────────

  queryRecipes(filters: RecipeFilters = {}): Recipe[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filters.dishName) {
      where.push("LOWER(dish_name) LIKE ? ESCAPE '\\'");
      params.push(like(filters.dishName));
    }
    if (filters.category) {
      where.push("LOWER(category) LIKE ? ESCAPE '\\'");
      params.push(like(filters.category));
    }
    if (filters.cuisine) {
      where.push("LOWER(cuisine_type) LIKE ? ESCAPE '\\'");
      params.push(like(filters.cuisine));
    }
    if (filters.maxPrepTime !== undefined) {
      where.push("prep_time_minutes <= ?");
      params.push(filters.maxPrepTime);
    }
    if (filters.difficulty !== undefined) {
      where.push("difficulty_level = ?");
      params.push(filters.difficulty);
    }
    const rows = this.db
      .prepare(`SELECT * FROM recipes ${whereClause(where)} ORDER BY dish_name`)
      .all(...params) as RecipeRow[];
    return rows.map((row) => this.toRecipe(row, false));
  }

  /** One recipe by id, else by (partial) dish name. */
  getRecipe(lookup: { recipeId?: string; dishName?: string }): Recipe | null {
    let row: RecipeRow | undefined;
    if (lookup.recipeId) {
      row = this.db
        .prepare("SELECT * FROM recipes WHERE recipe_id = ?")
        .get(lookup.recipeId) as RecipeRow | undefined;
    }
    if (!row && lookup.dishName) {
      row = this.db
        .prepare(
          "SELECT * FROM recipes WHERE LOWER(dish_name) LIKE ? ESCAPE '\\' ORDER BY LENGTH(dish_name) LIMIT 1",
        )
        .get(like(lookup.dishName)) as RecipeRow | undefined;
    }
    return row ? this.toRecipe(row, true) : null;
  }

  // ── Daily Menu ─────────────────────────────────────────

  queryMenu(filters: MenuFilters): MenuListing[] {
    const menuWhere = ["(menu_date = ? OR menu_date IS NULL)"];
    const menuParams: string[] = [filters.date];
    if (filters.location) {
      menuWhere.push("LOWER(restaurant_location) LIKE ? ESCAPE '\\'");
      menuParams.push(like(filters.location));
    }
    const menus = (
      this.db
        .prepare(
          `SELECT * FROM daily_menus ${whereClause(menuWhere)} ORDER BY restaurant_location`,
        )
        .all(...menuParams) as MenuRow[]
    ).map((row) => toMenuHeader(row, filters.date));

    const itemWhere = ["menu_id = ?"];
    const itemParams: (string | number)[] = [];
    if (filters.category) {
      itemWhere.push("LOWER(category) LIKE ? ESCAPE '\\'");
      itemParams.push(like(filters.category));
    }
    if (filters.priceRange) {
      itemWhere.push("price >= ? AND price <= ?");
      itemParams.push(filters.priceRange.min, filters.priceRange.max);
    }
    const dietary = filters.dietary?.toLowerCase() ?? "";
    if (dietary.includes("vegetarian")) itemWhere.push("is_vegetarian = 1");
    if (dietary.includes("vegan")) itemWhere.push("is_vegan = 1");
    if (/gluten[_ -]?free/.test(dietary)) itemWhere.push("is_gluten_free = 1");

    const selectItems = this.db.prepare(
      `SELECT * FROM daily_menu_items ${whereClause(itemWhere)} ORDER BY category, dish_name`,
    );
    return menus
      .map((menu) => ({
        menu,
        items: (selectItems.all(menu.menu_id, ...itemParams) as MenuItemRow[]).map(
          toMenuItem,
        ),
      }))
      .filter((listing) => listing.items.length > 0);
  }

  getMenuItem(dishName: string, date: string): MenuItemDetail | null {
    const row = this.db
      .prepare(
        `SELECT i.* FROM daily_menu_items i JOIN daily_menus m ON m.menu_id = i.menu_id
         WHERE (m.menu_date = ? OR m.menu_date IS NULL) AND LOWER(i.dish_name) LIKE ? ESCAPE '\\'
         ORDER BY LENGTH(i.dish_name), m.restaurant_location LIMIT 1`,
      )
      .get(date, like(dishName)) as MenuItemRow | undefined;
    if (!row) return null;

    const menu = this.db
      .prepare("SELECT * FROM daily_menus WHERE menu_id = ?")
      .get(row.menu_id) as MenuRow;
    return {
      item: toMenuItem(row),
      menu: toMenuHeader(menu, date),
      recipe: row.recipe_id ? this.getRecipe({ recipeId: row.recipe_id }) : null,
    };
  }

  // ── Internals ──────────────────────────────────────────

  private toRecipe(row: RecipeRow, withIngredients: boolean): Recipe {
    const ingredients = withIngredients
      ? (this.db
          .prepare(
            "SELECT ingredient_name, quantity, unit, timing, notes FROM recipe_ingredients WHERE recipe_id = ? ORDER BY id",
          )
          .all(row.recipe_id) as RecipeIngredient[])
      : [];
    return {
      ...row,
      instructions: parseStringList(row.instructions),
      allergens: parseStringList(row.allergens),
      ingredients,
    };
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS employees (
        employee_id         TEXT PRIMARY KEY,
        first_name          TEXT NOT NULL,
        last_name           TEXT NOT NULL,
        email               TEXT NOT NULL UNIQUE,
        phone               TEXT NOT NULL,
        position            TEXT NOT NULL,
        department          TEXT NOT NULL,
        hire_date           TEXT NOT NULL,
        tenure_months       INTEGER NOT NULL,
        performance_rating  REAL NOT NULL,
        shift_type          TEXT NOT NULL,
        status              TEXT NOT NULL DEFAULT 'active'
      );

      CREATE TABLE IF NOT EXISTS storage_items (
        item_id           TEXT PRIMARY KEY,
        item_name         TEXT NOT NULL,
        category          TEXT NOT NULL,
        storage_location  TEXT NOT NULL,
        current_stock     REAL NOT NULL,
        minimum_stock     REAL NOT NULL,
        unit              TEXT NOT NULL,
        cost_per_unit     REAL NOT NULL,
        supplier          TEXT NOT NULL,
        expiry_date       TEXT
      );

      CREATE TABLE IF NOT EXISTS recipes (
        recipe_id          TEXT PRIMARY KEY,
        dish_name          TEXT NOT NULL,
        category           TEXT NOT NULL,
        cuisine_type       TEXT NOT NULL,
        difficulty_level   INTEGER NOT NULL,
        prep_time_minutes  INTEGER NOT NULL,
        cook_time_minutes  INTEGER NOT NULL,
        serving_size       INTEGER NOT NULL,
        cost_per_serving   REAL NOT NULL,
        instructions       TEXT NOT NULL,
        allergens          TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS recipe_ingredients (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        recipe_id        TEXT NOT NULL REFERENCES recipes(recipe_id) ON DELETE CASCADE,
        ingredient_name  TEXT NOT NULL,
        quantity         REAL NOT NULL,
        unit             TEXT NOT NULL,
        timing           TEXT NOT NULL,
        notes            TEXT
      );

      CREATE TABLE IF NOT EXISTS daily_menus (
        menu_id              TEXT PRIMARY KEY,
        menu_date            TEXT,
        restaurant_location  TEXT NOT NULL,
        chef_recommendation  TEXT,
        special_offers       TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS daily_menu_items (
        menu_item_id         TEXT PRIMARY KEY,
        menu_id              TEXT NOT NULL REFERENCES daily_menus(menu_id) ON DELETE CASCADE,
        recipe_id            TEXT REFERENCES recipes(recipe_id),
        dish_name            TEXT NOT NULL,
        description          TEXT NOT NULL,
        category             TEXT NOT NULL,
        price                REAL NOT NULL,
        status               TEXT NOT NULL DEFAULT 'available',
        estimated_prep_time  INTEGER NOT NULL,
        spicy_level          INTEGER,
        is_vegetarian        INTEGER NOT NULL DEFAULT 0,
        is_vegan             INTEGER NOT NULL DEFAULT 0,
        is_gluten_free       INTEGER NOT NULL DEFAULT 0,
        calories             INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_menus_date ON daily_menus(menu_date);
      CREATE INDEX IF NOT EXISTS idx_menu_items_menu ON daily_menu_items(menu_id);
    `);
  }
}

// ── Row mapping ──────────────────────────────────────────

type RecipeRow = Omit<Recipe, "instructions" | "allergens" | "ingredients"> & {
  instructions: string;
  allergens: string;
};

interface MenuRow {
  menu_id: string;
  menu_date: string | null;
  restaurant_location: string;
  chef_recommendation: string | null;
  special_offers: string;
}

type MenuItemRow = Omit<
  MenuItem,
  "is_vegetarian" | "is_vegan" | "is_gluten_free"
> & {
  menu_id: string;
  is_vegetarian: number;
  is_vegan: number;
  is_gluten_free: number;
};

function whereClause(conditions: string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
}

function parseStringList(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed)
    ? parsed.filter((v): v is string => typeof v === "string")
    : [];
}

/** Undated menus take the date they were asked for. */
function toMenuHeader(row: MenuRow, date: string): MenuHeader {
  return {
    ...row,
    menu_date: row.menu_date ?? date,
    special_offers: parseStringList(row.special_offers),
  };
}

function toMenuItem(row: MenuItemRow): MenuItem {
  const { menu_id: _menuId, ...item } = row;
  return {
    ...item,
    is_vegetarian: row.is_vegetarian === 1,
    is_vegan: row.is_vegan === 1,
    is_gluten_free: row.is_gluten_free === 1,
  };
}
