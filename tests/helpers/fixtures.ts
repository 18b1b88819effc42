import { readFileSync } from "fs";
import { RestaurantDb } from "../../src/data/restaurant-db.js";
import { seedSchema, type SeedData } from "../../src/data/seed-schema.js";

export const TODAY = "2026-03-14";

export function loadSeed(): SeedData {
  const raw = readFileSync(new URL("../../data/seed.json", import.meta.url), "utf-8");
  return seedSchema.parse(JSON.parse(raw));
}

/** In-memory dataset. Seed menus are undated, so they are served on TODAY too. */
export function seededDb(): RestaurantDb {
  const db = new RestaurantDb(":memory:");
  db.seed(loadSeed());
  return db;
}
