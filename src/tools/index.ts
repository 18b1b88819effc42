import { ToolRegistry } from "./registry.js";
import { createEmployeeTools } from "./employees.js";
import { createInventoryTools } from "./inventory.js";
import { createRecipeTools } from "./recipes.js";
import { createMenuTools } from "./menu.js";
import { createMemoryTools } from "./memory.js";
import { todayIso, type RestaurantDb } from "../data/restaurant-db.js";
import type { MemoryStore } from "../memory/store.js";
import { log } from "../logger.js";

/** Every capability, each tagged with the personas allowed to use it. */
export function createToolRegistry(
  db: RestaurantDb,
  memoryStore: MemoryStore,
  today: () => string = todayIso,
): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(
    ...createEmployeeTools(db),
    ...createInventoryTools(db, today),
    ...createRecipeTools(db),
    ...createMenuTools(db, today),
    ...createMemoryTools(memoryStore),
  );
  log.debug(
    {
      internal: registry.namesFor("internal").length,
      external: registry.namesFor("external").length,
    },
    "🔧 Tools registered",
  );
  return registry;
}

export { ToolRegistry } from "./registry.js";
export type { ToolContext, ToolDefinition } from "./registry.js";
