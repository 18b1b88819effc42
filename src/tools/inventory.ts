import { z } from "zod";
import type { ToolDefinition } from "./registry.js";
import {
  todayIso,
  type InventoryItem,
  type RestaurantDb,
} from "../data/restaurant-db.js";
import {
  OUTPUT_FORMAT_PARAM,
  capped,
  optFlag,
  optNumber,
  optText,
  outputFormat,
  parseToolArgs,
  render,
} from "./args.js";

// ── Storage Inventory Tools (internal only) ──────────────

const inventoryArgs = z.object({
  item_name_filter: optText,
  category_filter: optText,
  location_filter: optText,
  low_stock_only: optFlag,
  expired_items_only: optFlag,
  limit: optNumber,
  output_format: outputFormat,
});

const alertArgs = z.object({ output_format: outputFormat });

function stockLine(item: InventoryItem): string {
  const flags = [
    item.is_low_stock ? "LOW" : "",
    item.expiry_date ? `expires ${item.expiry_date}` : "",
  ].filter(Boolean);
  return (
    `- ${item.item_name} (${item.item_id}): ${item.current_stock}/${item.minimum_stock} ${item.unit}` +
    ` in ${item.storage_location}, supplier ${item.supplier}` +
    (flags.length ? ` [${flags.join(", ")}]` : "")
  );
}

export function createInventoryTools(
  db: RestaurantDb,
  today: () => string = todayIso,
): ToolDefinition[] {
  const queryInventory: ToolDefinition = {
    name: "query_storage_inventory",
    description:
      "Look up stock levels of ingredients and supplies by name, category or storage location.",
    parameters: {
      type: "object",
      properties: {
        item_name_filter: {
          type: "string",
          description: "Item name (partial match).",
        },
        category_filter: {
          type: "string",
          description: "Category (meat, seafood, vegetables, dairy, grains, ...).",
        },
        location_filter: {
          type: "string",
          enum: ["refrigerator", "freezer", "pantry", "dry_storage"],
          description: "Storage location.",
        },
        low_stock_only: {
          type: "boolean",
          description: "Only items below their minimum stock.",
        },
        expired_items_only: {
          type: "boolean",
          description: "Only items at or past their expiry date.",
        },
        limit: { type: "number", description: "Maximum rows to return." },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: [],
    },
    personas: ["internal"],

    executeSync: (input) => {
      const args = parseToolArgs("query_storage_inventory", inventoryArgs, input);
      const items = capped(
        db.queryInventory(
          {
            itemName: args.item_name_filter,
            category: args.category_filter,
            location: args.location_filter,
            lowStockOnly: args.low_stock_only,
            expiredOnly: args.expired_items_only,
          },
          today(),
        ),
        args.limit,
      );

      return render(args.output_format, { count: items.length, items }, () =>
        items.length === 0
          ? "No inventory items found matching the criteria."
          : [`Found ${items.length} item(s):`, ...items.map(stockLine)].join("\n"),
      );
    },
  };

  const lowStockAlerts: ToolDefinition = {
    name: "get_low_stock_alerts",
    description: "List every item currently below its minimum stock level.",
    parameters: {
      type: "object",
      properties: { output_format: OUTPUT_FORMAT_PARAM },
      required: [],
    },
    personas: ["internal"],

    executeSync: (input) => {
      const args = parseToolArgs("get_low_stock_alerts", alertArgs, input);
      const items = db.queryInventory({ lowStockOnly: true }, today());
      const alerts = items.map((item) => ({
        item_id: item.item_id,
        item_name: item.item_name,
        current_stock: item.current_stock,
        minimum_stock: item.minimum_stock,
        shortfall: item.minimum_stock - item.current_stock,
        unit: item.unit,
        supplier: item.supplier,
      }));

      return render(args.output_format, { count: alerts.length, alerts }, () =>
        alerts.length === 0
          ? "No items are currently below minimum stock levels."
          : [
              `Items needing restock: ${alerts.length}`,
              ...alerts.map(
                (a) =>
                  `- ${a.item_name}: ${a.current_stock} ${a.unit} (minimum ${a.minimum_stock}), order from ${a.supplier}`,
              ),
            ].join("\n"),
      );
    },
  };

  return [queryInventory, lowStockAlerts];
}
