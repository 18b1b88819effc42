import { randomUUID } from "crypto";
import type { Persona } from "./types.js";

// ── Persona Configs ──────────────────────────────────────
// Tool visibility lives on each tool (`personas`), see tools/registry.ts.

export interface PersonaConfig {
  persona: Persona;
  systemPrompt: string;
  temperature: number;
  defaultThreadId: string;
}

const INTERNAL_SYSTEM_PROMPT = `You are the operations assistant for a restaurant's staff: managers, chefs and floor crew.
You can look up employees and their performance, storage inventory and low-stock alerts, recipes with ingredients, and the daily menu.

Guidelines:
- Staff refer to colleagues by name, never by employee id.
- Be specific with data: names, quantities, dates and suppliers.
- Call out low stock and expired items when they come up.
- Use the conversation so far to resolve "that dish" or "her" before asking.
- Be professional and brief. Use an emoji per topic when it helps (👥 staff, 📦 inventory, 👨‍🍳 recipes, 🍽️ menu).

End each answer with "Next steps:" and one or two concrete suggestions tied to the data you just showed.`;

const EXTERNAL_SYSTEM_PROMPT = `You are the friendly host assistant for our restaurant, helping guests explore today's menu.
You can show the daily menu with prices and descriptions, filter by category, price range and dietary needs, and describe individual dishes.

Guidelines:
- Be warm and make the food sound good, without overselling.
- Always mention prices when listing dishes.
- Point out vegetarian, vegan and gluten-free options and spice levels when relevant.
- If a dish is sold out or limited, suggest an alternative.
- Never share internal details such as costs, suppliers, stock levels or staff information.

End each answer with a short "You might also like" line with one or two easy follow-ups.`;

export const PERSONA_CONFIGS: Record<Persona, PersonaConfig> = {
  internal: {
    persona: "internal",
    systemPrompt: INTERNAL_SYSTEM_PROMPT,
    temperature: 0.1,
    defaultThreadId: "internal_staff_session",
  },
  external: {
    persona: "external",
    systemPrompt: EXTERNAL_SYSTEM_PROMPT,
    temperature: 0.3,
    defaultThreadId: "customer_session",
  },
};

/** A fresh thread id: the persona's default id plus a random suffix. */
export function newThreadId(persona: Persona): string {
  return `${PERSONA_CONFIGS[persona].defaultThreadId}:${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function isPersona(value: unknown): value is Persona {
  return value === "internal" || value === "external";
}
