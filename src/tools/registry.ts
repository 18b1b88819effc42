import type { Persona, ToolArgs } from "../agent/types.js";

// ── Tool Definition ──────────────────────────────────────

/** Who is calling. Tools never take the thread from model-written args. */
export interface ToolContext {
  threadId: string;
  persona: Persona;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, { type: string; description: string; enum?: string[] }>;
    required: string[];
  };
  /** Personas allowed to see and run this tool. */
  personas: readonly Persona[];
  execute?: (input: ToolArgs, ctx: ToolContext) => Promise<unknown>;
  /** Blocking variant, used when no async `execute` is given. */
  executeSync?: (input: ToolArgs, ctx: ToolContext) => unknown;
}

// ── Tool Registry ────────────────────────────────────────

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(...tools: ToolDefinition[]): void {
    for (const tool of tools) {
      if (!tool.execute && !tool.executeSync) {
        throw new Error(`Tool "${tool.name}" has no execute function`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /** The tool, only if the persona is allowed to use it. */
  getFor(name: string, persona: Persona): ToolDefinition | undefined {
    const tool = this.tools.get(name);
    return tool?.personas.includes(persona) ? tool : undefined;
  }

  forPersona(persona: Persona): ToolDefinition[] {
    return Array.from(this.tools.values()).filter((t) =>
      t.personas.includes(persona),
    );
  }

  /** The persona's whitelist. */
  namesFor(persona: Persona): string[] {
    return this.forPersona(persona).map((t) => t.name);
  }

  /** Plain-text catalogue of the persona's tools for the planner prompt. */
  describeFor(persona: Persona): string {
    return this.forPersona(persona)
      .map((tool) => {
        const params = Object.entries(tool.parameters.properties).map(
          ([name, p]) => {
            const required = tool.parameters.required.includes(name)
              ? ", required"
              : "";
            const choices = p.enum ? ` (one of: ${p.enum.join(", ")})` : "";
            return `    - ${name} (${p.type}${required}): ${p.description}${choices}`;
          },
        );
        return [`- ${tool.name}: ${tool.description}`, ...params].join("\n");
      })
      .join("\n");
  }
}
