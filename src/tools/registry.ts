import { z } from "zod";

import type { Tool, ToolSpec } from "../types/tool";

import { toolSpecSchema } from "../types/tool";
import { ConfigError, DuplicateToolError } from "../utils/errors";

export class ToolRegistry {
  private readonly tools = new Map<string, { spec: ToolSpec; tool: Tool }>();

  register(tool: Tool): void {
    const parsedSpec = toolSpecSchema.safeParse(tool.spec);
    if (!parsedSpec.success) {
      throw new ConfigError(
        `Invalid tool spec for "${tool.spec.name}": ${z.prettifyError(parsedSpec.error)}`,
        parsedSpec.error
      );
    }

    const name = parsedSpec.data.name;
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }

    this.tools.set(name, { spec: parsedSpec.data, tool });
  }

  lookup(name: string): ToolSpec | undefined {
    return this.tools.get(name)?.spec;
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name)?.tool;
  }

  all(): readonly ToolSpec[] {
    return Array.from(this.tools.values(), (entry) => entry.spec);
  }

  describe(): string {
    return this.all()
      .map((spec) => {
        const inputs = spec.requiredInputs.length > 0 ? spec.requiredInputs.join(", ") : "none";
        const lines = [`- ${spec.name} (${spec.effect}): ${spec.description}`, `  Required inputs: ${inputs}`];
        if (spec.inputHint) {
          lines.push(`  Input hint: ${spec.inputHint}`);
        }
        if (spec.outputSchema) {
          lines.push(`  Output: ${spec.outputSchema}`);
        }
        return lines.join("\n");
      })
      .join("\n");
  }
}

export function createRegistry(tools: Iterable<Tool>): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry;
}
