import type { Tool } from "../types/tool";

import { echoTool } from "./echo";
import { gitStatusTool } from "./git";
import { createRegistry, ToolRegistry } from "./registry";
import { runCommandTool } from "./shell";

export const builtinTools: Tool[] = [gitStatusTool, runCommandTool, echoTool];

export function createDefaultRegistry(): ToolRegistry {
  return createRegistry(builtinTools);
}

export { createRegistry, ToolRegistry };
