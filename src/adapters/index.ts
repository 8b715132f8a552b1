/**
 * Tool Registry
 *
 * The external programs a session depends on.
 */

export * from "./base.js";
export * from "./gdb.js";
export * from "./valgrind.js";

import type { ToolConfig } from "./base.js";
import { gdbTool } from "./gdb.js";
import { valgrindTool, vgdbTool } from "./valgrind.js";

const tools: Map<string, ToolConfig> = new Map([
  ["valgrind", valgrindTool],
  ["gdb", gdbTool],
  ["vgdb", vgdbTool],
]);

/**
 * Get a tool configuration by id
 */
export function getTool(id: string): ToolConfig | undefined {
  return tools.get(id.toLowerCase());
}

export function getToolIds(): string[] {
  return Array.from(tools.keys());
}

/**
 * Locate each tool. `overrides` maps a tool id to the command to look for
 * instead of its default.
 */
export async function detectTools(
  overrides: Partial<Record<string, string>> = {}
): Promise<Map<string, string | null>> {
  const found = new Map<string, string | null>();

  for (const [id, tool] of tools) {
    found.set(id, await tool.detect(overrides[id] ?? tool.command));
  }

  return found;
}
