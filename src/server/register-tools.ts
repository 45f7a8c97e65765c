/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { documentTools } from '../tools/documents.js';
import { ingestionTools } from '../tools/ingestion.js';
import { searchTools } from '../tools/search.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [
  ingestionTools,
  documentTools,
  searchTools,
];

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames.size;
}

/**
 * Names of all tools, in registration order
 */
export function getToolNames(): string[] {
  return allToolModules.flatMap((toolModule) => Object.keys(toolModule));
}
