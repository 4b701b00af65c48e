/**
 * list_direct_tools MCP Tool
 *
 * Shows the direct tools registered per persona, with descriptions and
 * example triggers.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ListDirectToolsSchema } from '../../../common/schemas/index.js';
import type { ToolRegistry } from '../../../common/types.js';
import { getRegistryStats } from '../tool-registry.js';
import { getDefaultToolRegistry } from '../direct-tools/index.js';

/**
 * Markdown listing of the registry, optionally for one persona
 */
export function formatRegistry(registry: ToolRegistry, persona?: string): string {
  const stats = getRegistryStats(registry);
  const lines: string[] = [];

  lines.push('# Direct Tools');
  lines.push('');
  lines.push(`${stats.totalTools} tools across ${stats.totalPersonas} personas`);

  const personas = persona ? [persona] : [...registry.keys()];
  for (const name of personas) {
    const tools = registry.get(name) ?? [];
    lines.push('');
    lines.push(`## ${name}`);
    if (tools.length === 0) {
      lines.push('No direct tools registered.');
      continue;
    }
    tools.forEach((tool, i) => {
      lines.push(`${i + 1}. **${tool.name}**: ${tool.description}`);
      for (const trigger of tool.exampleTriggers) {
        lines.push(`   - "${trigger}"`);
      }
    });
  }

  return lines.join('\n');
}

/**
 * Register the list_direct_tools tool with the MCP server
 */
export function registerRegistryTool(server: McpServer): void {
  server.tool(
    'list_direct_tools',
    'List the direct lookup tools registered for each persona, in dispatch order, with example questions that trigger them.',
    ListDirectToolsSchema.shape,
    async ({ persona }) => ({
      content: [{ type: 'text', text: formatRegistry(getDefaultToolRegistry(), persona) }],
    })
  );
}
