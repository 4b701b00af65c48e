/**
 * orchestrator_status MCP Tool
 *
 * Metrics summary plus configuration health.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getMetricsSummary } from '../metrics.js';
import { getOrchestratorConfig, validateConfig } from '../config.js';
import { isClaudeAvailable } from '../claude-client.js';

export function formatStatus(): string {
  const config = getOrchestratorConfig();
  const configErrors = validateConfig(config);
  const lines: string[] = [];

  lines.push(getMetricsSummary());
  lines.push('');
  lines.push('## Configuration');
  lines.push(`- Claude API: ${isClaudeAvailable() ? 'configured' : 'ANTHROPIC_API_KEY not set'}`);
  lines.push(`- Model: ${config.claudeModel}`);
  lines.push(`- Default persona: ${config.defaultPersona}`);
  lines.push(`- Discovery limit: ${config.discoveryLimit}`);
  lines.push(`- Direct tool timeout: ${config.directToolTimeoutMs}ms`);
  if (configErrors.length > 0) {
    lines.push('- Problems:');
    for (const error of configErrors) {
      lines.push(`  - ${error}`);
    }
  }

  return lines.join('\n');
}

export function registerStatusTool(server: McpServer): void {
  server.tool(
    'orchestrator_status',
    'Show orchestrator metrics (execution paths, direct tool hit rates, store queries, degraded responses) and configuration.',
    {},
    async () => ({
      content: [{ type: 'text', text: formatStatus() }],
    })
  );
}
