/**
 * ask_business_question MCP Tool
 *
 * Runs a question through the orchestrator.
 *
 * Usage:
 *   ask_business_question({ question: "Replace BR-56U10 with our equivalent" })
 *
 * Returns:
 *   - The final answer
 *   - Execution path, persona and timing
 *   - Notes (fallbacks, degraded stages)
 *   - Optionally the raw response envelope as JSON
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { AskQuestionSchema } from '../../../common/schemas/index.js';
import type { ResponseEnvelope } from '../../../common/types.js';
import { getQuestionOrchestrator } from '../engine.js';
import { isClaudeAvailable } from '../claude-client.js';
import { errorMessage } from '../../../common/utils/timeout.js';
import { logInfo } from '../../../common/services/logger.js';

// =============================================================================
// FORMATTING
// =============================================================================

function formatUnavailable(): string {
  return `# Orchestrator Unavailable

The Claude API is required for classification, query generation and evaluation.

**To enable:**
1. Set the \`ANTHROPIC_API_KEY\` environment variable
2. Restart the MCP server

**Alternative:**
Use \`list_direct_tools\` to inspect the registered direct tools.`;
}

/**
 * Markdown rendering of a response envelope
 */
export function formatEnvelope(envelope: ResponseEnvelope): string {
  const lines: string[] = [];

  lines.push(envelope.finalAnswer);
  lines.push('');
  lines.push('---');
  lines.push('');
  lines.push('## Execution');
  lines.push(`- **Path:** ${envelope.executionPath}`);
  lines.push(
    `- **Persona:** ${envelope.classification.persona} (${envelope.classification.intent}, confidence ${envelope.classification.confidence.toFixed(2)})`
  );
  lines.push(`- **Stages:** ${Object.keys(envelope.stageResults).join(', ')}`);
  lines.push(`- **Store queries:** ${envelope.timing.storeQueries}`);
  lines.push(`- **Duration:** ${envelope.timing.totalMs}ms`);

  const evaluation = envelope.stageResults.evaluation;
  if (evaluation) {
    lines.push(`- **Confidence:** ${evaluation.confidenceLabel} (${evaluation.parseMode})`);
  }

  if (envelope.degraded) {
    lines.push('- **Degraded:** yes');
  }

  if (envelope.notes.length > 0) {
    lines.push('');
    lines.push('## Notes');
    for (const note of envelope.notes) {
      lines.push(`- ${note}`);
    }
  }

  lines.push('');
  lines.push(`*Request: ${envelope.requestId}*`);

  return lines.join('\n');
}

// =============================================================================
// TOOL REGISTRATION
// =============================================================================

/**
 * Register the ask_business_question tool with the MCP server
 */
export function registerAskTool(server: McpServer): void {
  server.tool(
    'ask_business_question',
    'Answer a business question from the data warehouse. Classifies the question, tries a fast direct lookup, falls back to generated SQL or a discovery → analysis pipeline, and evaluates the retrieved data. Requires ANTHROPIC_API_KEY.',
    AskQuestionSchema.shape,
    async ({ question, format }) => {
      if (!isClaudeAvailable()) {
        return {
          content: [{ type: 'text', text: formatUnavailable() }],
          isError: true,
        };
      }

      try {
        const envelope = await getQuestionOrchestrator().handle(question);
        logInfo('ask_business_question answered', {
          request_id: envelope.requestId,
          execution_path: envelope.executionPath,
        });

        const text = format === 'json' ? JSON.stringify(envelope, null, 2) : formatEnvelope(envelope);
        return {
          content: [{ type: 'text', text }],
        };
      } catch (error) {
        // Only reachable when the orchestrator cannot be constructed
        return {
          content: [{ type: 'text', text: `Error answering question: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    }
  );
}
