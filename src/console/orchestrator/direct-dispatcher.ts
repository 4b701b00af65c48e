/**
 * Direct Dispatcher
 *
 * Picks the first registered tool whose predicate accepts the question and
 * runs it. At most one executor is invoked per call. Every error, including
 * a throwing predicate, a timed-out executor or a malformed result, comes
 * back as a 'failed' outcome; dispatch() itself never rejects.
 */

import type {
  ClassificationRecord,
  DispatchOutcome,
  ToolRegistry,
  ToolResult,
} from '../../common/types.js';
import { logDebug, logInfo, logWarn } from '../../common/services/logger.js';
import { errorMessage, withTimeout } from '../../common/utils/timeout.js';
import { DirectToolError } from './errors.js';
import { getToolsForPersona } from './tool-registry.js';

/**
 * Result invariants: rowCount matches rows, matched/unmatched are disjoint
 */
export function checkToolResult(result: ToolResult): string | undefined {
  if (result.rowCount !== result.rows.length) {
    return `rowCount ${result.rowCount} does not match ${result.rows.length} rows`;
  }
  const matched = new Set(result.matchedInputs);
  const overlap = result.unmatchedInputs.filter((input) => matched.has(input));
  if (overlap.length > 0) {
    return `inputs reported as both matched and unmatched: ${overlap.join(', ')}`;
  }
  return undefined;
}

export class DirectDispatcher {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly executorTimeoutMs: number
  ) {}

  async dispatch(
    question: string,
    classification: ClassificationRecord,
    requestId?: string
  ): Promise<DispatchOutcome> {
    const tools = getToolsForPersona(this.registry, classification.persona);
    if (tools.length === 0) {
      logDebug('No direct tools for persona', {
        request_id: requestId,
        persona: classification.persona,
      });
      return { kind: 'no_match' };
    }

    for (const tool of tools) {
      let applicable: boolean;
      try {
        applicable = tool.predicate(question, classification);
      } catch (error) {
        logWarn('Direct tool predicate threw', {
          request_id: requestId,
          tool_name: tool.name,
          error: errorMessage(error),
        });
        return {
          kind: 'failed',
          toolName: tool.name,
          error: new DirectToolError(tool.name, `predicate error: ${errorMessage(error)}`, {
            cause: error,
          }),
          durationMs: 0,
        };
      }

      if (!applicable) continue;

      const startTime = Date.now();
      try {
        const result = await withTimeout(
          tool.executor(question, classification),
          this.executorTimeoutMs,
          `Direct tool ${tool.name}`
        );
        const durationMs = Date.now() - startTime;

        const violation = checkToolResult(result);
        if (violation) {
          throw new DirectToolError(tool.name, `malformed result: ${violation}`);
        }

        logInfo('Direct tool completed', {
          request_id: requestId,
          tool_name: tool.name,
          row_count: result.rowCount,
          duration_ms: durationMs,
        });
        return { kind: 'success', toolName: tool.name, result, durationMs };
      } catch (error) {
        const durationMs = Date.now() - startTime;
        const toolError =
          error instanceof DirectToolError
            ? error
            : new DirectToolError(tool.name, errorMessage(error), { cause: error });
        logWarn('Direct tool failed', {
          request_id: requestId,
          tool_name: tool.name,
          error: toolError.message,
          error_kind: toolError.kind,
          duration_ms: durationMs,
        });
        return { kind: 'failed', toolName: tool.name, error: toolError, durationMs };
      }
    }

    return { kind: 'no_match' };
  }
}
