/**
 * Orchestrator error taxonomy
 *
 * - ClassificationError: classifier unreachable or output unusable → safe default record
 * - DirectToolError: a direct tool failed → fallback to the AI workflow
 * - StoreQueryError: a warehouse query failed → degraded response
 * - EvaluationParseError: evaluation output not structured → unstructured recovery
 *
 * Only StoreQueryError reaches the caller, and then only as a degraded
 * envelope; handle() never rejects.
 */

import type { QueryStage } from '../../common/types.js';

export type OrchestratorErrorKind =
  | 'classification'
  | 'direct_tool'
  | 'store_query'
  | 'evaluation_parse'
  | 'tool_registry';

export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ClassificationError extends OrchestratorError {
  readonly kind = 'classification' as const;
}

export class DirectToolError extends OrchestratorError {
  readonly kind = 'direct_tool' as const;

  constructor(
    public readonly toolName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Direct tool [${toolName}] failed: ${message}`, options);
  }
}

export class StoreQueryError extends OrchestratorError {
  readonly kind = 'store_query' as const;

  constructor(
    message: string,
    public readonly stage?: QueryStage,
    public readonly sql?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class EvaluationParseError extends OrchestratorError {
  readonly kind = 'evaluation_parse' as const;

  constructor(
    message: string,
    public readonly rawResponse: string
  ) {
    super(message);
  }
}

/**
 * Invalid direct-tool definitions, raised at start-up only
 */
export class ToolRegistryError extends OrchestratorError {
  readonly kind = 'tool_registry' as const;

  constructor(public readonly problems: string[]) {
    super(`Invalid direct tool registry: ${problems.join('; ')}`);
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}
