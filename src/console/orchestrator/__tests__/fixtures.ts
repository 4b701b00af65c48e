/**
 * In-process fakes shared by the orchestrator tests
 */

import type {
  ClassificationRecord,
  EntityValue,
  ExecutionStrategy,
  Row,
  StoreClient,
  StoreQueryResult,
  ToolResult,
} from '../../../common/types.js';
import type { CompletionClient, CompletionOptions, CompletionResult } from '../claude-client.js';
import { createClassification } from '../intent-classifier.js';

export function classificationFor(
  persona: string,
  options: {
    strategy?: ExecutionStrategy;
    entities?: Record<string, EntityValue>;
    enableEvaluation?: boolean;
  } = {}
): ClassificationRecord {
  return createClassification({
    intent: 'test_intent',
    persona,
    confidence: 0.9,
    executionStrategy: options.strategy ?? 'single_stage',
    extractedEntities: options.entities ?? {},
    enableEvaluation: options.enableEvaluation ?? true,
  });
}

export function toolResult(rows: Row[], matchedInputs: string[] = [], unmatchedInputs: string[] = []): ToolResult {
  return { rows, rowCount: rows.length, executedQuery: 'SELECT 1', matchedInputs, unmatchedInputs };
}

/**
 * Completion client answering from a script; an Error entry is thrown
 */
export class ScriptedClient implements CompletionClient {
  readonly prompts: string[] = [];
  readonly options: (CompletionOptions | undefined)[] = [];

  constructor(private readonly responses: (string | Error)[]) {}

  async complete(prompt: string, options?: CompletionOptions): Promise<CompletionResult> {
    this.prompts.push(prompt);
    this.options.push(options);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('No scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return { text: next, usage: { input: 10, output: 5 } };
  }
}

/**
 * Store answering each query from a queue of row sets; an Error entry is thrown
 */
export class FakeStore implements StoreClient {
  readonly calls: { sql: string; params: readonly unknown[] }[] = [];

  constructor(private readonly results: (Row[] | Error)[] = []) {}

  async query(sql: string, params: readonly unknown[] = []): Promise<StoreQueryResult> {
    this.calls.push({ sql, params });
    const next = this.results.shift() ?? [];
    if (next instanceof Error) {
      throw next;
    }
    return { rows: next, rowCount: next.length, executedQuery: sql };
  }
}
