/**
 * Orchestrator Metrics Service
 *
 * Tracks question-handling statistics for monitoring.
 * In-memory storage (resets on restart) - suitable for MCP server lifecycle.
 *
 * Tracks:
 * - Execution path distribution
 * - Direct tool outcomes per tool
 * - Store queries per stage
 * - Classification fallbacks and degraded responses
 * - Evaluation parse modes
 * - Latency
 *
 * @module orchestrator/metrics
 */

import type {
  DispatchOutcome,
  EvaluationResult,
  ExecutionPath,
  QueryStage,
} from '../../common/types.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Per-tool dispatch statistics
 */
interface ToolStats {
  invocations: number;
  hits: number;
  empty: number;
  failures: number;
  totalDurationMs: number;
  avgDurationMs: number;
}

/**
 * Aggregate orchestrator metrics
 */
export interface OrchestratorMetrics {
  // Request counters
  totalRequests: number;
  degradedResponses: number;
  classificationFallbacks: number;
  noMatchDispatches: number;

  // Timing
  totalDurationMs: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;

  // Timestamps
  firstRequestTimestamp: string | null;
  lastRequestTimestamp: string | null;

  // Breakdowns
  /** Keyed by ExecutionPath */
  byExecutionPath: Record<string, number>;
  byTool: Record<string, ToolStats>;
  /** Keyed by QueryStage */
  storeQueriesByStage: Record<string, number>;
  /** Keyed by EvaluationResult parseMode */
  evaluationParseModes: Record<string, number>;
}

// =============================================================================
// IN-MEMORY STORAGE
// =============================================================================

const createEmptyMetrics = (): OrchestratorMetrics => ({
  totalRequests: 0,
  degradedResponses: 0,
  classificationFallbacks: 0,
  noMatchDispatches: 0,

  totalDurationMs: 0,
  avgDurationMs: 0,
  minDurationMs: Infinity,
  maxDurationMs: 0,

  firstRequestTimestamp: null,
  lastRequestTimestamp: null,

  byExecutionPath: {},
  byTool: {},
  storeQueriesByStage: {},
  evaluationParseModes: {},
});

let metrics: OrchestratorMetrics = createEmptyMetrics();

// =============================================================================
// RECORDING FUNCTIONS
// =============================================================================

/**
 * Record a completed request
 */
export function recordRequest(
  executionPath: ExecutionPath,
  durationMs: number,
  degraded: boolean,
  classificationFallback: boolean
): void {
  const now = new Date().toISOString();

  metrics.totalRequests++;
  if (degraded) metrics.degradedResponses++;
  if (classificationFallback) metrics.classificationFallbacks++;

  metrics.totalDurationMs += durationMs;
  metrics.avgDurationMs = metrics.totalDurationMs / metrics.totalRequests;
  metrics.minDurationMs = Math.min(metrics.minDurationMs, durationMs);
  metrics.maxDurationMs = Math.max(metrics.maxDurationMs, durationMs);

  metrics.lastRequestTimestamp = now;
  if (!metrics.firstRequestTimestamp) {
    metrics.firstRequestTimestamp = now;
  }

  metrics.byExecutionPath[executionPath] = (metrics.byExecutionPath[executionPath] ?? 0) + 1;
}

/**
 * Record a dispatch outcome
 */
export function recordDispatch(outcome: DispatchOutcome): void {
  if (outcome.kind === 'no_match') {
    metrics.noMatchDispatches++;
    return;
  }

  const stats = (metrics.byTool[outcome.toolName] ??= {
    invocations: 0,
    hits: 0,
    empty: 0,
    failures: 0,
    totalDurationMs: 0,
    avgDurationMs: 0,
  });

  stats.invocations++;
  if (outcome.kind === 'failed') {
    stats.failures++;
  } else if (outcome.result.rowCount === 0) {
    stats.empty++;
  } else {
    stats.hits++;
  }
  stats.totalDurationMs += outcome.durationMs;
  stats.avgDurationMs = stats.totalDurationMs / stats.invocations;
}

export function recordStoreQuery(stage: QueryStage): void {
  metrics.storeQueriesByStage[stage] = (metrics.storeQueriesByStage[stage] ?? 0) + 1;
}

export function recordEvaluation(parseMode: EvaluationResult['parseMode']): void {
  metrics.evaluationParseModes[parseMode] = (metrics.evaluationParseModes[parseMode] ?? 0) + 1;
}

// =============================================================================
// RETRIEVAL FUNCTIONS
// =============================================================================

/**
 * Get current metrics snapshot
 */
export function getOrchestratorMetrics(): OrchestratorMetrics {
  const snapshot: OrchestratorMetrics = {
    ...metrics,
    byExecutionPath: { ...metrics.byExecutionPath },
    byTool: Object.fromEntries(Object.entries(metrics.byTool).map(([k, v]) => [k, { ...v }])),
    storeQueriesByStage: { ...metrics.storeQueriesByStage },
    evaluationParseModes: { ...metrics.evaluationParseModes },
  };
  // Clean up Infinity for display
  if (snapshot.minDurationMs === Infinity) {
    snapshot.minDurationMs = 0;
  }
  return snapshot;
}

function pct(count: number, total: number): string {
  return total > 0 ? ((count / total) * 100).toFixed(1) : '0';
}

/**
 * Get metrics summary for display
 */
export function getMetricsSummary(): string {
  const m = getOrchestratorMetrics();
  const lines: string[] = [];

  lines.push('# Orchestrator Metrics');
  lines.push('');

  lines.push('## Overview');
  lines.push(`- Total Requests: ${m.totalRequests}`);
  lines.push(`- Degraded Rate: ${pct(m.degradedResponses, m.totalRequests)}%`);
  lines.push(`- Classification Fallback Rate: ${pct(m.classificationFallbacks, m.totalRequests)}%`);
  lines.push('');

  lines.push('## Timing');
  lines.push(`- Avg Duration: ${m.avgDurationMs.toFixed(0)}ms`);
  lines.push(`- Min Duration: ${m.minDurationMs}ms`);
  lines.push(`- Max Duration: ${m.maxDurationMs}ms`);
  lines.push('');

  if (Object.keys(m.byExecutionPath).length > 0) {
    lines.push('## Execution Paths');
    for (const [path, count] of Object.entries(m.byExecutionPath)) {
      lines.push(`- ${path}: ${count} (${pct(count, m.totalRequests)}%)`);
    }
    lines.push('');
  }

  if (Object.keys(m.byTool).length > 0 || m.noMatchDispatches > 0) {
    lines.push('## Direct Tools');
    for (const [tool, stats] of Object.entries(m.byTool)) {
      lines.push(
        `- ${tool}: ${stats.invocations} calls | ${stats.hits} hits | ${stats.empty} empty | ${stats.failures} failed | ${stats.avgDurationMs.toFixed(0)}ms avg`
      );
    }
    lines.push(`- no match: ${m.noMatchDispatches}`);
    lines.push('');
  }

  if (Object.keys(m.storeQueriesByStage).length > 0) {
    lines.push('## Store Queries');
    for (const [stage, count] of Object.entries(m.storeQueriesByStage)) {
      lines.push(`- ${stage}: ${count}`);
    }
    lines.push('');
  }

  if (Object.keys(m.evaluationParseModes).length > 0) {
    lines.push('## Evaluation Parse Modes');
    for (const [mode, count] of Object.entries(m.evaluationParseModes)) {
      lines.push(`- ${mode}: ${count}`);
    }
    lines.push('');
  }

  if (m.firstRequestTimestamp) {
    lines.push('## Timeline');
    lines.push(`- First Request: ${m.firstRequestTimestamp}`);
    lines.push(`- Last Request: ${m.lastRequestTimestamp}`);
  }

  return lines.join('\n');
}

/**
 * Reset all metrics
 */
export function resetOrchestratorMetrics(): void {
  metrics = createEmptyMetrics();
}

// =============================================================================
// EXPORT SINGLETON
// =============================================================================

export const orchestratorMetrics = {
  recordRequest,
  recordDispatch,
  recordStoreQuery,
  recordEvaluation,
  getMetrics: getOrchestratorMetrics,
  getSummary: getMetricsSummary,
  reset: resetOrchestratorMetrics,
};
