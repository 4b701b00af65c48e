/**
 * Result Assembler
 *
 * Normalizes whichever path ran into a ResponseEnvelope and renders the
 * user-facing answer. finalAnswer is never empty.
 */

import type {
  ClassificationRecord,
  EvaluationResult,
  ExecutionPath,
  ResponseEnvelope,
  Row,
  StageResults,
} from '../../common/types.js';
import { NO_RESULTS_ANSWER, STORE_FAILURE_ANSWER } from '../../common/constants.js';
import { formatValue } from '../../common/utils/row-compression.js';

const DETAIL_RECORDS = 3;

// =============================================================================
// ANSWER RENDERING
// =============================================================================

/**
 * Render an evaluation as bold answer, findings and recommended action
 */
export function formatEvaluationAnswer(evaluation: EvaluationResult): string {
  const parts = [`**${evaluation.businessAnswer}**`];

  if (evaluation.keyFindings.length > 0) {
    parts.push('\n**Key Findings:**');
    for (const finding of evaluation.keyFindings) {
      parts.push(`• ${finding}`);
    }
  }

  if (evaluation.recommendedAction) {
    parts.push(`\n**Recommended Action:** ${evaluation.recommendedAction}`);
  }

  return parts.join('\n');
}

/**
 * Render raw rows: the first three records and a count
 */
export function formatRowsAnswer(question: string, rows: readonly Row[]): string {
  const parts = [`**Answer to: ${question}**`, '\n**Key Details**:'];

  rows.slice(0, DETAIL_RECORDS).forEach((record, i) => {
    const fields = Object.entries(record)
      .filter(([, v]) => v !== null && v !== undefined)
      .map(([k, v]) => `${k}: ${formatValue(v)}`)
      .join(', ');
    parts.push(`• Record ${i + 1}: ${fields}`);
  });

  parts.push(`\n**Data Summary**: Found ${rows.length} records`);
  return parts.join('\n');
}

export interface FinalAnswerInput {
  question: string;
  evaluation?: EvaluationResult;
  /** Rows to show when no evaluation ran */
  rows?: readonly Row[];
  degraded: boolean;
}

export function formatFinalAnswer(input: FinalAnswerInput): string {
  const hasRows = input.rows !== undefined && input.rows.length > 0;
  const evaluation = input.evaluation;
  // A degraded evaluation gives way to retrieved rows when there are any
  const useEvaluation =
    evaluation !== undefined &&
    evaluation.businessAnswer.trim().length > 0 &&
    !(evaluation.parseMode === 'degraded' && hasRows);

  let body: string;
  if (useEvaluation && evaluation) {
    body = formatEvaluationAnswer(evaluation);
  } else if (input.rows && input.rows.length > 0) {
    body = formatRowsAnswer(input.question, input.rows);
  } else {
    body = NO_RESULTS_ANSWER;
  }

  return input.degraded ? `${STORE_FAILURE_ANSWER}\n\n${body}` : body;
}

// =============================================================================
// ENVELOPE
// =============================================================================

export interface AssemblyInput {
  requestId: string;
  question: string;
  classification: ClassificationRecord;
  executionPath: ExecutionPath;
  stageResults: StageResults;
  rows?: readonly Row[];
  degraded: boolean;
  notes: string[];
  startTime: number;
  storeQueries: number;
}

export function assembleResponse(input: AssemblyInput): ResponseEnvelope {
  return {
    requestId: input.requestId,
    question: input.question,
    classification: input.classification,
    executionPath: input.executionPath,
    stageResults: input.stageResults,
    finalAnswer: formatFinalAnswer({
      question: input.question,
      evaluation: input.stageResults.evaluation,
      rows: input.rows,
      degraded: input.degraded,
    }),
    degraded: input.degraded,
    notes: input.notes,
    timing: {
      totalMs: Date.now() - input.startTime,
      storeQueries: input.storeQueries,
    },
  };
}
