/**
 * Jest Unit Tests for the Result Assembler
 */

import type { EvaluationResult } from '../../../common/types.js';
import { NO_RESULTS_ANSWER, STORE_FAILURE_ANSWER } from '../../../common/constants.js';
import {
  assembleResponse,
  formatEvaluationAnswer,
  formatFinalAnswer,
  formatRowsAnswer,
} from '../result-assembler.js';
import { degradedEvaluation } from '../evaluator.js';
import { classificationFor } from './fixtures.js';

const evaluation: EvaluationResult = {
  businessAnswer: 'Use PK-100.',
  keyFindings: ['Direct mapping exists', 'In stock'],
  recommendedAction: 'Quote PK-100',
  confidenceLabel: 'high',
  dataQualityNote: 'good',
  parseMode: 'structured',
};

describe('Result Assembler', () => {
  describe('formatEvaluationAnswer', () => {
    test('renders answer, findings and action', () => {
      expect(formatEvaluationAnswer(evaluation)).toBe(
        '**Use PK-100.**\n\n**Key Findings:**\n• Direct mapping exists\n• In stock\n\n**Recommended Action:** Quote PK-100'
      );
    });

    test('omits empty sections', () => {
      expect(formatEvaluationAnswer({ ...evaluation, keyFindings: [], recommendedAction: '' })).toBe('**Use PK-100.**');
    });
  });

  describe('formatRowsAnswer', () => {
    test('shows three records and the total', () => {
      const rows = [{ part: 'A', note: null }, { part: 'B' }, { part: 'C' }, { part: 'D' }];
      expect(formatRowsAnswer('Which parts?', rows)).toBe(
        '**Answer to: Which parts?**\n\n**Key Details**:\n• Record 1: part: A\n• Record 2: part: B\n• Record 3: part: C\n\n**Data Summary**: Found 4 records'
      );
    });
  });

  describe('formatFinalAnswer', () => {
    test('prefers the evaluation', () => {
      expect(formatFinalAnswer({ question: 'q', evaluation, rows: [{ a: 1 }], degraded: false })).toBe(
        formatEvaluationAnswer(evaluation)
      );
    });

    test('shows rows without an evaluation', () => {
      expect(formatFinalAnswer({ question: 'q', rows: [{ a: 1 }], degraded: false })).toBe(
        formatRowsAnswer('q', [{ a: 1 }])
      );
    });

    test('shows rows instead of a degraded evaluation', () => {
      const degraded = degradedEvaluation('Error during evaluation stage', 'evaluation failed: timeout');
      expect(formatFinalAnswer({ question: 'q', evaluation: degraded, rows: [{ a: 1 }], degraded: false })).toBe(
        formatRowsAnswer('q', [{ a: 1 }])
      );
    });

    test('falls back to the no-results answer', () => {
      expect(formatFinalAnswer({ question: 'q', rows: [], degraded: false })).toBe(NO_RESULTS_ANSWER);
    });

    test('prefixes degraded answers', () => {
      expect(formatFinalAnswer({ question: 'q', degraded: true })).toBe(
        `${STORE_FAILURE_ANSWER}\n\n${NO_RESULTS_ANSWER}`
      );
    });
  });

  describe('assembleResponse', () => {
    test('builds the envelope', () => {
      const classification = classificationFor('sales_rep');
      const envelope = assembleResponse({
        requestId: 'req-1',
        question: 'q',
        classification,
        executionPath: 'direct_with_evaluation',
        stageResults: { evaluation },
        degraded: false,
        notes: ['note'],
        startTime: Date.now(),
        storeQueries: 0,
      });
      expect(envelope.requestId).toBe('req-1');
      expect(envelope.classification).toBe(classification);
      expect(envelope.finalAnswer).toBe(formatEvaluationAnswer(evaluation));
      expect(envelope.notes).toEqual(['note']);
      expect(envelope.timing.storeQueries).toBe(0);
      expect(envelope.timing.totalMs).toBeGreaterThanOrEqual(0);
    });
  });
});
