/**
 * Jest Unit Tests for the Evaluator
 *
 * Tests the two-tier parse (structured, unstructured fallback), the
 * degraded evaluation and prompt construction.
 */

import {
  buildEvaluationPrompt,
  ClaudeEvaluator,
  degradedEvaluation,
  parseEvaluationResponse,
  parseStructuredEvaluation,
} from '../evaluator.js';
import { EvaluationParseError } from '../errors.js';
import { ScriptedClient } from './fixtures.js';

describe('Evaluator', () => {
  // ==========================================================================
  // STRUCTURED PARSE
  // ==========================================================================

  describe('structured parse', () => {
    test('maps a complete response', () => {
      const result = parseEvaluationResponse(
        '{"business_answer": "Use PK-100.", "key_findings": ["Direct mapping exists"], "recommended_action": "Quote PK-100", "confidence": "high", "data_quality": "good"}'
      );
      expect(result).toEqual({
        businessAnswer: 'Use PK-100.',
        keyFindings: ['Direct mapping exists'],
        recommendedAction: 'Quote PK-100',
        confidenceLabel: 'high',
        dataQualityNote: 'good',
        parseMode: 'structured',
      });
    });

    test('accepts fenced output and reads confidence from supporting_data', () => {
      const result = parseEvaluationResponse(
        '```json\n{"business_answer": "Two parts use C-10.", "supporting_data": {"confidence": "Low"}}\n```'
      );
      expect(result.parseMode).toBe('structured');
      expect(result.confidenceLabel).toBe('low');
      expect(result.keyFindings).toEqual([]);
      expect(result.dataQualityNote).toBe('not assessed');
    });

    test('defaults confidence to medium', () => {
      expect(parseEvaluationResponse('{"business_answer": "x"}').confidenceLabel).toBe('medium');
    });

    test('parseStructuredEvaluation throws EvaluationParseError on prose', () => {
      expect(() => parseStructuredEvaluation('just words')).toThrow(EvaluationParseError);
    });
  });

  // ==========================================================================
  // UNSTRUCTURED FALLBACK
  // ==========================================================================

  describe('unstructured fallback', () => {
    test('recovers fields from truncated JSON', () => {
      const result = parseEvaluationResponse(
        '{"business_answer": "Use PK-100.", "key_findings": ["a", "b"], "recommended_action": "Call the customer", "confidence": "hi'
      );
      expect(result).toEqual({
        businessAnswer: 'Use PK-100.',
        keyFindings: ['a', 'b'],
        recommendedAction: 'Call the customer',
        confidenceLabel: 'low',
        dataQualityNote: 'unstructured fallback',
        parseMode: 'unstructured_fallback',
      });
    });

    test('caps recovered findings at five', () => {
      const result = parseEvaluationResponse(
        '{"business_answer": "x", "key_findings": ["1", "2", "3", "4", "5", "6"], "broken'
      );
      expect(result.keyFindings).toEqual(['1', '2', '3', '4', '5']);
    });

    test('uses placeholders when JSON fails validation', () => {
      const result = parseEvaluationResponse('{"key_findings": []}');
      expect(result.parseMode).toBe('unstructured_fallback');
      expect(result.businessAnswer).toBe('Analysis completed (JSON parsing issue)');
      expect(result.recommendedAction).toBe('Review the analysis results for insights');
    });

    test('takes plain prose as the answer', () => {
      const result = parseEvaluationResponse('  The closest match is PK-100.  ');
      expect(result.businessAnswer).toBe('The closest match is PK-100.');
      expect(result.parseMode).toBe('unstructured_fallback');
    });
  });

  describe('degradedEvaluation', () => {
    test('builds a low-confidence local result', () => {
      expect(degradedEvaluation('No data.', 'store query failed: timeout')).toEqual({
        businessAnswer: 'No data.',
        keyFindings: ['store query failed: timeout'],
        recommendedAction: 'Review previous stage results manually',
        confidenceLabel: 'low',
        dataQualityNote: 'poor - store query failed: timeout',
        parseMode: 'degraded',
      });
    });
  });

  // ==========================================================================
  // PROMPT AND CLIENT
  // ==========================================================================

  describe('buildEvaluationPrompt', () => {
    test('includes datasets, selection and notes', () => {
      const prompt = buildEvaluationPrompt('Which part?', {
        personaContext: 'Sales persona',
        stageTemplate: '# Stage 3',
        datasets: [{ label: 'Analysis results', rows: [{ part: 'PK-1' }] }],
        selection: {
          summary: 's',
          selectedKeys: ['PK-1'],
          reasoning: 'best fit',
          analysisFocus: 'f',
          mode: 'reasoned',
        },
        notes: ['The query returned no rows'],
      });
      expect(prompt.startsWith('# Stage 3\n\nPERSONA CONTEXT:\nSales persona')).toBe(true);
      expect(prompt).toContain('USER QUESTION: Which part?');
      expect(prompt).toContain('INTERMEDIATE ANALYSIS: best fit\nSELECTED ITEMS: PK-1');
      expect(prompt).toContain('ANALYSIS RESULTS: 1 records\npart: PK-1');
      expect(prompt).toContain('NOTES:\n- The query returned no rows');
      expect(prompt).toContain('DO NOT generate any SQL');
    });

    test('states an empty selection as none', () => {
      const prompt = buildEvaluationPrompt('q', {
        personaContext: 'p',
        datasets: [],
        selection: { summary: '', selectedKeys: [], reasoning: 'r', analysisFocus: '', mode: 'empty' },
      });
      expect(prompt).toContain('SELECTED ITEMS: none');
    });
  });

  describe('ClaudeEvaluator', () => {
    test('parses the model response', async () => {
      const client = new ScriptedClient(['{"business_answer": "Use PK-100.", "confidence": "high"}']);
      const result = await new ClaudeEvaluator(client).evaluate('q', { personaContext: 'p', datasets: [] });
      expect(result.businessAnswer).toBe('Use PK-100.');
      expect(client.prompts).toHaveLength(1);
    });

    test('propagates transport errors', async () => {
      const client = new ScriptedClient([new Error('529 overloaded')]);
      await expect(
        new ClaudeEvaluator(client).evaluate('q', { personaContext: 'p', datasets: [] })
      ).rejects.toThrow('529 overloaded');
    });
  });
});
