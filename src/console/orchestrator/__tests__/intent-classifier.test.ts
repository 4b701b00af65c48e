/**
 * Jest Unit Tests for the Intent Classifier
 *
 * Tests record construction, the safe default, and response validation
 * against a scripted completion client.
 */

import {
  buildClassificationPrompt,
  ClaudeIntentClassifier,
  createClassification,
  defaultClassification,
  type PersonaCatalog,
} from '../intent-classifier.js';
import { ClassificationError } from '../errors.js';
import { ScriptedClient } from './fixtures.js';

const catalog: PersonaCatalog = {
  listPersonas: () => [
    { name: 'product_planning', description: 'BOM and stock', tables: ['bill_of_materials'] },
    { name: 'sales_rep', description: 'Competitive cross-references', tables: [] },
  ],
};

describe('Intent Classifier', () => {
  // ==========================================================================
  // RECORDS
  // ==========================================================================

  describe('createClassification', () => {
    test('freezes the record and its entity lists', () => {
      const record = createClassification({
        intent: 'lookup',
        persona: 'sales_rep',
        confidence: 0.8,
        executionStrategy: 'single_stage',
        extractedEntities: { competitorProduct: ['BR-56U10'] },
        enableEvaluation: true,
      });
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.extractedEntities)).toBe(true);
      expect(Object.isFrozen(record.extractedEntities.competitorProduct)).toBe(true);
    });

    test('copies entity lists from the input', () => {
      const parts = ['PK-1'];
      const record = createClassification({
        intent: 'lookup',
        persona: 'product_planning',
        confidence: 0.8,
        executionStrategy: 'single_stage',
        extractedEntities: { partNumber: parts },
        enableEvaluation: true,
      });
      parts.push('PK-2');
      expect(record.extractedEntities.partNumber).toEqual(['PK-1']);
    });

    test('omits empty reasoning', () => {
      const record = createClassification({
        intent: 'lookup',
        persona: 'sales_rep',
        confidence: 0.8,
        executionStrategy: 'single_stage',
        enableEvaluation: true,
        reasoning: '',
      });
      expect('reasoning' in record).toBe(false);
      expect(record.extractedEntities).toEqual({});
    });
  });

  describe('defaultClassification', () => {
    test('is a single-stage general query with evaluation', () => {
      expect(defaultClassification('product_planning', 'timeout')).toEqual({
        intent: 'general_query',
        persona: 'product_planning',
        confidence: 0.5,
        executionStrategy: 'single_stage',
        extractedEntities: {},
        enableEvaluation: true,
        reasoning: 'Fallback classification: timeout',
      });
    });
  });

  describe('buildClassificationPrompt', () => {
    test('lists personas with their tables', () => {
      const prompt = buildClassificationPrompt('Top customers?', catalog.listPersonas());
      expect(prompt).toContain('- product_planning: BOM and stock\n  Tables: bill_of_materials');
      expect(prompt).toContain('- sales_rep: Competitive cross-references\n  Tables: No specific tables');
      expect(prompt).toContain('Analyze this question: "Top customers?"');
    });

    test('notes when no personas exist', () => {
      expect(buildClassificationPrompt('q', [])).toContain('- (no personas configured)');
    });
  });

  // ==========================================================================
  // CLASSIFY
  // ==========================================================================

  describe('ClaudeIntentClassifier', () => {
    test('maps a fenced JSON response onto a record', async () => {
      const client = new ScriptedClient([
        '```json\n{"intent": "competitor_lookup", "persona": "sales_rep", "confidence": 0.92, "execution_strategy": "single_stage", "extracted_entities": {"competitorProduct": "BR-56U10"}, "enable_evaluation": false, "reasoning": "names a competitor code"}\n```',
      ]);
      const record = await new ClaudeIntentClassifier(client, catalog).classify('Replace BR-56U10');
      expect(record).toEqual({
        intent: 'competitor_lookup',
        persona: 'sales_rep',
        confidence: 0.92,
        executionStrategy: 'single_stage',
        extractedEntities: { competitorProduct: 'BR-56U10' },
        enableEvaluation: false,
        reasoning: 'names a competitor code',
      });
      expect(client.options[0]?.temperature).toBe(0);
    });

    test('wraps transport errors', async () => {
      const client = new ScriptedClient([new Error('503 overloaded')]);
      await expect(new ClaudeIntentClassifier(client, catalog).classify('q')).rejects.toThrow(
        'Classifier unavailable: 503 overloaded'
      );
    });

    test('rejects an empty response', async () => {
      const client = new ScriptedClient(['  ']);
      await expect(new ClaudeIntentClassifier(client, catalog).classify('q')).rejects.toThrow(
        'Classifier returned an empty response'
      );
    });

    test('rejects prose without JSON', async () => {
      const client = new ScriptedClient(['I think this is about sales.']);
      await expect(new ClaudeIntentClassifier(client, catalog).classify('q')).rejects.toThrow(
        'Classifier response is not a JSON object'
      );
    });

    test('rejects a response missing the persona', async () => {
      const client = new ScriptedClient(['{"intent": "x"}']);
      const result = new ClaudeIntentClassifier(client, catalog).classify('q');
      await expect(result).rejects.toBeInstanceOf(ClassificationError);
      await expect(result).rejects.toThrow('Invalid classifier response: persona:');
    });
  });
});
