/**
 * Jest Unit Tests for the Component Lookup Direct Tool
 */

import {
  createComponentLookupTool,
  extractParentParts,
  isComponentLookupApplicable,
} from '../direct-tools/component-lookup.js';
import { createBuiltInToolDefinitions } from '../direct-tools/index.js';
import { createToolRegistry, testPredicate } from '../tool-registry.js';
import { classificationFor, FakeStore } from './fixtures.js';

const planning = classificationFor('product_planning');

describe('Component Lookup Tool', () => {
  describe('isComponentLookupApplicable', () => {
    test('accepts "components in <part>"', () => {
      expect(isComponentLookupApplicable('List the components in PK-2201', planning)).toBe(true);
    });

    test('accepts a partNumber entity', () => {
      const classification = classificationFor('product_planning', { entities: { partNumber: 'PK-2201' } });
      expect(isComponentLookupApplicable('How is PK-2201 built?', classification)).toBe(true);
    });

    test('rejects unrelated planning questions', () => {
      expect(isComponentLookupApplicable('Which suppliers have long lead times?', planning)).toBe(false);
    });

    test('rejects other personas', () => {
      expect(isComponentLookupApplicable('components in PK-2201', classificationFor('sales_rep'))).toBe(false);
    });
  });

  describe('extractParentParts', () => {
    test('reads the part from the question', () => {
      expect(extractParentParts('What components for KT2040?', planning)).toEqual(['KT2040']);
    });

    test('prefers the partNumber entity', () => {
      const classification = classificationFor('product_planning', { entities: { partNumber: ['A-1', 'B-2'] } });
      expect(extractParentParts('components in PK-2201', classification)).toEqual(['A-1', 'B-2']);
    });
  });

  describe('executor', () => {
    test('partitions parts by the rows returned', async () => {
      const store = new FakeStore([
        [
          { parent_part_number: 'A-1', component_part_number: 'C-10', quantity_per: 2 },
          { parent_part_number: 'A-1', component_part_number: 'C-11', quantity_per: 1 },
        ],
      ]);
      const tool = createComponentLookupTool(store);
      const classification = classificationFor('product_planning', { entities: { partNumber: ['a-1', 'B-2'] } });

      const result = await tool.executor('components', classification);
      expect(store.calls[0].params).toEqual([['A-1', 'B-2']]);
      expect(store.calls[0].sql).toContain('FROM bill_of_materials');
      expect(result.rowCount).toBe(2);
      expect(result.matchedInputs).toEqual(['a-1']);
      expect(result.unmatchedInputs).toEqual(['B-2']);
    });

    test('throws when no part can be extracted', async () => {
      const tool = createComponentLookupTool(new FakeStore());
      await expect(tool.executor('What is in stock?', planning)).rejects.toThrow(
        'Direct tool [component_lookup] failed: could not extract a part number from the question'
      );
    });
  });

  describe('built-in registry', () => {
    const registry = createToolRegistry(createBuiltInToolDefinitions(new FakeStore()));

    test('registers one tool per persona', () => {
      expect(registry.get('sales_rep')?.map((t) => t.name)).toEqual(['competitor_mapping']);
      expect(registry.get('product_planning')?.map((t) => t.name)).toEqual(['component_lookup']);
    });

    test.each([
      ['sales_rep', 'competitor_mapping'],
      ['product_planning', 'component_lookup'],
    ])('example triggers of %s/%s match their predicate', (persona, toolName) => {
      const tool = registry.get(persona)?.find((t) => t.name === toolName);
      const report = testPredicate(registry, persona, toolName, tool?.exampleTriggers ?? []);
      expect(report.found).toBe(true);
      if (report.found) {
        expect(report.results.length).toBeGreaterThan(0);
        expect(report.matchRate).toBe(1);
      }
    });
  });
});
