/**
 * Jest Unit Tests for the Direct Tool Registry
 *
 * Tests validation, construction order, freezing, stats and predicate testing.
 */

import type { ToolDefinition } from '../../../common/types.js';
import {
  createToolRegistry,
  getRegistryStats,
  getToolsForPersona,
  testPredicate,
  validateToolDefinition,
} from '../tool-registry.js';
import { ToolRegistryError } from '../errors.js';
import { toolResult } from './fixtures.js';

function definition(name: string, persona: string, predicate = (q: string) => q.includes(name)): ToolDefinition {
  return {
    name,
    persona,
    description: `${name} lookup`,
    predicate: (question) => predicate(question),
    executor: async () => toolResult([]),
    exampleTriggers: [`use ${name}`],
  };
}

describe('Tool Registry', () => {
  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  describe('validateToolDefinition', () => {
    test('accepts a complete definition', () => {
      expect(validateToolDefinition(definition('alpha', 'sales_rep'))).toEqual([]);
    });

    test('reports every missing field', () => {
      expect(validateToolDefinition({ name: 'alpha' })).toEqual([
        '[alpha] Missing required field: persona',
        '[alpha] Missing required field: description',
        '[alpha] predicate must be callable',
        '[alpha] executor must be callable',
      ]);
    });

    test('treats a blank name as missing', () => {
      const errors = validateToolDefinition({ ...definition('alpha', 'sales_rep'), name: ' ' });
      expect(errors).toEqual(['[ ] Missing required field: name']);
    });
  });

  // ==========================================================================
  // CONSTRUCTION
  // ==========================================================================

  describe('createToolRegistry', () => {
    test('keeps registration order per persona', () => {
      const registry = createToolRegistry([
        definition('alpha', 'sales_rep'),
        definition('beta', 'product_planning'),
        definition('gamma', 'sales_rep'),
      ]);
      expect(getToolsForPersona(registry, 'sales_rep').map((t) => t.name)).toEqual(['alpha', 'gamma']);
      expect(getToolsForPersona(registry, 'product_planning').map((t) => t.name)).toEqual(['beta']);
    });

    test('returns an empty list for unknown personas', () => {
      const registry = createToolRegistry([definition('alpha', 'sales_rep')]);
      expect(getToolsForPersona(registry, 'finance')).toEqual([]);
    });

    test('freezes descriptors and lists', () => {
      const registry = createToolRegistry([definition('alpha', 'sales_rep')]);
      const tools = getToolsForPersona(registry, 'sales_rep');
      expect(Object.isFrozen(tools)).toBe(true);
      expect(Object.isFrozen(tools[0])).toBe(true);
      expect(Object.isFrozen(tools[0].exampleTriggers)).toBe(true);
    });

    test('exposes the mapping without mutators', () => {
      const registry = createToolRegistry([definition('alpha', 'sales_rep')]);
      expect(Object.isFrozen(registry)).toBe(true);
      expect('set' in registry).toBe(false);
      expect('delete' in registry).toBe(false);
      expect('clear' in registry).toBe(false);
      expect([...registry.keys()]).toEqual(['sales_rep']);
      expect(registry.size).toBe(1);
    });

    test('rejects duplicate names within a persona', () => {
      expect(() =>
        createToolRegistry([definition('alpha', 'sales_rep'), definition('alpha', 'sales_rep')])
      ).toThrow("Duplicate tool name 'alpha' for persona 'sales_rep'");
    });

    test('allows the same name under different personas', () => {
      const registry = createToolRegistry([
        definition('alpha', 'sales_rep'),
        definition('alpha', 'product_planning'),
      ]);
      expect(registry.size).toBe(2);
    });

    test('collects every problem into one ToolRegistryError', () => {
      let caught: unknown;
      try {
        createToolRegistry([{ ...definition('alpha', 'sales_rep'), description: '' }, definition('alpha', 'sales_rep')]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ToolRegistryError);
      if (caught instanceof ToolRegistryError) {
        expect(caught.problems).toEqual([
          '[alpha] Missing required field: description',
          "Duplicate tool name 'alpha' for persona 'sales_rep'",
        ]);
      }
    });
  });

  // ==========================================================================
  // STATS AND PREDICATE TESTING
  // ==========================================================================

  describe('getRegistryStats', () => {
    test('counts personas and tools', () => {
      const registry = createToolRegistry([
        definition('alpha', 'sales_rep'),
        definition('beta', 'sales_rep'),
        definition('gamma', 'product_planning'),
      ]);
      expect(getRegistryStats(registry)).toEqual({
        totalPersonas: 2,
        totalTools: 3,
        personas: {
          sales_rep: { toolCount: 2, toolNames: ['alpha', 'beta'] },
          product_planning: { toolCount: 1, toolNames: ['gamma'] },
        },
      });
    });
  });

  describe('testPredicate', () => {
    const registry = createToolRegistry([
      definition('alpha', 'sales_rep'),
      definition('broken', 'sales_rep', () => {
        throw new Error('bad regex');
      }),
    ]);

    test('reports matches and the match rate', () => {
      const report = testPredicate(registry, 'sales_rep', 'alpha', ['use alpha', 'something else']);
      expect(report).toEqual({
        found: true,
        toolName: 'alpha',
        persona: 'sales_rep',
        results: [
          { question: 'use alpha', matches: true },
          { question: 'something else', matches: false },
        ],
        matchRate: 0.5,
      });
    });

    test('reports predicate exceptions per question', () => {
      const report = testPredicate(registry, 'sales_rep', 'broken', ['anything']);
      expect(report).toEqual({
        found: true,
        toolName: 'broken',
        persona: 'sales_rep',
        results: [{ question: 'anything', matches: false, error: 'bad regex' }],
        matchRate: 0,
      });
    });

    test('reports unknown tools', () => {
      expect(testPredicate(registry, 'product_planning', 'alpha', ['x'])).toEqual({
        found: false,
        error: 'Tool alpha not found for persona product_planning',
      });
    });
  });
});
