/**
 * Direct Tool Registry
 *
 * persona → ordered direct tools, built once at start-up and frozen.
 * Registration order is dispatch order. Nothing mutates the registry at
 * request time; tests build their own registries from plain definitions.
 */

import type {
  ToolDefinition,
  ToolDescriptor,
  ToolRegistry,
} from '../../common/types.js';
import { errorMessage } from '../../common/utils/timeout.js';
import { ToolRegistryError } from './errors.js';
import { createClassification } from './intent-classifier.js';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Problems with one tool definition; empty when valid
 */
export function validateToolDefinition(definition: Partial<ToolDefinition>): string[] {
  const errors: string[] = [];
  const label = definition.name ? `[${definition.name}] ` : '';

  for (const field of ['name', 'persona', 'description'] as const) {
    const value = definition[field];
    if (typeof value !== 'string' || !value.trim()) {
      errors.push(`${label}Missing required field: ${field}`);
    }
  }

  if (typeof definition.predicate !== 'function') {
    errors.push(`${label}predicate must be callable`);
  }

  if (typeof definition.executor !== 'function') {
    errors.push(`${label}executor must be callable`);
  }

  return errors;
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

function toDescriptor(definition: ToolDefinition): ToolDescriptor {
  return Object.freeze({
    name: definition.name,
    persona: definition.persona,
    description: definition.description,
    predicate: definition.predicate,
    executor: definition.executor,
    exampleTriggers: Object.freeze([...(definition.exampleTriggers ?? [])]),
  });
}

/**
 * Validate every definition, then build the frozen persona → tools mapping
 *
 * @throws ToolRegistryError listing every problem found
 */
export function createToolRegistry(definitions: readonly ToolDefinition[]): ToolRegistry {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const definition of definitions) {
    problems.push(...validateToolDefinition(definition));
    const key = `${definition.persona}:${definition.name}`;
    if (seen.has(key)) {
      problems.push(`Duplicate tool name '${definition.name}' for persona '${definition.persona}'`);
    }
    seen.add(key);
  }

  if (problems.length > 0) {
    throw new ToolRegistryError(problems);
  }

  const byPersona = new Map<string, ToolDescriptor[]>();
  for (const definition of definitions) {
    const tools = byPersona.get(definition.persona) ?? [];
    tools.push(toDescriptor(definition));
    byPersona.set(definition.persona, tools);
  }

  const frozen = new Map<string, readonly ToolDescriptor[]>();
  for (const [persona, tools] of byPersona) {
    frozen.set(persona, Object.freeze(tools));
  }
  return Object.freeze(new FrozenToolRegistry(frozen));
}

/**
 * Read-only view over the persona → tools mapping; there is no set, delete or clear
 */
class FrozenToolRegistry implements ToolRegistry {
  constructor(private readonly byPersona: ReadonlyMap<string, readonly ToolDescriptor[]>) {}

  get size() {
    return this.byPersona.size;
  }

  get(persona: string) {
    return this.byPersona.get(persona);
  }

  has(persona: string) {
    return this.byPersona.has(persona);
  }

  forEach(
    callback: (tools: readonly ToolDescriptor[], persona: string, registry: ToolRegistry) => void,
    thisArg?: unknown
  ): void {
    this.byPersona.forEach((tools, persona) => callback.call(thisArg, tools, persona, this));
  }

  keys() {
    return this.byPersona.keys();
  }

  values() {
    return this.byPersona.values();
  }

  entries() {
    return this.byPersona.entries();
  }

  [Symbol.iterator]() {
    return this.byPersona[Symbol.iterator]();
  }
}

// =============================================================================
// READ HELPERS
// =============================================================================

/**
 * Ordered tools for a persona; empty when the persona has none
 */
export function getToolsForPersona(registry: ToolRegistry, persona: string): readonly ToolDescriptor[] {
  return registry.get(persona) ?? [];
}

export interface RegistryStats {
  totalPersonas: number;
  totalTools: number;
  personas: Record<string, { toolCount: number; toolNames: string[] }>;
}

export function getRegistryStats(registry: ToolRegistry): RegistryStats {
  const personas: RegistryStats['personas'] = {};
  let totalTools = 0;

  for (const [persona, tools] of registry) {
    totalTools += tools.length;
    personas[persona] = {
      toolCount: tools.length,
      toolNames: tools.map((t) => t.name),
    };
  }

  return {
    totalPersonas: registry.size,
    totalTools,
    personas,
  };
}

export interface PredicateTestResult {
  question: string;
  matches: boolean;
  error?: string;
}

export type PredicateTestReport =
  | {
      found: true;
      toolName: string;
      persona: string;
      results: PredicateTestResult[];
      /** Share of questions matched (0-1) */
      matchRate: number;
    }
  | { found: false; error: string };

/**
 * Run a tool's predicate over sample questions
 *
 * Each question is paired with a minimal classification for the persona.
 * Predicate exceptions are reported per question.
 */
export function testPredicate(
  registry: ToolRegistry,
  persona: string,
  toolName: string,
  questions: readonly string[]
): PredicateTestReport {
  const tool = getToolsForPersona(registry, persona).find((t) => t.name === toolName);
  if (!tool) {
    return { found: false, error: `Tool ${toolName} not found for persona ${persona}` };
  }

  const classification = createClassification({
    intent: 'predicate_test',
    persona,
    confidence: 1,
    executionStrategy: 'single_stage',
    extractedEntities: {},
    enableEvaluation: true,
  });

  const results = questions.map((question): PredicateTestResult => {
    try {
      return { question, matches: tool.predicate(question, classification) };
    } catch (error) {
      return { question, matches: false, error: errorMessage(error) };
    }
  });

  const matched = results.filter((r) => r.matches).length;
  return {
    found: true,
    toolName,
    persona,
    results,
    matchRate: results.length > 0 ? matched / results.length : 0,
  };
}
