/**
 * Component Lookup Direct Tool
 *
 * Bill-of-materials lookup for "components in/for <part>" questions.
 */

import type {
  ClassificationRecord,
  StoreClient,
  ToolDefinition,
  ToolResult,
} from '../../../common/types.js';
import { DIRECT_TOOL_TABLES, PERSONAS } from '../../../common/constants.js';
import { DirectToolError } from '../errors.js';
import { entityValues, hasEntity, partitionInputs } from './entities.js';

export const COMPONENT_LOOKUP_TOOL = 'component_lookup';

const COMPONENT_QUESTION_PATTERN = /components?\s+(?:in|for|of)\s+([\w\-]+)/i;

export function isComponentLookupApplicable(
  question: string,
  classification: ClassificationRecord
): boolean {
  if (classification.persona !== PERSONAS.PRODUCT_PLANNING) {
    return false;
  }
  return hasEntity(classification, 'partNumber') || COMPONENT_QUESTION_PATTERN.test(question);
}

/**
 * Parent part numbers: the partNumber entity, else the part named in the question
 */
export function extractParentParts(question: string, classification: ClassificationRecord): string[] {
  const fromEntity = entityValues(classification, 'partNumber');
  if (fromEntity.length > 0) return fromEntity;

  const match = question.match(COMPONENT_QUESTION_PATTERN);
  return match ? [match[1]] : [];
}

export function buildComponentQuery(table: string): string {
  return `SELECT parent_part_number, component_part_number, component_description, quantity_per, unit_of_measure
FROM ${table}
WHERE UPPER(parent_part_number) = ANY($1::text[])
ORDER BY parent_part_number, component_part_number`;
}

export function createComponentLookupTool(
  store: StoreClient,
  table: string = DIRECT_TOOL_TABLES.BILL_OF_MATERIALS
): ToolDefinition {
  async function execute(question: string, classification: ClassificationRecord): Promise<ToolResult> {
    const parts = extractParentParts(question, classification);
    if (parts.length === 0) {
      throw new DirectToolError(COMPONENT_LOOKUP_TOOL, 'could not extract a part number from the question');
    }

    const sql = buildComponentQuery(table);
    const result = await store.query(sql, [parts.map((p) => p.toUpperCase())]);

    return {
      rows: result.rows,
      rowCount: result.rows.length,
      executedQuery: sql,
      ...partitionInputs(parts, result.rows, 'parent_part_number'),
    };
  }

  return {
    name: COMPONENT_LOOKUP_TOOL,
    persona: PERSONAS.PRODUCT_PLANNING,
    description: 'Direct bill-of-materials lookup for a part',
    predicate: isComponentLookupApplicable,
    executor: execute,
    exampleTriggers: ['List the components in PK-2201', 'What components for KT2040?'],
  };
}
