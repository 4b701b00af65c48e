/**
 * Competitor Mapping Direct Tool
 *
 * Maps competitor products to our equivalents without SQL generation.
 *
 * 1. Exact lookup of every key in the mapping table
 * 2. Keys with no mapping row get a keyword search against the product
 *    master (top 3 keywords, measurement terms first, 5 rows max)
 *
 * A key counts as matched when either step returned a row for it.
 *
 * Example triggers:
 *   "Replace BR-56U10 with our equivalent"
 *   "What do we offer instead of KT2040?"
 */

import type {
  ClassificationRecord,
  Row,
  StoreClient,
  ToolDefinition,
  ToolResult,
} from '../../../common/types.js';
import { DIRECT_TOOL_TABLES, PERSONAS } from '../../../common/constants.js';
import { DirectToolError } from '../errors.js';
import { entityValues, hasEntity, partitionInputs, unique } from './entities.js';

export const COMPETITOR_MAPPING_TOOL = 'competitor_mapping';

const PRODUCT_CODE_PATTERN = /[A-Z]{1,4}-[A-Z0-9]{3,10}|[A-Z]{2,4}[0-9]{2,6}/i;
const PRODUCT_CODE_PATTERN_GLOBAL = /\b(?:[A-Z]{1,4}-[A-Z0-9]{3,10}|[A-Z]{2,4}[0-9]{2,6})\b/gi;

const PRODUCT_NAME_PATTERNS: RegExp[] = [
  /replace\s+([\w\-.\s]+?)(?:\s+with|\s+and|\s+by|\s*[?!.]?$)/i,
  /(?:instead\s+of|equivalent\s+(?:to|for|of)|alternative\s+(?:to|for))\s+([\w\-.\s]+?)(?:\s+with|\s+and|\s*[?!.]?$)/i,
];

const STOPWORDS = new Set(['the', 'a', 'an', 'with', 'for', 'and', 'or', 'of']);
const TECHNICAL_INDICATORS = ['ml', 'mm', 'cm', 'gauge', 'fr', 'ch'];
const MAX_KEYWORDS = 5;
const SEARCH_KEYWORDS = 3;
const FUZZY_ROW_LIMIT = 5;

// =============================================================================
// APPLICABILITY
// =============================================================================

/**
 * Sales-rep questions carrying a competitor product entity or a product code
 */
export function isCompetitorMappingApplicable(
  question: string,
  classification: ClassificationRecord
): boolean {
  if (classification.persona !== PERSONAS.SALES_REP) {
    return false;
  }
  return hasEntity(classification, 'competitorProduct') || PRODUCT_CODE_PATTERN.test(question);
}

// =============================================================================
// KEY EXTRACTION
// =============================================================================

/**
 * Product name from phrasings like "replace X with ..." or "instead of X"
 */
export function extractProductName(question: string): string | undefined {
  for (const pattern of PRODUCT_NAME_PATTERNS) {
    const match = question.match(pattern);
    const name = match?.[1]?.trim();
    if (name) return name;
  }
  return undefined;
}

export function extractProductCodes(question: string): string[] {
  return unique([...question.matchAll(PRODUCT_CODE_PATTERN_GLOBAL)].map((m) => m[0].toUpperCase()));
}

/**
 * Lookup keys: the competitorProduct entity, else a product name from the
 * question, else the product codes in it
 */
export function extractLookupKeys(question: string, classification: ClassificationRecord): string[] {
  const fromEntity = entityValues(classification, 'competitorProduct');
  if (fromEntity.length > 0) return fromEntity;

  const name = extractProductName(question);
  if (name) return [name];

  return extractProductCodes(question);
}

/**
 * Searchable keywords of a product name, measurement terms first
 */
export function extractProductKeywords(productName: string): string[] {
  const words = productName
    .toLowerCase()
    .split(/[\s\-.]+/)
    .map((w) => w.trim())
    .filter((w) => w.length > 2 && !STOPWORDS.has(w));

  const prioritized: string[] = [];
  for (const word of words) {
    if (TECHNICAL_INDICATORS.some((indicator) => word.includes(indicator))) {
      prioritized.unshift(word);
    } else {
      prioritized.push(word);
    }
  }
  return prioritized.slice(0, MAX_KEYWORDS);
}

// =============================================================================
// QUERIES
// =============================================================================

export function buildExactMappingQuery(table: string): string {
  return `SELECT competitor_product, competitor_name, our_part_number, our_product_name, 'direct_mapping' AS mapping_type
FROM ${table}
WHERE UPPER(competitor_product) = ANY($1::text[])
ORDER BY competitor_product, our_part_number`;
}

/**
 * Keyword search; $1..$n are the %keyword% patterns, $1 also ranks results
 */
export function buildFuzzySearchQuery(table: string, keywordCount: number): string {
  const conditions = Array.from({ length: keywordCount }, (_, i) => `product_name ILIKE $${i + 1}`);
  return `SELECT part_number AS our_part_number, product_name AS our_product_name, specifications, 'fuzzy_match' AS mapping_type, 0.7 AS estimated_confidence
FROM ${table}
WHERE ${conditions.join(' OR ')}
ORDER BY CASE WHEN product_name ILIKE $1 THEN 1 ELSE 2 END, part_number
LIMIT ${FUZZY_ROW_LIMIT}`;
}

// =============================================================================
// EXECUTOR
// =============================================================================

export function createCompetitorMappingTool(
  store: StoreClient,
  tables: { mapping: string; productMaster: string } = {
    mapping: DIRECT_TOOL_TABLES.COMPETITOR_MAPPING,
    productMaster: DIRECT_TOOL_TABLES.PRODUCT_MASTER,
  }
): ToolDefinition {
  async function execute(question: string, classification: ClassificationRecord): Promise<ToolResult> {
    const keys = extractLookupKeys(question, classification);
    if (keys.length === 0) {
      throw new DirectToolError(COMPETITOR_MAPPING_TOOL, 'could not extract a competitor product from the question');
    }

    const exactSql = buildExactMappingQuery(tables.mapping);
    const exact = await store.query(exactSql, [keys.map((k) => k.toUpperCase())]);
    const exactPartition = partitionInputs(keys, exact.rows, 'competitor_product');

    const rows: Row[] = [...exact.rows];
    const executed: string[] = [exactSql];
    const matchedInputs = [...exactPartition.matchedInputs];
    const unmatchedInputs: string[] = [];

    for (const key of exactPartition.unmatchedInputs) {
      const keywords = extractProductKeywords(key).slice(0, SEARCH_KEYWORDS);
      if (keywords.length === 0) {
        unmatchedInputs.push(key);
        continue;
      }

      const fuzzySql = buildFuzzySearchQuery(tables.productMaster, keywords.length);
      const fuzzy = await store.query(
        fuzzySql,
        keywords.map((k) => `%${k}%`)
      );
      executed.push(fuzzySql);

      if (fuzzy.rows.length > 0) {
        rows.push(...fuzzy.rows.map((row) => ({ ...row, competitor_product: key })));
        matchedInputs.push(key);
      } else {
        unmatchedInputs.push(key);
      }
    }

    return {
      rows,
      rowCount: rows.length,
      executedQuery: executed.join(';\n'),
      matchedInputs,
      unmatchedInputs,
    };
  }

  return {
    name: COMPETITOR_MAPPING_TOOL,
    persona: PERSONAS.SALES_REP,
    description: 'Direct competitor product mapping to our equivalent products',
    predicate: isCompetitorMappingApplicable,
    executor: execute,
    exampleTriggers: [
      'Replace BR-56U10 with our equivalent',
      'What do we offer instead of KT2040?',
      'BR-56U10 equivalent',
    ],
  };
}
