/**
 * Evaluator
 *
 * Turns already-retrieved rows into a business answer. Never issues SQL.
 *
 * Output is parsed in two tiers:
 * 1. Structured: a JSON object validated by EvaluationResponseSchema
 * 2. Unstructured fallback: scalar fields recovered from the raw text
 *
 * A parse failure is never an error for the caller. Transport errors do
 * propagate; the orchestrator replaces them with degradedEvaluation().
 */

import type {
  Evaluator,
  EvaluationInput,
  EvaluationResult,
  ConfidenceLabel,
} from '../../common/types.js';
import { EvaluationResponseSchema } from '../../common/schemas/index.js';
import {
  extractJsonObject,
  extractStringField,
  extractStringArrayField,
} from '../../common/utils/json-extractor.js';
import { compressRows } from '../../common/utils/row-compression.js';
import { logWarn } from '../../common/services/logger.js';
import { EvaluationParseError } from './errors.js';
import type { CompletionClient } from './claude-client.js';

const MAX_RECOVERED_FINDINGS = 5;
const MAX_PROSE_ANSWER_CHARS = 1000;

export const UNSTRUCTURED_FALLBACK_NOTE = 'unstructured fallback';

// =============================================================================
// PROMPT
// =============================================================================

export function buildEvaluationPrompt(
  question: string,
  input: EvaluationInput,
  maxRecords = 10
): string {
  const sections: string[] = [];

  if (input.stageTemplate) {
    sections.push(input.stageTemplate);
  }

  sections.push(`PERSONA CONTEXT:\n${input.personaContext}`);
  sections.push(`USER QUESTION: ${question}`);

  if (input.selection) {
    sections.push(
      `INTERMEDIATE ANALYSIS: ${input.selection.reasoning}\nSELECTED ITEMS: ${
        input.selection.selectedKeys.join(', ') || 'none'
      }`
    );
  }

  for (const dataset of input.datasets) {
    sections.push(
      `${dataset.label.toUpperCase()}: ${dataset.rows.length} records\n${compressRows(dataset.rows, maxRecords)}`
    );
  }

  if (input.notes && input.notes.length > 0) {
    sections.push(`NOTES:\n${input.notes.map((n) => `- ${n}`).join('\n')}`);
  }

  sections.push(`IMPORTANT: DO NOT generate any SQL. Analyze only the data provided above.
The retrieved data is authoritative. When the question states something the data contradicts
(a price, a quantity, a mapping, a date), answer from the data and list each discrepancy as a
key finding.

Respond with JSON only, escaping special characters inside strings:
{
  "business_answer": "direct answer to the user question",
  "key_findings": ["finding1", "finding2", "finding3"],
  "recommended_action": "what the user should do next",
  "confidence": "high|medium|low",
  "data_quality": "assessment of result reliability"
}`);

  return sections.join('\n\n');
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Tier 1: strict JSON parse validated against the schema
 */
export function parseStructuredEvaluation(text: string): EvaluationResult {
  const json = extractJsonObject(text);
  if (!json) {
    throw new EvaluationParseError('Evaluation response contains no JSON object', text);
  }

  const parsed = EvaluationResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`)
      .join('; ');
    throw new EvaluationParseError(`Invalid evaluation response: ${issues}`, text);
  }

  const data = parsed.data;
  const confidence: ConfidenceLabel =
    data.confidence ?? data.supporting_data?.confidence ?? 'medium';

  return {
    businessAnswer: data.business_answer,
    keyFindings: data.key_findings,
    recommendedAction: data.recommended_action,
    confidenceLabel: confidence,
    dataQualityNote: data.data_quality || 'not assessed',
    parseMode: 'structured',
  };
}

/**
 * Tier 2: recover scalar fields from text that never became valid JSON
 *
 * Plain prose with no JSON at all is taken as the answer itself.
 */
export function recoverUnstructuredEvaluation(text: string): EvaluationResult {
  const trimmed = text.trim();
  const looksLikeJson = trimmed.includes('{');

  const businessAnswer =
    extractStringField(trimmed, 'business_answer') ??
    (!looksLikeJson && trimmed
      ? trimmed.substring(0, MAX_PROSE_ANSWER_CHARS)
      : 'Analysis completed (JSON parsing issue)');

  return {
    businessAnswer,
    keyFindings: extractStringArrayField(trimmed, 'key_findings').slice(0, MAX_RECOVERED_FINDINGS),
    recommendedAction:
      extractStringField(trimmed, 'recommended_action') ?? 'Review the analysis results for insights',
    confidenceLabel: 'low',
    dataQualityNote: UNSTRUCTURED_FALLBACK_NOTE,
    parseMode: 'unstructured_fallback',
  };
}

/**
 * Two-tier parse; never throws
 */
export function parseEvaluationResponse(text: string): EvaluationResult {
  try {
    return parseStructuredEvaluation(text);
  } catch (error) {
    if (!(error instanceof EvaluationParseError)) {
      throw error;
    }
    logWarn('Evaluation output not structured, recovering fields', {
      stage: 'evaluation',
      error: error.message,
      error_kind: error.kind,
    });
    return recoverUnstructuredEvaluation(text);
  }
}

/**
 * Locally built evaluation for when no model evaluation is possible
 */
export function degradedEvaluation(businessAnswer: string, reason: string): EvaluationResult {
  return {
    businessAnswer,
    keyFindings: [reason],
    recommendedAction: 'Review previous stage results manually',
    confidenceLabel: 'low',
    dataQualityNote: `poor - ${reason}`,
    parseMode: 'degraded',
  };
}

// =============================================================================
// EVALUATOR
// =============================================================================

export class ClaudeEvaluator implements Evaluator {
  constructor(
    private readonly client: CompletionClient,
    private readonly maxRecords = 10
  ) {}

  async evaluate(question: string, input: EvaluationInput): Promise<EvaluationResult> {
    const response = await this.client.complete(
      buildEvaluationPrompt(question, input, this.maxRecords),
      {
        system:
          'You are a business analyst. Analyze data and provide insights. DO NOT generate SQL queries.',
        maxTokens: 800,
        temperature: 0,
      }
    );
    return parseEvaluationResponse(response.text);
  }
}
