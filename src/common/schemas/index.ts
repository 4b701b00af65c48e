/**
 * Zod validation schemas
 *
 * - Model outputs: classifier, candidate selection, evaluation
 * - Classification records from any classifier
 * - MCP tool inputs: ask_business_question, list_direct_tools
 *
 * Model-output schemas use the snake_case keys the prompts ask for;
 * the capability implementations map them onto the camelCase domain types.
 */

import { z } from 'zod';

// =============================================================================
// SHARED
// =============================================================================

/** Model output sometimes has numeric codes where strings are expected */
const looseString = z.union([z.string(), z.number().transform((n) => String(n))]);

const confidenceLabel = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(['high', 'medium', 'low']));

// =============================================================================
// CLASSIFIER OUTPUT
// =============================================================================

/**
 * Schema for the classifier's JSON response
 */
export const ClassificationResponseSchema = z.object({
  intent: z.string().min(1).default('general_query'),

  persona: z.string().min(1, 'persona is required'),

  confidence: z.number().min(0).max(1).default(0.5),

  execution_strategy: z
    .enum(['single_stage', 'multi_stage', 'iterative'])
    .default('single_stage'),

  extracted_entities: z
    .record(z.union([looseString, z.array(looseString), z.null()]))
    .default({}),

  enable_evaluation: z.boolean().default(true),

  reasoning: z.string().optional(),
});

export type ClassificationResponse = z.infer<typeof ClassificationResponseSchema>;

/**
 * Shape check for a record returned by any Classifier implementation
 */
export const ClassificationRecordSchema = z.object({
  intent: z.string(),
  persona: z.string().trim().min(1, 'persona is required'),
  confidence: z.number().min(0).max(1),
  executionStrategy: z.enum(['single_stage', 'multi_stage', 'iterative']),
  extractedEntities: z.record(z.union([z.string(), z.array(z.string()), z.null()])),
  enableEvaluation: z.boolean(),
});

// =============================================================================
// CANDIDATE SELECTION OUTPUT
// =============================================================================

/**
 * Schema for the intermediate selection response (between Discovery and Analysis)
 */
export const SelectionResponseSchema = z.object({
  summary: z.string().default(''),
  selected_items: z.array(looseString).default([]),
  reasoning: z.string().default(''),
  stage2_focus: z.string().default(''),
});

export type SelectionResponse = z.infer<typeof SelectionResponseSchema>;

// =============================================================================
// EVALUATION OUTPUT
// =============================================================================

/**
 * Schema for the evaluation response
 *
 * Confidence may arrive at the top level or under supporting_data.
 */
export const EvaluationResponseSchema = z.object({
  business_answer: z.string().min(1, 'business_answer is required'),
  key_findings: z.array(z.string()).default([]),
  recommended_action: z.string().default(''),
  confidence: confidenceLabel.optional(),
  supporting_data: z
    .object({
      confidence: confidenceLabel.optional(),
    })
    .passthrough()
    .optional(),
  data_quality: z.string().default(''),
});

export type EvaluationResponse = z.infer<typeof EvaluationResponseSchema>;

// =============================================================================
// MCP TOOL INPUTS
// =============================================================================

/**
 * Schema for ask_business_question tool input
 */
export const AskQuestionSchema = z.object({
  question: z
    .string()
    .min(1, 'Question must be at least 1 character')
    .max(2000, 'Question must be at most 2000 characters')
    .describe('Natural-language business question, e.g. "Replace BR-56U10 with our equivalent"'),

  format: z
    .enum(['markdown', 'json'])
    .default('markdown')
    .describe('markdown = rendered answer with execution details, json = raw response envelope'),
});

export type AskQuestionInput = z.infer<typeof AskQuestionSchema>;

/**
 * Schema for list_direct_tools tool input
 */
export const ListDirectToolsSchema = z.object({
  persona: z
    .string()
    .optional()
    .describe('Only list tools registered for this persona'),
});

export type ListDirectToolsInput = z.infer<typeof ListDirectToolsSchema>;
