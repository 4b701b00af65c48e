/**
 * Intent Classifier
 *
 * Asks Claude to classify a business question into a persona, an execution
 * strategy and a set of extracted entities. Any failure surfaces as a
 * ClassificationError; the orchestrator then substitutes defaultClassification().
 */

import type {
  Classifier,
  ClassificationRecord,
  EntityValue,
  ExtractedEntities,
  ExecutionStrategy,
} from '../../common/types.js';
import { ClassificationResponseSchema } from '../../common/schemas/index.js';
import { extractJsonObject } from '../../common/utils/json-extractor.js';
import { errorMessage } from '../../common/utils/timeout.js';
import { ClassificationError } from './errors.js';
import type { CompletionClient } from './claude-client.js';
import type { PersonaSummary } from './persona-library.js';

/**
 * Anything that can list personas for the classification prompt
 */
export interface PersonaCatalog {
  listPersonas(): PersonaSummary[];
}

// =============================================================================
// RECORD CONSTRUCTION
// =============================================================================

/**
 * Build a frozen classification record
 *
 * Entity lists are copied and frozen along with the record.
 */
export function createClassification(input: {
  intent: string;
  persona: string;
  confidence: number;
  executionStrategy: ExecutionStrategy;
  extractedEntities?: Record<string, EntityValue>;
  enableEvaluation: boolean;
  reasoning?: string;
}): ClassificationRecord {
  const entities: Record<string, EntityValue> = {};
  for (const [key, value] of Object.entries(input.extractedEntities ?? {})) {
    entities[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  const frozenEntities: ExtractedEntities = Object.freeze(entities);

  return Object.freeze({
    intent: input.intent,
    persona: input.persona,
    confidence: input.confidence,
    executionStrategy: input.executionStrategy,
    extractedEntities: frozenEntities,
    enableEvaluation: input.enableEvaluation,
    ...(input.reasoning ? { reasoning: input.reasoning } : {}),
  });
}

/**
 * Safe default record used when classification fails
 */
export function defaultClassification(persona: string, reason?: string): ClassificationRecord {
  return createClassification({
    intent: 'general_query',
    persona,
    confidence: 0.5,
    executionStrategy: 'single_stage',
    extractedEntities: {},
    enableEvaluation: true,
    reasoning: reason ? `Fallback classification: ${reason}` : undefined,
  });
}

// =============================================================================
// PROMPT
// =============================================================================

export function buildClassificationPrompt(question: string, personas: PersonaSummary[]): string {
  const personaList = personas.length
    ? personas
        .map((p) => {
          const tables = p.tables.length ? p.tables.join(', ') : 'No specific tables';
          return `- ${p.name}: ${p.description}\n  Tables: ${tables}`;
        })
        .join('\n')
    : '- (no personas configured)';

  return `You are an intent classifier for a data warehouse assistant.

Available personas (business domain experts):
${personaList}

Analyze this question: "${question}"

Determine:
1. The best matching persona for the question's domain
2. The execution strategy
3. The entities mentioned in the question

Execution strategies:
- "single_stage": one query answers the question
- "multi_stage": candidates must be found first, then analysed (discovery → analysis → evaluation)
- "iterative": several rounds of refinement

Entity keys (include only those present):
- competitorProduct: competitor product name or code (string or list)
- partNumber: internal part number (string or list)
- customer: customer name
- productFamily: product family or category

Set enable_evaluation to false only when the user asks for raw data without interpretation.

Respond with JSON only:
{
  "intent": "short intent label",
  "persona": "best_matching_persona_name",
  "confidence": 0.0-1.0,
  "execution_strategy": "single_stage|multi_stage|iterative",
  "extracted_entities": { "entityKey": "value or [values]" },
  "enable_evaluation": true,
  "reasoning": "one sentence"
}`;
}

// =============================================================================
// CLASSIFIER
// =============================================================================

export class ClaudeIntentClassifier implements Classifier {
  constructor(
    private readonly client: CompletionClient,
    private readonly personas: PersonaCatalog
  ) {}

  async classify(question: string): Promise<ClassificationRecord> {
    let text: string;
    try {
      const response = await this.client.complete(
        buildClassificationPrompt(question, this.personas.listPersonas()),
        {
          system: 'You are a JSON classifier. Return ONLY valid JSON, no other text.',
          maxTokens: 500,
          temperature: 0,
        }
      );
      text = response.text;
    } catch (error) {
      throw new ClassificationError(`Classifier unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!text.trim()) {
      throw new ClassificationError('Classifier returned an empty response');
    }

    const json = extractJsonObject(text);
    if (!json) {
      throw new ClassificationError('Classifier response is not a JSON object');
    }

    const parsed = ClassificationResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`)
        .join('; ');
      throw new ClassificationError(`Invalid classifier response: ${issues}`);
    }

    const data = parsed.data;
    return createClassification({
      intent: data.intent,
      persona: data.persona,
      confidence: data.confidence,
      executionStrategy: data.execution_strategy,
      extractedEntities: data.extracted_entities,
      enableEvaluation: data.enable_evaluation,
      reasoning: data.reasoning,
    });
  }
}
