/**
 * Candidate Selector
 *
 * Reasoning step between Discovery and Analysis: reads the compressed
 * discovery candidates and picks the keys Analysis should focus on.
 * Never touches the store. Any model or parse failure yields an automatic
 * pick of the first three candidates instead of an error.
 */

import type { CandidateSelector, CandidateSelection, Row } from '../../common/types.js';
import { SelectionResponseSchema } from '../../common/schemas/index.js';
import { extractJsonObject } from '../../common/utils/json-extractor.js';
import { compressRows, formatValue } from '../../common/utils/row-compression.js';
import { errorMessage } from '../../common/utils/timeout.js';
import { logWarn } from '../../common/services/logger.js';
import type { CompletionClient } from './claude-client.js';

const KEY_FIELD_PATTERN = /(^id$|_id$|code|part|number|sku|key)/i;

const AUTOMATIC_PICK_COUNT = 3;

/**
 * Identifier of a candidate row: first key-like field, else its first field
 */
export function candidateKey(row: Row): string | undefined {
  const entries = Object.entries(row).filter(([, v]) => v !== null && v !== undefined);
  const keyed = entries.find(([k]) => KEY_FIELD_PATTERN.test(k));
  const chosen = keyed ?? entries[0];
  return chosen ? formatValue(chosen[1]) : undefined;
}

/**
 * Selection used when there is nothing to choose from
 */
export function emptySelection(): CandidateSelection {
  return {
    summary: 'Discovery found no candidates',
    selectedKeys: [],
    reasoning: 'No candidates were found',
    analysisFocus: 'answer the question directly from the warehouse',
    mode: 'empty',
  };
}

/**
 * Selection used when the model cannot be consulted or its output is unusable
 */
export function automaticSelection(candidates: readonly Row[]): CandidateSelection {
  const selectedKeys = candidates
    .slice(0, AUTOMATIC_PICK_COUNT)
    .map(candidateKey)
    .filter((key): key is string => key !== undefined);
  return {
    summary: `Found ${candidates.length} potential matches`,
    selectedKeys,
    reasoning: 'Automatic selection due to processing error',
    analysisFocus: 'detailed analysis of selected items',
    mode: 'automatic',
  };
}

export function buildSelectionPrompt(
  question: string,
  compressedCandidates: string,
  personaContext: string
): string {
  return `Analyze these Stage 1 results and select the most relevant items for Stage 2 detailed analysis.

Original question: ${question}
Context: ${personaContext.substring(0, 500)}...

Stage 1 Results:
${compressedCandidates}

Provide:
1. Brief summary of findings
2. The most relevant 1-3 items for detailed Stage 2 analysis
3. Key identifiers (IDs, part numbers, etc.) to use in Stage 2

Return JSON only:
{
  "summary": "brief summary of Stage 1 findings",
  "selected_items": ["item1_id", "item2_id"],
  "reasoning": "why these items were selected",
  "stage2_focus": "what Stage 2 should analyze"
}`;
}

export class ClaudeCandidateSelector implements CandidateSelector {
  constructor(
    private readonly client: CompletionClient,
    private readonly maxRecords = 10
  ) {}

  async select(question: string, candidates: Row[], personaContext: string): Promise<CandidateSelection> {
    if (candidates.length === 0) {
      return emptySelection();
    }

    const compressed = compressRows(candidates, this.maxRecords);

    try {
      const response = await this.client.complete(
        buildSelectionPrompt(question, compressed, personaContext),
        { maxTokens: 300, temperature: 0 }
      );

      const json = extractJsonObject(response.text);
      const parsed = json ? SelectionResponseSchema.safeParse(json) : undefined;
      if (!parsed || !parsed.success || parsed.data.selected_items.length === 0) {
        logWarn('Selection output unusable, selecting automatically', {
          stage: 'selection',
          candidates: candidates.length,
        });
        return automaticSelection(candidates);
      }

      return {
        summary: parsed.data.summary,
        selectedKeys: parsed.data.selected_items,
        reasoning: parsed.data.reasoning,
        analysisFocus: parsed.data.stage2_focus,
        mode: 'reasoned',
      };
    } catch (error) {
      logWarn('Selection failed, selecting automatically', {
        stage: 'selection',
        error: errorMessage(error),
      });
      return automaticSelection(candidates);
    }
  }
}
