/**
 * Stage Pipeline
 *
 * Multi-stage execution for questions that need candidates found before
 * they can be answered:
 *
 *   Discovery (store query #1) → selection (reasoning only) → Analysis (store query #2)
 *
 * Evaluation runs afterwards in the orchestrator. Empty Discovery still
 * proceeds to Analysis with an empty selection; a failed Discovery or
 * Analysis ends the pipeline with a 'failed' outcome instead of throwing.
 */

import type {
  CandidateSelection,
  CandidateSelector,
  PersonaContextSource,
  QueryGenerationRequest,
  QueryGenerator,
  QueryStage,
  StageContext,
  StoreClient,
  StoreQueryResult,
} from '../../common/types.js';
import { logInfo, logWarn } from '../../common/services/logger.js';
import { errorMessage, withTimeout } from '../../common/utils/timeout.js';
import { StoreQueryError } from './errors.js';
import { automaticSelection, emptySelection } from './candidate-selector.js';

// =============================================================================
// GENERATED QUERY EXECUTION
// =============================================================================

export interface QueryExecutionDeps {
  store: StoreClient;
  queryGenerator: QueryGenerator;
  capabilityTimeoutMs: number;
  /** Called once per statement actually sent to the store */
  onStoreQuery?: (stage: QueryStage) => void;
}

function asStoreQueryError(error: unknown, stage: QueryStage, sql?: string): StoreQueryError {
  if (error instanceof StoreQueryError && error.stage === stage) {
    return error;
  }
  const failedSql = sql ?? (error instanceof StoreQueryError ? error.sql : undefined);
  return new StoreQueryError(errorMessage(error), stage, failedSql, { cause: error });
}

/**
 * Generate SQL for a stage and run it
 *
 * @throws StoreQueryError tagged with the stage, for generation and store failures alike
 */
export async function executeGeneratedQuery(
  deps: QueryExecutionDeps,
  request: QueryGenerationRequest
): Promise<StoreQueryResult> {
  let sql: string;
  try {
    sql = await withTimeout(
      deps.queryGenerator.generate(request),
      deps.capabilityTimeoutMs,
      `Query generation (${request.stage})`
    );
  } catch (error) {
    throw asStoreQueryError(error, request.stage);
  }

  deps.onStoreQuery?.(request.stage);
  try {
    return await deps.store.query(sql);
  } catch (error) {
    throw asStoreQueryError(error, request.stage, sql);
  }
}

// =============================================================================
// PIPELINE
// =============================================================================

export type PipelineOutcome =
  | {
      status: 'completed';
      discovery: StoreQueryResult;
      selection: CandidateSelection;
      analysis: StoreQueryResult;
      personaContext: string;
    }
  | {
      status: 'failed';
      failedStage: 'discovery' | 'analysis';
      error: StoreQueryError;
      discovery?: StoreQueryResult;
      selection?: CandidateSelection;
      personaContext: string;
    };

export interface StagePipelineDeps extends QueryExecutionDeps {
  selector: CandidateSelector;
  personas: PersonaContextSource;
  discoveryLimit: number;
}

/**
 * Facts from the selection handed to the Analysis query
 */
export function describeSelection(selection: CandidateSelection): string {
  if (selection.mode === 'empty') {
    return 'Discovery found no candidates. Answer the question directly from the warehouse.';
  }
  return [
    `STAGE 1 RESULTS SUMMARY: ${selection.summary || 'No summary available'}`,
    `SELECTED ITEMS: ${selection.selectedKeys.join(', ') || 'No items selected'}`,
    `ANALYSIS FOCUS: ${selection.analysisFocus || 'detailed analysis of selected items'}`,
  ].join('\n');
}

export class StagePipeline {
  constructor(private readonly deps: StagePipelineDeps) {}

  async run(context: StageContext): Promise<PipelineOutcome> {
    const { requestId, question, persona } = context;
    const personaContext = this.deps.personas.loadPersona(persona);

    // Stage 1: Discovery
    let discovery: StoreQueryResult;
    try {
      const result = await executeGeneratedQuery(this.deps, {
        question,
        stage: 'discovery',
        personaContext,
        stageTemplate: this.deps.personas.loadStageTemplate('stage1_discovery'),
        limit: this.deps.discoveryLimit,
      });
      const rows = result.rows.slice(0, this.deps.discoveryLimit);
      discovery = { ...result, rows, rowCount: rows.length };
    } catch (error) {
      const storeError = asStoreQueryError(error, 'discovery');
      logWarn('Discovery failed', { request_id: requestId, stage: 'discovery', error: storeError.message });
      return { status: 'failed', failedStage: 'discovery', error: storeError, personaContext };
    }
    context.outputs.push({ stage: 'discovery', query: discovery });
    logInfo('Discovery completed', { request_id: requestId, stage: 'discovery', row_count: discovery.rowCount });

    // Intermediate selection (no store access)
    const selection = await this.select(requestId, question, discovery, personaContext);
    context.outputs.push({ stage: 'selection', selection });

    // Stage 2: Analysis
    let analysis: StoreQueryResult;
    try {
      analysis = await executeGeneratedQuery(this.deps, {
        question,
        stage: 'analysis',
        personaContext,
        stageTemplate: this.deps.personas.loadStageTemplate('stage2_analysis'),
        priorContext: describeSelection(selection),
      });
    } catch (error) {
      const storeError = asStoreQueryError(error, 'analysis');
      logWarn('Analysis failed', { request_id: requestId, stage: 'analysis', error: storeError.message });
      return {
        status: 'failed',
        failedStage: 'analysis',
        error: storeError,
        discovery,
        selection,
        personaContext,
      };
    }
    context.outputs.push({ stage: 'analysis', query: analysis });
    logInfo('Analysis completed', { request_id: requestId, stage: 'analysis', row_count: analysis.rowCount });

    return { status: 'completed', discovery, selection, analysis, personaContext };
  }

  private async select(
    requestId: string,
    question: string,
    discovery: StoreQueryResult,
    personaContext: string
  ): Promise<CandidateSelection> {
    if (discovery.rows.length === 0) {
      return emptySelection();
    }
    try {
      return await withTimeout(
        this.deps.selector.select(question, discovery.rows, personaContext),
        this.deps.capabilityTimeoutMs,
        'Candidate selection'
      );
    } catch (error) {
      logWarn('Selection failed, selecting automatically', {
        request_id: requestId,
        stage: 'selection',
        error: errorMessage(error),
      });
      return automaticSelection(discovery.rows);
    }
  }
}
