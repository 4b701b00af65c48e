/**
 * Question Orchestrator
 *
 * Top-level entry point: handle(question) → ResponseEnvelope.
 *
 *   Start → Classified → DirectAttempt | Staged → Evaluated → Done
 *
 * - single_stage / iterative: try a direct tool; a hit answers the question,
 *   anything else falls back to one generated query plus evaluation
 * - multi_stage: Discovery → selection → Analysis → evaluation
 *
 * Every failure is recovered into the envelope. Store failures are the only
 * ones reported as degraded; handle() never rejects.
 */

import type {
  CandidateSelector,
  ClassificationRecord,
  Classifier,
  DirectAttemptSummary,
  DispatchOutcome,
  EvaluationInput,
  EvaluationResult,
  Evaluator,
  ExecutionPath,
  OrchestratorConfig,
  PersonaContextSource,
  QueryGenerator,
  QueryStage,
  ResponseEnvelope,
  Row,
  StageResults,
  StoreClient,
  ToolRegistry,
} from '../../common/types.js';
import { ClassificationRecordSchema } from '../../common/schemas/index.js';
import { generateRequestId, logError, logInfo, logWarn } from '../../common/services/logger.js';
import { getStore } from '../../common/services/sql-store.js';
import { errorMessage, withTimeout } from '../../common/utils/timeout.js';
import { getOrchestratorConfig, validateConfig } from './config.js';
import { getClaudeClient } from './claude-client.js';
import { getPersonaLibrary } from './persona-library.js';
import { ClaudeIntentClassifier, defaultClassification } from './intent-classifier.js';
import { ClaudeQueryGenerator } from './query-generator.js';
import { ClaudeCandidateSelector } from './candidate-selector.js';
import { ClaudeEvaluator, degradedEvaluation } from './evaluator.js';
import { DirectDispatcher } from './direct-dispatcher.js';
import { getDefaultToolRegistry } from './direct-tools/index.js';
import { executeGeneratedQuery, StagePipeline, type QueryExecutionDeps } from './stage-pipeline.js';
import { assembleResponse } from './result-assembler.js';
import { ClassificationError, StoreQueryError } from './errors.js';
import { orchestratorMetrics } from './metrics.js';

export const NO_CANDIDATES_FINDING = 'No candidates were found in discovery';

export interface OrchestratorDeps {
  classifier: Classifier;
  store: StoreClient;
  queryGenerator: QueryGenerator;
  selector: CandidateSelector;
  evaluator: Evaluator;
  personas: PersonaContextSource;
  registry: ToolRegistry;
  config: OrchestratorConfig;
}

/**
 * Per-request mutable state; never shared between requests
 */
interface RequestState {
  requestId: string;
  question: string;
  startTime: number;
  classification: ClassificationRecord;
  classificationFallback: boolean;
  stageResults: StageResults;
  notes: string[];
  degraded: boolean;
  storeQueries: number;
  rows?: readonly Row[];
}

/**
 * A direct outcome answers the question only with rows for at least one input
 */
export function isDirectHit(outcome: DispatchOutcome): boolean {
  if (outcome.kind !== 'success') return false;
  const { result } = outcome;
  if (result.rowCount === 0) return false;
  const reportedInputs = result.matchedInputs.length + result.unmatchedInputs.length;
  return reportedInputs === 0 || result.matchedInputs.length > 0;
}

function summarizeDispatch(outcome: DispatchOutcome): DirectAttemptSummary {
  switch (outcome.kind) {
    case 'no_match':
      return { outcome: 'no_match' };
    case 'failed':
      return {
        outcome: 'failed',
        toolName: outcome.toolName,
        error: outcome.error.message,
        durationMs: outcome.durationMs,
      };
    case 'success':
      return {
        outcome: outcome.result.rowCount === 0 ? 'empty' : 'success',
        toolName: outcome.toolName,
        rowCount: outcome.result.rowCount,
        matchedInputs: outcome.result.matchedInputs,
        unmatchedInputs: outcome.result.unmatchedInputs,
        durationMs: outcome.durationMs,
      };
  }
}

function describeFallback(outcome: DispatchOutcome): string {
  switch (outcome.kind) {
    case 'no_match':
      return 'no direct tool applies';
    case 'failed':
      return outcome.error.message;
    case 'success':
      return outcome.result.rowCount === 0
        ? `direct tool ${outcome.toolName} found no rows`
        : `direct tool ${outcome.toolName} matched none of ${outcome.result.unmatchedInputs.join(', ')}`;
  }
}

export class QuestionOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly dispatcher: DirectDispatcher;

  constructor(deps: Partial<OrchestratorDeps> = {}) {
    const config = deps.config ?? getOrchestratorConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
      throw new Error(`Invalid orchestrator configuration: ${configErrors.join('; ')}`);
    }

    const personas = deps.personas ?? getPersonaLibrary();
    this.deps = {
      config,
      personas,
      classifier: deps.classifier ?? new ClaudeIntentClassifier(getClaudeClient(), getPersonaLibrary()),
      store: deps.store ?? getStore(),
      queryGenerator: deps.queryGenerator ?? new ClaudeQueryGenerator(getClaudeClient()),
      selector: deps.selector ?? new ClaudeCandidateSelector(getClaudeClient(), config.compressionMaxRecords),
      evaluator: deps.evaluator ?? new ClaudeEvaluator(getClaudeClient(), config.compressionMaxRecords),
      registry: deps.registry ?? getDefaultToolRegistry(),
    };
    this.dispatcher = new DirectDispatcher(this.deps.registry, config.directToolTimeoutMs);
  }

  /**
   * Answer one business question; never rejects
   */
  async handle(question: string): Promise<ResponseEnvelope> {
    const requestId = generateRequestId();
    const startTime = Date.now();

    try {
      return await this.run(requestId, question, startTime);
    } catch (error) {
      // Last resort: a bug or an unexpected throw from an injected capability
      logError('Question handling failed unexpectedly', {
        request_id: requestId,
        error: errorMessage(error),
      });
      const envelope = assembleResponse({
        requestId,
        question,
        classification: defaultClassification(this.deps.config.defaultPersona, 'unexpected error'),
        executionPath: 'ai_workflow_fallback',
        stageResults: {
          evaluation: degradedEvaluation(
            'The question could not be processed.',
            `unexpected error: ${errorMessage(error)}`
          ),
        },
        degraded: true,
        notes: [`Unexpected error: ${errorMessage(error)}`],
        startTime,
        storeQueries: 0,
      });
      orchestratorMetrics.recordRequest(envelope.executionPath, envelope.timing.totalMs, true, true);
      return envelope;
    }
  }

  private async run(requestId: string, question: string, startTime: number): Promise<ResponseEnvelope> {
    const { classification, fallbackReason } = await this.classify(requestId, question);
    const state: RequestState = {
      requestId,
      question,
      startTime,
      classification,
      classificationFallback: fallbackReason !== undefined,
      stageResults: {},
      notes: [],
      degraded: false,
      storeQueries: 0,
    };
    if (fallbackReason !== undefined) {
      state.stageResults.classification_fallback = { reason: fallbackReason };
      state.notes.push(`Classifier unavailable (${fallbackReason}); default classification used`);
    }

    logInfo('Question classified', {
      request_id: requestId,
      persona: state.classification.persona,
      intent: state.classification.intent,
      strategy: state.classification.executionStrategy,
      confidence: state.classification.confidence,
    });

    const executionPath =
      state.classification.executionStrategy === 'multi_stage'
        ? await this.runStaged(state)
        : await this.runDirect(state);

    const envelope = assembleResponse({
      requestId,
      question,
      classification: state.classification,
      executionPath,
      stageResults: state.stageResults,
      rows: state.rows,
      degraded: state.degraded,
      notes: state.notes,
      startTime,
      storeQueries: state.storeQueries,
    });

    orchestratorMetrics.recordRequest(
      executionPath,
      envelope.timing.totalMs,
      envelope.degraded,
      state.classificationFallback
    );
    logInfo('Question answered', {
      request_id: requestId,
      execution_path: executionPath,
      store_queries: state.storeQueries,
      degraded: envelope.degraded,
      duration_ms: envelope.timing.totalMs,
    });

    return envelope;
  }

  // ===========================================================================
  // CLASSIFICATION
  // ===========================================================================

  private async classify(
    requestId: string,
    question: string
  ): Promise<{ classification: ClassificationRecord; fallbackReason?: string }> {
    try {
      const classification = await withTimeout(
        this.deps.classifier.classify(question),
        this.deps.config.capabilityTimeoutMs,
        'Classification'
      );
      const checked = ClassificationRecordSchema.safeParse(classification);
      if (!checked.success) {
        const fields = [...new Set(checked.error.issues.map((issue) => issue.path.join('.')))];
        throw new ClassificationError(`classifier returned an invalid record (${fields.join(', ')})`);
      }
      return { classification };
    } catch (error) {
      const reason = errorMessage(error);
      logWarn('Classification failed, using default classification', {
        request_id: requestId,
        error: reason,
        error_kind: 'classification',
      });
      return {
        classification: defaultClassification(this.deps.config.defaultPersona, reason),
        fallbackReason: reason,
      };
    }
  }

  // ===========================================================================
  // DIRECT ATTEMPT + FALLBACK
  // ===========================================================================

  private async runDirect(state: RequestState): Promise<ExecutionPath> {
    const { question, classification, requestId } = state;

    const outcome = await this.dispatcher.dispatch(question, classification, requestId);
    orchestratorMetrics.recordDispatch(outcome);
    const summary = summarizeDispatch(outcome);

    if (outcome.kind === 'success' && isDirectHit(outcome)) {
      const { result } = outcome;
      state.stageResults.direct_tool = { ...summary, rows: result.rows, executedQuery: result.executedQuery };

      if (!classification.enableEvaluation) {
        state.rows = result.rows;
        return 'direct_no_evaluation';
      }

      state.stageResults.evaluation = await this.evaluate(state, {
        personaContext: this.deps.personas.loadPersona(classification.persona),
        stageTemplate: this.deps.personas.loadStageTemplate('stage3_evaluation'),
        datasets: [{ label: `${outcome.toolName} results`, rows: result.rows }],
        notes:
          result.unmatchedInputs.length > 0
            ? [`No direct match for: ${result.unmatchedInputs.join(', ')}`]
            : undefined,
      });
      return 'direct_with_evaluation';
    }

    state.stageResults.direct_tool = summary;
    const reason = describeFallback(outcome);
    if (outcome.kind !== 'no_match') {
      state.notes.push(`Direct lookup not used (${reason}); answered through the AI workflow`);
    }
    logInfo('Falling back to AI workflow', { request_id: requestId, reason });

    await this.runFallbackQuery(state);
    return 'ai_workflow_fallback';
  }

  private async runFallbackQuery(state: RequestState): Promise<void> {
    const personaContext = this.deps.personas.loadPersona(state.classification.persona);

    try {
      const result = await executeGeneratedQuery(this.queryDeps(state), {
        question: state.question,
        stage: 'fallback',
        personaContext,
      });
      state.stageResults.fallback_query = result;

      state.stageResults.evaluation = await this.evaluate(state, {
        personaContext,
        stageTemplate: this.deps.personas.loadStageTemplate('stage3_evaluation'),
        datasets: [{ label: 'Query results', rows: result.rows }],
        notes: result.rows.length === 0 ? ['The query returned no rows'] : undefined,
      });
    } catch (error) {
      this.recordStoreFailure(state, 'fallback', error);
      state.stageResults.fallback_query = { error: errorMessage(error) };
    }
  }

  // ===========================================================================
  // STAGED
  // ===========================================================================

  private async runStaged(state: RequestState): Promise<ExecutionPath> {
    const pipeline = new StagePipeline({
      ...this.queryDeps(state),
      selector: this.deps.selector,
      personas: this.deps.personas,
      discoveryLimit: this.deps.config.discoveryLimit,
    });

    const outcome = await pipeline.run({
      requestId: state.requestId,
      question: state.question,
      persona: state.classification.persona,
      outputs: [],
    });

    if (outcome.discovery) state.stageResults.discovery = outcome.discovery;
    if (outcome.selection) state.stageResults.selection = outcome.selection;

    if (outcome.status === 'failed') {
      state.stageResults[outcome.failedStage] = { error: outcome.error.message };
      this.recordStoreFailure(state, outcome.failedStage, outcome.error);
      return 'multi_stage';
    }

    state.stageResults.analysis = outcome.analysis;
    const noCandidates = outcome.selection.mode === 'empty';
    if (noCandidates) {
      state.notes.push('Discovery found no candidates; analysis ran without a selection');
    }

    const evaluation = await this.evaluate(state, {
      personaContext: outcome.personaContext,
      stageTemplate: this.deps.personas.loadStageTemplate('stage3_evaluation'),
      datasets: [
        { label: 'Discovery candidates', rows: outcome.discovery.rows },
        { label: 'Analysis results', rows: outcome.analysis.rows },
      ],
      selection: outcome.selection,
      notes: noCandidates ? [NO_CANDIDATES_FINDING] : undefined,
    });

    state.stageResults.evaluation =
      noCandidates && !evaluation.keyFindings.includes(NO_CANDIDATES_FINDING)
        ? { ...evaluation, keyFindings: [NO_CANDIDATES_FINDING, ...evaluation.keyFindings] }
        : evaluation;
    return 'multi_stage';
  }

  // ===========================================================================
  // SHARED STEPS
  // ===========================================================================

  private queryDeps(state: RequestState): QueryExecutionDeps {
    return {
      store: this.deps.store,
      queryGenerator: this.deps.queryGenerator,
      capabilityTimeoutMs: this.deps.config.capabilityTimeoutMs,
      onStoreQuery: (stage: QueryStage) => {
        state.storeQueries++;
        orchestratorMetrics.recordStoreQuery(stage);
      },
    };
  }

  /**
   * Evaluation capability call; a failure becomes a degraded evaluation
   */
  private async evaluate(state: RequestState, input: EvaluationInput): Promise<EvaluationResult> {
    let evaluation: EvaluationResult;
    try {
      evaluation = await withTimeout(
        this.deps.evaluator.evaluate(state.question, input),
        this.deps.config.capabilityTimeoutMs,
        'Evaluation'
      );
    } catch (error) {
      logWarn('Evaluation failed', {
        request_id: state.requestId,
        stage: 'evaluation',
        error: errorMessage(error),
      });
      state.notes.push(`Evaluation unavailable (${errorMessage(error)}); showing retrieved data`);
      evaluation = degradedEvaluation(
        'Error during evaluation stage',
        `evaluation failed: ${errorMessage(error)}`
      );
      if (state.rows === undefined) {
        state.rows = input.datasets.flatMap((d) => d.rows);
      }
    }
    orchestratorMetrics.recordEvaluation(evaluation.parseMode);
    return evaluation;
  }

  /**
   * A store failure skips the model evaluation; the envelope is degraded
   */
  private recordStoreFailure(state: RequestState, stage: QueryStage, error: unknown): void {
    const message = errorMessage(error);
    logError('Store query failed', {
      request_id: state.requestId,
      stage,
      error: message,
      error_kind: error instanceof StoreQueryError ? error.kind : undefined,
    });
    state.degraded = true;
    state.notes.push(`The ${stage} query failed (${message}); the answer may be incomplete`);
    state.stageResults.evaluation = degradedEvaluation(
      `The ${stage} query failed, so this question could not be answered from warehouse data.`,
      `store query failed: ${message}`
    );
    orchestratorMetrics.recordEvaluation('degraded');
  }
}

// =============================================================================
// SINGLETON ACCESS
// =============================================================================

let orchestratorInstance: QuestionOrchestrator | null = null;

export function getQuestionOrchestrator(): QuestionOrchestrator {
  if (!orchestratorInstance) {
    orchestratorInstance = new QuestionOrchestrator();
  }
  return orchestratorInstance;
}
