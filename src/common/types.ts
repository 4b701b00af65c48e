/**
 * Shared types for the insight-router orchestrator
 *
 * Covers the classification record produced by the classifier capability,
 * direct-tool descriptors and their results, the stage pipeline context,
 * and the response envelope returned by the orchestrator.
 */

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Execution strategies a classifier may declare
 *
 * - single_stage: one store query (direct tool first, if any applies)
 * - multi_stage: discovery → analysis → evaluation pipeline
 * - iterative: treated as single_stage (no refinement loop exists)
 */
export type ExecutionStrategy = 'single_stage' | 'multi_stage' | 'iterative';

/**
 * Value of an extracted entity: scalar, absent, or an ordered list
 */
export type EntityValue = string | readonly string[] | null;

export type ExtractedEntities = Readonly<Record<string, EntityValue>>;

/**
 * Structured output of the classifier for one question
 *
 * Created once per question and frozen; never persisted.
 */
export interface ClassificationRecord {
  /** Short label describing the detected intent */
  readonly intent: string;

  /** Persona (domain bundle) selecting tools and background knowledge */
  readonly persona: string;

  /** Classifier confidence (0-1) */
  readonly confidence: number;

  /** Which flow the orchestrator takes */
  readonly executionStrategy: ExecutionStrategy;

  /** Entity kind → value(s); empty object when nothing was extracted */
  readonly extractedEntities: ExtractedEntities;

  /** Whether an evaluation pass should run on the direct path */
  readonly enableEvaluation: boolean;

  /** Classifier's own explanation, when it gave one */
  readonly reasoning?: string;
}

// =============================================================================
// STORE
// =============================================================================

/** One tabular record: field name → value */
export type Row = Record<string, unknown>;

/**
 * Result of a query against the backing store
 */
export interface StoreQueryResult {
  rows: Row[];
  rowCount: number;
  /** Diagnostic copy of what ran; never interpreted */
  executedQuery: string;
}

/**
 * Store query capability (warehouse connector)
 */
export interface StoreClient {
  query(sql: string, params?: readonly unknown[]): Promise<StoreQueryResult>;
}

// =============================================================================
// DIRECT TOOLS
// =============================================================================

/**
 * Result of a direct-tool lookup
 *
 * Invariants: rowCount === rows.length; matchedInputs and unmatchedInputs
 * are disjoint and together equal the requested lookup keys.
 */
export interface ToolResult extends StoreQueryResult {
  matchedInputs: string[];
  unmatchedInputs: string[];
}

export type ToolPredicate = (question: string, classification: ClassificationRecord) => boolean;

export type ToolExecutor = (
  question: string,
  classification: ClassificationRecord
) => Promise<ToolResult>;

/**
 * Registration input for a direct tool
 */
export interface ToolDefinition {
  name: string;
  persona: string;
  description: string;
  predicate: ToolPredicate;
  executor: ToolExecutor;
  /** Sample questions the predicate is expected to accept */
  exampleTriggers?: string[];
}

/**
 * Registered, frozen direct tool
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly persona: string;
  readonly description: string;
  readonly predicate: ToolPredicate;
  readonly executor: ToolExecutor;
  readonly exampleTriggers: readonly string[];
}

/**
 * Read-only persona → ordered tool descriptors mapping
 */
export type ToolRegistry = ReadonlyMap<string, readonly ToolDescriptor[]>;

// =============================================================================
// STAGE PIPELINE
// =============================================================================

export type StageName = 'discovery' | 'selection' | 'analysis' | 'evaluation';

/**
 * Selection made between Discovery and Analysis
 */
export interface CandidateSelection {
  summary: string;
  selectedKeys: string[];
  reasoning: string;
  analysisFocus: string;
  /** reasoned: model picked; automatic: fallback pick; empty: no candidates */
  mode: 'reasoned' | 'automatic' | 'empty';
}

/**
 * Output of one stage, appended to the stage context in order
 */
export type StageOutput =
  | { stage: 'discovery'; query: StoreQueryResult }
  | { stage: 'selection'; selection: CandidateSelection }
  | { stage: 'analysis'; query: StoreQueryResult };

/**
 * Per-request accumulation of stage outputs
 */
export interface StageContext {
  readonly requestId: string;
  readonly question: string;
  readonly persona: string;
  readonly outputs: StageOutput[];
}

// =============================================================================
// EVALUATION
// =============================================================================

export type ConfidenceLabel = 'high' | 'medium' | 'low';

/**
 * Material handed to the evaluation step
 *
 * Always already-retrieved data; evaluation never touches the store.
 */
export interface EvaluationInput {
  personaContext: string;
  stageTemplate?: string;
  /** Named row sets, e.g. direct tool rows or discovery/analysis rows */
  datasets: Array<{ label: string; rows: Row[] }>;
  selection?: CandidateSelection;
  /** Extra facts the evaluator should state, e.g. "no candidates found" */
  notes?: string[];
}

export interface EvaluationResult {
  businessAnswer: string;
  keyFindings: string[];
  recommendedAction: string;
  confidenceLabel: ConfidenceLabel;
  dataQualityNote: string;
  /** structured: clean parse; unstructured_fallback: scalar extraction from text; degraded: built locally */
  parseMode: 'structured' | 'unstructured_fallback' | 'degraded';
}

// =============================================================================
// CAPABILITIES
// =============================================================================

export interface Classifier {
  classify(question: string): Promise<ClassificationRecord>;
}

export type QueryStage = 'fallback' | 'discovery' | 'analysis';

export interface QueryGenerationRequest {
  question: string;
  stage: QueryStage;
  personaContext: string;
  stageTemplate?: string;
  /** Prior-stage facts (selection summary, selected keys) */
  priorContext?: string;
  /** Row bound for discovery */
  limit?: number;
}

export interface QueryGenerator {
  generate(request: QueryGenerationRequest): Promise<string>;
}

export interface CandidateSelector {
  select(question: string, candidates: Row[], personaContext: string): Promise<CandidateSelection>;
}

export interface Evaluator {
  evaluate(question: string, input: EvaluationInput): Promise<EvaluationResult>;
}

/**
 * Source of persona and stage-template text
 */
export interface PersonaContextSource {
  loadPersona(persona: string): string;
  loadStageTemplate(stage: 'stage1_discovery' | 'stage2_analysis' | 'stage3_evaluation'): string;
}

// =============================================================================
// DISPATCH
// =============================================================================

export type DispatchOutcome =
  | { kind: 'success'; toolName: string; result: ToolResult; durationMs: number }
  | { kind: 'no_match' }
  | { kind: 'failed'; toolName: string; error: Error; durationMs: number };

// =============================================================================
// RESPONSE
// =============================================================================

export type ExecutionPath =
  | 'direct_with_evaluation'
  | 'direct_no_evaluation'
  | 'ai_workflow_fallback'
  | 'multi_stage';

/**
 * Summary of the direct-tool attempt kept in stageResults
 */
export interface DirectAttemptSummary {
  outcome: DispatchOutcome['kind'] | 'empty';
  toolName?: string;
  rowCount?: number;
  matchedInputs?: string[];
  unmatchedInputs?: string[];
  error?: string;
  durationMs?: number;
}

/**
 * Stage results keyed by stage name; which keys appear depends on the path
 */
export interface StageResults {
  classification_fallback?: { reason: string };
  direct_tool?: DirectAttemptSummary & { rows?: Row[]; executedQuery?: string };
  fallback_query?: StoreQueryResult | { error: string };
  discovery?: StoreQueryResult | { error: string };
  selection?: CandidateSelection;
  analysis?: StoreQueryResult | { error: string };
  evaluation?: EvaluationResult;
}

export interface ResponseEnvelope {
  requestId: string;
  question: string;
  classification: ClassificationRecord;
  executionPath: ExecutionPath;
  stageResults: StageResults;
  finalAnswer: string;
  /** True when a store failure means the answer may be incomplete */
  degraded: boolean;
  /** Explanatory notes (classifier fallback, tool failure, store failure) */
  notes: string[];
  timing: {
    totalMs: number;
    storeQueries: number;
  };
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface OrchestratorConfig {
  /** Persona used when classification fails */
  defaultPersona: string;

  /** Row bound applied to Discovery queries */
  discoveryLimit: number;

  /** Max records handed to reasoning steps after compression */
  compressionMaxRecords: number;

  /** Timeout for a single direct-tool executor call */
  directToolTimeoutMs: number;

  /** Timeout for classifier / generator / selector / evaluator calls */
  capabilityTimeoutMs: number;

  /** Claude API model to use */
  claudeModel: string;

  /** Directory holding personas/ and intent/ markdown */
  promptsDir: string;
}
