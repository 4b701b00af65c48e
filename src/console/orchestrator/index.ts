/**
 * Orchestrator - Business Question Execution
 *
 * Answers natural-language business questions from the data warehouse:
 * classify, try a direct lookup, otherwise run generated SQL (single query
 * or discovery → analysis), then evaluate the retrieved data.
 *
 * Usage:
 * ```typescript
 * import { QuestionOrchestrator } from './orchestrator/index.js';
 *
 * const orchestrator = new QuestionOrchestrator();
 * const envelope = await orchestrator.handle('Replace BR-56U10 with our equivalent');
 * console.log(envelope.executionPath); // 'direct_with_evaluation'
 * console.log(envelope.finalAnswer);
 * ```
 *
 * @module orchestrator
 */

// =============================================================================
// MAIN ENGINE
// =============================================================================

export {
  QuestionOrchestrator,
  getQuestionOrchestrator,
  isDirectHit,
  type OrchestratorDeps,
} from './engine.js';

// =============================================================================
// COMPONENTS
// =============================================================================

export { DirectDispatcher, checkToolResult } from './direct-dispatcher.js';

export {
  createToolRegistry,
  validateToolDefinition,
  getToolsForPersona,
  getRegistryStats,
  testPredicate,
  type RegistryStats,
  type PredicateTestReport,
} from './tool-registry.js';

export { StagePipeline, executeGeneratedQuery, type PipelineOutcome } from './stage-pipeline.js';

export { assembleResponse, formatFinalAnswer } from './result-assembler.js';

export {
  ClaudeIntentClassifier,
  createClassification,
  defaultClassification,
} from './intent-classifier.js';

export { ClaudeQueryGenerator } from './query-generator.js';

export { ClaudeCandidateSelector, automaticSelection, emptySelection } from './candidate-selector.js';

export { ClaudeEvaluator, parseEvaluationResponse, degradedEvaluation } from './evaluator.js';

export { PersonaLibrary, getPersonaLibrary, type PersonaSummary } from './persona-library.js';

export {
  ClaudeClient,
  getClaudeClient,
  isClaudeAvailable,
  type CompletionClient,
} from './claude-client.js';

// =============================================================================
// DIRECT TOOLS
// =============================================================================

export {
  createBuiltInToolDefinitions,
  getDefaultToolRegistry,
  createCompetitorMappingTool,
  createComponentLookupTool,
} from './direct-tools/index.js';

// =============================================================================
// CONFIGURATION, ERRORS, METRICS
// =============================================================================

export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  loadOrchestratorConfig,
  getOrchestratorConfig,
  validateConfig,
} from './config.js';

export {
  OrchestratorError,
  ClassificationError,
  DirectToolError,
  StoreQueryError,
  EvaluationParseError,
  ToolRegistryError,
  isOrchestratorError,
} from './errors.js';

export {
  orchestratorMetrics,
  getOrchestratorMetrics,
  getMetricsSummary,
  resetOrchestratorMetrics,
} from './metrics.js';

// =============================================================================
// MCP TOOLS
// =============================================================================

export { registerAskTool } from './tools/ask-tool.js';
export { registerRegistryTool } from './tools/registry-tool.js';
export { registerStatusTool } from './tools/status-tool.js';
