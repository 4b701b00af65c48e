/**
 * Orchestrator Configuration
 *
 * Default configuration values for the question orchestrator.
 * Can be overridden via environment variables or per-instance.
 */

import path from 'path';
import type { OrchestratorConfig } from '../../common/types.js';
import { ANTHROPIC_CONFIG, PERSONAS } from '../../common/constants.js';

/**
 * Default orchestrator configuration
 */
export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  // Persona substituted when the classifier fails
  defaultPersona: PERSONAS.PRODUCT_PLANNING,

  // Discovery is a candidate search, not an answer: keep it bounded
  discoveryLimit: 20,

  // Records handed to selection/evaluation prompts
  compressionMaxRecords: 10,

  directToolTimeoutMs: 5000,

  capabilityTimeoutMs: 60000,

  claudeModel: ANTHROPIC_CONFIG.MODEL,

  // <repo>/prompts, from both src/console/orchestrator and dist/console/orchestrator
  promptsDir: path.resolve(__dirname, '..', '..', '..', 'prompts'),
};

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
export function loadOrchestratorConfig(
  overrides?: Partial<OrchestratorConfig>
): OrchestratorConfig {
  const envConfig: Partial<OrchestratorConfig> = {};

  if (process.env.ORCHESTRATOR_DEFAULT_PERSONA) {
    envConfig.defaultPersona = process.env.ORCHESTRATOR_DEFAULT_PERSONA;
  }

  const discoveryLimit = readInt('ORCHESTRATOR_DISCOVERY_LIMIT');
  if (discoveryLimit !== undefined) {
    envConfig.discoveryLimit = discoveryLimit;
  }

  const compressionMaxRecords = readInt('ORCHESTRATOR_COMPRESSION_MAX_RECORDS');
  if (compressionMaxRecords !== undefined) {
    envConfig.compressionMaxRecords = compressionMaxRecords;
  }

  const directToolTimeoutMs = readInt('ORCHESTRATOR_DIRECT_TOOL_TIMEOUT_MS');
  if (directToolTimeoutMs !== undefined) {
    envConfig.directToolTimeoutMs = directToolTimeoutMs;
  }

  const capabilityTimeoutMs = readInt('ORCHESTRATOR_CAPABILITY_TIMEOUT_MS');
  if (capabilityTimeoutMs !== undefined) {
    envConfig.capabilityTimeoutMs = capabilityTimeoutMs;
  }

  if (process.env.CLAUDE_MODEL) {
    envConfig.claudeModel = process.env.CLAUDE_MODEL;
  }

  if (process.env.PROMPTS_DIR) {
    envConfig.promptsDir = path.resolve(process.env.PROMPTS_DIR);
  }

  // Merge: defaults < env < overrides
  return {
    ...DEFAULT_ORCHESTRATOR_CONFIG,
    ...envConfig,
    ...overrides,
  };
}

let configInstance: OrchestratorConfig | null = null;

/**
 * Get the current orchestrator configuration (singleton)
 */
export function getOrchestratorConfig(): OrchestratorConfig {
  if (!configInstance) {
    configInstance = loadOrchestratorConfig();
  }
  return configInstance;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: OrchestratorConfig): string[] {
  const errors: string[] = [];

  if (!config.defaultPersona.trim()) {
    errors.push('defaultPersona must not be empty');
  }

  if (config.discoveryLimit < 1 || config.discoveryLimit > 200) {
    errors.push('discoveryLimit must be between 1 and 200');
  }

  if (config.compressionMaxRecords < 1 || config.compressionMaxRecords > 100) {
    errors.push('compressionMaxRecords must be between 1 and 100');
  }

  if (config.directToolTimeoutMs < 100) {
    errors.push('directToolTimeoutMs must be at least 100');
  }

  if (config.capabilityTimeoutMs < 1000) {
    errors.push('capabilityTimeoutMs must be at least 1000');
  }

  return errors;
}
