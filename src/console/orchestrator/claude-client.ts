/**
 * Orchestrator Claude Client
 *
 * Thin completion wrapper used by the classifier, query generator,
 * candidate selector and evaluator. Those classes depend on the
 * CompletionClient interface so tests can hand them a scripted fake.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ANTHROPIC_CONFIG } from '../../common/constants.js';
import { getOrchestratorConfig } from './config.js';
import { logDebug } from '../../common/services/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CompletionOptions {
  /** System prompt (persona context, output rules) */
  system?: string;

  /** Maximum tokens in response */
  maxTokens?: number;

  /** Temperature (0-1) */
  temperature?: number;
}

export interface CompletionResult {
  text: string;
  usage: {
    input: number;
    output: number;
  };
}

export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<CompletionResult>;
}

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

export class ClaudeClient implements CompletionClient {
  private client: Anthropic;
  private model: string;

  constructor(model?: string) {
    const config = getOrchestratorConfig();

    this.client = new Anthropic({
      apiKey: ANTHROPIC_CONFIG.API_KEY,
      maxRetries: ANTHROPIC_CONFIG.MAX_RETRIES,
      timeout: config.capabilityTimeoutMs,
    });

    this.model = model ?? config.claudeModel;
  }

  /**
   * Single-turn completion
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<CompletionResult> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options.maxTokens ?? 1000,
      temperature: options.temperature ?? 0,
      ...(options.system ? { system: options.system } : {}),
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
    });

    const text = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    logDebug('Claude completion', {
      model: this.model,
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    });

    return {
      text,
      usage: {
        input: response.usage.input_tokens,
        output: response.usage.output_tokens,
      },
    };
  }
}

// =============================================================================
// SINGLETON ACCESS
// =============================================================================

let clientInstance: ClaudeClient | null = null;

/**
 * Get or create the Claude client instance
 */
export function getClaudeClient(): ClaudeClient {
  if (!clientInstance) {
    clientInstance = new ClaudeClient();
  }
  return clientInstance;
}

/**
 * Check if Claude API is available
 */
export function isClaudeAvailable(): boolean {
  return !!ANTHROPIC_CONFIG.API_KEY;
}
