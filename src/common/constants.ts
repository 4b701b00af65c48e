/**
 * Constants for the insight-router MCP server
 *
 * Connection settings are read from the environment once at module load.
 * Entry points import 'dotenv/config' before anything else.
 */

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

/**
 * Anthropic API configuration (classifier, SQL generation, selection, evaluation)
 */
export const ANTHROPIC_CONFIG = {
  API_KEY: process.env.ANTHROPIC_API_KEY || '',
  MODEL: process.env.CLAUDE_MODEL || 'claude-sonnet-4-20250514',
  MAX_RETRIES: parseInt(process.env.ANTHROPIC_MAX_RETRIES || '2', 10),
} as const;

/**
 * Warehouse (PostgreSQL) connection configuration
 */
export const STORE_CONFIG = {
  HOST: process.env.POSTGRES_HOST || 'localhost',
  PORT: parseInt(process.env.POSTGRES_PORT || '5432', 10),
  DATABASE: process.env.POSTGRES_DATABASE || 'warehouse',
  USER: process.env.POSTGRES_USER || 'readonly',
  PASSWORD: process.env.POSTGRES_PASSWORD || '',
  SSL: process.env.POSTGRES_SSL === 'true',
  POOL_MAX: parseInt(process.env.POSTGRES_POOL_MAX || '10', 10),
  CONNECTION_TIMEOUT_MS: parseInt(process.env.POSTGRES_CONNECTION_TIMEOUT_MS || '10000', 10),
  // Applied both client-side (query_timeout) and server-side (statement_timeout)
  QUERY_TIMEOUT_MS: parseInt(process.env.POSTGRES_QUERY_TIMEOUT_MS || '30000', 10),
} as const;

/**
 * Tables read by the built-in direct tools
 */
export const DIRECT_TOOL_TABLES = {
  COMPETITOR_MAPPING: process.env.COMPETITOR_MAPPING_TABLE || 'competitor_product_mapping',
  PRODUCT_MASTER: process.env.PRODUCT_MASTER_TABLE || 'product_master',
  BILL_OF_MATERIALS: process.env.BILL_OF_MATERIALS_TABLE || 'bill_of_materials',
} as const;

/**
 * MCP server transport configuration
 */
export const SERVER_CONFIG = {
  NAME: 'insight-router-mcp',
  VERSION: '0.1.0',
  TRANSPORT: process.env.TRANSPORT || 'stdio',
  PORT: parseInt(process.env.PORT || '3001', 10),
  HOST: process.env.HOST || '0.0.0.0',
} as const;

// =============================================================================
// PERSONAS
// =============================================================================

/**
 * Persona names used by the built-in direct tools
 */
export const PERSONAS = {
  SALES_REP: 'sales_rep',
  PRODUCT_PLANNING: 'product_planning',
} as const;

// =============================================================================
// ANSWER TEXT
// =============================================================================

export const NO_RESULTS_ANSWER =
  'No results found for this question. Try rephrasing it or naming a specific product, part number or customer.';

export const STORE_FAILURE_ANSWER =
  'No data could be retrieved from the warehouse to answer this question, so the answer below may be incomplete.';
