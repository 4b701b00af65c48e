/**
 * Structured Logger Service
 *
 * JSON-formatted logging for question handling.
 * All logs go to stderr (stdout reserved for MCP JSON-RPC protocol).
 *
 * Every line written while handling a question carries its request_id, so
 * grep "req_1734345045123_a1b2c3" shows the whole request lifecycle:
 * classification, dispatch, store queries, evaluation, assembly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  // Request identification
  request_id?: string;
  persona?: string;

  // Routing
  execution_path?: string;
  stage?: string;
  tool_name?: string;

  // Results
  row_count?: number;
  store_queries?: number;

  // Performance
  duration_ms?: number;

  // Errors
  error?: string;
  error_kind?: string;

  // Extensible
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveThreshold(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Log a structured message to stderr
 *
 * Output format:
 * {"ts":"2025-12-16T10:30:45.123Z","level":"info","msg":"Dispatch matched","request_id":"req_...",...}
 */
export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) {
    return;
  }
  const entry = {
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  };
  console.error(JSON.stringify(entry));
}

// Convenience functions
export const logInfo = (msg: string, ctx?: LogContext) => log('info', msg, ctx);
export const logWarn = (msg: string, ctx?: LogContext) => log('warn', msg, ctx);
export const logError = (msg: string, ctx?: LogContext) => log('error', msg, ctx);
export const logDebug = (msg: string, ctx?: LogContext) => log('debug', msg, ctx);

/**
 * Generate unique request ID for log correlation
 * Format: req_<timestamp>_<random>
 *
 * Example: req_1734345045123_a1b2c3
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}
