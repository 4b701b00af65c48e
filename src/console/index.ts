/**
 * insight-router - Business Question MCP Server
 *
 * Answers natural-language business questions from a PostgreSQL data
 * warehouse: fast direct lookups where a registered tool applies, generated
 * SQL with discovery → analysis otherwise, and an evaluation of the
 * retrieved data into a business answer.
 *
 * Supports two transport modes:
 * - stdio: For Claude Desktop & local clients
 * - http: For cloud deployment & browser clients
 */

import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import express, { Request, Response } from 'express';
import { SERVER_CONFIG } from '../common/constants.js';
import { logError, logInfo, logWarn } from '../common/services/logger.js';
import { closeStore } from '../common/services/sql-store.js';
import { errorMessage } from '../common/utils/timeout.js';
import { registerAskTool } from './orchestrator/tools/ask-tool.js';
import { registerRegistryTool } from './orchestrator/tools/registry-tool.js';
import { registerStatusTool } from './orchestrator/tools/status-tool.js';
import { getOrchestratorConfig, validateConfig } from './orchestrator/config.js';
import { getDefaultToolRegistry } from './orchestrator/direct-tools/index.js';
import { getRegistryStats } from './orchestrator/tool-registry.js';
import { isClaudeAvailable } from './orchestrator/claude-client.js';

// =============================================================================
// MCP SERVER INSTANCE
// =============================================================================

const server = new McpServer({
  name: SERVER_CONFIG.NAME,
  version: SERVER_CONFIG.VERSION,
});

// Register question tool (ask_business_question)
registerAskTool(server);

// Register registry tool (list_direct_tools)
registerRegistryTool(server);

// Register status tool (orchestrator_status)
registerStatusTool(server);

// =============================================================================
// START-UP CHECKS
// =============================================================================

/**
 * Validate configuration and build the direct tool registry
 *
 * An invalid registry is a start-up failure; a missing API key is only a warning.
 */
function checkStartup(): void {
  const configErrors = validateConfig(getOrchestratorConfig());
  if (configErrors.length > 0) {
    throw new Error(`Invalid orchestrator configuration: ${configErrors.join('; ')}`);
  }

  const stats = getRegistryStats(getDefaultToolRegistry());
  logInfo('Direct tool registry ready', {
    personas: stats.totalPersonas,
    tools: stats.totalTools,
  });

  if (!isClaudeAvailable()) {
    logWarn('ANTHROPIC_API_KEY not set - ask_business_question will be unavailable');
  }
}

// =============================================================================
// STDIO TRANSPORT
// =============================================================================

async function runStdio(): Promise<void> {
  checkStartup();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_CONFIG.NAME} running on stdio`);
}

// =============================================================================
// HTTP TRANSPORT
// =============================================================================

async function runHttp(): Promise<void> {
  checkStartup();

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: SERVER_CONFIG.NAME,
      version: SERVER_CONFIG.VERSION,
      transport: 'http',
      claude: isClaudeAvailable(),
    });
  });

  // MCP endpoint - stateless, creates new transport per request
  app.post('/mcp', async (req: Request, res: Response) => {
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined, // Stateless mode
        enableJsonResponse: true,
      });

      res.on('close', () => {
        transport.close().catch((err: unknown) => {
          logWarn('MCP transport close failed', { error: errorMessage(err) });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logError('MCP request error', { error: errorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  app.listen(SERVER_CONFIG.PORT, SERVER_CONFIG.HOST, () => {
    logInfo(`${SERVER_CONFIG.NAME} running on http://${SERVER_CONFIG.HOST}:${SERVER_CONFIG.PORT}/mcp`, {
      endpoints: ['GET /health', 'POST /mcp'],
      tools: ['ask_business_question', 'list_direct_tools', 'orchestrator_status'],
    });
  });
}

// =============================================================================
// SHUTDOWN
// =============================================================================

async function shutdown(signal: string): Promise<void> {
  logInfo('Shutting down', { signal });
  try {
    await closeStore();
  } catch (error) {
    logError('Store shutdown failed', { error: errorMessage(error) });
  }
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

// =============================================================================
// MAIN
// =============================================================================

const start = SERVER_CONFIG.TRANSPORT === 'http' ? runHttp : runStdio;

start().catch((error: unknown) => {
  logError('Fatal start-up error', { error: errorMessage(error) });
  process.exit(1);
});
