#!/usr/bin/env node
/**
 * insight-router CLI - Question and Registry Operations
 *
 * Command-line access to the orchestrator without an MCP client.
 *
 * Usage:
 *   npx insight-router-cli ask "Replace BR-56U10 with our equivalent"
 *   npx insight-router-cli ask "Top customers by revenue" --json
 *   npx insight-router-cli tools --persona sales_rep
 *   npx insight-router-cli test-predicate sales_rep competitor_mapping "BR-56U10 equivalent"
 */

import 'dotenv/config';
import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { toolsCommand } from './commands/tools.js';
import { testPredicateCommand } from './commands/test-predicate.js';

const program = new Command();

program
  .name('insight-router-cli')
  .description('insight-router CLI - business question orchestration')
  .version('0.1.0');

// ask <question>
program
  .command('ask <question>')
  .description('Answer a business question from the warehouse')
  .option('--json', 'Print the full response envelope as JSON', false)
  .action(askCommand);

// tools
program
  .command('tools')
  .description('List registered direct tools in dispatch order')
  .option('--persona <name>', 'Show one persona only')
  .action(toolsCommand);

// test-predicate <persona> <tool> <questions...>
program
  .command('test-predicate <persona> <tool> <questions...>')
  .description('Check which sample questions a direct tool would claim')
  .action(testPredicateCommand);

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
