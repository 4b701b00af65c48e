/**
 * Ask Command
 *
 * Runs one question through the orchestrator and prints the answer.
 */

import ora from 'ora';
import chalk from 'chalk';
import { getQuestionOrchestrator } from '../../orchestrator/engine.js';
import { isClaudeAvailable } from '../../orchestrator/claude-client.js';
import { formatEnvelope } from '../../orchestrator/tools/ask-tool.js';
import { closeStore } from '../../../common/services/sql-store.js';

interface AskOptions {
  json: boolean;
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  if (!isClaudeAvailable()) {
    console.log(chalk.red('ANTHROPIC_API_KEY is not set.'));
    process.exit(1);
  }

  console.log(chalk.bold('\n' + '='.repeat(60)));
  console.log(chalk.bold.cyan('INSIGHT ROUTER - Ask'));
  console.log(chalk.bold('='.repeat(60)));
  console.log();
  console.log(chalk.white('Question:'), chalk.yellow(question));
  console.log();

  const spinner = ora('Answering...').start();

  try {
    const envelope = await getQuestionOrchestrator().handle(question);
    if (envelope.degraded) {
      spinner.warn(`Answered with degraded data (${envelope.executionPath})`);
    } else {
      spinner.succeed(`Answered via ${envelope.executionPath} in ${envelope.timing.totalMs}ms`);
    }
    console.log();
    console.log(options.json ? JSON.stringify(envelope, null, 2) : formatEnvelope(envelope));
  } finally {
    await closeStore();
  }
}
