/**
 * Test Predicate Command
 *
 * Shows which sample questions a direct tool's predicate accepts.
 */

import chalk from 'chalk';
import { getDefaultToolRegistry } from '../../orchestrator/direct-tools/index.js';
import { testPredicate } from '../../orchestrator/tool-registry.js';

export async function testPredicateCommand(
  persona: string,
  toolName: string,
  questions: string[]
): Promise<void> {
  const report = testPredicate(getDefaultToolRegistry(), persona, toolName, questions);

  if (!report.found) {
    console.log(chalk.red(report.error));
    process.exit(1);
  }

  console.log(chalk.bold.cyan(`\n${report.toolName} (${report.persona})\n`));
  for (const result of report.results) {
    const mark = result.matches ? chalk.green('match') : chalk.dim('skip ');
    const suffix = result.error ? chalk.red(` [${result.error}]`) : '';
    console.log(`  ${mark}  ${result.question}${suffix}`);
  }
  console.log(chalk.white(`\nMatch rate: ${(report.matchRate * 100).toFixed(0)}%`));
}
