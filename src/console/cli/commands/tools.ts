/**
 * Tools Command
 *
 * Prints the direct tool registry.
 */

import chalk from 'chalk';
import { getDefaultToolRegistry } from '../../orchestrator/direct-tools/index.js';
import { getRegistryStats } from '../../orchestrator/tool-registry.js';

interface ToolsOptions {
  persona?: string;
}

export async function toolsCommand(options: ToolsOptions): Promise<void> {
  const registry = getDefaultToolRegistry();
  const stats = getRegistryStats(registry);

  console.log(chalk.bold.cyan('\nDirect Tools'));
  console.log(chalk.dim(`${stats.totalTools} tools across ${stats.totalPersonas} personas\n`));

  const personas = options.persona ? [options.persona] : [...registry.keys()];
  for (const persona of personas) {
    console.log(chalk.bold(persona));
    const tools = registry.get(persona) ?? [];
    if (tools.length === 0) {
      console.log(chalk.yellow('  No direct tools registered.'));
      continue;
    }
    tools.forEach((tool, i) => {
      console.log(`  ${i + 1}. ${chalk.green(tool.name)} - ${tool.description}`);
      for (const trigger of tool.exampleTriggers) {
        console.log(chalk.dim(`     "${trigger}"`));
      }
    });
    console.log();
  }
}
