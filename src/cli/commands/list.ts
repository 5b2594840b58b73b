import chalk from 'chalk';
import type { ConnectionCliOptions } from '../common/options.js';
import { createCliClient } from '../common/client.js';

export async function listCommand(options: ConnectionCliOptions & { json?: boolean }) {
  const client = createCliClient(options);
  const terminals = await client.terminals.all();

  if (options.json) {
    console.log(JSON.stringify(terminals.map((terminal) => terminal.surface), null, 2));
    return;
  }

  if (terminals.length === 0) {
    console.log(chalk.gray('No terminals found.'));
    return;
  }

  console.log(chalk.cyan(`\n🖥️  Terminals (${terminals.length}):\n`));
  for (const terminal of terminals) {
    const status = terminal.focused ? chalk.green('● focused') : chalk.gray('○');
    console.log(chalk.white(`  • ${terminal.id}`), status);
    console.log(chalk.gray(`    Title: ${terminal.title || '(untitled)'}`));
    console.log(chalk.gray(`    Path: ${terminal.pwd || '(unknown)'}`));
    console.log(chalk.gray(`    Size: ${terminal.cols}x${terminal.rows}`));
  }
  console.log('');
}
