import chalk from 'chalk';
import type { ConnectionCliOptions } from '../common/options.js';
import { createCliClient, requireTerminal } from '../common/client.js';

export async function focusCommand(id: string, options: ConnectionCliOptions) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.focus();
  console.log(chalk.green(`✅ Focused ${id}`));
}

export async function closeCommand(id: string, options: ConnectionCliOptions) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.close();
  console.log(chalk.green(`✅ Closed ${id}`));
}

export async function resizeCommand(id: string, options: ConnectionCliOptions & { rows?: number; cols?: number }) {
  if (options.rows === undefined && options.cols === undefined) {
    throw new Error('Specify --rows and/or --cols');
  }
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.resize({ rows: options.rows, cols: options.cols });
  console.log(chalk.green(`✅ Resized ${id} to ${options.cols ?? terminal.cols}x${options.rows ?? terminal.rows}`));
}

export async function screenshotCommand(id: string, path: string, options: ConnectionCliOptions) {
  const terminal = await requireTerminal(createCliClient(options), id);
  const saved = await terminal.screenshot(path);
  console.log(chalk.green(`✅ Screenshot saved: ${saved}`));
}
