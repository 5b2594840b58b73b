import chalk from 'chalk';
import type { ConnectionCliOptions } from '../common/options.js';
import { createCliClient, requireTerminal } from '../common/client.js';
import { waitForText } from '../../sync/waits.js';

export interface WaitCliOptions extends ConnectionCliOptions {
  text?: string;
  regex?: string;
  prompt?: boolean;
  idle?: boolean;
  stableMs?: number;
  plain?: boolean;
  waitTimeout?: number;
}

export async function waitCommand(id: string, options: WaitCliOptions) {
  const conditions = [options.text !== undefined, options.regex !== undefined, !!options.prompt, !!options.idle];
  if (conditions.filter(Boolean).length !== 1) {
    throw new Error('Specify exactly one of --text, --regex, --prompt or --idle');
  }

  const client = createCliClient(options);
  const terminal = await requireTerminal(client, id);
  const waitOptions = { timeoutMs: options.waitTimeout };

  if (options.text !== undefined) {
    await terminal.waitForText(options.text, { ...waitOptions, plain: options.plain });
    console.log(chalk.green(`✅ Found ${JSON.stringify(options.text)}`));
  } else if (options.regex !== undefined) {
    const pattern = new RegExp(options.regex);
    const screen = await waitForText(terminal, pattern, { ...waitOptions, clock: client.clock });
    const matched = pattern.exec(screen.text)?.[0] ?? '';
    console.log(chalk.green(`✅ Matched ${JSON.stringify(matched)}`));
  } else if (options.prompt) {
    await terminal.waitForPrompt(undefined, waitOptions);
    console.log(chalk.green('✅ Prompt is visible'));
  } else {
    await terminal.waitForIdle(options.stableMs ?? 500, waitOptions);
    console.log(chalk.green('✅ Screen is idle'));
  }
}
