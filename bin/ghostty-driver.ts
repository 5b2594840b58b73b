#!/usr/bin/env node

/**
 * CLI entry point for ghostty-driver
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { configCommand } from '../src/cli/commands/config.js';
import { listCommand } from '../src/cli/commands/list.js';
import { cellsCommand, readCommand } from '../src/cli/commands/read.js';
import {
  clickCommand,
  dragCommand,
  keyCommand,
  scrollCommand,
  sendCommand,
  typeCommand,
} from '../src/cli/commands/input.js';
import { waitCommand } from '../src/cli/commands/wait.js';
import { closeCommand, focusCommand, resizeCommand, screenshotCommand } from '../src/cli/commands/surface.js';
import { addConnectionOptions } from '../src/cli/common/options.js';
import { runCliCommand } from '../src/cli/common/errors.js';

function resolveCliVersion(): string {
  const candidates = [
    new URL('../package.json', import.meta.url),
    new URL('../../package.json', import.meta.url),
  ];

  for (const candidate of candidates) {
    const path = fileURLToPath(candidate);
    if (!existsSync(path)) continue;
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  }

  return process.env.npm_package_version || '0.0.0';
}

const BUTTONS = ['left', 'right', 'middle'] as const;

await yargs(hideBin(process.argv))
  .scriptName('ghostty-driver')
  .usage('$0 <command>')
  .version(resolveCliVersion())
  .help()
  .strict()
  .demandCommand(1)
  .command(
    'list',
    'List terminals in every window and tab',
    (y) => addConnectionOptions(y).option('json', { type: 'boolean', describe: 'Print surfaces as JSON' }),
    (argv) => runCliCommand(() => listCommand(argv))
  )
  .command(
    'read <id>',
    'Print the screen contents of a terminal',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .option('scrollback', { type: 'boolean', describe: 'Include scrollback, not just the viewport' })
      .option('plain', { type: 'boolean', describe: 'Strip ANSI escape sequences' }),
    (argv) => runCliCommand(() => readCommand(argv.id, argv))
  )
  .command(
    'cells <id>',
    'Print styled spans of a terminal screen',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .option('row', { type: 'number', describe: 'Only this row (0-based)' })
      .option('scrollback', { type: 'boolean', describe: 'Include scrollback, not just the viewport' })
      .option('json', { type: 'boolean', describe: 'Print spans as JSON' }),
    (argv) => runCliCommand(() => cellsCommand(argv.id, argv))
  )
  .command(
    'send <id> <text>',
    'Send text followed by Enter',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .positional('text', { type: 'string', demandOption: true }),
    (argv) => runCliCommand(() => sendCommand(argv.id, argv.text, argv))
  )
  .command(
    'type <id> <text>',
    'Type text without pressing Enter',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .positional('text', { type: 'string', demandOption: true })
      .option('delay', { type: 'number', describe: 'Pause between characters in milliseconds' }),
    (argv) => runCliCommand(() => typeCommand(argv.id, argv.text, argv))
  )
  .command(
    'key <id> <key>',
    'Press and release a key (e.g. Enter, ArrowUp, Ctrl+C)',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .positional('key', { type: 'string', demandOption: true })
      .option('mods', { type: 'string', describe: 'Comma-separated modifiers: shift,ctrl,alt,super' }),
    (argv) => runCliCommand(() => keyCommand(argv.id, argv.key, argv))
  )
  .command(
    'click <id> <x> <y>',
    'Click at a cell position',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .positional('x', { type: 'number', demandOption: true })
      .positional('y', { type: 'number', demandOption: true })
      .option('button', { choices: BUTTONS, describe: 'Mouse button' })
      .option('double', { type: 'boolean', describe: 'Double-click' })
      .option('mods', { type: 'string', describe: 'Comma-separated modifiers' }),
    (argv) => runCliCommand(() => clickCommand(argv.id, argv.x, argv.y, argv))
  )
  .command(
    'drag <id> <x1> <y1> <x2> <y2>',
    'Drag from one cell position to another',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .positional('x1', { type: 'number', demandOption: true })
      .positional('y1', { type: 'number', demandOption: true })
      .positional('x2', { type: 'number', demandOption: true })
      .positional('y2', { type: 'number', demandOption: true })
      .option('steps', { type: 'number', describe: 'Intermediate move events (default 10)' })
      .option('button', { choices: BUTTONS, describe: 'Mouse button' })
      .option('mods', { type: 'string', describe: 'Comma-separated modifiers' }),
    (argv) =>
      runCliCommand(() => dragCommand(argv.id, { x: argv.x1, y: argv.y1 }, { x: argv.x2, y: argv.y2 }, argv))
  )
  .command(
    'scroll <id>',
    'Scroll a terminal',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .option('dy', { type: 'number', describe: 'Vertical delta (positive scrolls down)' })
      .option('dx', { type: 'number', describe: 'Horizontal delta (positive scrolls right)' })
      .option('mods', { type: 'string', describe: 'Comma-separated modifiers' }),
    (argv) => runCliCommand(() => scrollCommand(argv.id, argv))
  )
  .command(
    'wait <id>',
    'Wait for text, a regex, a shell prompt or an idle screen',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .option('text', { type: 'string', describe: 'Wait for this substring' })
      .option('regex', { type: 'string', describe: 'Wait for this regular expression' })
      .option('prompt', { type: 'boolean', describe: 'Wait for a shell prompt' })
      .option('idle', { type: 'boolean', describe: 'Wait until the screen stops changing' })
      .option('stable-ms', { type: 'number', describe: 'How long the screen must stay unchanged for --idle' })
      .option('plain', { type: 'boolean', describe: 'Match --text against ANSI-stripped content' })
      .option('wait-timeout', { type: 'number', describe: 'Give up after this many milliseconds (default 30000)' }),
    (argv) => runCliCommand(() => waitCommand(argv.id, argv))
  )
  .command(
    'focus <id>',
    'Focus a terminal',
    (y) => addConnectionOptions(y).positional('id', { type: 'string', demandOption: true }),
    (argv) => runCliCommand(() => focusCommand(argv.id, argv))
  )
  .command(
    'close <id>',
    'Close a terminal',
    (y) => addConnectionOptions(y).positional('id', { type: 'string', demandOption: true }),
    (argv) => runCliCommand(() => closeCommand(argv.id, argv))
  )
  .command(
    'resize <id>',
    'Resize a terminal grid',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .option('rows', { type: 'number', describe: 'Rows' })
      .option('cols', { type: 'number', describe: 'Columns' }),
    (argv) => runCliCommand(() => resizeCommand(argv.id, argv))
  )
  .command(
    'screenshot <id> <path>',
    'Save a PNG screenshot of a terminal',
    (y) => addConnectionOptions(y)
      .positional('id', { type: 'string', demandOption: true })
      .positional('path', { type: 'string', demandOption: true }),
    (argv) => runCliCommand(() => screenshotCommand(argv.id, argv.path, argv))
  )
  .command(
    'config',
    'Show or save connection settings',
    (y) => y
      .option('show', { type: 'boolean', describe: 'Show current configuration' })
      .option('socket', { type: 'string', describe: 'Save the control socket path' })
      .option('app-class', { type: 'string', describe: 'Save an alternate app class' })
      .option('timeout', { type: 'number', describe: 'Save the per-request timeout in milliseconds' })
      .option('validate-socket', { type: 'boolean', describe: 'Save whether to validate the socket before connecting' }),
    (argv) => runCliCommand(() => configCommand(argv))
  )
  .parseAsync();
