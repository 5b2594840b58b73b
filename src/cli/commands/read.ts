import chalk from 'chalk';
import type { ConnectionCliOptions } from '../common/options.js';
import { createCliClient, requireTerminal } from '../common/client.js';
import type { Span } from '../../types/index.js';

export async function readCommand(
  id: string,
  options: ConnectionCliOptions & { scrollback?: boolean; plain?: boolean },
) {
  const terminal = await requireTerminal(createCliClient(options), id);
  const screen = await terminal.screen(options.scrollback ? 'screen' : 'viewport');
  console.log(options.plain ? screen.plainText : screen.text);
}

/** Non-default style attributes of a span, e.g. `fg=palette(1) bold`. */
export function describeStyle(span: Span): string {
  const parts: string[] = [];
  if (span.fg) parts.push(`fg=${span.fg}`);
  if (span.bg) parts.push(`bg=${span.bg}`);
  if (span.bold) parts.push('bold');
  if (span.italic) parts.push('italic');
  if (span.faint) parts.push('faint');
  if (span.strikethrough) parts.push('strikethrough');
  if (span.inverse) parts.push('inverse');
  if (span.underlineStyle !== 'none') parts.push(`underline=${span.underlineStyle}`);
  return parts.join(' ');
}

export async function cellsCommand(
  id: string,
  options: ConnectionCliOptions & { row?: number; scrollback?: boolean; json?: boolean },
) {
  const terminal = await requireTerminal(createCliClient(options), id);
  const cells = await terminal.cells(options.scrollback ? 'screen' : 'viewport');
  const spans = options.row === undefined ? cells.spans : cells.spans.filter((span) => span.y === options.row);

  if (options.json) {
    console.log(JSON.stringify(spans, null, 2));
    return;
  }

  console.log(chalk.cyan(`\n🔎 ${cells.colCount}x${cells.rowCount}, cursor at ${cells.cursorX},${cells.cursorY}\n`));
  for (const span of spans) {
    const style = describeStyle(span);
    console.log(`${chalk.gray(`${span.y}:${span.x}`)} ${JSON.stringify(span.text)}${style ? ` ${chalk.gray(style)}` : ''}`);
  }
}
