import chalk from 'chalk';
import type { ConnectionCliOptions } from '../common/options.js';
import { createCliClient, requireTerminal } from '../common/client.js';
import type { MouseButton } from '../../types/index.js';

export async function sendCommand(id: string, text: string, options: ConnectionCliOptions) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.send(text);
  console.log(chalk.green(`✅ Sent to ${id}`));
}

export async function typeCommand(id: string, text: string, options: ConnectionCliOptions & { delay?: number }) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.type(text, options.delay ?? 0);
  console.log(chalk.green(`✅ Typed ${text.length} characters into ${id}`));
}

export async function keyCommand(id: string, key: string, options: ConnectionCliOptions & { mods?: string }) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.press(key, options.mods);
  const label = options.mods ? `${options.mods}+${key}` : key;
  console.log(chalk.green(`✅ Pressed ${label} in ${id}`));
}

export async function clickCommand(
  id: string,
  x: number,
  y: number,
  options: ConnectionCliOptions & { button?: MouseButton; double?: boolean; mods?: string },
) {
  const terminal = await requireTerminal(createCliClient(options), id);
  const pointer = { button: options.button, mods: options.mods };
  if (options.double) {
    await terminal.doubleClick(x, y, pointer);
  } else {
    await terminal.click(x, y, pointer);
  }
  console.log(chalk.green(`✅ Clicked ${x},${y} in ${id}`));
}

export async function dragCommand(
  id: string,
  from: { x: number; y: number },
  to: { x: number; y: number },
  options: ConnectionCliOptions & { steps?: number; button?: MouseButton; mods?: string },
) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.drag(from, to, { steps: options.steps, button: options.button, mods: options.mods });
  console.log(chalk.green(`✅ Dragged ${from.x},${from.y} → ${to.x},${to.y} in ${id}`));
}

export async function scrollCommand(id: string, options: ConnectionCliOptions & { dy?: number; dx?: number; mods?: string }) {
  const terminal = await requireTerminal(createCliClient(options), id);
  await terminal.scroll({ dy: options.dy, dx: options.dx, mods: options.mods });
  console.log(chalk.green(`✅ Scrolled ${id} by dy=${options.dy ?? 0} dx=${options.dx ?? 0}`));
}
