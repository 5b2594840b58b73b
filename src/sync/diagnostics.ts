import type { Screen } from '../screen/screen.js';

export const MAX_DIAGNOSTIC_LINES = 80;
export const MAX_DIAGNOSTIC_CHARS = 8_000;

/**
 * Tail of the ANSI-stripped screen for failure messages.
 */
export function truncateScreen(screen: Screen): string {
  let text = screen.plainText;
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();

  if (lines.length > MAX_DIAGNOSTIC_LINES) {
    const omitted = lines.length - MAX_DIAGNOSTIC_LINES;
    text = [`… (${omitted} lines truncated) …`, ...lines.slice(-MAX_DIAGNOSTIC_LINES)].join('\n');
  }

  if (text.length > MAX_DIAGNOSTIC_CHARS) {
    text = `… (truncated) …\n${text.slice(-MAX_DIAGNOSTIC_CHARS)}`;
  }

  return text;
}
