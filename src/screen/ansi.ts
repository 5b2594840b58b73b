/**
 * ANSI escape stripping for text matching
 */

// OSC first so `ESC ]` is not taken as a two-character escape when terminated.
const ANSI_REGEX = new RegExp(
  [
    '\\x1B\\][^\\x07\\x1B]*(?:\\x07|\\x1B\\\\)', // OSC ... BEL | ST
    '\\x1B\\[[\\x30-\\x3F]*[\\x20-\\x2F]*[\\x40-\\x7E]', // CSI params, intermediates, final
    '\\x1B[\\x40-\\x5A\\x5C-\\x5F]', // ESC + one of @..Z \ ] ^ _
    '\\x1B', // stray ESC that starts no sequence
  ].join('|'),
  'g',
);

/**
 * Strip ANSI escape codes from terminal output
 */
export function stripAnsi(text: string): string {
  if (!text.includes('\x1b')) return text;
  return text.replace(ANSI_REGEX, '');
}
