/**
 * Key name canonicalization
 * Ghostty takes W3C key codes (`KeyA`, `ArrowUp`, `Enter`, ...)
 */

import type { Modifiers } from '../types/index.js';

const KEY_ALIASES: Readonly<Record<string, string>> = {
  Up: 'ArrowUp',
  Down: 'ArrowDown',
  Left: 'ArrowLeft',
  Right: 'ArrowRight',
  Esc: 'Escape',
  Return: 'Enter',
  Del: 'Delete',
  PgUp: 'PageUp',
  PgDn: 'PageDown',
  ' ': 'Space',
};

export type KeyInput =
  | { kind: 'key'; key: string; mods?: string }
  | { kind: 'text'; text: string };

/**
 * Normalize modifiers to the comma-separated wire form, or `undefined` when empty.
 */
export function formatMods(mods: Modifiers | undefined): string | undefined {
  if (mods === undefined) return undefined;
  const raw: string[] = typeof mods === 'string' ? mods.split(',') : [...mods];
  const parts = raw
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);
  return parts.length > 0 ? parts.join(',') : undefined;
}

export function canonicalKey(key: string): string {
  return Object.prototype.hasOwnProperty.call(KEY_ALIASES, key) ? KEY_ALIASES[key] : key;
}

/**
 * Resolve a key press request.
 * `Ctrl+<Letter>` becomes `Key<LETTER>` with `ctrl` prepended to the modifiers;
 * any other `Ctrl+<char>` is sent as its control character.
 */
export function resolveKeyInput(key: string, mods?: Modifiers): KeyInput {
  const formatted = formatMods(mods);

  if (key.startsWith('Ctrl+')) {
    const char = key.slice(5).toUpperCase();
    if (/^[A-Z]$/.test(char)) {
      return { kind: 'key', key: `Key${char}`, mods: formatted ? `ctrl,${formatted}` : 'ctrl' };
    }
    const code = char.length === 1 ? char.charCodeAt(0) - 'A'.charCodeAt(0) + 1 : 0;
    if (code > 0) {
      return { kind: 'text', text: String.fromCharCode(code) };
    }
  }

  return { kind: 'key', key: canonicalKey(key), mods: formatted };
}
