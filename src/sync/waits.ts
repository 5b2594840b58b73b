/**
 * Screen waits built on the poller
 */

import { TimeoutError } from '../errors.js';
import type { Screen } from '../screen/screen.js';
import { systemClock, type Clock } from './clock.js';
import { truncateScreen } from './diagnostics.js';
import { pollUntil } from './poller.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Common shell prompt endings: $ # > % ➤ ❯ λ » › */
export const DEFAULT_PROMPT_PATTERN = /[$#>%➤❯λ»›]\s*/;

export interface ScreenSource {
  screen(): Promise<Screen>;
}

export interface WaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface TextWaitOptions extends WaitOptions {
  /** Treat a string pattern as a regular expression. */
  regex?: boolean;
  /** Match against ANSI-stripped text instead of the raw screen. */
  plain?: boolean;
}

function describePattern(pattern: string | RegExp): string {
  return typeof pattern === 'string' ? JSON.stringify(pattern) : String(pattern);
}

/** Copy without `g`/`y` so repeated searches never depend on `lastIndex`. */
function toSearchRegExp(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

export function compilePattern(pattern: string | RegExp, regex = false): RegExp | null {
  if (pattern instanceof RegExp) return toSearchRegExp(pattern);
  return regex ? new RegExp(pattern) : null;
}

/**
 * Search `text` for a substring or regex; returns the match or `null`.
 */
export function findMatch(text: string, pattern: string | RegExp, regex = false): RegExpExecArray | string | null {
  const compiled = compilePattern(pattern, regex);
  if (compiled) return compiled.exec(text);
  return typeof pattern === 'string' && text.includes(pattern) ? pattern : null;
}

/** Drop the filler glyphs Ghostty reports for never-written cells. */
export function trimPlaceholders(text: string): string {
  return text.replace(/[\uFFFD\u0000]+$/, '');
}

function pollOptions(options: WaitOptions) {
  return {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    intervalMs: options.intervalMs,
    clock: options.clock,
    signal: options.signal,
  };
}

export function waitForText(
  source: ScreenSource,
  pattern: string | RegExp,
  options: TextWaitOptions = {},
): Promise<Screen> {
  const base = pollOptions(options);
  return pollUntil({
    ...base,
    fetch: () => source.screen(),
    check: (screen) => findMatch(options.plain ? screen.plainText : screen.text, pattern, options.regex) !== null,
    onTimeout: (screen) =>
      new TimeoutError(`Timeout waiting for text: ${describePattern(pattern)}`, base.timeoutMs, truncateScreen(screen)),
  });
}

export function waitForPrompt(
  source: ScreenSource,
  pattern: string | RegExp = DEFAULT_PROMPT_PATTERN,
  options: WaitOptions = {},
): Promise<Screen> {
  const base = pollOptions(options);
  const compiled = compilePattern(pattern, true) ?? DEFAULT_PROMPT_PATTERN;
  return pollUntil({
    ...base,
    fetch: () => source.screen(),
    check: (screen) => compiled.test(trimPlaceholders(screen.plainText)),
    onTimeout: (screen) =>
      new TimeoutError(`Timeout waiting for prompt: ${describePattern(pattern)}`, base.timeoutMs, truncateScreen(screen)),
  });
}

/**
 * Resolve once the raw screen text has not changed for `stableMs`.
 */
export function waitForIdle(source: ScreenSource, stableMs = 500, options: WaitOptions = {}): Promise<Screen> {
  const base = pollOptions(options);
  const clock = options.clock ?? systemClock;
  let lastText: string | undefined;
  let stableSince = 0;

  return pollUntil({
    ...base,
    clock,
    fetch: () => source.screen(),
    check: (screen) => {
      const now = clock.now();
      if (screen.text !== lastText) {
        lastText = screen.text;
        stableSince = now;
      }
      return now - stableSince >= stableMs;
    },
    onTimeout: (screen) =>
      new TimeoutError('Timeout waiting for screen to stabilize', base.timeoutMs, truncateScreen(screen)),
  });
}
