/**
 * Playwright-style expect assertions for terminals
 */

import { AssertionFailure, TimeoutError } from '../errors.js';
import type { Screen } from '../screen/screen.js';
import { systemClock, type Clock } from './clock.js';
import { truncateScreen } from './diagnostics.js';
import { POLL_INTERVAL_MS } from './poller.js';
import { DEFAULT_TIMEOUT_MS, findMatch, waitForPrompt, waitForText, type ScreenSource } from './waits.js';

export const DEFAULT_ABSENCE_TIMEOUT_MS = 1_000;

export interface ExpectTarget extends ScreenSource {
  refresh(): Promise<unknown>;
  readonly title: string;
  readonly pwd: string;
  readonly focused: boolean;
}

export interface AssertOptions {
  timeoutMs?: number;
}

export interface MetadataAssertOptions extends AssertOptions {
  /** Require equality instead of a substring match. */
  exact?: boolean;
}

function quote(value: string | RegExp): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

async function asAssertion<T>(run: () => Promise<T>, message: string): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new AssertionFailure(message, error.diagnostic, error);
    }
    throw error;
  }
}

export class TerminalExpect {
  constructor(
    private target: ExpectTarget,
    private clock: Clock = systemClock,
  ) {}

  async toContain(text: string, options: AssertOptions = {}): Promise<void> {
    await asAssertion(
      () => waitForText(this.target, text, { timeoutMs: options.timeoutMs, clock: this.clock }),
      `Expected terminal to contain ${quote(text)}`,
    );
  }

  /**
   * Resolves with the match once the raw screen matches `pattern`.
   */
  async toMatch(pattern: string | RegExp, options: AssertOptions = {}): Promise<RegExpExecArray> {
    const screen = await asAssertion(
      () => waitForText(this.target, pattern, { regex: true, timeoutMs: options.timeoutMs, clock: this.clock }),
      `Expected terminal to match pattern ${quote(pattern)}`,
    );
    const match = findMatch(screen.text, pattern, true);
    if (match === null || typeof match === 'string') {
      throw new AssertionFailure(`Pattern ${quote(pattern)} not found after wait`, truncateScreen(screen));
    }
    return match;
  }

  /**
   * Passes only if `text` stays absent for the whole window; fails on the
   * first screen that shows it.
   */
  async notToContain(text: string, options: AssertOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_ABSENCE_TIMEOUT_MS;
    const deadline = this.clock.now() + timeoutMs;

    for (;;) {
      const screen: Screen = await this.target.screen();
      if (screen.contains(text)) {
        throw new AssertionFailure(`Expected terminal NOT to contain ${quote(text)}`, truncateScreen(screen));
      }
      if (this.clock.now() >= deadline) return;
      await this.clock.sleep(POLL_INTERVAL_MS);
    }
  }

  async prompt(options: AssertOptions = {}): Promise<void> {
    await asAssertion(
      () => waitForPrompt(this.target, undefined, { timeoutMs: options.timeoutMs, clock: this.clock }),
      'Expected shell prompt to be visible',
    );
  }

  async toHaveTitle(title: string, options: MetadataAssertOptions = {}): Promise<void> {
    const matched = await this.pollMetadata(() => matchText(this.target.title, title, options.exact), options);
    if (!matched) {
      throw new AssertionFailure(
        `Expected terminal title ${options.exact ? 'to be' : 'to contain'} ${quote(title)}\n` +
          `Actual title: ${quote(this.target.title)}`,
      );
    }
  }

  async toHavePwd(path: string, options: MetadataAssertOptions = {}): Promise<void> {
    const matched = await this.pollMetadata(() => matchText(this.target.pwd, path, options.exact), options);
    if (!matched) {
      throw new AssertionFailure(
        `Expected terminal pwd ${options.exact ? 'to be' : 'to contain'} ${quote(path)}\n` +
          `Actual pwd: ${quote(this.target.pwd)}`,
      );
    }
  }

  async toBeFocused(options: AssertOptions = {}): Promise<void> {
    const matched = await this.pollMetadata(() => this.target.focused, options);
    if (!matched) {
      throw new AssertionFailure('Expected terminal to be focused');
    }
  }

  /** Refresh the surface snapshot each cycle until `check` holds or time runs out. */
  private async pollMetadata(check: () => boolean, options: AssertOptions): Promise<boolean> {
    const deadline = this.clock.now() + (options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    for (;;) {
      await this.target.refresh();
      if (check()) return true;
      if (this.clock.now() >= deadline) return false;
      await this.clock.sleep(POLL_INTERVAL_MS);
    }
  }
}

function matchText(actual: string, expected: string, exact = false): boolean {
  return exact ? actual === expected : actual.includes(expected);
}
