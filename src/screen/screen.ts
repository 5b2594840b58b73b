import { stripAnsi } from './ansi.js';

/**
 * Screen content from a terminal surface.
 * `plainText` is recomputed on each access so it always follows `text`.
 */
export class Screen {
  constructor(
    readonly text: string,
    readonly cursorX: number,
    readonly cursorY: number,
  ) {}

  get plainText(): string {
    return stripAnsi(this.text);
  }

  get lines(): string[] {
    const lines = this.text.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
  }

  contains(pattern: string): boolean {
    return this.text.includes(pattern);
  }
}
