/**
 * Styled screen model: rows of spans, with cells derived on demand
 */

import { ProtocolError } from '../errors.js';
import type { Cell, CellStyle, RowSpan, Span, StyleFilter, UnderlineStyle } from '../types/index.js';
import { canonicalColor } from './color.js';

const UNDERLINE_STYLES: readonly UnderlineStyle[] = ['none', 'single', 'double', 'curly', 'dotted', 'dashed'];

const STYLE_KEYS: readonly (keyof CellStyle)[] = [
  'fg',
  'bg',
  'bold',
  'italic',
  'faint',
  'strikethrough',
  'inverse',
  'underlineStyle',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.floor(value) : fallback;
}

function decodeUnderline(raw: unknown): UnderlineStyle {
  if (raw === true) return 'single';
  if (typeof raw === 'string') {
    const match = UNDERLINE_STYLES.find((style) => style === raw);
    if (match) return match;
  }
  return 'none';
}

/** Number of cells a span occupies: one per code point. */
export function spanWidth(span: Span): number {
  return Array.from(span.text).length;
}

/**
 * Decode one wire span, filling every absent field with its default.
 */
export function decodeSpan(raw: unknown): Span {
  const data = isRecord(raw) ? raw : {};
  return {
    x: Math.max(0, toInt(data.x, 0)),
    text: typeof data.text === 'string' ? data.text : '',
    fg: canonicalColor(data.fg),
    bg: canonicalColor(data.bg),
    bold: data.bold === true,
    italic: data.italic === true,
    faint: data.faint === true,
    strikethrough: data.strikethrough === true,
    inverse: data.inverse === true,
    underlineStyle: decodeUnderline(data.underline ?? data.underline_style),
  };
}

function styleOf(span: Span): CellStyle {
  return {
    fg: span.fg,
    bg: span.bg,
    bold: span.bold,
    italic: span.italic,
    faint: span.faint,
    strikethrough: span.strikethrough,
    inverse: span.inverse,
    underlineStyle: span.underlineStyle,
  };
}

function matchesFilter(style: CellStyle, filter: StyleFilter): boolean {
  return STYLE_KEYS.every((key) => filter[key] === undefined || filter[key] === style[key]);
}

/**
 * Expand one span to its cells.
 */
export function expandSpan(span: Span, y: number): Cell[] {
  const style = styleOf(span);
  return Array.from(span.text).map((char, offset) => ({ char, x: span.x + offset, y, ...style }));
}

export class ScreenCells {
  private readonly rows: Span[][];

  constructor(
    rows: Span[][],
    readonly cursorX: number,
    readonly cursorY: number,
    readonly rowCount: number,
    readonly colCount: number,
  ) {
    this.rows = rows.map((spans, y) => {
      const sorted = [...spans].sort((a, b) => a.x - b.x);
      for (let i = 1; i < sorted.length; i += 1) {
        const previous = sorted[i - 1];
        if (previous.x + spanWidth(previous) > sorted[i].x) {
          throw new ProtocolError(`Overlapping spans on row ${y} at column ${sorted[i].x}`);
        }
      }
      return sorted;
    });
  }

  /**
   * Decode the JSON object carried in a cells-format `get_screen` response.
   */
  static fromJSON(raw: unknown): ScreenCells {
    const data = isRecord(raw) ? raw : {};
    const rowsRaw = Array.isArray(data.rows) ? data.rows : [];
    const rows = rowsRaw.map((row: unknown) => {
      const spans = isRecord(row) && Array.isArray(row.spans) ? row.spans : [];
      return spans.map((span: unknown) => decodeSpan(span));
    });
    const cursor = isRecord(data.cursor) ? data.cursor : {};
    const size = isRecord(data.size) ? data.size : {};

    return new ScreenCells(
      rows,
      toInt(cursor.x, 0),
      toInt(cursor.y, 0),
      toInt(size.rows, rows.length),
      toInt(size.cols, 0),
    );
  }

  static parse(content: string): ScreenCells {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ProtocolError('Invalid cells payload from Ghostty', { cause: error });
    }
    return ScreenCells.fromJSON(raw);
  }

  /** Spans on row `y`, ascending by `x`. */
  spansAt(y: number): readonly Span[] {
    return this.rows[y] ?? [];
  }

  get spans(): RowSpan[] {
    return this.rows.flatMap((spans, y) => spans.map((span) => ({ ...span, y })));
  }

  /** Flattened cell list, recomputed from the spans on each access. */
  get cells(): Cell[] {
    return this.rows.flatMap((spans, y) => spans.flatMap((span) => expandSpan(span, y)));
  }

  get lines(): string[] {
    return this.rows.map((_spans, y) => this.textAtRow(y));
  }

  textAtRow(y: number): string {
    return this.spansAt(y)
      .map((span) => span.text)
      .join('');
  }

  /**
   * Cell at column `x` on row `y`, or `null` when `x` falls in an unwritten gap
   * or is not a whole column.
   */
  cellAt(x: number, y: number): Cell | null {
    if (!Number.isInteger(x)) return null;
    for (const span of this.spansAt(y)) {
      if (x < span.x) return null;
      const offset = x - span.x;
      const chars = Array.from(span.text);
      if (offset < chars.length) {
        return { char: chars[offset], x, y, ...styleOf(span) };
      }
    }
    return null;
  }

  styledSpans(filter: StyleFilter = {}): RowSpan[] {
    return this.spans.filter((span) => matchesFilter(span, filter));
  }

  styledCells(filter: StyleFilter = {}): Cell[] {
    return this.rows.flatMap((spans, y) =>
      spans.filter((span) => matchesFilter(styleOf(span), filter)).flatMap((span) => expandSpan(span, y)),
    );
  }
}
