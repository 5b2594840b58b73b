/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

/**
 * One terminal view exposed by the host. A value snapshot, never a live object.
 */
export interface Surface {
  id: string;
  title: string;
  pwd: string;
  focused: boolean;
  rows: number;
  cols: number;
}

export interface Tab {
  surfaces: Surface[];
}

export interface Window {
  tabs: Tab[];
}

export interface DriverConfig {
  socketPath: string;
  /** Alternate Ghostty app class to address; `null` targets the default instance. */
  target: string | null;
  requestTimeoutMs: number;
  validateSocket: boolean;
  debug: boolean;
}

/** `viewport` is the visible region, `screen` includes scrollback. */
export type ScreenKind = 'viewport' | 'screen';

export type Modifier = 'shift' | 'ctrl' | 'alt' | 'super';

/** Comma-separated string (`"ctrl,shift"`) or a list of modifiers. */
export type Modifiers = string | readonly Modifier[];

export type MouseButton = 'left' | 'right' | 'middle';

export type ButtonAction = 'press' | 'release';

export interface Point {
  x: number;
  y: number;
}

export type UnderlineStyle = 'none' | 'single' | 'double' | 'curly' | 'dotted' | 'dashed';

export interface CellStyle {
  /** Canonical color string, e.g. `palette(1)` or `rgb(255,0,0)`. */
  fg: string | null;
  bg: string | null;
  bold: boolean;
  italic: boolean;
  faint: boolean;
  strikethrough: boolean;
  inverse: boolean;
  underlineStyle: UnderlineStyle;
}

/**
 * Contiguous run of same-styled characters starting at column `x`.
 */
export interface Span extends CellStyle {
  x: number;
  text: string;
}

/** Span located on its row. */
export interface RowSpan extends Span {
  y: number;
}

export interface Cell extends CellStyle {
  char: string;
  x: number;
  y: number;
}

export type StyleFilter = Partial<CellStyle>;
