/**
 * Decoders for `list_surfaces` and `get_screen` payloads
 */

import { ProtocolError } from '../errors.js';
import { Screen } from '../screen/screen.js';
import { ScreenCells } from '../screen/cells.js';
import type { Surface, Tab, Window } from '../types/index.js';
import type { ResponseData } from './envelope.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function toInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.floor(value) : fallback;
}

export function decodeSurface(raw: unknown): Surface {
  if (!isRecord(raw) || typeof raw.id !== 'string' || raw.id.length === 0) {
    throw new ProtocolError('Surface entry without an id');
  }
  return {
    id: raw.id,
    title: typeof raw.title === 'string' ? raw.title : '',
    pwd: typeof raw.pwd === 'string' ? raw.pwd : '',
    focused: raw.focused === true,
    rows: toInt(raw.rows, 24),
    cols: toInt(raw.cols, 80),
  };
}

function decodeTab(raw: unknown): Tab {
  return { surfaces: list(isRecord(raw) ? raw.surfaces : undefined).map(decodeSurface) };
}

function decodeWindow(raw: unknown): Window {
  return { tabs: list(isRecord(raw) ? raw.tabs : undefined).map(decodeTab) };
}

export function extractWindows(data: ResponseData): Window[] {
  return list(data.windows).map(decodeWindow);
}

/**
 * Flatten windows → tabs → surfaces depth-first, keeping document order.
 */
export function extractSurfaces(data: ResponseData): Surface[] {
  return extractWindows(data).flatMap((window) => window.tabs.flatMap((tab) => tab.surfaces));
}

export function decodeScreen(data: ResponseData): Screen {
  return new Screen(
    typeof data.content === 'string' ? data.content : '',
    toInt(data.cursor_x, 0),
    toInt(data.cursor_y, 0),
  );
}

/**
 * Cells format carries its JSON document as a string in `content`.
 */
export function decodeScreenCells(data: ResponseData): ScreenCells {
  if (isRecord(data.content)) {
    return ScreenCells.fromJSON(data.content);
  }
  return ScreenCells.parse(typeof data.content === 'string' ? data.content : '{}');
}
