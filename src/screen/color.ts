export type Color =
  | { kind: 'palette'; index: number }
  | { kind: 'rgb'; r: number; g: number; b: number };

function isChannel(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * Decode a wire color: an integer is a palette index, a 3-element array is RGB.
 * Anything else is treated as the default color.
 */
export function decodeColor(raw: unknown): Color | null {
  if (typeof raw === 'number' && Number.isInteger(raw) && raw >= 0) {
    return { kind: 'palette', index: raw };
  }
  if (Array.isArray(raw) && raw.length === 3) {
    const [r, g, b]: unknown[] = raw;
    if (isChannel(r) && isChannel(g) && isChannel(b)) {
      return { kind: 'rgb', r, g, b };
    }
  }
  return null;
}

export function formatColor(color: Color): string {
  switch (color.kind) {
    case 'palette':
      return `palette(${color.index})`;
    case 'rgb':
      return `rgb(${color.r},${color.g},${color.b})`;
  }
}

/** Canonical color string used for equality checks, or `null` for the default color. */
export function canonicalColor(raw: unknown): string | null {
  const color = decodeColor(raw);
  return color ? formatColor(color) : null;
}
