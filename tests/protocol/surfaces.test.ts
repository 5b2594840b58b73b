import {
  decodeScreen,
  decodeScreenCells,
  decodeSurface,
  extractSurfaces,
  extractWindows,
} from '../../src/protocol/surfaces.js';
import { ProtocolError } from '../../src/errors.js';

describe('decodeSurface', () => {
  it('fills defaults for absent fields', () => {
    expect(decodeSurface({ id: 's1' })).toEqual({ id: 's1', title: '', pwd: '', focused: false, rows: 24, cols: 80 });
  });

  it('keeps provided fields', () => {
    expect(decodeSurface({ id: 's1', title: 'vim', pwd: '/src', focused: true, rows: 50, cols: 120 })).toEqual({
      id: 's1',
      title: 'vim',
      pwd: '/src',
      focused: true,
      rows: 50,
      cols: 120,
    });
  });

  it('rejects an entry without an id', () => {
    expect(() => decodeSurface({ title: 'orphan' })).toThrow(ProtocolError);
  });
});

describe('extractSurfaces', () => {
  it('flattens windows and tabs in document order', () => {
    const data = {
      windows: [
        { tabs: [{ surfaces: [{ id: 'A' }] }] },
        { tabs: [{ surfaces: [{ id: 'B' }] }] },
      ],
    };
    expect(extractSurfaces(data).map((surface) => surface.id)).toEqual(['A', 'B']);
  });

  it('visits every tab and split within a window', () => {
    const data = {
      windows: [
        { tabs: [{ surfaces: [{ id: 'a1' }, { id: 'a2' }] }, { surfaces: [{ id: 'b1' }] }] },
        { tabs: [] },
        { tabs: [{ surfaces: [{ id: 'c1' }] }] },
      ],
    };
    expect(extractSurfaces(data).map((surface) => surface.id)).toEqual(['a1', 'a2', 'b1', 'c1']);
  });

  it('returns nothing when windows are absent', () => {
    expect(extractSurfaces({})).toEqual([]);
  });

  it('keeps the grouping in extractWindows', () => {
    const windows = extractWindows({ windows: [{ tabs: [{ surfaces: [{ id: 'x' }] }, { surfaces: [] }] }] });
    expect(windows).toHaveLength(1);
    expect(windows[0].tabs).toHaveLength(2);
    expect(windows[0].tabs[0].surfaces[0].id).toBe('x');
  });
});

describe('decodeScreen', () => {
  it('reads content and cursor', () => {
    const screen = decodeScreen({ content: '$ ls\n', cursor_x: 2, cursor_y: 1 });
    expect(screen.text).toBe('$ ls\n');
    expect(screen.cursorX).toBe(2);
    expect(screen.cursorY).toBe(1);
  });

  it('defaults to an empty screen', () => {
    const screen = decodeScreen({});
    expect(screen.text).toBe('');
    expect(screen.cursorX).toBe(0);
  });
});

describe('decodeScreenCells', () => {
  it('parses the JSON document carried in content', () => {
    const content = JSON.stringify({
      rows: [{ spans: [{ x: 0, text: 'ok', fg: 2 }] }],
      cursor: { x: 2, y: 0 },
      size: { rows: 24, cols: 80 },
    });
    const cells = decodeScreenCells({ content });

    expect(cells.textAtRow(0)).toBe('ok');
    expect(cells.cellAt(1, 0)?.fg).toBe('palette(2)');
    expect(cells.rowCount).toBe(24);
    expect(cells.colCount).toBe(80);
    expect(cells.cursorX).toBe(2);
  });

  it('accepts an already-decoded object', () => {
    expect(decodeScreenCells({ content: { rows: [{ spans: [{ text: 'hi' }] }] } }).textAtRow(0)).toBe('hi');
  });

  it('rejects malformed cells content', () => {
    expect(() => decodeScreenCells({ content: '{rows' })).toThrow('Invalid cells payload from Ghostty');
  });
});
