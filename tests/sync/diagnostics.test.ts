import { truncateScreen } from '../../src/sync/diagnostics.js';
import { Screen } from '../../src/screen/screen.js';

describe('truncateScreen', () => {
  it('returns short screens stripped of escapes', () => {
    expect(truncateScreen(new Screen('\x1B[31merror\x1B[0m: bad', 0, 0))).toBe('error: bad');
  });

  it('keeps the last 80 lines behind a marker', () => {
    const text = Array.from({ length: 100 }, (_, i) => `line ${i + 1}`).join('\n');
    const lines = truncateScreen(new Screen(text, 0, 0)).split('\n');

    expect(lines).toHaveLength(81);
    expect(lines[0]).toBe('… (20 lines truncated) …');
    expect(lines[1]).toBe('line 21');
    expect(lines[80]).toBe('line 100');
  });

  it('keeps the last 8000 characters behind a marker', () => {
    const text = 'a'.repeat(1_000) + 'b'.repeat(8_000);
    expect(truncateScreen(new Screen(text, 0, 0))).toBe(`… (truncated) …\n${'b'.repeat(8_000)}`);
  });
});
