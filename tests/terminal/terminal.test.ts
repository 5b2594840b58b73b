import { resolve } from 'path';
import { NotFoundError } from '../../src/errors.js';
import { Terminal } from '../../src/terminal/terminal.js';
import {
  createTestClient,
  FakeClock,
  FakeSender,
  screenSequence,
  surface,
  surfacesData,
} from '../support/fakes.js';

function setup(clock = new FakeClock()) {
  const sender = new FakeSender().on('list_surfaces', () => surfacesData(surface('s1', { title: 'zsh', pwd: '/work' })));
  const client = createTestClient(sender, clock);
  const terminal = new Terminal(client, surface('s1', { title: 'zsh', pwd: '/work' }));
  return { sender, clock, terminal };
}

describe('Terminal', () => {
  describe('text input', () => {
    it('sends text followed by carriage return', async () => {
      const { sender, terminal } = setup();
      await terminal.send('ls -la');
      expect(sender.requests).toEqual([{ action: 'send_text', payload: { surface_id: 's1', text: 'ls -la\r' } }]);
    });

    it('types text in one request without a delay', async () => {
      const { sender, terminal } = setup();
      await terminal.type('abc');
      expect(sender.requestsFor('send_text')).toEqual([{ surface_id: 's1', text: 'abc' }]);
    });

    it('types one character per request with a delay', async () => {
      const { sender, clock, terminal } = setup();
      await terminal.type('hé', 20);
      expect(sender.requestsFor('send_text')).toEqual([
        { surface_id: 's1', text: 'h' },
        { surface_id: 's1', text: 'é' },
      ]);
      expect(clock.sleeps).toEqual([20, 20]);
    });
  });

  describe('keys', () => {
    it('presses and releases the same key', async () => {
      const { sender, terminal } = setup();
      await terminal.press('Enter');
      expect(sender.requestsFor('send_key')).toEqual([
        { surface_id: 's1', key: 'Enter', action: 'press' },
        { surface_id: 's1', key: 'Enter', action: 'release' },
      ]);
    });

    it('maps aliases and formats modifiers', async () => {
      const { sender, terminal } = setup();
      await terminal.press('Up', ['shift', 'alt']);
      expect(sender.requestsFor('send_key')).toEqual([
        { surface_id: 's1', key: 'ArrowUp', action: 'press', mods: 'shift,alt' },
        { surface_id: 's1', key: 'ArrowUp', action: 'release', mods: 'shift,alt' },
      ]);
    });

    it('sends Ctrl+letter as a key with ctrl', async () => {
      const { sender, terminal } = setup();
      await terminal.press('Ctrl+c');
      expect(sender.requestsFor('send_key')).toEqual([
        { surface_id: 's1', key: 'KeyC', action: 'press', mods: 'ctrl' },
        { surface_id: 's1', key: 'KeyC', action: 'release', mods: 'ctrl' },
      ]);
    });

    it('sends other Ctrl combinations as control characters', async () => {
      const { sender, terminal } = setup();
      await terminal.press('Ctrl+[');
      expect(sender.requests).toEqual([{ action: 'send_text', payload: { surface_id: 's1', text: '\x1b' } }]);
    });

    it('sends single transitions with keyDown and keyUp', async () => {
      const { sender, terminal } = setup();
      await terminal.keyDown('Esc', 'Ctrl');
      await terminal.keyUp('Esc');
      expect(sender.requestsFor('send_key')).toEqual([
        { surface_id: 's1', key: 'Escape', action: 'press', mods: 'ctrl' },
        { surface_id: 's1', key: 'Escape', action: 'release' },
      ]);
    });
  });

  describe('mouse', () => {
    it('clicks with press and release', async () => {
      const { sender, terminal } = setup();
      await terminal.click(5, 3);
      expect(sender.requestsFor('send_mouse')).toEqual([
        { surface_id: 's1', x: 5, y: 3, button: 'left', button_action: 'press' },
        { surface_id: 's1', x: 5, y: 3, button: 'left', button_action: 'release' },
      ]);
    });

    it('double-clicks with a pause between clicks', async () => {
      const { sender, clock, terminal } = setup();
      await terminal.doubleClick(1, 1, { button: 'right' });
      expect(sender.requestsFor('send_mouse')).toHaveLength(4);
      expect(clock.sleeps).toEqual([50]);
    });

    it('drags through interpolated moves ending at the destination', async () => {
      const { sender, clock, terminal } = setup();
      await terminal.drag({ x: 0, y: 0 }, { x: 4, y: 2 }, { steps: 2, mods: 'shift' });
      expect(sender.requestsFor('send_mouse')).toEqual([
        { surface_id: 's1', x: 0, y: 0, button: 'left', button_action: 'press', mods: 'shift' },
        { surface_id: 's1', x: 2, y: 1, mods: 'shift' },
        { surface_id: 's1', x: 4, y: 2, mods: 'shift' },
        { surface_id: 's1', x: 4, y: 2, button: 'left', button_action: 'release', mods: 'shift' },
      ]);
      expect(clock.sleeps).toEqual([10, 10, 10]);
    });

    it('emits steps + 2 events for a default drag', async () => {
      const { sender, terminal } = setup();
      await terminal.drag({ x: 0, y: 0 }, { x: 20, y: 0 });
      expect(sender.requestsFor('send_mouse')).toHaveLength(12);
    });

    it('scrolls with one request', async () => {
      const { sender, terminal } = setup();
      await terminal.scroll({ dy: 3 });
      await terminal.scroll({ dx: -2, mods: ['ctrl'] });
      expect(sender.requestsFor('send_scroll')).toEqual([
        { surface_id: 's1', x: 0, y: 3 },
        { surface_id: 's1', x: -2, y: 0, mods: 'ctrl' },
      ]);
    });
  });

  describe('reading', () => {
    it('reads the viewport by default', async () => {
      const { sender, terminal } = setup();
      screenSequence(sender, ['\x1B[1m$\x1B[0m ']);

      expect(await terminal.text()).toBe('\x1B[1m$\x1B[0m ');
      expect((await terminal.screen('screen')).plainText).toBe('$ ');
      expect(sender.requestsFor('get_screen')).toEqual([
        { surface_id: 's1', screen: 'viewport' },
        { surface_id: 's1', screen: 'screen' },
      ]);
    });

    it('reads styled cells', async () => {
      const { sender, terminal } = setup();
      sender.on('get_screen', () => ({
        content: JSON.stringify({ rows: [{ spans: [{ x: 0, text: 'ok', fg: 2 }] }], cursor: { x: 2, y: 0 } }),
      }));

      const cells = await terminal.cells();

      expect(cells.textAtRow(0)).toBe('ok');
      expect(sender.requestsFor('get_screen')).toEqual([{ surface_id: 's1', screen: 'viewport', format: 'cells' }]);
    });
  });

  describe('waiting', () => {
    it('waits on the host clock and stays chainable', async () => {
      const { sender, clock, terminal } = setup();
      screenSequence(sender, ['', 'Done']);

      const result = await terminal.waitForText('Done');

      expect(result).toBe(terminal);
      expect(clock.sleeps).toEqual([100]);
    });

    it('waits for idle output', async () => {
      const { sender, terminal } = setup();
      screenSequence(sender, ['steady']);
      await expect(terminal.waitForIdle(100)).resolves.toBe(terminal);
    });
  });

  describe('surface actions', () => {
    it('focuses, resizes and closes', async () => {
      const { sender, terminal } = setup();
      await terminal.focus();
      await terminal.resize({ rows: 30 });
      await terminal.close();
      expect(sender.requests).toEqual([
        { action: 'focus_surface', payload: { surface_id: 's1' } },
        { action: 'resize_surface', payload: { surface_id: 's1', rows: 30 } },
        { action: 'close_surface', payload: { surface_id: 's1' } },
      ]);
    });

    it('saves screenshots to an absolute path', async () => {
      const { sender, terminal } = setup();
      const saved = await terminal.screenshot('shots/term.png');
      expect(saved).toBe(resolve('shots/term.png'));
      expect(sender.requestsFor('screenshot_surface')).toEqual([{ surface_id: 's1', output_path: saved }]);
    });
  });

  describe('refresh', () => {
    it('replaces the snapshot with the current surface', async () => {
      const clock = new FakeClock();
      const sender = new FakeSender().on('list_surfaces', () =>
        surfacesData(surface('s0'), surface('s1', { title: 'htop', focused: true, rows: 40 })),
      );
      const terminal = new Terminal(createTestClient(sender, clock), surface('s1', { title: 'zsh' }));

      await terminal.refresh();

      expect(terminal.title).toBe('htop');
      expect(terminal.focused).toBe(true);
      expect(terminal.rows).toBe(40);
      expect(terminal.id).toBe('s1');
    });

    it('reports a surface that no longer exists', async () => {
      const sender = new FakeSender().on('list_surfaces', () => surfacesData(surface('other')));
      const terminal = new Terminal(createTestClient(sender), surface('s1'));

      const error = await terminal.refresh().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Terminal s1 no longer exists', code: 'NOT_FOUND' });
    });
  });

  it('describes itself', () => {
    const { terminal } = setup();
    expect(String(terminal)).toBe('Terminal(id="s1", title="zsh", pwd="/work")');
  });
});
