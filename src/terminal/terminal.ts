/**
 * Terminal handle with a Playwright-style automation API
 */

import { resolve } from 'path';
import { NotFoundError } from '../errors.js';
import type { RequestSender } from '../ipc/transport.js';
import { resolveKeyInput, formatMods, canonicalKey } from '../input/keys.js';
import { DOUBLE_CLICK_PAUSE_MS, DRAG_STEP_PAUSE_MS, interpolateDrag } from '../input/mouse.js';
import { decodeScreen, decodeScreenCells } from '../protocol/surfaces.js';
import type { ActionPayloads } from '../protocol/envelope.js';
import type { Screen } from '../screen/screen.js';
import type { ScreenCells } from '../screen/cells.js';
import type { Clock } from '../sync/clock.js';
import { TerminalExpect } from '../sync/expect.js';
import {
  waitForIdle,
  waitForPrompt,
  waitForText,
  type TextWaitOptions,
  type WaitOptions,
} from '../sync/waits.js';
import type { ButtonAction, Modifiers, MouseButton, Point, ScreenKind, Surface } from '../types/index.js';

/**
 * What a terminal handle needs from its client.
 */
export interface TerminalHost extends RequestSender {
  listSurfaces(): Promise<Surface[]>;
  readonly clock: Clock;
}

export interface PointerOptions {
  button?: MouseButton;
  mods?: Modifiers;
}

export interface DragOptions extends PointerOptions {
  steps?: number;
}

export interface ScrollOptions {
  /** Vertical delta, positive scrolls down. */
  dy?: number;
  /** Horizontal delta, positive scrolls right. */
  dx?: number;
  mods?: Modifiers;
}

export class Terminal {
  private snapshot: Surface;
  private expectHelper?: TerminalExpect;

  constructor(
    private host: TerminalHost,
    surface: Surface,
  ) {
    this.snapshot = surface;
  }

  get surface(): Surface {
    return this.snapshot;
  }

  get id(): string {
    return this.snapshot.id;
  }

  get title(): string {
    return this.snapshot.title;
  }

  get pwd(): string {
    return this.snapshot.pwd;
  }

  get rows(): number {
    return this.snapshot.rows;
  }

  get cols(): number {
    return this.snapshot.cols;
  }

  get focused(): boolean {
    return this.snapshot.focused;
  }

  get expect(): TerminalExpect {
    if (!this.expectHelper) {
      this.expectHelper = new TerminalExpect(this, this.host.clock);
    }
    return this.expectHelper;
  }

  // Input

  /** Send text followed by Enter. */
  async send(text: string): Promise<this> {
    await this.sendText(`${text}\r`);
    return this;
  }

  /** Type text without Enter, one request per character when `delayMs` > 0. */
  async type(text: string, delayMs = 0): Promise<this> {
    if (delayMs <= 0) {
      await this.sendText(text);
      return this;
    }
    for (const char of text) {
      await this.sendText(char);
      await this.host.clock.sleep(delayMs);
    }
    return this;
  }

  /**
   * Press and release a key. The host models physical transitions, so every
   * press is followed by a release of the same key and modifiers.
   */
  async press(key: string, mods?: Modifiers): Promise<this> {
    const input = resolveKeyInput(key, mods);
    if (input.kind === 'text') {
      await this.sendText(input.text);
      return this;
    }
    await this.sendKey(input.key, 'press', input.mods);
    await this.sendKey(input.key, 'release', input.mods);
    return this;
  }

  async keyDown(key: string, mods?: Modifiers): Promise<this> {
    await this.sendKey(canonicalKey(key), 'press', formatMods(mods));
    return this;
  }

  async keyUp(key: string, mods?: Modifiers): Promise<this> {
    await this.sendKey(canonicalKey(key), 'release', formatMods(mods));
    return this;
  }

  // Mouse

  async click(x: number, y: number, options: PointerOptions = {}): Promise<this> {
    const button = options.button ?? 'left';
    await this.sendMouse({ x, y }, button, 'press', options.mods);
    await this.sendMouse({ x, y }, button, 'release', options.mods);
    return this;
  }

  async doubleClick(x: number, y: number, options: PointerOptions = {}): Promise<this> {
    await this.click(x, y, options);
    await this.host.clock.sleep(DOUBLE_CLICK_PAUSE_MS);
    await this.click(x, y, options);
    return this;
  }

  /**
   * Press at `from`, move through `steps` interpolated points, release at `to`.
   */
  async drag(from: Point, to: Point, options: DragOptions = {}): Promise<this> {
    const button = options.button ?? 'left';

    await this.sendMouse(from, button, 'press', options.mods);
    await this.host.clock.sleep(DRAG_STEP_PAUSE_MS);

    for (const point of interpolateDrag(from, to, options.steps ?? 10)) {
      await this.sendMouse(point, undefined, undefined, options.mods);
      await this.host.clock.sleep(DRAG_STEP_PAUSE_MS);
    }

    await this.sendMouse(to, button, 'release', options.mods);
    return this;
  }

  async scroll(options: ScrollOptions = {}): Promise<this> {
    const payload: ActionPayloads['send_scroll'] = {
      surface_id: this.id,
      x: options.dx ?? 0,
      y: options.dy ?? 0,
    };
    const mods = formatMods(options.mods);
    if (mods) payload.mods = mods;
    await this.host.sendRequest('send_scroll', payload);
    return this;
  }

  // Reading

  async screen(kind: ScreenKind = 'viewport'): Promise<Screen> {
    const response = await this.host.sendRequest('get_screen', { surface_id: this.id, screen: kind });
    return decodeScreen(response.data);
  }

  async text(): Promise<string> {
    return (await this.screen()).text;
  }

  async cells(kind: ScreenKind = 'viewport'): Promise<ScreenCells> {
    const response = await this.host.sendRequest('get_screen', {
      surface_id: this.id,
      screen: kind,
      format: 'cells',
    });
    return decodeScreenCells(response.data);
  }

  // Waiting

  async waitForText(pattern: string | RegExp, options: TextWaitOptions = {}): Promise<this> {
    await waitForText(this, pattern, this.withClock(options));
    return this;
  }

  async waitForPrompt(pattern?: string | RegExp, options: WaitOptions = {}): Promise<this> {
    await waitForPrompt(this, pattern, this.withClock(options));
    return this;
  }

  async waitForIdle(stableMs = 500, options: WaitOptions = {}): Promise<this> {
    await waitForIdle(this, stableMs, this.withClock(options));
    return this;
  }

  // Actions

  async focus(): Promise<this> {
    await this.host.sendRequest('focus_surface', { surface_id: this.id });
    return this;
  }

  async close(): Promise<void> {
    await this.host.sendRequest('close_surface', { surface_id: this.id });
  }

  async resize(size: { rows?: number; cols?: number }): Promise<this> {
    const payload: ActionPayloads['resize_surface'] = { surface_id: this.id };
    if (size.rows !== undefined) payload.rows = size.rows;
    if (size.cols !== undefined) payload.cols = size.cols;
    await this.host.sendRequest('resize_surface', payload);
    return this;
  }

  /** Save a PNG of this surface; returns the absolute output path. */
  async screenshot(path: string): Promise<string> {
    const outputPath = resolve(path);
    await this.host.sendRequest('screenshot_surface', { surface_id: this.id, output_path: outputPath });
    return outputPath;
  }

  /**
   * Replace the snapshot with the host's current view of this surface.
   * A surface that no longer exists is reported as NotFoundError.
   */
  async refresh(): Promise<this> {
    const surfaces = await this.host.listSurfaces();
    const current = surfaces.find((surface) => surface.id === this.id);
    if (!current) {
      throw new NotFoundError(`Terminal ${this.id} no longer exists`);
    }
    this.snapshot = current;
    return this;
  }

  toString(): string {
    return `Terminal(id=${JSON.stringify(this.id)}, title=${JSON.stringify(this.title)}, pwd=${JSON.stringify(this.pwd)})`;
  }

  private withClock<T extends WaitOptions>(options: T): T {
    return options.clock ? options : { ...options, clock: this.host.clock };
  }

  private async sendText(text: string): Promise<void> {
    await this.host.sendRequest('send_text', { surface_id: this.id, text });
  }

  private async sendKey(key: string, action: ButtonAction, mods: string | undefined): Promise<void> {
    const payload: ActionPayloads['send_key'] = { surface_id: this.id, key, action };
    if (mods) payload.mods = mods;
    await this.host.sendRequest('send_key', payload);
  }

  private async sendMouse(
    point: Point,
    button: MouseButton | undefined,
    buttonAction: ButtonAction | undefined,
    mods: Modifiers | undefined,
  ): Promise<void> {
    const payload: ActionPayloads['send_mouse'] = { surface_id: this.id, x: point.x, y: point.y };
    if (button !== undefined) payload.button = button;
    if (buttonAction !== undefined) payload.button_action = buttonAction;
    const formatted = formatMods(mods);
    if (formatted) payload.mods = formatted;
    await this.host.sendRequest('send_mouse', payload);
  }
}
