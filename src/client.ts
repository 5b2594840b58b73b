/**
 * Ghostty client: entry point for terminal automation
 *
 * Example:
 *   const ghostty = GhosttyClient.connect();
 *   const terminal = await ghostty.terminals.first();
 *   await terminal.send('echo hello');
 *   await terminal.waitForText('hello');
 */

import { defaultConfigManager, type ConfigManager, type ConfigOverrides } from './config/index.js';
import { TimeoutError } from './errors.js';
import { SocketTransport, type RequestSender } from './ipc/transport.js';
import type { ActionName, ActionPayloads, SuccessResponse } from './protocol/envelope.js';
import { extractSurfaces } from './protocol/surfaces.js';
import { systemClock, type Clock } from './sync/clock.js';
import { pollUntil } from './sync/poller.js';
import { TerminalRegistry } from './terminal/registry.js';
import { Terminal, type TerminalHost } from './terminal/terminal.js';
import type { DriverConfig, Surface } from './types/index.js';

export const NEW_SURFACE_TIMEOUT_MS = 5_000;

export interface GhosttyClientOptions extends ConfigOverrides {
  configManager?: ConfigManager;
  /** Replaces the socket transport, e.g. with an in-process fake. */
  sender?: RequestSender;
  clock?: Clock;
}

export class GhosttyClient implements TerminalHost {
  readonly terminals: TerminalRegistry;
  readonly clock: Clock;
  readonly config: DriverConfig;
  private sender: RequestSender;

  constructor(options: GhosttyClientOptions = {}) {
    const manager = options.configManager ?? defaultConfigManager;
    this.config = manager.resolve(options);
    this.sender = options.sender ?? new SocketTransport(this.config, {
      storage: manager.getStorage(),
      env: manager.getEnvironment(),
    });
    this.clock = options.clock ?? systemClock;
    this.terminals = new TerminalRegistry(this);
  }

  static connect(options: GhosttyClientOptions = {}): GhosttyClient {
    return new GhosttyClient(options);
  }

  sendRequest<A extends ActionName>(action: A, payload?: ActionPayloads[A]): Promise<SuccessResponse> {
    return this.sender.sendRequest(action, payload);
  }

  async listSurfaces(): Promise<Surface[]> {
    const response = await this.sendRequest('list_surfaces');
    return extractSurfaces(response.data);
  }

  /** Open a new window and return its terminal once it appears. */
  async newWindow(command?: string[]): Promise<Terminal> {
    return this.openSurface('new_window', command);
  }

  /** Open a new tab and return its terminal once it appears. */
  async newTab(command?: string[]): Promise<Terminal> {
    return this.openSurface('new_tab', command);
  }

  private async openSurface(action: 'new_window' | 'new_tab', command: string[] | undefined): Promise<Terminal> {
    const before = new Set((await this.listSurfaces()).map((surface) => surface.id));

    await this.sendRequest(action, command && command.length > 0 ? { arguments: command } : undefined);

    const label = action === 'new_window' ? 'window' : 'tab';
    const created = await pollUntil<Surface | undefined>({
      fetch: async () => (await this.listSurfaces()).find((surface) => !before.has(surface.id)),
      check: (surface) => surface !== undefined,
      timeoutMs: NEW_SURFACE_TIMEOUT_MS,
      clock: this.clock,
      onTimeout: () => new TimeoutError(`New ${label} did not appear`, NEW_SURFACE_TIMEOUT_MS),
    });
    if (!created) {
      throw new TimeoutError(`New ${label} did not appear`, NEW_SURFACE_TIMEOUT_MS);
    }
    return new Terminal(this, created);
  }
}
