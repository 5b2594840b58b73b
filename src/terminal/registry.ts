/**
 * Lookup projections over the host's flattened surface list.
 * Nothing is cached: every call re-fetches `list_surfaces`.
 */

import { NotFoundError } from '../errors.js';
import type { Surface } from '../types/index.js';
import { Terminal, type TerminalHost } from './terminal.js';

export class TerminalRegistry {
  constructor(private host: TerminalHost) {}

  async all(): Promise<Terminal[]> {
    const surfaces = await this.host.listSurfaces();
    return surfaces.map((surface) => this.wrap(surface));
  }

  async first(): Promise<Terminal> {
    const surfaces = await this.host.listSurfaces();
    if (surfaces.length === 0) {
      throw new NotFoundError('No terminals found');
    }
    return this.wrap(surfaces[0]);
  }

  async focused(): Promise<Terminal | null> {
    return this.find((surface) => surface.focused);
  }

  /** First terminal whose title contains `title` (case-sensitive). */
  async byTitle(title: string): Promise<Terminal | null> {
    return this.find((surface) => surface.title.includes(title));
  }

  /** First terminal whose working directory contains `path` (case-sensitive). */
  async byPwd(path: string): Promise<Terminal | null> {
    return this.find((surface) => surface.pwd.includes(path));
  }

  async byId(id: string): Promise<Terminal | null> {
    return this.find((surface) => surface.id === id);
  }

  private async find(predicate: (surface: Surface) => boolean): Promise<Terminal | null> {
    const surfaces = await this.host.listSurfaces();
    const match = surfaces.find(predicate);
    return match ? this.wrap(match) : null;
  }

  private wrap(surface: Surface): Terminal {
    return new Terminal(this.host, surface);
  }
}
