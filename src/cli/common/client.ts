import { GhosttyClient } from '../../client.js';
import { NotFoundError } from '../../errors.js';
import type { Terminal } from '../../terminal/terminal.js';
import type { ConnectionCliOptions } from './options.js';

export function createCliClient(options: ConnectionCliOptions): GhosttyClient {
  return GhosttyClient.connect({
    socketPath: options.socket,
    appClass: options.appClass,
    requestTimeoutMs: options.timeout,
    validateSocket: options.validateSocket,
  });
}

export async function requireTerminal(client: GhosttyClient, id: string): Promise<Terminal> {
  const terminal = await client.terminals.byId(id);
  if (!terminal) {
    throw new NotFoundError(`No terminal with id ${id}`);
  }
  return terminal;
}
