/**
 * Ghostty socket discovery and ownership checks
 */

import { dirname, join } from 'path';
import { ConnectionError } from '../errors.js';
import type { IEnvironment, IStorage } from '../types/interfaces.js';

export const SOCKET_NAME = 'ghostty.sock';

const SKIP_HINT = '(pass validateSocket: false to skip checks)';

/**
 * Resolve the socket path from an explicit override or the environment.
 * Pure given `env`: XDG_RUNTIME_DIR (Linux), then TMPDIR (macOS), then /tmp.
 */
export function resolveSocketPath(override: string | undefined, env: IEnvironment): string {
  if (override) {
    if (override === '~' || override.startsWith('~/')) {
      return join(env.homedir(), override.slice(1));
    }
    return override;
  }

  const uid = env.uid();

  const runtimeDir = env.get('XDG_RUNTIME_DIR');
  if (runtimeDir) {
    return join(runtimeDir, 'ghostty', SOCKET_NAME);
  }

  const tmpDir = env.get('TMPDIR');
  if (tmpDir) {
    return join(tmpDir, `ghostty-${uid}`, SOCKET_NAME);
  }

  return `/tmp/ghostty-${uid}/${SOCKET_NAME}`;
}

/**
 * Refuse sockets another local user could have planted or could also reach.
 * Any group/world access to the socket grants control over the terminal.
 */
export function validateSocketPath(socketPath: string, storage: IStorage, uid: number): void {
  const socketStat = storage.lstat(socketPath);
  if (!socketStat) {
    throw new ConnectionError(`Socket not found: ${socketPath}`, 'missing');
  }

  if (!socketStat.isSocket) {
    throw new ConnectionError(`Not a Unix socket: ${socketPath} ${SKIP_HINT}`, 'not-socket');
  }

  if (socketStat.uid !== uid) {
    throw new ConnectionError(`Socket is not owned by current user: ${socketPath} ${SKIP_HINT}`, 'owner');
  }

  if ((socketStat.mode & 0o077) !== 0) {
    throw new ConnectionError(`Socket has insecure permissions: ${socketPath} ${SKIP_HINT}`, 'permissions');
  }

  const dir = dirname(socketPath);
  const dirStat = storage.lstat(dir);
  if (!dirStat) {
    throw new ConnectionError(`Unable to stat socket directory: ${dir}`, 'dir-unreadable');
  }

  if (dirStat.uid !== uid) {
    throw new ConnectionError(`Socket directory is not owned by current user: ${dir} ${SKIP_HINT}`, 'dir-owner');
  }

  if ((dirStat.mode & 0o022) !== 0) {
    throw new ConnectionError(`Socket directory is writable by others: ${dir} ${SKIP_HINT}`, 'dir-permissions');
  }
}
