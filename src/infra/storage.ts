/**
 * Default IStorage implementation using Node.js fs
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync, chmodSync, lstatSync } from 'fs';
import type { FileStatus, IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string, encoding: BufferEncoding): string {
    return readFileSync(path, encoding);
  }

  writeFile(path: string, data: string): void {
    writeFileSync(path, data);
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  mkdirp(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  chmod(path: string, mode: number): void {
    chmodSync(path, mode);
  }

  lstat(path: string): FileStatus | null {
    try {
      const stats = lstatSync(path);
      return {
        isSocket: stats.isSocket(),
        uid: stats.uid,
        mode: stats.mode,
      };
    } catch {
      return null;
    }
  }
}
