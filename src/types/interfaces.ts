/**
 * Dependency injection interfaces
 * Enables testability by abstracting external dependencies
 */

/**
 * Subset of a file's stat record needed for socket checks
 */
export interface FileStatus {
  isSocket: boolean;
  uid: number;
  mode: number;
}

/**
 * Abstracts filesystem operations
 */
export interface IStorage {
  readFile(path: string, encoding: BufferEncoding): string;
  writeFile(path: string, data: string): void;
  exists(path: string): boolean;
  mkdirp(path: string): void;
  chmod(path: string, mode: number): void;
  /** Returns `null` when the path cannot be stat'ed. Symlinks are not followed. */
  lstat(path: string): FileStatus | null;
}

/**
 * Abstracts environment variables and OS info
 */
export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
  uid(): number;
}
