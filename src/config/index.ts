/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import type { DriverConfig } from '../types/index.js';
import type { IStorage, IEnvironment } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { resolveSocketPath } from '../ipc/socket-path.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface StoredConfig {
  socketPath?: string;
  appClass?: string;
  requestTimeoutMs?: number;
  validateSocket?: boolean;
}

/** Explicit options take precedence over stored config and the environment. */
export interface ConfigOverrides {
  socketPath?: string;
  appClass?: string | null;
  requestTimeoutMs?: number;
  validateSocket?: boolean;
  debug?: boolean;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') return false;
  return undefined;
}

function parseTimeout(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return Math.floor(parsed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStoredConfig(value: unknown): StoredConfig {
  if (!isRecord(value)) return {};
  const stored: StoredConfig = {};
  if (typeof value.socketPath === 'string') stored.socketPath = value.socketPath;
  if (typeof value.appClass === 'string') stored.appClass = value.appClass;
  if (typeof value.requestTimeoutMs === 'number') stored.requestTimeoutMs = value.requestTimeoutMs;
  if (typeof value.validateSocket === 'boolean') stored.validateSocket = value.validateSocket;
  return stored;
}

export class ConfigManager {
  private storage: IStorage;
  private env: IEnvironment;
  private configDir: string;
  private configFile: string;
  private envLoaded = false;

  constructor(storage?: IStorage, env?: IEnvironment, configDir?: string) {
    this.storage = storage || new FileStorage();
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || join(this.env.homedir(), '.ghostty-driver');
    this.configFile = join(this.configDir, 'config.json');
  }

  /**
   * Resolve the transport configuration once.
   * Merge: explicit overrides > stored config > environment variables > defaults
   */
  resolve(overrides: ConfigOverrides = {}): DriverConfig {
    // Lazy load environment variables only once
    if (!this.envLoaded) {
      loadEnv({ quiet: true });
      this.envLoaded = true;
    }

    const stored = this.loadStoredConfig();

    const socketOverride = overrides.socketPath || stored.socketPath || this.env.get('GHOSTTY_SOCKET') || undefined;
    const target = overrides.appClass !== undefined
      ? overrides.appClass
      : stored.appClass || this.env.get('GHOSTTY_APP_CLASS') || null;

    const requestTimeoutMs =
      parseTimeout(overrides.requestTimeoutMs) ??
      parseTimeout(stored.requestTimeoutMs) ??
      parseTimeout(this.env.get('GHOSTTY_REQUEST_TIMEOUT_MS')) ??
      DEFAULT_REQUEST_TIMEOUT_MS;

    const validateSocket =
      overrides.validateSocket ??
      stored.validateSocket ??
      parseBooleanEnv(this.env.get('GHOSTTY_VALIDATE_SOCKET')) ??
      true;

    const debug = overrides.debug ?? parseBooleanEnv(this.env.get('GHOSTTY_DRIVER_DEBUG')) ?? false;

    return {
      socketPath: resolveSocketPath(socketOverride, this.env),
      target,
      requestTimeoutMs,
      validateSocket,
      debug,
    };
  }

  loadStoredConfig(): StoredConfig {
    if (!this.storage.exists(this.configFile)) {
      return {};
    }
    try {
      const data = this.storage.readFile(this.configFile, 'utf-8');
      return toStoredConfig(JSON.parse(data));
    } catch {
      return {};
    }
  }

  saveConfig(updates: Partial<StoredConfig>): void {
    if (!this.storage.exists(this.configDir)) {
      this.storage.mkdirp(this.configDir);
    }

    const current = this.loadStoredConfig();
    const newConfig = { ...current, ...updates };
    this.storage.writeFile(this.configFile, JSON.stringify(newConfig, null, 2));
    this.storage.chmod(this.configFile, 0o600);
  }

  getConfigPath(): string {
    return this.configFile;
  }

  getStorage(): IStorage {
    return this.storage;
  }

  getEnvironment(): IEnvironment {
    return this.env;
  }
}

export const defaultConfigManager = new ConfigManager();

export function resolveDriverConfig(overrides?: ConfigOverrides): DriverConfig {
  return defaultConfigManager.resolve(overrides);
}
