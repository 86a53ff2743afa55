import path from 'node:path';

import * as fs from 'fs-extra';

import { isPlainObject } from '../utils/json';
import { errorCode } from '../utils/retry';
import type { LoggerSettings } from '../logging/types';

import { AppConfigSchema, type AppConfig, type ConfigSection } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'config.json';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ConfigManagerOptions {
  /** Defaults to DW_CONFIG, then config.json in the working directory */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function coerceBoolean(v: unknown, fallback: unknown): unknown {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return v.trim().toLowerCase() === 'true';
}

function coerceNumber(v: unknown, fallback: unknown): unknown {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function coerceString(v: unknown, fallback: unknown): unknown {
  return typeof v === 'string' && v.trim() !== '' ? v.trim() : fallback;
}

/**
 * Loads `config.json`, applies environment overrides (env beats file) and validates the
 * result. A missing file means defaults. Relative paths resolve against the file's directory.
 */
export class ConfigManager {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private config: AppConfig;
  private lastMtimeMs: number | null = null;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = path.resolve(options.configPath ?? this.env.DW_CONFIG ?? DEFAULT_CONFIG_FILE);
    this.lastMtimeMs = this.readMtime();
    this.config = this.load();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getAll(): Readonly<AppConfig> {
    return this.config;
  }

  /** Value of `section.key`; `defaultValue` stands in for a null setting. */
  get<S extends ConfigSection, K extends keyof AppConfig[S]>(section: S, key: K, defaultValue?: AppConfig[S][K]): AppConfig[S][K] {
    const value = this.config[section][key];
    if (value === null || value === undefined) return defaultValue ?? value;
    return value;
  }

  /** Resolve a path setting against the directory holding the config file. */
  resolvePath(value: string): string {
    return path.resolve(path.dirname(this.configPath), value);
  }

  getStoreDirectory(): string {
    return this.resolvePath(this.config.StateCache.StoreDirectory);
  }

  getArtifactDirectory(): string {
    return this.resolvePath(this.config.StateCache.ArtifactDirectory);
  }

  getLoggerSettings(): LoggerSettings {
    const files = this.config.Files;
    return {
      logfileName: files.LogfileName ? this.resolvePath(files.LogfileName) : null,
      logfileMaxLines: files.LogfileMaxLines,
      logProcessId: files.LogProcessID,
      logfileVerbosity: files.LogfileVerbosity,
      consoleVerbosity: this.config.Website.DebugMode ? 'debug' : files.ConsoleVerbosity,
    };
  }

  /**
   * Reload when the file's modification time moved. Returns true when new settings were
   * applied. An invalid file throws ConfigError once per change and keeps the previous settings.
   */
  checkForConfigChanges(): boolean {
    const mtime = this.readMtime();
    if (mtime === this.lastMtimeMs) return false;
    this.lastMtimeMs = mtime;
    this.config = this.load();
    return true;
  }

  private readMtime(): number | null {
    try {
      return fs.statSync(this.configPath).mtimeMs;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw new ConfigError(`Unable to stat ${this.configPath}: ${String(error)}`);
    }
  }

  private load(): AppConfig {
    const raw = this.readFile();
    this.applyEnvOverrides(raw);
    const parsed = AppConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration in ${this.configPath}: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
  }

  private readFile(): Record<string, unknown> {
    let text: string;
    try {
      text = fs.readFileSync(this.configPath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return {};
      throw new ConfigError(`Unable to read ${this.configPath}: ${String(error)}`);
    }
    if (text.trim() === '') return {};

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Config file ${this.configPath} is not valid JSON: ${String(error)}`);
    }
    if (!isPlainObject(value)) {
      throw new ConfigError(`Config file ${this.configPath} must contain a JSON object`);
    }
    return { ...value };
  }

  private applyEnvOverrides(raw: Record<string, unknown>): void {
    const section = (name: ConfigSection): Record<string, unknown> => {
      const current = raw[name];
      // A malformed section is left for the schema to reject
      if (current !== undefined && !isPlainObject(current)) return {};
      const copy = isPlainObject(current) ? { ...current } : {};
      raw[name] = copy;
      return copy;
    };
    const website = section('Website');
    const stateCache = section('StateCache');
    const env = this.env;

    website.HostingIP = coerceString(env.DW_HOST, website.HostingIP);
    website.Port = coerceNumber(env.DW_PORT, website.Port);
    website.AccessKey = coerceString(env.DW_ACCESS_KEY, website.AccessKey);
    website.Workers = coerceNumber(env.DW_WORKERS, website.Workers);
    website.DebugMode = coerceBoolean(env.DW_DEBUG, website.DebugMode);
    stateCache.StoreDirectory = coerceString(env.DW_STORE_DIR, stateCache.StoreDirectory);
    stateCache.ArtifactDirectory = coerceString(env.DW_ARTIFACT_DIR, stateCache.ArtifactDirectory);
  }
}
