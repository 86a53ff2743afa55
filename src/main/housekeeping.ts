import { HOUSEKEEPING } from '../constants';

import { ConfigError, type ConfigManager } from './config/config-manager';
import type { Logger } from './logging/logger';
import type { StateCoordinator } from './state/state-coordinator';

export interface HousekeepingDeps {
  config: ConfigManager;
  logger: Logger;
  coordinator: StateCoordinator;
  now?: () => Date;
  trimIntervalMs?: number;
}

/**
 * Per-request upkeep ahead of every dashboard read: pick up config.json edits, bring the
 * state cache up to date and trim the logfile once an hour.
 */
export class Housekeeping {
  private lastTrim: Date | null = null;
  private readonly now: () => Date;
  private readonly trimIntervalMs: number;

  constructor(private readonly deps: HousekeepingDeps) {
    this.now = deps.now ?? (() => new Date());
    this.trimIntervalMs = deps.trimIntervalMs ?? HOUSEKEEPING.LOG_TRIM_INTERVAL_MS;
  }

  async run(): Promise<void> {
    this.checkConfig();
    await this.deps.coordinator.ensureFresh();
    this.trimLogfileIfDue();
  }

  private checkConfig(): void {
    const { config, logger } = this.deps;
    try {
      if (config.checkForConfigChanges()) {
        logger.applySettings(config.getLoggerSettings());
        logger.log(`Reloaded configuration from ${config.getConfigPath()}`, 'detailed');
      }
    } catch (error) {
      // Previous settings stay in effect
      if (error instanceof ConfigError) {
        logger.log(error.message, 'error');
        return;
      }
      throw error;
    }
  }

  private trimLogfileIfDue(): void {
    const now = this.now();
    if (this.lastTrim && now.getTime() - this.lastTrim.getTime() < this.trimIntervalMs) return;
    this.lastTrim = now;
    this.deps.logger.trimLogfile();
  }

  getLastTrimTime(): Date | null {
    return this.lastTrim;
  }
}
