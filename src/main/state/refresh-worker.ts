import { setTimeout as delay } from 'node:timers/promises';

import { STATE_CACHE } from '../../constants';
import { silentLogger } from '../logging/logger';
import type { Log } from '../logging/types';

/**
 * Result of one background cycle:
 * - `unchanged`: the store matches the cache
 * - `followed`: adopted a sibling's recent reload without taking the lock
 * - `deferred`: a sibling reloaded recently but its artifacts do not cover the store yet
 * - `busy`: another process holds the reload lock
 * - `reloaded`: this process performed a full reload
 * - `shared`: joined a refresh already running in this process
 */
export type BackgroundOutcome = 'unchanged' | 'followed' | 'deferred' | 'busy' | 'reloaded' | 'shared';

export interface RefreshTarget {
  refreshInBackground(): Promise<BackgroundOutcome>;
}

export interface RefreshWorkerOptions {
  intervalMs?: number;
  stopTimeoutMs?: number;
  logger?: Log;
}

/**
 * Periodically asks its coordinator to pick up store changes.
 * Timers are unref'd so an idle worker never keeps the process alive.
 */
export class RefreshWorker {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly intervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly logger: Log;
  private cycles = 0;

  constructor(private readonly target: RefreshTarget, options: RefreshWorkerOptions = {}) {
    this.intervalMs = options.intervalMs ?? STATE_CACHE.POLL_INTERVAL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? STATE_CACHE.WORKER_STOP_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Idempotent; a running worker is left alone. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  /**
   * Signal the loop to exit and wait up to the stop timeout for it to do so.
   * A reload already in progress runs to completion. Resolves false on timeout.
   */
  async stop(): Promise<boolean> {
    const loop = this.loop;
    const controller = this.controller;
    if (!loop || !controller) return true;
    controller.abort();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.stopTimeoutMs);
      timer.unref();
    });
    const exited = await Promise.race([loop.then((): boolean => true), timedOut]);
    clearTimeout(timer);

    this.loop = null;
    this.controller = null;
    if (!exited) {
      this.logger.log(`State refresh worker did not stop within ${this.stopTimeoutMs}ms`, 'warning');
    }
    return exited;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.log(`State refresh worker started (every ${this.intervalMs}ms)`, 'debug');
    while (!signal.aborted) {
      try {
        await delay(this.intervalMs, undefined, { signal, ref: false });
      } catch (error) {
        if (signal.aborted) break;
        this.logger.log(`State refresh worker timer failed: ${String(error)}`, 'error');
        continue;
      }

      try {
        const outcome = await this.target.refreshInBackground();
        this.cycles += 1;
        if (outcome !== 'unchanged') {
          this.logger.log(`State refresh worker cycle: ${outcome}`, 'debug');
        }
      } catch (error) {
        this.logger.log(`Error in state refresh worker: ${error instanceof Error ? error.message : String(error)}`, 'error');
      }
    }
    this.logger.log('State refresh worker stopped', 'debug');
  }
}
