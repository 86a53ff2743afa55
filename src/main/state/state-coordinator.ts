import * as path from 'node:path';

import * as fs from 'fs-extra';

import { STATE_CACHE } from '../../constants';
import type { ArtifactGenerator } from '../artifacts/artifact-generator';
import { silentLogger } from '../logging/logger';
import type { Log } from '../logging/types';
import { errorCode, sleep } from '../utils/retry';

import { CacheMetadataStore, isRecentSiblingReload, type ArtifactRecord } from './cache-metadata';
import { scanStore, type StoreScan } from './change-fingerprint';
import {
  decodeDeviceState,
  EMPTY_COLLECTION,
  traverseDocument,
  withArtifacts,
  type DevicePath,
  type DeviceState,
  type StateCollection,
} from './device-state';
import { StateStoreError } from './errors';
import { ReloadLock } from './reload-lock';
import { RefreshWorker, type BackgroundOutcome, type RefreshTarget } from './refresh-worker';
import { readJsonFile, writeJsonAtomic } from './safe-json-io';

export interface StateCoordinatorOptions {
  storeDir: string;
  generators?: readonly ArtifactGenerator[];
  logger?: Log;
  /** Identity written to the lock and metadata; defaults to process.pid */
  pid?: number;
  pollIntervalMs?: number;
  graceWindowMs?: number;
  lockStaleMs?: number;
  coldWaitMs?: number;
  coldWaitSampleMs?: number;
  lockBusyWaitMs?: number;
  workerStopTimeoutMs?: number;
  now?: () => Date;
}

export interface CoordinatorStats {
  cacheHits: number;
  fullReloads: number;
  passiveLoads: number;
  deferredReloads: number;
  filesParsed: number;
  artifactRuns: number;
}

export type ReloadPhase = 'idle' | 'attempting-lock' | 'reloading' | 'publishing' | 'waiting-briefly';

export interface DeviceSelection {
  index: number;
  /** Null when there is nothing to advance to */
  nextIndex: number | null;
}

export interface DeviceSelectionRequest {
  index?: number | null;
  name?: string | null;
}

interface InFlight {
  kind: 'foreground' | 'background';
  result: Promise<unknown>;
  /** Settles with the refresh but never rejects */
  done: Promise<void>;
}

export function isValidDeviceName(name: string): boolean {
  return name.length > 0 && !name.startsWith('.') && !/[\\/\0]/.test(name);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Per-process cache of every device state in the store, coordinated with sibling processes
 * through a lock file and a metadata file so that one process at a time reloads and
 * regenerates artifacts. Published collections are frozen and swapped in whole.
 */
export class StateCoordinator implements RefreshTarget {
  private snapshot: StateCollection | null = null;
  private loadedAt: Date | null = null;
  private fingerprint: string | null = null;
  private inFlight: InFlight | null = null;
  private phase: ReloadPhase = 'idle';
  private worker: RefreshWorker | null = null;
  private readonly stats: CoordinatorStats = {
    cacheHits: 0,
    fullReloads: 0,
    passiveLoads: 0,
    deferredReloads: 0,
    filesParsed: 0,
    artifactRuns: 0,
  };

  private readonly storeDir: string;
  private readonly generators: readonly ArtifactGenerator[];
  private readonly logger: Log;
  private readonly pid: number;
  private readonly now: () => Date;
  private readonly lock: ReloadLock;
  private readonly metadata: CacheMetadataStore;
  private readonly pollIntervalMs: number;
  private readonly graceWindowMs: number;
  private readonly coldWaitMs: number;
  private readonly coldWaitSampleMs: number;
  private readonly lockBusyWaitMs: number;
  private readonly workerStopTimeoutMs: number;

  constructor(options: StateCoordinatorOptions) {
    this.storeDir = options.storeDir;
    this.generators = options.generators ?? [];
    this.logger = options.logger ?? silentLogger;
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? (() => new Date());
    this.pollIntervalMs = options.pollIntervalMs ?? STATE_CACHE.POLL_INTERVAL_MS;
    this.graceWindowMs = options.graceWindowMs ?? STATE_CACHE.GRACE_WINDOW_MS;
    this.coldWaitMs = options.coldWaitMs ?? STATE_CACHE.COLD_WAIT_MS;
    this.coldWaitSampleMs = options.coldWaitSampleMs ?? STATE_CACHE.COLD_WAIT_SAMPLE_MS;
    this.lockBusyWaitMs = options.lockBusyWaitMs ?? STATE_CACHE.LOCK_BUSY_WAIT_MS;
    this.workerStopTimeoutMs = options.workerStopTimeoutMs ?? STATE_CACHE.WORKER_STOP_TIMEOUT_MS;
    this.lock = new ReloadLock(path.join(this.storeDir, STATE_CACHE.LOCK_FILE), {
      staleMs: options.lockStaleMs,
      pid: this.pid,
      now: this.now,
      logger: this.logger,
    });
    this.metadata = new CacheMetadataStore(path.join(this.storeDir, STATE_CACHE.METADATA_FILE), this.logger);
  }

  // ==================== Refresh ====================

  /**
   * Bring the cache up to date with the store and return it. An unchanged store returns the
   * cached collection itself without parsing anything. Concurrent callers share one refresh.
   */
  async ensureFresh(): Promise<StateCollection> {
    for (let current = this.inFlight; current; current = this.inFlight) {
      if (current.kind === 'foreground') {
        await current.result;
        return this.getStateCollection();
      }
      // Background failures are reported by the worker
      await current.done;
    }
    await this.runExclusive('foreground', () => this.refreshForeground());
    return this.getStateCollection();
  }

  /** One background cycle; used by the refresh worker. */
  async refreshInBackground(): Promise<BackgroundOutcome> {
    const current = this.inFlight;
    if (current) {
      await current.done;
      return 'shared';
    }
    return this.runExclusive('background', () => this.backgroundCycle());
  }

  private runExclusive<T>(kind: InFlight['kind'], fn: () => Promise<T>): Promise<T> {
    const entry: InFlight = { kind, result: Promise.resolve(), done: Promise.resolve() };
    const result = fn().finally(() => {
      if (this.inFlight === entry) this.inFlight = null;
    });
    entry.result = result;
    entry.done = result.then(
      () => undefined,
      () => undefined
    );
    this.inFlight = entry;
    return result;
  }

  private async refreshForeground(): Promise<void> {
    let scan: StoreScan;
    try {
      scan = await scanStore(this.storeDir);
    } catch (error) {
      if (this.snapshot) {
        this.logger.log(`Unable to scan ${this.storeDir}, serving cached state: ${describeError(error)}`, 'warning');
        return;
      }
      throw new StateStoreError('STORE_UNAVAILABLE', `Unable to read state store ${this.storeDir}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (this.snapshot && scan.fingerprint === this.fingerprint) {
      this.stats.cacheHits += 1;
      this.logger.log(`Using in-process cached state data (${this.snapshot.length} items)`, 'debug');
      return;
    }

    const metadata = await this.metadata.read();
    if (isRecentSiblingReload(metadata, this.pid, this.graceWindowMs, this.now())) {
      this.stats.deferredReloads += 1;
      if (this.snapshot) {
        this.logger.log(`PID ${this.pid} deferring reload to process ${metadata?.last_load_pid}`, 'debug');
        return;
      }
      await this.waitForSiblingReload();
      await this.passiveLoad();
      return;
    }

    await this.reloadUnderLock('foreground');
  }

  private async backgroundCycle(): Promise<BackgroundOutcome> {
    const scan = await scanStore(this.storeDir);
    if (this.snapshot && scan.fingerprint === this.fingerprint) return 'unchanged';

    const metadata = await this.metadata.read();
    if (isRecentSiblingReload(metadata, this.pid, this.graceWindowMs, this.now())) {
      this.stats.deferredReloads += 1;
      this.logger.log(`Worker (PID ${this.pid}) following reload by process ${metadata?.last_load_pid}`, 'debug');
      return (await this.passiveLoad()) ? 'followed' : 'deferred';
    }

    const outcome = await this.reloadUnderLock('background');
    return outcome === 'passive' ? 'busy' : outcome;
  }

  private async reloadUnderLock(mode: 'foreground' | 'background'): Promise<'reloaded' | 'followed' | 'busy' | 'passive'> {
    this.phase = 'attempting-lock';
    try {
      const attempt = await this.lock.tryAcquire();
      if (attempt.acquired) {
        try {
          this.logger.log(`PID ${this.pid} acquired reload lock`, 'debug');
          // A sibling may have finished a reload between our checks and the lock
          const metadata = await this.metadata.read();
          if (isRecentSiblingReload(metadata, this.pid, this.graceWindowMs, this.now()) && (await this.passiveLoad())) {
            return 'followed';
          }
          await this.fullReload();
        } finally {
          await attempt.release();
        }
        return 'reloaded';
      }

      this.stats.deferredReloads += 1;
      if (attempt.reason === 'error') {
        this.logger.log(`Reload lock unavailable, skipping reload this cycle: ${describeError(attempt.error)}`, 'warning');
      } else {
        this.logger.log(`PID ${this.pid} waiting for reload by process ${attempt.holder?.pid ?? 'unknown'}`, 'debug');
      }
      if (mode === 'background') return 'busy';

      if (attempt.reason === 'busy') {
        this.phase = 'waiting-briefly';
        await sleep(this.lockBusyWaitMs);
      }
      if (this.snapshot) return 'busy';
      await this.passiveLoad();
      return 'passive';
    } finally {
      this.phase = 'idle';
    }
  }

  /** Read every file, regenerate outdated artifacts, publish and record the reload. Lock must be held. */
  private async fullReload(): Promise<void> {
    this.phase = 'reloading';
    const scan = await scanStore(this.storeDir);
    const previous = (await this.metadata.read())?.artifacts ?? {};
    const loaded = await this.readDevices(scan.files);

    const records: Record<string, ArtifactRecord> = {};
    const devices: DeviceState[] = [];
    for (const device of loaded) {
      const applicable = this.generators.filter((g) => g.appliesTo(device));
      if (applicable.length === 0) {
        devices.push(device);
        continue;
      }
      const files: string[] = [];
      for (const generator of applicable) {
        const key = artifactKey(generator, device);
        const record = await this.artifactsFor(generator, device, previous[key]);
        if (record) {
          records[key] = record;
          files.push(...record.files);
        }
      }
      devices.push(withArtifacts(device, files));
    }

    this.phase = 'publishing';
    const loadedAt = this.now();
    this.publish(devices, loadedAt, scan.fingerprint);
    this.stats.fullReloads += 1;
    this.logger.log(`Loaded ${devices.length} state items from ${this.storeDir}`, 'detailed');

    try {
      await this.metadata.write(this.pid, loadedAt, records);
    } catch (error) {
      this.logger.log(`Error updating cache metadata: ${describeError(error)}`, 'warning');
    }
  }

  /** Reuse a sibling's artifacts for identical content; generate otherwise. Null when generation failed. */
  private async artifactsFor(
    generator: ArtifactGenerator,
    device: DeviceState,
    previous: ArtifactRecord | undefined
  ): Promise<ArtifactRecord | null> {
    if (previous && previous.signature === device.signature && (await generator.outputsExist(previous.files))) {
      return previous;
    }
    try {
      const files = await generator.generate(device);
      this.stats.artifactRuns += 1;
      return { signature: device.signature, files };
    } catch (error) {
      this.logger.log(`Artifact generator ${generator.name} failed for ${device.fileName}: ${describeError(error)}`, 'error');
      return null;
    }
  }

  /**
   * Load the store without generating artifacts, taking artifact lists from the metadata.
   * The fingerprint is only recorded when the metadata covers every device's current content,
   * otherwise the cache stays dirty and a later cycle reloads under the lock.
   */
  private async passiveLoad(): Promise<boolean> {
    const scan = await scanStore(this.storeDir);
    const records = (await this.metadata.read())?.artifacts ?? {};
    const loaded = await this.readDevices(scan.files);

    let complete = true;
    const devices = loaded.map((device) => {
      const applicable = this.generators.filter((g) => g.appliesTo(device));
      if (applicable.length === 0) return device;
      const files: string[] = [];
      for (const generator of applicable) {
        const record = records[artifactKey(generator, device)];
        if (!record || record.signature !== device.signature) complete = false;
        if (record) files.push(...record.files);
      }
      return withArtifacts(device, files);
    });

    this.publish(devices, this.now(), complete ? scan.fingerprint : null);
    this.stats.passiveLoads += 1;
    this.logger.log(`Passively loaded ${devices.length} state items (${complete ? 'current' : 'pending reload'})`, 'debug');
    return complete;
  }

  private async waitForSiblingReload(): Promise<void> {
    const deadline = Date.now() + this.coldWaitMs;
    while (Date.now() < deadline) {
      if (!(await fs.pathExists(this.lock.getPath()))) return;
      await sleep(this.coldWaitSampleMs);
    }
    this.logger.log(`PID ${this.pid} gave up waiting for a sibling reload`, 'debug');
  }

  private async readDevices(files: readonly string[]): Promise<DeviceState[]> {
    const now = this.now();
    const devices: DeviceState[] = [];
    for (const fileName of files) {
      const filePath = path.join(this.storeDir, fileName);
      try {
        const read = await readJsonFile(filePath, { logger: this.logger });
        if (!read) {
          this.logger.log(`Skipped empty or unreadable file: ${filePath}`, 'warning');
          continue;
        }
        this.stats.filesParsed += 1;
        const decoded = decodeDeviceState({ fileName, text: read.text, value: read.value, now });
        if (!decoded.ok) {
          this.logger.log(`Skipped invalid state file ${decoded.message}`, 'warning');
          continue;
        }
        devices.push(decoded.device);
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          this.logger.log(`State file ${filePath} disappeared during reload`, 'debug');
          continue;
        }
        this.logger.log(`Error loading JSON from ${filePath}: ${describeError(error)}`, 'error');
      }
    }
    return devices;
  }

  private publish(devices: DeviceState[], loadedAt: Date, fingerprint: string | null): void {
    this.snapshot = Object.freeze(devices);
    this.loadedAt = loadedAt;
    this.fingerprint = fingerprint;
  }

  // ==================== Accessors ====================

  getStateCollection(): StateCollection {
    return this.snapshot ?? EMPTY_COLLECTION;
  }

  /**
   * Read a value from a device document. Returns `fallback` when the path does not exist,
   * or when the value is null and a fallback was given.
   */
  getDevice(index: number, devicePath: DevicePath = [], fallback?: unknown): unknown {
    const device = this.getStateCollection()[index];
    if (!device) return fallback;
    return traverseDocument(device.document, devicePath, fallback);
  }

  /**
   * Resolve a requested device the way the dashboard pages do. A name is matched against
   * the URL name; unknown names and indexes past the end fall back to the first device and
   * negative indexes select the last.
   */
  selectDevice(request: DeviceSelectionRequest = {}): DeviceSelection | null {
    const devices = this.getStateCollection();
    if (devices.length === 0) return null;
    const max = devices.length - 1;

    let requested = request.index ?? null;
    if (requested === null && request.name != null) {
      const found = devices.findIndex((d) => d.urlName === request.name);
      if (found < 0) {
        this.logger.log(`State name '${request.name}' not found, defaulting to first state.`, 'error');
      }
      requested = Math.max(found, 0);
    }

    let index: number;
    if (requested === null || !Number.isInteger(requested)) index = 0;
    else if (requested < 0) index = max;
    else if (requested > max) index = 0;
    else index = requested;

    const nextIndex = max < 1 ? null : index < max ? index + 1 : 0;
    return { index, nextIndex };
  }

  /** Persist a device document as `<DeviceName>.json`. Returns the file name written. */
  async saveDeviceState(document: Record<string, unknown>): Promise<string> {
    const name = document['DeviceName'];
    if (typeof name !== 'string' || !isValidDeviceName(name)) {
      throw new StateStoreError('INVALID_DEVICE_NAME', `Invalid device name: ${JSON.stringify(name ?? null)}`);
    }
    const fileName = `${name}.json`;
    try {
      await fs.ensureDir(this.storeDir);
      await writeJsonAtomic(path.join(this.storeDir, fileName), document, { logger: this.logger });
    } catch (error) {
      throw new StateStoreError('WRITE_FAILED', `Error writing to ${this.storeDir}: ${describeError(error)}`, { cause: error });
    }
    this.logger.log(`Saved state for ${name} to ${this.storeDir}`, 'debug');
    return fileName;
  }

  getLastReloadTime(): Date | null {
    return this.loadedAt;
  }

  /** Newest save timestamp across the cached devices */
  getLatestStoreModificationTime(): Date | null {
    let latest: Date | null = null;
    for (const device of this.getStateCollection()) {
      if (!latest || device.localLastSaveTime > latest) latest = device.localLastSaveTime;
    }
    return latest;
  }

  getStats(): CoordinatorStats {
    return { ...this.stats };
  }

  getPhase(): ReloadPhase {
    return this.phase;
  }

  getStoreDir(): string {
    return this.storeDir;
  }

  // ==================== Worker ====================

  startWorker(): void {
    if (!this.worker) {
      this.worker = new RefreshWorker(this, {
        intervalMs: this.pollIntervalMs,
        stopTimeoutMs: this.workerStopTimeoutMs,
        logger: this.logger,
      });
    }
    this.worker.start();
  }

  isWorkerRunning(): boolean {
    return this.worker?.isRunning() ?? false;
  }

  async shutdownWorker(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    await worker.stop();
  }
}

function artifactKey(generator: ArtifactGenerator, device: DeviceState): string {
  return `${generator.name}:${device.fileName}`;
}
