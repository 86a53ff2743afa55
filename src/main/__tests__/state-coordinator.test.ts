/** @jest-environment node */

import fs from 'node:fs';
import path from 'node:path';

import type { ArtifactGenerator } from '../artifacts/artifact-generator';
import type { DeviceState } from '../state/device-state';
import { StateStoreError } from '../state/errors';
import { StateCoordinator, isValidDeviceName, type StateCoordinatorOptions } from '../state/state-coordinator';
import { sleep } from '../utils/retry';

import {
  bumpMtime,
  lightingDoc,
  makeTempDir,
  powerDoc,
  RecordingLog,
  removeDir,
  tempProbesDoc,
  writeDoc,
} from './helpers/store-fixtures';

/** Records every generation and how many ran at once */
class SpyGenerator implements ArtifactGenerator {
  readonly name = 'spy';
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;

  appliesTo(device: DeviceState): boolean {
    return device.kind === 'TempProbes';
  }

  async generate(device: DeviceState): Promise<string[]> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await sleep(15);
    this.active -= 1;
    this.calls.push(device.fileName);
    return [`spy-${device.name}.txt`];
  }

  async outputsExist(): Promise<boolean> {
    return true;
  }
}

function names(coordinator: StateCoordinator): string[] {
  return coordinator.getStateCollection().map((d) => d.name);
}

describe('StateCoordinator', () => {
  jest.setTimeout(20_000);
  let dir: string;
  const coordinators: StateCoordinator[] = [];

  function make(options: Partial<StateCoordinatorOptions> = {}): StateCoordinator {
    const coordinator = new StateCoordinator({ storeDir: dir, lockBusyWaitMs: 20, coldWaitSampleMs: 10, ...options });
    coordinators.push(coordinator);
    return coordinator;
  }

  beforeEach(() => {
    dir = makeTempDir('dw-coord-');
  });

  afterEach(async () => {
    await Promise.all(coordinators.splice(0).map((c) => c.shutdownWorker()));
    removeDir(dir);
  });

  test('an unchanged store returns the cached collection without parsing', async () => {
    writeDoc(dir, 'pump.json', powerDoc('pump'));
    writeDoc(dir, 'porch.json', lightingDoc('porch'));
    const coordinator = make({ pid: 1 });

    const first = await coordinator.ensureFresh();
    const second = await coordinator.ensureFresh();

    expect(second).toBe(first);
    expect(first.map((d) => d.fileName)).toEqual(['porch.json', 'pump.json']);
    expect(coordinator.getStats()).toMatchObject({ fullReloads: 1, filesParsed: 2, cacheHits: 1 });
    expect(Object.isFrozen(first)).toBe(true);
  });

  test('picks up added, modified and deleted files', async () => {
    const pump = writeDoc(dir, 'pump.json', powerDoc('pump'));
    const coordinator = make({ pid: 1 });
    await coordinator.ensureFresh();
    expect(names(coordinator)).toEqual(['pump']);

    writeDoc(dir, 'heater.json', powerDoc('heater'));
    await coordinator.ensureFresh();
    expect(names(coordinator)).toEqual(['heater', 'pump']);

    writeDoc(dir, 'pump.json', powerDoc('pump', { Output: { IsOn: false } }));
    bumpMtime(pump);
    await coordinator.ensureFresh();
    expect(coordinator.getDevice(1, ['Output', 'IsOn'])).toBe(false);

    fs.unlinkSync(path.join(dir, 'heater.json'));
    await coordinator.ensureFresh();
    expect(names(coordinator)).toEqual(['pump']);
    expect(coordinator.getStats().fullReloads).toBe(4);
  });

  test('concurrent callers share one refresh', async () => {
    writeDoc(dir, 'pump.json', powerDoc('pump'));
    const coordinator = make({ pid: 1 });

    const results = await Promise.all([coordinator.ensureFresh(), coordinator.ensureFresh(), coordinator.ensureFresh()]);

    expect(results[1]).toBe(results[0]);
    expect(results[2]).toBe(results[0]);
    expect(coordinator.getStats()).toMatchObject({ fullReloads: 1, filesParsed: 1 });
  });

  test('records the reload in the metadata file and releases the lock', async () => {
    writeDoc(dir, 'tank.json', tempProbesDoc('tank'));
    const generator = new SpyGenerator();
    const coordinator = make({ pid: 77, generators: [generator] });

    await coordinator.ensureFresh();
    const metadata = JSON.parse(fs.readFileSync(path.join(dir, '.cache_metadata.json'), 'utf8'));

    expect(metadata.last_load_pid).toBe(77);
    expect(metadata.artifacts['spy:tank.json'].files).toEqual(['spy-tank.txt']);
    expect(fs.existsSync(path.join(dir, '.reload.lock'))).toBe(false);
    expect(coordinator.getStateCollection()[0]?.document['Artifacts']).toEqual(['spy-tank.txt']);
  });

  test('a cold sibling follows a recent reload instead of repeating it', async () => {
    writeDoc(dir, 'tank.json', tempProbesDoc('tank'));
    writeDoc(dir, 'pump.json', powerDoc('pump'));
    const generator = new SpyGenerator();
    const a = make({ pid: 1, generators: [generator] });
    const b = make({ pid: 2, generators: [generator] });

    await a.ensureFresh();
    await b.ensureFresh();

    expect(names(b)).toEqual(names(a));
    expect(b.getStats()).toMatchObject({ fullReloads: 0, passiveLoads: 1, deferredReloads: 1 });
    expect(b.getStateCollection().find((d) => d.name === 'tank')?.artifacts).toEqual(['spy-tank.txt']);
    expect(generator.calls).toEqual(['tank.json']);

    // Followed with complete artifacts, so the next call is a cache hit
    await b.ensureFresh();
    expect(b.getStats().cacheHits).toBe(1);
  });

  test('serves its cache while a sibling reload is recent, then converges in the background', async () => {
    const tank = writeDoc(dir, 'tank.json', tempProbesDoc('tank'));
    const generator = new SpyGenerator();
    const a = make({ pid: 1, generators: [generator] });
    const b = make({ pid: 2, generators: [generator] });
    await a.ensureFresh();
    await b.ensureFresh();
    const before = b.getStateCollection();

    writeDoc(dir, 'tank.json', { ...tempProbesDoc('tank'), SchemaVersion: 9 });
    bumpMtime(tank);

    // The sibling's reload is still inside the grace window, so the foreground keeps the cache
    await b.ensureFresh();
    expect(b.getStateCollection()).toBe(before);

    // The worker shows the new content but its charts are not covered by the sibling's reload yet
    await expect(b.refreshInBackground()).resolves.toBe('deferred');
    expect(b.getDevice(0, ['SchemaVersion'])).toBe(9);

    await a.ensureFresh();
    expect(a.getDevice(0, ['SchemaVersion'])).toBe(9);

    await expect(b.refreshInBackground()).resolves.toBe('followed');
    expect(b.getDevice(0, ['SchemaVersion'])).toBe(9);
    await expect(b.refreshInBackground()).resolves.toBe('unchanged');
    expect(generator.calls).toEqual(['tank.json', 'tank.json']);
  });

  test('two cold processes racing produce a single full reload', async () => {
    writeDoc(dir, 'tank.json', tempProbesDoc('tank'));
    writeDoc(dir, 'porch.json', lightingDoc('porch'));
    const generator = new SpyGenerator();
    const a = make({ pid: 1, generators: [generator] });
    const b = make({ pid: 2, generators: [generator] });

    await Promise.all([a.ensureFresh(), b.ensureFresh()]);

    expect(names(a)).toEqual(['porch', 'tank']);
    expect(names(b)).toEqual(['porch', 'tank']);
    expect(a.getStats().fullReloads + b.getStats().fullReloads).toBe(1);
    expect(generator.calls).toEqual(['tank.json']);
  });

  test('artifact generation never overlaps across processes and is reused for identical content', async () => {
    writeDoc(dir, 'tank.json', tempProbesDoc('tank'));
    writeDoc(dir, 'cellar.json', tempProbesDoc('cellar'));
    const generator = new SpyGenerator();
    const group = [1, 2, 3, 4].map((pid) => make({ pid, generators: [generator], graceWindowMs: 0 }));

    await Promise.all(group.map((c) => c.ensureFresh()));
    await Promise.all(group.map((c) => c.ensureFresh()));

    expect(generator.maxActive).toBe(1);
    expect([...generator.calls].sort()).toEqual(['cellar.json', 'tank.json']);
    for (const c of group) {
      expect(names(c)).toEqual(['cellar', 'tank']);
    }
  });

  test('skips unreadable and invalid documents', async () => {
    writeDoc(dir, 'pump.json', powerDoc('pump'));
    fs.writeFileSync(path.join(dir, 'empty.json'), '');
    fs.writeFileSync(path.join(dir, 'list.json'), '[1, 2]');
    fs.writeFileSync(path.join(dir, 'broken.json'), '{"DeviceName": ');
    const log = new RecordingLog();
    const coordinator = make({ pid: 1, logger: log });

    await coordinator.ensureFresh();

    expect(names(coordinator)).toEqual(['pump']);
    expect(log.messages('warning')).toContain(`Skipped invalid state file list.json: expected a JSON object`);
    expect(log.messages('error').some((m) => m.startsWith(`Error loading JSON from ${path.join(dir, 'broken.json')}`))).toBe(true);
  });

  test('documents with off-type fields load and read back unchanged', async () => {
    writeDoc(dir, 'pump.json', powerDoc('pump', { SchemaVersion: '2', Scheduler: [], Output: { Type: 'shelly', IsOn: 1 } }));
    const probes = tempProbesDoc('tank');
    writeDoc(dir, 'tank.json', {
      ...probes,
      TempProbeLogging: { probes: [], history: [{ Timestamp: '2026-03-01T08:00:00', ProbeName: 'Tank', Temperature: 'n/a' }] },
    });
    const log = new RecordingLog();
    const coordinator = make({ pid: 1, logger: log });

    await coordinator.ensureFresh();

    expect(names(coordinator)).toEqual(['pump', 'tank']);
    expect(coordinator.getDevice(0, ['SchemaVersion'])).toBe('2');
    expect(coordinator.getDevice(0, ['Scheduler'])).toEqual([]);
    expect(coordinator.getDevice(0, ['Output', 'IsOn'])).toBe(1);
    expect(coordinator.getDevice(0, ['DeviceDescription'])).toBe('Power Controller');
    expect(coordinator.getDevice(1, ['TempProbeLogging', 'history', 0, 'Temperature'])).toBe('n/a');
    expect(log.messages('warning')).toEqual([]);
  });

  test('an unreadable store with no cache is reported', async () => {
    const coordinator = make({ storeDir: path.join(dir, 'absent'), pid: 1 });

    await expect(coordinator.ensureFresh()).rejects.toBeInstanceOf(StateStoreError);
    await expect(coordinator.ensureFresh()).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });

  test('the refresh worker picks up changes and stops cleanly', async () => {
    writeDoc(dir, 'pump.json', powerDoc('pump'));
    const coordinator = make({ pid: 1, pollIntervalMs: 20 });
    await coordinator.ensureFresh();

    coordinator.startWorker();
    coordinator.startWorker();
    expect(coordinator.isWorkerRunning()).toBe(true);

    writeDoc(dir, 'heater.json', powerDoc('heater'));
    const deadline = Date.now() + 5000;
    while (coordinator.getStateCollection().length < 2 && Date.now() < deadline) {
      await sleep(10);
    }
    expect(names(coordinator)).toEqual(['heater', 'pump']);

    await coordinator.shutdownWorker();
    expect(coordinator.isWorkerRunning()).toBe(false);
  });

  describe('device access', () => {
    let coordinator: StateCoordinator;

    beforeEach(async () => {
      writeDoc(dir, 'a.json', powerDoc('Alpha'));
      writeDoc(dir, 'b.json', powerDoc('Bravo Two'));
      writeDoc(dir, 'c.json', lightingDoc('Charlie'));
      coordinator = make({ pid: 1 });
      await coordinator.ensureFresh();
    });

    test('selectDevice mirrors the dashboard navigation', () => {
      expect(coordinator.selectDevice()).toEqual({ index: 0, nextIndex: 1 });
      expect(coordinator.selectDevice({ index: 2 })).toEqual({ index: 2, nextIndex: 0 });
      expect(coordinator.selectDevice({ index: -1 })).toEqual({ index: 2, nextIndex: 0 });
      expect(coordinator.selectDevice({ index: 9 })).toEqual({ index: 0, nextIndex: 1 });
      expect(coordinator.selectDevice({ name: 'BravoTwo' })).toEqual({ index: 1, nextIndex: 2 });
    });

    test('an unknown name falls back to the first device and is logged', async () => {
      const log = new RecordingLog();
      const logged = make({ pid: 2, logger: log });
      await logged.ensureFresh();

      expect(logged.selectDevice({ name: 'Nope' })).toEqual({ index: 0, nextIndex: 1 });
      expect(log.messages('error')).toEqual(["State name 'Nope' not found, defaulting to first state."]);
    });

    test('getDevice reads nested values with a fallback', () => {
      expect(coordinator.getDevice(0, ['Output', 'Type'])).toBe('shelly');
      expect(coordinator.getDevice(0, ['DeviceDescription'])).toBe('Power Controller');
      expect(coordinator.getDevice(2, ['SwitchStates', 0, 'Name'])).toBe('Porch');
      expect(coordinator.getDevice(0, ['Output', 'Voltage'], 'n/a')).toBe('n/a');
      expect(coordinator.getDevice(7, [], 'none')).toBe('none');
    });

    test('reload times are tracked', () => {
      expect(coordinator.getLastReloadTime()).toBeInstanceOf(Date);
      expect(coordinator.getLatestStoreModificationTime()?.getTime()).toBe(new Date(2026, 2, 1, 10, 0, 0).getTime());
    });
  });

  test('selectDevice handles empty and single-device stores', async () => {
    const coordinator = make({ pid: 1 });
    await coordinator.ensureFresh();
    expect(coordinator.selectDevice()).toBeNull();

    writeDoc(dir, 'pump.json', powerDoc('pump'));
    await coordinator.ensureFresh();
    expect(coordinator.selectDevice({ index: 0 })).toEqual({ index: 0, nextIndex: null });
  });

  test('saveDeviceState writes atomically and validates the name', async () => {
    const coordinator = make({ pid: 1 });

    await expect(coordinator.saveDeviceState(powerDoc('pump'))).resolves.toBe('pump.json');
    expect(JSON.parse(fs.readFileSync(path.join(dir, 'pump.json'), 'utf8'))).toEqual(powerDoc('pump'));

    await expect(coordinator.saveDeviceState(powerDoc('../escape'))).rejects.toMatchObject({ code: 'INVALID_DEVICE_NAME' });
    await expect(coordinator.saveDeviceState({ StateFileType: 'PowerController' })).rejects.toMatchObject({
      code: 'INVALID_DEVICE_NAME',
    });
    expect(fs.readdirSync(dir)).toEqual(['pump.json']);
  });

  test('device names are checked for path separators and hidden files', () => {
    expect(isValidDeviceName('Pool Pump')).toBe(true);
    expect(isValidDeviceName('')).toBe(false);
    expect(isValidDeviceName('.cache_metadata')).toBe(false);
    expect(isValidDeviceName('a/b')).toBe(false);
    expect(isValidDeviceName('a\\b')).toBe(false);
  });
});
