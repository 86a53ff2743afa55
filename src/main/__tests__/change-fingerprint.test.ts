/** @jest-environment node */

import fs from 'node:fs';
import path from 'node:path';

import { CacheMetadataStore, isRecentSiblingReload } from '../state/cache-metadata';
import { fingerprintOf, isStoreFileName, scanStore } from '../state/change-fingerprint';

import { bumpMtime, makeTempDir, powerDoc, RecordingLog, removeDir, writeDoc } from './helpers/store-fixtures';

describe('store scanning', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('dw-scan-');
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('only visible json files count', () => {
    expect(isStoreFileName('pump.json')).toBe(true);
    expect(isStoreFileName('.cache_metadata.json')).toBe(false);
    expect(isStoreFileName('.pump.json.12.1.tmp')).toBe(false);
    expect(isStoreFileName('notes.txt')).toBe(false);
  });

  test('fingerprint joins sorted names and the newest mtime', () => {
    expect(fingerprintOf(['a.json', 'b.json'], 1500)).toBe('a.json\u0000b.json|1500');
    expect(fingerprintOf([], 0)).toBe('|0');
  });

  test('scan lists files in order and ignores internal files', async () => {
    writeDoc(dir, 'pump.json', powerDoc('pump'));
    writeDoc(dir, 'heater.json', powerDoc('heater'));
    fs.writeFileSync(path.join(dir, '.reload.lock'), '{}');
    fs.writeFileSync(path.join(dir, '.cache_metadata.json'), '{}');
    fs.mkdirSync(path.join(dir, 'archive.json'));

    const scan = await scanStore(dir);
    expect(scan.files).toEqual(['heater.json', 'pump.json']);
    expect(scan.fingerprint.startsWith('heater.json\u0000pump.json|')).toBe(true);
  });

  test('fingerprint changes on modify, add and delete', async () => {
    const pump = writeDoc(dir, 'pump.json', powerDoc('pump'));
    const initial = (await scanStore(dir)).fingerprint;

    bumpMtime(pump);
    const modified = (await scanStore(dir)).fingerprint;
    expect(modified).not.toBe(initial);

    writeDoc(dir, 'heater.json', powerDoc('heater'));
    const added = (await scanStore(dir)).fingerprint;
    expect(added).not.toBe(modified);

    fs.unlinkSync(path.join(dir, 'heater.json'));
    expect((await scanStore(dir)).fingerprint).toBe(modified);
  });

  test('a missing store rejects', async () => {
    await expect(scanStore(path.join(dir, 'absent'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('CacheMetadataStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('dw-meta-');
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('round-trips the reload record in epoch seconds', async () => {
    const store = new CacheMetadataStore(path.join(dir, '.cache_metadata.json'));
    const loadedAt = new Date('2026-03-01T10:00:00.500Z');
    await store.write(321, loadedAt, { 'temp-probe-charts:tank.json': { signature: 'abc', files: ['Chart_tank-0.svg'] } });

    const read = await store.read();
    expect(read).toEqual({
      last_load_time: loadedAt.getTime() / 1000,
      last_load_pid: 321,
      last_load_datetime: '2026-03-01T10:00:00.500Z',
      artifacts: { 'temp-probe-charts:tank.json': { signature: 'abc', files: ['Chart_tank-0.svg'] } },
    });
  });

  test('missing, empty and malformed files read as null', async () => {
    const file = path.join(dir, '.cache_metadata.json');
    const log = new RecordingLog();
    const store = new CacheMetadataStore(file, log);
    await expect(store.read()).resolves.toBeNull();

    fs.writeFileSync(file, '');
    await expect(store.read()).resolves.toBeNull();

    fs.writeFileSync(file, JSON.stringify({ last_load_pid: 'x' }));
    await expect(store.read()).resolves.toBeNull();
    expect(log.messages('warning')).toContain('Ignoring malformed cache metadata');
  });

  test('a sibling reload counts as recent inside the grace window only', () => {
    const now = new Date('2026-03-01T10:00:10Z');
    const metadata = {
      last_load_time: new Date('2026-03-01T10:00:05Z').getTime() / 1000,
      last_load_pid: 2,
      last_load_datetime: '2026-03-01T10:00:05.000Z',
    };

    expect(isRecentSiblingReload(metadata, 1, 10_000, now)).toBe(true);
    expect(isRecentSiblingReload(metadata, 2, 10_000, now)).toBe(false);
    expect(isRecentSiblingReload(metadata, 1, 5_000, now)).toBe(false);
    expect(isRecentSiblingReload(null, 1, 10_000, now)).toBe(false);
  });
});
