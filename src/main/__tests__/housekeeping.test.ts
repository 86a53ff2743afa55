/** @jest-environment node */

import fs from 'node:fs';
import path from 'node:path';

import { ConfigManager } from '../config/config-manager';
import { Housekeeping } from '../housekeeping';
import { Logger } from '../logging/logger';
import { StateCoordinator } from '../state/state-coordinator';

import { makeTempDir, powerDoc, removeDir, writeDoc } from './helpers/store-fixtures';

function quietConsole() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('Housekeeping', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = makeTempDir('dw-hk-');
    configPath = path.join(dir, 'config.json');
    fs.mkdirSync(path.join(dir, 'state_data'));
    fs.writeFileSync(configPath, JSON.stringify({ Files: { LogfileName: 'dw.log', LogfileMaxLines: 2, LogfileVerbosity: 'all' } }));
  });

  afterEach(() => {
    removeDir(dir);
  });

  function setup(now: () => Date) {
    const config = new ConfigManager({ configPath, env: {} });
    const sink = quietConsole();
    const logger = new Logger(config.getLoggerSettings(), { console: sink });
    const coordinator = new StateCoordinator({ storeDir: config.getStoreDirectory(), pid: 1 });
    const housekeeping = new Housekeeping({ config, logger, coordinator, now, trimIntervalMs: 60_000 });
    return { config, logger, sink, coordinator, housekeeping };
  }

  test('refreshes the cache on every run', async () => {
    const { coordinator, housekeeping } = setup(() => new Date());
    writeDoc(path.join(dir, 'state_data'), 'pump.json', powerDoc('pump'));

    await housekeeping.run();
    expect(coordinator.getStateCollection()).toHaveLength(1);
  });

  test('trims the logfile at most once per interval', async () => {
    let clock = new Date('2026-03-01T10:00:00Z');
    const { housekeeping } = setup(() => clock);
    const logfile = path.join(dir, 'dw.log');

    fs.writeFileSync(logfile, 'a\nb\nc\nd\n');
    await housekeeping.run();
    expect(fs.readFileSync(logfile, 'utf8')).toBe('c\nd\n');
    expect(housekeeping.getLastTrimTime()).toEqual(clock);

    fs.writeFileSync(logfile, 'a\nb\nc\nd\n');
    clock = new Date('2026-03-01T10:00:30Z');
    await housekeeping.run();
    expect(fs.readFileSync(logfile, 'utf8')).toBe('a\nb\nc\nd\n');

    clock = new Date('2026-03-01T10:01:01Z');
    await housekeeping.run();
    expect(fs.readFileSync(logfile, 'utf8')).toBe('c\nd\n');
  });

  test('applies edited logger settings and survives an invalid edit', async () => {
    const { logger, sink, housekeeping } = setup(() => new Date());
    expect(logger.getSettings().consoleVerbosity).toBe('summary');

    fs.writeFileSync(configPath, JSON.stringify({ Files: { ConsoleVerbosity: 'error' } }));
    let later = new Date(Date.now() + 10_000);
    fs.utimesSync(configPath, later, later);
    await housekeeping.run();
    expect(logger.getSettings().consoleVerbosity).toBe('error');

    fs.writeFileSync(configPath, JSON.stringify({ Website: { Port: 1 } }));
    later = new Date(Date.now() + 20_000);
    fs.utimesSync(configPath, later, later);
    await housekeeping.run();
    expect(logger.getSettings().consoleVerbosity).toBe('error');
    expect(sink.error).toHaveBeenCalledTimes(1);
  });
});
