import path from 'node:path';

import * as fs from 'fs-extra';
import { format } from 'date-fns';

import { errorCode } from '../utils/retry';

import type { ConsoleLike, Log, LogSeverity, LoggerSettings } from './types';

const SEVERITY_RANK: Record<LogSeverity, number> = {
  error: 0,
  warning: 1,
  summary: 2,
  detailed: 3,
  debug: 4,
};

export const DEFAULT_LOGGER_SETTINGS: LoggerSettings = {
  logfileName: null,
  logfileMaxLines: 500,
  logProcessId: true,
  logfileVerbosity: 'summary',
  consoleVerbosity: 'summary',
};

interface LoggerOptions {
  console?: ConsoleLike;
  now?: () => Date;
  pid?: number;
}

export class Logger implements Log {
  private settings: LoggerSettings;
  private readonly sink: ConsoleLike;
  private readonly now: () => Date;
  private readonly pid: number;

  constructor(settings: Partial<LoggerSettings> = {}, options: LoggerOptions = {}) {
    this.settings = { ...DEFAULT_LOGGER_SETTINGS, ...settings };
    this.sink = options.console ?? console;
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
  }

  applySettings(settings: Partial<LoggerSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  getSettings(): Readonly<LoggerSettings> {
    return this.settings;
  }

  log(message: string, severity: LogSeverity = 'summary'): void {
    const line = this.formatLine(message, severity);

    if (SEVERITY_RANK[severity] <= SEVERITY_RANK[this.settings.consoleVerbosity]) {
      if (severity === 'error') this.sink.error(line);
      else if (severity === 'warning') this.sink.warn(line);
      else this.sink.log(line);
    }

    if (this.shouldWriteFile(severity)) {
      this.appendToFile(line);
    }
  }

  /**
   * Log an unrecoverable error for the current operation and return the text that was logged,
   * so request handlers can echo it back.
   */
  reportFatalError(message: string, error?: unknown): string {
    let text = `FATAL ERROR: ${message}`;
    if (error instanceof Error && error.stack) {
      text += `\n\nStack trace:\n${error.stack}`;
    }
    this.log(text, 'error');
    return text;
  }

  /** Keep only the newest `logfileMaxLines` lines of the logfile. */
  trimLogfile(): void {
    const { logfileName, logfileMaxLines } = this.settings;
    if (!logfileName || logfileMaxLines <= 0) return;
    let content: string;
    try {
      content = fs.readFileSync(logfileName, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return;
      this.sink.error(`[logger] unable to read ${logfileName}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }
    const lines = content.split('\n');
    if (lines.at(-1) === '') lines.pop();
    if (lines.length <= logfileMaxLines) return;

    const kept = lines.slice(-logfileMaxLines).join('\n') + '\n';
    const tmp = path.join(path.dirname(logfileName), `.${path.basename(logfileName)}.${this.pid}.tmp`);
    try {
      fs.writeFileSync(tmp, kept, 'utf8');
      fs.renameSync(tmp, logfileName);
    } catch (error) {
      this.sink.error(`[logger] unable to trim ${logfileName}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private shouldWriteFile(severity: LogSeverity): boolean {
    const { logfileName, logfileVerbosity } = this.settings;
    if (!logfileName || logfileVerbosity === 'none') return false;
    if (logfileVerbosity === 'all') return true;
    return SEVERITY_RANK[severity] <= SEVERITY_RANK[logfileVerbosity];
  }

  private appendToFile(line: string): void {
    const file = this.settings.logfileName;
    if (!file) return;
    try {
      fs.appendFileSync(file, line + '\n', 'utf8');
    } catch (error) {
      this.sink.error(`[logger] unable to append to ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private formatLine(message: string, severity: LogSeverity): string {
    const ts = format(this.now(), 'yyyy-MM-dd HH:mm:ss');
    const pid = this.settings.logProcessId ? ` [${this.pid}]` : '';
    return `${ts}${pid} ${severity.toUpperCase()}: ${message}`;
  }
}

/** Logger that discards everything; handy for tests and tools. */
export const silentLogger: Log = { log: () => undefined };
