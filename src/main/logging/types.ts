export type LogSeverity = 'error' | 'warning' | 'summary' | 'detailed' | 'debug';

/** Logfile threshold; `none` disables the file sink and `all` keeps everything */
export type LogfileVerbosity = 'none' | LogSeverity | 'all';

export interface LoggerSettings {
  logfileName: string | null;
  logfileMaxLines: number;
  logProcessId: boolean;
  logfileVerbosity: LogfileVerbosity;
  consoleVerbosity: LogSeverity;
}

/** What the state layer needs from a logger */
export interface Log {
  log(message: string, severity?: LogSeverity): void;
}

export type ConsoleLike = Pick<typeof console, 'log' | 'warn' | 'error'>;
