/** Log levels, ordered from most to least verbose. */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warning = 3,
  Error = 4,
  Off = 5,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  off: LogLevel.Off,
};

/** Parse a (case-insensitive) level name, returning undefined for anything unrecognized. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) {
    return undefined;
  }
  return LEVEL_NAMES[name.trim().toLowerCase()];
}
