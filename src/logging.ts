import { existsSync, readdirSync, statSync, unlinkSync } from "fs";
import { join, normalize } from "path";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import { getConfigs } from "./configs";
import { LogLevel } from "./logLevel";

export { LogLevel } from "./logLevel";

/** The base file name prefix for the log file. Helps with clean up of old log files. @see {@link cleanupOldLogFiles} */
export const BASEFILE_PREFIX: string = "compute-explorer";

/** Max size of any log file written to disk.
 * @see https://github.com/iccicci/rotating-file-stream?tab=readme-ov-file#size */
export const MAX_LOGFILE_SIZE = "10M";

/** Number of log files to keep.
 * @see https://github.com/iccicci/rotating-file-stream?tab=readme-ov-file#maxfiles */
export const MAX_LOGFILES = 3;

/** How often log files should rotate if they don't exceed {@link MAX_LOGFILE_SIZE}.
 * @see https://github.com/iccicci/rotating-file-stream?tab=readme-ov-file#interval */
export const LOGFILE_ROTATION_INTERVAL = "1d";

/**
 * Manages the creation and rotation of log files for the {@link LogSink}.
 *
 * @param directory - Where log files are written.
 * @param base - The base filepath name of the log file.
 */
export class RotatingLogManager {
  private stream: RotatingFileStream | undefined;
  private readonly _baseFileName: string;
  private readonly _currentFileName: string;
  private readonly _rotatedFileNames: string[] = [];

  constructor(
    private readonly directory: string,
    private readonly base: string,
  ) {
    this._baseFileName = `${BASEFILE_PREFIX}-${this.base}`;
    this._currentFileName = `${this._baseFileName}.log`;
  }

  get currentLogFileName(): string {
    return this._currentFileName;
  }

  /**
   * Generates a rotating filename based on the index, used by the `RotatingFileStream` as it
   * handles rotations.
   *
   * The active logfile never carries an index. Rotated files get `.1.log`, `.2.log`, ... and only
   * the newest {@link MAX_LOGFILES} of them are remembered.
   */
  rotatingFilenameGenerator(time: number | Date | null, index?: number): string {
    // 0, undefined, null will drop any index suffix
    const maybefileIndex = index ? `.${index}` : "";
    const newFileName = `${this._baseFileName}${maybefileIndex}.log`;

    // called multiple times per rotation, so guard against adding the same file name twice
    if (newFileName !== this._currentFileName && !this._rotatedFileNames.includes(newFileName)) {
      this._rotatedFileNames.push(newFileName);
    }

    if (this._rotatedFileNames.length > MAX_LOGFILES) {
      // RotatingFileStream handles the actual file deletion
      this._rotatedFileNames.shift();
    }

    return newFileName;
  }

  /** Gets (lazily creating) the stream for the log file. */
  getStream(): RotatingFileStream {
    if (!this.stream) {
      const filenameGenerator = (time: number | Date | null, index?: number) =>
        this.rotatingFilenameGenerator(time, index);

      this.stream = createStream(filenameGenerator, {
        size: MAX_LOGFILE_SIZE,
        maxFiles: MAX_LOGFILES,
        interval: LOGFILE_ROTATION_INTERVAL,
        path: this.directory,
        history: `${this._baseFileName}.history.log`,
        encoding: "utf-8",
      });
    }
    return this.stream;
  }

  /** Paths of the current and rotated log files that exist on disk. */
  getFilePaths(): string[] {
    const names = [this._currentFileName, ...this._rotatedFileNames];
    const paths = names.map((name) => normalize(join(this.directory, name)));
    return paths.filter((path, i) => paths.indexOf(path) === i && existsSync(path));
  }

  dispose(): void {
    if (this.stream && !this.stream.closed) {
      this.stream.end();
    }
    this.stream = undefined;
  }
}

/**
 * Console writer with level filtering that also appends to a rotating log file when a log
 * directory is configured.
 */
export class LogSink {
  private rotatingLogManager: RotatingLogManager | undefined;

  constructor(
    public level: LogLevel,
    logDirectory?: string,
    private readonly consoleLabelName?: string,
  ) {
    if (logDirectory) {
      this.rotatingLogManager = new RotatingLogManager(logDirectory, `${process.pid}`);
    }
  }

  get logFileName(): string | undefined {
    return this.rotatingLogManager?.currentLogFileName;
  }

  trace(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Trace, "trace", message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Debug, "debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Info, "info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Warning, "warning", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Error, "error", message, args);
  }

  private write(level: LogLevel, label: string, message: string, args: unknown[]): void {
    if (level < this.level) {
      return;
    }
    const prefix = this.logPrefix(label);
    switch (level) {
      case LogLevel.Trace:
      case LogLevel.Debug:
        console.debug(prefix, message, ...args);
        break;
      case LogLevel.Info:
        console.info(prefix, message, ...args);
        break;
      case LogLevel.Warning:
        console.warn(prefix, message, ...args);
        break;
      default:
        console.error(prefix, message, ...args);
    }
    // don't write trace logs to the log file
    if (level !== LogLevel.Trace && this.rotatingLogManager) {
      this.writeToLogFile(prefix, message, args).catch((error: unknown) => {
        console.error("Error writing to log file:", error);
      });
    }
  }

  private writeToLogFile(prefix: string, message: string, args: unknown[]): Promise<void> {
    const manager = this.rotatingLogManager;
    if (!manager) {
      return Promise.resolve();
    }
    const argString = args.map((arg) => safeStringify(arg)).join(" ");
    const formattedMessage = `${prefix} ${message} ${argString}\n`;

    return new Promise<void>((resolve, reject) => {
      const stream: RotatingFileStream = manager.getStream();
      if (stream.closed) {
        resolve();
        return;
      }
      stream.write(formattedMessage, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private logPrefix(level: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} [${level}]${this.consoleLabelName ? ` [${this.consoleLabelName}]` : ""}`;
  }

  /** Paths of the log files written so far, e.g. for attaching to a support request. */
  getFilePaths(): string[] {
    return this.rotatingLogManager?.getFilePaths() ?? [];
  }

  dispose(): void {
    this.rotatingLogManager?.dispose();
    this.rotatingLogManager = undefined;
  }
}

function safeStringify(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify({ name: value.name, message: value.message, stack: value.stack });
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

const initialConfig = getConfigs();

/** The process-wide sink every {@link Logger} writes through. */
export const LOG_SINK: LogSink = new LogSink(initialConfig.logLevel, initialConfig.logDirectory);

/** Change the minimum level of the shared {@link LOG_SINK}. */
export function setLogLevel(level: LogLevel): void {
  LOG_SINK.level = level;
}

const callpointCounter = new Map<string, number>();

/**
 * Lightweight wrapper writing timestamped, leveled messages tagged with the logger name to the
 * shared {@link LOG_SINK}.
 */
export class Logger {
  constructor(private name: string) {}

  /** Returns a new 'bound' logger with a common prefix to correlate a sequence of calls with */
  public withCallpoint(callpoint: string): Logger {
    const count = callpointCounter.get(callpoint) || 0;
    callpointCounter.set(callpoint, count + 1);
    return new Logger(`${this.name}[${callpoint}.${count}]`);
  }

  trace(message: string, ...args: unknown[]) {
    LOG_SINK.trace(this.fullMessage(message), ...args);
  }

  debug(message: string, ...args: unknown[]) {
    LOG_SINK.debug(this.fullMessage(message), ...args);
  }

  info(message: string, ...args: unknown[]) {
    LOG_SINK.info(this.fullMessage(message), ...args);
  }

  warn(message: string, ...args: unknown[]) {
    LOG_SINK.warn(this.fullMessage(message), ...args);
  }

  error(message: string, ...args: unknown[]) {
    LOG_SINK.error(this.fullMessage(message), ...args);
  }

  private fullMessage(message: string) {
    return `[${this.name}] ${message}`;
  }
}

/** Clean up log files older than three days that the rotating file stream didn't pick up. */
export function cleanupOldLogFiles(logfileDir: string, now: Date = new Date()): string[] {
  const logger = new Logger("logging.cleanup");

  const cutoffDate = new Date(now);
  cutoffDate.setDate(now.getDate() - 3);

  const logFiles: string[] = readdirSync(logfileDir).filter(
    (file) => file.startsWith(`${BASEFILE_PREFIX}-`) && file.endsWith(".log"),
  );
  logger.debug(`found ${logFiles.length} log file(s) in "${logfileDir}":`, logFiles.slice(0, 5));
  if (!logFiles.length) {
    return [];
  }

  const oldLogFiles = logFiles.filter((file) => {
    const stats = statSync(join(logfileDir, file));
    return stats.mtime < cutoffDate;
  });
  logger.debug(`log files modified before ${cutoffDate.toISOString()} to delete:`, oldLogFiles);

  const deleted: string[] = [];
  for (const file of oldLogFiles) {
    const filePath = join(logfileDir, file);
    try {
      logger.debug(`Deleting old log file: ${filePath}`);
      unlinkSync(filePath);
      deleted.push(file);
    } catch (error) {
      logger.error(`Error deleting old log file: ${filePath}`, error);
    }
  }
  return deleted;
}
