import { LogLevel, parseLogLevel } from "./logLevel";

/** Process-level configuration, read from the environment. */
export interface ExplorerConfig {
  /** Minimum level written to the console and the log file. */
  logLevel: LogLevel;
  /** Directory for rotating log files; file logging is off when undefined. */
  logDirectory: string | undefined;
  sentryDsn: string | undefined;
  sentryEnvironment: string | undefined;
  sentryRelease: string | undefined;
}

export const ENV_LOG_LEVEL = "COMPUTE_EXPLORER_LOG_LEVEL";
export const ENV_LOG_DIR = "COMPUTE_EXPLORER_LOG_DIR";

/** Convenience function for getting the configuration from the given (or current) environment. */
export function getConfigs(env: NodeJS.ProcessEnv = process.env): ExplorerConfig {
  return {
    logLevel: parseLogLevel(env[ENV_LOG_LEVEL]) ?? LogLevel.Info,
    logDirectory: nonEmpty(env[ENV_LOG_DIR]),
    sentryDsn: nonEmpty(env.SENTRY_DSN),
    sentryEnvironment: nonEmpty(env.SENTRY_ENV),
    sentryRelease: nonEmpty(env.SENTRY_RELEASE),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
