import { ENV_LOG_LEVEL } from "../../src/configs";
import { LogLevel, setLogLevel } from "../../src/logging";

/** Mocha global "before all"-style setup hook, loaded through `--require`. */
export function mochaGlobalSetup(): void {
  // keep expected failures out of the test output unless a level was asked for
  if (!process.env[ENV_LOG_LEVEL]) {
    setLogLevel(LogLevel.Off);
  }
}
