import * as assert from "assert";
import { existsSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import * as sinon from "sinon";
import {
  BASEFILE_PREFIX,
  cleanupOldLogFiles,
  LOG_SINK,
  Logger,
  LogLevel,
  LogSink,
  MAX_LOGFILES,
  RotatingLogManager,
} from "./logging";

describe("logging.ts", () => {
  let sandbox: sinon.SinonSandbox;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
  });

  afterEach(() => {
    sandbox.restore();
  });

  describe("Logger methods", function () {
    let traceStub: sinon.SinonStub;
    let debugStub: sinon.SinonStub;
    let infoStub: sinon.SinonStub;
    let warnStub: sinon.SinonStub;
    let errorStub: sinon.SinonStub;

    let logger: Logger;

    beforeEach(function () {
      traceStub = sandbox.stub(LOG_SINK, "trace");
      debugStub = sandbox.stub(LOG_SINK, "debug");
      infoStub = sandbox.stub(LOG_SINK, "info");
      warnStub = sandbox.stub(LOG_SINK, "warn");
      errorStub = sandbox.stub(LOG_SINK, "error");

      logger = new Logger("test");
    });

    it("should call LOG_SINK.trace when .trace() is called", function () {
      logger.trace("test message");

      sinon.assert.calledOnceWithExactly(traceStub, "[test] test message");
    });

    it("should call LOG_SINK.debug when .debug() is called", function () {
      logger.debug("test message");

      sinon.assert.calledOnceWithExactly(debugStub, "[test] test message");
    });

    it("should call LOG_SINK.info when .info() is called", function () {
      logger.info("test message");

      sinon.assert.calledOnceWithExactly(infoStub, "[test] test message");
    });

    it("should call LOG_SINK.warn when .warn() is called", function () {
      logger.warn("test message");

      sinon.assert.calledOnceWithExactly(warnStub, "[test] test message");
    });

    it("should pass extra arguments through to LOG_SINK.error", function () {
      const error = new Error("uh oh");

      logger.error("test message", error);

      sinon.assert.calledOnceWithExactly(errorStub, "[test] test message", error);
    });

    it("should number callpoints of the same name", function () {
      logger.withCallpoint("logging-test-callpoint").debug("first");
      logger.withCallpoint("logging-test-callpoint").debug("second");

      assert.strictEqual(debugStub.firstCall.args[0], "[test[logging-test-callpoint.0]] first");
      assert.strictEqual(debugStub.secondCall.args[0], "[test[logging-test-callpoint.1]] second");
    });
  });

  describe("LogSink", function () {
    let consoleDebugStub: sinon.SinonStub;
    let consoleInfoStub: sinon.SinonStub;
    let consoleWarnStub: sinon.SinonStub;
    let consoleErrorStub: sinon.SinonStub;

    beforeEach(function () {
      consoleDebugStub = sandbox.stub(console, "debug");
      consoleInfoStub = sandbox.stub(console, "info");
      consoleWarnStub = sandbox.stub(console, "warn");
      consoleErrorStub = sandbox.stub(console, "error");
    });

    it("should drop messages below its level", function () {
      const sink = new LogSink(LogLevel.Warning);

      sink.trace("trace message");
      sink.debug("debug message");
      sink.info("info message");

      sinon.assert.notCalled(consoleDebugStub);
      sinon.assert.notCalled(consoleInfoStub);
    });

    it("should write messages at or above its level to the console", function () {
      const sink = new LogSink(LogLevel.Warning);

      sink.warn("warn message", 42);
      sink.error("error message");

      sinon.assert.calledOnce(consoleWarnStub);
      assert.match(consoleWarnStub.firstCall.args[0], / \[warning\]$/);
      assert.deepStrictEqual(consoleWarnStub.firstCall.args.slice(1), ["warn message", 42]);
      sinon.assert.calledOnce(consoleErrorStub);
      assert.match(consoleErrorStub.firstCall.args[0], / \[error\]$/);
    });

    it("should write nothing when the level is Off", function () {
      const sink = new LogSink(LogLevel.Off);

      sink.error("error message");

      sinon.assert.notCalled(consoleErrorStub);
    });

    it("should include the console label in the prefix", function () {
      const sink = new LogSink(LogLevel.Trace, undefined, "explorer");

      sink.debug("debug message");

      sinon.assert.calledOnce(consoleDebugStub);
      assert.match(consoleDebugStub.firstCall.args[0], / \[debug\] \[explorer\]$/);
    });

    it("should report no log file without a log directory", function () {
      const sink = new LogSink(LogLevel.Info);

      assert.strictEqual(sink.logFileName, undefined);
      assert.deepStrictEqual(sink.getFilePaths(), []);
    });
  });

  describe("RotatingLogManager", function () {
    let logDir: string;

    beforeEach(function () {
      logDir = mkdtempSync(join(tmpdir(), "logging-test-"));
    });

    afterEach(function () {
      rmSync(logDir, { recursive: true, force: true });
    });

    it("should name the current log file after the base", function () {
      const manager = new RotatingLogManager(logDir, "123");

      assert.strictEqual(manager.currentLogFileName, `${BASEFILE_PREFIX}-123.log`);
    });

    it("should generate indexed names for rotated files only", function () {
      const manager = new RotatingLogManager(logDir, "123");

      assert.strictEqual(manager.rotatingFilenameGenerator(null), `${BASEFILE_PREFIX}-123.log`);
      assert.strictEqual(
        manager.rotatingFilenameGenerator(new Date(), 2),
        `${BASEFILE_PREFIX}-123.2.log`,
      );
    });

    it("should only remember the newest rotated files", function () {
      const manager = new RotatingLogManager(logDir, "123");
      for (let index = 1; index <= MAX_LOGFILES + 1; index++) {
        writeFileSync(join(logDir, `${BASEFILE_PREFIX}-123.${index}.log`), "");
        manager.rotatingFilenameGenerator(new Date(), index);
      }
      writeFileSync(join(logDir, `${BASEFILE_PREFIX}-123.log`), "");

      // MAX_LOGFILES is 3: the .1 file is forgotten
      assert.deepStrictEqual(manager.getFilePaths(), [
        join(logDir, `${BASEFILE_PREFIX}-123.log`),
        join(logDir, `${BASEFILE_PREFIX}-123.2.log`),
        join(logDir, `${BASEFILE_PREFIX}-123.3.log`),
        join(logDir, `${BASEFILE_PREFIX}-123.4.log`),
      ]);
    });

    it("should skip remembered files that don't exist", function () {
      const manager = new RotatingLogManager(logDir, "123");
      manager.rotatingFilenameGenerator(new Date(), 1);

      assert.deepStrictEqual(manager.getFilePaths(), []);
    });
  });

  describe("cleanupOldLogFiles()", function () {
    const now = new Date("2026-03-10T12:00:00Z");
    const fiveDaysAgo = new Date("2026-03-05T12:00:00Z");
    let logDir: string;

    beforeEach(function () {
      logDir = mkdtempSync(join(tmpdir(), "logging-cleanup-test-"));
    });

    afterEach(function () {
      rmSync(logDir, { recursive: true, force: true });
    });

    function writeLogFile(name: string, mtime: Date): string {
      const path = join(logDir, name);
      writeFileSync(path, "log line\n");
      utimesSync(path, mtime, mtime);
      return path;
    }

    it("should delete our log files older than three days", function () {
      const oldPath = writeLogFile(`${BASEFILE_PREFIX}-111.log`, fiveDaysAgo);
      const recentPath = writeLogFile(`${BASEFILE_PREFIX}-222.log`, now);

      const deleted = cleanupOldLogFiles(logDir, now);

      assert.deepStrictEqual(deleted, [`${BASEFILE_PREFIX}-111.log`]);
      assert.strictEqual(existsSync(oldPath), false);
      assert.strictEqual(existsSync(recentPath), true);
    });

    it("should leave files that aren't ours alone", function () {
      const foreignPath = writeLogFile("other-app.log", fiveDaysAgo);
      const notALogPath = writeLogFile(`${BASEFILE_PREFIX}-111.txt`, fiveDaysAgo);

      const deleted = cleanupOldLogFiles(logDir, now);

      assert.deepStrictEqual(deleted, []);
      assert.strictEqual(existsSync(foreignPath), true);
      assert.strictEqual(existsSync(notALogPath), true);
    });

    it("should return an empty list for an empty directory", function () {
      assert.deepStrictEqual(cleanupOldLogFiles(logDir, now), []);
    });
  });
});
