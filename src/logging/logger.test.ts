/**
 * Logger tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import { createLogger, errorContext, formatLogEntry, generateRunId } from "./index.js";

const tempDir = mkdtempSync(join(tmpdir(), "advisor-logger-"));

after(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe("formatLogEntry", () => {
  const now = new Date("2024-03-05T10:20:30.000Z");

  test("includes timestamp, padded level, run id, scope and context", () => {
    const entry = formatLogEntry(
      "info",
      "Topics extracted",
      { runId: "20240305-abcdef", scope: "extractor" },
      { count: 2 },
      now
    );
    assert.equal(
      entry,
      '[2024-03-05T10:20:30.000Z] [INFO ] [20240305-abcdef] [extractor] Topics extracted {"count":2}'
    );
  });

  test("omits empty context and missing scope", () => {
    const entry = formatLogEntry("warn", "Careful", { runId: "r1" }, {}, now);
    assert.equal(entry, "[2024-03-05T10:20:30.000Z] [WARN ] [r1] Careful");
  });
});

describe("createLogger", () => {
  test("writes entries at or above the level to the log file", () => {
    const logger = createLogger({
      level: "warn",
      logDir: tempDir,
      logFile: "levels.log",
      console: false,
    });

    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");

    const lines = readFileSync(join(tempDir, "levels.log"), "utf-8").trim().split("\n");
    assert.equal(lines.length, 2);
    assert.ok(lines[0]?.endsWith(" shown"));
    assert.ok(lines[1]?.endsWith(" also shown"));
  });

  test("child loggers join scopes and carry their run id", () => {
    const logger = createLogger({
      logDir: tempDir,
      logFile: "child.log",
      console: false,
    });

    logger.child({ scope: "pipeline", runId: "run-42" }).child({ scope: "assembler" }).info("hello");

    const line = readFileSync(join(tempDir, "child.log"), "utf-8").trim();
    assert.ok(line.includes("[run-42] [pipeline.assembler] hello"), line);
  });

  test("file output disabled creates no directory", () => {
    const dir = join(tempDir, "never-created");
    const logger = createLogger({ logDir: dir, console: false, file: false });
    logger.error("dropped");
    assert.equal(existsSync(dir), false);
  });
});

describe("helpers", () => {
  test("generateRunId uses the date prefix", () => {
    const id = generateRunId(new Date("2024-01-15T08:00:00.000Z"));
    assert.match(id, /^20240115-[0-9a-f]{6}$/);
  });

  test("errorContext handles errors and other values", () => {
    assert.deepEqual(errorContext(new RangeError("bad")), { error: "RangeError", message: "bad" });
    assert.deepEqual(errorContext("boom"), { error: "boom" });
  });
});
