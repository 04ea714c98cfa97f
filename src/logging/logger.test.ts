/**
 * Tests for the logger.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { createLogger, formatLogEntry, isLogLevel, type LogLevel } from "./logger.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void) {
  try {
    fn();
    passed++;
    console.log(`  PASS: ${name}`);
  } catch (err) {
    failed++;
    console.error(`  FAIL: ${name}`);
    console.error(`    ${(err as Error).message}`);
  }
}

function capture(level: LogLevel, scope: string) {
  const entries: { entry: string; level: LogLevel }[] = [];
  const logger = createLogger({
    level,
    scope,
    console: false,
    sink: (entry, entryLevel) => entries.push({ entry, level: entryLevel }),
  });
  return { logger, entries };
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

test("formats entries with timestamp, level, scope, and context", () => {
  const entry = formatLogEntry(
    "info",
    "cli",
    "Rendered blocks",
    { selection: "all" },
    new Date("2026-01-02T03:04:05.000Z")
  );
  assert.equal(
    entry,
    '[2026-01-02T03:04:05.000Z] [INFO ] [cli] Rendered blocks {"selection":"all"}'
  );
});

test("omits empty context", () => {
  const entry = formatLogEntry("warn", "loader", "Skipped", {}, new Date(0));
  assert.equal(entry, "[1970-01-01T00:00:00.000Z] [WARN ] [loader] Skipped");
});

test("filters entries below the minimum level", () => {
  const { logger, entries } = capture("warn", "test");
  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown");
  logger.error("shown too");
  assert.deepEqual(
    entries.map((e) => e.level),
    ["warn", "error"]
  );
});

test("nests the scope of child loggers", () => {
  const { logger, entries } = capture("debug", "blocks");
  logger.child("method").debug("Rejected method options");
  assert.equal(entries.length, 1);
  assert.ok(entries[0].entry.includes("[blocks:method] Rejected method options"));
});

test("recognizes log levels", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("verbose"), false);
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
