/**
 * Tests for the stderr logger
 */

import { test } from "node:test";
import assert from "node:assert";
import { createLogger } from "../src/logger.js";

test("createLogger - defaults to warn", () => {
  assert.strictEqual(createLogger().level, "warn");
});

test("createLogger - honours the requested level", () => {
  assert.strictEqual(createLogger("debug").level, "debug");
  const logger = createLogger("silent");
  assert.strictEqual(logger.level, "silent");
  assert.strictEqual(logger.isLevelEnabled("error"), false);
});
