/**
 * Tests for table files, codec construction and environment settings
 */

import { after, test } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createCodec, loadTableConfig, parseTableConfig } from "../src/config.js";
import { loadEnv } from "../src/env.js";
import { ConfigError } from "../src/errors.js";
import { WordCodec } from "../src/word-codec.js";

const scratch = mkdtempSync(join(tmpdir(), "lexicode-config-"));

after(() => {
  rmSync(scratch, { recursive: true, force: true });
});

const tinyTable = {
  bitWidth: 2,
  symbols: { "0": "n", "1": "o", "2": "p", "3": "q" },
  pad: { index: 4, token: "_" },
};

// ============================================================================
// table files
// ============================================================================

test("loadTableConfig - bundled default table", () => {
  const config = loadTableConfig();
  assert.strictEqual(config.bitWidth, 6);
  assert.strictEqual(Object.keys(config.symbols).length, 64);
  assert.deepStrictEqual(config.pad, { index: 65, token: "的" });
  assert.deepStrictEqual(config.envelope, { prefix: "啊啊啊啊啊啊宝宝你是一个", suffix: "的小蛋糕" });
});

test("loadTableConfig - reads a table from a path", () => {
  const path = join(scratch, "tiny.json");
  writeFileSync(path, JSON.stringify(tinyTable));
  const config = loadTableConfig(path);
  assert.strictEqual(config.bitWidth, 2);
  assert.strictEqual(config.envelope, undefined);
});

test("loadTableConfig - missing file", () => {
  const path = join(scratch, "missing.json");
  assert.throws(() => loadTableConfig(path), {
    name: "ConfigError",
    kind: "config",
    message: `cannot read table file ${path}`,
  });
});

test("loadTableConfig - malformed JSON", () => {
  const path = join(scratch, "broken.json");
  writeFileSync(path, "{ not json");
  assert.throws(() => loadTableConfig(path), {
    name: "ConfigError",
    message: `table file ${path} is not valid JSON`,
  });
});

test("parseTableConfig - bitWidth defaults to 6", () => {
  const config = parseTableConfig({ symbols: {}, pad: { index: 64, token: "p" } });
  assert.strictEqual(config.bitWidth, 6);
});

test("parseTableConfig - reports schema violations", () => {
  assert.throws(
    () => parseTableConfig({ pad: { index: 64, token: "p" } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.strictEqual(error.message, "invalid table config: symbols: Required");
      return true;
    }
  );
  assert.throws(() => parseTableConfig({ symbols: {}, pad: { index: -1, token: "p" } }), {
    name: "ConfigError",
  });
  assert.throws(() => parseTableConfig("table"), { name: "ConfigError" });
});

// ============================================================================
// createCodec
// ============================================================================

test("createCodec - without an envelope returns the word codec", () => {
  const codec = createCodec(parseTableConfig(tinyTable));
  assert.ok(codec instanceof WordCodec);
  // 0x41 = 01 00 00 01 -> o _ _ o
  assert.strictEqual(codec.encode("A"), "o__o");
  assert.strictEqual(codec.decode("o__o"), "A");
});

test("createCodec - envelope can be disabled", () => {
  const codec = createCodec(loadTableConfig(), { envelope: false });
  assert.ok(codec instanceof WordCodec);
  assert.strictEqual(codec.encode("A"), "香蕉香蕉");
});

test("createCodec - bit width override", () => {
  const codec = createCodec(loadTableConfig(), { envelope: false, bitWidth: 3 });
  assert.ok(codec instanceof WordCodec);
  assert.strictEqual(codec.bitWidth, 3);
  assert.strictEqual(codec.encode("A"), "甜甜的甜甜");
});

test("createCodec - table errors surface as ConfigError", () => {
  const config = parseTableConfig({ ...tinyTable, pad: { index: 3, token: "_" } });
  assert.throws(() => createCodec(config), { name: "ConfigError", field: "pad" });
});

// ============================================================================
// environment
// ============================================================================

test("loadEnv - defaults", () => {
  const env = loadEnv({});
  assert.strictEqual(env.LEXICODE_TABLE, undefined);
  assert.strictEqual(env.LEXICODE_BIT_WIDTH, undefined);
  assert.strictEqual(env.LEXICODE_LOG_LEVEL, "warn");
});

test("loadEnv - parses set variables", () => {
  const env = loadEnv({
    LEXICODE_TABLE: "/etc/lexicode/table.json",
    LEXICODE_BIT_WIDTH: "5",
    LEXICODE_LOG_LEVEL: "debug",
  });
  assert.strictEqual(env.LEXICODE_TABLE, "/etc/lexicode/table.json");
  assert.strictEqual(env.LEXICODE_BIT_WIDTH, 5);
  assert.strictEqual(env.LEXICODE_LOG_LEVEL, "debug");
});

test("loadEnv - empty strings count as unset", () => {
  const env = loadEnv({ LEXICODE_TABLE: "", LEXICODE_BIT_WIDTH: "" });
  assert.strictEqual(env.LEXICODE_TABLE, undefined);
  assert.strictEqual(env.LEXICODE_BIT_WIDTH, undefined);
});

test("loadEnv - rejects invalid values", () => {
  assert.throws(() => loadEnv({ LEXICODE_LOG_LEVEL: "loud" }), {
    name: "ConfigError",
    field: "LEXICODE_LOG_LEVEL",
  });
  for (const width of ["20", "0x4", "1e1"]) {
    assert.throws(() => loadEnv({ LEXICODE_BIT_WIDTH: width }), {
      name: "ConfigError",
      field: "LEXICODE_BIT_WIDTH",
    });
  }
});
