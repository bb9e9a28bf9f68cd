/**
 * Unit fuzz tests for the table stream decoder.
 * Generates random tables with a seeded PRNG, encodes them with the
 * reference writer and checks the decoded events, in memory and from disk.
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { decodeBytes, decodeFile } from "../index.ts";
import {
  encodeTables,
  expectedEvents,
  recordingHandlers,
  type ColumnSpec,
  type TableSpec,
  type Value,
  type ValueTypeName,
  writeTempFile,
} from "../test/test_utils.ts";
import { config, logConfig, logFuzzError } from "./config.ts";

logConfig();

/** mulberry32 */
function prng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("Table Stream Unit Fuzz Tests", { timeout: 60000 }, () => {
  function generator(seed: number) {
    const random = prng(seed);
    const randomInt = (min: number, max: number) => Math.floor(random() * (max - min + 1)) + min;
    const randomString = (maxLen = 40) => {
      const len = randomInt(0, maxLen);
      const chars = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 _./:-";
      return Array.from({ length: len }, () => chars[randomInt(0, chars.length - 1)]).join("");
    };
    const randomUint64 = () => {
      const hi = BigInt(randomInt(0, 0xffffffff));
      const lo = BigInt(randomInt(0, 0xffffffff));
      return (hi << 32n) | lo;
    };
    const types: ValueTypeName[] = ["uint64", "string", "bool"];
    const randomValue = (type: ValueTypeName): Value => {
      switch (type) {
        case "uint64":
          return randomUint64();
        case "string":
          return randomString();
        case "bool":
          return random() < 0.5;
      }
    };
    const randomColumns = (): ColumnSpec[] =>
      Array.from({ length: randomInt(0, config.maxColumns) }, () => ({
        type: types[randomInt(0, types.length - 1)],
        name: randomString(16),
      }));

    const randomTable = (): TableSpec => {
      const name = randomString(24);
      if (random() < 0.3) {
        return {
          kind: "keyval",
          name,
          entries: randomColumns().map((col) => ({ ...col, value: randomValue(col.type) })),
        };
      }
      const columns = randomColumns();
      const rows = Array.from({ length: randomInt(0, config.maxRows) }, () =>
        columns.map((col) => randomValue(col.type)),
      );
      return { kind: "basic", name, columns, rows };
    };

    return {
      randomInt,
      tables: () => Array.from({ length: randomInt(0, config.maxTables) }, randomTable),
    };
  }

  it("round-trips random streams in memory", () => {
    for (let i = 0; i < config.iterations; i++) {
      const seed = 0x5eed + i;
      const tables = generator(seed).tables();
      const bytes = encodeTables(tables);
      try {
        const events: string[] = [];
        assert.strictEqual(decodeBytes(bytes, recordingHandlers(), events), true);
        assert.deepStrictEqual(events, expectedEvents(tables));
      } catch (err) {
        logFuzzError({ iteration: i, totalIterations: config.iterations, seed, bytes: bytes.length }, err);
        throw err;
      }
    }
  });

  it("round-trips random streams from disk with random read buffers", () => {
    const iterations = Math.max(1, Math.floor(config.iterations / 5));
    for (let i = 0; i < iterations; i++) {
      const seed = 0xf11e + i;
      const gen = generator(seed);
      const tables = gen.tables();
      const bytes = encodeTables(tables);
      const readBufferSize = gen.randomInt(0, 64);
      const file = writeTempFile(bytes);
      try {
        const events: string[] = [];
        assert.strictEqual(decodeFile(file.path, recordingHandlers(), events, { readBufferSize }), true);
        assert.deepStrictEqual(events, expectedEvents(tables));
      } catch (err) {
        logFuzzError({ iteration: i, totalIterations: iterations, seed, bytes: bytes.length, readBufferSize }, err);
        throw err;
      } finally {
        file.cleanup();
      }
    }
  });

  it("reports exactly one error for random truncations", () => {
    for (let i = 0; i < config.iterations; i++) {
      const seed = 0xc0de + i;
      const gen = generator(seed);
      const bytes = encodeTables(gen.tables());
      const cut = gen.randomInt(0, bytes.length - 1);
      try {
        const events: string[] = [];
        assert.strictEqual(decodeBytes(bytes.subarray(0, cut), recordingHandlers(), events), false);
        const errors = events.filter((e) => e.startsWith("error("));
        assert.strictEqual(errors.length, 1);
        assert.ok(errors[0] === "error(TruncatedInput)" || errors[0] === "error(MalformedHeader)");
      } catch (err) {
        logFuzzError({ iteration: i, totalIterations: config.iterations, seed, bytes: cut }, err);
        throw err;
      }
    }
  });
});
