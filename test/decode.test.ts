/**
 * Session-level tests: entry points, error reporting and cleanup.
 */

import assert from "node:assert";
import { describe, it, before, after, mock } from "node:test";
import { join } from "node:path";
import {
  decodeBytes,
  decodeFile,
  decodeSource,
  DecodeError,
  FileSource,
  HANDLER_SET_REVISION,
  type TableHandlers,
} from "../index.ts";
import { encodeTables, expectedEvents, recordingHandlers, TableStreamWriter, type TableSpec, writeTempFile } from "./test_utils.ts";

const TABLES: TableSpec[] = [
  { kind: "basic", name: "Tally", columns: [{ type: "uint64", name: "Count" }], rows: [[42n]] },
  {
    kind: "keyval",
    name: "Cfg",
    entries: [
      { type: "string", name: "Version", value: "1.0" },
      { type: "bool", name: "Debug", value: true },
    ],
  },
];

function collectErrors(): { handlers: TableHandlers<DecodeError[]>; errors: DecodeError[] } {
  return {
    handlers: { revision: HANDLER_SET_REVISION, error: (ctx, _message, error) => ctx.push(error) },
    errors: [],
  };
}

describe("decodeFile", () => {
  let file: { path: string; cleanup: () => void };

  before(() => {
    file = writeTempFile(encodeTables(TABLES));
  });

  after(() => {
    file.cleanup();
  });

  it("decodes a file", () => {
    const events: string[] = [];
    assert.strictEqual(decodeFile(file.path, recordingHandlers(), events), true);
    assert.deepStrictEqual(events, expectedEvents(TABLES));
  });

  for (const readBufferSize of [0, 1, 5, 64]) {
    it(`matches in-memory decoding with readBufferSize=${readBufferSize}`, () => {
      const events: string[] = [];
      assert.strictEqual(decodeFile(file.path, recordingHandlers(), events, { readBufferSize }), true);
      assert.deepStrictEqual(events, expectedEvents(TABLES));
    });
  }

  it("reports a missing file as IoError", () => {
    const missing = join(file.path, "..", "missing.bfbin");
    const { handlers, errors } = collectErrors();
    assert.strictEqual(decodeFile(missing, handlers, errors), false);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].kind, "IoError");
    assert.match(errors[0].message, /^Failed to open .*missing\.bfbin \(ENOENT/);
  });

  it("reports a truncated file with the offset", () => {
    const bytes = encodeTables(TABLES);
    const short = writeTempFile(bytes.subarray(0, 30), "short.bfbin");
    try {
      const events: string[] = [];
      const messages: string[] = [];
      const handlers: TableHandlers<string[]> = {
        ...recordingHandlers(),
        error: (ctx, message, error) => {
          ctx.push(`error(${error.kind})`);
          messages.push(message);
        },
      };
      assert.strictEqual(decodeFile(short.path, handlers, events), false);
      assert.deepStrictEqual(events, [
        "table-begin(basic,Tally)",
        "column(uint64,Count)",
        "columns-end",
        "row-begin",
        "error(TruncatedInput)",
      ]);
      assert.deepStrictEqual(messages, [
        `Failed to read 8 bytes from ${short.path} at position 25 (unexpected end of file)`,
      ]);
    } finally {
      short.cleanup();
    }
  });
});

describe("decodeBytes", () => {
  it("names in-memory input in messages", () => {
    const { handlers, errors } = collectErrors();
    decodeBytes(new Uint8Array([0x42, 0x59, 0x46]), handlers, errors, { name: "capture" });
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].kind, "MalformedHeader");
    assert.strictEqual(
      errors[0].message,
      "Failed to read the file header from capture (Failed to read 7 bytes from capture at position 0 (unexpected end of input))",
    );
  });
});

describe("header validation", () => {
  it("rejects a wrong marker", () => {
    const bytes = new TableStreamWriter().write(new TextEncoder().encode("NOTBFBN")).writeEnd().finish();
    const { handlers, errors } = collectErrors();
    assert.strictEqual(decodeBytes(bytes, handlers, errors), false);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].kind, "MalformedHeader");
    assert.strictEqual(errors[0].message, "<buffer> does not appear to be a binary table stream");
  });

  it("rejects empty input", () => {
    const { handlers, errors } = collectErrors();
    assert.strictEqual(decodeBytes(new Uint8Array(0), handlers, errors), false);
    assert.deepStrictEqual(errors.map((e) => e.kind), ["MalformedHeader"]);
  });

  it("requires the stream terminator", () => {
    const bytes = new TableStreamWriter().writeMagic().finish();
    const { handlers, errors } = collectErrors();
    assert.strictEqual(decodeBytes(bytes, handlers, errors), false);
    assert.deepStrictEqual(errors.map((e) => e.kind), ["TruncatedInput"]);
  });
});

describe("unknown type tags", () => {
  it("rejects an unknown table type before reading its name", () => {
    const bytes = new TableStreamWriter().writeMagic().writeU8(9).finish();
    const { handlers, errors } = collectErrors();
    assert.strictEqual(decodeBytes(bytes, handlers, errors), false);
    assert.strictEqual(errors[0].kind, "InternalInconsistency");
    assert.strictEqual(errors[0].message, "Unrecognized table type 9 in <buffer> at position 7");
    assert.strictEqual(errors[0].offset, 7);
  });

  it("rejects an unknown column type", () => {
    const bytes = new TableStreamWriter().writeMagic().writeU8(1).writeString("T").writeU8(7).finish();
    const events: string[] = [];
    const messages: string[] = [];
    const handlers: TableHandlers<string[]> = {
      ...recordingHandlers(),
      error: (ctx, message, error) => {
        ctx.push(`error(${error.kind})`);
        messages.push(message);
      },
    };
    assert.strictEqual(decodeBytes(bytes, handlers, events), false);
    assert.deepStrictEqual(events, ["table-begin(basic,T)", "error(InternalInconsistency)"]);
    assert.deepStrictEqual(messages, ["Unrecognized column type 7 in <buffer> at position 11"]);
  });

  it("rejects an unknown row marker", () => {
    const bytes = new TableStreamWriter().writeMagic().writeU8(1).writeString("T").writeU8(0).writeU8(5).finish();
    const events: string[] = [];
    assert.strictEqual(decodeBytes(bytes, recordingHandlers(), events), false);
    assert.deepStrictEqual(events, ["table-begin(basic,T)", "columns-end", "error(InternalInconsistency)"]);
  });

  it("rejects an unknown key type", () => {
    const bytes = new TableStreamWriter().writeMagic().writeU8(2).writeString("K").writeU8(4).finish();
    const events: string[] = [];
    assert.strictEqual(decodeBytes(bytes, recordingHandlers(), events), false);
    assert.deepStrictEqual(events, ["table-begin(keyval,K)", "error(InternalInconsistency)"]);
  });
});

describe("decodeBytes options", () => {
  it("treats options passed as undefined like omitted ones", () => {
    const { handlers, errors } = collectErrors();
    const bytes = encodeTables([]).subarray(0, 7);
    const options = { debug: undefined, readBufferSize: undefined, name: undefined };
    assert.strictEqual(decodeBytes(bytes, handlers, errors, options), false);
    assert.deepStrictEqual(
      errors.map((e) => e.message),
      ["Failed to read 1 bytes from <buffer> at position 7 (unexpected end of input)"],
    );
  });
});

describe("decodeSource", () => {
  it("closes a caller-opened file after a full decode", () => {
    const written = writeTempFile(encodeTables(TABLES));
    try {
      const source = FileSource.open(written.path);
      const events: string[] = [];
      assert.strictEqual(decodeSource(source, recordingHandlers(), events), true);
      assert.deepStrictEqual(events, expectedEvents(TABLES));
      assert.strictEqual(source.isOpen, false);
    } finally {
      written.cleanup();
    }
  });
});

describe("handler set revision", () => {
  it("accepts a class-based handler set with its own fields", () => {
    class Totals implements TableHandlers<null> {
      readonly revision = HANDLER_SET_REVISION;
      sum = 0n;
      rows = 0;
      dataUint64(_ctx: null, value: bigint) {
        this.sum += value;
      }
      rowEnd() {
        this.rows++;
      }
    }
    const totals = new Totals();
    assert.strictEqual(decodeBytes(encodeTables(TABLES), totals, null), true);
    assert.strictEqual(totals.sum, 42n);
    assert.strictEqual(totals.rows, 1);
  });

  it("refuses a mismatched handler set without decoding", () => {
    const events: string[] = [];
    const handlers: TableHandlers<string[]> = { ...recordingHandlers(), revision: HANDLER_SET_REVISION + 1 };
    assert.strictEqual(decodeBytes(encodeTables(TABLES), handlers, events), false);
    assert.deepStrictEqual(events, ["error(HandlerSetMismatch)"]);
  });

  it("does not open the file on mismatch", () => {
    const { handlers, errors } = collectErrors();
    const stale = { ...handlers, revision: 0 };
    assert.strictEqual(decodeFile("/nonexistent/never-opened.bfbin", stale, errors), false);
    assert.deepStrictEqual(errors.map((e) => e.kind), ["HandlerSetMismatch"]);
  });

  it("declines silently without an error handler", () => {
    const tableBasic = mock.fn();
    const handlers = { revision: 0, tableBasic };
    assert.strictEqual(decodeBytes(encodeTables(TABLES), handlers, null), false);
    assert.strictEqual(tableBasic.mock.callCount(), 0);
  });
});

describe("error reporting", () => {
  it("reports each failure exactly once", () => {
    const bytes = encodeTables(TABLES).subarray(0, 40);
    const error = mock.fn();
    decodeBytes(bytes, { revision: HANDLER_SET_REVISION, error }, undefined);
    assert.strictEqual(error.mock.callCount(), 1);
  });

  it("swallows errors when no error handler is registered", () => {
    const bytes = encodeTables(TABLES).subarray(0, 12);
    assert.strictEqual(decodeBytes(bytes, { revision: HANDLER_SET_REVISION }, undefined), false);
  });

  it("propagates exceptions thrown by handlers", () => {
    const written = writeTempFile(encodeTables(TABLES));
    try {
      const error = mock.fn();
      const handlers: TableHandlers<undefined> = {
        revision: HANDLER_SET_REVISION,
        dataUint64: () => {
          throw new Error("boom");
        },
        error,
      };
      assert.throws(() => decodeFile(written.path, handlers, undefined), /boom/);
      assert.strictEqual(error.mock.callCount(), 0);
    } finally {
      written.cleanup();
    }
  });

  it("closes the source when a handler throws", () => {
    const written = writeTempFile(encodeTables(TABLES));
    try {
      const source = FileSource.open(written.path, { readBufferSize: 16 });
      const handlers: TableHandlers<undefined> = {
        revision: HANDLER_SET_REVISION,
        tableKeyValue: () => {
          throw new Error("boom");
        },
      };
      assert.throws(() => decodeSource(source, handlers, undefined), /boom/);
      assert.strictEqual(source.isOpen, false);
    } finally {
      written.cleanup();
    }
  });

  it("logs through the debug option", () => {
    const log = mock.method(console, "log", () => {});
    try {
      decodeBytes(encodeTables([]), { revision: HANDLER_SET_REVISION }, undefined, { debug: true });
      const lines = log.mock.calls.map((call) => call.arguments.join(" "));
      assert.deepStrictEqual(lines, ["[bfbin] Opened <buffer>", "[bfbin] Decoded 0 table(s) from <buffer> (8 bytes)"]);
    } finally {
      log.mock.restore();
    }
  });

  it("stays quiet without the debug option", () => {
    const log = mock.method(console, "log", () => {});
    try {
      decodeBytes(new Uint8Array(0), { revision: HANDLER_SET_REVISION }, undefined);
      assert.strictEqual(log.mock.callCount(), 0);
    } finally {
      log.mock.restore();
    }
  });
});
