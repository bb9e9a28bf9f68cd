/**
 * Decode entry points. Each call owns its source, scratch buffer and walker;
 * nothing is shared between calls.
 */

import { MAGIC, READ_BUFFER_SIZE } from "./constants.ts";
import { DecodeError } from "./errors.ts";
import { type TableHandlers, validateHandlers } from "./handlers.ts";
import { ValueReader } from "./io.ts";
import { BufferSource, type ByteSource, FileSource } from "./source.ts";
import { TableWalker } from "./walker.ts";

export interface DecoderOptions {
  /** Log progress to the console */
  debug?: boolean;
  /** Chunk size for buffered file reads (default: 10MB). 0 reads unbuffered. */
  readBufferSize?: number;
  /** Display name for in-memory input (default: "<buffer>") */
  name?: string;
}

type ResolvedOptions = Required<DecoderOptions>;

function resolveOptions(options: DecoderOptions): ResolvedOptions {
  return {
    debug: options.debug ?? false,
    readBufferSize: options.readBufferSize ?? READ_BUFFER_SIZE,
    name: options.name ?? "<buffer>",
  };
}

class DecodeSession<C> {
  private handlers: TableHandlers<C>;
  private ctx: C;
  private options: ResolvedOptions;

  constructor(handlers: TableHandlers<C>, ctx: C, options: ResolvedOptions) {
    this.handlers = handlers;
    this.ctx = ctx;
    this.options = options;
  }

  private log(...args: unknown[]) {
    if (this.options.debug) {
      console.log("[bfbin]", ...args);
    }
  }

  /**
   * Run a full decode. Every DecodeError raised while opening, reading or
   * walking lands here and is reported exactly once.
   */
  run(openSource: () => ByteSource): boolean {
    const mismatch = validateHandlers(this.handlers);
    if (mismatch) {
      this.report(mismatch);
      return false;
    }

    let source: ByteSource | null = null;
    try {
      source = openSource();
      this.log(`Opened ${source.name}`);
      if (source instanceof FileSource && !source.buffered) {
        this.log(`Read buffer unavailable for ${source.name}, reading unbuffered`);
      }
      const reader = new ValueReader(source);
      this.checkMagic(reader);

      const walker = new TableWalker(reader, this.handlers, this.ctx);
      let tables = 0;
      while (walker.decodeTable()) tables++;
      this.log(`Decoded ${tables} table(s) from ${source.name} (${source.position} bytes)`);

      const closing = source;
      source = null;
      closing.close();
      return true;
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.report(err);
      return false;
    } finally {
      if (source !== null) this.closeAfterFailure(source);
    }
  }

  private checkMagic(reader: ValueReader): void {
    const { source } = reader;
    const header = new Uint8Array(MAGIC.length);
    try {
      source.readInto(header, MAGIC.length);
    } catch (err) {
      if (!(err instanceof DecodeError) || err.kind !== "TruncatedInput") throw err;
      throw new DecodeError("MalformedHeader", `Failed to read the file header from ${source.name} (${err.message})`, {
        offset: err.offset,
        cause: err,
      });
    }
    if (!header.every((byte, i) => byte === MAGIC[i])) {
      throw new DecodeError("MalformedHeader", `${source.name} does not appear to be a binary table stream`, {
        offset: 0,
      });
    }
  }

  private closeAfterFailure(source: ByteSource): void {
    try {
      source.close();
    } catch (err) {
      // Only the first failure is reported.
      this.log(`Ignoring close failure for ${source.name}:`, err);
    }
  }

  private report(error: DecodeError): void {
    this.log(`${error.kind}: ${error.message}`);
    if (typeof this.handlers.error === "function") {
      this.handlers.error(this.ctx, error.message, error);
    }
  }
}

/**
 * Decode the file at `path`, reporting events to `handlers`. Returns true when
 * the whole stream was consumed; on failure the error handler (if any) has
 * been called once.
 */
export function decodeFile<C>(
  path: string,
  handlers: TableHandlers<C>,
  ctx: C,
  options: DecoderOptions = {},
): boolean {
  const resolved = resolveOptions(options);
  return new DecodeSession(handlers, ctx, resolved).run(() =>
    FileSource.open(path, { readBufferSize: resolved.readBufferSize }),
  );
}

/** Decode a stream already held in memory. */
export function decodeBytes<C>(
  bytes: Uint8Array,
  handlers: TableHandlers<C>,
  ctx: C,
  options: DecoderOptions = {},
): boolean {
  const resolved = resolveOptions(options);
  return new DecodeSession(handlers, ctx, resolved).run(() => new BufferSource(bytes, resolved.name));
}

/**
 * Decode from a source the caller opened. Once decoding starts the source is
 * closed before this returns or throws; a mismatched handler set is reported
 * without touching it.
 */
export function decodeSource<C>(
  source: ByteSource,
  handlers: TableHandlers<C>,
  ctx: C,
  options: DecoderOptions = {},
): boolean {
  return new DecodeSession(handlers, ctx, resolveOptions(options)).run(() => source);
}
