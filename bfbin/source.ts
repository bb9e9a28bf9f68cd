/**
 * Sequential, forward-only byte sources for the decoder.
 */

import { closeSync, openSync, readSync } from "node:fs";
import { READ_BUFFER_SIZE } from "./constants.ts";
import { DecodeError, systemErrorText } from "./errors.ts";

export interface ByteSource {
  /** Resource name used in error messages */
  readonly name: string;
  /** Number of bytes consumed so far */
  readonly position: number;
  /** Fill target[0, length) or throw TruncatedInput. */
  readInto(target: Uint8Array, length: number): void;
  close(): void;
}

export interface FileSourceOptions {
  /** Chunk size for buffered reads. 0 disables buffering. */
  readBufferSize?: number;
}

function allocateChunk(size: number): Uint8Array | null {
  const length = Math.floor(size);
  // Also rejects NaN: a zero-length chunk would never fill.
  if (!(length >= 1)) return null;
  try {
    return new Uint8Array(length);
  } catch (err) {
    // Buffering is an optimization only; fall back to direct reads.
    if (err instanceof RangeError) return null;
    throw err;
  }
}

/**
 * Reads a file front to back through a large chunk buffer so most reads
 * are served without a system call.
 */
export class FileSource implements ByteSource {
  readonly name: string;
  private fd: number | null;
  private chunk: Uint8Array | null;
  private chunkOffset = 0;
  private chunkLength = 0;
  private consumed = 0;

  private constructor(name: string, fd: number, chunk: Uint8Array | null) {
    this.name = name;
    this.fd = fd;
    this.chunk = chunk;
  }

  static open(path: string, options: FileSourceOptions = {}): FileSource {
    let fd: number;
    try {
      fd = openSync(path, "r");
    } catch (err) {
      throw new DecodeError("IoError", `Failed to open ${path} (${systemErrorText(err)})`, { cause: err });
    }
    return new FileSource(path, fd, allocateChunk(options.readBufferSize ?? READ_BUFFER_SIZE));
  }

  get position(): number {
    return this.consumed;
  }

  /** False when the chunk buffer could not be allocated */
  get buffered(): boolean {
    return this.chunk !== null;
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  readInto(target: Uint8Array, length: number): void {
    let filled = 0;
    while (filled < length) {
      if (this.chunk === null) {
        const n = this.readFile(target, filled, length - filled, length);
        if (n === 0) throw this.truncated(length, "unexpected end of file");
        filled += n;
        continue;
      }
      if (this.chunkOffset === this.chunkLength) {
        this.chunkLength = this.readFile(this.chunk, 0, this.chunk.length, length);
        this.chunkOffset = 0;
        if (this.chunkLength === 0) throw this.truncated(length, "unexpected end of file");
      }
      const take = Math.min(length - filled, this.chunkLength - this.chunkOffset);
      target.set(this.chunk.subarray(this.chunkOffset, this.chunkOffset + take), filled);
      this.chunkOffset += take;
      filled += take;
    }
    this.consumed += length;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    this.chunk = null;
    try {
      closeSync(fd);
    } catch (err) {
      throw new DecodeError("IoError", `Failed to close ${this.name} (${systemErrorText(err)})`, { cause: err });
    }
  }

  private readFile(buffer: Uint8Array, offset: number, length: number, requested: number): number {
    if (this.fd === null) {
      throw new DecodeError("IoError", `Read from ${this.name} after close`, { offset: this.consumed });
    }
    try {
      return readSync(this.fd, buffer, offset, length, null);
    } catch (err) {
      throw this.truncated(requested, systemErrorText(err), err);
    }
  }

  private truncated(length: number, reason: string, cause?: unknown): DecodeError {
    return new DecodeError(
      "TruncatedInput",
      `Failed to read ${length} bytes from ${this.name} at position ${this.consumed} (${reason})`,
      { offset: this.consumed, cause },
    );
  }
}

/**
 * The same contract over bytes already in memory.
 */
export class BufferSource implements ByteSource {
  readonly name: string;
  private bytes: Uint8Array;
  private offset = 0;

  constructor(bytes: Uint8Array, name = "<buffer>") {
    this.bytes = bytes;
    this.name = name;
  }

  get position(): number {
    return this.offset;
  }

  readInto(target: Uint8Array, length: number): void {
    if (this.offset + length > this.bytes.length) {
      throw new DecodeError(
        "TruncatedInput",
        `Failed to read ${length} bytes from ${this.name} at position ${this.offset} (unexpected end of input)`,
        { offset: this.offset },
      );
    }
    target.set(this.bytes.subarray(this.offset, this.offset + length));
    this.offset += length;
  }

  close(): void {}
}
