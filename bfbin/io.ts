/**
 * Big-endian scalar and length-prefixed string decoding.
 */

import { DecodeError, systemErrorText } from "./errors.ts";
import type { ByteSource } from "./source.ts";

// Keep a leading U+FEFF: it is part of the value, not a marker.
export const TEXT_DECODER = new TextDecoder("utf-8", { ignoreBOM: true });

export type UintWidth = 1 | 2 | 4 | 8;

/**
 * Growable byte buffer reused across string reads. Only ensureCapacity()
 * reallocates.
 */
export class ScratchBuffer {
  private bytes: Uint8Array;

  constructor(initialSize = 64) {
    this.bytes = new Uint8Array(initialSize);
  }

  get capacity(): number {
    return this.bytes.length;
  }

  /** Returns a region of exactly `length` bytes, growing if needed. */
  ensureCapacity(length: number): Uint8Array {
    if (length > this.bytes.length) {
      const newSize = Math.max(this.bytes.length * 2, length);
      try {
        this.bytes = new Uint8Array(newSize);
      } catch (err) {
        throw new DecodeError("AllocationFailure", `Failed to allocate ${newSize} bytes of memory (${systemErrorText(err)})`, {
          cause: err,
        });
      }
    }
    return this.bytes.subarray(0, length);
  }
}

export class ValueReader {
  readonly source: ByteSource;
  readonly scratch: ScratchBuffer;
  private word = new Uint8Array(8);
  private view = new DataView(this.word.buffer);

  constructor(source: ByteSource, scratch = new ScratchBuffer()) {
    this.source = source;
    this.scratch = scratch;
  }

  get position(): number {
    return this.source.position;
  }

  readUint(width: UintWidth): bigint {
    this.source.readInto(this.word, width);
    let result = 0n;
    for (let i = 0; i < width; i++) {
      result = (result << 8n) | BigInt(this.word[i]);
    }
    return result;
  }

  readU8(): number {
    this.source.readInto(this.word, 1);
    return this.word[0];
  }

  readU16(): number {
    this.source.readInto(this.word, 2);
    return this.view.getUint16(0, false);
  }

  readU64(): bigint {
    this.source.readInto(this.word, 8);
    return this.view.getBigUint64(0, false);
  }

  /** Raw byte; any nonzero value means true. */
  readBool(): number {
    return this.readU8();
  }

  /**
   * u16 length followed by that many bytes. The result aliases the scratch
   * buffer and is overwritten by the next readString().
   */
  readString(): Uint8Array {
    const length = this.readU16();
    const target = this.scratch.ensureCapacity(length);
    this.source.readInto(target, length);
    return target;
  }

  readText(): string {
    return TEXT_DECODER.decode(this.readString());
  }
}
