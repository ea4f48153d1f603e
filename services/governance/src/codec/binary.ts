/**
 * Fixed-size binary reader/writer
 *
 * Records are pre-allocated at their maximum size: strings are length-prefixed
 * and zero-padded to their limit, absent optionals still occupy their width.
 */

import * as crypto from "crypto";
import { I64_MAX, I64_MIN, U64_MAX } from "@sealvote/shared";
import { CorruptRecordError, ValidationError } from "../errors/index.js";
import { bytesToHex, hexToBytes32 } from "../commitment/index.js";

export const HEADER_BYTES = 8;

/** First 8 bytes of sha256("account:<RecordName>") */
export function recordHeader(recordName: string): Buffer {
  return crypto
    .createHash("sha256")
    .update(`account:${recordName}`)
    .digest()
    .subarray(0, HEADER_BYTES);
}

export class BinaryWriter {
  private readonly buffer: Buffer;
  private offset = 0;

  constructor(
    private readonly recordName: string,
    size: number
  ) {
    this.buffer = Buffer.alloc(size);
    recordHeader(recordName).copy(this.buffer, 0);
    this.offset = HEADER_BYTES;
  }

  u8(value: number): this {
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
    return this;
  }

  bool(value: boolean): this {
    return this.u8(value ? 1 : 0);
  }

  u64(value: bigint): this {
    if (value < 0n || value > U64_MAX) {
      throw new ValidationError("OUT_OF_RANGE", `${this.recordName}: u64 field out of range`);
    }
    this.buffer.writeBigUInt64LE(value, this.offset);
    this.offset += 8;
    return this;
  }

  i64(value: number): this {
    const big = BigInt(value);
    if (big < I64_MIN || big > I64_MAX) {
      throw new ValidationError("OUT_OF_RANGE", `${this.recordName}: i64 field out of range`);
    }
    this.buffer.writeBigInt64LE(big, this.offset);
    this.offset += 8;
    return this;
  }

  bytes32(hex: string): this {
    hexToBytes32(hex, this.recordName).copy(this.buffer, this.offset);
    this.offset += 32;
    return this;
  }

  raw(bytes: Uint8Array, width: number): this {
    if (bytes.length !== width) {
      throw new ValidationError("OUT_OF_RANGE", `${this.recordName}: expected ${width} raw bytes`);
    }
    Buffer.from(bytes).copy(this.buffer, this.offset);
    this.offset += width;
    return this;
  }

  /** u32 byte length, then UTF-8 bytes padded to maxBytes */
  string(value: string, maxBytes: number): this {
    const bytes = Buffer.from(value, "utf8");
    if (bytes.length > maxBytes) {
      throw new ValidationError("STRING_TOO_LONG", `${this.recordName}: string exceeds ${maxBytes} bytes`);
    }
    this.buffer.writeUInt32LE(bytes.length, this.offset);
    bytes.copy(this.buffer, this.offset + 4);
    this.offset += 4 + maxBytes;
    return this;
  }

  /** u8 presence flag, then the value or `width` zero bytes */
  option<T>(value: T | undefined, width: number, write: (w: this, v: T) => void): this {
    if (value === undefined) {
      this.u8(0);
      this.offset += width;
      return this;
    }
    this.u8(1);
    const start = this.offset;
    write(this, value);
    if (this.offset - start !== width) {
      throw new ValidationError("LAYOUT_MISMATCH", `${this.recordName}: option width mismatch`);
    }
    return this;
  }

  finish(): Buffer {
    if (this.offset > this.buffer.length) {
      throw new ValidationError("LAYOUT_MISMATCH", `${this.recordName}: record exceeds its allocation`);
    }
    return this.buffer;
  }
}

export class BinaryReader {
  private readonly buffer: Buffer;
  private offset = HEADER_BYTES;

  constructor(
    private readonly recordName: string,
    bytes: Uint8Array,
    size: number
  ) {
    this.buffer = Buffer.from(bytes);
    if (this.buffer.length !== size) {
      throw new CorruptRecordError(recordName, `expected ${size} bytes, got ${this.buffer.length}`);
    }
    if (!this.buffer.subarray(0, HEADER_BYTES).equals(recordHeader(recordName))) {
      throw new CorruptRecordError(recordName, "header does not match");
    }
  }

  u8(): number {
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  bool(): boolean {
    const value = this.u8();
    if (value > 1) {
      throw new CorruptRecordError(this.recordName, `invalid boolean byte ${value}`);
    }
    return value === 1;
  }

  u64(): bigint {
    const value = this.buffer.readBigUInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  i64(): number {
    const value = this.buffer.readBigInt64LE(this.offset);
    this.offset += 8;
    const asNumber = Number(value);
    if (!Number.isSafeInteger(asNumber)) {
      throw new CorruptRecordError(this.recordName, "timestamp outside the safe integer range");
    }
    return asNumber;
  }

  bytes32(): string {
    const value = bytesToHex(this.buffer.subarray(this.offset, this.offset + 32));
    this.offset += 32;
    return value;
  }

  raw(width: number): Uint8Array {
    const value = new Uint8Array(this.buffer.subarray(this.offset, this.offset + width));
    this.offset += width;
    return value;
  }

  string(maxBytes: number): string {
    const length = this.buffer.readUInt32LE(this.offset);
    if (length > maxBytes) {
      throw new CorruptRecordError(this.recordName, `string length ${length} exceeds ${maxBytes}`);
    }
    const value = this.buffer.toString("utf8", this.offset + 4, this.offset + 4 + length);
    this.offset += 4 + maxBytes;
    return value;
  }

  option<T>(width: number, read: (r: this) => T): T | undefined {
    const flag = this.u8();
    if (flag === 0) {
      this.offset += width;
      return undefined;
    }
    if (flag !== 1) {
      throw new CorruptRecordError(this.recordName, `invalid option flag ${flag}`);
    }
    return read(this);
  }
}
