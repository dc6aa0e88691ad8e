/**
 * Big-endian buffer primitives shared by the MAR decoder and encoder.
 */
import { MarDecodeError, type MarDecodeErrorCode } from '../mar-errors.js';

/**
 * Cursor over a borrowed buffer that refuses to read past its end.
 * Byte ranges are copied out so results never alias the caller's buffer.
 */
export class BoundedReader {
  private readonly buffer: Buffer;
  private cursor: number;

  constructor(buffer: Buffer, start = 0) {
    this.buffer = buffer;
    this.cursor = start;
  }

  get offset(): number {
    return this.cursor;
  }

  get length(): number {
    return this.buffer.length;
  }

  remaining(): number {
    return this.buffer.length - this.cursor;
  }

  /** Moves the cursor to an absolute position within the buffer. */
  seek(position: number, failure: MarDecodeErrorCode = 'BoundsViolation'): void {
    if (!Number.isSafeInteger(position) || position < 0 || position > this.buffer.length) {
      throw new MarDecodeError(failure, `Cannot seek to ${position}, beyond a buffer of ${this.buffer.length} bytes`, { offset: position });
    }
    this.cursor = position;
  }

  readUint32(failure: MarDecodeErrorCode = 'BoundsViolation'): number {
    this.require(4, failure);
    const value = this.buffer.readUInt32BE(this.cursor);
    this.cursor += 4;
    return value;
  }

  readUint64(failure: MarDecodeErrorCode = 'BoundsViolation'): number {
    this.require(8, failure);
    const value = this.buffer.readBigUInt64BE(this.cursor);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MarDecodeError('BoundsViolation', `64-bit value ${value} exceeds the addressable range`, { offset: this.cursor });
    }
    this.cursor += 8;
    return Number(value);
  }

  readBytes(length: number, failure: MarDecodeErrorCode = 'BoundsViolation'): Buffer {
    this.require(length, failure);
    const bytes = Buffer.from(this.buffer.subarray(this.cursor, this.cursor + length));
    this.cursor += length;
    return bytes;
  }

  /**
   * Reads a zero-terminated string and consumes its terminator.
   * @returns The bytes before the terminator, or null when no zero byte follows the cursor.
   */
  readZeroTerminated(): Buffer | null {
    const end = this.buffer.indexOf(0, this.cursor);
    if (end < 0) {
      return null;
    }
    const bytes = Buffer.from(this.buffer.subarray(this.cursor, end));
    this.cursor = end + 1;
    return bytes;
  }

  /** Copies `length` bytes at an absolute position without moving the cursor. */
  sliceAt(position: number, length: number): Buffer {
    if (position + length > this.buffer.length) {
      throw new MarDecodeError(
        'BoundsViolation',
        `Range of ${length} bytes at ${position} extends beyond a buffer of ${this.buffer.length} bytes`,
        { offset: position }
      );
    }
    return Buffer.from(this.buffer.subarray(position, position + length));
  }

  private require(length: number, failure: MarDecodeErrorCode): void {
    if (length > this.remaining()) {
      throw new MarDecodeError(
        failure,
        `Read of ${length} bytes exceeds the ${this.remaining()} bytes remaining`,
        { offset: this.cursor }
      );
    }
  }
}

/**
 * Growable staging buffer for big-endian serialization.
 */
export class BigEndianWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialCapacity = 256) {
    this.buffer = Buffer.alloc(initialCapacity);
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeUInt32BE(value, this.offset);
    this.offset += 4;
  }

  writeUint64(value: number): void {
    this.ensureCapacity(8);
    this.buffer.writeBigUInt64BE(BigInt(value), this.offset);
    this.offset += 8;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.offset] = value & 0xff;
    this.offset += 1;
  }

  getBuffer(): Buffer {
    return this.buffer.subarray(0, this.offset);
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }
}
