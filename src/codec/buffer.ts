import { CodecError } from './errors.js';

function checkWidth(value: number, max: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new CodecError(`${field} out of range: ${value} (0..${max})`, 'INVALID_FIELD');
  }
}

/**
 * Fixed-capacity big-endian writer.
 * Callers size the buffer up front from the serialized sizes.
 */
export class ByteWriter {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private position = 0;

  constructor(capacity: number) {
    this.data = new Uint8Array(capacity);
    this.view = new DataView(this.data.buffer);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  writeUint8(value: number, field = 'uint8'): void {
    checkWidth(value, 0xff, field);
    this.reserve(1);
    this.view.setUint8(this.position, value);
    this.position += 1;
  }

  writeUint16(value: number, field = 'uint16'): void {
    checkWidth(value, 0xffff, field);
    this.reserve(2);
    this.view.setUint16(this.position, value, false);
    this.position += 2;
  }

  writeUint32(value: number, field = 'uint32'): void {
    checkWidth(value, 0xffffffff, field);
    this.reserve(4);
    this.view.setUint32(this.position, value, false);
    this.position += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.data.set(bytes, this.position);
    this.position += bytes.length;
  }

  /**
   * Return the written bytes. The writer must be exactly full.
   */
  finish(): Uint8Array {
    if (this.position !== this.data.length) {
      throw new CodecError(
        `Wrote ${this.position} bytes, expected ${this.data.length}`,
        'SIZE_MISMATCH'
      );
    }
    return this.data;
  }

  private reserve(count: number): void {
    if (this.position + count > this.data.length) {
      throw new CodecError(
        `Buffer overflow: need ${count} bytes at offset ${this.position}, capacity ${this.data.length}`,
        'BUFFER_OVERFLOW'
      );
    }
  }
}

/**
 * Big-endian reader consuming from the front of a byte array
 */
export class ByteReader {
  private readonly view: DataView;
  private position = 0;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  readUint8(): number {
    this.require(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readUint16(): number {
    this.require(2);
    const value = this.view.getUint16(this.position, false);
    this.position += 2;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.position, false);
    this.position += 4;
    return value;
  }

  /**
   * Advance past `count` bytes without reading them
   */
  skip(count: number): void {
    this.require(count);
    this.position += count;
  }

  /**
   * Split off the next `count` bytes as an independent reader and
   * advance past them.
   */
  take(count: number): ByteReader {
    this.require(count);
    const sub = new ByteReader(this.data.subarray(this.position, this.position + count));
    this.position += count;
    return sub;
  }

  private require(count: number): void {
    if (count > this.remaining) {
      throw new CodecError(
        `Buffer underrun: need ${count} bytes at offset ${this.position}, have ${this.remaining}`,
        'BUFFER_UNDERRUN'
      );
    }
  }
}
