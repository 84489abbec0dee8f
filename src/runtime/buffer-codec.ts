/**
 * Big-endian primitive codec for serialized buffers.
 *
 * Wire format of the primitives:
 * - fixed-width integers and floats in network byte order
 * - strings and bytes: i32 length, then the (UTF-8) bytes
 */
import { BufferFormatError } from './errors';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

export class BufferWriter {
  private bytes: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity: number = 64) {
    this.bytes = new Uint8Array(Math.max(initialCapacity, 8));
    this.view = new DataView(this.bytes.buffer);
  }

  get length(): number {
    return this.offset;
  }

  private ensure(additional: number): void {
    if (this.offset + additional <= this.bytes.length) {
      return;
    }
    let capacity = this.bytes.length * 2;
    while (capacity < this.offset + additional) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.offset));
    this.bytes = grown;
    this.view = new DataView(grown.buffer);
  }

  writeI8(value: number): void {
    this.ensure(1);
    this.view.setInt8(this.offset, value);
    this.offset += 1;
  }

  writeU8(value: number): void {
    this.ensure(1);
    this.view.setUint8(this.offset, value);
    this.offset += 1;
  }

  writeI16(value: number): void {
    this.ensure(2);
    this.view.setInt16(this.offset, value);
    this.offset += 2;
  }

  writeU16(value: number): void {
    this.ensure(2);
    this.view.setUint16(this.offset, value);
    this.offset += 2;
  }

  writeI32(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.offset, value);
    this.offset += 4;
  }

  writeU32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this.offset, value);
    this.offset += 4;
  }

  writeI64(value: bigint): void {
    this.ensure(8);
    this.view.setBigInt64(this.offset, value);
    this.offset += 8;
  }

  writeU64(value: bigint): void {
    this.ensure(8);
    this.view.setBigUint64(this.offset, value);
    this.offset += 8;
  }

  writeF32(value: number): void {
    this.ensure(4);
    this.view.setFloat32(this.offset, value);
    this.offset += 4;
  }

  writeF64(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.offset, value);
    this.offset += 8;
  }

  writeBool(value: boolean): void {
    this.writeI8(value ? 1 : 0);
  }

  writeBytes(value: Uint8Array): void {
    this.writeI32(value.length);
    this.writeRaw(value);
  }

  writeString(value: string): void {
    this.writeBytes(textEncoder.encode(value));
  }

  writeRaw(value: Uint8Array): void {
    this.ensure(value.length);
    this.bytes.set(value, this.offset);
    this.offset += value.length;
  }

  finish(): Uint8Array {
    return this.bytes.slice(0, this.offset);
  }
}

export class BufferReader {
  private view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  get position(): number {
    return this.offset;
  }

  private take(size: number): number {
    if (size > this.remaining) {
      throw new BufferFormatError(
        `Buffer underflow: needed ${size} bytes at offset ${this.offset}, ${this.remaining} left`
      );
    }
    const at = this.offset;
    this.offset += size;
    return at;
  }

  readI8(): number {
    return this.view.getInt8(this.take(1));
  }

  readU8(): number {
    return this.view.getUint8(this.take(1));
  }

  readI16(): number {
    return this.view.getInt16(this.take(2));
  }

  readU16(): number {
    return this.view.getUint16(this.take(2));
  }

  readI32(): number {
    return this.view.getInt32(this.take(4));
  }

  readU32(): number {
    return this.view.getUint32(this.take(4));
  }

  readI64(): bigint {
    return this.view.getBigInt64(this.take(8));
  }

  readU64(): bigint {
    return this.view.getBigUint64(this.take(8));
  }

  readF32(): number {
    return this.view.getFloat32(this.take(4));
  }

  readF64(): number {
    return this.view.getFloat64(this.take(8));
  }

  readBool(): boolean {
    const byte = this.readI8();
    if (byte !== 0 && byte !== 1) {
      throw new BufferFormatError(`Invalid boolean byte ${byte}`);
    }
    return byte === 1;
  }

  /** Reads an i32 count or length and checks it is not negative. */
  readLength(): number {
    const length = this.readI32();
    if (length < 0) {
      throw new BufferFormatError(`Negative length ${length}`);
    }
    return length;
  }

  readBytes(): Uint8Array {
    const length = this.readLength();
    const at = this.take(length);
    return this.bytes.slice(at, at + length);
  }

  readString(): string {
    const bytes = this.readBytes();
    try {
      return textDecoder.decode(bytes);
    } catch (error) {
      throw new BufferFormatError(`Invalid UTF-8 in string: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** Fails unless every byte has been consumed. */
  ensureExhausted(): void {
    if (this.remaining !== 0) {
      throw new BufferFormatError(`${this.remaining} trailing bytes after value`);
    }
  }
}
