/**
 * In-process stand-in for the native allocator behind the buffer entry
 * points. Buffers are `{ pointer, length, capacity }` triples; pointer 0 is
 * the empty buffer and is never allocated or freed.
 */
import { BufferOwnershipError } from './errors';

export interface FfiBuffer {
  pointer: number;
  length: number;
  capacity: number;
}

export const EMPTY_BUFFER: FfiBuffer = Object.freeze({ pointer: 0, length: 0, capacity: 0 });

export function isFfiBuffer(value: unknown): value is FfiBuffer {
  return value !== null
    && typeof value === 'object'
    && 'pointer' in value && typeof value.pointer === 'number'
    && 'length' in value && typeof value.length === 'number'
    && 'capacity' in value && typeof value.capacity === 'number';
}

/** Pointers advance by this much so that no two live blocks share one. */
const POINTER_STRIDE = 16;

export class BufferHeap {
  private blocks = new Map<number, Uint8Array>();
  private freed = new Set<number>();
  private nextPointer = POINTER_STRIDE;

  /** Total blocks handed out and released, for ownership accounting. */
  allocations = 0;
  frees = 0;

  get liveCount(): number {
    return this.blocks.size;
  }

  alloc(size: number): FfiBuffer {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid buffer size ${size}`);
    }
    if (size === 0) {
      return EMPTY_BUFFER;
    }
    const pointer = this.nextPointer;
    this.nextPointer += Math.ceil(size / POINTER_STRIDE) * POINTER_STRIDE;
    this.blocks.set(pointer, new Uint8Array(size));
    this.allocations++;
    return { pointer, length: 0, capacity: size };
  }

  /** Copies `bytes` into a new buffer owned by the caller. */
  fromBytes(bytes: Uint8Array): FfiBuffer {
    const buffer = this.alloc(bytes.length);
    if (buffer.pointer === 0) {
      return buffer;
    }
    this.block(buffer).set(bytes);
    return { ...buffer, length: bytes.length };
  }

  /**
   * Grows `buffer` so that `additional` more bytes fit. Ownership of the old
   * buffer moves into the returned one.
   */
  reserve(buffer: FfiBuffer, additional: number): FfiBuffer {
    if (!Number.isInteger(additional) || additional < 0) {
      throw new RangeError(`Invalid reservation ${additional}`);
    }
    if (buffer.length + additional <= buffer.capacity) {
      return buffer;
    }
    const grown = this.alloc(buffer.length + additional);
    if (buffer.pointer !== 0) {
      this.block(grown).set(this.read(buffer));
      this.free(buffer);
    }
    return { ...grown, length: buffer.length };
  }

  /** Copy of the `length` bytes in use. */
  read(buffer: FfiBuffer): Uint8Array {
    if (buffer.pointer === 0) {
      return new Uint8Array(0);
    }
    const block = this.block(buffer);
    if (buffer.length > block.length) {
      throw new BufferOwnershipError(`Buffer ${buffer.pointer} claims ${buffer.length} bytes but holds ${block.length}`);
    }
    return block.slice(0, buffer.length);
  }

  free(buffer: FfiBuffer): void {
    if (buffer.pointer === 0) {
      return;
    }
    this.block(buffer);
    this.blocks.delete(buffer.pointer);
    this.freed.add(buffer.pointer);
    this.frees++;
  }

  isLive(buffer: FfiBuffer): boolean {
    return this.blocks.has(buffer.pointer);
  }

  private block(buffer: FfiBuffer): Uint8Array {
    const block = this.blocks.get(buffer.pointer);
    if (!block) {
      const reason = this.freed.has(buffer.pointer) ? 'was already freed' : 'was never allocated';
      throw new BufferOwnershipError(`Buffer ${buffer.pointer} ${reason}`);
    }
    return block;
  }
}

/** Allocates on, and consumes from, a heap directly: what native code does with its own allocator. */
export function heapTransport(heap: BufferHeap) {
  return {
    allocate: (bytes: Uint8Array): FfiBuffer => heap.fromBytes(bytes),
    consume: (buffer: FfiBuffer): Uint8Array => {
      const bytes = heap.read(buffer);
      heap.free(buffer);
      return bytes;
    }
  };
}
