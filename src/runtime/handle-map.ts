import { StaleHandleError } from './errors';

/**
 * Table of values exposed across the boundary as 64-bit handles. Handles
 * count up from 1 and are never reused, so a stale handle can never alias a
 * newer value.
 */
export class HandleMap<T> {
  private entries = new Map<bigint, T>();
  private nextHandle = 1n;

  constructor(private readonly label: string = 'handle') {}

  get size(): number {
    return this.entries.size;
  }

  insert(value: T): bigint {
    const handle = this.nextHandle++;
    this.entries.set(handle, value);
    return handle;
  }

  has(handle: bigint): boolean {
    return this.entries.has(handle);
  }

  get(handle: bigint): T {
    const value = this.entries.get(handle);
    if (value === undefined) {
      throw this.stale(handle);
    }
    return value;
  }

  /** Releases a handle and returns what it held. */
  remove(handle: bigint): T {
    const value = this.get(handle);
    this.entries.delete(handle);
    return value;
  }

  private stale(handle: bigint): StaleHandleError {
    const reason = handle > 0n && handle < this.nextHandle ? 'has been released' : 'was never issued';
    return new StaleHandleError(`${this.label} ${handle} ${reason}`);
  }
}
