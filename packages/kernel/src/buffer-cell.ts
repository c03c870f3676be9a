/**
 * BufferCell - a byte buffer with a single, tracked owner.
 *
 * Buffers cross into the event loop when a read is allocated or a write is
 * submitted, and come back at the matching completion callback. A cell
 * records which side holds it and refuses access from the other side:
 *
 * ```
 *   session ──lend()──▶ runtime ──reclaim()──▶ session ──release()──▶ released
 * ```
 *
 * The session reads through `view()`, the runtime fills or drains through
 * `storage()`. Releasing twice, or releasing while the runtime still holds the
 * cell, throws {@link OwnershipError}.
 */

export type BufferOwner = "session" | "runtime" | "released";

export class OwnershipError extends Error {
  readonly name = "OwnershipError";

  constructor(
    readonly action: string,
    readonly owner: BufferOwner,
  ) {
    super(`Cannot ${action} a buffer owned by ${owner}`);
  }
}

export class BufferCell {
  private _owner: BufferOwner = "session";
  private _storage: Uint8Array;
  private readonly _length: number;

  private constructor(storage: Uint8Array, length: number) {
    this._storage = storage;
    this._length = length;
  }

  /** A fresh, empty cell with room for `capacity` bytes. */
  static allocate(capacity: number): BufferCell {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`capacity must be a non-negative integer, got ${capacity}`);
    }
    return new BufferCell(new Uint8Array(capacity), 0);
  }

  /** Take ownership of `bytes` without copying. The caller must not touch them afterwards. */
  static wrap(bytes: Uint8Array): BufferCell {
    return new BufferCell(bytes, bytes.length);
  }

  get owner(): BufferOwner {
    return this._owner;
  }

  get capacity(): number {
    return this._storage.length;
  }

  /** Number of meaningful bytes (the payload of a write cell). */
  get length(): number {
    return this._length;
  }

  /** Hand the cell to the runtime. */
  lend(): this {
    this.expect("session", "lend");
    this._owner = "runtime";
    return this;
  }

  /** Take the cell back from the runtime at its completion callback. */
  reclaim(): this {
    this.expect("runtime", "reclaim");
    this._owner = "session";
    return this;
  }

  /** Free the cell. Valid exactly once, from the session side. */
  release(): void {
    this.expect("session", "release");
    this._owner = "released";
    this._storage = new Uint8Array(0);
  }

  /** Session-side view of the first `length` bytes (default: the payload). */
  view(length: number = this._length): Uint8Array {
    this.expect("session", "view");
    return this._storage.subarray(0, length);
  }

  /** Runtime-side access to the whole backing store. */
  storage(): Uint8Array {
    this.expect("runtime", "access the storage of");
    return this._storage;
  }

  private expect(owner: BufferOwner, action: string): void {
    if (this._owner !== owner) {
      throw new OwnershipError(action, this._owner);
    }
  }
}
