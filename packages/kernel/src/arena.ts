/**
 * Generation-checked slot storage.
 *
 * Long-lived objects that callbacks must find again are stored here, and the
 * callbacks carry a {@link SlotRef} instead of the object. Taking a value bumps
 * its slot's generation, so a ref kept past release resolves to `undefined`
 * rather than to whatever reuses the slot.
 */

export class SlotRef {
  constructor(
    readonly index: number,
    readonly generation: number,
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return `${this.index}v${this.generation}`;
  }
}

interface Slot<T> {
  generation: number;
  value: T | undefined;
}

export class Arena<T> {
  private readonly slots: Slot<T>[] = [];
  private readonly free: number[] = [];
  private count = 0;

  insert(value: T): SlotRef {
    const index = this.free.pop();
    if (index === undefined) {
      this.slots.push({ generation: 0, value });
      this.count++;
      return new SlotRef(this.slots.length - 1, 0);
    }
    const slot = this.slots[index];
    slot.value = value;
    this.count++;
    return new SlotRef(index, slot.generation);
  }

  get(ref: SlotRef | undefined): T | undefined {
    return this.live(ref)?.value;
  }

  has(ref: SlotRef | undefined): boolean {
    return this.live(ref) !== undefined;
  }

  /** Remove and return the value. A second take of the same ref returns `undefined`. */
  take(ref: SlotRef | undefined): T | undefined {
    const slot = this.live(ref);
    if (!slot || !ref) return undefined;

    const value = slot.value;
    slot.value = undefined;
    slot.generation++;
    this.free.push(ref.index);
    this.count--;
    return value;
  }

  get size(): number {
    return this.count;
  }

  private live(ref: SlotRef | undefined): Slot<T> | undefined {
    if (!ref) return undefined;
    const slot = this.slots[ref.index];
    if (!slot || slot.generation !== ref.generation || slot.value === undefined) {
      return undefined;
    }
    return slot;
  }
}
