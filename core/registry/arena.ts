/**
 * Generation-checked slot arena.
 *
 * Objects owned elsewhere in the editor (documents, windows) are referred
 * to through Handles instead of direct references. A handle stays valid
 * until its slot is released; after that, get() answers null even if the
 * slot is reused for a new object, because the generation no longer
 * matches.
 */

export interface Handle<T> {
  readonly index: number;
  readonly generation: number;
  /** Phantom field tying the handle to its arena's value type. */
  readonly __type?: (value: T) => T;
}

interface Slot<T> {
  generation: number;
  value: T | null;
}

export class Arena<T> {
  private slots: Slot<T>[] = [];
  private free: number[] = [];
  /** Live slot indices in insertion order. */
  private order: number[] = [];

  insert(value: T): Handle<T> {
    const index = this.free.pop();
    if (index !== undefined) {
      const slot = this.slots[index];
      slot.value = value;
      this.order.push(index);
      return { index, generation: slot.generation };
    }
    this.slots.push({ generation: 0, value });
    this.order.push(this.slots.length - 1);
    return { index: this.slots.length - 1, generation: 0 };
  }

  /** Resolve a handle; null once the object has been removed. */
  get(handle: Handle<T> | null): T | null {
    if (!handle) return null;
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation) return null;
    return slot.value;
  }

  has(handle: Handle<T> | null): boolean {
    return this.get(handle) !== null;
  }

  /** Release the slot. Returns the removed value, or null for a stale handle. */
  remove(handle: Handle<T>): T | null {
    const value = this.get(handle);
    if (value === null) return null;
    const slot = this.slots[handle.index];
    slot.value = null;
    slot.generation++;
    this.free.push(handle.index);
    this.order.splice(this.order.indexOf(handle.index), 1);
    return value;
  }

  /** Handle of a live value, or null if it is not stored here. */
  handleOf(value: T): Handle<T> | null {
    for (const index of this.order) {
      const slot = this.slots[index];
      if (slot.value === value) return { index, generation: slot.generation };
    }
    return null;
  }

  /** Live values in insertion order. */
  values(): T[] {
    const result: T[] = [];
    for (const index of this.order) {
      const value = this.slots[index].value;
      if (value !== null) result.push(value);
    }
    return result;
  }

  get size(): number {
    return this.order.length;
  }
}

/** Two handles designate the same slot generation. */
export function sameHandle<T>(a: Handle<T> | null, b: Handle<T> | null): boolean {
  if (!a || !b) return a === b;
  return a.index === b.index && a.generation === b.generation;
}
