import { StaleHandleError } from './errors.js';
import type { Handle } from './record.js';

/**
 * Owns every live record. Heap, index and chain links only hold handles,
 * so a released record can never be reached through a leftover reference.
 */
export class RecordArena<R> {
  private slots: (R | undefined)[] = [];
  private free: Handle[] = [];
  private live = 0;

  size(): number { return this.live; }

  alloc(record: R): Handle {
    const reused = this.free.pop();
    if (reused !== undefined) {
      this.slots[reused] = record;
      this.live++;
      return reused;
    }
    const h = this.slots.push(record) - 1;
    this.live++;
    return h;
  }

  has(h: Handle): boolean { return this.slots[h] !== undefined; }

  get(h: Handle): R {
    const r = this.slots[h];
    if (r === undefined) throw new StaleHandleError(h);
    return r;
  }

  /** Frees the slot and hands the record back for its terminal operation. */
  release(h: Handle): R {
    const r = this.get(h);
    this.slots[h] = undefined;
    this.free.push(h);
    this.live--;
    return r;
  }

  *handles(): IterableIterator<Handle> {
    for (let h = 0; h < this.slots.length; h++) {
      if (this.slots[h] !== undefined) yield h;
    }
  }
}
