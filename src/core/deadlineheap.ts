/**
 * Min-heap of record handles keyed by deadline, used by the timer queue.
 * insert/removeAt O(log n), peekMin O(1). Each record carries its own
 * heapPosition so cancellation can remove it without a search.
 */
import type { RecordArena } from './arena.js';
import { EmptyQueueError } from './errors.js';
import { NO_POSITION, type Earlier, type Handle, type TimerRecord } from './record.js';

export class DeadlineHeap<Time, Identity> {
  private a: Handle[] = [];

  constructor(
    private readonly arena: RecordArena<TimerRecord<Time, Identity>>,
    private readonly earlier: Earlier<Time>,
  ) {}

  size(): number { return this.a.length; }
  isEmpty(): boolean { return this.a.length === 0; }

  /** Returns the earliest handle without removing it. */
  peekMin(): Handle {
    if (this.a.length === 0) throw new EmptyQueueError();
    return this.a[0];
  }

  /** Adds a handle; true when it ended up at the top. */
  insert(h: Handle): boolean {
    const idx = this.a.push(h) - 1;
    this.arena.get(h).heapPosition = idx;
    this.upHeap(idx);
    return this.a[0] === h;
  }

  /** Removes the handle at a heap position and returns it. */
  removeAt(index: number): Handle {
    const n = this.a.length;
    if (!Number.isInteger(index) || index < 0 || index >= n) {
      throw new RangeError(`heap position ${index} out of range (size ${n})`);
    }
    const removed = this.a[index];
    if (index !== n - 1) this.swap(index, n - 1);
    this.a.pop();
    this.arena.get(removed).heapPosition = NO_POSITION;
    if (index < this.a.length) {
      if (index > 0 && this.less(index, parent(index))) this.upHeap(index);
      else this.downHeap(index);
    }
    return removed;
  }

  handles(): readonly Handle[] { return this.a; }

  violations(): string[] {
    const out: string[] = [];
    for (let i = 0; i < this.a.length; i++) {
      const pos = this.arena.get(this.a[i]).heapPosition;
      if (pos !== i) out.push(`handle ${this.a[i]} at ${i} records position ${pos}`);
      if (i > 0 && this.less(i, parent(i))) out.push(`position ${i} is earlier than its parent`);
    }
    return out;
  }

  private deadline(i: number): Time { return this.arena.get(this.a[i]).deadline; }

  private less(i: number, j: number): boolean {
    return this.earlier(this.deadline(i), this.deadline(j));
  }

  private upHeap(i: number): void {
    while (i > 0) {
      const p = parent(i);
      if (!this.less(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  private downHeap(i: number): void {
    const n = this.a.length;
    let child = 2 * i + 1;
    while (child < n) {
      // equal children: take the right one
      const min = (child + 1 === n || this.less(child, child + 1)) ? child : child + 1;
      if (!this.less(min, i)) break;
      this.swap(i, min);
      i = min;
      child = 2 * i + 1;
    }
  }

  private swap(i: number, j: number): void {
    const t = this.a[i];
    this.a[i] = this.a[j];
    this.a[j] = t;
    this.arena.get(this.a[i]).heapPosition = i;
    this.arena.get(this.a[j]).heapPosition = j;
  }
}

function parent(i: number): number { return (i - 1) >> 1; }
