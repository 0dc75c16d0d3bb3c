export interface TimerQueueStats {
  pending: number;
  identities: number;
  enqueued: number;
  fired: number;
  cancelled: number;
}

export interface TimerQueueOptions<Time> {
  /** Strict "earlier than"; defaults to naturalOrder. */
  earlier?: Earlier<Time>;
}

export interface TimerQueue<Time, Identity> {
  enqueue(deadline: Time, handler: TimerHandler, identity: Identity): boolean;
  cancel(identity: Identity): number;
  cancelAll(): number;
  dispatchDue(cutoff: Time): number;
  isEmpty(): boolean;
  earliestDeadline(): Time;
  size(): number;
  has(identity: Identity): boolean;
  stats(): TimerQueueStats;
}

import { RecordArena } from './arena.js';
import { DeadlineHeap } from './deadlineheap.js';
import { IdentityIndex } from './identityindex.js';
import {
  NO_POSITION, naturalOrder,
  type Earlier, type Handle, type TimerHandler, type TimerRecord,
} from './record.js';

/**
 * Pending timers kept in a deadline heap and an identity index at once.
 * Not thread-safe and not reentrant: driven by a single reactor loop.
 */
export class TimerQueueCore<Time = number, Identity = unknown> implements TimerQueue<Time, Identity> {
  private readonly arena = new RecordArena<TimerRecord<Time, Identity>>();
  private readonly heap: DeadlineHeap<Time, Identity>;
  private readonly index: IdentityIndex<Time, Identity>;
  private readonly earlier: Earlier<Time>;
  private _enqueued = 0;
  private _fired = 0;
  private _cancelled = 0;

  constructor(opts: TimerQueueOptions<Time> = {}) {
    this.earlier = opts.earlier ?? naturalOrder;
    this.heap = new DeadlineHeap(this.arena, this.earlier);
    this.index = new IdentityIndex(this.arena);
  }

  /**
   * Registers a timer. Returns true when it is now the earliest pending
   * timer, i.e. the reactor's wait timeout has to be recomputed. A deadline
   * equal to the current minimum does not count as earlier.
   */
  enqueue(deadline: Time, handler: TimerHandler, identity: Identity): boolean {
    // a comparator that rejects the deadline throws here, before anything is mutated
    this.earlier(deadline, this.heap.isEmpty() ? deadline : this.earliestDeadline());
    const h = this.arena.alloc({
      deadline, identity, handler,
      heapPosition: NO_POSITION, chainNext: null, chainPrev: null,
    });
    this.index.register(identity, h);
    this._enqueued++;
    return this.heap.insert(h);
  }

  isEmpty(): boolean { return this.heap.isEmpty(); }
  size(): number { return this.heap.size(); }
  has(identity: Identity): boolean { return this.index.has(identity); }

  /** Throws EmptyQueueError when nothing is pending. */
  earliestDeadline(): Time {
    return this.arena.get(this.heap.peekMin()).deadline;
  }

  /**
   * Fires every timer whose deadline is strictly earlier than `cutoff`,
   * earliest first. Returns how many fired.
   */
  dispatchDue(cutoff: Time): number {
    let fired = 0;
    while (!this.heap.isEmpty()) {
      const top = this.heap.peekMin();
      if (!this.earlier(this.arena.get(top).deadline, cutoff)) break;
      const rec = this.detach(top);
      this._fired++;
      fired++;
      rec.handler.fire();
    }
    return fired;
  }

  /** Cancels every timer registered under `identity`. Unknown identity is a no-op. */
  cancel(identity: Identity): number {
    const handlers = this.detachChain(identity);
    cancelEach(handlers);
    return handlers.length;
  }

  cancelAll(): number {
    const handlers: TimerHandler[] = [];
    for (const identity of this.index.identities()) handlers.push(...this.detachChain(identity));
    cancelEach(handlers);
    return handlers.length;
  }

  stats(): TimerQueueStats {
    return {
      pending: this.heap.size(),
      identities: this.index.size(),
      enqueued: this._enqueued,
      fired: this._fired,
      cancelled: this._cancelled,
    };
  }

  /** Lists every disagreement between heap, index and arena. Empty when consistent. */
  checkConsistency(): string[] {
    const out = [...this.heap.violations(), ...this.index.violations()];
    const heapSize = this.heap.size();
    if (this.arena.size() !== heapSize) out.push(`arena holds ${this.arena.size()} records, heap ${heapSize}`);
    let chained = 0;
    for (const identity of this.index.identities()) chained += this.index.chain(identity).length;
    if (chained !== heapSize) out.push(`index chains hold ${chained} records, heap ${heapSize}`);
    for (const h of this.arena.handles()) {
      const rec = this.arena.get(h);
      if (this.heap.handles()[rec.heapPosition] !== h) out.push(`handle ${h} is not at its heap position`);
      if (!this.index.chain(rec.identity).includes(h)) out.push(`handle ${h} is missing from its identity chain`);
    }
    return out;
  }

  private detach(h: Handle): TimerRecord<Time, Identity> {
    this.heap.removeAt(this.arena.get(h).heapPosition);
    this.index.unlink(h);
    return this.arena.release(h);
  }

  // Takes the whole chain out before any handler runs.
  private detachChain(identity: Identity): TimerHandler[] {
    const handlers: TimerHandler[] = [];
    let h = this.index.find(identity) ?? null;
    while (h !== null) {
      const next = this.arena.get(h).chainNext;
      handlers.push(this.detach(h).handler);
      h = next;
    }
    this._cancelled += handlers.length;
    return handlers;
  }
}

function cancelEach(handlers: TimerHandler[]): void {
  const errors: unknown[] = [];
  for (const handler of handlers) {
    try {
      handler.cancel();
    } catch (err) {
      errors.push(err);
    }
  }
  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new AggregateError(errors, `${errors.length} cancel handlers failed`);
}
