/**
 * Timer Reactor
 *
 * Drives a TimerQueueCore from Node's event loop: one setTimeout, sized
 * from the earliest deadline, is re-armed after every dispatch and whenever
 * an enqueue reports a new earliest timer.
 */

import { ReactorStoppedError } from '../core/errors.js';
import { handlerOf, type TimerHandler } from '../core/record.js';
import { TimerQueueCore, type TimerQueueStats } from '../core/timerqueue.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

export interface Clock {
  /** Milliseconds; only differences matter. */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export interface ReactorOptions {
  name?: string;
  /** Longest single wait before the reactor polls again (default 60s). */
  maxWaitMs?: number;
  clock?: Clock;
}

export type TimerCallback = () => void;

const DEFAULT_MAX_WAIT_MS = 60_000;
// setTimeout clamps anything larger to 1ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Delay until the clock is strictly past `deadline`, since dispatch only
 * fires deadlines earlier than "now".
 */
export function waitTimeout(deadline: number, now: number, maxWaitMs: number): number {
  return Math.min(Math.max(deadline - now + 1, 0), maxWaitMs);
}

export class TimerReactor<Identity = unknown> {
  readonly name: string;
  private readonly queue = new TimerQueueCore<number, Identity>();
  private readonly clock: Clock;
  private readonly maxWaitMs: number;
  private wakeup: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(opts: ReactorOptions = {}) {
    this.name = opts.name ?? 'default';
    this.clock = opts.clock ?? systemClock;
    this.maxWaitMs = opts.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
    if (!Number.isInteger(this.maxWaitMs) || this.maxWaitMs <= 0 || this.maxWaitMs > MAX_TIMEOUT_MS) {
      throw new RangeError(`maxWaitMs must be an integer in 1..${MAX_TIMEOUT_MS}, got ${this.maxWaitMs}`);
    }
  }

  /** Schedules `handler` to run `delayMs` from now. */
  setTimer(delayMs: number, identity: Identity, handler: TimerHandler | TimerCallback): boolean {
    return this.setTimerAt(this.clock.now() + delayMs, identity, handler);
  }

  /**
   * Schedules `handler` for an absolute clock deadline. Returns true when
   * this became the earliest pending timer.
   */
  setTimerAt(deadline: number, identity: Identity, handler: TimerHandler | TimerCallback): boolean {
    if (this.stopped) throw new ReactorStoppedError(this.name);
    if (!Number.isFinite(deadline)) throw new RangeError(`deadline must be a finite number, got ${deadline}`);
    const target = typeof handler === 'function' ? handlerOf(handler) : handler;
    const earliest = this.queue.enqueue(deadline, this.instrument(deadline, target), identity);
    if (earliest || this.wakeup === null) this.rearm();
    return earliest;
  }

  cancel(identity: Identity): number {
    try {
      return this.queue.cancel(identity);
    } finally {
      if (this.queue.isEmpty()) this.disarm();
    }
  }

  /** Fires everything due now and re-arms. Called by the wakeup timer. */
  poll(): number {
    this.wakeup = null;
    const before = this.queue.stats().fired;
    try {
      this.queue.dispatchDue(this.clock.now());
    } catch (err) {
      logger.error({ err, reactor: this.name }, 'Timer handler threw during dispatch');
    } finally {
      this.rearm();
    }
    return this.queue.stats().fired - before;
  }

  pending(): number { return this.queue.size(); }

  stats(): TimerQueueStats { return this.queue.stats(); }

  /** Cancels every pending timer; later setTimer calls throw. */
  stop(): number {
    if (this.stopped) return 0;
    this.stopped = true;
    this.disarm();
    const cancelled = this.queue.cancelAll();
    logger.info({ reactor: this.name, cancelled }, 'Reactor stopped');
    return cancelled;
  }

  private instrument(deadline: number, target: TimerHandler): TimerHandler {
    const labels = { reactor: this.name };
    return {
      fire: () => {
        metrics.fireLateness.observe(Math.max(0, this.clock.now() - deadline) / 1000, labels);
        metrics.outcomes.inc({ ...labels, outcome: 'fired' });
        target.fire();
      },
      cancel: () => {
        metrics.outcomes.inc({ ...labels, outcome: 'cancelled' });
        target.cancel();
      },
    };
  }

  private rearm(): void {
    this.disarm();
    if (this.stopped || this.queue.isEmpty()) return;
    const delay = waitTimeout(this.queue.earliestDeadline(), this.clock.now(), this.maxWaitMs);
    logger.debug({ reactor: this.name, delay, pending: this.queue.size() }, 'Reactor wakeup armed');
    this.wakeup = setTimeout(() => this.poll(), delay);
  }

  private disarm(): void {
    if (this.wakeup !== null) {
      clearTimeout(this.wakeup);
      this.wakeup = null;
    }
  }
}
