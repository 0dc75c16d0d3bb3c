import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimerReactor, waitTimeout } from '../src/reactor/reactor.js';
import { ReactorStoppedError } from '../src/core/errors.js';
import { logger } from '../src/utils/logger.js';
import { metrics } from '../src/utils/metrics.js';

describe('TimerReactor', () => {
  let reactor: TimerReactor<string>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    reactor = new TimerReactor<string>();
  });

  afterEach(() => {
    reactor.stop();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('fires once the clock is past the deadline', () => {
    const cb = vi.fn();
    expect(reactor.setTimer(100, 'a', cb)).toBe(true);
    vi.advanceTimersByTime(100);
    expect(cb).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(cb).toHaveBeenCalledTimes(1);
    expect(reactor.pending()).toBe(0);
  });

  it('re-arms for a timer earlier than the current wakeup', () => {
    const late = vi.fn();
    const early = vi.fn();
    expect(reactor.setTimer(1000, 'late', late)).toBe(true);
    expect(reactor.setTimer(10, 'early', early)).toBe(true);
    vi.advanceTimersByTime(11);
    expect(early).toHaveBeenCalledTimes(1);
    expect(late).not.toHaveBeenCalled();
    vi.advanceTimersByTime(990);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('cancels every timer of an identity', () => {
    const handler = { fire: vi.fn(), cancel: vi.fn() };
    const other = vi.fn();
    reactor.setTimer(50, 'x', handler);
    reactor.setTimer(55, 'x', handler);
    reactor.setTimer(60, 'y', other);
    expect(reactor.cancel('x')).toBe(2);
    expect(handler.cancel).toHaveBeenCalledTimes(2);
    vi.advanceTimersByTime(100);
    expect(handler.fire).not.toHaveBeenCalled();
    expect(other).toHaveBeenCalledTimes(1);
  });

  it('never waits longer than maxWaitMs', () => {
    const capped = new TimerReactor<string>({ name: 'capped', maxWaitMs: 1000 });
    const poll = vi.spyOn(capped, 'poll');
    const cb = vi.fn();
    capped.setTimer(5000, 'a', cb);
    vi.advanceTimersByTime(1000);
    expect(poll).toHaveBeenCalledTimes(1);
    expect(cb).not.toHaveBeenCalled();
    vi.advanceTimersByTime(4001);
    expect(cb).toHaveBeenCalledTimes(1);
    capped.stop();
  });

  it('logs a throwing handler and keeps dispatching', () => {
    const error = vi.spyOn(logger, 'error');
    const after = vi.fn();
    reactor.setTimer(10, 'bad', () => { throw new Error('boom'); });
    reactor.setTimer(10, 'good', after);
    vi.advanceTimersByTime(11);
    vi.advanceTimersByTime(1);
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ reactor: 'default' }),
      'Timer handler threw during dispatch',
    );
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('cancels pending timers on stop and refuses new ones', () => {
    const handler = { fire: vi.fn(), cancel: vi.fn() };
    reactor.setTimer(10, 'a', handler);
    expect(reactor.stop()).toBe(1);
    expect(handler.cancel).toHaveBeenCalledTimes(1);
    expect(() => reactor.setTimer(10, 'b', vi.fn())).toThrow(ReactorStoppedError);
    vi.advanceTimersByTime(100);
    expect(handler.fire).not.toHaveBeenCalled();
    expect(reactor.stop()).toBe(0);
  });

  it('records outcomes and lateness', () => {
    const named = new TimerReactor<string>({ name: 'metrics-test' });
    named.setTimer(100, 'a', vi.fn());
    named.setTimer(200, 'b', vi.fn());
    named.cancel('b');
    vi.advanceTimersByTime(101);
    expect(metrics.outcomes.get({ reactor: 'metrics-test', outcome: 'fired' })).toBe(1);
    expect(metrics.outcomes.get({ reactor: 'metrics-test', outcome: 'cancelled' })).toBe(1);
    expect(metrics.fireLateness.export()).toContain(
      'timerqueue_fire_lateness_seconds_bucket{le="0.001",reactor="metrics-test"} 1\n',
    );
    named.stop();
  });

  it('rejects deadlines that are not finite numbers', () => {
    const good = vi.fn();
    expect(() => reactor.setTimer(NaN, 'bad', vi.fn())).toThrow(RangeError);
    expect(() => reactor.setTimerAt(Infinity, 'bad', vi.fn())).toThrow(RangeError);
    expect(reactor.pending()).toBe(0);
    reactor.setTimer(10, 'good', good);
    vi.advanceTimersByTime(11);
    expect(good).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-positive maxWaitMs', () => {
    expect(() => new TimerReactor({ maxWaitMs: 0 })).toThrow(RangeError);
  });
});

describe('waitTimeout', () => {
  it('waits until just past the deadline', () => {
    expect(waitTimeout(100, 0, 60_000)).toBe(101);
  });

  it('does not go negative for overdue deadlines', () => {
    expect(waitTimeout(5, 10, 60_000)).toBe(0);
  });

  it('caps at the maximum wait', () => {
    expect(waitTimeout(10_000_000, 0, 1000)).toBe(1000);
  });
});
