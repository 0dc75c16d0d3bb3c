/** Capability attached to a timer. Exactly one of the two is invoked, once. */
export interface TimerHandler {
  fire(): void;
  cancel(): void;
}

/** Strict "earlier than" ordering over deadlines. */
export type Earlier<Time> = (a: Time, b: Time) => boolean;

/** Slot index of a record inside the RecordArena. */
export type Handle = number;

export const NO_POSITION = -1;

export interface TimerRecord<Time, Identity> {
  deadline: Time;
  identity: Identity;
  handler: TimerHandler;
  heapPosition: number;
  // chain of live records sharing `identity`, newest first
  chainNext: Handle | null;
  chainPrev: Handle | null;
}

/** Default ordering for number, bigint and Date deadlines. */
export function naturalOrder(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'number') return comparable(a) < comparable(b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b;
  if (a instanceof Date && b instanceof Date) return comparable(a.getTime()) < comparable(b.getTime());
  throw new TypeError(`no natural order between ${typeof a} and ${typeof b}; pass an "earlier" comparator`);
}

// NaN compares false both ways and would pin itself to the top of the heap
function comparable(t: number): number {
  if (Number.isNaN(t)) throw new RangeError('deadline is NaN or an invalid Date');
  return t;
}

function noop(): void {}

export function handlerOf(fire: () => void, cancel: () => void = noop): TimerHandler {
  return { fire, cancel };
}
