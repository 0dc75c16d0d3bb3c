import type { Handle } from './record.js';

/** earliestDeadline()/peekMin() on an empty queue. Callers must check isEmpty() first. */
export class EmptyQueueError extends Error {
  constructor() {
    super('timer queue is empty');
    this.name = 'EmptyQueueError';
  }
}

export class StaleHandleError extends Error {
  constructor(readonly handle: Handle) {
    super(`no live timer record at handle ${handle}`);
    this.name = 'StaleHandleError';
  }
}

export class ReactorStoppedError extends Error {
  constructor(reactor: string) {
    super(`reactor "${reactor}" is stopped`);
    this.name = 'ReactorStoppedError';
  }
}

export class ConfigError extends Error {
  constructor(readonly key: string, value: string) {
    super(`invalid value for ${key}: ${JSON.stringify(value)}`);
    this.name = 'ConfigError';
  }
}
