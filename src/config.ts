import { ConfigError } from './core/errors.js';
import { MAX_TIMEOUT_MS, type ReactorOptions } from './reactor/reactor.js';

/** Reads REACTOR_NAME and REACTOR_MAX_WAIT_MS. */
export function reactorOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ReactorOptions {
  const rawWait = env.REACTOR_MAX_WAIT_MS || '60000';
  const maxWaitMs = parseInt(rawWait, 10);
  if (!/^\d+$/.test(rawWait) || maxWaitMs <= 0 || maxWaitMs > MAX_TIMEOUT_MS) {
    throw new ConfigError('REACTOR_MAX_WAIT_MS', rawWait);
  }
  return {
    name: env.REACTOR_NAME || 'default',
    maxWaitMs,
  };
}
