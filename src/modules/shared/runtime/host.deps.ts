/**
 * Host Dependencies Contract
 *
 * Runtime collaborators injected into caches, aggregators and providers.
 * Nothing under modules/ reads the wall clock or writes to the console
 * directly; it goes through these interfaces so tests can swap them.
 */

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const defaultClock: Clock = {
  now: () => Date.now(),
};

/**
 * Console logger that prefixes every line with a component tag,
 * e.g. `[PoolAggregator] Fetched NOTG`.
 */
export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.log(`[${tag}] ${msg || ''}`, obj),
    warn: (obj, msg) => console.warn(`[${tag}] ${msg || ''}`, obj),
    error: (obj, msg) => console.error(`[${tag}] ${msg || ''}`, obj),
    debug: (obj, msg) => console.debug(`[${tag}] ${msg || ''}`, obj),
  };
}
