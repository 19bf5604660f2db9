/**
 * REQUEST COALESCER
 * =================
 *
 * Single-flight: concurrent requests for the same key share one promise.
 *
 * If four callers miss the same pool at once:
 * - Only 1 upstream request happens
 * - All 4 callers await the same promise
 *
 * The key is released once the promise settles, so a later miss starts a
 * fresh request.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Run fn unless a run for the same key is already in flight
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    // fn starts on the next microtask, after the key is registered
    const p = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, p);
    return p;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }
}
