/**
 * Request Coalescer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RequestCoalescer } from '../request-coalescer.js';

describe('RequestCoalescer', () => {
  it('should share one run between concurrent callers of the same key', async () => {
    const coalescer = new RequestCoalescer<string>();
    let release: (value: string) => void = () => undefined;
    const fn = vi.fn(() => new Promise<string>((resolve) => { release = resolve; }));

    const first = coalescer.run('NOTG', fn);
    const second = coalescer.run('NOTG', fn);

    expect(coalescer.isInFlight('NOTG')).toBe(true);
    await Promise.resolve();
    release('done');

    await expect(first).resolves.toBe('done');
    await expect(second).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should run different keys independently', async () => {
    const coalescer = new RequestCoalescer<string>();
    const fn = vi.fn(async () => 'x');

    await Promise.all([coalescer.run('a', fn), coalescer.run('b', fn)]);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should release the key after the run settles', async () => {
    const coalescer = new RequestCoalescer<number>();
    const fn = vi.fn(async () => 1);

    await coalescer.run('k', fn);
    await coalescer.run('k', fn);

    expect(fn).toHaveBeenCalledTimes(2);
    expect(coalescer.size()).toBe(0);
  });

  it('should release the key after a failure, including a synchronous throw', async () => {
    const coalescer = new RequestCoalescer<number>();
    const failing = vi.fn((): Promise<number> => {
      throw new Error('boom');
    });

    await expect(coalescer.run('k', failing)).rejects.toThrow('boom');
    expect(coalescer.isInFlight('k')).toBe(false);

    await expect(coalescer.run('k', async () => 7)).resolves.toBe(7);
  });
});
