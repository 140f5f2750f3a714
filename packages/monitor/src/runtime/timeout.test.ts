import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError, withTimeout } from './timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through a value that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000, 'slow')).resolves.toBe(42);
  });

  it('passes through a rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1_000, 'slow')).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError when the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 5_000, 'UI failed to shut down');
    const assertion = expect(pending).rejects.toThrow(TimeoutError);
    await vi.advanceTimersByTimeAsync(5_000);
    await assertion;
  });

  it('leaves no timer behind', async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve('done'), 5_000, 'slow');
    expect(vi.getTimerCount()).toBe(0);
  });
});
