import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HasAlreadyRunError } from './errors.js';
import { MAX_TIMEOUT_MS, Timer } from './timer.js';

describe('Timer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs the callback once the delay has passed', async () => {
    const cb = vi.fn();
    const timer = new Timer(5_000, cb, { onError: vi.fn() });

    await vi.advanceTimersByTimeAsync(4_999);
    expect(cb).not.toHaveBeenCalled();
    expect(timer.hasRun).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(cb).toHaveBeenCalledOnce();
    expect(timer.hasRun).toBe(true);
  });

  it('does not run after cancel()', async () => {
    const cb = vi.fn();
    const timer = new Timer(1_000, cb, { onError: vi.fn() });
    timer.cancel();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(cb).not.toHaveBeenCalled();
    expect(timer.cancelled).toBe(true);
  });

  it('skip() runs the callback immediately and only once', async () => {
    const cb = vi.fn();
    const timer = new Timer(60_000, cb, { onError: vi.fn() });
    await timer.skip();
    expect(cb).toHaveBeenCalledOnce();

    await vi.advanceTimersByTimeAsync(120_000);
    expect(cb).toHaveBeenCalledOnce();
  });

  it('throws HasAlreadyRunError once the callback has run', async () => {
    const timer = new Timer(10, vi.fn(), { onError: vi.fn() });
    await vi.advanceTimersByTimeAsync(10);
    expect(() => timer.cancel()).toThrow(HasAlreadyRunError);
    expect(() => timer.skip()).toThrow(HasAlreadyRunError);
  });

  it('chains delays longer than a single timeout', async () => {
    const cb = vi.fn();
    const delay = MAX_TIMEOUT_MS + 60_000;
    new Timer(delay, cb, { onError: vi.fn() });

    await vi.advanceTimersByTimeAsync(MAX_TIMEOUT_MS);
    expect(cb).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(cb).toHaveBeenCalledOnce();
  });

  it('hands callback errors to onError', async () => {
    const boom = new Error('boom');
    const onError = vi.fn();
    new Timer(10, () => Promise.reject(boom), { onError });
    await vi.advanceTimersByTimeAsync(10);
    expect(onError).toHaveBeenCalledWith(boom);
  });
});
