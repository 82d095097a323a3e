import { describe, expect, test, vi, afterEach } from 'vitest';
import { sleep } from './sleep';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;

    const sleeping = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toBe(true);
  });

  test('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;

    const sleeping = sleep(60_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await sleeping;

    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  test('returns at once for an aborted signal', async () => {
    vi.useFakeTimers();

    await sleep(60_000, AbortSignal.abort());

    expect(vi.getTimerCount()).toBe(0);
  });
});
