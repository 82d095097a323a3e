import { describe, expect, test } from 'vitest';
import { CompletionSignal } from './completion-signal';

describe('CompletionSignal', () => {
  test('resolves with the first value only', async () => {
    const signal = new CompletionSignal<string>();
    expect(signal.hasResolved).toBe(false);

    signal.resolveOnce('recovered');
    signal.resolveOnce('ignored');

    expect(signal.hasResolved).toBe(true);
    expect(await signal.promise).toBe('recovered');
  });

  test('works without a value', async () => {
    const signal = new CompletionSignal();
    signal.resolveOnce();

    await expect(signal.promise).resolves.toBeUndefined();
  });
});
