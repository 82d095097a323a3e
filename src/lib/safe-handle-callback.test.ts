import { describe, expect, it, vi, afterEach } from 'vitest';
import { onCallbackError, safeHandleCallback } from './safe-handle-callback';
import { sleep } from './sleep';

describe('safeHandleCallback', () => {
  const releases: Array<() => void> = [];

  const collectErrors = (): Error[] => {
    const reported: Error[] = [];

    releases.push(
      onCallbackError((error) => {
        reported.push(error);
      }),
    );

    return reported;
  };

  afterEach(() => {
    for (const release of releases.splice(0)) {
      release();
    }

    vi.restoreAllMocks();
  });

  it('should call a synchronous callback with its arguments', () => {
    let resultSaved = 0;

    safeHandleCallback(
      'syncCallback',
      (value: number): void => {
        resultSaved = value;
      },
      5,
    );

    expect(resultSaved).toBe(5);
  });

  it('should call an asynchronous callback without awaiting it', async () => {
    let resultSaved = 0;

    safeHandleCallback(
      'asyncCallback',
      async (a: number, b: number): Promise<void> => {
        await sleep(1);
        resultSaved = a + b;
      },
      5,
      10,
    );

    expect(resultSaved).toBe(0);

    await vi.waitFor(() => {
      expect(resultSaved).toBe(15);
    });
  });

  it('should report errors thrown by a synchronous callback', () => {
    const reported = collectErrors();

    safeHandleCallback('syncCallbackWithError', () => {
      throw new Error('Sync error');
    });

    expect(reported).toHaveLength(1);
    expect(reported[0]?.message).toContain(
      'Error in a callback syncCallbackWithError',
    );
    expect(reported[0]?.message).toContain('Sync error');
  });

  it('should report rejections of an asynchronous callback', async () => {
    const reported = collectErrors();

    safeHandleCallback('asyncCallbackWithError', async () => {
      await sleep(1);
      throw new Error('Async error');
    });

    await vi.waitFor(() => {
      expect(reported).toHaveLength(1);
    });

    expect(reported[0]?.message).toContain(
      'Error in a callback asyncCallbackWithError',
    );
    expect(reported[0]?.message).toContain('Async error');
  });

  it('should keep the original error as the cause', () => {
    const reported = collectErrors();
    const original = new Error('Original');

    safeHandleCallback('withCause', () => {
      throw original;
    });

    expect(reported[0]?.cause).toBe(original);
  });

  it('should report a callback that is not a function', () => {
    const reported = collectErrors();

    safeHandleCallback('notAFunction', 'not a function');

    expect(reported[0]?.message).toContain(
      'Callback provided for notAFunction is not a function',
    );
  });

  it('should notify every listener until it is removed', () => {
    const first = collectErrors();
    const second: Error[] = [];
    const releaseSecond = onCallbackError((error) => {
      second.push(error);
    });

    safeHandleCallback('twice', () => {
      throw new Error('one');
    });
    releaseSecond();
    safeHandleCallback('twice', () => {
      throw new Error('two');
    });

    expect(first).toHaveLength(2);
    expect(second).toHaveLength(1);
  });

  it('should fall back to console.error without listeners', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

    safeHandleCallback('unobserved', () => {
      throw new Error('Nobody listening');
    });

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(String(consoleError.mock.calls[0]?.[0])).toContain(
      'Error in a callback unobserved',
    );
  });

  it('should survive a failing listener', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const reported = collectErrors();

    releases.push(
      onCallbackError(() => {
        throw new Error('listener broke');
      }),
    );

    safeHandleCallback('withBrokenListener', () => {
      throw new Error('Original');
    });

    expect(reported).toHaveLength(1);
    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(String(consoleError.mock.calls[0]?.[0])).toContain(
      'Error in callback error listener',
    );
  });
});
