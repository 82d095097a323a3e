/**
 * Sleeps for the specified number of milliseconds.
 *
 * When a signal is given the sleep ends early (resolving, not rejecting) as
 * soon as the signal aborts, so periodic tasks can be cancelled between runs.
 *
 *  ```typescript
 * await sleep(1000);
 * await sleep(30_000, app.runSignal);
 * ```
 */

export async function sleep(time: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }

  return new Promise<void>(function (resolve) {
    const onAbort = (): void => {
      clearTimeout(timeout);
      resolve();
    };

    const timeout = setTimeout(function () {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, time);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
