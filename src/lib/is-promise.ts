/**
 * Thenable check used wherever a callback may or may not return a promise.
 */
export function isPromise(value: unknown): value is PromiseLike<unknown> {
  return (
    !!value &&
    (typeof value === 'object' || typeof value === 'function') &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
