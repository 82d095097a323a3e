import { errorToString } from './error-to-string';
import { isPromise } from './is-promise';
import { isFunction } from './is-function';
import { DOUBLE_EOL } from './constants';

export type CallbackErrorListener = (error: Error) => void;

const callbackErrorListeners = new Set<CallbackErrorListener>();

/**
 * Register a listener for errors raised by callbacks run through
 * `safeHandleCallback`.
 *
 * Node.js has no global `reportError` event, so failures are routed to these
 * listeners instead. With no listener registered they go to `console.error`.
 *
 * @returns A function that removes the listener
 */
export function onCallbackError(listener: CallbackErrorListener): () => void {
  callbackErrorListeners.add(listener);

  return () => {
    callbackErrorListeners.delete(listener);
  };
}

function reportCallbackError(callbackName: string, error: unknown): void {
  const reported = new Error(
    `Error in a callback ${callbackName}: ${DOUBLE_EOL}${errorToString(error)}`,
    { cause: error },
  );

  if (callbackErrorListeners.size === 0) {
    // eslint-disable-next-line no-console
    console.error(reported.message);
    return;
  }

  for (const listener of callbackErrorListeners) {
    try {
      listener(reported);
    } catch (listenerError) {
      // eslint-disable-next-line no-console
      console.error(
        `Error in callback error listener: ${errorToString(listenerError)}`,
      );
    }
  }
}

/**
 * Runs a callback, sync or async, without letting its failure escape.
 *
 * Fire-and-forget: the result is not awaited and errors are handed to the
 * callback error listeners.
 */
export function safeHandleCallback(
  callbackName: string,
  callback: unknown,
  ...args: unknown[]
): void {
  if (!isFunction(callback)) {
    reportCallbackError(
      callbackName,
      new Error(`Callback provided for ${callbackName} is not a function`),
    );
    return;
  }

  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.then(undefined, (error: unknown) => {
        reportCallbackError(callbackName, error);
      });
    }
  } catch (error) {
    reportCallbackError(callbackName, error);
  }
}
