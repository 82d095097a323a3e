import { errorToString } from './error-to-string';

/**
 * Normalize anything thrown into an Error, keeping Errors as they are
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  return new Error(errorToString(value, false), { cause: value });
}
