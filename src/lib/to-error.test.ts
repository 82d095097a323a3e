import { describe, expect, test } from 'vitest';
import { toError } from './to-error';

describe('toError', () => {
  test('keeps errors as they are', () => {
    const error = new TypeError('bad');

    expect(toError(error)).toBe(error);
  });

  test('wraps strings', () => {
    const error = toError('timed out');

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('timed out');
    expect(error.cause).toBeUndefined();
  });

  test('renders other values and keeps them as the cause', () => {
    const thrown = { code: 'E_CLOSED' };
    const error = toError(thrown);

    expect(error.message).toBe('Code: E_CLOSED');
    expect(error.cause).toBe(thrown);
  });

  test('renders primitives', () => {
    expect(toError(404).message).toBe('Value: 404');
  });
});
