import { describe, expect, test } from 'vitest';
import { prepareErrorObjectLog } from './error-object';

describe('prepareErrorObjectLog', () => {
  test('puts the trimmed prefix on its own line', () => {
    expect(prepareErrorObjectLog('  Stop failed  ', 'late')).toBe(
      'Stop failed:\n\nValue: late',
    );
  });

  test('omits a blank prefix', () => {
    expect(prepareErrorObjectLog('', null)).toBe('Value: null');
  });

  test('renders error fields after the prefix', () => {
    const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });
    error.stack = undefined;

    expect(prepareErrorObjectLog('Connect failed', error)).toBe(
      'Connect failed:\n\nMessage: refused\nName: Error\nCode: ECONNREFUSED',
    );
  });
});
