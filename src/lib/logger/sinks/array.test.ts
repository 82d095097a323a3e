import { describe, expect, test } from 'vitest';
import { ArraySink } from './array';
import type { LogEntry } from '../types';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: 1_700_000_000_000,
    type: 'info',
    template: 'Started',
    message: 'Started',
    ...overrides,
  };
}

describe('ArraySink', () => {
  test('keeps entries in order', () => {
    const sink = new ArraySink();
    const first = entry({ message: 'first' });
    const second = entry({ type: 'warn', message: 'second' });

    sink.write(first);
    sink.write(second);

    expect(sink.logs).toEqual([first, second]);
  });

  test('getMessages renders type and message', () => {
    const sink = new ArraySink();
    sink.write(entry({ type: 'error', message: 'boom' }));
    sink.write(entry({ type: 'success', message: 'done' }));

    expect(sink.getMessages()).toEqual(['error: boom', 'success: done']);
  });

  test('getMessages filters by service name', () => {
    const sink = new ArraySink();
    sink.write(entry({ serviceName: 'producer', message: 'a' }));
    sink.write(entry({ serviceName: 'consumer', message: 'b' }));
    sink.write(entry({ message: 'c' }));

    expect(sink.getMessages('consumer')).toEqual(['info: b']);
  });

  test('clear empties the log', () => {
    const sink = new ArraySink();
    sink.write(entry());
    sink.clear();

    expect(sink.logs).toEqual([]);
  });

  test('ignores writes after close', () => {
    const sink = new ArraySink();
    sink.write(entry({ message: 'before' }));
    sink.close();
    sink.write(entry({ message: 'after' }));

    expect(sink.getMessages()).toEqual(['info: before']);
  });

  test('stores the transformed entry', () => {
    const sink = new ArraySink({
      transformer: (log) => ({ ...log, timestamp: 0 }),
    });

    sink.write(entry());

    expect(sink.logs[0].timestamp).toBe(0);
  });

  test('a transformer returning false keeps the original entry', () => {
    const original = entry();
    const sink = new ArraySink({ transformer: () => false });

    sink.write(original);

    expect(sink.logs[0]).toBe(original);
  });
});
