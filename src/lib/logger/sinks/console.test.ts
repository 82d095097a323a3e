import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConsoleSink } from './console';
import type { LogEntry } from '../types';
import { LogLevel } from '../types';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date(2024, 0, 15, 9, 5, 3).getTime(),
    type: 'info',
    template: 'Started',
    message: 'Started',
    ...overrides,
  };
}

describe('ConsoleSink', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let warnSpy: MockInstance<typeof console.warn>;
  let infoSpy: MockInstance<typeof console.info>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('routing', () => {
    test('sends each type to its console method', () => {
      const sink = new ConsoleSink({ colors: false, minLevel: LogLevel.DEBUG });

      sink.write(entry({ type: 'error', message: 'e' }));
      sink.write(entry({ type: 'warn', message: 'w' }));
      sink.write(entry({ type: 'info', message: 'i' }));
      sink.write(entry({ type: 'success', message: 's' }));
      sink.write(entry({ type: 'notice', message: 'n' }));
      sink.write(entry({ type: 'debug', message: 'd' }));

      expect(errorSpy.mock.calls).toEqual([['e']]);
      expect(warnSpy.mock.calls).toEqual([['w']]);
      expect(infoSpy.mock.calls).toEqual([['i']]);
      expect(logSpy.mock.calls).toEqual([['s'], ['n'], ['d']]);
    });

    test('writes raw entries as they are', () => {
      const sink = new ConsoleSink({ typeLabels: true });

      sink.write(entry({ type: 'raw', serviceName: 'web', message: 'as is' }));

      expect(logSpy).toHaveBeenCalledWith('as is');
    });
  });

  describe('format', () => {
    test('prefixes service and entity names', () => {
      const sink = new ConsoleSink();

      expect(
        sink.format(
          entry({ serviceName: 'orchestrator', entityName: 'fetcher' }),
        ),
      ).toBe('[orchestrator] [fetcher] Started');
    });

    test('adds type labels', () => {
      const sink = new ConsoleSink({ typeLabels: true });

      expect(sink.format(entry({ type: 'warn' }))).toBe('[WARN] Started');
    });

    test('adds a local timestamp first', () => {
      const sink = new ConsoleSink({ timestamps: true, typeLabels: true });

      expect(sink.format(entry({ serviceName: 'web' }))).toBe(
        '[01-15-2024 09:05:03] [INFO] [web] Started',
      );
    });

    test('writes the formatted line', () => {
      const sink = new ConsoleSink({ colors: false });

      sink.write(entry({ serviceName: 'producer', message: 'Connected' }));

      expect(infoSpy).toHaveBeenCalledWith('[producer] Connected');
    });
  });

  describe('levels', () => {
    test('skips debug by default', () => {
      const sink = new ConsoleSink({ colors: false });

      sink.write(entry({ type: 'debug' }));

      expect(logSpy).not.toHaveBeenCalled();
      expect(sink.getMinLevel()).toBe(LogLevel.INFO);
    });

    test('setMinLevel narrows output', () => {
      const sink = new ConsoleSink({ colors: false });
      sink.setMinLevel(LogLevel.WARN);

      sink.write(entry({ type: 'info' }));
      sink.write(entry({ type: 'notice' }));
      sink.write(entry({ type: 'warn', message: 'kept' }));

      expect(infoSpy).not.toHaveBeenCalled();
      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('kept');
    });

    test('raw entries ignore the minimum level', () => {
      const sink = new ConsoleSink({ minLevel: LogLevel.ERROR });

      sink.write(entry({ type: 'raw', message: 'always' }));

      expect(logSpy).toHaveBeenCalledWith('always');
    });
  });

  describe('muting and closing', () => {
    test('a muted sink writes nothing until unmuted', () => {
      const sink = new ConsoleSink({ colors: false, muted: true });

      sink.write(entry({ message: 'hidden' }));
      expect(sink.isMuted()).toBe(true);

      sink.unmute();
      sink.write(entry({ message: 'shown' }));
      sink.mute();
      sink.write(entry({ message: 'hidden again' }));

      expect(infoSpy.mock.calls).toEqual([['shown']]);
    });

    test('a closed sink writes nothing', () => {
      const sink = new ConsoleSink({ colors: false });
      sink.close();

      sink.write(entry({ type: 'error' }));
      sink.write(entry({ type: 'raw' }));

      expect(errorSpy).not.toHaveBeenCalled();
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
