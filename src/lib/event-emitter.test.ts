import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter, EventEmitterProtected } from './event-emitter';
import { onCallbackError } from './safe-handle-callback';

interface TestEventMap {
  message: string;
  count: number;
  ping: undefined;
}

describe('EventEmitter', () => {
  let reported: Error[];
  let release: () => void;

  beforeEach(() => {
    reported = [];
    release = onCallbackError((error) => {
      reported.push(error);
    });
  });

  afterEach(() => {
    release();
  });

  test('basic event subscription and emission', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback = vi.fn();

    emitter.on('message', callback);
    emitter.emit('message', 'hello');

    expect(callback).toHaveBeenCalledWith('hello');
  });

  test('unsubscribe from event', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback = vi.fn();

    const unsubscribe = emitter.on('message', callback);
    unsubscribe();
    emitter.emit('message', 'hello');

    expect(callback).not.toHaveBeenCalled();
    expect(emitter.hasListeners('message')).toBe(false);
  });

  test('once subscription', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback = vi.fn();

    emitter.once('message', callback);
    emitter.emit('message', 'first');
    emitter.emit('message', 'second');

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith('first');
  });

  test('multiple subscribers', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    emitter.on('count', callback1);
    emitter.on('count', callback2);
    emitter.emit('count', 3);

    expect(callback1).toHaveBeenCalledWith(3);
    expect(callback2).toHaveBeenCalledWith(3);
  });

  test('hasListeners and listenerCount', () => {
    const emitter = new EventEmitter<TestEventMap>();

    expect(emitter.hasListeners('ping')).toBe(false);
    expect(emitter.listenerCount('ping')).toBe(0);

    emitter.on('ping', () => {});

    expect(emitter.hasListeners('ping')).toBe(true);
    expect(emitter.listenerCount('ping')).toBe(1);
  });

  test('clear all listeners', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    emitter.on('message', callback1);
    emitter.on('count', callback2);
    emitter.clear();

    emitter.emit('message', 'hello');
    emitter.emit('count', 1);

    expect(callback1).not.toHaveBeenCalled();
    expect(callback2).not.toHaveBeenCalled();
  });

  test('clear specific event listeners', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    emitter.on('message', callback1);
    emitter.on('count', callback2);
    emitter.clear('message');

    emitter.emit('message', 'hello');
    emitter.emit('count', 1);

    expect(callback1).not.toHaveBeenCalled();
    expect(callback2).toHaveBeenCalledWith(1);
  });

  test('a once handler may unsubscribe during emission', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const calls: string[] = [];

    emitter.once('message', (data) => {
      calls.push(`once:${data}`);
    });
    emitter.on('message', (data) => {
      calls.push(`on:${data}`);
    });

    emitter.emit('message', 'a');
    emitter.emit('message', 'b');

    expect(calls).toEqual(['once:a', 'on:a', 'on:b']);
  });

  test('async event handlers', async () => {
    const emitter = new EventEmitter<TestEventMap>();
    const result: string[] = [];

    emitter.on('message', async (data) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      result.push(data);
    });

    emitter.emit('message', 'hello');

    await vi.waitFor(() => {
      expect(result).toEqual(['hello']);
    });
  });

  test('a throwing handler is reported and the others still run', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const after = vi.fn();

    emitter.on('ping', () => {
      throw new Error('Test error');
    });
    emitter.on('ping', after);

    expect(() => emitter.emit('ping', undefined)).not.toThrow();

    expect(after).toHaveBeenCalledTimes(1);
    expect(reported).toHaveLength(1);
    expect(reported[0]?.message).toContain('event handler for ping');
    expect(reported[0]?.message).toContain('Test error');
  });

  test('a rejecting async handler is reported', async () => {
    const emitter = new EventEmitter<TestEventMap>();

    emitter.on('ping', () => Promise.reject(new Error('Async test error')));
    emitter.emit('ping', undefined);

    await vi.waitFor(() => {
      expect(reported).toHaveLength(1);
    });

    expect(reported[0]?.message).toContain('event handler for ping');
    expect(reported[0]?.message).toContain('Async test error');
  });
});

describe('EventEmitterProtected', () => {
  class Counter extends EventEmitterProtected<TestEventMap> {
    private value = 0;

    public increment(): void {
      this.value++;
      this.emit('count', this.value);
    }
  }

  test('protected emit can be called from derived class', () => {
    const counter = new Counter();
    const callback = vi.fn();

    counter.on('count', callback);
    counter.increment();
    counter.increment();

    expect(callback.mock.calls).toEqual([[1], [2]]);
  });

  test('all subscription methods work with protected emitter', () => {
    const counter = new Counter();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    counter.on('count', callback1);
    counter.once('count', callback2);

    expect(counter.listenerCount('count')).toBe(2);

    counter.increment();
    counter.increment();

    expect(callback1).toHaveBeenCalledTimes(2);
    expect(callback2).toHaveBeenCalledTimes(1);
    expect(counter.listenerCount('count')).toBe(1);
  });
});
