/**
 * Typed event emitter shared by the logger, lifecycle nodes and applications.
 *
 * Extend `EventEmitterProtected` when only the class itself should emit, or
 * use `EventEmitter` to make `emit` public. Listener failures never reach the
 * emitter: they are routed through `safeHandleCallback`.
 */

import { safeHandleCallback } from './safe-handle-callback';

export type EventCallback<T> = (data: T) => void | Promise<void>;

export class EventEmitterProtected<TEventMap extends object> {
  private events = new Map<keyof TEventMap, Set<EventCallback<never>>>();

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe from the event
   */
  public on<K extends keyof TEventMap & string>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    let callbacks = this.events.get(event);

    if (!callbacks) {
      callbacks = new Set();
      this.events.set(event, callbacks);
    }

    callbacks.add(callback);

    return () => {
      const current = this.events.get(event);

      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          this.events.delete(event);
        }
      }
    };
  }

  /**
   * Subscribe to an event once, unsubscribing after the first emission
   */
  public once<K extends keyof TEventMap & string>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEventMap & string): boolean {
    return (this.events.get(event)?.size ?? 0) > 0;
  }

  public listenerCount(event: keyof TEventMap & string): number {
    return this.events.get(event)?.size ?? 0;
  }

  /**
   * Remove all listeners for one event, or for every event
   */
  public clear(event?: keyof TEventMap & string): void {
    if (event) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  protected emit<K extends keyof TEventMap & string>(
    event: K,
    data: TEventMap[K],
  ): void {
    const callbacks = this.events.get(event);

    if (callbacks) {
      // Copy so once() handlers can unsubscribe while we iterate
      for (const callback of [...callbacks]) {
        safeHandleCallback(`event handler for ${event}`, callback, data);
      }
    }
  }
}

/**
 * Event emitter with a public `emit`.
 */
export class EventEmitter<
  TEventMap extends object,
> extends EventEmitterProtected<TEventMap> {
  public emit<K extends keyof TEventMap & string>(
    event: K,
    data: TEventMap[K],
  ): void {
    super.emit(event, data);
  }
}
