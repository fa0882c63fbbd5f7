/**
 * StateNotifier - observable holder of a single immutable value
 *
 * Every assignment to `state` is a replacement and is published to all
 * listeners, in the order replacements happen. Assignments made while a
 * notification is running are queued behind it.
 */

import { logger as defaultLogger, Logger } from '../logger';

export type Listener<T> = (state: T) => void;
export type Unsubscribe = () => void;

/**
 * Anything that exposes a current value and change notifications.
 */
export interface Observable<T> {
  readonly getCurrentState: () => T;
  readonly observe: (listener: Listener<T>) => Unsubscribe;
}

export class DisposedError extends Error {
  constructor(owner: string) {
    super(`${owner} was used after being disposed`);
    this.name = 'DisposedError';
  }
}

export class StateNotifier<T> implements Observable<T> {
  private current: T;
  private readonly listeners = new Set<Listener<T>>();
  private readonly queue: Array<{ state: T; recipients: Listener<T>[] }> = [];
  private notifying = false;
  private disposed = false;

  constructor(initialState: T, protected readonly log: Logger = defaultLogger) {
    this.current = initialState;
  }

  get mounted(): boolean {
    return !this.disposed;
  }

  protected get state(): T {
    return this.current;
  }

  protected set state(next: T) {
    if (this.disposed) {
      throw new DisposedError(this.constructor.name);
    }
    this.current = next;
    this.publish(next);
  }

  readonly getCurrentState = (): T => this.current;

  readonly observe = (listener: Listener<T>): Unsubscribe => {
    if (this.disposed) {
      throw new DisposedError(this.constructor.name);
    }
    // Wrap so the same function can be registered twice independently.
    const entry: Listener<T> = state => listener(state);
    this.listeners.add(entry);
    return () => {
      this.listeners.delete(entry);
    };
  };

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
    this.queue.length = 0;
  }

  private publish(next: T): void {
    // Recipients are fixed when the replacement happens, not when it is delivered.
    this.queue.push({ state: next, recipients: [...this.listeners] });
    if (this.notifying) return;

    this.notifying = true;
    try {
      let pending = this.queue.shift();
      while (pending) {
        this.deliver(pending.state, pending.recipients);
        pending = this.queue.shift();
      }
    } finally {
      this.notifying = false;
    }
  }

  private deliver(state: T, recipients: Listener<T>[]): void {
    for (const listener of recipients) {
      if (!this.listeners.has(listener)) continue;
      try {
        listener(state);
      } catch (error) {
        this.log.error('State listener failed', error, {
          notifier: this.constructor.name
        });
      }
    }
  }
}
