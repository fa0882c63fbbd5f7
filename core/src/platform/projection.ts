/**
 * Projection - a read-only, narrowly observable slice of an Observable
 *
 * A projection listens to its source only while it has observers of its
 * own. It remembers the last value it forwarded and stays silent when a
 * replacement leaves that value unchanged.
 */

import { Option, Some, None, isSome } from '../application/types';
import { logger as defaultLogger, Logger } from '../logger';
import { Listener, Observable, Unsubscribe } from './state-notifier';

export interface Projection<T> {
  readonly get: () => T;
  readonly observe: (listener: Listener<T>) => Unsubscribe;
}

export type Equality<T> = (a: T, b: T) => boolean;

export const select = <S, T>(
  source: Observable<S>,
  selector: (state: S) => T,
  equals: Equality<T> = Object.is,
  log: Logger = defaultLogger
): Projection<T> => {
  const observers = new Set<Listener<T>>();
  let lastSeen: Option<T> = None;
  let detach: Unsubscribe | undefined;

  const onSourceChange = (state: S): void => {
    const next = selector(state);
    if (isSome(lastSeen) && equals(lastSeen.value, next)) return;
    lastSeen = Some(next);
    for (const observer of [...observers]) {
      if (!observers.has(observer)) continue;
      try {
        observer(next);
      } catch (error) {
        log.error('Projection observer failed', error);
      }
    }
  };

  const get = (): T => selector(source.getCurrentState());

  const observe = (listener: Listener<T>): Unsubscribe => {
    const entry: Listener<T> = value => listener(value);
    if (observers.size === 0) {
      lastSeen = Some(get());
      detach = source.observe(onSourceChange);
    }
    observers.add(entry);

    return () => {
      if (!observers.delete(entry)) return;
      if (observers.size === 0 && detach) {
        detach();
        detach = undefined;
        lastSeen = None;
      }
    };
  };

  return { get, observe };
};
