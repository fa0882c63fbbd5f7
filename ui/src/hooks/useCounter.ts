import { useSyncExternalStore } from 'react';
import type { CounterActions, Projection } from 'counter-core';
import { useCounterViewModel } from '../context/CounterContext';

/**
 * Subscribe to a single projection. The component re-renders only when
 * that projection's value changes.
 */
export function useProjection<T>(projection: Projection<T>): T {
  return useSyncExternalStore(projection.observe, projection.get, projection.get);
}

export const useCount = (): number => useProjection(useCounterViewModel().count);

export const useCounterMessage = (): string => useProjection(useCounterViewModel().message);

export const useIsLoading = (): boolean => useProjection(useCounterViewModel().isLoading);

// Reading the actions never subscribes the caller to state.
export const useCounterActions = (): CounterActions => useCounterViewModel().actions;
