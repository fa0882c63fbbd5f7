import React, { createContext, useContext, ReactNode } from 'react';
import type { CounterViewModel } from 'counter-core';

const CounterContext = createContext<CounterViewModel | undefined>(undefined);

interface CounterProviderProps {
  viewModel: CounterViewModel;
  children: ReactNode;
}

// The ViewModel is created by the caller, so it outlives re-mounts of the tree.
export const CounterProvider: React.FC<CounterProviderProps> = ({ viewModel, children }) => (
  <CounterContext.Provider value={viewModel}>{children}</CounterContext.Provider>
);

export const useCounterViewModel = (): CounterViewModel => {
  const context = useContext(CounterContext);
  if (context === undefined) {
    throw new Error('useCounterViewModel must be used within a CounterProvider');
  }
  return context;
};
