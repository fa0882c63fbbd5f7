export { CounterViewModel, sleep } from './counter-viewmodel';
export type {
  ActionName,
  CounterActions,
  CounterViewModelOptions,
  Sleep
} from './counter-viewmodel';
