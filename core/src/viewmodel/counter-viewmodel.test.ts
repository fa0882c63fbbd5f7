import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CounterViewModel } from './counter-viewmodel';
import { CounterState, INITIAL_MESSAGE } from '../application/types';
import { NEGATIVE_VALUE_MESSAGE, RESET_MESSAGE } from '../application/counter-fsm';
import { DisposedError } from '../platform/state-notifier';
import type { Logger } from '../logger';

const quietLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

describe('CounterViewModel', () => {
  let viewModel: CounterViewModel;

  beforeEach(() => {
    vi.useFakeTimers();
    viewModel = new CounterViewModel({ logger: quietLogger() });
  });

  afterEach(() => {
    viewModel.dispose();
    vi.useRealTimers();
  });

  const settle = async (action: Promise<void>, ms: number): Promise<void> => {
    await vi.advanceTimersByTimeAsync(ms);
    await action;
  };

  it('starts from the initial state', () => {
    expect(viewModel.getCurrentState()).toEqual({
      count: 0,
      message: INITIAL_MESSAGE,
      isLoading: false
    });
  });

  describe('increment', () => {
    it('shows loading for 300ms, then adds one', async () => {
      const pending = viewModel.increment();

      expect(viewModel.getCurrentState()).toEqual({
        count: 0,
        message: INITIAL_MESSAGE,
        isLoading: true
      });

      await vi.advanceTimersByTimeAsync(299);
      expect(viewModel.getCurrentState().isLoading).toBe(true);

      await settle(pending, 1);
      expect(viewModel.getCurrentState()).toEqual({
        count: 1,
        message: 'count: 1 - still early!',
        isLoading: false
      });
    });

    it('reaches n after n sequential calls', async () => {
      for (let i = 0; i < 12; i++) {
        await settle(viewModel.increment(), 300);
      }

      expect(viewModel.getCurrentState()).toEqual({
        count: 12,
        message: 'count: 12 - impressive!',
        isLoading: false
      });
    });

    it('publishes the loading state and the result in order', async () => {
      const seen: CounterState[] = [];
      viewModel.observe(state => seen.push(state));

      await settle(viewModel.increment(), 300);

      expect(seen).toEqual([
        { count: 0, message: INITIAL_MESSAGE, isLoading: true },
        { count: 1, message: 'count: 1 - still early!', isLoading: false }
      ]);
    });
  });

  describe('incrementBatch', () => {
    it('adds ten after 500ms', async () => {
      await settle(viewModel.setCount(7), 250);

      const pending = viewModel.incrementBatch();
      await vi.advanceTimersByTimeAsync(499);
      expect(viewModel.getCurrentState()).toEqual({
        count: 7,
        message: 'counter set to 7',
        isLoading: true
      });

      await settle(pending, 1);
      expect(viewModel.getCurrentState()).toEqual({
        count: 17,
        message: 'incremented by 10 at once! now: 17',
        isLoading: false
      });
    });
  });

  describe('reset', () => {
    it('returns to zero with the reset message after 200ms', async () => {
      await settle(viewModel.incrementBatch(), 500);

      const pending = viewModel.reset();
      expect(viewModel.getCurrentState()).toEqual({
        count: 10,
        message: 'incremented by 10 at once! now: 10',
        isLoading: true
      });

      await settle(pending, 200);
      expect(viewModel.getCurrentState()).toEqual({
        count: 0,
        message: RESET_MESSAGE,
        isLoading: false
      });
    });
  });

  describe('setCount', () => {
    it.each([
      [42, '42 - the answer to life, the universe, and everything!'],
      [100, '100 - a perfect number!'],
      [0, 'counter set to 0'],
      [5000, "5000 - that's a very large number!"],
      [7, 'counter set to 7']
    ])('sets %i after 250ms', async (value, message) => {
      const pending = viewModel.setCount(value);
      expect(viewModel.getCurrentState().isLoading).toBe(true);

      await settle(pending, 250);
      expect(viewModel.getCurrentState()).toEqual({ count: value, message, isLoading: false });
    });

    it('rejects negative values with a message and no loading phase', async () => {
      await settle(viewModel.increment(), 300);
      const seen: CounterState[] = [];
      viewModel.observe(state => seen.push(state));

      await viewModel.setCount(-1);

      expect(vi.getTimerCount()).toBe(0);
      expect(seen).toEqual([
        { count: 1, message: NEGATIVE_VALUE_MESSAGE, isLoading: false }
      ]);
    });

    it('rejects fractional values the same way', async () => {
      await viewModel.setCount(2.5);

      expect(viewModel.getCurrentState()).toEqual({
        count: 0,
        message: 'error: only whole numbers are allowed',
        isLoading: false
      });
    });
  });

  describe('projections', () => {
    it('notify only when their own field changes', async () => {
      const counts: number[] = [];
      const messages: string[] = [];
      const loading: boolean[] = [];
      viewModel.count.observe(value => counts.push(value));
      viewModel.message.observe(value => messages.push(value));
      viewModel.isLoading.observe(value => loading.push(value));

      await settle(viewModel.increment(), 300);
      await viewModel.setCount(-3);

      expect(counts).toEqual([1]);
      expect(messages).toEqual(['count: 1 - still early!', NEGATIVE_VALUE_MESSAGE]);
      expect(loading).toEqual([true, false]);
    });

    it('read the current state synchronously', () => {
      void viewModel.increment();

      expect(viewModel.count.get()).toBe(0);
      expect(viewModel.message.get()).toBe(INITIAL_MESSAGE);
      expect(viewModel.isLoading.get()).toBe(true);
    });
  });

  describe('actions accessor', () => {
    it('is a single frozen handle that does not subscribe', async () => {
      const observeSpy = vi.spyOn(viewModel, 'observe');
      const actions = viewModel.actions;

      expect(viewModel.actions).toBe(actions);
      expect(Object.isFrozen(actions)).toBe(true);
      expect(observeSpy).not.toHaveBeenCalled();

      await settle(actions.setCount(100), 250);
      expect(viewModel.getCurrentState().message).toBe('100 - a perfect number!');
    });
  });

  describe('overlapping actions', () => {
    it('let the last completion win', async () => {
      const increment = viewModel.increment();
      const reset = viewModel.reset();

      await vi.advanceTimersByTimeAsync(200);
      await reset;
      expect(viewModel.getCurrentState()).toEqual({
        count: 0,
        message: RESET_MESSAGE,
        isLoading: false
      });

      await settle(increment, 100);
      expect(viewModel.getCurrentState()).toEqual({
        count: 1,
        message: 'count: 1 - still early!',
        isLoading: false
      });
    });

    it('apply increments on top of each other', async () => {
      const first = viewModel.increment();
      const second = viewModel.increment();

      await settle(Promise.all([first, second]).then(() => undefined), 300);

      expect(viewModel.getCurrentState().count).toBe(2);
    });
  });

  describe('dispose', () => {
    it('drops the result of an action still in flight', async () => {
      const pending = viewModel.increment();
      viewModel.dispose();

      await settle(pending, 300);

      expect(viewModel.getCurrentState()).toEqual({
        count: 0,
        message: INITIAL_MESSAGE,
        isLoading: true
      });
    });

    it('rejects new actions', async () => {
      viewModel.dispose();

      await expect(viewModel.increment()).rejects.toBeInstanceOf(DisposedError);
      await expect(viewModel.setCount(-1)).rejects.toBeInstanceOf(DisposedError);
    });
  });

  it('honours configured delays and a custom sleep', async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const custom = new CounterViewModel({ delays: { reset: 5 }, sleep, logger: quietLogger() });

    await custom.reset();
    await custom.increment();

    expect(sleep).toHaveBeenNthCalledWith(1, 5);
    expect(sleep).toHaveBeenNthCalledWith(2, 300);
    expect(custom.getCurrentState().count).toBe(1);
    custom.dispose();
  });

  it('delivers loading changes to every projection observer when one throws', async () => {
    const log = quietLogger();
    const instant = new CounterViewModel({ sleep: () => Promise.resolve(), logger: log });
    const loading: boolean[] = [];

    instant.isLoading.observe(() => {
      throw new Error('render failed');
    });
    instant.isLoading.observe(value => loading.push(value));

    await instant.increment();

    expect(loading).toEqual([true, false]);
    expect(log.error).toHaveBeenCalledTimes(2);
    instant.dispose();
  });
});
