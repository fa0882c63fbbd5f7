/**
 * CounterViewModel - owner of the counter's display state
 *
 * Exposes four actions and three projections. Each action (except a
 * rejected setCount) publishes a loading state, waits for its simulated
 * latency, then publishes the result. Overlapping actions are not
 * sequenced: whichever finishes last wins.
 */

import { trace, SpanStatusCode } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';
import { CounterState, isLeft } from '../application/types';
import {
  beginLoading,
  completeBatch,
  completeIncrement,
  completeSet,
  rejectInput,
  resetState,
  validateCount
} from '../application/counter-fsm';
import { ActionDelays, loadConfig } from '../config';
import { Logger } from '../logger';
import { StateNotifier } from '../platform/state-notifier';
import { Projection, select } from '../platform/projection';

const tracer = trace.getTracer('counter-viewmodel');

export type ActionName = keyof ActionDelays;

/**
 * The action half of the ViewModel. Holding it never subscribes to state.
 */
export interface CounterActions {
  readonly increment: () => Promise<void>;
  readonly incrementBatch: () => Promise<void>;
  readonly reset: () => Promise<void>;
  readonly setCount: (value: number) => Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

export interface CounterViewModelOptions {
  delays?: Partial<ActionDelays>;
  sleep?: Sleep;
  logger?: Logger;
}

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class CounterViewModel extends StateNotifier<CounterState> {
  readonly count: Projection<number>;
  readonly message: Projection<string>;
  readonly isLoading: Projection<boolean>;

  private readonly delays: ActionDelays;
  private readonly wait: Sleep;
  private readonly actionAccessor: CounterActions;

  constructor(options: CounterViewModelOptions = {}) {
    super(CounterState.initial(), options.logger);
    this.delays = { ...loadConfig().delays, ...options.delays };
    this.wait = options.sleep ?? sleep;

    this.count = select(this, state => state.count, Object.is, this.log);
    this.message = select(this, state => state.message, Object.is, this.log);
    this.isLoading = select(this, state => state.isLoading, Object.is, this.log);

    this.actionAccessor = Object.freeze({
      increment: () => this.increment(),
      incrementBatch: () => this.incrementBatch(),
      reset: () => this.reset(),
      setCount: (value: number) => this.setCount(value)
    });
  }

  get actions(): CounterActions {
    return this.actionAccessor;
  }

  increment(): Promise<void> {
    return this.runAction('increment', completeIncrement);
  }

  incrementBatch(): Promise<void> {
    return this.runAction('incrementBatch', completeBatch);
  }

  reset(): Promise<void> {
    return this.runAction('reset', resetState);
  }

  async setCount(value: number): Promise<void> {
    const validated = validateCount(value);
    if (isLeft(validated)) {
      this.state = rejectInput(this.state, validated.left);
      this.log.debug('Rejected counter value', { value, reason: validated.left._tag });
      return;
    }

    const target = validated.right;
    await this.runAction('setCount', () => completeSet(target));
  }

  private runAction(
    name: ActionName,
    complete: (state: CounterState) => CounterState
  ): Promise<void> {
    const actionId = uuidv4();
    const delayMs = this.delays[name];

    return tracer.startActiveSpan(`counter.${name}`, async span => {
      span.setAttribute('counter.action_id', actionId);
      try {
        this.state = beginLoading(this.state);
        this.log.debug('Counter action started', { action: name, actionId, delayMs });

        await this.wait(delayMs);

        if (!this.mounted) {
          this.log.debug('Counter action finished after dispose', { action: name, actionId });
          return;
        }

        this.state = complete(this.state);
        this.log.debug('Counter action completed', {
          action: name,
          actionId,
          count: this.state.count
        });
        span.setStatus({ code: SpanStatusCode.OK });
      } catch (error) {
        span.recordException(error instanceof Error ? error : String(error));
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error)
        });
        throw error;
      } finally {
        span.end();
      }
    });
  }
}
