/**
 * Counter FSM - pure state transitions
 *
 * Only pure functions live here. The ViewModel decides when each
 * transition runs (before or after a delay); this module decides what the
 * next state looks like.
 *
 * Usage:
 *   const next = completeIncrement(current)
 */

import {
  CounterState,
  Either,
  Left,
  Right,
  ValidationError
} from './types';

// ============================================================================
// Messages
// ============================================================================

export const RESET_MESSAGE = 'counter was reset';
export const NEGATIVE_VALUE_MESSAGE = 'error: negative values are not allowed';
export const NOT_AN_INTEGER_MESSAGE = 'error: only whole numbers are allowed';

export const BATCH_STEP = 10;

/**
 * Message shown after an increment.
 *
 * Rules are checked top to bottom and the first match wins, so the exact
 * 50 and 100 rules only ever see counts of 20 and above.
 */
export const messageForCount = (count: number): string => {
  if (count === 0) return 'count is zero';
  if (count < 5) return `count: ${count} - still early!`;
  if (count < 10) return `count: ${count} - good pace!`;
  if (count < 20) return `count: ${count} - impressive!`;
  if (count === 50) return '🎉 reached 50! congratulations!';
  if (count === 100) return '🏆 reached 100! excellent!';
  return `count: ${count} - keep it up!`;
};

/**
 * Message shown after setCount.
 */
export const customMessage = (value: number): string => {
  if (value === 0) return 'counter set to 0';
  if (value === 42) return '42 - the answer to life, the universe, and everything!';
  if (value === 100) return '100 - a perfect number!';
  if (value > 1000) return `${value} - that's a very large number!`;
  return `counter set to ${value}`;
};

export const batchMessage = (count: number): string =>
  `incremented by ${BATCH_STEP} at once! now: ${count}`;

// ============================================================================
// Validation (Pure)
// ============================================================================

/**
 * Validate a value before it is applied by setCount.
 * Negative values are reported ahead of fractional ones.
 */
export const validateCount = (value: number): Either<ValidationError, number> => {
  if (value < 0) {
    return Left(ValidationError.NegativeValue(value));
  }

  if (!Number.isInteger(value)) {
    return Left(ValidationError.NotAnInteger(value));
  }

  return Right(value);
};

export const validationMessage = (error: ValidationError): string => {
  switch (error._tag) {
    case 'NegativeValue':
      return NEGATIVE_VALUE_MESSAGE;
    case 'NotAnInteger':
      return NOT_AN_INTEGER_MESSAGE;
  }
};

// ============================================================================
// State Transition Functions (Pure)
// ============================================================================

export const beginLoading = (state: CounterState): CounterState =>
  CounterState.copyWith(state, { isLoading: true });

export const completeIncrement = (state: CounterState): CounterState => {
  const newCount = state.count + 1;
  return CounterState.create(newCount, messageForCount(newCount), false);
};

export const completeBatch = (state: CounterState): CounterState => {
  const newCount = state.count + BATCH_STEP;
  return CounterState.create(newCount, batchMessage(newCount), false);
};

export const resetState = (): CounterState =>
  CounterState.copyWith(CounterState.initial(), { message: RESET_MESSAGE });

export const completeSet = (value: number): CounterState =>
  CounterState.create(value, customMessage(value), false);

/**
 * Rejected input only changes the message; count and loading flag stay.
 */
export const rejectInput = (state: CounterState, error: ValidationError): CounterState =>
  CounterState.copyWith(state, { message: validationMessage(error) });
