import { Either, Left, Right } from 'counter-core';

export const INVALID_NUMBER_MESSAGE = 'please enter a valid number';

export type InputError = { readonly _tag: 'InvalidNumber'; readonly input: string };

const WHOLE_NUMBER = /^[+-]?\d+$/;

/**
 * Parse the set-value dialog's text into an integer.
 *
 * Negative numbers parse fine; rejecting them is the ViewModel's call.
 */
export const parseCountInput = (input: string): Either<InputError, number> => {
  const trimmed = input.trim();
  if (!WHOLE_NUMBER.test(trimmed)) {
    return Left({ _tag: 'InvalidNumber', input });
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    return Left({ _tag: 'InvalidNumber', input });
  }

  return Right(value);
};
