/**
 * Application Types - immutable data structures
 *
 * Pure data types with no behavior beyond construction and comparison.
 * All fields are readonly and every record is frozen on creation.
 */

// ============================================================================
// Functional Programming Primitives (Option/Either)
// ============================================================================

export type Option<A> = Some<A> | None;

export interface Some<A> {
  readonly _tag: 'Some';
  readonly value: A;
}

export interface None {
  readonly _tag: 'None';
}

export const Some = <A>(value: A): Option<A> => ({ _tag: 'Some', value });
export const None: Option<never> = { _tag: 'None' };

export const isSome = <A>(opt: Option<A>): opt is Some<A> => opt._tag === 'Some';

export type Either<L, R> = Left<L> | Right<R>;

export interface Left<L> {
  readonly _tag: 'Left';
  readonly left: L;
}

export interface Right<R> {
  readonly _tag: 'Right';
  readonly right: R;
}

export const Left = <L>(left: L): Either<L, never> => ({ _tag: 'Left', left });
export const Right = <R>(right: R): Either<never, R> => ({ _tag: 'Right', right });

export const isLeft = <L, R>(e: Either<L, R>): e is Left<L> => e._tag === 'Left';

export const fold = <L, R, A>(
  e: Either<L, R>,
  onLeft: (l: L) => A,
  onRight: (r: R) => A
): A => (isLeft(e) ? onLeft(e.left) : onRight(e.right));

// ============================================================================
// Domain Types
// ============================================================================

export const INITIAL_MESSAGE = 'press a button to start counting';

/**
 * Counter State - the whole display state at one instant.
 *
 * The record accepts any integer count; keeping it non-negative is the
 * ViewModel's job.
 */
export interface CounterState {
  readonly count: number;
  readonly message: string;
  readonly isLoading: boolean;
}

export const CounterState = {
  initial: (): CounterState => CounterState.create(0, INITIAL_MESSAGE),

  create: (count: number, message: string, isLoading = false): CounterState =>
    Object.freeze({
      count,
      message,
      isLoading
    }),

  copyWith: (state: CounterState, updates: Partial<CounterState>): CounterState =>
    CounterState.create(
      updates.count ?? state.count,
      updates.message ?? state.message,
      updates.isLoading ?? state.isLoading
    ),

  equals: (a: CounterState, b: CounterState): boolean =>
    a === b ||
    (a.count === b.count && a.message === b.message && a.isLoading === b.isLoading),

  toString: (state: CounterState): string =>
    `CounterState(count: ${state.count}, message: ${state.message}, isLoading: ${state.isLoading})`
};

/**
 * Validation error ADT for values handed to setCount.
 */
export type ValidationError =
  | { readonly _tag: 'NegativeValue'; readonly value: number }
  | { readonly _tag: 'NotAnInteger'; readonly value: number };

export const ValidationError = {
  NegativeValue: (value: number): ValidationError => ({ _tag: 'NegativeValue', value }),
  NotAnInteger: (value: number): ValidationError => ({ _tag: 'NotAnInteger', value })
};
