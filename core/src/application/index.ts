/**
 * Application Layer - pure counter logic
 *
 * Architecture:
 * - types.ts: immutable data types
 * - counter-fsm.ts: pure transitions, messages and validation
 */

export * from './types';

export {
  RESET_MESSAGE,
  NEGATIVE_VALUE_MESSAGE,
  NOT_AN_INTEGER_MESSAGE,
  BATCH_STEP,
  messageForCount,
  customMessage,
  batchMessage,
  validateCount,
  validationMessage,
  beginLoading,
  completeIncrement,
  completeBatch,
  resetState,
  completeSet,
  rejectInput
} from './counter-fsm';
