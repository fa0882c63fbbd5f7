/**
 * Platform Layer - observable state infrastructure
 *
 * Architecture:
 * - state-notifier.ts: single-value container with ordered notifications
 * - projection.ts: per-field slices that notify only on change
 */

export { StateNotifier, DisposedError } from './state-notifier';
export type { Listener, Unsubscribe, Observable } from './state-notifier';
export { select } from './projection';
export type { Projection, Equality } from './projection';
