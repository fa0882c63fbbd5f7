/**
 * counter-core
 *
 * - application/: immutable state record and pure transitions
 * - platform/: observable container and projections
 * - viewmodel/: the counter ViewModel
 */

export * from './application';
export * from './platform';
export * from './viewmodel';
export { loadConfig, DEFAULT_DELAYS } from './config';
export type { ActionDelays, CounterConfig, Env } from './config';
export { logger, createLogger } from './logger';
export type { Logger, LoggerOptions, LogLevel, LogMeta } from './logger';
