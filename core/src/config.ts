import type { LogLevel } from './logger';

export type Env = Record<string, string | undefined>;

/**
 * Simulated latency per action, in milliseconds.
 */
export interface ActionDelays {
  readonly increment: number;
  readonly incrementBatch: number;
  readonly reset: number;
  readonly setCount: number;
}

export interface CounterConfig {
  readonly serviceName: string;
  readonly logLevel: LogLevel;
  readonly delays: ActionDelays;
}

export const DEFAULT_DELAYS: ActionDelays = {
  increment: 300,
  incrementBatch: 500,
  reset: 200,
  setCount: 250
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

// Browsers have no process object; fall back to an empty environment there.
export const processEnv = (): Env =>
  typeof process !== 'undefined' && process.env ? process.env : {};

const parseDelay = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

export const loadConfig = (env: Env = processEnv()): CounterConfig => {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();

  return {
    serviceName: env.OTEL_SERVICE_NAME || 'counter-viewmodel',
    logLevel: isLogLevel(level) ? level : 'info',
    delays: {
      increment: parseDelay(env.COUNTER_INCREMENT_DELAY_MS, DEFAULT_DELAYS.increment),
      incrementBatch: parseDelay(env.COUNTER_BATCH_DELAY_MS, DEFAULT_DELAYS.incrementBatch),
      reset: parseDelay(env.COUNTER_RESET_DELAY_MS, DEFAULT_DELAYS.reset),
      setCount: parseDelay(env.COUNTER_SET_DELAY_MS, DEFAULT_DELAYS.setCount)
    }
  };
};
