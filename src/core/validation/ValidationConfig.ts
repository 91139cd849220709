import { ConfigurationError } from '../types/Errors';
import type { LogSink } from './Log';

export type Clock = () => Date;

/**
 * Options of one top-level validation call.
 */
export interface ValidationConfig {
  /** Stop at the first violation instead of collecting all of them. */
  failFast: boolean;
  /** Time source for temporal constraints. */
  clock: Clock;
  /** Receives one entry per constraint evaluation. */
  logger?: LogSink;
}

export type ValidationOptions = Partial<ValidationConfig>;

export const DEFAULT_VALIDATION_CONFIG: Readonly<ValidationConfig> = Object.freeze({
  failFast: false,
  clock: () => new Date(),
});

export function resolveConfig(options: ValidationOptions = {}): ValidationConfig {
  const config: ValidationConfig = {
    failFast: options.failFast ?? DEFAULT_VALIDATION_CONFIG.failFast,
    clock: options.clock ?? DEFAULT_VALIDATION_CONFIG.clock,
    logger: options.logger,
  };

  if (typeof config.failFast !== 'boolean') {
    throw ConfigurationError.invalidArgument('failFast must be a boolean', { failFast: config.failFast });
  }
  if (typeof config.clock !== 'function') {
    throw ConfigurationError.invalidArgument('clock must be a function returning a Date');
  }
  if (config.logger !== undefined && typeof config.logger !== 'function') {
    throw ConfigurationError.invalidArgument('logger must be a function');
  }

  return config;
}
