import type { MessageArgs } from '../message/MessageFormatter';
import type { Logger } from '../types/Logger';

/**
 * One constraint evaluation, reported to `ValidationConfig.logger`.
 * `args` are the raw message arguments, before any template is resolved.
 */
export type LogEntry =
  | {
      kind: 'satisfied';
      constraintId: string;
      root: string;
      path: string;
      input: unknown;
    }
  | {
      kind: 'violated';
      constraintId: string;
      root: string;
      path: string;
      input: unknown;
      args: MessageArgs;
    };

export type LogSink = (entry: LogEntry) => void;

/**
 * Adapts a `Logger` to the entry sink. Every entry is logged at debug level.
 *
 * @example
 * ```typescript
 * kova.string().min(3).tryValidate('ab', { logger: logWith(new ConsoleLogger('debug')) });
 * // [DEBUG] kova: constraint violated {"constraintId":"kova.charSequence.min","root":"","path":"","input":"ab","args":"Array(1)"}
 * ```
 */
export function logWith(logger: Logger): LogSink {
  return (entry) => {
    const { kind, ...context } = entry;
    logger.debug(kind === 'satisfied' ? 'constraint satisfied' : 'constraint violated', context);
  };
}
