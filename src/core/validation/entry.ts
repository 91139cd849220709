import { UnrecoveredValidationError, ValidationException } from '../types/Errors';
import { ValidationCancellation } from './Accumulate';
import { Validation, type ValidationBlock } from './Validation';
import { resolveConfig, type ValidationOptions } from './ValidationConfig';
import { toResult, type ValidationResult } from './ValidationResult';

type EntryArgs<R> = [block: ValidationBlock<R>] | [options: ValidationOptions, block: ValidationBlock<R>];

/**
 * Runs an imperative validation block and returns its outcome.
 * Violations never throw; a block that records any message fails.
 *
 * @example
 * ```typescript
 * const result = tryValidate({ failFast: true }, (v) => kova.int().min(3).bind(input, v));
 * if (!result.success) console.log(result.messages.map((m) => m.text));
 * ```
 */
export function tryValidate<R>(block: ValidationBlock<R>): ValidationResult<R>;
export function tryValidate<R>(options: ValidationOptions, block: ValidationBlock<R>): ValidationResult<R>;
export function tryValidate<R>(...args: EntryArgs<R>): ValidationResult<R> {
  const options = args.length === 2 ? args[0] : {};
  const block = args.length === 2 ? args[1] : args[0];
  const validation = Validation.start(resolveConfig(options));

  try {
    return toResult(validation.ior(block));
  } catch (error) {
    if (error instanceof ValidationCancellation) {
      throw new UnrecoveredValidationError();
    }
    throw error;
  }
}

/**
 * Like `tryValidate`, but returns the value and throws a `ValidationException`
 * carrying every message on failure.
 */
export function validate<R>(block: ValidationBlock<R>): R;
export function validate<R>(options: ValidationOptions, block: ValidationBlock<R>): R;
export function validate<R>(...args: EntryArgs<R>): R {
  const result = args.length === 2 ? tryValidate(args[0], args[1]) : tryValidate(args[0]);
  if (result.success) return result.value;
  throw new ValidationException(result.messages);
}
