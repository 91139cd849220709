import type { MessageOverride } from '../constraint/Constraint';
import { ChainValidator, type Step } from './ChainValidator';

/**
 * Validator for any value type. Beyond equality and membership it carries
 * only what callers add through `constrain` and `modify`.
 *
 * @example
 * ```typescript
 * kova.generic<Status>().oneOf([Status.Active, Status.Paused]);
 * ```
 */
export class GenericValidator<T> extends ChainValidator<T, GenericValidator<T>> {
  constructor(steps: readonly Step<T>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<T>[]): GenericValidator<T> {
    return new GenericValidator(steps);
  }

  /**
   * Must be `value` (`===`)
   */
  eq(value: T, message?: MessageOverride<T>): GenericValidator<T> {
    return this.rule('kova.any.eqValue', (input) => input === value, [value], message);
  }

  /**
   * Must not be `value` (`===`)
   */
  notEq(value: T, message?: MessageOverride<T>): GenericValidator<T> {
    return this.rule('kova.any.notEqValue', (input) => input !== value, [value], message);
  }

  /**
   * Must be an element of `values`
   */
  oneOf(values: Iterable<T>, message?: MessageOverride<T>): GenericValidator<T> {
    const allowed = [...values];
    return this.rule('kova.any.inIterable', (input) => allowed.includes(input), [allowed], message);
  }
}
