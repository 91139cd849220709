import type { MessageOverride } from '../constraint/Constraint';
import { ChainValidator, type Step } from './ChainValidator';

/**
 * Number validator with chainable methods
 *
 * `min`/`max` and `gte`/`lte` are inclusive; `gt`/`lt` are exclusive.
 */
export class NumberValidator extends ChainValidator<number, NumberValidator> {
  constructor(steps: readonly Step<number>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<number>[]): NumberValidator {
    return new NumberValidator(steps);
  }

  /**
   * Inclusive lower bound
   */
  min(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.min', (n) => n >= value, [value], message);
  }

  /**
   * Inclusive upper bound
   */
  max(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.max', (n) => n <= value, [value], message);
  }

  /**
   * Exclusive lower bound
   */
  gt(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.gt', (n) => n > value, [value], message);
  }

  /**
   * Inclusive lower bound
   */
  gte(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.gte', (n) => n >= value, [value], message);
  }

  /**
   * Exclusive upper bound
   */
  lt(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.lt', (n) => n < value, [value], message);
  }

  /**
   * Inclusive upper bound
   */
  lte(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.lte', (n) => n <= value, [value], message);
  }

  /**
   * Between `start` and `endInclusive`, both included
   */
  inRange(start: number, endInclusive: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.inRange', (n) => n >= start && n <= endInclusive, [start, endInclusive], message);
  }

  /**
   * Must equal `value`
   */
  eq(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.eq', (n) => n === value, [value], message);
  }

  /**
   * Must differ from `value`
   */
  notEq(value: number, message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.comparable.notEq', (n) => n !== value, [value], message);
  }

  /**
   * Greater than zero
   */
  positive(message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.number.positive', (n) => n > 0, [], message);
  }

  /**
   * Less than zero
   */
  negative(message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.number.negative', (n) => n < 0, [], message);
  }

  /**
   * Zero or less
   */
  notPositive(message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.number.notPositive', (n) => n <= 0, [], message);
  }

  /**
   * Zero or more
   */
  notNegative(message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.number.notNegative', (n) => n >= 0, [], message);
  }

  /**
   * Must be an integer
   */
  integer(message?: MessageOverride<number>): NumberValidator {
    return this.rule('kova.number.integer', (n) => Number.isInteger(n), [], message);
  }
}
