import { checkConstraint, type ConstraintCheck } from '../constraint/Constraint';
import { TextMessage } from '../message/Message';
import type { Segment } from '../path/Path';
import { MessageException } from '../types/Errors';
import { tryValidate, validate } from '../validation/entry';
import { consolidateMessages, orMessage, type MessageProvider, type Validation } from '../validation/Validation';
import type { ValidationOptions } from '../validation/ValidationConfig';
import { failure, success, type ValidationResult } from '../validation/ValidationResult';

export type Nullish<T> = T | null | undefined;

export type Execute<I, O> = (input: I, v: Validation) => ValidationResult<O>;

/**
 * Helper type to infer the output type of a Validator
 */
export type Infer<V> = V extends Validator<never, infer O> ? O : never;

export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * A composable check from `I` to a validated (possibly transformed) `O`.
 *
 * Every combinator returns a new validator; the receiver is never modified.
 */
export abstract class Validator<I, O = I> {
  abstract execute(input: I, v: Validation): ValidationResult<O>;

  static from<I, O>(execute: Execute<I, O>): Validator<I, O> {
    return new FunctionValidator(execute);
  }

  /**
   * Validator that accepts every input unchanged.
   */
  static success<T>(): Validator<T, T> {
    return new FunctionValidator<T, T>((input) => success(input));
  }

  /**
   * Runs both validators on the same input and keeps every message.
   * The value is `other`'s. Under fail-fast `other` is skipped once this failed.
   */
  and<P>(other: Validator<I, P>): Validator<I, P> {
    return Validator.from<I, P>((input, v) => {
      const first = this.execute(input, v);
      if (!first.success && v.config.failFast) return first;
      const second = other.execute(input, v);
      if (first.success) return second;
      return failure(second.success ? first.messages : [...first.messages, ...second.messages]);
    });
  }

  plus<P>(other: Validator<I, P>): Validator<I, P> {
    return this.and(other);
  }

  /**
   * Succeeds with the first branch that succeeds. When both fail the result
   * is one `kova.or` message holding both branches' messages.
   *
   * @example
   * ```typescript
   * const code = kova.string().length(2).or(kova.string().length(5));
   * code.tryValidate('abc');
   * // messages[0].text:
   * // at least one constraint must be satisfied: [[must be exactly 2 characters], [must be exactly 5 characters]]
   * ```
   */
  or(other: Validator<I, O>): Validator<I, O> {
    return Validator.from<I, O>((input, v) => {
      const first = this.execute(input, v);
      if (first.success) return first;
      const second = other.execute(input, v);
      if (second.success) return second;
      return failure([orMessage(v, input, first.messages, second.messages)]);
    });
  }

  orElse(other: Validator<I, O>): Validator<I, O> {
    return this.or(other);
  }

  then<P>(next: Validator<O, P>): Validator<I, P> {
    return Validator.from<I, P>((input, v) => {
      const result = this.execute(input, v);
      return result.success ? next.execute(result.value, v) : result;
    });
  }

  andThen<P>(next: Validator<O, P>): Validator<I, P> {
    return this.then(next);
  }

  compose<P>(before: Validator<P, I>): Validator<P, O> {
    return before.then(this);
  }

  /**
   * Transforms the validated value. Throwing a `MessageException` from
   * `transform` turns into a failure; other errors propagate.
   */
  map<P>(transform: (value: O) => P): Validator<I, P> {
    return Validator.from<I, P>((input, v) => {
      const result = this.execute(input, v);
      if (!result.success) return result;
      try {
        return success(transform(result.value));
      } catch (error) {
        if (!(error instanceof MessageException)) throw error;
        const { content } = error;
        const message =
          typeof content === 'string'
            ? new TextMessage({ constraintId: error.constraintId, root: v.root, path: v.path, input: result.value }, content)
            : content;
        v.log({
          kind: 'violated',
          constraintId: message.constraintId,
          root: v.root,
          path: v.path.fullName,
          input: result.value,
          args: message.args,
        });
        return failure([message]);
      }
    });
  }

  constrain(constraintId: string, check: ConstraintCheck<O>): Validator<I, O> {
    return this.then(Validator.from<O, O>((value: O, v) => checkConstraint(v, constraintId, value, check)));
  }

  /**
   * Skips this validator, passing the input through, when `predicate` is false.
   */
  onlyIf(predicate: (input: I) => boolean): Validator<I, I | O> {
    return Validator.from<I, I | O>((input, v) => (predicate(input) ? this.execute(input, v) : success(input)));
  }

  /**
   * Replaces all failure messages with a single one.
   * Without a provider the message is `invalid value: [...]`.
   */
  withMessage(provider?: MessageProvider, constraintId?: string): Validator<I, O> {
    return Validator.from<I, O>((input, v) => {
      const result = this.execute(input, v);
      if (result.success) return result;
      return failure([consolidateMessages(v, input, result.messages, provider, constraintId)]);
    });
  }

  named(label: string): Validator<I, O> {
    return this.under({ kind: 'named', label });
  }

  under(segment: Segment): Validator<I, O> {
    return Validator.from<I, O>((input, v) => this.execute(input, v.descend(segment)));
  }

  /**
   * Lets `null` and `undefined` through; other inputs are validated as before.
   * With a default, an absent input succeeds with that value instead.
   */
  asNullable(): NullableValidator<I, O>;
  asNullable(defaultValue: O): Validator<Nullish<I>, O>;
  asNullable(...defaults: [] | [O]): NullableValidator<I, O> | Validator<Nullish<I>, O> {
    if (defaults.length === 0) {
      return new NullableValidator<I, O>((input, v) => (isAbsent(input) ? success(input) : this.execute(input, v)));
    }
    const [defaultValue] = defaults;
    return Validator.from<Nullish<I>, O>((input, v) => (isAbsent(input) ? success(defaultValue) : this.execute(input, v)));
  }

  /**
   * Uses this validator inside an imperative block: returns the value, or
   * records the messages and cancels the block.
   */
  bind(input: I, v: Validation): O {
    const result = this.execute(input, v);
    if (result.success) return result.value;
    return v.raise(result.messages);
  }

  tryValidate(input: I, options: ValidationOptions = {}): ValidationResult<O> {
    return tryValidate(options, (v) => this.bind(input, v));
  }

  validate(input: I, options: ValidationOptions = {}): O {
    return validate(options, (v) => this.bind(input, v));
  }
}

class FunctionValidator<I, O> extends Validator<I, O> {
  constructor(private readonly run: Execute<I, O>) {
    super();
  }

  execute(input: I, v: Validation): ValidationResult<O> {
    return this.run(input, v);
  }
}

/**
 * Validator over values that may be `null` or `undefined`.
 */
export class NullableValidator<I, O = I> extends Validator<Nullish<I>, Nullish<O>> {
  constructor(private readonly run: Execute<Nullish<I>, Nullish<O>>) {
    super();
  }

  static of<T>(): NullableValidator<T, T> {
    return new NullableValidator<T, T>((input) => success(input));
  }

  execute(input: Nullish<I>, v: Validation): ValidationResult<Nullish<O>> {
    return this.run(input, v);
  }

  constrain(constraintId: string, check: ConstraintCheck<Nullish<O>>): NullableValidator<I, O> {
    return new NullableValidator<I, O>((input, v) => {
      const result = this.execute(input, v);
      return result.success ? checkConstraint(v, constraintId, result.value, check) : result;
    });
  }

  isNull(): NullableValidator<I, O> {
    return this.constrain('kova.nullable.isNull', (c) => isAbsent(c.input));
  }

  notNull(): NullableValidator<I, O> {
    return this.constrain('kova.nullable.notNull', (c) => !isAbsent(c.input));
  }

  /**
   * Applies `validator` to present values; absent values pass unchanged.
   */
  whenNotNull<P>(validator: Validator<O, P>): NullableValidator<I, P> {
    return new NullableValidator<I, P>((input, v) => {
      const result = this.execute(input, v);
      if (!result.success) return result;
      const { value } = result;
      return isAbsent(value) ? success(value) : validator.execute(value, v);
    });
  }

  /**
   * Absent, or present and accepted by `validator`.
   */
  isNullOr<P>(validator: Validator<O, P>): NullableValidator<I, P> {
    return new NullableValidator<I, P>((input, v) => {
      const result = this.execute(input, v);
      if (!result.success) return result;
      const { value } = result;
      const nullCheck = checkConstraint(v, 'kova.nullable.isNull', value, (c) => isAbsent(c.input));
      if (isAbsent(value)) return success(value);
      const other = validator.execute(value, v);
      if (other.success) return other;
      return failure([orMessage(v, value, nullCheck.success ? [] : nullCheck.messages, other.messages)]);
    });
  }

  notNullAnd<P>(validator: Validator<O, P>): NullableValidator<I, P> {
    return this.notNull().whenNotNull(validator);
  }

  /**
   * Requires a present value; the result type no longer admits `null`.
   */
  toNonNullable(): Validator<Nullish<I>, O> {
    return Validator.from<Nullish<I>, O>((input, v) => {
      const result = this.execute(input, v);
      if (!result.success) return result;
      const { value } = result;
      const checked = checkConstraint(v, 'kova.nullable.notNull', value, (c) => !isAbsent(c.input));
      if (!isAbsent(value)) return success(value);
      return checked.success ? failure([]) : checked;
    });
  }

  notNullThen<P>(validator: Validator<O, P>): Validator<Nullish<I>, P> {
    return this.toNonNullable().then(validator);
  }

  asNonNullableThen<P>(validator: Validator<O, P>): Validator<Nullish<I>, P> {
    return this.notNullThen(validator);
  }

  /**
   * Substitutes `defaultValue` for an absent result before anything chained
   * after it runs.
   */
  withDefault(defaultValue: O): Validator<Nullish<I>, O> {
    return this.map((value) => (isAbsent(value) ? defaultValue : value));
  }

  withDefaultThen<P>(defaultValue: O, validator: Validator<O, P>): Validator<Nullish<I>, P> {
    return this.withDefault(defaultValue).then(validator);
  }
}
