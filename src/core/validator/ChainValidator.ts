import { checkConstraint, type ConstraintCheck, type ConstraintContext, type MessageOverride } from '../constraint/Constraint';
import type { Message } from '../message/Message';
import type { Validation } from '../validation/Validation';
import { failure, success, type ValidationResult } from '../validation/ValidationResult';
import { Validator } from './Validator';

export type Step<T> =
  | { kind: 'constraint'; constraintId: string; check: ConstraintCheck<T> }
  | { kind: 'transform'; transform: (value: T) => T }
  | { kind: 'nested'; run: (value: T, v: Validation) => ValidationResult<T> };

/**
 * Base of the per-type validators: an ordered list of steps over one value.
 *
 * Transforms always apply, even after a failed constraint, so later
 * constraints see the transformed value. Failures are collected in order;
 * under fail-fast the first one ends the chain.
 */
export abstract class ChainValidator<T, Self extends ChainValidator<T, Self>> extends Validator<T, T> {
  protected constructor(protected readonly steps: readonly Step<T>[]) {
    super();
  }

  protected abstract create(steps: readonly Step<T>[]): Self;

  execute(input: T, v: Validation): ValidationResult<T> {
    const messages: Message[] = [];
    let value = input;

    for (const step of this.steps) {
      if (step.kind === 'transform') {
        value = step.transform(value);
        continue;
      }
      const result =
        step.kind === 'constraint' ? checkConstraint(v, step.constraintId, value, step.check) : step.run(value, v);
      if (result.success) {
        value = result.value;
      } else {
        messages.push(...result.messages);
        if (v.config.failFast) break;
      }
    }

    return messages.length === 0 ? success(value) : failure(messages);
  }

  constrain(constraintId: string, check: ConstraintCheck<T>): Self {
    return this.create([...this.steps, { kind: 'constraint', constraintId, check }]);
  }

  /**
   * Pure rewrite of the current value, e.g. trimming.
   */
  modify(transform: (value: T) => T): Self {
    return this.create([...this.steps, { kind: 'transform', transform }]);
  }

  protected nest(run: (value: T, v: Validation) => ValidationResult<T>): Self {
    return this.create([...this.steps, { kind: 'nested', run }]);
  }

  /**
   * Adds a built-in constraint whose default message is the template of
   * `constraintId` filled with `args`, or with the args computed from the
   * failing value.
   */
  protected rule(
    constraintId: string,
    test: (value: T, context: ConstraintContext<T>) => boolean,
    args: readonly unknown[] | ((value: T) => readonly unknown[]) = [],
    message?: MessageOverride<T>
  ): Self {
    return this.constrain(constraintId, (c) =>
      c.satisfies(test(c.input, c), () => {
        if (message === undefined) return c.resource(...(typeof args === 'function' ? args(c.input) : args));
        return typeof message === 'string' ? c.text(message) : message(c);
      })
    );
  }
}
