import type { MessageOverride } from '../constraint/Constraint';
import { ResourceMessage, type Message } from '../message/Message';
import { failure, success } from '../validation/ValidationResult';
import { ChainValidator, type Step } from './ChainValidator';
import type { Validator } from './Validator';

/**
 * Array validator with chainable methods
 *
 * @example
 * ```typescript
 * kova.list<string>().notEmpty().max(10).onEach(kova.string().notBlank());
 * ```
 */
export class ArrayValidator<E> extends ChainValidator<readonly E[], ArrayValidator<E>> {
  constructor(steps: readonly Step<readonly E[]>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<readonly E[]>[]): ArrayValidator<E> {
    return new ArrayValidator(steps);
  }

  /**
   * Minimum number of elements
   */
  min(size: number, message?: MessageOverride<readonly E[]>): ArrayValidator<E> {
    return this.sized('kova.collection.min', (n) => n >= size, size, message);
  }

  /**
   * Maximum number of elements
   */
  max(size: number, message?: MessageOverride<readonly E[]>): ArrayValidator<E> {
    return this.sized('kova.collection.max', (n) => n <= size, size, message);
  }

  /**
   * Exact number of elements
   */
  size(size: number, message?: MessageOverride<readonly E[]>): ArrayValidator<E> {
    return this.sized('kova.collection.size', (n) => n === size, size, message);
  }

  /**
   * At least one element
   */
  notEmpty(message?: MessageOverride<readonly E[]>): ArrayValidator<E> {
    return this.rule('kova.iterable.notEmpty', (list) => list.length > 0, [], message);
  }

  /**
   * Must contain `element`
   */
  contains(element: E, message?: MessageOverride<readonly E[]>): ArrayValidator<E> {
    return this.rule('kova.iterable.contains', (list) => list.includes(element), [element], message);
  }

  /**
   * Must not contain `element`
   */
  notContains(element: E, message?: MessageOverride<readonly E[]>): ArrayValidator<E> {
    return this.rule('kova.iterable.notContains', (list) => !list.includes(element), [element], message);
  }

  /**
   * Validates every element under its index. Element failures are folded into
   * one message whose first argument lists them all.
   */
  onEach(validator: Validator<E, E>): ArrayValidator<E> {
    return this.nest((list, v) => {
      const messages: Message[] = [];
      const output: E[] = [];
      for (const [index, element] of list.entries()) {
        const result = validator.execute(element, v.descend({ kind: 'index', index }));
        if (result.success) {
          output.push(result.value);
          continue;
        }
        output.push(element);
        messages.push(...result.messages);
        if (v.config.failFast) break;
      }
      if (messages.length === 0) return success(output);
      return failure([
        new ResourceMessage(
          { constraintId: 'kova.collection.onEach', root: v.root, path: v.path, input: list },
          [messages]
        ),
      ]);
    });
  }

  private sized(
    constraintId: string,
    accept: (size: number) => boolean,
    size: number,
    message?: MessageOverride<readonly E[]>
  ): ArrayValidator<E> {
    return this.rule(constraintId, (list) => accept(list.length), (list) => [list.length, size], message);
  }
}
