import { checkConstraint, type ConstraintCheck } from '../constraint/Constraint';
import type { Message } from '../message/Message';
import { rootLabelOf, type Validation } from '../validation/Validation';
import { failure, success, type ValidationResult } from '../validation/ValidationResult';
import { Validator } from './Validator';

type Rule<T> = (target: T, v: Validation) => ValidationResult<unknown>;

type RuleKey = string | symbol;

export interface ObjectSchemaOptions {
  /** Root label of messages; defaults to the constructor name of the input. */
  name?: string;
}

/**
 * Declares the rules of an `ObjectSchema`. Rules run in declaration order.
 * Declaring a rule for a key that already has one replaces it in place.
 */
export class ObjectSchemaScope<T extends object> {
  constructor(private readonly rules: Map<RuleKey, Rule<T>>) {}

  property<K extends keyof T & string>(key: K, validator: Validator<T[K], unknown>): this {
    this.rules.set(key, (target, v) => validator.execute(target[key], v.descend({ kind: 'property', name: key })));
    return this;
  }

  /**
   * Picks the validator of `key` from the whole, unvalidated object.
   *
   * @example
   * ```typescript
   * s.choose('zip', (address) => (address.country === 'JP' ? kova.string().matches(/\d{3}-\d{4}/) : kova.string()));
   * ```
   */
  choose<K extends keyof T & string>(key: K, select: (target: T) => Validator<T[K], unknown>): this {
    this.rules.set(key, (target, v) => select(target).execute(target[key], v.descend({ kind: 'property', name: key })));
    return this;
  }

  /**
   * Validates a computed value under a named path segment.
   */
  named<P>(label: string, accessor: (target: T) => P, validator: Validator<P, unknown>): this {
    this.rules.set(label, (target, v) => validator.execute(accessor(target), v.descend({ kind: 'named', label })));
    return this;
  }

  /**
   * Object-wide constraint; its messages carry the path of the object itself.
   */
  constrain(constraintId: string, check: ConstraintCheck<T>): this {
    this.rules.set(Symbol(constraintId), (target, v) => checkConstraint(v, constraintId, target, check));
    return this;
  }
}

/**
 * Validator of an object's properties.
 *
 * Objects already being validated further up the current path are accepted
 * without descending again, so cyclic graphs terminate.
 *
 * @example
 * ```typescript
 * const address = kova.object<Address>((s) => {
 *   s.property('street', kova.string().notBlank());
 *   s.property('zip', kova.string().matches(/\d{5}/));
 * });
 * ```
 */
export class ObjectSchema<T extends object> extends Validator<T, T> {
  private readonly rules: ReadonlyMap<RuleKey, Rule<T>>;

  constructor(
    block: (scope: ObjectSchemaScope<T>) => void,
    readonly options: ObjectSchemaOptions = {},
    inherited: ReadonlyMap<RuleKey, Rule<T>> = new Map()
  ) {
    super();
    const rules = new Map(inherited);
    block(new ObjectSchemaScope(rules));
    this.rules = rules;
  }

  get keys(): string[] {
    return [...this.rules.keys()].filter((key): key is string => typeof key === 'string');
  }

  /**
   * Same schema with more rules; rules for existing keys replace the old ones.
   */
  extend(block: (scope: ObjectSchemaScope<T>) => void): ObjectSchema<T> {
    return new ObjectSchema(block, this.options, this.rules);
  }

  replace<K extends keyof T & string>(key: K, validator: Validator<T[K], unknown>): ObjectSchema<T> {
    return this.extend((s) => s.property(key, validator));
  }

  execute(input: T, v: Validation): ValidationResult<T> {
    if (v.visiting.has(input)) return success(input);

    const scoped = v.root === '' ? v.withRoot(this.options.name ?? rootLabelOf(input)) : v;
    const messages: Message[] = [];

    v.visiting.add(input);
    try {
      for (const rule of this.rules.values()) {
        const result = rule(input, scoped);
        if (result.success) continue;
        messages.push(...result.messages);
        if (v.config.failFast) break;
      }
    } finally {
      v.visiting.delete(input);
    }

    return messages.length === 0 ? success(input) : failure(messages);
  }
}
