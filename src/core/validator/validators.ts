/**
 * Validator builder object
 *
 * Import and use `kova` to create validators:
 *
 * @example
 * ```typescript
 * import { kova } from 'kova';
 *
 * const user = kova.object<User>((s) => {
 *   s.property('name', kova.string().min(2));
 *   s.property('age', kova.int().min(0));
 *   s.property('email', kova.nullable<string>().whenNotNull(kova.string().contains('@')));
 * });
 * ```
 */

import type { Validation } from '../validation/Validation';
import { toResult } from '../validation/ValidationResult';
import { ArrayValidator } from './ArrayValidator';
import { BooleanValidator } from './BooleanValidator';
import { GenericValidator } from './GenericValidator';
import { LiteralValidator, type EnumLike, type Literal } from './LiteralValidator';
import { MapValidator } from './MapValidator';
import { NumberValidator } from './NumberValidator';
import { ObjectSchema, type ObjectSchemaOptions, type ObjectSchemaScope } from './ObjectSchema';
import { StringValidator } from './StringValidator';
import { TemporalValidator } from './TemporalValidator';
import { NullableValidator, Validator } from './Validator';

export const kova = {
  string: () => new StringValidator(),

  /**
   * Any finite or non-finite number
   */
  number: () => new NumberValidator(),

  /**
   * Number that must be an integer
   *
   * @example
   * ```typescript
   * kova.int().min(3).max(10).validate(7); // 7
   * ```
   */
  int: () => new NumberValidator().integer(),

  boolean: () => new BooleanValidator(),

  /**
   * Date validator; `past`/`future` use the configured clock
   */
  date: () => new TemporalValidator(),

  /**
   * One fixed value, or one of several
   *
   * @example
   * ```typescript
   * kova.literal('asc', 'desc'); // Validator<string, 'asc' | 'desc'>
   * ```
   */
  literal: <const T extends Literal>(...values: [T, ...T[]]) => LiteralValidator.of(values),

  enum: <E extends EnumLike>(enumObject: E) => LiteralValidator.ofEnum(enumObject),

  list: <E>() => new ArrayValidator<E>(),

  map: <K, V>() => new MapValidator<K, V>(),

  nullable: <T>() => NullableValidator.of<T>(),

  generic: <T>() => new GenericValidator<T>(),

  /**
   * Create an object schema
   *
   * @example
   * ```typescript
   * kova.object<Order>((s) => {
   *   s.property('id', kova.string().notBlank());
   *   s.property('lines', kova.list<Line>().notEmpty().onEach(line));
   *   s.constrain('order.total', (c) => c.input.total >= 0);
   * }, { name: 'Order' });
   * ```
   */
  object: <T extends object>(block: (scope: ObjectSchemaScope<T>) => void, options?: ObjectSchemaOptions) =>
    new ObjectSchema<T>(block, options),

  /**
   * Defers creation of a validator, for schemas that refer to themselves.
   */
  lazy: <I, O>(supply: () => Validator<I, O>): Validator<I, O> =>
    Validator.from<I, O>((input, v) => supply().execute(input, v)),

  /**
   * Wraps an imperative block as a validator.
   */
  block: <I, O>(run: (input: I, v: Validation) => O): Validator<I, O> =>
    Validator.from<I, O>((input, v) => toResult(v.ior((scoped) => run(input, scoped)))),
};
