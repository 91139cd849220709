import { checkConstraint } from '../constraint/Constraint';
import type { Validation } from '../validation/Validation';
import { failure, success, type ValidationResult } from '../validation/ValidationResult';
import { Validator } from './Validator';

export type Literal = string | number | boolean | bigint;

/**
 * The primitive type a literal belongs to: `'a' | 'b'` widens to `string`.
 */
export type Widen<T extends Literal> = T extends string
  ? string
  : T extends number
    ? number
    : T extends boolean
      ? boolean
      : bigint;

export type EnumLike = Record<string, string | number>;

/**
 * Values of a TypeScript enum or a const object, without the reverse
 * mappings numeric enums carry.
 */
export function enumValues<E extends EnumLike>(enumObject: E): Array<E[keyof E]> {
  const values: Array<E[keyof E]> = [];
  for (const key in enumObject) {
    if (Number.isNaN(Number(key))) values.push(enumObject[key]);
  }
  return values;
}

function sameValue(a: unknown, b: unknown): boolean {
  return a === b;
}

/**
 * Accepts exactly one of a fixed set of primitive values and narrows the
 * output to their union.
 */
export class LiteralValidator<T extends Literal> extends Validator<Widen<T>, T> {
  constructor(
    readonly values: readonly T[],
    private readonly constraintId: string,
    private readonly args: readonly unknown[]
  ) {
    super();
  }

  static of<T extends Literal>(values: readonly [T, ...T[]]): LiteralValidator<T> {
    return values.length === 1
      ? new LiteralValidator(values, 'kova.literal.single', [values[0]])
      : new LiteralValidator(values, 'kova.literal.list', [values]);
  }

  static ofEnum<E extends EnumLike>(enumObject: E): LiteralValidator<E[keyof E]> {
    const values = enumValues(enumObject);
    return new LiteralValidator(values, 'kova.enum', [values]);
  }

  execute(input: Widen<T>, v: Validation): ValidationResult<T> {
    const found = this.values.find((value) => sameValue(value, input));
    const result = checkConstraint(v, this.constraintId, input, (c) =>
      c.satisfies(found !== undefined, () => c.resource(...this.args))
    );
    if (found !== undefined) return success(found);
    return failure(result.success ? [] : result.messages);
  }
}
