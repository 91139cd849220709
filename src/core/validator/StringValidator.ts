import type { MessageOverride } from '../constraint/Constraint';
import { ChainValidator, type Step } from './ChainValidator';
import type { Validator } from './Validator';

const INTEGER = /^[+-]?\d+$/;
const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function fullMatch(pattern: RegExp): RegExp {
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * String validator with chainable methods
 *
 * @example
 * ```typescript
 * kova.string().trim().notBlank().max(50);
 * kova.string().matches(/[a-z]+/).startsWith('id_');
 * ```
 */
export class StringValidator extends ChainValidator<string, StringValidator> {
  constructor(steps: readonly Step<string>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<string>[]): StringValidator {
    return new StringValidator(steps);
  }

  /**
   * Minimum length, in UTF-16 code units
   */
  min(length: number, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.min', (s) => s.length >= length, [length], message);
  }

  /**
   * Maximum length
   */
  max(length: number, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.max', (s) => s.length <= length, [length], message);
  }

  /**
   * Exact length
   */
  length(length: number, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.length', (s) => s.length === length, [length], message);
  }

  /**
   * Must contain a non-whitespace character
   */
  notBlank(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.notBlank', (s) => s.trim() !== '', [], message);
  }

  /**
   * Empty or whitespace only
   */
  blank(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.blank', (s) => s.trim() === '', [], message);
  }

  /**
   * At least one character
   */
  notEmpty(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.notEmpty', (s) => s.length > 0, [], message);
  }

  /**
   * Must be the empty string
   */
  empty(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.empty', (s) => s.length === 0, [], message);
  }

  /**
   * Must start with `prefix`
   */
  startsWith(prefix: string, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.startsWith', (s) => s.startsWith(prefix), [prefix], message);
  }

  /**
   * Must not start with `prefix`
   */
  notStartsWith(prefix: string, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.notStartsWith', (s) => !s.startsWith(prefix), [prefix], message);
  }

  /**
   * Must end with `suffix`
   */
  endsWith(suffix: string, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.endsWith', (s) => s.endsWith(suffix), [suffix], message);
  }

  /**
   * Must not end with `suffix`
   */
  notEndsWith(suffix: string, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.notEndsWith', (s) => !s.endsWith(suffix), [suffix], message);
  }

  /**
   * Must contain `infix`
   */
  contains(infix: string, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.contains', (s) => s.includes(infix), [infix], message);
  }

  /**
   * Must not contain `infix`
   */
  notContains(infix: string, message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.notContains', (s) => !s.includes(infix), [infix], message);
  }

  /**
   * The whole string must match `pattern`.
   */
  matches(pattern: RegExp, message?: MessageOverride<string>): StringValidator {
    const whole = fullMatch(pattern);
    return this.rule('kova.charSequence.matches', (s) => whole.test(s), [pattern], message);
  }

  /**
   * The whole string must not match `pattern`
   */
  notMatches(pattern: RegExp, message?: MessageOverride<string>): StringValidator {
    const whole = fullMatch(pattern);
    return this.rule('kova.charSequence.notMatches', (s) => !whole.test(s), [pattern], message);
  }

  /**
   * Must equal its upper-case form
   */
  uppercase(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.uppercase', (s) => s === s.toUpperCase(), [], message);
  }

  /**
   * Must equal its lower-case form
   */
  lowercase(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.lowercase', (s) => s === s.toLowerCase(), [], message);
  }

  /**
   * Must parse as a safe integer
   */
  isInt(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.isInt', (s) => INTEGER.test(s) && Number.isSafeInteger(Number(s)), [], message);
  }

  /**
   * Must parse as a finite number
   */
  isNumber(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.isNumber', (s) => NUMBER.test(s.trim()) && Number.isFinite(Number(s)), [], message);
  }

  /**
   * Must be `"true"` or `"false"`
   */
  isBoolean(message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.isBoolean', (s) => s === 'true' || s === 'false', [], message);
  }

  /**
   * Must be one of `values`
   */
  isEnum(values: readonly string[], message?: MessageOverride<string>): StringValidator {
    return this.rule('kova.charSequence.isEnum', (s) => values.includes(s), [values], message);
  }

  /**
   * Trim surrounding whitespace
   */
  trim(): StringValidator {
    return this.modify((s) => s.trim());
  }

  /**
   * Convert to upper case
   */
  toUpperCase(): StringValidator {
    return this.modify((s) => s.toUpperCase());
  }

  /**
   * Convert to lower case
   */
  toLowerCase(): StringValidator {
    return this.modify((s) => s.toLowerCase());
  }

  /**
   * Parse as an integer
   */
  toInt(): Validator<string, number> {
    return this.isInt().map((s) => Number.parseInt(s, 10));
  }

  /**
   * Parse as a number
   */
  toNumber(): Validator<string, number> {
    return this.isNumber().map((s) => Number(s));
  }

  /**
   * Parse `"true"` / `"false"`
   */
  toBoolean(): Validator<string, boolean> {
    return this.isBoolean().map((s) => s === 'true');
  }

  /**
   * Converts to one of `values`; anything else fails with
   * `must be one of: [...]`.
   */
  toEnum<const E extends string>(values: readonly E[]): Validator<string, E> {
    return this.isEnum(values).map((s) => values[values.findIndex((value) => value === s)]);
  }
}
