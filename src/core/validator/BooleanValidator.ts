import type { MessageOverride } from '../constraint/Constraint';
import { ChainValidator, type Step } from './ChainValidator';

/**
 * Boolean validator
 */
export class BooleanValidator extends ChainValidator<boolean, BooleanValidator> {
  constructor(steps: readonly Step<boolean>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<boolean>[]): BooleanValidator {
    return new BooleanValidator(steps);
  }

  /**
   * Must be `true`
   */
  isTrue(message?: MessageOverride<boolean>): BooleanValidator {
    return this.rule('kova.boolean.isTrue', (b) => b, [], message);
  }

  /**
   * Must be `false`
   */
  isFalse(message?: MessageOverride<boolean>): BooleanValidator {
    return this.rule('kova.boolean.isFalse', (b) => !b, [], message);
  }
}
