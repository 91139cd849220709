import type { MessageOverride } from '../constraint/Constraint';
import { ChainValidator, type Step } from './ChainValidator';

/**
 * Date validator with chainable methods
 *
 * Past and future are judged against `config.clock`, so a fixed clock makes
 * them deterministic:
 *
 * @example
 * ```typescript
 * const clock = () => new Date('2024-06-01T00:00:00Z');
 * kova.date().future().tryValidate(new Date('2024-05-31T00:00:00Z'), { clock }); // must be in the future
 * ```
 */
export class TemporalValidator extends ChainValidator<Date, TemporalValidator> {
  constructor(steps: readonly Step<Date>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<Date>[]): TemporalValidator {
    return new TemporalValidator(steps);
  }

  past(message?: MessageOverride<Date>): TemporalValidator {
    return this.relative('kova.temporal.past', (diff) => diff < 0, message);
  }

  pastOrPresent(message?: MessageOverride<Date>): TemporalValidator {
    return this.relative('kova.temporal.pastOrPresent', (diff) => diff <= 0, message);
  }

  future(message?: MessageOverride<Date>): TemporalValidator {
    return this.relative('kova.temporal.future', (diff) => diff > 0, message);
  }

  futureOrPresent(message?: MessageOverride<Date>): TemporalValidator {
    return this.relative('kova.temporal.futureOrPresent', (diff) => diff >= 0, message);
  }

  min(value: Date, message?: MessageOverride<Date>): TemporalValidator {
    return this.rule('kova.temporal.min', (d) => d.getTime() >= value.getTime(), [value], message);
  }

  max(value: Date, message?: MessageOverride<Date>): TemporalValidator {
    return this.rule('kova.temporal.max', (d) => d.getTime() <= value.getTime(), [value], message);
  }

  private relative(
    constraintId: string,
    accept: (millisFromNow: number) => boolean,
    message?: MessageOverride<Date>
  ): TemporalValidator {
    return this.rule(constraintId, (d, c) => accept(d.getTime() - c.now().getTime()), [], message);
  }
}
