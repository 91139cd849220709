import type { Message } from '../message/Message';

/**
 * Identity token of one cancellable scope. Raising it unwinds to the
 * `recoverValidation` call that created it and to no other boundary.
 */
export class AccumulateError {
  readonly kind = 'error' as const;

  /**
   * Reading the value of a failed scope cancels the scope the token belongs to.
   */
  get value(): never {
    return this.raise();
  }

  raise(): never {
    throw new ValidationCancellation(this);
  }
}

export class AccumulateOk<T> {
  readonly kind = 'ok' as const;

  constructor(readonly value: T) {}
}

export type AccumulateValue<T> = AccumulateOk<T> | AccumulateError;

/**
 * Records messages for the current scope and returns the token that cancels it.
 */
export interface Accumulate {
  accumulate(messages: readonly Message[]): AccumulateError;
}

/**
 * Control-flow signal carrying the token of the scope to unwind.
 * Never surfaces from `tryValidate` or `validate`.
 */
export class ValidationCancellation extends Error {
  constructor(readonly token: AccumulateError) {
    super('Validation scope cancelled');
    this.name = 'ValidationCancellation';
  }
}

/**
 * Runs `block` with a fresh token; a cancellation raised with exactly that
 * token is turned into `recover()`. Any other error is rethrown untouched.
 */
export function recoverValidation<R>(recover: () => R, block: (token: AccumulateError) => R): R {
  const token = new AccumulateError();
  try {
    return block(token);
  } catch (error) {
    if (error instanceof ValidationCancellation && error.token === token) {
      return recover();
    }
    throw error;
  }
}
