import { ResourceMessage, TextMessage, type Message, type MessageOrigin } from '../message/Message';
import type { MessageArgs } from '../message/MessageFormatter';
import type { Path } from '../path/Path';
import type { Validation } from '../validation/Validation';
import type { ValidationConfig } from '../validation/ValidationConfig';
import { failure, success, type ValidationResult } from '../validation/ValidationResult';

export type ConstraintResult = { readonly satisfied: true } | { readonly satisfied: false; readonly message: Message };

export const SATISFIED: ConstraintResult = Object.freeze({ satisfied: true });

/**
 * A check either answers with a full result or with a boolean, in which case
 * a violation renders the default template of the constraint id.
 */
export type ConstraintCheck<T> = (context: ConstraintContext<T>) => ConstraintResult | boolean;

/**
 * Replaces the default message of a built-in constraint.
 */
export type MessageOverride<T> = string | ((context: ConstraintContext<T>) => Message);

export interface Constraint<T> {
  readonly id: string;
  readonly check: ConstraintCheck<T>;
}

/**
 * Everything a check may need to judge `input` and build its message.
 */
export class ConstraintContext<T> {
  constructor(
    readonly input: T,
    readonly constraintId: string,
    readonly validation: Validation
  ) {}

  get root(): string {
    return this.validation.root;
  }

  get path(): Path {
    return this.validation.path;
  }

  get config(): ValidationConfig {
    return this.validation.config;
  }

  now(): Date {
    return this.validation.config.clock();
  }

  private get origin(): MessageOrigin {
    return { constraintId: this.constraintId, root: this.root, path: this.path, input: this.input };
  }

  text(text: string): Message {
    return new TextMessage(this.origin, text);
  }

  /**
   * Message rendered from the template of this constraint id.
   */
  resource(...args: unknown[]): Message {
    return new ResourceMessage(this.origin, args);
  }

  resourceWith(args: MessageArgs, key: string = this.constraintId): Message {
    return new ResourceMessage(this.origin, args, key);
  }

  satisfies(condition: boolean, message?: Message | string | (() => Message)): ConstraintResult {
    if (condition) return SATISFIED;
    if (message === undefined) return { satisfied: false, message: this.resource() };
    if (typeof message === 'string') return { satisfied: false, message: this.text(message) };
    return { satisfied: false, message: typeof message === 'function' ? message() : message };
  }
}

/**
 * Evaluates one constraint and reports the outcome to the configured logger.
 */
export function checkConstraint<T>(
  validation: Validation,
  constraintId: string,
  input: T,
  check: ConstraintCheck<T>
): ValidationResult<T> {
  const context = new ConstraintContext(input, constraintId, validation);
  const outcome = check(context);
  const result = typeof outcome === 'boolean' ? context.satisfies(outcome) : outcome;
  const entry = { constraintId, root: validation.root, path: validation.path.fullName, input };

  if (result.satisfied) {
    validation.log({ kind: 'satisfied', ...entry });
    return success(input);
  }

  validation.log({ kind: 'violated', ...entry, args: result.message.args });
  return failure([result.message]);
}
