import type { Message } from '../message/Message';

/**
 * Base error class for all Kova errors
 */
export class KovaError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown by `validate` entry points when validation fails.
 * Exposes the full, ordered list of violation messages.
 */
export class ValidationException extends KovaError {
  readonly messages: readonly Message[];

  constructor(messages: readonly Message[]) {
    super(
      `Validation failed: ${messages.map((m) => (m.path.isEmpty() ? m.text : `${m.path.fullName}: ${m.text}`)).join(', ')}`,
      'VALIDATION_ERROR',
      { count: messages.length }
    );
    this.messages = messages;
  }
}

/**
 * Thrown from a `map` transform to turn the current value into a violation
 * instead of aborting the call. A plain string becomes a text message at the
 * path of the transform, under `constraintId`.
 */
export class MessageException extends KovaError {
  readonly content: Message | string;

  constructor(content: Message | string, readonly constraintId: string = 'kova.map') {
    super(typeof content === 'string' ? content : content.text, 'MESSAGE_ERROR', { constraintId });
    this.content = content;
  }
}

/**
 * A cancellation signal reached the top-level entry point without meeting the
 * boundary that created it.
 */
export class UnrecoveredValidationError extends KovaError {
  constructor(message: string = 'Validation cancellation escaped its scope') {
    super(message, 'UNRECOVERED_CANCELLATION');
  }
}

/**
 * Misuse of the library itself.
 * - ConfigurationError.missingResource() - No template for a constraint id
 * - ConfigurationError.emptyFailure() - Failure built without messages
 * - ConfigurationError.invalidArgument() - Bad argument to a builder
 */
export class ConfigurationError extends KovaError {
  private constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static missingResource(constraintId: string, locale: string): ConfigurationError {
    return new ConfigurationError(
      `No message template for "${constraintId}" (locale ${locale})`,
      'CONFIGURATION_ERROR:MISSING_RESOURCE',
      { constraintId, locale }
    );
  }

  static emptyFailure(): ConfigurationError {
    return new ConfigurationError('A failure needs at least one message', 'CONFIGURATION_ERROR:EMPTY_FAILURE');
  }

  static invalidArgument(message: string, details?: Record<string, unknown>): ConfigurationError {
    return new ConfigurationError(message, 'CONFIGURATION_ERROR:INVALID_ARGUMENT', details);
  }
}
