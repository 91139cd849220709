import type { Message } from '../message/Message';
import { ConfigurationError } from '../types/Errors';

export type NonEmptyMessages = readonly [Message, ...Message[]];

export interface Success<T> {
  readonly success: true;
  readonly value: T;
}

export interface Failure {
  readonly success: false;
  readonly messages: NonEmptyMessages;
}

/**
 * Result returned by validators and `tryValidate`
 */
export type ValidationResult<T> = Success<T> | Failure;

/**
 * A block that ran to completion but recorded violations on the way.
 */
export interface Both<T> {
  readonly success: false;
  readonly value: T;
  readonly messages: NonEmptyMessages;
}

/**
 * Inclusive-or outcome of an accumulating block.
 */
export type ValidationIor<T> = Success<T> | Failure | Both<T>;

export function success<T>(value: T): Success<T> {
  return { success: true, value };
}

export function failure(messages: readonly Message[]): Failure {
  return { success: false, messages: nonEmpty(messages) };
}

export function both<T>(value: T, messages: readonly Message[]): Both<T> {
  return { success: false, value, messages: nonEmpty(messages) };
}

export function nonEmpty(messages: readonly Message[]): NonEmptyMessages {
  const [first, ...rest] = messages;
  if (first === undefined) {
    throw ConfigurationError.emptyFailure();
  }
  return [first, ...rest];
}

export function isSuccess<T>(result: ValidationIor<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: ValidationIor<T>): result is Failure | Both<T> {
  return !result.success;
}

export function isBoth<T>(result: ValidationIor<T>): result is Both<T> {
  return !result.success && 'value' in result;
}

/**
 * Drops the partial value of a `Both`; used where only pass/fail matters.
 */
export function toResult<T>(ior: ValidationIor<T>): ValidationResult<T> {
  return ior.success ? ior : failure(ior.messages);
}
