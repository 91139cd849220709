/**
 * Core of the validation engine: paths, messages, the validation scope and
 * the validator combinators
 */

// Path
export { Path } from './path/Path';
export type { Segment } from './path/Path';

// Messages
export * from './message';

// Validation scope
export { Validation, OrChain, SchemaScope, orMessage, consolidateMessages, rootLabelOf } from './validation/Validation';
export type { ValidationBlock, MessageProvider } from './validation/Validation';
export { tryValidate, validate } from './validation/entry';
export { DEFAULT_VALIDATION_CONFIG, resolveConfig } from './validation/ValidationConfig';
export type { ValidationConfig, ValidationOptions, Clock } from './validation/ValidationConfig';
export { logWith } from './validation/Log';
export type { LogEntry, LogSink } from './validation/Log';
export {
  AccumulateError,
  AccumulateOk,
  ValidationCancellation,
  recoverValidation,
} from './validation/Accumulate';
export type { Accumulate, AccumulateValue } from './validation/Accumulate';
export { success, failure, both, isSuccess, isFailure, isBoth, toResult } from './validation/ValidationResult';
export type {
  ValidationResult,
  ValidationIor,
  Success,
  Failure,
  Both,
  NonEmptyMessages,
} from './validation/ValidationResult';

// Constraints
export { ConstraintContext, checkConstraint, SATISFIED } from './constraint/Constraint';
export type { Constraint, ConstraintCheck, ConstraintResult, MessageOverride } from './constraint/Constraint';

// Validators
export { Validator, NullableValidator, isAbsent } from './validator/Validator';
export type { Execute, Infer, Nullish } from './validator/Validator';
export { ChainValidator } from './validator/ChainValidator';
export type { Step } from './validator/ChainValidator';
export { StringValidator } from './validator/StringValidator';
export { NumberValidator } from './validator/NumberValidator';
export { BooleanValidator } from './validator/BooleanValidator';
export { TemporalValidator } from './validator/TemporalValidator';
export { LiteralValidator, enumValues } from './validator/LiteralValidator';
export type { Literal, Widen, EnumLike } from './validator/LiteralValidator';
export { ArrayValidator } from './validator/ArrayValidator';
export { MapValidator } from './validator/MapValidator';
export { GenericValidator } from './validator/GenericValidator';
export { ObjectSchema, ObjectSchemaScope } from './validator/ObjectSchema';
export type { ObjectSchemaOptions } from './validator/ObjectSchema';
export { kova } from './validator/validators';

// Logging
export type { Logger, LogLevel } from './types/Logger';
export { SilentLogger, ConsoleLogger, describeValue } from './types/Logger';

// Errors
export {
  KovaError,
  ValidationException,
  MessageException,
  UnrecoveredValidationError,
  ConfigurationError,
} from './types/Errors';
