import { checkConstraint, type ConstraintCheck } from '../constraint/Constraint';
import { Message, OR_CONSTRAINT_ID, ResourceMessage, TextMessage, WITH_MESSAGE_CONSTRAINT_ID } from '../message/Message';
import { Path, type Segment } from '../path/Path';
import { UnrecoveredValidationError } from '../types/Errors';
import { AccumulateOk, recoverValidation, type Accumulate, type AccumulateError, type AccumulateValue } from './Accumulate';
import type { LogEntry } from './Log';
import { DEFAULT_VALIDATION_CONFIG, type ValidationConfig } from './ValidationConfig';
import { both, failure, isBoth, success, type NonEmptyMessages, type ValidationIor } from './ValidationResult';

export type ValidationBlock<R> = (v: Validation) => R;

/**
 * Builds the single message that replaces a group of failures: a fixed text,
 * or a function of the failures returning a message or a text.
 */
export type MessageProvider = string | ((messages: NonEmptyMessages) => Message | string);

interface ValidationState {
  config: ValidationConfig;
  root: string;
  path: Path;
  visiting: Set<object>;
  acc: Accumulate;
}

const NO_SCOPE: Accumulate = {
  accumulate: () => {
    throw new UnrecoveredValidationError('Messages were recorded outside of any validation scope');
  },
};

/**
 * The composite message of a failed `or`: args are exactly the two branches'
 * message lists, left operand first.
 */
export function orMessage(v: Validation, input: unknown, left: readonly Message[], right: readonly Message[]): Message {
  return new ResourceMessage({ constraintId: OR_CONSTRAINT_ID, root: v.root, path: v.path, input }, [left, right]);
}

export function consolidateMessages(
  v: Validation,
  input: unknown,
  messages: NonEmptyMessages,
  provider: MessageProvider | undefined,
  constraintId: string = WITH_MESSAGE_CONSTRAINT_ID
): Message {
  const origin = { constraintId, root: v.root, path: v.path, input };
  if (provider === undefined) return new ResourceMessage(origin, [messages], WITH_MESSAGE_CONSTRAINT_ID);
  const provided = typeof provider === 'string' ? provider : provider(messages);
  return typeof provided === 'string' ? new TextMessage(origin, provided) : provided;
}

/**
 * Root label of an object: its constructor name, or '' for prototype-less
 * objects.
 */
export function rootLabelOf(obj: object): string {
  return obj.constructor?.name ?? '';
}

/**
 * State of one top-level validation call, as seen from the current position
 * in the object graph.
 *
 * Instances are cheap immutable views: descending into a property returns a
 * new `Validation` with a longer path, while the `visiting` set and the
 * message sink are shared by every view of the same call.
 */
export class Validation {
  readonly config: ValidationConfig;
  readonly root: string;
  readonly path: Path;
  readonly visiting: Set<object>;
  private readonly acc: Accumulate;

  private constructor(state: ValidationState) {
    this.config = state.config;
    this.root = state.root;
    this.path = state.path;
    this.visiting = state.visiting;
    this.acc = state.acc;
  }

  static start(config: ValidationConfig = DEFAULT_VALIDATION_CONFIG): Validation {
    return new Validation({ config, root: '', path: Path.root(), visiting: new Set(), acc: NO_SCOPE });
  }

  private copy(changes: Partial<ValidationState>): Validation {
    return new Validation({
      config: this.config,
      root: this.root,
      path: this.path,
      visiting: this.visiting,
      acc: this.acc,
      ...changes,
    });
  }

  descend(segment: Segment): Validation {
    return this.copy({ path: this.path.append(segment) });
  }

  withRoot(root: string): Validation {
    return this.copy({ root });
  }

  now(): Date {
    return this.config.clock();
  }

  log(entry: LogEntry): void {
    this.config.logger?.(entry);
  }

  /**
   * Records messages in the current scope. Under fail-fast the scope is
   * cancelled right away; otherwise evaluation continues and the returned
   * token may be raised later.
   */
  accumulate(messages: readonly Message[]): AccumulateError {
    return this.acc.accumulate(messages);
  }

  raise(messages: Message | readonly Message[]): never {
    return this.accumulate(messages instanceof Message ? [messages] : messages).raise();
  }

  /**
   * Runs `block` so that a raise inside it only ends the block. The messages
   * still reach the enclosing scope, and the returned error cancels that
   * scope when its value is read.
   */
  accumulating<R>(block: ValidationBlock<R>): AccumulateValue<R> {
    let outside: AccumulateError | undefined;
    return recoverValidation<AccumulateValue<R>>(
      () => outside ?? this.accumulate([]),
      (token) =>
        new AccumulateOk(
          block(
            this.copy({
              acc: {
                accumulate: (messages) => {
                  outside = this.accumulate(messages);
                  return token;
                },
              },
            })
          )
        )
    );
  }

  /**
   * Runs `block` with a private message list and reports what it produced.
   */
  ior<R>(block: ValidationBlock<R>): ValidationIor<R> {
    const messages: Message[] = [];
    return recoverValidation<ValidationIor<R>>(
      () => failure(messages),
      (token) => {
        const value = block(
          this.copy({
            acc: {
              accumulate: (recorded) => {
                messages.push(...recorded);
                if (this.config.failFast) token.raise();
                return token;
              },
            },
          })
        );
        return messages.length === 0 ? success(value) : both(value, messages);
      }
    );
  }

  /**
   * Starts an alternative chain: `v.or(a).or(b).orElse(c)`.
   */
  or<R>(block: ValidationBlock<R>): OrChain<R> {
    return new OrChain(this, this.ior(block));
  }

  named<R>(label: string, block: ValidationBlock<R>): R {
    return block(this.descend({ kind: 'named', label }));
  }

  accumulatingAt<R>(segment: Segment, block: ValidationBlock<R>): AccumulateValue<R> {
    const result = this.descend(segment).ior(block);
    if (result.success) return new AccumulateOk(result.value);
    return this.accumulate(result.messages);
  }

  /**
   * Validates a value under its own path segment without cancelling the
   * caller; a failed capture only cancels when its value is read.
   *
   * @example
   * ```typescript
   * const user = tryValidate((v) => {
   *   const name = v.capture('name', (v) => kova.string().notBlank().bind(rawName, v));
   *   const age = v.capture('age', (v) => kova.string().toInt().bind(rawAge, v));
   *   return new User(name.value, age.value);
   * });
   * ```
   */
  capture<R>(name: string, block: ValidationBlock<R>): AccumulateValue<R> {
    return this.accumulatingAt({ kind: 'named', label: name }, block);
  }

  constrain<T>(constraintId: string, input: T, check: ConstraintCheck<T>): void {
    const result = checkConstraint(this, constraintId, input, check);
    if (!result.success) this.accumulate(result.messages);
  }

  withMessage<R>(provider: MessageProvider | undefined, block: ValidationBlock<R>, constraintId?: string): R {
    const result = this.ior(block);
    if (result.success) return result.value;
    const message = consolidateMessages(this, undefined, result.messages, provider, constraintId);
    if (isBoth(result)) {
      this.accumulate([message]);
      return result.value;
    }
    return this.raise(message);
  }

  /**
   * Runs `block` for every element under an index segment and folds the
   * failures into one `kova.collection.onEach` message.
   */
  onEach<E>(elements: Iterable<E>, block: (element: E, v: Validation) => void): void {
    const messages: Message[] = [];
    let index = 0;
    for (const element of elements) {
      const result = this.descend({ kind: 'index', index }).ior((v) => block(element, v));
      index += 1;
      if (!result.success) {
        messages.push(...result.messages);
        if (this.config.failFast) break;
      }
    }
    if (messages.length > 0) {
      this.accumulate([
        new ResourceMessage(
          { constraintId: 'kova.collection.onEach', root: this.root, path: this.path, input: elements },
          [messages]
        ),
      ]);
    }
  }

  /**
   * Validates the properties of `obj` imperatively. Re-entering an object that
   * is already being validated further up the path is a no-op.
   */
  schema<T extends object>(obj: T, block: (scope: SchemaScope<T>) => void, name?: string): void {
    if (this.visiting.has(obj)) return;
    const scoped = this.root === '' ? this.withRoot(name ?? rootLabelOf(obj)) : this;
    this.visiting.add(obj);
    try {
      block(new SchemaScope(obj, scoped));
    } finally {
      this.visiting.delete(obj);
    }
  }
}

export class OrChain<R> {
  constructor(
    private readonly validation: Validation,
    readonly result: ValidationIor<R>
  ) {}

  or(block: ValidationBlock<R>): OrChain<R> {
    const current = this.result;
    if (current.success) return this;
    const other = this.validation.ior(block);
    if (other.success) return new OrChain(this.validation, other);

    const message = orMessage(this.validation, undefined, current.messages, other.messages);
    const partial = isBoth(current) ? current : isBoth(other) ? other : undefined;
    return new OrChain(this.validation, partial ? both(partial.value, [message]) : failure([message]));
  }

  orElse(block: ValidationBlock<R>): R {
    return this.or(block).bind();
  }

  /**
   * Hands the outcome to the enclosing scope and returns the value.
   */
  bind(): R {
    const result = this.result;
    if (result.success) return result.value;
    if (isBoth(result)) {
      this.validation.accumulate(result.messages);
      return result.value;
    }
    return this.validation.raise(result.messages);
  }
}

export class SchemaScope<T extends object> {
  constructor(
    readonly target: T,
    readonly validation: Validation
  ) {}

  property<K extends keyof T & string, R>(key: K, block: (value: T[K], v: Validation) => R): AccumulateValue<R> {
    return this.validation.accumulatingAt({ kind: 'property', name: key }, (v) => block(this.target[key], v));
  }

  named<R>(label: string, block: ValidationBlock<R>): AccumulateValue<R> {
    return this.validation.accumulatingAt({ kind: 'named', label }, block);
  }

  constrain(constraintId: string, check: ConstraintCheck<T>): void {
    this.validation.constrain(constraintId, this.target, check);
  }
}
