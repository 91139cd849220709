import { Path } from '../path/Path';
import { formatArg, formatTemplate, hasArg, lookupArg, type MessageArgs } from './MessageFormatter';
import { getLocale, resolveTemplate } from './ResourceBundle';

export type { MessageArgs } from './MessageFormatter';

/**
 * Where a message was produced: the root-type label and the path that were
 * active at the moment of the violation.
 */
export interface MessageOrigin {
  constraintId: string;
  root: string;
  path: Path;
  input: unknown;
}

function collectMessages(value: unknown, into: Message[]): void {
  if (value instanceof Message) {
    into.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) collectMessages(item, into);
  }
}

/**
 * Outcome of one failed constraint.
 */
export abstract class Message {
  abstract readonly kind: 'text' | 'resource';

  readonly constraintId: string;
  readonly root: string;
  readonly path: Path;
  readonly input: unknown;

  protected constructor(origin: MessageOrigin) {
    this.constraintId = origin.constraintId;
    this.root = origin.root;
    this.path = origin.path;
    this.input = origin.input;
  }

  abstract get text(): string;

  abstract get args(): MessageArgs;

  /**
   * Same message re-attributed to another input and constraint id.
   */
  abstract withDetails(input: unknown, constraintId: string): Message;

  /**
   * Messages nested in `args` (element failures, `or` branches), depth-first.
   */
  get descendants(): Message[] {
    const result: Message[] = [];
    const args = this.args;
    for (const value of Array.isArray(args) ? args : Object.values(args)) {
      collectMessages(value, result);
    }
    return result;
  }

  arg(key: number | string): unknown {
    return lookupArg(this.args, key);
  }

  hasArg(key: number | string): boolean {
    return hasArg(this.args, key);
  }

  toString(): string {
    return `Message(constraintId=${this.constraintId}, text='${this.text}', root=${this.root}, path=${this.path.fullName}, input=${formatArg(this.input)})`;
  }
}

/**
 * Final text supplied at the failure site.
 */
export class TextMessage extends Message {
  readonly kind = 'text' as const;
  private readonly value: string;

  constructor(origin: MessageOrigin, text: string) {
    super(origin);
    this.value = text;
  }

  get text(): string {
    return this.value;
  }

  get args(): MessageArgs {
    return [];
  }

  withDetails(input: unknown, constraintId: string): TextMessage {
    return new TextMessage({ constraintId, root: this.root, path: this.path, input }, this.value);
  }
}

/**
 * Message whose text comes from a locale bundle.
 *
 * `text` is resolved on every read against the ambient locale, so one message
 * renders differently after `setLocale` switches language. Use `textIn` to
 * render for an explicit locale instead.
 */
export class ResourceMessage extends Message {
  readonly kind = 'resource' as const;
  readonly key: string;
  private readonly values: MessageArgs;

  constructor(origin: MessageOrigin, args: MessageArgs = [], key: string = origin.constraintId) {
    super(origin);
    this.values = args;
    this.key = key;
  }

  get text(): string {
    return this.textIn(getLocale());
  }

  get args(): MessageArgs {
    return this.values;
  }

  textIn(locale: string): string {
    return formatTemplate(resolveTemplate(this.key, locale), this.values);
  }

  withDetails(input: unknown, constraintId: string): ResourceMessage {
    return new ResourceMessage({ constraintId, root: this.root, path: this.path, input }, this.values, this.key);
  }
}

export const OR_CONSTRAINT_ID = 'kova.or';
export const WITH_MESSAGE_CONSTRAINT_ID = 'kova.withMessage';

export function isOrMessage(message: Message): boolean {
  return message.constraintId === OR_CONSTRAINT_ID;
}
