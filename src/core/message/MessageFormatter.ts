/**
 * Positional (`{0}`) or named (`{max}`) message arguments.
 */
export type MessageArgs = readonly unknown[] | Readonly<Record<string, unknown>>;

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

/**
 * Anything that renders itself as message text (messages nested in args).
 */
export interface Renderable {
  readonly text: string;
}

export function isRenderable(value: unknown): value is Renderable {
  return typeof value === 'object' && value !== null && 'text' in value && 'constraintId' in value;
}

function isPositional(args: MessageArgs): args is readonly unknown[] {
  return Array.isArray(args);
}

export function hasArg(args: MessageArgs, key: string | number): boolean {
  if (isPositional(args)) {
    const index = typeof key === 'number' ? key : Number(key);
    return Number.isInteger(index) && index >= 0 && index < args.length;
  }
  return Object.prototype.hasOwnProperty.call(args, String(key));
}

export function lookupArg(args: MessageArgs, key: string | number): unknown {
  if (!hasArg(args, key)) return undefined;
  return isPositional(args) ? args[Number(key)] : args[String(key)];
}

export function formatArg(value: unknown): string {
  if (isRenderable(value)) return value.text;
  if (Array.isArray(value)) return `[${value.map(formatArg).join(', ')}]`;
  if (value instanceof RegExp) return value.source;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (value instanceof Set) return `[${[...value].map(formatArg).join(', ')}]`;
  if (value instanceof Map) {
    return `{${[...value.entries()].map(([k, v]) => `${formatArg(k)}=${formatArg(v)}`).join(', ')}}`;
  }
  return String(value);
}

/**
 * Substitutes placeholders in `template`. Unknown placeholders are left as-is.
 *
 * @example
 * ```typescript
 * formatTemplate('must be at least {0} characters', [5]); // 'must be at least 5 characters'
 * formatTemplate('between {min} and {max}', { min: 1, max: 3 }); // 'between 1 and 3'
 * ```
 */
export function formatTemplate(template: string, args: MessageArgs): string {
  return template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
    const lookupKey = /^\d+$/.test(key) ? Number(key) : key;
    return hasArg(args, lookupKey) ? formatArg(lookupArg(args, lookupKey)) : placeholder;
  });
}
