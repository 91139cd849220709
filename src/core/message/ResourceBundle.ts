import en from './resources/en.json';
import ja from './resources/ja.json';
import { ConfigurationError } from '../types/Errors';

/**
 * External template source: `(constraintId, locale) -> template`.
 * Returning `undefined` falls through to the built-in bundles.
 */
export type ResourceLookup = (constraintId: string, locale: string) => string | undefined;

export const DEFAULT_LOCALE = 'en';

const bundles = new Map<string, Record<string, string>>([
  ['en', { ...en }],
  ['ja', { ...ja }],
]);

let ambientLocale: string = DEFAULT_LOCALE;
let customLookup: ResourceLookup | undefined;

/**
 * Process-wide locale read whenever a resource message renders its text.
 */
export function getLocale(): string {
  return ambientLocale;
}

export function setLocale(locale: string): void {
  ambientLocale = locale;
}

/**
 * Runs `block` with the ambient locale switched to `locale`, restoring the
 * previous locale afterwards.
 */
export function withLocale<R>(locale: string, block: () => R): R {
  const previous = ambientLocale;
  ambientLocale = locale;
  try {
    return block();
  } finally {
    ambientLocale = previous;
  }
}

/**
 * Adds templates for a locale; existing ids are overridden.
 */
export function registerBundle(locale: string, templates: Readonly<Record<string, string>>): void {
  const bundle = bundles.get(locale) ?? {};
  bundles.set(locale, { ...bundle, ...templates });
}

export function setResourceLookup(lookup: ResourceLookup | undefined): void {
  customLookup = lookup;
}

/**
 * `ja-JP` is tried as `ja-JP`, then `ja`, then the default locale.
 */
function candidates(locale: string): string[] {
  const result = [locale];
  const language = locale.split(/[-_]/)[0];
  if (language && language !== locale) result.push(language);
  if (!result.includes(DEFAULT_LOCALE)) result.push(DEFAULT_LOCALE);
  return result;
}

export function resolveTemplate(constraintId: string, locale: string = ambientLocale): string {
  for (const candidate of candidates(locale)) {
    const custom = customLookup?.(constraintId, candidate);
    if (custom !== undefined) return custom;
    const template = bundles.get(candidate)?.[constraintId];
    if (template !== undefined) return template;
  }
  throw ConfigurationError.missingResource(constraintId, locale);
}

export function hasTemplate(constraintId: string, locale: string = ambientLocale): boolean {
  return candidates(locale).some(
    (candidate) => customLookup?.(constraintId, candidate) !== undefined || bundles.get(candidate)?.[constraintId] !== undefined
  );
}
