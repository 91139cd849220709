import { describe, it, expect, afterEach } from 'vitest';
import {
  getLocale,
  hasTemplate,
  registerBundle,
  resolveTemplate,
  setLocale,
  setResourceLookup,
  withLocale,
} from '../../src/core/message/ResourceBundle';
import { ConfigurationError } from '../../src/core/types/Errors';

describe('ResourceBundle', () => {
  afterEach(() => {
    setLocale('en');
    setResourceLookup(undefined);
  });

  it('should default to English', () => {
    expect(getLocale()).toBe('en');
    expect(resolveTemplate('kova.charSequence.min')).toBe('must be at least {0} characters');
  });

  it('should resolve Japanese templates', () => {
    expect(resolveTemplate('kova.charSequence.min', 'ja')).toBe('{0}文字以上である必要があります');
  });

  it('should fall back from region to language to default', () => {
    expect(resolveTemplate('kova.number.positive', 'ja-JP')).toBe('正の数である必要があります');
    expect(resolveTemplate('kova.number.positive', 'en-US')).toBe('must be positive');
    expect(resolveTemplate('kova.number.positive', 'fr')).toBe('must be positive');
  });

  it('should throw for an unknown constraint id', () => {
    expect(() => resolveTemplate('test.unknown', 'en')).toThrow(ConfigurationError);
    expect(() => resolveTemplate('test.unknown', 'en')).toThrow('No message template for "test.unknown" (locale en)');
  });

  it('should use the ambient locale by default', () => {
    setLocale('ja');
    expect(resolveTemplate('kova.nullable.notNull')).toBe('nullであってはいけません');
  });

  it('should restore the locale after withLocale', () => {
    expect(withLocale('ja', () => getLocale())).toBe('ja');
    expect(getLocale()).toBe('en');

    expect(() =>
      withLocale('ja', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(getLocale()).toBe('en');
  });

  it('should register new bundles and templates', () => {
    registerBundle('en', { 'test.greeting': 'hello {0}' });
    registerBundle('fr', { 'test.greeting': 'bonjour {0}' });

    expect(resolveTemplate('test.greeting', 'en')).toBe('hello {0}');
    expect(resolveTemplate('test.greeting', 'fr-FR')).toBe('bonjour {0}');
    expect(resolveTemplate('kova.or', 'fr')).toBe('at least one constraint must be satisfied: [{0}, {1}]');
  });

  it('should consult a custom lookup first', () => {
    setResourceLookup((constraintId, locale) =>
      constraintId === 'kova.charSequence.min' && locale === 'en' ? 'min {0}' : undefined
    );

    expect(resolveTemplate('kova.charSequence.min', 'en')).toBe('min {0}');
    expect(resolveTemplate('kova.charSequence.max', 'en')).toBe('must be at most {0} characters');
  });

  it('should report whether a template exists', () => {
    expect(hasTemplate('kova.or')).toBe(true);
    expect(hasTemplate('test.none')).toBe(false);
  });
});
