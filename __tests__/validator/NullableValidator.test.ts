import { describe, it, expect } from 'vitest';
import { kova } from '../../src/core/validator/validators';
import { texts } from '../helpers/results';
import type { LogEntry } from '../../src/core/validation/Log';

describe('NullableValidator', () => {
  describe('isNull and notNull', () => {
    it('should require an absent value', () => {
      const validator = kova.nullable<string>().isNull();

      expect(validator.tryValidate(null)).toEqual({ success: true, value: null });
      expect(texts(validator.tryValidate('a'))).toEqual(['must be null']);
    });

    it('should require a present value', () => {
      const validator = kova.nullable<string>().notNull();

      expect(texts(validator.tryValidate(null))).toEqual(['must not be null']);
      expect(texts(validator.tryValidate(undefined))).toEqual(['must not be null']);
      expect(validator.tryValidate('a')).toEqual({ success: true, value: 'a' });
    });
  });

  describe('whenNotNull', () => {
    it('should validate only present values', () => {
      const validator = kova.nullable<string>().whenNotNull(kova.string().min(3));

      expect(validator.tryValidate(null)).toEqual({ success: true, value: null });
      expect(texts(validator.tryValidate('ab'))).toEqual(['must be at least 3 characters']);
    });
  });

  describe('isNullOr', () => {
    it('should accept absent values or valid ones', () => {
      const validator = kova.nullable<string>().isNullOr(kova.string().min(3));

      expect(validator.tryValidate(undefined)).toEqual({ success: true, value: undefined });
      expect(validator.tryValidate('abcd')).toEqual({ success: true, value: 'abcd' });
    });

    it('should report both alternatives', () => {
      const result = kova.nullable<string>().isNullOr(kova.string().min(3)).tryValidate('ab');

      expect(texts(result)).toEqual([
        'at least one constraint must be satisfied: [[must be null], [must be at least 3 characters]]',
      ]);
    });

    it('should log the null check before the other validator', () => {
      const entries: LogEntry[] = [];

      kova
        .nullable<string>()
        .isNullOr(kova.string().min(3))
        .tryValidate('abcd', { logger: (entry) => entries.push(entry) });

      expect(entries.map((entry) => [entry.kind, entry.constraintId])).toEqual([
        ['violated', 'kova.nullable.isNull'],
        ['satisfied', 'kova.charSequence.min'],
      ]);
    });
  });

  describe('notNullAnd', () => {
    it('should require a present and valid value', () => {
      const validator = kova.nullable<string>().notNullAnd(kova.string().min(3));

      expect(texts(validator.tryValidate(null))).toEqual(['must not be null']);
      expect(texts(validator.tryValidate('ab'))).toEqual(['must be at least 3 characters']);
      expect(validator.tryValidate('abc')).toEqual({ success: true, value: 'abc' });
    });
  });

  describe('toNonNullable', () => {
    it('should perform the not-null check itself', () => {
      const validator = kova.nullable<string>().toNonNullable();

      expect(texts(validator.tryValidate(null))).toEqual(['must not be null']);
      expect(validator.tryValidate('x')).toEqual({ success: true, value: 'x' });
    });

    it('should continue with a non-nullable validator', () => {
      const validator = kova.nullable<string>().notNullThen(kova.string().toInt());

      expect(validator.tryValidate('12')).toEqual({ success: true, value: 12 });
      expect(texts(validator.tryValidate(null))).toEqual(['must not be null']);
      expect(kova.nullable<string>().asNonNullableThen(kova.string().toInt()).tryValidate('7')).toEqual({
        success: true,
        value: 7,
      });
    });
  });

  describe('withDefault', () => {
    it('should substitute absent values', () => {
      const validator = kova.nullable<string>().withDefault('anonymous');

      expect(validator.tryValidate(null)).toEqual({ success: true, value: 'anonymous' });
      expect(validator.tryValidate('bob')).toEqual({ success: true, value: 'bob' });
    });

    it('should validate the defaulted value', () => {
      const validator = kova.nullable<string>().withDefaultThen('0', kova.string().toInt());

      expect(validator.tryValidate(undefined)).toEqual({ success: true, value: 0 });
      expect(texts(validator.tryValidate('x'))).toEqual(['must be a valid integer']);
    });
  });

  describe('constrain', () => {
    it('should stay nullable', () => {
      const validator = kova
        .nullable<number>()
        .constrain('test.small', (c) => c.satisfies(c.input === null || c.input === undefined || c.input < 10, 'must be small'))
        .whenNotNull(kova.int());

      expect(texts(validator.tryValidate(12))).toEqual(['must be small']);
      expect(texts(validator.tryValidate(1.5))).toEqual(['must be an integer']);
      expect(validator.tryValidate(null)).toEqual({ success: true, value: null });
    });
  });
});
