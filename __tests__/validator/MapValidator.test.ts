import { describe, it, expect } from 'vitest';
import { kova } from '../../src/core/validator/validators';
import { texts } from '../helpers/results';

const scores = new Map([
  ['a', 1],
  ['b', -1],
]);

describe('MapValidator', () => {
  describe('size', () => {
    it('should report the actual size', () => {
      expect(texts(kova.map<string, number>().min(3).tryValidate(scores))).toEqual([
        'Map (size 2) must have at least 3 entries',
      ]);
      expect(texts(kova.map<string, number>().max(1).tryValidate(scores))).toEqual([
        'Map (size 2) must have at most 1 entries',
      ]);
      expect(texts(kova.map<string, number>().size(1).tryValidate(scores))).toEqual([
        'Map (size 2) must have exactly 1 entries',
      ]);
      expect(texts(kova.map<string, number>().notEmpty().tryValidate(new Map()))).toEqual(['must not be empty']);
    });
  });

  describe('membership', () => {
    it('should check keys and values', () => {
      expect(texts(kova.map<string, number>().containsKey('z').tryValidate(scores))).toEqual(['must contain key z']);
      expect(texts(kova.map<string, number>().notContainsKey('a').tryValidate(scores))).toEqual([
        'must not contain key a',
      ]);
      expect(texts(kova.map<string, number>().containsValue(5).tryValidate(scores))).toEqual(['must contain value 5']);
      expect(texts(kova.map<string, number>().notContainsValue(1).tryValidate(scores))).toEqual([
        'must not contain value 1',
      ]);
    });
  });

  describe('onEachValue', () => {
    it('should place value failures under their key', () => {
      const result = kova.map<string, number>().onEachValue(kova.int().min(0)).tryValidate(scores);

      expect(result.success).toBe(false);
      if (!result.success) {
        const [summary] = result.messages;
        expect(summary.constraintId).toBe('kova.map.onEachValue');
        expect(summary.text).toBe('Some values do not satisfy the constraint: [must be greater than or equal to 0]');
        expect(summary.descendants.map((m) => m.path.fullName)).toEqual(['[b]<map value>']);
      }
    });

    it('should output the transformed values', () => {
      const result = kova
        .map<string, string>()
        .onEachValue(kova.string().trim())
        .tryValidate(new Map([['k', ' v ']]));

      expect(result).toEqual({ success: true, value: new Map([['k', 'v']]) });
    });
  });

  describe('onEachKey', () => {
    it('should place key failures under their key', () => {
      const result = kova.map<string, number>().onEachKey(kova.string().min(2)).tryValidate(scores);

      expect(result.success).toBe(false);
      if (!result.success) {
        const [summary] = result.messages;
        expect(summary.text).toBe(
          'Some keys do not satisfy the constraint: [must be at least 2 characters, must be at least 2 characters]'
        );
        expect(summary.descendants.map((m) => m.path.fullName)).toEqual(['[a]<map key>', '[b]<map key>']);
      }
    });

    it('should stop at the first failing key under fail-fast', () => {
      const result = kova.map<string, number>().onEachKey(kova.string().min(2)).tryValidate(scores, { failFast: true });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.messages[0].descendants).toHaveLength(1);
      }
    });

    it('should reject converted keys that collide', () => {
      const result = kova
        .map<string, number>()
        .onEachKey(kova.string().toUpperCase())
        .tryValidate(
          new Map([
            ['a', 1],
            ['A', 2],
          ])
        );

      expect(result.success).toBe(false);
      if (!result.success) {
        const [summary] = result.messages;
        expect(summary.text).toBe(
          'Some keys do not satisfy the constraint: [must not collide with another key after conversion: A]'
        );
        expect(summary.descendants.map((m) => [m.constraintId, m.path.fullName])).toEqual([
          ['kova.map.distinctKey', '[A]<map key>'],
        ]);
      }
    });

    it('should output converted keys when they stay distinct', () => {
      const result = kova
        .map<string, number>()
        .onEachKey(kova.string().toUpperCase())
        .tryValidate(new Map([['a', 1]]));

      expect(result).toEqual({ success: true, value: new Map([['A', 1]]) });
    });
  });
});
