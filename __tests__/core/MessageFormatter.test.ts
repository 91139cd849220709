import { describe, it, expect } from 'vitest';
import { formatArg, formatTemplate, hasArg, lookupArg } from '../../src/core/message/MessageFormatter';
import { TextMessage } from '../../src/core/message/Message';
import { Path } from '../../src/core/path/Path';

describe('MessageFormatter', () => {
  describe('formatTemplate', () => {
    it('should substitute positional placeholders', () => {
      expect(formatTemplate('must be at least {0} characters', [5])).toBe('must be at least 5 characters');
      expect(formatTemplate('must be within range {0}..{1}', [1, 10])).toBe('must be within range 1..10');
    });

    it('should substitute named placeholders', () => {
      expect(formatTemplate('between {min} and {max}', { min: 1, max: 3 })).toBe('between 1 and 3');
    });

    it('should keep unknown placeholders', () => {
      expect(formatTemplate('{0} and {1}', ['a'])).toBe('a and {1}');
      expect(formatTemplate('hello {name}', [])).toBe('hello {name}');
    });
  });

  describe('formatArg', () => {
    it('should render nested arrays', () => {
      expect(formatArg([1, [2, 3]])).toBe('[1, [2, 3]]');
      expect(formatArg([])).toBe('[]');
    });

    it('should render messages as their text', () => {
      const message = new TextMessage({ constraintId: 'custom', root: '', path: Path.root(), input: 1 }, 'too small');
      expect(formatArg([message])).toBe('[too small]');
    });

    it('should render special objects', () => {
      expect(formatArg(/\d+/)).toBe('\\d+');
      expect(formatArg(new Date('2024-06-01T00:00:00.000Z'))).toBe('2024-06-01T00:00:00.000Z');
      expect(formatArg(new Set(['a', 'b']))).toBe('[a, b]');
      expect(formatArg(new Map([['a', 1]]))).toBe('{a=1}');
      expect(formatArg(null)).toBe('null');
    });
  });

  describe('argument lookup', () => {
    it('should look up positional arguments by number or numeric string', () => {
      expect(hasArg(['x'], 0)).toBe(true);
      expect(hasArg(['x'], 1)).toBe(false);
      expect(lookupArg(['x'], '0')).toBe('x');
    });

    it('should look up named arguments', () => {
      expect(hasArg({ a: 1 }, 'a')).toBe(true);
      expect(lookupArg({ a: 1 }, 'a')).toBe(1);
      expect(lookupArg({ a: 1 }, 'b')).toBeUndefined();
    });
  });
});
