import { describe, it, expect } from 'vitest';
import {
  both,
  failure,
  isBoth,
  isFailure,
  isSuccess,
  success,
  toResult,
} from '../../src/core/validation/ValidationResult';
import { TextMessage } from '../../src/core/message/Message';
import { Path } from '../../src/core/path/Path';
import { ConfigurationError } from '../../src/core/types/Errors';

const message = new TextMessage({ constraintId: 'custom', root: '', path: Path.root(), input: 1 }, 'bad');

describe('ValidationResult', () => {
  it('should refuse a failure without messages', () => {
    expect(() => failure([])).toThrow(ConfigurationError);
    expect(() => both('value', [])).toThrow('A failure needs at least one message');
  });

  it('should tell the three outcomes apart', () => {
    expect(isSuccess(success(1))).toBe(true);
    expect(isFailure(failure([message]))).toBe(true);
    expect(isBoth(failure([message]))).toBe(false);
    expect(isBoth(both(1, [message]))).toBe(true);
    expect(isFailure(both(1, [message]))).toBe(true);
  });

  it('should drop the partial value when converting', () => {
    expect(toResult(both(1, [message]))).toEqual({ success: false, messages: [message] });
    expect(toResult(success(1))).toEqual({ success: true, value: 1 });
  });
});
