import { checkConstraint, type MessageOverride } from '../constraint/Constraint';
import { ResourceMessage, type Message } from '../message/Message';
import type { Segment } from '../path/Path';
import type { Validation } from '../validation/Validation';
import { failure, success, type ValidationResult } from '../validation/ValidationResult';
import { ChainValidator, type Step } from './ChainValidator';
import type { Validator } from './Validator';

type EntryPart = 'key' | 'value';

/**
 * Map validator with chainable methods
 *
 * @example
 * ```typescript
 * kova.map<string, number>().notEmpty().onEachValue(kova.int().min(0));
 * ```
 */
export class MapValidator<K, V> extends ChainValidator<ReadonlyMap<K, V>, MapValidator<K, V>> {
  constructor(steps: readonly Step<ReadonlyMap<K, V>>[] = []) {
    super(steps);
  }

  protected create(steps: readonly Step<ReadonlyMap<K, V>>[]): MapValidator<K, V> {
    return new MapValidator(steps);
  }

  /**
   * Minimum number of entries
   */
  min(size: number, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.min', (map) => map.size >= size, (map) => [map.size, size], message);
  }

  /**
   * Maximum number of entries
   */
  max(size: number, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.max', (map) => map.size <= size, (map) => [map.size, size], message);
  }

  /**
   * Exact number of entries
   */
  size(size: number, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.size', (map) => map.size === size, (map) => [map.size, size], message);
  }

  /**
   * At least one entry
   */
  notEmpty(message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.notEmpty', (map) => map.size > 0, [], message);
  }

  /**
   * Key must be present
   */
  containsKey(key: K, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.containsKey', (map) => map.has(key), [key], message);
  }

  /**
   * Key must be absent
   */
  notContainsKey(key: K, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.notContainsKey', (map) => !map.has(key), [key], message);
  }

  /**
   * Some entry must hold `value`
   */
  containsValue(value: V, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.containsValue', (map) => [...map.values()].includes(value), [value], message);
  }

  /**
   * No entry may hold `value`
   */
  notContainsValue(value: V, message?: MessageOverride<ReadonlyMap<K, V>>): MapValidator<K, V> {
    return this.rule('kova.map.notContainsValue', (map) => ![...map.values()].includes(value), [value], message);
  }

  /**
   * Validates every key under a `[key]<map key>` segment. A converted key
   * that equals a key already produced is a `kova.map.distinctKey` violation.
   */
  onEachKey(validator: Validator<K, K>): MapValidator<K, V> {
    return this.nest((map, v) =>
      this.eachEntry(map, v, 'key', 'kova.map.onEachKey', (key, value, scoped, produced) => {
        const result = validator.execute(key, scoped);
        if (!result.success) return result;
        const distinct = checkConstraint(scoped, 'kova.map.distinctKey', result.value, (c) =>
          c.satisfies(!produced.has(c.input), () => c.resource(c.input))
        );
        return distinct.success ? success<[K, V]>([distinct.value, value]) : distinct;
      })
    );
  }

  /**
   * Validates every value under a `[key]<map value>` segment.
   */
  onEachValue(validator: Validator<V, V>): MapValidator<K, V> {
    return this.nest((map, v) =>
      this.eachEntry(map, v, 'value', 'kova.map.onEachValue', (key, value, scoped) => {
        const result = validator.execute(value, scoped);
        return result.success ? success<[K, V]>([key, result.value]) : result;
      })
    );
  }

  private eachEntry(
    map: ReadonlyMap<K, V>,
    v: Validation,
    part: EntryPart,
    constraintId: string,
    run: (key: K, value: V, scoped: Validation, produced: ReadonlyMap<K, V>) => ValidationResult<[K, V]>
  ): ValidationResult<ReadonlyMap<K, V>> {
    const messages: Message[] = [];
    const output = new Map<K, V>();
    for (const [key, value] of map) {
      const segment: Segment = part === 'key' ? { kind: 'mapKey', key } : { kind: 'mapValue', key };
      const result = run(key, value, v.descend(segment), output);
      if (result.success) {
        output.set(...result.value);
        continue;
      }
      output.set(key, value);
      messages.push(...result.messages);
      if (v.config.failFast) break;
    }
    if (messages.length === 0) return success(output);
    return failure([new ResourceMessage({ constraintId, root: v.root, path: v.path, input: map }, [messages])]);
  }
}
