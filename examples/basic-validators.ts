/**
 * Example: Declarative validators and combinators
 *
 * Run with: npx tsx examples/basic-validators.ts
 */

import { kova, type ValidationResult } from '../src';

function show<T>(label: string, result: ValidationResult<T>): void {
  if (result.success) {
    console.log(`  ✓ ${label}:`, result.value);
  } else {
    console.log(`  ✗ ${label}:`, result.messages.map((m) => m.text));
  }
}

console.log('=== Basic Validators ===\n');

// ============================================================================
// Example 1: Chained constraints
// ============================================================================
console.log('1. Strings and numbers:');
const username = kova.string().trim().min(3).max(16).matches(/[a-z0-9_]+/);
const age = kova.int().min(0).max(150);

show('"  ann_42  "', username.tryValidate('  ann_42  '));
show('"A!"', username.tryValidate('A!'));
show('7', age.tryValidate(7));
show('-1', age.tryValidate(-1));
console.log();

// ============================================================================
// Example 2: Alternatives and pipelines
// ============================================================================
console.log('2. or / then / map:');
const countryCode = kova.string().length(2).or(kova.string().length(3));
const port = kova.string().toInt().then(kova.int().inRange(1, 65535));
const initials = kova.string().notBlank().map((s) => s.split(' ').map((part) => part.charAt(0)).join(''));

show('"JPN"', countryCode.tryValidate('JPN'));
show('"J"', countryCode.tryValidate('J'));
show('"8080"', port.tryValidate('8080'));
show('"99999"', port.tryValidate('99999'));
show('"Ada Lovelace"', initials.tryValidate('Ada Lovelace'));
console.log();

// ============================================================================
// Example 3: Nullable values
// ============================================================================
console.log('3. Nullable:');
const nickname = kova.nullable<string>().whenNotNull(kova.string().min(2));
const displayName = kova.nullable<string>().withDefaultThen('anonymous', kova.string().notBlank());

show('null nickname', nickname.tryValidate(null));
show('"x" nickname', nickname.tryValidate('x'));
show('undefined display name', displayName.tryValidate(undefined));
console.log();

// ============================================================================
// Example 4: Collections, maps and literals
// ============================================================================
console.log('4. Collections:');
const tags = kova.list<string>().max(3).onEach(kova.string().lowercase());
const stock = kova.map<string, number>().onEachValue(kova.int().notNegative());
const sort = kova.literal('asc', 'desc');

show('["a", "B"]', tags.tryValidate(['a', 'B']));
show('stock', stock.tryValidate(new Map([['apples', 3], ['pears', -2]])));
show('"up"', sort.tryValidate('up'));
