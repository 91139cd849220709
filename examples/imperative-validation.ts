/**
 * Example: Imperative validation blocks
 *
 * Run with: npx tsx examples/imperative-validation.ts
 */

import { kova, tryValidate, validate, withLocale, logWith, ConsoleLogger } from '../src';

interface SignupForm {
  name: string;
  age: string;
  contact: string;
}

class Signup {
  constructor(
    readonly name: string,
    readonly age: number,
    readonly contact: string
  ) {}
}

function parseSignup(form: SignupForm) {
  return tryValidate((v) => {
    const name = v.capture('name', (scoped) => kova.string().trim().min(2).bind(form.name, scoped));
    const age = v.capture('age', (scoped) => kova.string().toInt().then(kova.int().min(18)).bind(form.age, scoped));
    const contact = v.named('contact', (scoped) =>
      scoped
        .or((alt) => kova.string().contains('@').bind(form.contact, alt))
        .orElse((alt) => kova.string().matches(/\+?\d{7,15}/).bind(form.contact, alt))
    );
    return new Signup(name.value, age.value, contact);
  });
}

console.log('=== Imperative Validation ===\n');

const ok = parseSignup({ name: ' Ada ', age: '36', contact: 'ada@example.com' });
console.log('  valid form:', ok.success ? ok.value : ok.messages.map((m) => m.text));

const bad = parseSignup({ name: 'A', age: 'twelve', contact: 'call me' });
if (!bad.success) {
  for (const message of bad.messages) {
    console.log(`  ✗ ${message.path.fullName}: ${message.text}`);
  }
  // Resource messages are rendered in the locale active when text is read
  withLocale('ja', () => {
    for (const message of bad.messages) {
      console.log(`  ✗ [ja] ${message.path.fullName}: ${message.text}`);
    }
  });
}

console.log('\n  with debug logging:');
const total = validate({ logger: logWith(new ConsoleLogger('debug')) }, (v) => {
  let sum = 0;
  v.onEach([3, 4, 5], (n, scoped) => {
    sum += kova.int().positive().bind(n, scoped);
  });
  return sum;
});
console.log('  total:', total);
