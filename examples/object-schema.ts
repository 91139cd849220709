/**
 * Example: Object schemas with nested paths and cycles
 *
 * Run with: npx tsx examples/object-schema.ts
 */

import { kova, type ObjectSchema, ValidationException } from '../src';

class Address {
  constructor(
    readonly street: string,
    readonly zip: string,
    readonly country: string
  ) {}
}

class Employee {
  manager: Employee | null = null;

  constructor(
    readonly name: string,
    readonly email: string,
    readonly address: Address,
    readonly skills: string[]
  ) {}
}

const addressSchema = kova.object<Address>((s) => {
  s.property('street', kova.string().notBlank());
  s.choose('zip', (address) =>
    address.country === 'JP' ? kova.string().matches(/\d{3}-\d{4}/) : kova.string().matches(/\d{5}/)
  );
});

// Managers are employees too, so the schema refers to itself through kova.lazy
const employeeSchema: ObjectSchema<Employee> = kova.object<Employee>((s) => {
  s.property('name', kova.string().min(2));
  s.property('email', kova.string().contains('@'));
  s.property('address', addressSchema);
  s.property('skills', kova.list<string>().notEmpty().onEach(kova.string().notBlank()));
  s.property('manager', kova.nullable<Employee>().whenNotNull(kova.lazy(() => employeeSchema)));
  s.constrain('employee.selfManaged', (c) => c.satisfies(c.input.manager !== c.input, 'cannot manage themselves'));
});

console.log('=== Object Schema ===\n');

const boss = new Employee('Grace', 'grace@example.com', new Address('1 Main St', '12345', 'US'), ['COBOL']);
const hire = new Employee('J', 'j.example.com', new Address('', '123-4567', 'US'), ['', 'TypeScript']);
hire.manager = boss;
boss.manager = hire;

const result = employeeSchema.tryValidate(hire);
if (!result.success) {
  for (const message of result.messages) {
    console.log(`  ✗ ${message.root}.${message.path.fullName || '<root>'}: ${message.text}`);
    for (const nested of message.descendants) {
      console.log(`      - ${nested.path.fullName}: ${nested.text}`);
    }
  }
}

try {
  employeeSchema.validate(boss, { failFast: true });
} catch (error) {
  if (error instanceof ValidationException) {
    console.log(`\n  ${error.message}`);
  } else {
    throw error;
  }
}
