import { describe, it, expect } from 'vitest';
import { kova } from '../../src/core/validator/validators';
import type { ObjectSchema } from '../../src/core/validator/ObjectSchema';
import { located, texts } from '../helpers/results';

class Street {
  constructor(readonly name: string) {}
}

class Address {
  constructor(
    readonly street: Street,
    readonly zip: string
  ) {}
}

class User {
  constructor(
    readonly name: string,
    readonly age: number,
    readonly address: Address
  ) {}
}

class Pair {
  constructor(
    readonly left: Street,
    readonly right: Street
  ) {}
}

class Node {
  next: Node | null = null;

  constructor(readonly value: number) {}
}

interface Shipping {
  country: string;
  zip: string;
}

const streetSchema = kova.object<Street>((s) => {
  s.property('name', kova.string().notBlank());
});

const addressSchema = kova.object<Address>((s) => {
  s.property('street', streetSchema);
  s.property('zip', kova.string().matches(/\d{5}/));
});

const userSchema = kova.object<User>((s) => {
  s.property('name', kova.string().min(2));
  s.property('age', kova.int().min(0));
  s.property('address', addressSchema);
});

const invalidUser = new User('A', -1, new Address(new Street(''), '12'));

describe('ObjectSchema', () => {
  describe('properties', () => {
    it('should return the input when every rule passes', () => {
      const user = new User('Ann', 30, new Address(new Street('Main'), '12345'));
      const result = userSchema.tryValidate(user);

      expect(result.success).toBe(true);
      expect(result.success && result.value).toBe(user);
    });

    it('should collect path-qualified messages in declaration order', () => {
      expect(located(userSchema.tryValidate(invalidUser))).toEqual([
        ['name', 'must be at least 2 characters'],
        ['age', 'must be greater than or equal to 0'],
        ['address.street.name', 'must not be blank'],
        ['address.zip', 'must match pattern: \\d{5}'],
      ]);
    });

    it('should label every message with the outermost type', () => {
      const result = userSchema.tryValidate(invalidUser);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.messages.map((m) => m.root)).toEqual(['User', 'User', 'User', 'User']);
      }
    });

    it('should use an explicit root label', () => {
      const named = kova.object<User>((s) => s.property('name', kova.string().min(2)), { name: 'Member' });
      const result = named.tryValidate(invalidUser);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.messages[0].root).toBe('Member');
      }
    });

    it('should stop at the first failing property under fail-fast', () => {
      expect(located(userSchema.tryValidate(invalidUser, { failFast: true }))).toEqual([
        ['name', 'must be at least 2 characters'],
      ]);
    });

    it('should index list elements below a property', () => {
      const tags = kova.object<{ list: string[] }>((s) => {
        s.property('list', kova.list<string>().onEach(kova.string().notBlank()));
      });
      const result = tags.tryValidate({ list: ['a', ''] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.messages[0].path.fullName).toBe('list');
        expect(result.messages[0].root).toBe('Object');
        expect(result.messages[0].descendants.map((m) => m.path.fullName)).toEqual(['list[1]<iterable element>']);
      }
    });
  });

  describe('dynamic and computed rules', () => {
    const shipping = kova.object<Shipping>((s) => {
      s.choose('zip', (address) =>
        address.country === 'JP' ? kova.string().matches(/\d{3}-\d{4}/) : kova.string().matches(/\d{5}/)
      );
    });

    it('should pick the validator from the whole object', () => {
      expect(shipping.tryValidate({ country: 'US', zip: '12345' }).success).toBe(true);
      expect(located(shipping.tryValidate({ country: 'JP', zip: '12345' }))).toEqual([
        ['zip', 'must match pattern: \\d{3}-\\d{4}'],
      ]);
    });

    it('should validate computed values under a named segment', () => {
      const short = kova.object<User>((s) => {
        s.named('nameLength', (user) => user.name.length, kova.int().max(3));
      });

      expect(located(short.tryValidate(new User('Alice', 1, invalidUser.address)))).toEqual([
        ['nameLength', 'must be less than or equal to 3'],
      ]);
    });

    it('should run object-wide constraints at the object path', () => {
      const adult = userSchema.extend((s) => {
        s.constrain('user.adult', (c) => c.satisfies(c.input.age >= 18, 'must be an adult'));
      });
      const result = adult.tryValidate(new User('Ann', 12, new Address(new Street('Main'), '12345')));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.messages).toHaveLength(1);
        expect(result.messages[0].path.fullName).toBe('');
        expect(result.messages[0].root).toBe('User');
        expect(result.messages[0].text).toBe('must be an adult');
      }
    });
  });

  describe('rule replacement', () => {
    it('should let a later rule replace an earlier one in place', () => {
      const schema = kova.object<User>((s) => {
        s.property('name', kova.string().min(10));
        s.property('age', kova.int().max(0));
        s.property('name', kova.string().max(1));
      });

      expect(schema.keys).toEqual(['name', 'age']);
      expect(texts(schema.tryValidate(new User('Ann', 5, invalidUser.address)))).toEqual([
        'must be at most 1 characters',
        'must be less than or equal to 0',
      ]);
    });

    it('should replace a property rule without touching the original schema', () => {
      const lenient = userSchema.replace('name', kova.string().max(3));

      expect(lenient.keys).toEqual(['name', 'age', 'address']);
      expect(texts(lenient.tryValidate(new User('Alice', 1, new Address(new Street('Main'), '12345'))))).toEqual([
        'must be at most 3 characters',
      ]);
      expect(userSchema.tryValidate(new User('Alice', 1, new Address(new Street('Main'), '12345'))).success).toBe(true);
    });

    it('should list only property and named keys', () => {
      const schema = userSchema.extend((s) => {
        s.constrain('user.any', () => true);
        s.named('initial', (user) => user.name.charAt(0), kova.string().uppercase());
      });

      expect(schema.keys).toEqual(['name', 'age', 'address', 'initial']);
    });
  });

  describe('cycles', () => {
    const nodeSchema: ObjectSchema<Node> = kova.object<Node>((s) => {
      s.property('value', kova.int().max(100));
      s.property('next', kova.nullable<Node>().whenNotNull(kova.lazy(() => nodeSchema)));
    });

    it('should terminate on a two-node cycle', () => {
      const a = new Node(200);
      const b = new Node(50);
      a.next = b;
      b.next = a;

      const result = nodeSchema.tryValidate(a);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.messages).toHaveLength(1);
        expect(result.messages[0].path.fullName).toBe('value');
        expect(result.messages[0].text).toBe('must be less than or equal to 100');
        expect(result.messages[0].root).toBe('Node');
      }
    });

    it('should report failures deeper in the cycle', () => {
      const a = new Node(1);
      const b = new Node(500);
      a.next = b;
      b.next = a;

      expect(located(nodeSchema.tryValidate(a))).toEqual([['next.value', 'must be less than or equal to 100']]);
    });

    it('should terminate on a self reference', () => {
      const a = new Node(1);
      a.next = a;

      expect(nodeSchema.tryValidate(a)).toEqual({ success: true, value: a });
    });

    it('should validate a shared node once per path', () => {
      const shared = new Street('');
      const pairSchema = kova.object<Pair>((s) => {
        s.property('left', streetSchema);
        s.property('right', streetSchema);
      });

      expect(located(pairSchema.tryValidate(new Pair(shared, shared)))).toEqual([
        ['left.name', 'must not be blank'],
        ['right.name', 'must not be blank'],
      ]);
    });
  });
});
