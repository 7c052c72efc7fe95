/**
 * Runtime type descriptors
 *
 * TypeScript types are erased at runtime, so the engine needs a value
 * that stands for a declared parameter or return type. A descriptor
 * carries the display name used in messages, whether `null`/`undefined`
 * may stand in for it, a type guard, and the zero value an unstubbed
 * call returns.
 */

import type { z } from 'zod/v4';
import { MockUsageError } from '../errors.js';

export interface TypeDescriptor<T> {
  /** Name shown in matcher labels and type errors */
  readonly name: string;
  /** Whether null or undefined is assignable */
  readonly nilable: boolean;
  is(value: unknown): value is T;
  zero(): T;
}

/** Descriptor of unknown element type, used where only the runtime shape matters */
export type AnyTypeDescriptor = TypeDescriptor<unknown>;

/** Extract the TypeScript type a descriptor stands for */
export type TypeOf<D> = D extends TypeDescriptor<infer T> ? T : never;

export function defineType<T>(
  name: string,
  options: {
    nilable: boolean;
    is: (value: unknown) => value is T;
    zero: () => T;
  },
): TypeDescriptor<T> {
  return {
    name,
    nilable: options.nilable,
    is: options.is,
    zero: options.zero,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const stringType = defineType('string', {
  nilable: false,
  is: (value): value is string => typeof value === 'string',
  zero: () => '',
});

const numberType = defineType('number', {
  nilable: false,
  is: (value): value is number => typeof value === 'number',
  zero: () => 0,
});

const integerType = defineType('integer', {
  nilable: false,
  is: (value): value is number => typeof value === 'number' && Number.isInteger(value),
  zero: () => 0,
});

const booleanType = defineType('boolean', {
  nilable: false,
  is: (value): value is boolean => typeof value === 'boolean',
  zero: () => false,
});

const bigintType = defineType('bigint', {
  nilable: false,
  is: (value): value is bigint => typeof value === 'bigint',
  zero: () => 0n,
});

const unknownType = defineType('unknown', {
  nilable: true,
  is: (value): value is unknown => true,
  zero: () => undefined,
});

const errorType = defineType('Error', {
  nilable: true,
  is: (value): value is Error | null => value === null || value instanceof Error,
  zero: () => null,
});

function func<F extends (...args: never[]) => unknown = (...args: never[]) => unknown>(
  name = 'Function',
): TypeDescriptor<F | null> {
  return defineType(name, {
    nilable: true,
    is: (value): value is F | null => value === null || typeof value === 'function',
    zero: () => null,
  });
}

function instanceOf<T>(ctor: abstract new (...args: never[]) => T): TypeDescriptor<T | null> {
  return defineType(ctor.name, {
    nilable: true,
    is: (value): value is T | null => value === null || value instanceof ctor,
    zero: () => null,
  });
}

function arrayOf<T>(element: TypeDescriptor<T>): TypeDescriptor<T[]> {
  return defineType(`${element.name}[]`, {
    nilable: false,
    is: (value): value is T[] => Array.isArray(value) && value.every((item) => element.is(item)),
    zero: () => [],
  });
}

function recordOf<T>(valueType: TypeDescriptor<T>): TypeDescriptor<Record<string, T>> {
  return defineType(`Record<string, ${valueType.name}>`, {
    nilable: false,
    is: (value): value is Record<string, T> =>
      isPlainObject(value) && Object.values(value).every((item) => valueType.is(item)),
    zero: () => ({}),
  });
}

function mapOf<K, V>(keyType: TypeDescriptor<K>, valueType: TypeDescriptor<V>): TypeDescriptor<Map<K, V>> {
  return defineType(`Map<${keyType.name}, ${valueType.name}>`, {
    nilable: false,
    is: (value): value is Map<K, V> => {
      if (!(value instanceof Map)) return false;
      for (const [key, item] of value) {
        if (!keyType.is(key) || !valueType.is(item)) return false;
      }
      return true;
    },
    zero: () => new Map<K, V>(),
  });
}

function nullable<T>(inner: TypeDescriptor<T>): TypeDescriptor<T | null> {
  return defineType(`${inner.name} | null`, {
    nilable: true,
    is: (value): value is T | null => value === null || inner.is(value),
    zero: () => null,
  });
}

function optional<T>(inner: TypeDescriptor<T>): TypeDescriptor<T | undefined> {
  return defineType(`${inner.name} | undefined`, {
    nilable: true,
    is: (value): value is T | undefined => value === undefined || inner.is(value),
    zero: () => undefined,
  });
}

/**
 * Wrap a zod schema as a descriptor.
 *
 * The zero value is `zero()` when given; otherwise null or undefined,
 * whichever the schema accepts. A schema that accepts neither needs an
 * explicit zero.
 */
function schema<T>(name: string, zodSchema: z.ZodType<T>, zero?: () => T): TypeDescriptor<T> {
  const nullResult = zodSchema.safeParse(null);
  const undefinedResult = zodSchema.safeParse(undefined);
  const nilable = nullResult.success || undefinedResult.success;

  let resolveZero: () => T;
  if (zero) {
    resolveZero = zero;
  } else if (nullResult.success) {
    const data = nullResult.data;
    resolveZero = () => data;
  } else if (undefinedResult.success) {
    const data = undefinedResult.data;
    resolveZero = () => data;
  } else {
    throw new MockUsageError(`Type "${name}" does not accept null or undefined, so it needs an explicit zero value`);
  }

  return defineType(name, {
    nilable,
    is: (value): value is T => zodSchema.safeParse(value).success,
    zero: resolveZero,
  });
}

/** Built-in descriptors and descriptor combinators */
export const types = {
  string: stringType,
  number: numberType,
  integer: integerType,
  boolean: booleanType,
  bigint: bigintType,
  unknown: unknownType,
  error: errorType,
  func,
  instanceOf,
  arrayOf,
  recordOf,
  mapOf,
  nullable,
  optional,
  schema,
};
