/**
 * Tests for runtime type descriptors
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod/v4';
import { defineType, types } from '../core/types/descriptors.js';
import { MockUsageError } from '../core/errors.js';

class Point {
  constructor(readonly x: number, readonly y: number) {}
}

describe('types', () => {
  describe('zero values', () => {
    it('should return the zero value of each primitive', () => {
      expect(types.string.zero()).toBe('');
      expect(types.number.zero()).toBe(0);
      expect(types.integer.zero()).toBe(0);
      expect(types.boolean.zero()).toBe(false);
      expect(types.bigint.zero()).toBe(0n);
    });

    it('should return null or undefined for nilable types', () => {
      expect(types.unknown.zero()).toBeUndefined();
      expect(types.error.zero()).toBeNull();
      expect(types.func().zero()).toBeNull();
      expect(types.instanceOf(Point).zero()).toBeNull();
      expect(types.nullable(types.string).zero()).toBeNull();
      expect(types.optional(types.string).zero()).toBeUndefined();
    });

    it('should return fresh empty containers', () => {
      const arrayType = types.arrayOf(types.string);

      expect(arrayType.zero()).toEqual([]);
      expect(arrayType.zero()).not.toBe(arrayType.zero());
      expect(types.recordOf(types.number).zero()).toEqual({});
      expect(types.mapOf(types.string, types.number).zero()).toEqual(new Map());
    });
  });

  describe('names', () => {
    it('should describe composite types', () => {
      expect(types.arrayOf(types.string).name).toBe('string[]');
      expect(types.recordOf(types.number).name).toBe('Record<string, number>');
      expect(types.mapOf(types.string, types.boolean).name).toBe('Map<string, boolean>');
      expect(types.nullable(types.string).name).toBe('string | null');
      expect(types.optional(types.number).name).toBe('number | undefined');
      expect(types.instanceOf(Point).name).toBe('Point');
      expect(types.func('Callback').name).toBe('Callback');
    });
  });

  describe('nilability', () => {
    it('should accept null only for nilable types', () => {
      expect(types.string.is(null)).toBe(false);
      expect(types.number.is(undefined)).toBe(false);
      expect(types.arrayOf(types.string).is(null)).toBe(false);
      expect(types.error.is(null)).toBe(true);
      expect(types.unknown.is(undefined)).toBe(true);
      expect(types.instanceOf(Point).is(null)).toBe(true);
      expect(types.nullable(types.arrayOf(types.string)).is(null)).toBe(true);
    });

    it('should report nilable consistently with is()', () => {
      expect(types.string.nilable).toBe(false);
      expect(types.error.nilable).toBe(true);
      expect(types.optional(types.string).nilable).toBe(true);
    });
  });

  describe('type guards', () => {
    it('should distinguish integers from other numbers', () => {
      expect(types.integer.is(3)).toBe(true);
      expect(types.integer.is(3.5)).toBe(false);
      expect(types.number.is(3.5)).toBe(true);
    });

    it('should check every element of a container', () => {
      expect(types.arrayOf(types.number).is([1, 2])).toBe(true);
      expect(types.arrayOf(types.number).is([1, '2'])).toBe(false);
      expect(types.recordOf(types.string).is({ a: 'x' })).toBe(true);
      expect(types.recordOf(types.string).is({ a: 1 })).toBe(false);
      expect(types.recordOf(types.string).is(new Point(1, 2))).toBe(false);
      expect(types.mapOf(types.string, types.number).is(new Map([['a', 1]]))).toBe(true);
      expect(types.mapOf(types.string, types.number).is(new Map([['a', 'b']]))).toBe(false);
    });

    it('should match class instances', () => {
      expect(types.instanceOf(Point).is(new Point(1, 2))).toBe(true);
      expect(types.instanceOf(Point).is({ x: 1, y: 2 })).toBe(false);
    });

    it('should match Error subclasses', () => {
      expect(types.error.is(new TypeError('bad'))).toBe(true);
      expect(types.error.is('bad')).toBe(false);
    });
  });

  describe('schema', () => {
    const UserSchema = z.object({ name: z.string() });

    it('should validate values with the schema', () => {
      const userType = types.schema('User', UserSchema, () => ({ name: '' }));

      expect(userType.is({ name: 'test-user' })).toBe(true);
      expect(userType.is({ name: 1 })).toBe(false);
      expect(userType.zero()).toEqual({ name: '' });
      expect(userType.nilable).toBe(false);
    });

    it('should use null as zero for a nullable schema', () => {
      const userType = types.schema('User | null', UserSchema.nullable());

      expect(userType.nilable).toBe(true);
      expect(userType.zero()).toBeNull();
    });

    it('should use undefined as zero for an optional schema', () => {
      const userType = types.schema('User | undefined', UserSchema.optional());

      expect(userType.zero()).toBeUndefined();
    });

    it('should require a zero value for a non-nilable schema', () => {
      expect(() => types.schema('User', UserSchema)).toThrow(
        new MockUsageError('Type "User" does not accept null or undefined, so it needs an explicit zero value'),
      );
    });
  });

  describe('defineType', () => {
    it('should build a descriptor from its parts', () => {
      const evenType = defineType('even', {
        nilable: false,
        is: (value): value is number => typeof value === 'number' && value % 2 === 0,
        zero: () => 0,
      });

      expect(evenType.name).toBe('even');
      expect(evenType.is(4)).toBe(true);
      expect(evenType.is(3)).toBe(false);
    });
  });
});
