/**
 * Argument matcher constructors.
 *
 * Each function registers a matcher and returns a placeholder of the
 * parameter's type, so it can be written in the argument position of a
 * mock call:
 *
 *   when(display.flash(anyString(), eqNumber(333))).thenReturn(...);
 *   verifyWasCalledOnce(display).flash(eqString('Hello'), anyNumber());
 *
 * Either every argument of a call is a matcher or none is.
 */

import { AnyMatcher, ArgThatMatcher, EqMatcher, NotEqMatcher } from './matchers.js';
import { registerMatcher } from './registry.js';
import { types } from '../types/descriptors.js';
import type { TypeDescriptor } from '../types/descriptors.js';

const stringArrayType = types.arrayOf(types.string);
const numberArrayType = types.arrayOf(types.number);

/** Any value assignable to `type` */
export function any<T>(type: TypeDescriptor<T>): T {
  registerMatcher(new AnyMatcher(type));
  return type.zero();
}

export function eq<T>(value: T): T {
  registerMatcher(new EqMatcher(value));
  return value;
}

export function notEq<T>(value: T): T {
  registerMatcher(new NotEqMatcher(value));
  return value;
}

/** Values of `type` for which `predicate` holds */
export function argThat<T>(type: TypeDescriptor<T>, predicate: (value: T) => boolean, description?: string): T {
  registerMatcher(new ArgThatMatcher(type, predicate, description));
  return type.zero();
}

export const anyString = (): string => any(types.string);
export const anyNumber = (): number => any(types.number);
export const anyInteger = (): number => any(types.integer);
export const anyBoolean = (): boolean => any(types.boolean);
export const anyBigint = (): bigint => any(types.bigint);
export const anyError = (): Error | null => any(types.error);
export const anything = (): unknown => any(types.unknown);
export const anyStringArray = (): string[] => any(stringArrayType);
export const anyNumberArray = (): number[] => any(numberArrayType);

export const eqString = (value: string): string => eq(value);
export const eqNumber = (value: number): number => eq(value);
export const eqBoolean = (value: boolean): boolean => eq(value);

export const notEqString = (value: string): string => notEq(value);
export const notEqNumber = (value: number): number => notEq(value);
