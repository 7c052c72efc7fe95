/**
 * Argument matchers
 *
 * A matcher decides whether one argument of a recorded call fits a
 * pattern. Matchers are immutable; `sameAs` lets the stubbing table
 * recognise a repeated `when(...)` with an identical pattern.
 */

import { isDeepStrictEqual } from 'node:util';
import type { AnyTypeDescriptor, TypeDescriptor } from '../types/descriptors.js';
import { formatValue } from '../../shared/utils/format.js';

type DescriptorIdentity = Pick<AnyTypeDescriptor, 'name' | 'nilable'>;

export interface Matcher {
  readonly label: string;
  matches(value: unknown): boolean;
  sameAs(other: Matcher): boolean;
}

/**
 * Combinators such as types.arrayOf() build a new descriptor per call,
 * so descriptors are compared by name and nilability.
 */
function sameType(a: DescriptorIdentity, b: DescriptorIdentity): boolean {
  return a === b || (a.name === b.name && a.nilable === b.nilable);
}

/** Deep, type-strict equality against a fixed value */
export class EqMatcher implements Matcher {
  readonly label: string;

  constructor(readonly value: unknown) {
    this.label = `Eq(${formatValue(value)})`;
  }

  matches(value: unknown): boolean {
    return isDeepStrictEqual(this.value, value);
  }

  sameAs(other: Matcher): boolean {
    return other instanceof EqMatcher && isDeepStrictEqual(this.value, other.value);
  }

  toString(): string {
    return this.label;
  }
}

export class NotEqMatcher implements Matcher {
  readonly label: string;

  constructor(readonly value: unknown) {
    this.label = `NotEq(${formatValue(value)})`;
  }

  matches(value: unknown): boolean {
    return !isDeepStrictEqual(this.value, value);
  }

  sameAs(other: Matcher): boolean {
    return other instanceof NotEqMatcher && isDeepStrictEqual(this.value, other.value);
  }

  toString(): string {
    return this.label;
  }
}

/**
 * Matches any value assignable to the declared type.
 * null/undefined match only when the type is nilable.
 */
export class AnyMatcher<T> implements Matcher {
  readonly label: string;

  constructor(readonly type: TypeDescriptor<T>) {
    this.label = `Any(${type.name})`;
  }

  matches(value: unknown): boolean {
    return this.type.is(value);
  }

  sameAs(other: Matcher): boolean {
    return other instanceof AnyMatcher && sameType(other.type, this.type);
  }

  toString(): string {
    return this.label;
  }
}

/** Caller-supplied predicate */
export class ArgThatMatcher<T> implements Matcher {
  readonly label: string;

  constructor(
    readonly type: TypeDescriptor<T>,
    readonly predicate: (value: T) => boolean,
    description = 'predicate',
  ) {
    this.label = `ArgThat(${description})`;
  }

  matches(value: unknown): boolean {
    return this.type.is(value) && this.predicate(value);
  }

  sameAs(other: Matcher): boolean {
    return other instanceof ArgThatMatcher && other.predicate === this.predicate && sameType(other.type, this.type);
  }

  toString(): string {
    return this.label;
  }
}

/** True when both lists have the same length and pairwise identical matchers */
export function sameMatchers(a: readonly Matcher[], b: readonly Matcher[]): boolean {
  return a.length === b.length && a.every((matcher, i) => {
    const other = b[i];
    return other !== undefined && matcher.sameAs(other);
  });
}

export function matchAll(matchers: readonly Matcher[], params: readonly unknown[]): boolean {
  return matchers.length === params.length && matchers.every((matcher, i) => matcher.matches(params[i]));
}

export function formatMatchers(matchers: readonly Matcher[]): string {
  return `[${matchers.map((matcher) => matcher.label).join(' ')}]`;
}
