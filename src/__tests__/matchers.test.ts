/**
 * Tests for argument matchers and matcher constructors
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AnyMatcher,
  ArgThatMatcher,
  EqMatcher,
  NotEqMatcher,
  formatMatchers,
  matchAll,
  sameMatchers,
} from '../core/matching/matchers.js';
import {
  anyNumber,
  anyString,
  anyStringArray,
  argThat,
  eq,
  eqString,
  notEq,
} from '../core/matching/argument-matchers.js';
import { MatcherRegistry, drainMatchers } from '../core/matching/registry.js';
import { types } from '../core/types/descriptors.js';

describe('EqMatcher', () => {
  it('should compare deeply and strictly', () => {
    const matcher = new EqMatcher({ a: [1, 2] });

    expect(matcher.matches({ a: [1, 2] })).toBe(true);
    expect(matcher.matches({ a: [1, 3] })).toBe(false);
    expect(new EqMatcher(1).matches('1')).toBe(false);
  });

  it('should render the value in its label', () => {
    expect(new EqMatcher('Hello').label).toBe('Eq(Hello)');
    expect(new EqMatcher(['a', 1]).label).toBe('Eq([a 1])');
    expect(String(new EqMatcher(3))).toBe('Eq(3)');
  });

  it('should be the same as an Eq matcher with an equal value', () => {
    expect(new EqMatcher([1]).sameAs(new EqMatcher([1]))).toBe(true);
    expect(new EqMatcher([1]).sameAs(new EqMatcher([2]))).toBe(false);
    expect(new EqMatcher(1).sameAs(new NotEqMatcher(1))).toBe(false);
  });
});

describe('NotEqMatcher', () => {
  it('should match every other value', () => {
    const matcher = new NotEqMatcher('x');

    expect(matcher.matches('y')).toBe(true);
    expect(matcher.matches('x')).toBe(false);
    expect(matcher.label).toBe('NotEq(x)');
  });
});

describe('AnyMatcher', () => {
  it('should match values of the type', () => {
    const matcher = new AnyMatcher(types.string);

    expect(matcher.matches('text')).toBe(true);
    expect(matcher.matches(1)).toBe(false);
    expect(matcher.label).toBe('Any(string)');
  });

  it('should be the same only for the same descriptor', () => {
    expect(new AnyMatcher(types.string).sameAs(new AnyMatcher(types.string))).toBe(true);
    expect(new AnyMatcher(types.string).sameAs(new AnyMatcher(types.number))).toBe(false);
  });

  it('should be the same for descriptors built separately by a combinator', () => {
    expect(new AnyMatcher(types.arrayOf(types.number)).sameAs(new AnyMatcher(types.arrayOf(types.number)))).toBe(true);
    expect(new AnyMatcher(types.nullable(types.string)).sameAs(new AnyMatcher(types.nullable(types.string)))).toBe(true);
    expect(new AnyMatcher(types.arrayOf(types.number)).sameAs(new AnyMatcher(types.arrayOf(types.string)))).toBe(false);
  });
});

describe('ArgThatMatcher', () => {
  const greaterThanTen = (value: number): boolean => value > 10;

  it('should apply the predicate to values of the type', () => {
    const matcher = new ArgThatMatcher(types.number, greaterThanTen, 'greater than 10');

    expect(matcher.matches(11)).toBe(true);
    expect(matcher.matches(10)).toBe(false);
    expect(matcher.matches('11')).toBe(false);
    expect(matcher.label).toBe('ArgThat(greater than 10)');
  });

  it('should use a generic label without description', () => {
    expect(new ArgThatMatcher(types.number, greaterThanTen).label).toBe('ArgThat(predicate)');
  });

  it('should be the same only for the same predicate', () => {
    const matcher = new ArgThatMatcher(types.number, greaterThanTen);

    expect(matcher.sameAs(new ArgThatMatcher(types.number, greaterThanTen))).toBe(true);
    expect(matcher.sameAs(new ArgThatMatcher(types.number, (value) => value > 10))).toBe(false);
  });
});

describe('matcher lists', () => {
  it('should require one matching matcher per argument', () => {
    const matchers = [new EqMatcher('a'), new AnyMatcher(types.number)];

    expect(matchAll(matchers, ['a', 1])).toBe(true);
    expect(matchAll(matchers, ['a', 'b'])).toBe(false);
    expect(matchAll(matchers, ['a'])).toBe(false);
    expect(matchAll([], [])).toBe(true);
  });

  it('should compare lists pairwise', () => {
    expect(sameMatchers([new EqMatcher('a')], [new EqMatcher('a')])).toBe(true);
    expect(sameMatchers([new EqMatcher('a')], [new EqMatcher('a'), new EqMatcher('b')])).toBe(false);
  });

  it('should format labels in brackets', () => {
    expect(formatMatchers([new EqMatcher('Invalid'), new EqMatcher(-1)])).toBe('[Eq(Invalid) Eq(-1)]');
  });
});

describe('matcher constructors', () => {
  beforeEach(() => {
    MatcherRegistry.resetInstance();
  });

  it('should return placeholders and register matchers', () => {
    expect(anyString()).toBe('');
    expect(anyNumber()).toBe(0);
    expect(eqString('Hello')).toBe('Hello');
    expect(anyStringArray()).toEqual([]);

    expect(drainMatchers().map((matcher) => matcher.label)).toEqual([
      'Any(string)',
      'Any(number)',
      'Eq(Hello)',
      'Any(string[])',
    ]);
  });

  it('should register NotEq and ArgThat matchers', () => {
    expect(notEq(5)).toBe(5);
    expect(argThat(types.string, (value) => value.startsWith('a'), 'starts with a')).toBe('');
    expect(eq({ id: 1 })).toEqual({ id: 1 });

    expect(drainMatchers().map((matcher) => matcher.label)).toEqual([
      'NotEq(5)',
      'ArgThat(starts with a)',
      'Eq({"id":1})',
    ]);
  });

  it('should reuse the descriptor of array shortcuts', () => {
    anyStringArray();
    anyStringArray();
    const [first, second] = drainMatchers();

    expect(first && second && first.sameAs(second)).toBe(true);
  });
});
