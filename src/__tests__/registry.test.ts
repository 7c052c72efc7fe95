/**
 * Tests for the pending-matcher registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EqMatcher } from '../core/matching/matchers.js';
import { MatcherRegistry, checkMatcherArity, registerMatcher } from '../core/matching/registry.js';
import { MockUsageError } from '../core/errors.js';

describe('MatcherRegistry', () => {
  beforeEach(() => {
    MatcherRegistry.resetInstance();
  });

  it('should return the same instance until reset', () => {
    const registry = MatcherRegistry.getInstance();

    expect(MatcherRegistry.getInstance()).toBe(registry);

    MatcherRegistry.resetInstance();

    expect(MatcherRegistry.getInstance()).not.toBe(registry);
  });

  it('should clear the pending list on drain', () => {
    registerMatcher(new EqMatcher('a'));
    registerMatcher(new EqMatcher('b'));
    const registry = MatcherRegistry.getInstance();

    expect(registry.size).toBe(2);
    expect(registry.drain().map((matcher) => matcher.label)).toEqual(['Eq(a)', 'Eq(b)']);
    expect(registry.size).toBe(0);
    expect(registry.drain()).toEqual([]);
  });

  it('should accept an empty list or one matcher per parameter', () => {
    const registry = MatcherRegistry.getInstance();

    expect(registry.drainAndValidate(2)).toEqual([]);

    registerMatcher(new EqMatcher('a'));
    registerMatcher(new EqMatcher('b'));

    expect(registry.drainAndValidate(2)).toHaveLength(2);
  });

  it('should reject any other number of matchers and still drain them', () => {
    registerMatcher(new EqMatcher('a'));
    const registry = MatcherRegistry.getInstance();

    expect(() => registry.drainAndValidate(3)).toThrow(MockUsageError);
    expect(registry.size).toBe(0);
  });
});

describe('checkMatcherArity', () => {
  it('should build the mixed matchers message', () => {
    const error = checkMatcherArity([new EqMatcher('a')], 2);

    expect(error?.message).toBe(
      'Invalid use of matchers!\n\n 2 matchers expected, 1 recorded.\n\n' +
      'This error may occur if matchers are combined with raw values:\n' +
      '    //incorrect:\n' +
      '    someFunc(anyNumber(), "raw String")\n' +
      'When using matchers, all arguments have to be provided by matchers.\n' +
      'For example:\n' +
      '    //correct:\n' +
      '    someFunc(anyNumber(), eqString("String by matcher"))',
    );
  });

  it('should return undefined for a valid count', () => {
    expect(checkMatcherArity([], 3)).toBeUndefined();
    expect(checkMatcherArity([new EqMatcher('a')], 1)).toBeUndefined();
  });
});
