/**
 * Pending-matcher side channel.
 *
 * Argument matcher constructors such as anyString() run while the
 * arguments of a mock call are evaluated. They cannot change the
 * argument's type, so they return a placeholder and push the real
 * matcher here. The next mock call, stubbing or verification drains the
 * list.
 *
 * Intended for the single-threaded "arrange" and "assert" phases of a
 * test only. MatcherRegistry is a singleton. Use
 * MatcherRegistry.getInstance() or the module-level functions.
 */

import { MockUsageError } from '../errors.js';
import type { Matcher } from './matchers.js';

export class MatcherRegistry {
  private static instance: MatcherRegistry | null = null;

  private pending: Matcher[] = [];

  private constructor() {}

  static getInstance(): MatcherRegistry {
    if (!MatcherRegistry.instance) {
      MatcherRegistry.instance = new MatcherRegistry();
    }
    return MatcherRegistry.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    MatcherRegistry.instance = null;
  }

  register(matcher: Matcher): void {
    this.pending.push(matcher);
  }

  /** Return and clear the pending matchers */
  drain(): Matcher[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  /**
   * Drain and require either no matchers (raw values were used) or
   * exactly one per parameter position.
   */
  drainAndValidate(expectedArity: number): Matcher[] {
    const drained = this.drain();
    const error = checkMatcherArity(drained, expectedArity);
    if (error) {
      throw error;
    }
    return drained;
  }

  get size(): number {
    return this.pending.length;
  }
}

export function checkMatcherArity(matchers: readonly Matcher[], expectedArity: number): MockUsageError | undefined {
  if (matchers.length === 0 || matchers.length === expectedArity) {
    return undefined;
  }
  return new MockUsageError(
    'Invalid use of matchers!\n\n' +
    ` ${expectedArity} matchers expected, ${matchers.length} recorded.\n\n` +
    'This error may occur if matchers are combined with raw values:\n' +
    '    //incorrect:\n' +
    '    someFunc(anyNumber(), "raw String")\n' +
    'When using matchers, all arguments have to be provided by matchers.\n' +
    'For example:\n' +
    '    //correct:\n' +
    '    someFunc(anyNumber(), eqString("String by matcher"))',
  );
}

export function registerMatcher(matcher: Matcher): void {
  MatcherRegistry.getInstance().register(matcher);
}

export function drainMatchers(): Matcher[] {
  return MatcherRegistry.getInstance().drain();
}
