/**
 * Invocation count policies used by verification.
 */

import { MockUsageError } from '../errors.js';
import { failWithoutMock } from '../mock/fail-handler.js';

export interface InvocationCountMatcher {
  /** Expected count as shown in failure messages ("1", "at least 2", ...) */
  readonly expectation: string;
  matches(count: number): boolean;
}

function assertCount(name: string, n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    failWithoutMock(new MockUsageError(`${name}() expects a non-negative integer, got ${n}`));
  }
}

export function times(n: number): InvocationCountMatcher {
  assertCount('times', n);
  return {
    expectation: String(n),
    matches: (count) => count === n,
  };
}

export function atLeast(n: number): InvocationCountMatcher {
  assertCount('atLeast', n);
  return {
    expectation: `at least ${n}`,
    matches: (count) => count >= n,
  };
}

export function atMost(n: number): InvocationCountMatcher {
  assertCount('atMost', n);
  return {
    expectation: `at most ${n}`,
    matches: (count) => count <= n,
  };
}

export function never(): InvocationCountMatcher {
  return times(0);
}

export function once(): InvocationCountMatcher {
  return times(1);
}

export function twice(): InvocationCountMatcher {
  return times(2);
}
