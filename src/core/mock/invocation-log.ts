/**
 * Append-only record of the calls made to one mock.
 */

import type { Matcher } from '../matching/matchers.js';
import { matchAll } from '../matching/matchers.js';
import type { MethodInvocation, Params } from './types.js';
import { nextSequenceNumber } from './invocation-counter.js';

export class InvocationLog {
  private readonly entries: MethodInvocation[] = [];

  append(methodName: string, params: Params): MethodInvocation {
    const invocation: MethodInvocation = Object.freeze({
      methodName,
      params: Object.freeze([...params]),
      sequence: nextSequenceNumber(),
    });
    this.entries.push(invocation);
    return invocation;
  }

  /**
   * Drop the call made by a `when(...)` trigger expression.
   * It set up a stubbing rather than exercising the mock.
   */
  discard(invocation: MethodInvocation): void {
    const index = this.entries.lastIndexOf(invocation);
    if (index >= 0) {
      this.entries.splice(index, 1);
    }
  }

  /** Calls of `methodName` whose arguments satisfy every matcher, in call order */
  find(methodName: string, matchers: readonly Matcher[]): MethodInvocation[] {
    return this.entries.filter(
      (invocation) => invocation.methodName === methodName && matchAll(matchers, invocation.params),
    );
  }

  get all(): readonly MethodInvocation[] {
    return [...this.entries];
  }
}
