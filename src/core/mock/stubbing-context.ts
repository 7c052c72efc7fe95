/**
 * Remembers the most recent mock call so that `when(mock.method(...))`
 * can turn it into a stubbing after the call has already happened.
 *
 * StubbingContext is a singleton. Use StubbingContext.getInstance().
 */

import type { Matcher } from '../matching/matchers.js';
import type { MethodInvocation, ReturnTypes, ReturnValues } from './types.js';
import type { GenericMock } from './GenericMock.js';

export interface TrackedInvocation {
  readonly mock: GenericMock;
  readonly invocation: MethodInvocation;
  /** Matchers drained from the registry while the call's arguments were evaluated */
  readonly matchers: readonly Matcher[];
  readonly returnTypes: ReturnTypes;
  /** What the call returned; empty until it has been answered */
  result: ReturnValues;
}

export class StubbingContext {
  private static instance: StubbingContext | null = null;

  private last: TrackedInvocation | null = null;

  private constructor() {}

  static getInstance(): StubbingContext {
    if (!StubbingContext.instance) {
      StubbingContext.instance = new StubbingContext();
    }
    return StubbingContext.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    StubbingContext.instance = null;
  }

  track(tracked: TrackedInvocation): void {
    this.last = tracked;
  }

  /** Peek at the last call without consuming it */
  peek(): TrackedInvocation | null {
    return this.last;
  }

  /** Consume the last call; it can only feed one stubbing */
  take(): TrackedInvocation | null {
    const tracked = this.last;
    this.last = null;
    return tracked;
  }
}
