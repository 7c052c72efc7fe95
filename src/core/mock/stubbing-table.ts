/**
 * Per-mock table of programmed answers.
 *
 * Lookup scans from the most recently added stubbing, so a later
 * stubbing wins over an earlier, overlapping one. Adding a stubbing
 * whose matcher list is identical to an existing one replaces it
 * (last-write-wins) instead of stacking both.
 */

import type { Matcher } from '../matching/matchers.js';
import { matchAll, sameMatchers } from '../matching/matchers.js';
import type { Answer, Params } from './types.js';

export class Stubbing {
  private readonly answers: Answer[] = [];
  private nextIndex = 0;

  constructor(
    readonly methodName: string,
    readonly matchers: readonly Matcher[],
  ) {}

  addAnswer(answer: Answer): void {
    this.answers.push(answer);
  }

  /**
   * Next queued answer. The last one repeats once the queue is exhausted.
   * Undefined while no answer has been queued yet.
   */
  nextAnswer(): Answer | undefined {
    const answer = this.answers[this.nextIndex];
    if (this.nextIndex < this.answers.length - 1) {
      this.nextIndex += 1;
    }
    return answer;
  }

  get answerCount(): number {
    return this.answers.length;
  }
}

export class StubbingTable {
  private readonly stubbings: Stubbing[] = [];

  /** Create a stubbing, replacing one with the same method and matcher list */
  put(methodName: string, matchers: readonly Matcher[]): Stubbing {
    const existing = this.stubbings.findIndex(
      (stubbing) => stubbing.methodName === methodName && sameMatchers(stubbing.matchers, matchers),
    );
    if (existing >= 0) {
      this.stubbings.splice(existing, 1);
    }
    const stubbing = new Stubbing(methodName, matchers);
    this.stubbings.push(stubbing);
    return stubbing;
  }

  find(methodName: string, params: Params): Stubbing | undefined {
    for (let i = this.stubbings.length - 1; i >= 0; i--) {
      const stubbing = this.stubbings[i];
      if (stubbing && stubbing.methodName === methodName && matchAll(stubbing.matchers, params)) {
        return stubbing;
      }
    }
    return undefined;
  }

  get all(): readonly Stubbing[] {
    return [...this.stubbings];
  }
}
