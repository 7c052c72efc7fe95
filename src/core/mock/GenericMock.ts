/**
 * Mock engine
 *
 * One GenericMock backs every mock object. The mock factory forwards
 * each method call to invoke() with the method name, the packed
 * arguments and the declared return types; verifiers forward to
 * verify() or verifyEventually().
 *
 * All work runs synchronously on the calling thread except the poll
 * loop of verifyEventually(), which re-reads the log after every timer
 * tick.
 */

import { EqMatcher, formatMatchers } from '../matching/matchers.js';
import type { Matcher } from '../matching/matchers.js';
import type { InvocationCountMatcher } from '../matching/count-matchers.js';
import { checkMatcherArity, drainMatchers } from '../matching/registry.js';
import { MockError, VerificationError } from '../errors.js';
import { InvocationLog } from './invocation-log.js';
import { StubbingTable } from './stubbing-table.js';
import type { Stubbing } from './stubbing-table.js';
import { StubbingContext } from './stubbing-context.js';
import type { TrackedInvocation } from './stubbing-context.js';
import type { InOrderContext } from './in-order-context.js';
import { getGlobalFailHandler } from './fail-handler.js';
import type { FailHandler } from './fail-handler.js';
import { checkReturnValues, zeroValues } from './return-values.js';
import type { MethodInvocation, Params, ReturnTypes, ReturnValues } from './types.js';
import { getRuntimeConfig } from '../../infra/config/runtimeConfig.js';
import { createLogger, formatList } from '../../shared/utils/index.js';

const log = createLogger('GenericMock');

/** Engine frames between a fail handler and the test code that triggered it */
const CALLER_SKIP = 3;

export interface GenericMockOptions {
  /** Shown in the interaction report and debug log */
  name?: string;
  /** Takes precedence over the handler given to registerMockFailHandler() */
  failHandler?: FailHandler;
}

interface ResolvedMatchers {
  matchers: readonly Matcher[];
  /** How the verified call is rendered in failure messages */
  description: string;
}

let anonymousMockCount = 0;

export class GenericMock {
  readonly name: string;
  private readonly invocationLog = new InvocationLog();
  private readonly stubbingTable = new StubbingTable();
  private failHandler: FailHandler | null;

  constructor(options: GenericMockOptions = {}) {
    anonymousMockCount += 1;
    this.name = options.name ?? `mock${anonymousMockCount}`;
    this.failHandler = options.failHandler ?? null;
    // Loads configuration and starts the debug log on first use.
    getRuntimeConfig();
  }

  setFailHandler(handler: FailHandler | null): void {
    this.failHandler = handler;
  }

  getFailHandler(): FailHandler | null {
    return this.failHandler;
  }

  /**
   * Record a call and answer it.
   *
   * A call whose arguments were produced by matcher constructors is a
   * stubbing trigger: it is recorded and tracked for when(), but
   * answered with zero values without consulting the stubbing table.
   */
  invoke(methodName: string, params: Params, returnTypes: ReturnTypes): ReturnValues {
    const matchers = drainMatchers();
    const invocation = this.invocationLog.append(methodName, params);
    const tracked: TrackedInvocation = {
      mock: this,
      invocation,
      matchers,
      returnTypes,
      result: [],
    };
    StubbingContext.getInstance().track(tracked);

    log.debug(`${this.name}.${methodName} called`, { sequence: invocation.sequence, params: formatList(params) });

    if (matchers.length > 0) {
      tracked.result = zeroValues(returnTypes);
      return tracked.result;
    }

    const answer = this.stubbingTable.find(methodName, params)?.nextAnswer();
    if (!answer) {
      tracked.result = zeroValues(returnTypes);
      return tracked.result;
    }

    switch (answer.kind) {
      case 'throw':
        throw answer.error;
      case 'return':
        tracked.result = answer.values;
        return tracked.result;
      case 'callback': {
        const values = answer.callback(params);
        const error = checkReturnValues(methodName, values, returnTypes);
        if (error) {
          this.abort(error);
        }
        tracked.result = values;
        return tracked.result;
      }
    }
  }

  /**
   * Turn a tracked trigger call into a stubbing.
   * The trigger call itself is removed from the invocation log.
   */
  createStubbing(tracked: TrackedInvocation): Stubbing {
    const { methodName, params } = tracked.invocation;
    this.invocationLog.discard(tracked.invocation);

    const arityError = checkMatcherArity(tracked.matchers, params.length);
    if (arityError) {
      this.abort(arityError);
    }

    const matchers = tracked.matchers.length > 0
      ? tracked.matchers
      : params.map((param) => new EqMatcher(param));
    const stubbing = this.stubbingTable.put(methodName, matchers);
    log.debug(`${this.name}.${methodName} stubbed`, { matchers: formatMatchers(matchers) });
    return stubbing;
  }

  /**
   * Check the recorded calls of `methodName` against a count policy.
   *
   * Matchers registered while the verifier's arguments were evaluated
   * take precedence over `params`; without them every argument must be
   * deeply equal. With an in-order context, calls at or before the
   * context's cursor do not count, and a match earlier than the cursor
   * is an ordering failure.
   *
   * @returns the qualifying invocations, in call order
   */
  verify(
    inOrderContext: InOrderContext | null,
    countMatcher: InvocationCountMatcher,
    methodName: string,
    params: Params,
  ): MethodInvocation[] {
    const { matchers, description } = this.resolveMatchers(params);
    const matches = this.invocationLog.find(methodName, matchers);

    if (!inOrderContext) {
      if (!countMatcher.matches(matches.length)) {
        this.reportFailure(new VerificationError(
          countMismatchMessage(methodName, description, countMatcher, matches.length, ''),
        ));
      }
      log.debug(`${this.name}.${methodName} verified`, { expected: countMatcher.expectation, actual: matches.length });
      return matches;
    }

    const earliest = matches[0];
    if (earliest && earliest.sequence < inOrderContext.position) {
      this.reportFailure(new VerificationError(
        `Expected function call "${methodName}" with params ${description} before ${inOrderContext.describeLastVerified() ?? 'the previous verification'}`,
      ));
      return [];
    }

    const ordered = matches.filter((invocation) => invocation.sequence > inOrderContext.position);
    if (!countMatcher.matches(ordered.length)) {
      this.reportFailure(new VerificationError(
        countMismatchMessage(methodName, description, countMatcher, ordered.length, ''),
      ));
      return ordered;
    }

    const last = ordered[ordered.length - 1];
    if (last) {
      inOrderContext.advance(last.sequence, methodName, description);
    }
    return ordered;
  }

  /**
   * Like verify() without an in-order context, but keeps re-checking on
   * the configured poll interval until the policy holds or `timeoutMs`
   * elapses. The policy is checked once more at the deadline.
   *
   * Matchers are drained before the first await, so the verifier call
   * expression can be written as usual.
   */
  async verifyEventually(
    countMatcher: InvocationCountMatcher,
    methodName: string,
    params: Params,
    timeoutMs: number,
  ): Promise<MethodInvocation[]> {
    const { matchers, description } = this.resolveMatchers(params);
    const { pollIntervalMs } = getRuntimeConfig();
    const deadline = Date.now() + timeoutMs;

    let matches = this.invocationLog.find(methodName, matchers);
    while (!countMatcher.matches(matches.length) && Date.now() < deadline) {
      await sleep(Math.min(pollIntervalMs, deadline - Date.now()));
      matches = this.invocationLog.find(methodName, matchers);
    }

    if (!countMatcher.matches(matches.length)) {
      matches = this.invocationLog.find(methodName, matchers);
    }
    if (!countMatcher.matches(matches.length)) {
      this.reportFailure(new VerificationError(
        countMismatchMessage(methodName, description, countMatcher, matches.length, ` within ${timeoutMs}ms`),
      ));
    }
    log.debug(`${this.name}.${methodName} verified eventually`, { expected: countMatcher.expectation, actual: matches.length });
    return matches;
  }

  /**
   * Arguments of the given invocations per parameter position, each in
   * call order. A variadic tail position holds one array per call.
   */
  getInvocationParams(invocations: readonly MethodInvocation[]): unknown[][] {
    const first = invocations[0];
    if (!first) {
      return [];
    }
    return first.params.map((_, position) => invocations.map((invocation) => invocation.params[position]));
  }

  /** Every recorded call, oldest first */
  getInvocations(): readonly MethodInvocation[] {
    return this.invocationLog.all;
  }

  getStubbings(): readonly Stubbing[] {
    return this.stubbingTable.all;
  }

  /**
   * Hand a failure to the resolved fail handler.
   * Without a handler the error is thrown.
   */
  reportFailure(error: MockError): void {
    const handler = this.failHandler ?? getGlobalFailHandler();
    log.error(error.message);
    if (!handler) {
      throw error;
    }
    handler(error.message, CALLER_SKIP);
  }

  /** Report a failure the current call cannot continue from */
  abort(error: MockError): never {
    this.reportFailure(error);
    throw error;
  }

  private resolveMatchers(params: Params): ResolvedMatchers {
    const registered = drainMatchers();
    const arityError = checkMatcherArity(registered, params.length);
    if (arityError) {
      this.abort(arityError);
    }
    if (registered.length > 0) {
      return { matchers: registered, description: formatMatchers(registered) };
    }
    return {
      matchers: params.map((param) => new EqMatcher(param)),
      description: formatList(params),
    };
  }
}

function countMismatchMessage(
  methodName: string,
  paramsDescription: string,
  countMatcher: InvocationCountMatcher,
  actual: number,
  timeoutSuffix: string,
): string {
  return `Mock invocation count for method "${methodName}" with params ${paramsDescription} does not match expectation${timeoutSuffix}.\n\n\tExpected: ${countMatcher.expectation}; but got: ${actual}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
}
