/**
 * Verification DSL
 *
 *   verifyWasCalledOnce(display).flash('Hello', 333);
 *   verifyWasCalled(display, atLeast(2)).show(anyString());
 *   verifyWasCalledInOrder(display, once(), inOrder).flash('Hello', 111);
 *   await verifyWasCalledEventually(display, once(), 500).show('done');
 *
 * Each verifier method returns an OngoingVerification for capturing the
 * arguments of the calls it matched.
 */

import { MockUsageError } from '../errors.js';
import { times } from '../matching/count-matchers.js';
import type { InvocationCountMatcher } from '../matching/count-matchers.js';
import type { GenericMock } from '../mock/GenericMock.js';
import type { InOrderContext } from '../mock/in-order-context.js';
import type { MethodInvocation, Params } from '../mock/types.js';
import { getGenericMockFrom, SIGNATURE } from './mock-factory.js';
import type { Mock } from './mock-factory.js';
import { packParams, recordedParamTypes } from './signature.js';
import type { CapturedArgs, MethodFn, MethodSignature, MockSignature } from './signature.js';

/** Per parameter position, the arguments of every matched call */
export type AllCapturedArgs<C> = { [K in keyof C]: C[K][] };

export type Verifier<S extends MockSignature> = {
  readonly [K in keyof S]: MethodFn<S[K], OngoingVerification<CapturedArgs<S[K]>>>;
};

export type EventualVerifier<S extends MockSignature> = {
  readonly [K in keyof S]: MethodFn<S[K], Promise<OngoingVerification<CapturedArgs<S[K]>>>>;
};

/**
 * Recorded arguments have one entry per declared parameter position.
 * Their values already passed the matchers of the verification, so they
 * are returned as recorded, even where a descriptor is narrower than its
 * static type.
 */
function hasPositions<T>(values: readonly unknown[], count: number): values is readonly unknown[] & T {
  return values.length === count;
}

export class OngoingVerification<C> {
  private readonly positionCount: number;

  constructor(
    private readonly engine: GenericMock,
    private readonly methodName: string,
    signature: MethodSignature,
    /** Matched calls, oldest first */
    readonly invocations: readonly MethodInvocation[],
  ) {
    this.positionCount = recordedParamTypes(signature).length;
  }

  /** Arguments of the last matched call */
  getCapturedArguments(): C {
    const last = this.capturedPositions().map((values) => values[values.length - 1]);
    if (!hasPositions<C>(last, this.positionCount)) {
      return this.engine.abort(this.arityMismatch());
    }
    return last;
  }

  /** Arguments of every matched call, grouped by parameter position */
  getAllCapturedArguments(): AllCapturedArgs<C> {
    const all = this.capturedPositions();
    if (!hasPositions<AllCapturedArgs<C>>(all, this.positionCount)) {
      return this.engine.abort(this.arityMismatch());
    }
    return all;
  }

  private capturedPositions(): unknown[][] {
    if (this.invocations.length === 0) {
      this.engine.abort(new MockUsageError(`No invocations captured for method "${this.methodName}"`));
    }
    return this.engine.getInvocationParams(this.invocations);
  }

  private arityMismatch(): MockUsageError {
    return new MockUsageError(
      `Captured arguments of method "${this.methodName}" do not match its declared parameter count`,
    );
  }
}

type VerifyCall = (engine: GenericMock, methodName: string, params: Params, signature: MethodSignature) => unknown;

function createVerifier<S extends MockSignature, V>(mockObject: Mock<S>, verifyCall: VerifyCall): V {
  const engine = getGenericMockFrom(mockObject);
  const signature: MockSignature = mockObject[SIGNATURE];
  const entries: [string, unknown][] = Object.entries(signature).map(([methodName, methodSignature]) => [
    methodName,
    (...args: unknown[]) => verifyCall(engine, methodName, packParams(methodSignature, args), methodSignature),
  ]);
  return Object.fromEntries(entries) as V;
}

export function verifyWasCalled<S extends MockSignature>(
  mockObject: Mock<S>,
  countMatcher: InvocationCountMatcher = times(1),
): Verifier<S> {
  return createVerifier<S, Verifier<S>>(mockObject, (engine, methodName, params, signature) =>
    new OngoingVerification(engine, methodName, signature, engine.verify(null, countMatcher, methodName, params)));
}

export function verifyWasCalledOnce<S extends MockSignature>(mockObject: Mock<S>): Verifier<S> {
  return verifyWasCalled(mockObject, times(1));
}

/**
 * Verify calls that happened after the last call verified through the
 * same `inOrderContext`, on this mock or any other.
 */
export function verifyWasCalledInOrder<S extends MockSignature>(
  mockObject: Mock<S>,
  countMatcher: InvocationCountMatcher,
  inOrderContext: InOrderContext,
): Verifier<S> {
  return createVerifier<S, Verifier<S>>(mockObject, (engine, methodName, params, signature) =>
    new OngoingVerification(engine, methodName, signature, engine.verify(inOrderContext, countMatcher, methodName, params)));
}

/**
 * Verify calls made by asynchronous code. The returned promise settles
 * once the count matches, or after `timeoutMs` with a failure.
 */
export function verifyWasCalledEventually<S extends MockSignature>(
  mockObject: Mock<S>,
  countMatcher: InvocationCountMatcher,
  timeoutMs: number,
): EventualVerifier<S> {
  return createVerifier<S, EventualVerifier<S>>(mockObject, async (engine, methodName, params, signature) => {
    const invocations = await engine.verifyEventually(countMatcher, methodName, params, timeoutMs);
    return new OngoingVerification(engine, methodName, signature, invocations);
  });
}
