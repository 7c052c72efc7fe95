/**
 * Stubbing DSL
 *
 *   when(display.show('Hello')).thenReturn(true);
 *   when(display.show(anyString())).thenReturn(false).thenThrow(new Error('gone'));
 *   when(() => display.flash('Hello', 333)).thenThrow(new Error('boom'));
 *
 * Methods without a return type are stubbed through a trigger function
 * that takes no arguments and returns nothing.
 */

import { MockUsageError } from '../errors.js';
import { failWithoutMock } from '../mock/fail-handler.js';
import type { GenericMock } from '../mock/GenericMock.js';
import { checkReturnValues } from '../mock/return-values.js';
import { StubbingContext } from '../mock/stubbing-context.js';
import type { TrackedInvocation } from '../mock/stubbing-context.js';
import type { Stubbing } from '../mock/stubbing-table.js';
import type { Params, ReturnTypes } from '../mock/types.js';

const MISSING_CALL_MESSAGE = "when() requires an argument which has to be 'a method call on a mock'.";
const INVALID_TRIGGER_MESSAGE =
  "When using 'when' with a function that does not return a value, it expects a function with no arguments and no return value.";

/** Queue of answers for one stubbing; every method returns the same handle */
export class OngoingStubbing<R> {
  private readonly mock: GenericMock;
  private readonly methodName: string;
  private readonly returnTypes: ReturnTypes;

  constructor(
    tracked: TrackedInvocation,
    private readonly stubbing: Stubbing,
  ) {
    this.mock = tracked.mock;
    this.methodName = tracked.invocation.methodName;
    this.returnTypes = tracked.returnTypes;
  }

  /** Answer with `value`; omit it for methods without a return type */
  thenReturn(value: R): this {
    const values = this.returnTypes.length === 0 ? [] : [value];
    const error = checkReturnValues(this.methodName, values, this.returnTypes);
    if (error) {
      this.mock.abort(error);
    }
    this.stubbing.addAnswer({ kind: 'return', values });
    return this;
  }

  /** Throw `error` from the mocked call, unchanged */
  thenThrow(error: unknown): this {
    this.stubbing.addAnswer({ kind: 'throw', error });
    return this;
  }

  /**
   * Compute the answer from the call's arguments. The variadic tail, if
   * any, is the last entry of `params`.
   */
  thenAnswer(callback: (params: Params) => R): this {
    const returnCount = this.returnTypes.length;
    this.stubbing.addAnswer({
      kind: 'callback',
      callback: (params) => {
        const value = callback(params);
        return returnCount === 0 ? [] : [value];
      },
    });
    return this;
  }
}

export function when(trigger: () => void): OngoingStubbing<void>;
export function when<R>(value: R): OngoingStubbing<R>;
export function when(value: unknown): OngoingStubbing<unknown> {
  const context = StubbingContext.getInstance();

  if (isFunction(value) && !isResultOfLastCall(value, context.peek())) {
    return stubThroughTrigger(value);
  }

  const tracked = context.take();
  if (!tracked) {
    failWithoutMock(new MockUsageError(MISSING_CALL_MESSAGE));
  }
  return new OngoingStubbing(tracked, tracked.mock.createStubbing(tracked));
}

function isFunction(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

/** A mocked method may itself return a function; that is not a trigger */
function isResultOfLastCall(value: unknown, tracked: TrackedInvocation | null): boolean {
  return tracked !== null && tracked.result.length > 0 && tracked.result[0] === value;
}

function stubThroughTrigger(trigger: () => unknown): OngoingStubbing<unknown> {
  if (trigger.length !== 0) {
    failWithoutMock(new MockUsageError(INVALID_TRIGGER_MESSAGE));
  }

  const context = StubbingContext.getInstance();
  context.take();
  const returned = trigger();
  const tracked = context.take();

  if (returned !== undefined) {
    const error = new MockUsageError(INVALID_TRIGGER_MESSAGE);
    if (tracked) {
      tracked.mock.abort(error);
    }
    failWithoutMock(error);
  }
  if (!tracked) {
    failWithoutMock(new MockUsageError(MISSING_CALL_MESSAGE));
  }
  return new OngoingStubbing(tracked, tracked.mock.createStubbing(tracked));
}
