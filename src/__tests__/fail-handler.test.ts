/**
 * Tests for routing failures through pluggable fail handlers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getGenericMockFrom, mock } from '../core/dsl/mock-factory.js';
import { when } from '../core/dsl/when.js';
import { verifyWasCalledInOrder, verifyWasCalledOnce } from '../core/dsl/verifiers.js';
import { eqString } from '../core/matching/argument-matchers.js';
import { once } from '../core/matching/count-matchers.js';
import { registerMockFailHandler } from '../core/mock/fail-handler.js';
import { InOrderContext } from '../core/mock/in-order-context.js';
import { MockUsageError } from '../core/errors.js';
import { Display, resetMockState } from './mock-test-helpers.js';

describe('fail handlers', () => {
  beforeEach(() => {
    resetMockState();
  });

  afterEach(() => {
    registerMockFailHandler(null);
  });

  it('should hand verification failures to the global handler and continue', () => {
    const handler = vi.fn();
    registerMockFailHandler(handler);
    const display = mock(Display);
    display.flash('Hello', 1);

    const verification = verifyWasCalledOnce(display).flash('Hello', 2);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(
      'Mock invocation count for method "flash" with params [Hello 2] does not match expectation.\n\n\tExpected: 1; but got: 0',
      3,
    );
    expect(verification.invocations).toEqual([]);
  });

  it('should prefer the per-mock handler over the global one', () => {
    const globalHandler = vi.fn();
    const mockHandler = vi.fn();
    registerMockFailHandler(globalHandler);
    const display = mock(Display, { failHandler: mockHandler });

    verifyWasCalledOnce(display).show('missing');

    expect(mockHandler).toHaveBeenCalledTimes(1);
    expect(globalHandler).not.toHaveBeenCalled();
  });

  it('should use a handler set on the engine after creation', () => {
    const handler = vi.fn();
    const display = mock(Display);
    getGenericMockFrom(display).setFailHandler(handler);

    expect(() => verifyWasCalledOnce(display).show('missing')).not.toThrow();
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should still throw usage errors after the handler returns', () => {
    const handler = vi.fn();
    const display = mock(Display, { failHandler: handler });

    expect(() => when(display.multipleParamsAndReturnValue(eqString('Hello'), 333))).toThrow(MockUsageError);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should report usage errors without a mock to the global handler', () => {
    const handler = vi.fn();
    registerMockFailHandler(handler);

    expect(() => when('not a mock call')).toThrow(MockUsageError);
    expect(handler).toHaveBeenCalledWith("when() requires an argument which has to be 'a method call on a mock'.", 2);
  });

  it('should let a throwing handler replace the default error', () => {
    registerMockFailHandler((message) => {
      throw new Error(`custom: ${message}`);
    });
    const display = mock(Display);

    expect(() => verifyWasCalledOnce(display).show('missing')).toThrow(
      'custom: Mock invocation count for method "show" with params [missing] does not match expectation.',
    );
  });

  it('should not advance the in-order cursor when the handler returns', () => {
    const handler = vi.fn();
    registerMockFailHandler(handler);
    const display = mock(Display);
    display.flash('first', 1);
    display.flash('second', 2);
    const inOrder = new InOrderContext();

    verifyWasCalledInOrder(display, once(), inOrder).flash('second', 2);
    const verification = verifyWasCalledInOrder(display, once(), inOrder).flash('first', 1);

    expect(handler).toHaveBeenCalledWith(
      'Expected function call "flash" with params [first 1] before function call "flash" with params [second 2]',
      3,
    );
    expect(verification.invocations).toEqual([]);
    expect(inOrder.position).toBe(2);
  });

  it('should reject objects that are not mocks', () => {
    expect(() => getGenericMockFrom({})).toThrow('Argument passed is not a mock created by mock()');
  });
});
