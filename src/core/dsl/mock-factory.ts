/**
 * Runtime mock factory
 *
 * Builds a mock object with one forwarding function per declared
 * method. Every function packs its arguments and hands them to a single
 * GenericMock, so the engine never special-cases a method.
 */

import { MockUsageError } from '../errors.js';
import { GenericMock } from '../mock/GenericMock.js';
import type { GenericMockOptions } from '../mock/GenericMock.js';
import { failWithoutMock } from '../mock/fail-handler.js';
import { packParams, returnTypesOf } from './signature.js';
import type { MethodFn, MethodSignature, MockSignature } from './signature.js';

/** Key under which a mock object keeps its signature */
export const SIGNATURE: unique symbol = Symbol('mockwright.signature');

export type Mock<S extends MockSignature> = {
  readonly [K in keyof S]: MethodFn<S[K]>;
} & {
  readonly [SIGNATURE]: S;
};

const engines = new WeakMap<object, GenericMock>();

function createForwarder(engine: GenericMock, methodName: string, signature: MethodSignature) {
  const returnTypes = returnTypesOf(signature);
  return (...args: unknown[]): unknown => {
    const [result] = engine.invoke(methodName, packParams(signature, args), returnTypes);
    return result;
  };
}

/**
 * Create a mock for `signature`.
 *
 * ```ts
 * const display = mock({ show: method([types.string], types.boolean) }, { name: 'display' });
 * display.show('Hello'); // false until stubbed
 * ```
 */
export function mock<S extends MockSignature>(signature: S, options: GenericMockOptions = {}): Mock<S> {
  const engine = new GenericMock(options);
  const methods: MockSignature = signature;
  const entries: [PropertyKey, unknown][] = Object.entries(methods).map(
    ([methodName, methodSignature]) => [methodName, createForwarder(engine, methodName, methodSignature)],
  );
  entries.push([SIGNATURE, signature]);

  const mockObject = Object.freeze(Object.fromEntries(entries)) as Mock<S>;
  engines.set(mockObject, engine);
  return mockObject;
}

/** The engine behind a mock object */
export function getGenericMockFrom(mockObject: object): GenericMock {
  const engine = engines.get(mockObject);
  if (!engine) {
    failWithoutMock(new MockUsageError('Argument passed is not a mock created by mock()'));
  }
  return engine;
}
