/**
 * mockwright - mock objects for TypeScript tests
 *
 * This module exports the public API.
 */

// Type descriptors
export { types, defineType } from './core/types/descriptors.js';
export type { TypeDescriptor, AnyTypeDescriptor, TypeOf } from './core/types/descriptors.js';

// Errors
export { MockError, MockUsageError, ReturnTypeError, VerificationError } from './core/errors.js';

// Matchers
export * from './core/matching/argument-matchers.js';
export { times, atLeast, atMost, never, once, twice } from './core/matching/count-matchers.js';
export type { InvocationCountMatcher } from './core/matching/count-matchers.js';
export { EqMatcher, NotEqMatcher, AnyMatcher, ArgThatMatcher } from './core/matching/matchers.js';
export type { Matcher } from './core/matching/matchers.js';
export { MatcherRegistry, registerMatcher } from './core/matching/registry.js';

// Engine
export { GenericMock } from './core/mock/GenericMock.js';
export type { GenericMockOptions } from './core/mock/GenericMock.js';
export { InOrderContext } from './core/mock/in-order-context.js';
export { registerMockFailHandler } from './core/mock/fail-handler.js';
export type { FailHandler } from './core/mock/fail-handler.js';
export type { MethodInvocation, Params } from './core/mock/types.js';

// DSL
export { method, variadicMethod } from './core/dsl/signature.js';
export type {
  MethodSignature,
  MockSignature,
  MethodArgs,
  MethodResult,
  CapturedArgs,
  ParamValues,
} from './core/dsl/signature.js';
export { mock, getGenericMockFrom } from './core/dsl/mock-factory.js';
export type { Mock } from './core/dsl/mock-factory.js';
export { when, OngoingStubbing } from './core/dsl/when.js';
export {
  verifyWasCalled,
  verifyWasCalledOnce,
  verifyWasCalledInOrder,
  verifyWasCalledEventually,
  OngoingVerification,
} from './core/dsl/verifiers.js';
export type { Verifier, EventualVerifier, AllCapturedArgs } from './core/dsl/verifiers.js';

// Configuration
export { configure, getRuntimeConfig, resetRuntimeConfig, loadConfig } from './infra/config/index.js';
export type { MockwrightConfig, ConfigOverrides } from './core/models/index.js';

// Reporting
export { formatInteractions, printInteractions } from './shared/ui/index.js';
export type { InteractionReportOptions } from './shared/ui/index.js';
