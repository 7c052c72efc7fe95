/**
 * Method signatures
 *
 * A mock is described by an object mapping method names to signatures:
 *
 *   const Display = {
 *     flash: method([types.string, types.number]),
 *     show: method([types.string], types.boolean),
 *     log: variadicMethod([types.string], types.string),
 *   };
 *
 * The descriptors drive the runtime behavior (zero values, return type
 * checks); the type parameters carry the matching TypeScript types to
 * the mock, verifier and capture APIs.
 */

import { types } from '../types/descriptors.js';
import type { AnyTypeDescriptor, TypeDescriptor, TypeOf } from '../types/descriptors.js';

/** TypeScript values of a tuple of descriptors */
export type ParamValues<P> = P extends [infer Head, ...infer Tail]
  ? [TypeOf<Head>, ...ParamValues<Tail>]
  : [];

/**
 * @typeParam A - argument list of the mocked method
 * @typeParam R - return type, `void` without a declared return type
 * @typeParam C - arguments as recorded, the variadic tail packed into one array
 */
export interface MethodSignature<A = unknown, R = unknown, C = A> {
  readonly paramTypes: readonly AnyTypeDescriptor[];
  readonly variadicType: AnyTypeDescriptor | null;
  readonly returnType: AnyTypeDescriptor | null;
  /** Type-level only; never set at runtime */
  readonly phantom?: { args: A; result: R; captured: C };
}

export type MockSignature = Record<string, MethodSignature>;

export type MethodArgs<M> = M extends MethodSignature<infer A, unknown, unknown> ? A : never;
export type MethodResult<M> = M extends MethodSignature<unknown, infer R, unknown> ? R : never;
export type CapturedArgs<M> = M extends MethodSignature<unknown, unknown, infer C> ? C : never;

/** Function type of one mocked method */
export type MethodFn<M, R = MethodResult<M>> = MethodArgs<M> extends infer A
  ? A extends unknown[] ? (...args: A) => R : never
  : never;

export function method<P extends AnyTypeDescriptor[]>(
  paramTypes: [...P],
): MethodSignature<ParamValues<P>, void>;
export function method<P extends AnyTypeDescriptor[], R>(
  paramTypes: [...P],
  returnType: TypeDescriptor<R>,
): MethodSignature<ParamValues<P>, R>;
export function method(
  paramTypes: AnyTypeDescriptor[],
  returnType?: AnyTypeDescriptor,
): MethodSignature {
  return {
    paramTypes: [...paramTypes],
    variadicType: null,
    returnType: returnType ?? null,
  };
}

/**
 * A method whose trailing arguments are collected into one array.
 *
 * The tail counts as a single parameter for matching. Give its matcher
 * with a spread, e.g. `mock.log(anyString(), ...anyStringArray())`.
 */
export function variadicMethod<P extends AnyTypeDescriptor[], V>(
  paramTypes: [...P],
  variadicType: TypeDescriptor<V>,
): MethodSignature<[...ParamValues<P>, ...V[]], void, [...ParamValues<P>, V[]]>;
export function variadicMethod<P extends AnyTypeDescriptor[], V, R>(
  paramTypes: [...P],
  variadicType: TypeDescriptor<V>,
  returnType: TypeDescriptor<R>,
): MethodSignature<[...ParamValues<P>, ...V[]], R, [...ParamValues<P>, V[]]>;
export function variadicMethod(
  paramTypes: AnyTypeDescriptor[],
  variadicType: AnyTypeDescriptor,
  returnType?: AnyTypeDescriptor,
): MethodSignature {
  return {
    paramTypes: [...paramTypes],
    variadicType,
    returnType: returnType ?? null,
  };
}

/**
 * Pack call arguments the way the engine records them: one entry per
 * fixed parameter, then the variadic tail as one array.
 */
export function packParams(signature: MethodSignature, args: readonly unknown[]): unknown[] {
  const params = signature.paramTypes.map((_, i) => args[i]);
  if (signature.variadicType) {
    params.push(args.slice(signature.paramTypes.length));
  }
  return params;
}

/** Descriptor of each recorded parameter position */
export function recordedParamTypes(signature: MethodSignature): AnyTypeDescriptor[] {
  const positions = [...signature.paramTypes];
  if (signature.variadicType) {
    positions.push(types.arrayOf(signature.variadicType));
  }
  return positions;
}

export function returnTypesOf(signature: MethodSignature): AnyTypeDescriptor[] {
  return signature.returnType ? [signature.returnType] : [];
}
