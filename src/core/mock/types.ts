/**
 * Engine-level value types shared by the mock runtime.
 */

import type { AnyTypeDescriptor } from '../types/descriptors.js';

/** Arguments of one call: fixed parameters, then the variadic tail as one array */
export type Params = readonly unknown[];

/** Values of one answer, one per declared return type */
export type ReturnValues = readonly unknown[];

export type ReturnTypes = readonly AnyTypeDescriptor[];

export interface MethodInvocation {
  readonly methodName: string;
  readonly params: Params;
  /** Process-wide, monotonically increasing */
  readonly sequence: number;
}

export type AnswerCallback = (params: Params) => ReturnValues;

export type Answer =
  | { readonly kind: 'return'; readonly values: ReturnValues }
  | { readonly kind: 'throw'; readonly error: unknown }
  | { readonly kind: 'callback'; readonly callback: AnswerCallback };
