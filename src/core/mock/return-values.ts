/**
 * Return value coercion against declared return types.
 */

import { ReturnTypeError } from '../errors.js';
import { describeValueType } from '../../shared/utils/format.js';
import type { ReturnTypes, ReturnValues } from './types.js';

export function zeroValues(returnTypes: ReturnTypes): ReturnValues {
  return returnTypes.map((type) => type.zero());
}

/**
 * Check answer values against the declared return types.
 * Returns the error to report, or undefined when every value fits.
 */
export function checkReturnValues(
  methodName: string,
  values: ReturnValues,
  returnTypes: ReturnTypes,
): ReturnTypeError | undefined {
  if (values.length !== returnTypes.length) {
    return new ReturnTypeError(
      `Method "${methodName}" declares ${returnTypes.length} return value(s), but ${values.length} were stubbed`,
    );
  }

  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    const type = returnTypes[i];
    if (!type || type.is(value)) continue;

    if (value === null || value === undefined) {
      return new ReturnTypeError(`Return value '${String(value)}' not assignable to return type ${type.name}`);
    }
    return new ReturnTypeError(
      `Return value of type ${describeValueType(value)} not assignable to return type ${type.name}`,
    );
  }
  return undefined;
}
