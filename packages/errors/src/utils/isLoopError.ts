import { isErrorCode } from '../constants.ts';
import type { LoopError } from '../types.ts';
import { isCodedError } from './isCodedError.ts';

/**
 * Checks if an error is one raised by the event loop packages. Matches on the
 * code rather than `instanceof`, so errors from a duplicated copy of this
 * package are recognized too.
 *
 * @param error - The error to check.
 * @returns Whether the error carries a known {@link ErrorCode}.
 */
export function isLoopError(error: unknown): error is LoopError {
  return isCodedError(error) && isErrorCode(error.code) && 'data' in error;
}
