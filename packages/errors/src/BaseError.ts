import type { Json } from '@metamask/utils';

import type { ErrorCode } from './constants.ts';
import type { LoopError } from './types.ts';

/**
 * The root of every coded error in the event loop packages. Carries a
 * machine-readable `code` and optional JSON `data` alongside the message.
 */
export class BaseError extends Error implements LoopError {
  public readonly code: ErrorCode;

  public readonly data: Json | undefined;

  /**
   * Creates a new coded error.
   *
   * @param code - The error code.
   * @param message - A human-readable description.
   * @param data - Additional data about the error.
   * @param cause - The underlying error, if any.
   */
  constructor(code: ErrorCode, message: string, data?: Json, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.data = data;
  }
}
