import { describe, it, expect } from 'vitest';

import { BaseError } from './BaseError.ts';
import { ErrorCode } from './constants.ts';

describe('BaseError', () => {
  it('carries code, message and data', () => {
    const error = new BaseError(ErrorCode.ChannelFull, 'full', { capacity: 1 });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('BaseError');
    expect(error.code).toBe('CHANNEL_FULL');
    expect(error.message).toBe('full');
    expect(error.data).toStrictEqual({ capacity: 1 });
  });

  it('omits the cause when none is given', () => {
    const error = new BaseError(ErrorCode.ChannelClosed, 'closed');
    expect(error.data).toBeUndefined();
    expect('cause' in error).toBe(false);
  });

  it('keeps a non-error cause as given', () => {
    const error = new BaseError(
      ErrorCode.InvalidConfig,
      'bad',
      undefined,
      'upstream',
    );
    expect(error.cause).toBe('upstream');
  });
});
