import { describe, it, expect } from 'vitest';

import { isCodedError } from './isCodedError.ts';
import { BaseError } from '../BaseError.ts';
import { ErrorCode } from '../constants.ts';
import { ChannelClosedError } from '../errors.ts';

class MockCodedError extends Error {
  code: string | number;

  constructor(message: string, code: string | number) {
    super(message);
    this.code = code;
  }
}

describe('isCodedError', () => {
  it.each([
    [new MockCodedError('An error occurred', 'ERROR_CODE'), true],
    [new MockCodedError('An error occurred', 12345), true],
    [new BaseError(ErrorCode.ChannelFull, 'Base Error'), true],
    [new ChannelClosedError(), true],
    [new Error('An error without a code'), false],
    [{ message: 'Not an error', code: 'SOME_CODE' }, false],
    [Object.assign(new Error('Invalid code type'), { code: {} }), false],
  ])('returns the expected result for %o', (inputError, expectedResult) => {
    expect(isCodedError(inputError)).toBe(expectedResult);
  });
});
