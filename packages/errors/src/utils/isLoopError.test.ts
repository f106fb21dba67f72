import { describe, it, expect } from 'vitest';

import { isLoopError } from './isLoopError.ts';
import { TimerCapacityError } from '../errors.ts';

describe('isLoopError', () => {
  it('recognizes errors raised by the loop packages', () => {
    expect(isLoopError(new TimerCapacityError(1))).toBe(true);
  });

  it('recognizes a structurally equivalent error from another copy', () => {
    const foreign = Object.assign(new Error('full'), {
      code: 'CHANNEL_FULL',
      data: { capacity: 1 },
    });
    expect(isLoopError(foreign)).toBe(true);
  });

  it('rejects coded errors with unknown codes', () => {
    const foreign = Object.assign(new Error('nope'), {
      code: 'ENOENT',
      data: undefined,
    });
    expect(isLoopError(foreign)).toBe(false);
  });

  it('rejects plain errors and non-errors', () => {
    expect(isLoopError(new Error('plain'))).toBe(false);
    expect(isLoopError('CHANNEL_FULL')).toBe(false);
  });
});
