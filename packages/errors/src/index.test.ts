import { describe, it, expect } from 'vitest';

import * as indexModule from './index.ts';

describe('index', () => {
  it('has the expected exports', () => {
    expect(Object.keys(indexModule).sort()).toStrictEqual([
      'BaseError',
      'ChannelClosedError',
      'ChannelFullError',
      'ErrorCode',
      'InvalidConfigError',
      'InvalidTimeoutError',
      'LoopAlreadyRunningError',
      'LoopClosedError',
      'SourceAlreadyRegisteredError',
      'SourceNotRegisteredError',
      'TimerCapacityError',
      'isCodedError',
      'isErrorCode',
      'isLoopError',
      'toError',
    ]);
  });
});
