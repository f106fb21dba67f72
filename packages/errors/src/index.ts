export type { LoopError } from './types.ts';
export { BaseError } from './BaseError.ts';
export { ErrorCode, isErrorCode } from './constants.ts';
export {
  ChannelClosedError,
  ChannelFullError,
  InvalidConfigError,
  InvalidTimeoutError,
  LoopAlreadyRunningError,
  LoopClosedError,
  SourceAlreadyRegisteredError,
  SourceNotRegisteredError,
  TimerCapacityError,
} from './errors.ts';
export { isCodedError } from './utils/isCodedError.ts';
export { isLoopError } from './utils/isLoopError.ts';
export { toError } from './utils/toError.ts';
