/**
 * Codes for every error the event loop packages raise.
 */
export const ErrorCode = {
  ChannelClosed: 'CHANNEL_CLOSED',
  ChannelFull: 'CHANNEL_FULL',
  InvalidConfig: 'INVALID_CONFIG',
  InvalidTimeout: 'INVALID_TIMEOUT',
  LoopAlreadyRunning: 'LOOP_ALREADY_RUNNING',
  LoopClosed: 'LOOP_CLOSED',
  SourceAlreadyRegistered: 'SOURCE_ALREADY_REGISTERED',
  SourceNotRegistered: 'SOURCE_NOT_REGISTERED',
  TimerCapacity: 'TIMER_CAPACITY',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const errorCodes: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Checks whether a value is one of the known error codes.
 *
 * @param value - The value to check.
 * @returns Whether the value is an {@link ErrorCode}.
 */
export const isErrorCode = (value: unknown): value is ErrorCode =>
  typeof value === 'string' && errorCodes.has(value);
