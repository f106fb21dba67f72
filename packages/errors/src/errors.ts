import { BaseError } from './BaseError.ts';
import { ErrorCode } from './constants.ts';

export class InvalidConfigError extends BaseError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(
      ErrorCode.InvalidConfig,
      'Invalid configuration.',
      { path, reason },
      cause,
    );
  }
}

export class ChannelFullError extends BaseError {
  constructor(capacity: number) {
    super(ErrorCode.ChannelFull, 'Notify channel is full.', { capacity });
  }
}

export class ChannelClosedError extends BaseError {
  constructor() {
    super(ErrorCode.ChannelClosed, 'Notify channel is closed.');
  }
}

export class LoopAlreadyRunningError extends BaseError {
  constructor() {
    super(ErrorCode.LoopAlreadyRunning, 'Event loop is already running.');
  }
}

export class LoopClosedError extends BaseError {
  constructor() {
    super(ErrorCode.LoopClosed, 'Event loop is closed.');
  }
}

export class SourceAlreadyRegisteredError extends BaseError {
  constructor(token: number) {
    super(
      ErrorCode.SourceAlreadyRegistered,
      'Event source is already registered.',
      { token },
    );
  }
}

export class SourceNotRegisteredError extends BaseError {
  constructor() {
    super(ErrorCode.SourceNotRegistered, 'Event source is not registered.');
  }
}

export class TimerCapacityError extends BaseError {
  constructor(capacity: number) {
    super(ErrorCode.TimerCapacity, 'Timer capacity exceeded.', { capacity });
  }
}

export class InvalidTimeoutError extends BaseError {
  constructor(delayMs: number) {
    super(
      ErrorCode.InvalidTimeout,
      'Timeout delay must be between 0 and 2147483647 milliseconds.',
      { delayMs: String(delayMs) },
    );
  }
}
