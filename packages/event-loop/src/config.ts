import { InvalidConfigError } from '@loopcore/errors';
import {
  create,
  defaulted,
  integer,
  min,
  object,
  StructError,
} from '@metamask/superstruct';
import type { Infer } from '@metamask/superstruct';

export const DEFAULT_CONFIG = {
  notifyCapacity: 4_096,
  messagesPerTick: 256,
  timerCapacity: 65_536,
} as const;

const positiveInteger = (fallback: number) =>
  defaulted(min(integer(), 1), fallback);

export const EventLoopConfigStruct = object({
  /** How many messages the notify channel holds before `send` fails. */
  notifyCapacity: positiveInteger(DEFAULT_CONFIG.notifyCapacity),
  /** How many channel messages one loop iteration delivers at most. */
  messagesPerTick: positiveInteger(DEFAULT_CONFIG.messagesPerTick),
  /** How many timers may be pending at once. */
  timerCapacity: positiveInteger(DEFAULT_CONFIG.timerCapacity),
});

export type EventLoopConfig = Infer<typeof EventLoopConfigStruct>;

/**
 * Fills in defaults and validates an event loop configuration.
 *
 * @param config - The caller's configuration.
 * @returns The complete configuration.
 */
export function parseEventLoopConfig(
  config: Partial<EventLoopConfig> = {},
): EventLoopConfig {
  try {
    return create(config, EventLoopConfigStruct);
  } catch (problem) {
    if (problem instanceof StructError) {
      throw new InvalidConfigError(
        problem.path.join('.'),
        problem.message,
        problem,
      );
    }
    throw problem;
  }
}
