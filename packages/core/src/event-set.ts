/**
 * Readiness flags. An event set is a bitwise union of these; an interest is
 * the event set a registration subscribes to.
 */
export const EventSet = {
  None: 0,
  Readable: 0b0001,
  Writable: 0b0010,
  Error: 0b0100,
  Hup: 0b1000,
  All: 0b1111,
} as const;

export type EventSet = number;

export type Interest = EventSet;

const flagNames: [number, string][] = [
  [EventSet.Readable, 'readable'],
  [EventSet.Writable, 'writable'],
  [EventSet.Error, 'error'],
  [EventSet.Hup, 'hup'],
];

/**
 * Combines readiness flags.
 *
 * @param flags - The flags to combine.
 * @returns The union of the flags.
 */
export const eventSet = (...flags: EventSet[]): EventSet =>
  flags.reduce((events, flag) => events | flag, EventSet.None);

export const isReadable = (events: EventSet): boolean =>
  (events & EventSet.Readable) !== 0;

export const isWritable = (events: EventSet): boolean =>
  (events & EventSet.Writable) !== 0;

export const isError = (events: EventSet): boolean =>
  (events & EventSet.Error) !== 0;

export const isHup = (events: EventSet): boolean =>
  (events & EventSet.Hup) !== 0;

/**
 * Renders an event set for log messages, e.g. `"readable | hup"`.
 *
 * @param events - The event set.
 * @returns The names of the set flags, or `"none"`.
 */
export const describeEvents = (events: EventSet): string => {
  const names = flagNames
    .filter(([flag]) => (events & flag) !== 0)
    .map(([, name]) => name);
  return names.length > 0 ? names.join(' | ') : 'none';
};
