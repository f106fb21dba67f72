import { EventSet } from '@loopcore/core';
import type { EventSource, ReadinessListener } from '@loopcore/core';
import type { Duplex } from 'node:stream';

const streamEvents: [string, EventSet][] = [
  ['readable', EventSet.Readable],
  ['drain', EventSet.Writable],
  ['error', EventSet.Error],
  ['end', EventSet.Hup],
  ['close', EventSet.Hup],
];

/**
 * Adapts a Node.js duplex stream (e.g. a socket) to an {@link EventSource}:
 * `'readable'` reports readable, `'drain'` writable, `'error'` error, and
 * `'end'` or `'close'` hang-up. Data is not consumed; the owning state reads
 * it with `stream.read()`.
 *
 * @param stream - The stream.
 * @returns The event source.
 */
export function makeStreamSource(stream: Duplex): EventSource {
  let listeners: [string, () => void][] = [];
  return {
    attach(emit: ReadinessListener) {
      listeners = streamEvents.map(([name, events]) => [
        name,
        () => emit(events),
      ]);
      for (const [name, listener] of listeners) {
        stream.on(name, listener);
      }
    },
    detach() {
      for (const [name, listener] of listeners) {
        stream.off(name, listener);
      }
      listeners = [];
    },
  };
}
