import type {
  EventSet,
  EventSource,
  Handler,
  Reactor,
  ReadinessListener,
  Token,
} from '@loopcore/core';

/**
 * An event source that reports whatever the test tells it to.
 */
export class ManualSource implements EventSource {
  #emit: ReadinessListener | undefined;

  attachCount = 0;

  get attached(): boolean {
    return this.#emit !== undefined;
  }

  attach(emit: ReadinessListener): void {
    this.attachCount += 1;
    this.#emit = emit;
  }

  detach(): void {
    this.#emit = undefined;
  }

  fire(events: EventSet): void {
    this.#emit?.(events);
  }
}

export type HandlerCall =
  | ['ready', Token, EventSet]
  | ['timeout', Token]
  | ['notify', string]
  | ['tick'];

/**
 * Makes a handler that records every call it receives.
 *
 * @param onNotify - Called for every message, after it is recorded.
 * @returns The handler and its call log.
 */
export const makeRecordingHandler = (
  onNotify?: (reactor: Reactor<string>, message: string) => void,
): { handler: Handler<string>; calls: HandlerCall[] } => {
  const calls: HandlerCall[] = [];
  const handler: Handler<string> = {
    ready: (_reactor, token, events) => {
      calls.push(['ready', token, events]);
    },
    timeout: (_reactor, token) => {
      calls.push(['timeout', token]);
    },
    notify: (reactor, message) => {
      calls.push(['notify', message]);
      onNotify?.(reactor, message);
    },
    tick: () => {
      calls.push(['tick']);
    },
  };
  return { handler, calls };
};
