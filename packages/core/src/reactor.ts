import type { EventSet, Interest } from './event-set.ts';
import type { Token } from './identifiers.ts';

/**
 * A pending timer, as returned by {@link Reactor.timeout}.
 */
export type TimeoutHandle = {
  readonly id: number;
  readonly token: Token;
};

/**
 * The sending half of a reactor's notify channel. Messages sent here are
 * delivered to the handler's `notify` on the loop, in send order.
 */
export type Sender<Message> = {
  send(message: Message): void;
};

export type ReadinessListener = (events: EventSet) => void;

/**
 * Anything that can report readiness to a reactor. The reactor calls
 * `attach` on registration and `detach` on deregistration.
 */
export type EventSource = {
  attach(emit: ReadinessListener): void;
  detach(): void;
};

/**
 * The polling mechanism that drives a {@link Handler}.
 */
export type Reactor<Message> = {
  register(source: EventSource, token: Token, interest: Interest): void;
  reregister(source: EventSource, token: Token, interest: Interest): void;
  deregister(source: EventSource): void;
  timeout(token: Token, delayMs: number): TimeoutHandle;
  clearTimeout(handle: TimeoutHandle): boolean;
  channel(): Sender<Message>;
  shutdown(): void;
  isRunning(): boolean;
};

/**
 * What a reactor delivers its events to.
 */
export type Handler<Message> = {
  ready(reactor: Reactor<Message>, token: Token, events: EventSet): void;
  timeout(reactor: Reactor<Message>, token: Token): void;
  notify(reactor: Reactor<Message>, message: Message): void;
  tick?(reactor: Reactor<Message>): void;
};
