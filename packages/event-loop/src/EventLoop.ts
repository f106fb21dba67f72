import type {
  EventSource,
  Handler,
  Interest,
  Reactor,
  Sender,
  TimeoutHandle,
  Token,
  EventSet,
} from '@loopcore/core';
import {
  InvalidTimeoutError,
  LoopAlreadyRunningError,
  LoopClosedError,
  SourceAlreadyRegisteredError,
  SourceNotRegisteredError,
  TimerCapacityError,
  toError,
} from '@loopcore/errors';
import type { Logger } from '@metamask/logger';
import { createDeferredPromise } from '@metamask/utils';

import { NotifyChannel } from './channel.ts';
import { parseEventLoopConfig } from './config.ts';
import type { EventLoopConfig } from './config.ts';

// setTimeout fires almost at once for larger delays.
const MAX_TIMEOUT_DELAY = 0x7fff_ffff;

type PendingEvent =
  | { kind: 'ready'; token: Token; events: EventSet }
  | { kind: 'timeout'; token: Token };

type Registration = {
  token: Token;
  interest: Interest;
};

/**
 * An in-process reactor. Event sources report readiness, timers fire and
 * other code sends messages; the loop queues all of it and delivers it to one
 * {@link Handler}, in arrival order, from a single async loop.
 *
 * Each iteration delivers the readiness and timer events queued when it
 * began, then up to `messagesPerTick` channel messages, then calls the
 * handler's `tick`. Between iterations the loop yields to the host so that
 * sources and timers get to run; with nothing pending it sleeps until woken.
 */
export class EventLoop<Message> implements Reactor<Message> {
  readonly #config: EventLoopConfig;

  readonly #events: PendingEvent[] = [];

  readonly #registrations: Map<EventSource, Registration> = new Map();

  readonly #timers: Map<number, ReturnType<typeof setTimeout>> = new Map();

  readonly #channel: NotifyChannel<Message>;

  readonly #sender: Sender<Message>;

  /** The logger, if any. */
  readonly #logger: Logger | undefined;

  #nextTimerId = 0;

  #running = false;

  #closed = false;

  /** Wakes a sleeping loop; set only while the loop sleeps. */
  #wakeUp: (() => void) | undefined;

  /**
   * @param config - Capacities; see {@link EventLoopConfig}.
   * @param logger - The logger. If not provided, no logging is done.
   */
  constructor(config: Partial<EventLoopConfig> = {}, logger?: Logger) {
    this.#config = parseEventLoopConfig(config);
    this.#logger = logger?.subLogger('event-loop');
    this.#channel = new NotifyChannel(this.#config.notifyCapacity, () =>
      this.#wake(),
    );
    this.#sender = this.#channel.sender();
  }

  get config(): Readonly<EventLoopConfig> {
    return this.#config;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Runs the loop until {@link shutdown} or {@link close} is called. If the
   * handler throws, the loop stops and the returned promise rejects with
   * the error; the loop may then be run again.
   *
   * @param handler - Receives every event and message.
   */
  async run(handler: Handler<Message>): Promise<void> {
    if (this.#closed) {
      throw new LoopClosedError();
    }
    if (this.#running) {
      throw new LoopAlreadyRunningError();
    }
    this.#running = true;
    this.#logger?.debug('Event loop started');
    try {
      while (this.#running) {
        this.runOnce(handler);
        if (!this.#running) {
          break;
        }
        if (this.#hasPendingWork()) {
          await new Promise<void>((resolve) => setImmediate(resolve));
        } else {
          await this.#sleep();
        }
      }
    } catch (problem) {
      const error = toError(problem);
      this.#logger?.error('Event loop stopped by a failing handler:', error);
      throw error;
    } finally {
      this.#running = false;
      this.#wakeUp = undefined;
    }
    this.#logger?.debug('Event loop stopped');
  }

  /**
   * Runs one iteration of the loop.
   *
   * @param handler - Receives the events and messages.
   */
  runOnce(handler: Handler<Message>): void {
    let remaining = this.#events.length;
    while (remaining > 0) {
      remaining -= 1;
      const event = this.#events.shift();
      if (event?.kind === 'ready') {
        handler.ready(this, event.token, event.events);
      } else if (event?.kind === 'timeout') {
        handler.timeout(this, event.token);
      }
    }
    this.#channel.deliver(this.#config.messagesPerTick, (message) =>
      handler.notify(this, message),
    );
    handler.tick?.(this);
  }

  register(source: EventSource, token: Token, interest: Interest): void {
    this.#assertOpen();
    const existing = this.#registrations.get(source);
    if (existing) {
      throw new SourceAlreadyRegisteredError(existing.token);
    }
    this.#registrations.set(source, { token, interest });
    try {
      source.attach((events) => this.#onReadiness(source, events));
    } catch (error) {
      this.#registrations.delete(source);
      throw error;
    }
  }

  reregister(source: EventSource, token: Token, interest: Interest): void {
    const registration = this.#registrations.get(source);
    if (!registration) {
      throw new SourceNotRegisteredError();
    }
    registration.token = token;
    registration.interest = interest;
  }

  /**
   * Detaches a source. Events it reported before this call are still
   * delivered, under the token it had when it reported them.
   *
   * @param source - The source to detach.
   */
  deregister(source: EventSource): void {
    if (!this.#registrations.delete(source)) {
      throw new SourceNotRegisteredError();
    }
    source.detach();
  }

  /**
   * Schedules `handler.timeout(token)` after `delayMs` milliseconds, at most
   * 2147483647 (about 24.8 days).
   *
   * @param token - The token to deliver.
   * @param delayMs - The delay.
   * @returns A handle for {@link clearTimeout}.
   */
  timeout(token: Token, delayMs: number): TimeoutHandle {
    this.#assertOpen();
    if (!(delayMs >= 0 && delayMs <= MAX_TIMEOUT_DELAY)) {
      throw new InvalidTimeoutError(delayMs);
    }
    if (this.#timers.size >= this.#config.timerCapacity) {
      throw new TimerCapacityError(this.#config.timerCapacity);
    }
    const handle: TimeoutHandle = { id: this.#nextTimerId, token };
    this.#nextTimerId += 1;
    const timer = setTimeout(() => {
      this.#timers.delete(handle.id);
      this.#enqueue({ kind: 'timeout', token });
    }, delayMs);
    this.#timers.set(handle.id, timer);
    return handle;
  }

  /**
   * @param handle - The handle {@link timeout} returned.
   * @returns Whether a pending timer was cancelled.
   */
  clearTimeout(handle: TimeoutHandle): boolean {
    const timer = this.#timers.get(handle.id);
    if (timer === undefined) {
      return false;
    }
    clearTimeout(timer);
    this.#timers.delete(handle.id);
    return true;
  }

  channel(): Sender<Message> {
    return this.#sender;
  }

  /**
   * Stops the loop after the current iteration. Pending timers, sources and
   * queued messages are kept for the next {@link run}.
   */
  shutdown(): void {
    this.#running = false;
    this.#wake();
  }

  isRunning(): boolean {
    return this.#running;
  }

  /**
   * Shuts the loop down for good: cancels timers, detaches sources, closes the
   * notify channel and drops everything still queued.
   */
  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.shutdown();
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
    for (const source of this.#registrations.keys()) {
      source.detach();
    }
    this.#registrations.clear();
    const droppedMessages = this.#channel.close();
    const droppedEvents = this.#events.splice(0).length;
    if (droppedMessages > 0 || droppedEvents > 0) {
      this.#logger?.debug(
        `Dropped ${droppedMessages} undelivered messages and ${droppedEvents} pending events`,
      );
    }
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new LoopClosedError();
    }
  }

  #onReadiness(source: EventSource, events: EventSet): void {
    const registration = this.#registrations.get(source);
    if (!registration) {
      return;
    }
    const masked = events & registration.interest;
    if (masked !== 0) {
      this.#enqueue({
        kind: 'ready',
        token: registration.token,
        events: masked,
      });
    }
  }

  #enqueue(event: PendingEvent): void {
    this.#events.push(event);
    this.#wake();
  }

  #hasPendingWork(): boolean {
    return this.#events.length > 0 || this.#channel.length > 0;
  }

  async #sleep(): Promise<void> {
    const { promise, resolve } = createDeferredPromise();
    this.#wakeUp = () => resolve();
    await promise;
  }

  #wake(): void {
    const wakeUp = this.#wakeUp;
    this.#wakeUp = undefined;
    wakeUp?.();
  }
}
