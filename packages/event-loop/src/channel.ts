import { ChannelClosedError, ChannelFullError } from '@loopcore/errors';
import type { Sender } from '@loopcore/core';

/**
 * The bounded queue behind an event loop's notify channel.
 */
export class NotifyChannel<Message> {
  readonly #queue: Message[] = [];

  readonly #capacity: number;

  readonly #onSend: () => void;

  #closed = false;

  /**
   * @param capacity - The most messages the queue holds.
   * @param onSend - Called after every accepted message.
   */
  constructor(capacity: number, onSend: () => void) {
    this.#capacity = capacity;
    this.#onSend = onSend;
  }

  get length(): number {
    return this.#queue.length;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Enqueues a message.
   *
   * @param message - The message.
   */
  send(message: Message): void {
    if (this.#closed) {
      throw new ChannelClosedError();
    }
    if (this.#queue.length >= this.#capacity) {
      throw new ChannelFullError(this.#capacity);
    }
    this.#queue.push(message);
    this.#onSend();
  }

  /**
   * Hands queued messages to `deliver` in send order, one at a time. A
   * message leaves the queue before it is delivered, so if `deliver` throws,
   * the messages after it stay queued.
   *
   * @param max - The most messages to deliver.
   * @param deliver - The receiver.
   * @returns How many messages were delivered.
   */
  deliver(max: number, deliver: (message: Message) => void): number {
    let delivered = 0;
    while (delivered < max && this.#queue.length > 0) {
      const message = this.#queue[0];
      this.#queue.shift();
      delivered += 1;
      deliver(message);
    }
    return delivered;
  }

  /**
   * Closes the channel, dropping whatever is still queued.
   *
   * @returns How many messages were dropped.
   */
  close(): number {
    this.#closed = true;
    return this.#queue.splice(0).length;
  }

  /**
   * @returns A view of the channel that can only send.
   */
  sender(): Sender<Message> {
    return { send: (message) => this.send(message) };
  }
}
