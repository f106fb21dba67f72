import { InvalidConfigError } from '@loopcore/errors';
import { integer, is, size } from '@metamask/superstruct';

/**
 * The largest identifier. Counters wrap to zero after it.
 */
export const MAX_IDENTIFIER = 0xffff_ffff;

/**
 * A reactor-scoped identifier naming one registered I/O resource (a socket,
 * a timer).
 */
export type Token = number;

/**
 * A core-scoped identifier naming one logical unit of work. It stays the same
 * when the tokens of the unit's resources change, e.g. on reconnect.
 */
export type Context = number;

export const IdentifierStruct = size(integer(), 0, MAX_IDENTIFIER);

export const TokenStruct = IdentifierStruct;

export const ContextStruct = IdentifierStruct;

/**
 * @param value - The value to check.
 * @returns Whether the value is a valid {@link Token}.
 */
export const isToken = (value: unknown): value is Token =>
  is(value, TokenStruct);

/**
 * @param value - The value to check.
 * @returns Whether the value is a valid {@link Context}.
 */
export const isContext = (value: unknown): value is Context =>
  is(value, ContextStruct);

/**
 * A monotonic identifier counter. Each call to {@link next} returns the
 * current value and advances by one, wrapping to zero after
 * {@link MAX_IDENTIFIER}. There is no check against identifiers still in use,
 * so two generators must never be seeded into overlapping ranges.
 */
export class IdentifierGenerator {
  #next: number;

  /**
   * @param seed - The first identifier to hand out.
   */
  constructor(seed = 0) {
    if (!is(seed, IdentifierStruct)) {
      throw new InvalidConfigError(
        'seed',
        `Expected an integer between 0 and ${MAX_IDENTIFIER}, received ${String(seed)}`,
      );
    }
    this.#next = seed;
  }

  /**
   * @returns The next identifier.
   */
  next(): number {
    const identifier = this.#next;
    this.#next = identifier === MAX_IDENTIFIER ? 0 : identifier + 1;
    return identifier;
  }

  /**
   * @returns The identifier the next call to {@link next} will return.
   */
  peek(): number {
    return this.#next;
  }
}
