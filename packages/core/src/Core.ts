import { InvalidConfigError } from '@loopcore/errors';
import type { Logger } from '@metamask/logger';
import { object, optional, validate } from '@metamask/superstruct';

import type { Closure } from './Closure.ts';
import { describeEvents } from './event-set.ts';
import type { EventSet } from './event-set.ts';
import { IdentifierGenerator, IdentifierStruct } from './identifiers.ts';
import type { Context, Token } from './identifiers.ts';
import type { Handler } from './reactor.ts';
import type { CoreOptions, CoreReactor, State } from './types.ts';

const CoreSeedsStruct = object({
  tokenSeed: optional(IdentifierStruct),
  contextSeed: optional(IdentifierStruct),
});

/**
 * The dispatch core of the event loop.
 *
 * The core keeps two maps: token to context, and context to state. Events
 * from the reactor carry a token; the core resolves it to a context, the
 * context to a state, and calls the matching capability on the state. A miss
 * at either step drops the event. Stale events for resources that were
 * already deregistered are expected, so a miss is never an error.
 *
 * Unbinding a state does not unbind its tokens. Tokens are unbound by
 * whoever deregisters the resource.
 *
 * All methods are synchronous and meant to be called from the loop only.
 * States may call back into the core while they are being dispatched to.
 */
export class Core implements Handler<Closure> {
  readonly #tokens: IdentifierGenerator;

  readonly #contexts: IdentifierGenerator;

  readonly #contextsByToken: Map<Token, Context> = new Map();

  readonly #states: Map<Context, State> = new Map();

  /** The logger, if any. */
  readonly #logger: Logger | undefined;

  /**
   * @param options - Construction options.
   * @param options.tokenSeed - The first token {@link nextToken} returns.
   * @param options.contextSeed - The first context {@link nextContext}
   * returns.
   * @param options.logger - The logger. If not provided, no logging is done.
   */
  constructor(options: CoreOptions = {}) {
    const [error] = validate(
      { tokenSeed: options.tokenSeed, contextSeed: options.contextSeed },
      CoreSeedsStruct,
    );
    if (error) {
      throw new InvalidConfigError(error.path.join('.'), error.message, error);
    }
    this.#tokens = new IdentifierGenerator(options.tokenSeed);
    this.#contexts = new IdentifierGenerator(options.contextSeed);
    this.#logger = options.logger?.subLogger('core');
  }

  /**
   * Makes a core whose contexts start at `contextSeed`, leaving the contexts
   * below it free for callers that must know them in advance.
   *
   * @param contextSeed - The first context {@link nextContext} returns.
   * @param logger - The logger, if any.
   * @returns The new core.
   */
  static withSeed(contextSeed: Context, logger?: Logger): Core {
    return new Core(logger ? { contextSeed, logger } : { contextSeed });
  }

  /**
   * Mints a token, for resources the core creates before the reactor knows
   * of them (e.g. timers).
   *
   * @returns The new token.
   */
  nextToken(): Token {
    return this.#tokens.next();
  }

  /**
   * @returns A new context.
   */
  nextContext(): Context {
    return this.#contexts.next();
  }

  /**
   * Binds a token to a context. The context need not have a state yet.
   *
   * @param token - The token.
   * @param context - The context.
   * @returns The context the token was bound to before, if any.
   */
  bindToken(token: Token, context: Context): Context | undefined {
    const previous = this.#contextsByToken.get(token);
    this.#contextsByToken.set(token, context);
    return previous;
  }

  /**
   * @param token - The token.
   * @returns The context the token was bound to, if any.
   */
  unbindToken(token: Token): Context | undefined {
    const context = this.#contextsByToken.get(token);
    this.#contextsByToken.delete(token);
    return context;
  }

  /**
   * Binds a state to a context, replacing any state bound there.
   *
   * @param context - The context.
   * @param state - The state.
   * @returns The state bound to the context before, if any.
   */
  bindState(context: Context, state: State): State | undefined {
    const previous = this.#states.get(context);
    this.#states.set(context, state);
    return previous;
  }

  /**
   * @param context - The context.
   * @returns The state the context was bound to, if any.
   */
  unbindState(context: Context): State | undefined {
    const state = this.#states.get(context);
    this.#states.delete(context);
    return state;
  }

  /**
   * @param token - The token to look up.
   * @returns The context bound to the token, if any.
   */
  resolveToken(token: Token): Context | undefined {
    return this.#contextsByToken.get(token);
  }

  /**
   * @param context - The context to look up.
   * @returns The state bound to the context, if any.
   */
  resolveContext(context: Context): State | undefined {
    return this.#states.get(context);
  }

  /**
   * @returns The number of bound tokens.
   */
  get tokenCount(): number {
    return this.#contextsByToken.size;
  }

  /**
   * @returns The number of bound states.
   */
  get stateCount(): number {
    return this.#states.size;
  }

  /**
   * Asks the state bound to a context to terminate. The state stays bound;
   * unbinding is up to the state's own `onTerminate`.
   *
   * @param context - The context whose state should terminate.
   * @param reactor - The reactor driving the core.
   */
  terminateState(context: Context, reactor: CoreReactor): void {
    const state = this.#states.get(context);
    if (state === undefined) {
      this.#logger?.debug(`No state to terminate for context ${context}`);
      return;
    }
    state.onTerminate(this, reactor);
  }

  /**
   * Delivers readiness of a resource to the state owning its token.
   *
   * @param reactor - The reactor driving the core.
   * @param token - The token of the resource.
   * @param events - The readiness.
   */
  ready(reactor: CoreReactor, token: Token, events: EventSet): void {
    const state = this.#dispatchTarget(token, 'readiness');
    if (state?.onReady) {
      state.onReady(this, reactor, token, events);
    } else if (state) {
      this.#logger?.debug(
        `State for token ${token} ignores readiness (${describeEvents(events)})`,
      );
    }
  }

  /**
   * Delivers the expiry of a timer to the state owning its token.
   *
   * @param reactor - The reactor driving the core.
   * @param token - The token the timer was scheduled with.
   */
  timeout(reactor: CoreReactor, token: Token): void {
    const state = this.#dispatchTarget(token, 'timeout');
    if (state?.onTimeout) {
      state.onTimeout(this, reactor, token);
    } else if (state) {
      this.#logger?.debug(`State for token ${token} ignores timeouts`);
    }
  }

  /**
   * Runs a closure sent through the reactor's notify channel.
   *
   * @param reactor - The reactor driving the core.
   * @param closure - The closure.
   */
  notify(reactor: CoreReactor, closure: Closure): void {
    closure.invoke(this, reactor);
  }

  /**
   * Resolves a token to the state it should be delivered to.
   *
   * @param token - The token of the event.
   * @param kind - What is being delivered, for logging.
   * @returns The state, or undefined if the token or its context is unbound.
   */
  #dispatchTarget(token: Token, kind: string): State | undefined {
    const context = this.#contextsByToken.get(token);
    if (context === undefined) {
      this.#logger?.debug(`Dropping ${kind} for unbound token ${token}`);
      return undefined;
    }
    const state = this.#states.get(context);
    if (state === undefined) {
      this.#logger?.debug(
        `Dropping ${kind} for token ${token}: no state bound to context ${context}`,
      );
    }
    return state;
  }
}
