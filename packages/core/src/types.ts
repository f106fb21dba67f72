import type { Logger } from '@metamask/logger';

import type { Closure } from './Closure.ts';
import type { Core } from './Core.ts';
import type { EventSet } from './event-set.ts';
import type { Context, Token } from './identifiers.ts';
import type { Reactor } from './reactor.ts';

/**
 * The reactor a {@link Core} is driven by. Its notify channel carries
 * {@link Closure}s.
 */
export type CoreReactor = Reactor<Closure>;

/**
 * One unit of higher-level logic, registered with a {@link Core} under a
 * {@link Context}. Every capability receives the core and the reactor, so it
 * may register or deregister resources, mint contexts, or terminate other
 * states while it runs.
 */
export type State = {
  /**
   * A resource bound to this state's context became ready. Ignored when
   * absent.
   */
  onReady?(
    core: Core,
    reactor: CoreReactor,
    token: Token,
    events: EventSet,
  ): void;
  /**
   * A timer bound to this state's context fired. Ignored when absent.
   */
  onTimeout?(core: Core, reactor: CoreReactor, token: Token): void;
  /**
   * The state is asked to stop. It should deregister its resources and
   * unbind itself from the core.
   */
  onTerminate(core: Core, reactor: CoreReactor): void;
};

export type CoreOptions = {
  /** The first token {@link Core.nextToken} returns. Defaults to 0. */
  tokenSeed?: Token;
  /** The first context {@link Core.nextContext} returns. Defaults to 0. */
  contextSeed?: Context;
  logger?: Logger;
};
