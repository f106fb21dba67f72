import type { Core } from './Core.ts';
import type { CoreReactor } from './types.ts';

export type ClosureCallback = (core: Core, reactor: CoreReactor) => void;

/**
 * A unit of work that runs at most once on the loop. Closures are built
 * anywhere and handed to the reactor's notify channel; the core invokes them
 * when the channel delivers.
 *
 * The callback is detached before it runs, so a second invocation (including
 * one from inside the callback itself) does nothing.
 */
export class Closure {
  #callback: ClosureCallback | undefined;

  /**
   * @param callback - The work to run on the loop.
   */
  constructor(callback: ClosureCallback) {
    this.#callback = callback;
  }

  /**
   * Whether the closure has been invoked.
   *
   * @returns `true` once {@link invoke} has been called.
   */
  get consumed(): boolean {
    return this.#callback === undefined;
  }

  /**
   * Runs the callback if it has not run yet.
   *
   * @param core - The core the closure runs against.
   * @param reactor - The reactor driving the core.
   */
  invoke(core: Core, reactor: CoreReactor): void {
    const callback = this.#callback;
    this.#callback = undefined;
    callback?.(core, reactor);
  }
}
