export { Core } from './Core.ts';
export { Closure } from './Closure.ts';
export type { ClosureCallback } from './Closure.ts';
export type { CoreOptions, CoreReactor, State } from './types.ts';
export type {
  EventSource,
  Handler,
  Reactor,
  ReadinessListener,
  Sender,
  TimeoutHandle,
} from './reactor.ts';
export {
  ContextStruct,
  IdentifierGenerator,
  IdentifierStruct,
  MAX_IDENTIFIER,
  TokenStruct,
  isContext,
  isToken,
} from './identifiers.ts';
export type { Context, Token } from './identifiers.ts';
export {
  EventSet,
  describeEvents,
  eventSet,
  isError,
  isHup,
  isReadable,
  isWritable,
} from './event-set.ts';
export type { Interest } from './event-set.ts';
