export { EventLoop } from './EventLoop.ts';
export { NotifyChannel } from './channel.ts';
export {
  DEFAULT_CONFIG,
  EventLoopConfigStruct,
  parseEventLoopConfig,
} from './config.ts';
export type { EventLoopConfig } from './config.ts';
export { makeStreamSource } from './stream-source.ts';
