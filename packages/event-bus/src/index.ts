export type { RuntimeEventMap } from './types.js';
export { EventBus } from './event-bus.js';
export type {
  EventBusOptions,
  EventRecord,
  RuntimeEventHandler,
  RuntimeEventName,
} from './event-bus.js';
