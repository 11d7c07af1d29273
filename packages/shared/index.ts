export { EventBus, getEventBus, createEvent } from './event-bus/index.js';
export type {
  EventChannel,
  EventSource,
  BusEvent,
  EventHandler,
  SpecLoadedPayload,
  SpecRejectedPayload,
  ReferencesCheckedPayload,
} from './types/index.js';
