export { EventBus } from './bus.js';
export type {
  SyncEvent,
  SyncEventType,
  SyncEventOf,
  EmittedEvent,
  EventListener,
  SupervisorState,
  SupervisorTask,
} from './types.js';
