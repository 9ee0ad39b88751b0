/**
 * Infrastructure Utilities
 *
 * Error taxonomy, queues, locks and timers shared by the sync core.
 */

export {
  BedlogError,
  NotConnectedError,
  TransportError,
  RpcError,
  MalformedFrameError,
  MalformedStoreError,
  ConfigError,
  isTransportError,
  isRpcError,
  toError,
} from './errors.js';

export { AsyncQueue } from './async-queue.js';

export { KeyedMutex, storeMutex } from './keyed-mutex.js';

export { sleep, isAbortError, MAX_TIMER_DELAY_MS } from './sleep.js';
