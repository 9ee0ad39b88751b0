export { RpcChannel, parseFrame } from './channel.js';
export { ResponseRouter, type NotificationSubscription } from './router.js';
export type {
  Frame,
  ReplyFrame,
  NotificationFrame,
  PendingRequest,
  JsonRpcRequest,
  RpcErrorObject,
  RpcParams,
} from './types.js';
