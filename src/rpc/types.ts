/**
 * JSON-RPC 2.0 envelopes as spoken by Moonraker
 */

export type RpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params: RpcParams;
  id: number;
}

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Request that has been sent and not yet answered
 */
export interface PendingRequest {
  id: number;
  method: string;
  issuedAt: Date;
}

export type ReplyFrame =
  | { kind: 'reply'; id: number; ok: true; result: unknown; request?: PendingRequest }
  | { kind: 'reply'; id: number; ok: false; error: RpcErrorObject; request?: PendingRequest };

export interface NotificationFrame {
  kind: 'notification';
  method: string;
  params: unknown[];
}

export type Frame = ReplyFrame | NotificationFrame;
