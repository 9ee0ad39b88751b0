/**
 * Error Taxonomy
 *
 * - NotConnectedError:   operation attempted without a live transport
 * - TransportError:      socket-level failure, ends the connection epoch
 * - RpcError:            the daemon answered a request with an error object
 * - MalformedFrameError: inbound message that is neither a reply nor a notification
 * - MalformedStoreError: store file present but unreadable (recovered as empty)
 * - ConfigError:         invalid configuration at startup
 */

/**
 * Base class for every error raised by bedlog
 */
export class BedlogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BedlogError';
  }
}

export class NotConnectedError extends BedlogError {
  constructor(operation: string) {
    super(`Cannot ${operation}: not connected`);
    this.name = 'NotConnectedError';
  }
}

/**
 * Socket-level failure. The supervisor reconnects after the retry delay.
 */
export class TransportError extends BedlogError {
  /** WebSocket close code, if the socket closed */
  readonly closeCode?: number;

  constructor(message: string, options?: { cause?: unknown; closeCode?: number }) {
    super(message, options);
    this.name = 'TransportError';
    this.closeCode = options?.closeCode;
  }
}

export class RpcError extends BedlogError {
  readonly code: number;
  readonly method: string;
  readonly requestId: number;

  constructor(method: string, requestId: number, code: number, message: string) {
    super(`${method} (#${requestId}) failed with ${code}: ${message}`);
    this.name = 'RpcError';
    this.code = code;
    this.method = method;
    this.requestId = requestId;
  }
}

export class MalformedFrameError extends BedlogError {
  /** First characters of the offending message */
  readonly excerpt: string;

  constructor(reason: string, raw: string) {
    super(`Malformed frame: ${reason}`);
    this.name = 'MalformedFrameError';
    this.excerpt = raw.slice(0, 120);
  }
}

export class MalformedStoreError extends BedlogError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Store ${filePath} is unreadable: ${reason}`, options);
    this.name = 'MalformedStoreError';
    this.filePath = filePath;
  }
}

export class ConfigError extends BedlogError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isRpcError(error: unknown): error is RpcError {
  return error instanceof RpcError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
