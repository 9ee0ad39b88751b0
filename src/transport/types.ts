/**
 * Transport
 *
 * Text-frame duplex connection the RPC channel is layered on.
 * Failures surface as TransportError; calls made before `open()` or after
 * `close()` fail with NotConnectedError.
 */
export interface Transport {
  /** Where this transport connects, for logging */
  readonly endpoint: string;

  open(): Promise<void>;

  send(data: string): Promise<void>;

  /**
   * Next inbound message, in arrival order. Messages received before the
   * connection dropped are still returned before the failure.
   */
  receive(): Promise<string>;

  /** Idempotent */
  close(): Promise<void>;
}

export type TransportFactory = () => Transport;
