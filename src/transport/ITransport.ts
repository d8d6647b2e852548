/**
 * Persistent connection transport.
 * The supervisor owns lifecycle and retries; a transport only opens sockets.
 */

export interface TransportOpenOptions {
  /** Reject the open if the handshake takes longer than this. */
  handshakeTimeoutMs: number;
}

export interface ITransportConnection {
  /** Next inbound text frame, or null once the connection has closed. */
  receive(): Promise<string | null>;

  /** Transmit one text frame. Rejects if the connection is not open. */
  send(data: string): Promise<void>;

  /** Liveness probe. Resolves on the peer's pong; rejects if the connection closes first. */
  ping(): Promise<void>;

  /** Close the connection. Pending and future `receive()` calls resolve null. Idempotent. */
  close(): Promise<void>;
}

export interface ITransport {
  open(url: string, options: TransportOpenOptions): Promise<ITransportConnection>;
}
