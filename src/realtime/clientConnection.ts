import { logger } from "@/monitoring/logger";
import { toErrorMessage } from "@/utils/errors";
import { withTimeout } from "@/utils/timeout";

// ws readyState for an open socket
export const SOCKET_OPEN = 1;

/** The part of a `ws` WebSocket the fan-out needs. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  terminate(): void;
  close(code?: number, reason?: string): void;
}

export interface ClientConnectionOptions {
  sendTimeoutMs: number;
  maxQueueSize: number;
  maxSendFailures: number;
  onPrune: (connection: ClientConnection, reason: string) => void;
}

/**
 * One connected client. Frames are queued and written by a single writer, one
 * at a time, each bounded by the send timeout. Enqueueing never waits on the
 * socket.
 */
export class ClientConnection {
  readonly subscriptions = new Set<string>();
  readonly connectedAt = new Date();
  isAlive = true;

  private readonly queue: string[] = [];
  private writing = false;
  private consecutiveFailures = 0;
  private closed = false;

  constructor(
    readonly id: string,
    readonly socket: ClientSocket,
    private readonly options: ClientConnectionOptions
  ) {}

  enqueue(payload: string): boolean {
    if (this.closed) {
      return false;
    }

    if (this.queue.length >= this.options.maxQueueSize) {
      this.recordFailure("outbound queue full");
      return false;
    }

    this.queue.push(payload);
    if (!this.writing) {
      this.drain().catch((error) => {
        logger.error("WebSocket writer crashed", {
          connectionId: this.id,
          error: toErrorMessage(error),
        });
      });
    }
    return true;
  }

  getFailureCount(): number {
    return this.consecutiveFailures;
  }

  markClosed(): void {
    this.closed = true;
    this.queue.length = 0;
  }

  private async drain(): Promise<void> {
    this.writing = true;
    try {
      let payload = this.queue.shift();
      while (payload !== undefined && !this.closed) {
        try {
          await withTimeout(
            this.send(payload),
            this.options.sendTimeoutMs,
            "WebSocket send"
          );
          this.consecutiveFailures = 0;
        } catch (error) {
          this.recordFailure(toErrorMessage(error));
        }
        payload = this.queue.shift();
      }
    } finally {
      this.writing = false;
    }
  }

  private send(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== SOCKET_OPEN) {
        reject(new Error("Socket is not open"));
        return;
      }
      this.socket.send(payload, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private recordFailure(reason: string): void {
    this.consecutiveFailures++;
    logger.debug("WebSocket send failed", {
      connectionId: this.id,
      failures: this.consecutiveFailures,
      reason,
    });

    if (
      !this.closed &&
      this.consecutiveFailures >= this.options.maxSendFailures
    ) {
      this.markClosed();
      this.options.onPrune(this, reason);
    }
  }
}
