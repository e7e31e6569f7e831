import { Redis } from "ioredis";
import { z } from "zod";
import { config } from "@/config/env";
import { logger } from "@/monitoring/logger";
import { BrokerError, toErrorMessage } from "@/utils/errors";
import { RelayHandler, RelayMessage, Unsubscribe } from "@/types/messaging";

export interface PubSubRelay {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  publish<T>(channel: string, type: string, data: T): Promise<void>;
  subscribe(channel: string, handler: RelayHandler): Promise<Unsubscribe>;
}

const relayMessageSchema = z.object({
  channel: z.string(),
  type: z.string(),
  data: z.unknown(),
  timestamp: z.string(),
});

export const encodeMessage = <T>(
  channel: string,
  type: string,
  data: T
): string => {
  const message: RelayMessage<T> = {
    channel,
    type,
    data,
    timestamp: new Date().toISOString(),
  };
  return JSON.stringify(message);
};

export const decodeMessage = (payload: string): RelayMessage | undefined => {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return undefined;
  }

  const parsed = relayMessageSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  return { ...parsed.data, data: parsed.data.data };
};

const deliver = async (
  handlers: Iterable<RelayHandler>,
  message: RelayMessage
): Promise<void> => {
  for (const handler of handlers) {
    try {
      await handler(message);
    } catch (error) {
      logger.error("Error in relay subscriber", {
        channel: message.channel,
        type: message.type,
        error: toErrorMessage(error),
      });
    }
  }
};

class HandlerRegistry {
  private readonly handlers = new Map<string, Set<RelayHandler>>();

  // Returns true when this is the channel's first handler
  add(channel: string, handler: RelayHandler): boolean {
    const existing = this.handlers.get(channel);
    if (existing) {
      existing.add(handler);
      return false;
    }
    this.handlers.set(channel, new Set([handler]));
    return true;
  }

  // Returns true when the channel has no handlers left
  remove(channel: string, handler: RelayHandler): boolean {
    const existing = this.handlers.get(channel);
    if (!existing) {
      return false;
    }
    existing.delete(handler);
    if (existing.size === 0) {
      this.handlers.delete(channel);
      return true;
    }
    return false;
  }

  get(channel: string): RelayHandler[] {
    return Array.from(this.handlers.get(channel) ?? []);
  }

  clear(): void {
    this.handlers.clear();
  }
}

interface RedisRelayOptions {
  url: string;
  connectTimeout: number;
}

/**
 * Redis pub/sub with separate publisher and subscriber connections.
 * Publishing never queues while the broker is down; ioredis re-issues
 * SUBSCRIBE for every channel after a reconnect.
 */
export class RedisPubSubRelay implements PubSubRelay {
  private readonly publisher: Redis;
  private readonly subscriber: Redis;
  private readonly handlers = new HandlerRegistry();
  private connected = false;

  constructor(options: RedisRelayOptions) {
    this.publisher = new Redis(options.url, {
      lazyConnect: true,
      connectTimeout: options.connectTimeout,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
    });
    this.subscriber = new Redis(options.url, {
      lazyConnect: true,
      connectTimeout: options.connectTimeout,
      autoResubscribe: true,
    });

    this.subscriber.on("message", (channel: string, payload: string) => {
      this.dispatch(channel, payload);
    });

    for (const [role, client] of [
      ["publisher", this.publisher],
      ["subscriber", this.subscriber],
    ] as const) {
      client.on("error", (error: Error) => {
        logger.warn("Redis connection error", { role, error: error.message });
      });
      client.on("reconnecting", () => {
        logger.info("Reconnecting to Redis", { role });
      });
    }
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    try {
      await Promise.all([this.publisher.connect(), this.subscriber.connect()]);
      this.connected = true;
      logger.info("Connected to Redis broker");
    } catch (error) {
      throw new BrokerError(
        `Failed to connect to Redis: ${toErrorMessage(error)}`
      );
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.handlers.clear();
    this.publisher.disconnect();
    this.subscriber.disconnect();
    logger.info("Disconnected from Redis broker");
  }

  isConnected(): boolean {
    return this.connected && this.publisher.status === "ready";
  }

  async publish<T>(channel: string, type: string, data: T): Promise<void> {
    if (!this.isConnected()) {
      throw new BrokerError("Redis broker is not connected", channel);
    }

    try {
      await this.publisher.publish(channel, encodeMessage(channel, type, data));
      logger.debug("Message published", { channel, type });
    } catch (error) {
      throw new BrokerError(
        `Failed to publish to ${channel}: ${toErrorMessage(error)}`,
        channel
      );
    }
  }

  async subscribe(channel: string, handler: RelayHandler): Promise<Unsubscribe> {
    if (this.handlers.add(channel, handler)) {
      try {
        await this.subscriber.subscribe(channel);
      } catch (error) {
        this.handlers.remove(channel, handler);
        throw new BrokerError(
          `Failed to subscribe to ${channel}: ${toErrorMessage(error)}`,
          channel
        );
      }
      logger.info("Subscribed to channel", { channel });
    }

    return async () => {
      if (this.handlers.remove(channel, handler) && this.connected) {
        await this.subscriber.unsubscribe(channel);
        logger.info("Unsubscribed from channel", { channel });
      }
    };
  }

  private dispatch(channel: string, payload: string): void {
    const message = decodeMessage(payload);
    if (!message) {
      logger.warn("Dropping malformed relay message", { channel });
      return;
    }

    deliver(this.handlers.get(channel), message).catch((error) => {
      logger.error("Relay dispatch failed", {
        channel,
        error: toErrorMessage(error),
      });
    });
  }
}

/**
 * In-process broker for development and tests. Delivery happens inside
 * `publish`, so a resolved publish means every handler has run.
 */
export class InMemoryPubSubRelay implements PubSubRelay {
  private messages: RelayMessage[] = [];
  private readonly handlers = new HandlerRegistry();
  private connected = false;

  async connect(): Promise<void> {
    this.connected = true;
    logger.info("In-memory broker connected");
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.handlers.clear();
    logger.info("In-memory broker disconnected");
  }

  isConnected(): boolean {
    return this.connected;
  }

  async publish<T>(channel: string, type: string, data: T): Promise<void> {
    if (!this.connected) {
      throw new BrokerError("In-memory broker is not connected", channel);
    }

    // Round-trip through the wire format so subscribers see what Redis would deliver
    const message = decodeMessage(encodeMessage(channel, type, data));
    if (!message) {
      throw new BrokerError(`Unserializable message for ${channel}`, channel);
    }

    this.messages.push(message);
    logger.debug("Message published to in-memory broker", { channel, type });

    await deliver(this.handlers.get(channel), message);
  }

  async subscribe(channel: string, handler: RelayHandler): Promise<Unsubscribe> {
    this.handlers.add(channel, handler);
    logger.info("Subscribed to in-memory channel", { channel });

    return async () => {
      this.handlers.remove(channel, handler);
    };
  }

  getMessages(channel?: string): RelayMessage[] {
    if (channel) {
      return this.messages.filter((message) => message.channel === channel);
    }
    return [...this.messages];
  }

  clear(): void {
    this.messages = [];
  }
}

export const createPubSubRelay = (): PubSubRelay => {
  if (config.mockBroker.enabled) {
    logger.info("Using in-memory broker");
    return new InMemoryPubSubRelay();
  }
  return new RedisPubSubRelay({
    url: config.redis.url,
    connectTimeout: config.redis.connectTimeout,
  });
};
