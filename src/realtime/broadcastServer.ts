import type http from "http";
import WebSocket, { RawData, WebSocketServer } from "ws";
import { z } from "zod";
import { logger } from "@/monitoring/logger";
import { CHANNELS } from "@/config/channels";
import { PubSubRelay } from "@/messaging/pubsubRelay";
import { LruCache } from "@/utils/lruCache";
import { generateConnectionId } from "@/utils/idGenerator";
import { toErrorMessage } from "@/utils/errors";
import { ClientConnection, ClientSocket } from "@/realtime/clientConnection";
import { Frame, RelayMessage, Unsubscribe } from "@/types/messaging";

export const TOPICS = {
  HEALTH: "health_updates",
  INCIDENTS: "incidents",
  ERROR_LOGS: "error_logs",
  ANALYTICS: "analytics_updates",
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];

export const FRAME_TYPES = {
  INITIAL_STATUS: "initial_status",
  HEALTH_UPDATE: "health_update",
  INCIDENT_UPDATE: "incident_update",
  ERROR_LOG: "error_log",
  ANALYTICS_UPDATE: "analytics_update",
  SUBSCRIPTION_CONFIRMED: "subscription_confirmed",
  UNSUBSCRIPTION_CONFIRMED: "unsubscription_confirmed",
  PONG: "pong",
  ERROR: "error",
} as const;

export const ALL_TOPICS: Topic[] = Object.values(TOPICS);

// Close code for "try again later"
const CLOSE_TRY_AGAIN_LATER = 1013;
const DEDUP_CACHE_SIZE = 10000;

interface RelayRoute {
  channel: string;
  topic: Topic;
  frameType: string;
}

const RELAY_ROUTES: RelayRoute[] = [
  {
    channel: CHANNELS.HEALTH_UPDATES,
    topic: TOPICS.HEALTH,
    frameType: FRAME_TYPES.HEALTH_UPDATE,
  },
  {
    channel: CHANNELS.INCIDENTS,
    topic: TOPICS.INCIDENTS,
    frameType: FRAME_TYPES.INCIDENT_UPDATE,
  },
  {
    channel: CHANNELS.ERROR_LOGS,
    topic: TOPICS.ERROR_LOGS,
    frameType: FRAME_TYPES.ERROR_LOG,
  },
  {
    channel: CHANNELS.ANALYTICS_UPDATES,
    topic: TOPICS.ANALYTICS,
    frameType: FRAME_TYPES.ANALYTICS_UPDATE,
  },
];

const topicSchema = z.enum([
  TOPICS.HEALTH,
  TOPICS.INCIDENTS,
  TOPICS.ERROR_LOGS,
  TOPICS.ANALYTICS,
]);

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("subscribe"),
    subscriptions: z.array(topicSchema).optional(),
  }),
  z.object({
    type: z.literal("unsubscribe"),
    subscriptions: z.array(topicSchema).optional(),
  }),
  z.object({ type: z.literal("ping") }),
]);

const incidentIdSchema = z.object({ id: z.string().min(1) }).passthrough();

export interface BroadcastServerOptions {
  relay: PubSubRelay;
  getInitialStatus: () => unknown;
  path: string;
  pingIntervalMs: number;
  sendTimeoutMs: number;
  maxQueueSize: number;
  maxSendFailures: number;
  maxConnections: number;
  incidentDedupTtlMs: number;
}

export const encodeFrame = <T>(type: string, data: T): string => {
  const frame: Frame<T> = { type, data, timestamp: new Date().toISOString() };
  return JSON.stringify(frame);
};

/**
 * Fans relay messages out to WebSocket clients. Broadcasting only enqueues on
 * each client's connection, so a slow client delays nobody but itself.
 */
export class BroadcastServer {
  private readonly clients = new Map<string, ClientConnection>();
  private readonly seenIncidents = new LruCache<true>(DEDUP_CACHE_SIZE);
  private readonly unsubscribers: Unsubscribe[] = [];
  private wss?: WebSocketServer;
  private heartbeatId?: NodeJS.Timeout;
  private isRunning = false;
  private framesSent = 0;
  private readonly log = logger.child({ component: "broadcast-server" });

  constructor(private readonly options: BroadcastServerOptions) {}

  attach(server: http.Server): void {
    this.wss = new WebSocketServer({ server, path: this.options.path });
    this.wss.on("connection", (socket: WebSocket) => this.handleConnection(socket));
    this.wss.on("error", (error: Error) => {
      this.log.error("WebSocket server error", { error: error.message });
    });
    this.log.info("WebSocket endpoint attached", { path: this.options.path });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.log.warn("Broadcast server already running");
      return;
    }
    this.isRunning = true;

    for (const route of RELAY_ROUTES) {
      const unsubscribe = await this.options.relay.subscribe(
        route.channel,
        (message) => this.handleRelayMessage(route, message)
      );
      this.unsubscribers.push(unsubscribe);
    }

    this.heartbeatId = setInterval(
      () => this.heartbeat(),
      this.options.pingIntervalMs
    );

    this.log.info("Broadcast server started", {
      channels: RELAY_ROUTES.map((route) => route.channel),
    });
  }

  async stop(): Promise<void> {
    if (this.heartbeatId) {
      clearInterval(this.heartbeatId);
      this.heartbeatId = undefined;
    }

    for (const unsubscribe of this.unsubscribers.splice(0)) {
      try {
        await unsubscribe();
      } catch (error) {
        this.log.warn("Failed to unsubscribe from relay", {
          error: toErrorMessage(error),
        });
      }
    }

    for (const connection of this.clients.values()) {
      connection.markClosed();
      connection.socket.close(1001, "Server shutdown");
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = undefined;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    this.isRunning = false;
    this.log.info("Broadcast server stopped");
  }

  private handleConnection(socket: WebSocket): void {
    const connection = this.addClient(socket);
    if (!connection) {
      return;
    }

    socket.on("message", (data: RawData) => {
      this.handleClientMessage(connection, data.toString());
    });
    socket.on("pong", () => {
      connection.isAlive = true;
    });
    socket.on("close", () => this.removeClient(connection.id));
    socket.on("error", (error: Error) => {
      this.log.warn("WebSocket client error", {
        connectionId: connection.id,
        error: error.message,
      });
    });
  }

  /**
   * Registers a socket, subscribes it to every topic and queues the initial
   * status. Returns undefined when the connection cap is reached.
   */
  addClient(socket: ClientSocket): ClientConnection | undefined {
    if (this.clients.size >= this.options.maxConnections) {
      this.log.warn("Rejecting WebSocket connection, limit reached", {
        limit: this.options.maxConnections,
      });
      socket.close(CLOSE_TRY_AGAIN_LATER, "Server at capacity");
      return undefined;
    }

    const connection = new ClientConnection(generateConnectionId(), socket, {
      sendTimeoutMs: this.options.sendTimeoutMs,
      maxQueueSize: this.options.maxQueueSize,
      maxSendFailures: this.options.maxSendFailures,
      onPrune: (pruned, reason) => this.prune(pruned, reason),
    });
    for (const topic of ALL_TOPICS) {
      connection.subscriptions.add(topic);
    }
    this.clients.set(connection.id, connection);

    this.log.info("WebSocket client connected", {
      connectionId: connection.id,
      clients: this.clients.size,
    });

    this.sendTo(
      connection,
      FRAME_TYPES.INITIAL_STATUS,
      this.options.getInitialStatus()
    );
    return connection;
  }

  removeClient(connectionId: string): void {
    const connection = this.clients.get(connectionId);
    if (!connection) {
      return;
    }
    connection.markClosed();
    this.clients.delete(connectionId);
    this.log.info("WebSocket client disconnected", {
      connectionId,
      clients: this.clients.size,
    });
  }

  handleClientMessage(connection: ClientConnection, raw: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      this.sendTo(connection, FRAME_TYPES.ERROR, { message: "Invalid JSON" });
      return;
    }

    const parsed = clientMessageSchema.safeParse(payload);
    if (!parsed.success) {
      this.sendTo(connection, FRAME_TYPES.ERROR, {
        message: "Unsupported message",
      });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case "subscribe": {
        const topics = message.subscriptions ?? ALL_TOPICS;
        topics.forEach((topic) => connection.subscriptions.add(topic));
        this.sendTo(connection, FRAME_TYPES.SUBSCRIPTION_CONFIRMED, {
          subscriptions: Array.from(connection.subscriptions),
        });
        break;
      }
      case "unsubscribe": {
        const topics = message.subscriptions ?? [];
        topics.forEach((topic) => connection.subscriptions.delete(topic));
        this.sendTo(connection, FRAME_TYPES.UNSUBSCRIPTION_CONFIRMED, {
          subscriptions: Array.from(connection.subscriptions),
        });
        break;
      }
      case "ping":
        this.sendTo(connection, FRAME_TYPES.PONG, {});
        break;
    }
  }

  broadcast<T>(topic: Topic, type: string, data: T): number {
    const payload = encodeFrame(type, data);
    let queued = 0;

    for (const connection of this.clients.values()) {
      if (connection.subscriptions.has(topic) && connection.enqueue(payload)) {
        queued++;
      }
    }

    this.framesSent += queued;
    return queued;
  }

  private handleRelayMessage(route: RelayRoute, message: RelayMessage): void {
    if (route.topic === TOPICS.INCIDENTS) {
      const incident = incidentIdSchema.safeParse(message.data);
      if (incident.success) {
        if (this.seenIncidents.has(incident.data.id)) {
          this.log.debug("Dropping duplicate incident", {
            incidentId: incident.data.id,
          });
          return;
        }
        this.seenIncidents.set(
          incident.data.id,
          true,
          this.options.incidentDedupTtlMs
        );
      }
    }

    this.broadcast(route.topic, route.frameType, message.data);
  }

  private sendTo<T>(connection: ClientConnection, type: string, data: T): void {
    if (connection.enqueue(encodeFrame(type, data))) {
      this.framesSent++;
    }
  }

  private prune(connection: ClientConnection, reason: string): void {
    this.log.warn("Pruning unresponsive WebSocket client", {
      connectionId: connection.id,
      reason,
    });
    this.clients.delete(connection.id);
    connection.socket.terminate();
  }

  private heartbeat(): void {
    for (const connection of Array.from(this.clients.values())) {
      if (!connection.isAlive) {
        this.log.warn("WebSocket client missed heartbeat", {
          connectionId: connection.id,
        });
        this.removeClient(connection.id);
        connection.socket.terminate();
        continue;
      }
      connection.isAlive = false;
      try {
        connection.socket.ping();
      } catch (error) {
        this.log.debug("Ping failed", {
          connectionId: connection.id,
          error: toErrorMessage(error),
        });
      }
    }
  }

  getConnectionCount(): number {
    return this.clients.size;
  }

  getStats() {
    return {
      running: this.isRunning,
      connections: this.clients.size,
      framesSent: this.framesSent,
      path: this.options.path,
    };
  }
}
