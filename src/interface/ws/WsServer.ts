/**
 * WebSocket Server
 * Streams pool events to subscribers; doubles as a notification sink.
 */
import type { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { getLogger } from '../../config/logger.js';
import type { AmmEvent, INotificationSink } from '../../domain/ports/INotificationSink.js';
import { serializeEvent } from '../../infrastructure/notifications/serialize.js';

const logger = getLogger().child({ service: 'websocket' });

// ── Message Types ──

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('subscribe'),
    channel: z.literal('pool'),
    params: z.object({ poolId: z.string().min(1).default('*') }).default({}),
  }),
  z.object({
    type: z.literal('unsubscribe'),
    channel: z.literal('pool'),
    params: z.object({ poolId: z.string().min(1).optional() }).default({}),
  }),
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

// ── Client tracking ──

interface WsClient {
  id: string;
  ws: WebSocket;
  /** Pool ids, or '*' for every pool */
  pools: Set<string>;
  alive: boolean;
}

export class WsServer implements INotificationSink {
  private wss: WebSocketServer | null = null;
  private clients = new Map<string, WsClient>();
  private heartbeatInterval: NodeJS.Timeout | null = null;

  /** Attach WebSocket server to an HTTP server */
  attach(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: '/v1/ws' });

    this.wss.on('connection', (ws) => {
      const clientId = uuid();
      const client: WsClient = { id: clientId, ws, pools: new Set(), alive: true };
      this.clients.set(clientId, client);
      logger.info({ clientId, total: this.clients.size }, 'WS client connected');

      ws.on('message', (raw) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw.toString());
        } catch {
          this.sendError(ws, 'Invalid message format');
          return;
        }
        const msg = clientMessageSchema.safeParse(parsed);
        if (!msg.success) {
          this.sendError(ws, 'Unknown message type or channel');
          return;
        }
        this.handleMessage(client, msg.data);
      });

      ws.on('pong', () => {
        client.alive = true;
      });

      ws.on('close', () => {
        this.clients.delete(clientId);
        logger.info({ clientId, total: this.clients.size }, 'WS client disconnected');
      });

      ws.on('error', (err) => {
        logger.error({ err, clientId }, 'WS client error');
      });

      this.send(ws, {
        type: 'connected',
        data: { clientId, timestamp: Date.now() },
      });
    });

    // Heartbeat: ping every 30s, terminate dead connections
    this.heartbeatInterval = setInterval(() => {
      for (const [id, client] of this.clients) {
        if (!client.alive) {
          client.ws.terminate();
          this.clients.delete(id);
          continue;
        }
        client.alive = false;
        client.ws.ping();
      }
    }, 30_000);

    logger.info('WebSocket server attached at /v1/ws');
  }

  /** Broadcast a pool event to its subscribers */
  publish(event: AmmEvent): void {
    const data = serializeEvent(event);
    for (const client of this.clients.values()) {
      if (client.pools.has(event.poolId) || client.pools.has('*')) {
        this.send(client.ws, { type: 'poolEvent', data });
      }
    }
  }

  /** Graceful shutdown */
  close(): void {
    if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);
    for (const client of this.clients.values()) {
      client.ws.close(1001, 'Server shutting down');
    }
    this.wss?.close();
    logger.info('WebSocket server closed');
  }

  /** Active client count */
  get clientCount(): number {
    return this.clients.size;
  }

  // ── Private ──

  private handleMessage(client: WsClient, msg: ClientMessage): void {
    switch (msg.type) {
      case 'subscribe':
        client.pools.add(msg.params.poolId);
        this.send(client.ws, {
          type: 'subscribed',
          data: { channel: msg.channel, pools: Array.from(client.pools) },
        });
        logger.debug({ clientId: client.id, pools: client.pools.size }, 'Client subscribed');
        break;
      case 'unsubscribe':
        if (msg.params.poolId) {
          client.pools.delete(msg.params.poolId);
        } else {
          client.pools.clear();
        }
        this.send(client.ws, {
          type: 'unsubscribed',
          data: { channel: msg.channel, pools: Array.from(client.pools) },
        });
        break;
    }
  }

  private send(ws: WebSocket, data: unknown): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(data));
    }
  }

  private sendError(ws: WebSocket, message: string): void {
    this.send(ws, { type: 'error', data: { message } });
  }
}
