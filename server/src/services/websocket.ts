/**
 * WebSocket Service
 * Streams new opportunities, execution record transitions and venue status to monitors
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import { z } from 'zod';
import { structuredLogger } from './logger.js';
import { metricsService } from './metrics.js';
import { stringify } from '../utils/json.js';
import type { WSEvent, WSEventType } from '../../../shared/schema.js';

interface ClientState {
  isAlive: boolean;
  // empty means every event type
  subscriptions: Set<WSEventType>;
}

const channelSchema = z.enum(['opportunity:new', 'execution:update', 'venue:status']);

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), channel: channelSchema }),
  z.object({ type: z.literal('unsubscribe'), channel: channelSchema }),
  z.object({ type: z.literal('ping') }),
]);

class WebSocketService {
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, ClientState> = new Map();
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  /**
   * Attach to the HTTP server at /ws
   */
  initialize(server: Server): void {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket) => {
      const state: ClientState = { isAlive: true, subscriptions: new Set() };
      this.clients.set(ws, state);
      metricsService.setGauge('websocket_connections', this.clients.size);

      ws.on('pong', () => {
        state.isAlive = true;
      });

      ws.on('message', (data) => {
        this.handleMessage(ws, state, data.toString());
      });

      ws.on('close', () => {
        this.removeClient(ws);
      });

      ws.on('error', (error) => {
        structuredLogger.warning('websocket', 'Client socket error', { error: error.message });
        this.removeClient(ws);
      });

      this.send(ws, { type: 'engine:status', payload: { connected: true }, timestamp: Date.now() });
    });

    // Keepalive
    this.pingInterval = setInterval(() => {
      this.clients.forEach((state, ws) => {
        if (!state.isAlive) {
          ws.terminate();
          this.removeClient(ws);
          return;
        }

        state.isAlive = false;
        ws.ping();
      });
    }, 30000);
    this.pingInterval.unref();

    structuredLogger.info('websocket', 'WebSocket server initialized', { path: '/ws' });
  }

  private handleMessage(ws: WebSocket, state: ClientState, data: string): void {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      this.sendError(ws, 'INVALID_JSON', 'Message is not valid JSON');
      return;
    }

    const parsed = clientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.sendError(ws, 'UNKNOWN_MESSAGE', 'Unknown message type');
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'subscribe':
        state.subscriptions.add(message.channel);
        this.send(ws, { type: 'subscription', payload: { subscribed: message.channel }, timestamp: Date.now() });
        break;

      case 'unsubscribe':
        state.subscriptions.delete(message.channel);
        this.send(ws, { type: 'subscription', payload: { unsubscribed: message.channel }, timestamp: Date.now() });
        break;

      case 'ping':
        this.send(ws, { type: 'pong', payload: {}, timestamp: Date.now() });
        break;
    }
  }

  send<T>(ws: WebSocket, event: WSEvent<T>): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(stringify(event));
    }
  }

  /**
   * Send to every client subscribed to the event type (or to everything)
   */
  broadcast<T>(type: WSEventType, payload: T): void {
    const message = stringify({ type, payload, timestamp: Date.now() });

    this.clients.forEach((state, ws) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (state.subscriptions.size > 0 && !state.subscriptions.has(type)) return;
      ws.send(message);
    });
  }

  sendError(ws: WebSocket, code: string, message: string): void {
    this.send(ws, { type: 'error', payload: { code, message }, timestamp: Date.now() });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  shutdown(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }

    this.clients.forEach((_state, ws) => {
      ws.close();
    });
    this.clients.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    structuredLogger.info('websocket', 'WebSocket server shutdown');
  }

  private removeClient(ws: WebSocket): void {
    this.clients.delete(ws);
    metricsService.setGauge('websocket_connections', this.clients.size);
  }
}

export const websocketService = new WebSocketService();
