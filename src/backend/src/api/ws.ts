import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { TableEvent, TableSnapshot } from '../engine/state.js';
import { logger } from '../utils/logger.js';

export type WebSocketMessage =
  | TableEvent
  | { type: 'state'; state: TableSnapshot }
  | { type: 'error'; message: string; context?: { phase?: string; operation?: string } };

export class EventsBroadcaster {
  private wss: WebSocketServer | null = null;

  initialize(server: Server, getState: () => TableSnapshot): void {
    this.wss = new WebSocketServer({
      server,
      path: '/events'
    });

    this.wss.on('connection', (ws: WebSocket) => {
      logger.info('Client connected to events WebSocket');

      // Send current state on connection
      this.sendToClient(ws, { type: 'state', state: getState() });

      ws.on('close', () => {
        logger.info('Client disconnected from events WebSocket');
      });

      ws.on('error', (error) => {
        logger.error('WebSocket error:', error);
      });
    });
  }

  private sendToClient(ws: WebSocket, message: WebSocketMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    try {
      ws.send(JSON.stringify({ ...message, timestamp: Date.now() }));
    } catch (error) {
      logger.error('Error sending WebSocket message:', error, 'Message type:', message.type);
    }
  }

  broadcast(message: WebSocketMessage): void {
    if (!this.wss) {
      logger.debug('WebSocketServer not initialized - dropping message:', message.type);
      return;
    }

    const connectedClients = Array.from(this.wss.clients).filter(client => client.readyState === WebSocket.OPEN);
    logger.debug(`Broadcasting ${message.type} to ${connectedClients.length} connected clients`);
    for (const client of connectedClients) {
      this.sendToClient(client, message);
    }
  }

  close(): void {
    this.wss?.close();
    this.wss = null;
  }
}

export const eventsBroadcaster = new EventsBroadcaster();
