/**
 * WebSocket Server
 * Shares the HTTP port. Companion clients get a status snapshot on connect,
 * then every message the voice engine broadcasts; they may send settings
 * updates and sleep requests.
 */

import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import type { Server as HttpServer } from 'http';
import { logger } from '../utils/logger.js';
import { orchestrator, type VoiceStatus } from '../orchestrator/index.js';
import type { ClientMessage, ServerMessage } from '../types/index.js';

const HEARTBEAT_INTERVAL_MS = 30000;

/**
 * The side of the voice engine the socket server talks to
 */
export interface VoiceEventSource {
  getStatus(): VoiceStatus;
  handleClientMessage(message: ClientMessage): void;
  on(event: 'broadcast', handler: (message: ServerMessage) => void): unknown;
  off(event: 'broadcast', handler: (message: ServerMessage) => void): unknown;
}

interface Peer {
  ws: WebSocket;
  alive: boolean;
}

const clientMessageSchema = z.object({
  type: z.enum(['update_settings', 'sleep']),
  payload: z.unknown(),
});

export class VoiceWebSocketServer {
  private wss: WebSocketServer | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private peers: Map<string, Peer> = new Map();
  private peerCount = 0;
  private readonly onBroadcast = (message: ServerMessage): void => this.broadcast(message);

  constructor(
    private readonly source: VoiceEventSource,
    private readonly heartbeatMs: number = HEARTBEAT_INTERVAL_MS
  ) {}

  attach(server: HttpServer): void {
    if (this.wss) return;

    const wss = new WebSocketServer({ server });
    wss.on('connection', (ws) => this.accept(ws));
    this.wss = wss;

    this.source.on('broadcast', this.onBroadcast);
    this.heartbeat = setInterval(() => this.checkPeers(), this.heartbeatMs);
    logger.info('WebSocket', 'Attached to HTTP server');
  }

  stop(): void {
    if (!this.wss) return;

    this.source.off('broadcast', this.onBroadcast);
    if (this.heartbeat) clearInterval(this.heartbeat);
    this.heartbeat = null;

    for (const peer of this.peers.values()) {
      peer.ws.close(1001, 'Server shutting down');
    }
    this.peers.clear();
    this.wss.close();
    this.wss = null;
    logger.info('WebSocket', 'Stopped');
  }

  getClientCount(): number {
    return this.peers.size;
  }

  private accept(ws: WebSocket): void {
    const id = `client_${++this.peerCount}`;
    const peer: Peer = { ws, alive: true };
    this.peers.set(id, peer);
    logger.info('WebSocket', `${id} connected (${this.peers.size} total)`);

    ws.on('pong', () => {
      peer.alive = true;
    });
    ws.on('message', (data) => this.receive(id, data.toString()));
    ws.on('close', () => {
      this.peers.delete(id);
      logger.info('WebSocket', `${id} disconnected`);
    });
    ws.on('error', (err) => {
      logger.error('WebSocket', `${id} socket error`, err);
    });

    this.send(ws, { type: 'state_change', payload: this.source.getStatus(), ts: Date.now() });
  }

  private receive(id: string, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn('WebSocket', `Malformed JSON from ${id}`, err);
      return;
    }

    const parsed = clientMessageSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('WebSocket', `Ignoring invalid message from ${id}`, parsed.error.issues);
      return;
    }

    try {
      this.source.handleClientMessage({ type: parsed.data.type, payload: parsed.data.payload });
    } catch (err) {
      logger.error('WebSocket', `Failed to handle ${parsed.data.type} from ${id}`, err);
    }
  }

  /** Drop peers that did not answer the previous ping */
  private checkPeers(): void {
    for (const [id, peer] of this.peers) {
      if (!peer.alive) {
        logger.warn('WebSocket', `${id} missed a heartbeat, terminating`);
        peer.ws.terminate();
        this.peers.delete(id);
        continue;
      }
      peer.alive = false;
      peer.ws.ping();
    }
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private broadcast(message: ServerMessage): void {
    const data = JSON.stringify(message);
    for (const { ws } of this.peers.values()) {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    }
  }
}

// Singleton instance
export const wsServer = new VoiceWebSocketServer(orchestrator);
