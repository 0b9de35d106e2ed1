/**
 * Connectivity monitor
 *
 * Holds a WebSocket to the backend and treats an authenticated socket as
 * "online". Emits `online` when the link comes up and `offline` when it
 * drops; reconnects on a fixed delay until stopped.
 */

import { EventEmitter } from 'events';
import { WebSocket, type RawData } from 'ws';
import { z } from 'zod';
import type { TokenProvider } from './api-client.js';
import { getLogger } from '../utils/logger.js';
import { toError } from '../../../shared/errors.js';

const logger = getLogger('Connectivity');

const serverMessageSchema = z.object({
  type: z.string(),
  message: z.string().optional(),
}).passthrough();

export type ServerMessage = z.infer<typeof serverMessageSchema>;

export interface ConnectivityOptions {
  reconnectDelayMs?: number;
  connectTimeoutMs?: number;
}

export interface ConnectivityEvents {
  online: [];
  offline: [];
  message: [ServerMessage];
}

export class ConnectivityMonitor extends EventEmitter<ConnectivityEvents> {
  private readonly wsUrl: string;
  private ws: WebSocket | null = null;
  private connected = false;
  private stopped = true;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private readonly reconnectDelayMs: number;
  private readonly connectTimeoutMs: number;

  constructor(
    apiUrl: string,
    private readonly tokenProvider: TokenProvider,
    options: ConnectivityOptions = {}
  ) {
    super();
    this.wsUrl = apiUrl.replace(/\/$/, '').replace(/^http/, 'ws') + '/ws';
    this.reconnectDelayMs = options.reconnectDelayMs ?? 5000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
  }

  isOnline(): boolean {
    return this.connected;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.connect().catch(err => {
      logger.debug('Initial connection failed', { error: toError(err).message });
    });
  }

  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.close();
      this.ws = null;
    }
    this.setConnected(false);
  }

  /** Resolves once the backend has acknowledged the token. */
  connect(): Promise<void> {
    if (!this.tokenProvider.isTokenValid()) {
      this.scheduleReconnect();
      return Promise.reject(new Error('No valid token for realtime connection'));
    }

    return new Promise((resolve, reject) => {
      const url = `${this.wsUrl}?token=${encodeURIComponent(this.tokenProvider.getToken())}`;
      const ws = new WebSocket(url);
      this.ws = ws;

      const timeout = setTimeout(() => {
        ws.terminate();
        reject(new Error('Connection timeout'));
      }, this.connectTimeoutMs);

      ws.on('message', (data: RawData) => {
        const message = this.parse(data);
        if (!message) return;

        if (message.type === 'AUTH_OK') {
          clearTimeout(timeout);
          this.setConnected(true);
          resolve();
        } else if (message.type === 'AUTH_FAIL') {
          clearTimeout(timeout);
          reject(new Error(message.message ?? 'Authentication failed'));
          ws.close();
        } else {
          this.emit('message', message);
        }
      });

      ws.on('close', () => {
        clearTimeout(timeout);
        if (this.ws === ws) this.ws = null;
        this.setConnected(false);
        this.scheduleReconnect();
      });

      ws.on('error', err => {
        clearTimeout(timeout);
        logger.debug('WebSocket error', { error: err.message });
        reject(err);
      });
    });
  }

  private parse(data: RawData): ServerMessage | null {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch (error) {
      logger.warn('Failed to parse server message', { error: toError(error).message });
      return null;
    }
    const parsed = serverMessageSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private setConnected(connected: boolean): void {
    if (this.connected === connected) return;
    this.connected = connected;
    logger.info(connected ? 'Backend reachable' : 'Backend unreachable');
    this.emit(connected ? 'online' : 'offline');
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch(err => {
        logger.debug('Reconnection failed', { error: toError(err).message });
      });
    }, this.reconnectDelayMs);
  }
}
