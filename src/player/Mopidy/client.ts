import WebSocket from 'ws';
import logger from '../../utils/bridgelogger';
import { PlayerRequestError } from '../playerTypes';
import { isRecord } from './stateMapper';
import { ConnectionState, EventCallback, MopidyEventMessage, RpcRequest } from './types';

export interface MopidyClientOptions {
  host: string;
  port: number;
  path?: string;
  requestTimeoutMs: number;
  /** Delay before reconnecting after a dropped connection; 0 disables reconnects. */
  reconnectDelayMs?: number;
}

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: PlayerRequestError) => void;
  timer: NodeJS.Timeout;
}

const HEARTBEAT_INTERVAL_MS = 10_000;
const HEARTBEAT_TIMEOUT_MS = 30_000;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Minimal Mopidy JSON-RPC client over the core websocket endpoint.
 * Owns connection lifecycle, request correlation and per-request timeouts; the player class
 * keeps the high-level mapping.
 */
export default class MopidyClient {
  private ws?: WebSocket;
  private state: ConnectionState = ConnectionState.DISCONNECTED;
  private nextMsgId = 0;
  private closing = false;
  private everConnected = false;

  private pending = new Map<number, PendingRequest>();
  private eventHandlers = new Set<EventCallback>();

  private reconnectTimer?: NodeJS.Timeout;
  private heartbeatTimer?: NodeJS.Timeout;
  private lastPong: number = Date.now();

  constructor(private readonly options: MopidyClientOptions) {}

  get url(): string {
    return `ws://${this.options.host}:${this.options.port}${this.options.path ?? '/mopidy/ws'}`;
  }

  /** Connect to the Mopidy websocket endpoint, installing heartbeat & reconnection hooks. */
  connect(): Promise<void> {
    this.closing = false;
    return new Promise((resolve, reject) => {
      const url = this.url;
      this.state = ConnectionState.CONNECTING;
      const ws = new WebSocket(url);

      let opened = false;

      ws.on('open', () => {
        this.ws = ws;
        this.state = ConnectionState.CONNECTED;
        this.everConnected = true;
        opened = true;
        logger.info(`[Mopidy] Connected to ${url}`);

        this.lastPong = Date.now();
        ws.on('pong', () => (this.lastPong = Date.now()));
        this.heartbeatTimer = setInterval(() => {
          if (Date.now() - this.lastPong > HEARTBEAT_TIMEOUT_MS) {
            logger.warn('[Mopidy] Heartbeat lost, terminating connection');
            ws.terminate();
            return;
          }
          ws.ping();
        }, HEARTBEAT_INTERVAL_MS);

        resolve();
      });

      ws.on('close', () => {
        this.state = ConnectionState.DISCONNECTED;
        if (this.ws === ws) this.ws = undefined;
        if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
        this.rejectPending('Connection closed');

        if (!opened) return;
        logger.warn('[Mopidy] Connection closed');
        this.scheduleReconnect();
      });

      ws.on('error', (err) => {
        logger.error(`[Mopidy] Connection error: ${err.message}`);
        if (!opened) reject(err);
      });

      ws.on('message', (buf) => this.onMessage(buf));
    });
  }

  /** Gracefully tear down the client. Pending requests are rejected. */
  cleanup(): void {
    this.closing = true;
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.ws?.terminate();
    this.ws = undefined;
    this.state = ConnectionState.DISCONNECTED;
    this.rejectPending('Connection closed');
  }

  /** Perform a JSON-RPC call against the Mopidy core. */
  rpc(method: string, params?: Record<string, unknown>): Promise<unknown> {
    const ws = this.ws;
    if (!ws || this.state !== ConnectionState.CONNECTED || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new PlayerRequestError(method, 'Not connected'));
    }

    const id = ++this.nextMsgId;
    const payload: RpcRequest = params ? { jsonrpc: '2.0', id, method, params } : { jsonrpc: '2.0', id, method };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new PlayerRequestError(method, `Timed out after ${this.options.requestTimeoutMs} ms`));
      }, this.options.requestTimeoutMs);

      this.pending.set(id, { method, resolve, reject, timer });
      try {
        ws.send(JSON.stringify(payload));
      } catch (error) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(new PlayerRequestError(method, errorMessage(error)));
      }
    });
  }

  /** Subscribe to raw Mopidy core events. Returns an unsubscribe function. */
  onEvent(cb: EventCallback): () => void {
    this.eventHandlers.add(cb);
    return () => {
      this.eventHandlers.delete(cb);
    };
  }

  private scheduleReconnect(): void {
    const delay = this.options.reconnectDelayMs ?? 0;
    if (this.closing || !this.everConnected || delay <= 0) return;

    this.reconnectTimer = setTimeout(() => {
      this.connect().catch((error: unknown) => {
        logger.warn(`[Mopidy] Reconnect failed: ${errorMessage(error)}`);
        this.scheduleReconnect();
      });
    }, delay);
  }

  private rejectPending(reason: string): void {
    this.pending.forEach((request) => {
      clearTimeout(request.timer);
      request.reject(new PlayerRequestError(request.method, reason));
    });
    this.pending.clear();
  }

  private onMessage(buf: WebSocket.RawData) {
    let msg: unknown;
    try {
      msg = JSON.parse(buf.toString());
    } catch {
      logger.debug('[Mopidy] Ignoring non-JSON frame');
      return;
    }
    if (!isRecord(msg)) return;

    if (typeof msg.event === 'string') {
      this.dispatchEvent({ ...msg, event: msg.event });
      return;
    }

    if (typeof msg.id !== 'number') return;
    const waiter = this.pending.get(msg.id);
    if (!waiter) return;
    this.pending.delete(msg.id);
    clearTimeout(waiter.timer);

    if (isRecord(msg.error)) {
      const message = typeof msg.error.message === 'string' ? msg.error.message : 'Unknown error';
      waiter.reject(new PlayerRequestError(waiter.method, message));
      return;
    }

    waiter.resolve(msg.result);
  }

  private dispatchEvent(evt: MopidyEventMessage) {
    for (const handler of this.eventHandlers) {
      try {
        handler(evt);
      } catch (error) {
        logger.error(`[Mopidy] Event callback error: ${errorMessage(error)}`);
      }
    }
  }
}
