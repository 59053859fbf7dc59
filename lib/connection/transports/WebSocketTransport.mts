/**
 * WebSocket Transport
 *
 * The controller pushes every event as one text message on
 * `/rest/subscribe`; opening the socket is the subscription.
 */

import WebSocket from 'ws';
import { ERROR_CODES, PROTOCOL_CONFIG, createIsyError } from '../../IsyProtocol.mjs';
import type { IsyError } from '../../IsyProtocol.mjs';
import { buildWebSocketHeaders, buildWebSocketUrl } from '../SubscriptionRequests.mjs';
import { createLogger } from '../../utils/Logger.mjs';
import type {
  EventTransport,
  Logger,
  ResolvedClientConfig,
  TransportHandlers,
} from '../../types.mjs';

const HTTP_UNAUTHORIZED = 401;

function toText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class WebSocketTransport implements EventTransport {
  private readonly config: ResolvedClientConfig;
  private readonly handlers: TransportHandlers;
  private readonly logger: Logger;
  private ws: WebSocket | null = null;
  private rejectOpen: ((error: IsyError) => void) | null = null;
  private closed = false;

  constructor(config: ResolvedClientConfig, handlers: TransportHandlers, logger: Logger) {
    this.config = config;
    this.handlers = handlers;
    this.logger = createLogger('WebSocketTransport', logger);
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      const url = buildWebSocketUrl(this.config);
      this.rejectOpen = reject;

      const ws = new WebSocket(url, PROTOCOL_CONFIG.WEBSOCKET.SUBPROTOCOL, {
        origin: PROTOCOL_CONFIG.WEBSOCKET.ORIGIN,
        headers: buildWebSocketHeaders(this.config),
        handshakeTimeout: this.config.connectTimeout,
        perMessageDeflate: false,
        rejectUnauthorized: false,
      });
      this.ws = ws;

      ws.on('open', () => {
        this.logger.info(`WebSocket connected to ${url}`);
        this.rejectOpen = null;
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        if (this.closed) return;
        if (isBinary) {
          this.logger.warn('Dropped binary message; events arrive as text');
          return;
        }
        this.handlers.onFrame(toText(data));
      });

      ws.on('unexpected-response', (_request, response) => {
        const status = response.statusCode ?? 0;
        this.fail(
          status === HTTP_UNAUTHORIZED
            ? createIsyError(ERROR_CODES.AUTH_FAILED, `HTTP ${status}`)
            : createIsyError(ERROR_CODES.SESSION_FAILED, `HTTP ${status} on upgrade`)
        );
      });

      ws.on('error', (err: Error) => {
        this.fail(createIsyError(ERROR_CODES.SESSION_FAILED, err.message, err));
      });

      ws.on('close', (code: number, reason: Buffer) => {
        const reasonStr = reason.toString() || 'No reason';
        this.fail(createIsyError(ERROR_CODES.SESSION_FAILED, `closed ${code} (${reasonStr})`));
      });
    });
  }

  /**
   * Nothing to send; the upgrade request subscribed us
   */
  subscribe(_streamId: string | null): Promise<void> {
    if (this.closed) {
      return Promise.reject(createIsyError(ERROR_CODES.SESSION_FAILED, 'socket not open'));
    }
    return Promise.resolve();
  }

  close(_streamId: string | null): void {
    if (this.closed) return;
    this.closed = true;
    this.settleOpen(createIsyError(ERROR_CODES.SESSION_FAILED, 'transport closed'));
    this.shutdown();
  }

  private fail(error: IsyError): void {
    if (this.closed) return;
    this.closed = true;
    this.shutdown();

    this.logger.warn(error.message);
    if (!this.settleOpen(error)) {
      this.handlers.onClose(error);
    }
  }

  private settleOpen(error: IsyError): boolean {
    const reject = this.rejectOpen;
    this.rejectOpen = null;
    if (!reject) return false;
    reject(error);
    return true;
  }

  private shutdown(): void {
    const ws = this.ws;
    this.ws = null;
    if (!ws) return;
    if (ws.readyState === WebSocket.OPEN) {
      ws.close();
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }
  }
}
