/**
 * TCP Transport
 *
 * Raw socket (plain or TLS) carrying a SOAP subscription with
 * `REUSE_SOCKET`: the controller answers the Subscribe request and then
 * keeps posting events down the same socket.
 */

import net from 'node:net';
import tls from 'node:tls';
import { ERROR_CODES, createIsyError, isIsyError } from '../../IsyProtocol.mjs';
import type { IsyError } from '../../IsyProtocol.mjs';
import { buildSubscribeRequest, buildUnsubscribeRequest } from '../SubscriptionRequests.mjs';
import { TcpEventReader } from './TcpEventReader.mjs';
import { createLogger } from '../../utils/Logger.mjs';
import type {
  EventTransport,
  Logger,
  ResolvedClientConfig,
  TransportHandlers,
} from '../../types.mjs';

interface Pending {
  resolve: () => void;
  reject: (error: IsyError) => void;
}

export class TcpTransport implements EventTransport {
  private readonly config: ResolvedClientConfig;
  private readonly handlers: TransportHandlers;
  private readonly logger: Logger;
  private readonly reader = new TcpEventReader();
  private socket: net.Socket | null = null;
  private pending: Pending | null = null;
  private subscribed = false;
  private closed = false;

  constructor(config: ResolvedClientConfig, handlers: TransportHandlers, logger: Logger) {
    this.config = config;
    this.handlers = handlers;
    this.logger = createLogger('TcpTransport', logger);
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      const { host, port } = this.config;
      this.pending = { resolve, reject };

      const onConnect = () => {
        this.logger.info(`Socket connected to ${host}:${port}`);
        this.settle();
      };
      const socket = this.config.tls
        ? tls.connect({ host, port, rejectUnauthorized: false }, onConnect)
        : net.createConnection({ host, port }, onConnect);
      this.socket = socket;

      socket.on('data', (chunk: Buffer) => this.handleData(chunk));
      socket.on('error', (err: Error) => {
        this.fail(createIsyError(ERROR_CODES.SESSION_FAILED, err.message, err));
      });
      socket.on('close', () => {
        // The controller hangs up right away when all subscriber slots are taken
        const error =
          this.reader.messageCount <= 1
            ? createIsyError(ERROR_CODES.MAX_CONNECTIONS, 'socket closed before any event')
            : createIsyError(ERROR_CODES.SESSION_FAILED, 'socket closed by controller');
        this.fail(error);
      });
    });
  }

  /**
   * Resolves once the controller answers the Subscribe request
   */
  subscribe(streamId: string | null): Promise<void> {
    const socket = this.socket;
    if (!socket || this.closed) {
      return Promise.reject(createIsyError(ERROR_CODES.SESSION_FAILED, 'socket not open'));
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
      this.logger.debug(streamId ? `Resubscribing as ${streamId}` : 'Subscribing');
      socket.write(buildSubscribeRequest(this.config, streamId));
    });
  }

  close(streamId: string | null): void {
    if (this.closed) return;
    this.closed = true;
    this.rejectPending(createIsyError(ERROR_CODES.SESSION_FAILED, 'transport closed'));

    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.destroyed) return;

    if (this.subscribed && streamId) {
      socket.end(buildUnsubscribeRequest(this.config, streamId), () => socket.destroy());
    } else {
      socket.destroy();
    }
  }

  private handleData(chunk: Buffer): void {
    if (this.closed) return;

    let bodies: string[];
    try {
      bodies = this.reader.read(chunk);
    } catch (error) {
      this.fail(
        isIsyError(error) ? error : createIsyError(ERROR_CODES.SESSION_FAILED, null, error)
      );
      return;
    }

    for (const body of bodies) {
      if (this.closed) return;
      if (!this.subscribed && this.pending) {
        this.subscribed = true;
        this.handlers.onFrame(body);
        this.settle();
        continue;
      }
      this.handlers.onFrame(body);
    }
  }

  private settle(): void {
    const pending = this.pending;
    this.pending = null;
    pending?.resolve();
  }

  private rejectPending(error: IsyError): boolean {
    const pending = this.pending;
    this.pending = null;
    if (!pending) return false;
    pending.reject(error);
    return true;
  }

  private fail(error: IsyError): void {
    if (this.closed) return;
    this.closed = true;
    this.socket?.destroy();
    this.socket = null;

    this.logger.warn(error.message);
    if (!this.rejectPending(error)) {
      this.handlers.onClose(error);
    }
  }
}
