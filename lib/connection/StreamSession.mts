/**
 * Stream Session
 *
 * One connection to the event stream: connect, subscribe, then read frames
 * until something breaks. A session never retries; it reports a single
 * error to its owner and stays closed.
 *
 * States: connecting -> subscribing -> live -> closing
 */

import { ERROR_CODES, createIsyError, isIsyError } from '../IsyProtocol.mjs';
import type { IsyError } from '../IsyProtocol.mjs';
import { decodeFrame } from '../messaging/EventDecoder.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type {
  EventTransport,
  IsyEvent,
  Logger,
  ResolvedClientConfig,
  StreamSessionState,
  TransportFactory,
} from '../types.mjs';

// ============================================================================
// Module-specific Types (callbacks)
// ============================================================================

export interface StreamSessionHandlers {
  /** Every decoded event except heartbeats */
  onEvent(event: IsyEvent): void;
  /** Called at most once, after the session went live */
  onError(error: IsyError): void;
  onStateChange?(state: StreamSessionState): void;
}

export interface StreamSessionOptions {
  config: ResolvedClientConfig;
  transportFactory: TransportFactory;
  logger?: Logger;
  /** Stream id of the previous session, for transports that can resume */
  streamId?: string | null;
}

interface PendingOpen {
  resolve: () => void;
  reject: (error: IsyError) => void;
}

export function toSessionError(error: unknown): IsyError {
  if (isIsyError(error)) return error;
  const details = error instanceof Error ? error.message : String(error);
  return createIsyError(ERROR_CODES.SESSION_FAILED, details, error);
}

// ============================================================================
// StreamSession Class
// ============================================================================

export class StreamSession {
  private readonly config: ResolvedClientConfig;
  private readonly transportFactory: TransportFactory;
  private readonly handlers: StreamSessionHandlers;
  private readonly logger: Logger;
  private readonly transportLogger: Logger;
  private transport: EventTransport | null = null;
  private currentState: StreamSessionState = 'connecting';
  private pendingOpen: PendingOpen | null = null;
  private openTimer: ReturnType<typeof setTimeout> | null = null;

  /** Epoch ms of the last frame of any kind */
  lastActivityAt: number | null = null;
  lastHeartbeatAt: number | null = null;
  /** Heartbeat interval the controller announced, in ms */
  heartbeatInterval: number | null = null;
  streamId: string | null;

  constructor(options: StreamSessionOptions, handlers: StreamSessionHandlers) {
    this.config = options.config;
    this.transportFactory = options.transportFactory;
    this.logger = createLogger('StreamSession', options.logger);
    this.transportLogger = options.logger ?? console;
    this.streamId = options.streamId ?? null;
    this.handlers = handlers;
  }

  get state(): StreamSessionState {
    return this.currentState;
  }

  get isLive(): boolean {
    return this.currentState === 'live';
  }

  /**
   * Connect and subscribe. Resolves once live; rejects if the transport
   * fails, the connect timeout passes or close() is called first.
   */
  open(): Promise<void> {
    if (this.transport || this.currentState === 'closing') {
      return Promise.reject(createIsyError(ERROR_CODES.SESSION_FAILED, 'session already used'));
    }

    return new Promise((resolve, reject) => {
      this.pendingOpen = { resolve, reject };
      this.openTimer = setTimeout(() => {
        this.openTimer = null;
        this.fail(
          createIsyError(
            ERROR_CODES.SESSION_FAILED,
            `not subscribed within ${this.config.connectTimeout} ms`
          )
        );
      }, this.config.connectTimeout);

      let transport: EventTransport;
      try {
        transport = this.transportFactory(
          this.config,
          {
            onFrame: (frame) => this.handleFrame(frame),
            onClose: (error) => this.fail(error),
          },
          this.transportLogger
        );
      } catch (error) {
        this.fail(toSessionError(error));
        return;
      }
      this.transport = transport;

      transport
        .open()
        .then(() => {
          if (this.currentState === 'closing') return;
          this.setState('subscribing');
          return transport.subscribe(this.streamId);
        })
        .then(() => {
          if (this.currentState === 'closing') return;
          this.clearOpenTimer();
          this.setState('live');
          const pending = this.pendingOpen;
          this.pendingOpen = null;
          pending?.resolve();
        })
        .catch((error: unknown) => {
          this.fail(toSessionError(error));
        });
    });
  }

  /**
   * Idempotent
   */
  close(): void {
    if (this.currentState === 'closing') return;
    this.teardown();
    this.rejectOpen(createIsyError(ERROR_CODES.SESSION_FAILED, 'session closed while opening'));
  }

  /**
   * Handle a raw frame from the transport
   */
  private handleFrame(frame: string): void {
    if (this.currentState === 'closing') return;
    const now = Date.now();
    this.lastActivityAt = now;

    const event = decodeFrame(frame);
    if (isIsyError(event)) {
      this.logger.warn(event.message);
      this.logger.debug('Dropped frame:', frame);
      return;
    }

    if (event.type === 'heartbeat') {
      this.lastHeartbeatAt = now;
      this.heartbeatInterval = event.interval * 1000;
      this.logger.debug(`Heartbeat #${event.sequence}, next within ${event.interval}s`);
      return;
    }

    if (event.type === 'subscribed') {
      this.streamId = event.streamId;
      this.logger.info(`Subscribed with stream id ${event.streamId}`);
    }

    try {
      this.handlers.onEvent(event);
    } catch (error) {
      this.logger.error(`Error dispatching ${event.type} event:`, error);
    }
  }

  private fail(error: IsyError): void {
    if (this.currentState === 'closing') return;
    this.logger.warn(`Session failed: ${error.message}`);
    this.teardown();

    if (!this.rejectOpen(error)) {
      this.handlers.onError(error);
    }
  }

  private teardown(): void {
    this.clearOpenTimer();
    this.setState('closing');
    const transport = this.transport;
    transport?.close(this.streamId);
  }

  private rejectOpen(error: IsyError): boolean {
    const pending = this.pendingOpen;
    this.pendingOpen = null;
    if (!pending) return false;
    pending.reject(error);
    return true;
  }

  private clearOpenTimer(): void {
    if (this.openTimer) {
      clearTimeout(this.openTimer);
      this.openTimer = null;
    }
  }

  private setState(state: StreamSessionState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.handlers.onStateChange?.(state);
  }
}
