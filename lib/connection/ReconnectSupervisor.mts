/**
 * Reconnection Supervisor
 *
 * Keeps exactly one Stream Session alive. A session error or a silent
 * stream (no frame inside the watchdog window) moves the supervisor to
 * `degraded`; after a backoff delay a fresh session is opened. Subscribers
 * live in the Notification Fabric, so they survive every reconnect.
 *
 *   disconnected -> connecting -> subscribing -> live
 *        ^                                        |
 *        +---- (gave up) <--- degraded <----------+
 */

import { ERROR_CODES, createIsyError } from '../IsyProtocol.mjs';
import type { IsyError } from '../IsyProtocol.mjs';
import { NotificationFabric } from '../events/NotificationFabric.mjs';
import { createLogger } from '../utils/Logger.mjs';
import { StreamSession, toSessionError } from './StreamSession.mjs';
import type {
  BackoffConfig,
  ConnectionStatus,
  IsyEvent,
  Logger,
  ResolvedClientConfig,
  SessionState,
  TransportFactory,
} from '../types.mjs';

// ============================================================================
// Module-specific Types
// ============================================================================

export interface ReconnectSupervisorOptions {
  config: ResolvedClientConfig;
  transportFactory: TransportFactory;
  fabric: NotificationFabric;
  logger?: Logger;
  /** Receives every decoded event from the live session */
  onEvent: (event: IsyEvent) => void;
  /** Runs before each reconnect attempt (not the first connect) */
  beforeReconnect?: () => Promise<void>;
}

interface Waiter {
  resolve: () => void;
  reject: (error: IsyError) => void;
}

const MIN_WATCHDOG_TICK = 5;
const MAX_WATCHDOG_TICK = 1000;

/**
 * Delay before reconnect attempt `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  backoff: BackoffConfig,
  random: () => number = Math.random
): number {
  const exponential = Math.min(
    backoff.initialDelay * Math.pow(backoff.multiplier, Math.max(0, attempt - 1)),
    backoff.maxDelay
  );
  const jitter = exponential * backoff.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential + jitter));
}

// ============================================================================
// ReconnectSupervisor Class
// ============================================================================

export class ReconnectSupervisor {
  private readonly config: ResolvedClientConfig;
  private readonly transportFactory: TransportFactory;
  private readonly fabric: NotificationFabric;
  private readonly logger: Logger;
  private readonly sessionLogger?: Logger;
  private readonly onEvent: (event: IsyEvent) => void;
  private readonly beforeReconnect?: () => Promise<void>;

  private session: StreamSession | null = null;
  private currentState: SessionState = 'disconnected';
  private connectionStatus: ConnectionStatus = 'disconnected';
  private autoReconnect: boolean;
  private started = false;
  private opening = false;
  private closed = false;
  private attempt = 0;
  private streamId: string | null = null;
  private liveSince = 0;
  private waiters: Waiter[] = [];

  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private watchdogTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ReconnectSupervisorOptions) {
    this.config = options.config;
    this.transportFactory = options.transportFactory;
    this.fabric = options.fabric;
    this.logger = createLogger('ReconnectSupervisor', options.logger);
    this.sessionLogger = options.logger;
    this.onEvent = options.onEvent;
    this.beforeReconnect = options.beforeReconnect;
    this.autoReconnect = options.config.autoReconnect;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get status(): ConnectionStatus {
    return this.connectionStatus;
  }

  get isLive(): boolean {
    return this.currentState === 'live';
  }

  /**
   * Consecutive failed attempts since the last live session
   */
  get failedAttempts(): number {
    return this.attempt;
  }

  get autoReconnectEnabled(): boolean {
    return this.autoReconnect;
  }

  /**
   * Window without frames after which the stream counts as dead
   */
  get watchdogWindow(): number {
    const announced = this.session?.heartbeatInterval;
    const fromHeartbeat = announced ? announced + this.config.heartbeatGrace : 0;
    return Math.max(this.config.watchdogInterval, fromHeartbeat);
  }

  /**
   * Open the first session. Resolves once live; rejects if the supervisor
   * gives up or is closed first. Failed attempts keep retrying in the
   * background while auto-reconnect is on.
   *
   * Once the supervisor has stopped by itself (retries exhausted, or a drop
   * with auto-reconnect off) this rejects right away; reconnect() resumes.
   */
  start(): Promise<void> {
    if (this.closed) {
      return Promise.reject(createIsyError(ERROR_CODES.SESSION_FAILED, 'supervisor closed'));
    }
    if (this.started && this.isStopped()) {
      return Promise.reject(
        createIsyError(ERROR_CODES.SESSION_FAILED, 'stopped; call reconnect() to resume')
      );
    }
    const live = this.waitForLive();
    if (!this.started) {
      this.started = true;
      this.connect();
    }
    return live;
  }

  /**
   * Stop reconnecting. The current session, if any, keeps running.
   */
  disableAutoReconnect(): void {
    this.autoReconnect = false;
    this.clearReconnectTimer();
    if (this.currentState === 'degraded') {
      this.setState('disconnected');
      this.publishStatus('disconnected');
    }
    this.logger.info('Auto-reconnect disabled');
  }

  /**
   * Re-enable auto-reconnect and, unless a session is already live or
   * opening, connect right away
   */
  reconnect(): void {
    if (this.closed) return;
    this.autoReconnect = true;
    this.started = true;
    this.attempt = 0;

    if (this.session || this.reconnectTimer || this.opening) {
      return;
    }
    this.logger.info('Manual reconnect requested');
    this.publishStatus('reconnecting');
    this.connect();
  }

  /**
   * Tear everything down. No timer or session survives this call.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.clearReconnectTimer();
    this.stopWatchdog();

    const session = this.session;
    this.session = null;
    if (session) {
      this.setState('closing');
      session.close();
    }
    this.setState('disconnected');
    this.publishStatus('disconnected');
    this.rejectWaiters(createIsyError(ERROR_CODES.SESSION_FAILED, 'supervisor closed'));
  }

  // ===========================================================================
  // Connect / Fail Cycle
  // ===========================================================================

  private connect(): void {
    this.opening = true;
    this.openSession()
      .catch((error: unknown) => {
        this.logger.error('Unexpected error while opening session:', error);
      })
      .finally(() => {
        this.opening = false;
      });
  }

  private async openSession(): Promise<void> {
    if (this.closed) return;
    this.setState('connecting');

    if (this.attempt > 0 && this.beforeReconnect) {
      try {
        await this.beforeReconnect();
      } catch (error) {
        this.logger.warn('Re-seed before reconnect failed:', error);
      }
      if (this.closed) return;
    }

    const session = new StreamSession(
      {
        config: this.config,
        transportFactory: this.transportFactory,
        logger: this.sessionLogger,
        streamId: this.streamId,
      },
      {
        onEvent: (event) => {
          if (event.type === 'subscribed') {
            this.streamId = event.streamId;
          }
          this.onEvent(event);
        },
        onError: (error) => this.handleFailure(session, error),
        onStateChange: (state) => {
          if (state === 'subscribing' && this.session === session) {
            this.setState('subscribing');
          }
        },
      }
    );
    this.session = session;

    try {
      await session.open();
    } catch (error) {
      this.handleFailure(session, toSessionError(error));
      return;
    }
    if (this.session !== session || this.closed) return;

    this.attempt = 0;
    this.liveSince = Date.now();
    this.setState('live');
    this.publishStatus('connected');
    this.startWatchdog(session);
    this.resolveWaiters();
  }

  private handleFailure(session: StreamSession, error: IsyError): void {
    if (this.session !== session || this.closed) return;
    this.session = null;
    this.stopWatchdog();
    session.close();

    this.logger.warn(`Event stream lost: ${error.message}`);
    this.setState('degraded');
    this.scheduleReconnect(error);
  }

  private scheduleReconnect(error: IsyError): void {
    if (!this.autoReconnect) {
      this.setState('disconnected');
      this.publishStatus('disconnected', error);
      return;
    }

    this.attempt++;
    const { maxRetries } = this.config;
    if (maxRetries !== null && this.attempt > maxRetries) {
      const exhausted = createIsyError(
        ERROR_CODES.RECONNECT_EXHAUSTED,
        `${maxRetries} retries failed`,
        error
      );
      this.logger.error(exhausted.message);
      this.setState('disconnected');
      this.publishStatus('failed', exhausted);
      this.rejectWaiters(exhausted);
      return;
    }

    const delay = computeBackoffDelay(this.attempt, this.config.backoff);
    this.logger.info(`Reconnecting in ${delay} ms (attempt ${this.attempt})`);
    this.publishStatus('reconnecting', error);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  // ===========================================================================
  // Watchdog
  // ===========================================================================

  private startWatchdog(session: StreamSession): void {
    this.stopWatchdog();
    const tick = Math.min(
      MAX_WATCHDOG_TICK,
      Math.max(MIN_WATCHDOG_TICK, Math.floor(this.config.watchdogInterval / 4))
    );

    this.watchdogTimer = setInterval(() => {
      if (this.session !== session) return;
      const lastActivity = session.lastActivityAt ?? this.liveSince;
      const silence = Date.now() - Math.max(lastActivity, this.liveSince);
      const limit = this.watchdogWindow;
      if (silence > limit) {
        this.handleFailure(
          session,
          createIsyError(ERROR_CODES.HEARTBEAT_TIMEOUT, `no frame for ${silence} ms (window ${limit} ms)`)
        );
      }
    }, tick);
  }

  private stopWatchdog(): void {
    if (this.watchdogTimer) {
      clearInterval(this.watchdogTimer);
      this.watchdogTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ===========================================================================
  // Feeds and Waiters
  // ===========================================================================

  private setState(state: SessionState): void {
    if (this.currentState === state) return;
    const previous = this.currentState;
    this.currentState = state;
    this.logger.debug(`${previous} -> ${state}`);
    this.fabric.publish('sessionState', { previous, current: state });
  }

  /**
   * Connection status is published only when it changes
   */
  private publishStatus(status: ConnectionStatus, error?: IsyError): void {
    if (this.connectionStatus === status) return;
    this.connectionStatus = status;
    this.fabric.publish('connection', {
      status,
      state: this.currentState,
      attempt: this.attempt,
      ...(error ? { error } : {}),
    });
  }

  private isStopped(): boolean {
    return (
      this.currentState === 'disconnected' &&
      this.session === null &&
      this.reconnectTimer === null &&
      !this.opening
    );
  }

  private waitForLive(): Promise<void> {
    if (this.currentState === 'live') return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private resolveWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  private rejectWaiters(error: IsyError): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }
}
