/**
 * ISY Event Client - Facade
 *
 * Main entry point: one instance per controller. Wires the Notification
 * Fabric, Shadow Tree, Event Dispatcher and Reconnection Supervisor
 * together around a single config and logger.
 *
 * @example
 * const client = new IsyEventClient({ host: '10.0.0.5', username: 'admin', password: 'secret' });
 * client.seed(entries);
 * client.onStatus('1A 2B 3C 1', (change) => console.log(change.current));
 * await client.start();
 */

import { CLIENT_CONFIG, ERROR_CODES, PROTOCOL_CONFIG, createIsyError, type IsyError } from '../IsyProtocol.mjs';
import { NotificationFabric, entityScope } from '../events/NotificationFabric.mjs';
import type { FeedEvents, FeedName } from '../events/NotificationFabric.mjs';
import { EventDispatcher } from '../messaging/EventDispatcher.mjs';
import { ShadowTree } from '../state/ShadowTree.mjs';
import type { SeedResult } from '../state/ShadowTree.mjs';
import { createLogger } from '../utils/Logger.mjs';
import { ReconnectSupervisor } from './ReconnectSupervisor.mjs';
import { TcpTransport } from './transports/TcpTransport.mjs';
import { WebSocketTransport } from './transports/WebSocketTransport.mjs';
import type {
  ConnectionStatus,
  ConnectionStatusEvent,
  ControlReceived,
  EntityChange,
  EntityKind,
  EntitySnapshot,
  IsyClientConfig,
  Listener,
  Logger,
  ResolvedClientConfig,
  SeedEntry,
  SessionState,
  SessionStateChange,
  SnapshotSource,
  StatusChange,
  SubscriptionHandle,
  SystemEvent,
  TransportFactory,
  TransportKind,
} from '../types.mjs';

const TRANSPORTS: readonly TransportKind[] = ['websocket', 'tcp'];

// ============================================================================
// Configuration
// ============================================================================

function invalid(details: string): IsyError {
  return createIsyError(ERROR_CODES.INVALID_CONFIG, details);
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalid(`${name} must be a positive number`);
  }
  return value;
}

function normalizeWebroot(webroot: string | undefined): string {
  const trimmed = (webroot ?? '').trim().replace(/\/+$/, '');
  if (trimmed === '') return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Apply defaults and validate. Throws INVALID_CONFIG.
 */
export function resolveConfig(config: IsyClientConfig): ResolvedClientConfig {
  if (typeof config.host !== 'string' || config.host.trim() === '') {
    throw invalid('host is required');
  }
  if (typeof config.username !== 'string' || typeof config.password !== 'string') {
    throw invalid('username and password are required');
  }

  const transport = config.transport ?? 'websocket';
  if (!TRANSPORTS.includes(transport)) {
    throw invalid(`unknown transport ${String(transport)}`);
  }

  const tls = config.tls ?? false;
  const port = config.port ?? (tls ? PROTOCOL_CONFIG.PORTS.HTTPS : PROTOCOL_CONFIG.PORTS.HTTP);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw invalid(`port ${port} is out of range`);
  }

  const backoff = {
    initialDelay: PROTOCOL_CONFIG.BACKOFF.INITIAL_DELAY,
    multiplier: PROTOCOL_CONFIG.BACKOFF.MULTIPLIER,
    maxDelay: PROTOCOL_CONFIG.BACKOFF.MAX_DELAY,
    jitter: PROTOCOL_CONFIG.BACKOFF.JITTER,
    ...config.backoff,
  };
  requirePositive('backoff.initialDelay', backoff.initialDelay);
  requirePositive('backoff.maxDelay', backoff.maxDelay);
  if (!Number.isFinite(backoff.multiplier) || backoff.multiplier < 1) {
    throw invalid('backoff.multiplier must be at least 1');
  }
  if (!Number.isFinite(backoff.jitter) || backoff.jitter < 0 || backoff.jitter > 1) {
    throw invalid('backoff.jitter must be between 0 and 1');
  }

  const maxRetries = config.maxRetries ?? null;
  if (maxRetries !== null && (!Number.isInteger(maxRetries) || maxRetries < 0)) {
    throw invalid('maxRetries must be a non-negative integer');
  }

  const heartbeatGrace = config.heartbeatGrace ?? PROTOCOL_CONFIG.TIMEOUTS.HEARTBEAT_GRACE;
  if (!Number.isFinite(heartbeatGrace) || heartbeatGrace < 0) {
    throw invalid('heartbeatGrace must not be negative');
  }

  return {
    host: config.host.trim(),
    port,
    username: config.username,
    password: config.password,
    transport,
    tls,
    webroot: normalizeWebroot(config.webroot),
    watchdogInterval: requirePositive(
      'watchdogInterval',
      config.watchdogInterval ?? PROTOCOL_CONFIG.TIMEOUTS.WATCHDOG
    ),
    heartbeatGrace,
    connectTimeout: requirePositive(
      'connectTimeout',
      config.connectTimeout ?? PROTOCOL_CONFIG.TIMEOUTS.CONNECT
    ),
    backoff,
    maxRetries,
    autoReconnect: config.autoReconnect ?? true,
    reseedOnReconnect: config.reseedOnReconnect ?? false,
  };
}

/**
 * Picks the built-in transport named in the config
 */
export const defaultTransportFactory: TransportFactory = (config, handlers, logger) =>
  config.transport === 'tcp'
    ? new TcpTransport(config, handlers, logger)
    : new WebSocketTransport(config, handlers, logger);

// ============================================================================
// IsyEventClient Class
// ============================================================================

export class IsyEventClient {
  readonly config: ResolvedClientConfig;

  // Modules
  private readonly fabric: NotificationFabric;
  private readonly tree: ShadowTree;
  private readonly dispatcher: EventDispatcher;
  private readonly supervisor: ReconnectSupervisor;

  private readonly snapshotSource?: SnapshotSource;
  private readonly logger: Logger;

  constructor(config: IsyClientConfig) {
    this.config = resolveConfig(config);
    this.snapshotSource = config.snapshotSource;
    this.logger = createLogger('IsyEventClient', config.logger);

    this.fabric = new NotificationFabric(config.logger);
    this.tree = new ShadowTree(this.fabric, config.logger);
    this.dispatcher = new EventDispatcher(this.tree, this.fabric, config.logger);

    const reseed =
      this.config.reseedOnReconnect && this.snapshotSource
        ? async () => {
            await this.loadSnapshot();
          }
        : undefined;

    this.supervisor = new ReconnectSupervisor({
      config: this.config,
      transportFactory: config.transportFactory ?? defaultTransportFactory,
      fabric: this.fabric,
      logger: config.logger,
      onEvent: (event) => this.dispatcher.dispatch(event),
      beforeReconnect: reseed,
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Seed the shadow tree from snapshot entries
   */
  seed(entries: readonly SeedEntry[]): SeedResult {
    return this.tree.seed(entries);
  }

  /**
   * Fetch a snapshot from the configured source and seed it
   */
  async loadSnapshot(): Promise<SeedResult> {
    if (!this.snapshotSource) {
      throw invalid('no snapshotSource configured');
    }
    const entries = await this.snapshotSource.fetchSnapshot();
    return this.tree.seed(entries);
  }

  /**
   * Connect to the event stream. Seeds from the snapshot source first when
   * the tree is still empty. Resolves once the stream is live.
   */
  async start(): Promise<void> {
    if (this.snapshotSource && this.tree.size === 0) {
      await this.loadSnapshot();
    }
    this.logger.info(
      `${CLIENT_CONFIG.NAME} v${CLIENT_CONFIG.VERSION} connecting to ${this.config.host}:${this.config.port} (${this.config.transport})`
    );
    return this.supervisor.start();
  }

  /**
   * Stop everything. Subscriptions are kept but will not fire again.
   */
  close(): void {
    this.supervisor.close();
  }

  disableAutoReconnect(): void {
    this.supervisor.disableAutoReconnect();
  }

  reconnect(): void {
    this.supervisor.reconnect();
  }

  get connectionStatus(): ConnectionStatus {
    return this.supervisor.status;
  }

  get sessionState(): SessionState {
    return this.supervisor.state;
  }

  get isConnected(): boolean {
    return this.supervisor.isLive;
  }

  // ===========================================================================
  // Public API - Entity Access
  // ===========================================================================

  lookup(address: string, kind?: EntityKind): EntitySnapshot | undefined {
    return this.tree.lookup(address, kind);
  }

  entities(kind?: EntityKind): EntitySnapshot[] {
    return this.tree.entities(kind);
  }

  get size(): number {
    return this.tree.size;
  }

  // ===========================================================================
  // Public API - Feeds
  // ===========================================================================

  /**
   * Status changes for one entity. Without a kind, the kind of the seeded
   * entity at that address is used (nodes if none is known yet).
   */
  onStatus(address: string, listener: Listener<StatusChange>, kind?: EntityKind): SubscriptionHandle {
    return this.fabric.subscribe('status', listener, this.scopeFor(address, kind));
  }

  onControl(
    address: string,
    listener: Listener<ControlReceived>,
    kind?: EntityKind
  ): SubscriptionHandle {
    return this.fabric.subscribe('control', listener, this.scopeFor(address, kind));
  }

  onEntityChanged(listener: Listener<EntityChange>): SubscriptionHandle {
    return this.fabric.subscribe('entityChanged', listener);
  }

  onConnection(listener: Listener<ConnectionStatusEvent>): SubscriptionHandle {
    return this.fabric.subscribe('connection', listener);
  }

  onSystem(listener: Listener<SystemEvent>): SubscriptionHandle {
    return this.fabric.subscribe('system', listener);
  }

  onSessionState(listener: Listener<SessionStateChange>): SubscriptionHandle {
    return this.fabric.subscribe('sessionState', listener);
  }

  /**
   * Generic form; without a scope the listener hears every entity
   */
  subscribe<F extends FeedName>(
    feed: F,
    listener: Listener<FeedEvents[F]>,
    scope?: string
  ): SubscriptionHandle {
    return this.fabric.subscribe(feed, listener, scope);
  }

  unsubscribe(handle: SubscriptionHandle): void {
    this.fabric.unsubscribe(handle);
  }

  private scopeFor(address: string, kind?: EntityKind): string {
    return entityScope(kind ?? this.tree.lookup(address)?.kind ?? 'node', address);
  }
}
