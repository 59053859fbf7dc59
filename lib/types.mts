/**
 * ISY Event Shadow - Shared TypeScript Interfaces
 *
 * This file contains all shared type definitions used across the library.
 * All modules should import types from here to avoid duplication.
 */

import type {
  IsyError,
  SystemStatusValue,
} from './IsyProtocol.mjs';

// =============================================================================
// Logging
// =============================================================================

/**
 * Leveled logger. The default implementation writes to the console with a
 * `[Component]` prefix; applications may pass their own.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

// =============================================================================
// Configuration Types
// =============================================================================

export type TransportKind = 'websocket' | 'tcp';

/**
 * Reconnect backoff settings (all times in ms)
 */
export interface BackoffConfig {
  initialDelay: number;
  multiplier: number;
  maxDelay: number;
  /** Fraction of the delay to randomize, 0 disables jitter */
  jitter: number;
}

/**
 * Configuration for initializing the IsyEventClient
 */
export interface IsyClientConfig {
  /** Hostname or IP address of the controller */
  host: string;
  /** Port (default: 80, or 443 with tls) */
  port?: number;
  username: string;
  password: string;
  /** Event stream transport (default: websocket) */
  transport?: TransportKind;
  tls?: boolean;
  /** Path prefix when the controller sits behind a proxy */
  webroot?: string;
  logger?: Logger;
  /** Window without any frame before the stream is considered dead */
  watchdogInterval?: number;
  /** Added to the heartbeat interval the controller announces */
  heartbeatGrace?: number;
  connectTimeout?: number;
  backoff?: Partial<BackoffConfig>;
  /** Give up after this many consecutive failed attempts (default: never) */
  maxRetries?: number;
  autoReconnect?: boolean;
  /** Fetch and seed a fresh snapshot before every reconnect */
  reseedOnReconnect?: boolean;
  snapshotSource?: SnapshotSource;
  /** Replaces the built-in transports */
  transportFactory?: TransportFactory;
}

/**
 * Configuration after defaults are applied
 */
export interface ResolvedClientConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  transport: TransportKind;
  tls: boolean;
  webroot: string;
  watchdogInterval: number;
  heartbeatGrace: number;
  connectTimeout: number;
  backoff: BackoffConfig;
  maxRetries: number | null;
  autoReconnect: boolean;
  reseedOnReconnect: boolean;
}

// =============================================================================
// Entity Types
// =============================================================================

export type EntityKind = 'node' | 'group' | 'program' | 'folder' | 'variable';

/**
 * Static capability tags; control codes resolve against these at apply time
 */
export type Capability = 'switchable' | 'dimmable' | 'runnable' | 'settable';

export type StatusValue = number | boolean | null;

/**
 * Unit of measure code as reported by the controller, or `null` when the
 * controller never sent one. An explicit `"0"` is a reported unit.
 */
export type UnitOfMeasure = string | null;

/**
 * Result of a control event or an aux property report
 */
export interface NodeProperty {
  control: string;
  value: number | null;
  uom: UnitOfMeasure;
  precision: number;
  formatted: string;
}

interface EntityStateBase {
  address: string;
  name: string;
  status: StatusValue;
  uom: UnitOfMeasure;
  precision: number;
  formatted: string;
  lastChanged: Date | null;
  lastUpdate: Date | null;
  enabled: boolean;
  capabilities: Capability[];
  properties: Record<string, NodeProperty>;
}

export interface NodeState extends EntityStateBase {
  kind: 'node';
  parent: string | null;
  nodeDefId: string | null;
  protocol: string | null;
}

export interface GroupState extends EntityStateBase {
  kind: 'group';
  members: string[];
}

export type ProgramRunState = 'idle' | 'then' | 'else';

export interface ProgramState extends EntityStateBase {
  kind: 'program' | 'folder';
  runAtStartup: boolean;
  running: ProgramRunState;
  lastRun: Date | null;
  lastFinished: Date | null;
}

export interface VariableState extends EntityStateBase {
  kind: 'variable';
  variableType: number;
  variableId: number;
  init: number | null;
  timestamp: Date | null;
}

export type EntityState = NodeState | GroupState | ProgramState | VariableState;

/**
 * Frozen copy handed to external readers
 */
export type EntitySnapshot = Readonly<EntityState>;

/**
 * One entry of the initial snapshot
 */
export type SeedEntry =
  | {
      kind: 'node';
      address: string;
      name: string;
      status?: StatusValue;
      uom?: UnitOfMeasure;
      precision?: number;
      formatted?: string;
      enabled?: boolean;
      capabilities?: Capability[];
      properties?: NodeProperty[];
      parent?: string | null;
      nodeDefId?: string | null;
      protocol?: string | null;
    }
  | {
      kind: 'group';
      address: string;
      name: string;
      status?: StatusValue;
      members?: string[];
      capabilities?: Capability[];
    }
  | {
      kind: 'program' | 'folder';
      address: string;
      name: string;
      status?: StatusValue;
      enabled?: boolean;
      runAtStartup?: boolean;
      running?: ProgramRunState;
      lastRun?: Date | null;
      lastFinished?: Date | null;
    }
  | {
      kind: 'variable';
      variableType: number;
      variableId: number;
      name: string;
      status?: number | null;
      init?: number | null;
      precision?: number;
      timestamp?: Date | null;
    };

/**
 * Collaborator that provides the full controller snapshot
 */
export interface SnapshotSource {
  fetchSnapshot(): Promise<SeedEntry[]>;
}

// =============================================================================
// Decoded Stream Events
// =============================================================================

export interface PropertyUpdateEvent {
  type: 'property_update';
  address: string;
  key: string;
  value: number | null;
  formatted: string;
  uom: UnitOfMeasure;
  precision: number;
}

export interface ControlMessageEvent {
  type: 'control_message';
  address: string;
  code: string;
  value: number | null;
  formatted: string;
  uom: UnitOfMeasure;
  precision: number;
}

export interface NodeListChangedEvent {
  type: 'node_list_changed';
  address: string;
  change: string;
  detail: Record<string, unknown>;
}

export interface SystemStatusEvent {
  type: 'system_status';
  status: SystemStatusValue;
}

export interface HeartbeatEvent {
  type: 'heartbeat';
  sequence: number;
  /** Seconds until the next heartbeat, as announced by the controller */
  interval: number;
}

export interface ProgramUpdateEvent {
  type: 'program_update';
  address: string;
  status?: boolean | null;
  running?: ProgramRunState;
  enabled?: boolean;
  runAtStartup?: boolean;
  lastRun?: Date;
  lastFinished?: Date;
}

export interface VariableUpdateEvent {
  type: 'variable_update';
  address: string;
  value: number;
  precision: number;
  timestamp: Date | null;
  init: boolean;
}

export interface SubscribedEvent {
  type: 'subscribed';
  streamId: string;
}

export interface UnhandledEvent {
  type: 'unhandled';
  control: string;
  action: string | null;
}

export type IsyEvent =
  | PropertyUpdateEvent
  | ControlMessageEvent
  | NodeListChangedEvent
  | SystemStatusEvent
  | HeartbeatEvent
  | ProgramUpdateEvent
  | VariableUpdateEvent
  | SubscribedEvent
  | UnhandledEvent;

export type DecodeResult = IsyEvent | IsyError;

// =============================================================================
// Feed Payloads
// =============================================================================

/**
 * Raised when an entity's status or one of its properties changes value
 */
export interface StatusChange {
  address: string;
  kind: EntityKind;
  key: string;
  previous: StatusValue;
  current: StatusValue;
  formatted: string;
  uom: UnitOfMeasure;
  lastChanged: Date;
}

/**
 * Raised for every control event, whether or not it changed state
 */
export interface ControlReceived {
  address: string;
  kind: EntityKind;
  code: string;
  value: number | null;
  formatted: string;
  uom: UnitOfMeasure;
}

export type EntityChangeAction = 'entity_added' | 'entity_changed' | 'entity_removed';

export interface EntityChange {
  action: EntityChangeAction;
  kind: EntityKind;
  address: string;
}

export type SystemEvent =
  | SystemStatusEvent
  | NodeListChangedEvent
  | { type: 'stream_id'; streamId: string };

export type ConnectionStatus = 'connected' | 'disconnected' | 'reconnecting' | 'failed';

export interface ConnectionStatusEvent {
  status: ConnectionStatus;
  state: SessionState;
  attempt: number;
  error?: IsyError;
}

export interface SessionStateChange {
  previous: SessionState;
  current: SessionState;
}

// =============================================================================
// Session Types
// =============================================================================

export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'subscribing'
  | 'live'
  | 'degraded'
  | 'closing';

export type StreamSessionState = 'connecting' | 'subscribing' | 'live' | 'closing';

/**
 * Callbacks a transport reports through
 */
export interface TransportHandlers {
  onFrame(frame: string): void;
  onClose(error: IsyError): void;
}

/**
 * One persistent connection delivering whole frames
 */
export interface EventTransport {
  /** Resolves once the socket is open */
  open(): Promise<void>;
  /** Sends the subscription request, if the transport needs one */
  subscribe(streamId: string | null): Promise<void>;
  /** Idempotent; the stream id lets the transport unsubscribe first */
  close(streamId: string | null): void;
}

export type TransportFactory = (
  config: ResolvedClientConfig,
  handlers: TransportHandlers,
  logger: Logger
) => EventTransport;

// =============================================================================
// Listener Types
// =============================================================================

/**
 * Listener callback; a returned promise is not awaited, only observed
 */
export type Listener<T> = (event: T) => void | Promise<void>;

/**
 * Handle returned by subscribe
 */
export interface SubscriptionHandle {
  readonly id: number;
  readonly feed: string;
  unsubscribe(): void;
}
