/**
 * ISY Event Shadow Library - Public API
 *
 * This is the main entry point for the library.
 * Import from here to access all public types and utilities.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Configuration
  IsyClientConfig,
  ResolvedClientConfig,
  BackoffConfig,
  TransportKind,
  Logger,
  // Entities
  EntityKind,
  Capability,
  StatusValue,
  UnitOfMeasure,
  NodeProperty,
  NodeState,
  GroupState,
  ProgramState,
  ProgramRunState,
  VariableState,
  EntityState,
  EntitySnapshot,
  SeedEntry,
  SnapshotSource,
  // Decoded events
  IsyEvent,
  DecodeResult,
  PropertyUpdateEvent,
  ControlMessageEvent,
  NodeListChangedEvent,
  SystemStatusEvent,
  HeartbeatEvent,
  ProgramUpdateEvent,
  VariableUpdateEvent,
  SubscribedEvent,
  UnhandledEvent,
  // Feeds
  StatusChange,
  ControlReceived,
  EntityChange,
  EntityChangeAction,
  SystemEvent,
  ConnectionStatus,
  ConnectionStatusEvent,
  SessionState,
  SessionStateChange,
  StreamSessionState,
  Listener,
  SubscriptionHandle,
  // Transport
  EventTransport,
  TransportHandlers,
  TransportFactory,
} from './types.mjs';

// =============================================================================
// Constants and Errors
// =============================================================================
export {
  CLIENT_CONFIG,
  PROTOCOL_CONFIG,
  EVENT_CONTROLS,
  TRIGGER_ACTIONS,
  PROP_STATUS,
  COMMAND_CODES,
  NODE_CHANGE_ACTIONS,
  SYSTEM_STATUS_CODES,
  ERROR_CODES,
  ERROR_MESSAGES,
  createIsyError,
  isIsyError,
  isCommandCode,
  getNodeChangeName,
  type IsyError,
  type ErrorCode,
  type EventControl,
  type CommandCode,
  type NodeChangeCode,
  type SystemStatusValue,
} from './IsyProtocol.mjs';

// =============================================================================
// Utilities
// =============================================================================
export * from './utils/index.mjs';

// =============================================================================
// Connection
// =============================================================================
export * from './connection/index.mjs';

// =============================================================================
// State Management
// =============================================================================
export * from './state/index.mjs';

// =============================================================================
// Messaging and Notifications
// =============================================================================
export * from './messaging/index.mjs';
export * from './events/index.mjs';
