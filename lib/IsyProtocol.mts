/**
 * ISY Event Stream Protocol Constants
 *
 * This module defines the control codes, action codes, timing defaults and
 * error codes used when talking to an ISY/IoX controller's event stream.
 */

import packageJson from '../package.json' with { type: 'json' };

/**
 * Event categories carried in the `<control>` tag.
 * Anything not starting with an underscore is a node property or command.
 */
export const EVENT_CONTROLS = {
  HEARTBEAT: '_0',
  TRIGGER: '_1',
  DRIVER_SPECIFIC: '_2',
  NODE_CHANGED: '_3',
  SYSTEM_CONFIG: '_4',
  SYSTEM_STATUS: '_5',
  INTERNET_ACCESS: '_6',
  PROGRESS_REPORT: '_7',
  SECURITY_SYSTEM: '_8',
  SYSTEM_ALERT: '_9',
} as const;

export type EventControl = (typeof EVENT_CONTROLS)[keyof typeof EVENT_CONTROLS];

/**
 * Actions for trigger (`_1`) events
 */
export const TRIGGER_ACTIONS = {
  PROGRAM_STATUS: '0',
  GET_STATUS: '1',
  KEY_CHANGED: '2',
  INFO_STRING: '3',
  IR_LEARN: '4',
  SCHEDULE_STATUS: '5',
  VARIABLE_STATUS: '6',
  VARIABLE_INIT: '7',
  KEY: '8',
} as const;

/**
 * Node status property; every other property is an aux report
 */
export const PROP_STATUS = 'ST';

/**
 * Commands a node reports as control events. These never carry state of
 * their own; the status that follows them arrives as a separate `ST` event.
 */
export const COMMAND_CODES = [
  'BEEP',
  'BMAN',
  'BRT',
  'DFOF',
  'DFON',
  'DIM',
  'DOF',
  'DON',
  'FDDOWN',
  'FDSTOP',
  'FDUP',
  'QUERY',
  'RESET',
  'RUN',
  'RUNELSE',
  'RUNTHEN',
  'SMAN',
  'STOP',
  'X10',
] as const;

export type CommandCode = (typeof COMMAND_CODES)[number];

/**
 * Node-list change actions (`_3` events)
 */
export const NODE_CHANGE_ACTIONS = {
  NN: 'node_renamed',
  NR: 'node_removed',
  ND: 'node_added',
  MV: 'node_moved_into_scene',
  CL: 'link_changed',
  RG: 'removed_from_group',
  EN: 'node_enabled',
  PC: 'parent_changed',
  PI: 'power_info_changed',
  DI: 'device_id_changed',
  DP: 'device_property_changed',
  GN: 'group_renamed',
  GR: 'group_removed',
  GD: 'group_added',
  FN: 'folder_renamed',
  FR: 'folder_removed',
  FD: 'folder_added',
  NE: 'node_error',
  CE: 'node_error_cleared',
  SN: 'discovering_nodes',
  SC: 'node_discovery_complete',
  WR: 'device_writing',
  MW: 'device_memory',
  WH: 'pending_device_writes',
  WD: 'programming_device',
  RV: 'node_revised',
} as const;

export type NodeChangeCode = keyof typeof NODE_CHANGE_ACTIONS;

/**
 * System status (`_5` events)
 */
export const SYSTEM_STATUS_CODES = {
  '0': 'not_busy',
  '1': 'busy',
  '2': 'idle',
  '3': 'safe_mode',
} as const;

export type SystemStatusValue =
  (typeof SYSTEM_STATUS_CODES)[keyof typeof SYSTEM_STATUS_CODES];

/**
 * Program status nibbles from the `<s>` element of a program event.
 * The first hex digit is the condition state, the second the run state.
 */
export const PROGRAM_STATUS_NIBBLES = {
  CONDITION_UNKNOWN: 0x1,
  CONDITION_TRUE: 0x2,
  CONDITION_FALSE: 0x3,
  CONDITION_NOT_LOADED: 0xf,
  RUN_IDLE: 0x1,
  RUN_THEN: 0x2,
  RUN_ELSE: 0x3,
} as const;

/**
 * Client identity - from package.json
 */
export const CLIENT_CONFIG = {
  NAME: packageJson.name,
  VERSION: packageJson.version,
} as const;

/**
 * Protocol Configuration
 */
export const PROTOCOL_CONFIG = {
  WEBSOCKET: {
    PATH: '/rest/subscribe',
    SUBPROTOCOL: 'ISYSUB',
    ORIGIN: 'com.universal-devices.websockets.isy',
  },
  TCP: {
    SERVICES_PATH: '/services',
    SOAP_SERVICE: 'urn:udi-com:service:X_Insteon_Lighting_Service:1',
    SOAP_ACTION: 'urn:udi-com:device:X_Insteon_Lighting_Service:1',
  },
  PORTS: {
    HTTP: 80,
    HTTPS: 443,
  },
  TIMEOUTS: {
    CONNECT: 10000, // 10 seconds
    WATCHDOG: 35000, // 30s controller heartbeat + grace
    HEARTBEAT_GRACE: 5000,
  },
  BACKOFF: {
    INITIAL_DELAY: 1000,
    MULTIPLIER: 2,
    MAX_DELAY: 60000,
    JITTER: 0,
  },
} as const;

/**
 * Error Codes
 */
export const ERROR_CODES = {
  DECODE_FAILED: 'DECODE_FAILED',
  APPLY_IGNORED: 'APPLY_IGNORED',
  SESSION_FAILED: 'SESSION_FAILED',
  HEARTBEAT_TIMEOUT: 'HEARTBEAT_TIMEOUT',
  LISTENER_FAILED: 'LISTENER_FAILED',
  AUTH_FAILED: 'AUTH_FAILED',
  MAX_CONNECTIONS: 'MAX_CONNECTIONS',
  RECONNECT_EXHAUSTED: 'RECONNECT_EXHAUSTED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error Messages
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.DECODE_FAILED]: 'Could not decode event stream frame',
  [ERROR_CODES.APPLY_IGNORED]: 'Update targets an entity that is not in the shadow tree',
  [ERROR_CODES.SESSION_FAILED]: 'Event stream session failed',
  [ERROR_CODES.HEARTBEAT_TIMEOUT]: 'No event stream activity within the watchdog window',
  [ERROR_CODES.LISTENER_FAILED]: 'Subscriber callback failed',
  [ERROR_CODES.AUTH_FAILED]: 'Controller rejected the event stream credentials',
  [ERROR_CODES.MAX_CONNECTIONS]: 'Controller reached its maximum number of subscribers',
  [ERROR_CODES.RECONNECT_EXHAUSTED]: 'Gave up reconnecting to the event stream',
  [ERROR_CODES.INVALID_CONFIG]: 'Invalid client configuration',
};

/**
 * Protocol error with code and details
 */
export interface IsyError extends Error {
  code: ErrorCode;
  details: unknown;
}

/**
 * Helper function to create standardized error
 */
export function createIsyError(
  code: ErrorCode,
  details: unknown = null,
  cause?: unknown
): IsyError {
  const message =
    typeof details === 'string'
      ? `${ERROR_MESSAGES[code]}: ${details}`
      : ERROR_MESSAGES[code];
  const error = new Error(message, cause === undefined ? undefined : { cause });
  return Object.assign(error, { code, details });
}

export function isIsyError(value: unknown): value is IsyError {
  if (!(value instanceof Error) || !('code' in value)) {
    return false;
  }
  const { code } = value;
  return Object.values(ERROR_CODES).some((known) => known === code);
}

/**
 * Helper function to check whether a control code is a pure command
 */
export function isCommandCode(code: string): code is CommandCode {
  return COMMAND_CODES.some((command) => command === code);
}

export function isNodeChangeCode(code: string): code is NodeChangeCode {
  return Object.hasOwn(NODE_CHANGE_ACTIONS, code);
}

/**
 * Helper function to get the node change name from its code
 */
export function getNodeChangeName(code: string): string {
  return isNodeChangeCode(code) ? NODE_CHANGE_ACTIONS[code] : `unknown_${code}`;
}
