/**
 * Event Decoder
 *
 * Turns one raw event-stream frame (an XML document) into a typed event.
 * Decoding is pure: no state, no I/O, no logging. Frames that cannot be
 * understood come back as a DECODE_FAILED error for the caller to log.
 *
 *   <Event seqnum="12" sid="uuid:47">
 *     <control>ST</control>
 *     <action uom="100" prec="0">255</action>
 *     <node>1A 2B 3C 1</node>
 *     <eventInfo/>
 *     <fmtAct>On</fmtAct>
 *   </Event>
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  ERROR_CODES,
  EVENT_CONTROLS,
  PROGRAM_STATUS_NIBBLES,
  PROP_STATUS,
  SYSTEM_STATUS_CODES,
  TRIGGER_ACTIONS,
  createIsyError,
  isCommandCode,
  type IsyError,
} from '../IsyProtocol.mjs';
import {
  formatValue,
  padProgramId,
  parseIsyTimestamp,
  variableAddress,
} from '../utils/ValueFormatters.mjs';
import type {
  DecodeResult,
  NodeListChangedEvent,
  ProgramRunState,
  ProgramUpdateEvent,
  SystemStatusEvent,
  UnhandledEvent,
  UnitOfMeasure,
  VariableUpdateEvent,
} from '../types.mjs';

// ============================================================================
// Parser Setup
// ============================================================================

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const TEXT_KEY = '#text';

const MEMORY_REPORT =
  /dbAddr=(?<memory>[A-F0-9x]*) \[(?<value>[A-F0-9]{2})\] cmd1=(?<cmd1>[A-F0-9x]{4}) cmd2=(?<cmd2>[A-F0-9x]{4})/;

type XmlRecord = Record<string, unknown>;

/**
 * The fields of an `<Event>` element, as text
 */
interface RawEvent {
  seqnum: string | null;
  control: string;
  action: string | null;
  uom: UnitOfMeasure;
  precision: number;
  node: string | null;
  eventInfo: unknown;
  fmtAct: string | null;
}

// ============================================================================
// XML Helpers
// ============================================================================

function isRecord(value: unknown): value is XmlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text content of an element; empty elements read as null
 */
function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isRecord(value)) {
    return textOf(value[TEXT_KEY]);
  }
  return null;
}

function attributeOf(value: unknown, name: string): string | null {
  if (!isRecord(value)) return null;
  const attribute = value[name];
  return typeof attribute === 'string' ? attribute : null;
}

/**
 * Integers only; anything else (including an empty value) reads as null
 */
export function parseInteger(text: string | null): number | null {
  if (text === null) return null;
  const trimmed = text.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Flatten an eventInfo element into a detail record of strings
 */
function detailOf(eventInfo: unknown): Record<string, unknown> {
  if (isRecord(eventInfo)) {
    const detail: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(eventInfo)) {
      detail[key] = isRecord(value) ? detailOf(value) : value;
    }
    return detail;
  }
  const text = textOf(eventInfo);
  return text === null ? {} : { message: text };
}

function decodeFailed(details: string, cause?: unknown): IsyError {
  return createIsyError(ERROR_CODES.DECODE_FAILED, details, cause);
}

// ============================================================================
// Decoder
// ============================================================================

/**
 * Decode a single frame
 */
export function decodeFrame(frame: string): DecodeResult {
  const validation = XMLValidator.validate(frame);
  if (validation !== true) {
    return decodeFailed(`malformed XML (${validation.err.msg})`);
  }

  let document: unknown;
  try {
    document = parser.parse(frame);
  } catch (error) {
    return decodeFailed('malformed XML', error);
  }
  if (!isRecord(document)) {
    return decodeFailed('empty frame');
  }

  const subscription = findSubscriptionResponse(document);
  if (subscription !== undefined) {
    const streamId = textOf(subscription.SID);
    if (streamId === null) {
      return decodeFailed('subscription response without SID');
    }
    return { type: 'subscribed', streamId };
  }

  if (!isRecord(document.Event)) {
    return decodeFailed(`unknown root element ${Object.keys(document).join(',') || '(none)'}`);
  }

  const raw = readEvent(document.Event);
  if (raw === null) {
    return decodeFailed('event without control');
  }
  return decodeEvent(raw);
}

/**
 * The WebSocket stream sends a bare SubscriptionResponse; the TCP stream
 * wraps it in a SOAP envelope
 */
function findSubscriptionResponse(document: XmlRecord): XmlRecord | undefined {
  if (isRecord(document.SubscriptionResponse)) {
    return document.SubscriptionResponse;
  }
  const envelope = document.Envelope;
  if (isRecord(envelope) && isRecord(envelope.Body)) {
    const response = envelope.Body.SubscriptionResponse;
    if (isRecord(response)) return response;
  }
  return undefined;
}

function readEvent(element: XmlRecord): RawEvent | null {
  const control = textOf(element.control);
  if (control === null) return null;

  const precision = parseInteger(attributeOf(element.action, 'prec'));
  return {
    seqnum: attributeOf(element, 'seqnum'),
    control,
    action: textOf(element.action),
    uom: attributeOf(element.action, 'uom'),
    precision: precision ?? 0,
    node: textOf(element.node),
    eventInfo: element.eventInfo,
    fmtAct: textOf(element.fmtAct),
  };
}

function decodeEvent(raw: RawEvent): DecodeResult {
  const { control } = raw;

  if (control === EVENT_CONTROLS.HEARTBEAT) {
    const interval = parseInteger(raw.action);
    if (interval === null) {
      return decodeFailed('heartbeat without interval');
    }
    return { type: 'heartbeat', sequence: parseInteger(raw.seqnum) ?? 0, interval };
  }

  if (!control.startsWith('_')) {
    return decodeNodeEvent(raw);
  }

  switch (control) {
    case EVENT_CONTROLS.TRIGGER:
      return decodeTrigger(raw);
    case EVENT_CONTROLS.NODE_CHANGED:
      return decodeNodeChanged(raw);
    case EVENT_CONTROLS.SYSTEM_STATUS:
      return decodeSystemStatus(raw);
    case EVENT_CONTROLS.PROGRESS_REPORT:
      return decodeProgressReport(raw);
    default:
      return unhandled(raw);
  }
}

function unhandled(raw: RawEvent): UnhandledEvent {
  return { type: 'unhandled', control: raw.control, action: raw.action };
}

/**
 * Status, aux property and command events for a node
 */
function decodeNodeEvent(raw: RawEvent): DecodeResult {
  if (raw.node === null) {
    return decodeFailed(`${raw.control} event without node`);
  }

  const value = parseInteger(raw.action);
  const formatted = raw.fmtAct ?? formatValue(value, raw.uom, raw.precision);
  const fields = {
    address: raw.node,
    value,
    formatted,
    uom: raw.uom,
    precision: raw.precision,
  };

  if (raw.control === PROP_STATUS) {
    return { type: 'property_update', key: PROP_STATUS, ...fields };
  }
  if (!isCommandCode(raw.control) && raw.uom !== null) {
    return { type: 'property_update', key: raw.control, ...fields };
  }
  return { type: 'control_message', code: raw.control, ...fields };
}

function decodeTrigger(raw: RawEvent): DecodeResult {
  switch (raw.action) {
    case TRIGGER_ACTIONS.PROGRAM_STATUS:
      return decodeProgramStatus(raw.eventInfo);
    case TRIGGER_ACTIONS.VARIABLE_STATUS:
      return decodeVariable(raw.eventInfo, false);
    case TRIGGER_ACTIONS.VARIABLE_INIT:
      return decodeVariable(raw.eventInfo, true);
    default:
      return unhandled(raw);
  }
}

/**
 * <eventInfo><id>1E</id><on/><rr/><r>240101 06:00:00</r><f>240101 06:00:01</f><s>21</s></eventInfo>
 */
function decodeProgramStatus(eventInfo: unknown): DecodeResult {
  if (!isRecord(eventInfo)) {
    return decodeFailed('program event without eventInfo');
  }
  const id = textOf(eventInfo.id);
  if (id === null) {
    return decodeFailed('program event without id');
  }

  const event: ProgramUpdateEvent = { type: 'program_update', address: padProgramId(id) };

  if ('on' in eventInfo) event.enabled = true;
  else if ('off' in eventInfo) event.enabled = false;

  if ('rr' in eventInfo) event.runAtStartup = true;
  else if ('nr' in eventInfo) event.runAtStartup = false;

  const status = textOf(eventInfo.s);
  if (status !== null && status.length >= 2) {
    event.status = programCondition(Number.parseInt(status.charAt(0), 16));
    const running = programRunState(Number.parseInt(status.charAt(1), 16));
    if (running !== undefined) event.running = running;
  }

  const lastRun = parseIsyTimestamp(textOf(eventInfo.r));
  if (lastRun) event.lastRun = lastRun;
  const lastFinished = parseIsyTimestamp(textOf(eventInfo.f));
  if (lastFinished) event.lastFinished = lastFinished;

  return event;
}

function programCondition(nibble: number): boolean | null {
  if (nibble === PROGRAM_STATUS_NIBBLES.CONDITION_TRUE) return true;
  if (nibble === PROGRAM_STATUS_NIBBLES.CONDITION_FALSE) return false;
  return null;
}

function programRunState(nibble: number): ProgramRunState | undefined {
  switch (nibble) {
    case PROGRAM_STATUS_NIBBLES.RUN_IDLE:
      return 'idle';
    case PROGRAM_STATUS_NIBBLES.RUN_THEN:
      return 'then';
    case PROGRAM_STATUS_NIBBLES.RUN_ELSE:
      return 'else';
    default:
      return undefined;
  }
}

/**
 * <eventInfo><var type="2" id="3"><val>5</val><prec>0</prec><ts>20240101 06:00:00</ts></var></eventInfo>
 * Init events carry <init> instead of <val>.
 */
function decodeVariable(eventInfo: unknown, init: boolean): DecodeResult {
  const variable = isRecord(eventInfo) ? eventInfo.var : undefined;
  if (!isRecord(variable)) {
    return decodeFailed('variable event without var');
  }

  const variableType = attributeOf(variable, 'type');
  const variableId = attributeOf(variable, 'id');
  if (variableType === null || variableId === null) {
    return decodeFailed('variable event without type or id');
  }

  const value = parseInteger(textOf(init ? variable.init : variable.val));
  if (value === null) {
    return decodeFailed(`variable ${variableType}.${variableId} without value`);
  }

  const event: VariableUpdateEvent = {
    type: 'variable_update',
    address: variableAddress(variableType, variableId),
    value,
    precision: parseInteger(textOf(variable.prec)) ?? 0,
    timestamp: parseIsyTimestamp(textOf(variable.ts)),
    init,
  };
  return event;
}

function decodeNodeChanged(raw: RawEvent): DecodeResult {
  if (raw.action === null) {
    return decodeFailed('node change event without action');
  }
  const event: NodeListChangedEvent = {
    type: 'node_list_changed',
    address: raw.node ?? '',
    change: raw.action,
    detail: detailOf(raw.eventInfo),
  };
  return event;
}

function decodeSystemStatus(raw: RawEvent): DecodeResult {
  switch (raw.action) {
    case '0':
    case '1':
    case '2':
    case '3': {
      const event: SystemStatusEvent = {
        type: 'system_status',
        status: SYSTEM_STATUS_CODES[raw.action],
      };
      return event;
    }
    default:
      return unhandled(raw);
  }
}

/**
 * <eventInfo>[  1A 2B 3C 1] Memory : Write dbAddr=0x0FFF [A2] cmd1=0x2E cmd2=0x00</eventInfo>
 */
function decodeProgressReport(raw: RawEvent): DecodeResult {
  const text = textOf(raw.eventInfo);
  if (text === null) {
    return unhandled(raw);
  }

  const closing = text.indexOf(']');
  const address = closing === -1 ? '' : text.slice(0, closing).replace(/^[\s[]+/, '').trim();
  const message = (closing === -1 ? text : text.slice(closing + 1)).trim();

  if (address !== 'All' && message.startsWith('Memory')) {
    const groups = MEMORY_REPORT.exec(message)?.groups;
    const detail: Record<string, unknown> = groups
      ? {
          memory: groups.memory,
          cmd1: groups.cmd1,
          cmd2: groups.cmd2,
          value: Number.parseInt(groups.value, 16),
        }
      : { message };
    return { type: 'node_list_changed', address, change: 'MW', detail };
  }

  return { type: 'node_list_changed', address, change: 'WR', detail: { message } };
}
