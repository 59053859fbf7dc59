/**
 * Entity Shadow Tree
 *
 * In-memory mirror of the controller's nodes, groups, programs, folders and
 * variables, keyed by kind and address. Every mutation goes through the same
 * change check: state that did not change raises no notification, so a
 * replayed event is harmless.
 *
 * Callers serialize mutations; the tree does no locking.
 */

import { isDeepStrictEqual } from 'node:util';
import { ERROR_CODES, PROP_STATUS, createIsyError, isCommandCode } from '../IsyProtocol.mjs';
import { NotificationFabric, entityScope } from '../events/NotificationFabric.mjs';
import { createLogger } from '../utils/Logger.mjs';
import { formatValue, variableAddress } from '../utils/ValueFormatters.mjs';
import type {
  Capability,
  ControlMessageEvent,
  EntityChangeAction,
  EntityKind,
  EntitySnapshot,
  EntityState,
  Logger,
  NodeListChangedEvent,
  NodeProperty,
  ProgramState,
  ProgramUpdateEvent,
  PropertyUpdateEvent,
  SeedEntry,
  StatusValue,
  UnitOfMeasure,
  VariableState,
  VariableUpdateEvent,
} from '../types.mjs';

// ============================================================================
// Module-specific Types
// ============================================================================

export type PropertyUpdate = Omit<PropertyUpdateEvent, 'type' | 'formatted'> & {
  formatted?: string;
};

export type ControlMessage = Omit<ControlMessageEvent, 'type' | 'formatted'> & {
  formatted?: string;
};

export interface SeedResult {
  added: number;
  changed: number;
}

/**
 * Status handler for a control code, applied only to entities carrying
 * the listed capability
 */
interface ControlStatusHandler {
  capability: Capability;
  status(value: number | null): number;
}

const ON_LEVEL = 255;
const OFF_LEVEL = 0;

const CONTROL_STATUS_HANDLERS: ReadonlyMap<string, ControlStatusHandler> = new Map([
  ['DON', { capability: 'switchable', status: (value) => value ?? ON_LEVEL }],
  ['DFON', { capability: 'switchable', status: () => ON_LEVEL }],
  ['DOF', { capability: 'switchable', status: () => OFF_LEVEL }],
  ['DFOF', { capability: 'switchable', status: () => OFF_LEVEL }],
]);

const DEFAULT_CAPABILITIES: Record<EntityKind, Capability[]> = {
  node: ['switchable'],
  group: ['switchable'],
  program: ['runnable'],
  folder: [],
  variable: ['settable'],
};

const KIND_LOOKUP_ORDER: readonly EntityKind[] = ['node', 'group', 'program', 'folder', 'variable'];

const REMOVAL_CHANGES: Readonly<Record<string, EntityKind>> = {
  NR: 'node',
  GR: 'group',
  FR: 'folder',
};

const RENAME_CHANGES: Readonly<Record<string, EntityKind>> = {
  NN: 'node',
  GN: 'group',
  FN: 'folder',
};

function formatStatus(status: StatusValue, uom: UnitOfMeasure, precision: number): string {
  if (typeof status === 'boolean') {
    return status ? 'true' : 'false';
  }
  return formatValue(status, uom, precision);
}

// Identity and runtime fields a snapshot never overwrites
const RUNTIME_FIELDS = new Set(['kind', 'address', 'status', 'formatted', 'lastChanged', 'lastUpdate']);

/**
 * Whether a seed entry carries a field. A null unit means "not set".
 */
function carries(entry: SeedEntry, field: string): boolean {
  if (!(field in entry)) return false;
  const value: unknown = Reflect.get(entry, field);
  return field === 'uom' ? value !== undefined && value !== null : value !== undefined;
}

/**
 * Copy the fields the entry carries onto the stored state. Returns true
 * when any of them differed.
 */
function refreshFields(existing: EntityState, entry: SeedEntry, incoming: EntityState): boolean {
  let changed = false;
  for (const [field, value] of Object.entries(incoming)) {
    if (RUNTIME_FIELDS.has(field) || !carries(entry, field)) continue;
    if (isDeepStrictEqual(Reflect.get(existing, field), value)) continue;
    Reflect.set(existing, field, value);
    changed = true;
  }
  return changed;
}

function parseFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

// ============================================================================
// ShadowTree Class
// ============================================================================

export class ShadowTree {
  private readonly states: Map<string, EntityState> = new Map();
  private readonly fabric: NotificationFabric;
  private readonly logger: Logger;

  constructor(fabric: NotificationFabric, logger?: Logger) {
    this.fabric = fabric;
    this.logger = createLogger('ShadowTree', logger);
  }

  // ===========================================================================
  // Seeding
  // ===========================================================================

  /**
   * Add or refresh entities from a snapshot. Only fields an entry carries
   * are refreshed, and `entity_changed` goes out only when one of them
   * differs. A refreshed status goes through the normal change check.
   */
  seed(entries: readonly SeedEntry[]): SeedResult {
    const result: SeedResult = { added: 0, changed: 0 };
    const now = new Date();

    for (const entry of entries) {
      const incoming = this.buildState(entry);
      const key = entityScope(incoming.kind, incoming.address);
      const existing = this.states.get(key);

      if (!existing) {
        this.states.set(key, incoming);
        result.added++;
        this.publishEntityChange('entity_added', incoming);
        continue;
      }

      const before = { status: existing.status, uom: existing.uom, precision: existing.precision };
      const refreshed = refreshFields(existing, entry, incoming);
      if (entry.status !== undefined) {
        existing.status = incoming.status;
      }
      const statusChanged = existing.status !== before.status;
      if (statusChanged || existing.uom !== before.uom || existing.precision !== before.precision) {
        const given = entry.kind === 'node' ? entry.formatted : undefined;
        existing.formatted = given ?? formatStatus(existing.status, existing.uom, existing.precision);
      }
      existing.lastUpdate = now;

      if (refreshed) {
        this.publishEntityChange('entity_changed', existing);
      }
      if (refreshed || statusChanged) {
        result.changed++;
      }
      if (statusChanged) {
        this.commitChange(existing, PROP_STATUS, before.status, now);
      }
    }

    this.logger.info(
      `Seeded ${entries.length} entities (${result.added} added, ${result.changed} refreshed)`
    );
    return result;
  }

  private buildState(entry: SeedEntry): EntityState {
    const base = {
      name: entry.name,
      lastChanged: null,
      lastUpdate: null,
      properties: {},
    };

    switch (entry.kind) {
      case 'node': {
        const status = entry.status ?? null;
        const uom = entry.uom ?? null;
        const precision = entry.precision ?? 0;
        const properties: Record<string, NodeProperty> = {};
        for (const property of entry.properties ?? []) {
          properties[property.control] = { ...property };
        }
        return {
          ...base,
          kind: 'node',
          address: entry.address,
          status,
          uom,
          precision,
          formatted: entry.formatted ?? formatStatus(status, uom, precision),
          enabled: entry.enabled ?? true,
          capabilities: [...(entry.capabilities ?? DEFAULT_CAPABILITIES.node)],
          properties,
          parent: entry.parent ?? null,
          nodeDefId: entry.nodeDefId ?? null,
          protocol: entry.protocol ?? null,
        };
      }
      case 'group': {
        const status = entry.status ?? null;
        return {
          ...base,
          kind: 'group',
          address: entry.address,
          status,
          uom: null,
          precision: 0,
          formatted: formatStatus(status, null, 0),
          enabled: true,
          capabilities: [...(entry.capabilities ?? DEFAULT_CAPABILITIES.group)],
          members: [...(entry.members ?? [])],
        };
      }
      case 'program':
      case 'folder': {
        const status = entry.status ?? null;
        return {
          ...base,
          kind: entry.kind,
          address: entry.address,
          status,
          uom: null,
          precision: 0,
          formatted: formatStatus(status, null, 0),
          enabled: entry.enabled ?? true,
          capabilities: [...DEFAULT_CAPABILITIES[entry.kind]],
          runAtStartup: entry.runAtStartup ?? false,
          running: entry.running ?? 'idle',
          lastRun: entry.lastRun ?? null,
          lastFinished: entry.lastFinished ?? null,
        };
      }
      case 'variable': {
        const status = entry.status ?? null;
        const precision = entry.precision ?? 0;
        return {
          ...base,
          kind: 'variable',
          address: variableAddress(entry.variableType, entry.variableId),
          status,
          uom: null,
          precision,
          formatted: formatStatus(status, null, precision),
          enabled: true,
          capabilities: [...DEFAULT_CAPABILITIES.variable],
          variableType: entry.variableType,
          variableId: entry.variableId,
          init: entry.init ?? null,
          timestamp: entry.timestamp ?? null,
        };
      }
    }
  }

  // ===========================================================================
  // Node and Group Updates
  // ===========================================================================

  /**
   * Apply a status (`ST`) or aux property report. Returns false when the
   * address is unknown.
   */
  applyPropertyUpdate(update: PropertyUpdate): boolean {
    const entity = this.findDevice(update.address);
    if (!entity) {
      this.ignore(update.address, `property ${update.key}`);
      return false;
    }
    this.setProperty(entity, update.key, update.value, update.uom, update.precision, update.formatted);
    return true;
  }

  /**
   * Apply a control event. Always notifies control listeners; codes with a
   * status handler for one of the entity's capabilities also update status.
   */
  applyControlMessage(message: ControlMessage): boolean {
    const entity = this.find(message.address);
    if (!entity) {
      this.ignore(message.address, `control ${message.code}`);
      return false;
    }

    const now = new Date();
    entity.lastUpdate = now;
    this.fabric.publish(
      'control',
      {
        address: entity.address,
        kind: entity.kind,
        code: message.code,
        value: message.value,
        formatted: message.formatted ?? formatValue(message.value, message.uom, message.precision),
        uom: message.uom,
      },
      entityScope(entity.kind, entity.address)
    );

    const handler = CONTROL_STATUS_HANDLERS.get(message.code);
    if (handler && entity.capabilities.includes(handler.capability)) {
      this.setProperty(entity, PROP_STATUS, handler.status(message.value), null, entity.precision);
    } else if (!isCommandCode(message.code) && message.value !== null) {
      this.setProperty(
        entity,
        message.code,
        message.value,
        message.uom,
        message.precision,
        message.formatted
      );
    }
    return true;
  }

  private setProperty(
    entity: EntityState,
    key: string,
    value: number | null,
    reportedUom: UnitOfMeasure,
    precision: number,
    formatted?: string
  ): void {
    const now = new Date();
    entity.lastUpdate = now;

    if (key === PROP_STATUS) {
      const uom = reportedUom ?? entity.uom;
      const previous = entity.status;
      entity.uom = uom;
      entity.precision = precision;
      entity.status = value;
      entity.formatted = formatted ?? formatStatus(value, uom, precision);
      this.commitChange(entity, key, previous, now);
      return;
    }

    const existing: NodeProperty | undefined = entity.properties[key];
    const uom = reportedUom ?? existing?.uom ?? null;
    entity.properties[key] = {
      control: key,
      value,
      uom,
      precision,
      formatted: formatted ?? formatValue(value, uom, precision),
    };
    if (!existing && value === null) return;
    this.commitChange(entity, key, existing?.value ?? null, now, !existing);
  }

  // ===========================================================================
  // Programs and Variables
  // ===========================================================================

  applyProgramUpdate(update: Omit<ProgramUpdateEvent, 'type'>): boolean {
    const program = this.findProgram(update.address);
    if (!program) {
      this.ignore(update.address, 'program update');
      return false;
    }

    const now = new Date();
    program.lastUpdate = now;

    let metadataChanged = false;
    if (update.enabled !== undefined && update.enabled !== program.enabled) {
      program.enabled = update.enabled;
      metadataChanged = true;
    }
    if (update.runAtStartup !== undefined && update.runAtStartup !== program.runAtStartup) {
      program.runAtStartup = update.runAtStartup;
      metadataChanged = true;
    }
    if (update.running !== undefined && update.running !== program.running) {
      program.running = update.running;
      metadataChanged = true;
    }
    if (update.lastRun && update.lastRun.getTime() !== program.lastRun?.getTime()) {
      program.lastRun = update.lastRun;
      metadataChanged = true;
    }
    if (update.lastFinished && update.lastFinished.getTime() !== program.lastFinished?.getTime()) {
      program.lastFinished = update.lastFinished;
      metadataChanged = true;
    }
    if (metadataChanged) {
      this.publishEntityChange('entity_changed', program);
    }

    if (update.status !== undefined) {
      const previous = program.status;
      program.status = update.status;
      program.formatted = formatStatus(update.status, null, 0);
      this.commitChange(program, PROP_STATUS, previous, now);
    }
    return true;
  }

  /**
   * Apply a variable value, or its init value when `init` is set
   */
  applyVariableUpdate(update: Omit<VariableUpdateEvent, 'type'>): boolean {
    const variable = this.findVariable(update.address);
    if (!variable) {
      this.ignore(update.address, 'variable update');
      return false;
    }

    const now = new Date();
    variable.lastUpdate = now;

    if (update.init) {
      const previous = variable.init;
      variable.init = update.value;
      this.commitChange(variable, 'init', previous, now);
      return true;
    }

    const previous = variable.status;
    variable.status = update.value;
    variable.precision = update.precision;
    variable.formatted = formatValue(update.value, null, update.precision);
    if (update.timestamp) {
      variable.timestamp = update.timestamp;
    }
    this.commitChange(variable, PROP_STATUS, previous, now);
    return true;
  }

  // ===========================================================================
  // Node List Changes
  // ===========================================================================

  /**
   * Reflect node-list changes the tree can act on: enable/disable, removal
   * and renames. Returns true when the tree changed.
   */
  applyNodeChange(event: Omit<NodeListChangedEvent, 'type'>): boolean {
    const { address, change, detail } = event;

    if (change === 'EN') {
      const node = this.states.get(entityScope('node', address));
      const enabled = parseFlag(detail.enabled);
      if (!node || enabled === undefined || node.enabled === enabled) return false;
      node.enabled = enabled;
      node.lastUpdate = new Date();
      this.publishEntityChange('entity_changed', node);
      return true;
    }

    const removedKind = REMOVAL_CHANGES[change];
    if (removedKind !== undefined) {
      const key = entityScope(removedKind, address);
      const removed = this.states.get(key);
      if (!removed) return false;
      this.states.delete(key);
      this.logger.info(`Removed ${removedKind} ${address}`);
      this.publishEntityChange('entity_removed', removed);
      return true;
    }

    const renamedKind = RENAME_CHANGES[change];
    if (renamedKind !== undefined) {
      const entity = this.states.get(entityScope(renamedKind, address));
      const newName = detail.newName;
      if (!entity || typeof newName !== 'string' || entity.name === newName) return false;
      entity.name = newName;
      entity.lastUpdate = new Date();
      this.publishEntityChange('entity_changed', entity);
      return true;
    }

    return false;
  }

  // ===========================================================================
  // Readers
  // ===========================================================================

  /**
   * Frozen copy of an entity. Without a kind, nodes are searched first,
   * then groups, programs, folders and variables.
   */
  lookup(address: string, kind?: EntityKind): EntitySnapshot | undefined {
    const state = kind ? this.states.get(entityScope(kind, address)) : this.find(address);
    return state ? this.snapshot(state) : undefined;
  }

  entities(kind?: EntityKind): EntitySnapshot[] {
    const result: EntitySnapshot[] = [];
    for (const state of this.states.values()) {
      if (kind === undefined || state.kind === kind) {
        result.push(this.snapshot(state));
      }
    }
    return result;
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * Forget every entity without notifying anyone
   */
  clear(): void {
    this.states.clear();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private snapshot(state: EntityState): EntitySnapshot {
    return Object.freeze(structuredClone(state));
  }

  private find(address: string): EntityState | undefined {
    for (const kind of KIND_LOOKUP_ORDER) {
      const state = this.states.get(entityScope(kind, address));
      if (state) return state;
    }
    return undefined;
  }

  private findDevice(address: string): EntityState | undefined {
    return (
      this.states.get(entityScope('node', address)) ??
      this.states.get(entityScope('group', address))
    );
  }

  private findProgram(address: string): ProgramState | undefined {
    const state =
      this.states.get(entityScope('program', address)) ??
      this.states.get(entityScope('folder', address));
    return state && (state.kind === 'program' || state.kind === 'folder') ? state : undefined;
  }

  private findVariable(address: string): VariableState | undefined {
    const state = this.states.get(entityScope('variable', address));
    return state?.kind === 'variable' ? state : undefined;
  }

  /**
   * Raise a status change when the value moved (or the key is new)
   */
  private commitChange(
    entity: EntityState,
    key: string,
    previous: StatusValue,
    now: Date,
    force = false
  ): void {
    const current = this.currentValue(entity, key);
    if (!force && previous === current) return;

    entity.lastChanged = now;
    const property = key === PROP_STATUS || key === 'init' ? undefined : entity.properties[key];
    this.fabric.publish(
      'status',
      {
        address: entity.address,
        kind: entity.kind,
        key,
        previous,
        current,
        formatted: property ? property.formatted : entity.formatted,
        uom: property ? property.uom : entity.uom,
        lastChanged: now,
      },
      entityScope(entity.kind, entity.address)
    );
  }

  private currentValue(entity: EntityState, key: string): StatusValue {
    if (key === PROP_STATUS) return entity.status;
    if (key === 'init' && entity.kind === 'variable') return entity.init;
    return entity.properties[key]?.value ?? null;
  }

  private publishEntityChange(action: EntityChangeAction, entity: EntityState): void {
    this.fabric.publish(
      'entityChanged',
      { action, kind: entity.kind, address: entity.address },
      entityScope(entity.kind, entity.address)
    );
  }

  private ignore(address: string, what: string): void {
    const error = createIsyError(ERROR_CODES.APPLY_IGNORED, `${what} for ${address}`);
    this.logger.debug(error.message);
  }
}
