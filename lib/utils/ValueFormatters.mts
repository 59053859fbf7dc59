/**
 * Value Formatters for ISY reported values
 *
 * The controller reports numbers as integers plus a precision (2345 with
 * precision 2 is 23.45) and a unit-of-measure code. These helpers turn the
 * raw triple into something a person can read.
 */

import uomTable from '../data/uom.json' with { type: 'json' };
import type { UnitOfMeasure } from '../types.mjs';

/** Insteon thermostats report temperature doubled */
export const UOM_DOUBLE_TEMP = '101';

const FRIENDLY_NAMES = new Map<string, string>(Object.entries(uomTable.friendlyNames));

const UOM_STATES = new Map<string, Map<string, string>>(
  Object.entries(uomTable.states).map(([uom, states]) => [
    uom,
    new Map<string, string>(Object.entries(states)),
  ])
);

const TIMESTAMP_PATTERN = /^(\d{2}|\d{4})(\d{2})(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Shift the decimal point of a raw value by its precision
 *
 * @example
 * convertRawValue(2345, '4', 2)  // 23.45
 * convertRawValue(45, '101', 0)  // 22.5
 */
export function convertRawValue(value: number, uom: UnitOfMeasure, precision: number): number {
  if (uom === UOM_DOUBLE_TEMP) {
    return Math.round((value / 2) * 10) / 10;
  }
  if (precision > 0) {
    return Number((value / 10 ** precision).toFixed(precision));
  }
  return value;
}

/**
 * Friendly unit label for a UOM code, if one is known
 */
export function getUnitName(uom: UnitOfMeasure): string | undefined {
  return uom === null ? undefined : FRIENDLY_NAMES.get(uom);
}

/**
 * Named state for enumerated units (lock status, thermostat mode, on/off)
 */
export function getStateName(value: number, uom: UnitOfMeasure): string | undefined {
  if (uom === null) return undefined;
  return UOM_STATES.get(uom)?.get(String(value));
}

/**
 * Format a raw value for display
 *
 * @example
 * formatValue(725, '17', 1)  // '72.5 °F'
 * formatValue(100, '78', 0)  // 'on'
 * formatValue(null, '51', 0) // 'unknown'
 */
export function formatValue(value: number | null, uom: UnitOfMeasure, precision: number): string {
  if (value === null) {
    return 'unknown';
  }

  const state = getStateName(value, uom);
  if (state !== undefined) {
    return state;
  }

  const converted = convertRawValue(value, uom, precision);
  const text =
    precision > 0 && uom !== UOM_DOUBLE_TEMP ? converted.toFixed(precision) : String(converted);
  const unit = getUnitName(uom);
  return unit ? `${text} ${unit}` : text;
}

/**
 * Parse the controller's `YYMMDD HH:MM:SS` / `YYYYMMDD HH:MM:SS` timestamps
 * (local time). Returns null for anything else.
 */
export function parseIsyTimestamp(text: string | null | undefined): Date | null {
  if (!text) return null;

  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match;
  const fullYear = year.length === 2 ? 2000 + Number(year) : Number(year);
  const date = new Date(
    fullYear,
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds)
  );
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Program ids arrive unpadded and in any case; the tree keys them as
 * 4-character upper-case hex
 */
export function padProgramId(id: string): string {
  return id.trim().toUpperCase().padStart(4, '0');
}

/**
 * Variables are addressed as `<type>.<id>`
 */
export function variableAddress(variableType: number | string, variableId: number | string): string {
  return `${variableType}.${variableId}`;
}
