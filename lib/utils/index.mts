/**
 * Utilities barrel export
 */

export {
  convertRawValue,
  formatValue,
  getStateName,
  getUnitName,
  padProgramId,
  parseIsyTimestamp,
  variableAddress,
  UOM_DOUBLE_TEMP,
} from './ValueFormatters.mjs';

export { createLogger, silentLogger } from './Logger.mjs';
