/**
 * Messaging - Public API
 *
 * Barrel exports for frame decoding and event routing.
 */

export { decodeFrame, parseInteger } from './EventDecoder.mjs';
export { EventDispatcher } from './EventDispatcher.mjs';
