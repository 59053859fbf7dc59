/**
 * State Management - Public API
 *
 * Barrel exports for the entity shadow tree.
 */

export {
  ShadowTree,
  type PropertyUpdate,
  type ControlMessage,
  type SeedResult,
} from './ShadowTree.mjs';
