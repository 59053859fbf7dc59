/**
 * Events barrel export
 */

export {
  NotificationFabric,
  entityScope,
  type FeedEvents,
  type FeedName,
} from './NotificationFabric.mjs';
