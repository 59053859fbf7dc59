/**
 * Notification Fabric
 *
 * Typed publish/subscribe used by every other component. Listeners attach to
 * a feed, optionally scoped to one entity (`<kind>:<address>`). Scoped
 * listeners hear only their entity; unscoped listeners hear every event on
 * the feed.
 *
 * Delivery is synchronous and in subscription order. The listener list is
 * copied before delivery, so a listener may unsubscribe itself (or anyone
 * else) mid-delivery and the change applies from the next publish onwards.
 */

import { ERROR_CODES, createIsyError } from '../IsyProtocol.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type {
  ConnectionStatusEvent,
  ControlReceived,
  EntityChange,
  EntityKind,
  Listener,
  Logger,
  SessionStateChange,
  StatusChange,
  SubscriptionHandle,
  SystemEvent,
} from '../types.mjs';

// ============================================================================
// Feed Types
// ============================================================================

/**
 * Payload carried by each feed
 */
export interface FeedEvents {
  status: StatusChange;
  control: ControlReceived;
  entityChanged: EntityChange;
  connection: ConnectionStatusEvent;
  system: SystemEvent;
  sessionState: SessionStateChange;
}

export type FeedName = keyof FeedEvents;

type ChannelRegistry = {
  [F in FeedName]: Map<string, Map<number, Listener<FeedEvents[F]>>>;
};

const ALL_ENTITIES = '*';

/**
 * Scope key for per-entity feeds
 */
export function entityScope(kind: EntityKind, address: string): string {
  return `${kind}:${address}`;
}

// ============================================================================
// NotificationFabric Class
// ============================================================================

export class NotificationFabric {
  private readonly logger: Logger;
  private readonly channels: ChannelRegistry = {
    status: new Map(),
    control: new Map(),
    entityChanged: new Map(),
    connection: new Map(),
    system: new Map(),
    sessionState: new Map(),
  };
  private nextId = 1;

  constructor(logger?: Logger) {
    this.logger = createLogger('NotificationFabric', logger);
  }

  /**
   * Attach a listener. Pass a scope to hear a single entity only.
   */
  subscribe<F extends FeedName>(
    feed: F,
    listener: Listener<FeedEvents[F]>,
    scope: string = ALL_ENTITIES
  ): SubscriptionHandle {
    const registry = this.channels[feed];
    let channel = registry.get(scope);
    if (!channel) {
      channel = new Map();
      registry.set(scope, channel);
    }

    const id = this.nextId++;
    channel.set(id, listener);

    const target = channel;
    let active = true;
    return {
      id,
      feed: scope === ALL_ENTITIES ? feed : `${feed}:${scope}`,
      unsubscribe: () => {
        if (!active) return;
        active = false;
        target.delete(id);
        if (target.size === 0 && registry.get(scope) === target) {
          registry.delete(scope);
        }
      },
    };
  }

  /**
   * Detach a listener. Calling it twice is harmless.
   */
  unsubscribe(handle: SubscriptionHandle): void {
    handle.unsubscribe();
  }

  /**
   * Deliver an event to the scoped listeners, then to the feed-wide ones.
   * Returns how many listeners were called.
   */
  publish<F extends FeedName>(feed: F, event: FeedEvents[F], scope?: string): number {
    const registry = this.channels[feed];
    const listeners: Listener<FeedEvents[F]>[] = [];

    if (scope !== undefined && scope !== ALL_ENTITIES) {
      listeners.push(...(registry.get(scope)?.values() ?? []));
    }
    listeners.push(...(registry.get(ALL_ENTITIES)?.values() ?? []));

    for (const listener of listeners) {
      this.deliver(feed, listener, event);
    }
    return listeners.length;
  }

  /**
   * Number of listeners on a feed (optionally a single scope)
   */
  listenerCount(feed: FeedName, scope?: string): number {
    const registry = this.channels[feed];
    if (scope !== undefined) {
      return registry.get(scope)?.size ?? 0;
    }
    let count = 0;
    for (const channel of registry.values()) {
      count += channel.size;
    }
    return count;
  }

  /**
   * Drop every listener
   */
  clear(): void {
    for (const registry of Object.values(this.channels)) {
      registry.clear();
    }
  }

  private deliver<T>(feed: FeedName, listener: Listener<T>, event: T): void {
    try {
      const result = listener(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.reportFailure(feed, error);
        });
      }
    } catch (error) {
      this.reportFailure(feed, error);
    }
  }

  private reportFailure(feed: FeedName, error: unknown): void {
    const failure = createIsyError(ERROR_CODES.LISTENER_FAILED, `${feed} listener`, error);
    this.logger.error(failure.message, error);
  }
}
