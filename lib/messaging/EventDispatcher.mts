/**
 * Event Dispatcher
 *
 * Routes decoded stream events: entity updates go to the Shadow Tree,
 * controller-wide events go to the `system` feed.
 */

import { getNodeChangeName } from '../IsyProtocol.mjs';
import { NotificationFabric } from '../events/NotificationFabric.mjs';
import { ShadowTree } from '../state/ShadowTree.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { IsyEvent, Logger, NodeListChangedEvent } from '../types.mjs';

// ============================================================================
// EventDispatcher Class
// ============================================================================

export class EventDispatcher {
  private readonly tree: ShadowTree;
  private readonly fabric: NotificationFabric;
  private readonly logger: Logger;

  constructor(tree: ShadowTree, fabric: NotificationFabric, logger?: Logger) {
    this.tree = tree;
    this.fabric = fabric;
    this.logger = createLogger('EventDispatcher', logger);
  }

  /**
   * Route a decoded event
   */
  dispatch(event: IsyEvent): void {
    switch (event.type) {
      case 'property_update':
        this.tree.applyPropertyUpdate(event);
        break;

      case 'control_message':
        this.tree.applyControlMessage(event);
        break;

      case 'program_update':
        this.tree.applyProgramUpdate(event);
        break;

      case 'variable_update':
        this.tree.applyVariableUpdate(event);
        break;

      case 'node_list_changed':
        this.handleNodeChange(event);
        break;

      case 'system_status':
        this.logger.debug(`System status: ${event.status}`);
        this.fabric.publish('system', event);
        break;

      case 'subscribed':
        this.fabric.publish('system', { type: 'stream_id', streamId: event.streamId });
        break;

      case 'heartbeat':
        this.logger.debug(`Heartbeat #${event.sequence}`);
        break;

      case 'unhandled':
        this.logger.debug(`Ignoring ${event.control} event (action ${event.action ?? 'none'})`);
        break;
    }
  }

  private handleNodeChange(event: NodeListChangedEvent): void {
    if (event.change === 'NE') {
      this.logger.error(`Could not communicate with device: ${event.address}`);
    } else {
      this.logger.debug(
        `Received a ${getNodeChangeName(event.change)} event for node ${event.address}`
      );
    }

    this.tree.applyNodeChange(event);
    this.fabric.publish('system', event);
  }
}

