/**
 * In-process stand-in for the network transports
 */

import { ERROR_CODES, createIsyError } from '../../lib/IsyProtocol.mjs';
import type { IsyError } from '../../lib/IsyProtocol.mjs';
import type {
  EventTransport,
  ResolvedClientConfig,
  TransportFactory,
  TransportHandlers,
} from '../../lib/types.mjs';

export class FakeTransport implements EventTransport {
  readonly handlers: TransportHandlers;
  readonly openError: IsyError | null;
  subscribedWith: Array<string | null> = [];
  closedWith: Array<string | null> = [];
  opened = false;

  constructor(handlers: TransportHandlers, openError: IsyError | null = null) {
    this.handlers = handlers;
    this.openError = openError;
  }

  get closed(): boolean {
    return this.closedWith.length > 0;
  }

  open(): Promise<void> {
    if (this.openError) {
      return Promise.reject(this.openError);
    }
    this.opened = true;
    return Promise.resolve();
  }

  subscribe(streamId: string | null): Promise<void> {
    this.subscribedWith.push(streamId);
    return Promise.resolve();
  }

  close(streamId: string | null): void {
    this.closedWith.push(streamId);
  }

  /** Deliver a frame as if it came off the wire */
  emit(frame: string): void {
    this.handlers.onFrame(frame);
  }

  /** Simulate the controller dropping the connection */
  drop(details = 'connection reset'): void {
    this.handlers.onClose(createIsyError(ERROR_CODES.SESSION_FAILED, details));
  }
}

/**
 * Transport factory that records every transport it creates
 */
export class FakeNetwork {
  readonly transports: FakeTransport[] = [];
  readonly configs: ResolvedClientConfig[] = [];
  /** Number of upcoming opens that should fail */
  failNextOpens = 0;

  readonly factory: TransportFactory = (config, handlers) => {
    let openError: IsyError | null = null;
    if (this.failNextOpens > 0) {
      this.failNextOpens--;
      openError = createIsyError(ERROR_CODES.SESSION_FAILED, 'connection refused');
    }
    const transport = new FakeTransport(handlers, openError);
    this.transports.push(transport);
    this.configs.push(config);
    return transport;
  };

  get latest(): FakeTransport {
    const transport = this.transports.at(-1);
    if (!transport) {
      throw new Error('no transport created yet');
    }
    return transport;
  }
}

// ============================================================================
// Frame Builders
// ============================================================================

export interface EventFrameFields {
  control: string;
  action?: string;
  node?: string;
  uom?: string;
  prec?: string;
  eventInfo?: string;
  fmtAct?: string;
  seqnum?: number;
}

export function eventFrame(fields: EventFrameFields): string {
  const attributes = [
    fields.uom !== undefined ? ` uom="${fields.uom}"` : '',
    fields.prec !== undefined ? ` prec="${fields.prec}"` : '',
  ].join('');
  const fmtAct = fields.fmtAct !== undefined ? `<fmtAct>${fields.fmtAct}</fmtAct>` : '';
  return (
    `<?xml version="1.0"?><Event seqnum="${fields.seqnum ?? 1}" sid="uuid:47">` +
    `<control>${fields.control}</control>` +
    `<action${attributes}>${fields.action ?? ''}</action>` +
    `<node>${fields.node ?? ''}</node>` +
    `<eventInfo>${fields.eventInfo ?? ''}</eventInfo>` +
    fmtAct +
    '</Event>'
  );
}

export function heartbeatFrame(sequence: number, intervalSeconds: number): string {
  return eventFrame({ control: '_0', action: String(intervalSeconds), seqnum: sequence });
}

export function statusFrame(node: string, value: number, uom = '100'): string {
  return eventFrame({ control: 'ST', action: String(value), node, uom, prec: '0' });
}

export function subscriptionFrame(streamId: string): string {
  return `<?xml version="1.0"?><SubscriptionResponse><SID>${streamId}</SID><duration>0</duration></SubscriptionResponse>`;
}

// ============================================================================
// Timing
// ============================================================================

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Poll until the predicate holds
 */
export async function waitFor(predicate: () => boolean, timeout = 2000): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeout} ms`);
    }
    await delay(2);
  }
}
