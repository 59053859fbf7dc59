/**
 * Connection - Public API
 *
 * Barrel exports for the event stream connection.
 */

export {
  IsyEventClient,
  resolveConfig,
  defaultTransportFactory,
} from './IsyEventClient.mjs';

export {
  ReconnectSupervisor,
  computeBackoffDelay,
  type ReconnectSupervisorOptions,
} from './ReconnectSupervisor.mjs';

export {
  StreamSession,
  toSessionError,
  type StreamSessionHandlers,
  type StreamSessionOptions,
} from './StreamSession.mjs';

export {
  basicAuthorization,
  buildWebSocketUrl,
  buildWebSocketHeaders,
  buildSubscribeRequest,
  buildUnsubscribeRequest,
} from './SubscriptionRequests.mjs';

export { TcpTransport } from './transports/TcpTransport.mjs';
export { TcpEventReader } from './transports/TcpEventReader.mjs';
export { WebSocketTransport } from './transports/WebSocketTransport.mjs';
