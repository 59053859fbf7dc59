import { test } from 'node:test';
import assert from 'node:assert/strict';
import { StreamSession } from '../lib/connection/StreamSession.mjs';
import { ERROR_CODES, isIsyError } from '../lib/IsyProtocol.mjs';
import type { IsyError } from '../lib/IsyProtocol.mjs';
import type { EventTransport, IsyEvent, StreamSessionState, TransportFactory } from '../lib/types.mjs';
import { testConfig } from './helpers/config.mjs';
import { FakeNetwork, heartbeatFrame, statusFrame, subscriptionFrame } from './helpers/FakeTransport.mjs';
import { RecordingLogger } from './helpers/RecordingLogger.mjs';

/**
 * Transport whose socket never connects
 */
class HangingTransport implements EventTransport {
  closes = 0;

  open(): Promise<void> {
    return new Promise(() => undefined);
  }

  subscribe(): Promise<void> {
    return Promise.resolve();
  }

  close(): void {
    this.closes++;
  }
}

function createSession(transportFactory: TransportFactory, streamId: string | null = null) {
  const logger = new RecordingLogger();
  const events: IsyEvent[] = [];
  const errors: IsyError[] = [];
  const states: StreamSessionState[] = [];
  const session = new StreamSession(
    { config: testConfig(), transportFactory, logger, streamId },
    {
      onEvent: (event) => {
        events.push(event);
      },
      onError: (error) => {
        errors.push(error);
      },
      onStateChange: (state) => {
        states.push(state);
      },
    }
  );
  return { session, logger, events, errors, states };
}

function isSessionError(message: string) {
  return (error: unknown) =>
    isIsyError(error) &&
    error.code === ERROR_CODES.SESSION_FAILED &&
    error.message === `Event stream session failed: ${message}`;
}

test('StreamSession: open connects, subscribes and goes live', async () => {
  const network = new FakeNetwork();
  const { session, states } = createSession(network.factory);

  await session.open();

  assert.equal(session.state, 'live');
  assert.equal(session.isLive, true);
  assert.deepEqual(states, ['subscribing', 'live']);
  assert.equal(network.latest.opened, true);
  assert.deepEqual(network.latest.subscribedWith, [null]);
});

test('StreamSession: resumes with the previous stream id', async () => {
  const network = new FakeNetwork();
  const { session } = createSession(network.factory, 'uuid:46');

  await session.open();

  assert.deepEqual(network.latest.subscribedWith, ['uuid:46']);
});

test('StreamSession: forwards events and keeps heartbeats to itself', async () => {
  const network = new FakeNetwork();
  const { session, events } = createSession(network.factory);
  await session.open();

  network.latest.emit(heartbeatFrame(7, 120));
  network.latest.emit(statusFrame('1A 2B 3C 1', 255));

  assert.deepEqual(
    events.map((event) => event.type),
    ['property_update']
  );
  assert.equal(session.heartbeatInterval, 120000);
  assert.ok(session.lastHeartbeatAt !== null);
  assert.ok(session.lastActivityAt !== null);
});

test('StreamSession: remembers the stream id and unsubscribes with it on close', async () => {
  const network = new FakeNetwork();
  const { session, events } = createSession(network.factory);
  await session.open();

  network.latest.emit(subscriptionFrame('uuid:47'));
  session.close();
  session.close();

  assert.equal(session.streamId, 'uuid:47');
  assert.deepEqual(events, [{ type: 'subscribed', streamId: 'uuid:47' }]);
  assert.equal(session.state, 'closing');
  assert.deepEqual(network.latest.closedWith, ['uuid:47']);
});

test('StreamSession: undecodable frames are dropped with a warning', async () => {
  const network = new FakeNetwork();
  const { session, events, logger } = createSession(network.factory);
  await session.open();

  network.latest.emit('<Event><control>');

  assert.equal(events.length, 0);
  assert.equal(session.isLive, true);
  assert.equal(logger.at('warn')[0].args[0], '[StreamSession]');
});

test('StreamSession: a dropped connection is reported once', async () => {
  const network = new FakeNetwork();
  const { session, errors } = createSession(network.factory);
  await session.open();

  network.latest.drop('connection reset');
  network.latest.drop('connection reset');
  network.latest.emit(statusFrame('1A 2B 3C 1', 0));

  assert.equal(errors.length, 1);
  assert.equal(errors[0].message, 'Event stream session failed: connection reset');
  assert.equal(session.state, 'closing');
  assert.equal(network.latest.closed, true);
});

test('StreamSession: a failed open rejects without calling onError', async () => {
  const network = new FakeNetwork();
  network.failNextOpens = 1;
  const { session, errors } = createSession(network.factory);

  await assert.rejects(session.open(), isSessionError('connection refused'));

  assert.equal(errors.length, 0);
  assert.deepEqual(network.latest.closedWith, [null]);
});

test('StreamSession: open times out when the transport never connects', async () => {
  const transport = new HangingTransport();
  const { session } = createSession(() => transport);

  await assert.rejects(session.open(), isSessionError('not subscribed within 100 ms'));

  assert.equal(transport.closes, 1);
});

test('StreamSession: close while opening rejects the open', async () => {
  const transport = new HangingTransport();
  const { session } = createSession(() => transport);

  const opening = session.open();
  session.close();

  await assert.rejects(opening, isSessionError('session closed while opening'));
  assert.equal(transport.closes, 1);
});

test('StreamSession: a session cannot be opened twice', async () => {
  const network = new FakeNetwork();
  const { session } = createSession(network.factory);
  await session.open();

  await assert.rejects(session.open(), isSessionError('session already used'));
  assert.equal(network.transports.length, 1);
  session.close();
});

test('StreamSession: a throwing event handler is logged and the session stays live', async () => {
  const network = new FakeNetwork();
  const logger = new RecordingLogger();
  const session = new StreamSession(
    { config: testConfig(), transportFactory: network.factory, logger },
    {
      onEvent: () => {
        throw new Error('handler broke');
      },
      onError: () => undefined,
    }
  );
  await session.open();

  network.latest.emit(statusFrame('1A 2B 3C 1', 255));

  assert.equal(session.isLive, true);
  assert.deepEqual(logger.at('error')[0].args.slice(0, 2), [
    '[StreamSession]',
    'Error dispatching property_update event:',
  ]);
  session.close();
});
