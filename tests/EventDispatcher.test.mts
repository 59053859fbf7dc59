import { test } from 'node:test';
import assert from 'node:assert/strict';
import { NotificationFabric } from '../lib/events/NotificationFabric.mjs';
import { isIsyError } from '../lib/IsyProtocol.mjs';
import { decodeFrame } from '../lib/messaging/EventDecoder.mjs';
import { EventDispatcher } from '../lib/messaging/EventDispatcher.mjs';
import { ShadowTree } from '../lib/state/ShadowTree.mjs';
import type { ControlReceived, IsyEvent, StatusChange, SystemEvent } from '../lib/types.mjs';
import { eventFrame, heartbeatFrame, statusFrame, subscriptionFrame } from './helpers/FakeTransport.mjs';
import { RecordingLogger } from './helpers/RecordingLogger.mjs';

const LAMP = '1A 2B 3C 1';

function deliver(dispatcher: EventDispatcher, frame: string): IsyEvent {
  const event = decodeFrame(frame);
  assert.ok(!isIsyError(event), 'frame should decode');
  dispatcher.dispatch(event);
  return event;
}

function createDispatcher() {
  const logger = new RecordingLogger();
  const fabric = new NotificationFabric(logger);
  const tree = new ShadowTree(fabric, logger);
  const dispatcher = new EventDispatcher(tree, fabric, logger);
  const changes: StatusChange[] = [];
  const system: SystemEvent[] = [];
  const controls: ControlReceived[] = [];
  fabric.subscribe('control', (event) => {
    controls.push(event);
  });
  fabric.subscribe('status', (event) => {
    changes.push(event);
  });
  fabric.subscribe('system', (event) => {
    system.push(event);
  });
  tree.seed([
    { kind: 'node', address: LAMP, name: 'Porch', status: 0, uom: '100' },
    { kind: 'program', address: '001E', name: 'Wake', status: false },
    { kind: 'variable', variableType: 2, variableId: 3, name: 'Counter', status: 0 },
    { kind: 'node', address: 'N1', name: 'Dimmer', status: 0, uom: '51' },
    { kind: 'node', address: 'P1', name: 'Keypad', status: 0, uom: '100' },
  ]);
  return { logger, tree, dispatcher, changes, system, controls };
}

test('EventDispatcher: status frame updates the tree', () => {
  const { tree, dispatcher, changes } = createDispatcher();

  const event = deliver(dispatcher, statusFrame(LAMP, 255));

  assert.equal(event.type, 'property_update');
  assert.equal(tree.lookup(LAMP)?.status, 255);
  assert.deepEqual(
    changes.map((change) => [change.address, change.previous, change.current]),
    [[LAMP, 0, 255]]
  );
});

test('EventDispatcher: program and variable frames reach the tree', () => {
  const { tree, dispatcher, changes } = createDispatcher();

  deliver(dispatcher, eventFrame({ control: '_1', action: '0', eventInfo: '<id>1e</id><s>21</s>' }));
  deliver(
    dispatcher,
    eventFrame({ control: '_1', action: '6', eventInfo: '<var type="2" id="3"><val>4</val><prec>0</prec></var>' })
  );

  assert.equal(tree.lookup('001E')?.status, true);
  assert.equal(tree.lookup('2.3')?.status, 4);
  assert.deepEqual(
    changes.map((change) => [change.kind, change.current]),
    [
      ['program', true],
      ['variable', 4],
    ]
  );
});

test('EventDispatcher: node removal updates the tree and the system feed', () => {
  const { tree, dispatcher, system } = createDispatcher();

  deliver(dispatcher, eventFrame({ control: '_3', action: 'NR', node: LAMP }));

  assert.equal(tree.lookup(LAMP), undefined);
  assert.deepEqual(system, [{ type: 'node_list_changed', address: LAMP, change: 'NR', detail: {} }]);
});

test('EventDispatcher: node errors are logged as errors', () => {
  const { logger, dispatcher, system } = createDispatcher();

  deliver(dispatcher, eventFrame({ control: '_3', action: 'NE', node: LAMP }));

  assert.deepEqual(logger.at('error')[0].args, [
    '[EventDispatcher]',
    `Could not communicate with device: ${LAMP}`,
  ]);
  assert.equal(system.length, 1);
});

test('EventDispatcher: system status and stream id go to the system feed', () => {
  const { dispatcher, system } = createDispatcher();

  deliver(dispatcher, eventFrame({ control: '_5', action: '1' }));
  deliver(dispatcher, subscriptionFrame('uuid:47'));

  assert.deepEqual(system, [
    { type: 'system_status', status: 'busy' },
    { type: 'stream_id', streamId: 'uuid:47' },
  ]);
});

test('EventDispatcher: heartbeats and unhandled events change nothing', () => {
  const { dispatcher, changes, system } = createDispatcher();

  assert.equal(deliver(dispatcher, heartbeatFrame(3, 120)).type, 'heartbeat');
  assert.equal(deliver(dispatcher, eventFrame({ control: '_9', action: '1' })).type, 'unhandled');

  assert.equal(changes.length, 0);
  assert.equal(system.length, 0);
});

test('EventDispatcher: a property update for a seeded node changes status once', () => {
  const { tree, dispatcher, changes } = createDispatcher();

  deliver(dispatcher, statusFrame('N1', 100, '51'));

  assert.equal(tree.lookup('N1')?.status, 100);
  assert.deepEqual(
    changes.map((change) => [change.address, change.previous, change.current, change.formatted]),
    [['N1', 0, 100, '100 %']]
  );
});

test('EventDispatcher: repeated control frames always notify but change no status', () => {
  const { dispatcher, changes, controls } = createDispatcher();
  const frame = eventFrame({ control: 'RUN', node: 'P1' });

  deliver(dispatcher, frame);
  deliver(dispatcher, frame);

  assert.deepEqual(
    controls.map((control) => [control.address, control.code, control.value]),
    [
      ['P1', 'RUN', null],
      ['P1', 'RUN', null],
    ]
  );
  assert.equal(changes.length, 0);
});
