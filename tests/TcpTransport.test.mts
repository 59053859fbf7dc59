import { test } from 'node:test';
import assert from 'node:assert/strict';
import net from 'node:net';
import { TcpTransport } from '../lib/connection/transports/TcpTransport.mjs';
import { ERROR_CODES, isIsyError } from '../lib/IsyProtocol.mjs';
import type { IsyError } from '../lib/IsyProtocol.mjs';
import { silentLogger } from '../lib/utils/Logger.mjs';
import { testConfig } from './helpers/config.mjs';
import { waitFor } from './helpers/FakeTransport.mjs';

const SUBSCRIBE_BODY = '<SubscriptionResponse><SID>uuid:47</SID></SubscriptionResponse>';
const EVENT_BODY = '<Event seqnum="2"><control>ST</control><action>255</action><node>1A 2B 3C 1</node></Event>';

function httpMessage(startLine: string, body: string): string {
  return `${startLine}\r\nContent-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`;
}

/**
 * Loopback stand-in for the controller
 */
async function startController(reply: (request: string) => string) {
  const requests: string[] = [];
  const server = net.createServer((socket) => {
    let received = '';
    socket.on('data', (chunk: Buffer) => {
      received += chunk.toString('utf8');
      if (received.includes('</s:Envelope>\r\n')) {
        requests.push(received);
        const answer = reply(received);
        received = '';
        if (answer) socket.write(answer);
      }
    });
  });
  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', resolve);
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no port');
  }
  const { port } = address;
  const stop = () =>
    new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  return { port, requests, stop };
}

test('TcpTransport: subscribes and streams events over one socket', async () => {
  const controller = await startController((request) =>
    request.includes('u:Subscribe')
      ? httpMessage('HTTP/1.1 200 OK', SUBSCRIBE_BODY) + httpMessage('POST /reuse_socket HTTP/1.1', EVENT_BODY)
      : ''
  );
  const frames: string[] = [];
  const closes: IsyError[] = [];
  const transport = new TcpTransport(
    testConfig({ host: '127.0.0.1', port: controller.port, transport: 'tcp' }),
    { onFrame: (frame) => frames.push(frame), onClose: (error) => closes.push(error) },
    silentLogger
  );

  await transport.open();
  await transport.subscribe(null);
  assert.deepEqual(frames.slice(0, 1), [SUBSCRIBE_BODY]);

  await waitFor(() => frames.length === 2);
  assert.equal(frames[1], EVENT_BODY);
  assert.ok(controller.requests[0].startsWith('POST /services HTTP/1.1\r\n'));

  transport.close('uuid:47');
  await waitFor(() => controller.requests.length === 2);
  assert.ok(controller.requests[1].includes('<SID>uuid:47</SID>'));
  assert.ok(controller.requests[1].includes('u:Unsubscribe'));
  assert.equal(closes.length, 0);

  await controller.stop();
});

test('TcpTransport: a full controller rejects the subscription', async () => {
  const controller = await startController(() => 'HTTP/1.1 817 Max Subscribers\r\nContent-Length: 0\r\n\r\n');
  const closes: IsyError[] = [];
  const transport = new TcpTransport(
    testConfig({ host: '127.0.0.1', port: controller.port, transport: 'tcp' }),
    { onFrame: () => undefined, onClose: (error) => closes.push(error) },
    silentLogger
  );

  await transport.open();
  await assert.rejects(
    transport.subscribe(null),
    (error: unknown) => isIsyError(error) && error.code === ERROR_CODES.MAX_CONNECTIONS
  );
  assert.equal(closes.length, 0);

  transport.close(null);
  await controller.stop();
});
