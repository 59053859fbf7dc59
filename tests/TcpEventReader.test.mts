import { test } from 'node:test';
import assert from 'node:assert/strict';
import { TcpEventReader } from '../lib/connection/transports/TcpEventReader.mjs';
import { ERROR_CODES, isIsyError, type ErrorCode } from '../lib/IsyProtocol.mjs';

const SUBSCRIBE_BODY = '<SubscriptionResponse><SID>uuid:47</SID></SubscriptionResponse>';
const EVENT_BODY = '<Event seqnum="1"><control>ST</control><action uom="4" prec="1">215</action><node>n001_t1</node><fmtAct>21.5 °C</fmtAct></Event>';

function response(body: string): string {
  return (
    'HTTP/1.1 200 OK\r\n' +
    'Content-Type: text/xml; charset="utf-8"\r\n' +
    `Content-Length: ${Buffer.byteLength(body)}\r\n` +
    '\r\n' +
    body
  );
}

function eventPost(body: string): string {
  return (
    'POST /reuse_socket HTTP/1.1\r\n' +
    'HOST: 192.0.2.10:80\r\n' +
    `CONTENT-LENGTH: ${Buffer.byteLength(body)}\r\n` +
    'CONTENT-TYPE: text/xml\r\n' +
    '\r\n' +
    body
  );
}

function isErrorWithCode(code: ErrorCode) {
  return (error: unknown) => isIsyError(error) && error.code === code;
}

test('TcpEventReader: reads one message per chunk', () => {
  const reader = new TcpEventReader();

  assert.deepEqual(reader.read(Buffer.from(response(SUBSCRIBE_BODY))), [SUBSCRIBE_BODY]);
  assert.deepEqual(reader.read(Buffer.from(eventPost(EVENT_BODY))), [EVENT_BODY]);
  assert.equal(reader.messageCount, 2);
});

test('TcpEventReader: splits merged messages', () => {
  const reader = new TcpEventReader();
  const chunk = Buffer.from(response(SUBSCRIBE_BODY) + eventPost(EVENT_BODY) + eventPost(EVENT_BODY));

  assert.deepEqual(reader.read(chunk), [SUBSCRIBE_BODY, EVENT_BODY, EVENT_BODY]);
});

test('TcpEventReader: reassembles messages split at any byte', () => {
  const reader = new TcpEventReader();
  const stream = Buffer.from(response(SUBSCRIBE_BODY) + eventPost(EVENT_BODY));
  const bodies: string[] = [];

  // Three-byte chunks also split the multi-byte degree sign
  for (let offset = 0; offset < stream.length; offset += 3) {
    bodies.push(...reader.read(stream.subarray(offset, offset + 3)));
  }

  assert.deepEqual(bodies, [SUBSCRIBE_BODY, EVENT_BODY]);
  assert.equal(reader.messageCount, 2);
});

test('TcpEventReader: empty bodies are counted but not returned', () => {
  const reader = new TcpEventReader();

  assert.deepEqual(reader.read(Buffer.from(response(''))), []);
  assert.equal(reader.messageCount, 1);
});

test('TcpEventReader: status 817 means the controller is full', () => {
  const reader = new TcpEventReader();
  assert.throws(
    () => reader.read(Buffer.from('HTTP/1.1 817 Max Subscribers\r\nContent-Length: 0\r\n\r\n')),
    isErrorWithCode(ERROR_CODES.MAX_CONNECTIONS)
  );
});

test('TcpEventReader: status 401 means bad credentials', () => {
  const reader = new TcpEventReader();
  assert.throws(
    () => reader.read(Buffer.from('HTTP/1.1 401 Unauthorized\r\nContent-Length: 0\r\n\r\n')),
    isErrorWithCode(ERROR_CODES.AUTH_FAILED)
  );
});

test('TcpEventReader: headers without Content-Length fail the session', () => {
  const reader = new TcpEventReader();
  assert.throws(
    () => reader.read(Buffer.from('HTTP/1.1 200 OK\r\nContent-Type: text/xml\r\n\r\n<x/>')),
    (error: unknown) =>
      isIsyError(error) &&
      error.code === ERROR_CODES.SESSION_FAILED &&
      error.message === 'Event stream session failed: missing Content-Length after "HTTP/1.1 200 OK"'
  );
});

test('TcpEventReader: reset drops partial input', () => {
  const reader = new TcpEventReader();
  const message = eventPost(EVENT_BODY);

  assert.deepEqual(reader.read(Buffer.from(message.slice(0, 40))), []);
  reader.reset();

  assert.deepEqual(reader.read(Buffer.from(message)), [EVENT_BODY]);
  assert.equal(reader.messageCount, 1);
});
