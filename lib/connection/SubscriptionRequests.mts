/**
 * Subscription Requests
 *
 * Builds the handshake pieces for both event transports: the WebSocket URL
 * and headers, and the raw SOAP Subscribe/Unsubscribe HTTP requests written
 * to the TCP socket.
 */

import { PROTOCOL_CONFIG } from '../IsyProtocol.mjs';
import type { ResolvedClientConfig } from '../types.mjs';

type RequestTarget = Pick<
  ResolvedClientConfig,
  'host' | 'port' | 'tls' | 'webroot' | 'username' | 'password'
>;

const CRLF = '\r\n';

/**
 * HTTP basic auth header value
 */
export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

/**
 * e.g. `ws://10.0.0.5:80/rest/subscribe`
 */
export function buildWebSocketUrl(target: RequestTarget): string {
  const scheme = target.tls ? 'wss' : 'ws';
  return `${scheme}://${target.host}:${target.port}${target.webroot}${PROTOCOL_CONFIG.WEBSOCKET.PATH}`;
}

export function buildWebSocketHeaders(target: RequestTarget): Record<string, string> {
  return { Authorization: basicAuthorization(target.username, target.password) };
}

/**
 * SOAP Subscribe request. With a previous stream id the controller resumes
 * that subscription instead of starting a new one.
 */
export function buildSubscribeRequest(target: RequestTarget, streamId: string | null): string {
  const lines = [
    '<s:Envelope><s:Body>',
    `<u:Subscribe xmlns:u="${PROTOCOL_CONFIG.TCP.SOAP_SERVICE}">`,
    '<reportURL>REUSE_SOCKET</reportURL>',
    '<duration>infinite</duration>',
  ];
  if (streamId) {
    lines.push(`<SID>${streamId}</SID>`);
  }
  lines.push('</u:Subscribe></s:Body></s:Envelope>');

  return buildSoapRequest(target, 'Subscribe', lines.join('\n') + CRLF);
}

export function buildUnsubscribeRequest(target: RequestTarget, streamId: string): string {
  const body = [
    '<s:Envelope><s:Body>',
    `<u:Unsubscribe xmlns:u="${PROTOCOL_CONFIG.TCP.SOAP_SERVICE}">`,
    `<SID>${streamId}</SID>`,
    '</u:Unsubscribe></s:Body></s:Envelope>',
  ].join('\n');

  return buildSoapRequest(target, 'Unsubscribe', body + CRLF);
}

function buildSoapRequest(target: RequestTarget, action: string, body: string): string {
  const head = [
    `POST ${target.webroot}${PROTOCOL_CONFIG.TCP.SERVICES_PATH} HTTP/1.1`,
    `Host: ${target.host}:${target.port}`,
    `Authorization: ${basicAuthorization(target.username, target.password)}`,
    `Content-Length: ${Buffer.byteLength(body, 'utf8')}`,
    'Content-Type: text/xml; charset="utf-8"',
    `SOAPAction: ${PROTOCOL_CONFIG.TCP.SOAP_ACTION}#${action}`,
  ];
  return head.join(CRLF) + CRLF + CRLF + body;
}
