/**
 * TCP Event Reader
 *
 * The TCP event stream is a sequence of HTTP messages on one socket: first
 * the response to Subscribe, then one POST per event, each framed by its
 * Content-Length. Chunks may split or merge messages arbitrarily.
 */

import { ERROR_CODES, createIsyError } from '../../IsyProtocol.mjs';

const HEADER_BODY_SEPARATOR = Buffer.from('\r\n\r\n');
const STATUS_LINE = /^HTTP\/1\.[01] (\d{3})/;

const HTTP_UNAUTHORIZED = 401;
const HTTP_MAX_CONNECTIONS = 817;

export class TcpEventReader {
  private buffer: Buffer = Buffer.alloc(0);
  private contentLength: number | null = null;
  private count = 0;

  /**
   * Feed a chunk; returns every message body completed by it.
   * Throws AUTH_FAILED, MAX_CONNECTIONS or SESSION_FAILED on a bad header.
   */
  read(chunk: Buffer): string[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const bodies: string[] = [];

    for (;;) {
      if (this.contentLength === null) {
        const separator = this.buffer.indexOf(HEADER_BODY_SEPARATOR);
        if (separator === -1) return bodies;
        this.contentLength = this.parseHeaders(separator);
      }

      if (this.buffer.length < this.contentLength) return bodies;

      const body = this.buffer.subarray(0, this.contentLength);
      this.buffer = this.buffer.subarray(this.contentLength);
      this.contentLength = null;
      this.count++;
      if (body.length > 0) {
        bodies.push(body.toString('utf8'));
      }
    }
  }

  /**
   * Complete messages read so far
   */
  get messageCount(): number {
    return this.count;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.contentLength = null;
    this.count = 0;
  }

  private parseHeaders(separator: number): number {
    const headers = this.buffer.subarray(0, separator).toString('latin1');
    this.buffer = this.buffer.subarray(separator + HEADER_BODY_SEPARATOR.length);

    const [startLine, ...fields] = headers.split('\r\n');
    const status = STATUS_LINE.exec(startLine);
    if (status) {
      const code = Number(status[1]);
      if (code === HTTP_MAX_CONNECTIONS) {
        throw createIsyError(ERROR_CODES.MAX_CONNECTIONS, startLine);
      }
      if (code === HTTP_UNAUTHORIZED) {
        throw createIsyError(ERROR_CODES.AUTH_FAILED, startLine);
      }
    }

    for (const field of fields) {
      const colon = field.indexOf(':');
      if (colon === -1) continue;
      if (field.slice(0, colon).trim().toLowerCase() !== 'content-length') continue;

      const length = Number(field.slice(colon + 1).trim());
      if (Number.isInteger(length) && length >= 0) {
        return length;
      }
    }
    throw createIsyError(ERROR_CODES.SESSION_FAILED, `missing Content-Length after "${startLine}"`);
  }
}
