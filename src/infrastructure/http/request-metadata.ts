import type { IncomingHttpHeaders, IncomingMessage } from 'node:http';
import { isIPv6 } from 'node:net';
import type { RequestMetadata } from '../../domain/index.js';
import { UNKNOWN_CONTENT_LENGTH } from '../../domain/index.js';

function header(headers: IncomingHttpHeaders, name: string): string {
  const value = headers[name];
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(', ') : value;
}

/** `ip:port`, with IPv6 addresses bracketed. */
export function formatPeerAddress(address: string | undefined, port: number | undefined): string {
  if (address === undefined) return '';
  if (port === undefined) return address;
  return isIPv6(address) ? `[${address}]:${port}` : `${address}:${port}`;
}

/** Parses a Content-Length header; absent or malformed yields UNKNOWN_CONTENT_LENGTH. */
export function parseContentLength(value: string): number {
  if (!/^\d+$/.test(value)) return UNKNOWN_CONTENT_LENGTH;
  const length = Number(value);
  return Number.isSafeInteger(length) ? length : UNKNOWN_CONTENT_LENGTH;
}

/** Strips the query string. The path is kept percent-encoded as received. */
export function requestPath(url: string | undefined): string {
  if (url === undefined || url === '') return '/';
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

/** Reads the observable attributes of a Node request without touching it. */
export function describeIncomingMessage(req: IncomingMessage): RequestMetadata {
  return {
    sourceAddress: formatPeerAddress(req.socket.remoteAddress, req.socket.remotePort),
    userAgent: header(req.headers, 'user-agent'),
    path: requestPath(req.url),
    method: req.method ?? 'GET',
    protocol: `HTTP/${req.httpVersion}`,
    host: header(req.headers, 'host'),
    acceptLanguage: header(req.headers, 'accept-language'),
    referer: header(req.headers, 'referer'),
    contentType: header(req.headers, 'content-type'),
    contentLength: parseContentLength(header(req.headers, 'content-length')),
  };
}
