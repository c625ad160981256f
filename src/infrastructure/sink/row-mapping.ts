import { isIP } from 'node:net';
import type { RequestRecord } from '../../domain/index.js';
import type { RequestLogParams } from '../db/index.js';

/**
 * Reduces a source address to the bare IP the `inet` column accepts.
 *
 * Hosts report the peer as `ip:port` or `[ipv6]:port`; the port is dropped.
 * Anything unrecognised is passed through and left for the database to
 * reject as a row-level failure.
 */
export function toInetAddress(address: string): string {
  const trimmed = address.trim();
  if (isIP(trimmed) !== 0) return trimmed;

  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(trimmed);
  if (bracketed?.[1] !== undefined && isIP(bracketed[1]) !== 0) {
    return bracketed[1];
  }

  const lastColon = trimmed.lastIndexOf(':');
  if (lastColon > 0) {
    const host = trimmed.slice(0, lastColon);
    if (isIP(host) === 4) return host;
  }

  return trimmed;
}

/** Formats a duration as a Postgres interval literal with microsecond precision. */
export function toIntervalLiteral(durationMs: number): string {
  return `${Number(durationMs.toFixed(3))} milliseconds`;
}

function emptyToNull(value: string): string | null {
  return value === '' ? null : value;
}

/**
 * Maps a record onto `request_logs` parameters.
 * Absent optional headers and an unknown content length become NULL.
 */
export function toRowParams(record: RequestRecord): RequestLogParams {
  return {
    ip: toInetAddress(record.sourceAddress),
    user_agent: emptyToNull(record.userAgent),
    path: record.path,
    request_time: record.observedAt,
    method: record.method,
    protocol: record.protocol,
    host: record.host,
    accept_language: emptyToNull(record.acceptLanguage),
    referer: emptyToNull(record.referer),
    content_type: emptyToNull(record.contentType),
    content_length: record.contentLength < 0 ? null : record.contentLength,
    response_time: toIntervalLiteral(record.durationMs),
  };
}
