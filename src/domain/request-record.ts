/**
 * Core domain types for the reqtrail request model.
 *
 * A RequestRecord is the canonical snapshot of one served request as it
 * flows from the request path to durable storage. These types carry no
 * framework dependencies.
 */

/** Sentinel for a request whose body length was not declared. */
export const UNKNOWN_CONTENT_LENGTH = -1;

/**
 * What a host adapter reads off a request. Header values that were not
 * sent are represented as empty strings.
 */
export interface RequestMetadata {
  readonly sourceAddress: string;
  readonly userAgent: string;
  readonly path: string;
  readonly method: string;
  readonly protocol: string;
  readonly host: string;
  readonly acceptLanguage: string;
  readonly referer: string;
  readonly contentType: string;
  /** Declared body length, or UNKNOWN_CONTENT_LENGTH. */
  readonly contentLength: number;
}

/**
 * Canonical request record.
 *
 * `observedAt` is taken before downstream handling starts and
 * `durationMs` spans the whole downstream call.
 */
export interface RequestRecord extends RequestMetadata {
  readonly observedAt: Date;
  readonly durationMs: number;
}

/**
 * Builds a complete, frozen record.
 *
 * Out-of-range values are normalised rather than rejected so that a record
 * can always be produced for a request that was actually served.
 */
export function createRequestRecord(
  metadata: RequestMetadata,
  observedAt: Date,
  durationMs: number,
): RequestRecord {
  const contentLength = Number.isSafeInteger(metadata.contentLength) && metadata.contentLength >= 0
    ? metadata.contentLength
    : UNKNOWN_CONTENT_LENGTH;

  return Object.freeze({
    sourceAddress: metadata.sourceAddress,
    userAgent: metadata.userAgent,
    path: metadata.path === '' ? '/' : metadata.path,
    method: metadata.method,
    protocol: metadata.protocol,
    host: metadata.host,
    acceptLanguage: metadata.acceptLanguage,
    referer: metadata.referer,
    contentType: metadata.contentType,
    contentLength,
    // Copy so the caller cannot mutate the record's instant afterwards
    observedAt: new Date(observedAt.getTime()),
    durationMs: Number.isFinite(durationMs) && durationMs > 0 ? durationMs : 0,
  });
}
