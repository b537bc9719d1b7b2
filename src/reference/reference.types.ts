/**
 * Reference types
 *
 * A reference is what the user typed: either an AIR or a direct
 * registry download URL. Parse once; downstream code only sees ResourceRef.
 */

/**
 * Structured resource name:
 * [urn:][air:]ecosystem:kind:source:id[@version][.format]
 */
export interface AirRef {
  type: "air";
  ecosystem: string;
  kind: string;
  source: string;
  id: string;
  version?: string;
  format?: string;
  raw: string;
}

/**
 * Direct download URL: .../api/download/models/{versionId}[?type=&format=&size=&fp=]
 */
export interface UrlRef {
  type: "url";
  versionId: string;
  queryType?: string;
  queryFormat?: string;
  querySize?: string;
  queryFp?: string;
  rawUrl: string;
}

export type ResourceRef = AirRef | UrlRef;

/**
 * How a batch of raw references is to be read. "auto" picks per string.
 */
export type ReferenceMode = "air" | "url" | "auto";

export type InvalidUrlReason = "domain" | "path" | "id";

export type ParseError =
  | { kind: "InvalidAir"; input: string; message: string }
  | { kind: "InvalidUrl"; input: string; reason: InvalidUrlReason; message: string };

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ParseError };

/**
 * Query parameters accepted by the download endpoint
 */
export interface DownloadQuery {
  type?: string;
  format?: string;
  size?: string;
  fp?: string;
}
