/**
 * Identifier resolver
 *
 * Pure functions turning a raw reference string into a ResourceRef.
 * No network I/O happens here.
 */

import { AIR_REGEX, DOWNLOAD_PATH, REGISTRY_HOST, REGISTRY_URL, VERSION_METADATA_PATH } from "#/constants";
import type {
  AirRef,
  DownloadQuery,
  InvalidUrlReason,
  ParseResult,
  ReferenceMode,
  ResourceRef,
  UrlRef,
} from "./reference.types";

const DOWNLOAD_PATH_PREFIX = `${DOWNLOAD_PATH}/`;
const DIGITS_REGEX = /^\d+$/;

/**
 * Parse an AIR string.
 *
 * @example parseAir("urn:air:flux1:lora:civitai:667004@746484")
 *   → { ecosystem: "flux1", kind: "lora", source: "civitai", id: "667004", version: "746484" }
 */
export function parseAir(input: string): ParseResult<AirRef> {
  const groups: Record<string, string | undefined> = AIR_REGEX.exec(input)?.groups ?? {};
  const { ecosystem, kind, source, id, version, format } = groups;

  if (!ecosystem || !kind || !source || !id) {
    return {
      success: false,
      error: {
        kind: "InvalidAir",
        input,
        message: `Invalid AIR: ${input}. Expected format: [urn:][air:]ecosystem:type:source:id[@version][.format]`,
      },
    };
  }

  return {
    success: true,
    data: { type: "air", ecosystem, kind, source, id, version, format, raw: input },
  };
}

function invalidUrl(input: string, reason: InvalidUrlReason, message: string): ParseResult<UrlRef> {
  return { success: false, error: { kind: "InvalidUrl", input, reason, message } };
}

function isRegistryHost(hostname: string): boolean {
  return hostname === REGISTRY_HOST || hostname.endsWith(`.${REGISTRY_HOST}`);
}

function queryValue(params: URLSearchParams, key: string): string | undefined {
  // get() returns the first occurrence; blank values count as absent
  return params.get(key) || undefined;
}

/**
 * Parse a registry download URL.
 *
 * @example parseDownloadUrl("https://civitai.com/api/download/models/746484?type=Model&format=SafeTensor")
 *   → { versionId: "746484", queryType: "Model", queryFormat: "SafeTensor" }
 */
export function parseDownloadUrl(input: string): ParseResult<UrlRef> {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return invalidUrl(input, "domain", `Invalid URL: ${input}`);
  }

  if ((url.protocol !== "http:" && url.protocol !== "https:") || !isRegistryHost(url.hostname)) {
    return invalidUrl(input, "domain", `Invalid domain in URL: ${input}`);
  }

  if (!url.pathname.startsWith(DOWNLOAD_PATH_PREFIX)) {
    return invalidUrl(input, "path", `Invalid download path in URL: ${input}`);
  }

  const versionId = url.pathname.slice(DOWNLOAD_PATH_PREFIX.length).split("/")[0] ?? "";
  if (!DIGITS_REGEX.test(versionId)) {
    return invalidUrl(input, "id", `Model version ID is not numeric: "${versionId}"`);
  }

  return {
    success: true,
    data: {
      type: "url",
      versionId,
      queryType: queryValue(url.searchParams, "type"),
      queryFormat: queryValue(url.searchParams, "format"),
      querySize: queryValue(url.searchParams, "size"),
      queryFp: queryValue(url.searchParams, "fp"),
      rawUrl: input,
    },
  };
}

/**
 * Resolve a raw reference. In "auto" mode anything with a scheme
 * separator is treated as a URL, everything else as an AIR; the other
 * modes accept only their own grammar.
 */
export function resolveReference(raw: string, mode: ReferenceMode = "auto"): ParseResult<ResourceRef> {
  const input = raw.trim();
  switch (mode) {
    case "air":
      return parseAir(input);
    case "url":
      return parseDownloadUrl(input);
    case "auto":
      return input.includes("://") ? parseDownloadUrl(input) : parseAir(input);
  }
}

/**
 * Version ID used for metadata and download requests.
 * An AIR without @version falls back to its resource id.
 */
export function getReferenceVersionId(ref: ResourceRef): string {
  return ref.type === "air" ? (ref.version ?? ref.id) : ref.versionId;
}

/**
 * Format declared by the reference itself, if any
 */
export function getReferenceFormat(ref: ResourceRef): string | undefined {
  return ref.type === "air" ? ref.format : ref.queryFormat;
}

export function buildDownloadUrl(versionId: string, query: DownloadQuery = {}): string {
  const params = new URLSearchParams();
  for (const key of ["type", "format", "size", "fp"] as const) {
    const value = query[key];
    if (value) params.set(key, value);
  }
  const search = params.toString();
  return `${REGISTRY_URL}${DOWNLOAD_PATH}/${encodeURIComponent(versionId)}${search ? `?${search}` : ""}`;
}

export function buildVersionMetadataUrl(versionId: string): string {
  return `${REGISTRY_URL}${VERSION_METADATA_PATH}/${encodeURIComponent(versionId)}`;
}

/**
 * Get a display name for a reference
 */
export function getReferenceDisplayName(ref: ResourceRef): string {
  switch (ref.type) {
    case "air": {
      const version = ref.version ? `@${ref.version}` : "";
      const format = ref.format ? `.${ref.format}` : "";
      return `urn:air:${ref.ecosystem}:${ref.kind}:${ref.source}:${ref.id}${version}${format}`;
    }
    case "url":
      return ref.rawUrl;
  }
}
