/**
 * Global constants for the air-fetch engine
 */

export const REGISTRY_NAME = "civitai";
export const REGISTRY_HOST = "civitai.com";
export const REGISTRY_URL = `https://${REGISTRY_HOST}`;

export const VERSION_METADATA_PATH = "/api/v1/model-versions";
export const DOWNLOAD_PATH = "/api/download/models";

// AIR: [urn:][air:]ecosystem:kind:source:id[@version][.format]
// The id stops at "@" or "."; version stops at ".".
export const AIR_REGEX =
  /^(?:urn:)?(?:air:)?(?<ecosystem>[^:]+):(?<kind>[^:]+):(?<source>[^:]+):(?<id>[^@.]+)(?:@(?<version>[^.]+))?(?:\.(?<format>\w+))?$/;

// Serialization format that passes the safety gate (compared case-insensitively)
export const SAFE_FORMAT = "safetensor";

export const CHUNK_SIZE = 16 * 1024 * 1024;
export const MAX_REDIRECTS = 10;
export const FILE_MODE = 0o644;

export const USER_AGENT = "air-fetch";
export const FALLBACK_FILENAME_PREFIX = "civitai_download";
