/**
 * Filename resolution
 *
 * Pick a local filename from response metadata and make it safe to
 * join onto the destination directory. Never fails: a name that
 * sanitizes to nothing is replaced with a timestamped fallback.
 */

import { FALLBACK_FILENAME_PREFIX } from "#/constants";

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f-\u009f]/g;
const EXTENDED_FILENAME_REGEX = /filename\*\s*=\s*[^']*'[^']*'([^;]+)/i;
const FILENAME_REGEX = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i;

function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Extract the filename from a Content-Disposition header.
 * `filename*=` (RFC 5987) wins over `filename=`.
 *
 * @example parseContentDisposition('attachment; filename="model%20v2.safetensors"') → "model v2.safetensors"
 */
export function parseContentDisposition(header: string | null): string | undefined {
  if (!header) return undefined;

  const extended = EXTENDED_FILENAME_REGEX.exec(header)?.[1]?.trim();
  if (extended) {
    return percentDecode(extended.replace(/^"|"$/g, ""));
  }

  const match = FILENAME_REGEX.exec(header);
  const value = match?.[1] ?? match?.[2]?.trim();
  return value ? percentDecode(value) : undefined;
}

/**
 * Last path segment of a URL, percent-decoded
 */
export function lastPathSegment(url: string): string {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url.split(/[?#]/)[0] ?? "";
  }
  return percentDecode(path.split("/").pop() ?? "");
}

/**
 * Reduce a name to its base component and replace characters that are
 * not allowed in filenames with "_". Idempotent.
 *
 * @example sanitizeFilename("../../etc/passwd") → "passwd"
 * @example sanitizeFilename('a<b>:c.bin') → "a_b__c.bin"
 */
export function sanitizeFilename(name: string, now: () => number = Date.now): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  const cleaned = base.replace(UNSAFE_FILENAME_CHARS, "_");
  const trimmed = cleaned.trim();

  if (!trimmed || trimmed === "." || trimmed === "..") {
    return `${FALLBACK_FILENAME_PREFIX}_${Math.floor(now() / 1000)}`;
  }
  return cleaned;
}

/**
 * Unsanitized filename candidate: Content-Disposition first, then the
 * final URL's last path segment.
 */
export function extractFilename(headers: Headers, finalUrl: string): string {
  return parseContentDisposition(headers.get("content-disposition")) ?? lastPathSegment(finalUrl);
}

export function resolveFilename(headers: Headers, finalUrl: string, now: () => number = Date.now): string {
  return sanitizeFilename(extractFilename(headers, finalUrl), now);
}
