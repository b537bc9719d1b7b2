import { USER_AGENT } from "#/constants";

/**
 * Get headers for registry requests.
 * Without a token no Authorization header is sent (anonymous access).
 */
export function getRegistryHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return headers;
}
