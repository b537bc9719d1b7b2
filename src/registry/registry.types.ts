/**
 * Registry types
 *
 * Metadata lookups against the model registry API.
 */

export type { FileDescriptor, FileMetadata, VersionMetadata } from "#/schemas";

export type FetchError =
  | { kind: "Http"; status: number; message: string }
  | { kind: "Decode"; message: string; details: string[] }
  | { kind: "Network"; message: string };

export type FetchResult<T> =
  | { success: true; data: T }
  | { success: false; error: FetchError };
