/**
 * Transfer types
 *
 * One transfer = one HTTP download of one file into the destination
 * directory: Requesting → Redirected(0..N) → Streaming → Complete,
 * with any state able to end in Failed.
 */

/**
 * URL to fetch and whether the registry token should be sent with it
 */
export interface DownloadTarget {
  url: string;
  expectedAuth: boolean;
  /** Manifest file name, for display only */
  label?: string;
}

export type TransferState = "requesting" | "redirected" | "streaming" | "complete" | "failed";

export interface RedirectHop {
  status: number;
  from: string;
  to: string;
}

export interface TransferProgress {
  fileName: string;
  bytesWritten: number;
  /** Declared Content-Length, when the server sent one */
  totalBytes?: number;
  percent?: number;
}

export interface TransferResult {
  localPath: string;
  fileName: string;
  bytesWritten: number;
  declaredBytes?: number;
  elapsedMs: number;
  finalUrl: string;
  redirects: RedirectHop[];
}

export type TransferErrorKind =
  | "AccessDenied"
  | "NotFound"
  | "UpstreamError"
  | "UnexpectedContentType"
  | "IOFailure"
  | "NetworkFailure"
  | "Cancelled";

export interface TransferError {
  kind: TransferErrorKind;
  message: string;
  url: string;
  status?: number;
  redirects: RedirectHop[];
  /** Set when a partial file was left on disk */
  localPath?: string;
}

export type TransferOutcome =
  | { success: true; data: TransferResult }
  | { success: false; error: TransferError };

export interface TransferHooks {
  signal?: AbortSignal;
  onProgress?: (progress: TransferProgress) => void;
  onStateChange?: (state: TransferState) => void;
}
