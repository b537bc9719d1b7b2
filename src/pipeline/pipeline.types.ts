/**
 * Pipeline types
 *
 * Per-reference orchestration: resolve → plan (metadata + selection) → transfer.
 * Every failure is reported against its reference; the run carries on.
 */

import type { ReferenceMode, ResourceRef } from "#/reference";
import type { SelectionConstraints, SelectionDecision } from "#/selection";
import type {
  DownloadTarget,
  TransferErrorKind,
  TransferProgress,
  TransferResult,
} from "#/transfer";

export type PipelineFailureKind =
  | "InvalidReference"
  | "UnsupportedSource"
  | "MetadataFetchFailed"
  | "NoMatchingFiles"
  | "InternalError"
  | TransferErrorKind;

export interface PipelineFailure {
  kind: PipelineFailureKind;
  message: string;
  details?: string[];
  status?: number;
}

/**
 * What will be downloaded for one reference
 */
export interface DownloadPlan {
  ref: ResourceRef;
  versionId: string;
  /** Format of the primary file, when known */
  format?: string;
  targets: DownloadTarget[];
  /** Per-file decisions; empty when metadata was not needed */
  decisions: SelectionDecision[];
}

export type PlanResult =
  | { success: true; data: DownloadPlan }
  | { success: false; error: PipelineFailure };

export interface ReferenceOutcome {
  input: string;
  ref?: ResourceRef;
  /** Completed transfers, in target order */
  results: TransferResult[];
  failure?: PipelineFailure;
}

export interface PipelineReport {
  outcomes: ReferenceOutcome[];
  succeeded: number;
  failed: number;
  exitCode: 0 | 1;
}

/**
 * Presentation hooks. All optional; the engine never prints.
 */
export interface PipelineReporter {
  onPlanned?(input: string, plan: DownloadPlan): void;
  onTransferStart?(input: string, target: DownloadTarget): void;
  onProgress?(input: string, progress: TransferProgress): void;
  onTransferComplete?(input: string, result: TransferResult): void;
  onFailure?(input: string, failure: PipelineFailure): void;
}

export interface PipelineRunOptions {
  destinationDir: string;
  /** Grammar every input must follow (default "auto": decided per input) */
  mode?: ReferenceMode;
  constraints: SelectionConstraints;
  /** Number of references processed at once (default 1: strictly sequential) */
  concurrency?: number;
  signal?: AbortSignal;
  reporter?: PipelineReporter;
}
