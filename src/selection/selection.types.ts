import type { FileDescriptor } from "#/schemas";

/**
 * User constraints applied to a version's file manifest.
 * Absent size/fp match everything.
 */
export interface SelectionConstraints {
  size?: string;
  fp?: string;
  includeCompanions: boolean;
  allowUnsafeFormat: boolean;
}

export type SelectionVerdict =
  | "included"
  | "skipped-companion"
  | "skipped-unsafe"
  | "skipped-constraint-mismatch"
  | "skipped-unsupported-type";

/**
 * Why a manifest entry was or was not selected
 */
export interface SelectionDecision {
  file: FileDescriptor;
  verdict: SelectionVerdict;
  reason?: string;
}
