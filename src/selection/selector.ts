/**
 * File selector
 *
 * Filters a version's manifest down to the files to download.
 * Size/precision filtering runs first, the safety gate after it, so
 * over-constraining size or fp can never switch the gate off.
 */

import { SAFE_FORMAT } from "#/constants";
import type { FileDescriptor } from "#/schemas";
import type { SelectionConstraints, SelectionDecision } from "./selection.types";

export const MODEL_FILE_TYPE = "Model";
export const COMPANION_FILE_TYPES: readonly string[] = ["VAE", "Other"];

/**
 * Normalize a precision value so manifest and user values compare equal.
 *
 * @example normalizePrecision("fp16") → "16"
 * @example normalizePrecision(32) → "32"
 */
export function normalizePrecision(value: string | number): string {
  return String(value).trim().toLowerCase().replace(/^fp/, "");
}

/**
 * File types compare case-insensitively: download URLs may spell them
 * differently from the manifest.
 */
export function isSameFileType(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isModelType(type: string): boolean {
  return isSameFileType(type, MODEL_FILE_TYPE);
}

export function isCompanionType(type: string): boolean {
  return COMPANION_FILE_TYPES.some((companion) => isSameFileType(type, companion));
}

/**
 * Whether a serialization format passes the safety gate (case-insensitive)
 */
export function isSafeFormat(format: string | undefined): boolean {
  return format?.toLowerCase() === SAFE_FORMAT;
}

function describeMismatch(file: FileDescriptor, constraints: SelectionConstraints): string | null {
  const { size, fp } = file.metadata;

  if (constraints.size && size !== constraints.size) {
    return `size ${size ?? "unknown"} does not match ${constraints.size}`;
  }
  if (constraints.fp && (fp === undefined || normalizePrecision(fp) !== normalizePrecision(constraints.fp))) {
    return `fp ${fp ?? "unknown"} does not match ${constraints.fp}`;
  }
  return null;
}

function decide(file: FileDescriptor, constraints: SelectionConstraints): Omit<SelectionDecision, "file"> {
  if (isModelType(file.type)) {
    const mismatch = describeMismatch(file, constraints);
    if (mismatch) {
      return { verdict: "skipped-constraint-mismatch", reason: mismatch };
    }
    if (!constraints.allowUnsafeFormat && !isSafeFormat(file.metadata.format)) {
      return {
        verdict: "skipped-unsafe",
        reason: `format ${file.metadata.format ?? "unknown"} is not SafeTensor`,
      };
    }
    return { verdict: "included" };
  }

  if (isCompanionType(file.type)) {
    return constraints.includeCompanions
      ? { verdict: "included" }
      : { verdict: "skipped-companion", reason: `${file.type} companion file` };
  }

  return { verdict: "skipped-unsupported-type", reason: `file type ${file.type} is not downloaded` };
}

/**
 * Decide, in manifest order, what happens to every file
 */
export function evaluateFiles(
  files: readonly FileDescriptor[],
  constraints: SelectionConstraints
): SelectionDecision[] {
  return files.map((file) => ({ file, ...decide(file, constraints) }));
}

/**
 * Select the files to download: matching model files first, then
 * companions when requested. Both groups keep manifest order.
 * Returns an empty array when nothing matches.
 */
export function selectFiles(
  files: readonly FileDescriptor[],
  constraints: SelectionConstraints
): FileDescriptor[] {
  const included = evaluateFiles(files, constraints)
    .filter((decision) => decision.verdict === "included")
    .map((decision) => decision.file);

  return [
    ...included.filter((file) => isModelType(file.type)),
    ...included.filter((file) => !isModelType(file.type)),
  ];
}
