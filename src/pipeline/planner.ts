/**
 * Download planner
 *
 * Turns a ResourceRef into the list of URLs to fetch. Metadata is only
 * requested when the reference leaves the format open or the caller
 * asked for file-level selection. A download URL's type query limits
 * the manifest to that file type.
 */

import { REGISTRY_NAME } from "#/constants";
import type { RegistryClient } from "#/registry";
import {
  buildDownloadUrl,
  getReferenceFormat,
  getReferenceVersionId,
  parseDownloadUrl,
  type ResourceRef,
} from "#/reference";
import type { FileDescriptor } from "#/schemas";
import {
  evaluateFiles,
  isCompanionType,
  isSafeFormat,
  isSameFileType,
  selectFiles,
  type SelectionConstraints,
} from "#/selection";
import type { PlanResult } from "./pipeline.types";

// Registry query spelling for formats that appear lowercase in AIRs
const FORMAT_QUERY_NAMES: Record<string, string> = {
  safetensor: "SafeTensor",
};

function toFormatQuery(format: string | undefined): string | undefined {
  if (!format) return undefined;
  return FORMAT_QUERY_NAMES[format.toLowerCase()] ?? format;
}

export function hasFileConstraints(constraints: SelectionConstraints): boolean {
  return Boolean(constraints.size || constraints.fp || constraints.includeCompanions);
}

/**
 * Whether version metadata must be fetched before downloading
 */
export function needsMetadata(ref: ResourceRef, constraints: SelectionConstraints): boolean {
  return !getReferenceFormat(ref) || hasFileConstraints(constraints);
}

/**
 * Size and fp from a download URL's query fill constraints the caller left unset
 */
export function effectiveConstraints(ref: ResourceRef, constraints: SelectionConstraints): SelectionConstraints {
  if (ref.type !== "url") return constraints;
  return {
    ...constraints,
    size: constraints.size ?? ref.querySize,
    fp: constraints.fp ?? ref.queryFp,
  };
}

/**
 * Download URL for one manifest file. The file's own downloadUrl is used
 * when it is a registry download URL.
 */
export function fileDownloadUrl(versionId: string, file: FileDescriptor): string {
  if (file.downloadUrl && parseDownloadUrl(file.downloadUrl).success) {
    return file.downloadUrl;
  }
  return buildDownloadUrl(versionId, { type: file.type, format: toFormatQuery(file.metadata.format) });
}

export async function planDownloads(
  ref: ResourceRef,
  constraints: SelectionConstraints,
  registry: RegistryClient,
  token?: string,
  signal?: AbortSignal
): Promise<PlanResult> {
  if (ref.type === "air" && ref.source !== REGISTRY_NAME) {
    return {
      success: false,
      error: {
        kind: "UnsupportedSource",
        message: `Unsupported source "${ref.source}": only ${REGISTRY_NAME} is supported`,
      },
    };
  }

  const versionId = getReferenceVersionId(ref);
  const expectedAuth = Boolean(token);
  const requestedType = ref.type === "url" ? ref.queryType : undefined;

  if (!needsMetadata(ref, constraints)) {
    const format = getReferenceFormat(ref);
    // Only a known companion type skips the gate; unknown types count as weights
    const isCompanion = requestedType !== undefined && isCompanionType(requestedType);

    if (!isCompanion && !constraints.allowUnsafeFormat && !isSafeFormat(format)) {
      return {
        success: false,
        error: {
          kind: "NoMatchingFiles",
          message: `Format ${format ?? "unknown"} is not SafeTensor; pass --force-unsafe to download it anyway`,
        },
      };
    }

    const url = ref.type === "url" ? ref.rawUrl : buildDownloadUrl(versionId, { format: toFormatQuery(format) });
    return {
      success: true,
      data: { ref, versionId, format, targets: [{ url, expectedAuth }], decisions: [] },
    };
  }

  const metadata = await registry.fetchVersionMetadata(versionId, signal);
  if (!metadata.success) {
    const { error } = metadata;
    if (signal?.aborted) {
      return { success: false, error: { kind: "Cancelled", message: `Metadata request for version ${versionId} cancelled` } };
    }
    return {
      success: false,
      error: {
        kind: "MetadataFetchFailed",
        message: error.message,
        status: error.kind === "Http" ? error.status : undefined,
        details: error.kind === "Decode" ? error.details : undefined,
      },
    };
  }

  const files = requestedType
    ? metadata.data.files.filter((file) => isSameFileType(file.type, requestedType))
    : metadata.data.files;
  // Asking for a companion type by URL counts as asking for companions
  const effective = requestedType && isCompanionType(requestedType)
    ? { ...effectiveConstraints(ref, constraints), includeCompanions: true }
    : effectiveConstraints(ref, constraints);
  const decisions = evaluateFiles(files, effective);
  const selected = selectFiles(files, effective);

  if (selected.length === 0) {
    const scope = requestedType ? `${requestedType} files` : "files";
    return {
      success: false,
      error: {
        kind: "NoMatchingFiles",
        message: `No ${scope} of version ${versionId} match the constraints (${metadata.data.files.length} in manifest)`,
        details: decisions.map((decision) => `${decision.file.name}: ${decision.reason ?? decision.verdict}`),
      },
    };
  }

  return {
    success: true,
    data: {
      ref,
      versionId,
      format: selected[0]?.metadata.format ?? getReferenceFormat(ref),
      targets: selected.map((file) => ({
        url: fileDownloadUrl(versionId, file),
        expectedAuth,
        label: file.name,
      })),
      decisions,
    },
  };
}
