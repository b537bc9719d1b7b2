/**
 * Console reporter
 *
 * Human-readable rendering of pipeline events. Diagnostics go through
 * the logger; this is what the user reads on stdout.
 */

import { formatBytes, formatDuration, formatProgress } from "#/formatters";
import type { PipelineReport, PipelineReporter } from "#/pipeline";
import type { SelectionVerdict } from "#/selection";

export interface TextOutput {
  write(text: string): unknown;
}

const VERDICT_LABELS: Record<Exclude<SelectionVerdict, "included">, string> = {
  "skipped-companion": "companion",
  "skipped-unsafe": "unsafe",
  "skipped-constraint-mismatch": "constraint mismatch",
  "skipped-unsupported-type": "unsupported type",
};

export function createConsoleReporter(out: TextOutput): PipelineReporter {
  // A progress line is rewritten in place with \r until the transfer ends
  let progressOpen = false;

  const line = (text: string): void => {
    if (progressOpen) {
      out.write("\n");
      progressOpen = false;
    }
    out.write(`${text}\n`);
  };

  return {
    onPlanned(input, plan) {
      const label = plan.ref.type === "air" ? "AIR" : "URL";
      const url = plan.targets[0]?.url ?? "";
      line(`Found ${label}: ${input} -> ${url} (version: ${plan.versionId}, format: ${plan.format ?? "unknown"})`);

      for (const { file, verdict, reason } of plan.decisions) {
        if (verdict === "included") {
          line(`  + ${file.name}`);
        } else {
          line(`  - ${file.name} (skipped, ${VERDICT_LABELS[verdict]}${reason ? `: ${reason}` : ""})`);
        }
      }
    },

    onTransferStart(_input, target) {
      line(`Downloading ${target.label ?? target.url}...`);
    },

    onProgress(_input, progress) {
      out.write(`\r${formatProgress(progress.fileName, progress.bytesWritten, progress.totalBytes)}`);
      progressOpen = true;
    },

    onTransferComplete(_input, result) {
      line(`Saved: ${result.localPath} (${formatBytes(result.bytesWritten)} in ${formatDuration(result.elapsedMs)})`);
    },

    onFailure(input, failure) {
      line(`Failed: ${input}: ${failure.message}`);
      for (const detail of failure.details ?? []) {
        line(`  ${detail}`);
      }
    },
  };
}

export function formatSummary(report: PipelineReport): string {
  const files = report.outcomes.reduce((count, outcome) => count + outcome.results.length, 0);
  return `Done: ${report.succeeded} succeeded, ${report.failed} failed, ${files} file(s) saved`;
}
