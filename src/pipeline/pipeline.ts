/**
 * Download pipeline
 *
 * Runs every reference through resolve → plan → transfer and collects
 * one outcome per reference. A failing reference never stops the others.
 */

import pLimit from "p-limit";
import type { EngineContext } from "#/core";
import type { Logger } from "#/logger";
import { resolveReference } from "#/reference";
import { RegistryClient } from "#/registry";
import { TransferExecutor, type TransferExecutorOptions } from "#/transfer";
import { planDownloads } from "./planner";
import type {
  PipelineFailure,
  PipelineReport,
  PipelineRunOptions,
  ReferenceOutcome,
} from "./pipeline.types";

export interface DownloadPipelineOptions extends TransferExecutorOptions {
  /** Log decoded version metadata at debug level */
  dumpMetadata?: boolean;
}

export class DownloadPipeline {
  private readonly logger: Logger;
  private readonly token?: string;
  private readonly registry: RegistryClient;
  private readonly executor: TransferExecutor;

  constructor(context: EngineContext, options: DownloadPipelineOptions = {}) {
    this.logger = context.logger;
    this.token = context.token;
    this.registry = new RegistryClient(context.http, context.logger, {
      token: context.token,
      dumpMetadata: options.dumpMetadata,
    });
    this.executor = new TransferExecutor(context, options);
  }

  async run(inputs: readonly string[], options: PipelineRunOptions): Promise<PipelineReport> {
    const limit = pLimit(Math.max(1, options.concurrency ?? 1));
    const outcomes = await Promise.all(inputs.map((input) => limit(() => this.processReference(input, options))));
    const failed = outcomes.filter((outcome) => outcome.failure).length;

    return {
      outcomes,
      succeeded: outcomes.length - failed,
      failed,
      exitCode: failed > 0 ? 1 : 0,
    };
  }

  async processReference(input: string, options: PipelineRunOptions): Promise<ReferenceOutcome> {
    const { reporter } = options;
    const outcome: ReferenceOutcome = { input, results: [] };

    const failWith = (failure: PipelineFailure): ReferenceOutcome => {
      outcome.failure = failure;
      this.logger.debug({ reference: input, kind: failure.kind }, failure.message);
      try {
        reporter?.onFailure?.(input, failure);
      } catch (err) {
        this.logger.warn(
          { reference: input, error: err instanceof Error ? err.message : String(err) },
          "failure reporter threw"
        );
      }
      return outcome;
    };

    try {
      const resolved = resolveReference(input, options.mode);
      if (!resolved.success) {
        return failWith({ kind: "InvalidReference", message: resolved.error.message });
      }
      outcome.ref = resolved.data;

      const plan = await planDownloads(resolved.data, options.constraints, this.registry, this.token, options.signal);
      if (!plan.success) {
        return failWith(plan.error);
      }
      reporter?.onPlanned?.(input, plan.data);

      for (const target of plan.data.targets) {
        reporter?.onTransferStart?.(input, target);
        const transferred = await this.executor.transfer(target, options.destinationDir, {
          signal: options.signal,
          onProgress: (progress) => reporter?.onProgress?.(input, progress),
        });

        if (!transferred.success) {
          const { error } = transferred;
          return failWith({ kind: error.kind, message: error.message, status: error.status });
        }
        outcome.results.push(transferred.data);
        reporter?.onTransferComplete?.(input, transferred.data);
      }

      return outcome;
    } catch (err) {
      return failWith({
        kind: "InternalError",
        message: `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  }
}
