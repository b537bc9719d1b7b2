/**
 * Pipeline module
 *
 * Reference → plan → transfer orchestration.
 */

export * from "./pipeline.types";
export * from "./planner";
export { DownloadPipeline, type DownloadPipelineOptions } from "./pipeline";
