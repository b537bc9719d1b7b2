/**
 * Transfer module
 *
 * Streaming downloads and local filename resolution.
 */

export * from "./transfer.types";
export * from "./filename";
export { TransferExecutor, type TransferExecutorOptions } from "./transfer";
