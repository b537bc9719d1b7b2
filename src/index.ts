/**
 * air-fetch
 *
 * Resolve model references, select files from the registry manifest
 * and download them. Dependency-injected; the CLI lives in src/cli.
 */

// Core interfaces and Node implementations
export * from "#/core";

// Constants (registry host, AIR grammar, chunk size)
export * from "#/constants";

// Schemas (Zod validation of registry responses and config)
export * from "#/schemas";

// Friendly parse errors for YAML/JSON + Zod
export * from "#/friendly-errors";

// Formatters (pure utilities)
export * from "#/formatters";

// Logging
export * from "#/logger";

// Reference parsing (AIR, download URLs)
export * from "#/reference";

// Registry metadata client
export * from "#/registry";

// File selection
export * from "#/selection";

// Transfers and filenames
export * from "#/transfer";

// Orchestration
export * from "#/pipeline";

// Configuration and token lookup
export * from "#/config";
