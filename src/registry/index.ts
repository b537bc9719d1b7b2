/**
 * Registry module
 *
 * Version metadata lookups and request headers.
 */

export * from "./registry.types";
export { getRegistryHeaders } from "./headers";
export { RegistryClient, type RegistryClientOptions } from "./client";
