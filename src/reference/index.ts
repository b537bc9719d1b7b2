/**
 * Reference module
 *
 * Parses AIR strings and download URLs into ResourceRef.
 */

export * from "./reference.types";
export * from "./reference";
