/**
 * Configuration
 *
 * Merges command-line flags, environment and the optional YAML config
 * file into Settings. Precedence: flag > environment > config file > default.
 */

import { dirname, join } from "path";
import type { FileSystem } from "#/core";
import { safeParseYaml, type FriendlyResult } from "#/friendly-errors";
import type { LogLevel } from "#/logger";
import type { ReferenceMode } from "#/reference";
import { ConfigFileSchema, LogLevelSchema, type ConfigFile } from "#/schemas";
import type { SelectionConstraints } from "#/selection";

export const DEFAULT_CONFIG_FILE = "air-fetch.yaml";
export const TOKEN_ENV_VAR = "CIVITAI_TOKEN";
export const LOG_LEVEL_ENV_VAR = "AIR_FETCH_LOG_LEVEL";

export type Env = Record<string, string | undefined>;

/**
 * Legacy token file: the raw token, nothing else
 */
export function getTokenFilePath(home: string): string {
  return join(home, ".civitai", "config");
}

export function loadConfigFile(
  fs: FileSystem,
  path: string,
  required = false
): FriendlyResult<ConfigFile> {
  if (!fs.exists(path)) {
    if (required) {
      return { success: false, error: { type: "validation", message: `Config file not found: ${path}` } };
    }
    return { success: true, data: {} };
  }
  return safeParseYaml(fs.readFile(path), ConfigFileSchema, path);
}

export type TokenSource = "flag" | "env" | "config" | "file";

export interface TokenLookup {
  flag?: string;
  env: Env;
  config: ConfigFile;
  fs: FileSystem;
  tokenFile: string;
}

/**
 * Find a token without prompting. Returns null when every source is empty.
 */
export function findToken(lookup: TokenLookup): { token: string; source: TokenSource } | null {
  const candidates: Array<[TokenSource, () => string | undefined]> = [
    ["flag", () => lookup.flag],
    ["env", () => lookup.env[TOKEN_ENV_VAR]],
    ["config", () => lookup.config.token],
    ["file", () => (lookup.fs.exists(lookup.tokenFile) ? lookup.fs.readFile(lookup.tokenFile) : undefined)],
  ];

  for (const [source, read] of candidates) {
    const token = read()?.trim();
    if (token) return { token, source };
  }
  return null;
}

/**
 * Persist a token to the legacy token file, readable by the owner only
 */
export function saveToken(fs: FileSystem, tokenFile: string, token: string): void {
  fs.mkdir(dirname(tokenFile), { recursive: true });
  fs.writeFile(tokenFile, `${token}\n`, { mode: 0o600 });
}

export interface CliFlags {
  air?: string[];
  url?: string[];
  size?: string;
  fp?: string;
  includeCompanions?: boolean;
  forceUnsafe?: boolean;
  localDir?: string;
  concurrency?: number;
  debug?: boolean;
}

export interface Settings {
  references: string[];
  /** Which grammar the references were given in */
  mode: ReferenceMode;
  destinationDir: string;
  constraints: SelectionConstraints;
  concurrency: number;
  logLevel: LogLevel;
  debug: boolean;
}

export function resolveSettings(flags: CliFlags, env: Env, config: ConfigFile): FriendlyResult<Settings> {
  const problems: string[] = [];

  if (flags.air && flags.url) {
    problems.push("--air and --url cannot be used together");
  }
  const references = flags.air ?? flags.url ?? [];
  if (references.length === 0) {
    problems.push("one of --air or --url is required");
  }

  const destinationDir = flags.localDir ?? config.localDir;
  if (!destinationDir) {
    problems.push("--local-dir is required (or set localDir in the config file)");
  }

  const concurrency = flags.concurrency ?? config.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    problems.push(`--concurrency must be a positive integer, got ${concurrency}`);
  }

  const envLevel = LogLevelSchema.safeParse(env[LOG_LEVEL_ENV_VAR]);
  const debug = flags.debug ?? false;
  const logLevel: LogLevel = debug ? "debug" : envLevel.success ? envLevel.data : (config.logLevel ?? "info");

  if (problems.length > 0 || !destinationDir) {
    return { success: false, error: { type: "validation", message: "Invalid arguments", details: problems } };
  }

  return {
    success: true,
    data: {
      references,
      mode: flags.air ? "air" : "url",
      destinationDir,
      constraints: {
        size: flags.size ?? config.size,
        fp: flags.fp ?? config.fp,
        includeCompanions: flags.includeCompanions ?? config.includeCompanions ?? false,
        allowUnsafeFormat: flags.forceUnsafe ?? config.allowUnsafeFormat ?? false,
      },
      concurrency,
      logLevel,
      debug,
    },
  };
}
