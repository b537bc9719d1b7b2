/**
 * Registry client
 *
 * Reads version metadata (the file manifest) from the registry REST API.
 * One GET per call, no retries; callers decide whether to try again.
 */

import type { HttpClient } from "#/core";
import type { Logger } from "#/logger";
import { safeParseJson } from "#/friendly-errors";
import { buildVersionMetadataUrl } from "#/reference";
import { VersionMetadataSchema } from "#/schemas";
import { getRegistryHeaders } from "./headers";
import type { FetchResult, VersionMetadata } from "./registry.types";

export interface RegistryClientOptions {
  token?: string;
  /** Log the full decoded metadata at debug level */
  dumpMetadata?: boolean;
}

export class RegistryClient {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly token?: string;
  private readonly dumpMetadata: boolean;

  constructor(http: HttpClient, logger: Logger, options: RegistryClientOptions = {}) {
    this.http = http;
    this.logger = logger;
    this.token = options.token;
    this.dumpMetadata = options.dumpMetadata ?? false;
  }

  async fetchVersionMetadata(versionId: string, signal?: AbortSignal): Promise<FetchResult<VersionMetadata>> {
    const url = buildVersionMetadataUrl(versionId);
    this.logger.debug({ url, authenticated: Boolean(this.token) }, "fetching version metadata");

    let response: Response;
    let body: string;
    try {
      response = await this.http.fetch(url, {
        headers: { ...getRegistryHeaders(this.token), Accept: "application/json" },
        signal,
      });
      body = await response.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: { kind: "Network", message: `Failed to fetch metadata: ${message}` } };
    }

    if (!response.ok) {
      return {
        success: false,
        error: {
          kind: "Http",
          status: response.status,
          message: `Failed to fetch metadata for version ${versionId}: ${response.status} ${response.statusText}`.trimEnd(),
        },
      };
    }

    const parsed = safeParseJson(body, VersionMetadataSchema, "version metadata");
    if (!parsed.success) {
      return {
        success: false,
        error: { kind: "Decode", message: parsed.error.message, details: parsed.error.details ?? [] },
      };
    }

    if (this.dumpMetadata) {
      this.logger.debug({ versionId, metadata: parsed.data }, "version metadata");
    }

    return { success: true, data: parsed.data };
  }
}
