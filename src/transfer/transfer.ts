/**
 * Transfer executor
 *
 * Authenticated streaming download of a single target. Redirects are
 * followed by hand so every hop can be validated and recorded, status
 * and content type are checked before anything touches the disk, and
 * the body is written in fixed-size chunks by a single writer.
 *
 * Partial files from a failed transfer are left in place.
 */

import { resolve } from "path";
import { CHUNK_SIZE, FILE_MODE, MAX_REDIRECTS } from "#/constants";
import type { EngineContext, FileSink } from "#/core";
import type { Logger } from "#/logger";
import { getRegistryHeaders } from "#/registry";
import { extractFilename, sanitizeFilename } from "./filename";
import type {
  DownloadTarget,
  RedirectHop,
  TransferErrorKind,
  TransferHooks,
  TransferOutcome,
} from "./transfer.types";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const ACCESS_DENIED_STATUSES = new Set([400, 401, 403]);
const NOT_FOUND_STATUSES = new Set([404, 410]);
const HTML_CONTENT_TYPE = /text\/html|application\/xhtml\+xml/i;

export interface TransferExecutorOptions {
  chunkSize?: number;
  /** Mode applied to finished files; null leaves the default umask */
  fileMode?: number | null;
}

type FollowResult =
  | { ok: true; response: Response; finalUrl: string }
  | { ok: false; kind: TransferErrorKind; message: string; status?: number };

type StreamResult =
  | { ok: true }
  | { ok: false; source: "read" | "write"; error: unknown };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function classifyStatus(status: number): TransferErrorKind | null {
  if (ACCESS_DENIED_STATUSES.has(status)) return "AccessDenied";
  if (NOT_FOUND_STATUSES.has(status)) return "NotFound";
  if (status < 200 || status >= 300) return "UpstreamError";
  return null;
}

function parseContentLength(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) return undefined;
  return Number(header.trim());
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export class TransferExecutor {
  private readonly context: Pick<EngineContext, "fs" | "http" | "clock" | "token">;
  private readonly logger: Logger;
  private readonly chunkSize: number;
  private readonly fileMode: number | null;

  constructor(
    context: Pick<EngineContext, "fs" | "http" | "clock" | "logger" | "token">,
    options: TransferExecutorOptions = {}
  ) {
    this.context = context;
    this.logger = context.logger;
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
    this.fileMode = options.fileMode === undefined ? FILE_MODE : options.fileMode;
  }

  async transfer(
    target: DownloadTarget,
    destinationDir: string,
    hooks: TransferHooks = {}
  ): Promise<TransferOutcome> {
    const { fs, clock } = this.context;
    const { signal, onProgress, onStateChange } = hooks;
    const startedAt = clock.now();
    const redirects: RedirectHop[] = [];

    const fail = (
      kind: TransferErrorKind,
      message: string,
      extra: { url?: string; status?: number; localPath?: string } = {}
    ): TransferOutcome => {
      onStateChange?.("failed");
      this.logger.debug({ kind, url: extra.url ?? target.url, status: extra.status }, "transfer failed");
      return {
        success: false,
        error: { kind, message, url: extra.url ?? target.url, status: extra.status, redirects, localPath: extra.localPath },
      };
    };

    onStateChange?.("requesting");
    const followed = await this.follow(target, redirects, signal, onStateChange);
    if (!followed.ok) {
      return fail(followed.kind, followed.message, { status: followed.status });
    }

    const { response, finalUrl } = followed;
    if (redirects.length > 0) {
      this.logger.debug({ hops: redirects.length, finalUrl }, "redirects resolved");
    }

    const statusKind = classifyStatus(response.status);
    if (statusKind) {
      await discardBody(response);
      return fail(statusKind, describeStatusFailure(statusKind, response, target.url), {
        url: finalUrl,
        status: response.status,
      });
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (HTML_CONTENT_TYPE.test(contentType)) {
      await discardBody(response);
      return fail(
        "UnexpectedContentType",
        `Received ${contentType} instead of a file. Possibly an invalid token or expired link.`,
        { url: finalUrl, status: response.status }
      );
    }

    const candidate = extractFilename(response.headers, finalUrl);
    const fileName = sanitizeFilename(candidate, () => clock.now());
    if (fileName !== candidate) {
      this.logger.warn({ candidate, fileName }, "filename sanitized");
    }
    const localPath = resolve(destinationDir, fileName);
    const totalBytes = parseContentLength(response.headers.get("content-length"));

    let sink: FileSink;
    try {
      fs.mkdir(destinationDir, { recursive: true });
      sink = await fs.openWrite(localPath);
    } catch (err) {
      await discardBody(response);
      return fail("IOFailure", `Cannot write ${localPath}: ${errorMessage(err)}`, { url: finalUrl });
    }

    onStateChange?.("streaming");
    let bytesWritten = 0;
    const streamed = await this.stream(response, sink, (written) => {
      bytesWritten += written;
      onProgress?.({
        fileName,
        bytesWritten,
        totalBytes,
        percent: totalBytes ? Math.min(100, (bytesWritten / totalBytes) * 100) : undefined,
      });
    });

    let closeError: unknown = null;
    try {
      await sink.close();
    } catch (err) {
      closeError = err;
    }

    if (!streamed.ok) {
      if (signal?.aborted) {
        return fail("Cancelled", `Download of ${fileName} cancelled after ${bytesWritten} bytes`, {
          url: finalUrl,
          localPath,
        });
      }
      return streamed.source === "read"
        ? fail("NetworkFailure", `Connection lost while downloading ${fileName}: ${errorMessage(streamed.error)}`, {
            url: finalUrl,
            localPath,
          })
        : fail("IOFailure", `Cannot write ${localPath}: ${errorMessage(streamed.error)}`, { url: finalUrl, localPath });
    }
    if (closeError !== null) {
      return fail("IOFailure", `Cannot write ${localPath}: ${errorMessage(closeError)}`, { url: finalUrl, localPath });
    }

    if (totalBytes !== undefined && totalBytes !== bytesWritten) {
      this.logger.warn({ declared: totalBytes, written: bytesWritten, fileName }, "content length mismatch");
    }

    if (this.fileMode !== null) {
      try {
        fs.chmod(localPath, this.fileMode);
      } catch (err) {
        this.logger.warn({ localPath, error: errorMessage(err) }, "could not set file permissions");
      }
    }

    onStateChange?.("complete");
    return {
      success: true,
      data: {
        localPath,
        fileName,
        bytesWritten,
        declaredBytes: totalBytes,
        elapsedMs: clock.now() - startedAt,
        finalUrl,
        redirects,
      },
    };
  }

  /**
   * GET with manual redirect handling. The token is dropped once a hop
   * leaves the origin of the original URL.
   */
  private async follow(
    target: DownloadTarget,
    redirects: RedirectHop[],
    signal: AbortSignal | undefined,
    onStateChange: TransferHooks["onStateChange"]
  ): Promise<FollowResult> {
    let url: URL;
    try {
      url = new URL(target.url);
    } catch {
      return { ok: false, kind: "UpstreamError", message: `Invalid download URL: ${target.url}` };
    }

    const origin = url.origin;
    let sendAuth = target.expectedAuth;

    for (;;) {
      let response: Response;
      try {
        response = await this.context.http.fetch(url.href, {
          headers: getRegistryHeaders(sendAuth ? this.context.token : undefined),
          redirect: "manual",
          signal,
        });
      } catch (err) {
        return signal?.aborted
          ? { ok: false, kind: "Cancelled", message: `Request for ${url.href} cancelled` }
          : { ok: false, kind: "NetworkFailure", message: `Request for ${url.href} failed: ${errorMessage(err)}` };
      }

      if (!REDIRECT_STATUSES.has(response.status)) {
        return { ok: true, response, finalUrl: url.href };
      }

      await discardBody(response);
      const location = response.headers.get("location");
      if (!location) {
        return {
          ok: false,
          kind: "UpstreamError",
          status: response.status,
          message: `Redirect ${response.status} from ${url.href} has no Location header`,
        };
      }
      if (redirects.length >= MAX_REDIRECTS) {
        return {
          ok: false,
          kind: "UpstreamError",
          status: response.status,
          message: `Too many redirects (more than ${MAX_REDIRECTS})`,
        };
      }

      let next: URL;
      try {
        next = new URL(location, url);
      } catch {
        return { ok: false, kind: "UpstreamError", status: response.status, message: `Invalid redirect location: ${location}` };
      }
      if (next.protocol !== "http:" && next.protocol !== "https:") {
        return { ok: false, kind: "UpstreamError", status: response.status, message: `Refusing redirect to ${next.protocol} URL` };
      }

      redirects.push({ status: response.status, from: url.href, to: next.href });
      this.logger.debug({ status: response.status, location: next.href }, "redirect");
      onStateChange?.("redirected");

      if (next.origin !== origin) {
        sendAuth = false;
      }
      url = next;
    }
  }

  /**
   * Copy the body to the sink in chunkSize pieces. Reads and writes
   * alternate, so the file only ever grows at its end.
   */
  private async stream(
    response: Response,
    sink: FileSink,
    onWritten: (bytes: number) => void
  ): Promise<StreamResult> {
    if (!response.body) return { ok: true };

    const reader = response.body.getReader();
    const pending = new Uint8Array(this.chunkSize);
    let filled = 0;

    const flush = async (): Promise<StreamResult> => {
      try {
        await sink.write(pending.subarray(0, filled));
      } catch (error) {
        return { ok: false, source: "write", error };
      }
      onWritten(filled);
      filled = 0;
      return { ok: true };
    };

    for (;;) {
      let value: Uint8Array;
      try {
        const read = await reader.read();
        if (read.done) break;
        value = read.value;
      } catch (error) {
        return { ok: false, source: "read", error };
      }

      let offset = 0;
      while (offset < value.length) {
        const count = Math.min(this.chunkSize - filled, value.length - offset);
        pending.set(value.subarray(offset, offset + count), filled);
        filled += count;
        offset += count;

        if (filled === this.chunkSize) {
          const flushed = await flush();
          if (!flushed.ok) {
            await reader.cancel();
            return flushed;
          }
        }
      }
    }

    return filled > 0 ? flush() : { ok: true };
  }
}

function describeStatusFailure(kind: TransferErrorKind, response: Response, url: string): string {
  switch (kind) {
    case "AccessDenied":
      return `Access denied for ${url}: ${response.status}`;
    case "NotFound":
      return `Resource not found for ${url}: ${response.status}`;
    default:
      return response.status >= 500
        ? `Server error for ${url}: ${response.status}`
        : `Unexpected response for ${url}: ${response.status}`;
  }
}
