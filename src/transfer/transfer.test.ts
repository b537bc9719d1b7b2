import { describe, test, expect } from "vitest";
import type { HttpClient } from "#/core";
import {
  binaryResponse,
  brokenStreamResponse,
  createMockClock,
  createMockFileSystem,
  createMockHttpClient,
  createSilentLogger,
  errorResponse,
  htmlResponse,
  redirectResponse,
} from "#/test-utils/mocks";
import { TransferExecutor, type TransferExecutorOptions } from "./transfer";
import type { DownloadTarget, TransferProgress, TransferState } from "./transfer.types";

const DOWNLOAD_URL = "https://civitai.com/api/download/models/746484";
const CDN_URL = "https://cdn.example.com/files/model.safetensors?X-Amz-Signature=abc";
const target: DownloadTarget = { url: DOWNLOAD_URL, expectedAuth: true };

function payload(size: number): Uint8Array {
  return new Uint8Array(size).fill(7);
}

describe("TransferExecutor", () => {
  const createExecutor = (
    responses: Array<[string, Response | (() => Response)]>,
    options: TransferExecutorOptions = { chunkSize: 256 },
    http?: HttpClient
  ) => {
    const fs = createMockFileSystem();
    const mockHttp = createMockHttpClient(new Map(responses));
    const executor = new TransferExecutor(
      {
        fs,
        http: http ?? mockHttp,
        logger: createSilentLogger(),
        clock: createMockClock(1_700_000_000_000, 500),
        token: "test-token",
      },
      options
    );
    return { executor, fs, http: mockHttp };
  };

  describe("successful transfer", () => {
    test("writes all bytes and reports 100% progress", async () => {
      const { executor, fs } = createExecutor([
        [DOWNLOAD_URL, binaryResponse(payload(1024), { filename: "model.safetensors" })],
      ]);
      const progress: TransferProgress[] = [];

      const result = await executor.transfer(target, "/models", { onProgress: (p) => progress.push(p) });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.bytesWritten).toBe(1024);
      expect(result.data.declaredBytes).toBe(1024);
      expect(result.data.localPath).toBe("/models/model.safetensors");
      expect(result.data.fileName).toBe("model.safetensors");
      expect(result.data.elapsedMs).toBe(500);
      expect(progress.map((p) => p.percent)).toEqual([25, 50, 75, 100]);
      expect(progress.at(-1)?.bytesWritten).toBe(1024);
      expect(fs.files.get("/models/model.safetensors")?.content.length).toBe(1024);
    });

    test("creates the destination directory and sets the file mode", async () => {
      const { executor, fs } = createExecutor([
        [DOWNLOAD_URL, binaryResponse(payload(10), { filename: "a.safetensors" })],
      ]);

      await executor.transfer(target, "/models/new");

      expect(fs.files.get("/models/new")?.isDirectory).toBe(true);
      expect(fs.files.get("/models/new/a.safetensors")?.mode).toBe(0o644);
    });

    test("leaves the mode alone when fileMode is null", async () => {
      const { executor, fs } = createExecutor(
        [[DOWNLOAD_URL, binaryResponse(payload(10), { filename: "a.safetensors" })]],
        { fileMode: null }
      );

      await executor.transfer(target, "/models");

      expect(fs.files.get("/models/a.safetensors")?.mode).toBeUndefined();
    });

    test("succeeds without Content-Length", async () => {
      const { executor } = createExecutor([
        [DOWNLOAD_URL, binaryResponse(payload(300), { filename: "a.bin", contentLength: null })],
      ]);
      const progress: TransferProgress[] = [];

      const result = await executor.transfer(target, "/models", { onProgress: (p) => progress.push(p) });

      expect(result.success && result.data.bytesWritten).toBe(300);
      expect(result.success && result.data.declaredBytes).toBeUndefined();
      expect(progress.map((p) => p.percent)).toEqual([undefined, undefined]);
    });

    test("a Content-Length mismatch is not an error", async () => {
      const { executor } = createExecutor([
        [DOWNLOAD_URL, binaryResponse(payload(100), { filename: "a.bin", contentLength: 2000 })],
      ]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.bytesWritten).toBe(100);
        expect(result.data.declaredBytes).toBe(2000);
      }
    });

    test("names the file after the final URL without Content-Disposition", async () => {
      const { executor } = createExecutor([
        [DOWNLOAD_URL, redirectResponse(CDN_URL)],
        [CDN_URL, binaryResponse(payload(10))],
      ]);

      const result = await executor.transfer(target, "/models");

      expect(result.success && result.data.localPath).toBe("/models/model.safetensors");
    });

    test("reports state transitions", async () => {
      const { executor } = createExecutor([
        [DOWNLOAD_URL, redirectResponse(CDN_URL)],
        [CDN_URL, binaryResponse(payload(10))],
      ]);
      const states: TransferState[] = [];

      await executor.transfer(target, "/models", { onStateChange: (s) => states.push(s) });

      expect(states).toEqual(["requesting", "redirected", "streaming", "complete"]);
    });
  });

  describe("redirects", () => {
    test("records hops and drops the token on a cross-origin hop", async () => {
      const { executor, http } = createExecutor([
        [DOWNLOAD_URL, redirectResponse(CDN_URL, 307)],
        [CDN_URL, binaryResponse(payload(10), { filename: "model.safetensors" })],
      ]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.finalUrl).toBe(CDN_URL);
      expect(result.data.redirects).toEqual([{ status: 307, from: DOWNLOAD_URL, to: CDN_URL }]);
      expect(http.requests.map((r) => r.redirect)).toEqual(["manual", "manual"]);
      expect(http.requests[0]?.headers.authorization).toBe("Bearer test-token");
      expect(http.requests[1]?.headers.authorization).toBeUndefined();
    });

    test("keeps the token on same-origin hops and resolves relative locations", async () => {
      const next = "https://civitai.com/api/download/models/746484/file";
      const { executor, http } = createExecutor([
        [DOWNLOAD_URL, redirectResponse("/api/download/models/746484/file", 302)],
        [next, binaryResponse(payload(10), { filename: "a.bin" })],
      ]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(true);
      expect(http.requests[1]?.url).toBe(next);
      expect(http.requests[1]?.headers.authorization).toBe("Bearer test-token");
    });

    test("fails on a redirect loop", async () => {
      const { executor, http } = createExecutor([[DOWNLOAD_URL, () => redirectResponse(DOWNLOAD_URL)]]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("UpstreamError");
      expect(result.error.message).toBe("Too many redirects (more than 10)");
      expect(result.error.redirects).toHaveLength(10);
      expect(http.requests).toHaveLength(11);
    });

    test("fails on a redirect without Location", async () => {
      const { executor } = createExecutor([[DOWNLOAD_URL, new Response(null, { status: 302 })]]);

      const result = await executor.transfer(target, "/models");

      expect(!result.success && result.error.kind).toBe("UpstreamError");
      expect(!result.success && result.error.status).toBe(302);
    });

    test("refuses redirects to non-http schemes", async () => {
      const { executor } = createExecutor([[DOWNLOAD_URL, redirectResponse("file:///etc/passwd")]]);

      const result = await executor.transfer(target, "/models");

      expect(!result.success && result.error.message).toBe("Refusing redirect to file: URL");
    });
  });

  describe("failures", () => {
    test.each([
      { status: 400, kind: "AccessDenied" },
      { status: 401, kind: "AccessDenied" },
      { status: 403, kind: "AccessDenied" },
      { status: 404, kind: "NotFound" },
      { status: 410, kind: "NotFound" },
      { status: 500, kind: "UpstreamError" },
      { status: 503, kind: "UpstreamError" },
      { status: 429, kind: "UpstreamError" },
    ])("status $status fails as $kind", async ({ status, kind }) => {
      const { executor, fs } = createExecutor([[DOWNLOAD_URL, errorResponse(status, "")]]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe(kind);
      expect(result.error.status).toBe(status);
      expect(fs.files.size).toBe(0);
    });

    test("status is checked on the final response after redirects", async () => {
      const { executor } = createExecutor([
        [DOWNLOAD_URL, redirectResponse(CDN_URL)],
        [CDN_URL, errorResponse(403, "Forbidden")],
      ]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("AccessDenied");
      expect(result.error.url).toBe(CDN_URL);
      expect(result.error.redirects).toHaveLength(1);
    });

    test("an HTML response fails and writes nothing", async () => {
      const { executor, fs } = createExecutor([[DOWNLOAD_URL, htmlResponse()]]);

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("UnexpectedContentType");
      expect(result.error.message).toBe(
        "Received text/html; charset=utf-8 instead of a file. Possibly an invalid token or expired link."
      );
      expect(fs.files.size).toBe(0);
    });

    test("a broken stream fails and leaves the partial file", async () => {
      const { executor, fs } = createExecutor(
        [[DOWNLOAD_URL, brokenStreamResponse([payload(4), payload(4)], 16)]],
        { chunkSize: 4 }
      );

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("NetworkFailure");
      expect(result.error.localPath).toBe("/models/746484");
      expect(fs.files.get("/models/746484")?.content.length).toBe(8);
    });

    test("a write error fails as IOFailure", async () => {
      const { executor, fs } = createExecutor([
        [DOWNLOAD_URL, binaryResponse(payload(10), { filename: "a.bin" })],
      ]);
      fs.failWritesAfter = 0;

      const result = await executor.transfer(target, "/models");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("IOFailure");
      expect(result.error.message).toBe("Cannot write /models/a.bin: ENOSPC: no space left on device, write");
    });

    test("a rejected request fails as NetworkFailure", async () => {
      const http: HttpClient = {
        fetch: () => Promise.reject(new Error("getaddrinfo ENOTFOUND civitai.com")),
      };
      const { executor } = createExecutor([], undefined, http);

      const result = await executor.transfer(target, "/models");

      expect(!result.success && result.error.kind).toBe("NetworkFailure");
    });

    test("an aborted request fails as Cancelled", async () => {
      const controller = new AbortController();
      controller.abort();
      const http: HttpClient = {
        fetch: (_url, options) =>
          options?.signal?.aborted
            ? Promise.reject(new DOMException("This operation was aborted", "AbortError"))
            : Promise.resolve(binaryResponse(payload(1))),
      };
      const { executor } = createExecutor([], undefined, http);

      const result = await executor.transfer(target, "/models", { signal: controller.signal });

      expect(!result.success && result.error.kind).toBe("Cancelled");
    });
  });

  describe("authentication", () => {
    test("sends no Authorization header when auth is not expected", async () => {
      const { executor, http } = createExecutor([
        [DOWNLOAD_URL, binaryResponse(payload(1), { filename: "a.bin" })],
      ]);

      await executor.transfer({ url: DOWNLOAD_URL, expectedAuth: false }, "/models");

      expect(http.requests[0]?.headers.authorization).toBeUndefined();
      expect(http.requests[0]?.headers["user-agent"]).toBe("air-fetch");
    });
  });
});
