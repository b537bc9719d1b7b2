/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import pino from "pino";
import type { Clock, EngineContext, FileSink, FileSystem, HttpClient } from "#/core";
import type { Logger } from "#/logger";

interface MockFileEntry {
  content: Buffer;
  isDirectory: boolean;
  mode?: number;
}

/**
 * Create a mock FileSystem with in-memory storage.
 * Writes through openWrite are visible immediately, so tests can
 * inspect partial files after a failed transfer.
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry>; failWritesAfter?: number } {
  const files = new Map<string, MockFileEntry>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content: Buffer.from(content), isDirectory: false });
  }

  const mock: FileSystem & { files: Map<string, MockFileEntry>; failWritesAfter?: number } = {
    files,

    readFile(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return entry.content.toString("utf-8");
    },

    writeFile(path: string, content: string, options?: { mode?: number }): void {
      files.set(path, { content: Buffer.from(content), isDirectory: false, mode: options?.mode });
    },

    exists(path: string): boolean {
      return files.has(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      if (!files.has(path)) {
        files.set(path, { content: Buffer.alloc(0), isDirectory: true });
      }
    },

    async openWrite(path: string): Promise<FileSink> {
      const entry: MockFileEntry = { content: Buffer.alloc(0), isDirectory: false };
      files.set(path, entry);
      let writes = 0;

      return {
        async write(chunk: Uint8Array): Promise<void> {
          if (mock.failWritesAfter !== undefined && writes >= mock.failWritesAfter) {
            throw new Error("ENOSPC: no space left on device, write");
          }
          writes += 1;
          entry.content = Buffer.concat([entry.content, Buffer.from(chunk)]);
        },
        async close(): Promise<void> {},
      };
    },

    chmod(path: string, mode: number): void {
      const entry = files.get(path);
      if (!entry) {
        throw new Error(`ENOENT: no such file or directory, chmod '${path}'`);
      }
      entry.mode = mode;
    },
  };

  return mock;
}

/**
 * Recorded HTTP request
 */
export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  redirect?: RequestInit["redirect"];
  signal?: AbortSignal | null;
}

/**
 * Create a mock HttpClient with predefined responses.
 * Unknown URLs get a 404.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  return {
    responses,
    requests,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      requests.push({
        url,
        headers: Object.fromEntries(new Headers(options?.headers).entries()),
        redirect: options?.redirect,
        signal: options?.signal,
      });

      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function"
        ? responseOrFactory()
        : responseOrFactory;
    },
  };
}

/**
 * Clock that advances by `step` milliseconds on every read
 */
export function createMockClock(start = 1_700_000_000_000, step = 0): Clock & { current: number } {
  const clock = {
    current: start,
    now(): number {
      const value = clock.current;
      clock.current += step;
      return value;
    },
  };
  return clock;
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function createMockContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    fs: createMockFileSystem(),
    http: createMockHttpClient(),
    logger: createSilentLogger(),
    clock: createMockClock(),
    ...overrides,
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}

/**
 * Helper to create a binary download response
 */
export function binaryResponse(
  data: Uint8Array,
  options: { filename?: string; contentLength?: number | null; contentDisposition?: string } = {}
): Response {
  const headers = new Headers({ "Content-Type": "application/octet-stream" });
  const contentLength = options.contentLength === undefined ? data.length : options.contentLength;
  if (contentLength !== null) {
    headers.set("Content-Length", String(contentLength));
  }
  if (options.contentDisposition) {
    headers.set("Content-Disposition", options.contentDisposition);
  } else if (options.filename) {
    headers.set("Content-Disposition", `attachment; filename="${options.filename}"`);
  }
  return new Response(data, { status: 200, headers });
}

/**
 * Helper to create an HTML page response (what an expired link returns)
 */
export function htmlResponse(html = "<html><body>Please log in</body></html>", status = 200): Response {
  return new Response(html, {
    status,
    headers: { "Content-Type": "text/html; charset=utf-8" },
  });
}

export function redirectResponse(location: string, status = 302): Response {
  return new Response(null, { status, headers: { Location: location } });
}

/**
 * Response whose body emits the given chunks, then errors
 */
export function brokenStreamResponse(chunks: Uint8Array[], total: number): Response {
  let index = 0;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index];
      index += 1;
      if (chunk) {
        controller.enqueue(chunk);
      } else {
        controller.error(new Error("socket hang up"));
      }
    },
  });
  return new Response(body, {
    status: 200,
    headers: { "Content-Type": "application/octet-stream", "Content-Length": String(total) },
  });
}

/**
 * Version metadata file entry in registry wire format
 */
export function fileEntry(
  name: string,
  type: string,
  metadata: { format?: string | null; size?: string | null; fp?: string | number | null } = {}
) {
  return { name, type, metadata };
}
