/**
 * Node.js implementations of the core interfaces.
 * Used by the CLI; tests use the in-memory mocks instead.
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { open } from "fs/promises";
import type { Clock, FileSink, FileSystem, HttpClient } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile(path: string): string {
      return readFileSync(path, "utf-8");
    },

    writeFile(path: string, content: string, options?: { mode?: number }): void {
      writeFileSync(path, content, { mode: options?.mode });
    },

    exists(path: string): boolean {
      return existsSync(path);
    },

    mkdir(path: string, options?: { recursive?: boolean }): void {
      mkdirSync(path, options);
    },

    async openWrite(path: string): Promise<FileSink> {
      const handle = await open(path, "w");
      return {
        async write(chunk: Uint8Array): Promise<void> {
          let offset = 0;
          while (offset < chunk.length) {
            const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
            offset += bytesWritten;
          }
        },
        close(): Promise<void> {
          return handle.close();
        },
      };
    },

    chmod(path: string, mode: number): void {
      // Windows has no POSIX permission bits
      if (process.platform === "win32") return;
      chmodSync(path, mode);
    },
  };
}

export function createNodeHttpClient(): HttpClient {
  return {
    fetch(url: string, options?: RequestInit): Promise<Response> {
      return fetch(url, options);
    },
  };
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
