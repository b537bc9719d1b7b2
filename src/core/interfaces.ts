/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

import type { Logger } from "pino";

/**
 * Append-only handle on a file opened for writing.
 * Writes land in call order; callers must await each write before the next.
 */
export interface FileSink {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface FileSystem {
  readFile(path: string): string;
  writeFile(path: string, content: string, options?: { mode?: number }): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  /** Open (truncating) a file for sequential writes */
  openWrite(path: string): Promise<FileSink>;
  chmod(path: string, mode: number): void;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export interface Clock {
  now(): number;
}

/**
 * Everything the engine needs from the outside world.
 * The token is read once by the caller and passed by value.
 */
export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  logger: Logger;
  clock: Clock;
  token?: string;
}
