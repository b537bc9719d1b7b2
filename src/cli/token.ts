import { createInterface } from "readline/promises";
import { findToken, saveToken, type TokenLookup } from "#/config";
import type { Logger } from "#/logger";

/**
 * Token from flag/env/config/file, or an interactive prompt whose answer
 * is saved to the token file. Non-interactive runs without a token go
 * ahead anonymously.
 */
export async function obtainToken(lookup: TokenLookup, logger: Logger): Promise<string | undefined> {
  const found = findToken(lookup);
  if (found) {
    logger.debug({ source: found.source }, "using registry token");
    return found.token;
  }

  if (!process.stdin.isTTY) {
    logger.warn("no registry token found; continuing without authentication");
    return undefined;
  }

  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const token = (await rl.question("Enter your CivitAI API token: ")).trim();
    if (!token) return undefined;
    saveToken(lookup.fs, lookup.tokenFile, token);
    logger.info({ tokenFile: lookup.tokenFile }, "token saved");
    return token;
  } finally {
    rl.close();
  }
}
