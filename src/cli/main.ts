import { homedir } from "os";
import { resolve } from "path";
import { DEFAULT_CONFIG_FILE, getTokenFilePath, loadConfigFile, resolveSettings } from "#/config";
import { createNodeFileSystem, createNodeHttpClient, systemClock } from "#/core";
import { formatFriendlyError } from "#/friendly-errors";
import { createLogger, createRootLogger } from "#/logger";
import { DownloadPipeline } from "#/pipeline";
import { buildProgram, type ProgramOptions } from "./program";
import { createConsoleReporter, formatSummary } from "./reporter";
import { obtainToken } from "./token";

async function main(argv: string[]): Promise<number> {
  const program = buildProgram().parse(argv);
  const flags = program.opts<ProgramOptions>();
  const fs = createNodeFileSystem();

  const configPath = resolve(flags.config ?? DEFAULT_CONFIG_FILE);
  const config = loadConfigFile(fs, configPath, flags.config !== undefined);
  if (!config.success) {
    formatFriendlyError(config.error).forEach((text) => console.error(text));
    return 1;
  }

  const settings = resolveSettings(flags, process.env, config.data);
  if (!settings.success) {
    formatFriendlyError(settings.error).forEach((text) => console.error(text));
    program.outputHelp({ error: true });
    return 1;
  }

  const root = createRootLogger(settings.data.logLevel);
  const token = await obtainToken(
    {
      flag: flags.token,
      env: process.env,
      config: config.data,
      fs,
      tokenFile: getTokenFilePath(homedir()),
    },
    createLogger(root, "token")
  );

  const pipeline = new DownloadPipeline(
    {
      fs,
      http: createNodeHttpClient(),
      logger: createLogger(root, "engine"),
      clock: systemClock,
      token,
    },
    { dumpMetadata: settings.data.debug }
  );

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const report = await pipeline.run(settings.data.references, {
      destinationDir: settings.data.destinationDir,
      mode: settings.data.mode,
      constraints: settings.data.constraints,
      concurrency: settings.data.concurrency,
      signal: controller.signal,
      reporter: createConsoleReporter(process.stdout),
    });
    console.log(formatSummary(report));
    return report.exitCode;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
