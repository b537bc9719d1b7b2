import { Command, InvalidArgumentError, Option } from "commander";
import type { CliFlags } from "#/config";

export interface ProgramOptions extends CliFlags {
  token?: string;
  config?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name("air-fetch")
    .description("Download models from the registry by AIR or download URL")
    .addOption(new Option("-u, --url <urls...>", "registry download URLs").conflicts("air"))
    .addOption(
      new Option(
        "-a, --air <airs...>",
        "AIR strings, e.g. urn:air:flux1:lora:civitai:667004@746484"
      ).conflicts("url")
    )
    .addOption(new Option("--size <size>", "only download model files of this size").choices(["full", "pruned"]))
    .addOption(new Option("--fp <fp>", "only download model files of this precision").choices(["8", "16", "32"]))
    .option("--include-companions", "also download companion files such as VAEs")
    .option("--force-unsafe", "allow non-SafeTensor model files (e.g. .ckpt, .pt)")
    .option("-t, --token <token>", "registry API token (default: $CIVITAI_TOKEN or ~/.civitai/config)")
    .option("-l, --local-dir <dir>", "directory to store downloaded files")
    .addOption(new Option("--concurrency <n>", "references downloaded at once").argParser(parsePositiveInt))
    .option("-c, --config <path>", "YAML config file (default: ./air-fetch.yaml)")
    .option("--debug", "verbose logging, including version metadata");
}
