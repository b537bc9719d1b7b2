import { describe, test, expect } from "vitest";
import { VersionMetadataSchema, type FileDescriptor } from "#/schemas";
import { fileEntry } from "#/test-utils/mocks";
import {
  evaluateFiles,
  isCompanionType,
  isModelType,
  isSafeFormat,
  normalizePrecision,
  selectFiles,
} from "./selector";
import type { SelectionConstraints } from "./selection.types";

function manifest(entries: ReturnType<typeof fileEntry>[]): FileDescriptor[] {
  return VersionMetadataSchema.parse({ files: entries }).files;
}

const noConstraints: SelectionConstraints = { includeCompanions: false, allowUnsafeFormat: false };

const files = manifest([
  fileEntry("full-fp32.safetensors", "Model", { format: "SafeTensor", size: "full", fp: "fp32" }),
  fileEntry("pruned-fp16.safetensors", "Model", { format: "SafeTensor", size: "pruned", fp: "fp16" }),
  fileEntry("vae.safetensors", "VAE", { format: "SafeTensor" }),
  fileEntry("pruned-fp16.ckpt", "Model", { format: "PickleTensor", size: "pruned", fp: "fp16" }),
  fileEntry("pruned-fp16-b.safetensors", "Model", { format: "safetensor", size: "pruned", fp: 16 }),
  fileEntry("config.yaml", "Other", { format: "Other" }),
  fileEntry("dataset.zip", "Training Data", { format: "Other" }),
]);

const names = (selected: FileDescriptor[]) => selected.map((file) => file.name);

describe("selector", () => {
  describe("normalizePrecision", () => {
    test("strips the fp prefix and stringifies numbers", () => {
      expect(normalizePrecision("fp16")).toBe("16");
      expect(normalizePrecision("FP32")).toBe("32");
      expect(normalizePrecision(8)).toBe("8");
      expect(normalizePrecision("bf16")).toBe("bf16");
    });
  });

  describe("isSafeFormat", () => {
    test("compares case-insensitively", () => {
      expect(isSafeFormat("SafeTensor")).toBe(true);
      expect(isSafeFormat("safetensor")).toBe(true);
      expect(isSafeFormat("PickleTensor")).toBe(false);
      expect(isSafeFormat(undefined)).toBe(false);
    });
  });

  describe("file types", () => {
    test("match case-insensitively", () => {
      expect(isModelType("model")).toBe(true);
      expect(isModelType("Pruned Model")).toBe(false);
      expect(isCompanionType("vae")).toBe(true);
      expect(isCompanionType("OTHER")).toBe(true);
      expect(isCompanionType("Training Data")).toBe(false);
    });

    test("a lowercase model entry still goes through the safety gate", () => {
      const lowercase = manifest([fileEntry("weights.ckpt", "model", { format: "PickleTensor" })]);

      expect(evaluateFiles(lowercase, noConstraints)[0]?.verdict).toBe("skipped-unsafe");
    });
  });

  describe("selectFiles", () => {
    test("returns safe model files in manifest order without constraints", () => {
      expect(names(selectFiles(files, noConstraints))).toEqual([
        "full-fp32.safetensors",
        "pruned-fp16.safetensors",
        "pruned-fp16-b.safetensors",
      ]);
    });

    test("filters by size and fp together", () => {
      const selected = selectFiles(files, { ...noConstraints, size: "pruned", fp: "16" });

      expect(names(selected)).toEqual(["pruned-fp16.safetensors", "pruned-fp16-b.safetensors"]);
    });

    test("safety gate still applies when size/fp match", () => {
      const selected = selectFiles(files, { ...noConstraints, size: "pruned", fp: "16" });

      expect(names(selected)).not.toContain("pruned-fp16.ckpt");
    });

    test("allowUnsafeFormat lets other formats through", () => {
      const selected = selectFiles(files, { ...noConstraints, size: "pruned", fp: "16", allowUnsafeFormat: true });

      expect(names(selected)).toEqual([
        "pruned-fp16.safetensors",
        "pruned-fp16.ckpt",
        "pruned-fp16-b.safetensors",
      ]);
    });

    test("companions follow model files, unfiltered, when requested", () => {
      const selected = selectFiles(files, { ...noConstraints, size: "full", includeCompanions: true });

      expect(names(selected)).toEqual(["full-fp32.safetensors", "vae.safetensors", "config.yaml"]);
    });

    test("companions are not subject to the safety gate", () => {
      const withUnsafeCompanion = manifest([fileEntry("vae.pt", "VAE", { format: "PickleTensor" })]);

      const selected = selectFiles(withUnsafeCompanion, { ...noConstraints, includeCompanions: true });

      expect(names(selected)).toEqual(["vae.pt"]);
    });

    test("returns an empty array when nothing matches", () => {
      expect(selectFiles(files, { ...noConstraints, fp: "8" })).toEqual([]);
      expect(selectFiles([], noConstraints)).toEqual([]);
    });

    test("model file without a format is treated as unsafe", () => {
      const unknownFormat = manifest([fileEntry("mystery.bin", "Model", { format: null })]);

      expect(selectFiles(unknownFormat, noConstraints)).toEqual([]);
    });
  });

  describe("evaluateFiles", () => {
    test("explains every file in manifest order", () => {
      const decisions = evaluateFiles(files, { ...noConstraints, size: "pruned" });

      expect(decisions.map((decision) => [decision.file.name, decision.verdict])).toEqual([
        ["full-fp32.safetensors", "skipped-constraint-mismatch"],
        ["pruned-fp16.safetensors", "included"],
        ["vae.safetensors", "skipped-companion"],
        ["pruned-fp16.ckpt", "skipped-unsafe"],
        ["pruned-fp16-b.safetensors", "included"],
        ["config.yaml", "skipped-companion"],
        ["dataset.zip", "skipped-unsupported-type"],
      ]);
    });

    test("gives readable reasons", () => {
      const [mismatch] = evaluateFiles(files.slice(0, 1), { ...noConstraints, size: "pruned" });
      const [unsafe] = evaluateFiles(files.slice(3, 4), noConstraints);

      expect(mismatch?.reason).toBe("size full does not match pruned");
      expect(unsafe?.reason).toBe("format PickleTensor is not SafeTensor");
    });
  });
});
