import fs from "fs";
import path from "path";
import { spawnSync, type SpawnSyncOptionsWithStringEncoding, type SpawnSyncReturns } from "child_process";
import { z } from "zod";
import { ConverterError, ModelStructureError } from "./errors.js";
import { replaceExt, type ParsedModel } from "./util.js";

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

export type LoadOptions = {
  workdir: string;
  jsonfile?: string;
  converterBin?: string;
  /** seconds */
  timeout?: number;
  spawn?: SpawnFn;
};

export type LoadedModel = {
  model: ParsedModel;
  jsonPath: string;
  /** Converter output, empty when the input was already JSON. */
  log: string;
};

const modelSchema = z
  .object({
    objects: z.record(z.string(), z.record(z.string(), z.unknown())),
  })
  .passthrough();

function defaultConverter(): string {
  const env = process.env.GRIDLABD_BIN;
  return env && env.trim().length > 0 ? env : "gridlabd";
}

export function parseModel(doc: unknown, source = "<model>"): ParsedModel {
  const res = modelSchema.safeParse(doc);
  if (!res.success) {
    const issue = res.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new ModelStructureError(source, where, issue?.message ?? "is not a model document");
  }
  return { objects: res.data.objects };
}

/** Runs the external converter and returns its combined output. */
export function convertToJson(input: string, jsonfile: string, options: LoadOptions): string {
  const bin = options.converterBin ?? defaultConverter();
  const spawn = options.spawn ?? spawnSync;
  const res = spawn(bin, ["-W", options.workdir, "-I", input, "-o", jsonfile], {
    encoding: "utf8",
    stdio: "pipe",
    timeout: options.timeout !== undefined ? options.timeout * 1000 : undefined,
  });
  const output = `${res.stdout ?? ""}${res.stderr ?? ""}`;
  if (res.error) {
    const code = "code" in res.error ? res.error.code : undefined;
    if (code === "ENOENT") {
      throw new ConverterError(
        `Converter not found ('${bin}'). Install GridLAB-D or set GRIDLABD_BIN to the executable path.`,
        null,
        output,
      );
    }
    if (code === "ETIMEDOUT") {
      throw new ConverterError(`Converter timed out after ${options.timeout}s on ${input}`, null, output);
    }
    throw new ConverterError(`Failed to launch converter ('${bin}'): ${res.error.message}`, null, output);
  }
  if (res.status !== 0) {
    throw new ConverterError(`Converter failed on ${input} with exit code ${res.status}`, res.status, output);
  }
  return output;
}

export function loadModel(input: string, options: LoadOptions): LoadedModel {
  let jsonfile = input;
  let log = "";
  if (path.extname(input).toLowerCase() !== ".json") {
    jsonfile = options.jsonfile ?? replaceExt(input, ".json");
    log = convertToJson(input, jsonfile, options);
  }
  const jsonPath = path.resolve(options.workdir, jsonfile);
  if (!fs.existsSync(jsonPath)) {
    throw new ConverterError(`Model JSON not found: ${jsonPath}`, null, log);
  }
  const doc: unknown = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
  return { model: parseModel(doc, jsonfile), jsonPath, log };
}
