import fs from "fs";
import path from "path";
import type { PlotConfig } from "./config.js";
import { ConverterError } from "./errors.js";
import type { SpawnFn } from "./model_load.js";
import { convert } from "./plot.js";
import { replaceExt } from "./util.js";

export const E_OK = 0;
export const E_FAILED = 1;
export const E_SYNTAX = 2;

export type AutotestOptions = {
  config?: PlotConfig;
  /** Report file, relative to the current directory. */
  report?: string;
  convertSpawn?: SpawnFn;
  write?: (text: string) => void;
};

export type AutotestSummary = {
  tested: number;
  failed: number;
  code: number;
};

/**
 * Converts every `.glm` under `<workdir>/autotest` to a `.png` beside it and
 * logs each outcome to the report file.
 */
export async function runAutotest(workdir: string, opts: AutotestOptions = {}): Promise<AutotestSummary> {
  const testdir = path.join(workdir, "autotest");
  const write = opts.write ?? ((text: string) => process.stdout.write(text));
  const report = fs.openSync(opts.report ?? "validate.txt", "w");
  let tested = 0;
  let failed = 0;
  try {
    const files = fs.readdirSync(testdir).filter((f) => f.endsWith(".glm")).sort();
    for (const file of files) {
      const output = path.join(testdir, replaceExt(file, ".png"));
      write(`Testing ${file}... `);
      tested += 1;
      if (fs.existsSync(output)) {
        write("FOUND\n");
        continue;
      }
      try {
        const res = await convert({ input: file, output, workdir: testdir, config: opts.config, convertSpawn: opts.convertSpawn });
        write("OK\n");
        fs.writeSync(report, `*** TEST ${file} OK\n${res.log}\n\n`);
      } catch (e: unknown) {
        failed += 1;
        if (e instanceof ConverterError) {
          write("FAILED\n");
          fs.writeSync(report, `*** TEST ${file} FAILED\n${e.output || e.message}\n\n`);
        } else {
          write("EXCEPTION\n");
          const trace = e instanceof Error ? e.stack ?? e.message : String(e);
          fs.writeSync(report, `*** TEST ${file} EXCEPTION\n${trace}\n\n`);
        }
      }
    }
  } finally {
    fs.closeSync(report);
  }
  write(`${tested} tested\n`);
  write(`${failed} failed\n`);
  if (tested > 0) write(`${(100 - (100 * failed) / tested).toFixed(0)}% passing\n`);
  return { tested, failed, code: failed ? E_FAILED : E_OK };
}
