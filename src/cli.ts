import fs from "fs";
import path from "path";
import minimist from "minimist";
import { runAutotest, E_OK, E_SYNTAX, type AutotestOptions, type AutotestSummary } from "./autotest.js";
import { loadRules, resolveConfig, type ConfigOverrides } from "./config.js";
import { convert, type ConvertRequest } from "./plot.js";

const USAGE = `Convert a GridLAB-D model to a network plot image

Options:
  -B|--base=FLOAT       Set the power base (default 1kW)
  -i|--input=FILE       Set the input file name (GLM or JSON)
  -L|--layout=NAME      Choose the layout method (default "kamada_kawai")
  -N|--nodeshape=NAME   Set the node shape (default "phases")
  -Z|--nodesize=INT     Set the node size (default 25)
  -o|--output=FILE      Set the output file name (.png, .svg or .pdf)
  -R|--rules=FILE       Read rules from a YAML file
  -S|--show             Show the image
  -t|--timeout=INT      Set the converter timeout in seconds
  -T|--title[=TEXT]     Enable or set the image title
  -W|--workdir=DIR      Set the working directory (default ".")

Link width is logarithmic in power: the power base draws width ~1 and each
factor of 10 above it adds 1. Layouts: kamada_kawai, spring,
fruchterman_reingold, layered, circular. Node shapes: phases (from each
node's phases), round, triangle-up, triangle-down, square, diamond.

Non-JSON input is converted to JSON with gridlabd first. Without --output
and --show the image is written beside the input with the extension ".png".
Without --input, every GLM file in <workdir>/autotest is plotted and the
results are written to validate.txt.`;

const KNOWN = new Set(["B", "base", "i", "input", "L", "layout", "N", "nodeshape", "Z", "nodesize", "o", "output", "R", "rules", "S", "show", "t", "timeout", "T", "title", "W", "workdir", "h", "help"]);

export type CliDeps = {
  convert: (req: ConvertRequest) => Promise<unknown>;
  runAutotest: (workdir: string, opts: AutotestOptions) => Promise<AutotestSummary>;
};

const defaultDeps: CliDeps = { convert, runAutotest };

function numberOption(name: string, v: unknown): number | undefined {
  if (v === undefined) return undefined;
  const n = typeof v === "number" ? v : Number(v);
  if (typeof v === "boolean" || !Number.isFinite(n)) throw new Error(`option '--${name}' needs a number`);
  return n;
}

function titleOption(v: unknown): boolean | string | undefined {
  if (v === undefined || typeof v === "boolean") return v;
  const s = String(v);
  if (s === "true") return true;
  if (s === "false") return false;
  return s;
}

/** Parses command-line arguments and runs one conversion or the autotest; resolves to the exit code. */
export async function runCli(args: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const argv = minimist(args, {
    string: ["input", "output", "layout", "nodeshape", "workdir", "rules"],
    boolean: ["show", "help"],
    alias: { B: "base", i: "input", L: "layout", N: "nodeshape", Z: "nodesize", o: "output", R: "rules", S: "show", t: "timeout", T: "title", W: "workdir", h: "help" },
  });
  const positional = argv._.map(String);
  for (const key of [...Object.keys(argv).filter((k) => k !== "_"), ...positional.filter((p) => p !== "help")]) {
    if (!KNOWN.has(key)) {
      console.error(`ERROR [glm-netplot]: option '${key}' is invalid`);
      return E_SYNTAX;
    }
  }
  if (argv.help || positional.includes("help")) {
    console.log(USAGE);
    return E_OK;
  }

  const overrides: ConfigOverrides = {
    base: numberOption("base", argv.base),
    layout: argv.layout || undefined,
    nodeShape: argv.nodeshape || undefined,
    nodeSize: numberOption("nodesize", argv.nodesize),
    timeout: numberOption("timeout", argv.timeout),
    title: titleOption(argv.title),
    show: argv.show ? true : undefined,
  };
  const config = resolveConfig(argv.rules ? loadRules(argv.rules) : undefined, overrides);
  const workdir = argv.workdir || ".";
  const input: string | undefined = argv.input || undefined;

  if (!input) {
    if (fs.existsSync(path.join(workdir, "autotest"))) {
      console.log("Validating in folder", path.join(workdir, "autotest"));
      const summary = await deps.runAutotest(workdir, { config });
      return summary.code;
    }
    console.log("Syntax: glm-netplot [OPTIONS ...]");
    return E_SYNTAX;
  }

  await deps.convert({ input, output: argv.output || undefined, workdir, config });
  return E_OK;
}
