import fs from "fs";
import os from "os";
import path from "path";
import { spawn, spawnSync, type SpawnSyncOptions, type SpawnSyncReturns } from "child_process";
import { pathToFileURL } from "url";
import { Resvg } from "@resvg/resvg-js";
import { writeText } from "./util.js";

export type SpawnFn = (command: string, args: string[], options: SpawnSyncOptions) => SpawnSyncReturns<string | Buffer>;

export type ImageFormat = "svg" | "png" | "pdf";

export type ExportOptions = {
  inkscapeBin?: string;
  spawn?: SpawnFn;
};

function defaultInkscape(): string {
  const env = process.env.INKSCAPE_BIN;
  return env && env.trim().length > 0 ? env : "inkscape";
}

function buildArgs(svg: string, pdf: string): string[] {
  return ["--export-area-drawing", `--export-filename=${pdf}`, svg];
}

const FORMATS: Record<string, ImageFormat> = { ".svg": "svg", ".png": "png", ".pdf": "pdf" };

export function imageFormat(output: string): ImageFormat {
  const ext = path.extname(output).toLowerCase();
  const format = FORMATS[ext];
  if (format) return format;
  throw new Error(`Unsupported output format '${ext || output}'; use .png, .svg or .pdf`);
}

/** Converts the SVG file at `svg` to `pdf` with Inkscape. */
export function exportPdf(svg: string, pdf: string, opts: ExportOptions = {}): void {
  const bin = opts.inkscapeBin ?? defaultInkscape();
  const run: SpawnFn = opts.spawn ?? spawnSync;
  const res = run(bin, buildArgs(svg, pdf), { stdio: "inherit" });
  if (res.error) {
    const code = "code" in res.error ? res.error.code : undefined;
    throw new Error(
      code === "ENOENT"
        ? `Inkscape not found ('${bin}'). Install Inkscape or set INKSCAPE_BIN to the executable path.`
        : `Failed to launch Inkscape ('${bin}'): ${res.error.message}`,
    );
  }
  if (res.status !== 0) throw new Error(`Inkscape exited with code ${res.status} writing ${pdf}`);
  if (!fs.existsSync(pdf)) throw new Error(`Inkscape wrote no PDF at ${pdf}`);
}

export function renderPng(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    background: "white",
    font: { loadSystemFonts: true },
  });
  return resvg.render().asPng();
}

/** Writes the SVG document to `output` in the format its extension names. */
export function writeImage(svg: string, output: string, opts: ExportOptions = {}): ImageFormat {
  const format = imageFormat(output);
  if (format === "svg") {
    writeText(output, svg);
  } else if (format === "png") {
    fs.writeFileSync(output, renderPng(svg));
  } else {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "glm-netplot-"));
    try {
      const svgPath = path.join(tmp, "plot.svg");
      writeText(svgPath, svg);
      exportPdf(svgPath, output, opts);
    } finally {
      fs.rmSync(tmp, { recursive: true, force: true });
    }
  }
  return format;
}

/** Opens an image in the desktop viewer without waiting for it. */
export function showImage(file: string): void {
  const [cmd, args]: [string, string[]] =
    process.platform === "darwin" ? ["open", [file]]
    : process.platform === "win32" ? ["cmd", ["/c", "start", "", file]]
    : ["xdg-open", [file]];
  const child = spawn(cmd, args, { detached: true, stdio: "ignore" });
  child.on("error", (err) => {
    console.error(`export_image: cannot open viewer '${cmd}': ${err.message}`);
  });
  child.unref();
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const svg = process.argv[2];
  const out = process.argv[3];
  if (!svg || !out) {
    console.error("Usage: node dist/export_image.js <in.svg> <out.png|out.pdf>");
    process.exit(1);
  }
  try {
    writeImage(fs.readFileSync(svg, "utf8"), out);
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
