import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { defaultConfig, type PlotConfig } from "./config.js";
import { showImage, writeImage, type SpawnFn as ExportSpawnFn } from "./export_image.js";
import { layoutGraph } from "./layout.js";
import { loadModel, type SpawnFn as ConvertSpawnFn } from "./model_load.js";
import { buildGraph, graphStats } from "./network_graph.js";
import { renderSvg } from "./render_svg.js";
import { baseName, replaceExt, type Graph } from "./util.js";

export type ConvertRequest = {
  input: string;
  output?: string;
  workdir?: string;
  jsonfile?: string;
  config?: PlotConfig;
  cssPath?: string;
  /** Replaces the external GridLAB-D converter. */
  convertSpawn?: ConvertSpawnFn;
  /** Replaces the Inkscape call for PDF output. */
  exportSpawn?: ExportSpawnFn;
  /** Replaces the desktop viewer. */
  show?: (file: string) => void;
};

export type ConvertResult = {
  output: string;
  graph: Graph;
  /** Converter output, empty for JSON input. */
  log: string;
};

export const DEFAULT_CSS = fileURLToPath(new URL("../styles/network.css", import.meta.url));

function resolveTitle(title: boolean | string, input: string): string | undefined {
  if (title === true) return baseName(input);
  if (typeof title === "string" && title.length > 0) return title;
  return undefined;
}

/** Model file in, image file out. */
export async function convert(req: ConvertRequest): Promise<ConvertResult> {
  const config = req.config ?? defaultConfig;
  const workdir = req.workdir ?? ".";
  const loaded = loadModel(req.input, {
    workdir,
    jsonfile: req.jsonfile,
    converterBin: config.converter.bin,
    timeout: config.converter.timeout,
    spawn: req.convertSpawn,
  });
  const graph = buildGraph(loaded.model, { powerBase: config.powerBase });
  const stats = graphStats(graph);
  console.error(
    `network_graph: nodes=${stats.nodes} edges=${stats.edges}` +
      (stats.minWeight !== undefined ? ` width=${stats.minWeight.toFixed(2)}..${(stats.maxWeight ?? stats.minWeight).toFixed(2)}` : ""),
  );

  const laid = await layoutGraph(graph, config.layout, config.render);
  const title = resolveTitle(config.render.title, loaded.jsonPath);
  const svg = renderSvg(laid, req.cssPath ?? (fs.existsSync(DEFAULT_CSS) ? DEFAULT_CSS : undefined), {
    ...config.render,
    title,
  });

  let output = req.output;
  if (!output) {
    output = config.render.show
      ? path.join(fs.mkdtempSync(path.join(os.tmpdir(), "glm-netplot-")), `${baseName(loaded.jsonPath)}.svg`)
      : replaceExt(loaded.jsonPath, ".png");
  }
  const format = writeImage(svg, output, { spawn: req.exportSpawn });
  console.error(`plot: wrote ${format} ${output}`);
  if (config.render.show) (req.show ?? showImage)(output);
  return { output, graph: laid, log: loaded.log };
}
