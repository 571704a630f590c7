import fs from "fs";
import { pathToFileURL } from "url";
import { loadRules, resolveConfig, type RenderConfig } from "./config.js";
import type { Edge, Graph, MarkerShape, Node } from "./util.js";

export type RenderOptions = Pick<RenderConfig, "width" | "height" | "nodeSize" | "nodeShape"> & {
  title?: string;
};

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function num(v: number): string {
  return String(Number(v.toFixed(2)));
}

function polygon(pts: Array<[number, number]>): string {
  return pts.map(([x, y]) => `${num(x)},${num(y)}`).join(" ");
}

/** Element name and geometry attributes for a marker centred on (cx, cy). */
export function markerGeometry(shape: MarkerShape, cx: number, cy: number, size: number): { tag: string; attrs: string } {
  const h = size / 2;
  switch (shape) {
    case "round":
      return { tag: "circle", attrs: `cx="${num(cx)}" cy="${num(cy)}" r="${num(h)}"` };
    case "square":
      return { tag: "rect", attrs: `x="${num(cx - h)}" y="${num(cy - h)}" width="${num(size)}" height="${num(size)}"` };
    case "triangle-up":
      return { tag: "polygon", attrs: `points="${polygon([[cx, cy - h], [cx + h, cy + h], [cx - h, cy + h]])}"` };
    case "triangle-down":
      return { tag: "polygon", attrs: `points="${polygon([[cx, cy + h], [cx + h, cy - h], [cx - h, cy - h]])}"` };
    case "diamond":
      return { tag: "polygon", attrs: `points="${polygon([[cx, cy - h], [cx + h, cy], [cx, cy + h], [cx - h, cy]])}"` };
  }
}

function renderEdge(e: Edge, byId: Map<string, Node>): string {
  const s = byId.get(e.source);
  const t = byId.get(e.target);
  if (!s || !t) return "";
  return `\n    <line class="edge" data-id="${esc(e.id)}" x1="${num(s.x ?? 0)}" y1="${num(s.y ?? 0)}" x2="${num(t.x ?? 0)}" y2="${num(t.y ?? 0)}" stroke="${esc(e.color)}" stroke-width="${num(e.weight)}"><title>${esc(e.label)}</title></line>`;
}

function renderNode(n: Node, opts: RenderOptions): string {
  const shape = opts.nodeShape === "phases" ? n.shape : opts.nodeShape;
  const { tag, attrs } = markerGeometry(shape, n.x ?? 0, n.y ?? 0, Math.sqrt(opts.nodeSize));
  return `\n    <${tag} class="node ${shape}" data-id="${esc(n.id)}" ${attrs} fill="${esc(n.color)}" stroke="${n.edgeColor}" stroke-width="0.8"><title>${esc(n.label)}</title></${tag}>`;
}

export function renderSvg(graph: Graph, cssPath: string | undefined, opts: RenderOptions): string {
  const css = cssPath ? fs.readFileSync(cssPath, "utf8") : "";
  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const edges = graph.edges.map((e) => renderEdge(e, byId)).join("");
  const nodes = graph.nodes.map((n) => renderNode(n, opts)).join("");
  const title = opts.title
    ? `\n<text class="title" x="${num(opts.width / 2)}" y="24" text-anchor="middle">${esc(opts.title)}</text>`
    : "";
  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" xmlns:inkscape="http://www.inkscape.org/namespaces/inkscape" width="${opts.width}" height="${opts.height}" viewBox="0 0 ${opts.width} ${opts.height}">\n<style>\n${css}\n</style>\n<rect class="background" x="0" y="0" width="${opts.width}" height="${opts.height}" fill="white"/>\n<g id="layer-links" class="layer links" inkscape:groupmode="layer" inkscape:label="links">${edges}\n</g>\n<g id="layer-nodes" class="layer nodes" inkscape:groupmode="layer" inkscape:label="nodes">${nodes}\n</g>${title}\n</svg>\n`;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const css = process.argv[4];
  const rulesPath = process.argv[5];
  const graph: Graph = JSON.parse(fs.readFileSync(input, "utf8"));
  const config = resolveConfig(rulesPath ? loadRules(rulesPath) : undefined);
  const title = typeof config.render.title === "string" ? config.render.title : undefined;
  const svg = renderSvg(graph, css, { ...config.render, title });
  fs.writeFileSync(output, svg, "utf8");
}
