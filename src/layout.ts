import fs from "fs";
import { pathToFileURL } from "url";
import elkModule from "elkjs/lib/elk.bundled.js";
import type { ElkNode, LayoutOptions } from "elkjs/lib/elk-api.js";
import { loadRules, resolveConfig, type LayoutConfig } from "./config.js";
import { extent, type Canvas, type Graph, type LayoutName } from "./util.js";

type Point = { x: number; y: number };

const ELK_ALGORITHMS: Record<Exclude<LayoutName, "circular">, string> = {
  kamada_kawai: "org.eclipse.elk.stress",
  spring: "org.eclipse.elk.force",
  fruchterman_reingold: "org.eclipse.elk.force",
  layered: "org.eclipse.elk.layered",
};

// ELK box per node; positions are rescaled to the canvas afterwards
const NODE_BOX = 10;

function buildLayoutOptions(algorithm: Exclude<LayoutName, "circular">, cfg: LayoutConfig): LayoutOptions {
  const opts: LayoutOptions = {
    "elk.algorithm": ELK_ALGORITHMS[algorithm],
    "elk.spacing.nodeNode": String(cfg.nodeSpacing),
    "elk.randomSeed": "1",
  };
  if (algorithm === "kamada_kawai") {
    opts["org.eclipse.elk.stress.desiredEdgeLength"] = String(cfg.nodeSpacing * 2);
  }
  if (algorithm === "layered") {
    opts["elk.direction"] = "RIGHT";
  }
  return { ...opts, ...cfg.options };
}

export function circularPositions(count: number): Point[] {
  const out: Point[] = [];
  for (let i = 0; i < count; i += 1) {
    const theta = (2 * Math.PI * i) / count;
    out.push({ x: Math.cos(theta), y: Math.sin(theta) });
  }
  return out;
}

async function elkPositions(graph: Graph, algorithm: Exclude<LayoutName, "circular">, cfg: LayoutConfig): Promise<Point[]> {
  const elk = new elkModule.default();
  const indexOf = new Map(graph.nodes.map((n, i) => [n.id, i]));
  const elkGraph: ElkNode = {
    id: "root",
    layoutOptions: buildLayoutOptions(algorithm, cfg),
    children: graph.nodes.map((_, i) => ({ id: `n${i}`, width: NODE_BOX, height: NODE_BOX })),
    edges: graph.edges.map((e, i) => ({
      id: `e${i}`,
      sources: [`n${indexOf.get(e.source) ?? -1}`],
      targets: [`n${indexOf.get(e.target) ?? -1}`],
    })),
  };
  const laid = await elk.layout(elkGraph);
  const byId = new Map<string, ElkNode>();
  for (const c of laid.children ?? []) byId.set(c.id, c);
  return graph.nodes.map((_, i) => {
    const c = byId.get(`n${i}`);
    return { x: (c?.x ?? 0) + NODE_BOX / 2, y: (c?.y ?? 0) + NODE_BOX / 2 };
  });
}

function fitAxis(values: number[], size: number, margin: number): number[] {
  const [lo, hi] = extent(values) ?? [0, 0];
  if (hi - lo < 1e-9) return values.map(() => size / 2);
  const span = size - 2 * margin;
  return values.map((v) => margin + ((v - lo) / (hi - lo)) * span);
}

/** Maps raw positions into the canvas box; each axis is stretched on its own. */
export function fitToCanvas(points: Point[], canvas: Canvas): Point[] {
  if (points.length === 0) return [];
  const xs = fitAxis(points.map((p) => p.x), canvas.width, canvas.margin);
  const ys = fitAxis(points.map((p) => p.y), canvas.height, canvas.margin);
  return points.map((_, i) => ({ x: xs[i] ?? 0, y: ys[i] ?? 0 }));
}

export async function layoutGraph(graph: Graph, cfg: LayoutConfig, canvas: Canvas): Promise<Graph> {
  if (graph.nodes.length === 0) return graph;
  const algorithm = cfg.algorithm;
  const raw = algorithm === "circular"
    ? circularPositions(graph.nodes.length)
    : await elkPositions(graph, algorithm, cfg);
  const placed = fitToCanvas(raw, canvas);
  return {
    ...graph,
    nodes: graph.nodes.map((n, i) => ({ ...n, x: placed[i]?.x ?? 0, y: placed[i]?.y ?? 0 })),
  };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  const rulesPath = process.argv[4];
  const graph: Graph = JSON.parse(fs.readFileSync(input, "utf8"));
  const config = resolveConfig(rulesPath ? loadRules(rulesPath) : undefined);
  layoutGraph(graph, config.layout, config.render).then((out) => {
    const data = JSON.stringify(out, null, 2);
    if (output === "-") {
      process.stdout.write(data);
    } else {
      fs.writeFileSync(output, data, "utf8");
    }
  }).catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}
