import fs from "fs";
import { pathToFileURL } from "url";
import { realPower } from "./complex.js";
import { DEFAULT_POWER_BASE, edgeWeight, phaseColor, phaseEdgeColor, phaseShape } from "./encoding.js";
import { ModelStructureError, WeightValidationError } from "./errors.js";
import { loadModel } from "./model_load.js";
import { extent, type Edge, type Graph, type Node, type ObjectRecord, type ParsedModel } from "./util.js";

export type BuildOptions = {
  powerBase?: number;
};

export type EdgeResult =
  | { ok: true; edge: Edge }
  | { ok: false; error: WeightValidationError };

type IdIndex = Map<string, string | undefined>;

function keyOf(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return undefined;
}

function stringField(name: string, record: ObjectRecord, field: string): string {
  const v = record[field];
  if (v === undefined || v === null) throw new ModelStructureError(name, field, "is missing");
  if (typeof v !== "string") throw new ModelStructureError(name, field, "must be a string");
  return v;
}

function isLink(record: ObjectRecord): boolean {
  return record.from !== undefined && record.to !== undefined;
}

function indexIds(objects: Record<string, ObjectRecord>): IdIndex {
  const index: IdIndex = new Map();
  for (const [name, data] of Object.entries(objects)) {
    index.set(name, keyOf(data.id));
  }
  return index;
}

function resolveEndpoint(index: IdIndex, link: string, field: "from" | "to", ref: unknown): { name: string; id: string } {
  if (typeof ref !== "string") throw new ModelStructureError(link, field, "must be an object name");
  if (!index.has(ref)) throw new ModelStructureError(link, field, `refers to unknown object '${ref}'`);
  const id = index.get(ref);
  if (id === undefined) throw new ModelStructureError(ref, "id", "is missing");
  return { name: ref, id };
}

function ensureNode(nodes: Map<string, Node>, objects: Record<string, ObjectRecord>, name: string, id: string): Node {
  const existing = nodes.get(id);
  if (existing) return existing;
  const phases = stringField(name, objects[name] ?? {}, "phases");
  const node: Node = {
    id,
    label: name,
    color: phaseColor(phases),
    edgeColor: phaseEdgeColor(phases),
    shape: phaseShape(phases),
  };
  nodes.set(id, node);
  return node;
}

/**
 * Builds the edge for one link record. A parse failure or a missing field
 * throws; a non-positive width comes back as a failed result.
 */
export function buildEdge(
  name: string,
  record: ObjectRecord,
  source: string,
  target: string,
  powerBase = DEFAULT_POWER_BASE,
): EdgeResult {
  const powerOut = stringField(name, record, "power_out");
  const weight = edgeWeight(realPower(name, powerOut), powerBase);
  // NaN fails this test too
  if (!(weight > 0)) {
    return { ok: false, error: new WeightValidationError(name, powerOut, weight) };
  }
  const phases = stringField(name, record, "phases");
  return {
    ok: true,
    edge: {
      id: keyOf(record.id) ?? name,
      source,
      target,
      label: name,
      color: phaseColor(phases),
      weight,
    },
  };
}

export function buildGraph(model: ParsedModel, options: BuildOptions = {}): Graph {
  const powerBase = options.powerBase ?? DEFAULT_POWER_BASE;
  const objects = model.objects;
  const index = indexIds(objects);
  const nodes = new Map<string, Node>();
  const edges: Edge[] = [];

  for (const [name, data] of Object.entries(objects)) {
    if (!isLink(data)) continue;
    const from = resolveEndpoint(index, name, "from", data.from);
    const to = resolveEndpoint(index, name, "to", data.to);
    ensureNode(nodes, objects, from.name, from.id);
    ensureNode(nodes, objects, to.name, to.id);
    const result = buildEdge(name, data, from.id, to.id, powerBase);
    if (!result.ok) throw result.error;
    edges.push(result.edge);
  }

  return { nodes: Array.from(nodes.values()), edges };
}

export function graphStats(graph: Graph): { nodes: number; edges: number; minWeight?: number; maxWeight?: number } {
  const range = extent(graph.edges.map((e) => e.weight));
  if (!range) return { nodes: graph.nodes.length, edges: 0 };
  return {
    nodes: graph.nodes.length,
    edges: graph.edges.length,
    minWeight: range[0],
    maxWeight: range[1],
  };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  const base = process.argv[4] ? Number(process.argv[4]) : DEFAULT_POWER_BASE;
  const { model } = loadModel(input, { workdir: "." });
  const graph = buildGraph(model, { powerBase: base });
  const data = JSON.stringify(graph, null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    fs.writeFileSync(output, data, "utf8");
  }
  const stats = graphStats(graph);
  console.error(`network_graph: nodes=${stats.nodes} edges=${stats.edges}`);
}
