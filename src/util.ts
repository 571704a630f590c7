import fs from "fs";
import path from "path";

export type NodeShape = "round" | "triangle-up" | "triangle-down";

export type MarkerShape = NodeShape | "square" | "diamond";

export type Node = {
  id: string;
  label: string;
  color: string;
  edgeColor: "black" | "white";
  shape: NodeShape;
  x?: number;
  y?: number;
};

export type Edge = {
  id: string;
  source: string;
  target: string;
  label: string;
  color: string;
  weight: number;
};

export type Graph = {
  nodes: Node[];
  edges: Edge[];
};

export type ObjectRecord = Record<string, unknown>;

export type ParsedModel = {
  objects: Record<string, ObjectRecord>;
};

export function die(msg: string): never {
  throw new Error(msg);
}

export function writeText(file: string, data: string): void {
  fs.writeFileSync(file, data, "utf8");
}

export function replaceExt(p: string, ext: string): string {
  return p.slice(0, p.length - path.extname(p).length) + ext;
}

export function baseName(p: string): string {
  return path.basename(p, path.extname(p));
}

export type Canvas = {
  width: number;
  height: number;
  margin: number;
};

export const LAYOUT_NAMES = ["kamada_kawai", "spring", "fruchterman_reingold", "layered", "circular"] as const;

export type LayoutName = (typeof LAYOUT_NAMES)[number];

/** `phases` draws each node with its own shape; anything else is used for every node. */
export const NODE_SHAPE_CHOICES = ["phases", "round", "triangle-up", "triangle-down", "square", "diamond"] as const;

export type NodeShapeChoice = (typeof NODE_SHAPE_CHOICES)[number];

/** Smallest and largest value in one pass; `undefined` for an empty list. */
export function extent(values: Iterable<number>): [number, number] | undefined {
  let lo = Infinity;
  let hi = -Infinity;
  let seen = false;
  for (const v of values) {
    seen = true;
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  return seen ? [lo, hi] : undefined;
}
