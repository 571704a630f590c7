import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import { DEFAULT_POWER_BASE } from "./encoding.js";
import { LAYOUT_NAMES, NODE_SHAPE_CHOICES, die, type LayoutName, type NodeShapeChoice } from "./util.js";

export type LayoutConfig = {
  algorithm: LayoutName;
  nodeSpacing: number;
  options: Record<string, string>;
};

export type RenderConfig = {
  width: number;
  height: number;
  margin: number;
  /** Marker area in square pixels. */
  nodeSize: number;
  nodeShape: NodeShapeChoice;
  title: boolean | string;
  show: boolean;
};

export type ConverterConfig = {
  bin?: string;
  /** seconds */
  timeout?: number;
};

export type PlotConfig = {
  powerBase: number;
  layout: LayoutConfig;
  render: RenderConfig;
  converter: ConverterConfig;
};

/** Command-line values that take precedence over the rules file. */
export type ConfigOverrides = {
  base?: number;
  layout?: string;
  nodeShape?: string;
  nodeSize?: number;
  title?: boolean | string;
  show?: boolean;
  timeout?: number;
};

const rulesSchema = z
  .object({
    graph: z.object({ power_base: z.number().positive() }).partial().strict().optional(),
    layout: z
      .object({
        algorithm: z.enum(LAYOUT_NAMES),
        node_node: z.number().positive(),
        options: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
      })
      .partial()
      .strict()
      .optional(),
    render: z
      .object({
        width: z.number().positive(),
        height: z.number().positive(),
        margin: z.number().nonnegative(),
        node_size: z.number().positive(),
        node_shape: z.enum(NODE_SHAPE_CHOICES),
        title: z.union([z.boolean(), z.string()]),
        show: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    converter: z
      .object({
        bin: z.string().min(1),
        timeout: z.number().int().positive(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

type Rules = z.infer<typeof rulesSchema>;

export const defaultConfig: PlotConfig = {
  powerBase: DEFAULT_POWER_BASE,
  layout: {
    algorithm: "kamada_kawai",
    nodeSpacing: 40,
    options: {},
  },
  render: {
    width: 1000,
    height: 700,
    margin: 40,
    nodeSize: 25,
    nodeShape: "phases",
    title: false,
    show: false,
  },
  converter: {},
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(rules: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = rules[key];
  return isRecord(v) ? { ...v } : {};
}

function applyOverrides(raw: unknown, o: ConfigOverrides): unknown {
  if (raw === undefined || raw === null) raw = {};
  if (!isRecord(raw)) return raw;
  const rules: Record<string, unknown> = { ...raw };
  const graph = section(rules, "graph");
  const layout = section(rules, "layout");
  const render = section(rules, "render");
  const converter = section(rules, "converter");
  if (o.base !== undefined) graph.power_base = o.base;
  if (o.layout !== undefined) layout.algorithm = o.layout;
  if (o.nodeShape !== undefined) render.node_shape = o.nodeShape;
  if (o.nodeSize !== undefined) render.node_size = o.nodeSize;
  if (o.title !== undefined) render.title = o.title;
  if (o.show !== undefined) render.show = o.show;
  if (o.timeout !== undefined) converter.timeout = o.timeout;
  for (const [key, value] of [["graph", graph], ["layout", layout], ["render", render], ["converter", converter]] as const) {
    if (Object.keys(value).length > 0) rules[key] = value;
  }
  return rules;
}

function toElkValue(v: string | number | boolean): string {
  return typeof v === "string" ? v : String(v);
}

function fromRules(rules: Rules): PlotConfig {
  const d = defaultConfig;
  const options: Record<string, string> = {};
  for (const [k, v] of Object.entries(rules.layout?.options ?? {})) {
    options[k] = toElkValue(v);
  }
  return {
    powerBase: rules.graph?.power_base ?? d.powerBase,
    layout: {
      algorithm: rules.layout?.algorithm ?? d.layout.algorithm,
      nodeSpacing: rules.layout?.node_node ?? d.layout.nodeSpacing,
      options,
    },
    render: {
      width: rules.render?.width ?? d.render.width,
      height: rules.render?.height ?? d.render.height,
      margin: rules.render?.margin ?? d.render.margin,
      nodeSize: rules.render?.node_size ?? d.render.nodeSize,
      nodeShape: rules.render?.node_shape ?? d.render.nodeShape,
      title: rules.render?.title ?? d.render.title,
      show: rules.render?.show ?? d.render.show,
    },
    converter: {
      bin: rules.converter?.bin,
      timeout: rules.converter?.timeout,
    },
  };
}

/** Validates a rules document (as loaded from YAML) and applies overrides on top. */
export function resolveConfig(raw: unknown, overrides: ConfigOverrides = {}): PlotConfig {
  const res = rulesSchema.safeParse(applyOverrides(raw, overrides));
  if (!res.success) {
    const msg = res.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return die(`invalid rules: ${msg}`);
  }
  return fromRules(res.data);
}

export function loadRules(path: string): unknown {
  return yaml.load(fs.readFileSync(path, "utf8"));
}
