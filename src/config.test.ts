import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig, loadRules, resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "netplot-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to the defaults", () => {
    expect(resolveConfig(undefined)).toEqual(defaultConfig);
    expect(resolveConfig(null)).toEqual(defaultConfig);
    expect(defaultConfig.powerBase).toBe(1000);
    expect(defaultConfig.layout.algorithm).toBe("kamada_kawai");
    expect(defaultConfig.render.nodeSize).toBe(25);
  });

  it("reads a YAML rules file", () => {
    const file = path.join(dir, "rules.yaml");
    fs.writeFileSync(
      file,
      [
        "graph:",
        "  power_base: 5000",
        "layout:",
        "  algorithm: circular",
        "  options:",
        "    elk.stress.iterationLimit: 500",
        "render:",
        "  node_shape: round",
        "  title: Test feeder",
        "converter:",
        "  bin: /opt/gridlabd/bin/gridlabd",
        "  timeout: 30",
      ].join("\n"),
    );
    const cfg = resolveConfig(loadRules(file));
    expect(cfg.powerBase).toBe(5000);
    expect(cfg.layout).toEqual({ algorithm: "circular", nodeSpacing: 40, options: { "elk.stress.iterationLimit": "500" } });
    expect(cfg.render).toEqual({ ...defaultConfig.render, nodeShape: "round", title: "Test feeder" });
    expect(cfg.converter).toEqual({ bin: "/opt/gridlabd/bin/gridlabd", timeout: 30 });
  });

  it("lets command-line values win over the rules", () => {
    const cfg = resolveConfig(
      { graph: { power_base: 5000 }, render: { node_size: 9 } },
      { base: 10, layout: "spring", nodeShape: "diamond", title: true, show: true, timeout: 4 },
    );
    expect(cfg.powerBase).toBe(10);
    expect(cfg.layout.algorithm).toBe("spring");
    expect(cfg.render).toMatchObject({ nodeSize: 9, nodeShape: "diamond", title: true, show: true });
    expect(cfg.converter.timeout).toBe(4);
  });

  it("rejects a non-positive power base", () => {
    expect(() => resolveConfig({ graph: { power_base: 0 } })).toThrow(/graph\.power_base/);
    expect(() => resolveConfig(undefined, { base: -5 })).toThrow(/graph\.power_base/);
  });

  it("rejects an unknown layout or shape", () => {
    expect(() => resolveConfig(undefined, { layout: "spectral" })).toThrow(/layout\.algorithm/);
    expect(() => resolveConfig(undefined, { nodeShape: "star" })).toThrow(/render\.node_shape/);
  });

  it("rejects unknown keys and non-mapping documents", () => {
    expect(() => resolveConfig({ colours: {} })).toThrow(/Unrecognized key/);
    expect(() => resolveConfig("hello")).toThrow(/^invalid rules: /);
  });
});
