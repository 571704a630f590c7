import { describe, expect, it } from "vitest";
import { ModelStructureError, PowerParseError, WeightValidationError } from "./errors.js";
import { buildEdge, buildGraph, graphStats } from "./network_graph.js";
import type { ParsedModel } from "./util.js";

function exampleModel(): ParsedModel {
  return {
    objects: {
      n1: { id: 1, phases: "ABC" },
      n2: { id: 2, phases: "AN" },
      link1: { id: 3, from: "n1", to: "n2", phases: "A", power_out: "5000 VA" },
    },
  };
}

describe("buildGraph", () => {
  it("encodes phases, node type and power on a small feeder", () => {
    const g = buildGraph(exampleModel(), { powerBase: 1000 });
    expect(g.nodes).toEqual([
      { id: "1", label: "n1", color: "black", edgeColor: "white", shape: "triangle-down" },
      { id: "2", label: "n2", color: "#ff0000", edgeColor: "black", shape: "triangle-down" },
    ]);
    expect(g.edges).toHaveLength(1);
    const [edge] = g.edges;
    expect(edge).toMatchObject({ id: "3", source: "1", target: "2", label: "link1", color: "#ff0000" });
    expect(edge?.weight).toBeCloseTo(1.1760912590556813, 12);
  });

  it("defaults the power base to 1000", () => {
    const g = buildGraph(exampleModel());
    expect(g.edges[0]?.weight).toBeCloseTo(Math.log10(15), 12);
  });

  it("keys nodes by id, creates each once and keeps its first attributes", () => {
    const g = buildGraph({
      objects: {
        feeder_head: { id: "10", phases: "ABCN" },
        tee: { id: 11, phases: "ABCD" },
        house: { id: 12, phases: "AS" },
        line_a: { id: 20, from: "feeder_head", to: "tee", phases: "ABC", power_out: "120000+3000j VA" },
        line_b: { id: 21, from: "tee", to: "house", phases: "AS", power_out: "4500-10j VA" },
      },
    });
    expect(g.nodes.map((n) => n.id)).toEqual(["10", "11", "12"]);
    expect(g.nodes.map((n) => n.shape)).toEqual(["triangle-down", "triangle-up", "round"]);
    expect(g.nodes[1]).toEqual({ id: "11", label: "tee", color: "black", edgeColor: "white", shape: "triangle-up" });
    expect(g.edges.map((e) => [e.source, e.target, e.color])).toEqual([
      ["10", "11", "black"],
      ["11", "12", "#ff0000"],
    ]);
  });

  it("never overwrites a node created by an earlier link", () => {
    const g = buildGraph({
      objects: {
        a: { id: 1, phases: "A" },
        a2: { id: 1, phases: "BS" },
        b: { id: 2, phases: "ABC" },
        l1: { id: 3, from: "a", to: "b", phases: "A", power_out: "100 VA" },
        l2: { id: 4, from: "a2", to: "b", phases: "B", power_out: "100 VA" },
      },
    });
    expect(g.nodes).toHaveLength(2);
    expect(g.nodes[0]).toEqual({ id: "1", label: "a", color: "#ff0000", edgeColor: "white", shape: "triangle-down" });
    expect(g.edges.map((e) => [e.id, e.source, e.target])).toEqual([
      ["3", "1", "2"],
      ["4", "1", "2"],
    ]);
  });

  it("adds one edge per link, parallel links included", () => {
    const g = buildGraph({
      objects: {
        a: { id: 1, phases: "ABC" },
        b: { id: 2, phases: "ABC" },
        line1: { id: 3, from: "a", to: "b", phases: "ABC", power_out: "1000 VA" },
        line2: { id: 4, from: "b", to: "a", phases: "B", power_out: "0 VA" },
      },
    });
    expect(g.nodes).toHaveLength(2);
    expect(g.edges.map((e) => e.id)).toEqual(["3", "4"]);
    expect(g.edges[1]?.weight).toBe(1);
  });

  it("ignores objects no link refers to", () => {
    const model = exampleModel();
    model.objects.island = { id: 99, phases: "B" };
    model.objects.clock = { timestamp: "2000-01-01 00:00:00" };
    expect(buildGraph(model).nodes.map((n) => n.id)).toEqual(["1", "2"]);
  });

  it("uses the link name when the link has no id", () => {
    const model = exampleModel();
    delete model.objects.link1?.id;
    expect(buildGraph(model).edges[0]?.id).toBe("link1");
  });

  it("is idempotent", () => {
    const model = exampleModel();
    expect(buildGraph(model)).toEqual(buildGraph(model));
  });

  it("names the endpoint when its id is missing", () => {
    const model = exampleModel();
    delete model.objects.n2?.id;
    expect(() => buildGraph(model)).toThrow(ModelStructureError);
    expect(() => buildGraph(model)).toThrow("n2: id is missing");
  });

  it("rejects a link to an unknown object", () => {
    const model = exampleModel();
    model.objects.link1 = { ...model.objects.link1, to: "n9" };
    expect(() => buildGraph(model)).toThrow("link1: to refers to unknown object 'n9'");
  });

  it("rejects an endpoint without phases", () => {
    const model = exampleModel();
    model.objects.n1 = { id: 1 };
    expect(() => buildGraph(model)).toThrow("n1: phases is missing");
  });

  it("rejects a link without power_out", () => {
    const model = exampleModel();
    delete model.objects.link1?.power_out;
    expect(() => buildGraph(model)).toThrow("link1: power_out is missing");
  });

  it("reports an unparseable power value with the link name", () => {
    const model = exampleModel();
    model.objects.link1 = { ...model.objects.link1, power_out: "lots VA" };
    try {
      buildGraph(model);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(PowerParseError);
      if (e instanceof PowerParseError) {
        expect(e.object).toBe("link1");
        expect(e.raw).toBe("lots VA");
      }
    }
  });

  it("stops the whole build on a non-positive width", () => {
    const model = exampleModel();
    model.objects.link1 = { ...model.objects.link1, power_out: "18000 VA" };
    expect(() => buildGraph(model, { powerBase: -2000 })).toThrow(WeightValidationError);
    expect(() => buildGraph(model, { powerBase: -2000 })).toThrow("link1: weight<=0; power = 18000 VA");
  });
});

describe("buildEdge", () => {
  it("returns a failed result instead of an edge for a non-positive width", () => {
    const res = buildEdge("link1", { phases: "A", power_out: "18000 VA" }, "1", "2", -2000);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.object).toBe("link1");
      expect(res.error.powerOut).toBe("18000 VA");
      expect(res.error.weight).toBe(0);
    }
  });

  it("treats a NaN width as invalid", () => {
    const res = buildEdge("link1", { phases: "A", power_out: "50000 VA" }, "1", "2", -2000);
    expect(res.ok).toBe(false);
  });
});

describe("graphStats", () => {
  it("summarises counts and the width range", () => {
    const g = buildGraph({
      objects: {
        a: { id: 1, phases: "A" },
        b: { id: 2, phases: "A" },
        c: { id: 3, phases: "A" },
        ab: { id: 4, from: "a", to: "b", phases: "A", power_out: "0 VA" },
        bc: { id: 5, from: "b", to: "c", phases: "A", power_out: "90000 VA" },
      },
    });
    expect(graphStats(g)).toEqual({ nodes: 3, edges: 2, minWeight: 1, maxWeight: 2 });
    expect(graphStats({ nodes: [], edges: [] })).toEqual({ nodes: 0, edges: 0 });
  });

  it("handles feeder-sized edge lists", () => {
    const edges = Array.from({ length: 200_000 }, (_, i) => ({
      id: String(i),
      source: "1",
      target: "2",
      label: `line${i}`,
      color: "black",
      weight: 1 + (i % 2),
    }));
    expect(graphStats({ nodes: [], edges })).toEqual({ nodes: 0, edges: 200_000, minWeight: 1, maxWeight: 2 });
  });
});
