import type { NodeShape } from "./util.js";

export const DEFAULT_POWER_BASE = 1e3;

function hex2(v: number): string {
  return v.toString(16).padStart(2, "0");
}

/** A -> red, B -> green, C -> blue. All three phases draw black, not white. */
export function phaseColor(phases: string): string {
  const r = phases.includes("A") ? 255 : 0;
  const g = phases.includes("B") ? 255 : 0;
  const b = phases.includes("C") ? 255 : 0;
  if (r === 255 && g === 255 && b === 255) return "black";
  return `#${hex2(r)}${hex2(g)}${hex2(b)}`;
}

export function phaseEdgeColor(phases: string): "black" | "white" {
  return phases.includes("N") ? "black" : "white";
}

export function phaseShape(phases: string): NodeShape {
  if (phases.includes("S")) return "round";
  if (phases.includes("D")) return "triangle-up";
  return "triangle-down";
}

/**
 * Line width for a link carrying `power` (real part, any sign). Width is 1 at
 * zero power and grows by 1 per decade of power above the base.
 */
export function edgeWeight(power: number, base = DEFAULT_POWER_BASE): number {
  return Math.log10(Math.abs(power) / base + 10);
}
