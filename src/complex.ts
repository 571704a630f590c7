import { PowerParseError } from "./errors.js";

export type Complex = { re: number; im: number };

const NUM = String.raw`(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?`;
const RECT = new RegExp(`^([+-]?${NUM})(?:([+-])(${NUM})?[jJ])?$`);
const IMAG = new RegExp(`^([+-]?${NUM})[jJ]$`);

/**
 * Parses `<real>[(+|-)<imag>j]` or `<imag>j`. An imaginary part written
 * without digits (`1+j`) is 1. Returns undefined for anything else.
 */
export function parseComplex(token: string): Complex | undefined {
  const rect = RECT.exec(token);
  if (rect) {
    const re = Number(rect[1]);
    if (rect[2] === undefined) return { re, im: 0 };
    const mag = rect[3] === undefined ? 1 : Number(rect[3]);
    return { re, im: rect[2] === "-" ? -mag : mag };
  }
  const imag = IMAG.exec(token);
  if (imag) return { re: 0, im: Number(imag[1]) };
  return undefined;
}

/** Real part of the leading token of a quantity such as `"1234.5+67.8j VA"`. */
export function realPower(object: string, powerOut: string): number {
  const token = powerOut.trim().split(/\s+/)[0] ?? "";
  const value = parseComplex(token);
  if (!value) throw new PowerParseError(object, powerOut);
  return value.re;
}
