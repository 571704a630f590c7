/** Model document is missing an object or field, or a field has the wrong type. */
export class ModelStructureError extends Error {
  readonly object: string;
  readonly field?: string;

  constructor(object: string, field: string | undefined, detail: string) {
    super(field ? `${object}: ${field} ${detail}` : `${object}: ${detail}`);
    this.name = "ModelStructureError";
    this.object = object;
    this.field = field;
  }
}

/** A power_out value whose leading token is not a complex number. */
export class PowerParseError extends Error {
  readonly object: string;
  readonly raw: string;

  constructor(object: string, raw: string) {
    super(`${object}: cannot parse power_out '${raw}' as a complex number`);
    this.name = "PowerParseError";
    this.object = object;
    this.raw = raw;
  }
}

/**
 * A link whose computed width is not positive. This is a data problem in the
 * model, not a parsing bug.
 */
export class WeightValidationError extends Error {
  readonly object: string;
  readonly powerOut: string;
  readonly weight: number;

  constructor(object: string, powerOut: string, weight: number) {
    super(`${object}: weight<=0; power = ${powerOut}`);
    this.name = "WeightValidationError";
    this.object = object;
    this.powerOut = powerOut;
    this.weight = weight;
  }
}

export class ConverterError extends Error {
  readonly status: number | null;
  readonly output: string;

  constructor(message: string, status: number | null, output = "") {
    super(message);
    this.name = "ConverterError";
    this.status = status;
    this.output = output;
  }
}
