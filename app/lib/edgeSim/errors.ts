/**
 * Edge Simulation Error Taxonomy
 *
 * Structural problems (bad timestep, bad config, broken gene bounds) are thrown.
 * Data-quality problems (override rows) are returned as MalformedOverride values
 * and population outcomes (extinction) are ordinary results, see evolutionEngine.ts.
 */

export type EdgeSimErrorCode =
  | "INVALID_TIMESTEP"
  | "INVALID_GENE_BOUNDS"
  | "INVALID_CONFIG"
  | "UNKNOWN_MODEL";

export class EdgeSimError extends Error {
  readonly code: EdgeSimErrorCode;

  constructor(code: EdgeSimErrorCode, message: string) {
    super(message);
    this.name = "EdgeSimError";
    this.code = code;
  }
}

export class InvalidTimestepError extends EdgeSimError {
  readonly dtS: number;

  constructor(dtS: number) {
    super("INVALID_TIMESTEP", `Timestep must be a positive finite number of seconds, got ${dtS}`);
    this.name = "InvalidTimestepError";
    this.dtS = dtS;
  }
}

export class InvalidGeneBoundsError extends EdgeSimError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number, lo: number, hi: number) {
    super("INVALID_GENE_BOUNDS", `Gene field ${field}=${value} outside [${lo}, ${hi}]`);
    this.name = "InvalidGeneBoundsError";
    this.field = field;
    this.value = value;
  }
}

export class InvalidConfigError extends EdgeSimError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("INVALID_CONFIG", `Invalid simulation config: ${problems.join("; ")}`);
    this.name = "InvalidConfigError";
    this.problems = problems;
  }
}

export class UnknownModelError extends EdgeSimError {
  readonly modelId: string;

  constructor(modelId: string) {
    super("UNKNOWN_MODEL", `Model "${modelId}" is not in the resolved catalog`);
    this.name = "UnknownModelError";
    this.modelId = modelId;
  }
}

/**
 * A rejected override field. Reported, never thrown.
 */
export interface MalformedOverride {
  kind: "MalformedOverride";
  target: "model" | "solar";
  profileId: string;
  field: string | null; // null when the whole row is rejected (unknown profile)
  value: unknown;
  reason: string;
}

export function malformedOverride(
  target: MalformedOverride["target"],
  profileId: string,
  field: string | null,
  value: unknown,
  reason: string
): MalformedOverride {
  return { kind: "MalformedOverride", target, profileId, field, value, reason };
}
