/**
 * Hybrid Resolver
 * Compiled catalog + optional override sets → one immutable resolved catalog.
 *
 * Per field the override wins when it is present and well-typed; otherwise the
 * catalog value stays. Bad override data never throws: every rejected value is
 * returned as a MalformedOverride so the caller can log it. Only an invalid
 * base catalog aborts (InvalidConfigError).
 */

import {
  MODEL_FIELDS,
  MODEL_FIELD_BOUNDS,
  SOLAR_FIELD_BOUNDS,
  type ModelField,
  type ModelProfile,
  type ParameterCatalog,
  type SolarProfile,
} from "./parameterCatalog";
import type { OverrideSet, OverrideValue, SolarOverrideRow } from "./overrideLoader";
import { sortSamples } from "./solarProfile";
import { InvalidConfigError, UnknownModelError, malformedOverride, type MalformedOverride } from "./errors";
import { describeBounds, sanitizeFinite } from "../utils/sanitize";

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ResolvedCatalog = DeepReadonly<ParameterCatalog>;
export type ResolvedModelProfile = DeepReadonly<ModelProfile>;
export type ResolvedSolarProfile = DeepReadonly<SolarProfile>;

export interface ResolutionResult {
  catalog: ResolvedCatalog;
  issues: MalformedOverride[];
}

function cloneModel(m: ResolvedModelProfile): ModelProfile {
  return { ...m };
}

/**
 * Mutable deep copy of a (resolved or compiled) catalog.
 */
export function asCatalog(catalog: ResolvedCatalog): ParameterCatalog {
  return {
    version: catalog.version,
    models: catalog.models.map(cloneModel),
    solar: {
      identifier: catalog.solar.identifier,
      panel_efficiency: catalog.solar.panel_efficiency,
      cloud_factor: catalog.solar.cloud_factor,
      samples: catalog.solar.samples.map((s) => ({ hour: s.hour, avg_irradiance: s.avg_irradiance })),
    },
  };
}

function deepFreeze(value: unknown): void {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
}

/**
 * Structural checks on the base catalog. Throws InvalidConfigError listing every problem.
 */
export function validateCatalog(catalog: ParameterCatalog): void {
  const problems: string[] = [];
  const seen = new Set<string>();

  if (catalog.models.length === 0) {
    problems.push("catalog has no models");
  }

  for (const model of catalog.models) {
    if (!model.identifier) {
      problems.push("model with empty identifier");
    }
    if (seen.has(model.identifier)) {
      problems.push(`duplicate model identifier ${model.identifier}`);
    }
    seen.add(model.identifier);

    for (const field of MODEL_FIELDS) {
      if (sanitizeFinite(model[field], MODEL_FIELD_BOUNDS[field]) === null) {
        problems.push(`${model.identifier}.${field}=${model[field]} outside ${describeBounds(MODEL_FIELD_BOUNDS[field])}`);
      }
    }
    if (model.idle_power_w > model.inference_power_w) {
      problems.push(`${model.identifier}: idle_power_w exceeds inference_power_w`);
    }
  }

  const solar = catalog.solar;
  if (solar.samples.length === 0) {
    problems.push("solar profile has no samples");
  }
  for (const s of solar.samples) {
    if (sanitizeFinite(s.hour, { min: 0, max: 24 }) === null || s.hour === 24) {
      problems.push(`solar sample hour ${s.hour} outside [0, 24)`);
    }
    if (sanitizeFinite(s.avg_irradiance, SOLAR_FIELD_BOUNDS.avg_irradiance) === null) {
      problems.push(`solar irradiance ${s.avg_irradiance} at hour ${s.hour} is negative or not finite`);
    }
  }
  if (sanitizeFinite(solar.panel_efficiency, SOLAR_FIELD_BOUNDS.panel_efficiency) === null) {
    problems.push(`panel_efficiency ${solar.panel_efficiency} outside [0, 1]`);
  }
  if (sanitizeFinite(solar.cloud_factor, SOLAR_FIELD_BOUNDS.cloud_factor) === null) {
    problems.push(`cloud_factor ${solar.cloud_factor} outside [0, 1]`);
  }

  if (problems.length > 0) {
    throw new InvalidConfigError(problems);
  }
}

function applyModelRows(
  models: Map<string, ModelProfile>,
  set: OverrideSet,
  issues: MalformedOverride[]
): void {
  for (const row of set.models) {
    const target = models.get(row.identifier);
    if (!target) {
      issues.push(malformedOverride("model", row.identifier, null, row.identifier, `unknown model identifier (source ${set.source})`));
      continue;
    }

    const before = { ...target };
    const applied: ModelField[] = [];

    for (const field of MODEL_FIELDS) {
      const raw = row.fields[field];
      if (raw === undefined) continue;
      const bounds = MODEL_FIELD_BOUNDS[field];
      const value = sanitizeFinite(raw, bounds);
      if (value === null) {
        issues.push(malformedOverride("model", row.identifier, field, raw, `expected a number in ${describeBounds(bounds)}`));
        continue;
      }
      target[field] = value;
      applied.push(field);
    }

    // idle ≤ inference: revert whichever side this row touched
    if (target.idle_power_w > target.inference_power_w) {
      for (const field of ["idle_power_w", "inference_power_w"] as const) {
        if (applied.includes(field)) {
          issues.push(malformedOverride("model", row.identifier, field, target[field], "idle_power_w would exceed inference_power_w"));
          target[field] = before[field];
        }
      }
    }
  }
}

function acceptSolarValue(
  solarId: string,
  field: "panel_efficiency" | "cloud_factor" | "avg_irradiance",
  raw: OverrideValue,
  issues: MalformedOverride[]
): number | null {
  const bounds = SOLAR_FIELD_BOUNDS[field];
  const value = sanitizeFinite(raw, bounds);
  if (value === null) {
    issues.push(malformedOverride("solar", solarId, field, raw, `expected a number in ${describeBounds(bounds)}`));
  }
  return value;
}

function applySolarRow(solar: SolarProfile, row: SolarOverrideRow, issues: MalformedOverride[]): void {
  if (row.panel_efficiency !== undefined) {
    const value = acceptSolarValue(solar.identifier, "panel_efficiency", row.panel_efficiency, issues);
    if (value !== null) solar.panel_efficiency = value;
  }
  if (row.cloud_factor !== undefined) {
    const value = acceptSolarValue(solar.identifier, "cloud_factor", row.cloud_factor, issues);
    if (value !== null) solar.cloud_factor = value;
  }
  if (row.avg_irradiance === undefined) return;

  const hour = sanitizeFinite(row.hour, { min: 0, max: 24 });
  if (hour === null || hour === 24) {
    issues.push(malformedOverride("solar", solar.identifier, "hour", row.hour ?? null, "expected an hour in [0, 24)"));
    return;
  }
  const irradiance = acceptSolarValue(`${solar.identifier}@${hour}`, "avg_irradiance", row.avg_irradiance, issues);
  if (irradiance === null) return;

  const existing = solar.samples.find((s) => s.hour === hour);
  if (existing) {
    existing.avg_irradiance = irradiance;
  } else {
    solar.samples.push({ hour, avg_irradiance: irradiance });
  }
}

/**
 * Merge override sets onto the catalog, later sets winning. Idempotent:
 * resolving the result again with no overrides yields an equal catalog.
 */
export function resolve(catalog: ResolvedCatalog, overrides: OverrideSet[] = []): ResolutionResult {
  const working = asCatalog(catalog);
  validateCatalog(working);

  const issues: MalformedOverride[] = [];
  const models = new Map(working.models.map((m) => [m.identifier, m]));

  for (const set of overrides) {
    applyModelRows(models, set, issues);
    for (const row of set.solar) {
      applySolarRow(working.solar, row, issues);
    }
  }

  working.solar.samples = sortSamples(working.solar.samples);
  deepFreeze(working);

  return { catalog: working, issues };
}

export function getResolvedModel(catalog: ResolvedCatalog, identifier: string): ResolvedModelProfile | undefined {
  return catalog.models.find((m) => m.identifier === identifier);
}

/**
 * Gene → model lookup for the simulation. Throws UnknownModelError.
 */
export function requireModel(catalog: ResolvedCatalog, identifier: string): ResolvedModelProfile {
  const model = getResolvedModel(catalog, identifier);
  if (!model) {
    throw new UnknownModelError(identifier);
  }
  return model;
}
