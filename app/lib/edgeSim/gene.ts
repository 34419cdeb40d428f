/**
 * Gene
 * The evolvable policy vector of a node: which model it runs, how much of each
 * tick it spends inferring, how well its panel performs, how fast it mutates and
 * which power policy gates inference. Fixed for the node's lifetime; children
 * get a mutated copy.
 */

import { InvalidGeneBoundsError } from "./errors";
import { POWER_POLICIES, type PowerPolicy } from "./powerPolicy";
import { chance, pick, randomInt, randomRange, type Rng } from "../utils/rng";
import { clamp } from "../utils/sanitize";

export interface Gene {
  modelId: string;
  dutyCycle: number; // 0–1
  solarEfficiencyModifier: number; // 0.5–1.2
  mutationRate: number; // [mutationRateMin, mutationRateMax]
  powerPolicy: PowerPolicy;
}

export interface MutationRateBounds {
  mutationRateMin: number;
  mutationRateMax: number;
}

export const DUTY_CYCLE_RANGE = { min: 0, max: 1 } as const;
export const SOLAR_MODIFIER_RANGE = { min: 0.5, max: 1.2 } as const;

// Perturbation half-widths
export const DUTY_CYCLE_STEP = 0.1;
export const SOLAR_MODIFIER_STEP = 0.05;
export const MUTATION_RATE_STEP = 0.02;

// Generation-0 seed distribution
const SEED_DUTY_RANGE = { min: 0.3, max: 1.0 };
const SEED_SOLAR_RANGE = { min: 0.8, max: 1.2 };

/**
 * Random generation-0 gene. Draw order is fixed: model, duty, solar, policy.
 */
export function seedGene(rng: Rng, modelIds: readonly string[], initialMutationRate: number): Gene {
  return {
    modelId: pick(rng, modelIds),
    dutyCycle: randomRange(rng, SEED_DUTY_RANGE.min, SEED_DUTY_RANGE.max),
    solarEfficiencyModifier: randomRange(rng, SEED_SOLAR_RANGE.min, SEED_SOLAR_RANGE.max),
    mutationRate: initialMutationRate,
    powerPolicy: pick(rng, POWER_POLICIES),
  };
}

function checkRange(field: string, value: number, lo: number, hi: number): void {
  if (!Number.isFinite(value) || value < lo || value > hi) {
    throw new InvalidGeneBoundsError(field, value, lo, hi);
  }
}

/**
 * Throws InvalidGeneBoundsError for the first out-of-range field.
 */
export function assertGeneBounds(gene: Gene, bounds: MutationRateBounds): void {
  checkRange("dutyCycle", gene.dutyCycle, DUTY_CYCLE_RANGE.min, DUTY_CYCLE_RANGE.max);
  checkRange("solarEfficiencyModifier", gene.solarEfficiencyModifier, SOLAR_MODIFIER_RANGE.min, SOLAR_MODIFIER_RANGE.max);
  checkRange("mutationRate", gene.mutationRate, bounds.mutationRateMin, bounds.mutationRateMax);
}

/**
 * Copy of `parent` with each field perturbed independently with probability
 * `parent.mutationRate`, then clamped. Rng draws happen in field order, so a
 * given seed always yields the same child.
 */
export function mutateGene(
  parent: Gene,
  rng: Rng,
  modelIds: readonly string[],
  bounds: MutationRateBounds
): Gene {
  const rate = parent.mutationRate;
  const child: Gene = { ...parent };

  if (chance(rng, rate)) {
    child.dutyCycle = clamp(
      parent.dutyCycle + randomRange(rng, -DUTY_CYCLE_STEP, DUTY_CYCLE_STEP),
      DUTY_CYCLE_RANGE.min,
      DUTY_CYCLE_RANGE.max
    );
  }
  if (chance(rng, rate)) {
    child.solarEfficiencyModifier = clamp(
      parent.solarEfficiencyModifier + randomRange(rng, -SOLAR_MODIFIER_STEP, SOLAR_MODIFIER_STEP),
      SOLAR_MODIFIER_RANGE.min,
      SOLAR_MODIFIER_RANGE.max
    );
  }
  if (chance(rng, rate)) {
    child.modelId = pick(rng, modelIds);
  }
  if (chance(rng, rate)) {
    child.mutationRate = clamp(
      parent.mutationRate + randomRange(rng, -MUTATION_RATE_STEP, MUTATION_RATE_STEP),
      bounds.mutationRateMin,
      bounds.mutationRateMax
    );
  }
  if (chance(rng, rate)) {
    child.powerPolicy = pick(rng, POWER_POLICIES);
  }

  assertGeneBounds(child, bounds);
  return child;
}

const GENE_FIELDS = ["modelId", "dutyCycle", "solarEfficiencyModifier", "mutationRate", "powerPolicy"] as const;

/**
 * Single-point crossover: fields before the cut come from `a`, the rest from `b`.
 * The cut is always inside the vector, so both parents contribute.
 */
export function crossoverGenes(a: Gene, b: Gene, rng: Rng): Gene {
  const cut = 1 + randomInt(rng, GENE_FIELDS.length - 1);
  const from = (index: number) => (index < cut ? a : b);
  return {
    modelId: from(0).modelId,
    dutyCycle: from(1).dutyCycle,
    solarEfficiencyModifier: from(2).solarEfficiencyModifier,
    mutationRate: from(3).mutationRate,
    powerPolicy: from(4).powerPolicy,
  };
}

export function describeGene(gene: Gene): string {
  return `${gene.modelId} duty=${gene.dutyCycle.toFixed(2)} solar=${gene.solarEfficiencyModifier.toFixed(2)} ` +
    `mut=${gene.mutationRate.toFixed(3)} ${gene.powerPolicy}`;
}
