/**
 * Simulation Configuration
 * Scenario parameters for a run. Plain named values with defaults; a partial
 * override (from code or a JSON file) is merged over createDefaultConfig().
 */

import { InvalidConfigError } from "./errors";
import { isHardwareTierId, type HardwareTierId } from "./hardwareTiers";

/**
 * When dead nodes leave the live registry. Either way they never breed.
 */
export type CullingPolicy = "deferred" | "immediate";

/**
 * What the runner does when a generation boundary finds no survivors:
 * stop the run, or seed a fresh random population and carry on.
 */
export type ExtinctionPolicy = "halt" | "reseed";

export interface SimulationConfig {
  seed: number;

  // Population and layout
  populationSize: number;
  gridWidth: number;
  gridHeight: number;
  gridSpacing: number; // world units between cells

  // Hardware
  initialBatteryCapacityWh: number;
  initialChargeFraction: number; // 0–1
  hardwareTier: HardwareTierId | null; // overrides capacity and caps harvest when set

  // Environment
  solarAvailability: number; // scales irradiance; 0 disables harvesting
  baseLoadOverrideW: number | null; // replaces every model's idle draw

  // Genetics
  initialMutationRate: number;
  mutationRateMin: number;
  mutationRateMax: number;
  survivalWeight: number; // fitness bonus per survived hour
  eliteFraction: number; // (0, 1], share of ranked survivors kept in the breeding pool
  crossoverRate: number; // 0–1

  // Time
  tickDurationS: number;
  ticksPerGeneration: number;
  startHour: number; // 0–24
  maxGenerations: number;

  // Policies
  cullingPolicy: CullingPolicy;
  extinctionPolicy: ExtinctionPolicy;
}

/**
 * Default scenario: 10×10 grid of Raspberry Pi class nodes, one simulated day
 * per generation in one-minute ticks, starting at dawn.
 */
export function createDefaultConfig(): SimulationConfig {
  return {
    seed: 42,
    populationSize: 100,
    gridWidth: 10,
    gridHeight: 10,
    gridSpacing: 50,
    initialBatteryCapacityWh: 50,
    initialChargeFraction: 0.8,
    hardwareTier: null,
    solarAvailability: 1,
    baseLoadOverrideW: null,
    initialMutationRate: 0.1,
    mutationRateMin: 0.01,
    mutationRateMax: 0.5,
    survivalWeight: 0.1,
    eliteFraction: 1,
    crossoverRate: 0,
    tickDurationS: 60,
    ticksPerGeneration: 1440,
    startHour: 6,
    maxGenerations: 10,
    cullingPolicy: "deferred",
    extinctionPolicy: "halt",
  };
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateConfig(config: SimulationConfig): ValidationResult {
  const errors: string[] = [];
  const positiveInt = (name: string, v: number) => {
    if (!Number.isInteger(v) || v <= 0) errors.push(`${name} must be a positive integer, got ${v}`);
  };
  const inRange = (name: string, v: number, lo: number, hi: number) => {
    if (!Number.isFinite(v) || v < lo || v > hi) errors.push(`${name} must be in [${lo}, ${hi}], got ${v}`);
  };

  if (!Number.isFinite(config.seed)) errors.push(`seed must be finite, got ${config.seed}`);
  positiveInt("populationSize", config.populationSize);
  positiveInt("gridWidth", config.gridWidth);
  positiveInt("gridHeight", config.gridHeight);
  positiveInt("ticksPerGeneration", config.ticksPerGeneration);
  positiveInt("maxGenerations", config.maxGenerations);

  if (config.populationSize > config.gridWidth * config.gridHeight) {
    errors.push(`populationSize ${config.populationSize} exceeds grid ${config.gridWidth}x${config.gridHeight}`);
  }
  if (!Number.isFinite(config.gridSpacing) || config.gridSpacing <= 0) {
    errors.push(`gridSpacing must be positive, got ${config.gridSpacing}`);
  }
  if (!Number.isFinite(config.initialBatteryCapacityWh) || config.initialBatteryCapacityWh <= 0) {
    errors.push(`initialBatteryCapacityWh must be positive, got ${config.initialBatteryCapacityWh}`);
  }
  inRange("initialChargeFraction", config.initialChargeFraction, 0, 1);
  if (config.hardwareTier !== null && !isHardwareTierId(config.hardwareTier)) {
    errors.push(`unknown hardwareTier ${String(config.hardwareTier)}`);
  }

  if (!Number.isFinite(config.solarAvailability) || config.solarAvailability < 0) {
    errors.push(`solarAvailability must be >= 0, got ${config.solarAvailability}`);
  }
  if (config.baseLoadOverrideW !== null && (!Number.isFinite(config.baseLoadOverrideW) || config.baseLoadOverrideW < 0)) {
    errors.push(`baseLoadOverrideW must be >= 0, got ${config.baseLoadOverrideW}`);
  }

  inRange("mutationRateMin", config.mutationRateMin, 0, 1);
  inRange("mutationRateMax", config.mutationRateMax, 0, 1);
  if (config.mutationRateMin > config.mutationRateMax) {
    errors.push(`mutationRateMin ${config.mutationRateMin} exceeds mutationRateMax ${config.mutationRateMax}`);
  }
  inRange("initialMutationRate", config.initialMutationRate, config.mutationRateMin, config.mutationRateMax);
  if (!Number.isFinite(config.survivalWeight) || config.survivalWeight < 0) {
    errors.push(`survivalWeight must be >= 0, got ${config.survivalWeight}`);
  }
  if (!Number.isFinite(config.eliteFraction) || config.eliteFraction <= 0 || config.eliteFraction > 1) {
    errors.push(`eliteFraction must be in (0, 1], got ${config.eliteFraction}`);
  }
  inRange("crossoverRate", config.crossoverRate, 0, 1);

  // A bad timestep is reported here too; the physics step throws InvalidTimestepError on its own
  if (!Number.isFinite(config.tickDurationS) || config.tickDurationS <= 0) {
    errors.push(`tickDurationS must be positive, got ${config.tickDurationS}`);
  }
  inRange("startHour", config.startHour, 0, 24);

  if (config.cullingPolicy !== "deferred" && config.cullingPolicy !== "immediate") {
    errors.push(`unknown cullingPolicy ${String(config.cullingPolicy)}`);
  }
  if (config.extinctionPolicy !== "halt" && config.extinctionPolicy !== "reseed") {
    errors.push(`unknown extinctionPolicy ${String(config.extinctionPolicy)}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Defaults + overrides, validated. Throws InvalidConfigError.
 */
export function buildConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const config: SimulationConfig = { ...createDefaultConfig(), ...overrides };
  const result = validateConfig(config);
  if (!result.valid) {
    throw new InvalidConfigError(result.errors);
  }
  return config;
}

type NumericKey = {
  [K in keyof SimulationConfig]: SimulationConfig[K] extends number ? K : never;
}[keyof SimulationConfig];

const NUMERIC_KEYS: readonly NumericKey[] = [
  "seed",
  "populationSize",
  "gridWidth",
  "gridHeight",
  "gridSpacing",
  "initialBatteryCapacityWh",
  "initialChargeFraction",
  "solarAvailability",
  "initialMutationRate",
  "mutationRateMin",
  "mutationRateMax",
  "survivalWeight",
  "eliteFraction",
  "crossoverRate",
  "tickDurationS",
  "ticksPerGeneration",
  "startHour",
  "maxGenerations",
];

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEYS.some((k) => k === key);
}

/**
 * Type-checks a parsed JSON object into a partial config. Range checks happen in validateConfig.
 */
export function configFromJson(value: unknown): Partial<SimulationConfig> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidConfigError(["config file must contain a JSON object"]);
  }

  const out: Partial<SimulationConfig> = {};
  const problems: string[] = [];

  for (const [key, raw] of Object.entries(value)) {
    if (isNumericKey(key)) {
      if (typeof raw === "number") out[key] = raw;
      else problems.push(`${key} must be a number`);
    } else if (key === "baseLoadOverrideW") {
      if (raw === null || typeof raw === "number") out.baseLoadOverrideW = raw;
      else problems.push(`${key} must be a number or null`);
    } else if (key === "hardwareTier") {
      if (raw === null || (typeof raw === "string" && isHardwareTierId(raw))) out.hardwareTier = raw;
      else problems.push(`${key} must be ESP32, RaspberryPi4, JetsonNano or null`);
    } else if (key === "cullingPolicy") {
      if (raw === "deferred" || raw === "immediate") out.cullingPolicy = raw;
      else problems.push(`${key} must be "deferred" or "immediate"`);
    } else if (key === "extinctionPolicy") {
      if (raw === "halt" || raw === "reseed") out.extinctionPolicy = raw;
      else problems.push(`${key} must be "halt" or "reseed"`);
    } else {
      problems.push(`unknown config key ${key}`);
    }
  }

  if (problems.length > 0) {
    throw new InvalidConfigError(problems);
  }
  return out;
}
