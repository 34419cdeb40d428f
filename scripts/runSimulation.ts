#!/usr/bin/env node
/**
 * Edge node evolution CLI
 * Run with: npm run build && npm run sim -- --generations 5 --seed 7
 */

import { promises as fs } from "fs";
import { Command, InvalidArgumentError } from "commander";
import { InvalidConfigError } from "../app/lib/edgeSim/errors";
import { loadOverrideFiles } from "../app/lib/edgeSim/overrideLoader";
import { configFromJson, type SimulationConfig } from "../app/lib/edgeSim/simulationConfig";
import { createSimulation, type RunSummary } from "../app/lib/edgeSim/simulationRunner";
import type { GenerationStats } from "../app/lib/edgeSim/simulationMetrics";
import { describeGene } from "../app/lib/edgeSim/gene";
import { formatHours, formatSigFigs, formatTimeOfDay, formatWh } from "../app/lib/utils/formatNumber";
import { createLogger } from "../app/lib/utils/logger";

const log = createLogger("CLI");

export interface RunCommandOptions {
  config?: string;
  models?: string;
  solar?: string;
  generations?: number;
  seed?: number;
}

export function parseIntegerOption(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return value;
}

export async function loadConfigFile(path?: string): Promise<Partial<SimulationConfig>> {
  if (!path) return {};
  const text = await fs.readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InvalidConfigError([`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return configFromJson(parsed);
}

/**
 * Flags win over the config file.
 */
export function mergeCliOverrides(fileConfig: Partial<SimulationConfig>, options: RunCommandOptions): Partial<SimulationConfig> {
  const merged: Partial<SimulationConfig> = { ...fileConfig };
  if (options.generations !== undefined) merged.maxGenerations = options.generations;
  if (options.seed !== undefined) merged.seed = options.seed;
  return merged;
}

export function formatGenerationLine(stats: GenerationStats): string {
  const lifetime = stats.meanDeadLifetimeS === null ? "-" : formatHours(stats.meanDeadLifetimeS);
  const best = stats.bestGene ? describeGene(stats.bestGene) : "none";
  return [
    `gen ${String(stats.generation).padStart(3)}`,
    `alive ${String(stats.alive).padStart(4)}`,
    `dead ${String(stats.dead).padStart(4)}`,
    `fitness mean ${formatSigFigs(stats.meanFitness)} p50 ${formatSigFigs(stats.medianFitness)} max ${formatSigFigs(stats.maxFitness)}`,
    `dead lifetime ${lifetime}`,
    `best ${best}`,
  ].join(" | ");
}

export function formatSummary(summary: RunSummary): string {
  const { totals, clock } = summary;
  return [
    `status: ${summary.status}`,
    `generations: ${summary.generations.length}`,
    `simulated: ${formatHours(clock.elapsedS)} (${clock.tickCount} ticks, ends ${formatTimeOfDay(clock.timeOfDay)})`,
    `energy consumed: ${formatWh(totals.energyConsumedWh)}`,
    `energy harvested: ${formatWh(totals.energyHarvestedWh)}`,
    `inferences: ${formatSigFigs(totals.inferences)}`,
  ].join("\n");
}

async function runCommand(options: RunCommandOptions): Promise<void> {
  const fileConfig = await loadConfigFile(options.config);
  const overrides = await loadOverrideFiles({ models: options.models, solar: options.solar });
  const { runner } = createSimulation({ config: mergeCliOverrides(fileConfig, options), overrides });

  const controller = new AbortController();
  const onSigint = () => {
    log.warn("interrupt received, stopping after the current tick");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  runner.addListener({ onGeneration: (stats) => console.log(formatGenerationLine(stats)) });
  try {
    const summary = await runner.run(controller.signal);
    console.log(formatSummary(summary));
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("edge-sim")
    .description("Evolve solar-powered edge inference nodes under an energy budget");

  program
    .command("run")
    .description("Run the simulation and print a summary per generation")
    .option("--config <file>", "JSON file with simulation config overrides")
    .option("--models <file>", "CSV of model profile overrides")
    .option("--solar <file>", "CSV of solar profile overrides")
    .option("--generations <n>", "number of generations to run", parseIntegerOption)
    .option("--seed <n>", "random seed", parseIntegerOption)
    .action(async (options: RunCommandOptions) => {
      await runCommand(options);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      if (error instanceof InvalidConfigError) {
        log.error("invalid configuration", error.problems);
      } else {
        log.error("fatal error", error);
      }
      process.exitCode = 1;
    });
}
