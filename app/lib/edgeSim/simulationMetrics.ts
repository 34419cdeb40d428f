/**
 * Simulation Metrics
 * Running energy and work totals per run, and a summary row per generation.
 */

import { max, mean, quantile, sum } from "d3-array";
import type { Gene } from "./gene";
import type { EdgeNode } from "./nodeRegistry";
import type { NodeStepResult } from "./physicsEngine";
import type { ScoredNode } from "./evolutionEngine";

export interface RunTotals {
  ticks: number;
  energyConsumedWh: number;
  energyHarvestedWh: number;
  inferences: number;
  usefulWork: number;
}

export interface GenerationStats {
  generation: number;
  alive: number;
  dead: number;
  meanFitness: number;
  maxFitness: number;
  medianFitness: number;
  meanDeadLifetimeS: number | null; // null when nobody died
  bestGene: Gene | null;
  extinct: boolean;
  modelHistogram: Record<string, number>; // of the population that follows
}

export function createRunTotals(): RunTotals {
  return { ticks: 0, energyConsumedWh: 0, energyHarvestedWh: 0, inferences: 0, usefulWork: 0 };
}

export function accumulateTick(totals: RunTotals, results: readonly NodeStepResult[]): RunTotals {
  return {
    ticks: totals.ticks + 1,
    energyConsumedWh: totals.energyConsumedWh + sum(results, (r) => r.drainWh),
    energyHarvestedWh: totals.energyHarvestedWh + sum(results, (r) => r.harvestWh),
    inferences: totals.inferences + sum(results, (r) => r.inferences),
    usefulWork: totals.usefulWork + sum(results, (r) => r.usefulWork),
  };
}

export function modelHistogram(genes: readonly Gene[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const gene of genes) {
    counts[gene.modelId] = (counts[gene.modelId] ?? 0) + 1;
  }
  return counts;
}

export function summarizeGeneration(
  generation: number,
  scored: readonly ScoredNode[],
  nextGenes: readonly Gene[]
): GenerationStats {
  const alive = scored.filter((s) => s.node.battery.status === "Alive");
  const dead: EdgeNode[] = scored.filter((s) => s.node.battery.status === "Dead").map((s) => s.node);
  const fitness = scored.map((s) => s.fitness);

  const best = alive.reduce<ScoredNode | null>(
    (acc, s) => (acc === null || s.fitness > acc.fitness || (s.fitness === acc.fitness && s.node.id < acc.node.id) ? s : acc),
    null
  );

  return {
    generation,
    alive: alive.length,
    dead: dead.length,
    meanFitness: mean(fitness) ?? 0,
    maxFitness: max(fitness) ?? 0,
    medianFitness: quantile(fitness, 0.5) ?? 0,
    meanDeadLifetimeS: dead.length > 0 ? mean(dead, (n) => n.survivalS) ?? null : null,
    bestGene: best ? best.node.gene : null,
    extinct: alive.length === 0,
    modelHistogram: modelHistogram(nextGenes),
  };
}
