/**
 * Evolution Engine
 * Runs at a generation boundary, with the tick loop paused:
 *
 *   Evaluating → Selecting → Breeding → Repopulated
 *
 * Dead nodes never enter the breeding pool. An empty pool is an ordinary
 * outcome (ExtinctionEvent), not an error. All randomness comes from the
 * injected rng, so a fixed seed reproduces the same offspring.
 */

import { bisectRight, cumsum, sum } from "d3-array";
import { crossoverGenes, mutateGene, type Gene, type MutationRateBounds } from "./gene";
import { isAlive, type EdgeNode, type EdgeNodeRegistry, type SpawnRequest } from "./nodeRegistry";
import { requireModel, type ResolvedCatalog } from "./hybridResolver";
import { chance, randomInt, type Rng } from "../utils/rng";
import { createLogger } from "../utils/logger";

const log = createLogger("EVOLUTION");

export type EvolutionPhase = "Idle" | "Evaluating" | "Selecting" | "Breeding" | "Repopulated";

export interface EvolutionParams extends MutationRateBounds {
  populationSize: number;
  survivalWeight: number;
  eliteFraction: number;
  crossoverRate: number;
}

export interface ScoredNode {
  node: EdgeNode;
  fitness: number;
}

export interface Offspring {
  slot: number;
  gene: Gene;
  parentId: number;
  coParentId: number | null; // set when the gene came from crossover
}

export interface ExtinctionEvent {
  kind: "ExtinctionEvent";
  generation: number;
  deadCount: number;
}

export type SelectionOutcome =
  | { kind: "Pool"; pool: ScoredNode[] }
  | ExtinctionEvent;

export type EvolutionOutcome =
  | { kind: "Repopulated"; generation: number; scored: ScoredNode[]; offspring: Offspring[] }
  | { kind: "Extinct"; generation: number; scored: ScoredNode[]; event: ExtinctionEvent };

/**
 * Useful work, boosted by survival time. No work means no fitness, however full the battery.
 */
export function fitnessOf(node: EdgeNode, survivalWeight: number): number {
  const survivalHours = node.survivalS / 3600;
  return node.usefulWork * (1 + survivalWeight * survivalHours);
}

export function evaluate(nodes: readonly EdgeNode[], survivalWeight: number): ScoredNode[] {
  return nodes.map((node) => ({ node, fitness: fitnessOf(node, survivalWeight) }));
}

/**
 * Live nodes ranked by fitness (desc), ties by id (asc), trimmed to the elite share.
 */
export function selectPool(scored: readonly ScoredNode[], eliteFraction: number, generation: number): SelectionOutcome {
  const ranked = scored
    .filter((s) => isAlive(s.node))
    .sort((a, b) => b.fitness - a.fitness || a.node.id - b.node.id);

  if (ranked.length === 0) {
    return { kind: "ExtinctionEvent", generation, deadCount: scored.length };
  }

  const keep = Math.max(1, Math.ceil(ranked.length * eliteFraction));
  return { kind: "Pool", pool: ranked.slice(0, keep) };
}

/**
 * Fitness-proportional pick; uniform when the pool has no fitness at all.
 */
export function rouletteSelect(pool: readonly ScoredNode[], rng: Rng): ScoredNode {
  if (pool.length === 0) {
    throw new RangeError("Cannot select from an empty pool");
  }
  const total = sum(pool, (s) => s.fitness);
  if (!(total > 0)) {
    return pool[randomInt(rng, pool.length)];
  }
  const cumulative = cumsum(pool, (s) => s.fitness);
  const idx = bisectRight(cumulative, rng() * total);
  return pool[Math.min(idx, pool.length - 1)];
}

/**
 * One child gene per slot: pick a parent, optionally cross with a second
 * parent, then mutate.
 */
export function breed(
  pool: readonly ScoredNode[],
  rng: Rng,
  modelIds: readonly string[],
  params: EvolutionParams
): Offspring[] {
  const offspring: Offspring[] = [];

  for (let slot = 0; slot < params.populationSize; slot++) {
    const parent = rouletteSelect(pool, rng);
    let base = parent.node.gene;
    let coParentId: number | null = null;

    // No rng draw at all when crossover is off, so the default stream is single-parent only
    if (params.crossoverRate > 0 && chance(rng, params.crossoverRate)) {
      const other = rouletteSelect(pool, rng);
      base = crossoverGenes(parent.node.gene, other.node.gene, rng);
      coParentId = other.node.id;
    }

    offspring.push({
      slot,
      gene: mutateGene(base, rng, modelIds, params),
      parentId: parent.node.id,
      coParentId,
    });
  }

  return offspring;
}

/**
 * Offspring → spawn requests against the resolved catalog. Throws UnknownModelError.
 */
export function toSpawnRequests(offspring: readonly Offspring[], catalog: ResolvedCatalog, generation: number): SpawnRequest[] {
  return offspring.map((child) => ({
    slot: child.slot,
    gene: child.gene,
    model: requireModel(catalog, child.gene.modelId),
    generation,
    parentId: child.parentId,
  }));
}

export class EvolutionEngine {
  private currentPhase: EvolutionPhase = "Idle";
  private readonly modelIds: string[];

  constructor(
    private readonly catalog: ResolvedCatalog,
    private readonly params: EvolutionParams,
    private readonly rng: Rng
  ) {
    this.modelIds = catalog.models.map((m) => m.identifier);
  }

  get phase(): EvolutionPhase {
    return this.currentPhase;
  }

  /**
   * Evolve the registry in place. On extinction the registry is left untouched.
   * `nextGeneration` is the generation number the offspring belong to.
   */
  run(registry: EdgeNodeRegistry, nextGeneration: number, extra: readonly EdgeNode[] = []): EvolutionOutcome {
    this.currentPhase = "Evaluating";
    // `extra` carries nodes culled earlier this generation; they score but can't breed
    const scored = evaluate([...registry.list(), ...extra], this.params.survivalWeight);

    this.currentPhase = "Selecting";
    const selection = selectPool(scored, this.params.eliteFraction, nextGeneration - 1);
    if (selection.kind === "ExtinctionEvent") {
      this.currentPhase = "Idle";
      log.warn(`generation ${selection.generation}: extinction, ${selection.deadCount} dead, no offspring`);
      return { kind: "Extinct", generation: nextGeneration - 1, scored, event: selection };
    }

    this.currentPhase = "Breeding";
    const offspring = breed(selection.pool, this.rng, this.modelIds, this.params);
    const requests = toSpawnRequests(offspring, this.catalog, nextGeneration);

    registry.replaceAll(requests);
    this.currentPhase = "Repopulated";
    log.debug(`generation ${nextGeneration}: ${offspring.length} offspring from pool of ${selection.pool.length}`);

    return { kind: "Repopulated", generation: nextGeneration, scored, offspring };
  }
}
