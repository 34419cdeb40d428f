/**
 * Simulation Runner
 * Wires the layers together: resolved catalog → generation-0 registry →
 * tick loop (fork-join physics) → evolution at each generation boundary.
 *
 * The catalog is resolved once, before any simulation component exists; nothing
 * below this point sees override data, only the frozen resolved table.
 */

import { createDefaultCatalog, type ParameterCatalog } from "./parameterCatalog";
import { resolve, requireModel, type ResolutionResult, type ResolvedCatalog } from "./hybridResolver";
import type { OverrideSet } from "./overrideLoader";
import { buildConfig, type SimulationConfig } from "./simulationConfig";
import { EdgeNodeRegistry, type EdgeNode, type NodeSnapshot, type SpawnRequest } from "./nodeRegistry";
import { seedGene } from "./gene";
import { advanceAll, commitStep } from "./physicsEngine";
import { sampleSolar } from "./solarProfile";
import { SimulationClock, type ClockState } from "./simulationClock";
import { EvolutionEngine } from "./evolutionEngine";
import { checkNodeInvariants } from "./invariants";
import {
  accumulateTick,
  createRunTotals,
  summarizeGeneration,
  type GenerationStats,
  type RunTotals,
} from "./simulationMetrics";
import { createRng, type Rng } from "../utils/rng";
import { createLogger } from "../utils/logger";

const log = createLogger("RUNNER");
const resolverLog = createLogger("RESOLVER");

export type RunStatus = "completed" | "extinct" | "stopped";

export interface TickReport {
  tick: number;
  timeOfDay: number;
  alive: number;
  died: number[]; // ids that died on this tick
}

export interface RunnerListener {
  onTick?: (report: TickReport) => void;
  onGeneration?: (stats: GenerationStats) => void;
}

export interface RunnerOptions {
  checkInvariants?: boolean; // default true
}

export interface SimulationSnapshot {
  nodes: NodeSnapshot[];
  clock: ClockState;
  totals: RunTotals;
  lastGeneration: GenerationStats | null;
}

export interface RunSummary {
  status: RunStatus;
  generations: GenerationStats[];
  totals: RunTotals;
  clock: ClockState;
}

/**
 * Fold a scenario-wide base load into the catalog: every model idles at
 * `baseLoadW`, and inference draw is raised to at least that much.
 */
export function applyBaseLoad(catalog: ResolvedCatalog, baseLoadW: number): ResolvedCatalog {
  const set: OverrideSet = {
    source: "config.baseLoadOverrideW",
    models: catalog.models.map((m) => ({
      identifier: m.identifier,
      fields: {
        idle_power_w: baseLoadW,
        inference_power_w: Math.max(m.inference_power_w, baseLoadW),
      },
    })),
    solar: [],
  };
  return resolve(catalog, [set]).catalog;
}

/**
 * Compiled catalog + overrides + scenario adjustments → the table the simulation runs on.
 * Issues are logged here and returned; they never abort.
 */
export function prepareCatalog(
  config: SimulationConfig,
  overrides: OverrideSet[] = [],
  base: ParameterCatalog = createDefaultCatalog()
): ResolutionResult {
  const result = resolve(base, overrides);
  for (const issue of result.issues) {
    resolverLog.warn(
      `malformed override ${issue.target}:${issue.profileId}${issue.field ? `.${issue.field}` : ""} = ${String(issue.value)} (${issue.reason})`
    );
  }
  const catalog = config.baseLoadOverrideW === null
    ? result.catalog
    : applyBaseLoad(result.catalog, config.baseLoadOverrideW);
  return { catalog, issues: result.issues };
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class SimulationRunner {
  readonly registry: EdgeNodeRegistry;
  readonly clock: SimulationClock;
  private readonly rng: Rng;
  private readonly engine: EvolutionEngine;
  private readonly listeners = new Set<RunnerListener>();
  private readonly checkInvariants: boolean;
  private totals: RunTotals = createRunTotals();
  private readonly history: GenerationStats[] = [];
  private culled: EdgeNode[] = []; // removed this generation under immediate culling
  private halted = false;
  private stopRequested = false;

  constructor(
    readonly config: SimulationConfig,
    readonly catalog: ResolvedCatalog,
    options: RunnerOptions = {}
  ) {
    this.checkInvariants = options.checkInvariants ?? true;
    this.rng = createRng(config.seed);
    this.registry = new EdgeNodeRegistry({
      layout: { width: config.gridWidth, height: config.gridHeight, spacing: config.gridSpacing },
      capacityWh: config.initialBatteryCapacityWh,
      initialChargeFraction: config.initialChargeFraction,
      hardwareTier: config.hardwareTier,
    });
    this.clock = new SimulationClock({
      tickDurationS: config.tickDurationS,
      ticksPerGeneration: config.ticksPerGeneration,
      startHour: config.startHour,
    });
    this.engine = new EvolutionEngine(catalog, config, this.rng);
    this.seedPopulation(0);
  }

  get generations(): readonly GenerationStats[] {
    return this.history;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  addListener(listener: RunnerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private seedPopulation(generation: number): void {
    const modelIds = this.catalog.models.map((m) => m.identifier);
    const requests: SpawnRequest[] = [];
    for (let slot = 0; slot < this.config.populationSize; slot++) {
      const gene = seedGene(this.rng, modelIds, this.config.initialMutationRate);
      requests.push({ slot, gene, model: requireModel(this.catalog, gene.modelId), generation, parentId: null });
    }
    this.registry.replaceAll(requests);
    log.debug(`seeded ${requests.length} nodes for generation ${generation}`);
  }

  /**
   * One tick: sample the sun, step every node against the same pre-tick state,
   * then commit the whole batch.
   */
  tick(): TickReport {
    const dtS = this.clock.dtS;
    const sample = sampleSolar(this.catalog.solar, this.clock.currentTimeOfDay(), this.config.solarAvailability);

    const nodes = this.registry.list();
    const results = advanceAll(nodes, sample, dtS);

    nodes.forEach((node, i) => this.registry.update(commitStep(node, results[i], dtS)));

    const died = results.filter((r) => r.died).map((r) => r.id);
    if (this.config.cullingPolicy === "immediate") {
      for (const id of died) {
        const node = this.registry.remove(id);
        if (node) this.culled.push(node);
      }
    }

    this.clock.tick();
    this.totals = accumulateTick(this.totals, results);

    if (this.checkInvariants) {
      checkNodeInvariants(this.registry.list(), this.config);
    }

    const report: TickReport = {
      tick: this.clock.state().tickCount,
      timeOfDay: this.clock.currentTimeOfDay(),
      alive: this.registry.alive().length,
      died,
    };
    for (const listener of this.listeners) listener.onTick?.(report);
    return report;
  }

  /**
   * Evolve at the boundary. Extinction either halts the run or reseeds
   * generation N+1 from the seed distribution, per extinctionPolicy.
   */
  endGeneration(): GenerationStats {
    const generation = this.clock.state().generation;
    const outcome = this.engine.run(this.registry, generation + 1, this.culled);
    this.culled = [];

    let stats: GenerationStats;
    if (outcome.kind === "Repopulated") {
      stats = summarizeGeneration(generation, outcome.scored, outcome.offspring.map((o) => o.gene));
      this.clock.advanceGeneration();
    } else if (this.config.extinctionPolicy === "reseed") {
      this.clock.advanceGeneration();
      this.seedPopulation(generation + 1);
      stats = summarizeGeneration(generation, outcome.scored, this.registry.list().map((n) => n.gene));
      log.warn(`generation ${generation} went extinct, reseeding generation ${generation + 1}`);
    } else {
      stats = summarizeGeneration(generation, outcome.scored, []);
      this.halted = true;
      log.warn(`generation ${generation} went extinct, halting`);
    }

    this.history.push(stats);
    log.info(
      `generation ${generation}: ${stats.alive} alive, ${stats.dead} dead, ` +
      `fitness mean ${stats.meanFitness.toFixed(1)} max ${stats.maxFitness.toFixed(1)}`
    );
    for (const listener of this.listeners) listener.onGeneration?.(stats);
    return stats;
  }

  /**
   * Ticks to the next boundary, then evolves.
   */
  runGeneration(): GenerationStats {
    while (!this.clock.generationBoundaryReached()) {
      this.tick();
    }
    return this.endGeneration();
  }

  /**
   * Request a clean stop; takes effect before the next tick.
   */
  stop(): void {
    this.stopRequested = true;
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const shouldStop = () => this.stopRequested || signal?.aborted === true;

    while (!this.halted && this.history.length < this.config.maxGenerations) {
      while (!this.clock.generationBoundaryReached()) {
        if (shouldStop()) return this.summary("stopped");
        this.tick();
      }
      this.endGeneration();
      // Let stop()/abort callers in between generations
      await nextTurn();
    }

    return this.summary(this.halted ? "extinct" : "completed");
  }

  summary(status: RunStatus): RunSummary {
    return {
      status,
      generations: [...this.history],
      totals: this.totals,
      clock: this.clock.state(),
    };
  }

  snapshot(): SimulationSnapshot {
    return {
      nodes: this.registry.snapshot(),
      clock: this.clock.state(),
      totals: this.totals,
      lastGeneration: this.history.length > 0 ? this.history[this.history.length - 1] : null,
    };
  }
}

export interface CreateSimulationInput {
  config?: Partial<SimulationConfig>;
  overrides?: OverrideSet[];
  catalog?: ParameterCatalog;
  options?: RunnerOptions;
}

/**
 * Validate config, resolve the catalog and build a runner. Throws InvalidConfigError.
 */
export function createSimulation(input: CreateSimulationInput = {}): { runner: SimulationRunner; resolution: ResolutionResult } {
  const config = buildConfig(input.config);
  const resolution = prepareCatalog(config, input.overrides, input.catalog);
  const runner = new SimulationRunner(config, resolution.catalog, input.options);
  log.info(
    `population ${config.populationSize} on ${config.gridWidth}x${config.gridHeight}, ` +
    `${resolution.catalog.models.length} models, seed ${config.seed}`
  );
  return { runner, resolution };
}
